/**
 * PDF Document Source
 *
 * Page-by-page text extraction using pdfjs-dist.
 */

import fs from 'fs';
import path from 'path';
import { logger, type DocumentSource } from '@governance-audit/shared';
import { joinTextItems, type PositionedText } from './text-lines';

// pdfjs-dist ships ES modules only; import() keeps it out of the CommonJS graph
function importPdfJs() {
  return import('pdfjs-dist/legacy/build/pdf.mjs');
}

type PdfJs = Awaited<ReturnType<typeof importPdfJs>>;
type PdfDocument = Awaited<ReturnType<PdfJs['getDocument']>['promise']>;

let pdfJs: Promise<PdfJs> | undefined;

function loadPdfJs(): Promise<PdfJs> {
  pdfJs ??= importPdfJs().then((pdfjsLib) => {
    // Configure worker for Node.js environment
    pdfjsLib.GlobalWorkerOptions.workerSrc = path.join(
      path.dirname(require.resolve('pdfjs-dist/package.json')),
      'legacy/build/pdf.worker.mjs'
    );
    return pdfjsLib;
  });
  return pdfJs;
}

export class PdfDocumentSource implements DocumentSource {
  constructor(private readonly pdf: PdfDocument) {}

  get pageCount(): number {
    return this.pdf.numPages;
  }

  async getPageText(index: number): Promise<string> {
    const page = await this.pdf.getPage(index + 1);
    const textContent = await page.getTextContent();

    const items: PositionedText[] = [];
    for (const item of textContent.items) {
      if ('str' in item) {
        items.push({ str: item.str, transform: item.transform });
      }
    }

    page.cleanup();
    return joinTextItems(items);
  }

  async close(): Promise<void> {
    await this.pdf.destroy();
  }
}

/**
 * Open a PDF on disk as a DocumentSource
 */
export async function openPdfDocument(filePath: string): Promise<DocumentSource> {
  logger.info('Opening PDF', { filePath });

  const pdfjsLib = await loadPdfJs();
  const data = new Uint8Array(await fs.promises.readFile(filePath));
  const pdf = await pdfjsLib.getDocument({ data, isEvalSupported: false }).promise;

  logger.info('PDF opened', { filePath, totalPages: pdf.numPages });

  return new PdfDocumentSource(pdf);
}
