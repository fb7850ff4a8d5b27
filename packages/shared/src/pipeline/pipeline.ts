/**
 * Audit Pipeline
 *
 * ingest -> audit -> redact -> done. Each stage takes the current record and
 * returns the fields it produced; the controller merges them into a new record.
 * Stages own their failure handling, so the controller never retries or skips.
 * The one exception is an unreadable source document, which rejects the run.
 */

import { ulid } from 'ulid';
import { getContext, runWithContextAsync } from '../context';
import { DocumentReadError, AppError } from '../errors';
import { logger } from '../logger';
import { auditsCounter, pageSelectionCounter, stageDurationHistogram } from '../metrics';
import type { Auditor } from '../auditor/auditor';
import { countRedactions, redactText, serializeAnalysis } from '../redaction/redactor';
import {
  createPageSelectorOptions,
  selectRelevantPages,
  type PageSelectorOptions,
} from '../selection/page-selector';
import type {
  DocumentLoader,
  DocumentSource,
  PageText,
  PipelineOutcome,
  PipelineRecord,
  PipelineState,
} from '../types';

export interface PipelineDependencies {
  loadDocument: DocumentLoader;
  auditor: Auditor;
  pageSelector?: PageSelectorOptions;
}

export interface PipelineStage {
  name: Exclude<PipelineState, 'done'>;
  run(record: PipelineRecord, deps: PipelineDependencies): Promise<Partial<PipelineRecord>>;
}

/**
 * Read every page of the source. Any failure here is a DocumentReadError.
 */
export async function readPages(
  sourcePath: string,
  loadDocument: DocumentLoader
): Promise<PageText[]> {
  let source: DocumentSource;
  try {
    source = await loadDocument(sourcePath);
  } catch (error) {
    throw new DocumentReadError(sourcePath, error);
  }

  try {
    const pages: PageText[] = [];
    for (let index = 0; index < source.pageCount; index++) {
      pages.push({ pageNumber: index + 1, text: await source.getPageText(index) });
    }
    return pages;
  } catch (error) {
    throw new DocumentReadError(sourcePath, error);
  } finally {
    await source.close().catch((error: unknown) => {
      logger.warn('Failed to close document source', {
        error: error instanceof Error ? error.message : String(error),
      });
    });
  }
}

const ingestStage: PipelineStage = {
  name: 'ingest',
  async run(record, deps) {
    const pages = await readPages(record.sourcePath, deps.loadDocument);
    const selection = selectRelevantPages(pages, deps.pageSelector ?? createPageSelectorOptions());

    pageSelectionCounter.inc({ mode: selection.usedFallback ? 'fallback' : 'matched' });

    if (selection.usedFallback) {
      logger.warn('No related party section found, using start of document', {
        page_count: pages.length,
      });
    }
    logger.info('Focused section extracted', {
      page_count: pages.length,
      matched_pages: selection.matchedPages,
      focused_chars: selection.focusedSection.length,
    });

    return { focusedSection: selection.focusedSection };
  },
};

const auditStage: PipelineStage = {
  name: 'audit',
  async run(record, deps) {
    return { analysisResult: await deps.auditor.audit(record.focusedSection) };
  },
};

const redactStage: PipelineStage = {
  name: 'redact',
  async run(record) {
    if (!record.analysisResult) {
      throw new AppError('Redaction reached without an analysis result', 'PIPELINE_ORDER');
    }
    const serialized = serializeAnalysis(record.analysisResult);
    logger.info('Analysis redacted', { redactions: countRedactions(serialized) });
    return { redactedReport: redactText(serialized) };
  },
};

export const PIPELINE_STAGES: readonly PipelineStage[] = [ingestStage, auditStage, redactStage];

export function createPipelineRecord(sourcePath: string): PipelineRecord {
  return { sourcePath, focusedSection: '', redactedReport: '' };
}

/**
 * Run one audit over one document. Each call owns its record.
 */
export async function runAuditPipeline(
  sourcePath: string,
  deps: PipelineDependencies
): Promise<PipelineOutcome> {
  const auditId = ulid();
  const correlationId = getContext()?.correlationId ?? auditId;

  return runWithContextAsync({ correlationId, auditId, sourcePath }, async () => {
    let record = createPipelineRecord(sourcePath);
    let state: PipelineState = PIPELINE_STAGES[0].name;

    logger.info('Audit pipeline started');

    for (const stage of PIPELINE_STAGES) {
      state = stage.name;
      const endTimer = stageDurationHistogram.startTimer({ stage: stage.name });
      try {
        record = { ...record, ...(await stage.run(record, deps)) };
      } catch (error) {
        logger.error('Audit pipeline aborted', error, { state });
        throw error;
      } finally {
        endTimer();
      }
    }

    const { analysisResult } = record;
    if (!analysisResult) {
      throw new AppError('Audit pipeline finished without an analysis result', 'PIPELINE_ORDER');
    }

    auditsCounter.inc({ status: analysisResult.metadata.status });
    logger.info('Audit pipeline complete', {
      status: analysisResult.metadata.status,
      compliance_score: analysisResult.complianceScore,
    });

    return {
      state: 'done',
      auditId,
      record: {
        sourcePath: record.sourcePath,
        focusedSection: record.focusedSection,
        analysisResult,
        redactedReport: record.redactedReport,
      },
    };
  });
}
