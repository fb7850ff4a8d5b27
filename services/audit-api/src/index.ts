/**
 * Audit API Service
 *
 * Wires the pdfjs document source and the OpenAI client into the pipeline and
 * starts the HTTP server.
 */

import {
  Auditor,
  OpenAiModelClient,
  config,
  enableDefaultMetrics,
  logger,
} from '@governance-audit/shared';
import { createApp } from './app';
import { openPdfDocument } from './lib/pdf';

enableDefaultMetrics();

const auditor = new Auditor(new OpenAiModelClient());
const app = createApp({ loadDocument: openPdfDocument, auditor });

const server = app.listen(config.port, () => {
  logger.info('Audit API started', { port: config.port, model: auditor.settings.model });
});

// Graceful shutdown
function shutdown(signal: string) {
  logger.info(`${signal} received, shutting down`);
  server.close(() => process.exit(0));
}

process.on('SIGTERM', () => shutdown('SIGTERM'));
process.on('SIGINT', () => shutdown('SIGINT'));
