/**
 * Uploaded PDF Handling
 *
 * Each upload gets its own temp directory for the lifetime of one pipeline run.
 */

import fs from 'fs';
import os from 'os';
import path from 'path';
import {
  formatAuditSummary,
  logger,
  redactText,
  runAuditPipeline,
  type AuditResponse,
  type PipelineDependencies,
} from '@governance-audit/shared';

export async function auditUploadedPdf(
  body: Buffer,
  deps: PipelineDependencies
): Promise<AuditResponse> {
  const tempDir = await fs.promises.mkdtemp(path.join(os.tmpdir(), 'governance-audit-'));
  const sourcePath = path.join(tempDir, 'report.pdf');

  try {
    await fs.promises.writeFile(sourcePath, body);

    const outcome = await runAuditPipeline(sourcePath, deps);
    const { analysisResult, redactedReport } = outcome.record;

    return {
      audit_id: outcome.auditId,
      analysis_result: analysisResult,
      redacted_report: redactedReport,
      summary: formatAuditSummary(analysisResult).map(redactText),
    };
  } finally {
    await fs.promises.rm(tempDir, { recursive: true, force: true }).catch((error: unknown) => {
      logger.warn('Failed to remove upload temp directory', {
        tempDir,
        error: error instanceof Error ? error.message : String(error),
      });
    });
  }
}
