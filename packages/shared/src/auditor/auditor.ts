/**
 * Forensic Auditor
 *
 * Sends the focused related-party text to the model and turns whatever comes
 * back into a well-formed AnalysisResult. Nothing thrown by the model call or
 * the reply parsing leaves this class; failures become error results.
 */

import { logger } from '../logger';
import { auditFailuresCounter } from '../metrics';
import { validateAuditPayload } from '../schemas';
import {
  MalformedResponseError,
  describeError,
  type AuditFailureKind,
} from '../errors';
import type { AnalysisResult } from '../types';
import { normalizeAuditPayload } from './normalize';
import { parseAuditPayload } from './response-parser';
import { createAuditorConfig, type AuditorConfig, type ModelClient } from './types';

function formatLatency(startTime: number): string {
  return `${((Date.now() - startTime) / 1000).toFixed(2)}s`;
}

/**
 * Result for a focused section too short to be worth a model call
 */
export function buildExtractionFailedResult(): AnalysisResult {
  return {
    complianceScore: 0,
    riskLevel: 'ERROR',
    redFlags: [
      {
        kind: 'structured',
        issue: 'Extraction Failed',
        severity: 'HIGH',
        regulation: 'N/A',
        evidence: 'No text found in PDF',
      },
    ],
    financialExposure: { kind: 'freeform', text: 'Unknown' },
    exposureAmounts: [],
    metadata: { status: 'Failed', source: 'System', model: 'None' },
  };
}

/**
 * Result for a failed or unparsable model call
 */
export function buildModelErrorResult(
  errorMessage: string,
  model: string,
  latency?: string
): AnalysisResult {
  return {
    complianceScore: 0,
    riskLevel: 'API_ERROR',
    redFlags: [
      {
        kind: 'structured',
        issue: 'AI Generation Failed',
        severity: 'CRITICAL',
        regulation: 'N/A',
        evidence: errorMessage,
      },
    ],
    financialExposure: { kind: 'freeform', text: 'Unknown' },
    exposureAmounts: [],
    metadata: { status: 'Error', source: 'Fallback', model, latency, errorMessage },
  };
}

export class Auditor {
  private readonly auditorConfig: AuditorConfig;

  constructor(
    private readonly client: ModelClient,
    auditorConfig: Partial<AuditorConfig> = {}
  ) {
    this.auditorConfig = createAuditorConfig(auditorConfig);
  }

  get settings(): Readonly<AuditorConfig> {
    return this.auditorConfig;
  }

  async audit(sectionText: string): Promise<AnalysisResult> {
    const { model, template, minTextChars, maxPromptChars, requestTimeoutMs } = this.auditorConfig;

    if (sectionText.length < minTextChars) {
      this.recordFailure('extraction_insufficient');
      logger.warn('Focused section too short for analysis, skipping model call', {
        text_length: sectionText.length,
        min_text_chars: minTextChars,
      });
      return buildExtractionFailedResult();
    }

    const promptText = sectionText.slice(0, maxPromptChars);
    const userPrompt = template.userPromptTemplate.replace('{{section_text}}', () => promptText);

    logger.info('Requesting forensic analysis', {
      model,
      prompt_version: template.version,
      text_length: promptText.length,
      truncated: promptText.length < sectionText.length,
    });

    const startTime = Date.now();

    try {
      const completion = await this.client.complete({
        model,
        systemPrompt: template.systemPrompt,
        userPrompt,
        timeoutMs: requestTimeoutMs,
      });
      const latency = formatLatency(startTime);

      const payload = parseAuditPayload(completion.text);
      const validation = validateAuditPayload(payload);
      const normalized = normalizeAuditPayload(payload);
      const schemaWarnings = [...(validation.errors ?? []), ...normalized.warnings];

      logger.info('Forensic analysis complete', {
        model: completion.model,
        latency,
        compliance_score: normalized.complianceScore,
        risk_level: normalized.riskLevel,
        red_flag_count: normalized.redFlags.length,
        schema_warning_count: schemaWarnings.length,
      });

      return {
        complianceScore: normalized.complianceScore,
        riskLevel: normalized.riskLevel,
        redFlags: normalized.redFlags,
        financialExposure: normalized.financialExposure,
        exposureAmounts: normalized.exposureAmounts,
        metadata: {
          status: 'Success',
          source: 'OpenAI API',
          model: completion.model,
          latency,
          requestId: completion.requestId,
          ...(schemaWarnings.length > 0 ? { schemaWarnings } : {}),
        },
      };
    } catch (error) {
      const latency = formatLatency(startTime);
      const kind: AuditFailureKind =
        error instanceof MalformedResponseError
          ? 'model_response_malformed'
          : 'model_transport_failure';

      this.recordFailure(kind);
      logger.error('Forensic analysis failed', error, { model, kind, latency });

      return buildModelErrorResult(describeError(error), model, latency);
    }
  }

  private recordFailure(kind: AuditFailureKind): void {
    auditFailuresCounter.inc({ kind });
  }
}
