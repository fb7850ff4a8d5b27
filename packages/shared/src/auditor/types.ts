/**
 * Auditor Types
 *
 * The model service is a black box: system instruction + user content in,
 * text out. Production uses the OpenAI client; tests inject a fake.
 */

import { config } from '../config';
import type { AuditPromptTemplate } from '../templates/types';
import { RELATED_PARTY_AUDIT_TEMPLATE } from '../templates/related-party-audit.template';

export interface ModelRequest {
  model: string;
  systemPrompt: string;
  userPrompt: string;
  /** Upper bound for the whole request */
  timeoutMs: number;
}

export interface ModelCompletion {
  text: string;
  /** Model that served the request, as reported by the service */
  model: string;
  requestId?: string;
}

/**
 * Chat-style completion service. Transport and auth failures reject the promise.
 */
export interface ModelClient {
  complete(request: ModelRequest): Promise<ModelCompletion>;
}

export interface AuditorConfig {
  model: string;
  template: AuditPromptTemplate;
  /** Shorter focused sections are reported as an extraction failure without calling the model */
  minTextChars: number;
  /** Focused text is cut to this length before it goes into the prompt */
  maxPromptChars: number;
  requestTimeoutMs: number;
}

export function createAuditorConfig(overrides: Partial<AuditorConfig> = {}): AuditorConfig {
  return {
    model: config.llmModelAudit,
    template: RELATED_PARTY_AUDIT_TEMPLATE,
    minTextChars: config.minAuditTextChars,
    maxPromptChars: config.maxPromptChars,
    requestTimeoutMs: config.llmRequestTimeoutMs,
    ...overrides,
  };
}
