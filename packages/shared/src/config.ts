/**
 * Centralized Configuration
 *
 * All configuration values can be tuned via environment variables.
 */

export interface Config {
  // API
  port: number;
  maxUploadBytes: number;

  // LLM
  llmModelAudit: string;
  llmRequestTimeoutMs: number;
  openaiApiKey: string;

  // Page selection
  maxFocusedSectionChars: number;
  fallbackPageCount: number;

  // Auditor guards
  minAuditTextChars: number;
  maxPromptChars: number;
}

export const config: Config = {
  // API
  port: parseInt(process.env.PORT || '8080', 10),
  maxUploadBytes: parseInt(process.env.MAX_UPLOAD_BYTES || String(50 * 1024 * 1024), 10),

  // LLM
  llmModelAudit: process.env.LLM_MODEL_AUDIT || 'gpt-4o-mini',
  llmRequestTimeoutMs: parseInt(process.env.LLM_REQUEST_TIMEOUT_MS || '60000', 10),
  openaiApiKey: process.env.OPENAI_API_KEY || '',

  // Page selection
  maxFocusedSectionChars: parseInt(process.env.MAX_FOCUSED_SECTION_CHARS || '30000', 10),
  fallbackPageCount: parseInt(process.env.FALLBACK_PAGE_COUNT || '10', 10),

  // Auditor guards
  minAuditTextChars: parseInt(process.env.MIN_AUDIT_TEXT_CHARS || '100', 10),
  maxPromptChars: parseInt(process.env.MAX_PROMPT_CHARS || '25000', 10),
};
