/**
 * Shared Package - Main Export
 */

// Context
export {
  getContext,
  getCorrelationId,
  runWithContext,
  runWithContextAsync,
  type RequestContext,
} from './context';

// Logger
export { logger, type LogContext } from './logger';

// Config
export { config, type Config } from './config';

// Errors
export {
  AppError,
  DocumentReadError,
  MalformedResponseError,
  describeError,
  type AuditFailureKind,
} from './errors';

// Types
export * from './types';

// Metrics
export {
  register,
  enableDefaultMetrics,
  auditsCounter,
  auditFailuresCounter,
  pageSelectionCounter,
  stageDurationHistogram,
  llmRequestsCounter,
  llmRequestDurationHistogram,
  httpRequestDurationHistogram,
  httpRequestsCounter,
  getMetrics,
  getMetricsContentType,
} from './metrics';

// Schemas
export { validateAuditPayload, type ValidationResult } from './schemas';

// Templates
export { RELATED_PARTY_AUDIT_TEMPLATE, type AuditPromptTemplate } from './templates';

// Page selection
export {
  selectRelevantPages,
  scorePage,
  formatPageBlock,
  createPageSelectorOptions,
  DEFAULT_PRIMARY_KEYWORDS,
  DEFAULT_SECONDARY_KEYWORDS,
  type PageSelectorOptions,
  type PageSelection,
  type PageScore,
} from './selection/page-selector';

// Currency
export { parseIndianCurrency, LAKH, CRORE } from './currency/indian-currency';

// Auditor
export {
  Auditor,
  buildExtractionFailedResult,
  buildModelErrorResult,
} from './auditor/auditor';
export { OpenAiModelClient, type OpenAiModelClientOptions } from './auditor/openai-client';
export {
  parseAuditPayload,
  unwrapJsonBlock,
  isJsonObject,
  type JsonObject,
} from './auditor/response-parser';
export {
  normalizeAuditPayload,
  normalizeFlag,
  normalizeExposure,
  normalizeScore,
  type NormalizedPayload,
} from './auditor/normalize';
export {
  createAuditorConfig,
  type AuditorConfig,
  type ModelClient,
  type ModelCompletion,
  type ModelRequest,
} from './auditor/types';

// Redaction
export {
  redactAnalysis,
  redactText,
  serializeAnalysis,
  countRedactions,
  REDACTION_RULES,
  type PiiKind,
} from './redaction/redactor';

// Report
export { formatAuditSummary, formatRupees } from './report/summary';

// Pipeline
export {
  runAuditPipeline,
  readPages,
  createPipelineRecord,
  PIPELINE_STAGES,
  type PipelineDependencies,
  type PipelineStage,
} from './pipeline/pipeline';
