/**
 * Shared TypeScript Types
 *
 * Types for the governance audit pipeline. The model payload contract lives in
 * docs/contracts/audit_payload.schema.json.
 */

// ============================================================================
// Document Text
// ============================================================================

/**
 * Page text with its 1-based page number
 */
export interface PageText {
  pageNumber: number;
  text: string;
}

/**
 * Readable document handle supplying page-by-page plain text
 */
export interface DocumentSource {
  readonly pageCount: number;
  /** Text of the page at a 0-based index */
  getPageText(index: number): Promise<string>;
  close(): Promise<void>;
}

export type DocumentLoader = (sourcePath: string) => Promise<DocumentSource>;

// ============================================================================
// Red Flags & Exposure
// ============================================================================

/**
 * Flag returned by the model as an object
 */
export interface StructuredFlag {
  kind: 'structured';
  issue: string;
  severity: string;
  regulation: string;
  evidence: string;
}

/**
 * Flag returned by the model as a bare string
 */
export interface FreeformNote {
  kind: 'freeform';
  note: string;
}

export type RedFlag = StructuredFlag | FreeformNote;

export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

export type FinancialExposure =
  | { kind: 'freeform'; text: string }
  | { kind: 'structured'; value: JsonValue };

// ============================================================================
// Analysis Result
// ============================================================================

export type AnalysisStatus = 'Success' | 'Failed' | 'Error';

export interface AnalysisMetadata {
  status: AnalysisStatus;
  /** Where the result came from: the model, the local guard, or the error fallback */
  source: 'OpenAI API' | 'System' | 'Fallback';
  model: string;
  /** Wall-clock model latency, e.g. "2.41s" */
  latency?: string;
  requestId?: string;
  errorMessage?: string;
  schemaWarnings?: string[];
}

export interface AnalysisResult {
  /** 0-100 */
  complianceScore: number;
  riskLevel: string;
  redFlags: RedFlag[];
  financialExposure: FinancialExposure;
  /** Absolute rupee values found in the exposure by the lakh/crore normalizer */
  exposureAmounts: number[];
  metadata: AnalysisMetadata;
}

// ============================================================================
// Pipeline
// ============================================================================

export interface PipelineRecord {
  sourcePath: string;
  focusedSection: string;
  analysisResult?: AnalysisResult;
  redactedReport: string;
}

export type PipelineState = 'ingest' | 'audit' | 'redact' | 'done';

export interface PipelineOutcome {
  state: 'done';
  auditId: string;
  record: Required<PipelineRecord>;
}

// ============================================================================
// API Types
// ============================================================================

export interface AuditResponse {
  audit_id: string;
  analysis_result: AnalysisResult;
  redacted_report: string;
  summary: string[];
}

export interface ErrorEnvelope {
  error: {
    code: string;
    message: string;
    correlation_id: string;
  };
}
