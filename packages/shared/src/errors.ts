/**
 * Error types for the audit pipeline
 */

/**
 * Base error class for all application errors
 */
export class AppError extends Error {
  public readonly code: string;
  public readonly statusCode: number;
  public readonly context?: Record<string, unknown>;

  constructor(
    message: string,
    code: string,
    statusCode: number = 500,
    context?: Record<string, unknown>
  ) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.statusCode = statusCode;
    this.context = context;

    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * The source document could not be opened or read.
 * The only failure that aborts a pipeline run.
 */
export class DocumentReadError extends AppError {
  constructor(sourcePath: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Unable to read document: ${reason}`, 'DOCUMENT_UNREADABLE', 422, { sourcePath });
    this.cause = cause;
  }
}

/**
 * Failures the auditor recovers locally into an error result.
 */
export type AuditFailureKind =
  | 'extraction_insufficient'
  | 'model_transport_failure'
  | 'model_response_malformed';

/**
 * Thrown inside the auditor when a model reply cannot be turned into a payload.
 * Never escapes the auditor.
 */
export class MalformedResponseError extends AppError {
  constructor(message: string) {
    super(message, 'MODEL_RESPONSE_MALFORMED', 502);
  }
}

/**
 * Get a printable description of any thrown value
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message || error.name;
  }
  return String(error);
}
