// packages/pipeline/src/errors.ts
//
// Error taxonomy shared by every pipeline stage and the HTTP layer.
// `status` follows HTTP semantics so the API can forward it unchanged.

export type PipelineErrorCode = "VALIDATION_ERROR" | "INSUFFICIENT_DATA" | "EXTERNAL_SERVICE_ERROR";

export class PipelineError extends Error {
  public readonly code: PipelineErrorCode;
  public readonly status: number;
  public readonly details: Record<string, unknown>;

  constructor(code: PipelineErrorCode, status: number, message: string, details: Record<string, unknown> = {}) {
    super(message);
    this.name = "PipelineError";
    this.code = code;
    this.status = status;
    this.details = details;
  }
}

/** Malformed or out-of-domain input. Never recovered inside the pipeline. */
export class ValidationError extends PipelineError {
  constructor(message: string, details: Record<string, unknown> = {}) {
    super("VALIDATION_ERROR", 400, message, details);
    this.name = "ValidationError";
  }
}

export class InsufficientDataError extends PipelineError {
  public readonly required: number;
  public readonly actual: number;

  constructor(what: string, required: number, actual: number) {
    super(
      "INSUFFICIENT_DATA",
      422,
      `${what} needs at least ${required} records, got ${actual}; supply a longer date range`,
      { required, actual }
    );
    this.name = "InsufficientDataError";
    this.required = required;
    this.actual = actual;
  }
}

export type ExternalServiceErrorKind = "timeout" | "http" | "network" | "malformed" | "credential";

/**
 * Raised by the text-generation client. Only the service narrative strategy
 * sees it; callers of generateReport never do.
 */
export class ExternalServiceError extends PipelineError {
  public readonly kind: ExternalServiceErrorKind;

  constructor(kind: ExternalServiceErrorKind, message: string, details: Record<string, unknown> = {}) {
    super("EXTERNAL_SERVICE_ERROR", 502, message, { ...details, kind });
    this.name = "ExternalServiceError";
    this.kind = kind;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
