/**
 * Error taxonomy for the matching pipeline.
 *
 * Item-level errors (quota, provider, malformed, validation) are recorded by the
 * stage that hit them. StageFailure is raised when a whole stage cannot produce
 * output; the orchestrator turns it into a run warning.
 */

export type PipelineErrorCode =
  | 'QUOTA_EXCEEDED'
  | 'PROVIDER_ERROR'
  | 'MALFORMED_RESPONSE'
  | 'VALIDATION_ERROR'
  | 'STAGE_FAILURE';

export class PipelineError extends Error {
  readonly code: PipelineErrorCode;

  constructor(code: PipelineErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'PipelineError';
    this.code = code;
  }
}

export class QuotaExceededError extends PipelineError {
  /** Wait advised by the provider, if it sent one. */
  readonly retry_after_ms: number | null;

  constructor(message: string, retryAfterMs: number | null = null, options?: { cause?: unknown }) {
    super('QUOTA_EXCEEDED', message, options);
    this.name = 'QuotaExceededError';
    this.retry_after_ms = retryAfterMs;
  }
}

export class ProviderError extends PipelineError {
  readonly status: number | null;

  constructor(message: string, status: number | null = null, options?: { cause?: unknown }) {
    super('PROVIDER_ERROR', message, options);
    this.name = 'ProviderError';
    this.status = status;
  }
}

export class MalformedResponseError extends PipelineError {
  readonly raw_text: string;

  constructor(message: string, rawText: string, options?: { cause?: unknown }) {
    super('MALFORMED_RESPONSE', message, options);
    this.name = 'MalformedResponseError';
    this.raw_text = rawText;
  }
}

export class ValidationError extends PipelineError {
  readonly field: string | null;

  constructor(message: string, field: string | null = null) {
    super('VALIDATION_ERROR', message);
    this.name = 'ValidationError';
    this.field = field;
  }
}

export class StageFailure extends PipelineError {
  readonly stage: string;

  constructor(stage: string, message: string, options?: { cause?: unknown }) {
    super('STAGE_FAILURE', message, options);
    this.name = 'StageFailure';
    this.stage = stage;
  }
}

export function isPipelineError(error: unknown): error is PipelineError {
  return error instanceof PipelineError;
}

/** Code for anything thrown; foreign errors count as provider errors. */
export function errorCodeOf(error: unknown): PipelineErrorCode {
  return isPipelineError(error) ? error.code : 'PROVIDER_ERROR';
}

/**
 * Operator-facing text for an arbitrary thrown value.
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message || error.name;
  if (typeof error === 'string') return error;
  try {
    return JSON.stringify(error) ?? String(error);
  } catch {
    return String(error);
  }
}
