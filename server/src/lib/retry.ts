import {
  PipelineError,
  ProviderError,
  QuotaExceededError,
  describeError,
} from './errors.js';
import { sleep as defaultSleep } from './sleep.js';

const QUOTA_STATUSES = new Set([429]);
const QUOTA_PATTERNS = [
  'rate limit',
  'rate_limit',
  'too many requests',
  'quota',
  'resource exhausted',
  'resource_exhausted',
];

/** Longest provider-advised wait we honour. */
export const MAX_ADVISED_DELAY_MS = 60_000;

// ─── Tagged outcomes ─────────────────────────────────────────────────

/** Result of a single attempt, as judged by the caller. */
export type AttemptResult<T> =
  | { kind: 'ok'; value: T }
  | { kind: 'retryable'; error: QuotaExceededError }
  | { kind: 'terminal'; error: Error };

/** Result of the whole bounded loop. */
export type RetryOutcome<T> =
  | { kind: 'ok'; value: T; attempts: number }
  | { kind: 'failed'; error: Error; attempts: number };

export interface QuotaRetryOptions {
  maxAttempts?: number;
  baseDelayMs?: number;
  sleep?: (ms: number) => Promise<void>;
  onRetry?: (attempt: number, error: QuotaExceededError, delayMs: number) => void;
}

/**
 * Delay before the next attempt: the provider's advice when it gave any,
 * otherwise `base * 2^(attempt - 1)`.
 */
export function backoffDelayMs(attempt: number, baseDelayMs: number, advisedMs: number | null): number {
  if (advisedMs != null && advisedMs > 0) {
    return Math.min(advisedMs, MAX_ADVISED_DELAY_MS);
  }
  return baseDelayMs * Math.pow(2, attempt - 1);
}

/**
 * Runs `attempt` until it succeeds, fails terminally, or `maxAttempts` quota
 * failures have been seen. Never throws for an attempt's failure; the outcome
 * says what happened.
 */
export async function withQuotaRetry<T>(
  attempt: (attemptNumber: number) => Promise<AttemptResult<T>>,
  options?: QuotaRetryOptions,
): Promise<RetryOutcome<T>> {
  const maxAttempts = Math.max(1, options?.maxAttempts ?? 3);
  const baseDelayMs = options?.baseDelayMs ?? 2000;
  const wait = options?.sleep ?? defaultSleep;

  let lastError: Error = new Error('No attempts were made');

  for (let n = 1; n <= maxAttempts; n++) {
    const result = await attempt(n);
    if (result.kind === 'ok') {
      return { kind: 'ok', value: result.value, attempts: n };
    }
    if (result.kind === 'terminal') {
      return { kind: 'failed', error: result.error, attempts: n };
    }

    lastError = result.error;
    if (n >= maxAttempts) break;

    const delay = backoffDelayMs(n, baseDelayMs, result.error.retry_after_ms);
    options?.onRetry?.(n, result.error, delay);
    await wait(delay);
  }

  return { kind: 'failed', error: lastError, attempts: maxAttempts };
}

// ─── Provider error classification ───────────────────────────────────

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

function readHeader(headers: unknown, name: string): string | null {
  if (headers instanceof Headers) {
    return headers.get(name);
  }
  if (!isRecord(headers)) return null;
  const key = Object.keys(headers).find((k) => k.toLowerCase() === name.toLowerCase());
  const value = key ? headers[key] : undefined;
  return typeof value === 'string' ? value : null;
}

export function getStatusCode(error: unknown): number | null {
  if (!isRecord(error)) return null;
  if (typeof error.status === 'number') return error.status;
  if (typeof error.statusCode === 'number') return error.statusCode;
  const response = error.response;
  if (isRecord(response) && typeof response.status === 'number') return response.status;
  return null;
}

/**
 * Parses a `retry-after` header value given in seconds.
 */
export function parseRetryAfterHeader(value: string | null): number | null {
  if (!value) return null;
  const seconds = Number.parseFloat(value);
  if (!Number.isFinite(seconds) || seconds <= 0) return null;
  return Math.min(seconds * 1000, MAX_ADVISED_DELAY_MS);
}

/**
 * Finds a wait the provider advised inside an error payload or message, e.g.
 * `"retryDelay": "12s"`, `"retry_after": 3` or "Please retry in 4.5s".
 */
export function parseAdvisedDelayMs(text: string): number | null {
  const patterns: Array<{ re: RegExp; unit: (m: RegExpMatchArray) => number }> = [
    { re: /"retryDelay"\s*:\s*"(\d+(?:\.\d+)?)s"/i, unit: () => 1000 },
    { re: /"retry_after(?:_seconds)?"\s*:\s*"?(\d+(?:\.\d+)?)/i, unit: () => 1000 },
    {
      re: /retry (?:in|after) (\d+(?:\.\d+)?)\s*(ms|milliseconds?|s|sec|seconds?)?\b/i,
      unit: (m) => (m[2] && m[2].toLowerCase().startsWith('m') ? 1 : 1000),
    },
  ];

  for (const { re, unit } of patterns) {
    const match = text.match(re);
    if (!match) continue;
    const amount = Number.parseFloat(match[1]);
    if (Number.isFinite(amount) && amount > 0) {
      return Math.min(amount * unit(match), MAX_ADVISED_DELAY_MS);
    }
  }
  return null;
}

/**
 * Advised wait from headers attached to the error (directly or under
 * `response`), falling back to the message text.
 */
export function getRetryAfterMs(error: unknown): number | null {
  if (isRecord(error)) {
    const response = error.response;
    const header = readHeader(error.headers, 'retry-after')
      ?? (isRecord(response) ? readHeader(response.headers, 'retry-after') : null);
    const fromHeader = parseRetryAfterHeader(header);
    if (fromHeader != null) return fromHeader;
  }
  return parseAdvisedDelayMs(describeError(error));
}

export function isQuotaSignal(error: unknown): boolean {
  const status = getStatusCode(error);
  if (status != null && QUOTA_STATUSES.has(status)) return true;
  const msg = describeError(error).toLowerCase();
  return QUOTA_PATTERNS.some((p) => msg.includes(p));
}

/**
 * Maps anything a provider threw onto the pipeline taxonomy. Errors that are
 * already classified pass through unchanged.
 */
export function classifyProviderError(error: unknown): PipelineError {
  if (error instanceof PipelineError) return error;
  const message = describeError(error);
  if (isQuotaSignal(error)) {
    return new QuotaExceededError(message, getRetryAfterMs(error), { cause: error });
  }
  return new ProviderError(message, getStatusCode(error), { cause: error });
}
