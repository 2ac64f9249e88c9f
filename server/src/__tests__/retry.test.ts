import { describe, it, expect, vi } from 'vitest';
import {
  backoffDelayMs,
  classifyProviderError,
  getRetryAfterMs,
  parseAdvisedDelayMs,
  withQuotaRetry,
  type AttemptResult,
} from '../lib/retry.js';
import { ProviderError, QuotaExceededError } from '../lib/errors.js';

function quota(retryAfterMs: number | null = null): AttemptResult<string> {
  return { kind: 'retryable', error: new QuotaExceededError('rate limited', retryAfterMs) };
}

describe('withQuotaRetry', () => {
  it('returns ok after quota failures with exponential backoff', async () => {
    const sleeps: number[] = [];
    let attempts = 0;
    const outcome = await withQuotaRetry<string>(async () => {
      attempts += 1;
      return attempts < 3 ? quota() : { kind: 'ok', value: 'done' };
    }, { maxAttempts: 3, baseDelayMs: 100, sleep: async (ms) => { sleeps.push(ms); } });

    expect(outcome).toEqual({ kind: 'ok', value: 'done', attempts: 3 });
    expect(sleeps).toEqual([100, 200]);
  });

  it('prefers the provider-advised delay', async () => {
    const sleeps: number[] = [];
    let attempts = 0;
    await withQuotaRetry<string>(async () => {
      attempts += 1;
      return attempts === 1 ? quota(7_000) : { kind: 'ok', value: 'x' };
    }, { baseDelayMs: 100, sleep: async (ms) => { sleeps.push(ms); } });

    expect(sleeps).toEqual([7_000]);
  });

  it('fails after maxAttempts quota errors without a trailing sleep', async () => {
    const sleeps: number[] = [];
    const onRetry = vi.fn();
    const outcome = await withQuotaRetry<string>(async () => quota(), {
      maxAttempts: 3,
      baseDelayMs: 10,
      sleep: async (ms) => { sleeps.push(ms); },
      onRetry,
    });

    expect(outcome.kind).toBe('failed');
    expect(outcome.attempts).toBe(3);
    if (outcome.kind === 'failed') {
      expect(outcome.error).toBeInstanceOf(QuotaExceededError);
    }
    expect(sleeps).toEqual([10, 20]);
    expect(onRetry).toHaveBeenCalledTimes(2);
    expect(onRetry).toHaveBeenNthCalledWith(2, 2, expect.any(QuotaExceededError), 20);
  });

  it('stops at the first terminal error', async () => {
    let attempts = 0;
    const outcome = await withQuotaRetry<string>(async () => {
      attempts += 1;
      return { kind: 'terminal', error: new ProviderError('bad request', 400) };
    }, { sleep: async () => {} });

    expect(attempts).toBe(1);
    expect(outcome.kind).toBe('failed');
    expect(outcome.attempts).toBe(1);
  });
});

describe('backoffDelayMs', () => {
  it('doubles from the base and caps advised waits at 60s', () => {
    expect(backoffDelayMs(1, 2000, null)).toBe(2000);
    expect(backoffDelayMs(3, 2000, null)).toBe(8000);
    expect(backoffDelayMs(1, 2000, 120_000)).toBe(60_000);
  });
});

describe('advised delay parsing', () => {
  it('reads retryDelay, retry_after and "retry in" text', () => {
    expect(parseAdvisedDelayMs('{"retryDelay": "12s"}')).toBe(12_000);
    expect(parseAdvisedDelayMs('{"retry_after": 3}')).toBe(3_000);
    expect(parseAdvisedDelayMs('Please retry in 4.5s')).toBe(4_500);
    expect(parseAdvisedDelayMs('retry after 250ms')).toBe(250);
    expect(parseAdvisedDelayMs('nothing here')).toBeNull();
  });

  it('uses a Retry-After header from response metadata', () => {
    const err = Object.assign(new Error('rate limited'), {
      response: { status: 429, headers: new Headers([['retry-after', '2']]) },
    });
    expect(getRetryAfterMs(err)).toBe(2_000);
  });
});

describe('classifyProviderError', () => {
  it('maps 429 and quota wording to QuotaExceededError', () => {
    const byStatus = classifyProviderError(Object.assign(new Error('slow down'), { status: 429 }));
    const byText = classifyProviderError(new Error('Resource exhausted: quota exceeded, retry in 5s'));

    expect(byStatus).toBeInstanceOf(QuotaExceededError);
    expect(byText).toBeInstanceOf(QuotaExceededError);
    expect(byText instanceof QuotaExceededError && byText.retry_after_ms).toBe(5_000);
  });

  it('maps everything else to ProviderError with its status', () => {
    const classified = classifyProviderError(Object.assign(new Error('server exploded'), { status: 500 }));
    expect(classified).toBeInstanceOf(ProviderError);
    expect(classified instanceof ProviderError && classified.status).toBe(500);
    expect(classified.code).toBe('PROVIDER_ERROR');
  });

  it('passes pipeline errors through unchanged', () => {
    const original = new QuotaExceededError('already classified', 1000);
    expect(classifyProviderError(original)).toBe(original);
  });
});
