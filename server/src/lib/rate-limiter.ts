import type { Logger } from 'pino';
import logger from './logger.js';
import { systemClock, type Clock } from './sleep.js';

export interface RateLimiterOptions {
  /** Calls allowed per window for models without an override. */
  defaultQuota: number;
  /** Per-model overrides, keyed by model id. */
  quotas?: Record<string, number>;
  windowMs?: number;
  clock?: Clock;
  logger?: Logger;
}

export interface RateLimitStatus {
  model: string;
  quota: number;
  in_window: number;
  remaining: number;
  window_ms: number;
}

/**
 * Strict sliding-window limiter, one timestamp record per model.
 *
 * A call is admitted only if fewer than `quota` calls were admitted in the
 * trailing `windowMs`. Otherwise the caller waits until the oldest recorded
 * call leaves the window, then re-checks. The prune/check/record sequence in
 * acquire() has no await in it, so the invariant holds even with several
 * callers awaiting at once.
 */
export class SlidingWindowRateLimiter {
  private readonly records = new Map<string, number[]>();
  private readonly defaultQuota: number;
  private readonly quotas: Record<string, number>;
  private readonly windowMs: number;
  private readonly clock: Clock;
  private readonly log: Logger;

  constructor(options: RateLimiterOptions) {
    if (!Number.isInteger(options.defaultQuota) || options.defaultQuota < 1) {
      throw new RangeError(`defaultQuota must be a positive integer, got ${options.defaultQuota}`);
    }
    for (const [model, quota] of Object.entries(options.quotas ?? {})) {
      if (!Number.isInteger(quota) || quota < 1) {
        throw new RangeError(`Quota for ${model} must be a positive integer, got ${quota}`);
      }
    }
    this.defaultQuota = options.defaultQuota;
    this.quotas = { ...options.quotas };
    this.windowMs = options.windowMs ?? 60_000;
    this.clock = options.clock ?? systemClock;
    this.log = options.logger ?? logger;
  }

  quotaFor(model: string): number {
    return this.quotas[model] ?? this.defaultQuota;
  }

  /**
   * Resolves once a call to `model` may be issued, and records it.
   */
  async acquire(model: string): Promise<void> {
    const quota = this.quotaFor(model);
    const record = this.recordFor(model);

    for (;;) {
      const now = this.clock.now();
      this.prune(record, now);
      if (record.length < quota) {
        record.push(now);
        return;
      }

      const waitMs = record[0] + this.windowMs - now;
      this.log.warn({ model, quota, wait_ms: waitMs }, 'LLM rate limit window full, waiting');
      await this.clock.sleep(waitMs);
    }
  }

  status(model: string): RateLimitStatus {
    const quota = this.quotaFor(model);
    const record = this.recordFor(model);
    this.prune(record, this.clock.now());
    return {
      model,
      quota,
      in_window: record.length,
      remaining: Math.max(0, quota - record.length),
      window_ms: this.windowMs,
    };
  }

  /** Timestamps currently inside the window, oldest first. */
  snapshot(model: string): readonly number[] {
    return [...(this.records.get(model) ?? [])];
  }

  private recordFor(model: string): number[] {
    let record = this.records.get(model);
    if (!record) {
      record = [];
      this.records.set(model, record);
    }
    return record;
  }

  private prune(record: number[], now: number): void {
    while (record.length > 0 && now - record[0] >= this.windowMs) {
      record.shift();
    }
  }
}
