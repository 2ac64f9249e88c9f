import type { Logger } from 'pino';
import logger from '../lib/logger.js';
import { QuotaExceededError, describeError, errorCodeOf } from '../lib/errors.js';
import { systemClock, type Clock } from '../lib/sleep.js';
import type { ItemFailure, PipelineStage } from './types.js';

/** Options shared by every stage that makes one LLM call per item. */
export interface ItemLoopOptions {
  /** Pause between consecutive calls. Default 500 ms. */
  interCallDelayMs?: number;
  /** Stop the loop after a quota failure and mark the rest skipped. */
  haltOnQuota?: boolean;
  clock?: Clock;
  logger?: Logger;
}

export interface ItemLoopResult<I, O> {
  results: Array<{ item: I; value: O }>;
  failures: ItemFailure[];
}

/**
 * Runs `handler` over `items` one at a time. A throw is recorded against that
 * item and the loop moves on; it never escapes.
 */
export async function forEachItem<I, O>(
  stage: PipelineStage,
  items: readonly I[],
  idOf: (item: I) => string,
  handler: (item: I) => Promise<O>,
  options: ItemLoopOptions = {},
): Promise<ItemLoopResult<I, O>> {
  const log = options.logger ?? logger;
  const clock = options.clock ?? systemClock;
  const delayMs = options.interCallDelayMs ?? 500;
  const results: Array<{ item: I; value: O }> = [];
  const failures: ItemFailure[] = [];

  for (let i = 0; i < items.length; i++) {
    const item = items[i];
    if (i > 0 && delayMs > 0) {
      await clock.sleep(delayMs);
    }

    try {
      results.push({ item, value: await handler(item) });
    } catch (err) {
      const message = describeError(err);
      log.warn({ stage, item: idOf(item), error: message }, 'Item failed');
      failures.push({ item: idOf(item), stage, code: errorCodeOf(err), message });

      if (options.haltOnQuota && err instanceof QuotaExceededError) {
        const skipped = items.slice(i + 1);
        if (skipped.length > 0) {
          log.warn({ stage, skipped: skipped.length }, 'Provider quota exhausted, skipping remaining items');
        }
        for (const rest of skipped) {
          failures.push({
            item: idOf(rest),
            stage,
            code: 'QUOTA_EXCEEDED',
            message: 'Skipped: provider quota exhausted',
          });
        }
        break;
      }
    }
  }

  return { results, failures };
}
