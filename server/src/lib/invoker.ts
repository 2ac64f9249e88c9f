import type { Logger } from 'pino';
import type { z } from 'zod';
import logger from './logger.js';
import { MalformedResponseError, QuotaExceededError } from './errors.js';
import { decodeJsonPayload } from './json-repair.js';
import type { LLMProvider, TokenUsage } from './llm-provider.js';
import type { SlidingWindowRateLimiter } from './rate-limiter.js';
import { classifyProviderError, withQuotaRetry, type AttemptResult } from './retry.js';
import { systemClock, type Clock } from './sleep.js';
import { formatIssues } from './validate.js';

export interface InvokeRequest<T> {
  /** Short name for logs and error messages, e.g. `skill_extraction`. */
  label: string;
  system: string;
  prompt: string;
  /** Shape the decoded payload must have; applied right after decoding. */
  schema: z.ZodType<T, z.ZodTypeDef, unknown>;
  max_tokens?: number;
}

/**
 * The only way stages reach a model.
 * Throws QuotaExceededError, ProviderError or MalformedResponseError.
 */
export interface Invoker {
  invoke<T>(model: string, request: InvokeRequest<T>): Promise<T>;
}

export interface RateLimitedInvokerOptions {
  provider: LLMProvider;
  limiter: SlidingWindowRateLimiter;
  maxAttempts?: number;
  baseDelayMs?: number;
  maxTokens?: number;
  clock?: Clock;
  logger?: Logger;
}

/**
 * Limit → call → retry on quota → decode → validate.
 *
 * Every attempt, retries included, passes through the limiter, so the
 * per-model window counts what the provider actually receives.
 */
export class RateLimitedInvoker implements Invoker {
  readonly provider: LLMProvider;
  readonly limiter: SlidingWindowRateLimiter;
  private readonly maxAttempts: number;
  private readonly baseDelayMs: number;
  private readonly maxTokens: number;
  private readonly clock: Clock;
  private readonly log: Logger;
  private readonly totals: TokenUsage = { input_tokens: 0, output_tokens: 0 };

  constructor(options: RateLimitedInvokerOptions) {
    this.provider = options.provider;
    this.limiter = options.limiter;
    this.maxAttempts = options.maxAttempts ?? 3;
    this.baseDelayMs = options.baseDelayMs ?? 2000;
    this.maxTokens = options.maxTokens ?? 4096;
    this.clock = options.clock ?? systemClock;
    this.log = options.logger ?? logger;
  }

  /** Tokens consumed by every successful call so far. */
  get usage(): TokenUsage {
    return { ...this.totals };
  }

  async invoke<T>(model: string, request: InvokeRequest<T>): Promise<T> {
    const outcome = await withQuotaRetry<string>(
      (attempt) => this.attempt(model, request, attempt),
      {
        maxAttempts: this.maxAttempts,
        baseDelayMs: this.baseDelayMs,
        sleep: (ms) => this.clock.sleep(ms),
        onRetry: (attempt, error, delayMs) => {
          this.log.warn(
            { model, label: request.label, attempt, delay_ms: delayMs, error: error.message },
            'LLM quota error, retrying',
          );
        },
      },
    );

    if (outcome.kind === 'failed') {
      this.log.warn(
        { model, label: request.label, attempts: outcome.attempts, error: outcome.error.message },
        'LLM call failed',
      );
      throw outcome.error;
    }

    return this.decode(model, request, outcome.value);
  }

  private async attempt<T>(model: string, request: InvokeRequest<T>, attempt: number): Promise<AttemptResult<string>> {
    await this.limiter.acquire(model);
    const startedAt = this.clock.now();
    try {
      const response = await this.provider.chat({
        model,
        system: request.system,
        prompt: request.prompt,
        max_tokens: request.max_tokens ?? this.maxTokens,
      });
      this.totals.input_tokens += response.usage.input_tokens;
      this.totals.output_tokens += response.usage.output_tokens;
      this.log.debug(
        { model, label: request.label, attempt, duration_ms: this.clock.now() - startedAt, usage: response.usage },
        'LLM call complete',
      );
      return { kind: 'ok', value: response.text };
    } catch (err) {
      const classified = classifyProviderError(err);
      if (classified instanceof QuotaExceededError) {
        return { kind: 'retryable', error: classified };
      }
      return { kind: 'terminal', error: classified };
    }
  }

  private decode<T>(model: string, request: InvokeRequest<T>, text: string): T {
    const prefix = `Malformed response from ${model} (${request.label})`;
    const decoded = decodeJsonPayload(text);
    if (!decoded.ok) {
      throw new MalformedResponseError(`${prefix}: not valid JSON`, text);
    }

    const parsed = request.schema.safeParse(decoded.value);
    if (!parsed.success) {
      throw new MalformedResponseError(`${prefix}: ${formatIssues(parsed.error.issues)}`, text);
    }
    return parsed.data;
  }
}
