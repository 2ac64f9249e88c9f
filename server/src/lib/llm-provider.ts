import Anthropic from '@anthropic-ai/sdk';
import { z } from 'zod';
import { getAnthropicClient, extractResponseText } from './anthropic.js';
import { ProviderError, QuotaExceededError, type PipelineError } from './errors.js';
import {
  classifyProviderError,
  getRetryAfterMs,
  isQuotaSignal,
  parseAdvisedDelayMs,
  parseRetryAfterHeader,
} from './retry.js';

// ─── Shared interfaces ───────────────────────────────────────────────

export interface ChatParams {
  model: string;
  /** Role framing and required output shape. */
  system: string;
  prompt: string;
  max_tokens: number;
}

export interface TokenUsage {
  input_tokens: number;
  output_tokens: number;
}

export interface ChatResponse {
  text: string;
  usage: TokenUsage;
}

/**
 * A model backend. Implementations throw QuotaExceededError when the provider
 * signals a rate/quota limit and ProviderError for anything else.
 */
export interface LLMProvider {
  readonly name: string;
  chat(params: ChatParams): Promise<ChatResponse>;
}

// ─── Anthropic provider ──────────────────────────────────────────────

export interface AnthropicConfig {
  apiKey?: string;
  timeoutMs?: number;
}

function toAnthropicError(err: unknown): PipelineError {
  if (err instanceof Anthropic.RateLimitError) {
    return new QuotaExceededError(`Anthropic rate limit: ${err.message}`, getRetryAfterMs(err), { cause: err });
  }
  if (err instanceof Anthropic.APIError) {
    return new ProviderError(`Anthropic API error: ${err.message}`, err.status ?? null, { cause: err });
  }
  return classifyProviderError(err);
}

export class AnthropicProvider implements LLMProvider {
  readonly name = 'anthropic';
  private readonly config: AnthropicConfig;

  constructor(config: AnthropicConfig = {}) {
    this.config = config;
  }

  async chat(params: ChatParams): Promise<ChatResponse> {
    const anthropic = getAnthropicClient(this.config.apiKey, this.config.timeoutMs);
    let response: Anthropic.Message;
    try {
      response = await anthropic.messages.create({
        model: params.model,
        max_tokens: params.max_tokens,
        system: params.system,
        messages: [{ role: 'user', content: params.prompt }],
      });
    } catch (err) {
      throw toAnthropicError(err);
    }

    return {
      text: extractResponseText(response),
      usage: {
        input_tokens: response.usage?.input_tokens ?? 0,
        output_tokens: response.usage?.output_tokens ?? 0,
      },
    };
  }
}

// ─── ZAI provider (OpenAI-compatible) ────────────────────────────────

export interface ZAIConfig {
  apiKey: string;
  baseUrl: string;
  timeoutMs?: number;
}

const ChatCompletionSchema = z.object({
  choices: z.array(z.object({
    message: z.object({
      content: z.string().nullable().optional(),
    }).passthrough(),
  }).passthrough()).default([]),
  usage: z.object({
    prompt_tokens: z.number().optional(),
    completion_tokens: z.number().optional(),
  }).passthrough().optional(),
}).passthrough();

export class ZAIProvider implements LLMProvider {
  readonly name = 'zai';
  private readonly apiKey: string;
  private readonly baseUrl: string;
  private readonly timeoutMs: number;

  constructor(config: ZAIConfig) {
    this.apiKey = config.apiKey;
    this.baseUrl = config.baseUrl.replace(/\/$/, '');
    this.timeoutMs = config.timeoutMs ?? 120_000;
  }

  async chat(params: ChatParams): Promise<ChatResponse> {
    let response: Response;
    try {
      response = await fetch(`${this.baseUrl}/chat/completions`, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          'Authorization': `Bearer ${this.apiKey}`,
        },
        body: JSON.stringify({
          model: params.model,
          max_tokens: params.max_tokens,
          messages: [
            { role: 'system', content: params.system },
            { role: 'user', content: params.prompt },
          ],
          stream: false,
        }),
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (err) {
      throw classifyProviderError(err);
    }

    if (!response.ok) {
      const errText = await response.text().catch(() => '');
      const message = `ZAI API error ${response.status}: ${errText}`;
      if (response.status === 429 || isQuotaSignal(errText)) {
        const advised = parseRetryAfterHeader(response.headers.get('retry-after'))
          ?? parseAdvisedDelayMs(errText);
        throw new QuotaExceededError(message, advised);
      }
      throw new ProviderError(message, response.status);
    }

    const body: unknown = await response.json().catch(() => null);
    const parsed = ChatCompletionSchema.safeParse(body);
    if (!parsed.success) {
      throw new ProviderError('ZAI API returned an unexpected response shape', response.status);
    }

    const data = parsed.data;
    return {
      text: data.choices[0]?.message.content ?? '',
      usage: {
        input_tokens: data.usage?.prompt_tokens ?? 0,
        output_tokens: data.usage?.completion_tokens ?? 0,
      },
    };
  }
}
