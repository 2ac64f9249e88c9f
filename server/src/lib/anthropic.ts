import Anthropic from '@anthropic-ai/sdk';

const clients = new Map<string, Anthropic>();

/**
 * Lazily create (and reuse) an Anthropic client per API key, so modules can be
 * imported in test/dev environments without credentials.
 */
export function getAnthropicClient(apiKey: string | undefined, timeoutMs?: number): Anthropic {
  if (!apiKey) {
    throw new Error('ANTHROPIC_API_KEY environment variable is required when LLM_PROVIDER=anthropic');
  }
  let client = clients.get(apiKey);
  if (!client) {
    // Retries are owned by the invoker, which routes every attempt through the limiter.
    client = new Anthropic({ apiKey, maxRetries: 0, ...(timeoutMs ? { timeout: timeoutMs } : {}) });
    clients.set(apiKey, client);
  }
  return client;
}

export const DEFAULT_ANTHROPIC_MODEL_MID = 'claude-sonnet-4-5-20250929';
export const DEFAULT_ANTHROPIC_MODEL_LIGHT = 'claude-haiku-4-5-20251001';

/**
 * Concatenates the text blocks of an Anthropic API response.
 */
export function extractResponseText(response: Anthropic.Message): string {
  return response.content
    .map((block) => (block.type === 'text' ? block.text : ''))
    .join('');
}
