import { AnthropicProvider, ZAIProvider, type LLMProvider } from './llm-provider.js';
import type { AppConfig } from './config.js';

/** Every LLM-backed step, used to pick a model and to label requests. */
export type LLMTask =
  | 'profile_extraction'
  | 'skill_extraction'
  | 'quick_rank'
  | 'full_rank'
  | 'gap_analysis'
  | 'review';

// ─── Task → model tier mapping ───────────────────────────────────────

const TASK_TIER: Record<LLMTask, 'light' | 'mid'> = {
  // Lightweight extraction and bulk scoring
  profile_extraction: 'light',
  skill_extraction: 'light',
  quick_rank: 'light',

  // Analytical comparison
  full_rank: 'mid',
  gap_analysis: 'mid',
  review: 'mid',
};

export type ModelMap = Record<LLMTask, string>;

export function buildModelMap(models: AppConfig['models']): ModelMap {
  return {
    profile_extraction: models[TASK_TIER.profile_extraction],
    skill_extraction: models[TASK_TIER.skill_extraction],
    quick_rank: models[TASK_TIER.quick_rank],
    full_rank: models[TASK_TIER.full_rank],
    gap_analysis: models[TASK_TIER.gap_analysis],
    review: models[TASK_TIER.review],
  };
}

// ─── Provider factory ────────────────────────────────────────────────

export function createProvider(config: AppConfig): LLMProvider {
  if (config.provider === 'zai') {
    const apiKey = config.zai.apiKey;
    if (!apiKey) {
      throw new Error('ZAI_API_KEY environment variable is required when LLM_PROVIDER=zai');
    }
    return new ZAIProvider({ apiKey, baseUrl: config.zai.baseUrl, timeoutMs: config.llm.timeoutMs });
  }

  // Anthropic lazily creates its client on first use.
  return new AnthropicProvider({ apiKey: config.anthropic.apiKey, timeoutMs: config.llm.timeoutMs });
}
