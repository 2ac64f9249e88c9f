import { DEFAULT_ANTHROPIC_MODEL_LIGHT, DEFAULT_ANTHROPIC_MODEL_MID } from './anthropic.js';

export type ProviderName = 'zai' | 'anthropic';

export interface AppConfig {
  provider: ProviderName;
  zai: { apiKey: string | undefined; baseUrl: string };
  anthropic: { apiKey: string | undefined };
  models: { light: string; mid: string };
  limiter: {
    requestsPerMinute: number;
    quotas: Record<string, number>;
    windowMs: number;
  };
  retry: { maxAttempts: number; baseDelayMs: number };
  llm: { maxTokens: number; timeoutMs: number };
  pipeline: {
    interCallDelayMs: number;
    topK: number;
    /**
     * FF_HALT_ON_QUOTA: stop a per-item stage loop once the provider reports
     * quota exhaustion after all retries; the rest are recorded as skipped.
     */
    haltOnQuota: boolean;
  };
  http: { port: number; maxBodyBytes: number };
}

export function envBool(key: string, fallback: boolean, env: NodeJS.ProcessEnv = process.env): boolean {
  const val = env[key];
  if (val === undefined) return fallback;
  return val === '1' || val.toLowerCase() === 'true';
}

export function parsePositiveInt(raw: string | undefined, fallback: number): number {
  const parsed = Number.parseInt(raw ?? '', 10);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
}

function parseNonNegativeInt(raw: string | undefined, fallback: number): number {
  const parsed = Number.parseInt(raw ?? '', 10);
  return Number.isFinite(parsed) && parsed >= 0 ? parsed : fallback;
}

/**
 * Parses `model=n,model=n`. Entries without a positive integer are skipped.
 */
export function parseModelQuotas(raw: string | undefined): Record<string, number> {
  const quotas: Record<string, number> = {};
  if (!raw) return quotas;
  for (const entry of raw.split(',')) {
    const eq = entry.lastIndexOf('=');
    if (eq <= 0) continue;
    const model = entry.slice(0, eq).trim();
    const quota = parsePositiveInt(entry.slice(eq + 1).trim(), 0);
    if (model && quota > 0) quotas[model] = quota;
  }
  return quotas;
}

function resolveProvider(env: NodeJS.ProcessEnv): ProviderName {
  const configured = env.LLM_PROVIDER?.toLowerCase();
  if (configured === 'zai' || configured === 'anthropic') return configured;
  return env.ZAI_API_KEY ? 'zai' : 'anthropic';
}

const DEFAULT_MODELS: Record<ProviderName, { light: string; mid: string }> = {
  zai: { light: 'glm-4.7-flash', mid: 'glm-4.5-air' },
  anthropic: { light: DEFAULT_ANTHROPIC_MODEL_LIGHT, mid: DEFAULT_ANTHROPIC_MODEL_MID },
};

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const provider = resolveProvider(env);
  const defaults = DEFAULT_MODELS[provider];

  return {
    provider,
    zai: {
      apiKey: env.ZAI_API_KEY,
      baseUrl: env.ZAI_BASE_URL ?? 'https://api.z.ai/api/paas/v4',
    },
    anthropic: { apiKey: env.ANTHROPIC_API_KEY },
    models: {
      light: env.MODEL_LIGHT ?? defaults.light,
      mid: env.MODEL_MID ?? defaults.mid,
    },
    limiter: {
      requestsPerMinute: parsePositiveInt(env.LLM_REQUESTS_PER_MINUTE, 10),
      quotas: parseModelQuotas(env.LLM_MODEL_QUOTAS),
      windowMs: parsePositiveInt(env.LLM_RATE_WINDOW_MS, 60_000),
    },
    retry: {
      maxAttempts: parsePositiveInt(env.LLM_MAX_ATTEMPTS, 3),
      baseDelayMs: parseNonNegativeInt(env.LLM_RETRY_BASE_DELAY_MS, 2000),
    },
    llm: {
      maxTokens: parsePositiveInt(env.LLM_MAX_TOKENS, 4096),
      timeoutMs: parsePositiveInt(env.LLM_TIMEOUT_MS, 120_000),
    },
    pipeline: {
      interCallDelayMs: parseNonNegativeInt(env.INTER_CALL_DELAY_MS, 500),
      topK: parsePositiveInt(env.TOP_K_JOBS, 10),
      haltOnQuota: envBool('FF_HALT_ON_QUOTA', false, env),
    },
    http: {
      port: parsePositiveInt(env.PORT, 3001),
      maxBodyBytes: parsePositiveInt(env.MAX_BODY_BYTES, 1_000_000),
    },
  };
}
