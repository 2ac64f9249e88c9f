import { Hono, type Context } from 'hono';
import { z } from 'zod';
import logger from '../lib/logger.js';
import { describeError, errorCodeOf } from '../lib/errors.js';
import { readJsonBody } from '../lib/http-body-guard.js';
import type { Invoker } from '../lib/invoker.js';
import type { ModelMap } from '../lib/llm.js';
import type { SlidingWindowRateLimiter } from '../lib/rate-limiter.js';
import type { Clock } from '../lib/sleep.js';
import { validateBody } from '../lib/validate.js';
import { extractProfileFromResumeText } from '../agents/intake.js';
import { runMatchingPipeline, runQuickRank, runSingleJobPipeline, type PipelineDeps } from '../agents/pipeline.js';
import { ProfileInputSchema } from '../agents/schemas/profile-schemas.js';

const MAX_POSTINGS_PER_REQUEST = 500;

const extractProfileSchema = z.object({
  resume_text: z.string().trim().min(1).max(100_000),
});

const rawPostingSchema = z.record(z.string(), z.unknown());

const matchSchema = z.object({
  profile: ProfileInputSchema,
  postings: z.array(rawPostingSchema).max(MAX_POSTINGS_PER_REQUEST),
});

const singleMatchSchema = z.object({
  profile: ProfileInputSchema,
  posting: rawPostingSchema,
});

export interface MatchingRouteDeps {
  invoker: Invoker;
  limiter: SlidingWindowRateLimiter;
  models: ModelMap;
  pipeline: {
    topK: number;
    interCallDelayMs: number;
    haltOnQuota: boolean;
  };
  maxBodyBytes: number;
  clock?: Clock;
}

type ParsedBody<T extends z.ZodTypeAny> =
  | { ok: true; data: z.infer<T> }
  | { ok: false; response: Response };

async function parseBody<T extends z.ZodTypeAny>(c: Context, schema: T, maxBytes: number): Promise<ParsedBody<T>> {
  const body = await readJsonBody(c.req.raw, maxBytes);
  if (!body.ok) {
    return { ok: false, response: c.json({ error: body.error }, body.status) };
  }
  const parsed = validateBody(schema, body.data);
  if (!parsed.success) {
    return { ok: false, response: c.json({ error: 'Invalid request', details: parsed.issues }, 400) };
  }
  return { ok: true, data: parsed.data };
}

/**
 * Matching API: profile extraction, full and single-job pipeline runs,
 * lightweight ranking, and limiter status.
 */
export function createMatchingRoutes(deps: MatchingRouteDeps): Hono {
  const routes = new Hono();

  const pipelineDeps = (c: Context): PipelineDeps => ({
    invoker: deps.invoker,
    models: deps.models,
    topK: deps.pipeline.topK,
    interCallDelayMs: deps.pipeline.interCallDelayMs,
    haltOnQuota: deps.pipeline.haltOnQuota,
    clock: deps.clock,
    runId: c.get('requestId'),
  });

  // GET /limits: per-model limiter window
  routes.get('/limits', (c) => {
    c.header('Cache-Control', 'no-store');
    const models = [...new Set(Object.values(deps.models))];
    return c.json({ limits: models.map((model) => deps.limiter.status(model)) });
  });

  // POST /profile/extract: resume text → Profile
  routes.post('/profile/extract', async (c) => {
    const body = await parseBody(c, extractProfileSchema, deps.maxBodyBytes);
    if (!body.ok) return body.response;

    try {
      const profile = await extractProfileFromResumeText(body.data.resume_text, deps.invoker, {
        model: deps.models.profile_extraction,
      });
      return c.json({ profile });
    } catch (err) {
      const message = describeError(err);
      logger.warn({ requestId: c.get('requestId'), error: message }, 'Profile extraction failed');
      return c.json({ error: 'Profile extraction failed', code: errorCodeOf(err), message }, 502);
    }
  });

  // POST /match: full pipeline over a batch of postings
  routes.post('/match', async (c) => {
    const body = await parseBody(c, matchSchema, deps.maxBodyBytes);
    if (!body.ok) return body.response;

    const run = await runMatchingPipeline(body.data.profile, body.data.postings, pipelineDeps(c));
    return c.json({ run_id: run.run_id, report: run.report });
  });

  // POST /match/single: gap analysis for one posting, no ranking or review
  routes.post('/match/single', async (c) => {
    const body = await parseBody(c, singleMatchSchema, deps.maxBodyBytes);
    if (!body.ok) return body.response;

    const run = await runSingleJobPipeline(body.data.profile, body.data.posting, pipelineDeps(c));
    return c.json({ run_id: run.run_id, report: run.report });
  });

  // POST /rank/quick: cheap ordering of fresh search results
  routes.post('/rank/quick', async (c) => {
    const body = await parseBody(c, matchSchema, deps.maxBodyBytes);
    if (!body.ok) return body.response;

    const run = await runQuickRank(body.data.profile, body.data.postings, pipelineDeps(c));
    return c.json({ run_id: run.run_id, scores: run.scores, warnings: run.warnings });
  });

  return routes;
}
