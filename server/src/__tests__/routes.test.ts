import { describe, it, expect } from 'vitest';
import { createApp } from '../app.js';
import { ProviderError } from '../lib/errors.js';
import { SlidingWindowRateLimiter } from '../lib/rate-limiter.js';
import type { FinalReport } from '../agents/types.js';
import { FakeClock } from './helpers/fake-clock.js';
import { FakeInvoker, TEST_MODELS, makePosting, type InvokeHandler } from './helpers/fakes.js';

function defaultHandler(call: { label: string }): unknown {
  switch (call.label) {
    case 'profile_extraction':
      return { name: 'Alex Tan', skills: ['SQL'] };
    case 'skill_extraction':
      return { hard_skills: ['SQL'] };
    case 'full_rank':
      return [{ job_id: 'P1', match_score: 0.75, reasoning: 'Solid.' }];
    case 'quick_rank':
      return [{ job_id: 'P1', match_score: 0.5 }];
    case 'gap_analysis':
      return { matched_skills: ['SQL'] };
    case 'review':
      return { flagged_job_ids: ['P1'] };
    default:
      throw new Error(`Unexpected call ${call.label}`);
  }
}

function setup(handler: InvokeHandler = defaultHandler) {
  const clock = new FakeClock();
  const invoker = new FakeInvoker(handler);
  const limiter = new SlidingWindowRateLimiter({ defaultQuota: 10, quotas: { 'mid-model': 2 }, clock });
  const app = createApp({
    providerName: 'zai',
    invoker,
    limiter,
    models: TEST_MODELS,
    pipeline: { topK: 10, interCallDelayMs: 0, haltOnQuota: false },
    maxBodyBytes: 2_000,
    clock,
  });
  return { app, invoker };
}

function post(path: string, body: unknown, headers: Record<string, string> = {}) {
  return {
    path: `http://test${path}`,
    init: {
      method: 'POST',
      body: typeof body === 'string' ? body : JSON.stringify(body),
      headers: { 'Content-Type': 'application/json', ...headers },
    },
  };
}

describe('app', () => {
  it('reports health with the provider name', async () => {
    const { app } = setup();

    const res = await app.request('http://test/health');

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ status: 'ok', provider: 'zai' });
    expect(res.headers.get('X-Content-Type-Options')).toBe('nosniff');
    expect(res.headers.get('Cache-Control')).toBe('no-store');
  });

  it('returns 404 JSON for unknown routes', async () => {
    const { app } = setup();

    const res = await app.request('http://test/nope');

    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({ error: 'Not found' });
  });

  it('lists limiter status per model', async () => {
    const { app } = setup();

    const res = await app.request('http://test/api/limits');

    expect(await res.json()).toEqual({
      limits: [
        { model: 'light-model', quota: 10, in_window: 0, remaining: 10, window_ms: 60_000 },
        { model: 'mid-model', quota: 2, in_window: 0, remaining: 2, window_ms: 60_000 },
      ],
    });
  });
});

describe('POST /api/match', () => {
  it('runs the pipeline and uses the request id as the run id', async () => {
    const { app, invoker } = setup();
    const { path, init } = post('/api/match', { profile: { skills: ['SQL'] }, postings: [makePosting('P1')] }, {
      'X-Request-ID': 'req-1',
    });

    const res = await app.request(path, init);

    expect(res.status).toBe(200);
    expect(res.headers.get('X-Request-ID')).toBe('req-1');
    const body = await res.json() as { run_id: string; report: FinalReport };
    expect(body.run_id).toBe('req-1');
    expect(body.report.ranked_jobs.map((j) => [j.posting_id, j.score, j.flagged])).toEqual([['P1', 0.75, true]]);
    expect(body.report.gaps.map((g) => g.posting_id)).toEqual(['P1']);
    expect(body.report.warnings).toEqual([]);
    expect(invoker.labels()).toEqual(['skill_extraction', 'full_rank', 'gap_analysis', 'review']);
  });

  it('rejects a body that fails validation', async () => {
    const { app, invoker } = setup();
    const { path, init } = post('/api/match', { profile: {}, postings: 'nope' });

    const res = await app.request(path, init);

    expect(res.status).toBe(400);
    const body = await res.json() as { error: string; details: Array<{ path: Array<string | number> }> };
    expect(body.error).toBe('Invalid request');
    expect(body.details.map((d) => d.path)).toEqual([['postings']]);
    expect(invoker.calls).toHaveLength(0);
  });

  it('rejects an oversized body', async () => {
    const { app } = setup();
    const { path, init } = post('/api/match', { profile: {}, postings: [], padding: 'x'.repeat(3_000) });

    const res = await app.request(path, init);

    expect(res.status).toBe(413);
    expect(await res.json()).toEqual({ error: 'Request too large (max 2000 bytes)' });
  });

  it('rejects invalid JSON', async () => {
    const { app } = setup();
    const { path, init } = post('/api/match', '{not json');

    const res = await app.request(path, init);

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ error: 'Request body is not valid JSON' });
  });
});

describe('POST /api/match/single', () => {
  it('returns gaps without ranked jobs', async () => {
    const { app, invoker } = setup();
    const { path, init } = post('/api/match/single', { profile: {}, posting: makePosting('S1') });

    const res = await app.request(path, init);

    expect(res.status).toBe(200);
    const body = await res.json() as { run_id: string; report: FinalReport };
    expect(body.report.ranked_jobs).toEqual([]);
    expect(body.report.gaps.map((g) => g.posting_id)).toEqual(['S1']);
    expect(invoker.labels()).toEqual(['skill_extraction', 'gap_analysis']);
  });
});

describe('POST /api/rank/quick', () => {
  it('returns scores best first', async () => {
    const { app } = setup();
    const { path, init } = post('/api/rank/quick', { profile: {}, postings: [makePosting('P1'), makePosting('P2')] });

    const res = await app.request(path, init);

    expect(res.status).toBe(200);
    const body = await res.json() as { scores: unknown; warnings: unknown };
    expect(body.scores).toEqual([{ posting_id: 'P1', score: 0.5 }]);
    expect(body.warnings).toEqual(['Ranking failed for posting P2: Not scored by the model']);
  });
});

describe('POST /api/profile/extract', () => {
  it('returns the extracted profile', async () => {
    const { app } = setup();
    const { path, init } = post('/api/profile/extract', { resume_text: 'Alex Tan. SQL.' });

    const res = await app.request(path, init);

    expect(res.status).toBe(200);
    const body = await res.json() as { profile: { name: string; skills: string[] } };
    expect(body.profile.name).toBe('Alex Tan');
    expect(body.profile.skills).toEqual(['SQL']);
  });

  it('maps extraction failures to 502', async () => {
    const { app } = setup(() => {
      throw new ProviderError('upstream failure', 500);
    });
    const { path, init } = post('/api/profile/extract', { resume_text: 'Alex Tan. SQL.' });

    const res = await app.request(path, init);

    expect(res.status).toBe(502);
    expect(await res.json()).toEqual({
      error: 'Profile extraction failed',
      code: 'PROVIDER_ERROR',
      message: 'upstream failure',
    });
  });

  it('requires resume text', async () => {
    const { app } = setup();
    const { path, init } = post('/api/profile/extract', { resume_text: '   ' });

    const res = await app.request(path, init);

    expect(res.status).toBe(400);
  });
});
