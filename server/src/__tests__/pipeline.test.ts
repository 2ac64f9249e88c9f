import { describe, it, expect } from 'vitest';
import {
  NO_VALID_POSTINGS_WARNING,
  runMatchingPipeline,
  runQuickRank,
  runSingleJobPipeline,
  type PipelineDeps,
} from '../agents/pipeline.js';
import { ProviderError } from '../lib/errors.js';
import type { PipelineEvent } from '../agents/types.js';
import { FakeClock } from './helpers/fake-clock.js';
import {
  FakeInvoker,
  TEST_MODELS,
  makePosting,
  makeProfile,
  postingIdFromPrompt,
  type InvokeHandler,
} from './helpers/fakes.js';

const FULL_RUN_STATES = ['normalizing', 'extracting_skills', 'ranking', 'analyzing_gaps', 'reviewing', 'finalized'];

/** Handler that answers every stage successfully unless overridden per label. */
function stageHandler(overrides: Partial<Record<string, InvokeHandler>> = {}): InvokeHandler {
  return (call) => {
    const override = overrides[call.label];
    if (override) return override(call);
    switch (call.label) {
      case 'skill_extraction':
        return { hard_skills: ['SQL'], tools: ['Excel'] };
      case 'full_rank':
        return [
          { job_id: 'P1', match_score: 0.7 },
          { job_id: 'P3', match_score: 0.9, reasoning: 'Great.' },
        ];
      case 'gap_analysis':
        return {
          matched_skills: ['SQL'],
          learning_resources: [{ name: 'SQL Course', url: 'https://learn.example.com/sql' }],
        };
      case 'review':
        return { warnings: ['P1 salary unknown.'], flagged_job_ids: ['P1'] };
      case 'quick_rank':
        return [];
      default:
        throw new Error(`Unexpected call ${call.label}`);
    }
  };
}

function setup(handler: InvokeHandler) {
  const invoker = new FakeInvoker(handler);
  const events: PipelineEvent[] = [];
  const clock = new FakeClock();
  const deps: PipelineDeps = {
    invoker,
    models: TEST_MODELS,
    interCallDelayMs: 0,
    clock,
    runId: 'run-1',
    emit: (event) => events.push(event),
  };
  return { invoker, events, clock, deps };
}

describe('runMatchingPipeline', () => {
  it('runs every stage and isolates a per-posting failure', async () => {
    const { invoker, events, clock, deps } = setup(stageHandler({
      skill_extraction: ({ prompt }) => (postingIdFromPrompt(prompt) === 'P2' ? 'garbage' : { hard_skills: ['SQL'] }),
    }));

    const run = await runMatchingPipeline(
      makeProfile(),
      [makePosting('P1'), makePosting('P2'), makePosting('P3')],
      deps,
    );

    expect(run.run_id).toBe('run-1');
    expect(run.states).toEqual(FULL_RUN_STATES);
    expect(run.report.ranked_jobs.map((j) => [j.posting_id, j.score, j.flagged])).toEqual([
      ['P3', 0.9, false],
      ['P1', 0.7, true],
    ]);
    expect(run.report.gaps.map((g) => g.posting_id)).toEqual(['P3', 'P1']);
    expect(run.report.roadmap).toEqual([
      { name: 'SQL Course', url: 'https://learn.example.com/sql', type: 'other', skill: '' },
    ]);
    expect(run.report.warnings).toEqual([
      'Skill extraction failed for posting P2: Malformed response from light-model (skill_extraction)',
      'P1 salary unknown.',
    ]);
    expect(invoker.labels()).toEqual([
      'skill_extraction',
      'skill_extraction',
      'skill_extraction',
      'full_rank',
      'gap_analysis',
      'gap_analysis',
      'review',
    ]);
    expect(invoker.calls.map((c) => c.model)).toEqual([
      'light-model',
      'light-model',
      'light-model',
      'mid-model',
      'mid-model',
      'mid-model',
      'mid-model',
    ]);
    expect(clock.sleeps).toEqual([]);

    expect(events.filter((e) => e.stage === 'extracting_skills')).toEqual([
      { type: 'stage_start', stage: 'extracting_skills' },
      {
        type: 'warning',
        stage: 'extracting_skills',
        message: 'Skill extraction failed for posting P2: Malformed response from light-model (skill_extraction)',
      },
      { type: 'stage_complete', stage: 'extracting_skills', duration_ms: 0, items_out: 2, failures: 1 },
    ]);
    expect(events.filter((e) => e.type === 'stage_start').map((e) => e.stage)).toEqual(FULL_RUN_STATES);
  });

  it('warns about a posting the ranker left unscored', async () => {
    const { deps } = setup(stageHandler({
      full_rank: () => [{ job_id: 'P3', match_score: 0.9 }],
    }));

    const run = await runMatchingPipeline(makeProfile(), [makePosting('P1'), makePosting('P3')], deps);

    expect(run.report.ranked_jobs.map((j) => j.posting_id)).toEqual(['P3']);
    expect(run.report.warnings).toEqual([
      'Ranking failed for posting P1: Not scored by the model',
      'P1 salary unknown.',
    ]);
  });

  it('carries on with empty output when ranking fails', async () => {
    const { invoker, events, deps } = setup(stageHandler({
      full_rank: () => {
        throw new ProviderError('upstream failure', 500);
      },
    }));

    const run = await runMatchingPipeline(makeProfile(), [makePosting('P1'), makePosting('P3')], deps);

    expect(run.states).toEqual(FULL_RUN_STATES);
    expect(run.report.ranked_jobs).toEqual([]);
    expect(run.report.gaps).toEqual([]);
    expect(run.report.warnings).toEqual(['Ranking failed: upstream failure']);
    expect(invoker.labels()).toEqual(['skill_extraction', 'skill_extraction', 'full_rank']);
    expect(events).toContainEqual({ type: 'stage_failed', stage: 'ranking', message: 'Ranking failed: upstream failure' });
  });

  it('keeps ranked jobs when review fails', async () => {
    const { deps } = setup(stageHandler({
      review: () => {
        throw new ProviderError('upstream failure', 500);
      },
    }));

    const run = await runMatchingPipeline(makeProfile(), [makePosting('P1'), makePosting('P3')], deps);

    expect(run.report.ranked_jobs.map((j) => [j.posting_id, j.flagged])).toEqual([['P3', false], ['P1', false]]);
    expect(run.report.warnings).toEqual(['Review stage failed: upstream failure']);
    expect(run.report.flagged_posting_ids).toEqual([]);
  });

  it('finalizes an empty report when no postings are given', async () => {
    const { invoker, deps } = setup(stageHandler());

    const run = await runMatchingPipeline(makeProfile(), [], deps);

    expect(run.states).toEqual(FULL_RUN_STATES);
    expect(run.report.warnings).toEqual([NO_VALID_POSTINGS_WARNING]);
    expect(run.report.summary).toBe('Found 0 job recommendation(s); analyzed skill gaps for 0; 0 flagged for review.');
    expect(invoker.calls).toHaveLength(0);
  });

  it('reports postings dropped by normalization', async () => {
    const { deps } = setup(stageHandler());

    const run = await runMatchingPipeline(makeProfile(), [{ title: 'No id', description: 'D' }], deps);

    expect(run.report.warnings).toEqual([
      'Normalization failed for posting #0: Posting #0 is missing required field "id"',
      NO_VALID_POSTINGS_WARNING,
    ]);
  });

  it('survives a listener that throws', async () => {
    const { deps } = setup(stageHandler());

    const run = await runMatchingPipeline(makeProfile(), [makePosting('P1')], {
      ...deps,
      emit: () => {
        throw new Error('listener broke');
      },
    });

    expect(run.states).toEqual(FULL_RUN_STATES);
    expect(run.report.ranked_jobs.map((j) => j.posting_id)).toEqual(['P1']);
  });

  it('generates a run id when none is given', async () => {
    const { deps } = setup(stageHandler());

    const run = await runMatchingPipeline(makeProfile(), [], { ...deps, runId: undefined });

    expect(run.run_id).toMatch(/^[0-9a-f-]{36}$/);
  });
});

describe('runSingleJobPipeline', () => {
  it('skips ranking and review', async () => {
    const { invoker, deps } = setup(stageHandler());

    const run = await runSingleJobPipeline(makeProfile(), makePosting('S1'), deps);

    expect(run.states).toEqual(['normalizing', 'extracting_skills', 'analyzing_gaps', 'finalized']);
    expect(run.report.ranked_jobs).toEqual([]);
    expect(run.report.gaps.map((g) => [g.posting_id, g.posting_title])).toEqual([['S1', 'Role S1']]);
    expect(run.report.summary).toBe('Found 0 job recommendation(s); analyzed skill gaps for 1; 0 flagged for review.');
    expect(invoker.labels()).toEqual(['skill_extraction', 'gap_analysis']);
  });

  it('still finalizes when the posting is invalid', async () => {
    const { invoker, deps } = setup(stageHandler());

    const run = await runSingleJobPipeline(makeProfile(), { id: 'S2' }, deps);

    expect(run.states).toEqual(['normalizing', 'extracting_skills', 'analyzing_gaps', 'finalized']);
    expect(run.report.warnings).toEqual([
      'Normalization failed for posting S2: Posting S2 is missing required field "title"',
      NO_VALID_POSTINGS_WARNING,
    ]);
    expect(invoker.calls).toHaveLength(0);
  });
});

describe('runQuickRank', () => {
  it('normalizes then scores, best first', async () => {
    const { invoker, deps } = setup(stageHandler({
      quick_rank: () => [
        { job_id: 'Q2', match_score: 0.9 },
        { job_id: 'Q1', match_score: 0.4 },
      ],
    }));

    const run = await runQuickRank(makeProfile(), [makePosting('Q1'), makePosting('Q2'), makePosting('Q3')], deps);

    expect(run.states).toEqual(['normalizing', 'ranking']);
    expect(run.scores).toEqual([
      { posting_id: 'Q2', score: 0.9 },
      { posting_id: 'Q1', score: 0.4 },
    ]);
    expect(run.warnings).toEqual(['Ranking failed for posting Q3: Not scored by the model']);
    expect(invoker.calls.map((c) => [c.model, c.label])).toEqual([['light-model', 'quick_rank']]);
  });

  it('turns a failed batch into warnings', async () => {
    const { deps } = setup(stageHandler({
      quick_rank: () => {
        throw new ProviderError('upstream failure', 503);
      },
    }));

    const run = await runQuickRank(makeProfile(), [makePosting('Q1')], deps);

    expect(run.scores).toEqual([]);
    expect(run.warnings).toEqual(['Ranking failed for posting Q1: upstream failure']);
  });
});
