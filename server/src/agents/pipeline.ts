/**
 * Pipeline Orchestrator
 *
 * Drives one run through its states:
 *
 *   normalizing → extracting_skills → ranking → analyzing_gaps → reviewing → finalized
 *
 * Each state's stage is called with the previous state's output. Per-item
 * failures become warnings naming the item. A stage that throws is caught,
 * reported as a warning, and the next state gets the best partial output
 * (possibly empty). `finalized` is always reached and a report always returned.
 *
 * The orchestrator itself makes no LLM calls.
 */

import { randomUUID } from 'node:crypto';
import type { Logger } from 'pino';
import { createRunLogger } from '../lib/logger.js';
import { StageFailure, describeError } from '../lib/errors.js';
import type { Invoker } from '../lib/invoker.js';
import type { ModelMap } from '../lib/llm.js';
import { systemClock, type Clock } from '../lib/sleep.js';
import { normalizePostings } from './normalize.js';
import { extractSkills } from './skill-extractor.js';
import { orderByScores, rankFull, rankQuick } from './ranker.js';
import { analyzeGap, analyzeGaps } from './gap-analyst.js';
import { emptyReviewOutcome, reviewMatches } from './review-board.js';
import { buildFinalReport } from './aggregator.js';
import { forEachItem } from './item-loop.js';
import type {
  ExtractedSkills,
  FinalReport,
  GapResult,
  Match,
  PipelineEvent,
  PipelineStage,
  Posting,
  Profile,
  ReviewOutcome,
  StageOutput,
} from './types.js';

export type PipelineEmitter = (event: PipelineEvent) => void;

export interface PipelineDeps {
  invoker: Invoker;
  models: ModelMap;
  /** Matches kept after ranking. Default 10. */
  topK?: number;
  interCallDelayMs?: number;
  haltOnQuota?: boolean;
  clock?: Clock;
  emit?: PipelineEmitter;
  runId?: string;
}

export interface PipelineRun {
  run_id: string;
  /** States in the order they were entered. */
  states: PipelineStage[];
  report: FinalReport;
}

export interface QuickRankRun {
  run_id: string;
  states: PipelineStage[];
  /** Scored postings, best first. */
  scores: Array<{ posting_id: string; score: number }>;
  warnings: string[];
}

const STAGE_LABEL: Record<PipelineStage, string> = {
  normalizing: 'Normalization',
  extracting_skills: 'Skill extraction',
  ranking: 'Ranking',
  analyzing_gaps: 'Gap analysis',
  reviewing: 'Review',
  finalized: 'Finalization',
};

export const NO_VALID_POSTINGS_WARNING = 'No valid postings after normalization';

// ─── Run context ─────────────────────────────────────────────────────

class RunContext {
  readonly runId: string;
  readonly states: PipelineStage[] = [];
  readonly warnings: string[] = [];
  readonly log: Logger;
  readonly clock: Clock;
  private readonly emitter: PipelineEmitter | undefined;

  constructor(deps: PipelineDeps, kind: string) {
    this.runId = deps.runId ?? randomUUID();
    this.log = createRunLogger(this.runId, { kind });
    this.clock = deps.clock ?? systemClock;
    this.emitter = deps.emit;
  }

  emit(event: PipelineEvent): void {
    if (!this.emitter) return;
    try {
      this.emitter(event);
    } catch (err) {
      this.log.warn({ event: event.type, error: describeError(err) }, 'Pipeline event listener threw');
    }
  }

  warn(stage: PipelineStage, message: string): void {
    this.warnings.push(message);
    this.emit({ type: 'warning', stage, message });
  }

  enter(stage: PipelineStage): number {
    this.states.push(stage);
    this.emit({ type: 'stage_start', stage });
    this.log.info({ stage }, 'Stage start');
    return this.clock.now();
  }

  /**
   * Run one stage. Item failures are turned into warnings; a throw becomes a
   * stage warning and `fallback` is returned in place of the output.
   */
  async stage<T>(
    stage: PipelineStage,
    fallback: T,
    countOf: (output: T) => number,
    body: () => Promise<StageOutput<T>> | StageOutput<T>,
  ): Promise<T> {
    const startedAt = this.enter(stage);
    try {
      const { output, failures } = await body();
      for (const failure of failures) {
        this.warn(stage, `${STAGE_LABEL[stage]} failed for posting ${failure.item}: ${failure.message}`);
      }
      const durationMs = this.clock.now() - startedAt;
      this.emit({
        type: 'stage_complete',
        stage,
        duration_ms: durationMs,
        items_out: countOf(output),
        failures: failures.length,
      });
      this.log.info({ stage, duration_ms: durationMs, items_out: countOf(output), failures: failures.length }, 'Stage complete');
      return output;
    } catch (err) {
      const message = err instanceof StageFailure
        ? err.message
        : `${STAGE_LABEL[stage]} stage failed: ${describeError(err)}`;
      this.log.error({ stage, error: message }, 'Stage failed');
      this.emit({ type: 'stage_failed', stage, message });
      this.warn(stage, message);
      return fallback;
    }
  }

  finalize(matches: readonly Match[], gaps: readonly GapResult[], review: ReviewOutcome): FinalReport {
    const startedAt = this.enter('finalized');
    const report = buildFinalReport({ matches, gaps, review, warnings: this.warnings });
    this.emit({
      type: 'stage_complete',
      stage: 'finalized',
      duration_ms: this.clock.now() - startedAt,
      items_out: report.ranked_jobs.length,
      failures: 0,
    });
    this.log.info(
      { ranked: report.ranked_jobs.length, gaps: report.gaps.length, warnings: report.warnings.length },
      'Pipeline finalized',
    );
    return report;
  }
}

async function normalizeStage(ctx: RunContext, rawPostings: readonly unknown[]): Promise<Posting[]> {
  const postings = await ctx.stage<Posting[]>('normalizing', [], (out) => out.length, () =>
    normalizePostings(rawPostings, { logger: ctx.log }),
  );
  if (postings.length === 0) {
    ctx.warn('normalizing', NO_VALID_POSTINGS_WARNING);
  }
  return postings;
}

function extractStage(ctx: RunContext, deps: PipelineDeps, postings: readonly Posting[]): Promise<Map<string, ExtractedSkills>> {
  return ctx.stage('extracting_skills', new Map<string, ExtractedSkills>(), (out) => out.size, () =>
    extractSkills(postings, deps.invoker, {
      model: deps.models.skill_extraction,
      interCallDelayMs: deps.interCallDelayMs,
      haltOnQuota: deps.haltOnQuota,
      clock: ctx.clock,
      logger: ctx.log,
    }),
  );
}

// ─── Entry points ────────────────────────────────────────────────────

/**
 * Full run: every state in order.
 */
export async function runMatchingPipeline(
  profile: Profile,
  rawPostings: readonly unknown[],
  deps: PipelineDeps,
): Promise<PipelineRun> {
  const ctx = new RunContext(deps, 'match');
  ctx.log.info({ postings: rawPostings.length }, 'Matching pipeline started');

  const postings = await normalizeStage(ctx, rawPostings);
  const skills = await extractStage(ctx, deps, postings);

  const matches = await ctx.stage<Match[]>('ranking', [], (out) => out.length, () =>
    rankFull(profile, postings, skills, deps.invoker, {
      model: deps.models.full_rank,
      topK: deps.topK,
      logger: ctx.log,
    }),
  );

  const gaps = await ctx.stage<GapResult[]>('analyzing_gaps', [], (out) => out.length, () =>
    analyzeGaps(profile, matches, skills, deps.invoker, {
      model: deps.models.gap_analysis,
      interCallDelayMs: deps.interCallDelayMs,
      haltOnQuota: deps.haltOnQuota,
      clock: ctx.clock,
      logger: ctx.log,
    }),
  );

  const review = await ctx.stage('reviewing', emptyReviewOutcome(), (out) => out.flagged_posting_ids.length, async () => ({
    output: await reviewMatches(profile, matches, gaps, deps.invoker, { model: deps.models.review, logger: ctx.log }),
    failures: [],
  }));

  const report = ctx.finalize(matches, gaps, review);
  return { run_id: ctx.runId, states: ctx.states, report };
}

/**
 * Single-job run: normalizing → extracting_skills → analyzing_gaps → finalized.
 * Ranking and review are skipped; the report has no ranked jobs.
 */
export async function runSingleJobPipeline(
  profile: Profile,
  rawPosting: unknown,
  deps: PipelineDeps,
): Promise<PipelineRun> {
  const ctx = new RunContext(deps, 'single');

  const postings = await normalizeStage(ctx, [rawPosting]);
  const skills = await extractStage(ctx, deps, postings);

  const gaps = await ctx.stage<GapResult[]>('analyzing_gaps', [], (out) => out.length, async () => {
    const analyzable = postings.flatMap((posting) => {
      const postingSkills = skills.get(posting.id);
      return postingSkills ? [{ posting, skills: postingSkills }] : [];
    });
    const { results, failures } = await forEachItem(
      'analyzing_gaps',
      analyzable,
      (entry) => entry.posting.id,
      (entry) => analyzeGap(profile, entry.posting, entry.skills, deps.invoker, { model: deps.models.gap_analysis }),
      { interCallDelayMs: 0, clock: ctx.clock, logger: ctx.log },
    );
    return { output: results.map(({ value }) => value), failures };
  });

  const report = ctx.finalize([], gaps, emptyReviewOutcome());
  return { run_id: ctx.runId, states: ctx.states, report };
}

/**
 * Lightweight ordering for fresh search results: normalize, then one cheap
 * scoring pass. No skill extraction, no gaps.
 */
export async function runQuickRank(
  profile: Profile,
  rawPostings: readonly unknown[],
  deps: PipelineDeps,
): Promise<QuickRankRun> {
  const ctx = new RunContext(deps, 'quick_rank');

  const postings = await normalizeStage(ctx, rawPostings);
  const scores = await ctx.stage('ranking', new Map<string, number>(), (out) => out.size, () =>
    rankQuick(profile, postings, deps.invoker, {
      model: deps.models.quick_rank,
      interCallDelayMs: deps.interCallDelayMs,
      clock: ctx.clock,
      logger: ctx.log,
    }),
  );

  const ordered = orderByScores(postings, scores).flatMap((posting) => {
    const score = scores.get(posting.id);
    return score === undefined ? [] : [{ posting_id: posting.id, score }];
  });

  return { run_id: ctx.runId, states: ctx.states, scores: ordered, warnings: [...ctx.warnings] };
}
