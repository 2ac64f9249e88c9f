/**
 * Stage 3: Ranker
 *
 * Two scorers share one rubric and one response contract
 * (`[{ job_id, match_score, reasoning }]`), so a quick score and a full score
 * for the same posting mean the same thing:
 *
 *   rankQuick: light model, batches of up to 50 postings, short descriptions,
 *               no skill data. Used to order search results cheaply.
 *   rankFull:  mid model, one call over every posting with extracted skills.
 *               Produces the Matches the rest of the pipeline works from.
 */

import type { Logger } from 'pino';
import logger from '../lib/logger.js';
import { StageFailure, describeError, errorCodeOf } from '../lib/errors.js';
import { truncate } from '../lib/clean-text.js';
import type { Invoker } from '../lib/invoker.js';
import { systemClock, type Clock } from '../lib/sleep.js';
import { summarizeProfile } from './profile-summary.js';
import { RankingPayloadSchema, type RankEntry } from './schemas/llm-schemas.js';
import type { ExtractedSkills, ItemFailure, Match, Posting, Profile, StageOutput } from './types.js';

export const SCORE_RUBRIC = `Assign each job a match_score between 0.0 and 1.0:
- 1.0 = perfect match (all requirements met, ideal fit)
- 0.7-0.9 = strong match (most requirements met)
- 0.4-0.6 = moderate match (some requirements met)
- 0.1-0.3 = weak match (few requirements met, a stretch)
- 0.0 = no match (irrelevant)

Weigh skill and tool overlap, experience level, role and industry alignment, and education requirements.`;

const RESPONSE_CONTRACT = `Return ONLY a JSON array, one object per job:
[{ "job_id": "<id from the input>", "match_score": 0.85, "reasoning": "1-2 sentences" }]
No markdown fences, no explanation.`;

const SYSTEM_PROMPT = `You are a job matching expert. Score how well each job fits the candidate.

${SCORE_RUBRIC}

${RESPONSE_CONTRACT}`;

/** First entry per known posting id; unknown ids and repeats are dropped. */
function indexEntries(entries: RankEntry[], known: ReadonlySet<string>): Map<string, RankEntry> {
  const byId = new Map<string, RankEntry>();
  for (const entry of entries) {
    if (!known.has(entry.posting_id) || byId.has(entry.posting_id)) continue;
    byId.set(entry.posting_id, entry);
  }
  return byId;
}

export const NOT_SCORED_MESSAGE = 'Not scored by the model';

function notScored(postings: readonly Posting[], scored: ReadonlyMap<string, RankEntry>): ItemFailure[] {
  return postings
    .filter((posting) => !scored.has(posting.id))
    .map((posting): ItemFailure => ({
      item: posting.id,
      stage: 'ranking',
      code: 'MALFORMED_RESPONSE',
      message: NOT_SCORED_MESSAGE,
    }));
}

/** Score descending; equal scores keep their input order. */
export function sortMatches(matches: readonly Match[]): Match[] {
  return matches
    .map((match, index) => ({ match, index }))
    .sort((a, b) => b.match.score - a.match.score || a.index - b.index)
    .map(({ match }) => match);
}

// ─── Lightweight ranking ─────────────────────────────────────────────

export interface QuickRankOptions {
  model: string;
  /** Postings per call. Default 50. */
  batchSize?: number;
  /** Description characters per posting. Default 300. */
  maxDescriptionChars?: number;
  interCallDelayMs?: number;
  clock?: Clock;
  logger?: Logger;
}

function buildQuickPrompt(profile: Profile, batch: readonly Posting[], maxChars: number): string {
  const jobs = batch.map((p) => ({
    job_id: p.id,
    title: p.title,
    company: p.company,
    description: truncate(p.description, maxChars),
  }));
  return `Candidate Profile:\n${summarizeProfile(profile)}\n\nJobs to Score:\n${JSON.stringify(jobs, null, 2)}`;
}

/**
 * Posting id → score in [0, 1]. Postings in a failed batch, or left out of
 * the model's answer, have no score and are reported as failures.
 */
export async function rankQuick(
  profile: Profile,
  postings: readonly Posting[],
  invoker: Invoker,
  options: QuickRankOptions,
): Promise<StageOutput<Map<string, number>>> {
  const log = options.logger ?? logger;
  const clock = options.clock ?? systemClock;
  const batchSize = options.batchSize ?? 50;
  const maxChars = options.maxDescriptionChars ?? 300;
  const delayMs = options.interCallDelayMs ?? 500;

  const scores = new Map<string, number>();
  const failures: ItemFailure[] = [];

  for (let start = 0; start < postings.length; start += batchSize) {
    const batch = postings.slice(start, start + batchSize);
    if (start > 0 && delayMs > 0) {
      await clock.sleep(delayMs);
    }

    try {
      const entries = await invoker.invoke(options.model, {
        label: 'quick_rank',
        system: SYSTEM_PROMPT,
        prompt: buildQuickPrompt(profile, batch, maxChars),
        schema: RankingPayloadSchema,
      });
      const byId = indexEntries(entries, new Set(batch.map((p) => p.id)));
      for (const [id, entry] of byId) {
        scores.set(id, entry.score);
      }
      failures.push(...notScored(batch, byId));
    } catch (err) {
      const message = describeError(err);
      log.warn({ batch_start: start, size: batch.length, error: message }, 'Quick rank batch failed');
      for (const posting of batch) {
        failures.push({ item: posting.id, stage: 'ranking', code: errorCodeOf(err), message });
      }
    }
  }

  log.info({ postings: postings.length, scored: scores.size }, 'Quick rank complete');
  return { output: scores, failures };
}

/** Scored postings by score descending (stable), then unscored ones in input order. */
export function orderByScores(postings: readonly Posting[], scores: ReadonlyMap<string, number>): Posting[] {
  const scored = postings
    .map((posting, index) => ({ posting, index, score: scores.get(posting.id) }))
    .filter((entry): entry is { posting: Posting; index: number; score: number } => entry.score !== undefined)
    .sort((a, b) => b.score - a.score || a.index - b.index)
    .map(({ posting }) => posting);
  const unscored = postings.filter((posting) => !scores.has(posting.id));
  return [...scored, ...unscored];
}

// ─── Full ranking ────────────────────────────────────────────────────

export interface FullRankOptions {
  model: string;
  /** Matches kept after sorting. Default 10. */
  topK?: number;
  /** Postings sent to the model. Default 50. */
  maxPostings?: number;
  /** Description characters per posting. Default 500. */
  maxDescriptionChars?: number;
  logger?: Logger;
}

function buildFullPrompt(
  profile: Profile,
  candidates: readonly Posting[],
  skills: ReadonlyMap<string, ExtractedSkills>,
  maxChars: number,
): string {
  const jobs = candidates.map((p) => {
    const s = skills.get(p.id);
    return {
      job_id: p.id,
      title: p.title,
      company: p.company,
      description: truncate(p.description, maxChars),
      hard_skills: s?.hard_skills.slice(0, 10) ?? [],
      soft_skills: s?.soft_skills.slice(0, 10) ?? [],
      tools: s?.tools.slice(0, 10) ?? [],
      seniority: s?.seniority ?? 'Not specified',
    };
  });
  return `Candidate Profile:\n${summarizeProfile(profile)}\n\nJobs to Rank:\n${JSON.stringify(jobs, null, 2)}`;
}

/**
 * Rank the postings that have extracted skills. A failed call fails the whole
 * stage with StageFailure; nothing is scored by default.
 */
export async function rankFull(
  profile: Profile,
  postings: readonly Posting[],
  skills: ReadonlyMap<string, ExtractedSkills>,
  invoker: Invoker,
  options: FullRankOptions,
): Promise<StageOutput<Match[]>> {
  const log = options.logger ?? logger;
  const topK = options.topK ?? 10;
  const maxPostings = options.maxPostings ?? 50;

  const eligible = postings.filter((p) => skills.has(p.id));
  const candidates = eligible.slice(0, maxPostings);
  if (eligible.length > candidates.length) {
    log.info({ eligible: eligible.length, considered: candidates.length }, 'Ranking capped');
  }
  if (candidates.length === 0) {
    return { output: [], failures: [] };
  }

  let entries: RankEntry[];
  try {
    entries = await invoker.invoke(options.model, {
      label: 'full_rank',
      system: SYSTEM_PROMPT,
      prompt: buildFullPrompt(profile, candidates, skills, options.maxDescriptionChars ?? 500),
      schema: RankingPayloadSchema,
    });
  } catch (err) {
    throw new StageFailure('ranking', `Ranking failed: ${describeError(err)}`, { cause: err });
  }

  const byId = indexEntries(entries, new Set(candidates.map((p) => p.id)));
  const matches: Match[] = [];
  for (const posting of candidates) {
    const entry = byId.get(posting.id);
    if (!entry) continue;
    matches.push({
      posting,
      score: entry.score,
      reasoning: entry.reasoning ?? 'No reasoning provided',
    });
  }

  const ranked = sortMatches(matches).slice(0, topK);
  log.info({ considered: candidates.length, scored: matches.length, kept: ranked.length }, 'Ranking complete');
  return { output: ranked, failures: notScored(candidates, byId) };
}
