/**
 * Stage 5: Review Board
 *
 * One call that sanity-checks the ranked matches and their gap reports:
 * irrelevant jobs, matched skills the candidate never claimed, and high
 * scores that ignore experience level, location or salary floor.
 *
 * Uses the mid model.
 */

import type { Logger } from 'pino';
import logger from '../lib/logger.js';
import type { Invoker } from '../lib/invoker.js';
import { formatSalaryExpectation } from './profile-summary.js';
import { ReviewPayloadSchema } from './schemas/llm-schemas.js';
import type { GapResult, Match, Profile, ReviewOutcome } from './types.js';

export const MAX_REVIEWED_MATCHES = 20;

const SYSTEM_PROMPT = `You are a quality assurance reviewer for job recommendations. Identify:

1. Obviously irrelevant jobs (e.g. the candidate works in F&B but the job is "Senior Neurosurgeon").
2. Hallucinated skills: matched_skills that do not appear in the candidate's skills.
3. Inconsistencies where match_score is high despite:
   - an experience level mismatch (job requires Senior, candidate is Junior)
   - a location mismatch (candidate wants Remote, job is on-site only)
   - a salary mismatch (job pays well below the candidate's minimum)

Return ONLY a JSON object:
{
  "warnings": ["one message per issue found"],
  "flagged_job_ids": ["ids of jobs that should be flagged"],
  "corrections": [{ "job_id": "id", "note": "suggested correction" }]
}

Be thorough but fair. No markdown fences, no explanation.`;

export function emptyReviewOutcome(): ReviewOutcome {
  return { warnings: [], flagged_posting_ids: [], corrections: [] };
}

export interface ReviewOptions {
  model: string;
  logger?: Logger;
}

function buildPrompt(profile: Profile, reviewed: readonly Match[], gaps: readonly GapResult[]): string {
  const gapById = new Map(gaps.map((g) => [g.posting_id, g]));
  const summary = reviewed.map((match) => {
    const gap = gapById.get(match.posting.id);
    return {
      job_id: match.posting.id,
      title: match.posting.title,
      company: match.posting.company,
      location: match.posting.location,
      salary: match.posting.salary_text ?? 'Not specified',
      match_score: match.score,
      matched_skills: gap?.matched_skills.slice(0, 5) ?? [],
      missing_skills: gap?.missing_required_skills.slice(0, 5) ?? [],
    };
  });

  const prefs = profile.preferences;
  return [
    'Candidate Profile:',
    `- Skills: ${profile.skills.length > 0 ? profile.skills.join(', ') : 'None'}`,
    `- Experience Level: ${prefs.experience_level ?? 'Not specified'}`,
    `- Preferred Location: ${prefs.location ?? 'Not specified'}`,
    `- Salary Expectation: ${formatSalaryExpectation(profile)}`,
    '',
    'Job Matches and Skill Gaps:',
    JSON.stringify(summary, null, 2),
  ].join('\n');
}

/**
 * Review the top matches. No matches → empty outcome without a call.
 * Flagged ids and corrections naming postings outside the reviewed set are dropped. Throws on invoker failure.
 */
export async function reviewMatches(
  profile: Profile,
  matches: readonly Match[],
  gaps: readonly GapResult[],
  invoker: Invoker,
  options: ReviewOptions,
): Promise<ReviewOutcome> {
  const log = options.logger ?? logger;
  if (matches.length === 0) {
    return emptyReviewOutcome();
  }

  const reviewed = matches.slice(0, MAX_REVIEWED_MATCHES);
  const payload = await invoker.invoke(options.model, {
    label: 'review',
    system: SYSTEM_PROMPT,
    prompt: buildPrompt(profile, reviewed, gaps),
    schema: ReviewPayloadSchema,
    max_tokens: 2048,
  });

  const reviewedIds = new Set(reviewed.map((m) => m.posting.id));
  const flagged = payload.flagged_posting_ids.filter((id) => reviewedIds.has(id));
  const corrections = payload.corrections.filter((c) => c.posting_id === null || reviewedIds.has(c.posting_id));
  const dropped = payload.flagged_posting_ids.length - flagged.length
    + payload.corrections.length - corrections.length;
  if (dropped > 0) {
    log.warn({ dropped }, 'Review named unknown posting ids');
  }

  log.info({ reviewed: reviewed.length, warnings: payload.warnings.length, flagged: flagged.length }, 'Review complete');
  return {
    warnings: payload.warnings,
    flagged_posting_ids: flagged,
    corrections,
  };
}
