/**
 * Final stage: consolidate stage artifacts into the report. Pure; no calls.
 */

import type {
  FinalReport,
  GapResult,
  LearningResource,
  Match,
  RankedJob,
  ReviewOutcome,
} from './types.js';

export const MAX_ROADMAP_ITEMS = 10;
const TOP_MATCHES_IN_SUMMARY = 5;

export interface AggregateInput {
  /** Already sorted by score. */
  matches: readonly Match[];
  gaps: readonly GapResult[];
  review: ReviewOutcome;
  /** Warnings the run itself raised; review warnings follow them. */
  warnings: readonly string[];
}

function resourceKey(resource: LearningResource): string {
  return `${resource.name.trim().toLowerCase()}\u0000${resource.url.trim().toLowerCase()}`;
}

/** Learning resources across all gaps, first-seen order, unique by (name, URL). */
export function buildRoadmap(gaps: readonly GapResult[], limit = MAX_ROADMAP_ITEMS): LearningResource[] {
  const seen = new Set<string>();
  const roadmap: LearningResource[] = [];
  for (const gap of gaps) {
    for (const resource of gap.learning_resources) {
      if (roadmap.length >= limit) return roadmap;
      const key = resourceKey(resource);
      if (seen.has(key)) continue;
      seen.add(key);
      roadmap.push(resource);
    }
  }
  return roadmap;
}

export function formatMatchPercent(score: number): string {
  return `${(score * 100).toFixed(1)}%`;
}

export function buildSummary(rankedJobs: readonly RankedJob[], gapCount: number, flaggedCount: number): string {
  const lines = [
    `Found ${rankedJobs.length} job recommendation(s); analyzed skill gaps for ${gapCount}; ${flaggedCount} flagged for review.`,
  ];
  if (rankedJobs.length > 0) {
    lines.push('Top matches:');
    for (const job of rankedJobs.slice(0, TOP_MATCHES_IN_SUMMARY)) {
      lines.push(`- ${job.title} at ${job.company} (Match: ${formatMatchPercent(job.score)})`);
    }
  }
  return lines.join('\n');
}

export function buildFinalReport(input: AggregateInput): FinalReport {
  const flagged = new Set(input.review.flagged_posting_ids);

  const rankedJobs: RankedJob[] = input.matches.map((match) => ({
    posting_id: match.posting.id,
    title: match.posting.title,
    company: match.posting.company,
    location: match.posting.location,
    salary_text: match.posting.salary_text,
    category: match.posting.category,
    url: match.posting.url,
    score: match.score,
    reasoning: match.reasoning,
    flagged: flagged.has(match.posting.id),
  }));

  return {
    ranked_jobs: rankedJobs,
    gaps: [...input.gaps],
    roadmap: buildRoadmap(input.gaps),
    summary: buildSummary(rankedJobs, input.gaps.length, input.review.flagged_posting_ids.length),
    warnings: [...input.warnings, ...input.review.warnings],
    flagged_posting_ids: [...input.review.flagged_posting_ids],
    corrections: [...input.review.corrections],
  };
}
