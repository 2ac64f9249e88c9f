/**
 * Stage 4: Gap Analyst
 *
 * For each ranked match, compares the candidate's skills with the posting's
 * extracted requirements: matched, missing-required and nice-to-have skills,
 * a short narrative on what is missing, a 3-5 step learning path and concrete
 * learning resources.
 *
 * Uses the mid model (analytical comparison).
 *
 * The Gap Analyst only classifies and suggests; it does not re-score matches.
 */

import logger from '../lib/logger.js';
import { ValidationError } from '../lib/errors.js';
import { limitWords, truncate } from '../lib/clean-text.js';
import type { Invoker } from '../lib/invoker.js';
import { forEachItem, type ItemLoopOptions } from './item-loop.js';
import { GapPayloadSchema } from './schemas/llm-schemas.js';
import type { ExtractedSkills, GapResult, Match, Posting, Profile, StageOutput } from './types.js';

export const MAX_NARRATIVE_WORDS = 200;
export const MAX_LEARNING_STEPS = 5;
const MAX_DESCRIPTION_CHARS = 2000;

const SYSTEM_PROMPT = `You are a career advisor and skill gap analyst. Compare a candidate's skills with one job's requirements. Be honest and do not inflate matches.

Return ONLY a JSON object with this exact shape:
{
  "matched_skills": ["skills the candidate has that the job asks for"],
  "missing_required_skills": ["critical skills the candidate lacks"],
  "missing_skills_narrative": "at most 200 words on why the missing skills matter for this role",
  "nice_to_have_skills": ["useful but non-critical skills the candidate lacks"],
  "learning_path": ["3 to 5 high-level steps to close the gap"],
  "learning_resources": [
    { "name": "resource name", "url": "https://...", "type": "university | online_course | certification | bootcamp | training_program", "skill": "skill it covers" }
  ]
}

Rules:
- Only count a skill as matched if it appears in the candidate's skills or experience.
- Learning resources must be real programs with working URLs; omit any you are unsure of.
- No markdown fences, no explanation.`;

export interface GapAnalysisOptions extends ItemLoopOptions {
  model: string;
}

function buildPrompt(profile: Profile, posting: Posting, skills: ExtractedSkills): string {
  const experience = profile.experience.slice(0, 4)
    .map((e) => `- ${e.title} at ${e.company}${e.duration ? ` (${e.duration})` : ''}`)
    .join('\n');

  const lines = [`Candidate Skills: ${profile.skills.length > 0 ? profile.skills.join(', ') : 'None specified'}`];
  if (experience) lines.push(`Candidate Experience:\n${experience}`);

  return [
    ...lines,
    '',
    `Job Title: ${posting.title}`,
    `Company: ${posting.company}`,
    '',
    'Job Required Skills:',
    `Hard Skills: ${skills.hard_skills.join(', ')}`,
    `Soft Skills: ${skills.soft_skills.join(', ')}`,
    `Tools: ${skills.tools.join(', ')}`,
    `Seniority: ${skills.seniority ?? 'Not specified'}`,
    '',
    'Job Description:',
    truncate(posting.description, MAX_DESCRIPTION_CHARS),
  ].join('\n');
}

/** Gap analysis for one (profile, posting, skills) triple. Throws on invoker failure. */
export async function analyzeGap(
  profile: Profile,
  posting: Posting,
  skills: ExtractedSkills,
  invoker: Invoker,
  options: Pick<GapAnalysisOptions, 'model'>,
): Promise<GapResult> {
  const payload = await invoker.invoke(options.model, {
    label: 'gap_analysis',
    system: SYSTEM_PROMPT,
    prompt: buildPrompt(profile, posting, skills),
    schema: GapPayloadSchema,
    max_tokens: 2048,
  });

  return {
    posting_id: posting.id,
    posting_title: posting.title,
    matched_skills: payload.matched_skills,
    missing_required_skills: payload.missing_required_skills,
    missing_skills_narrative: payload.missing_skills_narrative == null
      ? null
      : limitWords(payload.missing_skills_narrative, MAX_NARRATIVE_WORDS),
    nice_to_have_skills: payload.nice_to_have_skills,
    learning_path: payload.learning_path.slice(0, MAX_LEARNING_STEPS),
    learning_resources: payload.learning_resources,
  };
}

/**
 * Analyze each match in order, one call at a time. Matches without extracted
 * skills cannot be analyzed and are reported as failures.
 */
export async function analyzeGaps(
  profile: Profile,
  matches: readonly Match[],
  skills: ReadonlyMap<string, ExtractedSkills>,
  invoker: Invoker,
  options: GapAnalysisOptions,
): Promise<StageOutput<GapResult[]>> {
  const log = options.logger ?? logger;

  const { results, failures } = await forEachItem(
    'analyzing_gaps',
    matches,
    (match) => match.posting.id,
    async (match) => {
      const postingSkills = skills.get(match.posting.id);
      if (!postingSkills) {
        throw new ValidationError(`No extracted skills for posting ${match.posting.id}`, 'skills');
      }
      return analyzeGap(profile, match.posting, postingSkills, invoker, options);
    },
    options,
  );

  const gaps = results.map(({ value }) => value);
  log.info({ matches: matches.length, analyzed: gaps.length, failed: failures.length }, 'Gap analysis complete');
  return { output: gaps, failures };
}
