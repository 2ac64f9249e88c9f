/**
 * Stage 2: Skill Extractor
 *
 * One call per posting: description → hard skills, soft skills, tools and
 * seniority. Uses the light model. Postings whose call fails are absent from
 * the returned map and reported as failures.
 */

import logger from '../lib/logger.js';
import { truncate } from '../lib/clean-text.js';
import type { Invoker } from '../lib/invoker.js';
import { forEachItem, type ItemLoopOptions } from './item-loop.js';
import { ExtractedSkillsPayloadSchema } from './schemas/llm-schemas.js';
import type { ExtractedSkills, Posting, StageOutput } from './types.js';

export const DEFAULT_MAX_INPUT_CHARS = 3000;

const SYSTEM_PROMPT = `You are an expert job requirements analyst. Read a job posting and extract the skills it asks for.

Return ONLY a JSON object with this exact shape:
{
  "hard_skills": ["technical or domain skills, e.g. Python, Financial Modelling"],
  "soft_skills": ["interpersonal skills, e.g. Communication, Stakeholder Management"],
  "tools": ["software, platforms and equipment, e.g. Excel, AWS, Salesforce"],
  "seniority": "Entry Level | Junior | Mid-Level | Senior | Lead | Executive, or null if unclear"
}

Rules:
- Each list holds short skill names as plain strings, no duplicates.
- Only list skills the posting actually mentions or clearly requires.
- Use empty arrays when nothing fits.
- No markdown fences, no explanation.`;

export interface SkillExtractionOptions extends ItemLoopOptions {
  model: string;
  /** Description characters sent to the model. Default 3000. */
  maxInputChars?: number;
}

function buildPrompt(posting: Posting, maxInputChars: number): string {
  return [
    `Job Title: ${posting.title}`,
    `Company: ${posting.company}`,
    '',
    'Job Description:',
    truncate(posting.description, maxInputChars),
  ].join('\n');
}

/** Extract skills for a single posting. Throws on invoker failure. */
export async function extractPostingSkills(
  posting: Posting,
  invoker: Invoker,
  options: Pick<SkillExtractionOptions, 'model' | 'maxInputChars'>,
): Promise<ExtractedSkills> {
  const payload = await invoker.invoke(options.model, {
    label: 'skill_extraction',
    system: SYSTEM_PROMPT,
    prompt: buildPrompt(posting, options.maxInputChars ?? DEFAULT_MAX_INPUT_CHARS),
    schema: ExtractedSkillsPayloadSchema,
    max_tokens: 1024,
  });

  return {
    posting_id: posting.id,
    hard_skills: payload.hard_skills,
    soft_skills: payload.soft_skills,
    tools: payload.tools,
    seniority: payload.seniority,
  };
}

export async function extractSkills(
  postings: readonly Posting[],
  invoker: Invoker,
  options: SkillExtractionOptions,
): Promise<StageOutput<Map<string, ExtractedSkills>>> {
  const log = options.logger ?? logger;

  const { results, failures } = await forEachItem(
    'extracting_skills',
    postings,
    (posting) => posting.id,
    (posting) => extractPostingSkills(posting, invoker, options),
    options,
  );

  const skills = new Map<string, ExtractedSkills>();
  for (const { item, value } of results) {
    skills.set(item.id, value);
  }

  log.info({ postings: postings.length, extracted: skills.size, failed: failures.length }, 'Skill extraction complete');
  return { output: skills, failures };
}
