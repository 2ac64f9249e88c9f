/**
 * Intake: parses already-extracted resume text into a Profile.
 * Pure extraction, no matching decisions. Uses the light model.
 */

import type { Invoker } from '../lib/invoker.js';
import { truncate } from '../lib/clean-text.js';
import { ExtractedProfilePayloadSchema } from './schemas/profile-schemas.js';
import type { Profile } from './types.js';

export const MAX_RESUME_CHARS = 4000;

const PARSE_PROMPT = `You are a resume parser. Extract structured data from the resume text and return ONLY valid JSON with this exact shape:

{
  "name": "Full Name",
  "headline": "Professional headline or current title",
  "summary": "Professional summary, verbatim",
  "skills": ["skill1", "skill2"],
  "experience": [
    { "company": "Company Name", "title": "Job Title", "years": "2019-2023", "responsibilities": "Brief description" }
  ],
  "education": [
    { "institution": "University", "degree": "Bachelor's", "field": "Computer Science", "year": "2015" }
  ],
  "target_roles": ["roles the candidate is aiming for"],
  "experience_level": "Entry Level | Junior | Mid-Level | Senior | Lead | Executive",
  "location": "Preferred work location, e.g. Singapore or Remote",
  "salary_range_min": 5000,
  "salary_range_max": 7000,
  "salary_currency": "SGD"
}

Rules:
- Extract ALL experience entries, most recent first.
- Skills are a flat array of individual skills.
- Use null for anything not present; salary_currency defaults to "SGD".
- Return ONLY the JSON object, no markdown fences, no explanation.`;

/**
 * Run intake over raw resume text. Throws on invoker failure; nothing is
 * substituted for a profile the model could not produce.
 */
export async function extractProfileFromResumeText(
  resumeText: string,
  invoker: Invoker,
  options: { model: string },
): Promise<Profile> {
  return invoker.invoke(options.model, {
    label: 'profile_extraction',
    system: PARSE_PROMPT,
    prompt: `Parse this resume:\n\n${truncate(resumeText, MAX_RESUME_CHARS)}`,
    schema: ExtractedProfilePayloadSchema,
    max_tokens: 4096,
  });
}
