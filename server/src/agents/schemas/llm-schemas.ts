/**
 * Zod schemas for LLM output validation.
 *
 * Every payload is checked here, right after decoding, so stages only ever see
 * the typed entities of ../types.ts. The schemas are permissive about key
 * spelling and list shape (models drift) but strict about the envelope: a
 * payload of the wrong kind fails and becomes a MalformedResponseError.
 */

import { z } from 'zod';
import {
  OptionalTextSchema,
  SkillListSchema,
  StringListSchema,
  isRecord,
  pickString,
  toScore,
  unwrapArray,
} from './coerce.js';
import type {
  LearningResource,
  LearningResourceType,
  ReviewCorrection,
} from '../types.js';

// ─── Skill extraction ────────────────────────────────────────────────

export const ExtractedSkillsPayloadSchema = z.object({
  hard_skills: SkillListSchema,
  soft_skills: SkillListSchema,
  tools: SkillListSchema,
  seniority: OptionalTextSchema,
});

export type ExtractedSkillsPayload = z.infer<typeof ExtractedSkillsPayloadSchema>;

// ─── Ranking (full and lightweight share one entry contract) ─────────

export interface RankEntry {
  posting_id: string;
  score: number;
  reasoning: string | null;
}

const ID_KEYS = ['job_id', 'posting_id', 'id'] as const;
const SCORE_KEYS = ['match_score', 'score'] as const;

function toRankEntry(value: unknown): RankEntry[] {
  if (!isRecord(value)) return [];
  const postingId = pickString(value, ID_KEYS);
  const rawScore = SCORE_KEYS.map((k) => value[k]).find((v) => v !== undefined);
  const score = toScore(rawScore);
  if (!postingId || score == null) return [];
  const reasoning = typeof value.reasoning === 'string' && value.reasoning.trim()
    ? value.reasoning.trim()
    : null;
  return [{ posting_id: postingId, score, reasoning }];
}

/**
 * `[{ job_id, match_score, reasoning }]`, optionally wrapped in
 * `{ matches | rankings | results | jobs | scores: [...] }`. Entries without an
 * id or a numeric score are dropped; scores are clamped to [0, 1].
 */
export const RankingPayloadSchema = z.preprocess(
  (value) => unwrapArray(value, ['matches', 'rankings', 'results', 'jobs', 'scores']),
  z.array(z.unknown()),
).transform((entries) => entries.flatMap(toRankEntry));

// ─── Gap analysis ────────────────────────────────────────────────────

const RESOURCE_TYPES: readonly LearningResourceType[] = [
  'university',
  'online_course',
  'certification',
  'bootcamp',
  'training_program',
];

export function normalizeResourceType(raw: unknown): LearningResourceType {
  const s = String(raw ?? '').toLowerCase().trim().replace(/[\s-]+/g, '_');
  const direct = RESOURCE_TYPES.find((t) => t === s);
  if (direct) return direct;
  if (/course|mooc/.test(s)) return 'online_course';
  if (/cert/.test(s)) return 'certification';
  if (/universit|college|degree/.test(s)) return 'university';
  if (/bootcamp/.test(s)) return 'bootcamp';
  if (/training|program/.test(s)) return 'training_program';
  return 'other';
}

function isHttpUrl(value: string): boolean {
  try {
    const url = new URL(value);
    return url.protocol === 'http:' || url.protocol === 'https:';
  } catch {
    return false;
  }
}

function toLearningResource(value: unknown): LearningResource[] {
  if (!isRecord(value)) return [];
  const name = pickString(value, ['name', 'title']);
  const url = pickString(value, ['url', 'link']);
  if (!name || !url || !isHttpUrl(url)) return [];
  return [{
    name,
    url,
    type: normalizeResourceType(value.type),
    skill: pickString(value, ['skill']) ?? '',
  }];
}

const LearningResourceListSchema = z.preprocess(
  (value) => (value == null ? [] : value),
  z.array(z.unknown()),
).transform((items) => items.flatMap(toLearningResource));

export const GapPayloadSchema = z.preprocess(
  (value) => {
    if (!isRecord(value)) return value;
    // Accept the older key names alongside the current ones.
    return {
      ...value,
      missing_skills_narrative: value.missing_skills_narrative ?? value.missing_required_skills_writeup,
      learning_path: value.learning_path ?? value.suggested_learning_path,
    };
  },
  z.object({
    matched_skills: SkillListSchema,
    missing_required_skills: SkillListSchema,
    missing_skills_narrative: OptionalTextSchema,
    nice_to_have_skills: SkillListSchema,
    learning_path: StringListSchema,
    learning_resources: LearningResourceListSchema,
  }),
);

export type GapPayload = z.infer<typeof GapPayloadSchema>;

// ─── Review ──────────────────────────────────────────────────────────

function toCorrection(value: unknown): ReviewCorrection[] {
  if (typeof value === 'string') {
    return value.trim() ? [{ posting_id: null, note: value.trim() }] : [];
  }
  if (!isRecord(value)) return [];
  const note = pickString(value, ['note', 'suggestion', 'correction', 'issue', 'description', 'message']);
  if (!note) return [];
  return [{ posting_id: pickString(value, ID_KEYS), note }];
}

const IdListSchema = z.preprocess(
  (value) => (value == null ? [] : value),
  z.array(z.unknown()),
).transform((items) => [...new Set(items
  .map((item) => (typeof item === 'number' ? String(item) : typeof item === 'string' ? item.trim() : ''))
  .filter((s) => s.length > 0))]);

export const ReviewPayloadSchema = z.preprocess(
  (value) => {
    if (!isRecord(value)) return value;
    return { ...value, flagged_posting_ids: value.flagged_posting_ids ?? value.flagged_job_ids };
  },
  z.object({
    warnings: StringListSchema,
    flagged_posting_ids: IdListSchema,
    corrections: z.preprocess(
      (value) => (value == null ? [] : value),
      z.array(z.unknown()),
    ).transform((items) => items.flatMap(toCorrection)),
  }),
);

export type ReviewPayload = z.infer<typeof ReviewPayloadSchema>;
