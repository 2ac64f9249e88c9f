/**
 * Shared type definitions for the matching pipeline.
 *
 * Each stage is a function: typed input → typed output plus per-item failures.
 * No stage mutates another stage's output; artifacts are keyed by posting id.
 */

import type { PipelineErrorCode } from '../lib/errors.js';

// ─── Profile ─────────────────────────────────────────────────────────

export interface ExperienceRecord {
  company: string;
  title: string;
  duration: string;
  responsibilities: string;
}

export interface EducationRecord {
  institution: string;
  degree: string;
  field: string;
  year: string;
}

export interface ProfilePreferences {
  target_roles: string[];
  experience_level: string | null;
  location: string | null;
  salary_min: number | null;
  salary_max: number | null;
  salary_currency: string;
}

export interface Profile {
  name: string | null;
  headline: string | null;
  summary: string | null;
  skills: string[];
  experience: ExperienceRecord[];
  education: EducationRecord[];
  preferences: ProfilePreferences;
}

// ─── Postings and stage artifacts ────────────────────────────────────

export interface Posting {
  id: string;
  title: string;
  company: string;
  location: string;
  salary_text: string | null;
  category: string | null;
  description: string;
  url: string | null;
}

export interface ExtractedSkills {
  posting_id: string;
  hard_skills: string[];
  soft_skills: string[];
  tools: string[];
  seniority: string | null;
}

export interface Match {
  posting: Posting;
  /** Always within [0, 1]. */
  score: number;
  reasoning: string;
}

export type LearningResourceType =
  | 'university'
  | 'online_course'
  | 'certification'
  | 'bootcamp'
  | 'training_program'
  | 'other';

export interface LearningResource {
  name: string;
  url: string;
  type: LearningResourceType;
  skill: string;
}

export interface GapResult {
  posting_id: string;
  posting_title: string;
  matched_skills: string[];
  missing_required_skills: string[];
  /** At most 200 words. */
  missing_skills_narrative: string | null;
  nice_to_have_skills: string[];
  /** At most 5 steps. */
  learning_path: string[];
  learning_resources: LearningResource[];
}

export interface ReviewCorrection {
  posting_id: string | null;
  note: string;
}

export interface ReviewOutcome {
  warnings: string[];
  flagged_posting_ids: string[];
  corrections: ReviewCorrection[];
}

// ─── Report ──────────────────────────────────────────────────────────

export interface RankedJob {
  posting_id: string;
  title: string;
  company: string;
  location: string;
  salary_text: string | null;
  category: string | null;
  url: string | null;
  score: number;
  reasoning: string;
  flagged: boolean;
}

export interface FinalReport {
  ranked_jobs: RankedJob[];
  gaps: GapResult[];
  roadmap: LearningResource[];
  summary: string;
  warnings: string[];
  flagged_posting_ids: string[];
  corrections: ReviewCorrection[];
}

// ─── Stage plumbing ──────────────────────────────────────────────────

export type PipelineStage =
  | 'normalizing'
  | 'extracting_skills'
  | 'ranking'
  | 'analyzing_gaps'
  | 'reviewing'
  | 'finalized';

export interface ItemFailure {
  /** Posting id, or `#<index>` for raw records without a usable id. */
  item: string;
  stage: PipelineStage;
  code: PipelineErrorCode;
  message: string;
}

export interface StageOutput<T> {
  output: T;
  failures: ItemFailure[];
}

export type PipelineEvent =
  | { type: 'stage_start'; stage: PipelineStage }
  | {
      type: 'stage_complete';
      stage: PipelineStage;
      duration_ms: number;
      items_out: number;
      failures: number;
    }
  | { type: 'stage_failed'; stage: PipelineStage; message: string }
  | { type: 'warning'; stage: PipelineStage; message: string };
