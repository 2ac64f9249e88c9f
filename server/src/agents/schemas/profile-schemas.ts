/**
 * Profile schemas: the strict shape accepted over HTTP, and the permissive
 * shape read back from profile extraction.
 */

import { z } from 'zod';
import { OptionalTextSchema, SkillListSchema, StringListSchema, isRecord } from './coerce.js';
import type { EducationRecord, ExperienceRecord, Profile } from '../types.js';

// ─── Caller-supplied profile ─────────────────────────────────────────

const nullableText = (max: number) => z.string().trim().max(max).nullable().default(null);

export const ProfileInputSchema = z.object({
  name: nullableText(200),
  headline: nullableText(300),
  summary: nullableText(5_000),
  skills: z.array(z.string().trim().min(1).max(200)).max(500).default([]),
  experience: z.array(z.object({
    company: z.string().max(300).default(''),
    title: z.string().max(300).default(''),
    duration: z.string().max(100).default(''),
    responsibilities: z.string().max(5_000).default(''),
  })).max(50).default([]),
  education: z.array(z.object({
    institution: z.string().max(300).default(''),
    degree: z.string().max(300).default(''),
    field: z.string().max(300).default(''),
    year: z.string().max(20).default(''),
  })).max(20).default([]),
  preferences: z.object({
    target_roles: z.array(z.string().trim().min(1).max(200)).max(50).default([]),
    experience_level: nullableText(100),
    location: nullableText(200),
    salary_min: z.number().nonnegative().nullable().default(null),
    salary_max: z.number().nonnegative().nullable().default(null),
    salary_currency: z.string().trim().min(1).max(10).default('SGD'),
  }).default({}),
});

// ─── Extracted profile (LLM output) ──────────────────────────────────

function text(value: unknown): string {
  if (typeof value === 'string') return value.trim();
  if (typeof value === 'number' && Number.isFinite(value)) return String(value);
  if (Array.isArray(value)) return value.map(text).filter(Boolean).join('; ');
  return '';
}

function toExperience(value: unknown): ExperienceRecord[] {
  if (!isRecord(value)) return [];
  const record: ExperienceRecord = {
    company: text(value.company),
    title: text(value.title),
    duration: text(value.duration ?? value.years),
    responsibilities: text(value.responsibilities),
  };
  return record.company || record.title ? [record] : [];
}

function toEducation(value: unknown): EducationRecord[] {
  if (!isRecord(value)) return [];
  const record: EducationRecord = {
    institution: text(value.institution),
    degree: text(value.degree),
    field: text(value.field),
    year: text(value.year),
  };
  return record.institution || record.degree ? [record] : [];
}

function toSalary(value: unknown): number | null {
  const n = typeof value === 'string' ? Number.parseFloat(value.replace(/[^\d.]/g, '')) : value;
  return typeof n === 'number' && Number.isFinite(n) && n >= 0 ? n : null;
}

const RecordListSchema = z.preprocess(
  (value) => (value == null ? [] : value),
  z.array(z.unknown()),
);

export const ExtractedProfilePayloadSchema = z.object({
  name: OptionalTextSchema,
  headline: OptionalTextSchema,
  summary: OptionalTextSchema,
  skills: SkillListSchema,
  experience: RecordListSchema.transform((items) => items.flatMap(toExperience)),
  education: RecordListSchema.transform((items) => items.flatMap(toEducation)),
  target_roles: StringListSchema,
  experience_level: OptionalTextSchema,
  location: OptionalTextSchema,
  salary_range_min: z.unknown().transform(toSalary),
  salary_range_max: z.unknown().transform(toSalary),
  salary_currency: OptionalTextSchema,
}).transform((payload): Profile => ({
  name: payload.name,
  headline: payload.headline,
  summary: payload.summary,
  skills: payload.skills,
  experience: payload.experience,
  education: payload.education,
  preferences: {
    target_roles: payload.target_roles,
    experience_level: payload.experience_level,
    location: payload.location,
    salary_min: payload.salary_range_min,
    salary_max: payload.salary_range_max,
    salary_currency: payload.salary_currency ?? 'SGD',
  },
}));
