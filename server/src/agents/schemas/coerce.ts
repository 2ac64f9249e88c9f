/**
 * Small coercions shared by the LLM output schemas. Model output drifts in
 * key names and value types; these helpers fold the common variants into one
 * shape without inventing values.
 */

import { z } from 'zod';

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** First non-empty string (or finite number) found under any of `keys`. */
export function pickString(record: Record<string, unknown>, keys: readonly string[]): string | null {
  for (const key of keys) {
    const value = record[key];
    if (typeof value === 'string' && value.trim()) return value.trim();
    if (typeof value === 'number' && Number.isFinite(value)) return String(value);
  }
  return null;
}

/** Case-insensitive de-duplication, first spelling wins. */
export function dedupeStrings(values: string[]): string[] {
  const seen = new Set<string>();
  const out: string[] = [];
  for (const value of values) {
    const key = value.toLowerCase();
    if (seen.has(key)) continue;
    seen.add(key);
    out.push(value);
  }
  return out;
}

export function clampScore(score: number): number {
  return Math.min(1, Math.max(0, score));
}

export function toScore(value: unknown): number | null {
  const n = typeof value === 'string' ? Number.parseFloat(value) : value;
  return typeof n === 'number' && Number.isFinite(n) ? clampScore(n) : null;
}

function skillName(item: unknown): string {
  if (typeof item === 'string') return item.trim();
  if (typeof item === 'number' && Number.isFinite(item)) return String(item);
  if (isRecord(item)) return pickString(item, ['skill', 'name', 'title']) ?? '';
  return '';
}

/**
 * A list of skill names. Accepts an array of strings or `{ skill | name | title }`
 * objects, or a comma-separated string; missing → empty list.
 */
export const SkillListSchema = z.preprocess(
  (value) => {
    if (value == null) return [];
    if (typeof value === 'string') return value.split(',');
    return value;
  },
  z.array(z.unknown()),
).transform((items) => dedupeStrings(items.map(skillName).filter((s) => s.length > 0)));

/** Plain string list; non-string entries are dropped. */
export const StringListSchema = z.preprocess(
  (value) => (value == null ? [] : value),
  z.array(z.unknown()),
).transform((items) => items
  .map((item) => (typeof item === 'string' ? item.trim() : ''))
  .filter((s) => s.length > 0));

/** Trimmed string, or null when absent/blank. */
export const OptionalTextSchema = z.unknown().transform((value) => {
  if (typeof value !== 'string') return null;
  const trimmed = value.trim();
  return trimmed ? trimmed : null;
});

/**
 * Unwraps `{ "<key>": [...] }` envelopes so an array payload can be read
 * whether or not the model wrapped it.
 */
export function unwrapArray(value: unknown, keys: readonly string[]): unknown {
  if (Array.isArray(value)) return value;
  if (isRecord(value)) {
    for (const key of keys) {
      if (Array.isArray(value[key])) return value[key];
    }
  }
  return value;
}
