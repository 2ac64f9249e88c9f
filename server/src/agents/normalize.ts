/**
 * Stage 1: Normalize
 *
 * Turns raw posting records of any shape into validated Postings. Two shapes
 * are understood: flat records (`{ id, title, company, ... }`) and the nested
 * job-board shape (`{ job: {...}, company: {...} }`) with its alternate key
 * spellings. Records missing an id, title or description, and records that
 * repeat an id, are dropped with a ValidationError. No LLM calls.
 */

import type { Logger } from 'pino';
import logger from '../lib/logger.js';
import { ValidationError, describeError, errorCodeOf } from '../lib/errors.js';
import { htmlToLine, htmlToText } from '../lib/clean-text.js';
import { isRecord } from './schemas/coerce.js';
import type { ItemFailure, Posting, StageOutput } from './types.js';

const TEXT_KEYS = ['caption', 'text', 'content', 'name', 'title', 'value', 'description', 'label', 'address'];

const ID_KEYS = ['id', 'job_id', 'posting_id', 'Id', 'JobId'];
const TITLE_KEYS = ['Title', 'title', 'job_title', 'JobTitle', 'name', 'Name'];
const COMPANY_KEYS = ['CompanyName', 'company_name', 'Company', 'company', 'name', 'Name'];
const RECORD_COMPANY_KEYS = ['company', 'company_name', 'CompanyName', 'Company'];
const LOCATION_KEYS = ['location', 'Location', 'address', 'Address', 'city', 'City'];
const DESCRIPTION_KEYS = [
  'JobDescription', 'job_description', 'Description', 'description',
  'summary', 'Summary', 'details', 'Details', 'content', 'Content',
];
const URL_KEYS = [
  'url', 'job_url', 'Url', 'URL', 'link', 'Link', 'application_url', 'ApplicationUrl',
];

/** Readable text from a string, number, captioned object or list of them. */
function extractText(value: unknown): string {
  if (value == null) return '';
  if (typeof value === 'string') return htmlToLine(value);
  if (typeof value === 'number' && Number.isFinite(value)) return String(value);
  if (Array.isArray(value)) {
    return value.map(extractText).filter(Boolean).join(', ');
  }
  if (isRecord(value)) {
    for (const key of TEXT_KEYS) {
      if (key in value) {
        const text = extractText(value[key]);
        if (text) return text;
      }
    }
  }
  return '';
}

function firstText(data: Record<string, unknown>, keys: readonly string[]): string {
  for (const key of keys) {
    if (key in data) {
      const text = extractText(data[key]);
      if (text) return text;
    }
  }
  return '';
}

function toAmount(value: unknown): number | null {
  const n = typeof value === 'string' ? Number.parseFloat(value.replace(/,/g, '')) : value;
  return typeof n === 'number' && Number.isFinite(n) && n > 0 ? n : null;
}

function buildSalaryText(job: Record<string, unknown>): string | null {
  const direct = firstText(job, ['salary_text', 'salary', 'Salary']);
  if (direct) return direct;

  const min = toAmount(job.id_Job_Salary);
  const max = toAmount(job.id_Job_MaxSalary);
  if (min == null && max == null) return null;

  const currency = extractText(job.id_Job_Currency) || 'SGD';
  const interval = extractText(job.id_Job_Interval) || 'month';
  const fmt = (n: number) => n.toLocaleString('en-US');
  if (min != null && max != null) return `${currency} ${fmt(min)}-${fmt(max)} per ${interval}`;
  if (min != null) return `${currency} ${fmt(min)}+ per ${interval}`;
  return `${currency} up to ${fmt(max ?? 0)} per ${interval}`;
}

function buildCategory(job: Record<string, unknown>): string | null {
  const direct = firstText(job, ['category', 'Category']);
  if (direct) return direct;
  const categories = job.JobCategory;
  if (!Array.isArray(categories)) return null;
  const captions = categories
    .map((cat) => (isRecord(cat) ? extractText(cat.caption) : ''))
    .filter(Boolean);
  return captions.length > 0 ? captions.join(', ') : null;
}

function findUrl(...sources: Record<string, unknown>[]): string | null {
  for (const source of sources) {
    for (const key of URL_KEYS) {
      const text = extractText(source[key]);
      if (/^https?:\/\//i.test(text)) return text;
    }
  }
  return null;
}

function nestedJob(raw: Record<string, unknown>): Record<string, unknown> | null {
  return isRecord(raw.job) && Object.keys(raw.job).length > 0 ? raw.job : null;
}

/** Id of a raw record, from the nested job first; empty when there is none. */
function recordId(raw: Record<string, unknown>): string {
  const nested = nestedJob(raw);
  return firstText(nested ?? raw, ID_KEYS) || (nested ? firstText(raw, ['id']) : '');
}

/**
 * Normalize one raw record. Throws ValidationError when a required field is
 * missing.
 */
export function normalizePosting(raw: unknown, index: number): Posting {
  if (!isRecord(raw)) {
    throw new ValidationError(`Posting #${index} is not an object`);
  }

  const job = nestedJob(raw) ?? raw;
  const companyData = isRecord(raw.company) ? raw.company : {};

  const id = recordId(raw);
  if (!id) {
    throw new ValidationError(`Posting #${index} is missing required field "id"`, 'id');
  }

  const title = firstText(job, TITLE_KEYS);
  if (!title) {
    throw new ValidationError(`Posting ${id} is missing required field "title"`, 'title');
  }

  const descriptionRaw = DESCRIPTION_KEYS
    .map((key) => job[key])
    .find((value) => typeof value === 'string' && value.trim().length > 0);
  const description = typeof descriptionRaw === 'string'
    ? htmlToText(descriptionRaw)
    : firstText(job, DESCRIPTION_KEYS);
  if (!description) {
    throw new ValidationError(`Posting ${id} is missing required field "description"`, 'description');
  }

  const company = (typeof raw.company === 'string' ? htmlToLine(raw.company) : '')
    || firstText(companyData, COMPANY_KEYS)
    || firstText(job, RECORD_COMPANY_KEYS);

  const googlePlace = companyData.GooglePlace;
  const location = (isRecord(googlePlace) ? extractText(googlePlace.address) || extractText(googlePlace.name) : '')
    || firstText(job, LOCATION_KEYS);

  return {
    id,
    title,
    company: company || 'Company Not Specified',
    location: location || 'Location Not Specified',
    salary_text: buildSalaryText(job),
    category: buildCategory(job),
    description,
    url: findUrl(job, raw),
  };
}

/**
 * Normalize a batch. Invalid records are dropped and reported as failures;
 * the batch itself never fails.
 */
export function normalizePostings(
  raws: readonly unknown[],
  options?: { logger?: Logger },
): StageOutput<Posting[]> {
  const log = options?.logger ?? logger;
  const postings: Posting[] = [];
  const failures: ItemFailure[] = [];
  const seen = new Set<string>();

  raws.forEach((raw, index) => {
    try {
      const posting = normalizePosting(raw, index);
      if (seen.has(posting.id)) {
        throw new ValidationError(`Duplicate posting id "${posting.id}" at #${index}`, 'id');
      }
      seen.add(posting.id);
      postings.push(posting);
    } catch (err) {
      const item = (isRecord(raw) ? recordId(raw) : '') || `#${index}`;
      const message = describeError(err);
      log.warn({ item, reason: message }, 'Dropping invalid posting');
      failures.push({ item, stage: 'normalizing', code: errorCodeOf(err), message });
    }
  });

  log.info({ received: raws.length, normalized: postings.length, dropped: failures.length }, 'Postings normalized');
  return { output: postings, failures };
}
