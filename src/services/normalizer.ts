import type { JobRecord, RawJobData } from '../types/job';

export type NormalizeResult =
  | { ok: true; job: JobRecord }
  | { ok: false; reason: string };

const FIELD_ALIASES = {
  externalId: ['external_id', 'id'],
  title: ['title'],
  description: ['description', 'desc', 'summary', 'preview_description'],
  url: ['url', 'original_url', 'link'],
  proposalUrl: ['proposal_url', 'affiliate_url'],
  budgetMin: ['budget_min', 'minbudget', 'budget_amount'],
  budgetMax: ['budget_max', 'maxbudget'],
  currency: ['currency', 'budget_currency', 'original_currency'],
  postedAt: ['posted_at', 'created_at', 'published_at', 'pub_date', 'date'],
} as const;

type Field = keyof typeof FIELD_ALIASES;

function pick(raw: RawJobData, field: Field): unknown {
  for (const key of FIELD_ALIASES[field]) {
    const value = raw[key];
    if (value !== undefined && value !== null && value !== '') {
      return value;
    }
  }
  return undefined;
}

function toText(value: unknown): string {
  if (typeof value === 'string') return value.trim();
  if (typeof value === 'number' && Number.isFinite(value)) return String(value);
  return '';
}

function cleanDescription(value: unknown): string {
  return toText(value)
    .replace(/<[^>]*>/g, ' ')
    .replace(/&nbsp;/g, ' ')
    .replace(/\s+/g, ' ')
    .trim();
}

function toNumber(value: unknown): number | null {
  if (typeof value === 'number') return Number.isFinite(value) ? value : null;
  if (typeof value === 'string') {
    const cleaned = value.replace(/[\s,]/g, '');
    if (!cleaned) return null;
    const parsed = Number(cleaned);
    return Number.isFinite(parsed) ? parsed : null;
  }
  return null;
}

function toCurrency(value: unknown): string | null {
  const text = toText(value);
  if (!text) return null;
  return /^[a-z]{3}$/i.test(text) ? text.toUpperCase() : text;
}

/**
 * Accepts Date, ISO-8601, RFC-2822 and unix timestamps (seconds or ms).
 */
export function parsePostedAt(value: unknown): Date | null {
  if (value instanceof Date) {
    return isNaN(value.getTime()) ? null : value;
  }

  let date: Date | null = null;
  if (typeof value === 'number' && Number.isFinite(value)) {
    date = new Date(value < 1e12 ? value * 1000 : value);
  } else if (typeof value === 'string' && value.trim()) {
    const text = value.trim();
    date = /^\d+(\.\d+)?$/.test(text)
      ? parsePostedAt(Number(text))
      : new Date(text);
  }

  return date && !isNaN(date.getTime()) ? date : null;
}

/**
 * Maps a source's raw record into the canonical job record.
 * Records with neither a title nor a URL cannot be shown or linked and are dropped.
 */
export function normalizeJob(raw: RawJobData, source: string): NormalizeResult {
  const title = toText(pick(raw, 'title')).replace(/\s+/g, ' ');
  const url = toText(pick(raw, 'url'));

  if (!title && !url) {
    return { ok: false, reason: 'missing title and url' };
  }

  const externalId = toText(pick(raw, 'externalId'));
  const proposalUrl = toText(pick(raw, 'proposalUrl'));

  return {
    ok: true,
    job: {
      source,
      externalId: externalId || null,
      title,
      description: cleanDescription(pick(raw, 'description')),
      url,
      proposalUrl: proposalUrl || null,
      budgetMin: toNumber(pick(raw, 'budgetMin')),
      budgetMax: toNumber(pick(raw, 'budgetMax')),
      currency: toCurrency(pick(raw, 'currency')),
      postedAt: parsePostedAt(pick(raw, 'postedAt')),
    },
  };
}
