import type { JobRecord } from '../types/job';

/**
 * Lowercases, trims and de-duplicates keywords, keeping first-seen order
 */
export function normalizeKeywords(keywords: readonly string[]): string[] {
  const seen = new Set<string>();
  for (const keyword of keywords) {
    const normalized = keyword.trim().toLowerCase();
    if (normalized) seen.add(normalized);
  }
  return [...seen];
}

// Title and description only; the source name is not searched
function haystack(job: Pick<JobRecord, 'title' | 'description'>): string {
  return `${job.title}\n${job.description}`.toLowerCase();
}

/**
 * Returns every keyword found in the job's text, in keyword order.
 * Matching is a case-insensitive substring test: "log" hits "blogger".
 */
export function matchKeywords(
  job: Pick<JobRecord, 'title' | 'description'>,
  keywords: readonly string[]
): string[] {
  const normalized = normalizeKeywords(keywords);
  if (normalized.length === 0) return [];

  const text = haystack(job);
  return normalized.filter(keyword => text.includes(keyword));
}

/**
 * A recipient without keywords matches nothing.
 */
export function matches(
  job: Pick<JobRecord, 'title' | 'description'>,
  keywords: readonly string[]
): boolean {
  return matchKeywords(job, keywords).length > 0;
}
