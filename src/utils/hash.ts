import { createHash } from 'crypto';
import type { JobRecord } from '../types/job';

// Unit separator, does not occur in titles or URLs
const SEPARATOR = '\u001f';

export function normalizeTitle(title: string): string {
  return title.toLowerCase().trim().replace(/\s+/g, ' ');
}

/**
 * Part of the fingerprint that locates the listing.
 * Falls back to the source-native id, then to the title itself, which makes
 * every listing with the same title on that source count as one job.
 */
function locator(job: Pick<JobRecord, 'title' | 'url' | 'externalId'>): string {
  const url = job.url.trim();
  if (url) return url;
  if (job.externalId) return `id:${job.externalId}`;
  return `title:${normalizeTitle(job.title)}`;
}

/**
 * Generates a deterministic fingerprint for a job based on:
 * - normalized title
 * - source
 * - URL (or its fallback)
 *
 * Fetch time, page number and display fields do not take part.
 */
export function generateJobFingerprint(
  job: Pick<JobRecord, 'title' | 'source' | 'url' | 'externalId'>
): string {
  const hashInput = [normalizeTitle(job.title), job.source, locator(job)].join(SEPARATOR);
  return createHash('sha256').update(hashInput, 'utf8').digest('hex');
}

/**
 * Source-independent identity of a listing, used to collapse the same job
 * syndicated by several sources within one cycle. Without a URL there is
 * nothing shared across sources, so the source stays part of the key.
 */
export function generateListingKey(
  job: Pick<JobRecord, 'title' | 'source' | 'url' | 'externalId'>
): string {
  const url = job.url.trim();
  const parts = url
    ? [normalizeTitle(job.title), url]
    : [normalizeTitle(job.title), job.source, locator(job)];
  return parts.join(SEPARATOR);
}
