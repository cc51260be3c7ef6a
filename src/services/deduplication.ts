import type { JobRecord, JobWithFingerprint } from '../types/job';
import { generateJobFingerprint, generateListingKey } from '../utils/hash';

export interface DeduplicationResult {
  jobs: JobWithFingerprint[];
  duplicates: number;
}

/**
 * Keeps the record with a proposal link; otherwise the one seen first
 */
function preferProposal(current: JobWithFingerprint, candidate: JobWithFingerprint): JobWithFingerprint {
  if (!current.proposalUrl && candidate.proposalUrl) return candidate;
  return current;
}

/**
 * Fingerprints the cycle's jobs and collapses listings that appear more
 * than once, on one source or across several. Output keeps first-seen order.
 */
export function deduplicateJobs(jobs: JobRecord[]): DeduplicationResult {
  const byListing = new Map<string, JobWithFingerprint>();

  for (const job of jobs) {
    const withFingerprint: JobWithFingerprint = { ...job, fingerprint: generateJobFingerprint(job) };
    const listingKey = generateListingKey(job);
    const existing = byListing.get(listingKey);
    byListing.set(listingKey, existing ? preferProposal(existing, withFingerprint) : withFingerprint);
  }

  return {
    jobs: [...byListing.values()],
    duplicates: jobs.length - byListing.size,
  };
}

/**
 * True when the job is younger than `maxAgeHours`. Undated jobs are kept.
 */
export function isFresh(job: Pick<JobRecord, 'postedAt'>, maxAgeHours: number, now: Date): boolean {
  if (!job.postedAt || maxAgeHours <= 0) return true;
  return now.getTime() - job.postedAt.getTime() <= maxAgeHours * 3600 * 1000;
}
