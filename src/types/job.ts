/**
 * Canonical job record
 * All sources are normalized to this structure before dedup and matching
 */
export interface JobRecord {
  source: string;
  externalId: string | null;
  title: string;
  description: string;
  url: string;
  /** Affiliate-wrapped or proposal link, display only */
  proposalUrl: string | null;
  budgetMin: number | null;
  budgetMax: number | null;
  currency: string | null;
  postedAt: Date | null;
}

/**
 * Job with fingerprint for idempotent delivery
 */
export interface JobWithFingerprint extends JobRecord {
  fingerprint: string;
}

/**
 * Raw job data from a source (before normalization)
 */
export interface RawJobData {
  [key: string]: unknown;
}
