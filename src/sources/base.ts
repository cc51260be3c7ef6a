import type { RawJobData } from '../types/job';
import { SourceError } from '../utils/errors';

export type SourceResult =
  | { ok: true; records: RawJobData[] }
  | { ok: false; error: SourceError };

/**
 * Base interface for all job sources
 * Each source adapter must implement this interface
 */
export interface JobSource {
  /**
   * Unique identifier for the source
   */
  readonly name: string;

  /**
   * Fetches the current listings.
   * An empty keyword list means an unfiltered page. Expected failures
   * (HTTP errors, bad payloads, timeouts) come back as `{ ok: false }`.
   */
  fetchJobs(keywords: string[]): Promise<SourceResult>;
}

export function sourceFailure(source: string, message: string, cause?: unknown): SourceResult {
  return { ok: false, error: new SourceError(source, message, { cause }) };
}
