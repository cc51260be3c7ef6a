import type { JobSource, SourceResult } from '../sources/base';
import type { RawJobData } from '../types/job';
import { SourceError, errorMessage } from '../utils/errors';
import { logger } from '../utils/logger';

export interface SourceFetch {
  source: string;
  records: RawJobData[];
  error: SourceError | null;
}

/**
 * Orchestrates job fetching from all sources
 * Sources run concurrently; one failing source yields zero records for it only
 */
export class JobFetcherService {
  private readonly log = logger.child({ component: 'job-fetcher' });

  constructor(private readonly sources: JobSource[]) {}

  get sourceNames(): string[] {
    return this.sources.map(source => source.name);
  }

  async fetchAll(keywords: string[]): Promise<SourceFetch[]> {
    return Promise.all(this.sources.map(source => this.fetchOne(source, keywords)));
  }

  private async fetchOne(source: JobSource, keywords: string[]): Promise<SourceFetch> {
    let result: SourceResult;
    try {
      result = await source.fetchJobs(keywords);
    } catch (error) {
      result = {
        ok: false,
        error: new SourceError(source.name, errorMessage(error), { cause: error }),
      };
    }

    if (!result.ok) {
      this.log.error(`Source ${source.name} failed`, result.error);
      return { source: source.name, records: [], error: result.error };
    }

    this.log.info(`Source ${source.name} completed`, { fetched: result.records.length });
    return { source: source.name, records: result.records, error: null };
  }
}
