import Parser from 'rss-parser';
import { sourceFailure, type JobSource, type SourceResult } from './base';
import type { RawJobData } from '../types/job';
import { errorMessage } from '../utils/errors';
import { logger } from '../utils/logger';

export interface SkywalkerSourceOptions {
  rssUrl: string;
  timeoutMs: number;
}

/**
 * Skywalker.gr RSS adapter
 * The feed has no search, keywords are applied by the matcher downstream.
 */
export class SkywalkerSource implements JobSource {
  readonly name = 'skywalker';
  private readonly parser: Parser;
  private readonly log = logger.child({ source: 'skywalker' });

  constructor(private readonly options: SkywalkerSourceOptions) {
    this.parser = new Parser({
      timeout: options.timeoutMs,
    });
  }

  async fetchJobs(_keywords: string[]): Promise<SourceResult> {
    let feed: Parser.Output<Record<string, unknown>>;
    try {
      feed = await this.parser.parseURL(this.options.rssUrl);
    } catch (error) {
      return sourceFailure(this.name, errorMessage(error), error);
    }

    const items = feed.items || [];
    const records: RawJobData[] = items.map(item => ({
      id: item.guid ?? null,
      title: item.title,
      description: item.contentSnippet ?? item.content,
      url: item.link,
      posted_at: item.isoDate ?? item.pubDate,
    }));

    this.log.info(`Fetched ${records.length} jobs from ${this.name}`, {
      totalItems: items.length,
    });
    return { ok: true, records };
  }
}
