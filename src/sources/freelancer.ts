import fetch from 'node-fetch';
import { sourceFailure, type JobSource, type SourceResult } from './base';
import type { RawJobData } from '../types/job';
import { isRecord } from '../utils/guards';
import { errorMessage } from '../utils/errors';
import { logger } from '../utils/logger';

export interface FreelancerSourceOptions {
  /** Prepended to the URL-encoded listing link to build the proposal link */
  affiliatePrefix: string;
  timeoutMs: number;
  apiUrl?: string;
}

const DEFAULT_API_URL =
  'https://www.freelancer.com/api/projects/0.1/projects/active/?limit=100&full_description=true&compact=true';

/**
 * Freelancer.com public projects API adapter
 * The API's full-text query is AND-only, so the latest page is fetched
 * unfiltered and keywords are left to the matcher downstream.
 */
export class FreelancerSource implements JobSource {
  readonly name = 'freelancer';
  private readonly apiUrl: string;
  private readonly log = logger.child({ source: 'freelancer' });

  constructor(private readonly options: FreelancerSourceOptions) {
    this.apiUrl = options.apiUrl || DEFAULT_API_URL;
  }

  async fetchJobs(_keywords: string[]): Promise<SourceResult> {
    let payload: unknown;
    try {
      const response = await fetch(this.apiUrl, {
        timeout: this.options.timeoutMs,
        headers: { 'User-Agent': 'Mozilla/5.0 (compatible; JobAlertWorker/1.0)' },
      });
      if (!response.ok) {
        return sourceFailure(this.name, `HTTP ${response.status}`);
      }
      payload = await response.json();
    } catch (error) {
      return sourceFailure(this.name, errorMessage(error), error);
    }

    const projects = isRecord(payload) && isRecord(payload.result) ? payload.result.projects : undefined;
    if (!Array.isArray(projects)) {
      return sourceFailure(this.name, 'Invalid payload: missing result.projects');
    }

    const records = projects.filter(isRecord).map(project => this.toRawRecord(project));

    this.log.info(`Fetched ${records.length} jobs from ${this.name}`, {
      totalItems: projects.length,
    });
    return { ok: true, records };
  }

  private toRawRecord(project: Record<string, unknown>): RawJobData {
    const seoUrl = typeof project.seo_url === 'string' ? project.seo_url : '';
    const url = seoUrl ? `https://www.freelancer.com/projects/${seoUrl}` : '';
    const budget = isRecord(project.budget) ? project.budget : {};
    const currency = isRecord(project.currency) ? project.currency.code : undefined;

    return {
      id: project.id,
      title: project.title,
      description: project.description ?? project.preview_description,
      url,
      proposal_url: url && this.options.affiliatePrefix
        ? `${this.options.affiliatePrefix}${encodeURIComponent(url)}`
        : null,
      budget_min: budget.minimum,
      budget_max: budget.maximum,
      currency,
      created_at: project.time_submitted,
    };
  }
}
