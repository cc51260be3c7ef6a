import type { JobSource } from './base';
import { FreelancerSource } from './freelancer';
import { SkywalkerSource } from './skywalker';
import type { Config } from '../config';

/**
 * Creates enabled job sources based on configuration.
 * Order matters: on a cross-source duplicate without an affiliate link the
 * earlier source's record is kept.
 */
export function createJobSources(config: Config): JobSource[] {
  const sources: JobSource[] = [];

  if (config.enableFreelancer) {
    sources.push(new FreelancerSource({
      affiliatePrefix: config.freelancerAffiliatePrefix,
      timeoutMs: config.sourceTimeoutMs,
    }));
  }

  if (config.enableSkywalker) {
    sources.push(new SkywalkerSource({
      rssUrl: config.skywalkerRssUrl,
      timeoutMs: config.sourceTimeoutMs,
    }));
  }

  return sources;
}
