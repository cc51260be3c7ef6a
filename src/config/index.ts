/**
 * Configuration management
 * All behavior is driven by environment variables
 */
import { ConfigError } from '../utils/errors';

export type SentKeyScope = 'recipient' | 'global';

export interface Config {
  // Telegram
  telegram: {
    botToken: string;
  };

  // Database
  databaseUrl: string;
  databaseSsl: boolean;

  // Worker cycle
  workerIntervalSeconds: number;
  jobMaxAgeHours: number;
  maxQueryKeywords: number;
  sourceTimeoutMs: number;

  // Delivery
  sendMinIntervalMs: number;
  maxRetryAfterSeconds: number;
  descriptionMaxLength: number;
  maxNotificationsPerRecipient: number;
  sentKeyScope: SentKeyScope;

  // Stats
  workerStatsPath: string;

  // Platform toggles
  enableFreelancer: boolean;
  enableSkywalker: boolean;
  freelancerAffiliatePrefix: string;
  skywalkerRssUrl: string;
}

type Env = Record<string, string | undefined>;

export function parseBoolean(value: string | undefined, defaultValue: boolean = false): boolean {
  if (!value) return defaultValue;
  return value.toLowerCase() === 'true';
}

export function parseNumber(value: string | undefined, defaultValue: number): number {
  if (!value) return defaultValue;
  const parsed = parseInt(value, 10);
  return isNaN(parsed) || parsed < 0 ? defaultValue : parsed;
}

function parseScope(value: string | undefined): SentKeyScope {
  if (!value) return 'recipient';
  const scope = value.trim().toLowerCase();
  if (scope === 'recipient' || scope === 'global') return scope;
  throw new ConfigError(`SENT_KEY_SCOPE must be "recipient" or "global", got "${value}"`);
}

function required(env: Env, name: string): string {
  const value = env[name];
  if (!value) {
    throw new ConfigError(`Missing required environment variable: ${name}`);
  }
  return value;
}

export function loadDatabaseConfig(env: Env = process.env): Pick<Config, 'databaseUrl' | 'databaseSsl'> {
  return {
    databaseUrl: required(env, 'DATABASE_URL'),
    databaseSsl: parseBoolean(env.DATABASE_SSL, true),
  };
}

export function loadConfig(env: Env = process.env): Config {
  return {
    telegram: {
      botToken: required(env, 'TELEGRAM_BOT_TOKEN'),
    },
    ...loadDatabaseConfig(env),
    workerIntervalSeconds: parseNumber(env.WORKER_INTERVAL_SECONDS, 120),
    jobMaxAgeHours: parseNumber(env.JOB_MAX_AGE_HOURS, 48),
    maxQueryKeywords: parseNumber(env.MAX_QUERY_KEYWORDS, 50),
    sourceTimeoutMs: parseNumber(env.SOURCE_TIMEOUT_MS, 20000),
    sendMinIntervalMs: parseNumber(env.SEND_MIN_INTERVAL_MS, 500),
    maxRetryAfterSeconds: parseNumber(env.MAX_RETRY_AFTER_SECONDS, 60),
    descriptionMaxLength: parseNumber(env.DESCRIPTION_MAX_LENGTH, 400),
    maxNotificationsPerRecipient: parseNumber(env.MAX_NOTIFICATIONS_PER_RECIPIENT, 10),
    sentKeyScope: parseScope(env.SENT_KEY_SCOPE),
    workerStatsPath: env.WORKER_STATS_PATH || '/tmp/worker_stats.json',
    enableFreelancer: parseBoolean(env.ENABLE_FREELANCER, true),
    enableSkywalker: parseBoolean(env.ENABLE_SKYWALKER, true),
    freelancerAffiliatePrefix: env.FREELANCER_AFFILIATE_PREFIX || '',
    skywalkerRssUrl: env.SKYWALKER_RSS_URL || 'https://www.skywalker.gr/jobs/feed',
  };
}
