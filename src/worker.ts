import { loadConfig } from './config';
import { closePool, createPool } from './db/client';
import { RecipientsRepository } from './db/users';
import { createJobSources } from './sources';
import { CycleScheduler } from './services/cycle-scheduler';
import { PgIdempotencyStore } from './services/idempotency-store';
import { JobFetcherService } from './services/job-fetcher';
import { NotificationDispatcher } from './services/notification-dispatcher';
import { FileStatsSink } from './services/stats-sink';
import { TelegramChannel } from './services/telegram-channel';
import { logger } from './utils/logger';

/**
 * Worker entry point
 * Builds every collaborator once, runs cycles until SIGINT/SIGTERM
 */
async function main(): Promise<void> {
  const config = loadConfig();

  const sources = createJobSources(config);
  logger.info('Configuration loaded', {
    sources: sources.map(s => s.name),
    intervalSeconds: config.workerIntervalSeconds,
    sentKeyScope: config.sentKeyScope,
    maxNotificationsPerRecipient: config.maxNotificationsPerRecipient,
    jobMaxAgeHours: config.jobMaxAgeHours,
  });

  if (sources.length === 0) {
    logger.warn('No job sources enabled! Check ENABLE_FREELANCER and ENABLE_SKYWALKER');
  }

  const pool = createPool({ databaseUrl: config.databaseUrl, ssl: config.databaseSsl });
  const channel = new TelegramChannel(config.telegram.botToken);

  const scheduler = new CycleScheduler(
    {
      fetcher: new JobFetcherService(sources),
      recipients: new RecipientsRepository(pool),
      store: new PgIdempotencyStore(pool),
      dispatcher: new NotificationDispatcher(channel, {
        sendMinIntervalMs: config.sendMinIntervalMs,
        maxRetryAfterSeconds: config.maxRetryAfterSeconds,
        descriptionMaxLength: config.descriptionMaxLength,
      }),
      statsSink: new FileStatsSink(config.workerStatsPath),
    },
    {
      intervalSeconds: config.workerIntervalSeconds,
      jobMaxAgeHours: config.jobMaxAgeHours,
      maxQueryKeywords: config.maxQueryKeywords,
      maxNotificationsPerRecipient: config.maxNotificationsPerRecipient,
      sentKeyScope: config.sentKeyScope,
    }
  );

  const shutdown = (signal: string): void => {
    logger.info(`${signal} received, finishing current delivery`);
    scheduler.stop().catch((error: unknown) => {
      logger.error('Error while stopping worker', error);
    });
  };
  process.once('SIGINT', () => shutdown('SIGINT'));
  process.once('SIGTERM', () => shutdown('SIGTERM'));

  try {
    await scheduler.start();
  } finally {
    await channel.close();
    await closePool(pool);
    logger.info('Worker shut down');
  }
}

main().catch((error: unknown) => {
  logger.error('Worker failed to start', error);
  process.exit(1);
});
