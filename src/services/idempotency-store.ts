import type { SqlPool, SqlPoolClient } from '../db/client';
import { SentJobsRepository, sentKeyId, type MarkSentResult, type SentKey } from '../db/sent-jobs';
import { StoreUnavailableError, errorMessage } from '../utils/errors';
import { logger } from '../utils/logger';

export type DeliverOnceOutcome = 'delivered' | 'already-sent' | 'failed';

/**
 * Durable record of deliveries.
 * Every write is an atomic insert; no method reads and then writes.
 * Failures to reach the backing store surface as `StoreUnavailableError`.
 */
export interface IdempotencyStore {
  alreadySent(key: SentKey): Promise<boolean>;

  /** Batched `alreadySent`; returns the ids (see `sentKeyId`) already recorded */
  findSent(keys: SentKey[]): Promise<Set<string>>;

  markSent(key: SentKey): Promise<MarkSentResult>;

  /**
   * Claims the key, runs `deliver`, and keeps the claim only if it reports
   * success. A concurrent claimant of the same key waits for the first to
   * finish and then sees it as sent, so the message goes out once.
   */
  deliverOnce(key: SentKey, deliver: () => Promise<boolean>): Promise<DeliverOnceOutcome>;
}

/**
 * PostgreSQL-backed store
 * The claim is the uncommitted insert, so nothing is recorded unless a delivery happened
 */
export class PgIdempotencyStore implements IdempotencyStore {
  private readonly log = logger.child({ component: 'idempotency-store' });

  constructor(
    private readonly pool: SqlPool,
    private readonly sentJobsRepo: SentJobsRepository = new SentJobsRepository()
  ) {}

  async alreadySent(key: SentKey): Promise<boolean> {
    const sent = await this.findSent([key]);
    return sent.has(sentKeyId(key));
  }

  async findSent(keys: SentKey[]): Promise<Set<string>> {
    try {
      return await this.sentJobsRepo.findExisting(this.pool, keys);
    } catch (error) {
      throw new StoreUnavailableError(`Failed to read sent jobs: ${errorMessage(error)}`, { cause: error });
    }
  }

  async markSent(key: SentKey): Promise<MarkSentResult> {
    try {
      return await this.sentJobsRepo.insertIfAbsent(this.pool, key);
    } catch (error) {
      throw new StoreUnavailableError(`Failed to mark job sent: ${errorMessage(error)}`, { cause: error });
    }
  }

  async deliverOnce(key: SentKey, deliver: () => Promise<boolean>): Promise<DeliverOnceOutcome> {
    let client: SqlPoolClient;
    try {
      client = await this.pool.connect();
    } catch (error) {
      throw new StoreUnavailableError(`Failed to connect: ${errorMessage(error)}`, { cause: error });
    }

    let releaseError: Error | undefined;
    try {
      const claimed = await this.storeStep(client, 'claim', async () => {
        await client.query('BEGIN');
        return this.sentJobsRepo.insertIfAbsent(client, key);
      });

      if (claimed === 'already-exists') {
        await this.storeStep(client, 'rollback', () => client.query('ROLLBACK'));
        return 'already-sent';
      }

      let delivered = false;
      try {
        delivered = await deliver();
      } finally {
        if (!delivered) {
          await this.storeStep(client, 'rollback', () => client.query('ROLLBACK'));
        }
      }

      if (!delivered) return 'failed';

      await this.storeStep(client, 'commit', () => client.query('COMMIT'));
      return 'delivered';
    } catch (error) {
      if (error instanceof StoreUnavailableError) {
        // The connection is in an unknown state, do not return it to the pool
        releaseError = error;
      }
      throw error;
    } finally {
      client.release(releaseError);
    }
  }

  private async storeStep<T>(
    client: SqlPoolClient,
    step: string,
    run: () => Promise<T>
  ): Promise<T> {
    try {
      return await run();
    } catch (error) {
      this.log.error(`Store ${step} failed`, error);
      if (step !== 'rollback') {
        await client.query('ROLLBACK').catch((rollbackError: unknown) => {
          this.log.warn('Rollback after store failure also failed', { error: errorMessage(rollbackError) });
        });
      }
      throw new StoreUnavailableError(`Store ${step} failed: ${errorMessage(error)}`, { cause: error });
    }
  }
}
