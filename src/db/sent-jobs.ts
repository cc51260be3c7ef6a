import type { SqlClient } from './client';

/**
 * Identity of one delivery.
 * `recipientId` is null when a send suppresses the job for everyone.
 */
export interface SentKey {
  recipientId: number | null;
  fingerprint: string;
}

export type MarkSentResult = 'inserted' | 'already-exists';

export function sentKeyId(key: SentKey): string {
  return key.recipientId === null ? key.fingerprint : `${key.recipientId}:${key.fingerprint}`;
}

interface SentKeyRow {
  key: string;
}

/**
 * Database operations for the sent_jobs table
 * The primary key on `key` is what makes a delivery at-most-once
 */
export class SentJobsRepository {
  /**
   * Inserts the key unless present.
   * Single statement, so two workers racing on the same key get one winner.
   */
  async insertIfAbsent(client: SqlClient, key: SentKey): Promise<MarkSentResult> {
    const result = await client.query<SentKeyRow>(
      `INSERT INTO sent_jobs (key, fingerprint, recipient_id)
       VALUES ($1, $2, $3)
       ON CONFLICT (key) DO NOTHING
       RETURNING key`,
      [sentKeyId(key), key.fingerprint, key.recipientId]
    );

    return result.rows.length > 0 ? 'inserted' : 'already-exists';
  }

  /**
   * Returns the subset of keys already recorded
   */
  async findExisting(client: SqlClient, keys: SentKey[]): Promise<Set<string>> {
    if (keys.length === 0) return new Set();

    const ids = [...new Set(keys.map(sentKeyId))];
    const result = await client.query<SentKeyRow>(
      `SELECT key FROM sent_jobs WHERE key = ANY($1::text[])`,
      [ids]
    );

    return new Set(result.rows.map(row => row.key));
  }
}
