import type { SqlClient } from './client';
import type { Recipient } from '../types/user';
import { normalizeKeywords } from '../filters/keyword-matcher';

/**
 * Read-only source of subscribers
 */
export interface RecipientDirectory {
  listEligibleRecipients(): Promise<Recipient[]>;
}

interface RecipientRow {
  telegram_id: string | number;
  is_active: boolean;
  is_blocked: boolean;
  access_until: Date | null;
  keywords: string[] | null;
}

export function isEligible(recipient: Recipient, now: Date): boolean {
  if (!recipient.active || recipient.blocked) return false;
  return recipient.expiresAt === null || recipient.expiresAt.getTime() > now.getTime();
}

/**
 * Database reads for users and their keywords
 * Accounts and keywords are written by the bot, never by the worker
 */
export class RecipientsRepository implements RecipientDirectory {
  constructor(
    private readonly db: SqlClient,
    private readonly now: () => Date = () => new Date()
  ) {}

  async listRecipients(): Promise<Recipient[]> {
    const result = await this.db.query<RecipientRow>(
      `SELECT u.telegram_id, u.is_active, u.is_blocked, u.access_until,
              COALESCE(array_agg(k.value) FILTER (WHERE k.value IS NOT NULL), '{}') AS keywords
       FROM users u
       LEFT JOIN keywords k ON k.user_id = u.telegram_id
       GROUP BY u.telegram_id, u.is_active, u.is_blocked, u.access_until
       ORDER BY u.telegram_id`
    );

    return result.rows.map(row => ({
      // BIGINT comes back as a string
      id: Number(row.telegram_id),
      keywords: normalizeKeywords(row.keywords ?? []),
      active: row.is_active,
      blocked: row.is_blocked,
      expiresAt: row.access_until ? new Date(row.access_until) : null,
    }));
  }

  async listEligibleRecipients(): Promise<Recipient[]> {
    const now = this.now();
    const recipients = await this.listRecipients();
    return recipients.filter(recipient => isEligible(recipient, now));
  }
}
