/**
 * Read-only view of a subscriber.
 * Accounts are owned by the bot's account management, the worker never writes them.
 */
export interface Recipient {
  /** Telegram chat id */
  id: number;
  /** Lowercased, trimmed, de-duplicated */
  keywords: string[];
  active: boolean;
  blocked: boolean;
  /** Trial or licence expiry; null means no expiry */
  expiresAt: Date | null;
}
