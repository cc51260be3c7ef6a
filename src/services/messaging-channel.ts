export interface ActionLink {
  text: string;
  url: string;
}

export type SendResult =
  | { status: 'ok' }
  | { status: 'rate-limited'; retryAfterSeconds: number }
  | { status: 'failed'; reason: string; permanent: boolean };

/**
 * Outbound transport for job alerts.
 * Constructed once per process and closed on shutdown.
 */
export interface MessagingChannel {
  send(recipientId: number, text: string, links: ActionLink[]): Promise<SendResult>;
  close(): Promise<void>;
}
