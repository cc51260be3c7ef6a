import type { JobRecord } from '../types/job';
import type { Recipient } from '../types/user';
import type { ActionLink, MessagingChannel, SendResult } from './messaging-channel';
import { buildActionLinks, formatJobMessage } from './message-format';
import { Throttle } from '../utils/throttle';
import { sleep as defaultSleep, type Sleep } from '../utils/sleep';
import { errorMessage } from '../utils/errors';
import { logger } from '../utils/logger';

export type DeliveryOutcome =
  | { status: 'delivered'; attempts: number }
  | { status: 'failed'; reason: string; attempts: number };

export interface NotificationDispatcherOptions {
  sendMinIntervalMs: number;
  maxRetryAfterSeconds: number;
  descriptionMaxLength: number;
  now?: () => Date;
  sleep?: Sleep;
}

function failureReason(result: Exclude<SendResult, { status: 'ok' }>): string {
  return result.status === 'rate-limited'
    ? `rate limited, retry after ${result.retryAfterSeconds}s`
    : result.reason;
}

/**
 * Dispatches job notifications to recipients through a messaging channel
 * Every send goes through one shared throttle; a failed send is retried once
 */
export class NotificationDispatcher {
  private readonly throttle: Throttle;
  private readonly now: () => Date;
  private readonly sleep: Sleep;
  private readonly log = logger.child({ component: 'notification-dispatcher' });

  constructor(
    private readonly channel: MessagingChannel,
    private readonly options: NotificationDispatcherOptions
  ) {
    this.now = options.now ?? (() => new Date());
    this.sleep = options.sleep ?? defaultSleep;
    this.throttle = new Throttle(options.sendMinIntervalMs, () => this.now().getTime(), this.sleep);
  }

  /**
   * Sends one job to one recipient. Never throws: every failure is returned
   * so the caller can carry on with the next recipient.
   */
  async deliver(
    recipient: Recipient,
    job: JobRecord,
    matchedKeyword: string | null
  ): Promise<DeliveryOutcome> {
    const text = formatJobMessage(job, {
      matchedKeyword,
      descriptionMaxLength: this.options.descriptionMaxLength,
      now: this.now(),
    });
    const links = buildActionLinks(job);
    const context = { recipientId: recipient.id, source: job.source, title: job.title };

    const first = await this.send(recipient.id, text, links);
    if (first.status === 'ok') {
      this.log.debug('Notification sent', context);
      return { status: 'delivered', attempts: 1 };
    }

    if (first.status === 'failed' && first.permanent) {
      this.log.warn('Notification failed permanently', { ...context, reason: first.reason });
      return { status: 'failed', reason: first.reason, attempts: 1 };
    }

    if (first.status === 'rate-limited') {
      // Pauses this send only, for at most maxRetryAfterSeconds
      const pauseSeconds = Math.min(first.retryAfterSeconds, this.options.maxRetryAfterSeconds);
      this.log.warn(`Rate limit hit, pausing ${pauseSeconds}s`, {
        ...context,
        retryAfterSeconds: first.retryAfterSeconds,
      });
      await this.sleep(pauseSeconds * 1000);
    }

    const second = await this.send(recipient.id, text, links);
    if (second.status === 'ok') {
      this.log.debug('Notification sent on retry', context);
      return { status: 'delivered', attempts: 2 };
    }

    const reason = failureReason(second);
    this.log.warn('Notification failed after retry, skipping', { ...context, reason });
    return { status: 'failed', reason, attempts: 2 };
  }

  private async send(recipientId: number, text: string, links: ActionLink[]): Promise<SendResult> {
    await this.throttle.wait();
    try {
      return await this.channel.send(recipientId, text, links);
    } catch (error) {
      return { status: 'failed', reason: errorMessage(error), permanent: false };
    }
  }
}
