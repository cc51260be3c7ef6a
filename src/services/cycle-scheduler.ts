import type { SentKeyScope } from '../config';
import { sentKeyId, type SentKey } from '../db/sent-jobs';
import { isEligible, type RecipientDirectory } from '../db/users';
import { matchKeywords } from '../filters/keyword-matcher';
import type { JobRecord, JobWithFingerprint } from '../types/job';
import type { CycleStats } from '../types/stats';
import type { Recipient } from '../types/user';
import { StoreUnavailableError, errorMessage } from '../utils/errors';
import { logger } from '../utils/logger';
import { sleep as defaultSleep, type Sleep } from '../utils/sleep';
import { deduplicateJobs, isFresh } from './deduplication';
import type { IdempotencyStore } from './idempotency-store';
import type { JobFetcherService } from './job-fetcher';
import { normalizeJob } from './normalizer';
import type { NotificationDispatcher } from './notification-dispatcher';
import type { StatsSink } from './stats-sink';

export type CycleState =
  | 'idle'
  | 'fetching'
  | 'normalizing'
  | 'filtering'
  | 'notifying'
  | 'publishing';

export interface CycleSchedulerOptions {
  intervalSeconds: number;
  jobMaxAgeHours: number;
  maxQueryKeywords: number;
  maxNotificationsPerRecipient: number;
  sentKeyScope: SentKeyScope;
  now?: () => Date;
  sleep?: Sleep;
}

export interface CycleDependencies {
  fetcher: JobFetcherService;
  recipients: RecipientDirectory;
  store: IdempotencyStore;
  dispatcher: NotificationDispatcher;
  statsSink: StatsSink;
}

interface DeliveryTarget {
  recipient: Recipient;
  matchedKeyword: string;
}

/**
 * One claim in the idempotency store and the recipients it covers.
 * Recipient scope: one recipient per unit. Global scope: every matching recipient.
 */
interface DeliveryUnit {
  job: JobWithFingerprint;
  key: SentKey;
  targets: DeliveryTarget[];
}

/**
 * Union of all recipients' keywords, passed to sources that can search
 */
export function collectQueryKeywords(recipients: Recipient[], limit: number): string[] {
  const all = new Set<string>();
  for (const recipient of recipients) {
    recipient.keywords.forEach(keyword => all.add(keyword));
  }
  return [...all].sort().slice(0, limit);
}

/**
 * Drives the fetch → normalize → filter → notify → publish cycle.
 * Cycles run one after another: the interval sleep starts only after a
 * cycle has published its stats.
 */
export class CycleScheduler {
  private state: CycleState = 'idle';
  private cycleCount = 0;
  private stopRequested = false;
  private loop: Promise<void> | null = null;
  private readonly wake = new AbortController();
  private readonly now: () => Date;
  private readonly sleep: Sleep;
  private readonly log = logger.child({ component: 'cycle-scheduler' });

  constructor(
    private readonly deps: CycleDependencies,
    private readonly options: CycleSchedulerOptions
  ) {
    this.now = options.now ?? (() => new Date());
    this.sleep = options.sleep ?? defaultSleep;
  }

  get currentState(): CycleState {
    return this.state;
  }

  /**
   * Starts the loop; resolves once `stop()` has taken effect
   */
  start(): Promise<void> {
    if (!this.loop) {
      this.loop = this.runLoop();
    }
    return this.loop;
  }

  /**
   * Lets the in-flight delivery finish, skips the rest, publishes stats and
   * waits for the loop to exit
   */
  async stop(): Promise<void> {
    this.stopRequested = true;
    this.wake.abort();
    if (this.loop) {
      await this.loop;
    }
  }

  private async runLoop(): Promise<void> {
    this.log.info('Worker loop started', { intervalSeconds: this.options.intervalSeconds });

    while (!this.stopRequested) {
      await this.runCycle();
      if (this.stopRequested) break;
      await this.sleep(this.options.intervalSeconds * 1000, this.wake.signal);
    }

    this.log.info('Worker loop stopped', { cycles: this.cycleCount });
  }

  /**
   * Runs one full cycle and returns its stats. Never throws.
   */
  async runCycle(): Promise<CycleStats> {
    const startedAt = this.now();
    const stats: CycleStats = {
      cycleId: ++this.cycleCount,
      startedAt,
      cycleSeconds: 0,
      sentThisCycle: 0,
      failedThisCycle: 0,
      droppedThisCycle: 0,
      duplicatesThisCycle: 0,
      staleThisCycle: 0,
      aborted: null,
      feeds: {},
    };

    try {
      await this.execute(stats);
    } catch (error) {
      stats.aborted = errorMessage(error);
      if (error instanceof StoreUnavailableError) {
        this.log.error('Cycle aborted: idempotency store unavailable', error, { cycleId: stats.cycleId });
      } else {
        this.log.error('Cycle failed', error, { cycleId: stats.cycleId });
      }
    }

    this.transition('publishing');
    stats.cycleSeconds = (this.now().getTime() - startedAt.getTime()) / 1000;
    try {
      await this.deps.statsSink.publish(stats);
    } catch (error) {
      this.log.error('Failed to publish cycle stats', error, { cycleId: stats.cycleId });
    }

    this.log.info('Cycle completed', {
      cycleId: stats.cycleId,
      seconds: stats.cycleSeconds,
      sent: stats.sentThisCycle,
      failed: stats.failedThisCycle,
      dropped: stats.droppedThisCycle,
      duplicates: stats.duplicatesThisCycle,
      stale: stats.staleThisCycle,
      aborted: stats.aborted,
    });
    this.transition('idle');
    return stats;
  }

  private async execute(stats: CycleStats): Promise<void> {
    // Fetching
    this.transition('fetching');
    const recipients = await this.loadRecipients();
    const keywords = collectQueryKeywords(recipients ?? [], this.options.maxQueryKeywords);
    const fetched = await this.deps.fetcher.fetchAll(keywords);
    for (const result of fetched) {
      stats.feeds[result.source] = {
        count: result.records.length,
        error: result.error ? result.error.message : null,
      };
    }

    // Normalizing
    this.transition('normalizing');
    const jobs: JobRecord[] = [];
    for (const result of fetched) {
      for (const raw of result.records) {
        const normalized = normalizeJob(raw, result.source);
        if (normalized.ok) {
          jobs.push(normalized.job);
        } else {
          stats.droppedThisCycle++;
        }
      }
    }

    // Filtering
    this.transition('filtering');
    const { jobs: unique, duplicates } = deduplicateJobs(jobs);
    stats.duplicatesThisCycle = duplicates;
    const now = this.now();
    const fresh = unique.filter(job => isFresh(job, this.options.jobMaxAgeHours, now));
    stats.staleThisCycle = unique.length - fresh.length;

    if (recipients === null) {
      this.log.warn('Recipients unavailable, skipping notifications this cycle');
      return;
    }

    const units = await this.planDeliveries(fresh, recipients);

    // Notifying
    this.transition('notifying');
    await this.notify(units, stats);
  }

  private async loadRecipients(): Promise<Recipient[] | null> {
    try {
      const now = this.now();
      const recipients = await this.deps.recipients.listEligibleRecipients();
      return recipients.filter(recipient => isEligible(recipient, now));
    } catch (error) {
      this.log.error('Failed to load recipients', error);
      return null;
    }
  }

  /**
   * Matches jobs to recipients, drops pairs the store has already seen and
   * applies the per-recipient cap. Capped pairs stay unsent for a later cycle.
   */
  private async planDeliveries(
    jobs: JobWithFingerprint[],
    recipients: Recipient[]
  ): Promise<DeliveryUnit[]> {
    const global = this.options.sentKeyScope === 'global';
    const candidates: DeliveryUnit[] = [];

    for (const job of jobs) {
      const targets: DeliveryTarget[] = [];
      for (const recipient of recipients) {
        const [matchedKeyword] = matchKeywords(job, recipient.keywords);
        if (matchedKeyword) targets.push({ recipient, matchedKeyword });
      }
      if (targets.length === 0) continue;

      if (global) {
        candidates.push({ job, key: { recipientId: null, fingerprint: job.fingerprint }, targets });
      } else {
        for (const target of targets) {
          candidates.push({
            job,
            key: { recipientId: target.recipient.id, fingerprint: job.fingerprint },
            targets: [target],
          });
        }
      }
    }

    const sent = await this.deps.store.findSent(candidates.map(unit => unit.key));

    const perRecipient = new Map<number, number>();
    const units: DeliveryUnit[] = [];
    for (const unit of candidates) {
      if (sent.has(sentKeyId(unit.key))) continue;

      const targets = unit.targets.filter(target => {
        const count = perRecipient.get(target.recipient.id) ?? 0;
        if (count >= this.options.maxNotificationsPerRecipient) return false;
        perRecipient.set(target.recipient.id, count + 1);
        return true;
      });
      if (targets.length > 0) units.push({ ...unit, targets });
    }

    this.log.info('Deliveries planned', {
      jobs: jobs.length,
      recipients: recipients.length,
      candidates: candidates.length,
      alreadySent: sent.size,
      planned: units.length,
    });
    return units;
  }

  private async notify(units: DeliveryUnit[], stats: CycleStats): Promise<void> {
    for (const [index, unit] of units.entries()) {
      if (this.stopRequested) {
        this.log.info('Shutdown requested, skipping remaining deliveries', {
          remaining: units.length - index,
        });
        break;
      }

      const outcome = await this.deps.store.deliverOnce(unit.key, async () => {
        let delivered = false;
        for (const target of unit.targets) {
          const result = await this.deps.dispatcher.deliver(target.recipient, unit.job, target.matchedKeyword);
          if (result.status === 'delivered') {
            stats.sentThisCycle++;
            delivered = true;
          } else {
            stats.failedThisCycle++;
          }
        }
        return delivered;
      });

      if (outcome === 'already-sent') {
        this.log.debug('Job claimed by another worker, skipped', { fingerprint: unit.job.fingerprint });
      }
    }
  }

  private transition(next: CycleState): void {
    this.log.debug(`State ${this.state} -> ${next}`);
    this.state = next;
  }
}
