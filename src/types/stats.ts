export interface FeedStats {
  count: number;
  error: string | null;
}

/**
 * Counters for one worker cycle, superseded by the next cycle
 */
export interface CycleStats {
  cycleId: number;
  startedAt: Date;
  cycleSeconds: number;
  sentThisCycle: number;
  failedThisCycle: number;
  droppedThisCycle: number;
  duplicatesThisCycle: number;
  staleThisCycle: number;
  /** Reason the cycle stopped early, if it did */
  aborted: string | null;
  feeds: Record<string, FeedStats>;
}

/**
 * Snapshot layout written for operators
 */
export interface CycleStatsSnapshot {
  ts: string;
  cycle_seconds: number;
  sent_this_cycle: number;
  failed_this_cycle: number;
  dropped: number;
  duplicates: number;
  stale: number;
  aborted: string | null;
  feeds: Record<string, FeedStats>;
}
