import { promises as fs } from 'fs';
import { dirname } from 'path';
import type { CycleStats, CycleStatsSnapshot } from '../types/stats';
import { isRecord } from '../utils/guards';

export interface StatsSink {
  /** Replaces the previous snapshot */
  publish(stats: CycleStats): Promise<void>;
}

export function toSnapshot(stats: CycleStats): CycleStatsSnapshot {
  return {
    ts: new Date(stats.startedAt.getTime() + stats.cycleSeconds * 1000).toISOString(),
    cycle_seconds: stats.cycleSeconds,
    sent_this_cycle: stats.sentThisCycle,
    failed_this_cycle: stats.failedThisCycle,
    dropped: stats.droppedThisCycle,
    duplicates: stats.duplicatesThisCycle,
    stale: stats.staleThisCycle,
    aborted: stats.aborted,
    feeds: stats.feeds,
  };
}

/**
 * Writes the last cycle's stats as JSON for the bot's status command.
 * The write goes to a temp file first so readers never see half a snapshot.
 */
export class FileStatsSink implements StatsSink {
  constructor(private readonly path: string) {}

  async publish(stats: CycleStats): Promise<void> {
    const tmpPath = `${this.path}.tmp`;
    await fs.mkdir(dirname(this.path), { recursive: true });
    await fs.writeFile(tmpPath, JSON.stringify(toSnapshot(stats), null, 2), 'utf-8');
    await fs.rename(tmpPath, this.path);
  }
}

/**
 * Reads the snapshot back; null when absent or unreadable
 */
export async function readLastCycleStats(path: string): Promise<CycleStatsSnapshot | null> {
  let content: string;
  try {
    content = await fs.readFile(path, 'utf-8');
  } catch {
    return null;
  }

  try {
    const parsed: unknown = JSON.parse(content);
    return isSnapshot(parsed) ? parsed : null;
  } catch {
    return null;
  }
}

function isSnapshot(value: unknown): value is CycleStatsSnapshot {
  return isRecord(value)
    && typeof value.cycle_seconds === 'number'
    && typeof value.sent_this_cycle === 'number'
    && isRecord(value.feeds);
}
