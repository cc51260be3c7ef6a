import { promises as fs } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import type { CycleStats } from '../types/stats';
import { FileStatsSink, readLastCycleStats, toSnapshot } from './stats-sink';

const stats: CycleStats = {
  cycleId: 3,
  startedAt: new Date('2026-01-01T00:00:00Z'),
  cycleSeconds: 12.5,
  sentThisCycle: 4,
  failedThisCycle: 1,
  droppedThisCycle: 2,
  duplicatesThisCycle: 5,
  staleThisCycle: 0,
  aborted: null,
  feeds: {
    freelancer: { count: 20, error: null },
    skywalker: { count: 0, error: 'Status code 502' },
  },
};

describe('toSnapshot', () => {
  it('stamps the snapshot with the cycle end time', () => {
    expect(toSnapshot(stats)).toEqual({
      ts: '2026-01-01T00:00:12.500Z',
      cycle_seconds: 12.5,
      sent_this_cycle: 4,
      failed_this_cycle: 1,
      dropped: 2,
      duplicates: 5,
      stale: 0,
      aborted: null,
      feeds: {
        freelancer: { count: 20, error: null },
        skywalker: { count: 0, error: 'Status code 502' },
      },
    });
  });
});

describe('FileStatsSink', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(join(tmpdir(), 'worker-stats-'));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('writes the snapshot and reads it back', async () => {
    const path = join(dir, 'nested', 'worker_stats.json');
    await new FileStatsSink(path).publish(stats);

    expect(await readLastCycleStats(path)).toEqual(toSnapshot(stats));
    expect(await fs.readdir(join(dir, 'nested'))).toEqual(['worker_stats.json']);
  });

  it('replaces the previous snapshot', async () => {
    const path = join(dir, 'worker_stats.json');
    const sink = new FileStatsSink(path);

    await sink.publish(stats);
    await sink.publish({ ...stats, sentThisCycle: 0, feeds: {} });

    const snapshot = await readLastCycleStats(path);
    expect(snapshot?.sent_this_cycle).toBe(0);
    expect(snapshot?.feeds).toEqual({});
  });

  it('returns null for a missing or malformed file', async () => {
    expect(await readLastCycleStats(join(dir, 'absent.json'))).toBeNull();

    const path = join(dir, 'broken.json');
    await fs.writeFile(path, '{"cycle_seconds": "soon"}');
    expect(await readLastCycleStats(path)).toBeNull();
  });
});
