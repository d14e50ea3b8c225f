import { describe, it, expect, beforeEach } from '@jest/globals';
import { foldEma } from '@congestion/domain';
import type { BucketHistoryRow } from '@congestion/domain';
import { DeterministicClock } from '../clock/deterministic-clock.js';
import { InMemoryEphemeralStore } from '../memory/in-memory-ephemeral-store.js';
import { InMemoryBaselineRepository } from '../memory/in-memory-baseline.repository.js';
import { InMemoryBucketHistoryRepository } from '../memory/in-memory-bucket-history.repository.js';

const T0 = Date.UTC(2024, 0, 8, 12, 0, 0);
const DAY_MS = 86_400_000;

describe('InMemoryEphemeralStore', () => {
  let clock: DeterministicClock;
  let store: InMemoryEphemeralStore;

  beforeEach(() => {
    clock = new DeterministicClock(T0);
    store = new InMemoryEphemeralStore(clock);
  });

  it('counts each member once', async () => {
    expect(await store.addUnique('k', 'car_001')).toBe(1);
    expect(await store.addUnique('k', 'car_001')).toBe(1);
    expect(await store.addUnique('k', 'car_002')).toBe(2);
    expect(await store.count('k')).toBe(2);
    expect(await store.count('missing')).toBe(0);
  });

  it('expires keys once their TTL has fully elapsed', async () => {
    await store.addUnique('k', 'car_001');
    await store.expire('k', 300);
    clock.advance(299_999);
    expect(await store.count('k')).toBe(1);
    clock.advance(1);
    expect(await store.count('k')).toBe(0);
    expect(await store.exists('k')).toBe(false);
  });

  it('keeps keys without a TTL', async () => {
    await store.append('list', '12.5');
    clock.advance(10 * DAY_MS);
    expect(await store.readAll('list')).toEqual(['12.5']);
  });

  it('returns a copy of list contents', async () => {
    await store.append('list', '1');
    const values = await store.readAll('list');
    values.push('2');
    expect(await store.readAll('list')).toEqual(['1']);
  });

  it('sets a marker only when absent, until it expires', async () => {
    expect(await store.setIfAbsent('m', '1', 360)).toBe(true);
    expect(await store.setIfAbsent('m', '1', 360)).toBe(false);
    clock.advance(360_000);
    expect(await store.setIfAbsent('m', '1', 360)).toBe(true);
  });

  it('drops closed buckets that are never read again', async () => {
    for (let i = 0; i < 1000; i += 1) {
      await store.batch([
        { op: 'addUnique', key: `c1:${i}`, member: 'car_001' },
        { op: 'expire', key: `c1:${i}`, ttlSeconds: 300 },
        { op: 'append', key: `c1:${i}:speeds`, value: '30' },
        { op: 'expire', key: `c1:${i}:speeds`, ttlSeconds: 300 },
      ]);
      clock.advance(300_000);
    }
    // only the last bucket's two keys remain, already past their TTL
    expect(store.retainedKeys).toBe(2);
    expect(store.size()).toBe(0);
  });

  it('runs a batch in order and answers counts only', async () => {
    const replies = await store.batch([
      { op: 'addUnique', key: 'k', member: 'car_001' },
      { op: 'expire', key: 'k', ttlSeconds: 300 },
      { op: 'append', key: 'k:speeds', value: '42' },
      { op: 'expire', key: 'k:speeds', ttlSeconds: 300 },
      { op: 'count', key: 'k' },
    ]);
    expect(replies).toEqual([1, null, null, null, 1]);
    expect(store.size()).toBe(2);
    clock.advance(300_000);
    expect(store.size()).toBe(0);
  });
});

describe('InMemoryBaselineRepository', () => {
  it('reports a never-seen cell as uncalibrated', async () => {
    const repo = new InMemoryBaselineRepository();
    expect(await repo.getBaseline('c1')).toEqual({ kind: 'uncalibrated', sampleCount: 0 });
  });

  it('applies the fold to the stored row', async () => {
    const repo = new InMemoryBaselineRepository();
    await repo.updateBaseline('c1', (current) => foldEma(current, { count: 20, avgSpeed: 50 }));
    const saved = await repo.updateBaseline('c1', (current) => foldEma(current, { count: 30 }));
    expect(saved?.sampleCount).toBe(2);
    expect(saved?.avgCount).toBeCloseTo(21, 10);

    const read = await repo.getBaseline('c1');
    expect(read.kind).toBe('ema');
    expect(read.sampleCount).toBe(2);
  });
});

describe('InMemoryBucketHistoryRepository', () => {
  const now = new Date(T0);

  function row(overrides: Partial<BucketHistoryRow>): BucketHistoryRow {
    return {
      cellId: 'c1',
      bucketTime: new Date(T0 - DAY_MS),
      vehicleCount: 10,
      avgSpeed: 40,
      hourOfDay: 12,
      dayOfWeek: 6,
      ...overrides,
    };
  }

  it('rejects a second row for the same bucket', async () => {
    const repo = new InMemoryBucketHistoryRepository();
    expect(await repo.appendHistoryRow(row({}))).toBe(true);
    expect(await repo.appendHistoryRow(row({ vehicleCount: 99 }))).toBe(false);
    expect(repo.historyOf('c1')).toHaveLength(1);
  });

  it('computes percentiles over the trailing window only', async () => {
    const repo = new InMemoryBucketHistoryRepository();
    // exactly at the window edge: excluded
    await repo.appendHistoryRow(row({ bucketTime: new Date(T0 - 7 * DAY_MS), vehicleCount: 500, avgSpeed: 1 }));
    await repo.appendHistoryRow(row({ bucketTime: new Date(T0 - 3_600_000), vehicleCount: 10, avgSpeed: 20 }));
    await repo.appendHistoryRow(row({ bucketTime: new Date(T0 - 7_200_000), vehicleCount: 20, avgSpeed: 40 }));
    await repo.appendHistoryRow(row({ bucketTime: new Date(T0 - 10_800_000), vehicleCount: 30, avgSpeed: undefined }));
    await repo.appendHistoryRow(row({ cellId: 'c2', vehicleCount: 1000 }));

    expect(await repo.queryPercentiles('c1', { days: 7, now })).toEqual({
      kind: 'percentile',
      speedP25: 25,
      speedP50: 30,
      countP75: 25,
      sampleCount: 3,
    });
  });

  it('reports an empty window as uncalibrated', async () => {
    const repo = new InMemoryBucketHistoryRepository();
    expect(await repo.queryPercentiles('c1', { days: 7, now })).toEqual({ kind: 'uncalibrated', sampleCount: 0 });
  });
});
