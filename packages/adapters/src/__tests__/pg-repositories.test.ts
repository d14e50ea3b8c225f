import { describe, it, expect, jest, beforeEach, afterEach } from '@jest/globals';
import { foldEma } from '@congestion/domain';
import type { DbPool } from '../postgres/pool.js';
import { PgBaselineRepository } from '../postgres/baseline.repository.js';
import { PgBucketHistoryRepository } from '../postgres/bucket-history.repository.js';

type QueryResult = { rows: Array<Record<string, unknown>>; rowCount?: number };
type QueryFn = (sql: string, params?: unknown[]) => Promise<QueryResult>;

function fakePool() {
  const client = {
    query: jest.fn<QueryFn>(),
    release: jest.fn<() => void>(),
  };
  const pool = {
    query: jest.fn<QueryFn>(),
    connect: jest.fn(async () => client),
  };
  return { pool, client, db: pool as unknown as DbPool };
}

const UPDATED_AT = new Date(Date.UTC(2024, 0, 1));

beforeEach(() => {
  jest.spyOn(console, 'warn').mockImplementation(() => undefined);
});

afterEach(() => {
  jest.restoreAllMocks();
});

describe('PgBaselineRepository', () => {
  it('maps a stored row, coercing numeric strings', async () => {
    const { pool, db } = fakePool();
    pool.query.mockResolvedValue({
      rows: [
        {
          avg_speed: '60',
          avg_count: 20,
          speed_variance: 100,
          count_variance: '25',
          sample_count: 50,
          updated_at: UPDATED_AT,
        },
      ],
    });

    const baseline = await new PgBaselineRepository(db).getBaseline('c1');
    expect(baseline).toEqual({
      kind: 'ema',
      avgSpeed: 60,
      avgCount: 20,
      speedVariance: 100,
      countVariance: 25,
      sampleCount: 50,
      updatedAt: UPDATED_AT,
    });
    expect(pool.query.mock.calls[0]?.[1]).toEqual(['c1']);
  });

  it('treats a missing row or a zero sample count as uncalibrated', async () => {
    const { pool, db } = fakePool();
    const repo = new PgBaselineRepository(db);
    pool.query.mockResolvedValueOnce({ rows: [] });
    expect(await repo.getBaseline('c1')).toEqual({ kind: 'uncalibrated', sampleCount: 0 });
    pool.query.mockResolvedValueOnce({ rows: [{ sample_count: 0 }] });
    expect(await repo.getBaseline('c1')).toEqual({ kind: 'uncalibrated', sampleCount: 0 });
  });

  it('degrades to uncalibrated when the database is down', async () => {
    const { pool, db } = fakePool();
    pool.query.mockRejectedValue(new Error('connect ECONNREFUSED'));
    expect(await new PgBaselineRepository(db).getBaseline('c1')).toEqual({ kind: 'uncalibrated', sampleCount: 0 });
  });

  it('reports a dropped upsert as false', async () => {
    const { pool, db } = fakePool();
    pool.query.mockRejectedValue(new Error('timeout'));
    const ok = await new PgBaselineRepository(db).upsertBaseline('c1', {
      kind: 'ema',
      avgSpeed: 50,
      avgCount: 10,
      speedVariance: 0,
      countVariance: 0,
      sampleCount: 1,
    });
    expect(ok).toBe(false);
  });

  it('folds under a row lock inside one transaction', async () => {
    const { client, db } = fakePool();
    client.query.mockImplementation(async (sql: string) => {
      if (sql.includes('INSERT INTO cell_baselines')) {
        return {
          rows: [
            {
              avg_speed: 50,
              avg_count: 12,
              speed_variance: 0,
              count_variance: 0,
              sample_count: 1,
              updated_at: UPDATED_AT,
            },
          ],
        };
      }
      return { rows: [] };
    });

    const saved = await new PgBaselineRepository(db).updateBaseline('c1', (current) =>
      foldEma(current, { count: 12, avgSpeed: 50 }),
    );

    expect(saved).toMatchObject({ kind: 'ema', avgCount: 12, avgSpeed: 50, sampleCount: 1 });
    const statements = client.query.mock.calls.map(([sql]) => sql.trim().split(/\s+/)[0]);
    expect(statements).toEqual(['BEGIN', 'SELECT', 'INSERT', 'COMMIT']);
    expect(client.query.mock.calls[1]?.[0]).toContain('FOR UPDATE');
    expect(client.query.mock.calls[2]?.[1]).toEqual(['c1', 50, 12, 0, 0, 1]);
    expect(client.release).toHaveBeenCalledTimes(1);
  });

  it('returns the folded row when the upsert echoes nothing back', async () => {
    const { client, db } = fakePool();
    client.query.mockResolvedValue({ rows: [] });

    const saved = await new PgBaselineRepository(db).updateBaseline('c1', (current) =>
      foldEma(current, { count: 7, avgSpeed: 33 }),
    );

    expect(saved).toEqual({
      kind: 'ema',
      avgCount: 7,
      avgSpeed: 33,
      countVariance: 0,
      speedVariance: 0,
      sampleCount: 1,
    });
  });

  it('rolls back and returns null when the fold cannot be stored', async () => {
    const { client, db } = fakePool();
    client.query.mockImplementation(async (sql: string) => {
      if (sql.includes('INSERT')) throw new Error('disk full');
      return { rows: [] };
    });

    const saved = await new PgBaselineRepository(db).updateBaseline('c1', (current) =>
      foldEma(current, { count: 3 }),
    );

    expect(saved).toBeNull();
    expect(client.query.mock.calls.at(-1)?.[0]).toBe('ROLLBACK');
    expect(client.release).toHaveBeenCalledTimes(1);
  });
});

describe('PgBucketHistoryRepository', () => {
  const bucketTime = new Date(Date.UTC(2024, 0, 1, 10, 0));

  it('inserts a row and reports whether it was new', async () => {
    const { pool, db } = fakePool();
    const repo = new PgBucketHistoryRepository(db);
    const row = { cellId: 'c1', bucketTime, vehicleCount: 12, hourOfDay: 10, dayOfWeek: 0 };

    pool.query.mockResolvedValueOnce({ rows: [], rowCount: 1 });
    expect(await repo.appendHistoryRow(row)).toBe(true);
    expect(pool.query.mock.calls[0]?.[1]).toEqual(['c1', bucketTime, 12, null, 10, 0]);

    pool.query.mockResolvedValueOnce({ rows: [], rowCount: 0 });
    expect(await repo.appendHistoryRow(row)).toBe(false);
  });

  it('reads percentiles over the trailing window', async () => {
    const { pool, db } = fakePool();
    pool.query.mockResolvedValue({
      rows: [{ sample_count: 24, speed_p25: 31.5, speed_p50: 44, count_p75: 18 }],
    });
    const now = new Date(Date.UTC(2024, 0, 8));

    const result = await new PgBucketHistoryRepository(db).queryPercentiles('c1', { days: 7, now });

    expect(result).toEqual({ kind: 'percentile', speedP25: 31.5, speedP50: 44, countP75: 18, sampleCount: 24 });
    expect(pool.query.mock.calls[0]?.[1]).toEqual(['c1', new Date(Date.UTC(2024, 0, 1))]);
  });

  it('leaves speed percentiles unset when no row carried speed', async () => {
    const { pool, db } = fakePool();
    pool.query.mockResolvedValue({
      rows: [{ sample_count: 21, speed_p25: null, speed_p50: null, count_p75: 9 }],
    });
    const result = await new PgBucketHistoryRepository(db).queryPercentiles('c1', { days: 7, now: new Date() });
    expect(result).toEqual({ kind: 'percentile', speedP25: undefined, speedP50: undefined, countP75: 9, sampleCount: 21 });
  });

  it('treats an empty window or a failed query as uncalibrated', async () => {
    const { pool, db } = fakePool();
    const repo = new PgBucketHistoryRepository(db);
    pool.query.mockResolvedValueOnce({ rows: [{ sample_count: 0, speed_p25: null, speed_p50: null, count_p75: null }] });
    expect(await repo.queryPercentiles('c1', { days: 7, now: new Date() })).toEqual({ kind: 'uncalibrated', sampleCount: 0 });
    pool.query.mockRejectedValueOnce(new Error('connection terminated'));
    expect(await repo.queryPercentiles('c1', { days: 7, now: new Date() })).toEqual({ kind: 'uncalibrated', sampleCount: 0 });
  });
});
