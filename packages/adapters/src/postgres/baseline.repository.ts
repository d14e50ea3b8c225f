import type {
  BaselineRepositoryPort,
  CellId,
  EmaBaseline,
  UncalibratedBaseline,
} from '@congestion/domain';
import { UNCALIBRATED } from '@congestion/domain';
import { numericColumn, withTransaction } from './pool.js';
import type { DbClient, DbPool } from './pool.js';

const SELECT_BASELINE = `
  SELECT avg_speed, avg_count, speed_variance, count_variance, sample_count, updated_at
  FROM cell_baselines
  WHERE cell_id = $1`;

const UPSERT_BASELINE = `
  INSERT INTO cell_baselines
    (cell_id, avg_speed, avg_count, speed_variance, count_variance, sample_count, updated_at)
  VALUES ($1, $2, $3, $4, $5, $6, NOW())
  ON CONFLICT (cell_id) DO UPDATE SET
    avg_speed = EXCLUDED.avg_speed,
    avg_count = EXCLUDED.avg_count,
    speed_variance = EXCLUDED.speed_variance,
    count_variance = EXCLUDED.count_variance,
    sample_count = EXCLUDED.sample_count,
    updated_at = NOW()
  RETURNING avg_speed, avg_count, speed_variance, count_variance, sample_count, updated_at`;

/** EMA baselines in `cell_baselines`. Connectivity errors are logged, never thrown. */
export class PgBaselineRepository implements BaselineRepositoryPort {
  constructor(private readonly pool: DbPool) {}

  async getBaseline(cellId: CellId): Promise<EmaBaseline | UncalibratedBaseline> {
    try {
      const { rows } = await this.pool.query(SELECT_BASELINE, [cellId]);
      return rows[0] ? mapBaselineRow(rows[0]) : UNCALIBRATED;
    } catch (err) {
      console.warn('[pg-baseline] read failed, treating cell as uncalibrated', cellId, errorMessage(err));
      return UNCALIBRATED;
    }
  }

  async upsertBaseline(cellId: CellId, baseline: EmaBaseline): Promise<boolean> {
    try {
      await this.pool.query(UPSERT_BASELINE, baselineParams(cellId, baseline));
      return true;
    } catch (err) {
      console.warn('[pg-baseline] upsert dropped', cellId, errorMessage(err));
      return false;
    }
  }

  async updateBaseline(
    cellId: CellId,
    fold: (current: EmaBaseline | UncalibratedBaseline) => EmaBaseline,
  ): Promise<EmaBaseline | null> {
    try {
      return await withTransaction(this.pool, async (client: DbClient) => {
        const { rows } = await client.query(`${SELECT_BASELINE} FOR UPDATE`, [cellId]);
        const current = rows[0] ? mapBaselineRow(rows[0]) : UNCALIBRATED;
        const next = fold(current);
        const saved = await client.query(UPSERT_BASELINE, baselineParams(cellId, next));
        return saved.rows[0] ? mapEmaRow(saved.rows[0]) : next;
      });
    } catch (err) {
      console.warn('[pg-baseline] update dropped', cellId, errorMessage(err));
      return null;
    }
  }

  async isAvailable(): Promise<boolean> {
    try {
      await this.pool.query('SELECT 1');
      return true;
    } catch {
      return false;
    }
  }
}

function baselineParams(cellId: CellId, b: EmaBaseline): unknown[] {
  return [cellId, b.avgSpeed, b.avgCount, b.speedVariance, b.countVariance, b.sampleCount];
}

function mapBaselineRow(row: Record<string, unknown>): EmaBaseline | UncalibratedBaseline {
  const baseline = mapEmaRow(row);
  return baseline.sampleCount === 0 ? UNCALIBRATED : baseline;
}

/** A row just written by the fold; always an EMA row. */
function mapEmaRow(row: Record<string, unknown>): EmaBaseline {
  return {
    kind: 'ema',
    avgSpeed: numericColumn(row['avg_speed']) ?? 0,
    avgCount: numericColumn(row['avg_count']) ?? 0,
    speedVariance: numericColumn(row['speed_variance']) ?? 0,
    countVariance: numericColumn(row['count_variance']) ?? 0,
    sampleCount: numericColumn(row['sample_count']) ?? 0,
    updatedAt: row['updated_at'] instanceof Date ? row['updated_at'] : undefined,
  };
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
