import type {
  BucketHistoryRepositoryPort,
  BucketHistoryRow,
  CellId,
  PercentileBaseline,
  PercentileWindow,
  UncalibratedBaseline,
} from '@congestion/domain';
import { UNCALIBRATED } from '@congestion/domain';
import { numericColumn } from './pool.js';
import type { DbPool } from './pool.js';

const DAY_MS = 86_400_000;

/**
 * Append-only `bucket_history` log. Percentiles come from PERCENTILE_CONT,
 * which skips NULL speeds on its own; the sample count is every row in the window.
 */
export class PgBucketHistoryRepository implements BucketHistoryRepositoryPort {
  constructor(private readonly pool: DbPool) {}

  async appendHistoryRow(row: BucketHistoryRow): Promise<boolean> {
    try {
      const { rowCount } = await this.pool.query(
        `INSERT INTO bucket_history
           (cell_id, bucket_time, vehicle_count, avg_speed, hour_of_day, day_of_week)
         VALUES ($1, $2, $3, $4, $5, $6)
         ON CONFLICT (cell_id, bucket_time) DO NOTHING`,
        [
          row.cellId,
          row.bucketTime,
          row.vehicleCount,
          row.avgSpeed ?? null,
          row.hourOfDay,
          row.dayOfWeek,
        ],
      );
      return (rowCount ?? 0) > 0;
    } catch (err) {
      console.warn('[pg-history] append dropped', row.cellId, err instanceof Error ? err.message : err);
      return false;
    }
  }

  async queryPercentiles(
    cellId: CellId,
    window: PercentileWindow,
  ): Promise<PercentileBaseline | UncalibratedBaseline> {
    const since = new Date(window.now.getTime() - window.days * DAY_MS);
    try {
      const { rows } = await this.pool.query(
        `SELECT
           COUNT(*)::int AS sample_count,
           PERCENTILE_CONT(0.25) WITHIN GROUP (ORDER BY avg_speed) AS speed_p25,
           PERCENTILE_CONT(0.50) WITHIN GROUP (ORDER BY avg_speed) AS speed_p50,
           PERCENTILE_CONT(0.75) WITHIN GROUP (ORDER BY vehicle_count) AS count_p75
         FROM bucket_history
         WHERE cell_id = $1
           AND bucket_time > $2`,
        [cellId, since],
      );
      const row = rows[0];
      const sampleCount = row ? numericColumn(row['sample_count']) ?? 0 : 0;
      if (!row || sampleCount === 0) return UNCALIBRATED;
      return {
        kind: 'percentile',
        speedP25: numericColumn(row['speed_p25']),
        speedP50: numericColumn(row['speed_p50']),
        countP75: numericColumn(row['count_p75']),
        sampleCount,
      };
    } catch (err) {
      console.warn('[pg-history] percentile query failed, treating cell as uncalibrated', cellId, err instanceof Error ? err.message : err);
      return UNCALIBRATED;
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
