import type {
  BucketHistoryRepositoryPort,
  BucketHistoryRow,
  CellId,
  PercentileBaseline,
  PercentileWindow,
  UncalibratedBaseline,
} from '@congestion/domain';
import { percentileCont, UNCALIBRATED } from '@congestion/domain';

const DAY_MS = 86_400_000;

/** Process-local bucket-history log with the same percentile semantics as PERCENTILE_CONT. */
export class InMemoryBucketHistoryRepository implements BucketHistoryRepositoryPort {
  private readonly rows: BucketHistoryRow[] = [];

  async appendHistoryRow(row: BucketHistoryRow): Promise<boolean> {
    const duplicate = this.rows.some(
      (r) => r.cellId === row.cellId && r.bucketTime.getTime() === row.bucketTime.getTime(),
    );
    if (duplicate) return false;
    this.rows.push(row);
    return true;
  }

  async queryPercentiles(
    cellId: CellId,
    window: PercentileWindow,
  ): Promise<PercentileBaseline | UncalibratedBaseline> {
    const sinceMs = window.now.getTime() - window.days * DAY_MS;
    const rows = this.rows.filter(
      (r) => r.cellId === cellId && r.bucketTime.getTime() > sinceMs,
    );
    if (rows.length === 0) return UNCALIBRATED;

    const speeds = rows.flatMap((r) => (r.avgSpeed !== undefined ? [r.avgSpeed] : []));
    const counts = rows.map((r) => r.vehicleCount);
    return {
      kind: 'percentile',
      speedP25: percentileCont(speeds, 0.25),
      speedP50: percentileCont(speeds, 0.5),
      countP75: percentileCont(counts, 0.75),
      sampleCount: rows.length,
    };
  }

  async isAvailable(): Promise<boolean> {
    return true;
  }

  /** Rows recorded for a cell, oldest first. */
  historyOf(cellId: CellId): BucketHistoryRow[] {
    return this.rows.filter((r) => r.cellId === cellId);
  }
}
