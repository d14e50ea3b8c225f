import type { CellId } from '../../entities/cell.js';
import type {
  BucketHistoryRow,
  PercentileBaseline,
  UncalibratedBaseline,
} from '../../entities/baseline.js';

export interface PercentileWindow {
  /** Only rows with bucketTime after `now - days`. */
  readonly days: number;
  readonly now: Date;
}

/** Append-only per-bucket log; percentiles are computed at read time. */
export interface BucketHistoryRepositoryPort {
  /** False when the row was dropped (store down or duplicate bucket). */
  appendHistoryRow(row: BucketHistoryRow): Promise<boolean>;
  queryPercentiles(
    cellId: CellId,
    window: PercentileWindow,
  ): Promise<PercentileBaseline | UncalibratedBaseline>;
  isAvailable(): Promise<boolean>;
}
