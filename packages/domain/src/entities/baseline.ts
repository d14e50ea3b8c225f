import type { CellId, TimeBucket } from './cell.js';

/** Running EMA statistics persisted per cell (z-score strategy). */
export interface EmaBaseline {
  readonly kind: 'ema';
  readonly avgSpeed: number;
  readonly avgCount: number;
  readonly speedVariance: number;
  readonly countVariance: number;
  readonly sampleCount: number;
  readonly updatedAt?: Date;
}

/** Order statistics over the trailing history window (percentile strategy). */
export interface PercentileBaseline {
  readonly kind: 'percentile';
  readonly speedP25?: number;
  readonly speedP50?: number;
  readonly countP75?: number;
  readonly sampleCount: number;
}

/**
 * No usable history: the cell was never flushed, or the durable store could
 * not be reached. Carries no statistics.
 */
export interface UncalibratedBaseline {
  readonly kind: 'uncalibrated';
  readonly sampleCount: 0;
}

export type BaselineSnapshot = EmaBaseline | PercentileBaseline | UncalibratedBaseline;

export const UNCALIBRATED: UncalibratedBaseline = Object.freeze({
  kind: 'uncalibrated',
  sampleCount: 0,
});

/** Aggregate of a bucket that has just been superseded by a newer one. */
export interface ClosedBucket {
  readonly cellId: CellId;
  readonly bucket: TimeBucket;
  readonly count: number;
  readonly avgSpeed?: number;
}

/** Immutable row of the bucket-history log. */
export interface BucketHistoryRow {
  readonly cellId: CellId;
  readonly bucketTime: Date;
  readonly vehicleCount: number;
  readonly avgSpeed?: number;
  /** 0-23, UTC */
  readonly hourOfDay: number;
  /** 0 = Monday … 6 = Sunday */
  readonly dayOfWeek: number;
}
