import type { CellId, TimeBucket } from './cell.js';

/** Derived view of one (cell, bucket) in the ephemeral store. */
export interface LiveAggregate {
  readonly cellId: CellId;
  readonly bucket: TimeBucket;
  /** Unique devices seen in the bucket. 0 when the key expired or the store is down. */
  readonly count: number;
  /** Mean of recorded speeds (km/h); undefined when no speed was reported. */
  readonly avgSpeed?: number;
  readonly speedSampleCount: number;
}

/** What the scorer consumes. */
export interface LiveSample {
  readonly count: number;
  readonly avgSpeed?: number;
}
