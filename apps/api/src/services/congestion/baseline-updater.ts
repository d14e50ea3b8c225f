import type { CellId, ClosedBucket, EphemeralStorePort, TimeBucket } from '@congestion/domain';
import { flushMarkerKey } from '@congestion/domain';
import type { CongestionStrategy } from './congestion-strategy.js';
import type { LiveAggregator } from './live-aggregator.js';

/** Marker outlives the bucket keys so late pings cannot flush twice. */
export const DEFAULT_FLUSH_MARKER_TTL_SECONDS = 360;

export type FlushOutcome =
  | { status: 'flushed'; closed: ClosedBucket }
  /** Bucket was claimed but the durable write failed; its contribution is lost. */
  | { status: 'dropped'; closed: ClosedBucket }
  | { status: 'skipped'; reason: 'already_flushed' | 'empty_bucket' | 'store_unavailable' };

/**
 * Folds a bucket into the cell's baseline once the cell's next bucket begins.
 * Driven by ingestion: every ping reports the bucket it landed in, and the
 * first one to claim the previous bucket's flush marker performs the fold.
 */
export class BaselineUpdater {
  constructor(
    private readonly store: EphemeralStorePort,
    private readonly aggregator: LiveAggregator,
    private readonly strategy: CongestionStrategy,
    private readonly markerTtlSeconds: number = DEFAULT_FLUSH_MARKER_TTL_SECONDS,
  ) {}

  /** Never rejects. */
  async onBucketObserved(cellId: CellId, bucket: TimeBucket): Promise<FlushOutcome> {
    const previous = bucket - 1;

    let claimed: boolean;
    try {
      claimed = await this.store.setIfAbsent(
        flushMarkerKey(cellId, previous),
        String(bucket),
        this.markerTtlSeconds,
      );
    } catch (err) {
      console.warn('[baseline-updater] flush marker unavailable, skipping', cellId, previous, err instanceof Error ? err.message : err);
      return { status: 'skipped', reason: 'store_unavailable' };
    }
    if (!claimed) return { status: 'skipped', reason: 'already_flushed' };

    const aggregate = await this.aggregator.read(cellId, previous);
    if (aggregate.count === 0) return { status: 'skipped', reason: 'empty_bucket' };

    const closed: ClosedBucket = {
      cellId,
      bucket: previous,
      count: aggregate.count,
      avgSpeed: aggregate.avgSpeed,
    };

    let stored = false;
    try {
      stored = await this.strategy.fold(closed);
    } catch (err) {
      console.warn('[baseline-updater] fold threw', cellId, previous, err);
    }
    if (!stored) {
      console.warn(`[baseline-updater] bucket ${previous} of ${cellId} dropped (durable store unavailable)`);
      return { status: 'dropped', closed };
    }
    return { status: 'flushed', closed };
  }
}
