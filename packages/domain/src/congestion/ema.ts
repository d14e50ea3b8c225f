import type { EmaBaseline, UncalibratedBaseline } from '../entities/baseline.js';

export const DEFAULT_EMA_ALPHA = 0.1;

export interface BucketStats {
  readonly count: number;
  readonly avgSpeed?: number;
}

/**
 * Fold one completed bucket into a cell's EMA baseline.
 *
 * Variance blends the squared deviation from the pre-update mean. Speed
 * statistics move only when the bucket carried speed; the first speed seen
 * seeds the mean without a variance contribution.
 */
export function foldEma(
  current: EmaBaseline | UncalibratedBaseline,
  bucket: BucketStats,
  alpha: number = DEFAULT_EMA_ALPHA,
): EmaBaseline {
  if (current.kind === 'uncalibrated' || current.sampleCount === 0) {
    return {
      kind: 'ema',
      avgCount: bucket.count,
      avgSpeed: bucket.avgSpeed ?? 0,
      countVariance: 0,
      speedVariance: 0,
      sampleCount: 1,
    };
  }

  const countDiff = bucket.count - current.avgCount;
  const avgCount = (1 - alpha) * current.avgCount + alpha * bucket.count;
  const countVariance = (1 - alpha) * current.countVariance + alpha * countDiff ** 2;

  let { avgSpeed, speedVariance } = current;
  if (bucket.avgSpeed !== undefined) {
    if (current.avgSpeed > 0) {
      const speedDiff = bucket.avgSpeed - current.avgSpeed;
      avgSpeed = (1 - alpha) * current.avgSpeed + alpha * bucket.avgSpeed;
      speedVariance = (1 - alpha) * current.speedVariance + alpha * speedDiff ** 2;
    } else {
      avgSpeed = bucket.avgSpeed;
    }
  }

  return {
    kind: 'ema',
    avgCount,
    avgSpeed,
    countVariance,
    speedVariance,
    sampleCount: current.sampleCount + 1,
  };
}
