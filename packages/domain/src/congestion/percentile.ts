import type { PercentileBaseline, UncalibratedBaseline } from '../entities/baseline.js';
import type { LiveSample } from '../entities/live-aggregate.js';
import type { Verdict, VerdictEvidence } from '../entities/verdict.js';
import { isCalibrated, MIN_SAMPLES_PERCENTILE } from './calibration.js';
import { fallbackLevel, scoreFallback } from './fallback.js';

/** Multiplier over count p75 above which a speedless sample is HIGH. */
export const COUNT_P75_HIGH_FACTOR = 1.5;

/**
 * Continuous percentile with linear interpolation between the two nearest
 * ranks, matching PostgreSQL's PERCENTILE_CONT.
 */
export function percentileCont(values: readonly number[], fraction: number): number | undefined {
  if (values.length === 0) return undefined;
  const sorted = [...values].sort((a, b) => a - b);
  const pos = Math.min(Math.max(fraction, 0), 1) * (sorted.length - 1);
  const lo = Math.floor(pos);
  const hi = Math.ceil(pos);
  const lower = sorted[lo] ?? 0;
  const upper = sorted[hi] ?? lower;
  return lower + (upper - lower) * (pos - lo);
}

export interface PercentileOptions {
  readonly minSamples?: number;
}

/** Compare a live sample with the cell's trailing-window percentiles. */
export function scoreWithPercentiles(
  sample: LiveSample,
  baseline: PercentileBaseline | UncalibratedBaseline,
  options: PercentileOptions = {},
): Verdict {
  const minSamples = options.minSamples ?? MIN_SAMPLES_PERCENTILE;
  const evidence: VerdictEvidence = {
    sampleCount: baseline.sampleCount,
    currentCount: sample.count,
    currentAvgSpeed: sample.avgSpeed,
    ...(baseline.kind === 'percentile'
      ? { speedP25: baseline.speedP25, speedP50: baseline.speedP50, countP75: baseline.countP75 }
      : {}),
  };

  if (baseline.kind !== 'percentile' || !isCalibrated(baseline.sampleCount, minSamples)) {
    return scoreFallback(sample, evidence);
  }

  const { speedP25, speedP50, countP75 } = baseline;

  if (sample.avgSpeed !== undefined && speedP25 !== undefined && speedP50 !== undefined) {
    if (sample.avgSpeed < speedP25) {
      return { level: 'HIGH', method: 'percentile', reason: 'speed_percentile', evidence };
    }
    if (sample.avgSpeed < speedP50) {
      return { level: 'MODERATE', method: 'percentile', reason: 'speed_percentile', evidence };
    }
    if (countP75 !== undefined && sample.count > countP75) {
      return { level: 'MODERATE', method: 'percentile', reason: 'high_count_despite_good_speed', evidence };
    }
    return { level: 'LOW', method: 'percentile', reason: 'speed_percentile', evidence };
  }

  // No count history either: the fixed count thresholds are all we have.
  if (countP75 === undefined) {
    return { level: fallbackLevel(sample.count), method: 'percentile', reason: 'count_only', evidence };
  }

  const level =
    sample.count > countP75 * COUNT_P75_HIGH_FACTOR
      ? 'HIGH'
      : sample.count > countP75
        ? 'MODERATE'
        : 'LOW';
  return { level, method: 'percentile', reason: 'count_only', evidence };
}
