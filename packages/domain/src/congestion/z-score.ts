import type { EmaBaseline, UncalibratedBaseline } from '../entities/baseline.js';
import type { LiveSample } from '../entities/live-aggregate.js';
import type { CongestionLevel, Verdict, VerdictEvidence } from '../entities/verdict.js';
import { isCalibrated, MIN_SAMPLES_ZSCORE } from './calibration.js';
import { scoreFallback } from './fallback.js';

export interface ZThresholds {
  readonly high: number;
  readonly moderate: number;
}

export const DEFAULT_Z_THRESHOLDS: ZThresholds = { high: 1.5, moderate: 0.5 };

/**
 * Standard deviations between `value` and `mean`. With `invert` the sign is
 * flipped so that a lower-than-normal value scores positive.
 */
export function zScore(value: number, mean: number, std: number, invert = false): number {
  const divisor = std > 0 ? std : 1.0;
  return invert ? (mean - value) / divisor : (value - mean) / divisor;
}

/** sqrt(variance), never below 1.0 */
export function stdFromVariance(variance: number): number {
  return Math.max(Math.sqrt(Math.max(variance, 0)), 1.0);
}

export function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

export function levelFromZ(combinedZ: number, thresholds: ZThresholds = DEFAULT_Z_THRESHOLDS): CongestionLevel {
  if (combinedZ >= thresholds.high) return 'HIGH';
  if (combinedZ >= thresholds.moderate) return 'MODERATE';
  return 'LOW';
}

export interface ZScoreOptions {
  readonly minSamples?: number;
  readonly thresholds?: ZThresholds;
}

/** Compare a live sample with the cell's EMA baseline. */
export function scoreWithZ(
  sample: LiveSample,
  baseline: EmaBaseline | UncalibratedBaseline,
  options: ZScoreOptions = {},
): Verdict {
  const minSamples = options.minSamples ?? MIN_SAMPLES_ZSCORE;
  const base: VerdictEvidence = {
    sampleCount: baseline.sampleCount,
    currentCount: sample.count,
    currentAvgSpeed: sample.avgSpeed,
    ...(baseline.kind === 'ema'
      ? { baselineAvgSpeed: baseline.avgSpeed, baselineAvgCount: baseline.avgCount }
      : {}),
  };

  if (baseline.kind !== 'ema' || !isCalibrated(baseline.sampleCount, minSamples)) {
    return scoreFallback(sample, base);
  }

  const countZ = zScore(sample.count, baseline.avgCount, stdFromVariance(baseline.countVariance));

  if (sample.avgSpeed !== undefined && baseline.avgSpeed > 0) {
    const speedZ = zScore(
      sample.avgSpeed,
      baseline.avgSpeed,
      stdFromVariance(baseline.speedVariance),
      true,
    );
    const combinedZ = (countZ + speedZ) / 2;
    return {
      level: levelFromZ(combinedZ, options.thresholds),
      method: 'calibrated',
      reason: 'speed_and_count',
      evidence: { ...base, countZ: round2(countZ), speedZ: round2(speedZ), combinedZ: round2(combinedZ) },
    };
  }

  return {
    level: levelFromZ(countZ, options.thresholds),
    method: 'calibrated',
    reason: 'count_only',
    evidence: { ...base, countZ: round2(countZ), combinedZ: round2(countZ) },
  };
}
