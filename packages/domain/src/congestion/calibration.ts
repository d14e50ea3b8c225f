import type { BaselineSnapshot } from '../entities/baseline.js';

/** History required before the z-score strategy trusts its EMA baseline. */
export const MIN_SAMPLES_ZSCORE = 50;

/** History rows required before the percentile strategy trusts its order statistics. */
export const MIN_SAMPLES_PERCENTILE = 20;

export type CalibrationState = 'calibrated' | 'fallback';

export function isCalibrated(sampleCount: number, minSamples: number): boolean {
  return sampleCount >= minSamples;
}

export function calibrationState(baseline: BaselineSnapshot, minSamples: number): CalibrationState {
  return isCalibrated(baseline.sampleCount, minSamples) ? 'calibrated' : 'fallback';
}
