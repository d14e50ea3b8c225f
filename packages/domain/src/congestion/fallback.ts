import type { LiveSample } from '../entities/live-aggregate.js';
import type { CongestionLevel, Verdict, VerdictEvidence } from '../entities/verdict.js';

// Absolute-threshold policy for cells without enough history.
export const FALLBACK_SPEED_HIGH = 15;
export const FALLBACK_SPEED_MODERATE = 40;
export const FALLBACK_COUNT_HIGH = 30;
export const FALLBACK_COUNT_MODERATE = 10;

/**
 * Fixed-threshold classification. Speed dominates when present; a crowded
 * cell with good speed is still MODERATE.
 */
export function fallbackLevel(count: number, avgSpeed?: number): CongestionLevel {
  if (avgSpeed !== undefined) {
    if (avgSpeed < FALLBACK_SPEED_HIGH) return 'HIGH';
    if (avgSpeed < FALLBACK_SPEED_MODERATE) return 'MODERATE';
    if (count >= FALLBACK_COUNT_HIGH) return 'MODERATE';
    return 'LOW';
  }

  if (count >= FALLBACK_COUNT_HIGH) return 'HIGH';
  if (count >= FALLBACK_COUNT_MODERATE) return 'MODERATE';
  return 'LOW';
}

export function scoreFallback(sample: LiveSample, evidence: VerdictEvidence): Verdict {
  return {
    level: fallbackLevel(sample.count, sample.avgSpeed),
    method: 'fallback',
    reason: 'insufficient_history',
    evidence,
  };
}
