export type CongestionLevel = 'LOW' | 'MODERATE' | 'HIGH';

export type ScoringMethod = 'fallback' | 'calibrated' | 'percentile';

export type VerdictReason =
  | 'insufficient_history'
  | 'speed_and_count'
  | 'count_only'
  | 'speed_percentile'
  | 'high_count_despite_good_speed';

/** Numbers behind a verdict. Z-scores are rounded to two decimals. */
export interface VerdictEvidence {
  readonly sampleCount: number;
  readonly currentCount: number;
  readonly currentAvgSpeed?: number;
  readonly baselineAvgSpeed?: number;
  readonly baselineAvgCount?: number;
  readonly countZ?: number;
  readonly speedZ?: number;
  readonly combinedZ?: number;
  readonly speedP25?: number;
  readonly speedP50?: number;
  readonly countP75?: number;
}

export interface Verdict {
  readonly level: CongestionLevel;
  readonly method: ScoringMethod;
  readonly reason: VerdictReason;
  readonly evidence: VerdictEvidence;
}
