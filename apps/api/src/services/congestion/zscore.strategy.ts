import type {
  BaselineReport,
  BaselineRepositoryPort,
  CellId,
  ClosedBucket,
  EmaBaseline,
  LiveSample,
  UncalibratedBaseline,
  Verdict,
  ZThresholds,
} from '@congestion/domain';
import {
  DEFAULT_EMA_ALPHA,
  DEFAULT_Z_THRESHOLDS,
  foldEma,
  isCalibrated,
  MIN_SAMPLES_ZSCORE,
  round2,
  scoreWithZ,
  stdFromVariance,
  UNCALIBRATED,
} from '@congestion/domain';
import type { CongestionStrategy } from './congestion-strategy.js';

export interface ZScoreStrategyOptions {
  alpha?: number;
  minSamples?: number;
  thresholds?: ZThresholds;
}

/** EMA mean/variance per cell, scored by combined z-score. */
export class ZScoreStrategy implements CongestionStrategy {
  readonly name = 'zscore' as const;
  readonly minSamples: number;
  private readonly alpha: number;
  private readonly thresholds: ZThresholds;

  constructor(
    private readonly baselines: BaselineRepositoryPort,
    options: ZScoreStrategyOptions = {},
  ) {
    this.alpha = options.alpha ?? DEFAULT_EMA_ALPHA;
    this.minSamples = options.minSamples ?? MIN_SAMPLES_ZSCORE;
    this.thresholds = options.thresholds ?? DEFAULT_Z_THRESHOLDS;
  }

  async evaluate(cellId: CellId, sample: LiveSample): Promise<Verdict> {
    const baseline = await this.load(cellId);
    return scoreWithZ(sample, baseline, { minSamples: this.minSamples, thresholds: this.thresholds });
  }

  async report(cellId: CellId): Promise<BaselineReport> {
    const baseline = await this.load(cellId);
    return {
      cellId,
      strategy: this.name,
      sampleCount: baseline.sampleCount,
      calibrated: isCalibrated(baseline.sampleCount, this.minSamples),
      minSamplesRequired: this.minSamples,
      statistics:
        baseline.kind === 'ema'
          ? {
              kind: 'ema',
              avgSpeedKmh: round2(baseline.avgSpeed),
              avgCount: round2(baseline.avgCount),
              speedStd: round2(stdFromVariance(baseline.speedVariance)),
              countStd: round2(stdFromVariance(baseline.countVariance)),
            }
          : { kind: 'uncalibrated' },
    };
  }

  async fold(closed: ClosedBucket): Promise<boolean> {
    const saved = await this.baselines.updateBaseline(closed.cellId, (current) =>
      foldEma(current, closed, this.alpha),
    );
    return saved !== null;
  }

  async isAvailable(): Promise<boolean> {
    return this.baselines.isAvailable();
  }

  private async load(cellId: CellId): Promise<EmaBaseline | UncalibratedBaseline> {
    try {
      return await this.baselines.getBaseline(cellId);
    } catch (err) {
      console.warn('[zscore-strategy] baseline unreadable, scoring as uncalibrated', cellId, err);
      return UNCALIBRATED;
    }
  }
}
