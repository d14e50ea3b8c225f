import type {
  BaselineReport,
  BucketHistoryRepositoryPort,
  CellId,
  ClosedBucket,
  LiveSample,
  PercentileBaseline,
  UncalibratedBaseline,
  Verdict,
} from '@congestion/domain';
import {
  bucketStart,
  isCalibrated,
  MIN_SAMPLES_PERCENTILE,
  scoreWithPercentiles,
  timeParts,
  UNCALIBRATED,
} from '@congestion/domain';
import type { CongestionStrategy } from './congestion-strategy.js';

export const DEFAULT_PERCENTILE_WINDOW_DAYS = 7;

export interface PercentileStrategyOptions {
  windowDays?: number;
  minSamples?: number;
}

/** Append-only bucket history, scored against trailing-window percentiles. */
export class PercentileStrategy implements CongestionStrategy {
  readonly name = 'percentile' as const;
  readonly minSamples: number;
  private readonly windowDays: number;

  constructor(
    private readonly history: BucketHistoryRepositoryPort,
    options: PercentileStrategyOptions = {},
  ) {
    this.windowDays = options.windowDays ?? DEFAULT_PERCENTILE_WINDOW_DAYS;
    this.minSamples = options.minSamples ?? MIN_SAMPLES_PERCENTILE;
  }

  async evaluate(cellId: CellId, sample: LiveSample, now: Date): Promise<Verdict> {
    const percentiles = await this.load(cellId, now);
    return scoreWithPercentiles(sample, percentiles, { minSamples: this.minSamples });
  }

  async report(cellId: CellId, now: Date): Promise<BaselineReport> {
    const percentiles = await this.load(cellId, now);
    return {
      cellId,
      strategy: this.name,
      sampleCount: percentiles.sampleCount,
      calibrated: isCalibrated(percentiles.sampleCount, this.minSamples),
      minSamplesRequired: this.minSamples,
      statistics:
        percentiles.kind === 'percentile'
          ? {
              kind: 'percentile',
              speedP25: percentiles.speedP25,
              speedP50: percentiles.speedP50,
              countP75: percentiles.countP75,
            }
          : { kind: 'uncalibrated' },
    };
  }

  async fold(closed: ClosedBucket): Promise<boolean> {
    const bucketTime = bucketStart(closed.bucket);
    return this.history.appendHistoryRow({
      cellId: closed.cellId,
      bucketTime,
      vehicleCount: closed.count,
      avgSpeed: closed.avgSpeed,
      ...timeParts(bucketTime),
    });
  }

  async isAvailable(): Promise<boolean> {
    return this.history.isAvailable();
  }

  private async load(cellId: CellId, now: Date): Promise<PercentileBaseline | UncalibratedBaseline> {
    try {
      return await this.history.queryPercentiles(cellId, { days: this.windowDays, now });
    } catch (err) {
      console.warn('[percentile-strategy] history unreadable, scoring as uncalibrated', cellId, err);
      return UNCALIBRATED;
    }
  }
}
