import type {
  BaselineReport,
  CellId,
  ClosedBucket,
  LiveSample,
  Verdict,
} from '@congestion/domain';
import type { StrategyName } from '../../config/app-config.js';

/**
 * One statistical representation end to end: how a cell's baseline is read,
 * how a live sample is scored against it, and how a closed bucket is folded
 * back in. Exactly one strategy is active per deployment.
 */
export interface CongestionStrategy {
  readonly name: StrategyName;
  readonly minSamples: number;
  /** Never rejects; an unreadable baseline scores as uncalibrated. */
  evaluate(cellId: CellId, sample: LiveSample, now: Date): Promise<Verdict>;
  report(cellId: CellId, now: Date): Promise<BaselineReport>;
  /** Persist a closed bucket. False when the durable write was dropped. */
  fold(closed: ClosedBucket): Promise<boolean>;
  isAvailable(): Promise<boolean>;
}
