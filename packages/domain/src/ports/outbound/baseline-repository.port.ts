import type { CellId } from '../../entities/cell.js';
import type { EmaBaseline, UncalibratedBaseline } from '../../entities/baseline.js';

/**
 * Durable EMA baselines, one row per cell. Implementations swallow and log
 * connectivity errors: reads degrade to UNCALIBRATED, writes to false/null.
 */
export interface BaselineRepositoryPort {
  getBaseline(cellId: CellId): Promise<EmaBaseline | UncalibratedBaseline>;
  upsertBaseline(cellId: CellId, baseline: EmaBaseline): Promise<boolean>;
  /**
   * Read-modify-write under the store's transaction semantics. Resolves to
   * the stored baseline, or null when the write was dropped.
   */
  updateBaseline(
    cellId: CellId,
    fold: (current: EmaBaseline | UncalibratedBaseline) => EmaBaseline,
  ): Promise<EmaBaseline | null>;
  isAvailable(): Promise<boolean>;
}
