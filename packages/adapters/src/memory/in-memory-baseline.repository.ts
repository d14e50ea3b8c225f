import type {
  BaselineRepositoryPort,
  CellId,
  EmaBaseline,
  UncalibratedBaseline,
} from '@congestion/domain';
import { UNCALIBRATED } from '@congestion/domain';

/** Process-local EMA baselines; lost on restart. */
export class InMemoryBaselineRepository implements BaselineRepositoryPort {
  private readonly rows = new Map<CellId, EmaBaseline>();

  async getBaseline(cellId: CellId): Promise<EmaBaseline | UncalibratedBaseline> {
    return this.rows.get(cellId) ?? UNCALIBRATED;
  }

  async upsertBaseline(cellId: CellId, baseline: EmaBaseline): Promise<boolean> {
    this.rows.set(cellId, { ...baseline, updatedAt: new Date() });
    return true;
  }

  async updateBaseline(
    cellId: CellId,
    fold: (current: EmaBaseline | UncalibratedBaseline) => EmaBaseline,
  ): Promise<EmaBaseline | null> {
    const next = { ...fold(this.rows.get(cellId) ?? UNCALIBRATED), updatedAt: new Date() };
    this.rows.set(cellId, next);
    return next;
  }

  async isAvailable(): Promise<boolean> {
    return true;
  }
}
