import type { CellId, LatLng } from '../../entities/cell.js';

/** Deterministic spatial discretisation. */
export interface CellIndexerPort {
  cellOf(lat: number, lon: number): CellId;
  /** The cell itself plus every cell within `k` hops. */
  neighbors(cellId: CellId, k: number): CellId[];
  centerOf(cellId: CellId): LatLng;
}
