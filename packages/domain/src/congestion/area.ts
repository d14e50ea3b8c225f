import type { CongestionLevel } from '../entities/verdict.js';
import { FALLBACK_COUNT_HIGH, FALLBACK_COUNT_MODERATE } from './fallback.js';

export const AREA_HIGH_CELLS_FOR_HIGH = 3;

export interface AreaCellLevel {
  readonly count: number;
  readonly level: CongestionLevel;
}

export interface AreaSummary {
  readonly level: CongestionLevel;
  readonly totalVehicles: number;
  /** Rounded to one decimal. */
  readonly avgVehiclesPerCell: number;
  readonly highCongestionCells: number;
}

/**
 * Roll per-cell verdicts up to a neighbourhood. The area is HIGH when its
 * average is high or several cells are HIGH, MODERATE when the average is
 * moderate or any single cell is HIGH.
 */
export function summarizeArea(cells: readonly AreaCellLevel[]): AreaSummary {
  const totalVehicles = cells.reduce((sum, c) => sum + c.count, 0);
  const avg = cells.length > 0 ? totalVehicles / cells.length : 0;
  const highCongestionCells = cells.filter((c) => c.level === 'HIGH').length;

  let level: CongestionLevel = 'LOW';
  if (avg >= FALLBACK_COUNT_HIGH || highCongestionCells >= AREA_HIGH_CELLS_FOR_HIGH) {
    level = 'HIGH';
  } else if (avg >= FALLBACK_COUNT_MODERATE || highCongestionCells >= 1) {
    level = 'MODERATE';
  }

  return {
    level,
    totalVehicles,
    avgVehiclesPerCell: Math.round(avg * 10) / 10,
    highCongestionCells,
  };
}
