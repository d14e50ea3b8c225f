import type { CellId, TimeBucket } from '../../entities/cell.js';
import type { CongestionLevel, Verdict } from '../../entities/verdict.js';

export interface CellCongestion {
  cellId: CellId;
  bucket: TimeBucket;
  vehicleCount: number;
  avgSpeedKmh?: number;
  level: CongestionLevel;
  calibrated: boolean;
  windowSeconds: number;
  verdict: Verdict;
}

export interface AreaCell {
  cellId: CellId;
  count: number;
  avgSpeedKmh?: number;
  level: CongestionLevel;
  isCenter: boolean;
}

export interface AreaCongestion {
  centerCell: CellId;
  radius: number;
  totalCells: number;
  areaLevel: CongestionLevel;
  totalVehicles: number;
  avgVehiclesPerCell: number;
  highCongestionCells: number;
  cells: AreaCell[];
  windowSeconds: number;
}

export type BaselineStatistics =
  | {
      kind: 'ema';
      avgSpeedKmh: number;
      avgCount: number;
      speedStd: number;
      countStd: number;
    }
  | {
      kind: 'percentile';
      speedP25?: number;
      speedP50?: number;
      countP75?: number;
    }
  | { kind: 'uncalibrated' };

export interface BaselineReport {
  cellId: CellId;
  strategy: 'zscore' | 'percentile';
  sampleCount: number;
  calibrated: boolean;
  minSamplesRequired: number;
  statistics: BaselineStatistics;
}

export interface CongestionQueryPort {
  cellCongestion(lat: number, lon: number): Promise<CellCongestion>;
  areaCongestion(lat: number, lon: number, radius: number): Promise<AreaCongestion>;
  baseline(lat: number, lon: number): Promise<BaselineReport>;
}
