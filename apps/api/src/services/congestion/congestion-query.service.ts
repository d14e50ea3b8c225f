import type {
  AreaCell,
  AreaCongestion,
  BaselineReport,
  CellCongestion,
  CellId,
  CellIndexerPort,
  ClockPort,
  CongestionQueryPort,
} from '@congestion/domain';
import { bucketOf, summarizeArea, WINDOW_SECONDS } from '@congestion/domain';
import type { CongestionStrategy } from './congestion-strategy.js';
import type { LiveAggregator } from './live-aggregator.js';

export interface CongestionQueryDeps {
  indexer: CellIndexerPort;
  aggregator: LiveAggregator;
  strategy: CongestionStrategy;
  clock: ClockPort;
}

export class CongestionQueryService implements CongestionQueryPort {
  constructor(private readonly deps: CongestionQueryDeps) {}

  async cellCongestion(lat: number, lon: number): Promise<CellCongestion> {
    const cellId = this.deps.indexer.cellOf(lat, lon);
    return this.scoreCell(cellId, this.deps.clock.now());
  }

  /** Current verdict for every cell within `radius` hops, most crowded first. */
  async areaCongestion(lat: number, lon: number, radius: number): Promise<AreaCongestion> {
    const { indexer, clock } = this.deps;
    const now = clock.now();
    const centerCell = indexer.cellOf(lat, lon);
    const cellIds = indexer.neighbors(centerCell, radius);

    const scored = await Promise.all(cellIds.map((cellId) => this.scoreCell(cellId, now)));
    const cells: AreaCell[] = scored
      .map((c) => ({
        cellId: c.cellId,
        count: c.vehicleCount,
        avgSpeedKmh: c.avgSpeedKmh,
        level: c.level,
        isCenter: c.cellId === centerCell,
      }))
      .sort((a, b) => b.count - a.count);

    const summary = summarizeArea(cells);
    return {
      centerCell,
      radius,
      totalCells: cellIds.length,
      areaLevel: summary.level,
      totalVehicles: summary.totalVehicles,
      avgVehiclesPerCell: summary.avgVehiclesPerCell,
      highCongestionCells: summary.highCongestionCells,
      cells,
      windowSeconds: WINDOW_SECONDS,
    };
  }

  async baseline(lat: number, lon: number): Promise<BaselineReport> {
    const cellId = this.deps.indexer.cellOf(lat, lon);
    return this.deps.strategy.report(cellId, this.deps.clock.now());
  }

  private async scoreCell(cellId: CellId, now: Date): Promise<CellCongestion> {
    const { aggregator, strategy } = this.deps;
    const bucket = bucketOf(now);
    const live = await aggregator.read(cellId, bucket);
    const verdict = await strategy.evaluate(cellId, { count: live.count, avgSpeed: live.avgSpeed }, now);
    return {
      cellId,
      bucket,
      vehicleCount: live.count,
      avgSpeedKmh: live.avgSpeed,
      level: verdict.level,
      calibrated: verdict.method !== 'fallback',
      windowSeconds: WINDOW_SECONDS,
      verdict,
    };
  }
}
