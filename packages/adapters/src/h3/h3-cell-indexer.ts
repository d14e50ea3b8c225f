import { cellToLatLng, gridDisk, latLngToCell } from 'h3-js';
import type { CellId, CellIndexerPort, LatLng } from '@congestion/domain';

/**
 * H3 hexagonal grid.
 *   7 ≈ 1.2 km edge
 *   8 ≈ 460 m edge (city traffic)
 *   9 ≈ 174 m edge
 */
export const DEFAULT_H3_RESOLUTION = 8;

export class H3CellIndexer implements CellIndexerPort {
  constructor(private readonly resolution: number = DEFAULT_H3_RESOLUTION) {}

  cellOf(lat: number, lon: number): CellId {
    return latLngToCell(lat, lon, this.resolution);
  }

  neighbors(cellId: CellId, k: number): CellId[] {
    return gridDisk(cellId, k);
  }

  centerOf(cellId: CellId): LatLng {
    const coords = cellToLatLng(cellId);
    return { lat: coords[0] ?? 0, lon: coords[1] ?? 0 };
  }
}
