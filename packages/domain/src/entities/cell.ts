/** Opaque spatial region key produced by the cell indexer. */
export type CellId = string;

/** `floor(epochSeconds / WINDOW_SECONDS)` */
export type TimeBucket = number;

export interface LatLng {
  readonly lat: number;
  readonly lon: number;
}
