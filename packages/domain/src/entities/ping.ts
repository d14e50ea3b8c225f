export interface Ping {
  readonly deviceId: string;
  readonly lat: number;
  readonly lon: number;
  /** Wall-clock time of the fix; the server clock is used when absent. */
  readonly timestamp?: Date;
  /** km/h */
  readonly speedKmh?: number;
}
