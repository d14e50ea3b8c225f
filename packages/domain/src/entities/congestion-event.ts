import type { CellId, TimeBucket } from './cell.js';
import type { CongestionLevel } from './verdict.js';

export type CongestionEventType = 'ping_received' | 'high_congestion';

export interface PingReceivedEvent {
  readonly eventType: 'ping_received';
  readonly deviceId: string;
  readonly cellId: CellId;
  readonly lat: number;
  readonly lon: number;
  readonly bucket: TimeBucket;
  readonly vehicleCount: number;
  readonly speedKmh?: number;
  readonly timestamp: Date;
}

export interface HighCongestionEvent {
  readonly eventType: 'high_congestion';
  readonly cellId: CellId;
  readonly vehicleCount: number;
  readonly avgSpeedKmh?: number;
  readonly level: Extract<CongestionLevel, 'HIGH'>;
  readonly reason: string;
  readonly lat: number;
  readonly lon: number;
  readonly timestamp: Date;
}

export type CongestionEvent = PingReceivedEvent | HighCongestionEvent;

/** An event as read back from the stream, fields flattened to strings. */
export interface StoredCongestionEvent {
  readonly id: string;
  readonly eventType: CongestionEventType;
  readonly fields: Record<string, string>;
}
