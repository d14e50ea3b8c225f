import type { CellId, TimeBucket } from '../../entities/cell.js';
import type { Ping } from '../../entities/ping.js';
import type { CongestionLevel } from '../../entities/verdict.js';

export interface PingIngestResult {
  deviceId: string;
  cellId: CellId;
  bucket: TimeBucket;
  /** Unique devices in the bucket after this ping; 0 when the store was unreachable. */
  bucketCount: number;
  level: CongestionLevel;
}

export interface PingIngestionPort {
  ingest(ping: Ping): Promise<PingIngestResult>;
}
