import type {
  CellIndexerPort,
  ClockPort,
  CongestionEventPublisherPort,
  Ping,
  PingIngestionPort,
  PingIngestResult,
} from '@congestion/domain';
import { bucketOf } from '@congestion/domain';
import type { BaselineUpdater } from './baseline-updater.js';
import type { CongestionStrategy } from './congestion-strategy.js';
import type { LiveAggregator } from './live-aggregator.js';

export interface PingIngestionDeps {
  indexer: CellIndexerPort;
  aggregator: LiveAggregator;
  updater: BaselineUpdater;
  strategy: CongestionStrategy;
  publisher: CongestionEventPublisherPort;
  clock: ClockPort;
}

/**
 * Ping → (cell, bucket) → live aggregate → bucket rollover → verdict → events.
 * Store failures degrade the result; they never fail the ping.
 */
export class PingIngestionService implements PingIngestionPort {
  constructor(private readonly deps: PingIngestionDeps) {}

  async ingest(ping: Ping): Promise<PingIngestResult> {
    const { indexer, aggregator, updater, strategy, clock } = this.deps;
    const receivedAt = clock.now();
    const ts = ping.timestamp ?? receivedAt;
    const cellId = indexer.cellOf(ping.lat, ping.lon);
    const bucket = bucketOf(ts);

    const bucketCount = await aggregator.record(cellId, bucket, ping.deviceId, ping.speedKmh);
    await updater.onBucketObserved(cellId, bucket);

    const live = await aggregator.read(cellId, bucket);
    const verdict = await strategy.evaluate(
      cellId,
      { count: live.count, avgSpeed: live.avgSpeed },
      receivedAt,
    );

    await this.publishEvents(ping, { cellId, bucket, bucketCount, level: verdict.level }, {
      avgSpeed: live.avgSpeed,
      reason: verdict.reason,
      at: receivedAt,
    });

    return { deviceId: ping.deviceId, cellId, bucket, bucketCount, level: verdict.level };
  }

  private async publishEvents(
    ping: Ping,
    result: Omit<PingIngestResult, 'deviceId'>,
    context: { avgSpeed?: number; reason: string; at: Date },
  ): Promise<void> {
    const { publisher } = this.deps;
    try {
      await publisher.publishPingReceived({
        eventType: 'ping_received',
        deviceId: ping.deviceId,
        cellId: result.cellId,
        lat: ping.lat,
        lon: ping.lon,
        bucket: result.bucket,
        vehicleCount: result.bucketCount,
        speedKmh: ping.speedKmh,
        timestamp: context.at,
      });
      if (result.level === 'HIGH') {
        await publisher.publishHighCongestion({
          eventType: 'high_congestion',
          cellId: result.cellId,
          vehicleCount: result.bucketCount,
          avgSpeedKmh: context.avgSpeed,
          level: 'HIGH',
          reason: context.reason,
          lat: ping.lat,
          lon: ping.lon,
          timestamp: context.at,
        });
      }
    } catch (err) {
      console.warn('[ingestion] event publish failed', result.cellId, err instanceof Error ? err.message : err);
    }
  }
}
