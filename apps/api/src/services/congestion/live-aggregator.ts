import type {
  CellId,
  EphemeralCommand,
  EphemeralStorePort,
  LiveAggregate,
  TimeBucket,
} from '@congestion/domain';
import { countKey, speedKey, WINDOW_SECONDS } from '@congestion/domain';

/**
 * Unique-device counts and speed samples per (cell, bucket). Keys expire on
 * their own; an expired or unreachable key reads as an empty bucket.
 */
export class LiveAggregator {
  constructor(
    private readonly store: EphemeralStorePort,
    private readonly ttlSeconds: number = WINDOW_SECONDS,
  ) {}

  /**
   * Record one ping in a single round trip. Resolves to the bucket's unique
   * device count, or 0 when the store could not be written.
   */
  async record(cellId: CellId, bucket: TimeBucket, deviceId: string, speedKmh?: number): Promise<number> {
    const devices = countKey(cellId, bucket);
    const speeds = speedKey(cellId, bucket);
    const commands: EphemeralCommand[] = [
      { op: 'addUnique', key: devices, member: deviceId },
      { op: 'expire', key: devices, ttlSeconds: this.ttlSeconds },
    ];
    if (speedKmh !== undefined) commands.push({ op: 'append', key: speeds, value: String(speedKmh) });
    // Speedless pings keep the samples alive too; EXPIRE on a missing key is a no-op.
    commands.push({ op: 'expire', key: speeds, ttlSeconds: this.ttlSeconds });

    try {
      const [count] = await this.store.batch(commands);
      return count ?? 0;
    } catch (err) {
      console.warn('[live-aggregator] record failed, ping not counted', devices, errorMessage(err));
      return 0;
    }
  }

  async read(cellId: CellId, bucket: TimeBucket): Promise<LiveAggregate> {
    try {
      const [count, rawSpeeds] = await Promise.all([
        this.store.count(countKey(cellId, bucket)),
        this.store.readAll(speedKey(cellId, bucket)),
      ]);
      const speeds = rawSpeeds.map(Number).filter(Number.isFinite);
      const avgSpeed =
        speeds.length > 0 ? speeds.reduce((sum, s) => sum + s, 0) / speeds.length : undefined;
      return { cellId, bucket, count, avgSpeed, speedSampleCount: speeds.length };
    } catch (err) {
      console.warn('[live-aggregator] read failed, reporting empty bucket', cellId, bucket, errorMessage(err));
      return { cellId, bucket, count: 0, speedSampleCount: 0 };
    }
  }
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
