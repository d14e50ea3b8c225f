import type { Redis } from 'ioredis';
import type {
  CongestionEvent,
  CongestionEventPublisherPort,
  CongestionEventReaderPort,
  CongestionEventType,
  HighCongestionEvent,
  PingReceivedEvent,
  StoredCongestionEvent,
} from '@congestion/domain';

export const CONGESTION_STREAM = 'congestion:events';
export const DEFAULT_STREAM_MAXLEN = 10_000;

export interface RedisEventStreamOptions {
  stream?: string;
  /** Approximate cap on retained entries (XADD MAXLEN ~). */
  maxLen?: number;
}

/**
 * Redis Streams log of congestion events. Every field is written as a string;
 * optional fields are omitted rather than sent empty.
 */
export class RedisCongestionEventStream
  implements CongestionEventPublisherPort, CongestionEventReaderPort
{
  private readonly stream: string;
  private readonly maxLen: number;

  constructor(
    private readonly client: Redis,
    options: RedisEventStreamOptions = {},
  ) {
    this.stream = options.stream ?? CONGESTION_STREAM;
    this.maxLen = options.maxLen ?? DEFAULT_STREAM_MAXLEN;
  }

  async publishPingReceived(event: PingReceivedEvent): Promise<void> {
    await this.append(event);
  }

  async publishHighCongestion(event: HighCongestionEvent): Promise<void> {
    await this.append(event);
  }

  async readEvents(lastId: string, count: number): Promise<StoredCongestionEvent[]> {
    const result = await this.client.xread('COUNT', count, 'STREAMS', this.stream, lastId);
    if (!result) return [];
    const entries = result[0]?.[1] ?? [];
    return entries.map(([id, flat]) => fromStreamFields(id, flat));
  }

  private async append(event: CongestionEvent): Promise<void> {
    await this.client.xadd(this.stream, 'MAXLEN', '~', this.maxLen, '*', ...toStreamFields(event));
  }
}

/** Flatten an event into XADD field/value pairs. */
export function toStreamFields(event: CongestionEvent): string[] {
  const fields: Record<string, string> =
    event.eventType === 'ping_received'
      ? {
          event_type: event.eventType,
          device_id: event.deviceId,
          cell_id: event.cellId,
          lat: String(event.lat),
          lon: String(event.lon),
          bucket: String(event.bucket),
          vehicle_count: String(event.vehicleCount),
          ...(event.speedKmh !== undefined ? { speed_kmh: String(event.speedKmh) } : {}),
          timestamp: event.timestamp.toISOString(),
        }
      : {
          event_type: event.eventType,
          cell_id: event.cellId,
          vehicle_count: String(event.vehicleCount),
          ...(event.avgSpeedKmh !== undefined ? { avg_speed_kmh: String(event.avgSpeedKmh) } : {}),
          level: event.level,
          reason: event.reason,
          lat: String(event.lat),
          lon: String(event.lon),
          timestamp: event.timestamp.toISOString(),
        };
  return Object.entries(fields).flat();
}

export function fromStreamFields(id: string, flat: readonly string[]): StoredCongestionEvent {
  const fields: Record<string, string> = {};
  for (let i = 0; i + 1 < flat.length; i += 2) {
    const key = flat[i];
    const value = flat[i + 1];
    if (key !== undefined && value !== undefined) fields[key] = value;
  }
  return { id, eventType: parseEventType(fields['event_type']), fields };
}

function parseEventType(raw: string | undefined): CongestionEventType {
  return raw === 'high_congestion' ? 'high_congestion' : 'ping_received';
}
