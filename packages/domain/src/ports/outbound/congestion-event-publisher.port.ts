import type {
  HighCongestionEvent,
  PingReceivedEvent,
  StoredCongestionEvent,
} from '../../entities/congestion-event.js';

export interface CongestionEventPublisherPort {
  publishPingReceived(event: PingReceivedEvent): Promise<void>;
  publishHighCongestion(event: HighCongestionEvent): Promise<void>;
}

export interface CongestionEventReaderPort {
  /** Events strictly after `lastId` ('0' for the beginning of the stream). */
  readEvents(lastId: string, count: number): Promise<StoredCongestionEvent[]>;
}
