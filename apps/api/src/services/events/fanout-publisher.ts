import type {
  CongestionEventPublisherPort,
  HighCongestionEvent,
  PingReceivedEvent,
} from '@congestion/domain';

/** Delivers each event to every sink; a failing sink is logged and skipped. */
export class FanoutPublisher implements CongestionEventPublisherPort {
  private readonly sinks: Array<{ name: string; publisher: CongestionEventPublisherPort }> = [];

  add(name: string, publisher: CongestionEventPublisherPort): this {
    this.sinks.push({ name, publisher });
    return this;
  }

  get size(): number {
    return this.sinks.length;
  }

  async publishPingReceived(event: PingReceivedEvent): Promise<void> {
    await this.deliver((p) => p.publishPingReceived(event));
  }

  async publishHighCongestion(event: HighCongestionEvent): Promise<void> {
    await this.deliver((p) => p.publishHighCongestion(event));
  }

  private async deliver(send: (p: CongestionEventPublisherPort) => Promise<void>): Promise<void> {
    const results = await Promise.allSettled(this.sinks.map((s) => send(s.publisher)));
    results.forEach((result, i) => {
      if (result.status === 'rejected') {
        const reason: unknown = result.reason;
        console.warn(`[events] ${this.sinks[i]?.name ?? 'sink'} publish failed`, reason instanceof Error ? reason.message : reason);
      }
    });
  }
}
