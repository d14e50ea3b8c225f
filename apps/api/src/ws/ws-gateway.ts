import { WebSocketServer, WebSocket } from 'ws';
import type { Server } from 'http';
import type {
  CongestionEventPublisherPort,
  HighCongestionEvent,
  PingReceivedEvent,
} from '@congestion/domain';

type WsMessage =
  | { type: 'ping'; data: PingReceivedEvent }
  | { type: 'highCongestion'; data: HighCongestionEvent };

/** Pushes congestion events to every open dashboard socket on /ws. */
export class WsGateway implements CongestionEventPublisherPort {
  private readonly wss: WebSocketServer;
  private readonly clients = new Set<WebSocket>();

  constructor(server: Server) {
    this.wss = new WebSocketServer({ server, path: '/ws' });

    this.wss.on('connection', (ws) => {
      this.clients.add(ws);
      ws.on('close', () => this.clients.delete(ws));
      ws.on('error', () => this.clients.delete(ws));
    });

    console.log('[ws-gateway] listening on /ws');
  }

  get connections(): number {
    return this.clients.size;
  }

  private broadcast(msg: WsMessage): void {
    const payload = JSON.stringify(msg);
    for (const client of this.clients) {
      if (client.readyState === WebSocket.OPEN) {
        client.send(payload);
      }
    }
  }

  async publishPingReceived(event: PingReceivedEvent): Promise<void> {
    this.broadcast({ type: 'ping', data: event });
  }

  async publishHighCongestion(event: HighCongestionEvent): Promise<void> {
    this.broadcast({ type: 'highCongestion', data: event });
  }

  close(): Promise<void> {
    for (const client of this.clients) client.terminate();
    this.clients.clear();
    return new Promise((resolve, reject) => {
      this.wss.close((err) => (err ? reject(err) : resolve()));
    });
  }
}
