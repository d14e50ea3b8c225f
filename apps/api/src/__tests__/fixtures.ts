import type {
  CellId,
  CellIndexerPort,
  CongestionEventPublisherPort,
  EphemeralStorePort,
  HighCongestionEvent,
  LatLng,
  PingReceivedEvent,
} from '@congestion/domain';
import {
  DeterministicClock,
  InMemoryBaselineRepository,
  InMemoryBucketHistoryRepository,
  InMemoryEphemeralStore,
} from '@congestion/adapters';
import { buildContext } from '../context.js';
import { PercentileStrategy } from '../services/congestion/percentile.strategy.js';
import { ZScoreStrategy } from '../services/congestion/zscore.strategy.js';

/** 2024-01-01T12:00:00Z, the start of a bucket. */
export const T0 = Date.UTC(2024, 0, 1, 12, 0, 0);
export const BUCKET_MS = 300_000;

/**
 * Square grid of `step`-degree cells named `row:col`. Predictable neighbours
 * without a real spatial index.
 */
export class GridIndexer implements CellIndexerPort {
  constructor(private readonly step = 0.01) {}

  cellOf(lat: number, lon: number): CellId {
    return `${Math.floor(lat / this.step)}:${Math.floor(lon / this.step)}`;
  }

  neighbors(cellId: CellId, k: number): CellId[] {
    const [row, col] = parseCell(cellId);
    const cells: CellId[] = [];
    for (let dr = -k; dr <= k; dr++) {
      for (let dc = -k; dc <= k; dc++) cells.push(`${row + dr}:${col + dc}`);
    }
    return cells;
  }

  centerOf(cellId: CellId): LatLng {
    const [row, col] = parseCell(cellId);
    return { lat: (row + 0.5) * this.step, lon: (col + 0.5) * this.step };
  }
}

function parseCell(cellId: CellId): [number, number] {
  const [row = '0', col = '0'] = cellId.split(':');
  return [Number(row), Number(col)];
}

export class RecordingPublisher implements CongestionEventPublisherPort {
  readonly pings: PingReceivedEvent[] = [];
  readonly highs: HighCongestionEvent[] = [];

  async publishPingReceived(event: PingReceivedEvent): Promise<void> {
    this.pings.push(event);
  }

  async publishHighCongestion(event: HighCongestionEvent): Promise<void> {
    this.highs.push(event);
  }
}

/** An ephemeral store that is down. */
export class UnreachableStore implements EphemeralStorePort {
  private fail(): Promise<never> {
    return Promise.reject(new Error('connect ECONNREFUSED 127.0.0.1:6379'));
  }
  addUnique(): Promise<number> { return this.fail(); }
  count(): Promise<number> { return this.fail(); }
  append(): Promise<void> { return this.fail(); }
  readAll(): Promise<string[]> { return this.fail(); }
  expire(): Promise<void> { return this.fail(); }
  exists(): Promise<boolean> { return this.fail(); }
  setIfAbsent(): Promise<boolean> { return this.fail(); }
  batch(): Promise<Array<number | null>> { return this.fail(); }
  async ping(): Promise<boolean> { return false; }
}

export interface TestContextOptions {
  strategy?: 'zscore' | 'percentile';
  store?: EphemeralStorePort;
  now?: number;
}

/** Fully in-process wiring on a manual clock. */
export function testContext(options: TestContextOptions = {}) {
  const clock = new DeterministicClock(options.now ?? T0);
  const store = options.store ?? new InMemoryEphemeralStore(clock);
  const baselines = new InMemoryBaselineRepository();
  const history = new InMemoryBucketHistoryRepository();
  const strategy =
    options.strategy === 'percentile' ? new PercentileStrategy(history) : new ZScoreStrategy(baselines);
  const publisher = new RecordingPublisher();
  const ctx = buildContext({
    store,
    strategy,
    indexer: new GridIndexer(),
    clock,
    sinks: [{ name: 'recording', publisher }],
  });
  return { ctx, clock, store, baselines, history, strategy, publisher };
}
