import type { Redis } from 'ioredis';
import type {
  BaselineRepositoryPort,
  BucketHistoryRepositoryPort,
  CellIndexerPort,
  ClockPort,
  CongestionEventPublisherPort,
  CongestionEventReaderPort,
  CongestionQueryPort,
  EphemeralStorePort,
  PingIngestionPort,
} from '@congestion/domain';
import {
  applySchema,
  createPool,
  createRedisClient,
  H3CellIndexer,
  InMemoryBaselineRepository,
  InMemoryBucketHistoryRepository,
  InMemoryEphemeralStore,
  PgBaselineRepository,
  PgBucketHistoryRepository,
  RedisCongestionEventStream,
  RedisEphemeralStore,
  SystemClock,
} from '@congestion/adapters';
import type { DbPool } from '@congestion/adapters';
import type { AppConfig, StrategyName } from './config/app-config.js';
import { BaselineUpdater } from './services/congestion/baseline-updater.js';
import type { CongestionStrategy } from './services/congestion/congestion-strategy.js';
import { CongestionQueryService } from './services/congestion/congestion-query.service.js';
import { LiveAggregator } from './services/congestion/live-aggregator.js';
import { PercentileStrategy } from './services/congestion/percentile.strategy.js';
import { PingIngestionService } from './services/congestion/ping-ingestion.service.js';
import { ZScoreStrategy } from './services/congestion/zscore.strategy.js';
import { FanoutPublisher } from './services/events/fanout-publisher.js';

export interface HealthReport {
  status: 'ok' | 'degraded';
  ts: string;
  redis: 'connected' | 'unavailable';
  database: 'connected' | 'unavailable' | 'disabled';
  strategy: StrategyName;
}

export interface AppContext {
  ingestion: PingIngestionPort;
  query: CongestionQueryPort;
  /** Undefined when no durable event log is configured. */
  events?: CongestionEventReaderPort;
  /** Sinks may be added after construction (the WebSocket gateway needs the HTTP server). */
  publisher: FanoutPublisher;
  health(): Promise<HealthReport>;
  start(): Promise<void>;
  close(): Promise<void>;
}

export interface ContextDeps {
  store: EphemeralStorePort;
  strategy: CongestionStrategy;
  indexer: CellIndexerPort;
  clock: ClockPort;
  bucketTtlSeconds?: number;
  flushMarkerTtlSeconds?: number;
  /** Durable sinks published to on every ping. */
  sinks?: Array<{ name: string; publisher: CongestionEventPublisherPort }>;
  events?: CongestionEventReaderPort;
  /** Whether a database is configured at all; drives the `disabled` health state. */
  databaseEnabled?: boolean;
  start?: () => Promise<void>;
  close?: () => Promise<void>;
}

/** Wire services from already-built adapters. Tests call this directly. */
export function buildContext(deps: ContextDeps): AppContext {
  const aggregator = new LiveAggregator(deps.store, deps.bucketTtlSeconds);
  const updater = new BaselineUpdater(deps.store, aggregator, deps.strategy, deps.flushMarkerTtlSeconds);
  const publisher = new FanoutPublisher();
  for (const sink of deps.sinks ?? []) publisher.add(sink.name, sink.publisher);

  const ingestion = new PingIngestionService({
    indexer: deps.indexer,
    aggregator,
    updater,
    strategy: deps.strategy,
    publisher,
    clock: deps.clock,
  });
  const query = new CongestionQueryService({
    indexer: deps.indexer,
    aggregator,
    strategy: deps.strategy,
    clock: deps.clock,
  });

  return {
    ingestion,
    query,
    events: deps.events,
    publisher,
    async health() {
      const [redisUp, dbUp] = await Promise.all([deps.store.ping(), deps.strategy.isAvailable()]);
      const database = deps.databaseEnabled ? (dbUp ? 'connected' : 'unavailable') : 'disabled';
      return {
        status: redisUp && database !== 'unavailable' ? 'ok' : 'degraded',
        ts: deps.clock.now().toISOString(),
        redis: redisUp ? 'connected' : 'unavailable',
        database,
        strategy: deps.strategy.name,
      };
    },
    start: deps.start ?? (async () => undefined),
    close: deps.close ?? (async () => undefined),
  };
}

export function createStrategy(
  config: AppConfig,
  baselines: BaselineRepositoryPort,
  history: BucketHistoryRepositoryPort,
): CongestionStrategy {
  return config.scoring.strategy === 'percentile'
    ? new PercentileStrategy(history, { windowDays: config.scoring.percentileWindowDays })
    : new ZScoreStrategy(baselines, { alpha: config.scoring.emaAlpha });
}

/** Build the production context from configuration. */
export function createContext(config: AppConfig): AppContext {
  const clock = new SystemClock();

  let redis: Redis | undefined;
  let store: EphemeralStorePort;
  let stream: RedisCongestionEventStream | undefined;
  if (config.redis.mode === 'redis') {
    redis = createRedisClient({ url: config.redis.url, commandTimeoutMs: config.redis.commandTimeoutMs });
    store = new RedisEphemeralStore(redis);
    stream = new RedisCongestionEventStream(redis, { maxLen: config.redis.streamMaxLen });
  } else {
    console.warn('[server] EPHEMERAL_STORE=memory: live aggregates are process-local');
    store = new InMemoryEphemeralStore(clock);
  }

  let pool: DbPool | undefined;
  let baselines: BaselineRepositoryPort;
  let history: BucketHistoryRepositoryPort;
  if (config.database) {
    pool = createPool({ connectionString: config.database.url, max: config.database.poolMax });
    baselines = new PgBaselineRepository(pool);
    history = new PgBucketHistoryRepository(pool);
  } else {
    console.warn('[server] DATABASE_URL not set: baselines are kept in memory and lost on restart');
    baselines = new InMemoryBaselineRepository();
    history = new InMemoryBucketHistoryRepository();
  }

  const database = config.database;
  return buildContext({
    store,
    strategy: createStrategy(config, baselines, history),
    indexer: new H3CellIndexer(config.h3Resolution),
    clock,
    bucketTtlSeconds: config.bucketTtlSeconds,
    flushMarkerTtlSeconds: config.flushMarkerTtlSeconds,
    sinks: stream ? [{ name: 'redis-stream', publisher: stream }] : [],
    events: stream,
    databaseEnabled: database !== undefined,
    // Both dependencies are optional at startup; the service runs degraded until they come up.
    async start() {
      if (redis) {
        try {
          await redis.connect();
          console.log('[server] redis connected');
        } catch (err) {
          console.warn('[server] redis unavailable on startup', err instanceof Error ? err.message : err);
        }
      }
      if (pool && database) {
        try {
          await applySchema(pool, database.schemaPath);
          console.log('[server] database connected');
        } catch (err) {
          console.warn('[server] database unavailable on startup', err instanceof Error ? err.message : err);
        }
      }
    },
    async close() {
      if (redis) redis.disconnect();
      if (pool) await pool.end();
    },
  });
}
