// ─── PostgreSQL Adapters ───────────────────────────────────────────────────────
export { createPool, withTransaction, applySchema, numericColumn } from './postgres/pool.js';
export type { DbPool, DbClient, PgPoolConfig } from './postgres/pool.js';
export { PgBaselineRepository } from './postgres/baseline.repository.js';
export { PgBucketHistoryRepository } from './postgres/bucket-history.repository.js';

// ─── Redis Adapters ────────────────────────────────────────────────────────────
export { createRedisClient } from './redis/client.js';
export type { RedisClientConfig } from './redis/client.js';
export { RedisEphemeralStore } from './redis/redis-ephemeral-store.js';
export {
  RedisCongestionEventStream,
  CONGESTION_STREAM,
  DEFAULT_STREAM_MAXLEN,
  toStreamFields,
  fromStreamFields,
} from './redis/redis-event-stream.js';

// ─── In-memory Adapters ────────────────────────────────────────────────────────
export { InMemoryEphemeralStore } from './memory/in-memory-ephemeral-store.js';
export { InMemoryBaselineRepository } from './memory/in-memory-baseline.repository.js';
export { InMemoryBucketHistoryRepository } from './memory/in-memory-bucket-history.repository.js';

// ─── Spatial index ─────────────────────────────────────────────────────────────
export { H3CellIndexer, DEFAULT_H3_RESOLUTION } from './h3/h3-cell-indexer.js';

// ─── Clock / RNG ──────────────────────────────────────────────────────────────
export { DeterministicClock, SystemClock, SeededRng } from './clock/deterministic-clock.js';
