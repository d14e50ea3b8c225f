import { Redis } from 'ioredis';

export interface RedisClientConfig {
  url: string;
  /** Per-command timeout; store calls never block indefinitely. */
  commandTimeoutMs?: number;
}

export function createRedisClient(config: RedisClientConfig): Redis {
  const client = new Redis(config.url, {
    maxRetriesPerRequest: 1,
    commandTimeout: config.commandTimeoutMs ?? 1_000,
    enableOfflineQueue: false,
    lazyConnect: true,
    retryStrategy: (times) => Math.min(times * 200, 5_000),
  });
  client.on('error', (err) => {
    console.error('[redis] connection error', err.message);
  });
  return client;
}
