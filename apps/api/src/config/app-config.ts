import { z } from 'zod';

const emptyAsUndefined = (v: unknown) => (typeof v === 'string' && v.trim() === '' ? undefined : v);

const envSchema = z.object({
  PORT: z.coerce.number().int().positive().default(3001),
  CORS_ORIGIN: z.string().default('*'),
  EPHEMERAL_STORE: z.enum(['redis', 'memory']).default('redis'),
  REDIS_URL: z.string().default('redis://127.0.0.1:6379'),
  REDIS_COMMAND_TIMEOUT_MS: z.coerce.number().int().positive().default(1_000),
  DATABASE_URL: z.preprocess(emptyAsUndefined, z.string().optional()),
  PG_POOL_MAX: z.coerce.number().int().positive().default(20),
  SCHEMA_PATH: z.string().default('db/postgres/schema.sql'),
  SCORING_STRATEGY: z.enum(['zscore', 'percentile']).default('zscore'),
  EMA_ALPHA: z.coerce.number().gt(0).lte(1).default(0.1),
  PERCENTILE_WINDOW_DAYS: z.coerce.number().positive().default(7),
  H3_RESOLUTION: z.coerce.number().int().min(0).max(15).default(8),
  BUCKET_TTL_SECONDS: z.coerce.number().int().positive().default(300),
  FLUSH_MARKER_TTL_SECONDS: z.coerce.number().int().positive().default(360),
  EVENT_STREAM_MAXLEN: z.coerce.number().int().positive().default(10_000),
});

export type StrategyName = 'zscore' | 'percentile';

export interface AppConfig {
  readonly port: number;
  readonly corsOrigin: string;
  readonly redis: {
    readonly mode: 'redis' | 'memory';
    readonly url: string;
    readonly commandTimeoutMs: number;
    readonly streamMaxLen: number;
  };
  /** Absent when baselines live in process memory. */
  readonly database?: {
    readonly url: string;
    readonly poolMax: number;
    readonly schemaPath: string;
  };
  readonly scoring: {
    readonly strategy: StrategyName;
    readonly emaAlpha: number;
    readonly percentileWindowDays: number;
  };
  readonly h3Resolution: number;
  readonly bucketTtlSeconds: number;
  readonly flushMarkerTtlSeconds: number;
}

/** Parse the process environment once at startup. Throws ZodError on bad values. */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const e = envSchema.parse(env);
  return Object.freeze({
    port: e.PORT,
    corsOrigin: e.CORS_ORIGIN,
    redis: {
      mode: e.EPHEMERAL_STORE,
      url: e.REDIS_URL,
      commandTimeoutMs: e.REDIS_COMMAND_TIMEOUT_MS,
      streamMaxLen: e.EVENT_STREAM_MAXLEN,
    },
    database: e.DATABASE_URL
      ? { url: e.DATABASE_URL, poolMax: e.PG_POOL_MAX, schemaPath: e.SCHEMA_PATH }
      : undefined,
    scoring: {
      strategy: e.SCORING_STRATEGY,
      emaAlpha: e.EMA_ALPHA,
      percentileWindowDays: e.PERCENTILE_WINDOW_DAYS,
    },
    h3Resolution: e.H3_RESOLUTION,
    bucketTtlSeconds: e.BUCKET_TTL_SECONDS,
    flushMarkerTtlSeconds: e.FLUSH_MARKER_TTL_SECONDS,
  });
}
