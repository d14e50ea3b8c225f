import { readFileSync } from 'fs';
import pg from 'pg';

const { Pool } = pg;

export type DbPool = pg.Pool;
export type DbClient = pg.PoolClient;

export interface PgPoolConfig {
  connectionString: string;
  max?: number;
  applicationName?: string;
}

export function createPool(config: PgPoolConfig): pg.Pool {
  const pool = new Pool({
    connectionString: config.connectionString,
    max: config.max ?? 20,
    idleTimeoutMillis: 30_000,
    connectionTimeoutMillis: 5_000,
    application_name: config.applicationName ?? 'congestion-api',
  });
  pool.on('error', (err) => {
    console.error('[pg-pool] unexpected error on idle client', err);
  });
  return pool;
}

/** Run a callback inside a transaction; rolls back on error. */
export async function withTransaction<T>(
  pool: DbPool,
  fn: (client: DbClient) => Promise<T>,
): Promise<T> {
  const client = await pool.connect();
  try {
    await client.query('BEGIN');
    const result = await fn(client);
    await client.query('COMMIT');
    return result;
  } catch (err) {
    await client.query('ROLLBACK');
    throw err;
  } finally {
    client.release();
  }
}

/**
 * Execute a DDL file in one simple-protocol query. The file must be
 * idempotent (IF NOT EXISTS everywhere).
 */
export async function applySchema(pool: DbPool, schemaPath: string): Promise<void> {
  const ddl = readFileSync(schemaPath, 'utf-8');
  await pool.query(ddl);
  console.log(`[pg-pool] schema applied from ${schemaPath}`);
}

/** Coerce a NUMERIC/BIGINT/DOUBLE column to a number; null stays undefined. */
export function numericColumn(value: unknown): number | undefined {
  if (value === null || value === undefined) return undefined;
  const n = typeof value === 'number' ? value : Number(value);
  return Number.isFinite(n) ? n : undefined;
}
