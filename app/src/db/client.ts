import pg from 'pg';
import type { LogFn } from '../middleware/logger.js';

const { Pool } = pg;

export type DbPool = pg.Pool;

export interface DbClientOptions {
  readonly connectionString: string;
  readonly maxConnections?: number;
  /** Bounds every statement; a stuck query fails instead of holding a review open. */
  readonly statementTimeoutMs?: number;
  readonly log?: LogFn;
}

export const POOL_DEFAULTS = {
  min: 1,
  max: 10,
  idleTimeoutMillis: 30_000,
  connectionTimeoutMillis: 5_000,
  statementTimeoutMs: 10_000,
} as const;

/** Pool for the `claims` and `approval_requests` tables. */
export function createDbPool(opts: DbClientOptions): DbPool {
  const pool = new Pool({
    connectionString: opts.connectionString,
    min: POOL_DEFAULTS.min,
    max: opts.maxConnections ?? POOL_DEFAULTS.max,
    idleTimeoutMillis: POOL_DEFAULTS.idleTimeoutMillis,
    connectionTimeoutMillis: POOL_DEFAULTS.connectionTimeoutMillis,
    statement_timeout: opts.statementTimeoutMs ?? POOL_DEFAULTS.statementTimeoutMs,
  });

  // An idle client losing its connection; the pool replaces it.
  pool.on('error', (err) => {
    opts.log?.('error', { event: 'pg_pool_error', message: err.message });
  });

  return pool;
}

/** Round-trip latency of `SELECT 1` in ms. */
export async function checkDbHealth(pool: DbPool): Promise<number> {
  const start = Date.now();
  await pool.query('SELECT 1');
  return Date.now() - start;
}
