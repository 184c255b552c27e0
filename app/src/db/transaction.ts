import type pg from 'pg';
import type { LogFn } from '../middleware/logger.js';
import type { DbPool } from './client.js';

/**
 * Run `fn` between BEGIN and COMMIT on one pooled client. The callback's
 * error is rethrown after ROLLBACK. A client whose ROLLBACK also failed
 * is in an unknown transaction state and is destroyed, not returned.
 */
export async function withTransaction<T>(
  pool: DbPool,
  fn: (client: pg.PoolClient) => Promise<T>,
  log?: LogFn,
): Promise<T> {
  const client = await pool.connect();
  let broken: Error | undefined;
  try {
    await client.query('BEGIN');
    const result = await fn(client);
    await client.query('COMMIT');
    return result;
  } catch (err) {
    try {
      await client.query('ROLLBACK');
    } catch (rollbackErr) {
      broken = rollbackErr instanceof Error ? rollbackErr : new Error(String(rollbackErr));
      log?.('error', { event: 'pg_rollback_failed', message: broken.message });
    }
    throw err;
  } finally {
    client.release(broken);
  }
}
