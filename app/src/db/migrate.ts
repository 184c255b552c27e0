/**
 * Migration Runner — Forward-only SQL migration framework.
 *
 * Discovers SQL files in `app/migrations/`, tracks applied migrations in a
 * `_migrations` table, and applies pending ones in order, each in its own
 * transaction.
 *
 * - Forward-only: no rollbacks
 * - Idempotent: re-running migrate() is always safe
 * - Checksum verification: warns if applied migration files change
 * - Advisory lock: replicas starting together migrate one at a time
 */
import { readdir, readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { createHash } from 'node:crypto';
import type { DbPool } from './client.js';

/**
 * Deterministic advisory lock ID from an application name: a 31-bit
 * positive integer, so apps sharing a cluster do not collide.
 */
function computeLockId(appName: string): number {
  const hash = createHash('sha256').update(appName).digest();
  return hash.readUInt32BE(0) & 0x7FFFFFFF;
}

/** app/migrations, resolved from app/src/db or dist/app/src/db. */
export const DEFAULT_MIGRATIONS_DIR = fileURLToPath(new URL('../../migrations', import.meta.url));

const LOCK_TIMEOUT_MS = 30_000;

export interface MigrationResult {
  /** Filenames of newly applied migrations. */
  applied: string[];
  /** Filenames of previously applied migrations (skipped). */
  skipped: string[];
  /** Total migration files discovered. */
  total: number;
  /** Warnings (e.g., checksum mismatches). */
  warnings: string[];
}

export interface MigrateOptions {
  readonly migrationsDir?: string;
}

function computeChecksum(content: string): string {
  return createHash('sha256').update(content).digest('hex');
}

async function ensureMigrationsTable(pool: DbPool): Promise<void> {
  await pool.query(`
    CREATE TABLE IF NOT EXISTS _migrations (
      id SERIAL PRIMARY KEY,
      filename TEXT NOT NULL UNIQUE,
      checksum TEXT NOT NULL,
      applied_at TIMESTAMPTZ NOT NULL DEFAULT now()
    );
  `);
}

async function getAppliedMigrations(pool: DbPool): Promise<Map<string, string>> {
  const result = await pool.query<{ filename: string; checksum: string }>(
    'SELECT filename, checksum FROM _migrations ORDER BY id',
  );
  const map = new Map<string, string>();
  for (const row of result.rows) {
    map.set(row.filename, row.checksum);
  }
  return map;
}

/** SQL migration files sorted by their numeric prefix. */
export async function discoverMigrations(dir: string): Promise<string[]> {
  const files = await readdir(dir);
  const prefix = (name: string): number => parseInt(name.split('_')[0] ?? '', 10);
  return files
    .filter((f) => f.endsWith('.sql'))
    .sort((a, b) => prefix(a) - prefix(b));
}

/**
 * Run all pending migrations in order.
 */
export async function migrate(pool: DbPool, opts: MigrateOptions = {}): Promise<MigrationResult> {
  const dir = opts.migrationsDir ?? DEFAULT_MIGRATIONS_DIR;
  const result: MigrationResult = {
    applied: [],
    skipped: [],
    total: 0,
    warnings: [],
  };

  const lockId = computeLockId('claimgate:migration');
  const lockClient = await pool.connect();
  try {
    await lockClient.query(`SELECT set_config('lock_timeout', $1, false)`, [`${LOCK_TIMEOUT_MS}ms`]);
    await lockClient.query('SELECT pg_advisory_lock($1)', [lockId]);
  } catch (err) {
    lockClient.release();
    throw new Error(
      `Failed to acquire migration lock within ${LOCK_TIMEOUT_MS}ms. ` +
        'Another instance may be migrating. Check and retry.',
      { cause: err },
    );
  }

  try {
    await lockClient.query("SET lock_timeout = '0'");
    await ensureMigrationsTable(pool);

    const applied = await getAppliedMigrations(pool);
    const migrationFiles = await discoverMigrations(dir);
    result.total = migrationFiles.length;

    for (const filename of migrationFiles) {
      const content = await readFile(join(dir, filename), 'utf-8');
      const checksum = computeChecksum(content);

      const existingChecksum = applied.get(filename);
      if (existingChecksum !== undefined) {
        if (existingChecksum !== checksum) {
          result.warnings.push(
            `Checksum mismatch for ${filename}: expected ${existingChecksum}, got ${checksum}. Migration file has changed after application.`,
          );
        }
        result.skipped.push(filename);
        continue;
      }

      const client = await pool.connect();
      try {
        await client.query('BEGIN');
        await client.query(content);
        await client.query(
          'INSERT INTO _migrations (filename, checksum) VALUES ($1, $2)',
          [filename, checksum],
        );
        await client.query('COMMIT');
        result.applied.push(filename);
      } catch (err) {
        // ROLLBACK failure must not mask the original migration error
        await client.query('ROLLBACK').catch(() => undefined);
        throw new Error(
          `Migration ${filename} failed: ${err instanceof Error ? err.message : String(err)}`,
          { cause: err },
        );
      } finally {
        client.release();
      }
    }

    return result;
  } finally {
    // Unlock failure must not mask the migration result
    await lockClient.query('SELECT pg_advisory_unlock($1)', [lockId]).catch(() => undefined);
    lockClient.release();
  }
}
