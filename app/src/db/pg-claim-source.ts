/**
 * PostgreSQL Claim Source — claim inventory stored in the `claims` table.
 *
 * Patches are a single conditional UPDATE on (id, version); a miss is
 * resolved into NotFoundError or VersionConflictError with one follow-up
 * read. Pool failures surface as TransientInfraError so the monitor's
 * bounded retry applies to them.
 *
 * `list` drops rows that do not parse (a label value written as a number,
 * an unknown status) and logs them; the rest of the inventory is still
 * returned.
 */
import { z } from 'zod';
import type { DbPool } from './client.js';
import type { LogFn } from '../middleware/logger.js';
import type { Claim, ClaimChanges } from '../types/claim.js';
import { CLAIM_STATUSES } from '../types/claim.js';
import type { ClaimSourceAdapter } from '../services/claim-source.js';
import {
  GovernanceError,
  NotFoundError,
  TransientInfraError,
  VersionConflictError,
} from '../services/governance-errors.js';

const TimestampSchema = z.union([z.date(), z.string()]).transform((v) => new Date(v).toISOString());

const ClaimRowSchema = z.object({
  id: z.string(),
  namespace: z.string(),
  tier: z.string(),
  status: z.enum(CLAIM_STATUSES),
  labels: z.record(z.string()),
  parameters: z.object({
    storageSizeGB: z.number().optional(),
    version: z.string().optional(),
    enableBackups: z.boolean().optional(),
  }).nullable(),
  version: z.number().int(),
  created_at: TimestampSchema,
});

export type ClaimRow = z.input<typeof ClaimRowSchema>;

export function rowToClaim(row: unknown): Claim {
  return toClaim(ClaimRowSchema.parse(row));
}

function toClaim(parsed: z.output<typeof ClaimRowSchema>): Claim {
  const params = parsed.parameters ?? {};
  return {
    id: parsed.id,
    namespace: parsed.namespace,
    tier: parsed.tier,
    status: parsed.status,
    labels: parsed.labels,
    version: parsed.version,
    createdAt: parsed.created_at,
    parameters: {
      ...(params.storageSizeGB !== undefined ? { storageSizeGB: params.storageSizeGB } : {}),
      ...(params.version !== undefined ? { version: params.version } : {}),
      ...(params.enableBackups !== undefined ? { enableBackups: params.enableBackups } : {}),
    },
  };
}

/** Split label changes into keys to set and keys to remove. */
export function splitLabelChanges(
  labels: Readonly<Record<string, string | null>> | undefined,
): { set: Record<string, string>; remove: string[] } {
  const set: Record<string, string> = {};
  const remove: string[] = [];
  for (const [key, value] of Object.entries(labels ?? {})) {
    if (value === null) {
      remove.push(key);
    } else {
      set[key] = value;
    }
  }
  return { set, remove };
}

async function guarded<T>(operation: string, fn: () => Promise<T>): Promise<T> {
  try {
    return await fn();
  } catch (err) {
    if (err instanceof GovernanceError || err instanceof z.ZodError) throw err;
    throw new TransientInfraError(
      `${operation} failed: ${err instanceof Error ? err.message : String(err)}`,
      { cause: err },
    );
  }
}

function rowId(row: unknown): string | null {
  if (typeof row === 'object' && row !== null && 'id' in row && typeof row.id === 'string') return row.id;
  return null;
}

export class PgClaimSource implements ClaimSourceAdapter {
  constructor(
    private readonly pool: DbPool,
    private readonly log: LogFn = () => {},
  ) {}

  async list(): Promise<Claim[]> {
    return guarded('claim list', async () => {
      const result = await this.pool.query(
        `SELECT id, namespace, tier, status, labels, parameters, version, created_at
         FROM claims
         WHERE status <> 'deleted'
         ORDER BY id`,
      );
      const claims: Claim[] = [];
      for (const row of result.rows) {
        const parsed = ClaimRowSchema.safeParse(row);
        if (parsed.success) {
          claims.push(toClaim(parsed.data));
          continue;
        }
        this.log('warn', {
          event: 'claim_row_invalid',
          claim_id: rowId(row),
          issues: parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`),
        });
      }
      return claims;
    });
  }

  async get(id: string): Promise<Claim | null> {
    return guarded('claim get', async () => {
      const result = await this.pool.query(
        `SELECT id, namespace, tier, status, labels, parameters, version, created_at
         FROM claims WHERE id = $1`,
        [id],
      );
      const row: unknown = result.rows[0];
      return row === undefined ? null : rowToClaim(row);
    });
  }

  async patch(id: string, expectedVersion: number, changes: ClaimChanges): Promise<Claim> {
    return guarded('claim patch', async () => {
      const { set, remove } = splitLabelChanges(changes.labels);
      const result = await this.pool.query(
        `UPDATE claims
         SET status = COALESCE($1, status),
             labels = (labels || $2::jsonb) - $3::text[],
             version = version + 1,
             updated_at = now()
         WHERE id = $4 AND version = $5
         RETURNING id, namespace, tier, status, labels, parameters, version, created_at`,
        [changes.status ?? null, JSON.stringify(set), remove, id, expectedVersion],
      );

      const row: unknown = result.rows[0];
      if (row !== undefined) return rowToClaim(row);

      const current = await this.pool.query<{ version: number }>(
        'SELECT version FROM claims WHERE id = $1',
        [id],
      );
      const actual = current.rows[0];
      if (!actual) throw new NotFoundError('Claim', id);
      throw new VersionConflictError(id, expectedVersion, actual.version);
    });
  }
}
