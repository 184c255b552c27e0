/**
 * PostgreSQL Approval Store — `approval_requests` with optimistic concurrency.
 *
 * A transition locks the row (SELECT … FOR UPDATE), checks the lifecycle
 * and the expected version, then writes the new state and bumps the
 * version, all in one transaction.
 */
import { z } from 'zod';
import type pg from 'pg';
import type { DbPool } from './client.js';
import type { LogFn } from '../middleware/logger.js';
import { withTransaction } from './transaction.js';
import type {
  ApprovalRequest,
  ApprovalState,
  ApprovalUpdate,
} from '../types/approval.js';
import { APPROVAL_STATES } from '../types/approval.js';
import type {
  ApprovalQueryFilters,
  ApprovalStore,
  NewApprovalRequest,
} from '../services/approval-store.js';
import { DEFAULT_LIST_LIMIT } from '../services/approval-store.js';
import { NotFoundError, VersionConflictError } from '../services/governance-errors.js';
import { ApprovalLifecycleMachine, assertTransition } from '../services/state-machine.js';

const TimestampSchema = z.union([z.date(), z.string()]).transform((v) => new Date(v).toISOString());

const ManifestSchema = z.object({
  apiVersion: z.string(),
  kind: z.string(),
  metadata: z.object({
    name: z.string(),
    labels: z.record(z.string()),
  }),
  spec: z.record(z.unknown()),
});

const ApprovalRowSchema = z.object({
  id: z.string(),
  requester: z.string(),
  description: z.string(),
  // NUMERIC comes back from pg as a string
  estimated_cost: z.coerce.number(),
  state: z.enum(APPROVAL_STATES),
  team: z.string().nullable(),
  resource_type: z.string().nullable(),
  specifications: z.record(z.unknown()),
  justification: z.string().nullable(),
  finance_approval_required: z.boolean(),
  reviewer: z.string().nullable(),
  review_notes: z.string().nullable(),
  cost_override: z.boolean(),
  manifest: ManifestSchema.nullable(),
  version: z.number().int(),
  created_at: TimestampSchema,
  updated_at: TimestampSchema,
});

export type ApprovalRow = z.input<typeof ApprovalRowSchema>;

export function rowToApproval(row: unknown): ApprovalRequest {
  const r = ApprovalRowSchema.parse(row);
  return {
    id: r.id,
    requester: r.requester,
    description: r.description,
    estimatedCost: r.estimated_cost,
    state: r.state,
    team: r.team,
    resourceType: r.resource_type,
    specifications: r.specifications,
    justification: r.justification,
    financeApprovalRequired: r.finance_approval_required,
    reviewer: r.reviewer,
    reviewNotes: r.review_notes,
    costOverride: r.cost_override,
    manifest: r.manifest,
    version: r.version,
    createdAt: r.created_at,
    updatedAt: r.updated_at,
  };
}

export class PgApprovalStore implements ApprovalStore {
  constructor(
    private readonly pool: DbPool,
    private readonly log?: LogFn,
  ) {}

  async create(request: NewApprovalRequest): Promise<ApprovalRequest> {
    const result = await this.pool.query(
      `INSERT INTO approval_requests (
        id, requester, description, estimated_cost, team, resource_type,
        specifications, justification, finance_approval_required, created_at, updated_at
      ) VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $10)
      RETURNING *`,
      [
        request.id,
        request.requester,
        request.description,
        request.estimatedCost,
        request.team,
        request.resourceType,
        JSON.stringify(request.specifications),
        request.justification,
        request.financeApprovalRequired,
        request.createdAt,
      ],
    );
    return rowToApproval(result.rows[0]);
  }

  async get(id: string): Promise<ApprovalRequest | null> {
    const result = await this.pool.query('SELECT * FROM approval_requests WHERE id = $1', [id]);
    const row: unknown = result.rows[0];
    return row === undefined ? null : rowToApproval(row);
  }

  async list(filters: ApprovalQueryFilters = {}): Promise<ApprovalRequest[]> {
    const conditions: string[] = [];
    const params: unknown[] = [];
    let paramIdx = 1;

    if (filters.state) {
      conditions.push(`state = $${paramIdx++}`);
      params.push(filters.state);
    }

    const where = conditions.length > 0 ? `WHERE ${conditions.join(' AND ')}` : '';
    const limit = filters.limit ?? DEFAULT_LIST_LIMIT;

    const result = await this.pool.query(
      `SELECT * FROM approval_requests ${where} ORDER BY created_at DESC LIMIT $${paramIdx}`,
      [...params, limit],
    );
    return result.rows.map(rowToApproval);
  }

  async transition(
    id: string,
    expectedVersion: number,
    to: ApprovalState,
    update?: ApprovalUpdate,
  ): Promise<ApprovalRequest> {
    return withTransaction(this.pool, async (client: pg.PoolClient) => {
      const locked = await client.query(
        'SELECT * FROM approval_requests WHERE id = $1 FOR UPDATE',
        [id],
      );
      const row: unknown = locked.rows[0];
      if (row === undefined) throw new NotFoundError('ApprovalRequest', id);
      const current = rowToApproval(row);

      assertTransition(ApprovalLifecycleMachine, current.state, to);
      if (current.version !== expectedVersion) {
        throw new VersionConflictError(id, expectedVersion, current.version);
      }

      const setClauses = ['state = $1', 'version = version + 1', 'updated_at = now()'];
      const params: unknown[] = [to];
      let paramIdx = 2;

      if (update?.reviewer !== undefined) {
        setClauses.push(`reviewer = $${paramIdx++}`);
        params.push(update.reviewer);
      }
      if (update?.reviewNotes !== undefined) {
        setClauses.push(`review_notes = $${paramIdx++}`);
        params.push(update.reviewNotes);
      }
      if (update?.costOverride !== undefined) {
        setClauses.push(`cost_override = $${paramIdx++}`);
        params.push(update.costOverride);
      }
      if (update?.manifest !== undefined) {
        setClauses.push(`manifest = $${paramIdx++}`);
        params.push(JSON.stringify(update.manifest));
      }

      params.push(id);
      const result = await client.query(
        `UPDATE approval_requests SET ${setClauses.join(', ')}
         WHERE id = $${paramIdx}
         RETURNING *`,
        params,
      );
      return rowToApproval(result.rows[0]);
    }, this.log);
  }
}
