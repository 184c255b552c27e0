/**
 * Approval Store — persistence contract for custom infrastructure requests.
 *
 * Every state change is a compare-and-set on the record version; the
 * transition itself is checked against ApprovalLifecycleMachine so no
 * writer can skip or revisit a state.
 */
import type { ApprovalRequest, ApprovalState, ApprovalUpdate } from '../types/approval.js';
import { NotFoundError, VersionConflictError } from './governance-errors.js';
import { ApprovalLifecycleMachine, assertTransition } from './state-machine.js';

/** Fields supplied when a request is created. */
export type NewApprovalRequest = Omit<ApprovalRequest, 'version' | 'state' | 'updatedAt'>;

export interface ApprovalQueryFilters {
  readonly state?: ApprovalState;
  readonly limit?: number;
}

export interface ApprovalStore {
  create(request: NewApprovalRequest): Promise<ApprovalRequest>;
  get(id: string): Promise<ApprovalRequest | null>;
  list(filters?: ApprovalQueryFilters): Promise<ApprovalRequest[]>;
  /**
   * Move a request to `to` if its version still equals `expectedVersion`.
   *
   * @throws {InvalidStateTransition} if the lifecycle forbids the move
   * @throws {VersionConflictError} if another writer got there first
   * @throws {NotFoundError} if the request does not exist
   */
  transition(
    id: string,
    expectedVersion: number,
    to: ApprovalState,
    update?: ApprovalUpdate,
  ): Promise<ApprovalRequest>;
}

export const DEFAULT_LIST_LIMIT = 50;

/** Apply a transition to an in-memory record. */
function applyApprovalUpdate(
  current: ApprovalRequest,
  to: ApprovalState,
  update: ApprovalUpdate | undefined,
  now: Date,
): ApprovalRequest {
  return {
    ...current,
    state: to,
    ...(update?.reviewer !== undefined ? { reviewer: update.reviewer } : {}),
    ...(update?.reviewNotes !== undefined ? { reviewNotes: update.reviewNotes } : {}),
    ...(update?.costOverride !== undefined ? { costOverride: update.costOverride } : {}),
    ...(update?.manifest !== undefined ? { manifest: update.manifest } : {}),
    version: current.version + 1,
    updatedAt: now.toISOString(),
  };
}

export class InMemoryApprovalStore implements ApprovalStore {
  private readonly requests = new Map<string, ApprovalRequest>();

  constructor(private readonly now: () => Date = () => new Date()) {}

  async create(request: NewApprovalRequest): Promise<ApprovalRequest> {
    const record: ApprovalRequest = {
      ...request,
      state: ApprovalLifecycleMachine.initial,
      version: 0,
      updatedAt: request.createdAt,
    };
    this.requests.set(record.id, record);
    return record;
  }

  async get(id: string): Promise<ApprovalRequest | null> {
    return this.requests.get(id) ?? null;
  }

  async list(filters: ApprovalQueryFilters = {}): Promise<ApprovalRequest[]> {
    return [...this.requests.values()]
      .filter((r) => filters.state === undefined || r.state === filters.state)
      .sort((a, b) => (a.createdAt < b.createdAt ? 1 : a.createdAt > b.createdAt ? -1 : 0))
      .slice(0, filters.limit ?? DEFAULT_LIST_LIMIT);
  }

  async transition(
    id: string,
    expectedVersion: number,
    to: ApprovalState,
    update?: ApprovalUpdate,
  ): Promise<ApprovalRequest> {
    const current = this.requests.get(id);
    if (!current) throw new NotFoundError('ApprovalRequest', id);
    assertTransition(ApprovalLifecycleMachine, current.state, to);
    if (current.version !== expectedVersion) {
      throw new VersionConflictError(id, expectedVersion, current.version);
    }

    const updated = applyApprovalUpdate(current, to, update, this.now());
    this.requests.set(id, updated);
    return updated;
  }
}
