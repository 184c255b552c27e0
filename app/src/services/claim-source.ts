/**
 * Claim Source Adapter — the engine's read/patch contract over the claim
 * inventory owned by the cluster.
 *
 * Writes are optimistic: `patch` takes the version the caller read and
 * throws VersionConflictError when the claim has changed since.
 */
import type { Claim, ClaimChanges } from '../types/claim.js';
import { labelValue } from '../types/claim.js';
import { NotFoundError, VersionConflictError } from './governance-errors.js';

export interface ClaimSourceAdapter {
  list(): Promise<Claim[]>;
  get(id: string): Promise<Claim | null>;
  /**
   * Apply `changes` if the stored version still equals `expectedVersion`.
   * Returns the updated claim with its new version.
   *
   * @throws {VersionConflictError} on a stale version
   * @throws {NotFoundError} when the claim does not exist
   */
  patch(id: string, expectedVersion: number, changes: ClaimChanges): Promise<Claim>;
}

/** Merge label changes into a label set; null values remove the key. */
export function mergeLabels(
  labels: Readonly<Record<string, string>>,
  changes: Readonly<Record<string, string | null>> | undefined,
): Record<string, string> {
  const merged: Record<string, string> = { ...labels };
  if (!changes) return merged;
  for (const [key, value] of Object.entries(changes)) {
    if (value === null) {
      delete merged[key];
    } else {
      merged[key] = value;
    }
  }
  return merged;
}

/** True when applying `changes` to `claim` would change nothing. */
export function isNoopChange(claim: Claim, changes: ClaimChanges): boolean {
  if (changes.status !== undefined && changes.status !== claim.status) return false;
  for (const [key, value] of Object.entries(changes.labels ?? {})) {
    if (value === null ? Object.hasOwn(claim.labels, key) : labelValue(claim.labels, key) !== value) return false;
  }
  return true;
}

/**
 * In-process claim inventory. Used by tests and by the service when no
 * database is configured.
 */
export class InMemoryClaimSource implements ClaimSourceAdapter {
  private readonly claims = new Map<string, Claim>();

  constructor(seed: readonly Claim[] = []) {
    for (const claim of seed) this.claims.set(claim.id, claim);
  }

  async list(): Promise<Claim[]> {
    return [...this.claims.values()];
  }

  async get(id: string): Promise<Claim | null> {
    return this.claims.get(id) ?? null;
  }

  async patch(id: string, expectedVersion: number, changes: ClaimChanges): Promise<Claim> {
    const current = this.claims.get(id);
    if (!current) throw new NotFoundError('Claim', id);
    if (current.version !== expectedVersion) {
      throw new VersionConflictError(id, expectedVersion, current.version);
    }

    const updated: Claim = {
      ...current,
      status: changes.status ?? current.status,
      labels: mergeLabels(current.labels, changes.labels),
      version: current.version + 1,
    };
    this.claims.set(id, updated);
    return updated;
  }

  /** Insert or replace a claim as the cluster would (not a governed write). */
  put(claim: Claim): void {
    this.claims.set(claim.id, claim);
  }
}
