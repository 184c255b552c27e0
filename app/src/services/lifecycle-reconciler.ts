/**
 * Lifecycle Reconciler — pure reconciliation of claims against policy.
 *
 * `reconcile` takes a claim snapshot, a policy snapshot and the current
 * time, and returns the actions that bring the inventory back into
 * compliance. It performs no I/O and reads no clock, so the same inputs
 * always yield the same plan. Ages are recomputed from absolute
 * timestamps on every pass; missed or irregular cycles need no catch-up.
 *
 * Fail closed: a claim whose tier has no rule produces no actions and is
 * reported as skipped. A ready claim with an unreadable creation time is
 * reported as skipped for age-based cleanup only; its labelling checks
 * still run.
 */
import type { Claim } from '../types/claim.js';
import { LIVE_CLAIM_STATUSES, labelValue } from '../types/claim.js';
import type { PolicySnapshot } from '../types/policy.js';
import type { LifecycleAction, ReconcilePlan, SkippedClaim } from '../types/lifecycle.js';
import { maxAgeDaysForTier, requiredLabelsForTier, rulesForTier } from './policy-store.js';

/** Label holding the time after which a flagged claim is deleted. */
export const CLEANUP_DEADLINE_LABEL = 'claimgate.io/cleanup-after';

/** Label marking a claim that violates labelling policy. */
export const COMPLIANCE_LABEL = 'claimgate.io/compliance';

export const MS_PER_DAY = 86_400_000;

/** Tier that requires an owner label at all times. */
const OWNER_REQUIRED_TIER = 'production';

const KIND_ORDER: Record<LifecycleAction['kind'], number> = {
  'flag-for-cleanup': 0,
  'require-owner': 1,
  'missing-required-label': 2,
  delete: 3,
  restore: 4,
  'clear-compliance': 5,
};

export function hasOwner(claim: Claim, policy: PolicySnapshot): boolean {
  const owner = labelValue(claim.labels, policy.ownerLabel);
  return owner !== undefined && owner.trim().length > 0;
}

/** Whole and fractional days elapsed since the claim was created. Null if createdAt is unparseable. */
export function claimAgeDays(claim: Claim, now: Date): number | null {
  const created = Date.parse(claim.createdAt);
  if (Number.isNaN(created)) return null;
  return (now.getTime() - created) / MS_PER_DAY;
}

function reconcileClaim(
  claim: Claim,
  policy: PolicySnapshot,
  now: Date,
  actions: LifecycleAction[],
  skipped: SkippedClaim[],
): void {
  if (!LIVE_CLAIM_STATUSES.has(claim.status)) return;

  if (rulesForTier(policy, claim.tier).length === 0) {
    skipped.push({ claimId: claim.id, reason: 'unknown tier' });
    return;
  }

  const owned = hasOwner(claim, policy);

  if (claim.status === 'ready') {
    const ageDays = claimAgeDays(claim, now);
    const maxAgeDays = maxAgeDaysForTier(policy, claim.tier);
    if (ageDays === null) {
      skipped.push({ claimId: claim.id, reason: 'invalid createdAt' });
    } else if (maxAgeDays !== null && ageDays > maxAgeDays && !owned) {
      actions.push({
        kind: 'flag-for-cleanup',
        claimId: claim.id,
        ageDays: Math.floor(ageDays),
        maxAgeDays,
      });
    }
  }

  const ownerMissing = claim.tier === OWNER_REQUIRED_TIER && !owned;
  if (ownerMissing) {
    actions.push({ kind: 'require-owner', claimId: claim.id });
  }

  const missingKeys = requiredLabelsForTier(policy, claim.tier).filter((key) => !labelValue(claim.labels, key));
  if (missingKeys.length > 0) {
    actions.push({ kind: 'missing-required-label', claimId: claim.id, missingKeys });
  }

  if (!ownerMissing && missingKeys.length === 0 && labelValue(claim.labels, COMPLIANCE_LABEL) !== undefined) {
    actions.push({ kind: 'clear-compliance', claimId: claim.id });
  }

  if (claim.status === 'flagged-for-cleanup') {
    if (owned) {
      actions.push({ kind: 'restore', claimId: claim.id });
      return;
    }
    const deadlineLabel = labelValue(claim.labels, CLEANUP_DEADLINE_LABEL);
    const deadline = deadlineLabel === undefined ? Number.NaN : Date.parse(deadlineLabel);
    if (Number.isNaN(deadline)) {
      skipped.push({ claimId: claim.id, reason: 'missing cleanup deadline' });
    } else if (deadline <= now.getTime()) {
      actions.push({ kind: 'delete', claimId: claim.id });
    }
  }
}

/**
 * Compute the actions for one reconciliation pass.
 * Actions are sorted by claim id, then kind.
 */
export function reconcile(
  claims: readonly Claim[],
  policy: PolicySnapshot,
  now: Date,
): ReconcilePlan {
  const actions: LifecycleAction[] = [];
  const skipped: SkippedClaim[] = [];

  for (const claim of claims) {
    reconcileClaim(claim, policy, now, actions, skipped);
  }

  actions.sort((a, b) =>
    a.claimId === b.claimId
      ? KIND_ORDER[a.kind] - KIND_ORDER[b.kind]
      : a.claimId < b.claimId ? -1 : 1,
  );
  skipped.sort((a, b) => (a.claimId < b.claimId ? -1 : a.claimId > b.claimId ? 1 : 0));

  return { actions, skipped };
}
