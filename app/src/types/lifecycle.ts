/**
 * Lifecycle Action Type Definitions
 *
 * Actions are the output of one reconciliation pass. Each action concerns
 * exactly one claim and can be applied independently of all others.
 */

export interface FlagForCleanupAction {
  readonly kind: 'flag-for-cleanup';
  readonly claimId: string;
  readonly ageDays: number;
  readonly maxAgeDays: number;
}

export interface RequireOwnerAction {
  readonly kind: 'require-owner';
  readonly claimId: string;
}

export interface MissingRequiredLabelAction {
  readonly kind: 'missing-required-label';
  readonly claimId: string;
  readonly missingKeys: readonly string[];
}

/** Grace period after flagging has elapsed. */
export interface DeleteAction {
  readonly kind: 'delete';
  readonly claimId: string;
}

/** A flagged claim regained an owner label. */
export interface RestoreAction {
  readonly kind: 'restore';
  readonly claimId: string;
}

/** A claim marked non-compliant no longer violates labelling policy. */
export interface ClearComplianceAction {
  readonly kind: 'clear-compliance';
  readonly claimId: string;
}

export type LifecycleAction =
  | FlagForCleanupAction
  | RequireOwnerAction
  | MissingRequiredLabelAction
  | DeleteAction
  | RestoreAction
  | ClearComplianceAction;

export type LifecycleActionKind = LifecycleAction['kind'];

/** Claims the reconciler could not evaluate. */
export interface SkippedClaim {
  readonly claimId: string;
  readonly reason: string;
}

export interface ReconcilePlan {
  readonly actions: readonly LifecycleAction[];
  readonly skipped: readonly SkippedClaim[];
}
