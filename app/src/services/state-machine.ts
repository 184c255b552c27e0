/**
 * State Machine Validation
 *
 * Transition maps for the two mutable lifecycles the engine owns:
 * ApprovalLifecycle (custom infrastructure requests) and ClaimStatus
 * (post-admission claim status, written only by the Lifecycle Monitor).
 *
 * `validateTransition` never throws; `assertTransition` throws
 * InvalidStateTransition for use at operation boundaries.
 */
import type { ApprovalState } from '../types/approval.js';
import type { ClaimStatus } from '../types/claim.js';
import { InvalidStateTransition } from './governance-errors.js';

/** Generic state machine definition */
export interface StateMachine<S extends string> {
  readonly name: string;
  readonly initial: S;
  readonly transitions: Readonly<Record<S, readonly S[]>>;
}

export interface TransitionResult {
  readonly valid: boolean;
  readonly from: string;
  readonly to: string;
  readonly machine: string;
  readonly error?: string;
}

export function validateTransition<S extends string>(
  machine: StateMachine<S>,
  from: S,
  to: S,
): TransitionResult {
  const allowed: readonly S[] | undefined = machine.transitions[from];
  if (!allowed) {
    return {
      valid: false,
      from,
      to,
      machine: machine.name,
      error: `Unknown state '${from}' in ${machine.name}`,
    };
  }

  if (!allowed.includes(to)) {
    const targets = allowed.length > 0 ? allowed.join(', ') : 'none (terminal)';
    return {
      valid: false,
      from,
      to,
      machine: machine.name,
      error: `Invalid transition ${from} → ${to} in ${machine.name}. Allowed: [${targets}]`,
    };
  }

  return { valid: true, from, to, machine: machine.name };
}

/**
 * Assert a valid transition.
 * @throws {InvalidStateTransition} when the machine does not allow `from → to`
 */
export function assertTransition<S extends string>(
  machine: StateMachine<S>,
  from: S,
  to: S,
): void {
  const result = validateTransition(machine, from, to);
  if (!result.valid) {
    throw new InvalidStateTransition(machine.name, from, to, result.error);
  }
}

// --- State Machine Definitions ---

/**
 * Approval lifecycle. Strictly forward: no state is revisited, and a
 * rejected request must be resubmitted as a new request.
 */
export const ApprovalLifecycleMachine: StateMachine<ApprovalState> = {
  name: 'ApprovalLifecycle',
  initial: 'submitted',
  transitions: {
    submitted: ['notified'],
    notified: ['under_review'],
    under_review: ['approved', 'rejected'],
    approved: ['provisioned'],
    rejected: [], // terminal
    provisioned: [], // terminal
  },
};

/**
 * Claim status after admission. `flagged-for-cleanup → ready` covers a
 * claim that gained an owner label during its grace period.
 */
export const ClaimStatusMachine: StateMachine<ClaimStatus> = {
  name: 'ClaimStatus',
  initial: 'pending',
  transitions: {
    pending: ['ready', 'denied'],
    ready: ['flagged-for-cleanup', 'deleted'],
    'flagged-for-cleanup': ['ready', 'deleted'],
    denied: ['deleted'],
    deleted: [], // terminal
  },
};
