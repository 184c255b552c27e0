/**
 * Lifecycle Monitor — scheduled reconciliation of the claim inventory.
 *
 * Each cycle: read the policy snapshot, list claims, compute the plan with
 * the pure `reconcile`, then apply every action independently through the
 * Claim Source Adapter. The snapshot taken at the start of a cycle is used
 * for the whole cycle, even if the policy is reloaded meanwhile.
 *
 * Per-claim updates are read-modify-write with the claim's version token.
 * Before writing, the action is re-derived from the fresh claim; an action
 * that no longer applies, or is already in effect, is a no-op. Version
 * conflicts and adapter timeouts are retried with bounded backoff, then
 * logged and left for the next cycle. One claim's failure never aborts
 * the cycle for the others.
 *
 * Scheduling: cycles never overlap (skip-if-running). Cancellation is
 * cooperative and checked between claims, never mid-write.
 */
import type { Claim, ClaimChanges, ClaimStatus } from '../types/claim.js';
import type { PolicySnapshot } from '../types/policy.js';
import type { LifecycleAction, SkippedClaim } from '../types/lifecycle.js';
import type { LogFn } from '../middleware/logger.js';
import type { ClaimSourceAdapter } from './claim-source.js';
import { isNoopChange } from './claim-source.js';
import { ConfigurationError } from './governance-errors.js';
import {
  CLEANUP_DEADLINE_LABEL,
  COMPLIANCE_LABEL,
  MS_PER_DAY,
  reconcile,
} from './lifecycle-reconciler.js';
import type { PolicySource } from './policy-store.js';
import { withRetry, withTimeout } from './retry.js';
import { ClaimStatusMachine, validateTransition } from './state-machine.js';
import { SignalEmitter } from './signal-emitter.js';
import type { SignalPublisher } from './signal-emitter.js';
import { addSanitizedAttributes, startSanitizedSpan } from '../utils/span-sanitizer.js';

// ---------------------------------------------------------------------------
// Exported Types
// ---------------------------------------------------------------------------

export const NON_COMPLIANT = 'non-compliant';

export type ApplyOutcome = 'applied' | 'noop';

export interface FailedAction {
  readonly claimId: string;
  readonly kind: LifecycleAction['kind'];
  readonly error: string;
}

/** Result of a single reconciliation cycle. */
export interface MonitorCycleResult {
  readonly status: 'completed' | 'cancelled' | 'skipped';
  /** Why a cycle was skipped. */
  readonly reason?: string;
  readonly policyVersion: string | null;
  readonly claimsChecked: number;
  readonly actionsPlanned: number;
  readonly applied: readonly LifecycleAction[];
  readonly noops: number;
  readonly failed: readonly FailedAction[];
  readonly skipped: readonly SkippedClaim[];
}

/** Health status of the LifecycleMonitor. */
export interface MonitorHealth {
  readonly running: boolean;
  readonly cycleInProgress: boolean;
  /** Duration of the last completed cycle in milliseconds. */
  readonly lastCycleMs: number;
  readonly lastCycleAt: string | null;
  readonly cycleCount: number;
  /** Cumulative error count across all cycles. */
  readonly errors: number;
}

export interface LifecycleMonitorConfig {
  readonly source: ClaimSourceAdapter;
  readonly policy: PolicySource;
  /** Interval between cycles in milliseconds. Default: 3_600_000 (hourly). */
  readonly intervalMs?: number;
  /** Deadline for each adapter call. Default: 10_000. */
  readonly adapterTimeoutMs?: number;
  /** Attempts per adapter operation, including the first. Default: 3. */
  readonly retryAttempts?: number;
  readonly retryBaseDelayMs?: number;
  readonly log?: LogFn;
  readonly signals?: SignalPublisher | null;
  readonly now?: () => Date;
  /** Injectable sleep for tests. */
  readonly sleep?: (ms: number) => Promise<void>;
  readonly random?: () => number;
}

export interface RunCycleOptions {
  readonly signal?: AbortSignal;
  readonly trigger?: string;
}

// ---------------------------------------------------------------------------
// Action application
// ---------------------------------------------------------------------------

/** Claim changes that put `action` into effect. */
export function changesForAction(
  action: LifecycleAction,
  policy: PolicySnapshot,
  now: Date,
): ClaimChanges {
  switch (action.kind) {
    case 'flag-for-cleanup': {
      const deadline = new Date(now.getTime() + policy.cleanupGracePeriodDays * MS_PER_DAY);
      return {
        status: 'flagged-for-cleanup',
        labels: { [CLEANUP_DEADLINE_LABEL]: deadline.toISOString() },
      };
    }
    case 'require-owner':
    case 'missing-required-label':
      return { labels: { [COMPLIANCE_LABEL]: NON_COMPLIANT } };
    case 'delete':
      return { status: 'deleted' };
    case 'restore':
      return { status: 'ready', labels: { [CLEANUP_DEADLINE_LABEL]: null } };
    case 'clear-compliance':
      return { labels: { [COMPLIANCE_LABEL]: null } };
  }
}

function isStatusChangeAllowed(from: ClaimStatus, to: ClaimStatus | undefined): boolean {
  return to === undefined || to === from || validateTransition(ClaimStatusMachine, from, to).valid;
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

// ---------------------------------------------------------------------------
// LifecycleMonitor
// ---------------------------------------------------------------------------

export class LifecycleMonitor {
  private readonly source: ClaimSourceAdapter;
  private readonly policy: PolicySource;
  private readonly intervalMs: number;
  private readonly adapterTimeoutMs: number;
  private readonly retryAttempts: number;
  private readonly retryBaseDelayMs: number;
  private readonly log: LogFn;
  private readonly signals: SignalPublisher | null;
  private readonly now: () => Date;
  private readonly sleep: ((ms: number) => Promise<void>) | undefined;
  private readonly random: (() => number) | undefined;

  // Interval state
  private intervalHandle: ReturnType<typeof setInterval> | null = null;
  private inFlight: Promise<MonitorCycleResult | null> | null = null;
  private abortController: AbortController | null = null;

  // Health tracking
  private _running = false;
  private _lastCycleMs = 0;
  private _lastCycleAt: string | null = null;
  private _cycleCount = 0;
  private _errors = 0;

  constructor(config: LifecycleMonitorConfig) {
    this.source = config.source;
    this.policy = config.policy;
    this.intervalMs = config.intervalMs ?? 3_600_000;
    this.adapterTimeoutMs = config.adapterTimeoutMs ?? 10_000;
    this.retryAttempts = config.retryAttempts ?? 3;
    this.retryBaseDelayMs = config.retryBaseDelayMs ?? 200;
    this.log = config.log ?? (() => {});
    this.signals = config.signals ?? null;
    this.now = config.now ?? (() => new Date());
    this.sleep = config.sleep;
    this.random = config.random;
  }

  // -------------------------------------------------------------------------
  // Cycle
  // -------------------------------------------------------------------------

  /**
   * Run one reconciliation cycle. Does not take the scheduler lock; use
   * `trigger()` when cycles may overlap.
   */
  async runCycle(opts: RunCycleOptions = {}): Promise<MonitorCycleResult> {
    const trigger = opts.trigger ?? 'manual';

    let policy: PolicySnapshot;
    try {
      policy = this.policy.current();
    } catch (err) {
      if (!(err instanceof ConfigurationError)) throw err;
      this.log('error', {
        event: 'reconcile_skipped',
        reason: 'policy_unavailable',
        trigger,
        message: err.message,
      });
      return {
        status: 'skipped',
        reason: 'policy unavailable',
        policyVersion: null,
        claimsChecked: 0,
        actionsPlanned: 0,
        applied: [],
        noops: 0,
        failed: [],
        skipped: [],
      };
    }

    return startSanitizedSpan(
      'claimgate.reconcile',
      { trigger, policy_version: policy.version },
      async (span) => {
        const result = await this.reconcileWith(policy, trigger, opts.signal);
        addSanitizedAttributes(span, 'claimgate.reconcile', {
          claims: result.claimsChecked,
          actions: result.actionsPlanned,
          applied: result.applied.length,
          skipped: result.skipped.length,
          failed: result.failed.length,
          cancelled: result.status === 'cancelled',
        });
        return result;
      },
    );
  }

  private async reconcileWith(
    policy: PolicySnapshot,
    trigger: string,
    signal: AbortSignal | undefined,
  ): Promise<MonitorCycleResult> {
    const claims = await this.withAdapterRetry('claim list', () => this.source.list(), signal);
    const now = this.now();
    const plan = reconcile(claims, policy, now);

    for (const skip of plan.skipped) {
      this.log('warn', { event: 'reconcile_claim_skipped', claim_id: skip.claimId, reason: skip.reason });
    }

    // Actions arrive sorted by claim id; group them per claim
    const byClaim = new Map<string, LifecycleAction[]>();
    for (const action of plan.actions) {
      const group = byClaim.get(action.claimId);
      if (group) {
        group.push(action);
      } else {
        byClaim.set(action.claimId, [action]);
      }
    }

    const applied: LifecycleAction[] = [];
    const failed: FailedAction[] = [];
    let noops = 0;
    let cancelled = false;

    for (const [claimId, actions] of byClaim) {
      if (signal?.aborted) {
        cancelled = true;
        this.log('info', { event: 'reconcile_cancelled', trigger, next_claim_id: claimId });
        break;
      }

      for (const action of actions) {
        try {
          const outcome = await this.applyAction(action, policy, now, signal);
          if (outcome === 'applied') {
            applied.push(action);
          } else {
            noops++;
          }
        } catch (err) {
          failed.push({ claimId, kind: action.kind, error: errorMessage(err) });
          this.log('error', {
            event: 'reconcile_action_failed',
            claim_id: claimId,
            kind: action.kind,
            message: errorMessage(err),
          });
        }
      }
    }

    const result: MonitorCycleResult = {
      status: cancelled ? 'cancelled' : 'completed',
      policyVersion: policy.version,
      claimsChecked: claims.length,
      actionsPlanned: plan.actions.length,
      applied,
      noops,
      failed,
      skipped: plan.skipped,
    };

    this.log('info', {
      event: 'reconcile_cycle',
      trigger,
      status: result.status,
      policy_version: policy.version,
      claims: result.claimsChecked,
      planned: result.actionsPlanned,
      applied: applied.length,
      noops,
      failed: failed.length,
      skipped: plan.skipped.length,
    });

    return result;
  }

  /**
   * Apply one action with read-modify-write. The action is re-derived from
   * the fresh claim so a stale plan never overwrites newer state.
   */
  private async applyAction(
    action: LifecycleAction,
    policy: PolicySnapshot,
    now: Date,
    signal: AbortSignal | undefined,
  ): Promise<ApplyOutcome> {
    if (action.kind === 'require-owner' || action.kind === 'missing-required-label') {
      this.log('warn', {
        event: 'claim_non_compliant',
        claim_id: action.claimId,
        kind: action.kind,
        ...(action.kind === 'missing-required-label' ? { missing_keys: action.missingKeys } : {}),
      });
    }

    return this.withAdapterRetry(`claim update ${action.claimId}`, async () => {
      const claim = await this.source.get(action.claimId);
      if (!claim || !this.stillApplies(claim, action, policy, now)) return 'noop';

      const changes = changesForAction(action, policy, now);
      if (isNoopChange(claim, changes) || !isStatusChangeAllowed(claim.status, changes.status)) {
        return 'noop';
      }

      await withTimeout(
        this.source.patch(claim.id, claim.version, changes),
        this.adapterTimeoutMs,
        `claim patch ${claim.id}`,
      );
      this.log('info', {
        event: 'claim_updated',
        claim_id: claim.id,
        kind: action.kind,
        from_status: claim.status,
        to_status: changes.status ?? claim.status,
      });
      this.publish(action, policy);
      return 'applied';
    }, signal);
  }

  private stillApplies(claim: Claim, action: LifecycleAction, policy: PolicySnapshot, now: Date): boolean {
    return reconcile([claim], policy, now).actions.some((a) => a.kind === action.kind);
  }

  private async withAdapterRetry<T>(
    operation: string,
    fn: () => Promise<T>,
    signal: AbortSignal | undefined,
  ): Promise<T> {
    return withRetry(
      () => withTimeout(fn(), this.adapterTimeoutMs, operation),
      {
        attempts: this.retryAttempts,
        baseDelayMs: this.retryBaseDelayMs,
        ...(this.sleep ? { sleep: this.sleep } : {}),
        ...(this.random ? { random: this.random } : {}),
        ...(signal ? { signal } : {}),
        onRetry: (err, attempt, delayMs) => this.log('warn', {
          event: 'adapter_retry',
          operation,
          attempt: attempt + 1,
          delay_ms: delayMs,
          message: errorMessage(err),
        }),
      },
    );
  }

  private publish(action: LifecycleAction, policy: PolicySnapshot): void {
    if (!this.signals) return;
    void this.signals.publish(SignalEmitter.SUBJECTS.lifecycle, {
      ...action,
      policy_version: policy.version,
      timestamp: this.now().toISOString(),
    }).catch((err: unknown) => {
      this.log('error', { event: 'lifecycle_signal_failed', claim_id: action.claimId, message: errorMessage(err) });
    });
  }

  // -------------------------------------------------------------------------
  // Scheduling
  // -------------------------------------------------------------------------

  /**
   * Run a cycle unless one is already in progress.
   * Returns null when the cycle was skipped.
   */
  async trigger(trigger = 'manual'): Promise<MonitorCycleResult | null> {
    if (this.inFlight) {
      this.log('warn', { event: 'reconcile_overlap_skipped', trigger });
      return null;
    }

    const controller = new AbortController();
    this.abortController = controller;
    const start = Date.now();

    const run = (async (): Promise<MonitorCycleResult | null> => {
      try {
        const result = await this.runCycle({ signal: controller.signal, trigger });
        this._lastCycleMs = Date.now() - start;
        this._lastCycleAt = this.now().toISOString();
        this._cycleCount++;
        this._errors += result.failed.length + (result.status === 'skipped' ? 1 : 0);
        return result;
      } catch (err) {
        this._errors++;
        this.log('error', { event: 'reconcile_cycle_failed', trigger, message: errorMessage(err) });
        throw err;
      } finally {
        this.inFlight = null;
        this.abortController = null;
      }
    })();

    this.inFlight = run;
    return run;
  }

  /** Start the interval loop. */
  start(): void {
    if (this._running) {
      this.log('warn', { event: 'monitor_already_running' });
      return;
    }

    this._running = true;
    this.intervalHandle = setInterval(() => {
      void this.tick();
    }, this.intervalMs);

    this.log('info', { event: 'monitor_started', interval_ms: this.intervalMs });
  }

  /**
   * Stop the loop. An in-flight cycle is asked to stop at the next claim
   * boundary and awaited.
   */
  async stop(): Promise<void> {
    if (this.intervalHandle) {
      clearInterval(this.intervalHandle);
      this.intervalHandle = null;
    }
    this._running = false;

    const inFlight = this.inFlight;
    if (inFlight) {
      this.abortController?.abort();
      await inFlight.catch((err: unknown) => {
        this.log('warn', { event: 'monitor_stop_cycle_error', message: errorMessage(err) });
        return null;
      });
    }

    this.log('info', { event: 'monitor_stopped', cycle_count: this._cycleCount });
  }

  getHealth(): MonitorHealth {
    return {
      running: this._running,
      cycleInProgress: this.inFlight !== null,
      lastCycleMs: this._lastCycleMs,
      lastCycleAt: this._lastCycleAt,
      cycleCount: this._cycleCount,
      errors: this._errors,
    };
  }

  /** One interval tick; failures are already logged by trigger(). */
  private async tick(): Promise<void> {
    try {
      await this.trigger('interval');
    } catch (err) {
      this.log('debug', { event: 'monitor_tick_error', message: errorMessage(err) });
    }
  }
}
