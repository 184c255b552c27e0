/**
 * Approval Workflow Manager — out-of-blueprint infrastructure requests.
 *
 *   submitted → notified → under_review → approved → provisioned
 *                                       ↘ rejected
 *
 * The manager is the sole writer of ApprovalRequest.state. Every
 * operation checks the lifecycle before acting, so calling an operation
 * from the wrong state raises InvalidStateTransition and leaves the
 * request untouched. A rejected request is never resurrected; the team
 * submits a new one.
 *
 * Cost guard: approving a request whose estimate exceeds the policy cost
 * ceiling requires an explicit override from the reviewer. Without it the
 * review is refused (returned as data, state unchanged).
 */
import { randomUUID } from 'node:crypto';
import type {
  ApprovalRequest,
  ApprovalState,
  ApprovalUpdate,
  ManifestDescriptor,
  ReviewDecision,
} from '../types/approval.js';
import { SubmitApprovalSchema } from '../types/approval.js';
import type { LogFn } from '../middleware/logger.js';
import type { ApprovalQueryFilters, ApprovalStore } from './approval-store.js';
import { InvalidStateTransition, NotFoundError, ValidationError } from './governance-errors.js';
import type { ManifestSink, PlatformNotifier, RequesterNotifier } from './platform-notifier.js';
import type { PolicySource } from './policy-store.js';
import { ApprovalLifecycleMachine, assertTransition } from './state-machine.js';
import { SignalEmitter } from './signal-emitter.js';
import type { SignalPublisher } from './signal-emitter.js';
import { startSanitizedSpan } from '../utils/span-sanitizer.js';

export const COST_CEILING_EXCEEDED = 'cost ceiling exceeded';

export const MANIFEST_API_VERSION = 'infrastructure.claimgate.io/v1alpha1';
export const MANIFEST_KIND = 'CustomResource';

export interface ReviewOptions {
  readonly costOverride?: boolean;
  readonly notes?: string;
}

export interface ReviewResult {
  /** False when a guard refused the decision; `request` is then unchanged. */
  readonly applied: boolean;
  readonly request: ApprovalRequest;
  readonly reasons: readonly string[];
}

export interface ApprovalWorkflowOptions {
  readonly store: ApprovalStore;
  readonly policy: PolicySource;
  readonly notifier: PlatformNotifier;
  readonly manifestSink: ManifestSink;
  /** Tells the requester about review decisions. */
  readonly requesterNotifier?: RequesterNotifier | null;
  readonly signals?: SignalPublisher | null;
  readonly log?: LogFn;
  readonly now?: () => Date;
  readonly generateId?: () => string;
}

/** Provisioning descriptor for an approved request. */
export function buildManifest(request: ApprovalRequest): ManifestDescriptor {
  return {
    apiVersion: MANIFEST_API_VERSION,
    kind: MANIFEST_KIND,
    metadata: {
      name: `custom-${request.id}`,
      labels: {
        team: request.team ?? 'unassigned',
        'request-id': request.id,
        'approved-by': request.reviewer ?? 'unknown',
      },
    },
    spec: { ...request.specifications },
  };
}

export class ApprovalWorkflow {
  private readonly store: ApprovalStore;
  private readonly policy: PolicySource;
  private readonly notifier: PlatformNotifier;
  private readonly manifestSink: ManifestSink;
  private readonly requesterNotifier: RequesterNotifier | null;
  private readonly signals: SignalPublisher | null;
  private readonly log: LogFn;
  private readonly now: () => Date;
  private readonly generateId: () => string;

  constructor(opts: ApprovalWorkflowOptions) {
    this.store = opts.store;
    this.policy = opts.policy;
    this.notifier = opts.notifier;
    this.manifestSink = opts.manifestSink;
    this.requesterNotifier = opts.requesterNotifier ?? null;
    this.signals = opts.signals ?? null;
    this.log = opts.log ?? (() => {});
    this.now = opts.now ?? (() => new Date());
    this.generateId = opts.generateId ?? randomUUID;
  }

  /**
   * Create a request in `submitted`.
   *
   * @throws {ValidationError} when requester, description or justification is empty, or the cost is invalid
   * @throws {ConfigurationError} when no policy is loaded
   */
  async submit(input: unknown): Promise<ApprovalRequest> {
    const parsed = SubmitApprovalSchema.safeParse(input);
    if (!parsed.success) {
      const issues = parsed.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`);
      throw new ValidationError(`Invalid approval request: ${issues.join('; ')}`, issues);
    }
    const data = parsed.data;
    const threshold = this.policy.current().financeApprovalThreshold;

    const request = await this.store.create({
      id: this.generateId(),
      requester: data.requester,
      description: data.description,
      estimatedCost: data.estimatedCost,
      team: data.team ?? null,
      resourceType: data.resourceType ?? null,
      specifications: data.specifications ?? {},
      justification: data.justification,
      financeApprovalRequired: threshold !== null && data.estimatedCost > threshold,
      reviewer: null,
      reviewNotes: null,
      costOverride: false,
      manifest: null,
      createdAt: this.now().toISOString(),
    });

    this.log('info', {
      event: 'approval_submitted',
      request_id: request.id,
      estimated_cost: request.estimatedCost,
      finance_approval_required: request.financeApprovalRequired,
    });
    this.emitSignal(request, null);
    return request;
  }

  /**
   * Notify the platform team. On success the request moves to `notified`;
   * on failure it stays `submitted` and the error propagates so the call
   * can be retried.
   */
  async notifyPlatformTeam(id: string): Promise<ApprovalRequest> {
    const current = await this.require(id);
    assertTransition(ApprovalLifecycleMachine, current.state, 'notified');

    try {
      await this.notifier.notify(current);
    } catch (err) {
      this.log('warn', {
        event: 'approval_notify_failed',
        request_id: id,
        message: err instanceof Error ? err.message : String(err),
      });
      throw err;
    }

    return this.move(current, 'notified');
  }

  /** A reviewer picks up a notified request. */
  async openReview(id: string, reviewer: string): Promise<ApprovalRequest> {
    if (!reviewer.trim()) {
      throw new ValidationError('reviewer is required', ['reviewer: reviewer is required']);
    }
    const current = await this.require(id);
    assertTransition(ApprovalLifecycleMachine, current.state, 'under_review');
    return this.move(current, 'under_review', { reviewer });
  }

  /**
   * Record a review decision. Only valid from `under_review`.
   *
   * @throws {InvalidStateTransition} from any other state
   */
  async review(
    id: string,
    decision: ReviewDecision,
    reviewer: string,
    opts: ReviewOptions = {},
  ): Promise<ReviewResult> {
    return startSanitizedSpan('claimgate.approval', { operation: 'review', request_id: id, reviewer }, async (span) => {
      const current = await this.require(id);
      const target: ApprovalState = decision === 'approve' ? 'approved' : 'rejected';
      assertTransition(ApprovalLifecycleMachine, current.state, target);

      if (decision === 'approve') {
        const ceiling = this.policy.current().costCeiling;
        if (current.estimatedCost > ceiling && opts.costOverride !== true) {
          this.log('warn', {
            event: 'approval_review_refused',
            request_id: id,
            reviewer,
            estimated_cost: current.estimatedCost,
            cost_ceiling: ceiling,
          });
          span.setAttribute('state', current.state);
          return { applied: false, request: current, reasons: [COST_CEILING_EXCEEDED] };
        }
      }

      const updated = await this.move(current, target, {
        reviewer,
        reviewNotes: opts.notes ?? null,
        costOverride: opts.costOverride === true,
      });
      span.setAttribute('state', updated.state);
      await this.tellRequester(updated);
      return { applied: true, request: updated, reasons: [] };
    });
  }

  /**
   * Mark an approved request provisioned and emit its manifest.
   *
   * The version-checked transition is claimed before anything is emitted,
   * so two concurrent calls produce one manifest and the loser gets a
   * VersionConflictError. If the sink then fails the request stays
   * `provisioned` with its manifest recorded; use redeliverManifest.
   */
  async provision(id: string): Promise<ApprovalRequest> {
    const current = await this.require(id);
    assertTransition(ApprovalLifecycleMachine, current.state, 'provisioned');

    const provisioned = await this.move(current, 'provisioned', { manifest: buildManifest(current) });
    await this.deliver(provisioned);
    return provisioned;
  }

  /**
   * Emit the recorded manifest of a provisioned request again.
   *
   * @throws {InvalidStateTransition} when the request is not provisioned
   */
  async redeliverManifest(id: string): Promise<ApprovalRequest> {
    const current = await this.require(id);
    if (current.state !== 'provisioned' || current.manifest === null) {
      throw new InvalidStateTransition(
        ApprovalLifecycleMachine.name,
        current.state,
        'provisioned',
        `Request ${id} has no manifest to redeliver (state ${current.state})`,
      );
    }
    await this.deliver(current);
    this.log('info', { event: 'manifest_redelivered', request_id: id });
    return current;
  }

  /** @throws {NotFoundError} */
  async get(id: string): Promise<ApprovalRequest> {
    return this.require(id);
  }

  async list(filters: ApprovalQueryFilters = {}): Promise<ApprovalRequest[]> {
    return this.store.list(filters);
  }

  private async deliver(request: ApprovalRequest): Promise<void> {
    if (request.manifest === null) return;
    try {
      await this.manifestSink.emit(request.manifest, request);
    } catch (err) {
      this.log('error', {
        event: 'manifest_emit_failed',
        request_id: request.id,
        message: err instanceof Error ? err.message : String(err),
      });
      throw err;
    }
  }

  /** The decision is already stored, so a failed delivery is logged only. */
  private async tellRequester(request: ApprovalRequest): Promise<void> {
    if (!this.requesterNotifier) return;
    try {
      await this.requesterNotifier.notifyDecision(request);
    } catch (err) {
      this.log('warn', {
        event: 'requester_notify_failed',
        request_id: request.id,
        message: err instanceof Error ? err.message : String(err),
      });
    }
  }

  private async require(id: string): Promise<ApprovalRequest> {
    const request = await this.store.get(id);
    if (!request) throw new NotFoundError('ApprovalRequest', id);
    return request;
  }

  private async move(
    current: ApprovalRequest,
    to: ApprovalState,
    update?: ApprovalUpdate,
  ): Promise<ApprovalRequest> {
    const updated = await this.store.transition(current.id, current.version, to, update);
    this.log('info', {
      event: 'approval_transition',
      request_id: updated.id,
      from: current.state,
      to: updated.state,
    });
    this.emitSignal(updated, current.state);
    return updated;
  }

  private emitSignal(request: ApprovalRequest, from: ApprovalState | null): void {
    if (!this.signals) return;
    void this.signals.publish(SignalEmitter.SUBJECTS.approval, {
      request_id: request.id,
      from,
      to: request.state,
      estimated_cost: request.estimatedCost,
      timestamp: this.now().toISOString(),
    }).catch((err: unknown) => {
      this.log('error', {
        event: 'approval_signal_failed',
        request_id: request.id,
        message: err instanceof Error ? err.message : String(err),
      });
    });
  }
}
