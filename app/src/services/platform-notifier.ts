/**
 * Platform notification and manifest delivery for the approval workflow.
 *
 * A PlatformNotifier tells the platform team a custom request is waiting;
 * a failed notification throws TransientInfraError so the request stays
 * `submitted` and the call can be retried. A ManifestSink hands approved
 * requests to the provisioning engine. A RequesterNotifier tells the
 * requester how their request was decided.
 *
 * Channels:
 * - webhook: JSON POST to a chat/incident webhook with bounded backoff
 * - signal: NATS JetStream publish
 * - log: structured stdout line (always succeeds)
 */
import type { ApprovalRequest, ManifestDescriptor } from '../types/approval.js';
import type { LogFn } from '../middleware/logger.js';
import { TransientInfraError } from './governance-errors.js';
import { withRetry } from './retry.js';
import { SignalEmitter } from './signal-emitter.js';
import type { SignalPublisher } from './signal-emitter.js';

export interface PlatformNotifier {
  /** @throws {TransientInfraError} when the notification could not be delivered */
  notify(request: ApprovalRequest): Promise<void>;
}

export interface ManifestSink {
  /** @throws {TransientInfraError} when the manifest could not be handed off */
  emit(manifest: ManifestDescriptor, request: ApprovalRequest): Promise<void>;
}

export interface RequesterNotifier {
  notifyDecision(request: ApprovalRequest): Promise<void>;
}

export function decisionText(request: ApprovalRequest): string {
  const by = request.reviewer ? ` by ${request.reviewer}` : '';
  const notes = request.reviewNotes ? `. Notes: ${request.reviewNotes}` : '';
  return `Request ${request.id} has been ${request.state}${by}${notes}`;
}

function notificationText(request: ApprovalRequest): string {
  const cost = `$${request.estimatedCost.toLocaleString('en-US')}`;
  const finance = request.financeApprovalRequired ? ' (finance approval required)' : '';
  return `Custom infrastructure request ${request.id} from ${request.requester}: ${request.description} [${cost}${finance}]`;
}

// ---------------------------------------------------------------------------
// Webhook
// ---------------------------------------------------------------------------

export interface WebhookNotifierOptions {
  readonly url: string;
  readonly attempts?: number;
  readonly baseDelayMs?: number;
  readonly log?: LogFn;
  /** Injectable fetch for testing. Defaults to global fetch. */
  readonly fetch?: typeof globalThis.fetch;
  readonly sleep?: (ms: number) => Promise<void>;
}

/** Non-retryable HTTP failure (4xx other than 429). */
class WebhookRejectedError extends Error {
  constructor(readonly status: number) {
    super(`Webhook rejected notification: HTTP ${status}`);
    this.name = 'WebhookRejectedError';
  }
}

export class WebhookPlatformNotifier implements PlatformNotifier {
  private readonly opts: WebhookNotifierOptions;
  private readonly log: LogFn;
  private readonly _fetch: typeof globalThis.fetch;

  constructor(opts: WebhookNotifierOptions) {
    this.opts = opts;
    this.log = opts.log ?? (() => {});
    this._fetch = opts.fetch ?? globalThis.fetch;
  }

  async notify(request: ApprovalRequest): Promise<void> {
    const body = JSON.stringify({
      text: notificationText(request),
      request_id: request.id,
      requester: request.requester,
      estimated_cost: request.estimatedCost,
      finance_approval_required: request.financeApprovalRequired,
    });

    try {
      await withRetry(async () => {
        let response: Response;
        try {
          response = await this._fetch(this.opts.url, {
            method: 'POST',
            headers: { 'Content-Type': 'application/json' },
            body,
          });
        } catch (err) {
          throw new TransientInfraError('Webhook unreachable', { cause: err });
        }
        if (response.ok) return;
        if (response.status >= 400 && response.status < 500 && response.status !== 429) {
          throw new WebhookRejectedError(response.status);
        }
        throw new TransientInfraError(`Webhook returned HTTP ${response.status}`);
      }, {
        attempts: this.opts.attempts ?? 3,
        baseDelayMs: this.opts.baseDelayMs ?? 500,
        ...(this.opts.sleep ? { sleep: this.opts.sleep } : {}),
        onRetry: (err, attempt, delayMs) => this.log('warn', {
          event: 'notification_retry',
          request_id: request.id,
          attempt: attempt + 1,
          delay_ms: delayMs,
          error: err instanceof Error ? err.message : String(err),
        }),
      });
    } catch (err) {
      this.log('error', {
        event: 'notification_failed',
        channel: 'webhook',
        request_id: request.id,
        error: err instanceof Error ? err.message : String(err),
      });
      if (err instanceof TransientInfraError) throw err;
      throw new TransientInfraError(
        err instanceof Error ? err.message : String(err),
        { cause: err },
      );
    }

    this.log('info', { event: 'notification_delivered', channel: 'webhook', request_id: request.id });
  }
}

// ---------------------------------------------------------------------------
// NATS signal
// ---------------------------------------------------------------------------

export class SignalPlatformNotifier implements PlatformNotifier {
  constructor(private readonly publisher: SignalPublisher) {}

  async notify(request: ApprovalRequest): Promise<void> {
    const published = await this.publisher.publish(SignalEmitter.SUBJECTS.notification, {
      type: 'approval_submitted',
      request_id: request.id,
      requester: request.requester,
      description: request.description,
      estimated_cost: request.estimatedCost,
      finance_approval_required: request.financeApprovalRequired,
      timestamp: new Date().toISOString(),
    });
    if (!published) {
      throw new TransientInfraError(`Notification for ${request.id} was not published`);
    }
  }
}

export class SignalRequesterNotifier implements RequesterNotifier {
  constructor(private readonly publisher: SignalPublisher) {}

  async notifyDecision(request: ApprovalRequest): Promise<void> {
    const published = await this.publisher.publish(SignalEmitter.SUBJECTS.notification, {
      type: 'approval_decided',
      request_id: request.id,
      requester: request.requester,
      state: request.state,
      reviewer: request.reviewer,
      text: decisionText(request),
      timestamp: new Date().toISOString(),
    });
    if (!published) {
      throw new TransientInfraError(`Decision notice for ${request.id} was not published`);
    }
  }
}

export class SignalManifestSink implements ManifestSink {
  constructor(private readonly publisher: SignalPublisher) {}

  async emit(manifest: ManifestDescriptor, request: ApprovalRequest): Promise<void> {
    const published = await this.publisher.publish(SignalEmitter.SUBJECTS.manifest, {
      request_id: request.id,
      manifest: { ...manifest },
      timestamp: new Date().toISOString(),
    });
    if (!published) {
      throw new TransientInfraError(`Manifest ${manifest.metadata.name} was not published`);
    }
  }
}

// ---------------------------------------------------------------------------
// Log
// ---------------------------------------------------------------------------

export class LogPlatformNotifier implements PlatformNotifier {
  constructor(private readonly log: LogFn) {}

  async notify(request: ApprovalRequest): Promise<void> {
    this.log('info', {
      event: 'notification_log',
      request_id: request.id,
      text: notificationText(request),
    });
  }
}

export class LogManifestSink implements ManifestSink {
  constructor(private readonly log: LogFn) {}

  async emit(manifest: ManifestDescriptor, request: ApprovalRequest): Promise<void> {
    this.log('info', {
      event: 'manifest_emitted',
      request_id: request.id,
      manifest,
    });
  }
}

export class LogRequesterNotifier implements RequesterNotifier {
  constructor(private readonly log: LogFn) {}

  async notifyDecision(request: ApprovalRequest): Promise<void> {
    this.log('info', {
      event: 'requester_notified',
      request_id: request.id,
      requester: request.requester,
      text: decisionText(request),
    });
  }
}
