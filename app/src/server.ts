import { Hono } from 'hono';
import { secureHeaders } from 'hono/secure-headers';
import { requestId } from './middleware/request-id.js';
import { createTracing } from './middleware/tracing.js';
import { createLogger } from './middleware/logger.js';
import type { LogFn } from './middleware/logger.js';
import { createBodyLimit } from './middleware/body-limit.js';
import { createHealthRoutes } from './routes/health.js';
import { createAdmissionRoutes } from './routes/admission.js';
import { createApprovalRoutes } from './routes/approvals.js';
import { createAdminRoutes } from './routes/admin.js';
import { createDbPool, type DbPool } from './db/client.js';
import { PgClaimSource } from './db/pg-claim-source.js';
import { PgApprovalStore } from './db/pg-approval-store.js';
import { PolicyStore } from './services/policy-store.js';
import { InMemoryClaimSource } from './services/claim-source.js';
import type { ClaimSourceAdapter } from './services/claim-source.js';
import { InMemoryApprovalStore } from './services/approval-store.js';
import type { ApprovalStore } from './services/approval-store.js';
import { ApprovalWorkflow } from './services/approval-workflow.js';
import { LifecycleMonitor } from './services/lifecycle-monitor.js';
import { SignalEmitter } from './services/signal-emitter.js';
import {
  LogManifestSink,
  LogPlatformNotifier,
  LogRequesterNotifier,
  SignalManifestSink,
  SignalPlatformNotifier,
  SignalRequesterNotifier,
  WebhookPlatformNotifier,
} from './services/platform-notifier.js';
import type { ManifestSink, PlatformNotifier, RequesterNotifier } from './services/platform-notifier.js';
import type { GovernanceConfig } from './config.js';

export interface GovernanceApp {
  app: Hono;
  log: LogFn;
  policyStore: PolicyStore;
  claimSource: ClaimSourceAdapter;
  approvalStore: ApprovalStore;
  workflow: ApprovalWorkflow;
  monitor: LifecycleMonitor;
  /** PostgreSQL pool (null when DATABASE_URL is not configured) */
  dbPool: DbPool | null;
  /** NATS signal emitter (null when NATS_URL is not configured) */
  signalEmitter: SignalEmitter | null;
}

/** Collaborators that replace the configured defaults, for tests and embedding. */
export interface GovernanceAppOverrides {
  policyStore?: PolicyStore;
  claimSource?: ClaimSourceAdapter;
  approvalStore?: ApprovalStore;
  notifier?: PlatformNotifier;
  manifestSink?: ManifestSink;
  requesterNotifier?: RequesterNotifier;
  /** Log line sink. Defaults to stdout. */
  write?: (line: string) => void;
  now?: () => Date;
}

/**
 * Create and configure the governance Hono application and its services.
 *
 * Infrastructure is optional: without DATABASE_URL claims and approval
 * requests are held in memory; without NATS_URL no signals are published.
 * Connections are not opened here (index.ts connects NATS and runs
 * migrations before serving).
 */
export function createGovernanceApp(
  config: GovernanceConfig,
  overrides: GovernanceAppOverrides = {},
): GovernanceApp {
  const app = new Hono();
  const { middleware: loggerMiddleware, log } = createLogger('claimgate', config.logLevel, overrides.write);
  const now = overrides.now ?? (() => new Date());

  const policyStore = overrides.policyStore ?? new PolicyStore(config.policyPath, {
    log,
    watch: config.policyWatch,
    reloadIntervalMs: config.policyReloadIntervalMs,
    now,
  });

  let dbPool: DbPool | null = null;
  if (config.databaseUrl && (!overrides.claimSource || !overrides.approvalStore)) {
    dbPool = createDbPool({ connectionString: config.databaseUrl, log });
  }

  let signalEmitter: SignalEmitter | null = null;
  if (config.natsUrl) {
    signalEmitter = new SignalEmitter({ url: config.natsUrl, log });
  }

  const claimSource = overrides.claimSource
    ?? (dbPool ? new PgClaimSource(dbPool, log) : new InMemoryClaimSource());
  const approvalStore = overrides.approvalStore
    ?? (dbPool ? new PgApprovalStore(dbPool, log) : new InMemoryApprovalStore(now));

  // Notification channel: webhook, then NATS, then the log
  let notifier: PlatformNotifier;
  if (overrides.notifier) {
    notifier = overrides.notifier;
  } else if (config.platformWebhookUrl) {
    notifier = new WebhookPlatformNotifier({
      url: config.platformWebhookUrl,
      attempts: config.retryAttempts,
      baseDelayMs: config.retryBaseDelayMs,
      log,
    });
  } else if (signalEmitter) {
    notifier = new SignalPlatformNotifier(signalEmitter);
  } else {
    notifier = new LogPlatformNotifier(log);
  }

  const manifestSink = overrides.manifestSink
    ?? (signalEmitter ? new SignalManifestSink(signalEmitter) : new LogManifestSink(log));

  const workflow = new ApprovalWorkflow({
    store: approvalStore,
    policy: policyStore,
    notifier,
    manifestSink,
    requesterNotifier: overrides.requesterNotifier
      ?? (signalEmitter ? new SignalRequesterNotifier(signalEmitter) : new LogRequesterNotifier(log)),
    signals: signalEmitter,
    log,
    now,
  });

  const monitor = new LifecycleMonitor({
    source: claimSource,
    policy: policyStore,
    intervalMs: config.reconcileIntervalMs,
    adapterTimeoutMs: config.adapterTimeoutMs,
    retryAttempts: config.retryAttempts,
    retryBaseDelayMs: config.retryBaseDelayMs,
    log,
    signals: signalEmitter,
    now,
  });

  // Middleware ordering:
  // 1. requestId — generates the request ID before anything else
  // 2. tracing — request span joins the caller's trace
  // 3. secureHeaders — security headers on every response
  // 4. bodyLimit — reject oversized payloads early
  // 5. logger — one line per request with latency
  app.use('*', requestId());
  app.use('*', createTracing());
  app.use('*', secureHeaders({
    strictTransportSecurity: 'max-age=31536000; includeSubDomains',
    xFrameOptions: 'DENY',
    referrerPolicy: 'no-referrer',
  }));
  app.use('*', createBodyLimit());
  app.use('*', loggerMiddleware);

  // --- Routes ---
  app.route('/api/health', createHealthRoutes({ policyStore, monitor, dbPool, signalEmitter }));
  app.route('/', createAdmissionRoutes({
    policy: policyStore,
    log,
    budgetMs: config.admissionTimeoutMs,
    now,
  }));
  app.route('/api/approvals', createApprovalRoutes({ workflow, log }));
  app.route('/api/admin', createAdminRoutes({ adminKey: config.adminKey, policyStore, monitor, log }));

  app.notFound((c) => c.json({ error: 'not_found', message: 'Route not found' }, 404));

  return {
    app,
    log,
    policyStore,
    claimSource,
    approvalStore,
    workflow,
    monitor,
    dbPool,
    signalEmitter,
  };
}
