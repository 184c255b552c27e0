import { isLogLevel } from './middleware/logger.js';
import type { LogLevel } from './middleware/logger.js';
import { DEFAULT_ADMISSION_BUDGET_MS } from './services/admission-validator.js';

export interface GovernanceConfig {
  port: number;
  policyPath: string;
  /** Watch the policy file for changes (fs.watch with polling fallback). */
  policyWatch: boolean;
  /** Interval reload of the policy file; 0 disables. */
  policyReloadIntervalMs: number;
  adminKey: string;
  nodeEnv: string;
  logLevel: LogLevel;
  otelEndpoint: string | null;

  reconcileIntervalMs: number;
  adapterTimeoutMs: number;
  admissionTimeoutMs: number;
  retryAttempts: number;
  retryBaseDelayMs: number;

  /** Chat/incident webhook for platform-team notifications. */
  platformWebhookUrl: string | null;

  databaseUrl: string | null;
  natsUrl: string | null;
}

type Env = Record<string, string | undefined>;

function intFromEnv(env: Env, name: string, fallback: number, min = 0): number {
  const raw = env[name];
  if (raw === undefined || raw === '') return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value < min) {
    throw new Error(`${name} must be an integer >= ${min} (got '${raw}')`);
  }
  return value;
}

/**
 * Environment variables:
 *
 * CLAIMGATE_PORT                      (optional) — HTTP listen port; default 3010
 * CLAIMGATE_POLICY_PATH               (optional) — policy document (JSON); default ./config/policy.json
 * CLAIMGATE_POLICY_WATCH              (optional) — '1' reloads the policy when the file changes
 * CLAIMGATE_POLICY_RELOAD_INTERVAL_MS (optional) — periodic policy reload; default 0 (off)
 * CLAIMGATE_ADMIN_KEY                 (required in production) — key for /api/admin endpoints
 * CLAIMGATE_RECONCILE_INTERVAL_MS     (optional) — lifecycle cycle interval; default 3600000 (hourly)
 * CLAIMGATE_ADAPTER_TIMEOUT_MS        (optional) — deadline per claim source call; default 10000
 * CLAIMGATE_ADMISSION_TIMEOUT_MS      (optional) — admission hook latency budget; default 500
 * CLAIMGATE_RETRY_ATTEMPTS            (optional) — attempts per claim update; default 3
 * CLAIMGATE_RETRY_BASE_DELAY_MS       (optional) — backoff base delay; default 200
 * CLAIMGATE_PLATFORM_WEBHOOK_URL      (optional) — platform-team notification webhook
 * DATABASE_URL                        (optional) — PostgreSQL; null keeps claims and approvals in memory
 * NATS_URL                            (optional) — NATS server; null disables signal publishing
 * NODE_ENV                            (optional) — runtime environment; default 'development'
 * LOG_LEVEL                           (optional) — error | warn | info | debug; default 'info'
 * OTEL_EXPORTER_OTLP_ENDPOINT         (optional) — OpenTelemetry collector; null disables export
 */
export function loadConfig(env: Env = process.env): GovernanceConfig {
  const nodeEnv = env.NODE_ENV ?? 'development';

  // An empty admin key would leave the admin API open in production
  const adminKey = env.CLAIMGATE_ADMIN_KEY ?? '';
  if (!adminKey && nodeEnv === 'production') {
    throw new Error('CLAIMGATE_ADMIN_KEY is required in production (empty key disables admin authentication)');
  }

  const logLevel = env.LOG_LEVEL ?? 'info';
  if (!isLogLevel(logLevel)) {
    throw new Error(`LOG_LEVEL must be one of error, warn, info, debug (got '${logLevel}')`);
  }

  return {
    port: intFromEnv(env, 'CLAIMGATE_PORT', 3010, 1),
    policyPath: env.CLAIMGATE_POLICY_PATH ?? './config/policy.json',
    policyWatch: env.CLAIMGATE_POLICY_WATCH === '1',
    policyReloadIntervalMs: intFromEnv(env, 'CLAIMGATE_POLICY_RELOAD_INTERVAL_MS', 0),
    adminKey,
    nodeEnv,
    logLevel,
    otelEndpoint: env.OTEL_EXPORTER_OTLP_ENDPOINT ?? null,

    reconcileIntervalMs: intFromEnv(env, 'CLAIMGATE_RECONCILE_INTERVAL_MS', 3_600_000, 1_000),
    adapterTimeoutMs: intFromEnv(env, 'CLAIMGATE_ADAPTER_TIMEOUT_MS', 10_000, 1),
    admissionTimeoutMs: intFromEnv(env, 'CLAIMGATE_ADMISSION_TIMEOUT_MS', DEFAULT_ADMISSION_BUDGET_MS, 1),
    retryAttempts: intFromEnv(env, 'CLAIMGATE_RETRY_ATTEMPTS', 3, 1),
    retryBaseDelayMs: intFromEnv(env, 'CLAIMGATE_RETRY_BASE_DELAY_MS', 200),

    platformWebhookUrl: env.CLAIMGATE_PLATFORM_WEBHOOK_URL ?? null,

    databaseUrl: env.DATABASE_URL ?? null,
    natsUrl: env.NATS_URL ?? null,
  };
}
