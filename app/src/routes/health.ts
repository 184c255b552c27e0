import { Hono } from 'hono';
import type { DbPool } from '../db/client.js';
import { checkDbHealth } from '../db/client.js';
import type { LifecycleMonitor } from '../services/lifecycle-monitor.js';
import type { PolicyStore } from '../services/policy-store.js';
import type { SignalEmitter } from '../services/signal-emitter.js';
import type { HealthResponse, ServiceHealth } from '../types.js';

const VERSION = '1.0.0';
const startedAt = Date.now();

/** Cache healthy probes longer than failing ones so recovery shows quickly. */
const HEALTHY_CACHE_TTL_MS = 10_000;
const UNHEALTHY_CACHE_TTL_MS = 5_000;

interface CachedHealth {
  data: ServiceHealth;
  expiresAt: number;
}

function cacheTtl(status: ServiceHealth['status']): number {
  return status === 'healthy' ? HEALTHY_CACHE_TTL_MS : UNHEALTHY_CACHE_TTL_MS;
}

export interface HealthDependencies {
  policyStore: PolicyStore;
  monitor?: LifecycleMonitor | null;
  dbPool?: DbPool | null;
  signalEmitter?: SignalEmitter | null;
}

/**
 * Probe a dependency, caching the outcome per TTL. `probe` resolves to the
 * measured latency or rejects when the dependency is unreachable.
 */
function cachedProbe(name: string, probe: () => Promise<number>) {
  let cached: CachedHealth | null = null;

  return async (): Promise<ServiceHealth> => {
    const now = Date.now();
    if (cached && now < cached.expiresAt) return cached.data;

    let result: ServiceHealth;
    try {
      const latency = await probe();
      result = { status: 'healthy', latency_ms: latency };
    } catch {
      result = { status: 'unreachable', latency_ms: Date.now() - now, error: `Failed to reach ${name}` };
    }
    cached = { data: result, expiresAt: now + cacheTtl(result.status) };
    return result;
  };
}

/**
 * GET / — liveness and dependency health.
 *
 * Unhealthy when no policy is loaded (admission denies everything);
 * degraded when a configured dependency is unreachable.
 */
export function createHealthRoutes(deps: HealthDependencies): Hono {
  const app = new Hono();

  const dbPool = deps.dbPool;
  const signalEmitter = deps.signalEmitter;
  const dbProbe = dbPool ? cachedProbe('PostgreSQL', () => checkDbHealth(dbPool)) : null;
  const natsProbe = signalEmitter ? cachedProbe('NATS', () => signalEmitter.healthCheck()) : null;

  app.get('/', async (c) => {
    const [pgHealth, natsHealth] = await Promise.all([
      dbProbe ? dbProbe() : Promise.resolve(null),
      natsProbe ? natsProbe() : Promise.resolve(null),
    ]);

    const policy = deps.policyStore.getStatus();
    const monitor = deps.monitor?.getHealth() ?? null;

    let overallStatus: HealthResponse['status'] = 'healthy';
    if (!policy.loaded) {
      overallStatus = 'unhealthy';
    } else if (pgHealth?.status === 'unreachable' || natsHealth?.status === 'unreachable') {
      overallStatus = 'degraded';
    }

    const services: HealthResponse['services'] = {};
    if (pgHealth) services.postgres = pgHealth;
    if (natsHealth) services.nats = natsHealth;

    const response: HealthResponse = {
      status: overallStatus,
      version: VERSION,
      uptime_seconds: Math.floor((Date.now() - startedAt) / 1000),
      policy: {
        status: policy.loaded ? 'loaded' : 'unavailable',
        version: policy.version,
        loaded_at: policy.loadedAt,
      },
      monitor: monitor
        ? {
            running: monitor.running,
            cycle_count: monitor.cycleCount,
            last_cycle_ms: monitor.lastCycleMs,
            errors: monitor.errors,
          }
        : null,
      services,
      timestamp: new Date().toISOString(),
    };

    return c.json(response, overallStatus === 'unhealthy' ? 503 : 200);
  });

  return app;
}
