import { describe, it, expect, vi, beforeEach } from 'vitest';
import { fileURLToPath } from 'node:url';
import { createHealthRoutes } from '../../src/routes/health.js';
import { PolicyStore } from '../../src/services/policy-store.js';
import { LifecycleMonitor } from '../../src/services/lifecycle-monitor.js';
import { InMemoryClaimSource } from '../../src/services/claim-source.js';
import { SignalEmitter } from '../../src/services/signal-emitter.js';
import { createMockPool } from '../fixtures/pg-test.js';

const EXAMPLE_POLICY = fileURLToPath(new URL('../../config/policy.json', import.meta.url));

describe('health routes', () => {
  let policyStore: PolicyStore;

  beforeEach(() => {
    policyStore = new PolicyStore(EXAMPLE_POLICY);
    policyStore.reload();
  });

  it('returns healthy with the loaded policy version', async () => {
    const app = createHealthRoutes({ policyStore });
    const res = await app.request('/');
    const body = await res.json();

    expect(res.status).toBe(200);
    expect(body.status).toBe('healthy');
    expect(body.version).toBe('1.0.0');
    expect(body.policy).toMatchObject({ status: 'loaded', version: '2024.1' });
    expect(body.monitor).toBeNull();
    expect(body.services).toEqual({});
    expect(body.uptime_seconds).toBeGreaterThanOrEqual(0);
  });

  it('returns 503 unhealthy when no policy is loaded', async () => {
    const app = createHealthRoutes({ policyStore: new PolicyStore('/nonexistent/policy.json') });
    const res = await app.request('/');
    const body = await res.json();

    expect(res.status).toBe(503);
    expect(body.status).toBe('unhealthy');
    expect(body.policy).toEqual({ status: 'unavailable', version: null, loaded_at: null });
  });

  it('reports lifecycle monitor health', async () => {
    const monitor = new LifecycleMonitor({ source: new InMemoryClaimSource(), policy: policyStore });
    await monitor.runCycle();

    const app = createHealthRoutes({ policyStore, monitor });
    const body = await (await app.request('/')).json();

    expect(body.monitor).toMatchObject({ running: false, errors: 0 });
  });

  it('returns degraded when PostgreSQL is unreachable', async () => {
    const pool = createMockPool();
    pool._setError('SELECT 1', new Error('ECONNREFUSED'));

    const app = createHealthRoutes({ policyStore, dbPool: pool });
    const res = await app.request('/');
    const body = await res.json();

    expect(res.status).toBe(200);
    expect(body.status).toBe('degraded');
    expect(body.services.postgres).toMatchObject({ status: 'unreachable', error: 'Failed to reach PostgreSQL' });
  });

  it('returns degraded when NATS is not connected', async () => {
    const signalEmitter = new SignalEmitter({ url: 'nats://localhost:4222' });

    const app = createHealthRoutes({ policyStore, signalEmitter });
    const body = await (await app.request('/')).json();

    expect(body.status).toBe('degraded');
    expect(body.services.nats.status).toBe('unreachable');
  });

  it('caches a healthy PostgreSQL probe', async () => {
    const pool = createMockPool();
    const app = createHealthRoutes({ policyStore, dbPool: pool });

    await app.request('/');
    await app.request('/');

    expect(pool.query).toHaveBeenCalledTimes(1);
  });

  it('re-probes a failed dependency after its shorter TTL', async () => {
    vi.useFakeTimers();
    try {
      const pool = createMockPool();
      pool._setError('SELECT 1', new Error('ECONNREFUSED'));
      const app = createHealthRoutes({ policyStore, dbPool: pool });

      await app.request('/');
      vi.advanceTimersByTime(5_001);
      await app.request('/');

      expect(pool.query).toHaveBeenCalledTimes(2);
    } finally {
      vi.useRealTimers();
    }
  });
});
