import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { Hono } from 'hono';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { createAdminRoutes } from '../../src/routes/admin.js';
import { PolicyStore } from '../../src/services/policy-store.js';
import { LifecycleMonitor } from '../../src/services/lifecycle-monitor.js';
import { InMemoryClaimSource } from '../../src/services/claim-source.js';
import type { Claim } from '../../src/types/claim.js';
import { NOW, daysAgo, makeClaim, testPolicyDocument } from '../fixtures/policy.js';

describe('admin routes', () => {
  const adminKey = 'test-secret';
  const auth = { authorization: `Bearer ${adminKey}` };
  let tmpDir: string;
  let policyPath: string;
  let policyStore: PolicyStore;
  let source: InMemoryClaimSource;
  let monitor: LifecycleMonitor;
  let app: Hono;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'claimgate-admin-'));
    policyPath = path.join(tmpDir, 'policy.json');
    fs.writeFileSync(policyPath, JSON.stringify(testPolicyDocument()));
    policyStore = new PolicyStore(policyPath, { now: () => NOW });
    policyStore.reload();
    source = new InMemoryClaimSource([makeClaim({ createdAt: daysAgo(40) })]);
    monitor = new LifecycleMonitor({ source, policy: policyStore, now: () => NOW });
    app = new Hono();
    app.route('/api/admin', createAdminRoutes({ adminKey, policyStore, monitor }));
  });

  afterEach(() => {
    policyStore.close();
    fs.rmSync(tmpDir, { recursive: true });
  });

  it('returns 401 without admin key', async () => {
    const res = await app.request('/api/admin/policy');
    expect(res.status).toBe(401);
  });

  it('returns 403 with invalid admin key', async () => {
    const res = await app.request('/api/admin/policy', {
      headers: { authorization: 'Bearer wrong-key' },
    });
    expect(res.status).toBe(403);
  });

  it('returns 403 for every request when no key is configured', async () => {
    const open = new Hono();
    open.route('/api/admin', createAdminRoutes({ adminKey: '', policyStore, monitor }));

    const res = await open.request('/api/admin/policy', { headers: { authorization: 'Bearer ' } });
    expect(res.status).toBe(403);
    expect(await res.json()).toEqual({ error: 'forbidden', message: 'Admin API not configured' });
  });

  it('reports the active policy', async () => {
    const res = await app.request('/api/admin/policy', { headers: auth });
    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({
      loaded: true,
      version: 'test-1',
      loaded_at: NOW.toISOString(),
      last_error: null,
      reload_count: 1,
    });
  });

  it('reloads the policy document', async () => {
    fs.writeFileSync(policyPath, JSON.stringify(testPolicyDocument({ version: 'test-2' })));

    const res = await app.request('/api/admin/policy/reload', { method: 'POST', headers: auth });

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ version: 'test-2', loaded_at: NOW.toISOString(), rules: 3 });
    expect(policyStore.current().version).toBe('test-2');
  });

  it('answers 503 and fails closed when the reloaded document is invalid', async () => {
    fs.writeFileSync(policyPath, JSON.stringify({ version: 'broken' }));

    const res = await app.request('/api/admin/policy/reload', { method: 'POST', headers: auth });
    const body = await res.json();

    expect(res.status).toBe(503);
    expect(body.error).toBe('policy_unavailable');
    expect(policyStore.getStatus().loaded).toBe(false);
  });

  it('runs a reconciliation cycle on demand', async () => {
    const res = await app.request('/api/admin/reconcile', { method: 'POST', headers: auth });
    const body = await res.json();

    expect(res.status).toBe(200);
    expect(body.status).toBe('completed');
    expect(body.applied).toEqual([
      { kind: 'flag-for-cleanup', claimId: 'team-alpha/db', ageDays: 40, maxAgeDays: 30 },
    ]);
    expect((await source.get('team-alpha/db'))?.status).toBe('flagged-for-cleanup');
  });

  it('answers 409 while a cycle is in flight', async () => {
    let release: (claims: Claim[]) => void = () => {};
    const blocking = new LifecycleMonitor({
      source: {
        list: () => new Promise<Claim[]>((resolve) => {
          release = resolve;
        }),
        get: async () => null,
        patch: async () => {
          throw new Error('unreachable');
        },
      },
      policy: policyStore,
    });
    const busy = new Hono();
    busy.route('/api/admin', createAdminRoutes({ adminKey, policyStore, monitor: blocking }));

    const first = blocking.trigger('test');
    const res = await busy.request('/api/admin/reconcile', { method: 'POST', headers: auth });

    expect(res.status).toBe(409);
    expect((await res.json()).error).toBe('cycle_in_progress');
    release([]);
    await first;
  });

  it('answers 503 when the cycle is skipped for lack of policy', async () => {
    fs.writeFileSync(policyPath, '{');
    policyStore.reloadQuietly('test');

    const res = await app.request('/api/admin/reconcile', { method: 'POST', headers: auth });

    expect(res.status).toBe(503);
    expect((await res.json()).status).toBe('skipped');
  });

  it('reports monitor health', async () => {
    const res = await app.request('/api/admin/monitor', { headers: auth });
    expect(await res.json()).toMatchObject({ running: false, cycleInProgress: false, cycleCount: 0 });
  });
});
