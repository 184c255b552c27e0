import { describe, it, expect, beforeEach } from 'vitest';
import { fileURLToPath } from 'node:url';
import { createGovernanceApp } from '../../src/server.js';
import type { GovernanceApp } from '../../src/server.js';
import { loadConfig } from '../../src/config.js';
import { InMemoryClaimSource } from '../../src/services/claim-source.js';
import { makeClaim, daysAgo, NOW } from '../fixtures/policy.js';

const EXAMPLE_POLICY = fileURLToPath(new URL('../../config/policy.json', import.meta.url));

describe('createGovernanceApp', () => {
  let governance: GovernanceApp;
  let lines: string[];

  beforeEach(() => {
    lines = [];
    const config = loadConfig({
      CLAIMGATE_POLICY_PATH: EXAMPLE_POLICY,
      CLAIMGATE_ADMIN_KEY: 'test-secret',
    });
    governance = createGovernanceApp(config, {
      claimSource: new InMemoryClaimSource([makeClaim({ id: 'sandbox/db', namespace: 'sandbox', createdAt: daysAgo(45) })]),
      write: (line) => {
        lines.push(line);
      },
      now: () => NOW,
    });
    governance.policyStore.reload();
  });

  it('runs in memory without database or NATS', () => {
    expect(governance.dbPool).toBeNull();
    expect(governance.signalEmitter).toBeNull();
  });

  it('serves health with request id, trace and security headers', async () => {
    const res = await governance.app.request('/api/health');

    expect(res.status).toBe(200);
    expect(res.headers.get('X-Request-Id')).toBeTruthy();
    expect(res.headers.get('traceparent')).toBeTruthy();
    expect(res.headers.get('X-Frame-Options')).toBe('DENY');
    expect((await res.json()).policy.version).toBe('2024.1');
  });

  it('logs one line per request', async () => {
    lines.length = 0;
    await governance.app.request('/api/health');

    const entry = JSON.parse(lines[lines.length - 1] ?? '{}');
    expect(entry).toMatchObject({ level: 'info', service: 'claimgate', method: 'GET', path: '/api/health', status: 200 });
  });

  it('answers unknown routes with a JSON 404', async () => {
    const res = await governance.app.request('/nope');
    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({ error: 'not_found', message: 'Route not found' });
  });

  it('mounts the admission hook at the root', async () => {
    const res = await governance.app.request('/api/admission/validate', {
      method: 'POST',
      headers: { 'content-type': 'application/json' },
      body: JSON.stringify({ name: 'db', namespace: 'team-alpha', tier: 'development', storageSizeGB: 10 }),
    });

    expect(await res.json()).toEqual({
      allowed: true,
      reasons: [],
      claim_id: 'team-alpha/db',
      policy_version: '2024.1',
    });
  });

  it('notifies through the log channel when no webhook or NATS is configured', async () => {
    const res = await governance.app.request('/api/approvals', {
      method: 'POST',
      headers: { 'content-type': 'application/json' },
      body: JSON.stringify({ requester: 'alice', description: 'Kafka cluster', estimatedCost: 800, justification: 'Event bus for order events' }),
    });

    expect(res.status).toBe(201);
    expect((await res.json()).state).toBe('notified');
    expect(lines.some((l) => l.includes('"event":"notification_log"'))).toBe(true);
  });

  it('reconciles through the admin API', async () => {
    const res = await governance.app.request('/api/admin/reconcile', {
      method: 'POST',
      headers: { authorization: 'Bearer test-secret' },
    });

    expect(res.status).toBe(200);
    expect((await governance.claimSource.get('sandbox/db'))?.status).toBe('flagged-for-cleanup');
  });
});
