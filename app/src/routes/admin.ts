import { Hono } from 'hono';
import type { LifecycleMonitor } from '../services/lifecycle-monitor.js';
import type { PolicyStore } from '../services/policy-store.js';
import type { LogFn } from '../middleware/logger.js';
import { safeEqual } from '../utils/crypto.js';
import { handleRouteError } from '../utils/error-handler.js';

export interface AdminRouteDeps {
  adminKey: string;
  policyStore: PolicyStore;
  monitor: LifecycleMonitor;
  log?: LogFn;
}

/**
 * Operator routes: policy status and reload, on-demand reconciliation.
 * Gated by the admin API key.
 */
export function createAdminRoutes(deps: AdminRouteDeps): Hono {
  const { adminKey, policyStore, monitor, log } = deps;
  const app = new Hono();

  app.use('*', async (c, next) => {
    // An unconfigured key rejects everything; safeEqual('', '') would otherwise pass
    if (!adminKey) {
      return c.json({ error: 'forbidden', message: 'Admin API not configured' }, 403);
    }
    const authHeader = c.req.header('authorization');
    if (!authHeader) {
      return c.json({ error: 'unauthorized', message: 'Admin key required' }, 401);
    }
    const key = authHeader.startsWith('Bearer ') ? authHeader.slice(7) : authHeader;
    if (!safeEqual(key, adminKey)) {
      return c.json({ error: 'forbidden', message: 'Invalid admin key' }, 403);
    }
    await next();
  });

  /** GET /policy — active policy version and last load error. */
  app.get('/policy', (c) => {
    const status = policyStore.getStatus();
    return c.json({
      loaded: status.loaded,
      version: status.version,
      loaded_at: status.loadedAt,
      last_error: status.lastError,
      reload_count: status.reloadCount,
    });
  });

  /**
   * POST /policy/reload — re-read the policy document. An invalid document
   * leaves the store without a policy (fail closed) and answers 503.
   */
  app.post('/policy/reload', (c) => {
    try {
      const snapshot = policyStore.reload();
      log?.('info', { event: 'policy_reload_requested', trigger: 'admin', version: snapshot.version });
      return c.json({ version: snapshot.version, loaded_at: snapshot.loadedAt, rules: snapshot.rules.length });
    } catch (err) {
      return handleRouteError(c, err, log);
    }
  });

  /** GET /monitor — lifecycle monitor health. */
  app.get('/monitor', (c) => c.json(monitor.getHealth()));

  /**
   * POST /reconcile — run a lifecycle cycle now and return its report.
   * 409 while another cycle is in flight.
   */
  app.post('/reconcile', async (c) => {
    try {
      const result = await monitor.trigger('admin');
      if (!result) {
        return c.json({ error: 'cycle_in_progress', message: 'A reconciliation cycle is already running' }, 409);
      }
      return c.json(result, result.status === 'skipped' ? 503 : 200);
    } catch (err) {
      return handleRouteError(c, err, log);
    }
  });

  return app;
}
