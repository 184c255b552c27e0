import type { Context } from 'hono';
import { ApiError, toApiError } from '../errors.js';
import { isGovernanceError } from '../services/governance-errors.js';
import type { LogFn } from '../middleware/logger.js';

/**
 * Shared route error handler — maps ApiError and GovernanceError to
 * structured JSON responses. Anything else is a 500 and is logged.
 */
export function handleRouteError(
  c: Context,
  err: unknown,
  log?: LogFn,
  fallbackMessage = 'Internal server error',
): Response {
  if (ApiError.isApiError(err)) {
    return c.json(err.body, err.status);
  }
  if (isGovernanceError(err)) {
    const apiErr = toApiError(err);
    if (err.type === 'CONFIGURATION' || err.type === 'TRANSIENT_INFRA') {
      log?.(err.type === 'CONFIGURATION' ? 'error' : 'warn', {
        event: 'route_error',
        path: c.req.path,
        type: err.type,
        message: err.message,
      });
    }
    return c.json(apiErr.body, apiErr.status);
  }
  log?.('error', {
    event: 'route_unhandled_error',
    path: c.req.path,
    message: err instanceof Error ? err.message : String(err),
  });
  return c.json({ error: 'internal_error', message: fallbackMessage }, 500);
}

/**
 * Read a JSON request body. Malformed JSON becomes a 400 ApiError instead
 * of an unhandled parse exception.
 */
export async function readJsonBody(c: Context): Promise<unknown> {
  try {
    const body: unknown = await c.req.json();
    return body;
  } catch {
    throw new ApiError(400, { error: 'invalid_request', message: 'Request body must be valid JSON' });
  }
}
