/**
 * Approval routes — out-of-blueprint infrastructure requests.
 *
 * Routes delegate to ApprovalWorkflow; state and guard errors map to HTTP
 * through handleRouteError (invalid transition → 409, unknown id → 404).
 */
import { Hono } from 'hono';
import { APPROVAL_STATES, ReviewApprovalSchema } from '../types/approval.js';
import type { ApprovalRequest, ApprovalState } from '../types/approval.js';
import type { ApprovalWorkflow } from '../services/approval-workflow.js';
import { ValidationError } from '../services/governance-errors.js';
import type { LogFn } from '../middleware/logger.js';
import { handleRouteError, readJsonBody } from '../utils/error-handler.js';

export interface ApprovalRouteDeps {
  workflow: ApprovalWorkflow;
  log?: LogFn;
}

/** Path param safety: alphanumeric, hyphens, underscores only. */
const PATH_PARAM_RE = /^[a-zA-Z0-9_-]{1,128}$/;

const VALID_STATES: ReadonlySet<string> = new Set(APPROVAL_STATES);

function isApprovalState(value: string): value is ApprovalState {
  return VALID_STATES.has(value);
}

function requireId(id: string): string {
  if (!PATH_PARAM_RE.test(id)) {
    throw new ValidationError('Invalid request id', ['id: must be alphanumeric, "-" or "_"']);
  }
  return id;
}

function toResponse(request: ApprovalRequest) {
  return {
    id: request.id,
    state: request.state,
    requester: request.requester,
    description: request.description,
    estimated_cost: request.estimatedCost,
    team: request.team,
    resource_type: request.resourceType,
    specifications: request.specifications,
    justification: request.justification,
    finance_approval_required: request.financeApprovalRequired,
    reviewer: request.reviewer,
    review_notes: request.reviewNotes,
    cost_override: request.costOverride,
    manifest: request.manifest,
    created_at: request.createdAt,
    updated_at: request.updatedAt,
  };
}

export function createApprovalRoutes(deps: ApprovalRouteDeps): Hono {
  const { workflow, log } = deps;
  const app = new Hono();

  /**
   * POST / — submit, then notify the platform team. A notification failure
   * leaves the request `submitted` (still 201) with `notification_error`
   * set; POST /:id/notify retries it.
   */
  app.post('/', async (c) => {
    let request: ApprovalRequest;
    try {
      request = await workflow.submit(await readJsonBody(c));
    } catch (err) {
      return handleRouteError(c, err, log);
    }

    try {
      const notified = await workflow.notifyPlatformTeam(request.id);
      return c.json(toResponse(notified), 201);
    } catch (err) {
      return c.json({
        ...toResponse(request),
        notification_error: err instanceof Error ? err.message : String(err),
      }, 201);
    }
  });

  /** GET / — list requests, newest first. Optional ?state= and ?limit=. */
  app.get('/', async (c) => {
    try {
      const stateParam = c.req.query('state');
      if (stateParam !== undefined && !isApprovalState(stateParam)) {
        throw new ValidationError(
          `state must be one of: ${APPROVAL_STATES.join(', ')}`,
          [`state: unknown state '${stateParam}'`],
        );
      }
      const limitParam = c.req.query('limit');
      const limit = limitParam !== undefined ? Number(limitParam) : undefined;
      if (limit !== undefined && (!Number.isInteger(limit) || limit < 1 || limit > 500)) {
        throw new ValidationError('limit must be an integer between 1 and 500', ['limit: out of range']);
      }

      const requests = await workflow.list({
        ...(stateParam !== undefined ? { state: stateParam } : {}),
        ...(limit !== undefined ? { limit } : {}),
      });
      return c.json({ requests: requests.map(toResponse), total: requests.length });
    } catch (err) {
      return handleRouteError(c, err, log);
    }
  });

  /** GET /:id */
  app.get('/:id', async (c) => {
    try {
      const request = await workflow.get(requireId(c.req.param('id')));
      return c.json(toResponse(request));
    } catch (err) {
      return handleRouteError(c, err, log);
    }
  });

  /** POST /:id/notify — retry a failed platform-team notification. */
  app.post('/:id/notify', async (c) => {
    try {
      const request = await workflow.notifyPlatformTeam(requireId(c.req.param('id')));
      return c.json(toResponse(request));
    } catch (err) {
      return handleRouteError(c, err, log);
    }
  });

  /** POST /:id/open — a reviewer picks up the request. Body: { reviewer } */
  app.post('/:id/open', async (c) => {
    try {
      const id = requireId(c.req.param('id'));
      const body = await readJsonBody(c);
      const reviewer = typeof body === 'object' && body !== null && 'reviewer' in body ? body.reviewer : undefined;
      if (typeof reviewer !== 'string') {
        throw new ValidationError('reviewer is required', ['reviewer: reviewer is required']);
      }
      const request = await workflow.openReview(id, reviewer);
      return c.json(toResponse(request));
    } catch (err) {
      return handleRouteError(c, err, log);
    }
  });

  /**
   * POST /:id/review — approve or reject. A cost-ceiling refusal answers
   * 422 with the unchanged request.
   */
  app.post('/:id/review', async (c) => {
    try {
      const id = requireId(c.req.param('id'));
      const parsed = ReviewApprovalSchema.safeParse(await readJsonBody(c));
      if (!parsed.success) {
        const issues = parsed.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`);
        throw new ValidationError(`Invalid review: ${issues.join('; ')}`, issues);
      }
      const { decision, reviewer, costOverride, notes } = parsed.data;
      const result = await workflow.review(id, decision, reviewer, {
        ...(costOverride !== undefined ? { costOverride } : {}),
        ...(notes !== undefined ? { notes } : {}),
      });
      if (!result.applied) {
        return c.json({
          error: 'review_refused',
          message: result.reasons.join('; '),
          reasons: result.reasons,
          request: toResponse(result.request),
        }, 422);
      }
      return c.json(toResponse(result.request));
    } catch (err) {
      return handleRouteError(c, err, log);
    }
  });

  /**
   * POST /:id/provision — mark an approved request provisioned and emit its
   * manifest. A sink failure still leaves it provisioned; retry delivery
   * with POST /:id/manifest/redeliver.
   */
  app.post('/:id/provision', async (c) => {
    try {
      const request = await workflow.provision(requireId(c.req.param('id')));
      return c.json(toResponse(request));
    } catch (err) {
      return handleRouteError(c, err, log);
    }
  });

  /** POST /:id/manifest/redeliver — emit a provisioned request's manifest again. */
  app.post('/:id/manifest/redeliver', async (c) => {
    try {
      const request = await workflow.redeliverManifest(requireId(c.req.param('id')));
      return c.json(toResponse(request));
    } catch (err) {
      return handleRouteError(c, err, log);
    }
  });

  return app;
}
