/**
 * Admission routes — the synchronous hook the cluster API server calls
 * before persisting a claim, plus the label derivation endpoint used by
 * the composition renderer.
 *
 *   POST /validate          — AdmissionReview (admission.k8s.io/v1) envelope
 *   POST /api/admission/validate — bare claim payload → { allowed, reasons }
 *   POST /api/admission/labels   — bare claim payload → { labels }
 */
import { Hono } from 'hono';
import { z } from 'zod';
import { ClaimPayloadSchema, claimFromPayload } from '../types/claim.js';
import type { ClaimPayload } from '../types/claim.js';
import { reviewAdmission } from '../services/admission-validator.js';
import type { AdmissionResult } from '../services/admission-validator.js';
import { ValidationError } from '../services/governance-errors.js';
import type { PolicySource } from '../services/policy-store.js';
import { enforce } from '../services/tag-enforcer.js';
import type { LogFn } from '../middleware/logger.js';
import { handleRouteError, readJsonBody } from '../utils/error-handler.js';
import { addSanitizedAttributes, startSanitizedSpan } from '../utils/span-sanitizer.js';

export interface AdmissionRouteDeps {
  policy: PolicySource;
  log?: LogFn;
  /** Latency budget for a single admission decision. */
  budgetMs?: number;
  now?: () => Date;
}

const ADMISSION_API_VERSION = 'admission.k8s.io/v1';

/** The subset of an AdmissionReview request the validator reads. */
const AdmissionReviewSchema = z.object({
  apiVersion: z.string().optional(),
  kind: z.string().optional(),
  request: z.object({
    uid: z.string().min(1),
    object: z.object({
      metadata: z.object({
        name: z.unknown(),
        namespace: z.unknown(),
        labels: z.record(z.unknown()).optional(),
        creationTimestamp: z.unknown().optional(),
      }),
      spec: z
        .object({
          parameters: z.record(z.unknown()).optional(),
        })
        .optional(),
    }),
  }),
});

type AdmissionReview = z.infer<typeof AdmissionReviewSchema>;

/** Flatten a claim object from an AdmissionReview into the claim payload shape. */
export function payloadFromReview(review: AdmissionReview): Record<string, unknown> {
  const { metadata, spec } = review.request.object;
  const params = spec?.parameters ?? {};
  return {
    name: metadata.name,
    namespace: metadata.namespace,
    tier: params.tier,
    storageSizeGB: params.storageSizeGB,
    version: params.version,
    enableBackups: params.enableBackups,
    labels: metadata.labels ?? {},
    createdAt: metadata.creationTimestamp,
  };
}

function reviewResponse(uid: string, allowed: boolean, code: number, reasons: readonly string[]) {
  return {
    apiVersion: ADMISSION_API_VERSION,
    kind: 'AdmissionReview',
    response: allowed
      ? { uid, allowed: true }
      : { uid, allowed: false, status: { code, message: reasons.join('; ') } },
  };
}

function parseClaimPayload(body: unknown): ClaimPayload {
  const parsed = ClaimPayloadSchema.safeParse(body);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`);
    throw new ValidationError(`Malformed claim payload: ${issues.join('; ')}`, issues);
  }
  return parsed.data;
}

export function createAdmissionRoutes(deps: AdmissionRouteDeps): Hono {
  const app = new Hono();
  const now = deps.now ?? (() => new Date());

  const decide = (payload: unknown): Promise<AdmissionResult> =>
    startSanitizedSpan('claimgate.admission', {}, async (span) => {
      const result = reviewAdmission(payload, deps.policy, { log: deps.log, now, budgetMs: deps.budgetMs });
      addSanitizedAttributes(span, 'claimgate.admission', {
        allowed: result.allowed,
        reason_count: result.reasons.length,
        policy_version: result.policyVersion,
      });
      return result;
    });

  /** POST /validate — AdmissionReview webhook. Always answers 200 with a verdict. */
  app.post('/validate', async (c) => {
    let review: AdmissionReview;
    try {
      const parsed = AdmissionReviewSchema.safeParse(await readJsonBody(c));
      if (!parsed.success) {
        return c.json({ error: 'invalid_request', message: 'Body must be an AdmissionReview with request.uid and request.object' }, 400);
      }
      review = parsed.data;
    } catch (err) {
      return handleRouteError(c, err, deps.log);
    }

    const uid = review.request.uid;
    try {
      const result = await decide(payloadFromReview(review));
      return c.json(reviewResponse(uid, result.allowed, 403, result.reasons));
    } catch (err) {
      if (err instanceof ValidationError) {
        return c.json(reviewResponse(uid, false, 400, err.issues));
      }
      return handleRouteError(c, err, deps.log);
    }
  });

  /** POST /api/admission/validate — bare claim payload. */
  app.post('/api/admission/validate', async (c) => {
    try {
      const result = await decide(await readJsonBody(c));
      return c.json({
        allowed: result.allowed,
        reasons: result.reasons,
        claim_id: result.claimId ?? null,
        policy_version: result.policyVersion ?? null,
      });
    } catch (err) {
      if (err instanceof ValidationError) {
        return c.json({ allowed: false, reasons: err.issues, claim_id: null, policy_version: null }, 400);
      }
      return handleRouteError(c, err, deps.log);
    }
  });

  /** POST /api/admission/labels — labels to stamp on the claim's rendered resources. */
  app.post('/api/admission/labels', async (c) => {
    try {
      const payload = parseClaimPayload(await readJsonBody(c));
      const claim = claimFromPayload(payload, now());
      const policy = deps.policy.current();
      return c.json({ claim_id: claim.id, policy_version: policy.version, labels: enforce(claim, policy) });
    } catch (err) {
      return handleRouteError(c, err, deps.log);
    }
  });

  return app;
}
