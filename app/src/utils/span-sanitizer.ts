/**
 * Span Sanitizer — PII-safe OpenTelemetry span creation.
 *
 * Enforces attribute allowlists per span type. Unknown attributes are stripped.
 * Requester and reviewer identities are hashed (SHA-256 truncated to 12 chars).
 */
import { createHash } from 'node:crypto';
import { trace, type Attributes, type AttributeValue, type Span, SpanStatusCode } from '@opentelemetry/api';

const TRACER_NAME = 'claimgate';

let _tracer: ReturnType<typeof trace.getTracer> | null = null;
function getTracer() {
  if (!_tracer) _tracer = trace.getTracer(TRACER_NAME);
  return _tracer;
}

/** SHA-256 hash truncated to 12 hex characters. */
export function hashForSpan(value: string): string {
  return createHash('sha256').update(value).digest('hex').slice(0, 12);
}

/**
 * Per-span-type attribute allowlists.
 * Only attributes in the allowlist survive sanitization.
 */
const SPAN_ALLOWLISTS: Record<string, ReadonlySet<string>> = {
  'claimgate.request': new Set(['method', 'url', 'status_code', 'duration_ms']),
  'claimgate.admission': new Set(['tier', 'namespace', 'allowed', 'reason_count', 'policy_version']),
  'claimgate.reconcile': new Set([
    'claims', 'actions', 'applied', 'skipped', 'failed', 'cancelled', 'policy_version', 'trigger',
  ]),
  'claimgate.reconcile.apply': new Set(['claim_id', 'kind', 'attempts', 'outcome']),
  'claimgate.approval': new Set(['operation', 'request_id', 'state', 'requester_hash', 'reviewer_hash']),
};

/**
 * Attributes that contain identity data and must be hashed.
 * Key = raw input attribute name, Value = sanitized output attribute name.
 */
const HASH_FIELDS: Record<string, string> = {
  requester: 'requester_hash',
  reviewer: 'reviewer_hash',
};

function isAttributeValue(value: unknown): value is AttributeValue {
  return typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean';
}

/**
 * Sanitize attributes for a span type.
 * - Strips any attribute not in the span's allowlist or not a primitive
 * - Hashes identity fields (requester → requester_hash, reviewer → reviewer_hash)
 * - Returns empty object for unknown span types
 */
export function sanitizeAttributes(
  spanName: string,
  attrs: Record<string, unknown>,
): Attributes {
  const allowlist = SPAN_ALLOWLISTS[spanName];
  if (!allowlist) return {};

  const sanitized: Attributes = {};

  for (const [key, value] of Object.entries(attrs)) {
    const hashTarget = HASH_FIELDS[key];
    if (hashTarget && allowlist.has(hashTarget)) {
      if (typeof value === 'string') sanitized[hashTarget] = hashForSpan(value);
      continue;
    }

    if (allowlist.has(key) && isAttributeValue(value)) {
      sanitized[key] = value;
    }
  }

  return sanitized;
}

/**
 * Add sanitized attributes to an existing span.
 * Use this for attributes that are only known after the span starts.
 */
export function addSanitizedAttributes(
  span: Span,
  spanName: string,
  attrs: Record<string, unknown>,
): void {
  span.setAttributes(sanitizeAttributes(spanName, attrs));
}

/**
 * Start a sanitized span with enforced attribute allowlisting.
 *
 * ```ts
 * const plan = await startSanitizedSpan('claimgate.reconcile', { trigger: 'interval' }, async (span) => {
 *   return runOnce();
 * });
 * ```
 */
export async function startSanitizedSpan<T>(
  spanName: string,
  attrs: Record<string, unknown>,
  fn: (span: Span) => Promise<T>,
): Promise<T> {
  const tracer = getTracer();
  const sanitized = sanitizeAttributes(spanName, attrs);

  return tracer.startActiveSpan(spanName, async (span) => {
    span.setAttributes(sanitized);
    try {
      const result = await fn(span);
      span.setStatus({ code: SpanStatusCode.OK });
      return result;
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      span.setStatus({ code: SpanStatusCode.ERROR, message });
      span.recordException(err instanceof Error ? err : new Error(message));
      throw err;
    } finally {
      span.end();
    }
  });
}
