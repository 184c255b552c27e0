import { createMiddleware } from 'hono/factory';
import { propagation, context } from '@opentelemetry/api';
import { startSanitizedSpan, addSanitizedAttributes } from '../utils/span-sanitizer.js';

/**
 * Request tracing middleware — W3C traceparent propagation + OTEL spans.
 *
 * Extracts incoming traceparent context so the request span joins the
 * caller's trace (an API server calling the admission hook, a CI job
 * calling the approval API). The response carries the span's own
 * traceparent for correlation.
 */
export function createTracing() {
  return createMiddleware(async (c, next) => {
    const start = Date.now();

    const carrier: Record<string, string> = {};
    const incoming = c.req.header('traceparent');
    if (incoming) carrier['traceparent'] = incoming;
    const tracestate = c.req.header('tracestate');
    if (tracestate) carrier['tracestate'] = tracestate;
    const parentCtx = propagation.extract(context.active(), carrier);

    await context.with(parentCtx, () =>
      startSanitizedSpan(
        'claimgate.request',
        { method: c.req.method, url: c.req.path },
        async (span) => {
          const ctx = span.spanContext();
          const flags = ctx.traceFlags.toString(16).padStart(2, '0');
          c.header('traceparent', `00-${ctx.traceId}-${ctx.spanId}-${flags}`);
          c.header('x-trace-id', ctx.traceId);

          await next();

          addSanitizedAttributes(span, 'claimgate.request', {
            status_code: c.res.status,
            duration_ms: Date.now() - start,
          });
        },
      ),
    );
  });
}
