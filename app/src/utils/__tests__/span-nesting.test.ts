/**
 * Span nesting: nested startSanitizedSpan() calls, captured with the
 * in-memory exporter, form a parent-child chain within one trace.
 */
import { describe, it, expect, beforeAll, afterAll, beforeEach } from 'vitest';
import { NodeTracerProvider } from '@opentelemetry/sdk-trace-node';
import { InMemorySpanExporter, SimpleSpanProcessor } from '@opentelemetry/sdk-trace-base';
import type { ReadableSpan } from '@opentelemetry/sdk-trace-base';

describe('span nesting', () => {
  let provider: NodeTracerProvider;
  let exporter: InMemorySpanExporter;

  beforeAll(() => {
    exporter = new InMemorySpanExporter();
    provider = new NodeTracerProvider();
    provider.addSpanProcessor(new SimpleSpanProcessor(exporter));
    provider.register();
  });

  afterAll(async () => {
    await provider.shutdown();
  });

  beforeEach(() => {
    exporter.reset();
  });

  function finished(name: string): ReadableSpan {
    const span = exporter.getFinishedSpans().find((s) => s.name === name);
    if (!span) throw new Error(`span ${name} was not exported`);
    return span;
  }

  it('nests a reconcile apply span under the cycle span', async () => {
    // Dynamic import so the module picks up the registered provider
    const { startSanitizedSpan } = await import('../span-sanitizer.js');

    await startSanitizedSpan('claimgate.reconcile', { trigger: 'interval' }, async () => {
      await startSanitizedSpan('claimgate.reconcile.apply', { claim_id: 'a/db', kind: 'restore' }, async () => 'applied');
      return 'done';
    });

    expect(exporter.getFinishedSpans()).toHaveLength(2);
    const cycle = finished('claimgate.reconcile');
    const apply = finished('claimgate.reconcile.apply');

    expect(apply.spanContext().traceId).toBe(cycle.spanContext().traceId);
    expect(apply.parentSpanId).toBe(cycle.spanContext().spanId);
    expect(cycle.parentSpanId).toBeUndefined();
    expect(apply.attributes).toEqual({ claim_id: 'a/db', kind: 'restore' });
  });

  it('three-level nesting forms the request → admission chain', async () => {
    const { startSanitizedSpan } = await import('../span-sanitizer.js');

    await startSanitizedSpan('claimgate.request', { method: 'POST', url: '/validate' }, async () => {
      await startSanitizedSpan('claimgate.admission', { tier: 'staging' }, async () => {
        await startSanitizedSpan('claimgate.approval', { operation: 'get' }, async () => 'inner');
        return 'decision';
      });
      return 'response';
    });

    const request = finished('claimgate.request');
    const admission = finished('claimgate.admission');
    const inner = finished('claimgate.approval');

    const traceId = request.spanContext().traceId;
    expect(admission.spanContext().traceId).toBe(traceId);
    expect(inner.spanContext().traceId).toBe(traceId);
    expect(admission.parentSpanId).toBe(request.spanContext().spanId);
    expect(inner.parentSpanId).toBe(admission.spanContext().spanId);
  });

  it('span context IDs are valid W3C trace format', async () => {
    const { startSanitizedSpan } = await import('../span-sanitizer.js');

    await startSanitizedSpan('claimgate.request', { method: 'GET', url: '/api/health' }, async () => 'ok');

    const ctx = finished('claimgate.request').spanContext();
    expect(ctx.traceId).toMatch(/^[0-9a-f]{32}$/);
    expect(ctx.spanId).toMatch(/^[0-9a-f]{16}$/);
  });
});
