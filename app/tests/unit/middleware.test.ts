import { describe, it, expect } from 'vitest';
import { Hono } from 'hono';
import { requestId } from '../../src/middleware/request-id.js';
import { createLogger } from '../../src/middleware/logger.js';

describe('requestId middleware', () => {
  it('generates X-Request-Id when none provided', async () => {
    const app = new Hono();
    app.use('*', requestId());
    app.get('/', (c) => c.text('ok'));

    const res = await app.request('/');
    expect(res.headers.get('X-Request-Id')).toMatch(
      /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/,
    );
  });

  it('preserves existing X-Request-Id', async () => {
    const app = new Hono();
    app.use('*', requestId());
    app.get('/', (c) => c.text('ok'));

    const res = await app.request('/', {
      headers: { 'x-request-id': 'custom-123' },
    });
    expect(res.headers.get('X-Request-Id')).toBe('custom-123');
  });

  it('replaces a forwarded ID that is not a plain token', async () => {
    const app = new Hono();
    app.use('*', requestId());
    app.get('/', (c) => c.text('ok'));

    const spaced = await app.request('/', { headers: { 'x-request-id': 'two words' } });
    const long = await app.request('/', { headers: { 'x-request-id': 'a'.repeat(129) } });

    const uuid = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/;
    expect(spaced.headers.get('X-Request-Id')).toMatch(uuid);
    expect(long.headers.get('X-Request-Id')).toMatch(uuid);
  });
});

describe('createLogger', () => {
  function collect() {
    const lines: Array<Record<string, unknown>> = [];
    const write = (line: string) => {
      lines.push(JSON.parse(line));
    };
    return { lines, write };
  }

  it('writes one JSON line with level, timestamp and service', () => {
    const { lines, write } = collect();
    const { log } = createLogger('claimgate', 'info', write);

    log('info', { event: 'policy_loaded', version: '2024.1' });

    expect(lines).toHaveLength(1);
    expect(lines[0]).toMatchObject({ level: 'info', service: 'claimgate', event: 'policy_loaded', version: '2024.1' });
    expect(typeof lines[0]?.timestamp).toBe('string');
  });

  it('drops entries below the configured level', () => {
    const { lines, write } = collect();
    const { log } = createLogger('claimgate', 'warn', write);

    log('info', { event: 'ignored' });
    log('debug', { event: 'ignored' });
    log('error', { event: 'kept' });

    expect(lines.map((l) => l.event)).toEqual(['kept']);
  });

  it('logs each request with its status and request id', async () => {
    const { lines, write } = collect();
    const { middleware } = createLogger('claimgate', 'info', write);
    const app = new Hono();
    app.use('*', requestId());
    app.use('*', middleware);
    app.get('/ok', (c) => c.text('ok'));
    app.get('/missing', (c) => c.json({ error: 'not_found' }, 404));
    app.get('/broken', (c) => c.json({ error: 'internal_error' }, 500));

    await app.request('/ok', { headers: { 'x-request-id': 'req-a' } });
    await app.request('/missing');
    await app.request('/broken');

    expect(lines.map((l) => [l.level, l.path, l.status])).toEqual([
      ['info', '/ok', 200],
      ['warn', '/missing', 404],
      ['error', '/broken', 500],
    ]);
    expect(lines[0]).toMatchObject({ request_id: 'req-a', method: 'GET' });
  });
});
