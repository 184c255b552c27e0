import { createMiddleware } from 'hono/factory';

export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

/** Structured log sink handed to services. */
export type LogFn = (level: LogLevel, data: Record<string, unknown>) => void;

const LEVEL_ORDER: Record<LogLevel, number> = {
  error: 0,
  warn: 1,
  info: 2,
  debug: 3,
};

export function isLogLevel(value: string): value is LogLevel {
  return value in LEVEL_ORDER;
}

/**
 * Structured JSON logger.
 *
 * `log` writes one JSON line per event to stdout with level, timestamp and
 * service. `middleware` logs one line per request with request_id, method,
 * path, status and latency_ms; 5xx responses log at error, 4xx at warn.
 */
export function createLogger(
  serviceName: string,
  configuredLevel: LogLevel = 'info',
  write: (line: string) => void = (line) => process.stdout.write(line),
) {
  const threshold = LEVEL_ORDER[configuredLevel];

  const log: LogFn = (level, data) => {
    if (LEVEL_ORDER[level] > threshold) return;
    const entry = {
      level,
      timestamp: new Date().toISOString(),
      service: serviceName,
      ...data,
    };
    write(JSON.stringify(entry) + '\n');
  };

  const middleware = createMiddleware(async (c, next) => {
    const start = Date.now();
    await next();
    const latencyMs = Date.now() - start;

    const status = c.res.status;
    const level: LogLevel = status >= 500 ? 'error' : status >= 400 ? 'warn' : 'info';

    log(level, {
      request_id: c.res.headers.get('X-Request-Id') ?? '',
      method: c.req.method,
      path: new URL(c.req.url).pathname,
      status,
      latency_ms: latencyMs,
    });
  });

  return { middleware, log };
}
