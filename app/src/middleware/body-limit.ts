import { createMiddleware } from 'hono/factory';

/**
 * Body size limit middleware.
 * Rejects requests with Content-Length exceeding the limit before the body
 * is buffered. Requests without Content-Length are left to the body parser.
 */
export function createBodyLimit(maxBytes: number = 262_144) {
  return createMiddleware(async (c, next) => {
    const contentLength = c.req.header('content-length');
    if (contentLength && parseInt(contentLength, 10) > maxBytes) {
      return c.json(
        { error: 'payload_too_large', message: `Body exceeds ${maxBytes} bytes` },
        413,
      );
    }
    await next();
  });
}
