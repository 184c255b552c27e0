import { createMiddleware } from 'hono/factory';
import { randomUUID } from 'node:crypto';

/** Forwarded IDs are echoed into the response, so only plain tokens are kept. */
const FORWARDED_ID = /^[A-Za-z0-9._:-]{1,128}$/;

/**
 * Tags each response with X-Request-Id. An ID forwarded by the caller (the
 * cluster API server relaying an admission review, say) is kept when it
 * is a plain token; anything else is replaced with a fresh UUID.
 */
export const requestId = () =>
  createMiddleware(async (c, next) => {
    const forwarded = c.req.header('x-request-id');
    c.header('X-Request-Id', forwarded !== undefined && FORWARDED_ID.test(forwarded) ? forwarded : randomUUID());
    await next();
  });
