/**
 * Request Context
 *
 * Assigns each request an ID and times it. The request ID doubles as the
 * log correlation ID, so every log line written while handling a request
 * carries it.
 */

import type { Context, Next } from "hono";
import { nanoid } from "nanoid";
import { withCorrelationIdAsync } from "../logging";

/**
 * Request headers for tracing
 */
export const REQUEST_ID_HEADER = "X-Request-ID";
export const RESPONSE_TIME_HEADER = "X-Response-Time";

/** Longest client-supplied request ID that is passed through */
const MAX_REQUEST_ID_LENGTH = 128;

function incomingRequestId(c: Context): string | undefined {
  const header = c.req.header(REQUEST_ID_HEADER)?.trim();
  if (!header || header.length > MAX_REQUEST_ID_LENGTH) return undefined;
  return header;
}

/**
 * Request context middleware for Hono
 *
 * Binds a unique ID for the duration of the request and tracks timing.
 */
export function requestContext(): (c: Context, next: Next) => Promise<void> {
  return async (c: Context, next: Next) => {
    const requestId = incomingRequestId(c) ?? `req-${nanoid(12)}`;
    const startTime = performance.now();

    await withCorrelationIdAsync(requestId, async () => {
      try {
        await next();
      } finally {
        // Set once the response exists so raw Response objects get them too
        c.header(REQUEST_ID_HEADER, requestId);
        c.header(RESPONSE_TIME_HEADER, `${(performance.now() - startTime).toFixed(2)}ms`);
      }
    });
  };
}
