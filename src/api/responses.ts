/**
 * Standardized API Response Formats
 *
 * Listings and page details are returned as bare JSON. Errors share one
 * envelope: { error: { code, message, details? } }
 */

import type { Context } from "hono";

// ==================== Response Types ====================

/**
 * Standard error response
 */
export interface ErrorResponse {
  error: {
    code: string;
    message: string;
    details?: unknown;
  };
}

export type ErrorStatus = 400 | 404 | 413 | 500 | 503;

// ==================== Response Builders ====================

/**
 * Build an error response
 */
export function errorResponse(
  c: Context,
  code: string,
  message: string,
  status: ErrorStatus = 400,
  details?: unknown
) {
  const response: ErrorResponse = {
    error: {
      code,
      message,
      ...(details !== undefined && { details }),
    },
  };
  return c.json(response, status);
}

/**
 * Build a created response with location header and no body
 */
export function createdResponse(c: Context, location: string) {
  c.header("Location", location);
  return c.body(null, 201);
}

/**
 * Build an empty success response
 */
export function noContentResponse(c: Context) {
  return c.body(null, 204);
}

// ==================== Cache Headers ====================

/** Version snapshots never change once written */
export const IMMUTABLE_CACHE_CONTROL = "public, max-age=31536000, immutable";

/**
 * Set ETag and Cache-Control headers and handle If-None-Match
 *
 * @returns true when the client copy is current and the caller should
 *   return 304
 */
export function withETag(
  c: Context,
  etag: string,
  cacheControl = IMMUTABLE_CACHE_CONTROL
): boolean {
  c.header("ETag", etag);
  c.header("Cache-Control", cacheControl);

  const ifNoneMatch = c.req.header("If-None-Match");
  return ifNoneMatch !== undefined && ifNoneMatch === etag;
}

// ==================== Response Helpers ====================

/**
 * Helper to send 304 Not Modified
 */
export function notModified(c: Context) {
  return c.body(null, 304);
}

/**
 * Helper to send raw bytes with a content type
 */
export function binaryResponse(data: Uint8Array, contentType: string) {
  return new Response(data, {
    headers: {
      "Content-Type": contentType,
      "Content-Length": String(data.byteLength),
    },
  });
}
