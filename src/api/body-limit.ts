/**
 * Body Size Limit Middleware
 *
 * Protects against memory exhaustion from oversized request bodies.
 * Rejects early via Content-Length, then checks the bytes actually read.
 */

import type { Context, Next } from "hono";
import { createLogger } from "../logging";
import { ApiError, errorFromCode } from "./error-codes";

const log = createLogger("body-limit");

export interface BodyLimitConfig {
  /** Maximum body size in bytes */
  maxSize: number;
  /** Name for logging */
  name: string;
}

/** Default limit: base64 attachments are the largest bodies (10MB) */
export const DEFAULT_MAX_BODY_BYTES = 10 * 1024 * 1024;

/**
 * Custom error for body size violations
 */
export class BodyTooLargeError extends Error {
  public readonly maxSize: number;
  public readonly actualSize?: number;

  constructor(maxSize: number, actualSize?: number) {
    const message = actualSize
      ? `Request body too large. Max: ${formatBytes(maxSize)}, Received: ${formatBytes(actualSize)}`
      : `Request body too large. Max: ${formatBytes(maxSize)}`;
    super(message);
    this.name = "BodyTooLargeError";
    this.maxSize = maxSize;
    this.actualSize = actualSize;
  }
}

/**
 * Check Content-Length header for fast rejection
 */
function checkContentLength(c: Context, maxSize: number): void {
  const contentLength = c.req.header("Content-Length");
  if (contentLength) {
    const length = parseInt(contentLength, 10);
    if (!isNaN(length) && length > maxSize) {
      throw new BodyTooLargeError(maxSize, length);
    }
  }
}

/**
 * Body limit middleware factory
 *
 * The body is read here as text; Hono caches it, so handlers reading
 * `c.req.text()` or `c.req.json()` afterwards get the same content.
 */
export function bodyLimit(
  config: BodyLimitConfig = { maxSize: DEFAULT_MAX_BODY_BYTES, name: "default" }
): (c: Context, next: Next) => Promise<void | Response> {
  const { maxSize, name } = config;

  return async (c: Context, next: Next) => {
    // Only check POST, PUT, PATCH requests
    if (!["POST", "PUT", "PATCH"].includes(c.req.method)) {
      return next();
    }

    try {
      checkContentLength(c, maxSize);

      const body = await c.req.text();
      const size = Buffer.byteLength(body, "utf8");
      if (size > maxSize) {
        throw new BodyTooLargeError(maxSize, size);
      }
    } catch (err) {
      if (err instanceof BodyTooLargeError) {
        log.warn("Body size exceeds limit", { name, bodySize: err.actualSize, maxSize });
        return errorFromCode(c, ApiError.PAYLOAD_TOO_LARGE, err.message, { maxSize: err.maxSize });
      }
      throw err;
    }

    await next();
  };
}

/**
 * Format bytes to human-readable string
 */
export function formatBytes(bytes: number): string {
  if (bytes < 1024) return `${bytes}B`;
  if (bytes < 1024 * 1024) return `${(bytes / 1024).toFixed(1)}KB`;
  return `${(bytes / (1024 * 1024)).toFixed(1)}MB`;
}
