/**
 * Wiki Web Server
 *
 * Builds the Hono application: tracing, shutdown and body-size middleware,
 * a health endpoint, and every other request classified by the path router
 * and dispatched to the wiki handlers.
 */

import { Hono } from "hono";
import { logger } from "hono/logger";
import { createLogger } from "./logging";
import { isStoreError, type WikiStore } from "./storage";
import {
  ApiError,
  ApiRequestError,
  BodyTooLargeError,
  bodyLimit,
  DEFAULT_MAX_BODY_BYTES,
  errorForStoreError,
  errorFromCode,
  handleWikiRequest,
  requestContext,
  runHealthCheck,
  shutdownMiddleware,
} from "./api";

const log = createLogger("web");
const httpLog = createLogger("http");

export interface WebServerOptions {
  store: WikiStore;
  /** Largest accepted request body in bytes */
  maxBodyBytes?: number;
  /** Include error messages of unexpected failures in responses */
  exposeErrors?: boolean;
  /** Epoch milliseconds the server started, for uptime reporting */
  startedAt?: number;
}

export function createWebServer(options: WebServerOptions): Hono {
  const {
    store,
    maxBodyBytes = DEFAULT_MAX_BODY_BYTES,
    exposeErrors = false,
    startedAt = Date.now(),
  } = options;

  const app = new Hono();

  // Request context (must be first to track timing)
  app.use("*", requestContext());

  // Graceful shutdown middleware (rejects requests during shutdown)
  app.use("*", shutdownMiddleware());

  app.use("*", logger((line, ...rest) => httpLog.info([line, ...rest].join(" "))));

  app.use("*", bodyLimit({ maxSize: maxBodyBytes, name: "default" }));

  // Global error handler
  app.onError((err, c) => {
    if (err instanceof ApiRequestError) {
      return errorFromCode(c, err.definition, err.message, err.details);
    }

    if (isStoreError(err)) {
      const definition = errorForStoreError(err);
      if (definition.status >= 500) {
        log.error("Store operation failed", { method: c.req.method, path: c.req.path, kind: err.kind, error: err });
      } else {
        log.debug("Store operation rejected", { path: c.req.path, kind: err.kind, reason: err.message });
      }
      return errorFromCode(c, definition, undefined, exposeErrors ? err.message : undefined);
    }

    if (err instanceof BodyTooLargeError) {
      return errorFromCode(c, ApiError.PAYLOAD_TOO_LARGE, err.message, { maxSize: err.maxSize });
    }

    if (err instanceof SyntaxError) {
      return errorFromCode(c, ApiError.INVALID_JSON);
    }

    log.error("Unhandled error", { method: c.req.method, path: c.req.path, error: err });
    return errorFromCode(c, ApiError.INTERNAL_ERROR, undefined, exposeErrors ? err.message : undefined);
  });

  app.get("/health", async (c) => {
    const health = await runHealthCheck(store.root, startedAt);
    return c.json(health, health.status === "ok" ? 200 : 503);
  });

  app.all("*", (c) => handleWikiRequest(c, store));

  return app;
}
