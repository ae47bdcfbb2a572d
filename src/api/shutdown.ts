/**
 * Graceful Shutdown Handler
 *
 * Ensures the server shuts down cleanly by:
 * - Rejecting new requests with 503
 * - Waiting for in-flight requests to complete
 * - Running registered cleanup callbacks (closing the HTTP server)
 */

import type { Context, Next } from "hono";
import { createLogger } from "../logging";
import { ApiError, errorFromCode } from "./error-codes";

const log = createLogger("shutdown");

// Shutdown state
let isShuttingDown = false;
let shutdownPromise: Promise<ShutdownResult> | null = null;
const activeRequests = new Set<symbol>();

export const DEFAULT_SHUTDOWN_TIMEOUT_MS = 30_000;
const DRAIN_INTERVAL_MS = 100;

export interface ShutdownResult {
  /** Whether every in-flight request finished before the timeout */
  drained: boolean;
  /** Requests still running when the drain gave up */
  remaining: number;
}

/**
 * Get count of active requests
 */
export function getActiveRequestCount(): number {
  return activeRequests.size;
}

/**
 * Middleware to track active requests and reject new ones during shutdown
 */
export function shutdownMiddleware() {
  return async (c: Context, next: Next) => {
    if (isShuttingDown) {
      c.header("Connection", "close");
      c.header("Retry-After", "60");
      return errorFromCode(c, ApiError.SERVICE_UNAVAILABLE, "Server is shutting down");
    }

    const requestId = Symbol();
    activeRequests.add(requestId);

    try {
      await next();
    } finally {
      activeRequests.delete(requestId);
    }
  };
}

/**
 * Wait for all active requests to complete (with timeout)
 */
async function drainRequests(timeoutMs: number): Promise<ShutdownResult> {
  const startTime = Date.now();

  while (activeRequests.size > 0) {
    if (Date.now() - startTime >= timeoutMs) {
      log.warn("Drain timeout reached", { remaining: activeRequests.size });
      return { drained: false, remaining: activeRequests.size };
    }

    log.info("Waiting for requests to complete", { active: activeRequests.size });
    await new Promise((resolve) => setTimeout(resolve, DRAIN_INTERVAL_MS));
  }

  return { drained: true, remaining: 0 };
}

/**
 * Callbacks to run during shutdown
 */
type ShutdownCallback = () => Promise<void> | void;
const shutdownCallbacks: Array<{ name: string; callback: ShutdownCallback }> = [];

/**
 * Register a callback to run during shutdown
 */
export function onShutdown(name: string, callback: ShutdownCallback): void {
  shutdownCallbacks.push({ name, callback });
}

/**
 * Initiate graceful shutdown. Later calls return the first call's result.
 */
export function gracefulShutdown(
  signal: string,
  timeoutMs = DEFAULT_SHUTDOWN_TIMEOUT_MS
): Promise<ShutdownResult> {
  if (shutdownPromise) {
    return shutdownPromise;
  }

  isShuttingDown = true;

  shutdownPromise = (async () => {
    log.info("Starting graceful shutdown", { signal });
    const startTime = Date.now();

    const drainResult = await drainRequests(timeoutMs);
    if (drainResult.drained) {
      log.info("All requests completed");
    } else {
      log.warn("Requests still active after timeout", { remaining: drainResult.remaining });
    }

    for (const { name, callback } of shutdownCallbacks) {
      try {
        log.debug("Running shutdown callback", { name });
        await callback();
      } catch (err) {
        log.error("Shutdown callback failed", { name, error: err });
      }
    }

    log.info("Graceful shutdown completed", { durationMs: Date.now() - startTime });
    return drainResult;
  })();

  return shutdownPromise;
}

/**
 * Install signal handlers that shut down and exit the process
 */
export function installShutdownHandlers(timeoutMs = DEFAULT_SHUTDOWN_TIMEOUT_MS): void {
  const shutdownAndExit = (signal: string) => {
    gracefulShutdown(signal, timeoutMs).then(
      ({ drained }) => process.exit(drained ? 0 : 1),
      (err: unknown) => {
        log.error("Graceful shutdown failed", { error: err });
        process.exit(1);
      }
    );
  };

  // Handle SIGTERM (Docker/K8s sends this)
  process.on("SIGTERM", () => shutdownAndExit("SIGTERM"));

  // Handle SIGINT (Ctrl+C)
  process.on("SIGINT", () => shutdownAndExit("SIGINT"));

  process.on("uncaughtException", (err) => {
    log.error("Uncaught exception", err);
    shutdownAndExit("uncaughtException");
  });

  // Log only; a stray rejection does not stop the server
  process.on("unhandledRejection", (reason) => {
    log.error("Unhandled rejection", { error: reason });
  });

  log.debug("Graceful shutdown handlers installed");
}

/**
 * Export for testing
 */
export function resetShutdownState(): void {
  isShuttingDown = false;
  shutdownPromise = null;
  activeRequests.clear();
  shutdownCallbacks.length = 0;
}
