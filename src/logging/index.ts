/**
 * Structured Logging Module
 *
 * JSON-formatted log lines with:
 * - Configurable log levels (debug, info, warn, error)
 * - Module tagging via child loggers
 * - Request correlation IDs
 * - Redaction of sensitive keys and oversized payload fields
 *
 * Usage:
 *   import { logger, createLogger } from "./logging";
 *   logger.info("Server started", { port: 3000 });
 *   const storeLog = createLogger("store");
 *   storeLog.debug("Version appended", { page: "WebHome", hash });
 */

import { AsyncLocalStorage } from "node:async_hooks";

// ==================== Configuration ====================

export const LOG_LEVELS = ["debug", "info", "warn", "error"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export function isLogLevel(value: unknown): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

export interface LogConfig {
  /** Minimum log level to output */
  level: LogLevel;
  /** Pretty-print JSON (dev mode) */
  pretty: boolean;
  /** Include stack traces for errors */
  includeStack: boolean;
  /** Service name for log identification */
  service: string;
}

const LOG_CONFIG: LogConfig = {
  level: isLogLevel(process.env.LOG_LEVEL) ? process.env.LOG_LEVEL : "info",
  pretty: process.env.LOG_PRETTY === "true" || process.env.NODE_ENV === "development",
  includeStack: process.env.LOG_INCLUDE_STACK !== "false",
  service: process.env.LOG_SERVICE || "wikistore",
};

/**
 * Override logging settings after configuration has been loaded
 */
export function configureLogging(overrides: Partial<LogConfig>): void {
  Object.assign(LOG_CONFIG, overrides);
}

// ==================== Types ====================

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  service: string;
  module?: string;
  correlationId?: string;
  [key: string]: unknown;
}

export interface LogMetadata {
  [key: string]: unknown;
}

export interface LoggerContext {
  module?: string;
  correlationId?: string;
  [key: string]: unknown;
}

export interface Logger {
  debug(message: string, meta?: LogMetadata): void;
  info(message: string, meta?: LogMetadata): void;
  warn(message: string, meta?: LogMetadata): void;
  error(message: string, meta?: LogMetadata | Error): void;
  child(context: LoggerContext): Logger;
}

/** Destination for formatted log lines, swappable in tests */
export type LogSink = (level: LogLevel, line: string) => void;

const consoleSink: LogSink = (level, line) => {
  if (level === "error") {
    console.error(line);
  } else if (level === "warn") {
    console.warn(line);
  } else {
    console.log(line);
  }
};

let sink: LogSink = consoleSink;

/**
 * Replace the log destination. Returns a function restoring the previous one.
 */
export function setLogSink(next: LogSink): () => void {
  const previous = sink;
  sink = next;
  return () => {
    sink = previous;
  };
}

// ==================== Correlation IDs ====================

const correlationStorage = new AsyncLocalStorage<string>();

/**
 * Run an async function with a correlation ID bound to the log context
 */
export function withCorrelationIdAsync<T>(id: string, fn: () => Promise<T>): Promise<T> {
  return correlationStorage.run(id, fn);
}

// ==================== Sanitization ====================

/**
 * Keys that commonly contain sensitive data (case-insensitive, - and _ ignored)
 */
const SENSITIVE_KEYS = new Set([
  "password", "passwd", "pwd",
  "secret", "secrets",
  "token", "accesstoken", "refreshtoken",
  "apikey",
  "authorization", "auth",
  "cookie", "cookies", "sessionid",
]);

/** Payload fields that are elided rather than logged in full */
const BULK_KEYS = new Set(["encodeddata", "content"]);

const BULK_PREVIEW_LENGTH = 64;

function normalizeKey(key: string): string {
  return key.toLowerCase().replace(/[-_]/g, "");
}

function sanitizeValue(key: string, value: unknown, depth = 0): unknown {
  if (depth > 5) return "[nested too deep]";

  const normalized = normalizeKey(key);
  if (SENSITIVE_KEYS.has(normalized)) {
    return "[REDACTED]";
  }

  if (BULK_KEYS.has(normalized) && typeof value === "string" && value.length > BULK_PREVIEW_LENGTH) {
    return `${value.slice(0, BULK_PREVIEW_LENGTH)}... [${value.length} chars]`;
  }

  if (value !== null && typeof value === "object") {
    if (Array.isArray(value)) {
      return value.map((v, i) => sanitizeValue(String(i), v, depth + 1));
    }
    const sanitized: Record<string, unknown> = {};
    for (const [k, v] of Object.entries(value)) {
      sanitized[k] = sanitizeValue(k, v, depth + 1);
    }
    return sanitized;
  }

  return value;
}

export function sanitizeMetadata(metadata: LogMetadata): LogMetadata {
  const sanitized: LogMetadata = {};
  for (const [key, value] of Object.entries(metadata)) {
    sanitized[key] = sanitizeValue(key, value);
  }
  return sanitized;
}

// ==================== Logger Implementation ====================

function shouldLog(level: LogLevel): boolean {
  return LOG_LEVEL_PRIORITY[level] >= LOG_LEVEL_PRIORITY[LOG_CONFIG.level];
}

function formatError(error: unknown): Record<string, unknown> {
  if (error instanceof Error) {
    return {
      errorName: error.name,
      errorMessage: error.message,
      ...(LOG_CONFIG.includeStack && error.stack ? { stack: error.stack } : {}),
    };
  }
  return { errorValue: String(error) };
}

function createLoggerImpl(baseContext: LoggerContext = {}): Logger {
  const log = (level: LogLevel, message: string, meta?: LogMetadata | Error): void => {
    if (!shouldLog(level)) return;

    let metadata: LogMetadata = {};
    if (meta instanceof Error) {
      metadata = formatError(meta);
    } else if (meta) {
      const { error, ...rest } = meta;
      metadata = error === undefined ? rest : { ...rest, ...formatError(error) };
    }

    const { module, correlationId, ...extraContext } = baseContext;
    const activeCorrelationId = correlationId ?? correlationStorage.getStore();

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
      service: LOG_CONFIG.service,
      ...(module && { module }),
      ...(activeCorrelationId && { correlationId: activeCorrelationId }),
      ...extraContext,
      ...sanitizeMetadata(metadata),
    };

    sink(level, LOG_CONFIG.pretty ? JSON.stringify(entry, null, 2) : JSON.stringify(entry));
  };

  return {
    debug: (message, meta) => log("debug", message, meta),
    info: (message, meta) => log("info", message, meta),
    warn: (message, meta) => log("warn", message, meta),
    error: (message, meta) => log("error", message, meta),
    child: (context) => createLoggerImpl({ ...baseContext, ...context }),
  };
}

// ==================== Exports ====================

/**
 * Root logger instance
 */
export const logger = createLoggerImpl();

/**
 * Create a module-scoped logger
 * @param module - Module name (e.g., "store", "http", "config")
 */
export function createLogger(module: string): Logger {
  return logger.child({ module });
}
