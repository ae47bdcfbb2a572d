/**
 * Centralized Configuration Module
 *
 * Environment variables are validated with Zod. CLI flags override the
 * environment. Fail fast if anything is invalid.
 *
 * Usage:
 *   import { loadConfig } from "./config";
 *   const config = loadConfig(process.env, { dataDir: "./wiki" });
 *   console.log(config.server.port);
 */

import { stat } from "node:fs/promises";
import { resolve } from "node:path";
import { z } from "zod";
import { LOG_LEVELS } from "../logging";

/**
 * Helper to create a port number schema with default
 */
const portSchema = (defaultPort: number) =>
  z.preprocess(
    (val) => val ?? String(defaultPort),
    z
      .string()
      .regex(/^\d+$/, "Expected a whole number")
      .transform((s) => parseInt(s, 10))
      .pipe(z.number().int().min(1).max(65535))
  );

/**
 * Helper to create a number schema with default and range
 */
const numberSchema = (defaultValue: number, min: number, max: number) =>
  z.preprocess(
    (val) => val ?? String(defaultValue),
    z
      .string()
      .regex(/^\d+$/, "Expected a whole number")
      .transform((s) => parseInt(s, 10))
      .pipe(z.number().int().min(min).max(max))
  );

/**
 * Helper for boolean env vars (truthy = "true" or "1")
 */
const booleanSchema = (defaultValue: boolean) =>
  z.preprocess(
    (val) => val ?? String(defaultValue),
    z.string().transform((s) => s === "true" || s === "1")
  );

/**
 * Environment variable schema with validation
 */
const envSchema = z.object({
  // Server configuration
  PORT: portSchema(3000),
  HOST: z.string().min(1).default("127.0.0.1"),

  // Environment
  NODE_ENV: z.enum(["development", "production", "test"]).default("development"),

  // Wiki store root, resolved to an absolute path
  DATA_DIR: z
    .string()
    .min(1)
    .default("./data")
    .transform((path) => resolve(path)),

  // Logging
  LOG_LEVEL: z.enum(LOG_LEVELS).default("info"),
  LOG_PRETTY: booleanSchema(false),

  // Limits
  MAX_BODY_BYTES: numberSchema(10 * 1024 * 1024, 1024, 1024 * 1024 * 1024),
  SHUTDOWN_TIMEOUT_MS: numberSchema(30_000, 0, 10 * 60 * 1000),
});

export type EnvConfig = z.infer<typeof envSchema>;

/**
 * Values given on the command line. They win over the environment.
 */
export interface ConfigOverrides {
  dataDir?: string;
  host?: string;
  port?: string;
}

/**
 * Error thrown when configuration is invalid
 */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigurationError";
  }
}

/**
 * Derived configuration with grouped settings
 */
export interface AppConfig {
  env: EnvConfig["NODE_ENV"];
  isProduction: boolean;
  isDevelopment: boolean;
  isTest: boolean;

  server: {
    host: string;
    port: number;
    maxBodyBytes: number;
    shutdownTimeoutMs: number;
  };

  data: {
    dir: string;
  };

  logging: {
    level: EnvConfig["LOG_LEVEL"];
    pretty: boolean;
  };
}

/**
 * Parse and validate configuration
 */
export function loadConfig(
  env: NodeJS.ProcessEnv = process.env,
  overrides: ConfigOverrides = {}
): AppConfig {
  const input: NodeJS.ProcessEnv = {
    ...env,
    ...(overrides.dataDir !== undefined && { DATA_DIR: overrides.dataDir }),
    ...(overrides.host !== undefined && { HOST: overrides.host }),
    ...(overrides.port !== undefined && { PORT: overrides.port }),
  };

  const result = envSchema.safeParse(input);
  if (!result.success) {
    throw new ConfigurationError(
      `Invalid configuration: ${result.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join(", ")}`
    );
  }

  const values = result.data;
  return {
    env: values.NODE_ENV,
    isProduction: values.NODE_ENV === "production",
    isDevelopment: values.NODE_ENV === "development",
    isTest: values.NODE_ENV === "test",
    server: {
      host: values.HOST,
      port: values.PORT,
      maxBodyBytes: values.MAX_BODY_BYTES,
      shutdownTimeoutMs: values.SHUTDOWN_TIMEOUT_MS,
    },
    data: {
      dir: values.DATA_DIR,
    },
    logging: {
      level: values.LOG_LEVEL,
      pretty: values.LOG_PRETTY || values.NODE_ENV === "development",
    },
  };
}

/**
 * The store root must already exist before the server starts
 */
export async function assertDataDirectory(config: AppConfig): Promise<void> {
  let isDirectory: boolean;
  try {
    isDirectory = (await stat(config.data.dir)).isDirectory();
  } catch (err) {
    throw new ConfigurationError(
      `Data directory ${config.data.dir} is not accessible: ${err instanceof Error ? err.message : String(err)}`
    );
  }
  if (!isDirectory) {
    throw new ConfigurationError(`Data directory ${config.data.dir} is not a directory`);
  }
}

/**
 * Get configuration summary for diagnostics
 */
export function getConfigSummary(config: AppConfig): Record<string, unknown> {
  return {
    environment: config.env,
    server: {
      host: config.server.host,
      port: config.server.port,
      maxBodyBytes: config.server.maxBodyBytes,
    },
    data: {
      dir: config.data.dir,
    },
    logging: {
      level: config.logging.level,
    },
  };
}

// Export for testing
export { envSchema };
