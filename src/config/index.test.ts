/**
 * Configuration Module Tests
 */

import { describe, test, expect, beforeEach, afterEach } from "vitest";
import { writeFile } from "node:fs/promises";
import { join, resolve } from "node:path";
import { makeTempDir, removeTempDir } from "../test-support";
import {
  assertDataDirectory,
  ConfigurationError,
  envSchema,
  getConfigSummary,
  loadConfig,
} from "./index";

describe("envSchema", () => {
  test("applies defaults", () => {
    const result = envSchema.parse({});

    expect(result.PORT).toBe(3000);
    expect(result.HOST).toBe("127.0.0.1");
    expect(result.NODE_ENV).toBe("development");
    expect(result.DATA_DIR).toBe(resolve("./data"));
    expect(result.LOG_LEVEL).toBe("info");
    expect(result.LOG_PRETTY).toBe(false);
    expect(result.MAX_BODY_BYTES).toBe(10 * 1024 * 1024);
    expect(result.SHUTDOWN_TIMEOUT_MS).toBe(30000);
  });

  test("rejects out-of-range ports", () => {
    expect(envSchema.safeParse({ PORT: "0" }).success).toBe(false);
    expect(envSchema.safeParse({ PORT: "65536" }).success).toBe(false);
    expect(envSchema.safeParse({ PORT: "80abc" }).success).toBe(false);
  });

  test("rejects unknown log levels", () => {
    expect(envSchema.safeParse({ LOG_LEVEL: "trace" }).success).toBe(false);
  });

  test("parses boolean flags", () => {
    expect(envSchema.parse({ LOG_PRETTY: "1" }).LOG_PRETTY).toBe(true);
    expect(envSchema.parse({ LOG_PRETTY: "no" }).LOG_PRETTY).toBe(false);
  });
});

describe("loadConfig", () => {
  test("groups validated values", () => {
    const config = loadConfig({ NODE_ENV: "test", PORT: "8080", DATA_DIR: "/srv/wiki" });

    expect(config.env).toBe("test");
    expect(config.isTest).toBe(true);
    expect(config.isProduction).toBe(false);
    expect(config.server.port).toBe(8080);
    expect(config.server.host).toBe("127.0.0.1");
    expect(config.data.dir).toBe(resolve("/srv/wiki"));
    expect(config.logging).toEqual({ level: "info", pretty: false });
  });

  test("lets overrides win over the environment", () => {
    const config = loadConfig(
      { NODE_ENV: "test", PORT: "8080", HOST: "0.0.0.0", DATA_DIR: "/srv/wiki" },
      { port: "9090", host: "localhost", dataDir: "/tmp/other" }
    );

    expect(config.server.port).toBe(9090);
    expect(config.server.host).toBe("localhost");
    expect(config.data.dir).toBe(resolve("/tmp/other"));
  });

  test("pretty-prints logs in development", () => {
    expect(loadConfig({ NODE_ENV: "development" }).logging.pretty).toBe(true);
  });

  test("reports every invalid value", () => {
    expect(() => loadConfig({ PORT: "nope", MAX_BODY_BYTES: "1" })).toThrow(ConfigurationError);
    expect(() => loadConfig({ PORT: "nope" })).toThrow(/^Invalid configuration: PORT: /);
  });

  test("summarizes without secrets", () => {
    const config = loadConfig({ NODE_ENV: "test", DATA_DIR: "/srv/wiki" });

    expect(getConfigSummary(config)).toEqual({
      environment: "test",
      server: { host: "127.0.0.1", port: 3000, maxBodyBytes: 10 * 1024 * 1024 },
      data: { dir: resolve("/srv/wiki") },
      logging: { level: "info" },
    });
  });
});

describe("assertDataDirectory", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir();
  });

  afterEach(async () => {
    await removeTempDir(dir);
  });

  test("accepts an existing directory", async () => {
    await expect(assertDataDirectory(loadConfig({ DATA_DIR: dir }))).resolves.toBeUndefined();
  });

  test("rejects a missing directory", async () => {
    await expect(assertDataDirectory(loadConfig({ DATA_DIR: join(dir, "missing") }))).rejects.toThrow(
      ConfigurationError
    );
  });

  test("rejects a file", async () => {
    await writeFile(join(dir, "file"), "x");
    await expect(assertDataDirectory(loadConfig({ DATA_DIR: join(dir, "file") }))).rejects.toThrow(
      "is not a directory"
    );
  });
});
