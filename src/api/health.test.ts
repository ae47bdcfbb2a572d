/**
 * Health Check Tests
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { writeFile } from "node:fs/promises";
import { join } from "node:path";
import { makeTempDir, removeTempDir } from "../test-support";
import { checkDataDirectory, runHealthCheck } from "./health";

describe("Health Checks", () => {
  let root: string;

  beforeEach(async () => {
    root = await makeTempDir();
  });

  afterEach(async () => {
    await removeTempDir(root);
  });

  describe("checkDataDirectory", () => {
    it("accepts a writable directory", async () => {
      expect(await checkDataDirectory(root)).toEqual({ ok: true });
    });

    it("reports a missing directory", async () => {
      const missing = join(root, "missing");
      expect(await checkDataDirectory(missing)).toEqual({
        ok: false,
        error: `Data directory ${missing} does not exist`,
      });
    });

    it("reports a file in place of the directory", async () => {
      const file = join(root, "file");
      await writeFile(file, "x");

      expect((await checkDataDirectory(file)).ok).toBe(false);
    });
  });

  describe("runHealthCheck", () => {
    it("reports ok with whole-second uptime", async () => {
      const health = await runHealthCheck(root, Date.now() - 2500);

      expect(health).toEqual({ status: "ok", uptimeSeconds: 2, dataDir: root, activeRequests: 0 });
    });

    it("reports unavailable with the reason", async () => {
      const missing = join(root, "missing");
      const health = await runHealthCheck(missing, Date.now());

      expect(health.status).toBe("unavailable");
      expect(health.error).toBe(`Data directory ${missing} does not exist`);
    });
  });
});
