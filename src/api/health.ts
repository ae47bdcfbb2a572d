/**
 * Health Check Module
 *
 * Reports whether the store root is reachable, for process supervisors and
 * load balancers.
 */

import { access, constants } from "node:fs/promises";
import { isDirectory } from "../storage/fs-utils";
import { getActiveRequestCount } from "./shutdown";

export type HealthStatus = "ok" | "unavailable";

export interface HealthResponse {
  status: HealthStatus;
  uptimeSeconds: number;
  dataDir: string;
  /** Requests in flight, this one included when served over HTTP */
  activeRequests: number;
  error?: string;
}

/**
 * Check that the store root is a directory the process can read and write
 */
export async function checkDataDirectory(dataDir: string): Promise<{ ok: boolean; error?: string }> {
  try {
    if (!(await isDirectory(dataDir))) {
      return { ok: false, error: `Data directory ${dataDir} does not exist` };
    }
    await access(dataDir, constants.R_OK | constants.W_OK);
    return { ok: true };
  } catch (err) {
    return { ok: false, error: err instanceof Error ? err.message : "Data directory check failed" };
  }
}

/**
 * Build the health report
 *
 * @param startedAt - epoch milliseconds when the server started
 */
export async function runHealthCheck(dataDir: string, startedAt: number): Promise<HealthResponse> {
  const check = await checkDataDirectory(dataDir);
  return {
    status: check.ok ? "ok" : "unavailable",
    uptimeSeconds: Math.floor((Date.now() - startedAt) / 1000),
    dataDir,
    activeRequests: getActiveRequestCount(),
    ...(check.error !== undefined && { error: check.error }),
  };
}
