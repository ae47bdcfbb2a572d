/**
 * Shared helpers for tests
 */

import { mkdtemp, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { isStoreError, type StoreError } from "./storage/errors";

export function makeTempDir(prefix = "wikistore-"): Promise<string> {
  return mkdtemp(join(tmpdir(), prefix));
}

export function removeTempDir(dir: string): Promise<void> {
  return rm(dir, { recursive: true, force: true });
}

/**
 * Await an operation expected to fail with a store error and return it
 */
export async function captureStoreError(operation: Promise<unknown>): Promise<StoreError> {
  try {
    await operation;
  } catch (err) {
    if (isStoreError(err)) return err;
    throw err;
  }
  throw new Error("Expected the operation to fail with a store error");
}
