/**
 * Filesystem helpers shared by the store layers
 */

import { link, mkdir, readdir, rename, stat, unlink, writeFile } from "node:fs/promises";
import { nanoid } from "nanoid";
import { createLogger } from "../logging";
import { errnoCode } from "./errors";

const log = createLogger("store");

const TEMP_MARKER = ".tmp-";

export function tempPathFor(path: string): string {
  return `${path}${TEMP_MARKER}${nanoid(8)}`;
}

/**
 * Whether a directory entry is an in-flight temporary file
 */
export function isTempFile(name: string): boolean {
  return name.includes(TEMP_MARKER);
}

async function removeTempFile(path: string): Promise<void> {
  try {
    await unlink(path);
  } catch (err) {
    if (errnoCode(err) !== "ENOENT") {
      log.warn("Failed to remove temporary file", { path, error: err });
    }
  }
}

/**
 * Replace a file with new contents. Readers see either the old file or the
 * complete new one.
 */
export async function writeFileAtomic(path: string, data: Uint8Array): Promise<void> {
  const tempPath = tempPathFor(path);
  try {
    await writeFile(tempPath, data);
    await rename(tempPath, path);
  } catch (err) {
    await removeTempFile(tempPath);
    throw err;
  }
}

/**
 * Create a file only if nothing exists at `path`. The file appears complete
 * or not at all.
 *
 * @returns false when the path was already taken
 */
export async function writeFileExclusive(path: string, data: Uint8Array): Promise<boolean> {
  const tempPath = tempPathFor(path);
  try {
    await writeFile(tempPath, data);
    await link(tempPath, path);
    return true;
  } catch (err) {
    if (errnoCode(err) === "EEXIST") {
      return false;
    }
    throw err;
  } finally {
    await removeTempFile(tempPath);
  }
}

export async function ensureDirectory(path: string): Promise<void> {
  await mkdir(path, { recursive: true });
}

/**
 * @returns false when nothing exists at `path` or it is not a directory
 */
export async function isDirectory(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isDirectory();
  } catch (err) {
    const code = errnoCode(err);
    if (code === "ENOENT" || code === "ENOTDIR") {
      return false;
    }
    throw err;
  }
}

/**
 * Sorted names of the immediate entries of `dir` that pass `accept`.
 * A missing directory lists as empty when `missingOk` is set.
 */
export async function listEntries(
  dir: string,
  accept: (entry: { name: string; isFile(): boolean; isDirectory(): boolean }) => boolean,
  missingOk = false
): Promise<string[]> {
  try {
    const entries = await readdir(dir, { withFileTypes: true });
    return entries
      .filter(accept)
      .map((entry) => entry.name)
      .sort();
  } catch (err) {
    if (missingOk && errnoCode(err) === "ENOENT") {
      return [];
    }
    throw err;
  }
}

export function listSubdirectories(dir: string): Promise<string[]> {
  return listEntries(dir, (entry) => entry.isDirectory());
}
