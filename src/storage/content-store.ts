/**
 * Append-only content store
 *
 * Files in one directory, keyed by name. A key is written at most once;
 * later writes of the same key are ignored.
 */

import { readFile, stat } from "node:fs/promises";
import { join } from "node:path";
import { StoreError, errnoCode, type StoreScope } from "./errors";
import { ensureDirectory, isTempFile, listEntries, writeFileExclusive } from "./fs-utils";

const KEY_PATTERN = /^[A-Za-z0-9_-]+$/;

export interface ContentStoreOptions {
  /** Appended to each key to form the filename, e.g. ".json" */
  suffix?: string;
  /** Scope reported on errors raised by this store */
  scope: StoreScope;
}

export function isValidContentKey(key: string): boolean {
  return KEY_PATTERN.test(key);
}

function isMissing(err: unknown): boolean {
  const code = errnoCode(err);
  return code === "ENOENT" || code === "ENOTDIR";
}

export class ContentStore {
  readonly directory: string;
  private readonly suffix: string;
  private readonly scope: StoreScope;

  constructor(directory: string, options: ContentStoreOptions) {
    this.directory = directory;
    this.suffix = options.suffix ?? "";
    this.scope = options.scope;
  }

  pathFor(key: string): string {
    if (!isValidContentKey(key)) {
      throw new StoreError(this.scope, "InvalidPath", `Invalid content key: ${key}`);
    }
    return join(this.directory, `${key}${this.suffix}`);
  }

  async has(key: string): Promise<boolean> {
    if (!isValidContentKey(key)) return false;
    try {
      return (await stat(this.pathFor(key))).isFile();
    } catch (err) {
      if (isMissing(err)) return false;
      throw err;
    }
  }

  /**
   * @returns null when the key is absent or not a valid key
   */
  async get(key: string): Promise<Buffer | null> {
    if (!isValidContentKey(key)) return null;
    try {
      return await readFile(this.pathFor(key));
    } catch (err) {
      if (isMissing(err)) return null;
      throw err;
    }
  }

  /**
   * Store bytes under a key unless it already exists.
   *
   * @returns true if the key was newly written
   */
  async put(key: string, bytes: Uint8Array): Promise<boolean> {
    const path = this.pathFor(key);
    await ensureDirectory(this.directory);
    return writeFileExclusive(path, bytes);
  }

  /**
   * Sorted keys of all stored entries. Empty if the directory is absent.
   */
  async keys(): Promise<string[]> {
    const names = await listEntries(
      this.directory,
      (entry) => entry.isFile() && entry.name.endsWith(this.suffix) && !isTempFile(entry.name),
      true
    );
    return names
      .map((name) => name.slice(0, name.length - this.suffix.length))
      .filter(isValidContentKey);
  }
}
