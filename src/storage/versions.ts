/**
 * Page version history
 *
 * Every distinct serialised detail a page has held is kept as
 * `versions/<sha256>.json`. Version files are never rewritten.
 */

import { join } from "node:path";
import type { PageDetail, VersionStub } from "../types";
import { createLogger } from "../logging";
import { ContentStore } from "./content-store";
import { VersionError, fromFsError, isStoreError } from "./errors";
import { hashContent, parsePageDetail } from "./serialization";

const log = createLogger("versions");

export const VERSIONS_DIRECTORY = "versions";
export const VERSION_SUFFIX = ".json";

const VERSION_HASH_PATTERN = /^[0-9a-f]{64}$/;

export function isVersionHash(value: string): boolean {
  return VERSION_HASH_PATTERN.test(value);
}

export interface AppendResult {
  hash: string;
  created: boolean;
}

function toVersionError(err: unknown, context: string): VersionError {
  if (err instanceof VersionError) return err;
  if (isStoreError(err)) return new VersionError(err.kind, err.message, { cause: err });
  return fromFsError(VersionError, err, context);
}

export class VersionStore {
  private readonly content: ContentStore;

  constructor(pageDirectory: string) {
    this.content = new ContentStore(join(pageDirectory, VERSIONS_DIRECTORY), {
      suffix: VERSION_SUFFIX,
      scope: "version",
    });
  }

  get directory(): string {
    return this.content.directory;
  }

  /**
   * Record serialised detail bytes, keyed by their hash
   */
  async append(bytes: Uint8Array): Promise<AppendResult> {
    const hash = hashContent(bytes);
    try {
      if (await this.content.has(hash)) {
        return { hash, created: false };
      }
      const created = await this.content.put(hash, bytes);
      if (created) {
        log.debug("Version appended", { directory: this.directory, hash });
      }
      return { hash, created };
    } catch (err) {
      throw toVersionError(err, `Failed to append version ${hash}`);
    }
  }

  async list(): Promise<VersionStub[]> {
    try {
      const hashes = await this.content.keys();
      return hashes.map((hash) => ({ hash }));
    } catch (err) {
      throw toVersionError(err, "Failed to list versions");
    }
  }

  async get(hash: string): Promise<PageDetail> {
    if (!isVersionHash(hash)) {
      throw new VersionError("NotFound", `Version not found: ${hash}`);
    }

    let bytes: Buffer | null;
    try {
      bytes = await this.content.get(hash);
    } catch (err) {
      throw toVersionError(err, `Failed to read version ${hash}`);
    }
    if (bytes === null) {
      throw new VersionError("NotFound", `Version not found: ${hash}`);
    }

    const parsed = parsePageDetail(bytes);
    if (!parsed.valid) {
      throw new VersionError("SerializationError", `Version ${hash} is unreadable: ${parsed.error}`);
    }
    return parsed.detail;
  }
}
