/**
 * Page store
 *
 * A page is a directory named after the page, holding `page.json` (the
 * current detail), `versions/` and `attachments/`.
 */

import { mkdir, readFile, rm, stat } from "node:fs/promises";
import { basename, join } from "node:path";
import type {
  AttachmentStub,
  IncomingAttachment,
  PageDetail,
  PageWriteResult,
  VersionStub,
} from "../types";
import { createLogger } from "../logging";
import { isSafePathSegment } from "../utils/path-safety";
import { Attachment, AttachmentStore } from "./attachments";
import { PageError, fromFsError, isStoreError } from "./errors";
import { writeFileAtomic } from "./fs-utils";
import { parsePageDetail, serializePageDetail } from "./serialization";
import { VersionStore } from "./versions";

const log = createLogger("page");

export const PAGE_FILENAME = "page.json";

/** Substituted by the OS layer for bytes that are not valid text */
const REPLACEMENT_CHARACTER = "\uFFFD";

export class Page {
  readonly directory: string;
  readonly detail: PageDetail;
  private readonly versions: VersionStore;
  private readonly attachments: AttachmentStore;

  private constructor(directory: string, detail: PageDetail) {
    this.directory = directory;
    this.detail = detail;
    this.versions = new VersionStore(directory);
    this.attachments = new AttachmentStore(directory);
  }

  get name(): string {
    return this.detail.name;
  }

  /**
   * A page bound to `directory` that has not been written yet
   */
  static bind(directory: string, detail: PageDetail): Page {
    return new Page(directory, detail);
  }

  /**
   * Load an existing page. The stored name must equal the directory name.
   */
  static async open(directory: string): Promise<Page> {
    const name = basename(directory);
    if (name.includes(REPLACEMENT_CHARACTER)) {
      throw new PageError("Utf8Error", `Page directory name is not valid UTF-8: ${directory}`);
    }
    if (!isSafePathSegment(name)) {
      throw new PageError("InvalidPath", `Page path has no name component: ${directory}`);
    }

    try {
      const info = await stat(directory);
      if (!info.isDirectory()) {
        throw new PageError("NotDirectory", `Page path is not a directory: ${directory}`);
      }
    } catch (err) {
      if (isStoreError(err)) throw err;
      throw fromFsError(PageError, err, `Failed to open page ${name}`);
    }

    let bytes: Buffer;
    try {
      bytes = await readFile(join(directory, PAGE_FILENAME));
    } catch (err) {
      throw fromFsError(PageError, err, `Failed to read page ${name}`);
    }

    const parsed = parsePageDetail(bytes);
    if (!parsed.valid) {
      throw new PageError("SerializationError", `Page ${name} is unreadable: ${parsed.error}`);
    }
    if (parsed.detail.name !== name) {
      throw new PageError(
        "NameMismatch",
        `Page directory ${name} holds a page named ${parsed.detail.name}`
      );
    }
    return new Page(directory, parsed.detail);
  }

  /**
   * Write a new page. Fails with OverwriteError if the directory exists.
   * A failed first write leaves no directory behind.
   */
  async create(): Promise<PageWriteResult> {
    try {
      await mkdir(this.directory);
    } catch (err) {
      throw fromFsError(PageError, err, `Failed to create page ${this.name}`);
    }

    try {
      return await this.write();
    } catch (err) {
      await rm(this.directory, { recursive: true, force: true }).catch((cleanupErr: unknown) => {
        log.warn("Failed to remove partially created page", { directory: this.directory, error: cleanupErr });
      });
      throw err;
    }
  }

  /**
   * Replace the detail of an existing page. Fails with NotFound if the
   * directory does not exist.
   */
  async update(): Promise<PageWriteResult> {
    try {
      const info = await stat(this.directory);
      if (!info.isDirectory()) {
        throw new PageError("NotFound", `Page not found: ${this.name}`);
      }
    } catch (err) {
      if (isStoreError(err)) throw err;
      throw fromFsError(PageError, err, `Page not found: ${this.name}`);
    }
    return this.write();
  }

  private async write(): Promise<PageWriteResult> {
    const bytes = serializePageDetail(this.detail);
    try {
      await writeFileAtomic(join(this.directory, PAGE_FILENAME), bytes);
    } catch (err) {
      throw fromFsError(PageError, err, `Failed to write page ${this.name}`);
    }

    const { hash, created } = await this.versions.append(bytes);
    log.info("Page written", { directory: this.directory, hash, versionCreated: created });
    return { hash, versionCreated: created };
  }

  listVersions(): Promise<VersionStub[]> {
    return this.versions.list();
  }

  getVersion(hash: string): Promise<PageDetail> {
    return this.versions.get(hash);
  }

  listAttachments(): Promise<AttachmentStub[]> {
    return this.attachments.list();
  }

  getAttachment(filename: string): Promise<Attachment> {
    return this.attachments.open(filename);
  }

  saveAttachment(incoming: IncomingAttachment): Promise<Attachment> {
    return this.attachments.save(incoming);
  }
}
