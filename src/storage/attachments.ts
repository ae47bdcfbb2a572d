/**
 * Page attachments
 *
 * Raw files under `<page>/attachments/`. Attachments have no history: a save
 * with an existing filename replaces the file.
 */

import { readFile, stat } from "node:fs/promises";
import { join } from "node:path";
import type { AttachmentStub, IncomingAttachment, MimeType } from "../types";
import { createLogger } from "../logging";
import { isSafePathSegment } from "../utils/path-safety";
import { AttachmentError, errnoCode, fromFsError } from "./errors";
import { ensureDirectory, isTempFile, listEntries, writeFileAtomic } from "./fs-utils";

const log = createLogger("attachments");

export const ATTACHMENTS_DIRECTORY = "attachments";

/** Names accepted from uploads: word characters, one dot, word characters */
const UPLOAD_FILENAME_PATTERN = /^\w+\.\w+$/;

/** Names recognised on disk: any stem and a word-character extension */
const STORED_FILENAME_PATTERN = /^.+\.\w+$/;

export function isValidUploadFilename(name: string): boolean {
  return UPLOAD_FILENAME_PATTERN.test(name);
}

export function isValidStoredFilename(name: string): boolean {
  return STORED_FILENAME_PATTERN.test(name);
}

const MIME_TYPES = new Map<string, MimeType>([
  ["png", "image/png"],
  ["jpg", "image/jpeg"],
  ["jpeg", "image/jpeg"],
]);

/**
 * Content type by extension, case-insensitive. The file body is never
 * inspected.
 */
export function mimeTypeFor(filename: string): MimeType {
  const match = /\.([^.]+)$/.exec(filename);
  const extension = match ? match[1].toLowerCase() : "";
  return MIME_TYPES.get(extension) ?? "application/octet-stream";
}

/**
 * Decode standard padded base64. Anything that is not the canonical encoding
 * of its bytes fails with DecodeError.
 */
export function decodeBase64(encoded: string): Buffer {
  const bytes = Buffer.from(encoded, "base64");
  if (bytes.toString("base64") !== encoded) {
    throw new AttachmentError("DecodeError", "Attachment data is not valid base64");
  }
  return bytes;
}

export class Attachment {
  constructor(
    readonly filename: string,
    readonly path: string
  ) {}

  mimeType(): MimeType {
    return mimeTypeFor(this.filename);
  }

  /**
   * Read the whole file into memory
   */
  async data(): Promise<Buffer> {
    try {
      return await readFile(this.path);
    } catch (err) {
      throw new AttachmentError("IoError", `Failed to read attachment ${this.filename}`, { cause: err });
    }
  }
}

export class AttachmentStore {
  readonly directory: string;

  constructor(pageDirectory: string) {
    this.directory = join(pageDirectory, ATTACHMENTS_DIRECTORY);
  }

  async list(): Promise<AttachmentStub[]> {
    try {
      const names = await listEntries(
        this.directory,
        (entry) => entry.isFile() && isValidStoredFilename(entry.name) && !isTempFile(entry.name),
        true
      );
      return names.map((file_name) => ({ file_name }));
    } catch (err) {
      throw fromFsError(AttachmentError, err, "Failed to list attachments");
    }
  }

  /**
   * Open a file that `list` would show. Anything else is NotFound.
   */
  async open(filename: string): Promise<Attachment> {
    if (!isSafePathSegment(filename) || !isValidStoredFilename(filename) || isTempFile(filename)) {
      throw new AttachmentError("NotFound", `Attachment not found: ${filename}`);
    }

    const path = join(this.directory, filename);
    try {
      const info = await stat(path);
      if (!info.isFile()) {
        throw new AttachmentError("NotFound", `Attachment not found: ${filename}`);
      }
    } catch (err) {
      if (err instanceof AttachmentError) throw err;
      const code = errnoCode(err);
      if (code === "ENOENT" || code === "ENOTDIR") {
        throw new AttachmentError("NotFound", `Attachment not found: ${filename}`, { cause: err });
      }
      throw new AttachmentError("IoError", `Failed to open attachment ${filename}`, { cause: err });
    }
    return new Attachment(filename, path);
  }

  /**
   * Decode and write an upload, replacing any file of the same name
   */
  async save(incoming: IncomingAttachment): Promise<Attachment> {
    const bytes = decodeBase64(incoming.encoded_data);
    if (!isSafePathSegment(incoming.file_name)) {
      throw new AttachmentError("InvalidPath", `Invalid attachment filename: ${incoming.file_name}`);
    }

    const path = join(this.directory, incoming.file_name);
    try {
      await ensureDirectory(this.directory);
      await writeFileAtomic(path, bytes);
    } catch (err) {
      throw fromFsError(AttachmentError, err, `Failed to save attachment ${incoming.file_name}`);
    }

    log.debug("Attachment saved", { path, size: bytes.length });
    return new Attachment(incoming.file_name, path);
  }
}
