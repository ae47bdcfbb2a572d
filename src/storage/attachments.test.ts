/**
 * Attachment Store Tests
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdir, readFile, readdir, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { makeTempDir, removeTempDir, captureStoreError } from "../test-support";
import {
  ATTACHMENTS_DIRECTORY,
  AttachmentStore,
  decodeBase64,
  isValidStoredFilename,
  isValidUploadFilename,
  mimeTypeFor,
} from "./attachments";

describe("filename validators", () => {
  it("accepts simple upload names", () => {
    expect(isValidUploadFilename("photo.png")).toBe(true);
    expect(isValidUploadFilename("notes_2024.txt")).toBe(true);
  });

  it("rejects upload names without a single extension", () => {
    expect(isValidUploadFilename("noext")).toBe(false);
    expect(isValidUploadFilename("archive.tar.gz")).toBe(false);
    expect(isValidUploadFilename(".png")).toBe(false);
    expect(isValidUploadFilename("my photo.png")).toBe(false);
    expect(isValidUploadFilename("../x.png")).toBe(false);
  });

  it("accepts any stem for stored names", () => {
    expect(isValidStoredFilename("archive.tar.gz")).toBe(true);
    expect(isValidStoredFilename("my photo.png")).toBe(true);
    expect(isValidStoredFilename("noext")).toBe(false);
    expect(isValidStoredFilename("trailing.")).toBe(false);
  });
});

describe("mimeTypeFor", () => {
  it("maps known image extensions", () => {
    expect(mimeTypeFor("photo.png")).toBe("image/png");
    expect(mimeTypeFor("photo.jpg")).toBe("image/jpeg");
    expect(mimeTypeFor("photo.jpeg")).toBe("image/jpeg");
  });

  it("ignores extension case", () => {
    expect(mimeTypeFor("PHOTO.PNG")).toBe("image/png");
    expect(mimeTypeFor("photo.JpEg")).toBe("image/jpeg");
  });

  it("falls back to octet-stream", () => {
    expect(mimeTypeFor("notes.txt")).toBe("application/octet-stream");
    expect(mimeTypeFor("photo.png.bak")).toBe("application/octet-stream");
    expect(mimeTypeFor("noext")).toBe("application/octet-stream");
    expect(mimeTypeFor("file.constructor")).toBe("application/octet-stream");
  });
});

describe("decodeBase64", () => {
  it("decodes standard padded base64", () => {
    expect(decodeBase64("aGVsbG8=").toString("utf8")).toBe("hello");
    expect(decodeBase64("")).toHaveLength(0);
  });

  it("rejects malformed input", () => {
    for (const input of ["aGVsbG8", "aGV sbG8=", "a", "!!!!", "aGVsbG8=\n", "aGVsbG9="]) {
      expect(() => decodeBase64(input)).toThrow("Attachment data is not valid base64");
    }
  });
});

describe("AttachmentStore", () => {
  let pageDir: string;
  let attachments: AttachmentStore;

  const pngBytes = Buffer.from([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a]);

  beforeEach(async () => {
    pageDir = await makeTempDir();
    attachments = new AttachmentStore(pageDir);
  });

  afterEach(async () => {
    await removeTempDir(pageDir);
  });

  it("round-trips saved bytes", async () => {
    await attachments.save({ file_name: "photo.png", encoded_data: pngBytes.toString("base64") });

    const attachment = await attachments.open("photo.png");
    expect((await attachment.data()).equals(pngBytes)).toBe(true);
    expect(attachment.mimeType()).toBe("image/png");
    expect(await readFile(join(pageDir, ATTACHMENTS_DIRECTORY, "photo.png"))).toEqual(pngBytes);
  });

  it("overwrites an existing attachment", async () => {
    await attachments.save({ file_name: "a.txt", encoded_data: Buffer.from("one").toString("base64") });
    await attachments.save({ file_name: "a.txt", encoded_data: Buffer.from("two").toString("base64") });

    const data = await (await attachments.open("a.txt")).data();
    expect(data.toString("utf8")).toBe("two");
    expect(await readdir(join(pageDir, ATTACHMENTS_DIRECTORY))).toEqual(["a.txt"]);
  });

  it("rejects bad base64 before touching the disk", async () => {
    const err = await captureStoreError(attachments.save({ file_name: "a.txt", encoded_data: "%%%" }));

    expect(err.kind).toBe("DecodeError");
    expect(await readdir(pageDir)).toEqual([]);
  });

  it("rejects filenames that escape the directory", async () => {
    const err = await captureStoreError(attachments.save({ file_name: "../a.txt", encoded_data: "" }));
    expect(err.kind).toBe("InvalidPath");
  });

  it("lists nothing when the directory is absent", async () => {
    expect(await attachments.list()).toEqual([]);
  });

  it("lists regular files with an extension, sorted", async () => {
    const dir = join(pageDir, ATTACHMENTS_DIRECTORY);
    await mkdir(dir);
    await writeFile(join(dir, "b.png"), "x");
    await writeFile(join(dir, "a b.txt"), "x");
    await writeFile(join(dir, "noext"), "x");
    await mkdir(join(dir, "folder.d"));

    expect(await attachments.list()).toEqual([{ file_name: "a b.txt" }, { file_name: "b.png" }]);
  });

  it("reports missing attachments as not found", async () => {
    expect((await captureStoreError(attachments.open("missing.png"))).kind).toBe("NotFound");
  });

  it("reports escaping names as not found", async () => {
    expect((await captureStoreError(attachments.open(".."))).kind).toBe("NotFound");
    expect((await captureStoreError(attachments.open("../page.json"))).kind).toBe("NotFound");
  });

  it("reports files hidden from the listing as not found", async () => {
    const dir = join(pageDir, ATTACHMENTS_DIRECTORY);
    await mkdir(dir, { recursive: true });
    await writeFile(join(dir, "README"), "x");
    await writeFile(join(dir, "photo.png.tmp-abcdefgh"), "x");

    expect(await attachments.list()).toEqual([]);
    expect((await captureStoreError(attachments.open("README"))).kind).toBe("NotFound");
    expect((await captureStoreError(attachments.open("photo.png.tmp-abcdefgh"))).kind).toBe("NotFound");
  });

  it("reports directories as not found", async () => {
    await mkdir(join(pageDir, ATTACHMENTS_DIRECTORY, "folder.d"), { recursive: true });
    expect((await captureStoreError(attachments.open("folder.d"))).kind).toBe("NotFound");
  });
});
