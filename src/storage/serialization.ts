/**
 * Page detail encoding
 *
 * Details are written as pretty-printed JSON with a fixed key order, so the
 * same detail always yields the same bytes and the same version hash.
 */

import { createHash } from "node:crypto";
import type { PageDetail } from "../types";
import { PageDetailSchema, formatIssues } from "../validation/schemas";

export function serializePageDetail(detail: PageDetail): Buffer {
  const ordered: PageDetail = {
    name: detail.name,
    title: detail.title,
    content: detail.content,
    ...(detail.parent !== undefined && { parent: detail.parent }),
  };
  return Buffer.from(JSON.stringify(ordered, null, 2), "utf8");
}

export type ParsePageDetailResult =
  | { valid: true; detail: PageDetail }
  | { valid: false; error: string };

const utf8 = new TextDecoder("utf-8", { fatal: true });

/**
 * Decode stored page detail bytes. Never throws.
 */
export function parsePageDetail(bytes: Uint8Array): ParsePageDetailResult {
  let text: string;
  try {
    text = utf8.decode(bytes);
  } catch {
    return { valid: false, error: "Stored detail is not valid UTF-8" };
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (err) {
    const message = err instanceof Error ? err.message : "Unknown JSON parse error";
    return { valid: false, error: `JSON parse error: ${message}` };
  }

  const result = PageDetailSchema.safeParse(parsed);
  if (!result.success) {
    return { valid: false, error: formatIssues(result.error.issues) };
  }
  return { valid: true, detail: result.data };
}

/**
 * Lowercase hex SHA-256 of the given bytes
 */
export function hashContent(bytes: Uint8Array): string {
  return createHash("sha256").update(bytes).digest("hex");
}
