/**
 * Wiki Store Type Definitions
 */

/**
 * The versionable unit of a page. Serialised with a fixed key order so
 * identical details always produce identical bytes.
 */
export interface PageDetail {
  name: string;
  title: string;
  content: string;
  /** Name of a parent page in the same web */
  parent?: string;
}

// Listing projections

export interface WebStub {
  name: string;
}

export interface PageStub {
  name: string;
}

export interface AttachmentStub {
  file_name: string;
}

export interface VersionStub {
  hash: string;
}

/**
 * Attachment upload as received over the wire
 */
export interface IncomingAttachment {
  file_name: string;
  /** Base64 (standard alphabet, padded) file contents */
  encoded_data: string;
}

/**
 * Outcome of writing a page detail
 */
export interface PageWriteResult {
  /** SHA-256 of the serialised detail */
  hash: string;
  /** False when a version with this hash already existed */
  versionCreated: boolean;
}

export type MimeType = "image/png" | "image/jpeg" | "application/octet-stream";
