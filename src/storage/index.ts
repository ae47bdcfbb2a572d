/**
 * Wiki store
 */

import { KeyedLock } from "./lock";
import { WebCollection } from "./webs";

export interface WikiStore {
  root: string;
  webs: WebCollection;
  locks: KeyedLock;
}

export function createWikiStore(root: string): WikiStore {
  return { root, webs: new WebCollection(root), locks: new KeyedLock() };
}

/** Serialises creation of the web and of pages inside it */
export function webLockKey(webName: string): string {
  return `web:${webName}`;
}

/** Serialises reads and writes of one page */
export function pageLockKey(webName: string, pageName: string): string {
  return `page:${webName}/${pageName}`;
}

export * from "./errors";
export { WebCollection } from "./webs";
export { Web } from "./web";
export { Page, PAGE_FILENAME } from "./page";
export { VersionStore, VERSIONS_DIRECTORY, isVersionHash } from "./versions";
export {
  Attachment,
  AttachmentStore,
  ATTACHMENTS_DIRECTORY,
  isValidUploadFilename,
  isValidStoredFilename,
  mimeTypeFor,
  decodeBase64,
} from "./attachments";
export { ContentStore } from "./content-store";
export { KeyedLock } from "./lock";
export { serializePageDetail, parsePageDetail, hashContent } from "./serialization";
