/**
 * Path Safety Utilities
 *
 * Web and page names become directory names under the store root, so they
 * are checked before any filesystem call.
 */

/**
 * Characters that may never appear inside a single path segment. U+FFFD
 * is reserved for directory names that were not valid UTF-8 on disk.
 */
const FORBIDDEN_SEGMENT_CHARS = /[/\\\x00\uFFFD]/;

/**
 * Check that a name is usable as exactly one directory entry.
 *
 * Rejects empty names, "." and "..", and anything containing a
 * path separator, NUL or U+FFFD.
 */
export function isSafePathSegment(name: string): boolean {
  if (name.length === 0) return false;
  if (name === "." || name === "..") return false;
  return !FORBIDDEN_SEGMENT_CHARS.test(name);
}

