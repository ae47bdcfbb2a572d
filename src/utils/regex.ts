/**
 * Regex Utilities
 *
 * Safe handling of regular expressions built from literal text.
 */

/**
 * Escape special regex characters in a string.
 *
 * Use this when constructing a RegExp from literal input so that
 * characters like "." or "+" in a route segment match themselves.
 *
 * @example
 * ```ts
 * const pattern = new RegExp(`^/${escapeRegex("v1.0")}$`);
 * // pattern matches "/v1.0" but not "/v1x0"
 * ```
 */
export function escapeRegex(str: string): string {
  // Backslash must be escaped along with the other metacharacters
  return str.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}
