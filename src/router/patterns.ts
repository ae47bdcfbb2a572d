/**
 * Path Patterns
 *
 * Compiles declarative patterns such as "/webs/:web_name/pages" into
 * matchers. A pattern is compiled once and reused across requests.
 *
 *   const pattern = compilePattern("/webs/:web_name/pages/:page_name");
 *   pattern.match("/webs/Home/pages/WebHome");
 *   // { web_name: "Home", page_name: "WebHome" }
 */

import { escapeRegex } from "../utils/regex";

export type PatternSegment =
  | { type: "literal"; value: string }
  | { type: "param"; name: string };

export type PathParams = Record<string, string>;

export interface PathPattern {
  /** Source pattern as written */
  readonly source: string;
  /** Segments in order, as parsed */
  readonly segments: readonly PatternSegment[];
  /** Declared parameter names in order (duplicates preserved) */
  readonly paramNames: readonly string[];
  /** Anchored expression the pattern compiled to */
  readonly regex: RegExp;
  /**
   * Match a concrete path. Returns one percent-decoded value per declared
   * parameter, or null when the path does not fit the pattern.
   */
  match(path: string): PathParams | null;
  /** Substitute parameters back into the pattern */
  build(params: PathParams): string;
}

/** One non-empty path component */
const PARAM_CAPTURE = "([^/]+)";

/**
 * Percent-decode one captured component. Malformed escapes do not match.
 */
function decodeSegment(raw: string | undefined): string | null {
  if (raw === undefined) return null;
  try {
    return decodeURIComponent(raw);
  } catch (err) {
    if (err instanceof URIError) return null;
    throw err;
  }
}

export class PatternError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "PatternError";
  }
}

/**
 * Split a pattern into literal and parameter segments.
 * The leading "/" is required; everything after it is split on "/".
 */
export function parsePattern(pattern: string): PatternSegment[] {
  if (!pattern.startsWith("/")) {
    throw new PatternError(`Pattern must start with "/": ${pattern}`);
  }

  return pattern
    .slice(1)
    .split("/")
    .map((part): PatternSegment => {
      if (part.startsWith(":")) {
        const name = part.slice(1);
        if (name.length === 0) {
          throw new PatternError(`Empty parameter name in pattern: ${pattern}`);
        }
        return { type: "param", name };
      }
      return { type: "literal", value: part };
    });
}

/**
 * Compile a pattern into a reusable matcher.
 */
export function compilePattern(pattern: string): PathPattern {
  const segments = parsePattern(pattern);
  const paramNames: string[] = [];

  let source = "^";
  for (const segment of segments) {
    source += "/";
    if (segment.type === "param") {
      paramNames.push(segment.name);
      source += PARAM_CAPTURE;
    } else {
      source += escapeRegex(segment.value);
    }
  }
  source += "$";

  const regex = new RegExp(source);

  const match = (path: string): PathParams | null => {
    const result = regex.exec(path);
    if (!result) return null;

    const params: PathParams = {};
    for (const [i, name] of paramNames.entries()) {
      const value = decodeSegment(result[i + 1]);
      if (value === null) return null;
      params[name] = value;
    }

    // A repeated name collapses into one key; treat that as no match
    // rather than silently dropping a captured segment.
    if (Object.keys(params).length !== paramNames.length) {
      return null;
    }
    return params;
  };

  const build = (params: PathParams): string =>
    "/" +
    segments
      .map((segment) => {
        if (segment.type === "literal") return segment.value;
        const value = params[segment.name];
        if (value === undefined || value.length === 0) {
          throw new PatternError(`Missing value for parameter "${segment.name}" in ${pattern}`);
        }
        return encodeURIComponent(value);
      })
      .join("/");

  return {
    source: pattern,
    segments,
    paramNames,
    regex,
    match,
    build,
  };
}
