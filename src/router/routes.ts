/**
 * Route Classification
 *
 * Turns an HTTP method and path into a typed route. The rule table is
 * compiled at module load and evaluated in order; the first matching rule
 * wins and anything unmatched is an Invalid route.
 */

import { compilePattern, type PathParams, type PathPattern } from "./patterns";

export type Route =
  | { kind: "ListWebs" }
  | { kind: "CreateWeb" }
  | { kind: "ListPages"; webName: string }
  | { kind: "CreatePage"; webName: string }
  | { kind: "ShowPage"; webName: string; pageName: string }
  | { kind: "UpdatePage"; webName: string; pageName: string }
  | { kind: "ListAttachments"; webName: string; pageName: string }
  | { kind: "CreateAttachment"; webName: string; pageName: string }
  | { kind: "ServeAttachment"; webName: string; pageName: string; attachmentName: string }
  | { kind: "ListPageVersions"; webName: string; pageName: string }
  | { kind: "ShowPageVersion"; webName: string; pageName: string; versionHash: string }
  | { kind: "Invalid" };

export type RouteKind = Route["kind"];

export type RouteMethod = "GET" | "POST" | "PUT";

export const PATHS = {
  webs: compilePattern("/webs"),
  pages: compilePattern("/webs/:web_name/pages"),
  page: compilePattern("/webs/:web_name/pages/:page_name"),
  attachments: compilePattern("/webs/:web_name/pages/:page_name/attachments"),
  attachment: compilePattern("/webs/:web_name/pages/:page_name/attachments/:attachment_name"),
  versions: compilePattern("/webs/:web_name/pages/:page_name/versions"),
  version: compilePattern("/webs/:web_name/pages/:page_name/versions/:version_hash"),
} as const satisfies Record<string, PathPattern>;

interface RouteRule {
  method: RouteMethod;
  pattern: PathPattern;
  build: (params: PathParams) => Route;
}

/**
 * Every pattern guarantees its parameters are bound when it matches, so a
 * missing one here is a programming error in the rule table.
 */
function param(params: PathParams, name: string): string {
  const value = params[name];
  if (value === undefined) {
    throw new Error(`Route rule references unbound parameter "${name}"`);
  }
  return value;
}

const webParams = (p: PathParams) => ({ webName: param(p, "web_name") });

const pageParams = (p: PathParams) => ({
  webName: param(p, "web_name"),
  pageName: param(p, "page_name"),
});

/** Evaluated top to bottom; deeper shapes come before their parents */
export const ROUTE_RULES: readonly RouteRule[] = [
  // GET
  {
    method: "GET",
    pattern: PATHS.attachment,
    build: (p) => ({ kind: "ServeAttachment", ...pageParams(p), attachmentName: param(p, "attachment_name") }),
  },
  { method: "GET", pattern: PATHS.attachments, build: (p) => ({ kind: "ListAttachments", ...pageParams(p) }) },
  {
    method: "GET",
    pattern: PATHS.version,
    build: (p) => ({ kind: "ShowPageVersion", ...pageParams(p), versionHash: param(p, "version_hash") }),
  },
  { method: "GET", pattern: PATHS.versions, build: (p) => ({ kind: "ListPageVersions", ...pageParams(p) }) },
  { method: "GET", pattern: PATHS.page, build: (p) => ({ kind: "ShowPage", ...pageParams(p) }) },
  { method: "GET", pattern: PATHS.pages, build: (p) => ({ kind: "ListPages", ...webParams(p) }) },
  { method: "GET", pattern: PATHS.webs, build: () => ({ kind: "ListWebs" }) },

  // POST
  { method: "POST", pattern: PATHS.attachments, build: (p) => ({ kind: "CreateAttachment", ...pageParams(p) }) },
  { method: "POST", pattern: PATHS.pages, build: (p) => ({ kind: "CreatePage", ...webParams(p) }) },
  { method: "POST", pattern: PATHS.webs, build: () => ({ kind: "CreateWeb" }) },

  // PUT
  { method: "PUT", pattern: PATHS.page, build: (p) => ({ kind: "UpdatePage", ...pageParams(p) }) },
];

/**
 * Classify a request. Pure: the same input always yields the same route.
 */
export function classifyRoute(method: string, path: string): Route {
  const normalizedMethod = method.toUpperCase();

  for (const rule of ROUTE_RULES) {
    if (rule.method !== normalizedMethod) continue;
    const params = rule.pattern.match(path);
    if (params) {
      return rule.build(params);
    }
  }

  return { kind: "Invalid" };
}
