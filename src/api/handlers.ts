/**
 * Wiki Route Handlers
 *
 * One handler per classified route. Each resolves web and page under the
 * matching lock, runs the store operation and shapes the response.
 * Failures are thrown and turned into error responses by the app's
 * onError hook.
 */

import type { Context } from "hono";
import type { z } from "zod";
import { PATHS, classifyRoute, type Route } from "../router";
import {
  isValidUploadFilename,
  pageLockKey,
  webLockKey,
  type Page,
  type Web,
  type WikiStore,
} from "../storage";
import {
  AttachmentUploadSchema,
  CreateWebRequestSchema,
  PageDetailSchema,
  validateRequest,
} from "../validation/schemas";
import { ApiError, ApiRequestError, errorFromCode } from "./error-codes";
import {
  binaryResponse,
  createdResponse,
  noContentResponse,
  notModified,
  withETag,
} from "./responses";

type RouteOf<K extends Route["kind"]> = Extract<Route, { kind: K }>;

/**
 * Parse the request body as JSON and validate it
 */
async function readBody<T extends z.ZodType>(c: Context, schema: T): Promise<z.infer<T>> {
  const text = await c.req.text();

  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ApiRequestError(ApiError.INVALID_JSON, `${ApiError.INVALID_JSON.message}: ${reason}`);
  }

  const result = validateRequest(schema, data);
  if (!result.success) {
    throw new ApiRequestError(ApiError.VALIDATION_ERROR, result.error, result.details);
  }
  return result.data;
}

async function requireWeb(store: WikiStore, webName: string): Promise<Web> {
  const web = await store.webs.get(webName);
  if (!web) {
    throw new ApiRequestError(ApiError.WEB_NOT_FOUND, `Web not found: ${webName}`);
  }
  return web;
}

async function requirePage(store: WikiStore, webName: string, pageName: string): Promise<Page> {
  const web = await requireWeb(store, webName);
  return web.openPage(pageName);
}

/**
 * Run `fn` while holding the lock of one page
 */
function withPage<T>(
  store: WikiStore,
  route: { webName: string; pageName: string },
  fn: (page: Page) => Promise<T>
): Promise<T> {
  return store.locks.run(pageLockKey(route.webName, route.pageName), async () =>
    fn(await requirePage(store, route.webName, route.pageName))
  );
}

// ==================== Webs ====================

async function listWebs(c: Context, store: WikiStore) {
  return c.json(await store.webs.list());
}

async function createWeb(c: Context, store: WikiStore) {
  const { name } = await readBody(c, CreateWebRequestSchema);
  await store.locks.run(webLockKey(name), () => store.webs.create(name));
  return createdResponse(c, PATHS.pages.build({ web_name: name }));
}

// ==================== Pages ====================

async function listPages(c: Context, store: WikiStore, route: RouteOf<"ListPages">) {
  const web = await requireWeb(store, route.webName);
  return c.json(await web.listPages());
}

async function createPage(c: Context, store: WikiStore, route: RouteOf<"CreatePage">) {
  const detail = await readBody(c, PageDetailSchema);

  await store.locks.run(webLockKey(route.webName), () =>
    store.locks.run(pageLockKey(route.webName, detail.name), async () => {
      const web = await requireWeb(store, route.webName);
      await web.newPage(detail).create();
    })
  );

  return createdResponse(c, PATHS.page.build({ web_name: route.webName, page_name: detail.name }));
}

async function showPage(c: Context, store: WikiStore, route: RouteOf<"ShowPage">) {
  const detail = await withPage(store, route, async (page) => page.detail);
  return c.json(detail);
}

async function updatePage(c: Context, store: WikiStore, route: RouteOf<"UpdatePage">) {
  const detail = await readBody(c, PageDetailSchema);
  if (detail.name !== route.pageName) {
    throw new ApiRequestError(
      ApiError.NAME_MISMATCH,
      `Body names page "${detail.name}" but the path names "${route.pageName}"`
    );
  }

  await store.locks.run(pageLockKey(route.webName, route.pageName), async () => {
    const web = await requireWeb(store, route.webName);
    await web.newPage(detail).update();
  });

  return noContentResponse(c);
}

// ==================== Attachments ====================

async function listAttachments(c: Context, store: WikiStore, route: RouteOf<"ListAttachments">) {
  return c.json(await withPage(store, route, (page) => page.listAttachments()));
}

async function createAttachment(c: Context, store: WikiStore, route: RouteOf<"CreateAttachment">) {
  const upload = await readBody(c, AttachmentUploadSchema);
  if (!isValidUploadFilename(upload.file_name)) {
    throw new ApiRequestError(
      ApiError.INVALID_FILENAME,
      `${ApiError.INVALID_FILENAME.message}: ${upload.file_name}`
    );
  }

  await withPage(store, route, (page) => page.saveAttachment(upload));

  return createdResponse(
    c,
    PATHS.attachment.build({
      web_name: route.webName,
      page_name: route.pageName,
      attachment_name: upload.file_name,
    })
  );
}

async function serveAttachment(store: WikiStore, route: RouteOf<"ServeAttachment">) {
  const { data, mimeType } = await withPage(store, route, async (page) => {
    const attachment = await page.getAttachment(route.attachmentName);
    return { data: await attachment.data(), mimeType: attachment.mimeType() };
  });
  return binaryResponse(data, mimeType);
}

// ==================== Versions ====================

async function listPageVersions(c: Context, store: WikiStore, route: RouteOf<"ListPageVersions">) {
  return c.json(await withPage(store, route, (page) => page.listVersions()));
}

async function showPageVersion(c: Context, store: WikiStore, route: RouteOf<"ShowPageVersion">) {
  const detail = await withPage(store, route, (page) => page.getVersion(route.versionHash));

  if (withETag(c, `"${route.versionHash}"`)) {
    return notModified(c);
  }
  return c.json(detail);
}

// ==================== Dispatch ====================

/**
 * Run the handler for an already classified route
 */
export async function dispatchRoute(c: Context, store: WikiStore, route: Route): Promise<Response> {
  switch (route.kind) {
    case "ListWebs":
      return listWebs(c, store);
    case "CreateWeb":
      return createWeb(c, store);
    case "ListPages":
      return listPages(c, store, route);
    case "CreatePage":
      return createPage(c, store, route);
    case "ShowPage":
      return showPage(c, store, route);
    case "UpdatePage":
      return updatePage(c, store, route);
    case "ListAttachments":
      return listAttachments(c, store, route);
    case "CreateAttachment":
      return createAttachment(c, store, route);
    case "ServeAttachment":
      return serveAttachment(store, route);
    case "ListPageVersions":
      return listPageVersions(c, store, route);
    case "ShowPageVersion":
      return showPageVersion(c, store, route);
    case "Invalid":
      return errorFromCode(c, ApiError.NOT_FOUND, `No route for ${c.req.method} ${new URL(c.req.url).pathname}`);
  }
}

/**
 * Classify the request path (still percent-encoded) and dispatch it
 */
export function handleWikiRequest(c: Context, store: WikiStore): Promise<Response> {
  const route = classifyRoute(c.req.method, new URL(c.req.url).pathname);
  return dispatchRoute(c, store, route);
}
