/**
 * Error Codes Module Tests
 */

import { describe, it, expect } from "vitest";
import { Hono } from "hono";
import {
  AttachmentError,
  PageError,
  STORE_ERROR_KINDS,
  StoreError,
  VersionError,
  WebError,
} from "../storage/errors";
import {
  ApiError,
  ApiRequestError,
  errorForStoreError,
  errorFromCode,
} from "./error-codes";

describe("ApiError constants", () => {
  it("uses 400 for rejected input", () => {
    expect(ApiError.INVALID_JSON.status).toBe(400);
    expect(ApiError.VALIDATION_ERROR.status).toBe(400);
    expect(ApiError.INVALID_NAME.status).toBe(400);
    expect(ApiError.NAME_MISMATCH.status).toBe(400);
    expect(ApiError.INVALID_FILENAME.status).toBe(400);
    expect(ApiError.DECODE_ERROR.status).toBe(400);
    expect(ApiError.ALREADY_EXISTS.status).toBe(400);
  });

  it("uses 404 for missing resources", () => {
    expect(ApiError.NOT_FOUND.status).toBe(404);
    expect(ApiError.WEB_NOT_FOUND.status).toBe(404);
    expect(ApiError.PAGE_NOT_FOUND.status).toBe(404);
    expect(ApiError.ATTACHMENT_NOT_FOUND.status).toBe(404);
    expect(ApiError.VERSION_NOT_FOUND.status).toBe(404);
  });

  it("uses 5xx for server side failures", () => {
    expect(ApiError.INTERNAL_ERROR.status).toBe(500);
    expect(ApiError.STORAGE_ERROR.status).toBe(500);
    expect(ApiError.SERVICE_UNAVAILABLE.status).toBe(503);
  });

  it("keys every definition by its own code", () => {
    for (const [key, definition] of Object.entries(ApiError)) {
      expect(definition.code).toBe(key);
    }
  });
});

describe("errorFromCode", () => {
  it("uses the default message", async () => {
    const app = new Hono();
    app.get("/test", (c) => errorFromCode(c, ApiError.PAGE_NOT_FOUND));

    const res = await app.request("/test");

    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({
      error: { code: "PAGE_NOT_FOUND", message: "Page not found" },
    });
  });

  it("accepts a custom message and details", async () => {
    const app = new Hono();
    app.get("/test", (c) =>
      errorFromCode(c, ApiError.PAYLOAD_TOO_LARGE, "Too big", { maxSize: 10 })
    );

    const res = await app.request("/test");

    expect(res.status).toBe(413);
    expect(await res.json()).toEqual({
      error: { code: "PAYLOAD_TOO_LARGE", message: "Too big", details: { maxSize: 10 } },
    });
  });
});

describe("ApiRequestError", () => {
  it("falls back to the definition message", () => {
    const err = new ApiRequestError(ApiError.WEB_NOT_FOUND);
    expect(err.message).toBe("Web not found");
    expect(err.definition).toBe(ApiError.WEB_NOT_FOUND);
    expect(err.details).toBeUndefined();
  });

  it("keeps a custom message and details", () => {
    const err = new ApiRequestError(ApiError.VALIDATION_ERROR, "name: Required", ["issue"]);
    expect(err.message).toBe("name: Required");
    expect(err.details).toEqual(["issue"]);
    expect(err.name).toBe("ApiRequestError");
  });
});

describe("errorForStoreError", () => {
  it("maps NotFound by the scope that raised it", () => {
    expect(errorForStoreError(new WebError("NotFound", "x"))).toBe(ApiError.WEB_NOT_FOUND);
    expect(errorForStoreError(new PageError("NotFound", "x"))).toBe(ApiError.PAGE_NOT_FOUND);
    expect(errorForStoreError(new AttachmentError("NotFound", "x"))).toBe(ApiError.ATTACHMENT_NOT_FOUND);
    expect(errorForStoreError(new VersionError("NotFound", "x"))).toBe(ApiError.VERSION_NOT_FOUND);
  });

  it("maps caller mistakes to 400s", () => {
    expect(errorForStoreError(new PageError("InvalidPath", "x"))).toBe(ApiError.INVALID_NAME);
    expect(errorForStoreError(new PageError("NameMismatch", "x"))).toBe(ApiError.NAME_MISMATCH);
    expect(errorForStoreError(new WebError("OverwriteError", "x"))).toBe(ApiError.ALREADY_EXISTS);
    expect(errorForStoreError(new AttachmentError("DecodeError", "x"))).toBe(ApiError.DECODE_ERROR);
  });

  it("maps store corruption and I/O failures to STORAGE_ERROR", () => {
    for (const kind of ["NotDirectory", "Utf8Error", "IoError", "SerializationError"] as const) {
      expect(errorForStoreError(new StoreError("page", kind, "x"))).toBe(ApiError.STORAGE_ERROR);
    }
  });

  it("maps every kind to a definition", () => {
    for (const kind of STORE_ERROR_KINDS) {
      expect(errorForStoreError(new StoreError("web", kind, "x")).code).toMatch(/^[A-Z_]+$/);
    }
  });
});
