/**
 * Centralized API Error Codes
 *
 * Single source of truth for all API error codes, status codes, and default messages.
 *
 * Usage:
 *   import { ApiError, errorFromCode } from "./error-codes";
 *   return errorFromCode(c, ApiError.PAGE_NOT_FOUND);
 *   throw new ApiRequestError(ApiError.VALIDATION_ERROR, "title: Required");
 */

import type { Context } from "hono";
import type { StoreError } from "../storage/errors";
import { errorResponse, type ErrorStatus } from "./responses";

/**
 * Error definition with code, default status, and default message
 */
export interface ErrorDefinition {
  code: string;
  status: ErrorStatus;
  message: string;
}

/**
 * All API error codes organized by category
 */
export const ApiError = {
  // ==================== Client Errors (4xx) ====================

  // 400 Bad Request - Invalid input
  INVALID_JSON: {
    code: "INVALID_JSON",
    status: 400,
    message: "Invalid JSON in request body",
  },
  VALIDATION_ERROR: {
    code: "VALIDATION_ERROR",
    status: 400,
    message: "Validation failed",
  },
  INVALID_NAME: {
    code: "INVALID_NAME",
    status: 400,
    message: "Name must be a single path segment",
  },
  NAME_MISMATCH: {
    code: "NAME_MISMATCH",
    status: 400,
    message: "Page name in body does not match the request path",
  },
  INVALID_FILENAME: {
    code: "INVALID_FILENAME",
    status: 400,
    message: "Attachment filename must look like name.ext",
  },
  DECODE_ERROR: {
    code: "DECODE_ERROR",
    status: 400,
    message: "Attachment data is not valid base64",
  },
  ALREADY_EXISTS: {
    code: "ALREADY_EXISTS",
    status: 400,
    message: "Resource already exists",
  },

  // 404 Not Found
  NOT_FOUND: {
    code: "NOT_FOUND",
    status: 404,
    message: "Resource not found",
  },
  WEB_NOT_FOUND: {
    code: "WEB_NOT_FOUND",
    status: 404,
    message: "Web not found",
  },
  PAGE_NOT_FOUND: {
    code: "PAGE_NOT_FOUND",
    status: 404,
    message: "Page not found",
  },
  ATTACHMENT_NOT_FOUND: {
    code: "ATTACHMENT_NOT_FOUND",
    status: 404,
    message: "Attachment not found",
  },
  VERSION_NOT_FOUND: {
    code: "VERSION_NOT_FOUND",
    status: 404,
    message: "Version not found",
  },

  // 413 Payload Too Large
  PAYLOAD_TOO_LARGE: {
    code: "PAYLOAD_TOO_LARGE",
    status: 413,
    message: "Request body too large",
  },

  // ==================== Server Errors (5xx) ====================

  INTERNAL_ERROR: {
    code: "INTERNAL_ERROR",
    status: 500,
    message: "Internal server error",
  },
  STORAGE_ERROR: {
    code: "STORAGE_ERROR",
    status: 500,
    message: "Failed to access the wiki store",
  },

  // 503 Service Unavailable
  SERVICE_UNAVAILABLE: {
    code: "SERVICE_UNAVAILABLE",
    status: 503,
    message: "Service temporarily unavailable",
  },
} as const satisfies Record<string, ErrorDefinition>;

/**
 * Thrown from handlers to end the request with a predefined error
 */
export class ApiRequestError extends Error {
  constructor(
    public readonly definition: ErrorDefinition,
    message?: string,
    public readonly details?: unknown
  ) {
    super(message ?? definition.message);
    this.name = "ApiRequestError";
  }
}

/**
 * Create an error response from a predefined error definition
 *
 * @param customMessage - overrides the default message
 */
export function errorFromCode(
  c: Context,
  error: ErrorDefinition,
  customMessage?: string,
  details?: unknown
) {
  return errorResponse(
    c,
    error.code,
    customMessage ?? error.message,
    error.status,
    details
  );
}

const NOT_FOUND_BY_SCOPE: Record<StoreError["scope"], ErrorDefinition> = {
  web: ApiError.WEB_NOT_FOUND,
  page: ApiError.PAGE_NOT_FOUND,
  attachment: ApiError.ATTACHMENT_NOT_FOUND,
  version: ApiError.VERSION_NOT_FOUND,
};

/**
 * Pick the API error for a store failure
 */
export function errorForStoreError(err: StoreError): ErrorDefinition {
  switch (err.kind) {
    case "NotFound":
      return NOT_FOUND_BY_SCOPE[err.scope];
    case "InvalidPath":
      return ApiError.INVALID_NAME;
    case "NameMismatch":
      return ApiError.NAME_MISMATCH;
    case "OverwriteError":
      return ApiError.ALREADY_EXISTS;
    case "DecodeError":
      return ApiError.DECODE_ERROR;
    case "NotDirectory":
    case "Utf8Error":
    case "IoError":
    case "SerializationError":
      return ApiError.STORAGE_ERROR;
  }
}
