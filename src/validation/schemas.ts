/**
 * Zod Validation Schemas
 *
 * Request bodies and stored page details are validated here before they
 * reach the store.
 */

import { z } from "zod";
import { isSafePathSegment } from "../utils/path-safety";

// ==================== Constants ====================

export const LIMITS = {
  NAME_MAX: 255,
  TITLE_MAX: 1000,
  FILENAME_MAX: 255,
} as const;

// ==================== Base Schemas ====================

/**
 * Web or page name: a single path segment
 */
export const NameSchema = z
  .string()
  .min(1, "Name is required")
  .max(LIMITS.NAME_MAX)
  .refine(isSafePathSegment, { message: "Name must be a single path segment" });

/**
 * Current content of a page, also the body of create and update requests
 */
export const PageDetailSchema = z.object({
  name: NameSchema,
  title: z.string().max(LIMITS.TITLE_MAX),
  content: z.string(),
  parent: NameSchema.optional(),
});

// ==================== Request Schemas ====================

export const CreateWebRequestSchema = z.object({
  name: NameSchema,
});

/**
 * Attachment upload. The filename pattern is checked separately so a bad
 * name can be reported with its own error code.
 */
export const AttachmentUploadSchema = z.object({
  file_name: z.string().min(1).max(LIMITS.FILENAME_MAX),
  encoded_data: z.string(),
});

// ==================== Validation Helpers ====================

/**
 * Validate and parse data, returning result with typed error
 */
export function validateRequest<T extends z.ZodType>(
  schema: T,
  data: unknown
): { success: true; data: z.infer<T> } | { success: false; error: string; details: z.ZodIssue[] } {
  const result = schema.safeParse(data);

  if (result.success) {
    return { success: true, data: result.data };
  }

  return {
    success: false,
    error: formatIssues(result.error.issues),
    details: result.error.issues,
  };
}

/**
 * Join zod issues into one readable line
 */
export function formatIssues(issues: z.ZodIssue[]): string {
  return issues
    .map((issue) => {
      const path = issue.path.length > 0 ? `${issue.path.join(".")}: ` : "";
      return `${path}${issue.message}`;
    })
    .join("; ");
}
