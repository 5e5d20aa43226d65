/**
 * Request/Response Schemas using Zod
 *
 * Centralized validation schemas for API request bodies and CLI options.
 */

import { z } from "zod";

export const AUDIT_MODES = ["single", "full"] as const;

export type AuditMode = (typeof AUDIT_MODES)[number];

/**
 * Schema for the /audit POST request body
 */
export const AuditRequestSchema = z.object({
  url: z
    .string()
    .min(1, "URL is required")
    .max(2048, "URL is too long (max 2048 characters)"),
  mode: z.enum(AUDIT_MODES, {
    errorMap: () => ({ message: "mode must be 'single' or 'full'" }),
  }).default("single"),
  max_pages: z
    .number()
    .int("max_pages must be an integer")
    .min(1, "max_pages must be at least 1")
    .max(100, "max_pages cannot exceed 100")
    .optional(),
});

export type AuditRequestBody = z.infer<typeof AuditRequestSchema>;

/**
 * Schema for CLI options, which arrive as strings
 */
export const CliOptionsSchema = z.object({
  mode: z.enum(AUDIT_MODES).default("single"),
  maxPages: z.coerce.number().int().min(1).max(100).optional(),
  concurrency: z.coerce.number().int().min(1).max(50).optional(),
});

export type CliOptions = z.infer<typeof CliOptionsSchema>;

/**
 * Helper function to validate request body with Zod schema
 */
export function validateRequest<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  data: unknown
): { success: true; data: T } | { success: false; error: string } {
  const result = schema.safeParse(data);
  if (result.success) {
    return { success: true, data: result.data };
  }
  const errorMessages = result.error.issues
    .map((e) => `${e.path.join(".")}: ${e.message}`)
    .join("; ");
  return { success: false, error: errorMessages || "Validation failed" };
}
