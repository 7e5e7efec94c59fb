/**
 * Validation utilities for tool arguments.
 *
 * @module tools/validation
 */

import type { ZodType } from "zod";
import type { ValidationIssue } from "../core/errors.js";
import type { BaseTool } from "./tool.js";

export type { ValidationIssue };

/**
 * Result of argument validation.
 * Discriminated union based on `success` field.
 */
export type ValidationResult<T = Record<string, unknown>> =
  | {
      success: true;
      /** Validated and transformed data with defaults applied */
      data: T;
    }
  | {
      success: false;
      /** Formatted error message */
      error: string;
      /** Individual validation issues */
      issues: ValidationIssue[];
    };

/**
 * Validate arguments against a Zod schema and apply defaults/transformations.
 *
 * @example
 * ```typescript
 * const schema = z.object({
 *   delay: z.number().default(100),
 *   retries: z.number().int().min(0).default(3),
 * });
 *
 * const result = validateAndApplyDefaults(schema, { delay: 50 });
 * if (result.success) {
 *   console.log(result.data); // { delay: 50, retries: 3 }
 * }
 * ```
 */
export function validateAndApplyDefaults(
  schema: ZodType,
  params: Readonly<Record<string, unknown>>,
): ValidationResult {
  const result = schema.safeParse(params);

  if (result.success) {
    const data = result.data;
    if (data === null || typeof data !== "object" || Array.isArray(data)) {
      return {
        success: false,
        error: "Invalid parameters: root: expected an object",
        issues: [{ path: "root", message: "expected an object" }],
      };
    }
    return { success: true, data: { ...data } };
  }

  const issues: ValidationIssue[] = result.error.issues.map((issue) => ({
    path: issue.path.map(String).join(".") || "root",
    message: issue.message,
  }));

  const formattedError = `Invalid parameters: ${issues.map((i) => `${i.path}: ${i.message}`).join("; ")}`;

  return {
    success: false,
    error: formattedError,
    issues,
  };
}

/**
 * Validate arguments using the tool's schema. Tools without a schema accept
 * any argument object unchanged.
 */
export function validateToolParams(
  tool: BaseTool,
  params: Readonly<Record<string, unknown>>,
): ValidationResult {
  if (!tool.parameterSchema) {
    return { success: true, data: { ...params } };
  }
  return validateAndApplyDefaults(tool.parameterSchema, params);
}
