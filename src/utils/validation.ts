/**
 * Validation utilities for Curricula
 */

import { z } from "zod";
import { ValidationError, type ValidationIssue } from "./errors.js";

function toIssues(error: z.ZodError): ValidationIssue[] {
  return error.issues.map((issue) => ({
    path: issue.path.join("."),
    message: issue.message,
    code: issue.code,
  }));
}

/**
 * Validate data against a Zod schema
 */
export function validate<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  data: unknown,
  context?: string,
): T {
  const result = schema.safeParse(data);

  if (result.success) {
    return result.data;
  }

  throw new ValidationError(context ? `Validation failed for ${context}` : "Validation failed", {
    field: context,
    issues: toIssues(result.error),
  });
}

/**
 * Pull the outermost JSON object out of model output, tolerating prose and
 * ```json fences around it. Returns undefined when nothing parses.
 */
export function extractJsonObject(text: string): unknown {
  const jsonMatch = text.match(/\{[\s\S]*\}/);
  if (!jsonMatch) {
    return undefined;
  }

  try {
    return JSON.parse(jsonMatch[0]);
  } catch {
    return undefined;
  }
}
