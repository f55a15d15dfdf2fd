/**
 * Contextual Validation Utilities
 *
 * Zod validation wrappers that name what was being validated, so a bad
 * config value and a malformed server frame read differently in logs.
 *
 * @example
 * ```typescript
 * const config = validateWith(clientConfigSchema, input, "client config");
 * ```
 */

import { type ZodError, type ZodType } from "zod";

import { ValidationError, type ValidationIssue } from "./index";

/**
 * Converts Zod issues to ValidationIssue format.
 */
export function zodIssuesToValidationIssues(
  error: ZodError,
): ValidationIssue[] {
  return error.issues.map((issue) => ({
    path: issue.path.map(String).join("."),
    message: issue.message,
    code: issue.code,
  }));
}

/**
 * Validates a value, throwing a ValidationError naming the subject.
 */
export function validateWith<T>(
  schema: ZodType<T>,
  value: unknown,
  subject: string,
): T {
  const result = schema.safeParse(value);

  if (result.success) {
    return result.data;
  }

  throw wrapZodError(result.error, subject);
}

/**
 * Wraps a Zod error already caught elsewhere.
 */
export function wrapZodError(
  error: ZodError,
  subject: string,
): ValidationError {
  const issues = zodIssuesToValidationIssues(error);
  const summary = issues
    .map((issue) =>
      issue.path ? `${issue.path}: ${issue.message}` : issue.message,
    )
    .join("; ");

  return new ValidationError(
    `Invalid ${subject}: ${summary}`,
    { subject, issues },
    { cause: error },
  );
}
