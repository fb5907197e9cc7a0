/**
 * @fileoverview Zod schemas and validation helpers shared by Tasklane packages
 * @module @tasklane/validation
 *
 * @example
 * ```typescript
 * import { validate, nonEmptyStringSchema, queryBooleanSchema } from '@tasklane/validation';
 *
 * // Throws ValidationError with per-field messages
 * const request = validate(CreateSpaceRequestSchema, input, 'Invalid space request');
 *
 * const archived = queryBooleanSchema.parse('true'); // true
 * ```
 */

import { z } from 'zod';
import { ValidationError } from '@tasklane/errors';

// ============================================================================
// Field Schemas
// ============================================================================

/**
 * Non-empty string; used for names that a remote API requires.
 */
export const nonEmptyStringSchema = z.string().regex(/\S/, 'This field is required');

/**
 * Opaque remote identifier. ClickUp uses numeric strings for most resources
 * and alphanumeric strings for tasks.
 */
export const resourceIdSchema = z
  .string()
  .min(1, 'Identifier is required')
  .regex(/^[A-Za-z0-9_-]+$/, 'Identifier contains invalid characters');

/**
 * Unix timestamp in milliseconds.
 */
export const timestampMsSchema = z.number().int().nonnegative();

/**
 * Boolean query parameter. Accepts only the literal strings `true` and `false`.
 */
export const queryBooleanSchema = z
  .enum(['true', 'false'], { errorMap: () => ({ message: 'Expected "true" or "false"' }) })
  .transform((value) => value === 'true');

/**
 * Zero-based page number from a query string. Only plain decimal digits.
 */
export const pageNumberSchema = z
  .string()
  .regex(/^\d+$/, 'Expected a non-negative integer')
  .pipe(z.coerce.number().int());

// ============================================================================
// Validation Utilities
// ============================================================================

/**
 * Validates data with a schema, throwing ValidationError on failure.
 *
 * @param schema - Zod schema to validate against
 * @param data - Data to validate
 * @param message - Message for the thrown error
 * @returns Validated and typed data
 */
export function validate<S extends z.ZodTypeAny>(
  schema: S,
  data: unknown,
  message = 'Validation failed'
): z.output<S> {
  const result = schema.safeParse(data);
  if (!result.success) {
    throw new ValidationError(message, formatZodErrors(result.error));
  }
  return result.data;
}

/**
 * Validates data without throwing.
 *
 * @example
 * ```typescript
 * const result = safeValidate(queryBooleanSchema, c.req.query('archived'));
 * if (!result.success) {
 *   console.log(formatZodErrorsFlat(result.errors));
 * }
 * ```
 */
export function safeValidate<S extends z.ZodTypeAny>(
  schema: S,
  data: unknown
): { success: true; data: z.output<S> } | { success: false; errors: z.ZodError } {
  const result = schema.safeParse(data);
  if (result.success) {
    return { success: true, data: result.data };
  }
  return { success: false, errors: result.error };
}

/**
 * Formats Zod errors into messages keyed by field path.
 *
 * @example
 * ```typescript
 * formatZodErrors(error); // { name: ['This field is required'] }
 * ```
 */
export function formatZodErrors(error: z.ZodError): Record<string, string[]> {
  const formatted: Record<string, string[]> = {};
  for (const issue of error.issues) {
    const path = issue.path.join('.') || '_root';
    (formatted[path] ??= []).push(issue.message);
  }
  return formatted;
}

/**
 * Formats Zod errors into a flat array of messages.
 */
export function formatZodErrorsFlat(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.join('.');
    return path ? `${path}: ${issue.message}` : issue.message;
  });
}

/**
 * Removes keys whose value is `undefined`, keeping explicit `null`s.
 * Partial updates depend on omitted keys leaving remote values untouched.
 */
export function omitUndefined(value: Record<string, unknown>): Record<string, unknown> {
  return Object.fromEntries(Object.entries(value).filter(([, entry]) => entry !== undefined));
}
