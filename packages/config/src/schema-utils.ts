/**
 * Zod Schema Utilities
 *
 * Shared validation helpers for consistent error handling across packages.
 *
 * @packageDocumentation
 */

import type { z } from 'zod';

/**
 * Format Zod issues as `path: message` strings
 *
 * Error messages include the full path (e.g., "builder.args.2: Expected string, received number").
 */
export function formatZodIssues(error: z.ZodError): string[] {
  return error.errors.map(err => {
    const path = err.path.join('.');
    return path ? `${path}: ${err.message}` : err.message;
  });
}

/**
 * Create a type-safe validator function from a Zod schema
 *
 * @example
 * ```typescript
 * const result = safeValidateConfig(data);
 * if (result.success) {
 *   console.log(result.data.projects);
 * } else {
 *   console.error(result.errors);
 * }
 * ```
 */
export function createSafeValidator<T extends z.ZodType>(schema: T) {
  return function safeValidate(data: unknown):
    | { success: true; data: z.infer<T> }
    | { success: false; errors: string[] } {
    const result = schema.safeParse(data);

    if (result.success) {
      return { success: true, data: result.data };
    }

    return { success: false, errors: formatZodIssues(result.error) };
  };
}

/**
 * Create a strict validator function from a Zod schema
 *
 * Throws ZodError on validation failure.
 */
export function createStrictValidator<T extends z.ZodType>(schema: T) {
  return function validate(data: unknown): z.infer<T> {
    return schema.parse(data);
  };
}
