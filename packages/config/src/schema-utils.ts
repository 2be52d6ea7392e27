/**
 * Zod Schema Utilities
 *
 * Shared validation helpers for consistent error handling.
 *
 * @packageDocumentation
 */

import type { z } from 'zod';

/**
 * Format zod issues as "path: message" lines
 *
 * @example
 * ```typescript
 * formatIssues(error) // ['github.timeoutMs: Number must be greater than 0']
 * ```
 */
export function formatIssues(error: z.ZodError): string[] {
  return error.errors.map(err => {
    const path = err.path.join('.');
    return path ? `${path}: ${err.message}` : err.message;
  });
}

/**
 * Create a type-safe validator function from a Zod schema
 *
 * Error messages include full path (e.g., "0.condition.0: Invalid enum value...")
 *
 * @example
 * ```typescript
 * const safeValidateConfig = createSafeValidator(ShiplogConfigSchema);
 *
 * const result = safeValidateConfig(data);
 * if (result.success) {
 *   console.log(result.data);
 * } else {
 *   console.error(result.errors);
 * }
 * ```
 */
export function createSafeValidator<T extends z.ZodType>(schema: T) {
  return function safeValidate(data: unknown):
    | { success: true; data: z.output<T> }
    | { success: false; errors: string[] } {
    const result = schema.safeParse(data);

    if (result.success) {
      return { success: true, data: result.data };
    }

    return { success: false, errors: formatIssues(result.error) };
  };
}
