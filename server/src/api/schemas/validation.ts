/**
 * Request Validation
 *
 * Parses request data with a Zod schema, throwing a ValidationError the
 * error handler turns into a 400 response.
 */

import { ZodError, ZodIssue, ZodType, ZodTypeDef } from 'zod';
import { ErrorCodes, ValidationError } from '../../errors/ApiError';

/**
 * Format Zod errors into a user-friendly message
 */
export function formatZodError(error: ZodError<unknown>): string {
  return error.issues
    .map((e: ZodIssue) => {
      const path = e.path.length > 0 ? `${e.path.join('.')}: ` : '';
      return `${path}${e.message}`;
    })
    .join('; ');
}

/**
 * Validate `data` (a request body, query or params object) and return the
 * parsed value
 *
 * @example
 * const input = parseRequest(ProviderBodySchema, req.body);
 */
export function parseRequest<T>(schema: ZodType<T, ZodTypeDef, unknown>, data: unknown): T {
  const result = schema.safeParse(data);

  if (!result.success) {
    throw new ValidationError(formatZodError(result.error), ErrorCodes.VALIDATION_ERROR, {
      issues: result.error.issues.map((e: ZodIssue) => ({
        field: e.path.join('.'),
        message: e.message,
        code: e.code,
      })),
    });
  }

  return result.data;
}
