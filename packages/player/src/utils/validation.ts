/**
 * Validation helper utilities
 *
 * Turns zod failures and range violations into ValidationError
 */

import { z } from 'zod';
import { ValidationError } from '../types/errors';

/**
 * Validates data against a Zod schema
 *
 * @param schema - Zod schema to validate against
 * @param data - Data to validate
 * @param context - Additional context for error messages
 * @returns Validated and typed data
 * @throws ValidationError if validation fails
 */
export function validate<T extends z.ZodTypeAny>(
  schema: T,
  data: unknown,
  context?: string
): z.infer<T> {
  const result = schema.safeParse(data);
  if (result.success) {
    return result.data;
  }

  const message = context
    ? `Validation failed for ${context}: ${formatZodError(result.error)}`
    : `Validation failed: ${formatZodError(result.error)}`;

  throw new ValidationError(message, result.error.errors, {
    validationErrors: result.error.errors,
  });
}

/**
 * Validates data against a Zod schema, returning null on failure instead of throwing
 */
export function validateSafe<T extends z.ZodTypeAny>(schema: T, data: unknown): z.infer<T> | null {
  const result = schema.safeParse(data);
  return result.success ? result.data : null;
}

/**
 * Formats Zod validation errors into a readable message
 */
export function formatZodError(error: z.ZodError): string {
  return error.errors
    .map((err) => {
      const path = err.path.join('.');
      return path ? `${path}: ${err.message}` : err.message;
    })
    .join('; ');
}

/**
 * Validates that a number is within a range
 *
 * @param value - Number to validate
 * @param min - Minimum value (inclusive)
 * @param max - Maximum value (inclusive)
 * @param name - Name of the value for error message
 * @throws ValidationError if value is out of range
 */
export function validateRange(value: number, min: number, max: number, name = 'Value'): number {
  if (Number.isNaN(value) || value < min || value > max) {
    throw new ValidationError(
      `${name} must be between ${min} and ${max}, got ${value}`,
      undefined,
      {
        value,
        min,
        max,
        fieldName: name,
      }
    );
  }
  return value;
}

/**
 * Type guard to check if an error is a ValidationError
 */
export function isValidationError(error: unknown): error is ValidationError {
  return error instanceof ValidationError;
}

/**
 * Type guard to check if an error is a Zod error
 */
export function isZodError(error: unknown): error is z.ZodError {
  return error instanceof z.ZodError;
}
