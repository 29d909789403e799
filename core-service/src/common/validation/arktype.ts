/**
 * Validation Utilities
 *
 * Common validation helpers used across services
 */

import { type } from 'arktype';
import { ValidationError } from '../errors.js';

export type ValidationErrors = InstanceType<typeof type.errors>;

/**
 * Unwrap an arktype result or throw a ValidationError naming `subject`
 *
 * @example
 * ```typescript
 * const schema = type({ email: 'string.email', password: 'string > 0' });
 * const { email, password } = assertValid(schema(input), 'login request');
 * ```
 */
export function assertValid<T>(schemaResult: T | ValidationErrors, subject: string): T {
  if (schemaResult instanceof type.errors) {
    throw new ValidationError(`Invalid ${subject}: ${schemaResult.summary}`, { subject, summary: schemaResult.summary });
  }
  return schemaResult;
}
