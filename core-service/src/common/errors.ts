/**
 * Error Handling Utilities
 *
 * Unified error handling shared by every package:
 * - Generic error utilities (getErrorMessage, normalizeError)
 * - Typed service errors (NotFoundError, DuplicateError, CycleError, ...)
 * - Error code registry (registerServiceErrorCodes, getAllErrorCodes)
 */

// ═══════════════════════════════════════════════════════════════════
// Generic Error Utilities
// ═══════════════════════════════════════════════════════════════════

/**
 * Extract error message from any error type
 *
 * @example
 * ```typescript
 * try {
 *   // some operation
 * } catch (error) {
 *   logger.error('Operation failed', { error: getErrorMessage(error) });
 * }
 * ```
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === 'string') {
    return error;
  }
  if (error && typeof error === 'object' && 'message' in error) {
    return String(error.message);
  }
  return String(error);
}

/**
 * Create a standardized error object from any error type
 */
export function normalizeError(error: unknown): { message: string; stack?: string } {
  if (error instanceof Error) {
    return {
      message: error.message,
      stack: error.stack,
    };
  }
  return {
    message: getErrorMessage(error),
  };
}

// ═══════════════════════════════════════════════════════════════════
// Service Errors
// ═══════════════════════════════════════════════════════════════════

export type ServiceErrorKind =
  | 'NotFound'
  | 'Duplicate'
  | 'Cycle'
  | 'Auth'
  | 'Locked'
  | 'Expired'
  | 'Storage'
  | 'Validation';

/**
 * Base class of every definitional or storage failure surfaced to callers.
 * `kind` is stable and meant for branching; `message` is for humans.
 */
export abstract class ServiceError extends Error {
  abstract readonly kind: ServiceErrorKind;
  readonly details: Record<string, unknown>;

  constructor(message: string, details: Record<string, unknown> = {}, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.details = details;
  }
}

export class NotFoundError extends ServiceError {
  readonly kind = 'NotFound';
}

export class DuplicateError extends ServiceError {
  readonly kind = 'Duplicate';
}

/** Role inheritance would become (or already is) cyclic */
export class CycleError extends ServiceError {
  readonly kind = 'Cycle';
}

/** Invalid credentials, inactive account or invalid session. Never says which. */
export class AuthError extends ServiceError {
  readonly kind = 'Auth';
}

export class LockedError extends ServiceError {
  readonly kind = 'Locked';
}

export class ExpiredError extends ServiceError {
  readonly kind = 'Expired';
}

/** Wraps any backend failure. The only kind a caller may retry. */
export class StorageError extends ServiceError {
  readonly kind = 'Storage';
}

export class ValidationError extends ServiceError {
  readonly kind = 'Validation';
}

export function isServiceError(error: unknown): error is ServiceError {
  return error instanceof ServiceError;
}

export function isRetryableError(error: unknown): boolean {
  return error instanceof StorageError;
}

/**
 * Run a storage call and wrap anything it throws that is not already a
 * ServiceError in a StorageError.
 */
export async function withStorage<T>(
  operation: string,
  fn: () => Promise<T>,
  mapError?: (error: unknown) => ServiceError | undefined
): Promise<T> {
  try {
    return await fn();
  } catch (error) {
    if (error instanceof ServiceError) throw error;
    const mapped = mapError?.(error);
    if (mapped) throw mapped;
    throw new StorageError(`Storage operation failed: ${operation}`, { operation, error: getErrorMessage(error) }, { cause: error });
  }
}

// ═══════════════════════════════════════════════════════════════════
// Error Code Registry
// ═══════════════════════════════════════════════════════════════════

/**
 * Service-agnostic registry that merges error codes from all services.
 * Used for documentation and client-side discovery.
 */
const errorCodeRegistry = new Set<string>();

/**
 * Register error codes from a service
 * Called by each service during initialization
 */
export function registerServiceErrorCodes(codes: readonly string[]): void {
  codes.forEach(code => errorCodeRegistry.add(code));
}

/**
 * Get all registered error codes as a flat, sorted array
 */
export function getAllErrorCodes(): string[] {
  return Array.from(errorCodeRegistry).sort();
}

/**
 * Extract service name from error code prefix (e.g., "MSAuthUserNotFound" -> "Auth")
 */
export function extractServiceFromCode(code: string): string | null {
  const match = code.match(/^MS([A-Z][a-z]+)/);
  return match ? match[1] : null;
}
