/**
 * MongoDB Error Handling Utilities
 *
 * Maps driver failures onto service errors: duplicate keys become
 * DuplicateError, everything else StorageError.
 */

import { DuplicateError, withStorage } from './errors.js';

/**
 * Check if error is a MongoDB duplicate key error (E11000)
 * Handles various error formats for compatibility
 */
export function isDuplicateKeyError(error: unknown): boolean {
  if (!error || typeof error !== 'object') return false;

  if ('code' in error && (error.code === 11000 || error.code === 11001)) return true;
  if ('codeName' in error && error.codeName === 'DuplicateKey') return true;

  const message = 'message' in error ? error.message : undefined;
  if (typeof message === 'string') {
    return message.includes('duplicate key') || message.includes('E11000') || message.includes('E11001');
  }

  return false;
}

/**
 * Run a MongoDB call, turning duplicate-key failures into the DuplicateError
 * built by `onDuplicate` and anything else into a StorageError.
 */
export function withMongo<T>(
  operation: string,
  fn: () => Promise<T>,
  onDuplicate?: (error: unknown) => DuplicateError
): Promise<T> {
  return withStorage(operation, fn, error =>
    onDuplicate && isDuplicateKeyError(error) ? onDuplicate(error) : undefined
  );
}
