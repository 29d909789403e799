/**
 * Auth Service Error Codes
 *
 * Complete list of all error codes returned by auth-service.
 *
 * Usage: the front controller maps every ServiceError kind to one of these
 * constants before it reaches a caller.
 * ```typescript
 * import { AUTH_ERRORS } from './error-codes.js';
 *
 * return { type, result: false, error: { code: AUTH_ERRORS.AccountLocked, message } };
 * ```
 *
 * Constants are the single source of truth - array is derived from them
 */
import type { ServiceErrorKind } from 'core-service';

export const AUTH_ERRORS = {
  NotFound: 'MSAuthNotFound',
  AlreadyExists: 'MSAuthAlreadyExists',
  RoleCycle: 'MSAuthRoleCycle',
  AuthenticationFailed: 'MSAuthAuthenticationFailed',
  AccountLocked: 'MSAuthAccountLocked',
  ActivationExpired: 'MSAuthActivationExpired',
  StorageUnavailable: 'MSAuthStorageUnavailable',
  InvalidRequest: 'MSAuthInvalidRequest',
  UnknownRequestType: 'MSAuthUnknownRequestType',
  InternalError: 'MSAuthInternalError',
} as const;

/**
 * Array derived from constants - no duplication, automatically synced
 */
export const AUTH_ERROR_CODES: readonly string[] = Object.values(AUTH_ERRORS);

export type AuthErrorCode = typeof AUTH_ERRORS[keyof typeof AUTH_ERRORS];

/** Code returned for each service error kind */
export const ERROR_CODE_BY_KIND: Record<ServiceErrorKind, AuthErrorCode> = {
  NotFound: AUTH_ERRORS.NotFound,
  Duplicate: AUTH_ERRORS.AlreadyExists,
  Cycle: AUTH_ERRORS.RoleCycle,
  Auth: AUTH_ERRORS.AuthenticationFailed,
  Locked: AUTH_ERRORS.AccountLocked,
  Expired: AUTH_ERRORS.ActivationExpired,
  Storage: AUTH_ERRORS.StorageUnavailable,
  Validation: AUTH_ERRORS.InvalidRequest,
};
