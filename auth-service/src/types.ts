/**
 * Auth Service Types
 */

import type { RoleLookup } from 'access-engine';
import type { Clock, Logger } from 'core-service';

// ═══════════════════════════════════════════════════════════════════
// Entities
// ═══════════════════════════════════════════════════════════════════

export const USER_STATUSES = ['inactive', 'active', 'suspended'] as const;

export type UserStatus = typeof USER_STATUSES[number];

export interface User {
  id: string;
  /** Stored normalised (trimmed, lower-case) */
  email: string;
  passwordHash: string;
  status: UserStatus;
  roleId: string;
  createdAt: Date;
  updatedAt: Date;
}

/**
 * Pending activation; at most one per user
 */
export interface Activation {
  userId: string;
  token: string;
  createdAt: Date;
}

/**
 * Login state; at most one per user
 */
export interface Login {
  userId: string;
  /** null while no session is open */
  sessionToken: string | null;
  /** Consecutive failed attempts */
  attempts: number;
  /** When the session was issued or the last failure recorded */
  createdAt: Date;
}

export type UserLookup = { userId: string } | { email: string };

// ═══════════════════════════════════════════════════════════════════
// Repositories
// ═══════════════════════════════════════════════════════════════════

export interface UserRepository {
  findById(userId: string): Promise<User | null>;
  findByEmail(email: string): Promise<User | null>;
  /** Throws DuplicateError when the e-mail is taken */
  insert(user: User): Promise<void>;
  updateStatus(userId: string, status: UserStatus, updatedAt: Date): Promise<User | null>;
  updateRole(userId: string, roleId: string, updatedAt: Date): Promise<User | null>;
  deleteById(userId: string): Promise<boolean>;
}

export interface ActivationRepository {
  findByUserId(userId: string): Promise<Activation | null>;
  findByToken(token: string): Promise<Activation | null>;
  /** Throws DuplicateError when the user already has an activation */
  insert(activation: Activation): Promise<void>;
  deleteByUserId(userId: string): Promise<boolean>;
  /** Delete rows created at or before `cutoff`; resolves the count */
  deleteCreatedBefore(cutoff: Date): Promise<number>;
}

export interface LoginRepository {
  findByUserId(userId: string): Promise<Login | null>;
  findBySessionToken(sessionToken: string): Promise<Login | null>;
  /** Create or replace the user's row */
  save(login: Login): Promise<void>;
  /**
   * Atomically add one failed attempt (creating the row if needed), stamp
   * it with `at` and drop any stale session token. Resolves the new count.
   */
  incrementAttempts(userId: string, at: Date): Promise<number>;
  resetAttempts(userId: string): Promise<void>;
  clearSession(userId: string): Promise<void>;
  /** Clear tokens of sessions created at or before `cutoff`; resolves the count */
  clearSessionsCreatedBefore(cutoff: Date): Promise<number>;
}

// ═══════════════════════════════════════════════════════════════════
// Collaborators
// ═══════════════════════════════════════════════════════════════════

export interface PasswordHasher {
  hash(password: string): Promise<string>;
  verify(password: string, hash: string): Promise<boolean>;
}

export interface ActivationNotifier {
  sendActivation(user: User, token: string): Promise<void>;
}

/** Produces unpredictable fixed-length tokens */
export type TokenGenerator = () => string;

/**
 * Options shared by every auth component
 */
export interface ComponentOptions {
  clock?: Clock;
  logger?: Logger;
}

export interface AccountStoreOptions extends ComponentOptions {
  /** Role existence check for register and setRole */
  roles: RoleLookup;
  /**
   * Called after a user row is written. If it throws, the registration is
   * rolled back and the error propagates.
   */
  onRegistered?: (user: User) => Promise<void>;
  generateId?: () => string;
}

export interface SessionPolicy {
  sessionLifetimeMs: number;
  maxLoginAttempts: number;
  /** Rotate the token when at most this much lifetime remains; 0 disables rotation */
  sessionRefreshMs: number;
}

export interface ActivationPolicy {
  activationWindowMs: number;
}
