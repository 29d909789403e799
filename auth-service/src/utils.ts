/**
 * Utility functions for auth service
 *
 * Password hashing/verification using bcrypt and the session/activation
 * token generator.
 */

import bcrypt from 'bcrypt';
import { generateToken } from 'core-service';
import type { PasswordHasher, TokenGenerator } from './types.js';

// ═══════════════════════════════════════════════════════════════════
// Password Hashing & Verification
// ═══════════════════════════════════════════════════════════════════

export const BCRYPT_ROUNDS = 12;

/**
 * bcrypt-backed PasswordHasher. Never compare plain text passwords.
 */
export class BcryptPasswordHasher implements PasswordHasher {
  constructor(private rounds: number = BCRYPT_ROUNDS) {}

  hash(password: string): Promise<string> {
    return bcrypt.hash(password, this.rounds);
  }

  verify(password: string, hash: string): Promise<boolean> {
    return bcrypt.compare(password, hash);
  }
}

// ═══════════════════════════════════════════════════════════════════
// Token Utilities
// ═══════════════════════════════════════════════════════════════════

/** Session and activation tokens: 32 random bytes, 64 hex characters */
export const TOKEN_BYTES = 32;

export const generateSessionToken: TokenGenerator = () => generateToken(TOKEN_BYTES);

/**
 * Activation link sent to a freshly registered user
 */
export function buildActivationLink(baseUrl: string, token: string): string {
  return `${baseUrl.replace(/\/+$/, '')}/activate?aid=${encodeURIComponent(token)}`;
}
