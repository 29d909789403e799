/**
 * Generic Utilities
 *
 * Token, identifier and time helpers shared across services.
 */

import crypto from 'node:crypto';

// ═══════════════════════════════════════════════════════════════════
// Token Utilities
// ═══════════════════════════════════════════════════════════════════

/**
 * Generate a cryptographically random hex token (`length` bytes, 2×length chars)
 */
export function generateToken(length: number = 32): string {
  return crypto.randomBytes(length).toString('hex');
}

/**
 * Truncate a token for log output so full secrets never reach the logs
 */
export function maskToken(token: string): string {
  return token.length <= 8 ? '***' : `${token.slice(0, 6)}…`;
}

// ═══════════════════════════════════════════════════════════════════
// Identifier Utilities
// ═══════════════════════════════════════════════════════════════════

/**
 * Normalize email (lowercase, trim)
 */
export function normalizeEmail(email: string): string {
  return email.toLowerCase().trim();
}

// ═══════════════════════════════════════════════════════════════════
// Time Utilities
// ═══════════════════════════════════════════════════════════════════

/** Source of the current time; injected so expiry can be tested */
export interface Clock {
  now(): Date;
}

export const systemClock: Clock = {
  now: () => new Date(),
};

export function addMilliseconds(date: Date, ms: number): Date {
  return new Date(date.getTime() + ms);
}

/**
 * True once `lifetimeMs` has fully elapsed since `createdAt`.
 * The boundary itself counts as expired.
 */
export function hasExpired(createdAt: Date, lifetimeMs: number, now: Date): boolean {
  return now.getTime() - createdAt.getTime() >= lifetimeMs;
}
