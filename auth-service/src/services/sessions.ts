/**
 * Session Manager
 *
 * Per-user state machine: NoSession -> Active (login) -> NoSession (logout or
 * expiry). Failed credential checks while no session is open count towards
 * the lockout threshold; once it is reached every login is refused until an
 * administrative reset.
 *
 * Sessions expire a fixed time after issue. With a refresh window configured
 * a session close to expiry is rotated to a new token on refresh. A session
 * only stays valid while its account is active.
 */

import {
  AuthError,
  KeyedMutex,
  LockedError,
  NotFoundError,
  addMilliseconds,
  getErrorMessage,
  hasExpired,
  logger as defaultLogger,
  maskToken,
  systemClock,
  type Clock,
  type Logger,
} from 'core-service';
import { generateSessionToken } from '../utils.js';
import type { AccountStore } from './accounts.js';
import type {
  ComponentOptions,
  Login,
  LoginRepository,
  PasswordHasher,
  SessionPolicy,
  TokenGenerator,
  User,
  UserLookup,
} from '../types.js';

export interface SessionManagerOptions extends ComponentOptions {
  generateToken?: TokenGenerator;
}

const INVALID_CREDENTIALS = 'Invalid email or password';
const INVALID_SESSION = 'Session is invalid or has expired';
const DUMMY_PASSWORD = 'not-a-real-password';

export class SessionManager {
  private mutex = new KeyedMutex();
  private generateToken: TokenGenerator;
  private clock: Clock;
  private log: Logger;
  private dummyHash: Promise<string> | null = null;

  constructor(
    private logins: LoginRepository,
    private accounts: AccountStore,
    private hasher: PasswordHasher,
    private policy: SessionPolicy,
    options: SessionManagerOptions = {}
  ) {
    this.generateToken = options.generateToken ?? generateSessionToken;
    this.clock = options.clock ?? systemClock;
    this.log = options.logger ?? defaultLogger;
    // Hash up front so the first unknown-email login costs the same as any other
    void this.getDummyHash();
  }

  // ═══════════════════════════════════════════════════════════════════
  // Authentication
  // ═══════════════════════════════════════════════════════════════════

  /**
   * Check credentials and open a session. Unknown e-mail and wrong password
   * fail identically.
   */
  async login(email: string, password: string): Promise<string> {
    const user = await this.findUser({ email });
    if (!user) {
      // Spend the same hashing time as a real check
      await this.hasher.verify(password, await this.getDummyHash());
      this.log.info('Login failed', { reason: 'unknown-user' });
      throw new AuthError(INVALID_CREDENTIALS);
    }

    return this.mutex.runExclusive(user.id, async () => {
      const login = await this.logins.findByUserId(user.id);
      if (login && login.attempts >= this.policy.maxLoginAttempts) {
        this.log.warn('Login refused for locked account', { userId: user.id, attempts: login.attempts });
        throw new LockedError('Account is locked', { userId: user.id });
      }

      const now = this.clock.now();
      if (!(await this.hasher.verify(password, user.passwordHash))) {
        if (!this.isOpen(login, now)) {
          const attempts = await this.logins.incrementAttempts(user.id, now);
          this.log.info('Login failed', { userId: user.id, reason: 'wrong-password', attempts });
          if (attempts >= this.policy.maxLoginAttempts) {
            this.log.warn('Account locked after failed logins', { userId: user.id, attempts });
          }
        } else {
          this.log.info('Login failed', { userId: user.id, reason: 'wrong-password' });
        }
        throw new AuthError(INVALID_CREDENTIALS);
      }

      if (user.status !== 'active') {
        this.log.info('Login refused for inactive account', { userId: user.id, status: user.status });
        throw new AuthError('Account is not active', { status: user.status });
      }

      const sessionToken = this.generateToken();
      await this.logins.save({ userId: user.id, sessionToken, attempts: 0, createdAt: now });
      this.log.info('Login succeeded', { userId: user.id, session: maskToken(sessionToken) });
      return sessionToken;
    });
  }

  /**
   * Resolve the user owning a live session
   */
  async validate(sessionToken: string): Promise<string> {
    const login = await this.findLive(sessionToken);
    return login.userId;
  }

  /**
   * Validate, rotating the token when it is inside the refresh window
   */
  async refresh(sessionToken: string): Promise<{ userId: string; sessionToken: string }> {
    const { userId } = await this.findLive(sessionToken);

    return this.mutex.runExclusive(userId, async () => {
      const login = await this.logins.findByUserId(userId);
      const now = this.clock.now();
      if (!login || login.sessionToken !== sessionToken || !this.isOpen(login, now)) {
        throw new AuthError(INVALID_SESSION);
      }

      const remaining = this.policy.sessionLifetimeMs - (now.getTime() - login.createdAt.getTime());
      if (this.policy.sessionRefreshMs <= 0 || remaining > this.policy.sessionRefreshMs) {
        return { userId, sessionToken };
      }

      const rotated = this.generateToken();
      await this.logins.save({ ...login, sessionToken: rotated, createdAt: now });
      this.log.info('Session rotated', { userId, session: maskToken(rotated) });
      return { userId, sessionToken: rotated };
    });
  }

  /**
   * Close the user's session. Idempotent.
   */
  async logout(userId: string): Promise<void> {
    await this.mutex.runExclusive(userId, async () => {
      await this.logins.clearSession(userId);
    });
    this.log.info('Logged out', { userId });
  }

  // ═══════════════════════════════════════════════════════════════════
  // Administration
  // ═══════════════════════════════════════════════════════════════════

  /**
   * Clear the failed-attempt counter (unlocks the account)
   */
  async resetAttempts(userId: string): Promise<void> {
    await this.accounts.find({ userId });
    await this.mutex.runExclusive(userId, async () => {
      await this.logins.resetAttempts(userId);
    });
    this.log.info('Login attempts reset', { userId });
  }

  async attemptsOf(userId: string): Promise<number> {
    const login = await this.logins.findByUserId(userId);
    return login?.attempts ?? 0;
  }

  /**
   * Clear every expired session token; resolves how many were cleared
   */
  async sweepExpired(): Promise<number> {
    const cutoff = addMilliseconds(this.clock.now(), -this.policy.sessionLifetimeMs);
    const cleared = await this.logins.clearSessionsCreatedBefore(cutoff);
    if (cleared > 0) {
      this.log.info('Expired sessions cleared', { cleared });
    }
    return cleared;
  }

  // ═══════════════════════════════════════════════════════════════════
  // Internals
  // ═══════════════════════════════════════════════════════════════════

  private async findUser(lookup: UserLookup): Promise<User | null> {
    try {
      return await this.accounts.find(lookup);
    } catch (error) {
      if (error instanceof NotFoundError) return null;
      throw error;
    }
  }

  private isOpen(login: Login | null, now: Date): boolean {
    return login !== null
      && login.sessionToken !== null
      && !hasExpired(login.createdAt, this.policy.sessionLifetimeMs, now);
  }

  /**
   * Look up a session that has not expired. An expired one is cleared.
   */
  private async findLive(sessionToken: string): Promise<Login> {
    if (!sessionToken) {
      throw new AuthError(INVALID_SESSION);
    }
    const login = await this.logins.findBySessionToken(sessionToken);
    if (!login) {
      throw new AuthError(INVALID_SESSION);
    }

    if (!this.isOpen(login, this.clock.now())) {
      await this.closeSession(login.userId, sessionToken);
      this.log.info('Session expired', { userId: login.userId });
      throw new AuthError(INVALID_SESSION);
    }

    const user = await this.findUser({ userId: login.userId });
    if (!user || user.status !== 'active') {
      await this.closeSession(login.userId, sessionToken);
      this.log.info('Session closed for inactive account', { userId: login.userId, status: user?.status });
      throw new AuthError(INVALID_SESSION);
    }
    return login;
  }

  /** Clear the user's session if it still holds `sessionToken` */
  private async closeSession(userId: string, sessionToken: string): Promise<void> {
    await this.mutex.runExclusive(userId, async () => {
      const current = await this.logins.findByUserId(userId);
      if (current?.sessionToken === sessionToken) {
        await this.logins.clearSession(userId);
      }
    });
  }

  private getDummyHash(): Promise<string> {
    if (!this.dummyHash) {
      const pending = this.hasher.hash(DUMMY_PASSWORD);
      this.dummyHash = pending;
      void pending.catch(error => {
        // Drop the failed hash so the next unknown-email login tries again
        if (this.dummyHash === pending) {
          this.dummyHash = null;
        }
        this.log.warn('Dummy password hash failed', { error: getErrorMessage(error) });
      });
    }
    return this.dummyHash;
  }
}
