/**
 * Activation Manager
 *
 * Issues and redeems one-time activation tokens. An expired token is kept
 * until it is cleared, re-issued or swept so that redeeming it keeps
 * reporting "expired" rather than "unknown"; only the expired case offers a
 * resend.
 */

import {
  AuthError,
  DuplicateError,
  ExpiredError,
  KeyedMutex,
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
  Activation,
  ActivationNotifier,
  ActivationPolicy,
  ActivationRepository,
  ComponentOptions,
  TokenGenerator,
  User,
} from '../types.js';

export interface ActivationManagerOptions extends ComponentOptions {
  notifier?: ActivationNotifier;
  generateToken?: TokenGenerator;
}

export class ActivationManager {
  private mutex = new KeyedMutex();
  private notifier: ActivationNotifier | undefined;
  private generateToken: TokenGenerator;
  private clock: Clock;
  private log: Logger;

  constructor(
    private activations: ActivationRepository,
    private accounts: AccountStore,
    private policy: ActivationPolicy,
    options: ActivationManagerOptions = {}
  ) {
    this.notifier = options.notifier;
    this.generateToken = options.generateToken ?? generateSessionToken;
    this.clock = options.clock ?? systemClock;
    this.log = options.logger ?? defaultLogger;
  }

  /**
   * Create the user's activation token. Fails if one is already pending.
   */
  async issue(userId: string): Promise<string> {
    const user = await this.accounts.find({ userId });
    return this.mutex.runExclusive(userId, () => this.issueFor(user));
  }

  /**
   * Activate the user owning `token` and consume the token
   */
  async redeem(token: string): Promise<string> {
    const found = await this.activations.findByToken(token);
    if (!found) {
      throw new NotFoundError('Activation link not valid');
    }
    const userId = found.userId;

    return this.mutex.runExclusive(userId, async () => {
      // Re-read under the lock; a concurrent redeem or reissue may have won
      const activation = await this.activations.findByUserId(userId);
      if (!activation || activation.token !== token) {
        throw new NotFoundError('Activation link not valid');
      }

      if (this.isExpired(activation)) {
        this.log.info('Expired activation redeemed', { userId });
        throw new ExpiredError('Activation link expired', { userId });
      }

      let user: User;
      try {
        user = await this.accounts.find({ userId });
      } catch (error) {
        if (error instanceof NotFoundError) {
          // Orphaned activation: its user is gone
          await this.activations.deleteByUserId(userId);
        }
        throw error;
      }

      // A suspended account must not lift its suspension through a pending link
      if (user.status !== 'inactive') {
        this.log.warn('Activation refused', { userId, status: user.status });
        throw new AuthError('Account does not need activation', { userId, status: user.status });
      }

      await this.accounts.setStatus(userId, 'active');
      await this.activations.deleteByUserId(userId);

      this.log.info('User activated', { userId });
      return userId;
    });
  }

  /**
   * Remove any pending activation of the user. Idempotent.
   */
  async clear(userId: string): Promise<void> {
    await this.mutex.runExclusive(userId, async () => {
      await this.activations.deleteByUserId(userId);
    });
  }

  /**
   * Replace the pending activation of an inactive user with a fresh one
   */
  async reissue(userId: string): Promise<string> {
    return this.mutex.runExclusive(userId, async () => {
      const user = await this.accounts.find({ userId });
      if (user.status !== 'inactive') {
        throw new AuthError('Account does not need activation', { userId });
      }
      await this.activations.deleteByUserId(userId);
      return this.issueFor(user);
    });
  }

  /**
   * Delete expired activations; resolves how many were removed
   */
  async sweepExpired(): Promise<number> {
    const cutoff = addMilliseconds(this.clock.now(), -this.policy.activationWindowMs);
    const removed = await this.activations.deleteCreatedBefore(cutoff);
    if (removed > 0) {
      this.log.info('Expired activations removed', { removed });
    }
    return removed;
  }

  private isExpired(activation: Activation): boolean {
    return hasExpired(activation.createdAt, this.policy.activationWindowMs, this.clock.now());
  }

  private async issueFor(user: User): Promise<string> {
    if (await this.activations.findByUserId(user.id)) {
      throw new DuplicateError('Activation already pending', { userId: user.id });
    }

    const activation: Activation = {
      userId: user.id,
      token: this.generateToken(),
      createdAt: this.clock.now(),
    };
    await this.activations.insert(activation);
    this.log.info('Activation issued', { userId: user.id, token: maskToken(activation.token) });

    await this.notify(user, activation.token);
    return activation.token;
  }

  private async notify(user: User, token: string): Promise<void> {
    if (!this.notifier) return;
    try {
      await this.notifier.sendActivation(user, token);
    } catch (error) {
      // The token stays valid; the user can ask for a resend
      this.log.error('Failed to send activation', { userId: user.id, error: getErrorMessage(error) });
    }
  }
}
