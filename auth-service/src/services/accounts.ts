/**
 * Account Store
 *
 * Owns user identity, status and role assignment. Registration hands the new
 * user to the `onRegistered` hook (activation issuance); the hook is part of
 * the registration, so its failure removes the user again.
 */

import { randomUUID } from 'node:crypto';
import type { RoleLookup } from 'access-engine';
import {
  DuplicateError,
  KeyedMutex,
  NotFoundError,
  getErrorMessage,
  logger as defaultLogger,
  normalizeEmail,
  systemClock,
  type Clock,
  type Logger,
} from 'core-service';
import type { AccountStoreOptions, User, UserLookup, UserRepository, UserStatus } from '../types.js';

export class AccountStore {
  private mutex = new KeyedMutex();
  private roles: RoleLookup;
  private onRegistered: (user: User) => Promise<void>;
  private generateId: () => string;
  private clock: Clock;
  private log: Logger;

  constructor(private users: UserRepository, options: AccountStoreOptions) {
    this.roles = options.roles;
    this.onRegistered = options.onRegistered ?? (async () => undefined);
    this.generateId = options.generateId ?? randomUUID;
    this.clock = options.clock ?? systemClock;
    this.log = options.logger ?? defaultLogger;
  }

  /**
   * Create an inactive user and resolve its id
   */
  async register(email: string, passwordHash: string, roleId: string): Promise<string> {
    const normalizedEmail = normalizeEmail(email);

    return this.mutex.runExclusive(`email:${normalizedEmail}`, async () => {
      if (await this.users.findByEmail(normalizedEmail)) {
        throw new DuplicateError('Email already registered', { email: normalizedEmail });
      }
      if (!(await this.roles.hasRole(roleId))) {
        throw new NotFoundError(`Role ${roleId} does not exist`, { roleId });
      }

      const now = this.clock.now();
      const user: User = {
        id: this.generateId(),
        email: normalizedEmail,
        passwordHash,
        status: 'inactive',
        roleId,
        createdAt: now,
        updatedAt: now,
      };
      await this.users.insert(user);

      try {
        await this.onRegistered({ ...user });
      } catch (error) {
        this.log.warn('Registration rolled back', { userId: user.id, error: getErrorMessage(error) });
        await this.users.deleteById(user.id);
        throw error;
      }

      this.log.info('User registered', { userId: user.id, roleId });
      return user.id;
    });
  }

  async find(lookup: UserLookup): Promise<User> {
    const user = 'userId' in lookup
      ? await this.users.findById(lookup.userId)
      : await this.users.findByEmail(normalizeEmail(lookup.email));

    if (!user) {
      throw new NotFoundError('User not found', 'userId' in lookup ? { userId: lookup.userId } : {});
    }
    return user;
  }

  async setStatus(userId: string, status: UserStatus): Promise<User> {
    return this.mutex.runExclusive(`user:${userId}`, async () => {
      const user = await this.users.updateStatus(userId, status, this.clock.now());
      if (!user) {
        throw new NotFoundError('User not found', { userId });
      }
      this.log.info('User status changed', { userId, status });
      return user;
    });
  }

  async setRole(userId: string, roleId: string): Promise<User> {
    return this.mutex.runExclusive(`user:${userId}`, async () => {
      if (!(await this.roles.hasRole(roleId))) {
        throw new NotFoundError(`Role ${roleId} does not exist`, { roleId });
      }
      const user = await this.users.updateRole(userId, roleId, this.clock.now());
      if (!user) {
        throw new NotFoundError('User not found', { userId });
      }
      this.log.info('User role changed', { userId, roleId });
      return user;
    });
  }
}
