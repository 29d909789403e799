/**
 * Shared fixtures for the auth-service tests
 */

import { AccessEngine } from 'access-engine';
import type { Clock } from 'core-service';
import {
  AccountStore,
  ActivationManager,
  SessionManager,
  createInMemoryRepositories,
  type ActivationNotifier,
  type AuthRepositories,
  type PasswordHasher,
  type SessionPolicy,
  type User,
} from '../src/index.js';

export const HOUR = 60 * 60 * 1000;

export const START = Date.UTC(2024, 0, 1, 12, 0, 0);

/** Reversible stand-in for bcrypt; keeps the tests fast */
export const fakeHasher: PasswordHasher = {
  hash: async password => `hashed:${password}`,
  verify: async (password, hash) => hash === `hashed:${password}`,
};

/** A clock that only moves when told to */
export class ManualClock implements Clock {
  private current: number;

  constructor(start: number) {
    this.current = start;
  }

  now(): Date {
    return new Date(this.current);
  }

  advance(ms: number): void {
    this.current += ms;
  }
}

export class RecordingNotifier implements ActivationNotifier {
  sent: Array<{ userId: string; email: string; token: string }> = [];

  async sendActivation(user: User, token: string): Promise<void> {
    this.sent.push({ userId: user.id, email: user.email, token });
  }

  lastTokenFor(email: string): string {
    const entry = [...this.sent].reverse().find(sent => sent.email === email);
    if (!entry) {
      throw new Error(`No activation sent to ${email}`);
    }
    return entry.token;
  }
}

export interface Fixture {
  clock: ManualClock;
  repositories: AuthRepositories;
  engine: AccessEngine;
  accounts: AccountStore;
  activations: ActivationManager;
  sessions: SessionManager;
  notifier: RecordingNotifier;
}

/**
 * Components over in-memory storage with roles anonymous <- standard
 */
export async function createFixture(policy: Partial<SessionPolicy> = {}): Promise<Fixture> {
  const clock = new ManualClock(START);
  const repositories = createInMemoryRepositories();
  const engine = new AccessEngine({
    roleRepository: repositories.roles,
    permissionRepository: repositories.permissions,
  });
  await engine.addRole('anonymous');
  await engine.addRole('standard', 'anonymous');

  const notifier = new RecordingNotifier();
  const accounts: AccountStore = new AccountStore(repositories.users, {
    roles: engine.roles,
    clock,
    onRegistered: async user => {
      await activations.issue(user.id);
    },
  });
  const activations = new ActivationManager(
    repositories.activations,
    accounts,
    { activationWindowMs: 24 * HOUR },
    { notifier, clock }
  );
  const sessions = new SessionManager(
    repositories.logins,
    accounts,
    fakeHasher,
    { sessionLifetimeMs: 2 * HOUR, maxLoginAttempts: 3, sessionRefreshMs: 0, ...policy },
    { clock }
  );

  return { clock, repositories, engine, accounts, activations, sessions, notifier };
}

/**
 * Register and activate a user; resolves its id
 */
export async function registerActiveUser(fixture: Fixture, email: string, password: string): Promise<string> {
  const userId = await fixture.accounts.register(email, await fakeHasher.hash(password), 'standard');
  await fixture.activations.redeem(fixture.notifier.lastTokenFor(email.trim().toLowerCase()));
  return userId;
}
