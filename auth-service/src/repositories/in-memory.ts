/**
 * In-memory repositories
 *
 * Map-backed implementations of the auth repositories. Every record is
 * copied on the way in and out, and each method completes in one
 * synchronous step, which makes the read-modify-write ones atomic.
 */

import { DuplicateError } from 'core-service';
import type {
  Activation,
  ActivationRepository,
  Login,
  LoginRepository,
  User,
  UserRepository,
  UserStatus,
} from '../types.js';

function copyUser(user: User): User {
  return { ...user, createdAt: new Date(user.createdAt), updatedAt: new Date(user.updatedAt) };
}

function copyActivation(activation: Activation): Activation {
  return { ...activation, createdAt: new Date(activation.createdAt) };
}

function copyLogin(login: Login): Login {
  return { ...login, createdAt: new Date(login.createdAt) };
}

// ═══════════════════════════════════════════════════════════════════
// Users
// ═══════════════════════════════════════════════════════════════════

export class InMemoryUserRepository implements UserRepository {
  private rows = new Map<string, User>();

  async findById(userId: string): Promise<User | null> {
    const user = this.rows.get(userId);
    return user ? copyUser(user) : null;
  }

  async findByEmail(email: string): Promise<User | null> {
    for (const user of this.rows.values()) {
      if (user.email === email) return copyUser(user);
    }
    return null;
  }

  async insert(user: User): Promise<void> {
    if (this.rows.has(user.id)) {
      throw new DuplicateError(`User ${user.id} already exists`, { userId: user.id });
    }
    for (const existing of this.rows.values()) {
      if (existing.email === user.email) {
        throw new DuplicateError('Email already registered', { email: user.email });
      }
    }
    this.rows.set(user.id, copyUser(user));
  }

  async updateStatus(userId: string, status: UserStatus, updatedAt: Date): Promise<User | null> {
    return this.update(userId, { status, updatedAt });
  }

  async updateRole(userId: string, roleId: string, updatedAt: Date): Promise<User | null> {
    return this.update(userId, { roleId, updatedAt });
  }

  async deleteById(userId: string): Promise<boolean> {
    return this.rows.delete(userId);
  }

  private update(userId: string, changes: Partial<Pick<User, 'status' | 'roleId' | 'updatedAt'>>): User | null {
    const user = this.rows.get(userId);
    if (!user) return null;
    const updated = { ...user, ...changes };
    this.rows.set(userId, updated);
    return copyUser(updated);
  }
}

// ═══════════════════════════════════════════════════════════════════
// Activations
// ═══════════════════════════════════════════════════════════════════

export class InMemoryActivationRepository implements ActivationRepository {
  private rows = new Map<string, Activation>();

  async findByUserId(userId: string): Promise<Activation | null> {
    const activation = this.rows.get(userId);
    return activation ? copyActivation(activation) : null;
  }

  async findByToken(token: string): Promise<Activation | null> {
    for (const activation of this.rows.values()) {
      if (activation.token === token) return copyActivation(activation);
    }
    return null;
  }

  async insert(activation: Activation): Promise<void> {
    if (this.rows.has(activation.userId)) {
      throw new DuplicateError('Activation already pending', { userId: activation.userId });
    }
    this.rows.set(activation.userId, copyActivation(activation));
  }

  async deleteByUserId(userId: string): Promise<boolean> {
    return this.rows.delete(userId);
  }

  async deleteCreatedBefore(cutoff: Date): Promise<number> {
    let removed = 0;
    for (const [userId, activation] of this.rows) {
      if (activation.createdAt.getTime() <= cutoff.getTime()) {
        this.rows.delete(userId);
        removed++;
      }
    }
    return removed;
  }
}

// ═══════════════════════════════════════════════════════════════════
// Logins
// ═══════════════════════════════════════════════════════════════════

export class InMemoryLoginRepository implements LoginRepository {
  private rows = new Map<string, Login>();

  async findByUserId(userId: string): Promise<Login | null> {
    const login = this.rows.get(userId);
    return login ? copyLogin(login) : null;
  }

  async findBySessionToken(sessionToken: string): Promise<Login | null> {
    for (const login of this.rows.values()) {
      if (login.sessionToken === sessionToken) return copyLogin(login);
    }
    return null;
  }

  async save(login: Login): Promise<void> {
    this.rows.set(login.userId, copyLogin(login));
  }

  async incrementAttempts(userId: string, at: Date): Promise<number> {
    const current = this.rows.get(userId);
    const attempts = (current?.attempts ?? 0) + 1;
    this.rows.set(userId, {
      userId,
      sessionToken: null,
      attempts,
      createdAt: new Date(at),
    });
    return attempts;
  }

  async resetAttempts(userId: string): Promise<void> {
    const current = this.rows.get(userId);
    if (current) {
      this.rows.set(userId, { ...current, attempts: 0 });
    }
  }

  async clearSession(userId: string): Promise<void> {
    const current = this.rows.get(userId);
    if (current) {
      this.rows.set(userId, { ...current, sessionToken: null });
    }
  }

  async clearSessionsCreatedBefore(cutoff: Date): Promise<number> {
    let cleared = 0;
    for (const [userId, login] of this.rows) {
      if (login.sessionToken !== null && login.createdAt.getTime() <= cutoff.getTime()) {
        this.rows.set(userId, { ...login, sessionToken: null });
        cleared++;
      }
    }
    return cleared;
  }
}
