/**
 * access-engine - In-memory repositories
 *
 * Map-backed role and permission storage for tests, tooling and deployments
 * without a database. Records are copied in and out so callers cannot
 * mutate stored state.
 */

import { DuplicateError } from 'core-service';
import type { PermissionRecord, PermissionRepository, RoleRecord, RoleRepository } from './types.js';

export class InMemoryRoleRepository implements RoleRepository {
  private rows = new Map<string, RoleRecord>();

  constructor(seed: RoleRecord[] = []) {
    for (const role of seed) {
      this.rows.set(role.id, { ...role });
    }
  }

  async findAll(): Promise<RoleRecord[]> {
    return Array.from(this.rows.values(), role => ({ ...role }));
  }

  async insert(role: RoleRecord): Promise<void> {
    if (this.rows.has(role.id)) {
      throw new DuplicateError(`Role ${role.id} already exists`, { roleId: role.id });
    }
    this.rows.set(role.id, { ...role });
  }
}

export class InMemoryPermissionRepository implements PermissionRepository {
  private rows = new Map<string, PermissionRecord>();

  constructor(seed: PermissionRecord[] = []) {
    for (const permission of seed) {
      this.rows.set(permission.id, { ...permission });
    }
  }

  async findAll(): Promise<PermissionRecord[]> {
    return Array.from(this.rows.values(), permission => ({ ...permission }));
  }

  async insert(permission: PermissionRecord): Promise<void> {
    if (this.rows.has(permission.id)) {
      throw new DuplicateError(`Permission ${permission.id} already exists`, { permissionId: permission.id });
    }
    this.rows.set(permission.id, { ...permission });
  }

  async deleteById(permissionId: string): Promise<boolean> {
    return this.rows.delete(permissionId);
  }
}
