/**
 * access-engine - Permission Store
 *
 * Owns permission records and indexes them by id, by owning role and by
 * object. Lookups are direct grants only; inheritance is the role graph's
 * business. Writes go through to the repository first, then to the indexes,
 * and are serialised per permission id.
 */

import {
  DuplicateError,
  KeyedMutex,
  NotFoundError,
  logger as defaultLogger,
  type Logger,
} from 'core-service';
import type {
  PermissionChange,
  PermissionChangeListener,
  PermissionRecord,
  PermissionRepository,
  PermissionSource,
  PermissionStoreOptions,
  RoleLookup,
} from './types.js';

const EMPTY: ReadonlySet<string> = new Set();

export class PermissionStore implements PermissionSource {
  private byId = new Map<string, PermissionRecord>();
  /** roleId -> objectId -> permission ids granting it */
  private byRole = new Map<string, Map<string, Set<string>>>();
  /** objectId -> roleId -> permission ids granting it */
  private byObject = new Map<string, Map<string, Set<string>>>();
  private mutex = new KeyedMutex();
  private listeners = new Set<PermissionChangeListener>();
  private log: Logger;

  constructor(
    private repository: PermissionRepository,
    private roles: RoleLookup,
    options: PermissionStoreOptions = {}
  ) {
    this.log = options.logger ?? defaultLogger;
  }

  /**
   * Load every persisted permission. Each must name an existing role.
   */
  async hydrate(): Promise<number> {
    const rows = await this.repository.findAll();
    for (const row of rows) {
      if (!(await this.roles.hasRole(row.roleId))) {
        throw new NotFoundError(`Role ${row.roleId} of permission ${row.id} does not exist`, {
          permissionId: row.id,
          roleId: row.roleId,
        });
      }
    }

    this.byId.clear();
    this.byRole.clear();
    this.byObject.clear();
    for (const row of rows) {
      this.index({ ...row });
    }
    this.emit({ type: 'reload', count: this.byId.size });
    this.log.info('Permissions loaded', { permissions: this.byId.size });
    return this.byId.size;
  }

  async grant(permissionId: string, roleId: string, objectId: string): Promise<PermissionRecord> {
    return this.mutex.runExclusive(permissionId, async () => {
      if (this.byId.has(permissionId)) {
        throw new DuplicateError(`Permission ${permissionId} already exists`, { permissionId });
      }
      if (!(await this.roles.hasRole(roleId))) {
        throw new NotFoundError(`Role ${roleId} does not exist`, { permissionId, roleId });
      }

      const record: PermissionRecord = { id: permissionId, roleId, objectId };
      await this.repository.insert(record);
      this.index(record);

      this.log.info('Permission granted', { permissionId, roleId, objectId });
      this.emit({ type: 'grant', permission: { ...record } });
      return { ...record };
    });
  }

  async revoke(permissionId: string): Promise<PermissionRecord> {
    return this.mutex.runExclusive(permissionId, async () => {
      const record = this.byId.get(permissionId);
      if (!record) {
        throw new NotFoundError(`Permission ${permissionId} does not exist`, { permissionId });
      }

      await this.repository.deleteById(permissionId);
      this.unindex(record);

      this.log.info('Permission revoked', { permissionId, roleId: record.roleId, objectId: record.objectId });
      this.emit({ type: 'revoke', permission: { ...record } });
      return { ...record };
    });
  }

  /**
   * Objects granted directly to exactly this role
   */
  async permissionsOf(roleId: string): Promise<ReadonlySet<string>> {
    const objects = this.byRole.get(roleId);
    return objects ? new Set(objects.keys()) : EMPTY;
  }

  /**
   * Roles holding a direct grant of `objectId`
   */
  async rolesGranting(objectId: string): Promise<ReadonlySet<string>> {
    const roles = this.byObject.get(objectId);
    return roles ? new Set(roles.keys()) : EMPTY;
  }

  async get(permissionId: string): Promise<PermissionRecord> {
    const record = this.byId.get(permissionId);
    if (!record) {
      throw new NotFoundError(`Permission ${permissionId} does not exist`, { permissionId });
    }
    return { ...record };
  }

  async list(): Promise<PermissionRecord[]> {
    return Array.from(this.byId.values(), record => ({ ...record }));
  }

  onChange(listener: PermissionChangeListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  // ═══════════════════════════════════════════════════════════════════
  // Index maintenance
  // ═══════════════════════════════════════════════════════════════════

  private index(record: PermissionRecord): void {
    this.byId.set(record.id, record);
    addToIndex(this.byRole, record.roleId, record.objectId, record.id);
    addToIndex(this.byObject, record.objectId, record.roleId, record.id);
  }

  private unindex(record: PermissionRecord): void {
    this.byId.delete(record.id);
    removeFromIndex(this.byRole, record.roleId, record.objectId, record.id);
    removeFromIndex(this.byObject, record.objectId, record.roleId, record.id);
  }

  private emit(change: PermissionChange): void {
    for (const listener of this.listeners) {
      listener(change);
    }
  }
}

function addToIndex(index: Map<string, Map<string, Set<string>>>, outer: string, inner: string, id: string): void {
  let level = index.get(outer);
  if (!level) {
    level = new Map();
    index.set(outer, level);
  }
  let ids = level.get(inner);
  if (!ids) {
    ids = new Set();
    level.set(inner, ids);
  }
  ids.add(id);
}

function removeFromIndex(index: Map<string, Map<string, Set<string>>>, outer: string, inner: string, id: string): void {
  const level = index.get(outer);
  const ids = level?.get(inner);
  if (!level || !ids) return;
  ids.delete(id);
  if (ids.size === 0) level.delete(inner);
  if (level.size === 0) index.delete(outer);
}
