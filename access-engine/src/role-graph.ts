/**
 * access-engine - Role Graph
 *
 * Arena-style role forest: role id -> node, parent links are ids, so every
 * ancestry walk is a chain of map lookups. The graph is the only writer of
 * inheritance edges and refuses any edge that would close a cycle.
 *
 * Concurrency: mutations hold the write side of a reader/writer lock, walks
 * the read side, so a walk never observes a half-applied insert.
 */

import {
  CycleError,
  DuplicateError,
  NotFoundError,
  RwLock,
  logger as defaultLogger,
  type Logger,
} from 'core-service';
import { PermissionSetCache } from './cache.js';
import type { PermissionSource, RoleGraphOptions, RoleRecord, RoleRepository } from './types.js';

interface RoleNode {
  readonly id: string;
  readonly parentId: string | null;
}

export class RoleGraph {
  private nodes = new Map<string, RoleNode>();
  private lock = new RwLock();
  private permissions: PermissionSource | undefined;
  private maxDepth: number;
  private cache: PermissionSetCache | null;
  private log: Logger;

  constructor(private repository: RoleRepository, options: RoleGraphOptions = {}) {
    this.permissions = options.permissions;
    this.maxDepth = options.maxDepth ?? Number.POSITIVE_INFINITY;
    this.cache = options.cache ? new PermissionSetCache(options.maxCacheSize ?? 1000) : null;
    this.log = options.logger ?? defaultLogger;
    this.permissions?.onChange?.(() => this.invalidate());
  }

  // ═══════════════════════════════════════════════════════════════════
  // Mutations
  // ═══════════════════════════════════════════════════════════════════

  /**
   * Replace the arena with every persisted role. Rows are loaded as stored;
   * a stored cycle is only caught later by the walk bound.
   */
  async hydrate(): Promise<number> {
    const rows = await this.repository.findAll();
    return this.lock.write(() => {
      const nodes = new Map<string, RoleNode>();
      for (const row of rows) {
        if (nodes.has(row.id)) {
          throw new DuplicateError(`Role ${row.id} is stored twice`, { roleId: row.id });
        }
        nodes.set(row.id, { id: row.id, parentId: row.parentId });
      }
      for (const node of nodes.values()) {
        if (node.parentId !== null && !nodes.has(node.parentId)) {
          throw new NotFoundError(`Parent role ${node.parentId} of ${node.id} does not exist`, {
            roleId: node.id,
            parentId: node.parentId,
          });
        }
      }
      this.nodes = nodes;
      this.invalidate();
      this.log.info('Role graph loaded', { roles: nodes.size });
      return nodes.size;
    });
  }

  /**
   * Add a role, optionally under `parentId`.
   *
   * A new role has no descendants yet, so the edge closes a cycle only when
   * `roleId` already sits on the parent's ancestry chain (which includes the
   * parent itself).
   */
  async addRole(roleId: string, parentId: string | null = null): Promise<RoleRecord> {
    return this.lock.write(async () => {
      if (parentId !== null && this.reaches(parentId, roleId)) {
        throw new CycleError(`Role ${roleId} cannot inherit from its own descendant ${parentId}`, { roleId, parentId });
      }
      if (this.nodes.has(roleId)) {
        throw new DuplicateError(`Role ${roleId} already exists`, { roleId });
      }
      if (parentId !== null && !this.nodes.has(parentId)) {
        throw new NotFoundError(`Parent role ${parentId} does not exist`, { roleId, parentId });
      }

      const record: RoleRecord = { id: roleId, parentId };
      await this.repository.insert(record);
      this.nodes.set(roleId, { id: roleId, parentId });
      this.invalidate();

      this.log.info('Role added', { roleId, parentId });
      return { ...record };
    });
  }

  // ═══════════════════════════════════════════════════════════════════
  // Queries
  // ═══════════════════════════════════════════════════════════════════

  async hasRole(roleId: string): Promise<boolean> {
    return this.lock.read(() => this.nodes.has(roleId));
  }

  async getRole(roleId: string): Promise<RoleRecord> {
    return this.lock.read(() => {
      const node = this.nodes.get(roleId);
      if (!node) {
        throw new NotFoundError(`Role ${roleId} does not exist`, { roleId });
      }
      return { id: node.id, parentId: node.parentId };
    });
  }

  async listRoles(): Promise<RoleRecord[]> {
    return this.lock.read(() =>
      Array.from(this.nodes.values(), node => ({ id: node.id, parentId: node.parentId }))
    );
  }

  /**
   * The role itself followed by each ancestor up to its root
   */
  async effectiveRoles(roleId: string): Promise<string[]> {
    return this.lock.read(() => this.walk(roleId));
  }

  /**
   * Union of the objects granted to the role and all of its ancestors
   */
  async effectivePermissions(roleId: string): Promise<ReadonlySet<string>> {
    const permissions = this.requirePermissions();
    const cached = this.cache?.get(roleId);
    if (cached) return cached;

    return this.lock.read(async () => {
      const generation = this.cache?.snapshot() ?? 0;
      const objects = new Set<string>();
      for (const id of this.walk(roleId)) {
        for (const objectId of await permissions.permissionsOf(id)) {
          objects.add(objectId);
        }
      }
      this.cache?.store(roleId, objects, generation);
      return objects;
    });
  }

  async hasPermission(roleId: string, objectId: string): Promise<boolean> {
    const objects = await this.effectivePermissions(roleId);
    return objects.has(objectId);
  }

  /**
   * First role on the chain (nearest first) that directly holds `objectId`
   */
  async grantingRole(roleId: string, objectId: string): Promise<string | null> {
    const permissions = this.requirePermissions();
    return this.lock.read(async () => {
      for (const id of this.walk(roleId)) {
        const objects = await permissions.permissionsOf(id);
        if (objects.has(objectId)) return id;
      }
      return null;
    });
  }

  get size(): number {
    return this.nodes.size;
  }

  // ═══════════════════════════════════════════════════════════════════
  // Internals
  // ═══════════════════════════════════════════════════════════════════

  /** Drop every cached permission set */
  invalidate(): void {
    this.cache?.invalidate();
  }

  private requirePermissions(): PermissionSource {
    if (!this.permissions) {
      throw new Error('RoleGraph was created without a permission source');
    }
    return this.permissions;
  }

  /**
   * Whether walking up from `from` meets `target`. Bounded by the arena
   * size; an existing cycle counts as reaching.
   */
  private reaches(from: string, target: string): boolean {
    let current: string | null = from;
    for (let steps = 0; current !== null; steps++) {
      if (current === target || steps > this.nodes.size) return true;
      current = this.nodes.get(current)?.parentId ?? null;
    }
    return false;
  }

  private walk(roleId: string): string[] {
    let node = this.nodes.get(roleId);
    if (!node) {
      throw new NotFoundError(`Role ${roleId} does not exist`, { roleId });
    }

    const limit = Math.min(this.maxDepth, this.nodes.size);
    const chain: string[] = [];
    const seen = new Set<string>();

    while (node) {
      if (seen.has(node.id) || chain.length >= limit) {
        const reason = seen.has(node.id) ? 'cycle' : 'max-depth';
        this.log.critical('Role inheritance walk aborted', { roleId, at: node.id, reason, chain });
        throw new CycleError(`Role inheritance of ${roleId} is cyclic or deeper than ${limit}`, {
          roleId,
          at: node.id,
          reason,
        });
      }
      seen.add(node.id);
      chain.push(node.id);

      if (node.parentId === null) break;
      const parent = this.nodes.get(node.parentId);
      if (!parent) {
        throw new NotFoundError(`Parent role ${node.parentId} of ${node.id} does not exist`, {
          roleId: node.id,
          parentId: node.parentId,
        });
      }
      node = parent;
    }

    return chain;
  }
}
