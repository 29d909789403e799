/**
 * Access Engine - Test Suite
 *
 * Unit tests for the role graph, the permission store and the engine that
 * ties them together. Also serves as usage examples.
 */

import { afterEach, beforeAll, describe, expect, it, vi } from 'vitest';
import {
  CycleError,
  DuplicateError,
  NotFoundError,
  configureLogger,
  subscribeToLogs,
  type LogEntry,
} from 'core-service';
import {
  AccessEngine,
  InMemoryPermissionRepository,
  InMemoryRoleRepository,
  PermissionSetCache,
  PermissionStore,
  RoleGraph,
  createAccessEngine,
  type AuditEvent,
  type RoleRecord,
} from '../src/index.js';

beforeAll(() => {
  configureLogger({ output: false });
});

/** Deterministic PRNG so generated forests are reproducible */
function seededRandom(seed: number): () => number {
  let state = seed;
  return () => {
    state = (state * 1103515245 + 12345) % 2147483648;
    return state / 2147483648;
  };
}

async function buildForest(engine: AccessEngine, size: number, seed: number): Promise<Map<string, string | null>> {
  const random = seededRandom(seed);
  const parents = new Map<string, string | null>();
  for (let i = 0; i < size; i++) {
    const roleId = `role-${i}`;
    const existing = Array.from(parents.keys());
    const parentId = existing.length > 0 && random() < 0.8
      ? existing[Math.floor(random() * existing.length)]
      : null;
    await engine.addRole(roleId, parentId);
    parents.set(roleId, parentId);
  }
  return parents;
}

function ancestorsOf(parents: Map<string, string | null>, roleId: string): string[] {
  const chain = [roleId];
  let current = parents.get(roleId) ?? null;
  while (current !== null) {
    chain.push(current);
    current = parents.get(current) ?? null;
  }
  return chain;
}

// ═══════════════════════════════════════════════════════════════════
// ROLE GRAPH TESTS
// ═══════════════════════════════════════════════════════════════════

describe('RoleGraph', () => {
  describe('addRole', () => {
    it('should add root and child roles', async () => {
      const graph = new RoleGraph(new InMemoryRoleRepository());

      expect(await graph.addRole('admin')).toEqual({ id: 'admin', parentId: null });
      expect(await graph.addRole('editor', 'admin')).toEqual({ id: 'editor', parentId: 'admin' });
      expect(await graph.hasRole('editor')).toBe(true);
      expect(graph.size).toBe(2);
    });

    it('should write through to the repository', async () => {
      const repository = new InMemoryRoleRepository();
      const graph = new RoleGraph(repository);

      await graph.addRole('admin');
      await graph.addRole('editor', 'admin');

      expect(await repository.findAll()).toEqual([
        { id: 'admin', parentId: null },
        { id: 'editor', parentId: 'admin' },
      ]);
    });

    it('should reject a duplicate role', async () => {
      const graph = new RoleGraph(new InMemoryRoleRepository());
      await graph.addRole('admin');

      await expect(graph.addRole('admin')).rejects.toBeInstanceOf(DuplicateError);
    });

    it('should reject an unknown parent', async () => {
      const graph = new RoleGraph(new InMemoryRoleRepository());

      await expect(graph.addRole('editor', 'ghost')).rejects.toBeInstanceOf(NotFoundError);
      expect(await graph.hasRole('editor')).toBe(false);
    });

    it('should reject a role as its own parent', async () => {
      const graph = new RoleGraph(new InMemoryRoleRepository());

      await expect(graph.addRole('loop', 'loop')).rejects.toBeInstanceOf(CycleError);
    });

    it('should reject a parent that descends from the role', async () => {
      const graph = new RoleGraph(new InMemoryRoleRepository());
      await graph.addRole('root');
      await graph.addRole('child', 'root');
      await graph.addRole('grandchild', 'child');

      await expect(graph.addRole('root', 'grandchild')).rejects.toBeInstanceOf(CycleError);
      await expect(graph.addRole('child', 'child')).rejects.toBeInstanceOf(CycleError);
    });

    it('should leave storage untouched when an insert is rejected', async () => {
      const repository = new InMemoryRoleRepository();
      const graph = new RoleGraph(repository);
      await graph.addRole('root');

      await expect(graph.addRole('root', 'root')).rejects.toBeInstanceOf(CycleError);
      expect(await repository.findAll()).toEqual([{ id: 'root', parentId: null }]);
    });
  });

  describe('effectiveRoles', () => {
    it('should return the role followed by its ancestors', async () => {
      const graph = new RoleGraph(new InMemoryRoleRepository());
      await graph.addRole('root');
      await graph.addRole('a', 'root');
      await graph.addRole('b', 'a');
      await graph.addRole('c', 'b');

      expect(await graph.effectiveRoles('c')).toEqual(['c', 'b', 'a', 'root']);
      expect(await graph.effectiveRoles('root')).toEqual(['root']);
    });

    it('should keep separate trees apart', async () => {
      const graph = new RoleGraph(new InMemoryRoleRepository());
      await graph.addRole('staff');
      await graph.addRole('clerk', 'staff');
      await graph.addRole('guest');

      expect(await graph.effectiveRoles('clerk')).toEqual(['clerk', 'staff']);
      expect(await graph.effectiveRoles('guest')).toEqual(['guest']);
    });

    it('should fail for an unknown role', async () => {
      const graph = new RoleGraph(new InMemoryRoleRepository());

      await expect(graph.effectiveRoles('ghost')).rejects.toBeInstanceOf(NotFoundError);
    });

    it('should return exactly the role and its ancestors for generated forests', async () => {
      for (const seed of [1, 7, 42]) {
        const engine = new AccessEngine();
        const parents = await buildForest(engine, 30, seed);

        for (const roleId of parents.keys()) {
          const roles = await engine.roles.effectiveRoles(roleId);
          expect(roles).toEqual(ancestorsOf(parents, roleId));
          expect(new Set(roles).size).toBe(roles.length);
        }
      }
    });

    it('should enforce a configured maximum depth', async () => {
      const graph = new RoleGraph(new InMemoryRoleRepository(), { maxDepth: 2 });
      await graph.addRole('a');
      await graph.addRole('b', 'a');
      await graph.addRole('c', 'b');

      expect(await graph.effectiveRoles('b')).toEqual(['b', 'a']);
      await expect(graph.effectiveRoles('c')).rejects.toBeInstanceOf(CycleError);
    });
  });

  describe('stored cycles', () => {
    let unsubscribe: (() => void) | undefined;

    afterEach(() => {
      unsubscribe?.();
      unsubscribe = undefined;
    });

    it('should fail the walk and log a critical entry', async () => {
      const entries: LogEntry[] = [];
      unsubscribe = subscribeToLogs(entry => {
        entries.push(entry);
      });

      const repository = new InMemoryRoleRepository([
        { id: 'a', parentId: 'b' },
        { id: 'b', parentId: 'a' },
        { id: 'solo', parentId: null },
      ]);
      const graph = new RoleGraph(repository);
      expect(await graph.hydrate()).toBe(3);

      await expect(graph.effectiveRoles('a')).rejects.toBeInstanceOf(CycleError);
      // The rest of the graph stays usable
      expect(await graph.effectiveRoles('solo')).toEqual(['solo']);

      const critical = entries.filter(entry => entry.level === 'critical');
      expect(critical).toHaveLength(1);
      expect(critical[0].message).toBe('Role inheritance walk aborted');
      expect(critical[0].data).toMatchObject({ roleId: 'a', at: 'a', reason: 'cycle' });
    });
  });

  describe('hydrate', () => {
    it('should load persisted roles', async () => {
      const graph = new RoleGraph(new InMemoryRoleRepository([
        { id: 'admin', parentId: null },
        { id: 'editor', parentId: 'admin' },
      ]));

      expect(await graph.hydrate()).toBe(2);
      expect(await graph.effectiveRoles('editor')).toEqual(['editor', 'admin']);
      expect(await graph.getRole('editor')).toEqual({ id: 'editor', parentId: 'admin' });
      expect(await graph.listRoles()).toEqual([
        { id: 'admin', parentId: null },
        { id: 'editor', parentId: 'admin' },
      ]);
    });

    it('should reject a role whose parent is missing', async () => {
      const graph = new RoleGraph(new InMemoryRoleRepository([{ id: 'orphan', parentId: 'gone' }]));

      await expect(graph.hydrate()).rejects.toBeInstanceOf(NotFoundError);
      expect(graph.size).toBe(0);
    });
  });

  describe('concurrency', () => {
    it('should serialise inserts against walks', async () => {
      const graph = new RoleGraph(new InMemoryRoleRepository());
      await graph.addRole('r0');

      const operations: Promise<unknown>[] = [];
      for (let i = 1; i <= 20; i++) {
        operations.push(graph.addRole(`r${i}`, `r${i - 1}`));
        operations.push(graph.effectiveRoles(`r${i - 1}`));
      }
      await Promise.all(operations);

      const chain = await graph.effectiveRoles('r20');
      expect(chain).toHaveLength(21);
      expect(chain[0]).toBe('r20');
      expect(chain[20]).toBe('r0');
    });
  });

  it('should refuse permission checks without a permission source', async () => {
    const graph = new RoleGraph(new InMemoryRoleRepository());
    await graph.addRole('admin');

    await expect(graph.hasPermission('admin', '/reports')).rejects.toThrow('without a permission source');
  });
});

// ═══════════════════════════════════════════════════════════════════
// PERMISSION STORE TESTS
// ═══════════════════════════════════════════════════════════════════

describe('PermissionStore', () => {
  const knownRoles = new Set(['admin', 'editor']);
  const lookup = { hasRole: async (roleId: string) => knownRoles.has(roleId) };

  it('should grant and list direct permissions', async () => {
    const store = new PermissionStore(new InMemoryPermissionRepository(), lookup);

    await store.grant('p1', 'admin', '/reports');
    await store.grant('p2', 'admin', '/users');
    await store.grant('p3', 'editor', '/drafts');

    expect(await store.permissionsOf('admin')).toEqual(new Set(['/reports', '/users']));
    expect(await store.permissionsOf('editor')).toEqual(new Set(['/drafts']));
    expect(await store.permissionsOf('nobody')).toEqual(new Set());
  });

  it('should look up roles by object', async () => {
    const store = new PermissionStore(new InMemoryPermissionRepository(), lookup);
    await store.grant('p1', 'admin', '/reports');
    await store.grant('p2', 'editor', '/reports');

    expect(await store.rolesGranting('/reports')).toEqual(new Set(['admin', 'editor']));
    expect(await store.rolesGranting('/nothing')).toEqual(new Set());
  });

  it('should reject a duplicate permission id', async () => {
    const store = new PermissionStore(new InMemoryPermissionRepository(), lookup);
    await store.grant('p1', 'admin', '/reports');

    await expect(store.grant('p1', 'editor', '/drafts')).rejects.toBeInstanceOf(DuplicateError);
  });

  it('should reject an unknown role', async () => {
    const repository = new InMemoryPermissionRepository();
    const store = new PermissionStore(repository, lookup);

    await expect(store.grant('p1', 'ghost', '/reports')).rejects.toBeInstanceOf(NotFoundError);
    expect(await repository.findAll()).toEqual([]);
  });

  it('should revoke a permission', async () => {
    const repository = new InMemoryPermissionRepository();
    const store = new PermissionStore(repository, lookup);
    await store.grant('p1', 'admin', '/reports');

    expect(await store.revoke('p1')).toEqual({ id: 'p1', roleId: 'admin', objectId: '/reports' });
    expect(await store.permissionsOf('admin')).toEqual(new Set());
    expect(await store.rolesGranting('/reports')).toEqual(new Set());
    expect(await repository.findAll()).toEqual([]);
    await expect(store.revoke('p1')).rejects.toBeInstanceOf(NotFoundError);
  });

  it('should keep an object granted while another permission still names it', async () => {
    const store = new PermissionStore(new InMemoryPermissionRepository(), lookup);
    await store.grant('p1', 'admin', '/reports');
    await store.grant('p2', 'admin', '/reports');

    await store.revoke('p1');

    expect(await store.permissionsOf('admin')).toEqual(new Set(['/reports']));
  });

  it('should get and list records', async () => {
    const store = new PermissionStore(new InMemoryPermissionRepository(), lookup);
    await store.grant('p1', 'admin', '/reports');

    expect(await store.get('p1')).toEqual({ id: 'p1', roleId: 'admin', objectId: '/reports' });
    expect(await store.list()).toEqual([{ id: 'p1', roleId: 'admin', objectId: '/reports' }]);
    await expect(store.get('p9')).rejects.toBeInstanceOf(NotFoundError);
  });

  it('should notify change listeners', async () => {
    const store = new PermissionStore(new InMemoryPermissionRepository(), lookup);
    const listener = vi.fn();
    const unsubscribe = store.onChange(listener);

    await store.grant('p1', 'admin', '/reports');
    await store.revoke('p1');
    unsubscribe();
    await store.grant('p2', 'admin', '/reports');

    expect(listener).toHaveBeenCalledTimes(2);
    expect(listener).toHaveBeenNthCalledWith(1, {
      type: 'grant',
      permission: { id: 'p1', roleId: 'admin', objectId: '/reports' },
    });
    expect(listener).toHaveBeenNthCalledWith(2, {
      type: 'revoke',
      permission: { id: 'p1', roleId: 'admin', objectId: '/reports' },
    });
  });

  it('should reject persisted permissions of unknown roles on hydrate', async () => {
    const store = new PermissionStore(
      new InMemoryPermissionRepository([{ id: 'p1', roleId: 'ghost', objectId: '/x' }]),
      lookup
    );

    await expect(store.hydrate()).rejects.toBeInstanceOf(NotFoundError);
  });
});

// ═══════════════════════════════════════════════════════════════════
// ACCESS ENGINE TESTS
// ═══════════════════════════════════════════════════════════════════

describe('AccessEngine', () => {
  it('should let an editor read reports granted to admin until revoked', async () => {
    const engine = createAccessEngine();
    await engine.addRole('admin');
    await engine.addRole('editor', 'admin');
    await engine.grant('reports-read', 'admin', '/reports');

    expect(await engine.can('editor', '/reports')).toBe(true);

    await engine.revoke('reports-read');

    expect(await engine.can('editor', '/reports')).toBe(false);
    expect(await engine.can('admin', '/reports')).toBe(false);
  });

  it('should not pass permissions down from child to parent', async () => {
    const engine = new AccessEngine();
    await engine.addRole('admin');
    await engine.addRole('editor', 'admin');
    await engine.grant('drafts', 'editor', '/drafts');

    expect(await engine.can('editor', '/drafts')).toBe(true);
    expect(await engine.can('admin', '/drafts')).toBe(false);
  });

  it('should grant every ancestor permission to descendants in generated forests', async () => {
    const engine = new AccessEngine();
    const parents = await buildForest(engine, 25, 99);
    const random = seededRandom(5);

    const grants: Array<{ roleId: string; objectId: string }> = [];
    const roleIds = Array.from(parents.keys());
    for (let i = 0; i < 40; i++) {
      const roleId = roleIds[Math.floor(random() * roleIds.length)];
      const objectId = `/object-${i}`;
      await engine.grant(`perm-${i}`, roleId, objectId);
      grants.push({ roleId, objectId });
    }

    for (const roleId of roleIds) {
      const chain = new Set(ancestorsOf(parents, roleId));
      for (const grant of grants) {
        expect(await engine.can(roleId, grant.objectId)).toBe(chain.has(grant.roleId));
      }
    }
  });

  it('should see new grants after a cached negative answer', async () => {
    const engine = new AccessEngine({ enableCache: true });
    await engine.addRole('admin');
    await engine.addRole('editor', 'admin');

    expect(await engine.can('editor', '/reports')).toBe(false);
    await engine.grant('p1', 'admin', '/reports');
    expect(await engine.can('editor', '/reports')).toBe(true);
  });

  it('should give the same answers with caching disabled', async () => {
    const engine = new AccessEngine({ enableCache: false });
    await engine.addRole('admin');
    await engine.grant('p1', 'admin', '/reports');

    expect(await engine.can('admin', '/reports')).toBe(true);
    await engine.revoke('p1');
    expect(await engine.can('admin', '/reports')).toBe(false);
  });

  describe('check', () => {
    it('should explain inherited, direct and denied decisions', async () => {
      const engine = new AccessEngine();
      await engine.addRole('admin');
      await engine.addRole('editor', 'admin');
      await engine.grant('p1', 'admin', '/reports');
      await engine.grant('p2', 'editor', '/drafts');

      const inherited = await engine.check('editor', '/reports');
      expect(inherited).toMatchObject({ allowed: true, matchedBy: 'admin', reason: 'Inherited from admin' });

      const direct = await engine.check('editor', '/drafts');
      expect(direct).toMatchObject({ allowed: true, matchedBy: 'editor', reason: 'Granted directly' });

      const denied = await engine.check('admin', '/drafts');
      expect(denied.allowed).toBe(false);
      expect(denied.matchedBy).toBeUndefined();
    });

    it('should audit decisions when enabled', async () => {
      const events: AuditEvent[] = [];
      const engine = new AccessEngine({ enableAudit: true, auditLogger: event => events.push(event) });
      await engine.addRole('admin');
      await engine.grant('p1', 'admin', '/reports');

      await engine.check('admin', '/reports');
      await engine.can('admin', '/reports');

      expect(events).toHaveLength(1);
      expect(events[0].roleId).toBe('admin');
      expect(events[0].objectId).toBe('/reports');
      expect(events[0].result.allowed).toBe(true);
    });

    it('should not audit when disabled', async () => {
      const auditLogger = vi.fn();
      const engine = new AccessEngine({ auditLogger });
      await engine.addRole('admin');

      await engine.check('admin', '/reports');

      expect(auditLogger).not.toHaveBeenCalled();
    });
  });

  it('should hydrate roles and permissions from storage', async () => {
    const roles: RoleRecord[] = [
      { id: 'admin', parentId: null },
      { id: 'editor', parentId: 'admin' },
    ];
    const engine = new AccessEngine({
      roleRepository: new InMemoryRoleRepository(roles),
      permissionRepository: new InMemoryPermissionRepository([{ id: 'p1', roleId: 'admin', objectId: '/reports' }]),
    });

    expect(await engine.hydrate()).toEqual({ roles: 2, permissions: 1 });
    expect(await engine.can('editor', '/reports')).toBe(true);
    expect(await engine.permissions.rolesGranting('/reports')).toEqual(new Set(['admin']));
  });
});

// ═══════════════════════════════════════════════════════════════════
// LRU CACHE TESTS
// ═══════════════════════════════════════════════════════════════════

describe('PermissionSetCache', () => {
  it('should evict the least recently used entry', () => {
    const cache = new PermissionSetCache(2);
    const generation = cache.snapshot();
    cache.store('a', new Set(['x']), generation);
    cache.store('b', new Set(['y']), generation);
    cache.get('a');
    cache.store('c', new Set(['z']), generation);

    expect(cache.get('a')).toEqual(new Set(['x']));
    expect(cache.get('b')).toBeUndefined();
    expect(cache.get('c')).toEqual(new Set(['z']));
    expect(cache.size).toBe(2);
  });

  it('should refuse a set computed before an invalidation', () => {
    const cache = new PermissionSetCache(10);
    const stale = cache.snapshot();

    cache.invalidate();

    expect(cache.store('a', new Set(['x']), stale)).toBe(false);
    expect(cache.get('a')).toBeUndefined();
    expect(cache.store('a', new Set(['x']), cache.snapshot())).toBe(true);
  });
});
