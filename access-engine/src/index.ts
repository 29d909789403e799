/**
 * access-engine
 *
 * Hierarchical role-based access control.
 *
 * Features:
 * - Role forest with single-parent inheritance and cycle rejection
 * - Bounded ancestry walks (a corrupt cycle fails the request, not the process)
 * - Permission store indexed by role and by object
 * - Cached effective permission sets, dropped on every mutation
 * - Audit hook for access decisions
 *
 * @example
 * ```typescript
 * import { AccessEngine } from 'access-engine';
 *
 * const engine = new AccessEngine();
 * await engine.addRole('admin');
 * await engine.addRole('editor', 'admin');
 * await engine.grant('reports', 'admin', '/reports');
 *
 * await engine.can('editor', '/reports'); // true
 * await engine.revoke('reports');
 * await engine.can('editor', '/reports'); // false
 * ```
 *
 * @packageDocumentation
 */

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

export type {
  RoleRecord,
  PermissionRecord,
  RoleRepository,
  PermissionRepository,
  PermissionChange,
  PermissionChangeListener,
  PermissionSource,
  RoleLookup,
  RoleGraphOptions,
  PermissionStoreOptions,
  AccessResult,
  AuditEvent,
  AccessEngineConfig,
} from './types.js';

// ─────────────────────────────────────────────────────────────────────────────
// Engine
// ─────────────────────────────────────────────────────────────────────────────

export { AccessEngine, createAccessEngine } from './engine.js';
export { RoleGraph } from './role-graph.js';
export { PermissionStore } from './permissions.js';

// ─────────────────────────────────────────────────────────────────────────────
// Storage
// ─────────────────────────────────────────────────────────────────────────────

export { InMemoryRoleRepository, InMemoryPermissionRepository } from './repositories.js';
export { PermissionSetCache } from './cache.js';
