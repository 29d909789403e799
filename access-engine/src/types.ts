/**
 * access-engine - Type Definitions
 *
 * Core types for hierarchical role/permission resolution.
 */

import type { Logger } from 'core-service';

// ═══════════════════════════════════════════════════════════════════
// Records
// ═══════════════════════════════════════════════════════════════════

/**
 * Role node. Roles form a forest: each has at most one parent and
 * inherits everything its ancestors are granted.
 */
export interface RoleRecord {
  id: string;
  /** null for a root role */
  parentId: string | null;
}

/**
 * A grant of one protected object to exactly one role
 */
export interface PermissionRecord {
  id: string;
  roleId: string;
  /** Opaque name of a protected resource or action (e.g. '/reports') */
  objectId: string;
}

// ═══════════════════════════════════════════════════════════════════
// Persistence
// ═══════════════════════════════════════════════════════════════════

/**
 * Durable storage behind the role graph. The graph keeps its own arena and
 * writes through, so the repository only has to load and append.
 */
export interface RoleRepository {
  findAll(): Promise<RoleRecord[]>;
  insert(role: RoleRecord): Promise<void>;
}

export interface PermissionRepository {
  findAll(): Promise<PermissionRecord[]>;
  insert(permission: PermissionRecord): Promise<void>;
  /** Resolves false when nothing was deleted */
  deleteById(permissionId: string): Promise<boolean>;
}

// ═══════════════════════════════════════════════════════════════════
// Collaborator contracts
// ═══════════════════════════════════════════════════════════════════

export type PermissionChange =
  | { type: 'grant'; permission: PermissionRecord }
  | { type: 'revoke'; permission: PermissionRecord }
  | { type: 'reload'; count: number };

export type PermissionChangeListener = (change: PermissionChange) => void;

/**
 * What the role graph needs from a permission store: direct grants per
 * role, and optionally a change feed so cached results can be dropped.
 */
export interface PermissionSource {
  permissionsOf(roleId: string): Promise<ReadonlySet<string>>;
  onChange?(listener: PermissionChangeListener): () => void;
}

/**
 * What the permission store needs from the role graph
 */
export interface RoleLookup {
  hasRole(roleId: string): Promise<boolean>;
}

// ═══════════════════════════════════════════════════════════════════
// Configuration
// ═══════════════════════════════════════════════════════════════════

export interface RoleGraphOptions {
  /** Direct grants per role; required for permission checks */
  permissions?: PermissionSource;
  /**
   * Upper bound on the length of an ancestry walk. The number of roles is
   * always an upper bound too; the smaller of the two applies.
   */
  maxDepth?: number;
  /** Cache effective permission sets per role (default: false) */
  cache?: boolean;
  /** Maximum cached roles (default: 1000) */
  maxCacheSize?: number;
  logger?: Logger;
}

export interface PermissionStoreOptions {
  logger?: Logger;
}

/**
 * Result of an authorization check
 */
export interface AccessResult {
  /** Whether access is allowed */
  allowed: boolean;
  /** Reason for the decision */
  reason: string;
  /** Role in the inheritance chain that holds the grant */
  matchedBy?: string;
  /** Time taken for the check (ms) */
  duration: number;
}

/**
 * Audit event for logging access decisions
 */
export interface AuditEvent {
  timestamp: Date;
  roleId: string;
  objectId: string;
  result: AccessResult;
}

/**
 * Configuration for the AccessEngine
 */
export interface AccessEngineConfig {
  /** Role storage (default: in-memory) */
  roleRepository?: RoleRepository;
  /** Permission storage (default: in-memory) */
  permissionRepository?: PermissionRepository;
  /** Enable caching of effective permission sets (default: true) */
  enableCache?: boolean;
  /** Maximum cache entries */
  maxCacheSize?: number;
  /** Maximum ancestry walk length */
  maxDepth?: number;
  /** Enable audit logging of check() decisions */
  enableAudit?: boolean;
  /** Custom audit logger */
  auditLogger?: (event: AuditEvent) => void;
  logger?: Logger;
}
