/**
 * access-engine - Core Engine
 *
 * Wires a RoleGraph and a PermissionStore together and answers
 * "may role R touch object O?" with an explained, optionally audited result.
 */

import { getErrorMessage, logger as defaultLogger, type Logger } from 'core-service';
import { PermissionStore } from './permissions.js';
import { InMemoryPermissionRepository, InMemoryRoleRepository } from './repositories.js';
import { RoleGraph } from './role-graph.js';
import type { AccessEngineConfig, AccessResult, AuditEvent, PermissionRecord, RoleRecord } from './types.js';

/**
 * AccessEngine - hierarchical RBAC
 *
 * @example
 * ```typescript
 * const engine = new AccessEngine();
 *
 * await engine.addRole('admin');
 * await engine.addRole('editor', 'admin');
 * await engine.grant('reports-read', 'admin', '/reports');
 *
 * await engine.can('editor', '/reports'); // true
 * ```
 */
export class AccessEngine {
  readonly roles: RoleGraph;
  readonly permissions: PermissionStore;
  private enableAudit: boolean;
  private auditLogger: (event: AuditEvent) => void;
  private log: Logger;

  constructor(config: AccessEngineConfig = {}) {
    this.log = config.logger ?? defaultLogger;
    this.enableAudit = config.enableAudit ?? false;
    this.auditLogger = config.auditLogger ?? (event => {
      this.log.debug('Access decision', {
        roleId: event.roleId,
        objectId: event.objectId,
        allowed: event.result.allowed,
        matchedBy: event.result.matchedBy,
      });
    });

    // The store only needs an existence check from the graph, so it can be
    // built first and handed to the graph as its permission source.
    this.permissions = new PermissionStore(
      config.permissionRepository ?? new InMemoryPermissionRepository(),
      { hasRole: roleId => this.roles.hasRole(roleId) },
      { logger: this.log }
    );
    this.roles = new RoleGraph(config.roleRepository ?? new InMemoryRoleRepository(), {
      permissions: this.permissions,
      cache: config.enableCache ?? true,
      maxCacheSize: config.maxCacheSize,
      maxDepth: config.maxDepth,
      logger: this.log,
    });
  }

  /**
   * Load roles, then permissions (which reference roles), from storage
   */
  async hydrate(): Promise<{ roles: number; permissions: number }> {
    const roles = await this.roles.hydrate();
    const permissions = await this.permissions.hydrate();
    return { roles, permissions };
  }

  // ═══════════════════════════════════════════════════════════════════
  // Administration
  // ═══════════════════════════════════════════════════════════════════

  addRole(roleId: string, parentId: string | null = null): Promise<RoleRecord> {
    return this.roles.addRole(roleId, parentId);
  }

  grant(permissionId: string, roleId: string, objectId: string): Promise<PermissionRecord> {
    return this.permissions.grant(permissionId, roleId, objectId);
  }

  revoke(permissionId: string): Promise<PermissionRecord> {
    return this.permissions.revoke(permissionId);
  }

  // ═══════════════════════════════════════════════════════════════════
  // Authorization
  // ═══════════════════════════════════════════════════════════════════

  /**
   * Boolean permission check (cached when caching is enabled)
   */
  can(roleId: string, objectId: string): Promise<boolean> {
    return this.roles.hasPermission(roleId, objectId);
  }

  /**
   * Permission check that also names the role holding the grant
   */
  async check(roleId: string, objectId: string): Promise<AccessResult> {
    const startTime = Date.now();
    const matchedBy = await this.roles.grantingRole(roleId, objectId);

    const result: AccessResult = matchedBy
      ? {
          allowed: true,
          reason: matchedBy === roleId ? 'Granted directly' : `Inherited from ${matchedBy}`,
          matchedBy,
          duration: Date.now() - startTime,
        }
      : {
          allowed: false,
          reason: 'No role in the inheritance chain grants this object',
          duration: Date.now() - startTime,
        };

    if (this.enableAudit) {
      this.audit({ timestamp: new Date(), roleId, objectId, result });
    }
    return result;
  }

  private audit(event: AuditEvent): void {
    try {
      this.auditLogger(event);
    } catch (error) {
      this.log.warn('Audit logger failed', { error: getErrorMessage(error) });
    }
  }
}

/**
 * Create an AccessEngine with the given configuration
 */
export function createAccessEngine(config?: AccessEngineConfig): AccessEngine {
  return new AccessEngine(config);
}
