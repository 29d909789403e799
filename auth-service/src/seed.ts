/**
 * Access model seeding
 *
 * Loads the default roles and permissions from JSON and adds whatever is
 * missing. Seeding is idempotent: existing roles and permissions are left
 * alone, so it runs on every start-up.
 */

import { readFile } from 'node:fs/promises';
import type { AccessEngine } from 'access-engine';
import { assertValid, logger, type } from 'core-service';

export const accessModelSchema = type({
  roles: type({ id: 'string > 0', parentId: 'string > 0 | null' }).array(),
  permissions: type({ id: 'string > 0', roleId: 'string > 0', objectId: 'string > 0' }).array(),
});

export type AccessModel = typeof accessModelSchema.infer;

export async function loadAccessModel(filePath: string): Promise<AccessModel> {
  const content = await readFile(filePath, 'utf-8');
  const parsed: unknown = JSON.parse(content);
  return assertValid(accessModelSchema(parsed), `access model ${filePath}`);
}

/**
 * Add the model's missing roles (parents first) and permissions
 */
export async function seedAccessModel(
  engine: AccessEngine,
  model: AccessModel
): Promise<{ roles: number; permissions: number }> {
  let rolesAdded = 0;
  let permissionsAdded = 0;

  const pending = [...model.roles];
  while (pending.length > 0) {
    const before = pending.length;
    for (let i = 0; i < pending.length; ) {
      const role = pending[i];
      const parentReady = role.parentId === null || await engine.roles.hasRole(role.parentId);
      if (!parentReady) {
        i++;
        continue;
      }
      if (!(await engine.roles.hasRole(role.id))) {
        await engine.addRole(role.id, role.parentId);
        rolesAdded++;
      }
      pending.splice(i, 1);
    }
    if (pending.length === before) {
      // Remaining roles name parents that never appear; addRole reports it
      await engine.addRole(pending[0].id, pending[0].parentId);
    }
  }

  const existing = new Set((await engine.permissions.list()).map(permission => permission.id));
  for (const permission of model.permissions) {
    if (existing.has(permission.id)) continue;
    await engine.grant(permission.id, permission.roleId, permission.objectId);
    permissionsAdded++;
  }

  logger.info('Access model seeded', { rolesAdded, permissionsAdded });
  return { roles: rolesAdded, permissions: permissionsAdded };
}
