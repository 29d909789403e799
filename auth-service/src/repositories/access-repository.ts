/**
 * Role and Permission Repositories
 *
 * MongoDB storage behind the access-engine role graph and permission store.
 */

import type { PermissionRecord, PermissionRepository, RoleRecord, RoleRepository } from 'access-engine';
import { DuplicateError, withMongo, type Collection, type Db } from 'core-service';

export interface RoleDocument {
  _id: string;
  parentId: string | null;
}

export interface PermissionDocument {
  _id: string;
  roleId: string;
  objectId: string;
}

export class MongoRoleRepository implements RoleRepository {
  static readonly collectionName = 'roles';
  private collection: Collection<RoleDocument>;

  constructor(db: Db) {
    this.collection = db.collection<RoleDocument>(MongoRoleRepository.collectionName);
  }

  async findAll(): Promise<RoleRecord[]> {
    const docs = await withMongo('roles.findAll', () => this.collection.find({}).toArray());
    return docs.map(doc => ({ id: doc._id, parentId: doc.parentId }));
  }

  async insert(role: RoleRecord): Promise<void> {
    await withMongo(
      'roles.insert',
      () => this.collection.insertOne({ _id: role.id, parentId: role.parentId }),
      () => new DuplicateError(`Role ${role.id} already exists`, { roleId: role.id })
    );
  }
}

export class MongoPermissionRepository implements PermissionRepository {
  static readonly collectionName = 'permissions';
  private collection: Collection<PermissionDocument>;

  constructor(db: Db) {
    this.collection = db.collection<PermissionDocument>(MongoPermissionRepository.collectionName);
  }

  async findAll(): Promise<PermissionRecord[]> {
    const docs = await withMongo('permissions.findAll', () => this.collection.find({}).toArray());
    return docs.map(doc => ({ id: doc._id, roleId: doc.roleId, objectId: doc.objectId }));
  }

  async insert(permission: PermissionRecord): Promise<void> {
    await withMongo(
      'permissions.insert',
      () => this.collection.insertOne({
        _id: permission.id,
        roleId: permission.roleId,
        objectId: permission.objectId,
      }),
      () => new DuplicateError(`Permission ${permission.id} already exists`, { permissionId: permission.id })
    );
  }

  async deleteById(permissionId: string): Promise<boolean> {
    const result = await withMongo('permissions.deleteById', () =>
      this.collection.deleteOne({ _id: permissionId })
    );
    return result.deletedCount > 0;
  }
}
