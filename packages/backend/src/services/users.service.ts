import { getDb, insertedId, withUniqueGuard, transaction } from '../lib/db.js';
import type { Db } from '../lib/db.js';
import { nowIso } from '../lib/clock.js';
import { NotFoundError, ValidationError, ForbiddenError } from '../lib/errors.js';
import {
  canCreateRole,
  canDeleteUser,
  hasSystemRole,
  isContributor,
  systemRoleRank,
} from '../lib/permissions.js';
import { runService, success, created } from '../lib/service-result.js';
import type { ServiceResult } from '../lib/service-result.js';
import type { ActorContext } from '../engine/access/index.js';
import { SystemRole, ActivityAction, EntityType } from '../types/index.js';
import type { UserDto, UserProjectAssignmentDto, ProjectRole } from '../types/index.js';
import type {
  CreateUserInput,
  UpdateUserInput,
  UserFiltersInput,
} from '../schemas/user.schema.js';
import type { UserRow } from './records.js';
import { resolveActor } from './identity.service.js';
import { requireCompanyUser } from './access.helpers.js';
import { logActivity } from './audit.service.js';

interface UserWithManagerRow extends UserRow {
  manager_first_name: string | null;
  manager_last_name: string | null;
}

const SELECT_USER = `
  SELECT u.*, m.first_name AS manager_first_name, m.last_name AS manager_last_name
  FROM users u
  LEFT JOIN users m ON m.id = u.manager_id`;

function toUserDto(row: UserWithManagerRow): UserDto {
  return {
    id: row.id,
    email: row.email,
    firstName: row.first_name,
    lastName: row.last_name,
    fullName: `${row.first_name} ${row.last_name}`,
    phone: row.phone,
    systemRole: row.system_role,
    companyId: row.company_id,
    managerId: row.manager_id,
    managerName:
      row.manager_first_name !== null && row.manager_last_name !== null
        ? `${row.manager_first_name} ${row.manager_last_name}`
        : null,
    createdAt: row.created_at,
  };
}

function findCompanyUser(db: Db, actor: ActorContext, userId: number): UserWithManagerRow {
  const row = db
    .prepare<[number], UserWithManagerRow>(`${SELECT_USER} WHERE u.id = ? AND u.is_deleted = 0`)
    .get(userId);
  if (!row || actor.companyId === null || row.company_id !== actor.companyId) {
    throw new NotFoundError('User');
  }
  return row;
}

function requireCompany(actor: ActorContext): number {
  if (actor.companyId === null) {
    throw new ValidationError('You must belong to a company to manage users');
  }
  return actor.companyId;
}

function validateManager(db: Db, managerId: number, companyId: number): UserRow {
  const manager = requireCompanyUser(db, managerId, companyId, 'Manager not found in this company');
  if (!hasSystemRole(manager.system_role, SystemRole.MANAGER)) {
    throw new ValidationError('The assigned manager must have the Manager role or above', {
      managerId,
    });
  }
  return manager;
}

class UsersService {
  async list(actorId: number, filters: UserFiltersInput = {}): Promise<ServiceResult<UserDto[]>> {
    return runService('users.list', () => {
      const actor = resolveActor(actorId);
      if (actor.companyId === null) {
        return success([]);
      }

      const params: unknown[] = [actor.companyId];
      let sql = `${SELECT_USER} WHERE u.company_id = ? AND u.is_deleted = 0`;
      if (filters.search) {
        sql += ' AND (u.first_name LIKE ? OR u.last_name LIKE ? OR u.email LIKE ?)';
        const pattern = `%${filters.search}%`;
        params.push(pattern, pattern, pattern);
      }
      sql += ' ORDER BY u.last_name, u.first_name';

      const rows = getDb().prepare<unknown[], UserWithManagerRow>(sql).all(...params);
      return success(rows.map(toUserDto));
    });
  }

  async getById(actorId: number, userId: number): Promise<ServiceResult<UserDto>> {
    return runService('users.getById', () => {
      const actor = resolveActor(actorId);
      return success(toUserDto(findCompanyUser(getDb(), actor, userId)));
    });
  }

  async getMe(actorId: number): Promise<ServiceResult<UserDto>> {
    return runService('users.getMe', () => {
      resolveActor(actorId);
      const row = getDb()
        .prepare<[number], UserWithManagerRow>(`${SELECT_USER} WHERE u.id = ?`)
        .get(actorId);
      if (!row) {
        throw new NotFoundError('User');
      }
      return success(toUserDto(row));
    });
  }

  /** Direct reports of the caller. */
  async listTeam(actorId: number): Promise<ServiceResult<UserDto[]>> {
    return runService('users.listTeam', () => {
      const actor = resolveActor(actorId);
      const rows = getDb()
        .prepare<[number], UserWithManagerRow>(
          `${SELECT_USER} WHERE u.manager_id = ? AND u.is_deleted = 0 ORDER BY u.last_name, u.first_name`
        )
        .all(actor.userId);
      return success(rows.map(toUserDto));
    });
  }

  /** Users who may be assigned as someone's manager. */
  async listManagers(actorId: number): Promise<ServiceResult<UserDto[]>> {
    return runService('users.listManagers', () => {
      const actor = resolveActor(actorId);
      if (actor.companyId === null) {
        return success([]);
      }
      const rows = getDb()
        .prepare<[number], UserWithManagerRow>(
          `${SELECT_USER}
           WHERE u.company_id = ? AND u.is_deleted = 0
             AND u.system_role IN ('MANAGER', 'ADMIN', 'SUPER_ADMIN')
           ORDER BY u.last_name, u.first_name`
        )
        .all(actor.companyId);
      return success(rows.map(toUserDto));
    });
  }

  async listProjects(
    actorId: number,
    userId: number
  ): Promise<ServiceResult<UserProjectAssignmentDto[]>> {
    return runService('users.listProjects', () => {
      const actor = resolveActor(actorId);
      const db = getDb();
      const user = findCompanyUser(db, actor, userId);
      const rows = db
        .prepare<[number], { project_id: number; name: string; key: string; role: ProjectRole }>(
          `SELECT pm.project_id, p.name, p.key, pm.role
           FROM project_members pm
           JOIN projects p ON p.id = pm.project_id
           WHERE pm.user_id = ? AND pm.is_deleted = 0 AND p.is_deleted = 0
           ORDER BY p.name`
        )
        .all(user.id);
      return success(
        rows.map((r) => ({
          projectId: r.project_id,
          projectName: r.name,
          projectKey: r.key,
          role: r.role,
        }))
      );
    });
  }

  async create(actorId: number, input: CreateUserInput): Promise<ServiceResult<UserDto>> {
    return runService('users.create', () => {
      const actor = resolveActor(actorId);
      const companyId = requireCompany(actor);
      const db = getDb();

      if (!canCreateRole(actor.systemRole, input.systemRole)) {
        throw new ForbiddenError(`You cannot create a user with the ${input.systemRole} role`);
      }

      if (isContributor(input.systemRole) && input.managerId === undefined) {
        throw new ValidationError('Members and QA users must be assigned a manager');
      }
      if (input.managerId !== undefined) {
        validateManager(db, input.managerId, companyId);
      }

      const duplicate = db
        .prepare<[number, string], { id: number }>(
          'SELECT id FROM users WHERE company_id = ? AND email = ? AND is_deleted = 0'
        )
        .get(companyId, input.email);
      if (duplicate) {
        throw new ValidationError(`A user with email '${input.email}' already exists`);
      }

      const now = nowIso();
      const id = withUniqueGuard(`A user with email '${input.email}' already exists`, () =>
        insertedId(
          db
            .prepare(
              `INSERT INTO users
                 (email, first_name, last_name, phone, system_role, company_id, manager_id, created_at, updated_at)
               VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)`
            )
            .run(
              input.email,
              input.firstName,
              input.lastName,
              input.phone ?? null,
              input.systemRole,
              companyId,
              input.managerId ?? null,
              now,
              now
            )
        )
      );

      logActivity({
        userId: actor.userId,
        action: ActivityAction.CREATED,
        entityType: EntityType.USER,
        entityId: id,
        newValue: input.systemRole,
        description: `Created user ${input.firstName} ${input.lastName}`,
      });

      return created(toUserDto(findCompanyUser(db, actor, id)));
    });
  }

  async update(
    actorId: number,
    userId: number,
    input: UpdateUserInput
  ): Promise<ServiceResult<UserDto>> {
    return runService('users.update', () => {
      const actor = resolveActor(actorId);
      const db = getDb();
      const target = findCompanyUser(db, actor, userId);
      const isSelf = target.id === actor.userId;

      const roleChanging =
        input.systemRole !== undefined && input.systemRole !== target.system_role;
      const managerChanging =
        input.managerId !== undefined && input.managerId !== target.manager_id;

      if (isSelf) {
        if (roleChanging || managerChanging) {
          throw new ForbiddenError('You cannot change your own role or manager');
        }
      } else {
        const outranks =
          actor.systemRole === SystemRole.SUPER_ADMIN ||
          systemRoleRank(actor.systemRole) > systemRoleRank(target.system_role);
        if (!hasSystemRole(actor.systemRole, SystemRole.MANAGER) || !outranks) {
          throw new ForbiddenError('You do not have permission to edit this user');
        }
      }

      const nextRole = input.systemRole ?? target.system_role;
      if (roleChanging) {
        if (target.system_role === SystemRole.SUPER_ADMIN) {
          throw new ValidationError('The super admin role can only change through a transfer');
        }
        if (!canCreateRole(actor.systemRole, nextRole)) {
          throw new ForbiddenError(`You cannot assign the ${nextRole} role`);
        }
      }

      const nextManagerId = input.managerId !== undefined ? input.managerId : target.manager_id;
      if (isContributor(nextRole) && nextManagerId === null) {
        throw new ValidationError('Members and QA users must be assigned a manager');
      }
      if (managerChanging && nextManagerId !== null) {
        if (nextManagerId === target.id) {
          throw new ValidationError('A user cannot be their own manager');
        }
        validateManager(db, nextManagerId, requireCompany(actor));
      }

      db.prepare(
        `UPDATE users
         SET first_name = ?, last_name = ?, phone = ?, system_role = ?, manager_id = ?, updated_at = ?
         WHERE id = ?`
      ).run(
        input.firstName ?? target.first_name,
        input.lastName ?? target.last_name,
        input.phone !== undefined ? input.phone : target.phone,
        nextRole,
        nextManagerId,
        nowIso(),
        target.id
      );

      logActivity({
        userId: actor.userId,
        action: ActivityAction.UPDATED,
        entityType: EntityType.USER,
        entityId: target.id,
        oldValue: roleChanging ? target.system_role : null,
        newValue: roleChanging ? nextRole : null,
        description: `Updated user ${target.first_name} ${target.last_name}`,
      });

      return success(toUserDto(findCompanyUser(db, actor, target.id)));
    });
  }

  async delete(actorId: number, userId: number): Promise<ServiceResult<null>> {
    return runService('users.delete', () => {
      const actor = resolveActor(actorId);
      const db = getDb();
      const target = findCompanyUser(db, actor, userId);

      if (target.id === actor.userId) {
        throw new ValidationError('You cannot delete your own account');
      }
      if (target.system_role === SystemRole.SUPER_ADMIN) {
        throw new ValidationError('A super administrator cannot be deleted');
      }
      if (!canDeleteUser(actor.systemRole, target.system_role)) {
        throw new ForbiddenError('You can only delete users with a lower role than your own');
      }

      const now = nowIso();
      db.prepare(
        'UPDATE users SET is_deleted = 1, deleted_at = ?, deleted_by = ?, updated_at = ? WHERE id = ?'
      ).run(now, actor.userId, now, target.id);

      logActivity({
        userId: actor.userId,
        action: ActivityAction.DELETED,
        entityType: EntityType.USER,
        entityId: target.id,
        description: `Deleted user ${target.first_name} ${target.last_name}`,
      });

      return success(null);
    });
  }

  /**
   * Hand the SuperAdmin role to an Admin of the same company. Both role
   * changes commit together or not at all.
   */
  async transferSuperAdmin(
    actorId: number,
    targetUserId: number
  ): Promise<ServiceResult<{ formerSuperAdmin: UserDto; superAdmin: UserDto }>> {
    return runService('users.transferSuperAdmin', () => {
      const actor = resolveActor(actorId);
      if (actor.systemRole !== SystemRole.SUPER_ADMIN) {
        throw new ForbiddenError('Only the super administrator can transfer the role');
      }

      const db = getDb();
      const target = findCompanyUser(db, actor, targetUserId);
      if (target.id === actor.userId) {
        throw new ValidationError('You already hold the super admin role');
      }
      if (target.system_role !== SystemRole.ADMIN) {
        throw new ValidationError('The super admin role can only be transferred to an administrator');
      }

      transaction((tx) => {
        const now = nowIso();
        const setRole = tx.prepare('UPDATE users SET system_role = ?, updated_at = ? WHERE id = ?');
        setRole.run(SystemRole.SUPER_ADMIN, now, target.id);
        setRole.run(SystemRole.ADMIN, now, actor.userId);
      });

      logActivity({
        userId: actor.userId,
        action: ActivityAction.SUPER_ADMIN_TRANSFERRED,
        entityType: EntityType.USER,
        entityId: target.id,
        oldValue: SystemRole.ADMIN,
        newValue: SystemRole.SUPER_ADMIN,
        description: `Transferred super admin role to ${target.first_name} ${target.last_name}`,
      });

      return success({
        formerSuperAdmin: toUserDto(findCompanyUser(db, actor, actor.userId)),
        superAdmin: toUserDto(findCompanyUser(db, actor, target.id)),
      });
    });
  }
}

export const usersService = new UsersService();
