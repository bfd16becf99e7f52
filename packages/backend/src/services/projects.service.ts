import { getDb, fromFlag, toFlag, insertedId, withUniqueGuard, transaction } from '../lib/db.js';
import type { Db } from '../lib/db.js';
import { nowIso } from '../lib/clock.js';
import { NotFoundError, ValidationError, ForbiddenError } from '../lib/errors.js';
import { hasSystemRole, hasProjectRole } from '../lib/permissions.js';
import { moduleLogger } from '../lib/logger.js';
import { runService, success, created } from '../lib/service-result.js';
import type { ServiceResult } from '../lib/service-result.js';
import { authorize } from '../engine/access/index.js';
import type { ActorContext } from '../engine/access/index.js';
import { SystemRole, ProjectRole, ActivityAction, EntityType } from '../types/index.js';
import type { ProjectDto, ProjectMemberDto, UserDto } from '../types/index.js';
import type {
  CreateProjectInput,
  UpdateProjectInput,
  AddMemberInput,
  UpdateMemberRoleInput,
  AvailableUsersFiltersInput,
} from '../schemas/project.schema.js';
import type { ProjectRow, ProjectMemberRow, UserRow } from './records.js';
import { resolveActor } from './identity.service.js';
import {
  requireProjectAccess,
  requireCompanyUser,
  loadMembershipFacts,
  fullName,
} from './access.helpers.js';
import { seedCoreStatuses } from './workflow-statuses.service.js';
import { createDefaultBoard } from './boards.service.js';
import { logActivity } from './audit.service.js';

const log = moduleLogger('projects');

interface MemberWithUserRow extends ProjectMemberRow {
  first_name: string;
  last_name: string;
  email: string;
  system_role: SystemRole;
}

const SELECT_MEMBERS = `
  SELECT pm.*, u.first_name, u.last_name, u.email, u.system_role
  FROM project_members pm
  JOIN users u ON u.id = pm.user_id AND u.is_deleted = 0`;

/** Manager-or-above: project role Manager/Admin, or system role Manager and up. */
function isManagerOrAbove(member: Pick<MemberWithUserRow, 'role' | 'system_role'>): boolean {
  return (
    hasProjectRole(member.role, ProjectRole.MANAGER) ||
    hasSystemRole(member.system_role, SystemRole.MANAGER)
  );
}

function listActiveMembers(db: Db, projectId: number): MemberWithUserRow[] {
  return db
    .prepare<[number], MemberWithUserRow>(
      `${SELECT_MEMBERS} WHERE pm.project_id = ? AND pm.is_deleted = 0 ORDER BY u.last_name, u.first_name`
    )
    .all(projectId);
}

function toMemberDto(row: MemberWithUserRow): ProjectMemberDto {
  return {
    id: row.id,
    projectId: row.project_id,
    userId: row.user_id,
    fullName: fullName(row),
    email: row.email,
    systemRole: row.system_role,
    role: row.role,
    joinedAt: row.joined_at,
  };
}

function toProjectDto(db: Db, row: ProjectRow): ProjectDto {
  const managers = listActiveMembers(db, row.id)
    .filter(isManagerOrAbove)
    .map((m) => ({ userId: m.user_id, fullName: fullName(m), email: m.email }));

  return {
    id: row.id,
    companyId: row.company_id,
    name: row.name,
    description: row.description,
    key: row.key,
    startDate: row.start_date,
    endDate: row.end_date,
    isActive: fromFlag(row.is_active),
    createdAt: row.created_at,
    managers,
  };
}

function assertKeyAvailable(db: Db, companyId: number, key: string, exceptId?: number): void {
  const clash = db
    .prepare<[number, string, number], { id: number }>(
      'SELECT id FROM projects WHERE company_id = ? AND key = ? AND is_deleted = 0 AND id != ?'
    )
    .get(companyId, key, exceptId ?? 0);
  if (clash) {
    throw new ValidationError(`Project key '${key}' is already in use`);
  }
}

/**
 * Reject a change that would leave the project without a manager-or-above
 * member. `memberId` is the membership being removed or demoted.
 */
function assertKeepsAManager(db: Db, projectId: number, memberId: number): void {
  const remaining = listActiveMembers(db, projectId).filter(
    (m) => m.id !== memberId && isManagerOrAbove(m)
  );
  if (remaining.length === 0) {
    throw new ValidationError('A project must keep at least one manager');
  }
}

function findMember(db: Db, projectId: number, memberId: number): MemberWithUserRow {
  const member = db
    .prepare<[number, number], MemberWithUserRow>(
      `${SELECT_MEMBERS} WHERE pm.id = ? AND pm.project_id = ? AND pm.is_deleted = 0`
    )
    .get(memberId, projectId);
  if (!member) {
    throw new NotFoundError('Project member');
  }
  return member;
}

function canSee(actor: ActorContext, db: Db, project: ProjectRow): boolean {
  const membership = loadMembershipFacts(db, actor, project.id);
  return authorize(actor, 'read', { kind: 'project', companyId: project.company_id, membership })
    .allowed;
}

class ProjectsService {
  async list(actorId: number): Promise<ServiceResult<ProjectDto[]>> {
    return runService('projects.list', () => {
      const actor = resolveActor(actorId);
      if (actor.companyId === null) {
        return success([]);
      }
      const db = getDb();
      const rows = db
        .prepare<[number], ProjectRow>(
          'SELECT * FROM projects WHERE company_id = ? AND is_deleted = 0 ORDER BY name'
        )
        .all(actor.companyId);

      return success(rows.filter((p) => canSee(actor, db, p)).map((p) => toProjectDto(db, p)));
    });
  }

  async getById(actorId: number, projectId: number): Promise<ServiceResult<ProjectDto>> {
    return runService('projects.getById', () => {
      const actor = resolveActor(actorId);
      const { project } = requireProjectAccess(actor, projectId, 'read');
      return success(toProjectDto(getDb(), project));
    });
  }

  /**
   * Create a project together with its manager membership, the four core
   * statuses and the default board. All of it commits in one transaction.
   */
  async create(actorId: number, input: CreateProjectInput): Promise<ServiceResult<ProjectDto>> {
    return runService('projects.create', () => {
      const actor = resolveActor(actorId);
      if (!hasSystemRole(actor.systemRole, SystemRole.ADMIN)) {
        throw new ForbiddenError('Only administrators can create projects');
      }
      if (actor.companyId === null) {
        throw new ValidationError('You must belong to a company to create projects');
      }
      const companyId = actor.companyId;
      const db = getDb();

      const manager = requireCompanyUser(
        db,
        input.managerId,
        companyId,
        'Project manager not found in this company'
      );
      if (!hasSystemRole(manager.system_role, SystemRole.MANAGER)) {
        throw new ValidationError('The project manager must have the Manager role or above', {
          managerId: manager.id,
        });
      }
      assertKeyAvailable(db, companyId, input.key);

      const projectId = withUniqueGuard(`Project key '${input.key}' is already in use`, () =>
        transaction((tx) => {
          const now = nowIso();
          const id = insertedId(
            tx
              .prepare(
                `INSERT INTO projects
                   (company_id, name, description, key, start_date, end_date, is_active, created_at, updated_at)
                 VALUES (?, ?, ?, ?, ?, ?, 1, ?, ?)`
              )
              .run(
                companyId,
                input.name,
                input.description ?? null,
                input.key,
                input.startDate ? input.startDate.toISOString() : null,
                input.endDate ? input.endDate.toISOString() : null,
                now,
                now
              )
          );

          tx.prepare(
            `INSERT INTO project_members (project_id, user_id, role, joined_at, created_at, updated_at)
             VALUES (?, ?, ?, ?, ?, ?)`
          ).run(id, manager.id, ProjectRole.MANAGER, now, now, now);

          const statusIds = seedCoreStatuses(tx, id, now);
          createDefaultBoard(tx, id, statusIds, now);
          return id;
        })
      );

      log.info({ projectId, key: input.key }, 'Project created');
      logActivity({
        userId: actor.userId,
        action: ActivityAction.CREATED,
        entityType: EntityType.PROJECT,
        entityId: projectId,
        projectId,
        description: `Created project '${input.name}' (${input.key})`,
      });

      const { project } = requireProjectAccess(actor, projectId, 'read');
      return created(toProjectDto(db, project));
    });
  }

  async update(
    actorId: number,
    projectId: number,
    input: UpdateProjectInput
  ): Promise<ServiceResult<ProjectDto>> {
    return runService('projects.update', () => {
      const actor = resolveActor(actorId);
      const { project } = requireProjectAccess(actor, projectId, 'update');
      const db = getDb();

      const nextKey = input.key ?? project.key;
      if (nextKey !== project.key) {
        assertKeyAvailable(db, project.company_id, nextKey, project.id);
      }

      const startDate =
        input.startDate === undefined
          ? project.start_date
          : input.startDate === null
            ? null
            : input.startDate.toISOString();
      const endDate =
        input.endDate === undefined
          ? project.end_date
          : input.endDate === null
            ? null
            : input.endDate.toISOString();
      if (startDate !== null && endDate !== null && startDate > endDate) {
        throw new ValidationError('startDate must be on or before endDate');
      }

      withUniqueGuard(`Project key '${nextKey}' is already in use`, () =>
        db
          .prepare(
            `UPDATE projects
             SET name = ?, description = ?, key = ?, start_date = ?, end_date = ?, is_active = ?, updated_at = ?
             WHERE id = ?`
          )
          .run(
            input.name ?? project.name,
            input.description !== undefined ? input.description : project.description,
            nextKey,
            startDate,
            endDate,
            input.isActive !== undefined ? toFlag(input.isActive) : project.is_active,
            nowIso(),
            project.id
          )
      );

      logActivity({
        userId: actor.userId,
        action: ActivityAction.UPDATED,
        entityType: EntityType.PROJECT,
        entityId: project.id,
        projectId: project.id,
        description: `Updated project '${input.name ?? project.name}'`,
      });

      return success(toProjectDto(db, requireProjectAccess(actor, project.id, 'read').project));
    });
  }

  async delete(actorId: number, projectId: number): Promise<ServiceResult<null>> {
    return runService('projects.delete', () => {
      const actor = resolveActor(actorId);
      const { project } = requireProjectAccess(actor, projectId, 'delete');

      const now = nowIso();
      getDb()
        .prepare(
          'UPDATE projects SET is_deleted = 1, deleted_at = ?, deleted_by = ?, updated_at = ? WHERE id = ?'
        )
        .run(now, actor.userId, now, project.id);

      logActivity({
        userId: actor.userId,
        action: ActivityAction.DELETED,
        entityType: EntityType.PROJECT,
        entityId: project.id,
        projectId: project.id,
        description: `Deleted project '${project.name}'`,
      });

      return success(null);
    });
  }

  // ==========================================================================
  // Members
  // ==========================================================================

  async listMembers(actorId: number, projectId: number): Promise<ServiceResult<ProjectMemberDto[]>> {
    return runService('projects.listMembers', () => {
      const actor = resolveActor(actorId);
      const { project } = requireProjectAccess(actor, projectId, 'read');
      return success(listActiveMembers(getDb(), project.id).map(toMemberDto));
    });
  }

  /** Company users who are not yet active members. */
  async listAvailableUsers(
    actorId: number,
    projectId: number,
    filters: AvailableUsersFiltersInput = {}
  ): Promise<ServiceResult<Pick<UserDto, 'id' | 'email' | 'fullName' | 'systemRole'>[]>> {
    return runService('projects.listAvailableUsers', () => {
      const actor = resolveActor(actorId);
      const { project } = requireProjectAccess(actor, projectId, 'update');

      const params: unknown[] = [project.company_id, project.id];
      let sql = `
        SELECT u.* FROM users u
        WHERE u.company_id = ? AND u.is_deleted = 0
          AND NOT EXISTS (
            SELECT 1 FROM project_members pm
            WHERE pm.user_id = u.id AND pm.project_id = ? AND pm.is_deleted = 0
          )`;
      if (filters.unassignedOnly) {
        sql += `
          AND NOT EXISTS (
            SELECT 1 FROM project_members pm2
            JOIN projects p2 ON p2.id = pm2.project_id AND p2.is_deleted = 0
            WHERE pm2.user_id = u.id AND pm2.is_deleted = 0
          )`;
      }
      if (filters.search) {
        sql += ' AND (u.first_name LIKE ? OR u.last_name LIKE ? OR u.email LIKE ?)';
        const pattern = `%${filters.search}%`;
        params.push(pattern, pattern, pattern);
      }
      sql += ' ORDER BY u.last_name, u.first_name';

      const rows = getDb().prepare<unknown[], UserRow>(sql).all(...params);
      return success(
        rows.map((u) => ({
          id: u.id,
          email: u.email,
          fullName: fullName(u),
          systemRole: u.system_role,
        }))
      );
    });
  }

  /** Add a member, or reactivate a previously removed membership. */
  async addMember(
    actorId: number,
    projectId: number,
    input: AddMemberInput
  ): Promise<ServiceResult<ProjectMemberDto>> {
    return runService('projects.addMember', () => {
      const actor = resolveActor(actorId);
      const { project } = requireProjectAccess(actor, projectId, 'manage');
      const db = getDb();
      const user = requireCompanyUser(
        db,
        input.userId,
        project.company_id,
        'User not found in this company'
      );

      const existing = db
        .prepare<[number, number], ProjectMemberRow>(
          'SELECT * FROM project_members WHERE project_id = ? AND user_id = ?'
        )
        .get(project.id, user.id);

      if (existing && existing.is_deleted === 0) {
        throw new ValidationError('User is already a member of this project');
      }

      const now = nowIso();
      let memberId: number;
      if (existing) {
        db.prepare(
          `UPDATE project_members
           SET is_deleted = 0, deleted_at = NULL, deleted_by = NULL, role = ?, joined_at = ?, updated_at = ?
           WHERE id = ?`
        ).run(input.role, now, now, existing.id);
        memberId = existing.id;
      } else {
        memberId = insertedId(
          db
            .prepare(
              `INSERT INTO project_members (project_id, user_id, role, joined_at, created_at, updated_at)
               VALUES (?, ?, ?, ?, ?, ?)`
            )
            .run(project.id, user.id, input.role, now, now, now)
        );
      }

      logActivity({
        userId: actor.userId,
        action: ActivityAction.MEMBER_ADDED,
        entityType: EntityType.PROJECT_MEMBER,
        entityId: memberId,
        projectId: project.id,
        newValue: input.role,
        description: `Added ${fullName(user)} to project '${project.name}'`,
      });

      const dto = toMemberDto(findMember(db, project.id, memberId));
      return existing ? success(dto) : created(dto);
    });
  }

  async updateMemberRole(
    actorId: number,
    projectId: number,
    memberId: number,
    input: UpdateMemberRoleInput
  ): Promise<ServiceResult<ProjectMemberDto>> {
    return runService('projects.updateMemberRole', () => {
      const actor = resolveActor(actorId);
      const { project } = requireProjectAccess(actor, projectId, 'manage');
      const db = getDb();
      const member = findMember(db, project.id, memberId);

      if (isManagerOrAbove(member) && !isManagerOrAbove({ ...member, role: input.role })) {
        assertKeepsAManager(db, project.id, member.id);
      }

      db.prepare('UPDATE project_members SET role = ?, updated_at = ? WHERE id = ?').run(
        input.role,
        nowIso(),
        member.id
      );

      logActivity({
        userId: actor.userId,
        action: ActivityAction.MEMBER_ROLE_CHANGED,
        entityType: EntityType.PROJECT_MEMBER,
        entityId: member.id,
        projectId: project.id,
        oldValue: member.role,
        newValue: input.role,
        description: `Changed ${fullName(member)}'s project role`,
      });

      return success(toMemberDto(findMember(db, project.id, member.id)));
    });
  }

  async removeMember(
    actorId: number,
    projectId: number,
    memberId: number
  ): Promise<ServiceResult<null>> {
    return runService('projects.removeMember', () => {
      const actor = resolveActor(actorId);
      const { project } = requireProjectAccess(actor, projectId, 'manage');
      const db = getDb();
      const member = findMember(db, project.id, memberId);

      if (isManagerOrAbove(member)) {
        assertKeepsAManager(db, project.id, member.id);
      }

      const now = nowIso();
      db.prepare(
        'UPDATE project_members SET is_deleted = 1, deleted_at = ?, deleted_by = ?, updated_at = ? WHERE id = ?'
      ).run(now, actor.userId, now, member.id);

      logActivity({
        userId: actor.userId,
        action: ActivityAction.MEMBER_REMOVED,
        entityType: EntityType.PROJECT_MEMBER,
        entityId: member.id,
        projectId: project.id,
        description: `Removed ${fullName(member)} from project '${project.name}'`,
      });

      return success(null);
    });
  }
}

export const projectsService = new ProjectsService();
