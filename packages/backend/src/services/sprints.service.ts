import { getDb, insertedId, transaction } from '../lib/db.js';
import type { Db } from '../lib/db.js';
import { nowIso } from '../lib/clock.js';
import { NotFoundError, ValidationError } from '../lib/errors.js';
import { moduleLogger } from '../lib/logger.js';
import { runService, success, created } from '../lib/service-result.js';
import type { ServiceResult } from '../lib/service-result.js';
import type { ActorContext } from '../engine/access/index.js';
import { sprintLifecycle } from '../engine/graph/index.js';
import { SprintStatus, ActivityAction, EntityType } from '../types/index.js';
import type { SprintDto } from '../types/index.js';
import type { CreateSprintInput, UpdateSprintInput } from '../schemas/sprint.schema.js';
import type { SprintRow } from './records.js';
import type { ProjectAccess } from './access.helpers.js';
import { resolveActor } from './identity.service.js';
import { requireProjectAccess, assertProjectScoped } from './access.helpers.js';
import { logActivity } from './audit.service.js';

const log = moduleLogger('sprints');

interface SprintWithCountRow extends SprintRow {
  work_item_count: number;
}

const SELECT_SPRINT = `
  SELECT s.*,
    (SELECT COUNT(*) FROM work_items w WHERE w.sprint_id = s.id AND w.is_deleted = 0) AS work_item_count
  FROM sprints s`;

function toSprintDto(row: SprintWithCountRow): SprintDto {
  return {
    id: row.id,
    projectId: row.project_id,
    name: row.name,
    goal: row.goal,
    startDate: row.start_date,
    endDate: row.end_date,
    status: row.status,
    workItemCount: row.work_item_count,
    createdAt: row.created_at,
  };
}

export function findProjectSprint(db: Db, projectId: number, sprintId: number): SprintRow | undefined {
  return db
    .prepare<[number, number], SprintRow>(
      'SELECT * FROM sprints WHERE id = ? AND project_id = ? AND is_deleted = 0'
    )
    .get(sprintId, projectId);
}

function loadSprintDto(db: Db, sprintId: number): SprintDto {
  const row = db
    .prepare<[number], SprintWithCountRow>(`${SELECT_SPRINT} WHERE s.id = ? AND s.is_deleted = 0`)
    .get(sprintId);
  if (!row) {
    throw new NotFoundError('Sprint');
  }
  return toSprintDto(row);
}

interface ManagedSprint {
  access: ProjectAccess;
  sprint: SprintRow;
}

/** Load a sprint and require manage rights on its project. */
function requireManagedSprint(actor: ActorContext, projectId: number, sprintId: number): ManagedSprint {
  const access = requireProjectAccess(actor, projectId, 'read');
  const sprint = findProjectSprint(getDb(), access.project.id, sprintId);
  if (!sprint) {
    throw new NotFoundError('Sprint');
  }
  assertProjectScoped(actor, access, 'sprint', 'manage');
  return { access, sprint };
}

class SprintsService {
  async list(actorId: number, projectId: number): Promise<ServiceResult<SprintDto[]>> {
    return runService('sprints.list', () => {
      const actor = resolveActor(actorId);
      const { project } = requireProjectAccess(actor, projectId, 'read');
      const rows = getDb()
        .prepare<[number], SprintWithCountRow>(
          `${SELECT_SPRINT} WHERE s.project_id = ? AND s.is_deleted = 0 ORDER BY s.start_date, s.id`
        )
        .all(project.id);
      return success(rows.map(toSprintDto));
    });
  }

  async getById(actorId: number, projectId: number, sprintId: number): Promise<ServiceResult<SprintDto>> {
    return runService('sprints.getById', () => {
      const actor = resolveActor(actorId);
      const { project } = requireProjectAccess(actor, projectId, 'read');
      const db = getDb();
      const sprint = findProjectSprint(db, project.id, sprintId);
      if (!sprint) {
        throw new NotFoundError('Sprint');
      }
      return success(loadSprintDto(db, sprint.id));
    });
  }

  async create(
    actorId: number,
    projectId: number,
    input: CreateSprintInput
  ): Promise<ServiceResult<SprintDto>> {
    return runService('sprints.create', () => {
      const actor = resolveActor(actorId);
      const access = requireProjectAccess(actor, projectId, 'read');
      assertProjectScoped(actor, access, 'sprint', 'manage');

      const now = nowIso();
      const db = getDb();
      const id = insertedId(
        db
          .prepare(
            `INSERT INTO sprints (project_id, name, goal, start_date, end_date, status, created_at, updated_at)
             VALUES (?, ?, ?, ?, ?, ?, ?, ?)`
          )
          .run(
            access.project.id,
            input.name,
            input.goal ?? null,
            input.startDate.toISOString(),
            input.endDate.toISOString(),
            SprintStatus.PLANNING,
            now,
            now
          )
      );

      logActivity({
        userId: actor.userId,
        action: ActivityAction.CREATED,
        entityType: EntityType.SPRINT,
        entityId: id,
        projectId: access.project.id,
        description: `Created sprint '${input.name}'`,
      });

      return created(loadSprintDto(db, id));
    });
  }

  async update(
    actorId: number,
    projectId: number,
    sprintId: number,
    input: UpdateSprintInput
  ): Promise<ServiceResult<SprintDto>> {
    return runService('sprints.update', () => {
      const actor = resolveActor(actorId);
      const { access, sprint } = requireManagedSprint(actor, projectId, sprintId);

      const startDate = input.startDate ? input.startDate.toISOString() : sprint.start_date;
      const endDate = input.endDate ? input.endDate.toISOString() : sprint.end_date;
      if (startDate > endDate) {
        throw new ValidationError('startDate must be on or before endDate');
      }

      const nextStatus = input.status ?? sprint.status;
      if (nextStatus !== sprint.status) {
        sprintLifecycle.assertTransition(sprint.status, nextStatus);
      }

      const db = getDb();
      db.prepare(
        `UPDATE sprints SET name = ?, goal = ?, start_date = ?, end_date = ?, status = ?, updated_at = ?
         WHERE id = ?`
      ).run(
        input.name ?? sprint.name,
        input.goal !== undefined ? input.goal : sprint.goal,
        startDate,
        endDate,
        nextStatus,
        nowIso(),
        sprint.id
      );

      logActivity({
        userId: actor.userId,
        action: nextStatus !== sprint.status ? ActivityAction.STATUS_CHANGED : ActivityAction.UPDATED,
        entityType: EntityType.SPRINT,
        entityId: sprint.id,
        projectId: access.project.id,
        oldValue: nextStatus !== sprint.status ? sprint.status : null,
        newValue: nextStatus !== sprint.status ? nextStatus : null,
        description: `Updated sprint '${input.name ?? sprint.name}'`,
      });

      return success(loadSprintDto(db, sprint.id));
    });
  }

  async start(actorId: number, projectId: number, sprintId: number): Promise<ServiceResult<SprintDto>> {
    return runService('sprints.start', () =>
      this.advance(actorId, projectId, sprintId, SprintStatus.ACTIVE, ActivityAction.STARTED)
    );
  }

  async complete(
    actorId: number,
    projectId: number,
    sprintId: number
  ): Promise<ServiceResult<SprintDto>> {
    return runService('sprints.complete', () =>
      this.advance(actorId, projectId, sprintId, SprintStatus.COMPLETED, ActivityAction.COMPLETED)
    );
  }

  /**
   * Soft-delete the sprint and return its work items to the backlog in the
   * same transaction.
   */
  async delete(
    actorId: number,
    projectId: number,
    sprintId: number
  ): Promise<ServiceResult<{ movedToBacklog: number }>> {
    return runService('sprints.delete', () => {
      const actor = resolveActor(actorId);
      const { access, sprint } = requireManagedSprint(actor, projectId, sprintId);

      const movedToBacklog = transaction((tx) => {
        const now = nowIso();
        const moved = tx
          .prepare(
            `UPDATE work_items SET sprint_id = NULL, is_in_backlog = 1, updated_at = ?
             WHERE sprint_id = ?`
          )
          .run(now, sprint.id);
        tx.prepare(
          'UPDATE sprints SET is_deleted = 1, deleted_at = ?, deleted_by = ?, updated_at = ? WHERE id = ?'
        ).run(now, actor.userId, now, sprint.id);
        return moved.changes;
      });

      log.info({ sprintId: sprint.id, movedToBacklog }, 'Sprint deleted');
      logActivity({
        userId: actor.userId,
        action: ActivityAction.DELETED,
        entityType: EntityType.SPRINT,
        entityId: sprint.id,
        projectId: access.project.id,
        description: `Deleted sprint '${sprint.name}' and moved ${movedToBacklog} item(s) to the backlog`,
      });

      return success({ movedToBacklog });
    });
  }

  private advance(
    actorId: number,
    projectId: number,
    sprintId: number,
    target: SprintStatus,
    action: ActivityAction
  ): ServiceResult<SprintDto> {
    const actor = resolveActor(actorId);
    const { access, sprint } = requireManagedSprint(actor, projectId, sprintId);
    sprintLifecycle.assertTransition(sprint.status, target);

    const db = getDb();
    db.prepare('UPDATE sprints SET status = ?, updated_at = ? WHERE id = ?').run(
      target,
      nowIso(),
      sprint.id
    );

    logActivity({
      userId: actor.userId,
      action,
      entityType: EntityType.SPRINT,
      entityId: sprint.id,
      projectId: access.project.id,
      oldValue: sprint.status,
      newValue: target,
      description: `${action} sprint '${sprint.name}'`,
    });

    return success(loadSprintDto(db, sprint.id));
  }
}

export const sprintsService = new SprintsService();
