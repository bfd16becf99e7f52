import { getDb, fromFlag, insertedId, withUniqueGuard, transaction } from '../lib/db.js';
import type { Db } from '../lib/db.js';
import { nowIso } from '../lib/clock.js';
import { NotFoundError, ValidationError } from '../lib/errors.js';
import { runService, success, created } from '../lib/service-result.js';
import type { ServiceResult } from '../lib/service-result.js';
import { CoreStatusType, ActivityAction, EntityType } from '../types/index.js';
import type { WorkflowStatusDto } from '../types/index.js';
import type {
  CreateWorkflowStatusInput,
  UpdateWorkflowStatusInput,
  ReorderStatusesInput,
} from '../schemas/workflow-status.schema.js';
import type { WorkflowStatusRow } from './records.js';
import { resolveActor } from './identity.service.js';
import { requireProjectAccess, assertProjectScoped } from './access.helpers.js';
import { logActivity } from './audit.service.js';

export const DEFAULT_STATUS_COLOR = '#6B7280';

/** Seeded into every new project, in this order. */
export const CORE_STATUS_SEED = [
  { name: 'To Do', coreType: CoreStatusType.NEW, color: '#6B7280' },
  { name: 'In Progress', coreType: CoreStatusType.IN_PROGRESS, color: '#3B82F6' },
  { name: 'Review', coreType: CoreStatusType.REVIEW, color: '#8B5CF6' },
  { name: 'Done', coreType: CoreStatusType.DONE, color: '#10B981' },
] as const;

/** Insert the core statuses inside the caller's transaction; returns their ids in order. */
export function seedCoreStatuses(tx: Db, projectId: number, now: string): number[] {
  const insert = tx.prepare(
    `INSERT INTO workflow_statuses
       (project_id, name, sort_order, color, is_core, core_type, created_at, updated_at)
     VALUES (?, ?, ?, ?, 1, ?, ?, ?)`
  );
  return CORE_STATUS_SEED.map((status, index) =>
    insertedId(insert.run(projectId, status.name, index + 1, status.color, status.coreType, now, now))
  );
}

export function toStatusDto(row: WorkflowStatusRow): WorkflowStatusDto {
  return {
    id: row.id,
    projectId: row.project_id,
    name: row.name,
    description: row.description,
    order: row.sort_order,
    color: row.color,
    isCore: fromFlag(row.is_core),
    coreType: row.core_type,
  };
}

export function listProjectStatuses(db: Db, projectId: number): WorkflowStatusRow[] {
  return db
    .prepare<[number], WorkflowStatusRow>(
      'SELECT * FROM workflow_statuses WHERE project_id = ? AND is_deleted = 0 ORDER BY sort_order, id'
    )
    .all(projectId);
}

export function findProjectStatus(
  db: Db,
  projectId: number,
  statusId: number
): WorkflowStatusRow | undefined {
  return db
    .prepare<[number, number], WorkflowStatusRow>(
      'SELECT * FROM workflow_statuses WHERE id = ? AND project_id = ? AND is_deleted = 0'
    )
    .get(statusId, projectId);
}

/** Status new work items start in: core NEW, else the first by order. */
export function findDefaultStatus(db: Db, projectId: number): WorkflowStatusRow | undefined {
  const statuses = listProjectStatuses(db, projectId);
  return statuses.find((s) => s.core_type === CoreStatusType.NEW) ?? statuses[0];
}

function requireStatus(db: Db, projectId: number, statusId: number): WorkflowStatusRow {
  const status = findProjectStatus(db, projectId, statusId);
  if (!status) {
    throw new NotFoundError('Workflow status');
  }
  return status;
}

function assertNameAvailable(db: Db, projectId: number, name: string, exceptId?: number): void {
  const clash = db
    .prepare<[number, string, number], { id: number }>(
      'SELECT id FROM workflow_statuses WHERE project_id = ? AND name = ? AND is_deleted = 0 AND id != ?'
    )
    .get(projectId, name, exceptId ?? 0);
  if (clash) {
    throw new ValidationError(`A status named '${name}' already exists in this project`);
  }
}

class WorkflowStatusesService {
  async list(actorId: number, projectId: number): Promise<ServiceResult<WorkflowStatusDto[]>> {
    return runService('statuses.list', () => {
      const actor = resolveActor(actorId);
      const { project } = requireProjectAccess(actor, projectId, 'read');
      return success(listProjectStatuses(getDb(), project.id).map(toStatusDto));
    });
  }

  async getById(
    actorId: number,
    projectId: number,
    statusId: number
  ): Promise<ServiceResult<WorkflowStatusDto>> {
    return runService('statuses.getById', () => {
      const actor = resolveActor(actorId);
      const { project } = requireProjectAccess(actor, projectId, 'read');
      return success(toStatusDto(requireStatus(getDb(), project.id, statusId)));
    });
  }

  async create(
    actorId: number,
    projectId: number,
    input: CreateWorkflowStatusInput
  ): Promise<ServiceResult<WorkflowStatusDto>> {
    return runService('statuses.create', () => {
      const actor = resolveActor(actorId);
      const access = requireProjectAccess(actor, projectId, 'read');
      assertProjectScoped(actor, access, 'workflow_status', 'manage');
      const projectIdValue = access.project.id;

      const id = withUniqueGuard(`A status named '${input.name}' already exists in this project`, () =>
        transaction((tx) => {
          assertNameAvailable(tx, projectIdValue, input.name);
          const maxRow = tx
            .prepare<[number], { max_order: number | null }>(
              'SELECT MAX(sort_order) AS max_order FROM workflow_statuses WHERE project_id = ? AND is_deleted = 0'
            )
            .get(projectIdValue);
          const order = input.order ?? (maxRow?.max_order ?? 0) + 1;
          const now = nowIso();
          return insertedId(
            tx
              .prepare(
                `INSERT INTO workflow_statuses
                   (project_id, name, description, sort_order, color, is_core, core_type, created_at, updated_at)
                 VALUES (?, ?, ?, ?, ?, 0, NULL, ?, ?)`
              )
              .run(
                projectIdValue,
                input.name,
                input.description ?? null,
                order,
                input.color ?? DEFAULT_STATUS_COLOR,
                now,
                now
              )
          );
        })
      );

      logActivity({
        userId: actor.userId,
        action: ActivityAction.CREATED,
        entityType: EntityType.WORKFLOW_STATUS,
        entityId: id,
        projectId: projectIdValue,
        description: `Created status '${input.name}'`,
      });

      return created(toStatusDto(requireStatus(getDb(), projectIdValue, id)));
    });
  }

  async update(
    actorId: number,
    projectId: number,
    statusId: number,
    input: UpdateWorkflowStatusInput
  ): Promise<ServiceResult<WorkflowStatusDto>> {
    return runService('statuses.update', () => {
      const actor = resolveActor(actorId);
      const access = requireProjectAccess(actor, projectId, 'read');
      const db = getDb();
      const status = requireStatus(db, access.project.id, statusId);
      assertProjectScoped(actor, access, 'workflow_status', 'manage');

      const renaming = input.name !== undefined && input.name !== status.name;
      if (renaming && fromFlag(status.is_core)) {
        throw new ValidationError(`Core status '${status.name}' cannot be renamed`);
      }

      const nextName = input.name ?? status.name;
      withUniqueGuard(`A status named '${nextName}' already exists in this project`, () =>
        transaction((tx) => {
          if (renaming) {
            assertNameAvailable(tx, status.project_id, nextName, status.id);
          }
          tx.prepare(
            `UPDATE workflow_statuses
             SET name = ?, description = ?, color = ?, sort_order = ?, updated_at = ?
             WHERE id = ?`
          ).run(
            nextName,
            input.description !== undefined ? input.description : status.description,
            input.color ?? status.color,
            input.order ?? status.sort_order,
            nowIso(),
            status.id
          );
        })
      );

      logActivity({
        userId: actor.userId,
        action: ActivityAction.UPDATED,
        entityType: EntityType.WORKFLOW_STATUS,
        entityId: status.id,
        projectId: status.project_id,
        oldValue: renaming ? status.name : null,
        newValue: renaming ? nextName : null,
        description: `Updated status '${nextName}'`,
      });

      return success(toStatusDto(requireStatus(db, status.project_id, status.id)));
    });
  }

  async delete(actorId: number, projectId: number, statusId: number): Promise<ServiceResult<null>> {
    return runService('statuses.delete', () => {
      const actor = resolveActor(actorId);
      const access = requireProjectAccess(actor, projectId, 'read');
      const db = getDb();
      const status = requireStatus(db, access.project.id, statusId);
      assertProjectScoped(actor, access, 'workflow_status', 'manage');

      if (fromFlag(status.is_core)) {
        throw new ValidationError(`Core status '${status.name}' cannot be deleted`);
      }

      transaction((tx) => {
        const inUse = tx
          .prepare<[number], { total: number }>(
            'SELECT COUNT(*) AS total FROM work_items WHERE status_id = ? AND is_deleted = 0'
          )
          .get(status.id);
        if (inUse && inUse.total > 0) {
          throw new ValidationError(
            `Status '${status.name}' is used by ${inUse.total} work item(s) and cannot be deleted`,
            { workItemCount: inUse.total }
          );
        }
        const now = nowIso();
        tx.prepare(
          'UPDATE workflow_statuses SET is_deleted = 1, deleted_at = ?, deleted_by = ?, updated_at = ? WHERE id = ?'
        ).run(now, actor.userId, now, status.id);
        tx.prepare('DELETE FROM board_columns WHERE status_id = ?').run(status.id);
      });

      logActivity({
        userId: actor.userId,
        action: ActivityAction.DELETED,
        entityType: EntityType.WORKFLOW_STATUS,
        entityId: status.id,
        projectId: status.project_id,
        description: `Deleted status '${status.name}'`,
      });

      return success(null);
    });
  }

  /**
   * Assign order 1..N following `statusIds`. Ids that are not live statuses
   * of this project are skipped but still take up their position; statuses
   * left out of the list keep their current order.
   */
  async reorder(
    actorId: number,
    projectId: number,
    input: ReorderStatusesInput
  ): Promise<ServiceResult<WorkflowStatusDto[]>> {
    return runService('statuses.reorder', () => {
      const actor = resolveActor(actorId);
      const access = requireProjectAccess(actor, projectId, 'read');
      assertProjectScoped(actor, access, 'workflow_status', 'manage');
      const id = access.project.id;

      transaction((tx) => {
        const setOrder = tx.prepare(
          `UPDATE workflow_statuses SET sort_order = ?, updated_at = ?
           WHERE id = ? AND project_id = ? AND is_deleted = 0`
        );
        const now = nowIso();
        input.statusIds.forEach((statusId, index) => {
          setOrder.run(index + 1, now, statusId, id);
        });
      });

      logActivity({
        userId: actor.userId,
        action: ActivityAction.REORDERED,
        entityType: EntityType.PROJECT,
        entityId: id,
        projectId: id,
        newValue: input.statusIds.join(','),
        description: 'Reordered workflow statuses',
      });

      return success(listProjectStatuses(getDb(), id).map(toStatusDto));
    });
  }
}

export const workflowStatusesService = new WorkflowStatusesService();
