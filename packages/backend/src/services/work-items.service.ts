import { getDb, fromFlag, toFlag, insertedId, transaction, withSequenceRetry } from '../lib/db.js';
import type { Db } from '../lib/db.js';
import { nowIso } from '../lib/clock.js';
import { NotFoundError, ValidationError } from '../lib/errors.js';
import { moduleLogger } from '../lib/logger.js';
import { runService, success, created } from '../lib/service-result.js';
import type { ServiceResult } from '../lib/service-result.js';
import { authorize, assertAllowed } from '../engine/access/index.js';
import type { ActorContext, AccessAction } from '../engine/access/index.js';
import { assertLegalChild, wouldCreateCycle } from '../engine/graph/index.js';
import { ActivityAction, EntityType } from '../types/index.js';
import type { WorkItemDto, WorkItemType } from '../types/index.js';
import type {
  CreateWorkItemInput,
  UpdateWorkItemInput,
  WorkItemFiltersInput,
  MoveToSprintInput,
} from '../schemas/work-item.schema.js';
import type { WorkItemRow } from './records.js';
import type { ProjectAccess } from './access.helpers.js';
import { resolveActor } from './identity.service.js';
import {
  requireProjectAccess,
  requireWorkItemAccess,
  requireCompanyUser,
} from './access.helpers.js';
import { findProjectStatus, findDefaultStatus } from './workflow-statuses.service.js';
import { findProjectSprint } from './sprints.service.js';
import { logActivity } from './audit.service.js';

const log = moduleLogger('work-items');

interface WorkItemViewRow extends WorkItemRow {
  project_key: string;
  status_name: string;
  status_color: string;
  assignee_first_name: string | null;
  assignee_last_name: string | null;
  parent_number: number | null;
  child_count: number;
}

const SELECT_WORK_ITEM = `
  SELECT w.*,
    p.key AS project_key,
    s.name AS status_name,
    s.color AS status_color,
    u.first_name AS assignee_first_name,
    u.last_name AS assignee_last_name,
    pw.item_number AS parent_number,
    (SELECT COUNT(*) FROM work_items c WHERE c.parent_id = w.id AND c.is_deleted = 0) AS child_count
  FROM work_items w
  JOIN projects p ON p.id = w.project_id
  JOIN workflow_statuses s ON s.id = w.status_id
  LEFT JOIN users u ON u.id = w.assigned_to_id
  LEFT JOIN work_items pw ON pw.id = w.parent_id`;

const ORDER_WORK_ITEMS = 'ORDER BY w.queue_order IS NULL, w.queue_order, w.item_number';

export function formatItemKey(projectKey: string, itemNumber: number): string {
  return `${projectKey}-${itemNumber}`;
}

function toWorkItemDto(row: WorkItemViewRow): WorkItemDto {
  return {
    id: row.id,
    projectId: row.project_id,
    itemNumber: row.item_number,
    itemKey: formatItemKey(row.project_key, row.item_number),
    title: row.title,
    description: row.description,
    type: row.type,
    priority: row.priority,
    dueDate: row.due_date,
    estimatedHours: row.estimated_hours,
    actualHours: row.actual_hours,
    statusId: row.status_id,
    statusName: row.status_name,
    statusColor: row.status_color,
    assignedToId: row.assigned_to_id,
    assignedToName:
      row.assignee_first_name !== null && row.assignee_last_name !== null
        ? `${row.assignee_first_name} ${row.assignee_last_name}`
        : null,
    sprintId: row.sprint_id,
    isInBacklog: fromFlag(row.is_in_backlog),
    queueOrder: row.queue_order,
    parentId: row.parent_id,
    parentKey: row.parent_number !== null ? formatItemKey(row.project_key, row.parent_number) : null,
    childCount: row.child_count,
    createdById: row.created_by_id,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

function loadWorkItemDto(db: Db, id: number): WorkItemDto {
  const row = db
    .prepare<[number], WorkItemViewRow>(`${SELECT_WORK_ITEM} WHERE w.id = ?`)
    .get(id);
  if (!row) {
    throw new NotFoundError('Work item');
  }
  return toWorkItemDto(row);
}

function findProjectItem(db: Db, projectId: number, id: number): WorkItemRow | undefined {
  return db
    .prepare<[number, number], WorkItemRow>(
      'SELECT * FROM work_items WHERE id = ? AND project_id = ? AND is_deleted = 0'
    )
    .get(id, projectId);
}

function canSee(actor: ActorContext, access: ProjectAccess, row: WorkItemRow, action: AccessAction): boolean {
  return authorize(actor, action, {
    kind: 'work_item',
    companyId: access.project.company_id,
    membership: access.membership,
    createdById: row.created_by_id,
    assignedToId: row.assigned_to_id,
  }).allowed;
}

function requireParent(db: Db, projectId: number, parentId: number): WorkItemRow {
  const parent = findProjectItem(db, projectId, parentId);
  if (!parent) {
    throw new ValidationError('Parent work item not found in this project', { parentId });
  }
  return parent;
}

function requireSprintInProject(db: Db, projectId: number, sprintId: number): number {
  const sprint = findProjectSprint(db, projectId, sprintId);
  if (!sprint) {
    throw new ValidationError('Sprint not found in this project', { sprintId });
  }
  return sprint.id;
}

function requireStatusInProject(db: Db, projectId: number, statusId: number): { id: number; name: string } {
  const status = findProjectStatus(db, projectId, statusId);
  if (!status) {
    throw new ValidationError('Status does not belong to this project', { statusId });
  }
  return status;
}

/** Every live child must stay legal under `type`. */
function assertChildrenFit(db: Db, itemId: number, type: WorkItemType): void {
  const children = db
    .prepare<[number], { type: WorkItemType }>(
      'SELECT type FROM work_items WHERE parent_id = ? AND is_deleted = 0'
    )
    .all(itemId);
  for (const child of children) {
    assertLegalChild(type, child.type);
  }
}

/**
 * Resolve the sprint/backlog pair after an update. The two stay mutually
 * exclusive: a sprint means not in backlog, no sprint means backlog.
 */
function resolvePlacement(
  db: Db,
  item: WorkItemRow,
  input: Pick<UpdateWorkItemInput, 'sprintId' | 'isInBacklog'>
): number | null {
  let sprintId = item.sprint_id;
  if (input.sprintId !== undefined) {
    sprintId = input.sprintId === null ? null : requireSprintInProject(db, item.project_id, input.sprintId);
  }
  if (input.isInBacklog === true) {
    if (typeof input.sprintId === 'number') {
      throw new ValidationError('A work item cannot be in a sprint and the backlog at once');
    }
    sprintId = null;
  }
  if (input.isInBacklog === false && sprintId === null) {
    throw new ValidationError('A work item outside the backlog must belong to a sprint');
  }
  return sprintId;
}

class WorkItemsService {
  async list(
    actorId: number,
    projectId: number,
    filters: WorkItemFiltersInput
  ): Promise<ServiceResult<WorkItemDto[]>> {
    return runService('workItems.list', () => {
      const actor = resolveActor(actorId);
      const access = requireProjectAccess(actor, projectId, 'read');

      const clauses = ['w.project_id = ?', 'w.is_deleted = 0'];
      const params: unknown[] = [access.project.id];
      if (filters.sprintId !== undefined) {
        clauses.push('w.sprint_id = ?');
        params.push(filters.sprintId);
      }
      if (filters.backlog !== undefined) {
        clauses.push('w.is_in_backlog = ?');
        params.push(toFlag(filters.backlog));
      }
      if (filters.assignedToId !== undefined) {
        clauses.push('w.assigned_to_id = ?');
        params.push(filters.assignedToId);
      }
      if (filters.statusId !== undefined) {
        clauses.push('w.status_id = ?');
        params.push(filters.statusId);
      }
      if (filters.parentId !== undefined) {
        clauses.push('w.parent_id = ?');
        params.push(filters.parentId);
      }
      if (filters.type !== undefined) {
        clauses.push('w.type = ?');
        params.push(filters.type);
      }
      if (filters.search !== undefined) {
        clauses.push('(w.title LIKE ? OR w.description LIKE ?)');
        params.push(`%${filters.search}%`, `%${filters.search}%`);
      }

      const rows = getDb()
        .prepare<unknown[], WorkItemViewRow>(
          `${SELECT_WORK_ITEM} WHERE ${clauses.join(' AND ')} ${ORDER_WORK_ITEMS}`
        )
        .all(...params);

      return success(rows.filter((row) => canSee(actor, access, row, 'read')).map(toWorkItemDto));
    });
  }

  async getById(actorId: number, projectId: number, id: number): Promise<ServiceResult<WorkItemDto>> {
    return runService('workItems.getById', () => {
      const actor = resolveActor(actorId);
      const { item } = requireWorkItemAccess(actor, projectId, id, 'read');
      return success(loadWorkItemDto(getDb(), item.id));
    });
  }

  async listChildren(
    actorId: number,
    projectId: number,
    id: number
  ): Promise<ServiceResult<WorkItemDto[]>> {
    return runService('workItems.listChildren', () => {
      const actor = resolveActor(actorId);
      const { project, membership, item } = requireWorkItemAccess(actor, projectId, id, 'read');
      const rows = getDb()
        .prepare<[number], WorkItemViewRow>(
          `${SELECT_WORK_ITEM} WHERE w.parent_id = ? AND w.is_deleted = 0 ${ORDER_WORK_ITEMS}`
        )
        .all(item.id);
      const access = { project, membership };
      return success(rows.filter((row) => canSee(actor, access, row, 'read')).map(toWorkItemDto));
    });
  }

  async create(
    actorId: number,
    projectId: number,
    input: CreateWorkItemInput
  ): Promise<ServiceResult<WorkItemDto>> {
    return runService('workItems.create', () => {
      const actor = resolveActor(actorId);
      const { project, membership } = requireProjectAccess(actor, projectId, 'read');
      assertAllowed(
        authorize(actor, 'create', {
          kind: 'work_item',
          companyId: project.company_id,
          membership,
          createdById: actor.userId,
          assignedToId: input.assignedToId ?? null,
        })
      );

      const db = getDb();
      if (input.assignedToId !== undefined) {
        requireCompanyUser(db, input.assignedToId, project.company_id, 'Assignee must be a user of this company');
      }
      const sprintId =
        input.sprintId !== undefined ? requireSprintInProject(db, project.id, input.sprintId) : null;
      if (input.parentId !== undefined) {
        assertLegalChild(requireParent(db, project.id, input.parentId).type, input.type);
      }
      let statusId: number;
      if (input.statusId !== undefined) {
        statusId = requireStatusInProject(db, project.id, input.statusId).id;
      } else {
        const fallback = findDefaultStatus(db, project.id);
        if (!fallback) {
          throw new ValidationError('Project has no workflow statuses');
        }
        statusId = fallback.id;
      }

      const id = withSequenceRetry('work-item number', () =>
        transaction((tx) => {
          // Deleted items keep their numbers; numbers are never reused.
          const maxRow = tx
            .prepare<[number], { max_number: number | null }>(
              'SELECT MAX(item_number) AS max_number FROM work_items WHERE project_id = ?'
            )
            .get(project.id);
          const itemNumber = (maxRow?.max_number ?? 0) + 1;
          const now = nowIso();
          return insertedId(
            tx
              .prepare(
                `INSERT INTO work_items
                   (project_id, item_number, title, description, type, priority, due_date,
                    estimated_hours, status_id, assigned_to_id, sprint_id, is_in_backlog,
                    parent_id, created_by_id, created_at, updated_at)
                 VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`
              )
              .run(
                project.id,
                itemNumber,
                input.title,
                input.description ?? null,
                input.type,
                input.priority,
                input.dueDate ? input.dueDate.toISOString() : null,
                input.estimatedHours ?? null,
                statusId,
                input.assignedToId ?? null,
                sprintId,
                toFlag(sprintId === null),
                input.parentId ?? null,
                actor.userId,
                now,
                now
              )
          );
        })
      );

      const dto = loadWorkItemDto(db, id);
      log.debug({ workItemId: id, itemKey: dto.itemKey }, 'Work item created');
      logActivity({
        userId: actor.userId,
        action: ActivityAction.CREATED,
        entityType: EntityType.WORK_ITEM,
        entityId: id,
        projectId: project.id,
        workItemId: id,
        description: `Created ${dto.type} ${dto.itemKey}: ${dto.title}`,
      });

      return created(dto);
    });
  }

  async update(
    actorId: number,
    projectId: number,
    id: number,
    input: UpdateWorkItemInput
  ): Promise<ServiceResult<WorkItemDto>> {
    return runService('workItems.update', () => {
      const actor = resolveActor(actorId);
      const { project, item } = requireWorkItemAccess(actor, projectId, id, 'update');
      const db = getDb();

      const type = input.type ?? item.type;

      let parentId = item.parent_id;
      if (input.parentId !== undefined) {
        if (input.parentId === 0) {
          parentId = null;
        } else {
          if (input.parentId === item.id) {
            throw new ValidationError('A work item cannot be its own parent');
          }
          const parent = requireParent(db, project.id, input.parentId);
          const parentOf = (nodeId: number): number | null =>
            db
              .prepare<[number], { parent_id: number | null }>(
                'SELECT parent_id FROM work_items WHERE id = ?'
              )
              .get(nodeId)?.parent_id ?? null;
          if (wouldCreateCycle(item.id, parent.id, parentOf)) {
            throw new ValidationError('Moving this item under the chosen parent would create a cycle');
          }
          parentId = parent.id;
        }
      }
      if (parentId !== null && (input.type !== undefined || input.parentId !== undefined)) {
        // A soft-deleted parent no longer constrains the type.
        const parent = findProjectItem(db, project.id, parentId);
        if (parent) {
          assertLegalChild(parent.type, type);
        }
      }
      if (input.type !== undefined && input.type !== item.type) {
        assertChildrenFit(db, item.id, input.type);
      }

      let oldStatusName: string | null = null;
      let newStatusName: string | null = null;
      let statusId = item.status_id;
      if (input.statusId !== undefined && input.statusId !== item.status_id) {
        const next = requireStatusInProject(db, project.id, input.statusId);
        const previous = findProjectStatus(db, project.id, item.status_id);
        oldStatusName = previous ? previous.name : null;
        newStatusName = next.name;
        statusId = next.id;
      }

      let assignedToId = item.assigned_to_id;
      if (input.assignedToId !== undefined) {
        assignedToId =
          input.assignedToId === null
            ? null
            : requireCompanyUser(db, input.assignedToId, project.company_id, 'Assignee must be a user of this company').id;
      }

      const sprintId = resolvePlacement(db, item, input);

      db.prepare(
        `UPDATE work_items SET
           title = ?, description = ?, type = ?, priority = ?, due_date = ?,
           estimated_hours = ?, actual_hours = ?, status_id = ?, assigned_to_id = ?,
           sprint_id = ?, is_in_backlog = ?, queue_order = ?, parent_id = ?, updated_at = ?
         WHERE id = ?`
      ).run(
        input.title ?? item.title,
        input.description !== undefined ? input.description : item.description,
        type,
        input.priority ?? item.priority,
        input.dueDate !== undefined ? (input.dueDate ? input.dueDate.toISOString() : null) : item.due_date,
        input.estimatedHours !== undefined ? input.estimatedHours : item.estimated_hours,
        input.actualHours !== undefined ? input.actualHours : item.actual_hours,
        statusId,
        assignedToId,
        sprintId,
        toFlag(sprintId === null),
        input.queueOrder !== undefined ? input.queueOrder : item.queue_order,
        parentId,
        nowIso(),
        item.id
      );

      const dto = loadWorkItemDto(db, item.id);
      if (statusId !== item.status_id) {
        logActivity({
          userId: actor.userId,
          action: ActivityAction.STATUS_CHANGED,
          entityType: EntityType.WORK_ITEM,
          entityId: item.id,
          projectId: project.id,
          workItemId: item.id,
          oldValue: oldStatusName,
          newValue: newStatusName,
          description: `Changed status of ${dto.itemKey} from '${oldStatusName ?? ''}' to '${newStatusName ?? ''}'`,
        });
      }
      const otherFieldsChanged = Object.entries(input).some(
        ([key, value]) => key !== 'statusId' && value !== undefined
      );
      if (otherFieldsChanged) {
        logActivity({
          userId: actor.userId,
          action: ActivityAction.UPDATED,
          entityType: EntityType.WORK_ITEM,
          entityId: item.id,
          projectId: project.id,
          workItemId: item.id,
          description: `Updated ${dto.itemKey}`,
        });
      }

      return success(dto);
    });
  }

  /** Soft delete. Children keep their parent reference. */
  async delete(actorId: number, projectId: number, id: number): Promise<ServiceResult<null>> {
    return runService('workItems.delete', () => {
      const actor = resolveActor(actorId);
      const { project, item } = requireWorkItemAccess(actor, projectId, id, 'delete');
      const now = nowIso();
      getDb()
        .prepare(
          'UPDATE work_items SET is_deleted = 1, deleted_at = ?, deleted_by = ?, updated_at = ? WHERE id = ?'
        )
        .run(now, actor.userId, now, item.id);

      logActivity({
        userId: actor.userId,
        action: ActivityAction.DELETED,
        entityType: EntityType.WORK_ITEM,
        entityId: item.id,
        projectId: project.id,
        workItemId: item.id,
        description: `Deleted ${formatItemKey(project.key, item.item_number)}`,
      });

      return success(null);
    });
  }

  /**
   * Bulk move into a sprint, or back to the backlog when `sprintId` is null.
   * All or nothing: one item the actor may not update rejects the whole move.
   */
  async moveToSprint(
    actorId: number,
    projectId: number,
    input: MoveToSprintInput
  ): Promise<ServiceResult<WorkItemDto[]>> {
    return runService('workItems.moveToSprint', () => {
      const actor = resolveActor(actorId);
      const { project } = requireProjectAccess(actor, projectId, 'read');
      const db = getDb();
      const sprintId =
        input.sprintId === null ? null : requireSprintInProject(db, project.id, input.sprintId);

      const ids = [...new Set(input.workItemIds)];
      const items = ids.map((id) => requireWorkItemAccess(actor, project.id, id, 'update').item);

      transaction((tx) => {
        const move = tx.prepare(
          'UPDATE work_items SET sprint_id = ?, is_in_backlog = ?, updated_at = ? WHERE id = ?'
        );
        const now = nowIso();
        for (const item of items) {
          move.run(sprintId, toFlag(sprintId === null), now, item.id);
        }
      });

      for (const item of items) {
        logActivity({
          userId: actor.userId,
          action: ActivityAction.UPDATED,
          entityType: EntityType.WORK_ITEM,
          entityId: item.id,
          projectId: project.id,
          workItemId: item.id,
          oldValue: item.sprint_id !== null ? String(item.sprint_id) : null,
          newValue: sprintId !== null ? String(sprintId) : null,
          description:
            sprintId === null
              ? `Moved ${formatItemKey(project.key, item.item_number)} to the backlog`
              : `Moved ${formatItemKey(project.key, item.item_number)} to sprint ${sprintId}`,
        });
      }

      return success(items.map((item) => loadWorkItemDto(db, item.id)));
    });
  }
}

export const workItemsService = new WorkItemsService();
