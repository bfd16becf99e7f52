import { getDb } from '../lib/db.js';
import { nowIso } from '../lib/clock.js';
import { moduleLogger } from '../lib/logger.js';
import { ForbiddenError } from '../lib/errors.js';
import { hasSystemRole } from '../lib/permissions.js';
import { runService, success } from '../lib/service-result.js';
import type { ServiceResult } from '../lib/service-result.js';
import { SystemRole } from '../types/index.js';
import type {
  ActivityAction,
  ActivityLogDto,
  EntityType,
  PaginatedResponse,
} from '../types/index.js';
import type {
  CompanyActivityFiltersInput,
  ProjectActivityFiltersInput,
} from '../schemas/activity-log.schema.js';
import type { ActivityLogRow } from './records.js';
import { resolveActor } from './identity.service.js';
import {
  requireProjectAccess,
  requireWorkItemAccess,
  requireFileTicketAccess,
} from './access.helpers.js';

const log = moduleLogger('audit');

// ============================================================================
// Audit sink
// ============================================================================

export interface ActivityEntry {
  userId: number;
  action: ActivityAction;
  entityType: EntityType;
  entityId: number;
  description?: string;
  oldValue?: string | null;
  newValue?: string | null;
  projectId?: number | null;
  workItemId?: number | null;
  fileTicketId?: number | null;
}

/**
 * Append one activity row. Called after the primary write has committed and
 * never throws: a failed append is logged and dropped.
 */
export function logActivity(entry: ActivityEntry): void {
  try {
    getDb()
      .prepare(
        `INSERT INTO activity_logs
           (user_id, action, entity_type, entity_id, old_value, new_value, description,
            project_id, work_item_id, file_ticket_id, timestamp)
         VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`
      )
      .run(
        entry.userId,
        entry.action,
        entry.entityType,
        entry.entityId,
        entry.oldValue ?? null,
        entry.newValue ?? null,
        entry.description ?? null,
        entry.projectId ?? null,
        entry.workItemId ?? null,
        entry.fileTicketId ?? null,
        nowIso()
      );
  } catch (error) {
    log.warn(
      { err: error, action: entry.action, entityType: entry.entityType, entityId: entry.entityId },
      'Failed to write activity log entry'
    );
  }
}

// ============================================================================
// Queries
// ============================================================================

interface ActivityLogJoinedRow extends ActivityLogRow {
  first_name: string;
  last_name: string;
  project_name: string | null;
}

const SELECT_ACTIVITY = `
  SELECT a.*, u.first_name, u.last_name, p.name AS project_name
  FROM activity_logs a
  JOIN users u ON u.id = a.user_id
  LEFT JOIN projects p ON p.id = a.project_id`;

function toActivityLogDto(row: ActivityLogJoinedRow): ActivityLogDto {
  return {
    id: row.id,
    action: row.action,
    entityType: row.entity_type,
    entityId: row.entity_id,
    oldValue: row.old_value,
    newValue: row.new_value,
    description: row.description,
    timestamp: row.timestamp,
    userId: row.user_id,
    userName: `${row.first_name} ${row.last_name}`,
    projectId: row.project_id,
    projectName: row.project_name,
  };
}

/** Collects WHERE fragments and their parameters in order. */
class ActivityQuery {
  private readonly clauses: string[] = [];
  private readonly params: unknown[] = [];

  where(clause: string, ...params: unknown[]): this {
    this.clauses.push(clause);
    this.params.push(...params);
    return this;
  }

  dateRange(startDate?: Date, endDate?: Date): this {
    if (startDate) {
      this.where('a.timestamp >= ?', startDate.toISOString());
    }
    if (endDate) {
      // Inclusive of the whole end day.
      const endOfDay = new Date(endDate);
      endOfDay.setUTCHours(0, 0, 0, 0);
      endOfDay.setUTCDate(endOfDay.getUTCDate() + 1);
      this.where('a.timestamp < ?', endOfDay.toISOString());
    }
    return this;
  }

  private whereSql(): string {
    return this.clauses.length > 0 ? ` WHERE ${this.clauses.join(' AND ')}` : '';
  }

  all(): ActivityLogDto[] {
    return getDb()
      .prepare<unknown[], ActivityLogJoinedRow>(
        `${SELECT_ACTIVITY}${this.whereSql()} ORDER BY a.timestamp DESC, a.id DESC`
      )
      .all(...this.params)
      .map(toActivityLogDto);
  }

  page(page: number, limit: number): PaginatedResponse<ActivityLogDto> {
    const db = getDb();
    const countRow = db
      .prepare<unknown[], { total: number }>(
        `SELECT COUNT(*) AS total FROM activity_logs a
         JOIN users u ON u.id = a.user_id${this.whereSql()}`
      )
      .get(...this.params);
    const total = countRow ? countRow.total : 0;

    const data = db
      .prepare<unknown[], ActivityLogJoinedRow>(
        `${SELECT_ACTIVITY}${this.whereSql()} ORDER BY a.timestamp DESC, a.id DESC LIMIT ? OFFSET ?`
      )
      .all(...this.params, limit, (page - 1) * limit)
      .map(toActivityLogDto);

    return {
      data,
      pagination: {
        page,
        limit,
        total,
        totalPages: Math.ceil(total / limit),
      },
    };
  }
}

/** Company-wide activity. Admins and above only. */
export async function listCompanyActivity(
  actorId: number,
  filters: CompanyActivityFiltersInput
): Promise<ServiceResult<PaginatedResponse<ActivityLogDto>>> {
  return runService('activity.listCompany', () => {
    const actor = resolveActor(actorId);
    if (!hasSystemRole(actor.systemRole, SystemRole.ADMIN)) {
      throw new ForbiddenError('Only administrators can view company activity');
    }

    const query = new ActivityQuery()
      .where('u.company_id = ?', actor.companyId)
      .dateRange(filters.startDate, filters.endDate);
    if (filters.userId !== undefined) query.where('a.user_id = ?', filters.userId);
    if (filters.projectId !== undefined) query.where('a.project_id = ?', filters.projectId);

    return success(query.page(filters.page, filters.limit));
  });
}

export async function listProjectActivity(
  actorId: number,
  projectId: number,
  filters: ProjectActivityFiltersInput
): Promise<ServiceResult<PaginatedResponse<ActivityLogDto>>> {
  return runService('activity.listProject', () => {
    const actor = resolveActor(actorId);
    const { project } = requireProjectAccess(actor, projectId, 'read');

    const query = new ActivityQuery()
      .where('a.project_id = ?', project.id)
      .dateRange(filters.startDate, filters.endDate);
    if (filters.userId !== undefined) query.where('a.user_id = ?', filters.userId);
    if (filters.entityType !== undefined) query.where('a.entity_type = ?', filters.entityType);
    if (filters.entityId !== undefined) query.where('a.entity_id = ?', filters.entityId);

    return success(query.page(filters.page, filters.limit));
  });
}

export async function listWorkItemActivity(
  actorId: number,
  projectId: number,
  workItemId: number
): Promise<ServiceResult<ActivityLogDto[]>> {
  return runService('activity.listWorkItem', () => {
    const actor = resolveActor(actorId);
    const { item } = requireWorkItemAccess(actor, projectId, workItemId, 'read');
    return success(new ActivityQuery().where('a.work_item_id = ?', item.id).all());
  });
}

export async function listFileTicketActivity(
  actorId: number,
  projectId: number,
  fileTicketId: number
): Promise<ServiceResult<ActivityLogDto[]>> {
  return runService('activity.listFileTicket', () => {
    const actor = resolveActor(actorId);
    const { ticket } = requireFileTicketAccess(actor, projectId, fileTicketId, 'read');
    return success(new ActivityQuery().where('a.file_ticket_id = ?', ticket.id).all());
  });
}
