import { getDb } from '../lib/db.js';
import type { Db } from '../lib/db.js';
import { runService, success } from '../lib/service-result.js';
import type { ServiceResult } from '../lib/service-result.js';
import { fileTicketLifecycle } from '../engine/graph/index.js';
import { CoreStatusType, WorkItemType, Priority, SprintStatus } from '../types/index.js';
import type { DashboardDto, FileTicketStatus, MemberWorkloadDto, SprintCountDto } from '../types/index.js';
import type { WorkflowStatusRow } from './records.js';
import { resolveActor } from './identity.service.js';
import { requireProjectAccess } from './access.helpers.js';

interface StatusCountRow extends Pick<WorkflowStatusRow, 'id' | 'name' | 'color' | 'core_type'> {
  count: number;
}

interface GroupCountRow<K> {
  bucket: K;
  count: number;
}

interface SprintCountRow {
  id: number;
  name: string;
  status: SprintStatus;
  count: number;
}

interface WorkloadRow {
  user_id: number;
  full_name: string;
  assigned: number;
  completed: number;
}

const LIVE_ITEM = 'w.project_id = s.project_id AND w.is_deleted = 0';

/** Every key of `keys`, in order, with zero where nothing was counted. */
function countsFor<K extends string>(keys: readonly K[], rows: GroupCountRow<K>[]): { key: K; count: number }[] {
  const counted = new Map<K, number>(rows.map((row) => [row.bucket, row.count]));
  return keys.map((key) => ({ key, count: counted.get(key) ?? 0 }));
}

function groupItems<K extends string>(db: Db, projectId: number, column: 'type' | 'priority'): GroupCountRow<K>[] {
  return db
    .prepare<[number], GroupCountRow<K>>(
      `SELECT ${column} AS bucket, COUNT(*) AS count FROM work_items
       WHERE project_id = ? AND is_deleted = 0 GROUP BY ${column}`
    )
    .all(projectId);
}

function sumWhere(rows: StatusCountRow[], coreType: CoreStatusType): number {
  return rows.filter((row) => row.core_type === coreType).reduce((total, row) => total + row.count, 0);
}

function loadWorkload(db: Db, projectId: number): MemberWorkloadDto[] {
  const rows = db
    .prepare<[number], WorkloadRow>(
      `SELECT m.user_id, u.first_name || ' ' || u.last_name AS full_name,
         (SELECT COUNT(*) FROM work_items w
           WHERE w.project_id = m.project_id AND w.is_deleted = 0 AND w.assigned_to_id = m.user_id) AS assigned,
         (SELECT COUNT(*) FROM work_items w
           JOIN workflow_statuses ws ON ws.id = w.status_id
           WHERE w.project_id = m.project_id AND w.is_deleted = 0 AND w.assigned_to_id = m.user_id
             AND ws.core_type = '${CoreStatusType.DONE}') AS completed
       FROM project_members m
       JOIN users u ON u.id = m.user_id AND u.is_deleted = 0
       WHERE m.project_id = ? AND m.is_deleted = 0
       ORDER BY u.last_name, u.first_name`
    )
    .all(projectId);
  return rows.map((row) => ({
    userId: row.user_id,
    fullName: row.full_name,
    assigned: row.assigned,
    completed: row.completed,
  }));
}

class DashboardService {
  /**
   * Project-wide counts. Anyone who can read the project sees the totals,
   * including those of items they cannot open.
   */
  async get(actorId: number, projectId: number): Promise<ServiceResult<DashboardDto>> {
    return runService('dashboard.get', () => {
      const actor = resolveActor(actorId);
      const { project } = requireProjectAccess(actor, projectId, 'read');
      const db = getDb();

      const statuses = db
        .prepare<[number], StatusCountRow>(
          `SELECT s.id, s.name, s.color, s.core_type,
             (SELECT COUNT(*) FROM work_items w WHERE w.status_id = s.id AND ${LIVE_ITEM}) AS count
           FROM workflow_statuses s
           WHERE s.project_id = ? AND s.is_deleted = 0
           ORDER BY s.sort_order, s.id`
        )
        .all(project.id);

      const sprints = db
        .prepare<[number], SprintCountRow>(
          `SELECT s.id, s.name, s.status,
             (SELECT COUNT(*) FROM work_items w WHERE w.sprint_id = s.id AND ${LIVE_ITEM}) AS count
           FROM sprints s
           WHERE s.project_id = ? AND s.is_deleted = 0
           ORDER BY s.start_date, s.id`
        )
        .all(project.id);
      const bySprint: SprintCountDto[] = sprints.map((row) => ({
        sprintId: row.id,
        name: row.name,
        status: row.status,
        count: row.count,
      }));

      const backlog = db
        .prepare<[number], { count: number }>(
          'SELECT COUNT(*) AS count FROM work_items WHERE project_id = ? AND is_deleted = 0 AND is_in_backlog = 1'
        )
        .get(project.id);

      const ticketStatuses = db
        .prepare<[number], { status: FileTicketStatus }>(
          'SELECT status FROM file_tickets WHERE project_id = ? AND is_deleted = 0'
        )
        .all(project.id);

      const byType = countsFor(Object.values(WorkItemType), groupItems<WorkItemType>(db, project.id, 'type'));
      const byPriority = countsFor(Object.values(Priority), groupItems<Priority>(db, project.id, 'priority'));

      return success({
        projectId: project.id,
        totalWorkItems: byType.reduce((total, entry) => total + entry.count, 0),
        completedWorkItems: sumWhere(statuses, CoreStatusType.DONE),
        inProgressWorkItems: sumWhere(statuses, CoreStatusType.IN_PROGRESS),
        blockedWorkItems: sumWhere(statuses, CoreStatusType.BLOCKED),
        backlogWorkItems: backlog?.count ?? 0,
        totalSprints: sprints.length,
        activeSprints: sprints.filter((row) => row.status === SprintStatus.ACTIVE).length,
        totalFileTickets: ticketStatuses.length,
        openFileTickets: ticketStatuses.filter((row) => !fileTicketLifecycle.isTerminal(row.status)).length,
        byStatus: statuses.map((row) => ({
          statusId: row.id,
          name: row.name,
          color: row.color,
          count: row.count,
        })),
        byType: byType.map(({ key, count }) => ({ type: key, count })),
        byPriority: byPriority.map(({ key, count }) => ({ priority: key, count })),
        bySprint,
        workload: loadWorkload(db, project.id),
      });
    });
  }
}

export const dashboardService = new DashboardService();
