import { getDb } from '../lib/db.js';
import type { Db } from '../lib/db.js';
import { NotFoundError, ValidationError } from '../lib/errors.js';
import { authorize, assertAllowed } from '../engine/access/index.js';
import type {
  ActorContext,
  AccessAction,
  AccessDecision,
  MembershipFacts,
} from '../engine/access/index.js';
import type {
  ProjectRow,
  ProjectMemberRow,
  UserRow,
  WorkItemRow,
  FileTicketRow,
} from './records.js';

export function fullName(user: Pick<UserRow, 'first_name' | 'last_name'>): string {
  return `${user.first_name} ${user.last_name}`;
}

export function findActiveUser(db: Db, userId: number): UserRow | undefined {
  return db
    .prepare<[number], UserRow>('SELECT * FROM users WHERE id = ? AND is_deleted = 0')
    .get(userId);
}

export function findActiveProject(db: Db, projectId: number): ProjectRow | undefined {
  return db
    .prepare<[number], ProjectRow>('SELECT * FROM projects WHERE id = ? AND is_deleted = 0')
    .get(projectId);
}

export function findActiveMembership(
  db: Db,
  projectId: number,
  userId: number
): ProjectMemberRow | undefined {
  return db
    .prepare<[number, number], ProjectMemberRow>(
      'SELECT * FROM project_members WHERE project_id = ? AND user_id = ? AND is_deleted = 0'
    )
    .get(projectId, userId);
}

/** The actor's own membership, plus whether their direct manager is a member. */
export function loadMembershipFacts(db: Db, actor: ActorContext, projectId: number): MembershipFacts {
  const own = findActiveMembership(db, projectId, actor.userId);
  const viaManager =
    actor.managerId !== null && findActiveMembership(db, projectId, actor.managerId) !== undefined;
  return {
    projectRole: own ? own.role : null,
    managerIsMember: viaManager,
  };
}

export interface ProjectAccess {
  project: ProjectRow;
  membership: MembershipFacts;
}

/**
 * Load a live project and check `action` against it.
 * Missing, deleted and other-company projects all read as "Project not found".
 */
export function requireProjectAccess(
  actor: ActorContext,
  projectId: number,
  action: AccessAction
): ProjectAccess {
  const db = getDb();
  const project = findActiveProject(db, projectId);
  if (!project) {
    throw new NotFoundError('Project');
  }
  const membership = loadMembershipFacts(db, actor, project.id);
  assertAllowed(authorize(actor, action, { kind: 'project', companyId: project.company_id, membership }));
  return { project, membership };
}

/** Check `action` on a project-scoped resource (status, sprint) of an already loaded project. */
export function assertProjectScoped(
  actor: ActorContext,
  access: ProjectAccess,
  kind: 'workflow_status' | 'sprint',
  action: AccessAction
): void {
  assertAllowed(
    authorize(actor, action, {
      kind,
      companyId: access.project.company_id,
      membership: access.membership,
    })
  );
}

/**
 * Fetch a live user of `companyId` or reject the payload with `message`.
 * Used for assignees, holders, managers and new members.
 */
export function requireCompanyUser(
  db: Db,
  userId: number,
  companyId: number,
  message: string
): UserRow {
  const user = findActiveUser(db, userId);
  if (!user || user.company_id !== companyId) {
    throw new ValidationError(message, { userId });
  }
  return user;
}

export interface WorkItemAccess extends ProjectAccess {
  item: WorkItemRow;
}

/** Load a live work item of `projectId` and check `action` on it. */
export function requireWorkItemAccess(
  actor: ActorContext,
  projectId: number,
  workItemId: number,
  action: AccessAction
): WorkItemAccess {
  const { project, membership } = requireProjectAccess(actor, projectId, 'read');
  const item = getDb()
    .prepare<[number, number], WorkItemRow>(
      'SELECT * FROM work_items WHERE id = ? AND project_id = ? AND is_deleted = 0'
    )
    .get(workItemId, project.id);
  if (!item) {
    throw new NotFoundError('Work item');
  }
  assertAllowed(
    authorize(actor, action, {
      kind: 'work_item',
      companyId: project.company_id,
      membership,
      createdById: item.created_by_id,
      assignedToId: item.assigned_to_id,
    })
  );
  return { project, membership, item };
}

export interface FileTicketAccess extends ProjectAccess {
  ticket: FileTicketRow;
}

export interface TenantProject extends ProjectAccess {
  /** The actor's `read` decision on the project itself. */
  projectRead: AccessDecision;
}

/**
 * Load a live project of the actor's company without requiring that the actor
 * can see it. File tickets travel to holders outside the project, so their
 * callers decide visibility per ticket.
 */
export function requireTenantProject(actor: ActorContext, projectId: number): TenantProject {
  const db = getDb();
  const project = findActiveProject(db, projectId);
  if (!project) {
    throw new NotFoundError('Project');
  }
  const membership = loadMembershipFacts(db, actor, project.id);
  const projectRead = authorize(actor, 'read', { kind: 'project', companyId: project.company_id, membership });
  if (!projectRead.allowed && projectRead.outcome === 'not_found') {
    assertAllowed(projectRead);
  }
  return { project, membership, projectRead };
}

/** Load a live file ticket of `projectId` and check `action` on it. */
export function requireFileTicketAccess(
  actor: ActorContext,
  projectId: number,
  ticketId: number,
  action: AccessAction
): FileTicketAccess {
  const { project, membership, projectRead } = requireTenantProject(actor, projectId);
  const ticket = getDb()
    .prepare<[number, number], FileTicketRow>(
      'SELECT * FROM file_tickets WHERE id = ? AND project_id = ? AND is_deleted = 0'
    )
    .get(ticketId, project.id);
  if (!ticket) {
    assertAllowed(projectRead);
    throw new NotFoundError('File ticket');
  }
  assertAllowed(
    authorize(actor, action, {
      kind: 'file_ticket',
      companyId: project.company_id,
      membership,
      createdById: ticket.created_by_id,
      currentHolderId: ticket.current_holder_id,
    })
  );
  return { project, membership, ticket };
}
