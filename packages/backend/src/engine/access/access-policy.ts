import { SystemRole, ProjectRole } from '../../types/index.js';
import { hasSystemRole, hasProjectRole } from '../../lib/permissions.js';
import { ForbiddenError, NotFoundError } from '../../lib/errors.js';
import type {
  ActorContext,
  AccessAction,
  AccessTarget,
  AccessTargetKind,
  AccessDecision,
  MembershipFacts,
} from './types.js';

const ALLOW: AccessDecision = { allowed: true };

const TARGET_LABELS: Record<AccessTargetKind, string> = {
  company: 'Company',
  project: 'Project',
  workflow_status: 'Workflow status',
  sprint: 'Sprint',
  work_item: 'Work item',
  file_ticket: 'File ticket',
  comment: 'Comment',
  board: 'Board',
};

function forbid(reason: string): AccessDecision {
  return { allowed: false, outcome: 'forbidden', reason };
}

function hide(target: AccessTarget): AccessDecision {
  const resource = TARGET_LABELS[target.kind];
  return { allowed: false, outcome: 'not_found', resource, reason: `${resource} not found` };
}

/**
 * Decide whether `actor` may perform `action` on `target`.
 *
 * Evaluation order:
 * 1. Tenancy. A target in another company is reported as not found, for every
 *    role. The only exception is a SuperAdmin reading a company record.
 * 2. Ownership rules that bind every role. A personal board belongs to its
 *    owner alone. A file ticket stays open to its creator and holder even
 *    when they cannot see the project it was filed in. A comment is always
 *    open to its author.
 * 3. Admin and SuperAdmin: allowed within their company.
 * 4. Manager: reads anything in the company; other actions need membership,
 *    and `manage` needs a manager-or-admin project role.
 * 5. Member and QA: limited to projects they (or their direct manager) belong
 *    to, and within those to items they created, are assigned or hold.
 *
 * Pure: every fact it needs is on the arguments.
 */
export function authorize(
  actor: ActorContext,
  action: AccessAction,
  target: AccessTarget
): AccessDecision {
  if (target.kind === 'company') {
    return authorizeCompany(actor, action, target);
  }

  if (actor.companyId === null || actor.companyId !== target.companyId) {
    return hide(target);
  }

  if (target.kind === 'board' && target.ownerId !== null) {
    return target.ownerId === actor.userId ? ALLOW : hide(target);
  }

  if (target.kind === 'file_ticket' && holdsTicket(actor, action, target)) {
    return ALLOW;
  }

  if (target.kind === 'comment' && target.authorId === actor.userId) {
    return ALLOW;
  }

  if (hasSystemRole(actor.systemRole, SystemRole.ADMIN)) {
    return ALLOW;
  }

  if (actor.systemRole === SystemRole.MANAGER) {
    return authorizeManager(action, target);
  }

  return authorizeContributor(actor, action, target);
}

function holdsTicket(
  actor: ActorContext,
  action: AccessAction,
  target: Extract<AccessTarget, { kind: 'file_ticket' }>
): boolean {
  const isCreator = target.createdById === actor.userId;
  if (action === 'read' || action === 'update') {
    return isCreator || target.currentHolderId === actor.userId;
  }
  return action === 'delete' && isCreator;
}

function authorizeCompany(
  actor: ActorContext,
  action: AccessAction,
  target: Extract<AccessTarget, { kind: 'company' }>
): AccessDecision {
  const isSuperAdmin = actor.systemRole === SystemRole.SUPER_ADMIN;

  if (actor.companyId !== target.companyId) {
    return isSuperAdmin && action === 'read' ? ALLOW : hide(target);
  }

  switch (action) {
    case 'read':
      return ALLOW;
    case 'update':
      return hasSystemRole(actor.systemRole, SystemRole.ADMIN)
        ? ALLOW
        : forbid('Only administrators can update the company');
    default:
      return isSuperAdmin ? ALLOW : forbid('Only a super administrator can manage companies');
  }
}

function authorizeManager(
  action: AccessAction,
  target: Exclude<AccessTarget, { kind: 'company' }>
): AccessDecision {
  if (action === 'read') {
    return ALLOW;
  }

  if (target.kind === 'project' && action === 'delete') {
    return forbid('Only administrators can delete projects');
  }

  const role = target.membership.projectRole;
  if (role === null) {
    return forbid('You are not a member of this project');
  }

  // Someone else's comment is moderated like project settings.
  const moderates = target.kind === 'comment';
  if ((action === 'manage' || moderates) && !hasProjectRole(role, ProjectRole.MANAGER)) {
    return forbid('Project manager role required');
  }

  return ALLOW;
}

function canSeeProject(membership: MembershipFacts): boolean {
  return membership.projectRole !== null || membership.managerIsMember;
}

function authorizeContributor(
  actor: ActorContext,
  action: AccessAction,
  target: Exclude<AccessTarget, { kind: 'company' }>
): AccessDecision {
  if (!canSeeProject(target.membership)) {
    return forbid('You do not have access to this project');
  }

  if (action === 'manage') {
    return forbid('Project manager role required');
  }

  const isQa = actor.systemRole === SystemRole.QA;

  switch (target.kind) {
    case 'project':
    case 'workflow_status':
    case 'sprint':
      return action === 'read' ? ALLOW : forbid('Project manager role required');

    case 'work_item': {
      const involved =
        target.createdById === actor.userId || target.assignedToId === actor.userId;
      switch (action) {
        case 'create':
          return isQa ? ALLOW : forbid('Members cannot create work items');
        case 'delete':
          if (!isQa) {
            return forbid('Members cannot delete work items');
          }
          return target.createdById === actor.userId
            ? ALLOW
            : forbid('QA users can only delete work items they created');
        default:
          return involved
            ? ALLOW
            : forbid('You can only access work items you created or are assigned to');
      }
    }

    case 'file_ticket':
      // Creator and holder were let through above.
      switch (action) {
        case 'create':
          return ALLOW;
        case 'delete':
          return forbid('You can only delete file tickets you created');
        default:
          return forbid('You can only access file tickets you created or currently hold');
      }

    case 'comment':
      return action === 'read' ? ALLOW : forbid('You can only change comments you wrote');

    case 'board':
      // Personal boards were settled above; this is the default board.
      return action === 'read' ? ALLOW : forbid('Project manager role required');
  }
}

/** Throw the matching domain error for a denied decision. */
export function assertAllowed(decision: AccessDecision): void {
  if (decision.allowed) {
    return;
  }
  if (decision.outcome === 'not_found') {
    throw new NotFoundError(decision.resource);
  }
  throw new ForbiddenError(decision.reason);
}
