import type { SystemRole, ProjectRole } from '../../types/index.js';

/** The resolved identity of the caller, re-read on every request. */
export interface ActorContext {
  userId: number;
  systemRole: SystemRole;
  /** Null only before the user has joined a company. */
  companyId: number | null;
  managerId: number | null;
}

export type AccessAction = 'read' | 'create' | 'update' | 'delete' | 'manage';

/** What the actor's project membership looks like for one project. */
export interface MembershipFacts {
  /** The actor's own active membership role, if any. */
  projectRole: ProjectRole | null;
  /** Whether the actor's direct manager is an active member. */
  managerIsMember: boolean;
}

interface ProjectScoped {
  companyId: number;
  membership: MembershipFacts;
}

export type AccessTarget =
  | { kind: 'company'; companyId: number }
  | ({ kind: 'project' } & ProjectScoped)
  | ({ kind: 'workflow_status' } & ProjectScoped)
  | ({ kind: 'sprint' } & ProjectScoped)
  | ({ kind: 'work_item'; createdById: number; assignedToId: number | null } & ProjectScoped)
  | ({ kind: 'file_ticket'; createdById: number; currentHolderId: number | null } & ProjectScoped)
  | ({ kind: 'comment'; authorId: number } & ProjectScoped)
  | ({ kind: 'board'; ownerId: number | null } & ProjectScoped);

export type AccessTargetKind = AccessTarget['kind'];

export type AccessDecision =
  | { allowed: true }
  | { allowed: false; outcome: 'forbidden'; reason: string }
  | { allowed: false; outcome: 'not_found'; resource: string; reason: string };
