import { SystemRole, ProjectRole } from '../types/index.js';

/**
 * Explicit role ranks. Comparisons go through these tables rather than
 * enum declaration order.
 */
export const SYSTEM_ROLE_RANK: Record<SystemRole, number> = {
  MEMBER: 1,
  QA: 2,
  MANAGER: 3,
  ADMIN: 4,
  SUPER_ADMIN: 5,
};

export const PROJECT_ROLE_RANK: Record<ProjectRole, number> = {
  VIEWER: 1,
  MEMBER: 2,
  MANAGER: 3,
  ADMIN: 4,
};

export function systemRoleRank(role: SystemRole): number {
  return SYSTEM_ROLE_RANK[role];
}

export function projectRoleRank(role: ProjectRole): number {
  return PROJECT_ROLE_RANK[role];
}

export function hasSystemRole(role: SystemRole, minimum: SystemRole): boolean {
  return systemRoleRank(role) >= systemRoleRank(minimum);
}

export function hasProjectRole(role: ProjectRole, minimum: ProjectRole): boolean {
  return projectRoleRank(role) >= projectRoleRank(minimum);
}

/** Member and QA: the roles whose visibility is limited to their own items. */
export function isContributor(role: SystemRole): boolean {
  return !hasSystemRole(role, SystemRole.MANAGER);
}

/**
 * Whether `creatorRole` may assign `targetRole` to a user.
 * SuperAdmin grants anything except SuperAdmin; Admin and Manager grant
 * strictly lower roles; Member and QA grant nothing.
 */
export function canCreateRole(creatorRole: SystemRole, targetRole: SystemRole): boolean {
  if (targetRole === SystemRole.SUPER_ADMIN) {
    return false;
  }
  if (creatorRole === SystemRole.SUPER_ADMIN) {
    return true;
  }
  if (!hasSystemRole(creatorRole, SystemRole.MANAGER)) {
    return false;
  }
  return systemRoleRank(targetRole) < systemRoleRank(creatorRole);
}

/**
 * Whether `deleterRole` may delete a user holding `targetRole`.
 * A SuperAdmin is never deletable; it can only be handed over.
 */
export function canDeleteUser(deleterRole: SystemRole, targetRole: SystemRole): boolean {
  if (targetRole === SystemRole.SUPER_ADMIN) {
    return false;
  }
  if (deleterRole === SystemRole.SUPER_ADMIN) {
    return true;
  }
  if (!hasSystemRole(deleterRole, SystemRole.MANAGER)) {
    return false;
  }
  return systemRoleRank(targetRole) < systemRoleRank(deleterRole);
}
