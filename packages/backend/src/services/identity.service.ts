import { getDb } from '../lib/db.js';
import { UnauthorizedError } from '../lib/errors.js';
import type { ActorContext } from '../engine/access/index.js';
import { findActiveUser } from './access.helpers.js';

/**
 * Resolve the acting user from an authenticated user id.
 * Role and company are re-read every time so changes apply immediately.
 */
export function resolveActor(userId: number): ActorContext {
  const user = findActiveUser(getDb(), userId);
  if (!user) {
    throw new UnauthorizedError('User not found');
  }
  return {
    userId: user.id,
    systemRole: user.system_role,
    companyId: user.company_id,
    managerId: user.manager_id,
  };
}
