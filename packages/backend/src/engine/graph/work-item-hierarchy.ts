import { WorkItemType } from '../../types/index.js';
import { ValidationError } from '../../lib/errors.js';

/** Parent type → child types it may hold. Subtask is a leaf. */
export const ALLOWED_CHILD_TYPES: Record<WorkItemType, readonly WorkItemType[]> = {
  EPIC: [WorkItemType.FEATURE, WorkItemType.STORY],
  FEATURE: [WorkItemType.STORY, WorkItemType.TASK, WorkItemType.BUG],
  STORY: [WorkItemType.TASK, WorkItemType.BUG, WorkItemType.SUBTASK],
  TASK: [WorkItemType.SUBTASK],
  BUG: [WorkItemType.SUBTASK],
  SUBTASK: [],
};

export function isLegalChild(parentType: WorkItemType, childType: WorkItemType): boolean {
  return ALLOWED_CHILD_TYPES[parentType].includes(childType);
}

export function assertLegalChild(parentType: WorkItemType, childType: WorkItemType): void {
  if (!isLegalChild(parentType, childType)) {
    throw new ValidationError(`A ${childType} cannot be a child of a ${parentType}`, {
      parentType,
      childType,
      allowed: ALLOWED_CHILD_TYPES[parentType],
    });
  }
}

/**
 * Whether attaching `itemId` under `newParentId` would close a loop.
 * Walks up from the new parent; `parentOf` returns null at a root.
 */
export function wouldCreateCycle(
  itemId: number,
  newParentId: number,
  parentOf: (id: number) => number | null
): boolean {
  const seen = new Set<number>();
  let cursor: number | null = newParentId;
  while (cursor !== null) {
    if (cursor === itemId) {
      return true;
    }
    if (seen.has(cursor)) {
      // A loop already exists above; it does not pass through itemId.
      return false;
    }
    seen.add(cursor);
    cursor = parentOf(cursor);
  }
  return false;
}
