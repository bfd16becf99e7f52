export { LifecycleGraph } from './lifecycle-graph.js';
export { defineLifecycle, sprintLifecycle, fileTicketLifecycle, CUSTODY_STATES } from './lifecycles.js';
export {
  ALLOWED_CHILD_TYPES,
  isLegalChild,
  assertLegalChild,
  wouldCreateCycle,
} from './work-item-hierarchy.js';
export type { Transition, LifecycleDefinition, TransitionResult, ValidationResult } from './types.js';
