export { authorize, assertAllowed } from './access-policy.js';
export type {
  ActorContext,
  AccessAction,
  AccessTarget,
  AccessTargetKind,
  AccessDecision,
  MembershipFacts,
} from './types.js';
