import { LifecycleGraph } from './lifecycle-graph.js';
import type { LifecycleDefinition, Transition } from './types.js';
import { SprintStatus, FileTicketStatus } from '../../types/index.js';

/** Build a graph, refusing to load a module whose lifecycle is malformed. */
export function defineLifecycle<S extends string>(definition: LifecycleDefinition<S>): LifecycleGraph<S> {
  const graph = new LifecycleGraph(definition);
  const { valid, errors } = graph.validate();
  if (!valid) {
    throw new Error(`Invalid ${definition.name} lifecycle: ${errors.join('; ')}`);
  }
  return graph;
}

export const sprintLifecycle = defineLifecycle<SprintStatus>({
  name: 'sprint',
  states: [SprintStatus.PLANNING, SprintStatus.ACTIVE, SprintStatus.COMPLETED],
  transitions: [
    { from: SprintStatus.PLANNING, to: SprintStatus.ACTIVE },
    { from: SprintStatus.ACTIVE, to: SprintStatus.COMPLETED },
  ],
  terminal: [SprintStatus.COMPLETED],
});

const FILE_TICKET_OPEN_STATES: FileTicketStatus[] = [
  FileTicketStatus.CREATED,
  FileTicketStatus.IN_TRANSIT,
  FileTicketStatus.RECEIVED,
  FileTicketStatus.PROCESSING,
  FileTicketStatus.APPROVED,
  FileTicketStatus.REJECTED,
];

/** States only transfer and receive may set. */
export const CUSTODY_STATES: readonly FileTicketStatus[] = [
  FileTicketStatus.IN_TRANSIT,
  FileTicketStatus.RECEIVED,
];

const processingTransitions: Transition<FileTicketStatus>[] = [
  { from: FileTicketStatus.CREATED, to: FileTicketStatus.PROCESSING },
  { from: FileTicketStatus.RECEIVED, to: FileTicketStatus.PROCESSING },
  { from: FileTicketStatus.PROCESSING, to: FileTicketStatus.APPROVED },
  { from: FileTicketStatus.PROCESSING, to: FileTicketStatus.REJECTED },
  { from: FileTicketStatus.APPROVED, to: FileTicketStatus.COMPLETED },
  { from: FileTicketStatus.REJECTED, to: FileTicketStatus.COMPLETED },
  { from: FileTicketStatus.REJECTED, to: FileTicketStatus.PROCESSING },
];

// Custody moves (transfer, receive) and loss are open from every non-terminal state.
const custodyTransitions: Transition<FileTicketStatus>[] = FILE_TICKET_OPEN_STATES.flatMap(
  (from) => [
    { from, to: FileTicketStatus.IN_TRANSIT },
    { from, to: FileTicketStatus.RECEIVED },
    { from, to: FileTicketStatus.LOST },
  ]
);

export const fileTicketLifecycle = defineLifecycle<FileTicketStatus>({
  name: 'file ticket',
  states: [...FILE_TICKET_OPEN_STATES, FileTicketStatus.COMPLETED, FileTicketStatus.LOST],
  transitions: [...processingTransitions, ...custodyTransitions],
  terminal: [FileTicketStatus.COMPLETED, FileTicketStatus.LOST],
});
