import { describe, it, expect } from 'vitest';
import {
  LifecycleGraph,
  defineLifecycle,
  sprintLifecycle,
  fileTicketLifecycle,
  CUSTODY_STATES,
} from '../engine/graph/index.js';
import { WorkflowError } from '../lib/errors.js';
import { SprintStatus, FileTicketStatus } from '../types/index.js';

type Light = 'red' | 'green' | 'amber' | 'off';

// ---------------------------------------------------------------------------
// LifecycleGraph — construction & validation
// ---------------------------------------------------------------------------

describe('LifecycleGraph', () => {
  it('lists next states', () => {
    const graph = new LifecycleGraph<Light>({
      name: 'light',
      states: ['red', 'green', 'amber'],
      transitions: [
        { from: 'red', to: 'green' },
        { from: 'green', to: 'amber' },
        { from: 'amber', to: 'red' },
      ],
      terminal: [],
    });
    expect(graph.getNext('green')).toEqual(['amber']);
    expect(graph.validate()).toEqual({ valid: true, errors: [] });
  });

  it('reports dead ends and unreachable states', () => {
    const graph = new LifecycleGraph<Light>({
      name: 'light',
      states: ['red', 'green', 'off'],
      transitions: [{ from: 'red', to: 'green' }],
      terminal: [],
    });
    const result = graph.validate();
    expect(result.valid).toBe(false);
    expect(result.errors).toEqual([
      "State 'green' is a dead-end (no outgoing transitions)",
      "State 'off' is a dead-end (no outgoing transitions)",
      "State 'off' is not reachable from entry state 'red'",
    ]);
  });

  it('reports terminal states with outgoing transitions', () => {
    const graph = new LifecycleGraph<Light>({
      name: 'light',
      states: ['red', 'off'],
      transitions: [
        { from: 'red', to: 'off' },
        { from: 'off', to: 'red' },
      ],
      terminal: ['off'],
    });
    expect(graph.validate().errors).toEqual(["Terminal state 'off' has outgoing transitions"]);
  });

  it('rejects an empty lifecycle', () => {
    const graph = new LifecycleGraph<Light>({ name: 'light', states: [], transitions: [], terminal: [] });
    expect(graph.validate()).toEqual({ valid: false, errors: ['Lifecycle must have at least one state'] });
  });

  it('refuses to define a malformed lifecycle', () => {
    expect(() =>
      defineLifecycle<Light>({
        name: 'light',
        states: ['red', 'off'],
        transitions: [{ from: 'red', to: 'off' }],
        terminal: [],
      })
    ).toThrow("Invalid light lifecycle: State 'off' is a dead-end (no outgoing transitions)");
  });

  it('narrows strings with hasState', () => {
    expect(sprintLifecycle.hasState('ACTIVE')).toBe(true);
    expect(sprintLifecycle.hasState('ARCHIVED')).toBe(false);
  });
});

// ---------------------------------------------------------------------------
// Sprint lifecycle
// ---------------------------------------------------------------------------

describe('sprintLifecycle', () => {
  it('is structurally valid', () => {
    expect(sprintLifecycle.validate().valid).toBe(true);
  });

  it('moves PLANNING → ACTIVE → COMPLETED', () => {
    expect(sprintLifecycle.check(SprintStatus.PLANNING, SprintStatus.ACTIVE).allowed).toBe(true);
    expect(sprintLifecycle.check(SprintStatus.ACTIVE, SprintStatus.COMPLETED).allowed).toBe(true);
  });

  it('does not skip or reverse', () => {
    expect(sprintLifecycle.check(SprintStatus.PLANNING, SprintStatus.COMPLETED)).toEqual({
      allowed: false,
      reason: 'Cannot move sprint from PLANNING to COMPLETED',
    });
    expect(sprintLifecycle.check(SprintStatus.ACTIVE, SprintStatus.PLANNING).allowed).toBe(false);
  });

  it('treats COMPLETED as terminal', () => {
    expect(sprintLifecycle.isTerminal(SprintStatus.COMPLETED)).toBe(true);
    expect(sprintLifecycle.check(SprintStatus.COMPLETED, SprintStatus.ACTIVE)).toEqual({
      allowed: false,
      reason: 'Cannot change a sprint that is COMPLETED',
    });
  });

  it('throws WorkflowError carrying both states', () => {
    try {
      sprintLifecycle.assertTransition(SprintStatus.ACTIVE, SprintStatus.ACTIVE);
      expect.unreachable('assertTransition should throw');
    } catch (err) {
      expect(err).toBeInstanceOf(WorkflowError);
      if (err instanceof WorkflowError) {
        expect(err.message).toBe('Cannot move sprint from ACTIVE to ACTIVE');
        expect(err.currentStatus).toBe('ACTIVE');
        expect(err.attemptedStatus).toBe('ACTIVE');
      }
    }
  });
});

// ---------------------------------------------------------------------------
// File ticket lifecycle
// ---------------------------------------------------------------------------

describe('fileTicketLifecycle', () => {
  it('is structurally valid', () => {
    expect(fileTicketLifecycle.validate()).toEqual({ valid: true, errors: [] });
  });

  it('follows the processing path', () => {
    expect(fileTicketLifecycle.check(FileTicketStatus.CREATED, FileTicketStatus.PROCESSING).allowed).toBe(true);
    expect(fileTicketLifecycle.check(FileTicketStatus.PROCESSING, FileTicketStatus.APPROVED).allowed).toBe(true);
    expect(fileTicketLifecycle.check(FileTicketStatus.APPROVED, FileTicketStatus.COMPLETED).allowed).toBe(true);
    expect(fileTicketLifecycle.check(FileTicketStatus.REJECTED, FileTicketStatus.PROCESSING).allowed).toBe(true);
  });

  it('does not complete an unreviewed ticket', () => {
    expect(fileTicketLifecycle.check(FileTicketStatus.CREATED, FileTicketStatus.COMPLETED).allowed).toBe(false);
    expect(fileTicketLifecycle.check(FileTicketStatus.PROCESSING, FileTicketStatus.COMPLETED).allowed).toBe(false);
  });

  it('allows custody moves from every open state, including a second receive', () => {
    for (const from of [
      FileTicketStatus.CREATED,
      FileTicketStatus.IN_TRANSIT,
      FileTicketStatus.RECEIVED,
      FileTicketStatus.PROCESSING,
      FileTicketStatus.APPROVED,
      FileTicketStatus.REJECTED,
    ]) {
      expect(fileTicketLifecycle.check(from, FileTicketStatus.IN_TRANSIT).allowed).toBe(true);
      expect(fileTicketLifecycle.check(from, FileTicketStatus.RECEIVED).allowed).toBe(true);
      expect(fileTicketLifecycle.check(from, FileTicketStatus.LOST).allowed).toBe(true);
    }
  });

  it('freezes COMPLETED and LOST tickets', () => {
    expect(fileTicketLifecycle.check(FileTicketStatus.LOST, FileTicketStatus.IN_TRANSIT)).toEqual({
      allowed: false,
      reason: 'Cannot change a file ticket that is LOST',
    });
    expect(fileTicketLifecycle.isTerminal(FileTicketStatus.COMPLETED)).toBe(true);
  });

  it('marks IN_TRANSIT and RECEIVED as custody states', () => {
    expect(CUSTODY_STATES).toEqual([FileTicketStatus.IN_TRANSIT, FileTicketStatus.RECEIVED]);
  });
});
