import type { LifecycleDefinition, Transition, TransitionResult, ValidationResult } from './types.js';
import { WorkflowError } from '../../lib/errors.js';

/**
 * LifecycleGraph — a directed graph of states and the transitions allowed
 * between them. Used for every entity whose status is gated (sprints, file
 * tickets); work item statuses are free-form and do not go through here.
 */
export class LifecycleGraph<S extends string> {
  readonly name: string;
  private readonly states: readonly S[];
  private readonly transitions: readonly Transition<S>[];
  private readonly terminal: ReadonlySet<S>;
  /** Adjacency list: state → reachable next states */
  private readonly adjacency: Map<S, S[]>;

  constructor(definition: LifecycleDefinition<S>) {
    this.name = definition.name;
    this.states = definition.states;
    this.transitions = definition.transitions;
    this.terminal = new Set(definition.terminal);

    this.adjacency = new Map();
    for (const state of this.states) {
      this.adjacency.set(state, []);
    }
    for (const t of this.transitions) {
      const outgoing = this.adjacency.get(t.from);
      if (outgoing) {
        outgoing.push(t.to);
      }
    }
  }

  getNext(state: S): S[] {
    return [...(this.adjacency.get(state) ?? [])];
  }

  hasState(state: string): state is S {
    return this.states.some((s) => s === state);
  }

  isTerminal(state: S): boolean {
    return this.terminal.has(state);
  }

  check(from: S, to: S): TransitionResult {
    if (this.isTerminal(from)) {
      return { allowed: false, reason: `Cannot change a ${this.name} that is ${from}` };
    }
    if (!this.getNext(from).includes(to)) {
      return { allowed: false, reason: `Cannot move ${this.name} from ${from} to ${to}` };
    }
    return { allowed: true, reason: 'ok' };
  }

  /** Throws WorkflowError when `from → to` is not a declared transition. */
  assertTransition(from: S, to: S): void {
    const result = this.check(from, to);
    if (!result.allowed) {
      throw new WorkflowError(result.reason, from, to);
    }
  }

  /**
   * Structural checks:
   * 1. At least one state exists
   * 2. All transition endpoints reference declared states
   * 3. Terminal states have no outgoing transitions; others have at least one
   * 4. Every state is reachable from the entry state
   */
  validate(): ValidationResult {
    const errors: string[] = [];

    if (this.states.length === 0) {
      errors.push('Lifecycle must have at least one state');
      return { valid: false, errors };
    }

    for (const t of this.transitions) {
      if (!this.hasState(t.from)) {
        errors.push(`Transition references undeclared source state '${t.from}'`);
      }
      if (!this.hasState(t.to)) {
        errors.push(`Transition references undeclared target state '${t.to}'`);
      }
    }

    for (const state of this.states) {
      const outgoing = this.getNext(state).length;
      if (this.isTerminal(state) && outgoing > 0) {
        errors.push(`Terminal state '${state}' has outgoing transitions`);
      }
      if (!this.isTerminal(state) && outgoing === 0) {
        errors.push(`State '${state}' is a dead-end (no outgoing transitions)`);
      }
    }

    const entry = this.states[0];
    const reachable = new Set<S>([entry]);
    const queue: S[] = [entry];
    let current = queue.shift();
    while (current !== undefined) {
      for (const next of this.getNext(current)) {
        if (!reachable.has(next)) {
          reachable.add(next);
          queue.push(next);
        }
      }
      current = queue.shift();
    }

    for (const state of this.states) {
      if (!reachable.has(state)) {
        errors.push(`State '${state}' is not reachable from entry state '${entry}'`);
      }
    }

    return { valid: errors.length === 0, errors };
  }
}
