// ============================================================================
// Lifecycle Graph Types
// ============================================================================

export interface Transition<S extends string> {
  from: S;
  to: S;
}

export interface LifecycleDefinition<S extends string> {
  /** Used in error messages, e.g. "sprint" */
  name: string;
  /** Declared states; the first one is the entry state */
  states: readonly S[];
  transitions: readonly Transition<S>[];
  /** States with no way out */
  terminal: readonly S[];
}

export interface TransitionResult {
  allowed: boolean;
  reason: string;
}

export interface ValidationResult {
  valid: boolean;
  errors: string[];
}
