// packages/core/src/types/plan.ts

export type Phase = 'full' | 'setup-only' | 'run-only';

export interface PlanEntry {
  key: string;
  phase: Phase;
  requires: readonly string[];
  /** Named in `except` but kept because a selected node requires it. */
  excludedButRequired: boolean;
}

export interface SelectionWarning {
  key: string;
  requiredBy: string;
  message: string;
}

/** Selected nodes in topological order. */
export interface ExecutionPlan {
  entries: readonly PlanEntry[];
  phase: Phase;
  warnings: readonly SelectionWarning[];
}

export interface SelectionOptions {
  only?: readonly string[];
  except?: readonly string[];
  /** Starting selection for `except`, in place of the nodes that run by default. */
  roots?: readonly string[];
  setupOnly?: boolean;
  noSetup?: boolean;
}
