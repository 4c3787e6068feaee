// packages/core/src/types/graph.ts

import type { ParameterValue, StepHandler } from './step.js';

/** A concrete variant of a step spec, bound to one parameter combination. */
export interface StepNode {
  kind: 'step';
  key: string;
  /** Name of the spec the node was expanded from. */
  name: string;
  description?: string;
  parameters: Readonly<Record<string, ParameterValue>>;
  requires: readonly string[];
  dependencies: readonly string[];
  runByDefault: boolean;
  passenv: readonly string[];
  setenv: Readonly<Record<string, string>>;
  handler: StepHandler;
}

/** Aggregates step nodes. Running a group means all its members ran. */
export interface GroupNode {
  kind: 'group';
  key: string;
  name: string;
  description?: string;
  /** Step node keys, already flattened. */
  members: readonly string[];
  runByDefault: boolean;
}

export type GraphNode = StepNode | GroupNode;

export interface Graph {
  readonly nodes: ReadonlyMap<string, GraphNode>;
  /** Direct requirements of each node. Groups require their members. */
  readonly requires: ReadonlyMap<string, readonly string[]>;
  readonly dependents: ReadonlyMap<string, readonly string[]>;
  readonly declarationOrder: readonly string[];
}
