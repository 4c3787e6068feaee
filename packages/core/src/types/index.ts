// packages/core/src/types/index.ts -- barrel re-export

export type { InstallerConfig, ProjectConfig } from './config.js';
export type {
  CommandResult,
  EnsureOptions,
  EnvironmentCache,
  EnvironmentHandle,
  RunCommandOptions,
} from './environment.js';
export type {
  EngineEvent,
  NodeCancelledEvent,
  NodeCompletedEvent,
  NodeFailedEvent,
  NodeOutputEvent,
  NodeSetupEvent,
  NodeSkippedEvent,
  NodeStartedEvent,
  RunCompletedEvent,
  RunStartedEvent,
  RunStoppingEvent,
  SelectionWarningEvent,
} from './events.js';
export type { Graph, GraphNode, GroupNode, StepNode } from './graph.js';
export type {
  ExecutionPlan,
  Phase,
  PlanEntry,
  SelectionOptions,
  SelectionWarning,
} from './plan.js';
export type {
  CancelReason,
  DependencyChain,
  NodeResult,
  NodeStatus,
  ResultCounts,
} from './results.js';
export type {
  CleanContext,
  ExecOptions,
  GroupSpec,
  ParameterValue,
  RequirementContext,
  RunContext,
  StepBody,
  StepHandler,
  StepOutcome,
  StepParameter,
  StepRunFunction,
  StepSpec,
} from './step.js';
