// packages/core/src/types/events.ts

/**
 * Engine events, emitted on the EventBus and consumed by the CLI renderer.
 * Type names are dot-separated.
 */

import type { Phase } from './plan.js';
import type { CancelReason, DependencyChain, ResultCounts } from './results.js';

// -- Run lifecycle --
export interface RunStartedEvent {
  type: 'run.started';
  runId: string;
  steps: string[];
  maxParallelism: number;
  timestamp: string;
}

export interface RunStoppingEvent {
  type: 'run.stopping';
  reason: CancelReason;
  timestamp: string;
}

export interface RunCompletedEvent {
  type: 'run.completed';
  runId: string;
  counts: ResultCounts;
  slowestChain: DependencyChain | null;
  durationMs: number;
  timestamp: string;
}

// -- Selection --
export interface SelectionWarningEvent {
  type: 'selection.warning';
  key: string;
  requiredBy: string;
  message: string;
}

// -- Node lifecycle --
export interface NodeStartedEvent {
  type: 'node.started';
  key: string;
  phase: Phase;
  timestamp: string;
}

export interface NodeSetupEvent {
  type: 'node.setup';
  key: string;
  reused: boolean;
  fingerprint: string;
  timestamp: string;
}

/** The whole captured output of one node, emitted once. */
export interface NodeOutputEvent {
  type: 'node.output';
  key: string;
  output: string;
  logFile: string;
}

export interface NodeCompletedEvent {
  type: 'node.completed';
  key: string;
  durationMs: number;
  timestamp: string;
}

export interface NodeFailedEvent {
  type: 'node.failed';
  key: string;
  error: string;
  durationMs: number;
  timestamp: string;
}

export interface NodeSkippedEvent {
  type: 'node.skipped';
  key: string;
  blockedBy: string;
  timestamp: string;
}

export interface NodeCancelledEvent {
  type: 'node.cancelled';
  key: string;
  reason: CancelReason;
  timestamp: string;
}

export type EngineEvent =
  | RunStartedEvent
  | RunStoppingEvent
  | RunCompletedEvent
  | SelectionWarningEvent
  | NodeStartedEvent
  | NodeSetupEvent
  | NodeOutputEvent
  | NodeCompletedEvent
  | NodeFailedEvent
  | NodeSkippedEvent
  | NodeCancelledEvent;
