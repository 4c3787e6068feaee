// packages/core/src/types/results.ts

export type CancelReason = 'fail-fast' | 'interrupt';

export type NodeResult =
  | { status: 'success'; durationMs: number }
  | { status: 'failure'; cause: unknown; durationMs: number }
  | { status: 'skipped'; blockedBy: string; reason: string }
  | { status: 'cancelled'; reason: CancelReason };

export type NodeStatus = NodeResult['status'];

export interface ResultCounts {
  success: number;
  failure: number;
  skipped: number;
  cancelled: number;
}

export interface DependencyChain {
  keys: string[];
  durationMs: number;
}
