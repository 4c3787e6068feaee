// packages/core/src/engine/scheduler.ts: Per-node state machine of one execution

import type { PlanEntry } from '../types/plan.js';
import type { CancelReason, NodeResult } from '../types/results.js';

export type NodeState = 'pending' | 'ready' | 'running' | NodeResult['status'];

export type SettledNode = readonly [key: string, result: NodeResult];

function blockingReason(key: string, result: NodeResult): string {
  switch (result.status) {
    case 'failure':
      return `'${key}' failed`;
    case 'skipped':
      return `'${key}' was skipped`;
    case 'cancelled':
      return `'${key}' was cancelled`;
    case 'success':
      return '';
  }
}

/**
 * Tracks every plan entry from `pending` to a terminal result.
 *
 * A node is ready once all its requirements succeeded. A requirement that ends
 * in any other state skips its dependents, transitively. Results are written
 * exactly once.
 */
export class NodeScheduler {
  private readonly states = new Map<string, NodeState>();
  private readonly unmet = new Map<string, number>();
  private readonly dependents = new Map<string, string[]>();
  private readonly results = new Map<string, NodeResult>();
  private readonly readyQueue: string[] = [];
  private stoppedBy: CancelReason | null = null;

  constructor(entries: readonly PlanEntry[]) {
    const keys = new Set(entries.map((e) => e.key));
    for (const entry of entries) {
      this.states.set(entry.key, 'pending');
      this.dependents.set(entry.key, []);
    }
    for (const entry of entries) {
      const requires = [...new Set(entry.requires)].filter((req) => keys.has(req));
      this.unmet.set(entry.key, requires.length);
      for (const req of requires) this.dependents.get(req)?.push(entry.key);
    }
    for (const entry of entries) {
      if (this.unmet.get(entry.key) === 0) this.markReady(entry.key);
    }
  }

  get size(): number {
    return this.states.size;
  }

  get isDone(): boolean {
    return this.results.size === this.states.size;
  }

  get isStopped(): boolean {
    return this.stoppedBy !== null;
  }

  get stopReason(): CancelReason | null {
    return this.stoppedBy;
  }

  state(key: string): NodeState | undefined {
    return this.states.get(key);
  }

  result(key: string): NodeResult | undefined {
    return this.results.get(key);
  }

  allResults(): Map<string, NodeResult> {
    return new Map(this.results);
  }

  /** Ready nodes in the order they became ready. */
  readyKeys(): string[] {
    return [...this.readyQueue];
  }

  runningKeys(): string[] {
    return [...this.states].filter(([, state]) => state === 'running').map(([key]) => key);
  }

  start(key: string): void {
    const state = this.states.get(key);
    if (state !== 'ready') {
      throw new Error(`Cannot start '${key}': node is ${state ?? 'unknown'}`);
    }
    this.readyQueue.splice(this.readyQueue.indexOf(key), 1);
    this.states.set(key, 'running');
  }

  /**
   * Record the result of a running node. Returns every node settled by it:
   * the node itself followed by dependents skipped because of it.
   */
  complete(key: string, result: NodeResult): SettledNode[] {
    if (this.states.get(key) !== 'running') {
      throw new Error(`Cannot complete '${key}': node is ${this.states.get(key) ?? 'unknown'}`);
    }
    const settled: SettledNode[] = [];
    this.record(key, result, settled);
    return settled;
  }

  /**
   * Stop dispatching. Pending and ready nodes are cancelled, running nodes are
   * left to complete. Returns the cancelled nodes, or an empty list when the
   * scheduler was already stopped.
   */
  stop(reason: CancelReason): SettledNode[] {
    if (this.stoppedBy !== null) return [];
    this.stoppedBy = reason;
    this.readyQueue.length = 0;

    const settled: SettledNode[] = [];
    for (const [key, state] of this.states) {
      if (state === 'pending' || state === 'ready') {
        const result: NodeResult = { status: 'cancelled', reason };
        this.states.set(key, 'cancelled');
        this.results.set(key, result);
        settled.push([key, result]);
      }
    }
    return settled;
  }

  private markReady(key: string): void {
    if (this.stoppedBy !== null) return;
    this.states.set(key, 'ready');
    this.readyQueue.push(key);
  }

  private record(key: string, result: NodeResult, settled: SettledNode[]): void {
    if (this.results.has(key)) {
      throw new Error(`Result of '${key}' was already recorded`);
    }
    this.results.set(key, result);
    this.states.set(key, result.status);
    settled.push([key, result]);

    for (const dependent of this.dependents.get(key) ?? []) {
      if (this.states.get(dependent) !== 'pending') continue;
      if (result.status === 'success') {
        const unmet = (this.unmet.get(dependent) ?? 0) - 1;
        this.unmet.set(dependent, unmet);
        if (unmet === 0) this.markReady(dependent);
      } else {
        this.record(
          dependent,
          { status: 'skipped', blockedBy: key, reason: blockingReason(key, result) },
          settled,
        );
      }
    }
  }
}
