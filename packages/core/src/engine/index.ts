// packages/core/src/engine -- Scheduling, execution and cancellation

export { CancellationToken, CancellationError } from './cancellation.js';
export { EventBus } from './event-bus.js';
export { Executor, nodeCachePath, nodeLogPath, resolveParallelism } from './executor.js';
export type { ExecuteOptions, ExecutorOptions } from './executor.js';
export {
  Pipeline,
  computeExitCode,
  countResults,
  slowestChain,
} from './pipeline.js';
export type { ListEntry, PipelineOptions, PipelineRunOptions, RunSummary } from './pipeline.js';
export { NodeScheduler } from './scheduler.js';
export type { NodeState, SettledNode } from './scheduler.js';
