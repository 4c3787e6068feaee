// packages/core/src/engine/pipeline.ts: Registry to results, for one invocation

import { rm } from 'node:fs/promises';
import { isAbsolute, join } from 'node:path';
import { NpmInstaller } from '../environment/installer.js';
import { LocalEnvironmentCache } from '../environment/local-cache.js';
import { ProcessManager } from '../environment/process-manager.js';
import { buildGraph } from '../graph/builder.js';
import { select } from '../graph/selector.js';
import type { StepRegistry } from '../steps/registry.js';
import type { ProjectConfig } from '../types/config.js';
import type { EnvironmentCache } from '../types/environment.js';
import type { Graph, GraphNode } from '../types/graph.js';
import type { ExecutionPlan, SelectionOptions } from '../types/plan.js';
import type { DependencyChain, NodeResult, ResultCounts } from '../types/results.js';
import { FailedPipelineError } from '../utils/errors.js';
import { generateRunId } from '../utils/id.js';
import { type Logger, createLogger } from '../utils/logger.js';
import type { CancellationToken } from './cancellation.js';
import { EventBus } from './event-bus.js';
import { Executor, nodeCachePath, resolveParallelism } from './executor.js';

export interface PipelineOptions {
  registry: StepRegistry;
  config: ProjectConfig;
  projectDir: string;
  eventBus?: EventBus;
  logger?: Logger;
  /** Defaults to a LocalEnvironmentCache under the configured cache directory. */
  cache?: EnvironmentCache;
  processes?: ProcessManager;
}

export interface PipelineRunOptions extends SelectionOptions {
  /** Drop cached environments and scratch directories of the selected steps first. */
  clean?: boolean;
  userArgs?: readonly string[];
  interrupt?: CancellationToken;
  /** Overrides `config.jobs`. */
  jobs?: number;
  /** Overrides `config.failFast`. */
  failFast?: boolean;
}

export interface RunSummary {
  runId: string;
  plan: ExecutionPlan;
  results: Map<string, NodeResult>;
  counts: ResultCounts;
  slowestChain: DependencyChain | null;
  durationMs: number;
  exitCode: number;
  /** Set when at least one node failed or was cancelled. */
  error: FailedPipelineError | null;
}

export interface ListEntry {
  key: string;
  kind: GraphNode['kind'];
  selected: boolean;
  excludedButRequired: boolean;
  requires: readonly string[];
  description?: string;
}

export function countResults(results: ReadonlyMap<string, NodeResult>): ResultCounts {
  const counts: ResultCounts = { success: 0, failure: 0, skipped: 0, cancelled: 0 };
  for (const result of results.values()) counts[result.status]++;
  return counts;
}

/** 0 when nothing failed or was cancelled, 1 otherwise. */
export function computeExitCode(counts: ResultCounts): number {
  return counts.failure > 0 || counts.cancelled > 0 ? 1 : 0;
}

/**
 * Most expensive requires path among the nodes that ran. Groups take no time
 * and are left out of the returned keys.
 */
export function slowestChain(
  graph: Graph,
  plan: ExecutionPlan,
  results: ReadonlyMap<string, NodeResult>,
): DependencyChain | null {
  const best = new Map<string, DependencyChain>();
  let slowest: DependencyChain | null = null;

  for (const entry of plan.entries) {
    const result = results.get(entry.key);
    if (!result || (result.status !== 'success' && result.status !== 'failure')) continue;

    let previous: DependencyChain | null = null;
    for (const req of entry.requires) {
      const chain = best.get(req);
      if (chain && (previous === null || chain.durationMs > previous.durationMs)) previous = chain;
    }
    const before = previous ?? { keys: [], durationMs: 0 };
    const isGroup = graph.nodes.get(entry.key)?.kind === 'group';
    const chain: DependencyChain = {
      keys: isGroup ? before.keys : [...before.keys, entry.key],
      durationMs: before.durationMs + result.durationMs,
    };
    best.set(entry.key, chain);
    if (chain.keys.length > 0 && (slowest === null || chain.durationMs > slowest.durationMs)) {
      slowest = chain;
    }
  }
  return slowest;
}

/**
 * Builds the graph once, then plans, lists and runs selections of it.
 * Definition errors surface from the constructor.
 */
export class Pipeline {
  readonly graph: Graph;
  readonly eventBus: EventBus;
  readonly cacheDir: string;
  private readonly logger: Logger;
  private readonly processes: ProcessManager;
  private cache: EnvironmentCache | null;

  constructor(private readonly options: PipelineOptions) {
    this.graph = buildGraph(options.registry);
    this.eventBus = options.eventBus ?? new EventBus();
    this.logger = (options.logger ?? createLogger(options.config.logLevel)).child('pipeline');
    this.processes = options.processes ?? new ProcessManager();
    this.cache = options.cache ?? null;
    this.cacheDir = isAbsolute(options.config.cacheDir)
      ? options.config.cacheDir
      : join(options.projectDir, options.config.cacheDir);
  }

  get processManager(): ProcessManager {
    return this.processes;
  }

  /** Select nodes. Warnings are emitted as events. */
  plan(selection: SelectionOptions = {}): ExecutionPlan {
    const plan = select(this.graph, selection);
    for (const warning of plan.warnings) {
      this.logger.debug(warning.message);
      this.eventBus.emitEvent({ type: 'selection.warning', ...warning });
    }
    return plan;
  }

  /** Every node in declaration order, marked with whether the selection includes it. */
  list(selection: SelectionOptions = {}): ListEntry[] {
    const plan = select(this.graph, selection);
    const selected = new Map(plan.entries.map((e) => [e.key, e]));
    return this.graph.declarationOrder.flatMap((key) => {
      const node = this.graph.nodes.get(key);
      if (!node) return [];
      return [
        {
          key,
          kind: node.kind,
          selected: selected.has(key),
          excludedButRequired: selected.get(key)?.excludedButRequired ?? false,
          requires: this.graph.requires.get(key) ?? [],
          description: node.description,
        },
      ];
    });
  }

  async run(options: PipelineRunOptions = {}): Promise<RunSummary> {
    const runId = generateRunId();
    const started = Date.now();
    const plan = this.plan(options);
    const cache = this.environmentCache();

    if (options.clean) {
      await this.clean(plan, cache);
    }

    const executor = new Executor({
      graph: this.graph,
      cache,
      processes: this.processes,
      eventBus: this.eventBus,
      logger: this.logger.child('executor'),
      cacheDir: this.cacheDir,
      projectDir: this.options.projectDir,
      passenv: this.options.config.passenv,
      killGraceMs: this.options.config.killGraceMs,
    });

    const results = await executor.execute(plan, {
      runId,
      maxParallelism: resolveParallelism(options.jobs ?? this.options.config.jobs),
      failFast: options.failFast ?? this.options.config.failFast,
      interrupt: options.interrupt,
      userArgs: options.userArgs,
    });

    const counts = countResults(results);
    const chain = slowestChain(this.graph, plan, results);
    const durationMs = Date.now() - started;
    const exitCode = computeExitCode(counts);

    this.eventBus.emitEvent({
      type: 'run.completed',
      runId,
      counts,
      slowestChain: chain,
      durationMs,
      timestamp: '',
    });

    return {
      runId,
      plan,
      results,
      counts,
      slowestChain: chain,
      durationMs,
      exitCode,
      error:
        exitCode === 0 ? null : new FailedPipelineError(counts.failure, counts.skipped, counts.cancelled),
    };
  }

  private environmentCache(): EnvironmentCache {
    if (this.cache) return this.cache;
    const local = new LocalEnvironmentCache({
      cacheDir: this.cacheDir,
      installer: new NpmInstaller(this.processes, this.options.config.installer.command),
      processes: this.processes,
      logger: this.logger.child('environment'),
    });
    this.cache = local;
    return local;
  }

  private async clean(plan: ExecutionPlan, cache: EnvironmentCache): Promise<void> {
    for (const entry of plan.entries) {
      const node = this.graph.nodes.get(entry.key);
      if (node?.kind !== 'step') continue;
      const cachePath = nodeCachePath(this.cacheDir, node.key);
      this.logger.debug('Cleaning %s', node.key);
      await node.handler.clean?.({
        key: node.key,
        name: node.name,
        parameters: node.parameters,
        cachePath,
      });
      await cache.remove(node.key);
      await rm(cachePath, { recursive: true, force: true });
    }
  }
}
