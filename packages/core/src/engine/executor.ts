// packages/core/src/engine/executor.ts: Bounded-concurrency execution of a plan

import { mkdir, writeFile } from 'node:fs/promises';
import { availableParallelism } from 'node:os';
import { join } from 'node:path';
import { hashContent } from '../environment/fingerprint.js';
import { slugify } from '../environment/local-cache.js';
import { type ProcessManager, buildCommandEnv } from '../environment/process-manager.js';
import type { EnvironmentCache, EnvironmentHandle } from '../types/environment.js';
import type { Graph, StepNode } from '../types/graph.js';
import type { ExecutionPlan, PlanEntry } from '../types/plan.js';
import type { CancelReason, NodeResult } from '../types/results.js';
import type { RunContext } from '../types/step.js';
import { DEFAULT_KILL_GRACE_MS } from '../utils/constants.js';
import { CommandError, StepFailedError, describeError } from '../utils/errors.js';
import { generateRunId } from '../utils/id.js';
import type { Logger } from '../utils/logger.js';
import { CancellationError, CancellationToken } from './cancellation.js';
import type { EventBus } from './event-bus.js';
import { NodeScheduler, type SettledNode } from './scheduler.js';

export interface ExecutorOptions {
  graph: Graph;
  cache: EnvironmentCache;
  processes: ProcessManager;
  eventBus: EventBus;
  logger: Logger;
  cacheDir: string;
  /** Working directory of commands that do not set one. */
  projectDir: string;
  /** Host variables forwarded to every step. */
  passenv?: readonly string[];
  killGraceMs?: number;
}

export interface ExecuteOptions {
  /** Worker count. 0 or unset means host parallelism. */
  maxParallelism?: number;
  failFast?: boolean;
  /** External interrupt. Cancels every node and terminates running processes. */
  interrupt?: CancellationToken;
  /** Arguments after `--`, handed to every node. */
  userArgs?: readonly string[];
  runId?: string;
}

export function resolveParallelism(requested?: number): number {
  return requested !== undefined && requested > 0 ? Math.floor(requested) : availableParallelism();
}

function fileSafe(key: string): string {
  return key.replace(/[/\\:*?"<>|\s]/g, '_');
}

/** Scratch directory of a node, kept across runs until cleaned. */
export function nodeCachePath(cacheDir: string, key: string): string {
  return join(cacheDir, 'cache', `${slugify(key)}-${hashContent(key)}`);
}

export function nodeLogPath(cacheDir: string, key: string): string {
  return join(cacheDir, 'logs', `${fileSafe(key)}.log`);
}

/** Requirement keys with groups replaced by their members, in order. */
function directStepRequirements(graph: Graph, requires: readonly string[]): string[] {
  const keys = requires.flatMap((req) => {
    const required = graph.nodes.get(req);
    return required?.kind === 'group' ? required.members : [req];
  });
  return [...new Set(keys)];
}

export class Executor {
  constructor(private readonly options: ExecutorOptions) {}

  /** Run every entry of the plan. Resolves once all of them have a result. */
  async execute(plan: ExecutionPlan, options: ExecuteOptions = {}): Promise<Map<string, NodeResult>> {
    const { graph, eventBus, logger } = this.options;
    const maxParallelism = resolveParallelism(options.maxParallelism);
    const scheduler = new NodeScheduler(plan.entries);
    const stopToken = new CancellationToken();
    const entries = new Map(plan.entries.map((e) => [e.key, e]));
    const artifacts = new Map<string, Record<string, unknown[]>>();
    const workers = new Map<string, Promise<void>>();
    let terminating: Promise<void> = Promise.resolve();
    let interrupted = false;

    const publish = (settled: readonly SettledNode[]): void => {
      for (const [key, result] of settled) this.emitResult(key, result);
    };

    const stop = (reason: CancelReason): void => {
      if (scheduler.isStopped) return;
      const settled = scheduler.stop(reason);
      logger.debug('Stopping run (%s), %d nodes cancelled', reason, settled.length);
      eventBus.emitEvent({ type: 'run.stopping', reason, timestamp: '' });
      publish(settled);
      stopToken.cancel(reason);
    };

    const complete = (key: string, outcome: NodeResult): void => {
      let result = outcome;
      if (interrupted && outcome.status !== 'success') {
        result = { status: 'cancelled', reason: 'interrupt' };
      }
      publish(scheduler.complete(key, result));
      if (result.status === 'failure' && options.failFast) stop('fail-fast');
    };

    const dispatch = (): void => {
      let progressed = true;
      while (progressed) {
        progressed = false;
        for (const key of scheduler.readyKeys()) {
          const node = graph.nodes.get(key);
          const entry = entries.get(key);
          if (!node || !entry) {
            throw new Error(`Plan entry '${key}' is not part of the graph`);
          }
          if (node.kind === 'group') {
            scheduler.start(key);
            complete(key, { status: 'success', durationMs: 0 });
            progressed = true;
            continue;
          }
          if (workers.size >= maxParallelism) continue;

          scheduler.start(key);
          const worker = this.runNode(node, entry, {
            stopToken,
            artifacts,
            userArgs: options.userArgs ?? [],
            stopReason: () => scheduler.stopReason,
          }).then((result) => {
            workers.delete(key);
            complete(key, result);
          });
          workers.set(key, worker);
          progressed = true;
        }
      }
    };

    const onInterrupt = (): void => {
      interrupted = true;
      stop('interrupt');
      terminating = this.options.processes.terminateAll(
        this.options.killGraceMs ?? DEFAULT_KILL_GRACE_MS,
      );
    };

    eventBus.emitEvent({
      type: 'run.started',
      runId: options.runId ?? generateRunId(),
      steps: plan.entries.map((e) => e.key),
      maxParallelism,
      timestamp: '',
    });

    options.interrupt?.onCancel(onInterrupt);
    try {
      dispatch();
      while (workers.size > 0) {
        await Promise.race(workers.values());
        dispatch();
      }
      await terminating;
    } finally {
      options.interrupt?.offCancel(onInterrupt);
    }

    if (!scheduler.isDone) {
      throw new Error('Execution stalled with unresolved nodes');
    }
    return scheduler.allResults();
  }

  private emitResult(key: string, result: NodeResult): void {
    const { eventBus, logger } = this.options;
    switch (result.status) {
      case 'success':
        eventBus.emitEvent({
          type: 'node.completed',
          key,
          durationMs: result.durationMs,
          timestamp: '',
        });
        break;
      case 'failure':
        logger.debug('%s failed: %s', key, describeError(result.cause));
        eventBus.emitEvent({
          type: 'node.failed',
          key,
          error: describeError(result.cause),
          durationMs: result.durationMs,
          timestamp: '',
        });
        break;
      case 'skipped':
        eventBus.emitEvent({ type: 'node.skipped', key, blockedBy: result.blockedBy, timestamp: '' });
        break;
      case 'cancelled':
        eventBus.emitEvent({ type: 'node.cancelled', key, reason: result.reason, timestamp: '' });
        break;
    }
  }

  private async runNode(
    node: StepNode,
    entry: PlanEntry,
    run: {
      stopToken: CancellationToken;
      artifacts: Map<string, Record<string, unknown[]>>;
      userArgs: readonly string[];
      stopReason: () => CancelReason | null;
    },
  ): Promise<NodeResult> {
    const { cache, cacheDir, eventBus } = this.options;
    const start = Date.now();
    const chunks: string[] = [];
    const capture = (chunk: string): void => {
      chunks.push(chunk);
    };

    eventBus.emitEvent({ type: 'node.started', key: node.key, phase: entry.phase, timestamp: '' });

    let result: NodeResult;
    try {
      const cachePath = nodeCachePath(cacheDir, node.key);
      await mkdir(cachePath, { recursive: true });

      let environment: EnvironmentHandle;
      if (entry.phase === 'run-only') {
        environment = cache.locate(node.key);
      } else {
        environment = await cache.ensure(node.key, node.dependencies, {
          token: run.stopToken,
          onOutput: capture,
        });
        eventBus.emitEvent({
          type: 'node.setup',
          key: node.key,
          reused: environment.reused,
          fingerprint: environment.fingerprint,
          timestamp: '',
        });
      }

      const ctx = this.createContext(node, entry, environment, cachePath, run, capture);
      if (entry.phase !== 'run-only' && node.handler.setup) {
        await node.handler.setup(ctx);
      }
      if (entry.phase !== 'setup-only') {
        await this.setupFromRequirements(entry, ctx);
        const outcome = await node.handler.run(ctx);
        if (outcome === false) throw new StepFailedError(node.key);
        if (node.handler.artifacts) run.artifacts.set(node.key, node.handler.artifacts(ctx));
      }
      result = { status: 'success', durationMs: Date.now() - start };
    } catch (err) {
      result =
        err instanceof CancellationError
          ? { status: 'cancelled', reason: run.stopReason() ?? 'interrupt' }
          : { status: 'failure', cause: err, durationMs: Date.now() - start };
    }

    await this.flushOutput(node.key, chunks.join(''));
    return result;
  }

  private async setupFromRequirements(entry: PlanEntry, dependent: RunContext): Promise<void> {
    const { cache, cacheDir, graph, logger } = this.options;
    for (const key of directStepRequirements(graph, entry.requires)) {
      const required = graph.nodes.get(key);
      if (required?.kind !== 'step' || !required.handler.setupDependent) continue;
      dependent.signal.throwIfCancelled();
      logger.debug('Setting up %s from %s', dependent.key, key);
      await required.handler.setupDependent(
        {
          key,
          name: required.name,
          parameters: required.parameters,
          environment: cache.locate(key),
          cachePath: nodeCachePath(cacheDir, key),
        },
        dependent,
      );
    }
  }

  private createContext(
    node: StepNode,
    entry: PlanEntry,
    environment: EnvironmentHandle,
    cachePath: string,
    run: {
      stopToken: CancellationToken;
      artifacts: Map<string, Record<string, unknown[]>>;
      userArgs: readonly string[];
    },
    capture: (chunk: string) => void,
  ): RunContext {
    const { cache, graph, projectDir } = this.options;
    const baseEnv = buildCommandEnv({
      passenv: [...(this.options.passenv ?? []), ...node.passenv],
      setenv: node.setenv,
    });

    return {
      key: node.key,
      name: node.name,
      parameters: node.parameters,
      userArgs: run.userArgs,
      environment,
      cachePath,
      signal: run.stopToken,
      async exec(command, execOptions = {}) {
        capture(`$ ${command.join(' ')}\n`);
        const result = await cache.run(environment, command, {
          cwd: execOptions.cwd ?? projectDir,
          env: { ...baseEnv, ...(execOptions.env ?? {}) },
          token: run.stopToken,
          onOutput: capture,
        });
        if (result.exitCode !== 0) {
          throw new CommandError(command, result.exitCode, result.output);
        }
        return result;
      },
      log(message) {
        capture(`${message}\n`);
      },
      getArtifacts(name) {
        return directStepRequirements(graph, entry.requires).flatMap(
          (key) => run.artifacts.get(key)?.[name] ?? [],
        );
      },
    };
  }

  // The whole output of a node goes out as one unit.
  private async flushOutput(key: string, output: string): Promise<void> {
    const logFile = nodeLogPath(this.options.cacheDir, key);
    try {
      await mkdir(join(this.options.cacheDir, 'logs'), { recursive: true });
      await writeFile(logFile, output, 'utf-8');
    } catch (err) {
      this.options.logger.warn('Could not write log file %s: %s', logFile, describeError(err));
    }
    this.options.eventBus.emitEvent({ type: 'node.output', key, output, logFile });
  }
}
