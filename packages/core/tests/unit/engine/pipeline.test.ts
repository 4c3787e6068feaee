import { existsSync, mkdirSync, mkdtempSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { DEFAULT_CONFIG } from '../../../src/config/defaults.js';
import { nodeCachePath } from '../../../src/engine/executor.js';
import {
  Pipeline,
  computeExitCode,
  countResults,
  slowestChain,
} from '../../../src/engine/pipeline.js';
import { buildGraph } from '../../../src/graph/builder.js';
import { select } from '../../../src/graph/selector.js';
import type { StepRegistry } from '../../../src/steps/registry.js';
import type { EngineEvent } from '../../../src/types/events.js';
import type { NodeResult } from '../../../src/types/results.js';
import { createLogger } from '../../../src/utils/logger.js';
import { FakeEnvironmentCache } from '../../helpers/fake-cache.js';
import { pytestRegistry, registryOf } from '../../helpers/registry.js';

let projectDir: string;

beforeEach(() => {
  projectDir = mkdtempSync(join(tmpdir(), 'stepyard-pipeline-'));
});

afterEach(() => {
  rmSync(projectDir, { recursive: true, force: true });
});

function createPipeline(registry: StepRegistry) {
  const cache = new FakeEnvironmentCache();
  const pipeline = new Pipeline({
    registry,
    config: { ...DEFAULT_CONFIG, jobs: 2 },
    projectDir,
    cache,
    logger: createLogger('error', { sink: () => undefined }),
  });
  const events: EngineEvent[] = [];
  pipeline.eventBus.on('event', (event) => events.push(event));
  return { pipeline, cache, events };
}

describe('Pipeline', () => {
  it('places the cache directory under the project', () => {
    const { pipeline } = createPipeline(pytestRegistry());
    expect(pipeline.cacheDir).toBe(join(projectDir, '.stepyard'));
  });

  it('runs the default selection and summarizes it', async () => {
    const { pipeline, events } = createPipeline(pytestRegistry());

    const summary = await pipeline.run();

    expect(summary.counts).toEqual({ success: 4, failure: 0, skipped: 0, cancelled: 0 });
    expect(summary.exitCode).toBe(0);
    expect(summary.error).toBeNull();
    expect(summary.runId).toMatch(/^run_/);
    expect(summary.slowestChain?.keys[0]).toBe('package');
    expect(events.at(-1)).toEqual(
      expect.objectContaining({ type: 'run.completed', runId: summary.runId, counts: summary.counts }),
    );
  });

  it('exits non-zero when a requirement fails', async () => {
    const registry = registryOf(
      { name: 'package', body: () => false },
      { name: 'pytest', requires: ['package'], parameters: [{ name: 'python', values: ['3.8', '3.9'] }] },
    );
    const { pipeline } = createPipeline(registry);

    const summary = await pipeline.run();

    expect(summary.counts).toEqual({ success: 0, failure: 1, skipped: 3, cancelled: 0 });
    expect(summary.exitCode).toBe(1);
    expect(summary.error?.message).toBe('1 job failed, 3 jobs could not run');
  });

  it('emits selection warnings', () => {
    const { pipeline, events } = createPipeline(pytestRegistry());
    pipeline.plan({ except: ['package'] });
    expect(events).toEqual([
      {
        type: 'selection.warning',
        key: 'package',
        requiredBy: 'pytest[3.8]',
        message: "'package' was excluded but is required by 'pytest[3.8]', it will run anyway",
      },
    ]);
  });

  it('lists every node with its selection state', () => {
    const registry = pytestRegistry().registerGroup('docs', ['package'], {
      description: 'documentation',
      runByDefault: false,
    });
    const { pipeline } = createPipeline(registry);

    const entries = pipeline.list({ only: ['pytest[3.8]'] });

    expect(entries.map((e) => [e.key, e.kind, e.selected])).toEqual([
      ['package', 'step', true],
      ['pytest[3.8]', 'step', true],
      ['pytest[3.9]', 'step', false],
      ['pytest', 'group', false],
      ['docs', 'group', false],
    ]);
    expect(entries[4]).toEqual({
      key: 'docs',
      kind: 'group',
      selected: false,
      excludedButRequired: false,
      requires: ['package'],
      description: 'documentation',
    });
  });

  it('cleans environments and scratch directories of selected steps first', async () => {
    const cleaned: string[] = [];
    const registry = registryOf(
      {
        name: 'build',
        body: {
          run: () => undefined,
          clean: (ctx) => {
            cleaned.push(ctx.key);
          },
        },
      },
      { name: 'docs', runByDefault: false },
    );
    const { pipeline, cache } = createPipeline(registry);
    const stale = join(nodeCachePath(pipeline.cacheDir, 'build'), 'stale');
    mkdirSync(stale, { recursive: true });

    await pipeline.run({ clean: true });

    expect(cleaned).toEqual(['build']);
    expect(cache.removed).toEqual(['build']);
    expect(existsSync(stale)).toBe(false);
  });

  it('forwards user arguments to command steps', async () => {
    const registry = registryOf({
      name: 'test',
      body: async (ctx) => {
        await ctx.exec(['vitest', 'run', ...ctx.userArgs]);
      },
    });
    const { pipeline, cache } = createPipeline(registry);

    await pipeline.run({ userArgs: ['--silent'] });

    expect(cache.runs.map((r) => r.command)).toEqual([['vitest', 'run', '--silent']]);
  });

  it('reuses environments on the second run', async () => {
    const { pipeline, events } = createPipeline(registryOf({ name: 'build', dependencies: ['esbuild'] }));

    await pipeline.run();
    await pipeline.run();

    const setups = events.filter((e) => e.type === 'node.setup');
    expect(setups.map((e) => e.type === 'node.setup' && e.reused)).toEqual([false, true]);
  });
});

describe('result helpers', () => {
  const results = new Map<string, NodeResult>([
    ['package', { status: 'success', durationMs: 30 }],
    ['pytest[3.8]', { status: 'success', durationMs: 50 }],
    ['pytest[3.9]', { status: 'failure', cause: new Error('boom'), durationMs: 70 }],
    ['pytest', { status: 'skipped', blockedBy: 'pytest[3.9]', reason: "'pytest[3.9]' failed" }],
  ]);

  it('counts results by status', () => {
    expect(countResults(results)).toEqual({ success: 2, failure: 1, skipped: 1, cancelled: 0 });
  });

  it('derives the exit code', () => {
    expect(computeExitCode({ success: 3, failure: 0, skipped: 0, cancelled: 0 })).toBe(0);
    expect(computeExitCode({ success: 3, failure: 0, skipped: 0, cancelled: 1 })).toBe(1);
    expect(computeExitCode({ success: 0, failure: 1, skipped: 0, cancelled: 0 })).toBe(1);
  });

  it('finds the slowest requirement chain', () => {
    const graph = buildGraph(pytestRegistry());
    const plan = select(graph);
    expect(slowestChain(graph, plan, results)).toEqual({
      keys: ['package', 'pytest[3.9]'],
      durationMs: 100,
    });
  });

  it('has no chain when nothing ran', () => {
    const graph = buildGraph(pytestRegistry());
    expect(slowestChain(graph, select(graph), new Map())).toBeNull();
  });
});
