import { mkdirSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join, resolve } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { buildGraph } from '../../../src/graph/builder.js';
import { normalizeBody } from '../../../src/steps/parametrize.js';
import { loadStepfile, parseStepfile } from '../../../src/steps/stepfile.js';
import { StepfileError } from '../../../src/utils/errors.js';
import { fakeContext } from '../../helpers/context.js';

const STEPFILE = `
steps:
  package:
    description: build the tarball
    run: npm pack --pack-destination {cache}
  pytest:
    description: tests on {python}
    parameters:
      python: ["3.8", "3.9"]
    requires: [package]
    dependencies: [vitest]
    passenv: [CI]
    setenv:
      LEVEL: 3
    run:
      - echo "python {python}"
      - vitest run
groups:
  all:
    requires: [pytest, package]
    runByDefault: false
`;

describe('parseStepfile', () => {
  it('registers steps and groups in file order', () => {
    const registry = parseStepfile(STEPFILE, { baseDir: '/project' });
    expect(registry.steps.map((s) => s.name)).toEqual(['package', 'pytest']);
    expect(registry.groups).toEqual([
      { name: 'all', requires: ['pytest', 'package'], description: undefined, runByDefault: false },
    ]);
  });

  it('maps step attributes', () => {
    const registry = parseStepfile(STEPFILE, { baseDir: '/project' });
    const pytest = registry.steps[1];
    expect(pytest.parameters).toEqual([{ name: 'python', values: ['3.8', '3.9'] }]);
    expect(pytest.requires).toEqual(['package']);
    expect(pytest.dependencies).toEqual(['vitest']);
    expect(pytest.passenv).toEqual(['CI']);
    expect(pytest.setenv).toEqual({ LEVEL: '3' });
    expect(pytest.runByDefault).toBe(true);
  });

  it('accepts the list form of parameters with ids', () => {
    const registry = parseStepfile(
      `
steps:
  build:
    parameters:
      - name: mode
        values: [true, false]
        ids: [debug, release]
    run: make
`,
    );
    expect(registry.steps[0].parameters).toEqual([
      { name: 'mode', values: [true, false], ids: ['debug', 'release'] },
    ]);
  });

  it('takes runByDefault per value in the list form', () => {
    const registry = parseStepfile(
      `
steps:
  test:
    parameters:
      - name: node
        values: ["18", "20"]
        runByDefault: [false, true]
    run: vitest run
`,
    );
    expect(registry.steps[0].parameters).toEqual([
      { name: 'node', values: ['18', '20'], runByDefault: [false, true] },
    ]);
  });

  it('keeps version numbers as written', () => {
    const registry = parseStepfile(
      `
steps:
  pytest:
    parameters:
      python: [3.9, 3.10, 3.11]
    setenv:
      TARGET: 3.10
      WORKERS: 4
    run: pytest
`,
    );
    const [pytest] = registry.steps;
    expect(pytest.parameters).toEqual([{ name: 'python', values: [3.9, '3.10', 3.11] }]);
    expect(pytest.setenv).toEqual({ TARGET: '3.10', WORKERS: '4' });
    expect(buildGraph(registry).declarationOrder).toEqual([
      'pytest[3.9]',
      'pytest[3.10]',
      'pytest[3.11]',
      'pytest',
    ]);
  });

  it('builds command bodies that run in the stepfile directory', async () => {
    const registry = parseStepfile(STEPFILE, { baseDir: '/project' });
    const handler = normalizeBody(registry.steps[1].body);
    const { ctx, commands } = fakeContext({ parameters: { python: '3.8' }, userArgs: ['-x'] });
    await handler.run(ctx);
    expect(commands).toEqual([
      { command: ['echo', 'python 3.8'], cwd: resolve('/project', '.') },
      { command: ['vitest', 'run', '-x'], cwd: resolve('/project', '.') },
    ]);
  });

  it('returns an empty registry for an empty file', () => {
    const registry = parseStepfile('');
    expect(registry.steps).toEqual([]);
    expect(registry.groups).toEqual([]);
  });

  it('rejects invalid step definitions', () => {
    expect(() => parseStepfile('steps:\n  a:\n    run: 1\n')).toThrow(StepfileError);
    expect(() => parseStepfile('steps:\n  a:\n    run: 1\n')).toThrow(/steps\.a\.run/);
  });

  it('rejects unknown keys', () => {
    expect(() => parseStepfile('steps:\n  a:\n    command: make\n')).toThrow(/Invalid stepfile/);
  });

  it('rejects unterminated quotes in commands', () => {
    expect(() => parseStepfile(`steps:\n  a:\n    run: 'echo "oops'\n`)).toThrow(
      `step 'a': Unterminated double quote in: echo "oops`,
    );
  });

  it('rejects malformed YAML', () => {
    expect(() => parseStepfile('steps: [\n', { source: 'stepyard.yml' })).toThrow(
      /^Unable to load stepyard\.yml: Failed to parse YAML/,
    );
  });
});

describe('loadStepfile', () => {
  const dir = join(tmpdir(), `stepyard-stepfile-${process.pid}-${Date.now()}`);

  beforeEach(() => {
    mkdirSync(dir, { recursive: true });
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('loads a file from disk', () => {
    const path = join(dir, 'stepyard.yml');
    writeFileSync(path, 'steps:\n  lint:\n    run: eslint .\n', 'utf-8');
    const registry = loadStepfile(path);
    expect(registry.steps.map((s) => s.name)).toEqual(['lint']);
  });

  it('fails for a missing file', () => {
    const path = join(dir, 'missing.yml');
    expect(() => loadStepfile(path)).toThrow(`Unable to load ${path}: file not found`);
  });
});
