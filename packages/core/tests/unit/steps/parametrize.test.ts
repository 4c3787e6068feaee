import { describe, expect, it } from 'vitest';
import {
  expandParameters,
  expandStep,
  formatNodeKey,
  renderTemplate,
  validateParameters,
} from '../../../src/steps/parametrize.js';
import type { StepSpec } from '../../../src/types/step.js';
import { ParameterError } from '../../../src/utils/errors.js';

const noop = () => {};

describe('formatNodeKey', () => {
  it('returns the bare name without ids', () => {
    expect(formatNodeKey('lint', [])).toBe('lint');
  });

  it('joins ids with commas', () => {
    expect(formatNodeKey('pytest', ['3.8', 'linux'])).toBe('pytest[3.8,linux]');
  });

  it('drops empty ids', () => {
    expect(formatNodeKey('pytest', ['', '3.9'])).toBe('pytest[3.9]');
    expect(formatNodeKey('pytest', [''])).toBe('pytest');
  });
});

describe('renderTemplate', () => {
  it('replaces known placeholders', () => {
    expect(renderTemplate('node {node} on {os}', { node: 20, os: 'linux' })).toBe('node 20 on linux');
  });

  it('leaves unknown placeholders alone', () => {
    expect(renderTemplate('{missing} and {node}', { node: '18' })).toBe('{missing} and 18');
  });
});

describe('expandParameters', () => {
  it('yields one unparametrized combination without parameters', () => {
    expect(expandParameters('lint')).toEqual([{ id: '', key: 'lint', parameters: {}, runByDefault: true }]);
  });

  it('varies the first parameter slowest', () => {
    const keys = expandParameters('test', [
      { name: 'node', values: ['18', '20'] },
      { name: 'os', values: ['linux', 'mac'] },
    ]).map((c) => c.key);
    expect(keys).toEqual([
      'test[18,linux]',
      'test[18,mac]',
      'test[20,linux]',
      'test[20,mac]',
    ]);
  });

  it('keys a single combination by the bare name', () => {
    const [combo] = expandParameters('test', [{ name: 'node', values: ['20'] }]);
    expect(combo.key).toBe('test');
    expect(combo.id).toBe('20');
    expect(combo.parameters).toEqual({ node: '20' });
  });

  it('uses custom ids in keys', () => {
    const combos = expandParameters('test', [
      { name: 'debug', values: [true, false], ids: ['debug', 'release'] },
    ]);
    expect(combos.map((c) => c.key)).toEqual(['test[debug]', 'test[release]']);
    expect(combos[1].parameters).toEqual({ debug: false });
  });

  it('runs a combination by default only when all of its values do', () => {
    const combos = expandParameters('test', [
      { name: 'node', values: ['18', '20'], runByDefault: [false, true] },
      { name: 'os', values: ['linux', 'mac'], runByDefault: [true, false] },
    ]);
    expect(combos.map((c) => [c.key, c.runByDefault])).toEqual([
      ['test[18,linux]', false],
      ['test[18,mac]', false],
      ['test[20,linux]', true],
      ['test[20,mac]', false],
    ]);
  });

  it('stringifies non-string values for ids', () => {
    const combos = expandParameters('bench', [{ name: 'size', values: [1, 10] }]);
    expect(combos.map((c) => c.key)).toEqual(['bench[1]', 'bench[10]']);
  });
});

describe('validateParameters', () => {
  it('rejects duplicate parameter names', () => {
    expect(() =>
      validateParameters('test', [
        { name: 'node', values: ['18'] },
        { name: 'node', values: ['20'] },
      ]),
    ).toThrow("Cannot parametrize 'test': 'node' was already specified previously");
  });

  it('rejects a parameter without values', () => {
    expect(() => validateParameters('test', [{ name: 'node', values: [] }])).toThrow(ParameterError);
  });

  it('rejects ids that do not match the values', () => {
    expect(() =>
      validateParameters('test', [{ name: 'node', values: ['18', '20'], ids: ['a'] }]),
    ).toThrow("Cannot parametrize 'test': 2 values were passed for 'node', but 1 ids were given");
  });

  it('rejects runByDefault flags that do not match the values', () => {
    expect(() =>
      validateParameters('test', [{ name: 'node', values: ['18', '20'], runByDefault: [true] }]),
    ).toThrow(
      "Cannot parametrize 'test': 2 values were passed for 'node', but 1 runByDefault flags were given",
    );
  });

  it('rejects reserved and malformed names', () => {
    expect(() => validateParameters('test', [{ name: 'args', values: ['x'] }])).toThrow(
      "'args' is reserved",
    );
    expect(() => validateParameters('test', [{ name: '1st', values: ['x'] }])).toThrow(
      "'1st' is not a valid parameter name",
    );
  });
});

describe('expandStep', () => {
  const spec: StepSpec = {
    name: 'pytest',
    body: noop,
    description: 'run tests on python {python}',
    parameters: [{ name: 'python', values: ['3.8', '3.9'] }],
    requires: ['package'],
    dependencies: ['pytest'],
  };

  it('is deterministic', () => {
    const first = expandStep(spec).map((n) => n.key);
    const second = expandStep(spec).map((n) => n.key);
    expect(first).toEqual(['pytest[3.8]', 'pytest[3.9]']);
    expect(second).toEqual(first);
  });

  it('copies the spec attributes to every node', () => {
    const [node] = expandStep(spec);
    expect(node.kind).toBe('step');
    expect(node.name).toBe('pytest');
    expect(node.requires).toEqual(['package']);
    expect(node.dependencies).toEqual(['pytest']);
    expect(node.runByDefault).toBe(true);
    expect(node.parameters).toEqual({ python: '3.8' });
    expect(node.description).toBe('run tests on python 3.8');
  });

  it('fills placeholders in requirements, dependencies and setenv per variant', () => {
    const nodes = expandStep({
      name: 'test',
      body: noop,
      parameters: [{ name: 'django', values: ['3.0', '4.0'] }],
      requires: ['build[{django}]'],
      dependencies: ['django=={django}', 'vitest'],
      setenv: { DJANGO_VERSION: '{django}', MODE: 'ci' },
    });
    expect(nodes.map((n) => [n.key, n.requires, n.dependencies, n.setenv])).toEqual([
      ['test[3.0]', ['build[3.0]'], ['django==3.0', 'vitest'], { DJANGO_VERSION: '3.0', MODE: 'ci' }],
      ['test[4.0]', ['build[4.0]'], ['django==4.0', 'vitest'], { DJANGO_VERSION: '4.0', MODE: 'ci' }],
    ]);
  });

  it('takes runByDefault per variant', () => {
    const nodes = expandStep({
      name: 'test',
      body: noop,
      parameters: [{ name: 'node', values: ['18', '20'], runByDefault: [false, true] }],
    });
    expect(nodes.map((n) => n.runByDefault)).toEqual([false, true]);

    const disabled = expandStep({
      name: 'test',
      body: noop,
      runByDefault: false,
      parameters: [{ name: 'node', values: ['18', '20'], runByDefault: [false, true] }],
    });
    expect(disabled.map((n) => n.runByDefault)).toEqual([false, false]);
  });

  it('wraps function bodies into handlers', () => {
    const [node] = expandStep({ name: 'lint', body: noop });
    expect(node.handler.run).toBe(noop);
    expect(node.key).toBe('lint');
  });
});
