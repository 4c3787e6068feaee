import { describe, expect, it } from 'vitest';
import { StepRegistry } from '../../../src/steps/registry.js';
import { DuplicateStepError, ParameterError } from '../../../src/utils/errors.js';

const noop = () => {};

describe('StepRegistry', () => {
  it('keeps steps in registration order', () => {
    const registry = new StepRegistry()
      .register({ name: 'b', body: noop })
      .register({ name: 'a', body: noop });
    expect(registry.steps.map((s) => s.name)).toEqual(['b', 'a']);
  });

  it('rejects a duplicate step name', () => {
    const registry = new StepRegistry().register({ name: 'lint', body: noop });
    expect(() => registry.register({ name: 'lint', body: noop })).toThrow(DuplicateStepError);
    expect(() => registry.register({ name: 'lint', body: noop })).toThrow(
      "A step with the name 'lint' has already been registered",
    );
  });

  it('rejects a group named like a step', () => {
    const registry = new StepRegistry().register({ name: 'lint', body: noop });
    expect(() => registry.registerGroup('lint', ['lint'])).toThrow(DuplicateStepError);
  });

  it('validates parameters on registration', () => {
    const registry = new StepRegistry();
    expect(() =>
      registry.register({ name: 'test', body: noop, parameters: [{ name: 'node', values: [] }] }),
    ).toThrow(ParameterError);
    expect(registry.has('test')).toBe(false);
  });

  it('stores groups with their options', () => {
    const registry = new StepRegistry().registerGroup('checks', ['lint', 'types'], {
      runByDefault: false,
    });
    expect(registry.groups).toEqual([
      { name: 'checks', requires: ['lint', 'types'], runByDefault: false },
    ]);
  });

  it('refuses registrations once frozen', () => {
    const registry = new StepRegistry();
    registry.freeze();
    expect(registry.isFrozen).toBe(true);
    expect(() => registry.register({ name: 'late', body: noop })).toThrow(
      "Cannot register 'late': the step registry is frozen",
    );
  });
});
