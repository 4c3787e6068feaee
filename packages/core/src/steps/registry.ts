// packages/core/src/steps/registry.ts

import type { GroupSpec, StepSpec } from '../types/step.js';
import { DuplicateStepError } from '../utils/errors.js';
import { validateParameters } from './parametrize.js';

/**
 * Ordered collection of declared steps and groups for one invocation.
 * Filled during registration, then frozen by the graph builder.
 */
export class StepRegistry {
  private readonly stepSpecs = new Map<string, StepSpec>();
  private readonly groupSpecs = new Map<string, GroupSpec>();
  private frozen = false;

  register(spec: StepSpec): this {
    this.assertWritable(spec.name);
    validateParameters(spec.name, spec.parameters ?? []);
    this.stepSpecs.set(spec.name, spec);
    return this;
  }

  registerGroup(
    name: string,
    requires: readonly string[],
    options: { description?: string; runByDefault?: boolean } = {},
  ): this {
    this.assertWritable(name);
    this.groupSpecs.set(name, { name, requires: [...requires], ...options });
    return this;
  }

  has(name: string): boolean {
    return this.stepSpecs.has(name) || this.groupSpecs.has(name);
  }

  get steps(): readonly StepSpec[] {
    return [...this.stepSpecs.values()];
  }

  get groups(): readonly GroupSpec[] {
    return [...this.groupSpecs.values()];
  }

  get isFrozen(): boolean {
    return this.frozen;
  }

  /** Make the registry read-only. Further registrations throw. */
  freeze(): void {
    this.frozen = true;
  }

  private assertWritable(name: string): void {
    if (this.frozen) {
      throw new Error(`Cannot register '${name}': the step registry is frozen`);
    }
    if (this.has(name)) {
      throw new DuplicateStepError(name);
    }
  }
}
