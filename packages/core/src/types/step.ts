// packages/core/src/types/step.ts

import type { CancellationToken } from '../engine/cancellation.js';
import type { CommandResult, EnvironmentHandle } from './environment.js';

export type ParameterValue = string | number | boolean;

/**
 * One axis of a step's parametrization. The step expands to the cartesian
 * product of every axis, in declaration order.
 */
export interface StepParameter {
  name: string;
  values: readonly ParameterValue[];
  /** Display id per value, used in node keys. Defaults to `String(value)`. */
  ids?: readonly string[];
  /** Per value. A variant runs by default only if every one of its values does. */
  runByDefault?: readonly boolean[];
}

/** `false` marks the run as failed; anything else (or nothing) is success. */
export type StepOutcome = void | boolean;

export type StepRunFunction = (ctx: RunContext) => StepOutcome | Promise<StepOutcome>;

export interface StepHandler {
  run: StepRunFunction;
  /** Runs during the setup phase, after the environment is ensured. */
  setup?(ctx: RunContext): void | Promise<void>;
  /**
   * Called on each direct requirement (group members included) in the
   * context of a dependent, right before the dependent runs. Lets a step
   * install what it built into the environment of the steps requiring it.
   */
  setupDependent?(self: RequirementContext, dependent: RunContext): void | Promise<void>;
  /** Runs when the cache of the step is cleaned. */
  clean?(ctx: CleanContext): void | Promise<void>;
  /** Data exposed to steps that require this one, by key. */
  artifacts?(ctx: RunContext): Record<string, unknown[]>;
}

export type StepBody = StepRunFunction | StepHandler;

export interface StepSpec {
  name: string;
  body: StepBody;
  description?: string;
  parameters?: readonly StepParameter[];
  /**
   * Names of steps or groups that must succeed first. Like `dependencies`
   * and `setenv` values, may contain `{param}` placeholders.
   */
  requires?: readonly string[];
  /** Package requirements installed into the step environment. Opaque to the graph. */
  dependencies?: readonly string[];
  runByDefault?: boolean;
  /** Host environment variables forwarded to commands. */
  passenv?: readonly string[];
  /** Fixed environment variables. Win over `passenv`. */
  setenv?: Readonly<Record<string, string>>;
}

export interface GroupSpec {
  name: string;
  requires: readonly string[];
  description?: string;
  runByDefault?: boolean;
}

export interface ExecOptions {
  cwd?: string;
  env?: Record<string, string>;
}

export interface RunContext {
  readonly key: string;
  readonly name: string;
  readonly parameters: Readonly<Record<string, ParameterValue>>;
  /** Arguments given after `--` on the command line. */
  readonly userArgs: readonly string[];
  readonly environment: EnvironmentHandle;
  /** Scratch directory owned by this node. */
  readonly cachePath: string;
  /** Cancelled on fail-fast or interrupt. Long-running bodies should check it. */
  readonly signal: CancellationToken;
  /** Run a command inside the environment. Throws CommandError on a non-zero exit. */
  exec(command: readonly string[], options?: ExecOptions): Promise<CommandResult>;
  log(message: string): void;
  /** Artifacts published under `key` by every direct requirement. */
  getArtifacts(key: string): unknown[];
}

/** A required node, as seen from one of its dependents. */
export interface RequirementContext {
  readonly key: string;
  readonly name: string;
  readonly parameters: Readonly<Record<string, ParameterValue>>;
  readonly environment: EnvironmentHandle;
  readonly cachePath: string;
}

export interface CleanContext {
  readonly key: string;
  readonly name: string;
  readonly parameters: Readonly<Record<string, ParameterValue>>;
  readonly cachePath: string;
}
