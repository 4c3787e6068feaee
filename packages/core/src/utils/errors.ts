// packages/core/src/utils/errors.ts

/**
 * Base class for errors raised by stepyard.
 * `exitCode` is used when the error reaches the command line:
 * 1 means a run failed, 2 means a definition or configuration error.
 */
export class StepyardError extends Error {
  constructor(
    message: string,
    public readonly exitCode: number = 2,
  ) {
    super(message);
    this.name = 'StepyardError';
  }
}

export class DuplicateStepError extends StepyardError {
  constructor(public readonly stepName: string) {
    super(`A step with the name '${stepName}' has already been registered`);
    this.name = 'DuplicateStepError';
  }
}

export class UnknownStepError extends StepyardError {
  constructor(
    public readonly names: readonly string[],
    public readonly requiredBy?: string,
  ) {
    super(
      requiredBy
        ? `Step '${requiredBy}' requires unknown steps: ${names.join(', ')}`
        : `Unknown steps: ${names.join(', ')}`,
    );
    this.name = 'UnknownStepError';
  }
}

export class CyclicGraphError extends StepyardError {
  constructor(public readonly cycle: readonly string[]) {
    super(`Cyclic dependencies between steps: ${cycle.join(' --> ')}`);
    this.name = 'CyclicGraphError';
  }
}

export class ParameterError extends StepyardError {
  constructor(
    message: string,
    public readonly stepName: string,
  ) {
    super(`Cannot parametrize '${stepName}': ${message}`);
    this.name = 'ParameterError';
  }
}

export class SelectionError extends StepyardError {
  constructor(message: string) {
    super(message);
    this.name = 'SelectionError';
  }
}

export class ConfigError extends StepyardError {
  constructor(
    message: string,
    public readonly field?: string,
  ) {
    super(message);
    this.name = 'ConfigError';
  }
}

export class StepfileError extends StepyardError {
  constructor(
    message: string,
    public readonly path?: string,
  ) {
    super(path ? `Unable to load ${path}: ${message}` : message);
    this.name = 'StepfileError';
  }
}

export class CommandError extends StepyardError {
  constructor(
    public readonly command: readonly string[],
    public readonly status: number,
    public readonly output: string,
  ) {
    super(`Command '${command.join(' ')}' returned exit status ${status}`, 1);
    this.name = 'CommandError';
  }
}

export class EnvironmentError extends StepyardError {
  constructor(
    message: string,
    public readonly identity: string,
  ) {
    super(`Environment for '${identity}' could not be prepared: ${message}`, 1);
    this.name = 'EnvironmentError';
  }
}

export class StepFailedError extends StepyardError {
  constructor(public readonly key: string) {
    super(`Step '${key}' reported a failure`, 1);
    this.name = 'StepFailedError';
  }
}

function pluralize(count: number): string {
  return count === 1 ? '1 job' : `${count} jobs`;
}

export class FailedPipelineError extends StepyardError {
  constructor(
    public readonly failed: number,
    public readonly blocked: number,
    public readonly cancelled: number,
  ) {
    const parts: string[] = [];
    if (failed > 0) parts.push(`${pluralize(failed)} failed`);
    if (blocked > 0) parts.push(`${pluralize(blocked)} could not run`);
    if (cancelled > 0) {
      parts.push(`${pluralize(cancelled)} ${cancelled === 1 ? 'was' : 'were'} cancelled`);
    }
    super(parts.join(', '), 1);
    this.name = 'FailedPipelineError';
  }
}

/** Render an unknown thrown value for display. */
export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
