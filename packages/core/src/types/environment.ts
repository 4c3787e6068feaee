// packages/core/src/types/environment.ts

import type { CancellationToken } from '../engine/cancellation.js';

export interface CommandResult {
  command: string[];
  exitCode: number;
  /** Combined stdout and stderr, in arrival order. */
  output: string;
}

export interface EnvironmentHandle {
  identity: string;
  path: string;
  /** Directories prepended to PATH for commands run in this environment. */
  binPaths: readonly string[];
  fingerprint: string;
  /** True when the previous state was kept instead of rebuilt. */
  reused: boolean;
}

export interface EnsureOptions {
  token?: CancellationToken;
  onOutput?: (chunk: string) => void;
}

export interface RunCommandOptions {
  cwd?: string;
  env?: Record<string, string>;
  token?: CancellationToken;
  onOutput?: (chunk: string) => void;
}

/**
 * Isolated, persistent execution context per node identity.
 * `ensure` is idempotent for an unchanged dependency list.
 */
export interface EnvironmentCache {
  ensure(
    identity: string,
    dependencies: readonly string[],
    options?: EnsureOptions,
  ): Promise<EnvironmentHandle>;
  /** Handle for an environment prepared by an earlier invocation. No setup. */
  locate(identity: string): EnvironmentHandle;
  run(
    handle: EnvironmentHandle,
    command: readonly string[],
    options?: RunCommandOptions,
  ): Promise<CommandResult>;
  remove(identity: string): Promise<void>;
}
