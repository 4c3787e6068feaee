// packages/core/src/environment/installer.ts: Populate environment directories

import { writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import type { CancellationToken } from '../engine/cancellation.js';
import { DEFAULT_INSTALL_COMMAND } from '../utils/constants.js';
import { CommandError } from '../utils/errors.js';
import type { ProcessManager } from './process-manager.js';

export interface InstallOptions {
  env: Record<string, string>;
  token?: CancellationToken;
  onOutput?: (chunk: string) => void;
}

/** Knows how to install a dependency list into an empty directory. */
export interface EnvironmentInstaller {
  /** Part of every fingerprint: changing the installer rebuilds environments. */
  readonly id: string;
  binPaths(dir: string): string[];
  install(dir: string, dependencies: readonly string[], options: InstallOptions): Promise<void>;
}

export class NpmInstaller implements EnvironmentInstaller {
  constructor(
    private readonly processes: ProcessManager,
    private readonly command: readonly string[] = DEFAULT_INSTALL_COMMAND,
  ) {}

  get id(): string {
    return this.command.join(' ');
  }

  binPaths(dir: string): string[] {
    return [join(dir, 'node_modules', '.bin')];
  }

  async install(
    dir: string,
    dependencies: readonly string[],
    options: InstallOptions,
  ): Promise<void> {
    if (dependencies.length === 0) return;

    await writeFile(
      join(dir, 'package.json'),
      `${JSON.stringify({ name: 'stepyard-environment', private: true }, null, 2)}\n`,
      'utf-8',
    );

    const argv = [...this.command, '--prefix', dir, ...dependencies];
    const result = await this.processes.run(argv, {
      cwd: dir,
      env: options.env,
      token: options.token,
      onOutput: options.onOutput,
    });
    if (result.exitCode !== 0) {
      throw new CommandError(argv, result.exitCode, result.output);
    }
  }
}
