// packages/core/src/environment/process-manager.ts: Child processes of a run

import { type ChildProcess, spawn } from 'node:child_process';
import { delimiter } from 'node:path';
import { setTimeout as delay } from 'node:timers/promises';
import { CancellationError, type CancellationToken } from '../engine/cancellation.js';
import type { CommandResult } from '../types/environment.js';
import { BASE_ENV_ALLOWLIST, DEFAULT_KILL_GRACE_MS } from '../utils/constants.js';

export interface SpawnOptions {
  cwd?: string;
  env: Record<string, string>;
  /** Checked before the process starts. A running process is not affected. */
  token?: CancellationToken;
  onOutput?: (chunk: string) => void;
}

function isNoSuchProcess(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ESRCH';
}

// A process ended by a signal has no exit code.
function exitStatus(code: number | null): number {
  return code ?? 1;
}

/**
 * Spawns every external command of a run, each in its own process group,
 * and can terminate all of them on interrupt.
 */
export class ProcessManager {
  private readonly running = new Map<ChildProcess, Promise<void>>();
  private terminated = false;

  get activeCount(): number {
    return this.running.size;
  }

  get isTerminated(): boolean {
    return this.terminated;
  }

  /** Run a command to completion. Resolves with its exit status and combined output. */
  run(command: readonly string[], options: SpawnOptions): Promise<CommandResult> {
    if (this.terminated) {
      return Promise.reject(new CancellationError('Process manager was terminated'));
    }
    if (command.length === 0) {
      return Promise.reject(new Error('Cannot run an empty command'));
    }
    try {
      options.token?.throwIfCancelled();
    } catch (err) {
      return Promise.reject(err);
    }

    const [file, ...args] = command;
    return new Promise((resolve, reject) => {
      const child = spawn(file, args, {
        cwd: options.cwd,
        env: options.env,
        stdio: ['ignore', 'pipe', 'pipe'],
        detached: process.platform !== 'win32',
        windowsHide: true,
        shell: process.platform === 'win32',
      });

      let output = '';
      let settled = false;
      let markExited: () => void = () => undefined;
      this.running.set(
        child,
        new Promise<void>((done) => {
          markExited = done;
        }),
      );

      const finish = (): void => {
        this.running.delete(child);
        markExited();
      };

      const onData = (data: Buffer): void => {
        const chunk = data.toString();
        output += chunk;
        options.onOutput?.(chunk);
      };
      child.stdout?.on('data', onData);
      child.stderr?.on('data', onData);

      child.on('error', (err) => {
        finish();
        if (settled) return;
        settled = true;
        reject(new Error(`Unable to start '${file}': ${err.message}`));
      });

      child.on('close', (code) => {
        finish();
        if (settled) return;
        settled = true;
        resolve({ command: [...command], exitCode: exitStatus(code), output });
      });
    });
  }

  /**
   * Refuse new processes, send SIGTERM to every running process group and
   * SIGKILL whatever is still alive after `graceMs`.
   */
  async terminateAll(graceMs: number = DEFAULT_KILL_GRACE_MS): Promise<void> {
    this.terminated = true;
    const pending = [...this.running];
    if (pending.length === 0) return;

    for (const [child] of pending) this.signal(child, 'SIGTERM');

    const controller = new AbortController();
    const exited = await Promise.race([
      Promise.all(pending.map(([, done]) => done)).then(() => true),
      delay(graceMs, false, { signal: controller.signal }).catch((err: unknown) => {
        if (err instanceof Error && err.name === 'AbortError') return true;
        throw err;
      }),
    ]);
    controller.abort();

    if (!exited) {
      this.killAll();
      await Promise.all(pending.map(([, done]) => done));
    }
  }

  /** Refuse new processes and SIGKILL every running process group immediately. */
  killAll(): void {
    this.terminated = true;
    for (const child of this.running.keys()) this.signal(child, 'SIGKILL');
  }

  private signal(child: ChildProcess, signal: NodeJS.Signals): void {
    if (child.pid === undefined || child.exitCode !== null || child.signalCode !== null) return;
    try {
      if (process.platform === 'win32') {
        child.kill(signal);
      } else {
        process.kill(-child.pid, signal);
      }
    } catch (err) {
      if (!isNoSuchProcess(err)) throw err;
    }
  }
}

/** Copy the allowlisted variables that are set in `source`. */
export function buildFilteredEnv(
  allowlist: readonly string[],
  source: NodeJS.ProcessEnv = process.env,
): Record<string, string> {
  const env: Record<string, string> = {};
  for (const key of allowlist) {
    const val = source[key];
    if (val !== undefined) {
      env[key] = val;
    }
  }
  return env;
}

/** Put `binPaths` in front of PATH. */
export function prependPath(
  env: Readonly<Record<string, string>>,
  binPaths: readonly string[],
): Record<string, string> {
  if (binPaths.length === 0) return { ...env };
  const current = env.PATH;
  return { ...env, PATH: [...binPaths, ...(current ? [current] : [])].join(delimiter) };
}

export interface CommandEnvOptions {
  /** Extra host variables to forward, on top of the base allowlist. */
  passenv?: readonly string[];
  /** Fixed values. Win over forwarded ones. */
  setenv?: Readonly<Record<string, string>>;
  source?: NodeJS.ProcessEnv;
}

/** Environment of a step command before the environment's bin paths are added. */
export function buildCommandEnv(options: CommandEnvOptions = {}): Record<string, string> {
  const env = buildFilteredEnv([...BASE_ENV_ALLOWLIST, ...(options.passenv ?? [])], options.source);
  return { ...env, ...(options.setenv ?? {}) };
}
