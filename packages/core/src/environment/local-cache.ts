// packages/core/src/environment/local-cache.ts: Environment cache on the local disk

import { mkdir, rm } from 'node:fs/promises';
import { join } from 'node:path';
import { CancellationError } from '../engine/cancellation.js';
import type {
  CommandResult,
  EnsureOptions,
  EnvironmentCache,
  EnvironmentHandle,
  RunCommandOptions,
} from '../types/environment.js';
import { EnvironmentError, describeError } from '../utils/errors.js';
import type { Logger } from '../utils/logger.js';
import { hashConfig, hashContent, readFingerprint, writeFingerprint } from './fingerprint.js';
import type { EnvironmentInstaller } from './installer.js';
import { type ProcessManager, buildCommandEnv, prependPath } from './process-manager.js';

export interface LocalEnvironmentCacheOptions {
  cacheDir: string;
  installer: EnvironmentInstaller;
  processes: ProcessManager;
  /** Environment the installer runs with. Defaults to the base allowlist. */
  installEnv?: Record<string, string>;
  logger?: Logger;
}

/** Lowercase, filesystem-safe form of an identity. */
export function slugify(identity: string): string {
  const slug = identity
    .toLowerCase()
    .replace(/[^a-z0-9._-]+/g, '-')
    .replace(/^-+|-+$/g, '');
  return slug.slice(0, 48) || 'env';
}

/**
 * One directory per node identity under `<cacheDir>/envs`, rebuilt only when
 * the fingerprint of its dependency list changes. The fingerprint file is
 * written after a successful install, so a half-built directory never
 * counts as prepared.
 */
export class LocalEnvironmentCache implements EnvironmentCache {
  private readonly inflight = new Map<string, Promise<void>>();

  constructor(private readonly options: LocalEnvironmentCacheOptions) {}

  pathFor(identity: string): string {
    return join(this.options.cacheDir, 'envs', `${slugify(identity)}-${hashContent(identity)}`);
  }

  fingerprint(dependencies: readonly string[]): string {
    return hashConfig({
      installer: this.options.installer.id,
      dependencies: [...dependencies].sort(),
    });
  }

  ensure(
    identity: string,
    dependencies: readonly string[],
    options: EnsureOptions = {},
  ): Promise<EnvironmentHandle> {
    return this.serialize(identity, () => this.prepare(identity, dependencies, options));
  }

  locate(identity: string): EnvironmentHandle {
    const path = this.pathFor(identity);
    return {
      identity,
      path,
      binPaths: this.options.installer.binPaths(path),
      fingerprint: readFingerprint(path) ?? '',
      reused: true,
    };
  }

  run(
    handle: EnvironmentHandle,
    command: readonly string[],
    options: RunCommandOptions = {},
  ): Promise<CommandResult> {
    const env = prependPath(options.env ?? buildCommandEnv(), handle.binPaths);
    return this.options.processes.run(command, {
      cwd: options.cwd,
      env,
      token: options.token,
      onOutput: options.onOutput,
    });
  }

  remove(identity: string): Promise<void> {
    return this.serialize(identity, async () => {
      await rm(this.pathFor(identity), { recursive: true, force: true });
    });
  }

  // Chain tasks per identity. A failed task does not block the next one.
  private serialize<T>(identity: string, task: () => Promise<T>): Promise<T> {
    const previous = this.inflight.get(identity) ?? Promise.resolve();
    const next = previous.then(task);
    const settled: Promise<void> = next.then(
      () => this.release(identity, settled),
      () => this.release(identity, settled),
    );
    this.inflight.set(identity, settled);
    return next;
  }

  private release(identity: string, settled: Promise<void>): void {
    if (this.inflight.get(identity) === settled) this.inflight.delete(identity);
  }

  private async prepare(
    identity: string,
    dependencies: readonly string[],
    options: EnsureOptions,
  ): Promise<EnvironmentHandle> {
    const path = this.pathFor(identity);
    const binPaths = this.options.installer.binPaths(path);
    const fingerprint = this.fingerprint(dependencies);
    const previous = readFingerprint(path);

    if (previous === fingerprint) {
      this.options.logger?.debug('Reusing environment %s for %s', path, identity);
      return { identity, path, binPaths, fingerprint, reused: true };
    }

    options.token?.throwIfCancelled();
    this.options.logger?.debug(
      previous ? 'Rebuilding environment for %s' : 'Creating environment for %s',
      identity,
    );

    await rm(path, { recursive: true, force: true });
    await mkdir(path, { recursive: true });

    try {
      await this.options.installer.install(path, dependencies, {
        env: this.options.installEnv ?? buildCommandEnv(),
        token: options.token,
        onOutput: options.onOutput,
      });
    } catch (err) {
      if (err instanceof CancellationError) throw err;
      throw new EnvironmentError(describeError(err), identity);
    }

    await writeFingerprint(path, fingerprint);
    return { identity, path, binPaths, fingerprint, reused: false };
  }
}
