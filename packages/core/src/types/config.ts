// packages/core/src/types/config.ts

import type { LogLevel } from '../utils/logger.js';

export interface InstallerConfig {
  /** Install command. The environment directory and dependencies are appended. */
  command: string[];
}

export interface ProjectConfig {
  stepfile: string;
  cacheDir: string;
  /** Maximum concurrent steps. 0 uses the host parallelism. */
  jobs: number;
  failFast: boolean;
  /** Grace period between SIGTERM and SIGKILL on interrupt. */
  killGraceMs: number;
  logLevel: LogLevel;
  /** Host environment variables forwarded to every step. */
  passenv: string[];
  installer: InstallerConfig;
}
