// packages/core/src/config/defaults.ts

import type { ProjectConfig } from '../types/config.js';
import {
  DEFAULT_CACHE_DIR,
  DEFAULT_INSTALL_COMMAND,
  DEFAULT_KILL_GRACE_MS,
  DEFAULT_STEPFILE,
} from '../utils/constants.js';

export const DEFAULT_CONFIG: ProjectConfig = {
  stepfile: DEFAULT_STEPFILE,
  cacheDir: DEFAULT_CACHE_DIR,
  jobs: 0,
  failFast: false,
  killGraceMs: DEFAULT_KILL_GRACE_MS,
  logLevel: 'warn',
  passenv: [],
  installer: {
    command: [...DEFAULT_INSTALL_COMMAND],
  },
};
