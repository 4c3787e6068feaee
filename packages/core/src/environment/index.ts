export { hashConfig, hashContent, readFingerprint, writeFingerprint } from './fingerprint.js';
export { NpmInstaller } from './installer.js';
export type { EnvironmentInstaller, InstallOptions } from './installer.js';
export { LocalEnvironmentCache, slugify } from './local-cache.js';
export type { LocalEnvironmentCacheOptions } from './local-cache.js';
export {
  ProcessManager,
  buildCommandEnv,
  buildFilteredEnv,
  prependPath,
} from './process-manager.js';
export type { CommandEnvOptions, SpawnOptions } from './process-manager.js';
