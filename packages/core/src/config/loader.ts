// packages/core/src/config/loader.ts

import { existsSync, readFileSync } from 'node:fs';
import { join } from 'node:path';
import { parse as parseYaml } from 'yaml';
import type { ProjectConfig } from '../types/config.js';
import { CONFIG_FILENAME } from '../utils/constants.js';
import { ConfigError } from '../utils/errors.js';
import { DEFAULT_CONFIG } from './defaults.js';
import { validateConfig } from './schema.js';

type PlainObject = Record<string, unknown>;

function isPlainObject(value: unknown): value is PlainObject {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/**
 * Deep merge two objects. Source values overwrite target values.
 * Arrays are replaced, not merged. Undefined source values are ignored.
 */
function deepMerge(target: PlainObject, source: PlainObject): PlainObject {
  const result: PlainObject = { ...target };
  for (const key of Object.keys(source)) {
    const srcVal = source[key];
    const tgtVal = result[key];
    if (srcVal === undefined) continue;
    if (isPlainObject(srcVal) && isPlainObject(tgtVal)) {
      result[key] = deepMerge(tgtVal, srcVal);
    } else {
      result[key] = srcVal;
    }
  }
  return result;
}

export type ConfigOverrides = Partial<Omit<ProjectConfig, 'installer'>> & {
  installer?: Partial<ProjectConfig['installer']>;
};

/** Read `.stepyard.yml` from a directory. Null when the file does not exist. */
export function readConfigFile(projectDir: string): PlainObject | null {
  const configPath = join(projectDir, CONFIG_FILENAME);
  if (!existsSync(configPath)) return null;

  let parsed: unknown;
  try {
    parsed = parseYaml(readFileSync(configPath, 'utf-8'));
  } catch (err) {
    throw new ConfigError(
      `Failed to parse ${CONFIG_FILENAME}: ${err instanceof Error ? err.message : String(err)}`,
    );
  }
  if (parsed === null || parsed === undefined) return {};
  if (!isPlainObject(parsed)) {
    throw new ConfigError(`${CONFIG_FILENAME} must contain a mapping`);
  }
  return parsed;
}

/**
 * Load config with precedence: overrides > .stepyard.yml > defaults.
 *
 * 1. Start with hardcoded defaults
 * 2. Merge .stepyard.yml from projectDir on top
 * 3. Merge programmatic overrides on top
 * 4. Validate the final result
 */
export function loadConfig(options?: {
  projectDir?: string;
  overrides?: ConfigOverrides;
  skipFile?: boolean;
}): ProjectConfig {
  const projectDir = options?.projectDir ?? process.cwd();
  let merged: PlainObject = { ...structuredClone(DEFAULT_CONFIG) };

  if (!options?.skipFile) {
    const fileConfig = readConfigFile(projectDir);
    if (fileConfig) merged = deepMerge(merged, fileConfig);
  }

  if (options?.overrides) {
    merged = deepMerge(merged, { ...options.overrides });
  }

  return validateConfig(merged);
}

export { deepMerge };
