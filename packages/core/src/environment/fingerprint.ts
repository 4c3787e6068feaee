// packages/core/src/environment/fingerprint.ts: Content hashes and the fingerprint file of an environment

import { createHash } from 'node:crypto';
import { existsSync, readFileSync } from 'node:fs';
import { writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { FINGERPRINT_FILENAME } from '../utils/constants.js';

export function hashContent(content: string): string {
  return createHash('sha256').update(content).digest('hex').slice(0, 16);
}

/** Hash of a JSON value with object keys sorted at every level. */
export function hashConfig(config: Record<string, unknown>): string {
  return hashContent(JSON.stringify(sortKeys(config)));
}

function sortKeys(value: unknown): unknown {
  if (Array.isArray(value)) return value.map(sortKeys);
  if (value !== null && typeof value === 'object') {
    return Object.fromEntries(
      Object.entries(value)
        .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
        .map(([k, v]) => [k, sortKeys(v)]),
    );
  }
  return value;
}

/** Fingerprint recorded in an environment directory, null when there is none. */
export function readFingerprint(dir: string): string | null {
  const file = join(dir, FINGERPRINT_FILENAME);
  if (!existsSync(file)) return null;
  const content = readFileSync(file, 'utf-8').trim();
  return content === '' ? null : content;
}

/** Written last, once the environment is complete. */
export async function writeFingerprint(dir: string, fingerprint: string): Promise<void> {
  await writeFile(join(dir, FINGERPRINT_FILENAME), `${fingerprint}\n`, 'utf-8');
}
