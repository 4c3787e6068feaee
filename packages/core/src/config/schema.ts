// packages/core/src/config/schema.ts

import { z } from 'zod';
import { DEFAULT_CACHE_DIR, DEFAULT_INSTALL_COMMAND, DEFAULT_KILL_GRACE_MS, DEFAULT_STEPFILE } from '../utils/constants.js';
import { ConfigError } from '../utils/errors.js';

const installerConfigSchema = z.object({
  command: z.array(z.string().min(1)).min(1).default(DEFAULT_INSTALL_COMMAND),
});

export const projectConfigSchema = z
  .object({
    stepfile: z.string().min(1).default(DEFAULT_STEPFILE),
    cacheDir: z.string().min(1).default(DEFAULT_CACHE_DIR),
    jobs: z.number().int().nonnegative().default(0),
    failFast: z.boolean().default(false),
    killGraceMs: z.number().int().nonnegative().max(600_000).default(DEFAULT_KILL_GRACE_MS),
    logLevel: z.enum(['debug', 'info', 'warn', 'error']).default('warn'),
    passenv: z.array(z.string().min(1)).default([]),
    installer: installerConfigSchema.default({}),
  })
  .strict();

export type ProjectConfigInput = z.input<typeof projectConfigSchema>;

/**
 * Validate a raw config object against the schema.
 * Throws ConfigError with details on failure.
 */
export function validateConfig(config: unknown): z.output<typeof projectConfigSchema> {
  const result = projectConfigSchema.safeParse(config);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
    const field = result.error.issues[0]?.path.join('.');
    throw new ConfigError(`Invalid configuration: ${issues}`, field || undefined);
  }
  return result.data;
}
