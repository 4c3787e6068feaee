// packages/core/src/steps/stepfile.ts: YAML step declarations

import { existsSync, readFileSync } from 'node:fs';
import { dirname, resolve } from 'node:path';
import { parseDocument, visit } from 'yaml';
import { z } from 'zod';
import type { StepParameter } from '../types/step.js';
import { StepfileError } from '../utils/errors.js';
import { splitShellWords } from '../utils/shell-words.js';
import { createCommandBody } from './command-body.js';
import { StepRegistry } from './registry.js';

const nameSchema = z.string().min(1);

const commandListSchema = z
  .union([z.string().min(1), z.array(z.string().min(1))])
  .transform((value) => (typeof value === 'string' ? [value] : value));

const parameterValueSchema = z.union([z.string(), z.number(), z.boolean()]);

const parameterEntrySchema = z.object({
  name: nameSchema,
  values: z.array(parameterValueSchema),
  ids: z.array(z.string()).optional(),
  runByDefault: z.array(z.boolean()).optional(),
});

// Either `{ python: [3.8, 3.9] }` or a list of `{ name, values, ids, runByDefault }`.
const parametersSchema = z.union([
  z.array(parameterEntrySchema),
  z
    .record(z.array(parameterValueSchema))
    .transform((record): StepParameter[] =>
      Object.entries(record).map(([name, values]) => ({ name, values })),
    ),
]);

const stepSchema = z
  .object({
    description: z.string().optional(),
    run: commandListSchema.default([]),
    setup: commandListSchema.default([]),
    cwd: z.string().optional(),
    parameters: parametersSchema.optional(),
    requires: z.array(nameSchema).default([]),
    dependencies: z.array(nameSchema).default([]),
    runByDefault: z.boolean().default(true),
    passenv: z.array(nameSchema).default([]),
    setenv: z.record(z.coerce.string()).default({}),
  })
  .strict();

const groupSchema = z
  .object({
    description: z.string().optional(),
    requires: z.array(nameSchema).min(1),
    runByDefault: z.boolean().default(true),
  })
  .strict();

const stepfileSchema = z
  .object({
    steps: z.record(stepSchema).default({}),
    groups: z.record(groupSchema).default({}),
  })
  .strict();

export type StepfileDocument = z.output<typeof stepfileSchema>;

export interface ParseStepfileOptions {
  /** Directory that relative `cwd` entries resolve against. */
  baseDir?: string;
  /** Shown in error messages. */
  source?: string;
  /** Registry to add to. A new one is created when omitted. */
  registry?: StepRegistry;
}

function splitCommands(lines: readonly string[], stepName: string, source?: string): string[][] {
  return lines.map((line) => {
    try {
      return splitShellWords(line);
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      throw new StepfileError(`step '${stepName}': ${message}`, source);
    }
  });
}

/**
 * Parse YAML, keeping the written text of numbers that would not print back
 * the same, so `3.10` stays `'3.10'` instead of becoming `3.1`.
 */
function readYaml(text: string, source?: string): unknown {
  const doc = parseDocument(text);
  const [error] = doc.errors;
  if (error) {
    throw new StepfileError(`Failed to parse YAML: ${error.message}`, source);
  }
  visit(doc, {
    Scalar(_key, node) {
      const written = node.source;
      if (typeof node.value === 'number' && written !== undefined && String(node.value) !== written) {
        node.value = written;
      }
    },
  });
  return doc.toJS();
}

export function validateStepfile(raw: unknown, source?: string): StepfileDocument {
  const result = stepfileSchema.safeParse(raw ?? {});
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new StepfileError(`Invalid stepfile: ${issues}`, source);
  }
  return result.data;
}

/** Register the steps and groups of a stepfile, in file order. */
export function parseStepfile(text: string, options: ParseStepfileOptions = {}): StepRegistry {
  const baseDir = options.baseDir ?? process.cwd();
  const registry = options.registry ?? new StepRegistry();

  const doc = validateStepfile(readYaml(text, options.source), options.source);

  for (const [name, step] of Object.entries(doc.steps)) {
    registry.register({
      name,
      description: step.description,
      parameters: step.parameters,
      requires: step.requires,
      dependencies: step.dependencies,
      runByDefault: step.runByDefault,
      passenv: step.passenv,
      setenv: step.setenv,
      body: createCommandBody({
        run: splitCommands(step.run, name, options.source),
        setup: splitCommands(step.setup, name, options.source),
        cwd: resolve(baseDir, step.cwd ?? '.'),
      }),
    });
  }

  for (const [name, group] of Object.entries(doc.groups)) {
    registry.registerGroup(name, group.requires, {
      description: group.description,
      runByDefault: group.runByDefault,
    });
  }

  return registry;
}

export function loadStepfile(path: string, registry?: StepRegistry): StepRegistry {
  const fullPath = resolve(path);
  if (!existsSync(fullPath)) {
    throw new StepfileError('file not found', path);
  }
  const text = readFileSync(fullPath, 'utf-8');
  return parseStepfile(text, { baseDir: dirname(fullPath), source: path, registry });
}
