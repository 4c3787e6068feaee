// packages/core/src/steps/command-body.ts: Step bodies built from command lines

import type { ParameterValue, RunContext, StepHandler } from '../types/step.js';
import { renderTemplate } from './parametrize.js';

const ARGS_PLACEHOLDER = '{args}';

export interface CommandBodyOptions {
  /** Commands of the run phase, already split into words. */
  run: readonly (readonly string[])[];
  /** Commands of the setup phase, already split into words. */
  setup?: readonly (readonly string[])[];
  cwd?: string;
}

/**
 * Render one command for a node. A word that is exactly `{args}` expands to
 * the user arguments, inside a word they are joined with spaces.
 */
export function renderCommand(
  words: readonly string[],
  ctx: Pick<RunContext, 'parameters' | 'userArgs' | 'cachePath' | 'environment'>,
  appendUserArgs = false,
): string[] {
  const values: Record<string, ParameterValue> = {
    ...ctx.parameters,
    args: ctx.userArgs.join(' '),
    cache: ctx.cachePath,
    env: ctx.environment.path,
  };

  const argv: string[] = [];
  for (const word of words) {
    if (word === ARGS_PLACEHOLDER) {
      argv.push(...ctx.userArgs);
    } else {
      argv.push(renderTemplate(word, values));
    }
  }
  if (appendUserArgs) argv.push(...ctx.userArgs);
  return argv;
}

export function createCommandBody(options: CommandBodyOptions): StepHandler {
  const setup = options.setup ?? [];
  const run = options.run;
  const takesArgs = run.some((words) => words.some((word) => word.includes(ARGS_PLACEHOLDER)));

  return {
    async setup(ctx) {
      for (const words of setup) {
        const argv = renderCommand(words, ctx);
        if (argv.length > 0) await ctx.exec(argv, { cwd: options.cwd });
      }
    },
    async run(ctx) {
      for (const [index, words] of run.entries()) {
        const isLast = index === run.length - 1;
        const argv = renderCommand(words, ctx, isLast && !takesArgs);
        if (argv.length === 0) continue;
        await ctx.exec(argv, { cwd: options.cwd });
      }
    },
  };
}
