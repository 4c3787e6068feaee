// packages/cli/src/args.ts: Command line preparation before commander sees it

import { splitShellWords } from '@stepyard/core';

export interface SplitArgs {
  /** Arguments for the option parser. */
  args: string[];
  /** Everything after the first `--`, verbatim. */
  userArgs: string[];
}

/** Words of the ADDOPTS variable, quotes respected. */
export function tokenizeAddopts(value: string | undefined): string[] {
  if (!value || value.trim() === '') return [];
  return splitShellWords(value);
}

export function splitUserArgs(argv: readonly string[]): SplitArgs {
  const separator = argv.indexOf('--');
  if (separator === -1) return { args: [...argv], userArgs: [] };
  return { args: argv.slice(0, separator), userArgs: argv.slice(separator + 1) };
}

/** ADDOPTS words go first, so literal arguments can override them. */
export function prepareArgv(argv: readonly string[], addopts: string | undefined): SplitArgs {
  return splitUserArgs([...tokenizeAddopts(addopts), ...argv]);
}

/** Flatten repeated, comma-separated name options. */
export function splitNames(values: readonly string[]): string[] {
  return values
    .flatMap((value) => value.split(','))
    .map((name) => name.trim())
    .filter((name) => name.length > 0);
}

/** Commander collector for repeatable options. */
export function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}
