// packages/cli/src/commands/list.ts: Read-only graph listing

import type { Pipeline, SelectionOptions } from '@stepyard/core';
import chalk from 'chalk';
import { type LineWriter, colorListLine, formatList } from '../render.js';

export interface ListOptions {
  dependencies?: boolean;
  verbose?: boolean;
}

/** Print every step and group with its selection marker. Never runs anything. */
export function listCommand(
  pipeline: Pipeline,
  selection: SelectionOptions,
  options: ListOptions,
  write: LineWriter,
): number {
  const plan = pipeline.plan(selection);
  const lines = formatList(pipeline.list(selection), options);
  for (const line of lines) write(colorListLine(line));
  if (plan.entries.length === 0) write('No steps selected');
  for (const warning of plan.warnings) write(chalk.yellow(`warning: ${warning.message}`));
  return 0;
}
