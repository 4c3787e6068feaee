// packages/cli/src/render.ts: Terminal rendering for run events

import type { EngineEvent, EventBus, ListEntry, RunSummary } from '@stepyard/core';
import chalk from 'chalk';
import ora, { type Ora } from 'ora';
import { formatDuration } from './utils.js';

export type LineWriter = (line: string) => void;

export interface RendererOptions {
  write?: LineWriter;
  /** Show the running steps in a spinner. Only for terminals. */
  interactive?: boolean;
  /** Print the output of steps that succeeded too. */
  verbose?: boolean;
}

const defaultWriter: LineWriter = (line) => {
  console.log(line);
};

/**
 * Listing lines: `*` selected, `-` not selected, `!` excluded but required.
 */
export function formatList(
  entries: readonly ListEntry[],
  options: { dependencies?: boolean; verbose?: boolean } = {},
): string[] {
  return entries.map((entry) => {
    const marker = entry.excludedButRequired ? '!' : entry.selected ? '*' : '-';
    let line = `${marker} ${entry.key}`;
    if (options.dependencies && entry.requires.length > 0) {
      line += ` --> ${entry.requires.join(', ')}`;
    }
    if (options.verbose && entry.description) {
      line += `: ${entry.description}`;
    }
    return line;
  });
}

export function colorListLine(line: string): string {
  if (line.startsWith('*')) return chalk.green(line);
  if (line.startsWith('!')) return chalk.yellow(line);
  return chalk.dim(line);
}

export function formatSummary(summary: RunSummary): string[] {
  const { counts } = summary;
  const lines = [
    `${counts.success} succeeded, ${counts.failure} failed, ${counts.skipped} skipped, ${counts.cancelled} cancelled in ${formatDuration(summary.durationMs)}`,
  ];
  if (summary.slowestChain) {
    lines.push(
      `Slowest chain: ${summary.slowestChain.keys.join(' --> ')} (${formatDuration(summary.slowestChain.durationMs)})`,
    );
  }
  if (summary.error) {
    lines.push(summary.error.message);
  }
  return lines;
}

/** One line per event, or null for events that print nothing on their own. */
export function formatEvent(event: EngineEvent): string | null {
  switch (event.type) {
    case 'run.started':
      return chalk.gray(
        `Running ${event.steps.length} ${event.steps.length === 1 ? 'step' : 'steps'} with up to ${event.maxParallelism} jobs`,
      );
    case 'run.stopping':
      return chalk.yellow(
        event.reason === 'interrupt'
          ? 'Interrupted, stopping running steps'
          : 'A step failed, not starting any more steps',
      );
    case 'selection.warning':
      return chalk.yellow(`warning: ${event.message}`);
    case 'node.setup':
      return event.reused ? null : chalk.gray(`  prepared environment for ${event.key}`);
    case 'node.completed':
      return chalk.green(`✓ ${event.key} (${formatDuration(event.durationMs)})`);
    case 'node.failed':
      return chalk.red(`✗ ${event.key}: ${event.error} (${formatDuration(event.durationMs)})`);
    case 'node.skipped':
      return chalk.yellow(`- ${event.key} skipped, '${event.blockedBy}' did not succeed`);
    case 'node.cancelled':
      return chalk.yellow(`⊘ ${event.key} cancelled (${event.reason})`);
    case 'node.started':
    case 'node.output':
    case 'run.completed':
      return null;
  }
}

/**
 * Subscribe to the event bus and print as events arrive. Returns a function
 * that stops rendering.
 */
export function attachRenderer(eventBus: EventBus, options: RendererOptions = {}): () => void {
  const write = options.write ?? defaultWriter;
  const running = new Set<string>();
  const failed = new Set<string>();
  const outputs = new Map<string, string>();
  let spinner: Ora | null = null;

  const updateSpinner = (): void => {
    if (!options.interactive) return;
    if (running.size === 0) {
      spinner?.stop();
      spinner = null;
      return;
    }
    const text = `Running: ${[...running].join(', ')}`;
    if (spinner) {
      spinner.text = text;
    } else {
      spinner = ora({ text, discardStdin: false }).start();
    }
  };

  const print = (line: string): void => {
    if (spinner) spinner.clear();
    write(line);
    if (spinner) spinner.render();
  };

  const printOutput = (key: string): void => {
    const output = outputs.get(key);
    outputs.delete(key);
    if (!output || output.trim() === '') return;
    if (!options.verbose && !failed.has(key)) return;
    print(chalk.bold(`── ${key} ──`));
    print(output.replace(/\n$/, ''));
  };

  const onEvent = (event: EngineEvent): void => {
    switch (event.type) {
      case 'node.started':
        running.add(event.key);
        updateSpinner();
        return;
      case 'node.output':
        outputs.set(event.key, event.output);
        return;
      case 'node.failed':
        failed.add(event.key);
        break;
      default:
        break;
    }

    const line = formatEvent(event);
    if (line !== null) print(line);

    if (event.type === 'node.completed' || event.type === 'node.failed' || event.type === 'node.cancelled') {
      printOutput(event.key);
      running.delete(event.key);
      updateSpinner();
    }
  };

  eventBus.on('event', onEvent);
  return () => {
    eventBus.off('event', onEvent);
    spinner?.stop();
    spinner = null;
  };
}
