// packages/cli/src/commands/run.ts: Execute the selected steps

import { CancellationToken, type Logger, type Pipeline, type PipelineRunOptions } from '@stepyard/core';
import chalk from 'chalk';
import { type LineWriter, attachRenderer, formatSummary } from '../render.js';

export interface RunCommandOptions extends PipelineRunOptions {
  verbose?: boolean;
  interactive?: boolean;
}

/**
 * Run the pipeline with rendering and interrupt handling. The first SIGINT
 * stops the run gracefully, a second one kills every running process.
 */
export async function runCommand(
  pipeline: Pipeline,
  options: RunCommandOptions,
  write: LineWriter,
  logger: Logger,
): Promise<number> {
  const interrupt = options.interrupt ?? new CancellationToken();
  let interrupts = 0;
  const onSigint = (): void => {
    interrupts++;
    if (interrupts === 1) {
      logger.warn('Interrupt received, stopping (press Ctrl+C again to kill running commands)');
      interrupt.cancel('interrupt');
    } else {
      logger.warn('Killing running commands');
      pipeline.processManager.killAll();
    }
  };

  const detach = attachRenderer(pipeline.eventBus, {
    write,
    interactive: options.interactive,
    verbose: options.verbose,
  });
  process.on('SIGINT', onSigint);

  try {
    const summary = await pipeline.run({ ...options, interrupt });
    detach();
    const [counts, ...rest] = formatSummary(summary);
    write('');
    write(chalk.bold(counts));
    for (const line of rest) {
      write(summary.error && line === summary.error.message ? chalk.red(line) : chalk.gray(line));
    }
    return summary.exitCode;
  } finally {
    process.off('SIGINT', onSigint);
    detach();
  }
}
