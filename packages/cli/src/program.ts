// packages/cli/src/program.ts: Option parsing and dispatch

import { isAbsolute, join } from 'node:path';
import {
  ADDOPTS_ENV,
  type ConfigOverrides,
  Pipeline,
  type SelectionOptions,
  StepyardError,
  VERSION,
  createLogger,
  describeError,
  loadConfig,
  loadStepfile,
} from '@stepyard/core';
import chalk from 'chalk';
import { Command, CommanderError, InvalidArgumentError, Option } from 'commander';
import { collect, prepareArgv, splitNames } from './args.js';
import { listCommand } from './commands/list.js';
import { runCommand } from './commands/run.js';
import type { LineWriter } from './render.js';
import { resolveColor } from './utils.js';

export interface CliOptions {
  stepfile?: string;
  only: string[];
  except: string[];
  list?: boolean;
  listDependencies?: boolean;
  verbose?: boolean;
  jobs?: number;
  setupOnly?: boolean;
  setup: boolean;
  failFast?: boolean;
  ff?: boolean;
  clean?: boolean;
  cacheDir?: string;
  color?: boolean;
}

export interface MainContext {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  write?: LineWriter;
  writeError?: LineWriter;
  isTTY?: boolean;
}

function parseJobs(value: string): number {
  if (!/^\d+$/.test(value)) throw new InvalidArgumentError('Must be a non-negative integer');
  return Number.parseInt(value, 10);
}

export function buildProgram(writeError: LineWriter): Command {
  return new Command()
    .name('stepyard')
    .description('Run parametrized steps in parallel, each in its own cached environment')
    .version(VERSION)
    .usage('[options] [steps...] [-- args for the steps]')
    .argument('[steps...]', 'steps or groups to run, same as --only')
    .option('-f, --stepfile <path>', 'stepfile to load (default: stepyard.yml)')
    .option('-o, --only <names>', 'run only these steps and what they require', collect, [])
    .option('-e, --except <names>', 'leave these steps out unless something requires them', collect, [])
    .option('-l, --list', 'list steps instead of running them')
    .option('--list-dependencies', 'list steps with their requirements')
    .option('-v, --verbose', 'show descriptions, successful output and debug logs')
    .option('-j, --jobs <n>', 'steps to run in parallel, 0 for one per CPU', parseJobs)
    .option('--setup-only', 'prepare environments without running the steps')
    .option('--no-setup', 'run steps in the environments of a previous run')
    .option('--fail-fast', 'stop at the first failure')
    .addOption(new Option('--ff', 'same as --fail-fast').hideHelp())
    .option('-c, --clean', 'drop cached environments of the selected steps first')
    .option('--cache-dir <path>', 'where environments and logs are kept (default: .stepyard)')
    .option('--color', 'force colored output')
    .option('--no-color', 'disable colored output')
    .exitOverride()
    .configureOutput({ writeErr: (text) => writeError(text.replace(/\n$/, '')) });
}

/** Parse arguments, load everything and run or list. Resolves to the exit code. */
export async function main(argv: readonly string[], context: MainContext = {}): Promise<number> {
  const env = context.env ?? process.env;
  const cwd = context.cwd ?? process.cwd();
  const write = context.write ?? ((line: string) => console.log(line));
  const writeError = context.writeError ?? ((line: string) => console.error(line));

  const { args, userArgs } = prepareArgv(argv, env[ADDOPTS_ENV]);
  const program = buildProgram(writeError);
  try {
    program.parse(args, { from: 'user' });
  } catch (err) {
    if (err instanceof CommanderError) {
      return err.code === 'commander.helpDisplayed' || err.code === 'commander.version' ? 0 : 2;
    }
    throw err;
  }

  const opts = program.opts<CliOptions>();
  chalk.level = resolveColor(opts.color, env, context.isTTY ?? Boolean(process.stdout.isTTY))
    ? chalk.level || 1
    : 0;

  const logger = createLogger(opts.verbose ? 'debug' : 'warn', {
    timestamps: false,
    sink: (_level, line) => writeError(line),
  });

  try {
    // Step names are the starting selection that --except narrows, else they act as --only.
    const positional = splitNames(program.args);
    const except = splitNames(opts.except);
    const selection: SelectionOptions = {
      only: except.length > 0 ? splitNames(opts.only) : [...splitNames(opts.only), ...positional],
      except,
      roots: except.length > 0 ? positional : [],
      setupOnly: opts.setupOnly,
      noSetup: !opts.setup,
    };

    const overrides: ConfigOverrides = {
      stepfile: opts.stepfile,
      cacheDir: opts.cacheDir,
      jobs: opts.jobs,
      failFast: opts.failFast || opts.ff ? true : undefined,
      logLevel: opts.verbose ? 'debug' : undefined,
    };
    const config = loadConfig({ projectDir: cwd, overrides });
    const stepfile = isAbsolute(config.stepfile) ? config.stepfile : join(cwd, config.stepfile);
    const registry = loadStepfile(stepfile);

    const pipeline = new Pipeline({
      registry,
      config,
      projectDir: cwd,
      logger: createLogger(config.logLevel, {
        timestamps: false,
        sink: (_level, line) => writeError(line),
      }),
    });

    if (opts.list || opts.listDependencies) {
      return listCommand(
        pipeline,
        selection,
        { dependencies: opts.listDependencies, verbose: opts.verbose },
        write,
      );
    }
    return await runCommand(
      pipeline,
      {
        ...selection,
        clean: opts.clean,
        userArgs,
        verbose: opts.verbose,
        interactive: context.isTTY ?? Boolean(process.stdout.isTTY),
      },
      write,
      logger,
    );
  } catch (err) {
    if (err instanceof StepyardError) {
      writeError(chalk.red(`error: ${err.message}`));
      return err.exitCode;
    }
    logger.debug('%s', err instanceof Error ? (err.stack ?? err.message) : String(err));
    writeError(chalk.red(`error: ${describeError(err)}`));
    return 1;
  }
}
