// packages/core/src/utils/index.ts -- barrel re-export

export { generateRunId } from './id.js';
export {
  StepyardError,
  DuplicateStepError,
  UnknownStepError,
  CyclicGraphError,
  ParameterError,
  SelectionError,
  ConfigError,
  StepfileError,
  CommandError,
  EnvironmentError,
  StepFailedError,
  FailedPipelineError,
  describeError,
} from './errors.js';
export { createLogger } from './logger.js';
export type { Logger, LogLevel, LogSink, LoggerOptions } from './logger.js';
export { splitShellWords } from './shell-words.js';
