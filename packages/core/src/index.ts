// @stepyard/core - Step graph resolution and parallel execution

export const VERSION = '0.3.0';

// Type definitions
export type {
  // Config
  InstallerConfig,
  ProjectConfig,
  // Steps
  CleanContext,
  ExecOptions,
  GroupSpec,
  ParameterValue,
  RequirementContext,
  RunContext,
  StepBody,
  StepHandler,
  StepOutcome,
  StepParameter,
  StepRunFunction,
  StepSpec,
  // Graph and plan
  Graph,
  GraphNode,
  GroupNode,
  StepNode,
  ExecutionPlan,
  Phase,
  PlanEntry,
  SelectionOptions,
  SelectionWarning,
  // Results
  CancelReason,
  DependencyChain,
  NodeResult,
  NodeStatus,
  ResultCounts,
  // Environments
  CommandResult,
  EnsureOptions,
  EnvironmentCache,
  EnvironmentHandle,
  RunCommandOptions,
  // Events
  EngineEvent,
  NodeCancelledEvent,
  NodeCompletedEvent,
  NodeFailedEvent,
  NodeOutputEvent,
  NodeSetupEvent,
  NodeSkippedEvent,
  NodeStartedEvent,
  RunCompletedEvent,
  RunStartedEvent,
  RunStoppingEvent,
  SelectionWarningEvent,
} from './types/index.js';

// Utilities
export {
  generateRunId,
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
  createLogger,
  splitShellWords,
} from './utils/index.js';
export type { Logger, LogLevel, LogSink, LoggerOptions } from './utils/index.js';
export {
  ADDOPTS_ENV,
  BASE_ENV_ALLOWLIST,
  CONFIG_FILENAME,
  DEFAULT_CACHE_DIR,
  DEFAULT_INSTALL_COMMAND,
  DEFAULT_KILL_GRACE_MS,
  DEFAULT_STEPFILE,
} from './utils/constants.js';

// Configuration
export {
  DEFAULT_CONFIG,
  deepMerge,
  loadConfig,
  projectConfigSchema,
  readConfigFile,
  validateConfig,
} from './config/index.js';
export type { ConfigOverrides, ProjectConfigInput } from './config/index.js';

// Steps
export {
  RESERVED_PARAMETERS,
  StepRegistry,
  createCommandBody,
  expandParameters,
  expandStep,
  formatNodeKey,
  loadStepfile,
  normalizeBody,
  parseStepfile,
  renderCommand,
  renderTemplate,
  validateParameters,
  validateStepfile,
} from './steps/index.js';
export type {
  CommandBodyOptions,
  ParameterCombination,
  ParseStepfileOptions,
  StepfileDocument,
} from './steps/index.js';

// Graph
export {
  buildGraph,
  expandNames,
  findCycle,
  getNode,
  isGroup,
  requirementClosure,
  select,
  topologicalOrder,
} from './graph/index.js';

// Environments
export {
  LocalEnvironmentCache,
  NpmInstaller,
  ProcessManager,
  buildCommandEnv,
  buildFilteredEnv,
  hashConfig,
  hashContent,
  prependPath,
  readFingerprint,
  slugify,
  writeFingerprint,
} from './environment/index.js';
export type {
  CommandEnvOptions,
  EnvironmentInstaller,
  InstallOptions,
  LocalEnvironmentCacheOptions,
  SpawnOptions,
} from './environment/index.js';

// Engine
export {
  CancellationError,
  CancellationToken,
  EventBus,
  Executor,
  NodeScheduler,
  Pipeline,
  computeExitCode,
  countResults,
  nodeCachePath,
  nodeLogPath,
  resolveParallelism,
  slowestChain,
} from './engine/index.js';
export type {
  ExecuteOptions,
  ExecutorOptions,
  ListEntry,
  NodeState,
  PipelineOptions,
  PipelineRunOptions,
  RunSummary,
  SettledNode,
} from './engine/index.js';
