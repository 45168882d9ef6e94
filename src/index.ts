// Config
export { defaults, resolveConfig, configFromEnv, ENV_VARS } from "./config.js";
export type { TaskweaveConfig, EngineConfig, RunnersConfig, ConfigLayer, EnvVarInfo } from "./config.js";

// Errors
export {
  TaskweaveError,
  ConfigError,
  LoadError,
  SourceError,
  ValidationError,
  RenderError,
  ConflictError,
  InternalError,
  EXIT_CODES,
  errorMessage,
} from "./errors.js";
export type { ErrorCode, ValidationErrorKind, RenderErrorKind } from "./errors.js";

// Schemas
export { parseOrThrow, formatIssues, ActionParamsSchema, ConfigLayerSchema, RunnerResultSchema } from "./schemas.js";

// Graph
export { DependencyGraph } from "./graph/dependency-graph.js";
export { isTerminal, RESERVED_ACTION_IDS, TERMINAL_STATES } from "./graph/types.js";
export type { ActionDescriptor, ActionParams, ActionSeverity, ActionState, ParamValue, TerminalState } from "./graph/types.js";

// Outcomes
export { OutcomeLedger } from "./outcomes/ledger.js";
export type { OutcomeReader, OutcomeSnapshot } from "./outcomes/ledger.js";
export { tokenize, findReferences, renderString, renderParams } from "./outcomes/interpolator.js";
export type {
  NamespaceReference,
  OutcomeReference,
  Reference,
  ReferenceScope,
  RenderMode,
  RenderOptions,
} from "./outcomes/interpolator.js";

// Runners
export { succeed, fail, cancelled, invokeRunner } from "./runners/contract.js";
export type {
  ActionRunner,
  OutcomeContract,
  OutputStream,
  RunnerContext,
  RunnerResult,
  RunnerSuccess,
  RunnerFailure,
  RunnerCancelled,
} from "./runners/contract.js";
export { RunnerRegistry } from "./runners/registry.js";
export type { RunnerFactory } from "./runners/registry.js";
export { FunctionRunner } from "./runners/function-runner.js";
export type { FunctionRunnerOptions, RunnerFunction } from "./runners/function-runner.js";
export { ShellRunner, shellQuote } from "./runners/shell-runner.js";
export type { ChildHandle, SpawnFn, ShellRunnerOptions } from "./runners/shell-runner.js";
export { DockerShellRunner } from "./runners/docker-runner.js";
export type { DockerShellRunnerOptions } from "./runners/docker-runner.js";
export { EchoRunner } from "./runners/echo-runner.js";
export { registerBundledRunners, BUNDLED_KINDS } from "./runners/bundled.js";
export { loadRunnerPlugins, isActionRunner } from "./runners/plugins.js";

// Execution
export { ExecutionEngine } from "./executor/engine.js";
export type { EngineOptions } from "./executor/engine.js";
export {
  StrategyRegistry,
  FreeStrategy,
  StrictStrategy,
  SequentialStrategy,
  blockedLineage,
} from "./executor/strategy.js";
export type {
  ExecutionStrategy,
  DispatchPlan,
  SchedulingView,
  SkipDirective,
  StrategyFactory,
  StrategyOptions,
} from "./executor/strategy.js";
export { exitCodeFor } from "./executor/types.js";
export type { ActionReport, RunEvent, RunEventListener, RunOptions, RunResult, RunVerdict } from "./executor/types.js";

// Workflow files
export { loadWorkflow, loadsWorkflow, locateWorkflowSource, WORKFLOW_FILE_NAMES } from "./loader/workflow-loader.js";
export type { LoadedWorkflow, WorkflowSource } from "./loader/workflow-loader.js";
export { openProject, checkWorkflow } from "./project.js";
export type { Project, ProjectOptions, WorkflowIssue } from "./project.js";

// Display
export { ConsoleDisplay, fmtMs } from "./display/console-display.js";
export type { ConsoleDisplayOptions, DisplayStyle } from "./display/console-display.js";

// Persistence
export { RunStore } from "./persistence/store.js";
export type { RunRecord, ActionSummary } from "./persistence/store.js";

// Logging
export { log, setLogLevel, setLogSink } from "./utils/logger.js";
export type { LogLevel, LogSink } from "./utils/logger.js";
