import { ConfigError } from "./errors.js";
import type { RenderMode } from "./outcomes/interpolator.js";
import type { OutcomeContract } from "./runners/contract.js";
import { ConfigLayerSchema, EnvSchema, parseOrThrow } from "./schemas.js";
import type { ConfigLayer } from "./schemas.js";
import type { LogLevel } from "./utils/logger.js";

export type EngineConfig = {
  /** Strategy name, resolved through the strategy registry. */
  strategy: string;
  /** Global bound on concurrently running actions. Unbounded when absent. */
  concurrency?: number;
  rendering: RenderMode;
  outcomeContract: OutcomeContract;
  /** How long a cancelled run waits for in-flight runners to stop. */
  cancelGraceMs: number;
};

export type RunnersConfig = {
  actionsDirectories: string[];
  shellInjectYieldFunction: boolean;
  dockerBinary: string;
};

export type TaskweaveConfig = {
  engine: EngineConfig;
  runners: RunnersConfig;
  logging: {
    level: LogLevel;
    file?: string;
  };
  workflow: {
    file?: string;
    envFile: string;
  };
  history: {
    dbPath?: string;
  };
};

export type { ConfigLayer };

const DEFAULTS: TaskweaveConfig = {
  engine: {
    strategy: "free",
    rendering: "lenient",
    outcomeContract: "open",
    cancelGraceMs: 5_000,
  },
  runners: {
    actionsDirectories: [],
    shellInjectYieldFunction: true,
    dockerBinary: "docker",
  },
  logging: {
    level: "warn",
  },
  workflow: {
    envFile: "./.env",
  },
  history: {},
};

function freeze(config: TaskweaveConfig): Readonly<TaskweaveConfig> {
  Object.freeze(config.engine);
  Object.freeze(config.runners.actionsDirectories);
  Object.freeze(config.runners);
  Object.freeze(config.logging);
  Object.freeze(config.workflow);
  Object.freeze(config.history);
  return Object.freeze(config);
}

/** The default config values (frozen). */
export const defaults: Readonly<TaskweaveConfig> = freeze(structuredClone(DEFAULTS));

/** Shallow merge of one section. Undefined values in the patch are ignored. */
function mergeSection<T extends object>(base: T, patch: Partial<T> | undefined): T {
  const result = { ...base };
  if (!patch) return result;
  for (const key in patch) {
    const value = patch[key];
    if (value !== undefined) result[key] = value;
  }
  return result;
}

/**
 * Merge partial layers over the defaults, lowest priority first.
 * Each layer is validated; the result is a new frozen object.
 */
export function resolveConfig(...layers: ConfigLayer[]): Readonly<TaskweaveConfig> {
  let config: TaskweaveConfig = structuredClone(DEFAULTS);
  for (const raw of layers) {
    const layer = parseOrThrow(ConfigLayerSchema, raw, (msg) => new ConfigError("CONFIG_INVALID", msg));
    config = {
      engine: mergeSection<EngineConfig>(config.engine, layer.engine),
      runners: mergeSection<RunnersConfig>(config.runners, layer.runners),
      logging: mergeSection<TaskweaveConfig["logging"]>(config.logging, layer.logging),
      workflow: mergeSection<TaskweaveConfig["workflow"]>(config.workflow, layer.workflow),
      history: mergeSection<TaskweaveConfig["history"]>(config.history, layer.history),
    };
  }
  config.runners.actionsDirectories = [...config.runners.actionsDirectories];
  return freeze(config);
}

/** Build a config layer from TASKWEAVE_* environment variables. */
export function configFromEnv(env: NodeJS.ProcessEnv = process.env): ConfigLayer {
  const e = parseOrThrow(EnvSchema, env, (msg) => new ConfigError("CONFIG_INVALID", `Invalid environment: ${msg}`));
  const strict = e.TASKWEAVE_STRICT_OUTCOMES;
  return {
    engine: {
      strategy: e.TASKWEAVE_STRATEGY,
      concurrency: e.TASKWEAVE_CONCURRENCY,
      rendering: strict === undefined ? undefined : strict ? "strict" : "lenient",
      outcomeContract: e.TASKWEAVE_OUTCOME_CONTRACT,
      cancelGraceMs: e.TASKWEAVE_CANCEL_GRACE_MS,
    },
    runners: {
      actionsDirectories: e.TASKWEAVE_ACTIONS_DIRS,
      shellInjectYieldFunction: e.TASKWEAVE_SHELL_INJECT_YIELD,
      dockerBinary: e.TASKWEAVE_DOCKER_BIN,
    },
    logging: {
      level: e.TASKWEAVE_LOG_LEVEL,
      file: e.TASKWEAVE_LOG_FILE,
    },
    workflow: {
      file: e.TASKWEAVE_WORKFLOW_FILE,
      envFile: e.TASKWEAVE_ENV_FILE,
    },
    history: {
      dbPath: e.TASKWEAVE_HISTORY_DB,
    },
  };
}

export type EnvVarInfo = { name: string; description: string; default: string };

/** Environment variables, as listed by `taskweave info env-vars`. */
export const ENV_VARS: readonly EnvVarInfo[] = [
  { name: "TASKWEAVE_STRATEGY", description: "Execution strategy name", default: DEFAULTS.engine.strategy },
  { name: "TASKWEAVE_CONCURRENCY", description: "Maximum concurrently running actions", default: "unbounded" },
  { name: "TASKWEAVE_STRICT_OUTCOMES", description: "Fail rendering on missing outcomes", default: "false" },
  { name: "TASKWEAVE_OUTCOME_CONTRACT", description: "open or closed outcome contract", default: "open" },
  {
    name: "TASKWEAVE_CANCEL_GRACE_MS",
    description: "Wait for running actions after cancellation (ms)",
    default: String(DEFAULTS.engine.cancelGraceMs),
  },
  { name: "TASKWEAVE_ACTIONS_DIRS", description: "Comma-separated runner plugin directories", default: "" },
  { name: "TASKWEAVE_SHELL_INJECT_YIELD", description: "Inject the yield_outcome shell function", default: "true" },
  { name: "TASKWEAVE_DOCKER_BIN", description: "Docker CLI executable", default: DEFAULTS.runners.dockerBinary },
  { name: "TASKWEAVE_LOG_LEVEL", description: "debug, info, warn, error or silent", default: DEFAULTS.logging.level },
  { name: "TASKWEAVE_LOG_FILE", description: "Write logs to this file instead of stderr", default: "" },
  { name: "TASKWEAVE_WORKFLOW_FILE", description: "Workflow file path, or - for stdin", default: "auto-detect" },
  { name: "TASKWEAVE_ENV_FILE", description: "Dotenv file loaded before reading the environment", default: "./.env" },
  { name: "TASKWEAVE_HISTORY_DB", description: "SQLite file recording finished runs", default: "" },
];
