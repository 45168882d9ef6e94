#!/usr/bin/env node

import { appendFileSync, readFileSync } from "node:fs";
import { dirname, join } from "node:path";
import { fileURLToPath } from "node:url";
import { Command, InvalidArgumentError, Option } from "commander";
import dotenv from "dotenv";
import { ENV_VARS, configFromEnv, defaults, resolveConfig } from "./config.js";
import type { ConfigLayer } from "./config.js";
import { DISPLAY_STYLES, ConsoleDisplay, fmtMs } from "./display/console-display.js";
import type { DisplayStyle } from "./display/console-display.js";
import { ConfigError, EXIT_CODES, TaskweaveError, errorMessage } from "./errors.js";
import { ExecutionEngine } from "./executor/engine.js";
import { exitCodeFor } from "./executor/types.js";
import { RunStore } from "./persistence/store.js";
import { checkWorkflow, openProject } from "./project.js";
import { LogLevelSchema } from "./schemas.js";
import { LOG_LEVELS, log, setLogLevel, setLogSink } from "./utils/logger.js";

process.on("unhandledRejection", (reason) => {
  log.error("Unhandled rejection", { reason: errorMessage(reason) });
  process.exitCode = EXIT_CODES.unexpected;
});

const __dirname = dirname(fileURLToPath(import.meta.url));
const { version } = readPackageVersion();

function readPackageVersion(): { version: string } {
  const pkg: unknown = JSON.parse(readFileSync(join(__dirname, "..", "package.json"), "utf8"));
  if (typeof pkg === "object" && pkg !== null && "version" in pkg && typeof pkg.version === "string") {
    return { version: pkg.version };
  }
  return { version: "0.0.0" };
}

function positiveInt(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 1) throw new InvalidArgumentError("Expected a positive integer.");
  return n;
}

function nonNegativeInt(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 0) throw new InvalidArgumentError("Expected a non-negative integer.");
  return n;
}

type RunFlags = {
  strategy?: string;
  concurrency?: number;
  strictOutcomes?: boolean;
  closedOutcomes?: boolean;
  actionsDir?: string[];
  cancelGrace?: number;
  display: DisplayStyle;
  color: boolean;
  history?: string;
};

function overridesFrom(flags: Omit<RunFlags, "display" | "color">): ConfigLayer {
  return {
    engine: {
      strategy: flags.strategy,
      concurrency: flags.concurrency,
      rendering: flags.strictOutcomes ? "strict" : undefined,
      outcomeContract: flags.closedOutcomes ? "closed" : undefined,
      cancelGraceMs: flags.cancelGrace,
    },
    runners: { actionsDirectories: flags.actionsDir },
    history: { dbPath: flags.history },
  };
}

const program = new Command();

program
  .name("taskweave")
  .description("Run a declarative graph of actions, passing named outcomes between them")
  .version(version)
  .addOption(new Option("-l, --log-level <level>", "Log level").choices(LOG_LEVELS))
  .option("--log-file <path>", "Append logs to this file instead of stderr");

program.hook("preAction", (_cmd, actionCmd) => {
  dotenv.config({ path: process.env.TASKWEAVE_ENV_FILE ?? defaults.workflow.envFile });
  const env = resolveConfig(configFromEnv(process.env)).logging;
  const opts: { logLevel?: string; logFile?: string } = actionCmd.optsWithGlobals();
  const level = LogLevelSchema.safeParse(opts.logLevel ?? env.level);
  setLogLevel(level.success ? level.data : defaults.logging.level);
  const file = opts.logFile ?? env.file;
  if (file) setLogSink((line) => appendFileSync(file, `${line}\n`));
});

// --- run ---
program
  .command("run")
  .description("Run a workflow")
  .argument("[workflow]", "Workflow file, or - to read it from stdin (default: ./taskweave.yml)")
  .option("-s, --strategy <name>", "Execution strategy (free, strict, sequential)")
  .option("-c, --concurrency <n>", "Maximum concurrently running actions", positiveInt)
  .option("--strict-outcomes", "Fail an action whose referenced outcome is missing")
  .option("--closed-outcomes", "Fail an action that yields outcomes other than the declared ones")
  .option("-a, --actions-dir <dir...>", "Directories with runner plugins")
  .option("--cancel-grace <ms>", "How long to wait for running actions after cancellation", nonNegativeInt)
  .addOption(new Option("-d, --display <style>", "Output style").choices(DISPLAY_STYLES).default("prefixes"))
  .option("--no-color", "Disable colored output")
  .option("--history <db>", "Record the finished run in this SQLite file")
  .action(async (workflowArg: string | undefined, flags: RunFlags) => {
    const project = await openProject({ workflow: workflowArg, overrides: overridesFrom(flags) });
    const engine = new ExecutionEngine(project.runners, project.config.engine, { strategies: project.strategies });
    const display = new ConsoleDisplay({
      style: flags.display,
      color: flags.color && process.stdout.isTTY === true,
    });

    const controller = new AbortController();
    const onSignal = (signal: NodeJS.Signals): void => {
      if (controller.signal.aborted) {
        log.warn(`Received ${signal} again, exiting`);
        process.exit(EXIT_CODES.cancelled);
      }
      log.warn(`Received ${signal}, cancelling the run`);
      controller.abort();
    };
    process.on("SIGINT", onSignal);
    process.on("SIGTERM", onSignal);

    try {
      const result = await engine.runDescriptors(project.workflow.descriptors, {
        signal: controller.signal,
        onEvent: display.handle,
        context: project.workflow.context,
      });
      process.exitCode = exitCodeFor(result.verdict);

      const dbPath = project.config.history.dbPath;
      if (dbPath) {
        const store = new RunStore(dbPath);
        try {
          store.insert(result, project.source.type === "file" ? project.source.path : "<stdin>");
        } finally {
          store.close();
        }
      }
    } finally {
      process.off("SIGINT", onSignal);
      process.off("SIGTERM", onSignal);
    }
  });

// --- validate ---
program
  .command("validate")
  .description("Check a workflow without running it")
  .argument("[workflow]", "Workflow file, or - to read it from stdin")
  .option("-a, --actions-dir <dir...>", "Directories with runner plugins")
  .action(async (workflowArg: string | undefined, flags: { actionsDir?: string[] }) => {
    const project = await openProject({
      workflow: workflowArg,
      overrides: { runners: { actionsDirectories: flags.actionsDir } },
    });
    const issues = checkWorkflow(project);
    for (const issue of issues) {
      const where = issue.actionId ? `[${issue.actionId}] ` : "";
      console.log(`${issue.level}: ${where}${issue.message}`);
    }
    const errors = issues.filter((i) => i.level === "error").length;
    if (errors > 0) {
      process.exitCode = EXIT_CODES.validation;
      return;
    }
    console.log(`OK: ${project.workflow.descriptors.length} action(s)`);
  });

// --- history ---
program
  .command("history")
  .description("List recorded runs")
  .option("--db <path>", "History database (default: TASKWEAVE_HISTORY_DB)")
  .option("-n, --limit <n>", "How many runs to show", positiveInt, 20)
  .action((flags: { db?: string; limit: number }) => {
    const dbPath = flags.db ?? resolveConfig(configFromEnv(process.env)).history.dbPath;
    if (!dbPath) {
      throw new ConfigError("CONFIG_INVALID", "No history database given (use --db or TASKWEAVE_HISTORY_DB)");
    }
    const store = new RunStore(dbPath);
    try {
      const runs = store.list(flags.limit);
      if (runs.length === 0) {
        console.log("No runs recorded.");
        return;
      }
      for (const run of runs) {
        const failed = run.actions.filter((a) => a.state !== "SUCCESS").map((a) => `${a.id}=${a.state}`);
        console.log(
          `${new Date(run.startedAt).toISOString()} ${run.verdict.padEnd(9)} ${run.strategy.padEnd(10)} ` +
            `${fmtMs(run.finishedAt - run.startedAt).padStart(7)} ${run.workflow ?? ""}` +
            (failed.length > 0 ? `\n    ${failed.join(", ")}` : ""),
        );
      }
    } finally {
      store.close();
    }
  });

// --- info ---
const info = program.command("info").description("Show information about taskweave");

info
  .command("version")
  .description("Show the version")
  .action(() => {
    console.log(version);
  });

info
  .command("env-vars")
  .description("List the environment variables taskweave reads")
  .action(() => {
    const width = Math.max(...ENV_VARS.map((v) => v.name.length));
    for (const v of ENV_VARS) {
      console.log(`${v.name.padEnd(width)}  ${v.description}${v.default ? ` (default: ${v.default})` : ""}`);
    }
  });

(async () => {
  try {
    await program.parseAsync();
  } catch (err) {
    if (err instanceof TaskweaveError) {
      log.debug(`Exiting after ${err.name}`, { code: err.code, exitCode: err.exitCode });
      console.error(err.message);
      process.exitCode = err.exitCode;
    } else {
      log.error("Unexpected error", { error: errorMessage(err) });
      console.error(err instanceof Error ? (err.stack ?? err.message) : String(err));
      process.exitCode = EXIT_CODES.unexpected;
    }
  }
})().catch((err: unknown) => {
  console.error(errorMessage(err));
  process.exitCode = EXIT_CODES.unexpected;
});
