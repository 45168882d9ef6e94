import path from "node:path";
import { configFromEnv, resolveConfig } from "./config.js";
import type { ConfigLayer, TaskweaveConfig } from "./config.js";
import { RenderError } from "./errors.js";
import { StrategyRegistry } from "./executor/strategy.js";
import { DependencyGraph } from "./graph/dependency-graph.js";
import { loadWorkflow, loadsWorkflow, locateWorkflowSource } from "./loader/workflow-loader.js";
import type { LoadedWorkflow, WorkflowSource } from "./loader/workflow-loader.js";
import { findReferences } from "./outcomes/interpolator.js";
import type { Reference } from "./outcomes/interpolator.js";
import { registerBundledRunners } from "./runners/bundled.js";
import { loadRunnerPlugins } from "./runners/plugins.js";
import { RunnerRegistry } from "./runners/registry.js";
import type { SpawnFn } from "./runners/shell-runner.js";
import { log } from "./utils/logger.js";

export type ProjectOptions = {
  cwd?: string;
  /** Workflow path, or `-` for stdin. Falls back to `workflow.file`, then auto-detection. */
  workflow?: string;
  env?: NodeJS.ProcessEnv;
  /** Highest-priority layer, usually built from CLI flags. */
  overrides?: ConfigLayer;
  readStdin?: () => Promise<string>;
  spawn?: SpawnFn;
};

/** A loaded workflow with the configuration and runners it runs under. */
export type Project = {
  source: WorkflowSource;
  workflow: LoadedWorkflow;
  config: Readonly<TaskweaveConfig>;
  runners: RunnerRegistry;
  strategies: StrategyRegistry;
};

export type WorkflowIssue = {
  level: "error" | "warning";
  actionId?: string;
  message: string;
};

export async function readStdin(): Promise<string> {
  const chunks: Buffer[] = [];
  return new Promise((resolve, reject) => {
    process.stdin.on("data", (c) => chunks.push(Buffer.from(c)));
    process.stdin.on("end", () => resolve(Buffer.concat(chunks).toString("utf8")));
    process.stdin.on("error", reject);
    process.stdin.resume();
  });
}

/** Plugin directories named in a workflow file are relative to that file. */
function anchorLayer(layer: ConfigLayer, source: WorkflowSource, cwd: string): ConfigLayer {
  const dirs = layer.runners?.actionsDirectories;
  if (!dirs) return layer;
  const base = source.type === "file" ? path.dirname(source.path) : cwd;
  return { ...layer, runners: { ...layer.runners, actionsDirectories: dirs.map((d) => path.resolve(base, d)) } };
}

/**
 * Locate and load the workflow, resolve configuration
 * (defaults < workflow `configuration` < environment < overrides) and
 * register bundled runners followed by plugins.
 */
export async function openProject(opts: ProjectOptions = {}): Promise<Project> {
  const cwd = opts.cwd ?? process.cwd();
  const envLayer = configFromEnv(opts.env ?? process.env);
  const overrides = opts.overrides ?? {};

  const explicit = opts.workflow ?? resolveConfig(envLayer, overrides).workflow.file;
  const source = locateWorkflowSource(cwd, explicit);
  const workflow =
    source.type === "stdin"
      ? loadsWorkflow(await (opts.readStdin ?? readStdin)(), cwd)
      : loadWorkflow(source.path, cwd);

  const config = resolveConfig(anchorLayer(workflow.configuration, source, cwd), envLayer, overrides);
  log.debug("Resolved configuration", { engine: config.engine, runners: config.runners });

  const runners = new RunnerRegistry();
  registerBundledRunners(runners, config.runners, opts.spawn);
  const plugins = await loadRunnerPlugins(runners, config.runners.actionsDirectories);
  if (plugins.length > 0) log.info(`Loaded runner plugins: ${plugins.join(", ")}`);

  return { source, workflow, config, runners, strategies: StrategyRegistry.withBuiltins() };
}

/**
 * Static checks a run would otherwise only hit at dispatch time. Graph
 * errors are thrown as ValidationError; everything else is reported.
 */
export function checkWorkflow(project: Project): WorkflowIssue[] {
  const graph = DependencyGraph.build(project.workflow.descriptors);
  const issues: WorkflowIssue[] = [];

  if (!project.strategies.has(project.config.engine.strategy)) {
    issues.push({
      level: "error",
      message: `Unknown strategy "${project.config.engine.strategy}" (expected one of: ${project.strategies.names().join(", ")})`,
    });
  }

  for (const id of graph.order) {
    const descriptor = graph.get(id);
    if (!project.runners.has(descriptor.kind)) {
      issues.push({ level: "error", actionId: id, message: `Unknown runner kind "${descriptor.kind}"` });
    }

    let references: Reference[];
    try {
      references = findReferences(descriptor.params);
    } catch (err) {
      if (!(err instanceof RenderError)) throw err;
      issues.push({ level: "error", actionId: id, message: err.message });
      continue;
    }

    const ancestors = graph.ancestors(id);
    for (const ref of references) {
      if (ref.source === "env") continue;
      if (ref.source === "context") {
        if (!Object.hasOwn(project.workflow.context, ref.key)) {
          issues.push({ level: "error", actionId: id, message: `${ref.raw} names unknown context key "${ref.key}"` });
        }
        continue;
      }
      if (!graph.has(ref.actionId)) {
        issues.push({ level: "error", actionId: id, message: `${ref.raw} names unknown action "${ref.actionId}"` });
      } else if (!ancestors.has(ref.actionId)) {
        issues.push({
          level: "error",
          actionId: id,
          message: `${ref.raw} refers to "${ref.actionId}", which is not among its dependencies`,
        });
      } else {
        const declared = graph.get(ref.actionId).outcomes;
        if (declared && !declared.includes(ref.key)) {
          issues.push({
            level: "warning",
            actionId: id,
            message: `${ref.raw}: "${ref.actionId}" does not declare outcome "${ref.key}"`,
          });
        }
      }
    }
  }
  return issues;
}
