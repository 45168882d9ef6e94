import { existsSync, readFileSync, statSync } from "node:fs";
import path from "node:path";
import { parse as parseYaml } from "yaml";
import type { ScalarTag } from "yaml";
import type { ConfigLayer } from "../config.js";
import { LoadError, SourceError, errorMessage } from "../errors.js";
import type { ActionDescriptor, ActionSeverity } from "../graph/types.js";
import { ActionParamsSchema, WorkflowConfigurationSchema, formatIssues } from "../schemas.js";
import { log } from "../utils/logger.js";

export const WORKFLOW_FILE_NAMES = ["taskweave.yml", "taskweave.yaml"] as const;

const ROOT_KEYS = new Set(["actions", "configuration", "context"]);
const DEPENDENCY_KEYS = new Set(["name"]);

export type LoadedWorkflow = {
  descriptors: ActionDescriptor[];
  /** The file's `configuration` section, as a config layer. */
  configuration: ConfigLayer;
  /** Values for `@{context.key}` references; later keys win. */
  context: Record<string, string>;
  /** Every file read, in load order. */
  sources: string[];
};

export type WorkflowSource = { type: "file"; path: string } | { type: "stdin" };

/** `!import path/to/file.yml` inside the `actions` or `context` list. */
class ImportDirective {
  constructor(readonly path: string) {}
}

const importTag: ScalarTag = {
  tag: "!import",
  identify: (value) => value instanceof ImportDirective,
  resolve: (value) => new ImportDirective(value),
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value) && !(value instanceof ImportDirective);
}

/**
 * Reads a YAML workflow into action descriptors. One instance per load:
 * it tracks the import stack for cycle detection and error context.
 */
class WorkflowLoader {
  private actions = new Map<string, ActionDescriptor>();
  private configuration: ConfigLayer = {};
  private context: Record<string, string> = {};
  private sources: string[] = [];
  private rawStack: string[] = [];
  private resolvedStack: string[] = [];
  private typeCounters = new Map<string, number>();

  constructor(private readonly baseDir: string) {}

  loadFile(file: string): LoadedWorkflow {
    this.readFile(file, ROOT_KEYS);
    return this.result();
  }

  loadText(text: string): LoadedWorkflow {
    this.parseDocument(text, ROOT_KEYS);
    return this.result();
  }

  private result(): LoadedWorkflow {
    return {
      descriptors: [...this.actions.values()],
      configuration: this.configuration,
      context: this.context,
      sources: this.sources,
    };
  }

  private error(message: string): LoadError {
    return new LoadError(message, this.rawStack);
  }

  private readFile(file: string, allowedKeys: ReadonlySet<string>): void {
    const current = this.resolvedStack.at(-1);
    const context = current ? path.dirname(current) : this.baseDir;
    const resolved = path.resolve(context, file);
    if (this.resolvedStack.includes(resolved)) {
      throw this.error(`Cyclic load of "${file}"`);
    }

    this.rawStack.push(file);
    this.resolvedStack.push(resolved);
    try {
      if (!existsSync(resolved) || !statSync(resolved).isFile()) {
        throw this.error(`Workflow file not found: ${resolved}`);
      }
      log.debug(`Loading workflow file: ${resolved}`);
      this.sources.push(resolved);
      this.parseDocument(readFileSync(resolved, "utf8"), allowedKeys);
    } finally {
      this.rawStack.pop();
      this.resolvedStack.pop();
    }
  }

  private parseDocument(text: string, allowedKeys: ReadonlySet<string>): void {
    let root: unknown;
    try {
      root = parseYaml(text, { customTags: [importTag] });
    } catch (err) {
      throw this.error(`Invalid YAML: ${errorMessage(err)}`);
    }
    if (!isRecord(root)) {
      throw this.error("Unknown workflow structure (should be a mapping)");
    }

    const keys = Object.keys(root);
    const expected = [...ROOT_KEYS].join(", ");
    if (keys.length === 0) {
      throw this.error(`Empty root mapping (expected some of: ${expected})`);
    }
    const unknown = keys.filter((k) => !ROOT_KEYS.has(k));
    if (unknown.length > 0) {
      throw this.error(`Unrecognized root keys: ${unknown.sort().join(", ")} (expected some of: ${expected})`);
    }

    for (const key of keys) {
      if (!allowedKeys.has(key)) {
        log.warn(`Ignoring "${key}" section of an imported file`, { file: this.rawStack.at(-1) });
      }
    }

    if (allowedKeys.has("actions") && "actions" in root) {
      const actions = root.actions;
      if (!Array.isArray(actions)) {
        throw this.error(`"actions" should be a list (got ${describe(actions)})`);
      }
      for (const node of actions) {
        if (node instanceof ImportDirective) {
          if (!node.path.trim()) throw this.error("Empty import");
          this.readFile(node.path.trim(), new Set(["actions"]));
        } else if (isRecord(node)) {
          this.register(this.buildAction(node));
        } else {
          throw this.error(`Unrecognized action node: ${describe(node)}`);
        }
      }
    }

    if (allowedKeys.has("context") && "context" in root) {
      const context = root.context;
      const items = Array.isArray(context) ? context : [context];
      for (const item of items) {
        if (item instanceof ImportDirective) {
          if (!item.path.trim()) throw this.error("Empty import");
          this.readFile(item.path.trim(), new Set(["context"]));
        } else if (isRecord(item)) {
          this.mergeContext(item);
        } else if (item !== null) {
          throw this.error(`Unrecognized context node: ${describe(item)} (expected a mapping or an import)`);
        }
      }
    }

    if (allowedKeys.has("configuration") && "configuration" in root) {
      const parsed = WorkflowConfigurationSchema.safeParse(root.configuration ?? {});
      if (!parsed.success) {
        throw this.error(`Invalid configuration: ${formatIssues(parsed.error)}`);
      }
      this.configuration = parsed.data;
    }
  }

  private mergeContext(node: Record<string, unknown>): void {
    for (const [key, value] of Object.entries(node)) {
      if (typeof value === "string") {
        this.context[key] = value;
      } else if (typeof value === "number" || typeof value === "boolean") {
        this.context[key] = String(value);
      } else {
        throw this.error(`Context value "${key}" should be a scalar (got ${describe(value)})`);
      }
    }
  }

  private register(action: ActionDescriptor): void {
    if (this.actions.has(action.id)) {
      throw this.error(`Action declared twice: "${action.id}"`);
    }
    this.actions.set(action.id, action);
  }

  private buildAction(node: Record<string, unknown>): ActionDescriptor {
    const { type, name, description, expects, outcomes, severity, ...rest } = node;

    if (type === undefined) throw this.error('"type" not specified for action');
    if (typeof type !== "string" || !type) {
      throw this.error(`Unexpected "type" content: ${describe(type)} (expected a non-empty string)`);
    }

    const counter = this.typeCounters.get(type) ?? 0;
    this.typeCounters.set(type, counter + 1);
    let id: string;
    if (name === undefined) {
      id = `${type}-${counter}`;
    } else if (typeof name !== "string") {
      throw this.error(`Unexpected name type: ${describe(name)} (should be a string)`);
    } else if (!name) {
      throw this.error("Action node name is empty");
    } else {
      id = name;
    }

    if (description !== undefined && typeof description !== "string") {
      throw this.error(`Unrecognized "description" content: ${describe(description)} (expected a string)`);
    }
    if (severity !== undefined && !isSeverity(severity)) {
      throw this.error(`Unrecognized "severity" of action "${id}": ${describe(severity)} (expected low or normal)`);
    }

    const params = ActionParamsSchema.safeParse(rest);
    if (!params.success) {
      throw this.error(`Invalid parameters for action "${id}": ${formatIssues(params.error)}`);
    }

    const descriptor: ActionDescriptor = {
      id,
      kind: type,
      params: params.data,
      dependsOn: this.buildDependencies(expects),
    };
    if (outcomes !== undefined) descriptor.outcomes = this.buildOutcomeNames(id, outcomes);
    if (description !== undefined) descriptor.description = description;
    if (severity !== undefined) descriptor.severity = severity;
    return descriptor;
  }

  private buildDependencies(node: unknown): string[] {
    if (node === undefined || node === null) return [];
    const items = typeof node === "string" ? [node] : node;
    if (!Array.isArray(items)) {
      throw this.error(`Unrecognized "expects" content: ${describe(node)} (expected a string or a list)`);
    }
    return items.map((item: unknown) => {
      if (typeof item === "string") {
        if (!item) throw this.error("Empty dependency name met");
        return item;
      }
      if (!isRecord(item)) {
        throw this.error(`Unrecognized dependency node: ${describe(item)} (expected a string or a mapping)`);
      }
      const unexpected = Object.keys(item).filter((k) => !DEPENDENCY_KEYS.has(k));
      if (unexpected.length > 0) {
        throw this.error(`Unrecognized dependency node keys: ${unexpected.sort().join(", ")}`);
      }
      const depName = item.name;
      if (typeof depName !== "string" || !depName) {
        throw this.error(`Dependency name should be a non-empty string (got ${describe(depName)})`);
      }
      return depName;
    });
  }

  private buildOutcomeNames(id: string, node: unknown): string[] {
    const items = typeof node === "string" ? [node] : node;
    if (!Array.isArray(items) || !items.every((i: unknown): i is string => typeof i === "string" && i !== "")) {
      throw this.error(`"outcomes" of action "${id}" should be a list of names`);
    }
    return items;
  }
}

function isSeverity(value: unknown): value is ActionSeverity {
  return value === "low" || value === "normal";
}

function describe(value: unknown): string {
  if (value === null) return "null";
  if (Array.isArray(value)) return "a list";
  if (value instanceof ImportDirective) return `!import ${value.path}`;
  return typeof value === "object" ? "a mapping" : `${typeof value} ${JSON.stringify(value)}`;
}

/** Load a workflow file; `!import` paths resolve relative to the importing file. */
export function loadWorkflow(file: string, cwd: string = process.cwd()): LoadedWorkflow {
  return new WorkflowLoader(cwd).loadFile(file);
}

/** Load a workflow from text; `!import` paths resolve relative to `baseDir`. */
export function loadsWorkflow(text: string, baseDir: string = process.cwd()): LoadedWorkflow {
  return new WorkflowLoader(baseDir).loadText(text);
}

/**
 * Pick the workflow source: an explicit path, `-` for stdin, or the single
 * taskweave.yml / taskweave.yaml in `cwd`.
 */
export function locateWorkflowSource(cwd: string, explicit?: string): WorkflowSource {
  if (explicit !== undefined) {
    if (explicit === "-") return { type: "stdin" };
    const file = path.resolve(cwd, explicit);
    if (!existsSync(file)) {
      throw new SourceError(`Given workflow file does not exist: ${file}`);
    }
    return { type: "file", path: file };
  }

  const found = WORKFLOW_FILE_NAMES.map((name) => path.join(cwd, name)).filter((file) => existsSync(file));
  if (found.length > 1) {
    throw new SourceError(`Multiple workflow sources detected in ${cwd}: ${found.map((f) => path.basename(f)).join(", ")}`);
  }
  const [file] = found;
  if (file === undefined) {
    throw new SourceError(`No workflow source detected in ${cwd} (expected ${WORKFLOW_FILE_NAMES.join(" or ")})`);
  }
  log.info(`Detected the workflow source: ${file}`);
  return { type: "file", path: file };
}
