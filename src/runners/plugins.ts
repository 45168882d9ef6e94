import { readdir } from "node:fs/promises";
import path from "node:path";
import { pathToFileURL } from "node:url";
import { LoadError, errorMessage } from "../errors.js";
import type { ActionDescriptor } from "../graph/types.js";
import { log } from "../utils/logger.js";
import type { ActionRunner } from "./contract.js";
import type { RunnerFactory, RunnerRegistry } from "./registry.js";

const PLUGIN_EXTENSIONS = new Set([".js", ".mjs"]);

export function isActionRunner(value: unknown): value is ActionRunner {
  return (
    typeof value === "object" &&
    value !== null &&
    "kind" in value &&
    typeof value.kind === "string" &&
    "run" in value &&
    typeof value.run === "function"
  );
}

function exportedFactory(mod: unknown): Function | null {
  if (typeof mod !== "object" || mod === null) return null;
  const candidate = "createRunner" in mod ? mod.createRunner : "default" in mod ? mod.default : undefined;
  return typeof candidate === "function" ? candidate : null;
}

async function importPlugin(file: string): Promise<RunnerFactory> {
  let mod: unknown;
  try {
    mod = await import(pathToFileURL(file).href);
  } catch (err) {
    throw new LoadError(`Failed to import runner plugin "${file}": ${errorMessage(err)}`);
  }
  const create = exportedFactory(mod);
  if (!create) {
    throw new LoadError(`Runner plugin "${file}" exports neither a default nor a createRunner factory function`);
  }
  return (descriptor: Readonly<ActionDescriptor>) => {
    const runner: unknown = create(descriptor);
    if (!isActionRunner(runner)) {
      throw new LoadError(`Runner plugin "${file}" did not return an action runner (needs "kind" and "run")`);
    }
    return runner;
  };
}

/**
 * Discover runner plugins. Every .js/.mjs file in each directory is a
 * plugin whose runner kind is the file name without extension. Later
 * directories override earlier ones; plugins override bundled kinds.
 * Returns the kinds registered.
 */
export async function loadRunnerPlugins(registry: RunnerRegistry, directories: readonly string[]): Promise<string[]> {
  const discovered = new Map<string, { file: string; factory: RunnerFactory }>();

  for (const directory of directories) {
    const root = path.resolve(directory);
    log.info(`Loading runner plugins from "${root}"`);
    let entries: string[];
    try {
      entries = (await readdir(root, { withFileTypes: true }))
        .filter((e) => e.isFile() && PLUGIN_EXTENSIONS.has(path.extname(e.name)))
        .map((e) => e.name)
        .sort();
    } catch (err) {
      throw new LoadError(`Cannot read actions directory "${root}": ${errorMessage(err)}`);
    }

    for (const name of entries) {
      const kind = path.basename(name, path.extname(name));
      const file = path.join(root, name);
      const previous = discovered.get(kind);
      if (previous) {
        log.warn(`Runner kind "${kind}" is already defined: overriding from ${file}`, { previous: previous.file });
      }
      discovered.set(kind, { file, factory: await importPlugin(file) });
    }
  }

  for (const [kind, { file, factory }] of discovered) {
    if (registry.set(kind, factory)) {
      log.warn(`Runner plugin "${file}" replaces the registered "${kind}" runner`);
    }
  }
  return [...discovered.keys()];
}
