import { ValidationError } from "../errors.js";
import { RESERVED_ACTION_IDS } from "./types.js";
import type { ActionDescriptor, ParamValue } from "./types.js";

// Ids appear inside `@{id.key}` references, so these characters are reserved.
const VALID_ID = /^[^\s.@{}]+$/;

const WHITE = 0;
const GRAY = 1;
const BLACK = 2;
type Color = typeof WHITE | typeof GRAY | typeof BLACK;

/**
 * Immutable action graph. Built and validated once per run; every query is
 * read-only, so the scheduler and strategies share it without coordination.
 */
export class DependencyGraph {
  private readonly actions: ReadonlyMap<string, Readonly<ActionDescriptor>>;
  private readonly forward: ReadonlyMap<string, readonly string[]>;
  private readonly backward: ReadonlyMap<string, readonly string[]>;
  private readonly ancestorCache = new Map<string, ReadonlySet<string>>();
  private readonly descendantCache = new Map<string, ReadonlySet<string>>();
  readonly order: readonly string[];

  private constructor(
    actions: Map<string, Readonly<ActionDescriptor>>,
    backward: Map<string, string[]>,
    forward: Map<string, string[]>,
  ) {
    this.actions = actions;
    this.backward = backward;
    this.forward = forward;
    this.order = Object.freeze(kahnOrder([...actions.keys()], backward, forward));
  }

  /** Validate descriptors and build the graph. Throws ValidationError. */
  static build(descriptors: readonly ActionDescriptor[]): DependencyGraph {
    const actions = new Map<string, Readonly<ActionDescriptor>>();

    for (const descriptor of descriptors) {
      if (!VALID_ID.test(descriptor.id)) {
        throw new ValidationError(
          "InvalidId",
          `Action id "${descriptor.id}" is invalid (must be non-empty and contain no whitespace, ".", "@", "{" or "}")`,
          { actionId: descriptor.id },
        );
      }
      if (RESERVED_ACTION_IDS.has(descriptor.id)) {
        throw new ValidationError(
          "ReservedId",
          `Action id "${descriptor.id}" is reserved (${[...RESERVED_ACTION_IDS].join(", ")} are reference namespaces)`,
          { actionId: descriptor.id },
        );
      }
      if (actions.has(descriptor.id)) {
        throw new ValidationError("DuplicateId", `Action "${descriptor.id}" is declared more than once`, {
          actionId: descriptor.id,
        });
      }
      actions.set(descriptor.id, freezeDescriptor(descriptor));
    }

    const backward = new Map<string, string[]>();
    const forward = new Map<string, string[]>();
    for (const id of actions.keys()) forward.set(id, []);

    for (const action of actions.values()) {
      for (const dep of action.dependsOn) {
        if (!actions.has(dep)) {
          throw new ValidationError("UnknownDependency", `Action "${action.id}" depends on unknown action "${dep}"`, {
            actionId: action.id,
            dependency: dep,
          });
        }
        forward.get(dep)?.push(action.id);
      }
      backward.set(action.id, [...action.dependsOn]);
    }

    const cycle = findCycle([...actions.keys()], backward);
    if (cycle) {
      throw new ValidationError("CycleDetected", `Dependency cycle detected: ${cycle.join(" -> ")}`, { cycle });
    }

    return new DependencyGraph(actions, backward, forward);
  }

  get size(): number {
    return this.actions.size;
  }

  get ids(): string[] {
    return [...this.actions.keys()];
  }

  has(id: string): boolean {
    return this.actions.has(id);
  }

  get(id: string): Readonly<ActionDescriptor> {
    const action = this.actions.get(id);
    if (!action) throw unknownAction(id);
    return action;
  }

  dependencies(id: string): readonly string[] {
    const deps = this.backward.get(id);
    if (!deps) throw unknownAction(id);
    return deps;
  }

  dependents(id: string): readonly string[] {
    const next = this.forward.get(id);
    if (!next) throw unknownAction(id);
    return next;
  }

  /** Actions without dependencies, in declaration order. */
  roots(): string[] {
    return this.ids.filter((id) => this.dependencies(id).length === 0);
  }

  /** Transitive dependencies of `id`. */
  ancestors(id: string): ReadonlySet<string> {
    return this.closure(id, this.ancestorCache, (n) => this.dependencies(n));
  }

  /** Transitive dependents of `id`. */
  descendants(id: string): ReadonlySet<string> {
    return this.closure(id, this.descendantCache, (n) => this.dependents(n));
  }

  private closure(
    id: string,
    cache: Map<string, ReadonlySet<string>>,
    next: (id: string) => readonly string[],
  ): ReadonlySet<string> {
    const cached = cache.get(id);
    if (cached) return cached;

    const seen = new Set<string>();
    const queue = [...next(id)];
    while (queue.length > 0) {
      const current = queue.shift();
      if (current === undefined || seen.has(current)) continue;
      seen.add(current);
      queue.push(...next(current));
    }
    cache.set(id, seen);
    return seen;
  }
}

function unknownAction(id: string): ValidationError {
  return new ValidationError("UnknownAction", `Unknown action "${id}"`, { actionId: id });
}

function freezeDescriptor(descriptor: ActionDescriptor): Readonly<ActionDescriptor> {
  const copy: ActionDescriptor = {
    id: descriptor.id,
    kind: descriptor.kind,
    params: structuredClone(descriptor.params),
    dependsOn: [...new Set(descriptor.dependsOn)],
  };
  if (descriptor.outcomes) copy.outcomes = [...descriptor.outcomes];
  if (descriptor.description !== undefined) copy.description = descriptor.description;
  if (descriptor.severity !== undefined) copy.severity = descriptor.severity;
  deepFreeze(copy.params);
  Object.freeze(copy.dependsOn);
  if (copy.outcomes) Object.freeze(copy.outcomes);
  return Object.freeze(copy);
}

function deepFreeze(value: ParamValue): void {
  if (value === null || typeof value !== "object") return;
  for (const child of Object.values(value)) deepFreeze(child);
  Object.freeze(value);
}

/**
 * DFS with white/gray/black coloring over dependency edges. The first back
 * edge found yields the cycle as a closed path: ["a", "b", "a"].
 */
function findCycle(ids: string[], backward: Map<string, string[]>): string[] | null {
  const color = new Map<string, Color>();
  for (const id of ids) color.set(id, WHITE);
  const path: string[] = [];

  function dfs(id: string): string[] | null {
    color.set(id, GRAY);
    path.push(id);
    for (const dep of backward.get(id) ?? []) {
      const c = color.get(dep);
      if (c === GRAY) {
        return [...path.slice(path.indexOf(dep)), dep]; // back edge
      }
      if (c === WHITE) {
        const found = dfs(dep);
        if (found) return found;
      }
    }
    path.pop();
    color.set(id, BLACK);
    return null;
  }

  for (const id of ids) {
    if (color.get(id) === WHITE) {
      const found = dfs(id);
      if (found) return found;
    }
  }
  return null;
}

/** Kahn's algorithm seeded with roots in declaration order. */
function kahnOrder(ids: string[], backward: Map<string, string[]>, forward: Map<string, string[]>): string[] {
  const indegree = new Map<string, number>();
  for (const id of ids) indegree.set(id, backward.get(id)?.length ?? 0);

  const queue = ids.filter((id) => indegree.get(id) === 0);
  const sorted: string[] = [];
  while (queue.length > 0) {
    const id = queue.shift();
    if (id === undefined) break;
    sorted.push(id);
    for (const next of forward.get(id) ?? []) {
      const remaining = (indegree.get(next) ?? 0) - 1;
      indegree.set(next, remaining);
      if (remaining === 0) queue.push(next);
    }
  }
  return sorted;
}
