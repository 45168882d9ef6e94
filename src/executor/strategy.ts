import { ConfigError } from "../errors.js";
import type { DependencyGraph } from "../graph/dependency-graph.js";
import type { ActionState, TerminalState } from "../graph/types.js";
import { Semaphore } from "../utils/semaphore.js";

export type SkipDirective = { id: string; reason: string };

export type DispatchPlan = {
  dispatch: string[];
  skip: SkipDirective[];
};

/** Read-only view of the run handed to a strategy on every pass. */
export type SchedulingView = {
  graph: DependencyGraph;
  stateOf(id: string): ActionState;
};

/**
 * Scheduling policy. `plan` receives the READY actions in topological order
 * and picks which to dispatch now and which to skip; the rest stay READY.
 * `settled` is called once for every action that was returned in `dispatch`,
 * when it reaches a terminal state.
 */
export interface ExecutionStrategy {
  readonly name: string;
  plan(ready: readonly string[], view: SchedulingView): DispatchPlan;
  settled(id: string, state: TerminalState): void;
}

export type StrategyOptions = {
  concurrency?: number;
};

export type StrategyFactory = (opts: StrategyOptions) => ExecutionStrategy;

const BLOCKING_STATES: ReadonlySet<ActionState> = new Set<ActionState>(["WARNING", "FAILURE", "SKIPPED", "CANCELLED"]);

/**
 * Forward propagation shared by all strategies: every descendant of an
 * action that ended in anything but SUCCESS, mapped to the action that blocked
 * it first (walking in topological order, so the earliest origin wins).
 */
export function blockedLineage(
  graph: DependencyGraph,
  stateOf: (id: string) => ActionState,
): Map<string, string> {
  const blocked = new Map<string, string>();
  for (const id of graph.order) {
    if (!BLOCKING_STATES.has(stateOf(id))) continue;
    const origin = blocked.get(id) ?? id;
    for (const descendant of graph.descendants(id)) {
      if (!blocked.has(descendant)) blocked.set(descendant, origin);
    }
  }
  return blocked;
}

function skipReason(origin: string, view: SchedulingView): string {
  return `upstream action "${origin}" ended in ${view.stateOf(origin)}`;
}

/** Base for strategies that hold a dispatch slot per running action. */
abstract class SlotStrategy implements ExecutionStrategy {
  abstract readonly name: string;
  protected readonly slots: Semaphore;
  private holding = new Set<string>();

  constructor(limit: number) {
    this.slots = new Semaphore(limit);
  }

  abstract plan(ready: readonly string[], view: SchedulingView): DispatchPlan;

  settled(id: string, _state: TerminalState): void {
    if (this.holding.delete(id)) this.slots.release();
  }

  protected take(id: string): boolean {
    if (!this.slots.tryAcquire()) return false;
    this.holding.add(id);
    return true;
  }

  /** Dispatch what fits, skip whatever a failed, skipped or cancelled ancestor blocks. */
  protected planWithLineage(ready: readonly string[], view: SchedulingView): DispatchPlan {
    const blocked = blockedLineage(view.graph, view.stateOf);
    const plan: DispatchPlan = { dispatch: [], skip: [] };
    for (const id of ready) {
      const origin = blocked.get(id);
      if (origin !== undefined) {
        plan.skip.push({ id, reason: skipReason(origin, view) });
      } else if (this.take(id)) {
        plan.dispatch.push(id);
      }
    }
    return plan;
  }
}

/** Everything ready runs at once, up to the optional concurrency limit. */
export class FreeStrategy extends SlotStrategy {
  readonly name = "free";

  constructor(opts: StrategyOptions = {}) {
    super(opts.concurrency ?? Number.POSITIVE_INFINITY);
  }

  plan(ready: readonly string[], view: SchedulingView): DispatchPlan {
    return this.planWithLineage(ready, view);
  }
}

/** One action at a time in topological order; failures skip only their lineage. */
export class SequentialStrategy extends SlotStrategy {
  readonly name = "sequential";

  constructor(_opts: StrategyOptions = {}) {
    super(1);
  }

  plan(ready: readonly string[], view: SchedulingView): DispatchPlan {
    return this.planWithLineage(ready, view);
  }
}

/**
 * One action at a time in topological order; the first FAILURE or CANCELLED
 * skips everything left. A WARNING only skips its own lineage.
 */
export class StrictStrategy extends SlotStrategy {
  readonly name = "strict";
  private haltedBy: { id: string; state: TerminalState } | null = null;

  constructor(_opts: StrategyOptions = {}) {
    super(1);
  }

  plan(ready: readonly string[], view: SchedulingView): DispatchPlan {
    const halt = this.haltedBy;
    if (halt) {
      return {
        dispatch: [],
        skip: ready.map((id) => ({ id, reason: `run halted after "${halt.id}" ended in ${halt.state}` })),
      };
    }
    return this.planWithLineage(ready, view);
  }

  settled(id: string, state: TerminalState): void {
    super.settled(id, state);
    if (!this.haltedBy && (state === "FAILURE" || state === "CANCELLED")) {
      this.haltedBy = { id, state };
    }
  }
}

/** Named strategy constructors. */
export class StrategyRegistry {
  private factories = new Map<string, StrategyFactory>();

  /** Registry holding free, strict and sequential. */
  static withBuiltins(): StrategyRegistry {
    const registry = new StrategyRegistry();
    registry.register("free", (opts) => new FreeStrategy(opts));
    registry.register("strict", (opts) => new StrictStrategy(opts));
    registry.register("sequential", (opts) => new SequentialStrategy(opts));
    return registry;
  }

  register(name: string, factory: StrategyFactory): void {
    if (this.factories.has(name)) {
      throw new ConfigError("DUPLICATE_REGISTRATION", `Strategy "${name}" already registered`);
    }
    this.factories.set(name, factory);
  }

  has(name: string): boolean {
    return this.factories.has(name);
  }

  names(): string[] {
    return [...this.factories.keys()];
  }

  create(name: string, opts: StrategyOptions = {}): ExecutionStrategy {
    const factory = this.factories.get(name);
    if (!factory) {
      throw new ConfigError(
        "UNKNOWN_STRATEGY",
        `Unknown strategy "${name}" (expected one of: ${this.names().join(", ")})`,
      );
    }
    return factory(opts);
  }
}
