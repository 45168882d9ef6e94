import { randomUUID } from "node:crypto";
import { setMaxListeners } from "node:events";
import { resolveConfig } from "../config.js";
import type { EngineConfig } from "../config.js";
import { InternalError, RenderError, ValidationError, errorMessage } from "../errors.js";
import { DependencyGraph } from "../graph/dependency-graph.js";
import { isTerminal } from "../graph/types.js";
import type { ActionDescriptor, ActionParams, ActionState, TerminalState } from "../graph/types.js";
import { renderParams } from "../outcomes/interpolator.js";
import { OutcomeLedger } from "../outcomes/ledger.js";
import { invokeRunner } from "../runners/contract.js";
import type { ActionRunner, RunnerContext, RunnerResult } from "../runners/contract.js";
import type { RunnerRegistry } from "../runners/registry.js";
import { log } from "../utils/logger.js";
import { ActionStateMachine } from "./state.js";
import { StrategyRegistry } from "./strategy.js";
import type { DispatchPlan, ExecutionStrategy, SchedulingView } from "./strategy.js";
import type { ActionReport, RunEvent, RunOptions, RunResult, RunVerdict } from "./types.js";

export type EngineOptions = {
  /** Named strategies available to runs. Defaults to free, strict and sequential. */
  strategies?: StrategyRegistry;
};

type Completion = { id: string; result: RunnerResult };

function deadline(ms: number): { expired: Promise<"expired">; clear(): void } {
  let clear = (): void => undefined;
  const expired = new Promise<"expired">((resolve) => {
    const timer = setTimeout(() => resolve("expired"), ms);
    clear = () => clearTimeout(timer);
  });
  return { expired, clear: () => clear() };
}

/**
 * Runs a dependency graph to completion. Holds no per-run state: every
 * `run` call gets its own session, ledger and cancel signal.
 */
export class ExecutionEngine {
  private runners: RunnerRegistry;
  private config: Readonly<EngineConfig>;
  private strategies: StrategyRegistry;

  constructor(runners: RunnerRegistry, config: Partial<EngineConfig> = {}, opts: EngineOptions = {}) {
    this.runners = runners;
    this.config = resolveConfig({ engine: config }).engine;
    this.strategies = opts.strategies ?? StrategyRegistry.withBuiltins();
  }

  /** Build the graph, then run it. Throws ValidationError before anything starts. */
  async runDescriptors(descriptors: readonly ActionDescriptor[], options: RunOptions = {}): Promise<RunResult> {
    return this.run(DependencyGraph.build(descriptors), options);
  }

  async run(graph: DependencyGraph, options: RunOptions = {}): Promise<RunResult> {
    for (const id of graph.order) {
      const { kind } = graph.get(id);
      if (!this.runners.has(kind)) {
        throw new ValidationError("UnknownRunnerKind", `Action "${id}" uses unknown runner kind "${kind}"`, {
          actionId: id,
          kind,
        });
      }
    }
    const strategy = this.strategies.create(this.config.strategy, { concurrency: this.config.concurrency });
    const session = new RunSession(graph, strategy, this.runners, this.config, options);
    return session.execute();
  }
}

/**
 * One run. The session is the only writer of action state and of the
 * ledger; runner bodies progress concurrently and report back through
 * their completion promises, which this loop consumes one at a time.
 */
class RunSession {
  private readonly runId: string;
  private readonly states: ActionStateMachine;
  private readonly ledger = new OutcomeLedger();
  private readonly reports = new Map<string, ActionReport>();
  private readonly inFlight = new Map<string, Promise<Completion>>();
  private readonly controller = new AbortController();
  private readonly cancelled: Promise<"cancelled">;
  private readonly view: SchedulingView;
  private cancelRequested = false;

  constructor(
    private readonly graph: DependencyGraph,
    private readonly strategy: ExecutionStrategy,
    private readonly runners: RunnerRegistry,
    private readonly config: Readonly<EngineConfig>,
    private readonly options: RunOptions,
  ) {
    this.runId = options.runId ?? randomUUID();
    this.states = new ActionStateMachine(graph.order);
    for (const id of graph.order) {
      this.reports.set(id, { id, kind: graph.get(id).kind, state: "PENDING" });
    }
    // every in-flight runner may listen on the run signal
    setMaxListeners(0, this.controller.signal);
    this.cancelled = new Promise((resolve) => {
      this.controller.signal.addEventListener("abort", () => resolve("cancelled"), { once: true });
    });
    this.view = { graph, stateOf: (id) => this.states.get(id) };
  }

  async execute(): Promise<RunResult> {
    const startedAt = Date.now();
    const external = this.options.signal;
    const onExternalAbort = (): void => this.requestCancel();
    external?.addEventListener("abort", onExternalAbort, { once: true });

    log.info(`Run ${this.runId} started`, { strategy: this.strategy.name, actions: this.graph.size });
    this.emit({
      type: "run:started",
      runId: this.runId,
      strategy: this.strategy.name,
      actionIds: [...this.graph.order],
      at: startedAt,
    });

    try {
      if (external?.aborted) this.requestCancel();
      await this.loop();
    } catch (err) {
      // stop whatever is still in flight before the error leaves the run
      if (!this.controller.signal.aborted) this.controller.abort();
      throw err;
    } finally {
      external?.removeEventListener("abort", onExternalAbort);
    }

    const result = this.finish(startedAt);
    log.info(`Run ${this.runId} finished: ${result.verdict}`, { durationMs: result.durationMs });
    this.emit({ type: "run:finished", runId: this.runId, result, at: result.finishedAt });
    return result;
  }

  private requestCancel(): void {
    if (this.cancelRequested) return;
    this.cancelRequested = true;
    log.info(`Run ${this.runId} cancellation requested`);
    this.controller.abort();
  }

  private async loop(): Promise<void> {
    while (!this.states.allTerminal()) {
      if (this.cancelRequested) {
        await this.drainAfterCancel();
        return;
      }
      this.advance();
      if (this.states.allTerminal() || this.cancelRequested) continue;
      if (this.inFlight.size === 0) {
        const stuck = this.graph.order.filter((id) => !isTerminal(this.states.get(id)));
        throw new InternalError(`Scheduling stalled with nothing running: ${stuck.join(", ")}`);
      }
      const next = await Promise.race([...this.inFlight.values(), this.cancelled]);
      if (next !== "cancelled") this.complete(next);
    }
  }

  /** Promote, plan, skip and dispatch until a pass changes nothing. */
  private advance(): void {
    let changed = true;
    while (changed && !this.cancelRequested) {
      changed = false;
      for (const id of this.graph.order) {
        if (this.states.get(id) !== "PENDING") continue;
        if (this.graph.dependencies(id).every((dep) => isTerminal(this.states.get(dep)))) {
          this.transition(id, "READY");
          changed = true;
        }
      }

      const ready = this.states.idsIn("READY");
      if (ready.length === 0) continue;
      const plan = this.strategy.plan(ready, this.view);
      this.checkPlan(plan, ready);

      for (const { id, reason } of plan.skip) {
        this.transition(id, "SKIPPED", reason);
        changed = true;
      }
      for (const id of plan.dispatch) {
        if (this.cancelRequested) break;
        this.dispatch(id);
        changed = true;
      }
    }
  }

  private checkPlan(plan: DispatchPlan, ready: readonly string[]): void {
    const seen = new Set<string>();
    for (const id of [...plan.dispatch, ...plan.skip.map((s) => s.id)]) {
      if (!ready.includes(id) || seen.has(id)) {
        throw new InternalError(`Strategy "${this.strategy.name}" returned an invalid decision for action "${id}"`);
      }
      seen.add(id);
    }
  }

  private dispatch(id: string): void {
    const descriptor = this.graph.get(id);
    const report = this.report(id);

    let params: ActionParams;
    try {
      params = renderParams(descriptor.params, this.ledger, {
        actionId: id,
        mode: this.config.rendering,
        scope: this.graph,
        context: this.options.context,
        env: this.options.env ?? process.env,
      });
    } catch (err) {
      if (!(err instanceof RenderError)) throw err;
      this.failBeforeStart(id, `Rendering failed: ${err.message}`);
      return;
    }
    report.params = params;

    let runner: ActionRunner;
    try {
      runner = this.runners.create(descriptor);
    } catch (err) {
      this.failBeforeStart(id, `Runner construction failed: ${errorMessage(err)}`);
      return;
    }

    this.transition(id, "RUNNING");
    report.startedAt = Date.now();
    log.debug(`Dispatching "${id}" to runner "${runner.kind}"`, { runId: this.runId });

    const ctx: RunnerContext = {
      actionId: id,
      descriptor,
      signal: this.controller.signal,
      emit: (message, stream = "stdout") =>
        this.emit({ type: "action:message", runId: this.runId, actionId: id, message, stream, at: Date.now() }),
    };
    const completion = invokeRunner(runner, params, ctx, { outcomeContract: this.config.outcomeContract }).then(
      (result): Completion => ({ id, result }),
    );
    this.inFlight.set(id, completion);
  }

  /** READY straight to FAILURE (or WARNING); counts as the action's failure for propagation. */
  private failBeforeStart(id: string, cause: string): void {
    log.warn(`Action "${id}" failed before start: ${cause}`);
    this.report(id).finishedAt = Date.now();
    const state = this.failureState(id);
    this.transition(id, state, cause);
    this.strategy.settled(id, state);
  }

  /** Low-severity actions fail with WARNING, which still blocks their lineage. */
  private failureState(id: string): "FAILURE" | "WARNING" {
    return this.graph.get(id).severity === "low" ? "WARNING" : "FAILURE";
  }

  private complete({ id, result }: Completion): void {
    this.inFlight.delete(id);
    // already finalized by the cancellation grace period
    if (this.states.get(id) !== "RUNNING") return;

    const report = this.report(id);
    report.finishedAt = Date.now();
    let state: TerminalState;
    switch (result.status) {
      case "success":
        for (const [key, value] of Object.entries(result.outcomes)) {
          this.ledger.put(id, key, value);
        }
        state = "SUCCESS";
        this.transition(id, state);
        break;
      case "failure":
        if (result.exitCode !== undefined) report.exitCode = result.exitCode;
        state = this.failureState(id);
        if (state === "WARNING") log.warn(`Action "${id}" finished with warning status: ${result.cause}`);
        this.transition(id, state, result.cause);
        break;
      case "cancelled":
        state = "CANCELLED";
        this.transition(id, state, result.cause ?? "cancelled");
        break;
    }
    this.strategy.settled(id, state);
  }

  private async drainAfterCancel(): Promise<void> {
    for (const id of this.graph.order) {
      const state = this.states.get(id);
      if (state === "PENDING" || state === "READY") {
        this.transition(id, "CANCELLED", "run cancelled before dispatch");
      }
    }

    const grace = deadline(this.config.cancelGraceMs);
    try {
      while (this.inFlight.size > 0) {
        const next = await Promise.race([...this.inFlight.values(), grace.expired]);
        if (next === "expired") break;
        this.complete(next);
      }
    } finally {
      grace.clear();
    }

    for (const id of [...this.inFlight.keys()]) {
      log.warn(`Action "${id}" did not stop within ${this.config.cancelGraceMs}ms of cancellation`);
      this.report(id).finishedAt = Date.now();
      this.transition(id, "CANCELLED", `did not stop within ${this.config.cancelGraceMs}ms`);
      this.strategy.settled(id, "CANCELLED");
    }
    this.inFlight.clear();
  }

  private transition(id: string, to: ActionState, cause?: string): void {
    const record = this.states.transition(id, to, cause);
    const report = this.report(id);
    report.state = to;
    if (cause !== undefined) report.cause = cause;
    this.emit({ type: "action:transition", runId: this.runId, actionId: id, ...record });
  }

  private report(id: string): ActionReport {
    const report = this.reports.get(id);
    if (!report) throw new InternalError(`No report for action "${id}"`);
    return report;
  }

  private emit(event: RunEvent): void {
    if (!this.options.onEvent) return;
    try {
      this.options.onEvent(event);
    } catch (err) {
      log.warn(`Run event listener threw on "${event.type}"`, { error: errorMessage(err) });
    }
  }

  /** WARNING does not fail the run; its skipped dependents do not either. */
  private verdict(): RunVerdict {
    if (this.cancelRequested) return "CANCELLED";
    for (const id of this.graph.order) {
      const state = this.states.get(id);
      if (state === "FAILURE" || state === "CANCELLED") return "FAILURE";
    }
    return "SUCCESS";
  }

  private finish(startedAt: number): RunResult {
    const finishedAt = Date.now();
    const outcomes = this.ledger.snapshot();
    for (const values of Object.values(outcomes)) Object.freeze(values);
    const actions = this.graph.order.map((id) => Object.freeze({ ...this.report(id) }));
    return Object.freeze({
      runId: this.runId,
      verdict: this.verdict(),
      strategy: this.strategy.name,
      actions: Object.freeze(actions),
      outcomes: Object.freeze(outcomes),
      startedAt,
      finishedAt,
      durationMs: finishedAt - startedAt,
    });
  }
}
