import { errorMessage } from "../errors.js";
import type { ActionDescriptor, ActionParams } from "../graph/types.js";
import { RunnerResultSchema, formatIssues } from "../schemas.js";
import { log } from "../utils/logger.js";

export type OutputStream = "stdout" | "stderr";

export type RunnerContext = {
  actionId: string;
  descriptor: Readonly<ActionDescriptor>;
  /** Run-scoped cancel signal. Once aborted it stays aborted. */
  signal: AbortSignal;
  /** Forward one line of output to the lifecycle event stream. */
  emit(message: string, stream?: OutputStream): void;
};

export type RunnerSuccess = { status: "success"; outcomes: Record<string, string> };
export type RunnerFailure = { status: "failure"; cause: string; exitCode?: number };
export type RunnerCancelled = { status: "cancelled"; cause?: string };
export type RunnerResult = RunnerSuccess | RunnerFailure | RunnerCancelled;

export interface ActionRunner {
  readonly kind: string;
  run(params: ActionParams, ctx: RunnerContext): RunnerResult | Promise<RunnerResult>;
}

/** `open` accepts any returned keys; `closed` requires exactly the declared ones. */
export type OutcomeContract = "open" | "closed";

export function succeed(outcomes: Record<string, string> = {}): RunnerSuccess {
  return { status: "success", outcomes };
}

export function fail(cause: string, exitCode?: number): RunnerFailure {
  return exitCode === undefined ? { status: "failure", cause } : { status: "failure", cause, exitCode };
}

export function cancelled(cause?: string): RunnerCancelled {
  return cause === undefined ? { status: "cancelled" } : { status: "cancelled", cause };
}

/**
 * Adapter boundary between the engine and a runner. Never throws: every
 * error, malformed result or contract breach becomes a RunnerResult.
 */
export async function invokeRunner(
  runner: ActionRunner,
  params: ActionParams,
  ctx: RunnerContext,
  opts: { outcomeContract?: OutcomeContract } = {},
): Promise<RunnerResult> {
  let raw: unknown;
  try {
    raw = await runner.run(params, ctx);
  } catch (err) {
    if (ctx.signal.aborted) {
      return cancelled(errorMessage(err));
    }
    log.debug(`Runner "${runner.kind}" threw for action "${ctx.actionId}"`, { error: errorMessage(err) });
    return fail(errorMessage(err));
  }

  const parsed = RunnerResultSchema.safeParse(raw);
  if (!parsed.success) {
    return fail(`Runner "${runner.kind}" returned a malformed result: ${formatIssues(parsed.error)}`);
  }
  const result: RunnerResult = parsed.data;

  if (result.status === "failure" && ctx.signal.aborted) {
    return cancelled(result.cause);
  }
  if (result.status === "success" && opts.outcomeContract === "closed") {
    const breach = checkClosedContract(ctx.descriptor.outcomes ?? [], result.outcomes);
    if (breach) return fail(breach);
  }
  return result;
}

function checkClosedContract(declared: readonly string[], outcomes: Record<string, string>): string | null {
  const returned = Object.keys(outcomes);
  const missing = declared.filter((k) => !(k in outcomes));
  const extra = returned.filter((k) => !declared.includes(k));
  const problems: string[] = [];
  if (missing.length > 0) problems.push(`missing declared outcomes: ${missing.join(", ")}`);
  if (extra.length > 0) problems.push(`undeclared outcomes: ${extra.join(", ")}`);
  return problems.length > 0 ? `Outcome contract violated (${problems.join("; ")})` : null;
}
