import { errorMessage } from "../errors.js";
import type { ActionParams } from "../graph/types.js";
import { log } from "../utils/logger.js";
import { cancelled, fail, succeed } from "./contract.js";
import type { ActionRunner, RunnerContext, RunnerResult } from "./contract.js";

export type RunnerFunction = (
  params: ActionParams,
  ctx: RunnerContext,
) => Promise<Record<string, string> | void> | Record<string, string> | void;

export type FunctionRunnerOptions = {
  kind: string;
  fn: RunnerFunction;
  /** Timeout in ms. No timeout when omitted. */
  timeout?: number;
};

function isOutcomeRecord(value: unknown): value is Record<string, string> {
  return typeof value === "object" && value !== null;
}

const ABORTED = Symbol("aborted");
const TIMED_OUT = Symbol("timed-out");

/**
 * Runs an in-process function as an action. The function may observe
 * `ctx.signal` itself; either way the runner settles as soon as the run is
 * cancelled.
 */
export class FunctionRunner implements ActionRunner {
  readonly kind: string;
  private fn: RunnerFunction;
  private timeout?: number;

  constructor(opts: FunctionRunnerOptions) {
    this.kind = opts.kind;
    this.fn = opts.fn;
    this.timeout = opts.timeout;
  }

  async run(params: ActionParams, ctx: RunnerContext): Promise<RunnerResult> {
    if (ctx.signal.aborted) return cancelled("cancelled before start");

    let resolveAbort: (value: typeof ABORTED) => void = () => undefined;
    let resolveTimeout: (value: typeof TIMED_OUT) => void = () => undefined;
    const onAbort = (): void => resolveAbort(ABORTED);
    const guards: Promise<typeof ABORTED | typeof TIMED_OUT>[] = [
      new Promise<typeof ABORTED>((resolve) => {
        resolveAbort = resolve;
      }),
    ];
    ctx.signal.addEventListener("abort", onAbort, { once: true });

    let timer: NodeJS.Timeout | undefined;
    if (this.timeout !== undefined) {
      guards.push(
        new Promise<typeof TIMED_OUT>((resolve) => {
          resolveTimeout = resolve;
        }),
      );
      timer = setTimeout(() => resolveTimeout(TIMED_OUT), this.timeout);
    }

    try {
      const outcome = await Promise.race([Promise.resolve(this.fn(params, ctx)), ...guards]);
      if (outcome === ABORTED) return cancelled();
      if (outcome === TIMED_OUT) {
        log.warn(`[${this.kind}] Action "${ctx.actionId}" timed out`, { timeoutMs: this.timeout });
        return fail(`timed out after ${this.timeout}ms`);
      }
      if (ctx.signal.aborted) return cancelled();
      return succeed(isOutcomeRecord(outcome) ? outcome : {});
    } catch (err) {
      if (ctx.signal.aborted) return cancelled(errorMessage(err));
      return fail(errorMessage(err));
    } finally {
      ctx.signal.removeEventListener("abort", onAbort);
      if (timer) clearTimeout(timer);
    }
  }
}
