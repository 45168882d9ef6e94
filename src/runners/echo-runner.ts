import type { ActionParams } from "../graph/types.js";
import { EchoParamsSchema, formatIssues } from "../schemas.js";
import { fail, succeed } from "./contract.js";
import type { ActionRunner, RunnerContext, RunnerResult } from "./contract.js";

/** Prints `message`, one event per line. Produces no outcomes. */
export class EchoRunner implements ActionRunner {
  readonly kind = "echo";

  run(params: ActionParams, ctx: RunnerContext): RunnerResult {
    const parsed = EchoParamsSchema.safeParse(params);
    if (!parsed.success) return fail(`Invalid parameters: ${formatIssues(parsed.error)}`);
    for (const line of parsed.data.message.split("\n")) ctx.emit(line);
    return succeed();
  }
}
