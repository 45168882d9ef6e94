import type { ActionParams } from "../graph/types.js";
import { DockerShellParamsSchema, formatIssues } from "../schemas.js";
import { log } from "../utils/logger.js";
import { fail } from "./contract.js";
import type { RunnerContext, RunnerFailure, RunnerResult } from "./contract.js";
import { ShellRunner } from "./shell-runner.js";
import type { Invocation, ShellRunnerOptions } from "./shell-runner.js";

export type DockerShellRunnerOptions = ShellRunnerOptions & {
  /** Docker CLI executable (default: "docker"). */
  dockerBinary?: string;
};

/**
 * Shell runner that executes the script inside a throwaway container via
 * the docker CLI: `docker run --rm [-e K=V]... [-w cwd] <image> sh -c <script>`.
 */
export class DockerShellRunner extends ShellRunner {
  private readonly dockerBinary: string;

  constructor(opts: DockerShellRunnerOptions = {}) {
    super({ ...opts, kind: opts.kind ?? "docker-shell" });
    this.dockerBinary = opts.dockerBinary ?? "docker";
  }

  async run(params: ActionParams, ctx: RunnerContext): Promise<RunnerResult> {
    const parsed = DockerShellParamsSchema.safeParse(params);
    if (parsed.success && parsed.data.pull && !ctx.signal.aborted) {
      log.info(`[${this.kind}] Pulling image "${parsed.data.image}"`);
      const pulled = await this.execute(
        { file: this.dockerBinary, args: ["pull", parsed.data.image], options: {} },
        ctx,
      );
      if (pulled.status !== "success") return pulled;
    }
    return super.run(params, ctx);
  }

  protected prepare(params: ActionParams): Invocation | RunnerFailure {
    const parsed = DockerShellParamsSchema.safeParse(params);
    if (!parsed.success) return fail(`Invalid parameters: ${formatIssues(parsed.error)}`);
    const p = parsed.data;

    const args = ["run", "--rm", "--init"];
    for (const [key, value] of Object.entries(p.environment ?? {})) {
      args.push("-e", `${key}=${value}`);
    }
    if (p.cwd) args.push("-w", p.cwd);
    args.push(p.image, "sh", "-c", this.script(p));

    return { file: this.dockerBinary, args, options: {} };
  }
}
