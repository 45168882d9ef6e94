import { spawn } from "node:child_process";
import type { Readable } from "node:stream";
import { errorMessage } from "../errors.js";
import type { ActionParams } from "../graph/types.js";
import { ShellParamsSchema, formatIssues } from "../schemas.js";
import type { ShellParams } from "../schemas.js";
import { log } from "../utils/logger.js";
import { cancelled, fail, succeed } from "./contract.js";
import type { ActionRunner, RunnerContext, RunnerFailure, RunnerResult } from "./contract.js";
import { EmissionScanner, SHELL_SERVICE_FUNCTIONS } from "./emission.js";

/** The part of a child process the shell runners use. */
export interface ChildHandle {
  /** Also the id of the process group the child leads. */
  readonly pid?: number;
  readonly stdout: Readable | null;
  readonly stderr: Readable | null;
  kill(signal?: NodeJS.Signals): boolean;
  on(event: "close", listener: (code: number | null, signal: NodeJS.Signals | null) => void): this;
  on(event: "error", listener: (err: Error) => void): this;
}

export type SpawnOptions = { cwd?: string; env?: NodeJS.ProcessEnv };

export type SpawnFn = (file: string, args: readonly string[], options: SpawnOptions) => ChildHandle;

// Each child leads its own process group so cancellation reaches everything the script started.
export const defaultSpawn: SpawnFn = (file, args, options) =>
  spawn(file, [...args], { ...options, detached: true, stdio: ["ignore", "pipe", "pipe"] });

export type SignalGroupFn = (pid: number, signal: NodeJS.Signals) => void;

export const signalProcessGroup: SignalGroupFn = (pid, signal) => {
  process.kill(-pid, signal);
};

export type Invocation = { file: string; args: string[]; options: SpawnOptions };

export type ShellRunnerOptions = {
  kind?: string;
  /** Prepend the `yield_outcome` shell function (default: true). */
  injectYieldFunction?: boolean;
  spawn?: SpawnFn;
  signalGroup?: SignalGroupFn;
  /** Delay between SIGTERM and SIGKILL on cancellation (default: 3000). */
  killAfterMs?: number;
};

/** Quote a string for a POSIX shell. */
export function shellQuote(value: string): string {
  return `'${value.replace(/'/g, `'\\''`)}'`;
}

/** Settles when the stream closes, including when it is destroyed. */
function readLines(stream: Readable, onLine: (line: string) => void): Promise<void> {
  return new Promise((resolve, reject) => {
    let pending = "";
    stream.setEncoding("utf8");
    stream.on("data", (chunk: string) => {
      pending += chunk;
      let newline = pending.indexOf("\n");
      while (newline !== -1) {
        onLine(pending.slice(0, newline).replace(/\r$/, ""));
        pending = pending.slice(newline + 1);
        newline = pending.indexOf("\n");
      }
    });
    stream.on("error", reject);
    stream.on("close", () => {
      if (pending) onLine(pending);
      pending = "";
      resolve();
    });
  });
}

/**
 * Runs `command` (or sources `file`) with `sh -c`. Stdout lines are scanned
 * for yielded outcomes; stderr lines are forwarded as they are.
 */
export class ShellRunner implements ActionRunner {
  readonly kind: string;
  protected readonly injectYieldFunction: boolean;
  protected readonly spawn: SpawnFn;
  private readonly signalGroup: SignalGroupFn;
  private readonly killAfterMs: number;

  constructor(opts: ShellRunnerOptions = {}) {
    this.kind = opts.kind ?? "shell";
    this.injectYieldFunction = opts.injectYieldFunction ?? true;
    this.spawn = opts.spawn ?? defaultSpawn;
    this.signalGroup = opts.signalGroup ?? signalProcessGroup;
    this.killAfterMs = opts.killAfterMs ?? 3000;
  }

  async run(params: ActionParams, ctx: RunnerContext): Promise<RunnerResult> {
    if (ctx.signal.aborted) return cancelled("cancelled before start");
    const invocation = this.prepare(params);
    if ("status" in invocation) return invocation;
    return this.execute(invocation, ctx);
  }

  protected prepare(params: ActionParams): Invocation | RunnerFailure {
    const parsed = ShellParamsSchema.safeParse(params);
    if (!parsed.success) return fail(`Invalid parameters: ${formatIssues(parsed.error)}`);
    const p = parsed.data;
    return {
      file: "sh",
      args: ["-c", this.script(p)],
      options: {
        cwd: p.cwd,
        env: p.environment ? { ...process.env, ...p.environment } : undefined,
      },
    };
  }

  protected script(p: Pick<ShellParams, "command" | "file">): string {
    const body = p.command ?? `. ${shellQuote(p.file ?? "")}`;
    return this.injectYieldFunction ? `${SHELL_SERVICE_FUNCTIONS}\n${body}` : body;
  }

  protected async execute(invocation: Invocation, ctx: RunnerContext): Promise<RunnerResult> {
    log.debug(`[${this.kind}] Spawning "${invocation.file}" for action "${ctx.actionId}"`, {
      cwd: invocation.options.cwd,
    });
    const child = this.spawn(invocation.file, invocation.args, invocation.options);
    const scanner = new EmissionScanner((line) => ctx.emit(line, "stdout"));
    let forceKill: NodeJS.Timeout | undefined;
    const onAbort = (): void => {
      this.terminate(child, "SIGTERM");
      forceKill = setTimeout(() => this.terminate(child, "SIGKILL"), this.killAfterMs);
      // grandchildren may hold the pipes open long after the group is signalled
      child.stdout?.destroy();
      child.stderr?.destroy();
    };
    ctx.signal.addEventListener("abort", onAbort, { once: true });

    const exited = new Promise<{ code: number | null; signal: NodeJS.Signals | null }>((resolve, reject) => {
      child.on("error", reject);
      child.on("close", (code, signal) => {
        clearTimeout(forceKill);
        resolve({ code, signal });
      });
    });
    const readers: Promise<void>[] = [];
    if (child.stdout) readers.push(readLines(child.stdout, (line) => scanner.push(line)));
    if (child.stderr) readers.push(readLines(child.stderr, (line) => ctx.emit(line, "stderr")));

    let exit: { code: number | null; signal: NodeJS.Signals | null };
    try {
      [exit] = await Promise.all([exited, ...readers]);
    } catch (err) {
      if (ctx.signal.aborted) return cancelled(errorMessage(err));
      return fail(`Failed to run "${invocation.file}": ${errorMessage(err)}`);
    } finally {
      ctx.signal.removeEventListener("abort", onAbort);
      clearTimeout(forceKill);
    }
    scanner.flush();

    if (ctx.signal.aborted) {
      return cancelled(exit.signal ? `terminated by ${exit.signal}` : undefined);
    }
    if (exit.code === null) {
      return fail(`Killed by signal ${exit.signal ?? "unknown"}`);
    }
    if (exit.code !== 0) {
      return fail(`Exit code: ${exit.code}`, exit.code);
    }
    return succeed(scanner.outcomes);
  }

  /** Signal the child's whole process group, or the child alone when it has no pid. */
  private terminate(child: ChildHandle, signal: NodeJS.Signals): void {
    if (child.pid === undefined) {
      child.kill(signal);
      return;
    }
    log.debug(`[${this.kind}] Sending ${signal} to process group ${child.pid}`);
    try {
      this.signalGroup(child.pid, signal);
    } catch (err) {
      // ESRCH: the group is already gone
      log.debug(`[${this.kind}] Could not signal process group ${child.pid}: ${errorMessage(err)}`);
      child.kill(signal);
    }
  }
}
