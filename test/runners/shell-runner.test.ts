import { EventEmitter } from "node:events";
import { PassThrough } from "node:stream";
import { describe, expect, it } from "vitest";
import { cancelled, fail } from "../../src/runners/contract.js";
import type { RunnerContext } from "../../src/runners/contract.js";
import { DockerShellRunner } from "../../src/runners/docker-runner.js";
import { EmissionScanner, SHELL_SERVICE_FUNCTIONS, formatYieldLine } from "../../src/runners/emission.js";
import { ShellRunner, shellQuote } from "../../src/runners/shell-runner.js";
import type { ChildHandle, SignalGroupFn, SpawnFn, SpawnOptions } from "../../src/runners/shell-runner.js";

/** In-process stand-in for a child process. */
class FakeChild extends EventEmitter implements ChildHandle {
  readonly stdout = new PassThrough();
  readonly stderr = new PassThrough();
  readonly kills: NodeJS.Signals[] = [];

  constructor(readonly pid?: number) {
    super();
  }

  kill(signal: NodeJS.Signals = "SIGTERM"): boolean {
    this.kills.push(signal);
    setImmediate(() => this.finish(null, signal));
    return true;
  }

  out(text: string): void {
    this.stdout.write(text);
  }

  err(text: string): void {
    this.stderr.write(text);
  }

  finish(code: number | null, signal: NodeJS.Signals | null = null): void {
    if (!this.stdout.destroyed) this.stdout.end();
    if (!this.stderr.destroyed) this.stderr.end();
    this.exit(code, signal);
  }

  /** The child itself ends while its pipes stay open, as when a grandchild still holds them. */
  exit(code: number | null, signal: NodeJS.Signals | null = null): void {
    setImmediate(() => this.emit("close", code, signal));
  }
}

type Call = { file: string; args: string[]; options: SpawnOptions; child: FakeChild };

/** A spawn function that records calls and drives every child with `script`. */
function fakeSpawn(
  script: (child: FakeChild, call: number) => void,
  pid?: number,
): { spawn: SpawnFn; calls: Call[] } {
  const calls: Call[] = [];
  const spawn: SpawnFn = (file, args, options) => {
    const child = new FakeChild(pid);
    const index = calls.length;
    calls.push({ file, args: [...args], options, child });
    setImmediate(() => script(child, index));
    return child;
  };
  return { spawn, calls };
}

function context(signal: AbortSignal = new AbortController().signal) {
  const stdout: string[] = [];
  const stderr: string[] = [];
  const ctx: RunnerContext = {
    actionId: "job",
    descriptor: { id: "job", kind: "shell", params: {}, dependsOn: [] },
    signal,
    emit: (message, stream = "stdout") => (stream === "stdout" ? stdout : stderr).push(message),
  };
  return { ctx, stdout, stderr };
}

describe("EmissionScanner", () => {
  function scan(lines: string[]) {
    const text: string[] = [];
    const scanner = new EmissionScanner((line) => text.push(line));
    for (const line of lines) scanner.push(line);
    scanner.flush();
    return { text, outcomes: scanner.outcomes };
  }

  it("passes ordinary lines through", () => {
    expect(scan(["hello", "world ]##"])).toEqual({ text: ["hello", "world ]##"], outcomes: {} });
  });

  it("captures yielded outcomes and hides the service line", () => {
    expect(scan(["before", formatYieldLine("path", "/tmp/out"), "after"])).toEqual({
      text: ["before", "after"],
      outcomes: { path: "/tmp/out" },
    });
  });

  it("decodes multi-line and non-ASCII values", () => {
    expect(scan([formatYieldLine("notes", "line one\nzweite Zeile: ü")]).outcomes).toEqual({
      notes: "line one\nzweite Zeile: ü",
    });
  });

  it("carries text printed before a service message over to the next line", () => {
    expect(scan([`progress: ${formatYieldLine("k", "v")}`, "done"]).text).toEqual(["progress: done"]);
  });

  it("flushes carried text at the end", () => {
    expect(scan([`tail${formatYieldLine("k", "v")}`]).text).toEqual(["tail"]);
  });

  it("accepts a key without a value", () => {
    // "aw==" is base64 for "k"
    expect(scan(["##taskweave[yield-outcome-b64 aw==]##"]).outcomes).toEqual({ k: "" });
  });

  it("keeps the latest value of a key yielded twice", () => {
    expect(scan([formatYieldLine("k", "1"), formatYieldLine("k", "2")]).outcomes).toEqual({ k: "2" });
  });

  it("drops unrecognized service messages", () => {
    expect(scan(["##taskweave[set-color red]##"])).toEqual({ text: [], outcomes: {} });
  });
});

describe("ShellRunner", () => {
  it("runs the command through sh with the yield function prepended", async () => {
    const { spawn, calls } = fakeSpawn((child) => child.finish(0));
    await new ShellRunner({ spawn }).run({ command: "echo hi" }, context().ctx);
    expect(calls[0].file).toBe("sh");
    expect(calls[0].args).toEqual(["-c", `${SHELL_SERVICE_FUNCTIONS}\necho hi`]);
  });

  it("omits the yield function when injection is off", async () => {
    const { spawn, calls } = fakeSpawn((child) => child.finish(0));
    await new ShellRunner({ spawn, injectYieldFunction: false }).run({ command: "echo hi" }, context().ctx);
    expect(calls[0].args).toEqual(["-c", "echo hi"]);
  });

  it("sources a script file", async () => {
    const { spawn, calls } = fakeSpawn((child) => child.finish(0));
    await new ShellRunner({ spawn, injectYieldFunction: false }).run({ file: "/scripts/it's.sh" }, context().ctx);
    expect(calls[0].args).toEqual(["-c", ". '/scripts/it'\\''s.sh'"]);
  });

  it("passes cwd and merges the environment over the current one", async () => {
    const { spawn, calls } = fakeSpawn((child) => child.finish(0));
    await new ShellRunner({ spawn }).run(
      { command: "env", cwd: "/work", environment: { RETRIES: 3, MODE: "fast" } },
      context().ctx,
    );
    expect(calls[0].options.cwd).toBe("/work");
    expect(calls[0].options.env?.RETRIES).toBe("3");
    expect(calls[0].options.env?.MODE).toBe("fast");
    expect(calls[0].options.env?.PATH).toBe(process.env.PATH);
  });

  it("forwards output and collects outcomes", async () => {
    const { spawn } = fakeSpawn((child) => {
      child.out(`building\n${formatYieldLine("artifact", "/out/app.tar")}\npartial `);
      child.out(`${formatYieldLine("version", "1.0.0")}\nfinished`);
      child.err("warning: cache miss\n");
      child.finish(0);
    });
    const { ctx, stdout, stderr } = context();
    const result = await new ShellRunner({ spawn }).run({ command: "make" }, ctx);
    expect(result).toEqual({ status: "success", outcomes: { artifact: "/out/app.tar", version: "1.0.0" } });
    expect(stdout).toEqual(["building", "partial finished"]);
    expect(stderr).toEqual(["warning: cache miss"]);
  });

  it("fails with the exit code of the process", async () => {
    const { spawn } = fakeSpawn((child) => child.finish(3));
    expect(await new ShellRunner({ spawn }).run({ command: "false" }, context().ctx)).toEqual(fail("Exit code: 3", 3));
  });

  it("fails when the process is killed from outside", async () => {
    const { spawn } = fakeSpawn((child) => child.finish(null, "SIGKILL"));
    expect(await new ShellRunner({ spawn }).run({ command: "sleep 9" }, context().ctx)).toEqual(
      fail("Killed by signal SIGKILL"),
    );
  });

  it("fails when the process cannot be started", async () => {
    const { spawn } = fakeSpawn((child) => child.emit("error", new Error("spawn sh ENOENT")));
    expect(await new ShellRunner({ spawn }).run({ command: "true" }, context().ctx)).toEqual(
      fail('Failed to run "sh": spawn sh ENOENT'),
    );
  });

  it("terminates the process on cancellation", async () => {
    const controller = new AbortController();
    const { spawn, calls } = fakeSpawn(() => controller.abort());
    const result = await new ShellRunner({ spawn }).run({ command: "sleep 60" }, context(controller.signal).ctx);
    expect(result).toEqual(cancelled("terminated by SIGTERM"));
    expect(calls[0].child.kills).toEqual(["SIGTERM"]);
  });

  it("signals the whole process group and stops reading pipes a grandchild keeps open", async () => {
    const controller = new AbortController();
    const signals: [number, NodeJS.Signals][] = [];
    const { spawn, calls } = fakeSpawn((child) => {
      child.out("started\n");
      setTimeout(() => controller.abort(), 10);
    }, 4242);
    const signalGroup: SignalGroupFn = (pid, signal) => {
      signals.push([pid, signal]);
      calls[0].child.exit(null, signal);
    };
    const { ctx, stdout } = context(controller.signal);

    const startedAt = Date.now();
    const result = await new ShellRunner({ spawn, signalGroup }).run({ command: "sleep 60 & wait" }, ctx);

    expect(result).toEqual(cancelled("terminated by SIGTERM"));
    expect(Date.now() - startedAt).toBeLessThan(1000);
    expect(signals).toEqual([[4242, "SIGTERM"]]);
    expect(calls[0].child.kills).toEqual([]);
    expect(calls[0].child.stdout.destroyed).toBe(true);
    expect(stdout).toEqual(["started"]);
  });

  it("sends SIGKILL to a group that ignores SIGTERM", async () => {
    const controller = new AbortController();
    const signals: NodeJS.Signals[] = [];
    const { spawn, calls } = fakeSpawn(() => controller.abort(), 4242);
    const signalGroup: SignalGroupFn = (_pid, signal) => {
      signals.push(signal);
      if (signal === "SIGKILL") calls[0].child.exit(null, signal);
    };
    const runner = new ShellRunner({ spawn, signalGroup, killAfterMs: 20 });
    const result = await runner.run({ command: "trap '' TERM; sleep 60" }, context(controller.signal).ctx);
    expect(result).toEqual(cancelled("terminated by SIGKILL"));
    expect(signals).toEqual(["SIGTERM", "SIGKILL"]);
  });

  it("kills the child alone when its group cannot be signalled", async () => {
    const controller = new AbortController();
    const { spawn, calls } = fakeSpawn(() => controller.abort(), 4242);
    const signalGroup: SignalGroupFn = () => {
      throw new Error("kill ESRCH");
    };
    const result = await new ShellRunner({ spawn, signalGroup }).run(
      { command: "sleep 60" },
      context(controller.signal).ctx,
    );
    expect(result).toEqual(cancelled("terminated by SIGTERM"));
    expect(calls[0].child.kills).toEqual(["SIGTERM"]);
  });

  it("does not start when already cancelled", async () => {
    const controller = new AbortController();
    controller.abort();
    const { spawn, calls } = fakeSpawn((child) => child.finish(0));
    const result = await new ShellRunner({ spawn }).run({ command: "true" }, context(controller.signal).ctx);
    expect(result).toEqual(cancelled("cancelled before start"));
    expect(calls).toHaveLength(0);
  });

  it("rejects parameters with both command and file", async () => {
    const { spawn, calls } = fakeSpawn((child) => child.finish(0));
    const result = await new ShellRunner({ spawn }).run({ command: "true", file: "x.sh" }, context().ctx);
    expect(result).toEqual(fail('Invalid parameters: Exactly one of "command" or "file" must be set'));
    expect(calls).toHaveLength(0);
  });

  it("quotes strings for the shell", () => {
    expect(shellQuote("plain")).toBe("'plain'");
    expect(shellQuote("it's")).toBe("'it'\\''s'");
  });
});

describe("DockerShellRunner", () => {
  it("runs the script in a throwaway container", async () => {
    const { spawn, calls } = fakeSpawn((child) => child.finish(0));
    const runner = new DockerShellRunner({ spawn, dockerBinary: "podman", injectYieldFunction: false });
    const result = await runner.run(
      { image: "alpine:3", command: "echo hi", environment: { STAGE: "test" }, cwd: "/src" },
      context().ctx,
    );
    expect(result.status).toBe("success");
    expect(runner.kind).toBe("docker-shell");
    expect(calls).toHaveLength(1);
    expect(calls[0].file).toBe("podman");
    expect(calls[0].args).toEqual([
      "run",
      "--rm",
      "--init",
      "-e",
      "STAGE=test",
      "-w",
      "/src",
      "alpine:3",
      "sh",
      "-c",
      "echo hi",
    ]);
  });

  it("pulls the image first when asked", async () => {
    const { spawn, calls } = fakeSpawn((child) => child.finish(0));
    const runner = new DockerShellRunner({ spawn, injectYieldFunction: false });
    await runner.run({ image: "alpine:3", command: "true", pull: true }, context().ctx);
    expect(calls.map((c) => c.args.slice(0, 2))).toEqual([
      ["pull", "alpine:3"],
      ["run", "--rm"],
    ]);
    expect(calls[0].file).toBe("docker");
  });

  it("stops when the pull fails", async () => {
    const { spawn, calls } = fakeSpawn((child) => child.finish(1));
    const runner = new DockerShellRunner({ spawn });
    const result = await runner.run({ image: "missing:latest", command: "true", pull: true }, context().ctx);
    expect(result).toEqual(fail("Exit code: 1", 1));
    expect(calls).toHaveLength(1);
  });

  it("requires an image", async () => {
    const { spawn } = fakeSpawn((child) => child.finish(0));
    const result = await new DockerShellRunner({ spawn }).run({ command: "true" }, context().ctx);
    expect(result.status).toBe("failure");
  });
});
