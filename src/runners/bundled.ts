import type { RunnersConfig } from "../config.js";
import { DockerShellRunner } from "./docker-runner.js";
import { EchoRunner } from "./echo-runner.js";
import type { RunnerRegistry } from "./registry.js";
import { ShellRunner } from "./shell-runner.js";
import type { SpawnFn } from "./shell-runner.js";

export const BUNDLED_KINDS = ["echo", "shell", "docker-shell"] as const;

/** Register the runners shipped with taskweave. */
export function registerBundledRunners(
  registry: RunnerRegistry,
  config: Pick<RunnersConfig, "shellInjectYieldFunction" | "dockerBinary">,
  spawn?: SpawnFn,
): void {
  registry.add("echo", () => new EchoRunner());
  registry.add("shell", () => new ShellRunner({ injectYieldFunction: config.shellInjectYieldFunction, spawn }));
  registry.add(
    "docker-shell",
    () =>
      new DockerShellRunner({
        injectYieldFunction: config.shellInjectYieldFunction,
        dockerBinary: config.dockerBinary,
        spawn,
      }),
  );
}
