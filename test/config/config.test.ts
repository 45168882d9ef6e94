import { describe, expect, it } from "vitest";
import { ENV_VARS, configFromEnv, defaults, resolveConfig } from "../../src/config.js";
import { ConfigError } from "../../src/errors.js";
import { EnvSchema } from "../../src/schemas.js";

describe("resolveConfig", () => {
  it("returns the defaults when given no layers", () => {
    const config = resolveConfig();
    expect(config).toEqual(defaults);
    expect(config.engine).toEqual({ strategy: "free", rendering: "lenient", outcomeContract: "open", cancelGraceMs: 5000 });
    expect(config.runners).toEqual({ actionsDirectories: [], shellInjectYieldFunction: true, dockerBinary: "docker" });
    expect(config.logging.level).toBe("warn");
    expect(config.engine.concurrency).toBeUndefined();
  });

  it("lets later layers win key by key", () => {
    const config = resolveConfig(
      { engine: { strategy: "strict", concurrency: 2 } },
      { engine: { concurrency: 4 }, runners: { dockerBinary: "podman" } },
    );
    expect(config.engine.strategy).toBe("strict");
    expect(config.engine.concurrency).toBe(4);
    expect(config.engine.rendering).toBe("lenient");
    expect(config.runners.dockerBinary).toBe("podman");
  });

  it("ignores undefined values in a layer", () => {
    const config = resolveConfig({ engine: { strategy: "strict" } }, { engine: { strategy: undefined } });
    expect(config.engine.strategy).toBe("strict");
  });

  it("returns frozen objects and leaves the defaults untouched", () => {
    const config = resolveConfig({ runners: { actionsDirectories: ["plugins"] } });
    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.engine)).toBe(true);
    expect(Object.isFrozen(config.runners.actionsDirectories)).toBe(true);
    expect(defaults.runners.actionsDirectories).toEqual([]);
  });

  it("rejects invalid values", () => {
    expect(() => resolveConfig({ engine: { concurrency: 0 } })).toThrow(ConfigError);
    expect(() => resolveConfig({ engine: { cancelGraceMs: -1 } })).toThrow(
      "engine.cancelGraceMs: Number must be greater than or equal to 0",
    );
  });
});

describe("configFromEnv", () => {
  it("reads TASKWEAVE_* variables", () => {
    const config = resolveConfig(
      configFromEnv({
        TASKWEAVE_STRATEGY: "sequential",
        TASKWEAVE_CONCURRENCY: "4",
        TASKWEAVE_STRICT_OUTCOMES: "yes",
        TASKWEAVE_OUTCOME_CONTRACT: "closed",
        TASKWEAVE_ACTIONS_DIRS: "plugins, more,,extra ",
        TASKWEAVE_SHELL_INJECT_YIELD: "off",
        TASKWEAVE_LOG_LEVEL: "debug",
        TASKWEAVE_HISTORY_DB: "/tmp/runs.db",
        UNRELATED: "ignored",
      }),
    );
    expect(config.engine).toEqual({
      strategy: "sequential",
      concurrency: 4,
      rendering: "strict",
      outcomeContract: "closed",
      cancelGraceMs: 5000,
    });
    expect(config.runners.actionsDirectories).toEqual(["plugins", "more", "extra"]);
    expect(config.runners.shellInjectYieldFunction).toBe(false);
    expect(config.logging.level).toBe("debug");
    expect(config.history.dbPath).toBe("/tmp/runs.db");
  });

  it("maps a false TASKWEAVE_STRICT_OUTCOMES to lenient rendering", () => {
    expect(resolveConfig({ engine: { rendering: "strict" } }, configFromEnv({ TASKWEAVE_STRICT_OUTCOMES: "0" })).engine.rendering).toBe(
      "lenient",
    );
  });

  it("leaves everything at the defaults for an empty environment", () => {
    expect(resolveConfig(configFromEnv({}))).toEqual(defaults);
  });

  it("rejects malformed values", () => {
    expect(() => configFromEnv({ TASKWEAVE_STRICT_OUTCOMES: "maybe" })).toThrow(
      'Invalid environment: TASKWEAVE_STRICT_OUTCOMES: Expected a boolean, got "maybe"',
    );
    expect(() => configFromEnv({ TASKWEAVE_LOG_LEVEL: "loud" })).toThrow(ConfigError);
  });

  it("documents every variable it reads", () => {
    expect(ENV_VARS.map((v) => v.name).sort()).toEqual(Object.keys(EnvSchema.shape).sort());
  });
});
