import { afterEach, beforeEach, describe, expect, it } from "vitest";
import type { RunResult } from "../../src/executor/types.js";
import { RunStore } from "../../src/persistence/store.js";

function runResult(runId: string, startedAt: number, verdict: RunResult["verdict"] = "SUCCESS"): RunResult {
  return {
    runId,
    verdict,
    strategy: "free",
    actions: [
      {
        id: "build",
        kind: "shell",
        state: "SUCCESS",
        startedAt,
        finishedAt: startedAt + 10,
        params: { command: "make" },
      },
      { id: "deploy", kind: "shell", state: "FAILURE", cause: "Exit code: 2", exitCode: 2 },
    ],
    outcomes: { build: { artifact: "/out/app.tar" } },
    startedAt,
    finishedAt: startedAt + 50,
    durationMs: 50,
  };
}

describe("RunStore", () => {
  let store: RunStore;

  beforeEach(() => {
    store = new RunStore(":memory:");
  });

  afterEach(() => {
    store.close();
  });

  it("records a run without parameters or outcomes", () => {
    store.insert(runResult("r1", 1000, "FAILURE"), "/work/taskweave.yml");
    expect(store.get("r1")).toEqual({
      runId: "r1",
      workflow: "/work/taskweave.yml",
      verdict: "FAILURE",
      strategy: "free",
      actions: [
        { id: "build", kind: "shell", state: "SUCCESS", startedAt: 1000, finishedAt: 1010 },
        { id: "deploy", kind: "shell", state: "FAILURE", cause: "Exit code: 2", exitCode: 2 },
      ],
      startedAt: 1000,
      finishedAt: 1050,
    });
  });

  it("omits the workflow when none was given", () => {
    store.insert(runResult("r1", 1000));
    expect(store.get("r1")?.workflow).toBeUndefined();
  });

  it("returns undefined for an unknown run", () => {
    expect(store.get("missing")).toBeUndefined();
  });

  it("lists the most recent runs first", () => {
    store.insert(runResult("old", 1000));
    store.insert(runResult("new", 3000));
    store.insert(runResult("mid", 2000));
    expect(store.list().map((r) => r.runId)).toEqual(["new", "mid", "old"]);
    expect(store.list(2).map((r) => r.runId)).toEqual(["new", "mid"]);
  });

  it("deletes runs started before a timestamp", () => {
    store.insert(runResult("old", 1000));
    store.insert(runResult("new", 3000));
    expect(store.deleteOlderThan(2000)).toBe(1);
    expect(store.list().map((r) => r.runId)).toEqual(["new"]);
  });
});
