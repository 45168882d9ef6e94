import { describe, expect, it } from "vitest";
import { ValidationError } from "../../src/errors.js";
import { DependencyGraph } from "../../src/graph/dependency-graph.js";
import type { ActionDescriptor } from "../../src/graph/types.js";

function action(id: string, dependsOn: string[] = [], params: ActionDescriptor["params"] = {}): ActionDescriptor {
  return { id, kind: "echo", params, dependsOn };
}

function buildError(descriptors: ActionDescriptor[]): ValidationError {
  try {
    DependencyGraph.build(descriptors);
  } catch (err) {
    if (err instanceof ValidationError) return err;
    throw err;
  }
  throw new Error("expected DependencyGraph.build to throw");
}

describe("DependencyGraph", () => {
  it("orders dependencies first, roots in declaration order", () => {
    const graph = DependencyGraph.build([action("a"), action("b", ["a"]), action("c")]);
    expect(graph.order).toEqual(["a", "c", "b"]);
    expect(graph.roots()).toEqual(["a", "c"]);
    expect(graph.size).toBe(3);
  });

  it("answers dependency and lineage queries", () => {
    const graph = DependencyGraph.build([
      action("fetch"),
      action("build", ["fetch"]),
      action("test", ["build"]),
      action("lint", ["fetch"]),
    ]);
    expect(graph.dependencies("test")).toEqual(["build"]);
    expect(graph.dependents("fetch")).toEqual(["build", "lint"]);
    expect([...graph.ancestors("test")].sort()).toEqual(["build", "fetch"]);
    expect([...graph.descendants("fetch")].sort()).toEqual(["build", "lint", "test"]);
    expect(graph.ancestors("fetch").size).toBe(0);
    expect(graph.order.indexOf("fetch")).toBe(0);
  });

  it("deduplicates repeated dependencies", () => {
    const graph = DependencyGraph.build([action("a"), action("b", ["a", "a"])]);
    expect(graph.dependencies("b")).toEqual(["a"]);
  });

  it("accepts an empty graph", () => {
    const graph = DependencyGraph.build([]);
    expect(graph.order).toEqual([]);
    expect(graph.size).toBe(0);
  });

  it("rejects duplicate ids", () => {
    const err = buildError([action("a"), action("a")]);
    expect(err.kind).toBe("DuplicateId");
    expect(err.message).toBe('Action "a" is declared more than once');
  });

  it("rejects the reference namespaces as action ids", () => {
    const err = buildError([action("env")]);
    expect(err.kind).toBe("ReservedId");
    expect(err.details).toEqual({ actionId: "env" });
    expect(err.message).toBe('Action id "env" is reserved (context, env are reference namespaces)');
  });

  it("rejects unknown dependencies", () => {
    const err = buildError([action("a", ["missing"])]);
    expect(err.kind).toBe("UnknownDependency");
    expect(err.details).toEqual({ actionId: "a", dependency: "missing" });
    expect(err.message).toBe('Action "a" depends on unknown action "missing"');
  });

  it("reports a cycle as a closed path", () => {
    const err = buildError([action("a", ["b"]), action("b", ["a"])]);
    expect(err.kind).toBe("CycleDetected");
    expect(err.details.cycle).toEqual(["a", "b", "a"]);
    expect(err.message).toBe("Dependency cycle detected: a -> b -> a");
  });

  it("reports a self-dependency as a cycle", () => {
    const err = buildError([action("a", ["a"])]);
    expect(err.details.cycle).toEqual(["a", "a"]);
  });

  it.each(["", "has space", "dotted.id", "at@sign", "brace{"])("rejects the invalid id %j", (id) => {
    expect(buildError([action(id)]).kind).toBe("InvalidId");
  });

  it("throws UnknownAction for queries about ids it does not hold", () => {
    const graph = DependencyGraph.build([action("a")]);
    expect(() => graph.get("nope")).toThrow('Unknown action "nope"');
    expect(() => graph.dependencies("nope")).toThrow(ValidationError);
    expect(graph.has("nope")).toBe(false);
  });

  it("freezes descriptors so the caller's copy cannot change the graph", () => {
    const params = { message: "hello", nested: { list: ["x"] } };
    const original = action("a", [], params);
    const graph = DependencyGraph.build([original]);
    params.message = "changed";
    expect(graph.get("a").params.message).toBe("hello");
    expect(Object.isFrozen(graph.get("a"))).toBe(true);
    expect(Object.isFrozen(graph.get("a").params.nested)).toBe(true);
  });
});
