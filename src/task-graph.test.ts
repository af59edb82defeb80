import test from "node:test";
import assert from "node:assert/strict";
import { DecisionError, DependencyCycleError, AmbiguousDependencyError } from "./errors.js";
import { TaskGraph } from "./graph/task-graph.js";
import { makeRecord } from "./test-fixtures.js";

function diamond(): TaskGraph {
  return TaskGraph.fromTasks([
    makeRecord("d", { dependencies: ["b", "c"] }),
    makeRecord("b", { dependencies: ["a"] }),
    makeRecord("c", { dependencies: ["a"] }),
    makeRecord("a"),
    makeRecord("unrelated"),
  ]);
}

test("graph keeps insertion order and rejects duplicate labels", () => {
  const graph = diamond();
  assert.deepEqual(graph.labels(), ["d", "b", "c", "a", "unrelated"]);
  assert.equal(graph.size, 5);

  assert.throws(
    () => graph.add(makeRecord("a")),
    (err: unknown) => err instanceof DecisionError && err.code === "duplicate_label" && err.label === "a"
  );
});

test("topological order puts dependencies first and breaks ties by label", () => {
  assert.deepEqual(diamond().topologicalOrder(), ["a", "b", "c", "d", "unrelated"]);
});

test("validate reports a dangling dependency with the task and the missing label", () => {
  const graph = TaskGraph.fromTasks([makeRecord("x", { dependencies: ["ghost"] })]);
  assert.throws(
    () => graph.validate(),
    (err: unknown) =>
      err instanceof AmbiguousDependencyError && err.label === "x" && err.dependency === "ghost"
  );
  graph.validate(new Set(["ghost"]));
});

test("validate reports every task stuck in a cycle", () => {
  const graph = TaskGraph.fromTasks([
    makeRecord("p", { dependencies: ["q"] }),
    makeRecord("q", { dependencies: ["r"] }),
    makeRecord("r", { dependencies: ["p"] }),
    makeRecord("s"),
  ]);
  assert.throws(
    () => graph.validate(),
    (err: unknown) => err instanceof DependencyCycleError && err.labels.join(",") === "p,q,r"
  );
});

test("transitive closure and subgraph follow dependency edges only", () => {
  const graph = diamond();
  assert.deepEqual([...graph.transitiveClosure(["b"])].sort(), ["a", "b"]);
  assert.deepEqual([...graph.transitiveClosure(["d"])].sort(), ["a", "b", "c", "d"]);

  const sub = graph.subgraph(graph.transitiveClosure(["c"]));
  assert.deepEqual(sub.labels(), ["c", "a"]);
  assert.throws(() => graph.transitiveClosure(["nope"]), /unknown task label nope/);
});

test("edges list dependent then dependency", () => {
  assert.deepEqual(diamond().edges(), [
    ["d", "b"],
    ["d", "c"],
    ["b", "a"],
    ["c", "a"],
  ]);
});
