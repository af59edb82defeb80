import test from "node:test";
import assert from "node:assert/strict";
import { DecisionError } from "./errors.js";
import { TaskGraph } from "./graph/task-graph.js";
import { InMemoryQueueIndexStore } from "./persistence.js";
import { chooseStrategy, selectTargetTasks } from "./target/select.js";
import { createStrategyRegistry, nightlyIndexPath, type SelectionContext } from "./target/strategies.js";
import { makeParams, makeRecord, silentLogger } from "./test-fixtures.js";

function graph(): TaskGraph {
  return TaskGraph.fromTasks([
    makeRecord("build-a"),
    makeRecord("build-b", { attributes: { "run-on-normal-ci": false } }),
    makeRecord("test-b", { dependencies: ["build-b"] }),
    makeRecord("bench", { attributes: { "run-on-normal-ci": false } }),
    makeRecord("release-a", { dependencies: ["build-a"], attributes: { "release-only": true } }),
    makeRecord("publish-promote", { dependencies: ["build-a"], attributes: { "shipping-phase": "promote" } }),
    makeRecord("publish-ship", { dependencies: ["publish-promote"], attributes: { "shipping-phase": "ship" } }),
  ]);
}

function context(store = new InMemoryQueueIndexStore()): SelectionContext {
  return { store, indexPrefix: "garbage.decision-graph", logger: silentLogger };
}

const strategies = createStrategyRegistry();

test("strategy choice: explicit method, skip, shipping phase, trigger, full CI, normal", () => {
  assert.equal(chooseStrategy(makeParams({ targetTasksMethod: "custom", title: "[skip ci]" })), "custom");
  assert.equal(chooseStrategy(makeParams({ title: "[skip ci] [ci full]", shippingPhase: "ship" })), "skip");
  assert.equal(chooseStrategy(makeParams({ triggerKind: "tag-release", shippingPhase: "promote" })), "promote");
  assert.equal(chooseStrategy(makeParams({ triggerKind: "tag-release", title: "[ci full]" })), "release");
  assert.equal(chooseStrategy(makeParams({ triggerKind: "cron" })), "nightly");
  assert.equal(chooseStrategy(makeParams({ title: "[ci full]" })), "full");
  assert.equal(chooseStrategy(makeParams({ triggerKind: "push" })), "normal");
});

test("normal CI drops opted-out and release-only tasks but keeps what targets depend on", async () => {
  const selection = await selectTargetTasks(graph(), makeParams(), strategies, context());
  assert.equal(selection.strategy, "normal");
  assert.deepEqual(selection.targets, ["build-a", "test-b", "publish-promote", "publish-ship"]);
  assert.deepEqual(selection.labels, ["build-a", "build-b", "test-b", "publish-promote", "publish-ship"]);
  assert.deepEqual(selection.graph.labels(), selection.labels);
});

test("full CI keeps normal-CI opt-outs", async () => {
  const selection = await selectTargetTasks(graph(), makeParams({ title: "[ci full]" }), strategies, context());
  assert.equal(selection.strategy, "full");
  assert.deepEqual(selection.targets, ["build-a", "build-b", "test-b", "bench", "publish-promote", "publish-ship"]);
});

test("skip selects nothing", async () => {
  const selection = await selectTargetTasks(graph(), makeParams({ title: "[skip ci]" }), strategies, context());
  assert.deepEqual(selection.labels, []);
  assert.equal(selection.graph.size, 0);
});

test("a release selects every task", async () => {
  const selection = await selectTargetTasks(graph(), makeParams({ triggerKind: "tag-release" }), strategies, context());
  assert.equal(selection.strategy, "release");
  assert.deepEqual(selection.labels, graph().labels());
});

test("a nightly selects every task unless one already ran for the revision", async () => {
  const store = new InMemoryQueueIndexStore();
  const params = makeParams({ triggerKind: "cron" });

  const first = await selectTargetTasks(graph(), params, strategies, context(store));
  assert.equal(first.strategy, "nightly");
  assert.equal(first.labels.length, 7);

  await store.insertTask(nightlyIndexPath("garbage.decision-graph", "abc123"), "earlier-decision");
  const second = await selectTargetTasks(graph(), params, strategies, context(store));
  assert.deepEqual(second.targets, []);
  assert.deepEqual(second.labels, []);
});

test("shipping phases select their own tasks, ship including promote", async () => {
  const promote = await selectTargetTasks(
    graph(),
    makeParams({ triggerKind: "tag-release", shippingPhase: "promote" }),
    strategies,
    context()
  );
  assert.deepEqual(promote.targets, ["publish-promote"]);
  assert.deepEqual(promote.labels, ["build-a", "publish-promote"]);

  const ship = await selectTargetTasks(
    graph(),
    makeParams({ triggerKind: "tag-release", shippingPhase: "ship" }),
    strategies,
    context()
  );
  assert.deepEqual(ship.targets, ["publish-promote", "publish-ship"]);
  assert.deepEqual(ship.labels, ["build-a", "publish-promote", "publish-ship"]);
});

test("project strategies are registered by name; unknown names are rejected", async () => {
  const registry = createStrategyRegistry({
    "only-tests": {
      description: "Test tasks only.",
      async select(g) {
        return g.labels().filter((label) => label.startsWith("test-"));
      },
    },
  });
  const selection = await selectTargetTasks(graph(), makeParams({ targetTasksMethod: "only-tests" }), registry, context());
  assert.deepEqual(selection.labels, ["build-b", "test-b"]);

  await assert.rejects(
    selectTargetTasks(graph(), makeParams({ targetTasksMethod: "nope" }), strategies, context()),
    (err: unknown) =>
      err instanceof DecisionError &&
      err.code === "unknown_strategy" &&
      err.message === "unknown target tasks method nope; known: full, nightly, normal, promote, release, ship, skip"
  );
});
