import test from "node:test";
import assert from "node:assert/strict";
import { Redis } from "ioredis";
// ioredis-mock is CJS; cast to ioredis Redis type so tsc is satisfied
import RedisMockDefault from "ioredis-mock";
const RedisMock = RedisMockDefault as unknown as typeof Redis;
import type { TaskDefinition } from "./contracts.js";
import { findOrCreate } from "./cache/find-or-create.js";
import { QueueRequestError } from "./errors.js";
import { RedisQueueIndexStore } from "./persistence/redis-adapter.js";
import { DecisionRun } from "./run-context.js";
import { makeConfig, makeParams, makeRecord, silentLogger } from "./test-fixtures.js";

async function makeStore(keyPrefix?: string) {
  const mock = new RedisMock();
  await mock.flushall(); // ioredis-mock shares state across instances; flush each time
  return { mock, store: new RedisQueueIndexStore(mock, { keyPrefix }) };
}

const DEFINITION: TaskDefinition = {
  taskGroupId: "decision-1",
  dependencies: ["decision-1"],
  schedulerId: "taskcluster-github",
  provisionerId: "built-in",
  workerType: "succeed",
  created: "2026-01-01T00:00:00.000Z",
  deadline: "2026-01-02T00:00:00.000Z",
  expires: "2027-01-01T00:00:00.000Z",
  metadata: { name: "a", description: "", owner: "dev@example.com", source: "https://example.com" },
  payload: { n: 1 },
  routes: ["index.garbage.toolchains.rust", "tc-treeherder.v2.app"],
};

test("redis: createTask + getTask round-trips the definition", async () => {
  const { store } = await makeStore();
  await store.createTask("T1", DEFINITION);
  assert.deepEqual(await store.getTask("T1"), DEFINITION);
  assert.equal(await store.getTask("T2"), undefined);
  assert.deepEqual(await store.listTaskIds(), ["T1"]);
});

test("redis: created tasks are indexed under their index routes only", async () => {
  const { store } = await makeStore();
  await store.createTask("T1", DEFINITION);
  assert.equal(await store.findTask("garbage.toolchains.rust"), "T1");
  assert.equal(await store.findTask("tc-treeherder.v2.app"), undefined);
});

test("redis: createTask is idempotent for the same definition, 409 for another", async () => {
  const { store } = await makeStore();
  await store.createTask("T1", DEFINITION);
  await store.createTask("T1", { ...DEFINITION });
  await assert.rejects(
    store.createTask("T1", { ...DEFINITION, payload: { n: 2 } }),
    (err: unknown) => err instanceof QueueRequestError && err.status === 409
  );
  assert.deepEqual(await store.listTaskIds(), ["T1"]);
});

test("redis: insertTask points an index path at an existing task", async () => {
  const { store } = await makeStore();
  await store.insertTask("garbage.nightly.revision.abc123", "decision-1");
  assert.equal(await store.findTask("garbage.nightly.revision.abc123"), "decision-1");
});

test("redis: keys carry the configured prefix", async () => {
  const { mock, store } = await makeStore("decision:");
  await store.createTask("T1", DEFINITION);
  assert.equal(await mock.get("decision:index:garbage.toolchains.rust"), "T1");
  assert.notEqual(await mock.get("decision:task:T1"), null);
});

test("redis: listTaskIds reads the prefixed task set, sorted", async () => {
  const { mock, store } = await makeStore("decision:");
  await store.createTask("T2", { ...DEFINITION, routes: [] });
  await store.createTask("T1", DEFINITION);
  assert.deepEqual((await mock.smembers("decision:tasks")).sort(), ["T1", "T2"]);
  assert.equal(await mock.exists("tasks"), 0);
  assert.deepEqual(await store.listTaskIds(), ["T1", "T2"]);
});

test("redis: a stored value that is not a task definition is rejected", async () => {
  const { mock, store } = await makeStore();
  await mock.set("task:T9", JSON.stringify({ taskGroupId: "x" }));
  await assert.rejects(store.getTask("T9"), /task T9 is not a task definition/);
});

test("redis: find-or-create reuses a task across runs sharing the store", async () => {
  const { store } = await makeStore();
  const record = makeRecord("toolchain-rust", { cache: { indexPath: "toolchains.rust.v1" } });
  const run = (decisionTaskId: string) =>
    new DecisionRun({
      config: makeConfig(),
      params: makeParams({ decisionTaskId }),
      store,
      logger: silentLogger,
      treeSha: async () => "unused",
    });

  const first = await findOrCreate(run("decision-1"), record, new Map());
  const second = await findOrCreate(run("decision-2"), record, new Map());
  assert.equal(first.status, "created");
  assert.deepEqual(second, {
    label: "toolchain-rust",
    taskId: first.taskId,
    status: "found",
    indexPath: "garbage.decision-graph.toolchains.rust.v1",
  });
});
