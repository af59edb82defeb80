import test from "node:test";
import assert from "node:assert/strict";
import type { TaskDefinition } from "./contracts.js";
import type { JsonObject } from "./json.js";
import { createTask, defaultIndexPath, findOrCreate } from "./cache/find-or-create.js";
import { AmbiguousDependencyError, DecisionError, IndexLookupError, QueueRequestError } from "./errors.js";
import { InMemoryQueueIndexStore, type QueueIndexStore } from "./persistence.js";
import { DecisionRun, type DecisionRunOptions } from "./run-context.js";
import { fromNow, slugId } from "./task-definition.js";
import { buildTaskRecord } from "./task-schema.js";
import { makeConfig, makeParams, makeRecord, silentLogger } from "./test-fixtures.js";

const NOW = new Date("2026-01-01T00:00:00.000Z");

function newRun(store: QueueIndexStore, overrides: Partial<DecisionRunOptions> = {}): DecisionRun {
  return new DecisionRun({
    config: makeConfig(),
    params: makeParams(),
    store,
    logger: silentLogger,
    now: NOW,
    treeSha: async () => "unused",
    ...overrides,
  });
}

test("default index paths hash the worker type and payload, not key order", () => {
  const path = defaultIndexPath("b-linux", { a: 1, b: [1, 2] });
  assert.match(path, /^by-task-definition\.[0-9a-f]{64}$/);
  assert.equal(defaultIndexPath("b-linux", { b: [1, 2], a: 1 }), path);
  assert.notEqual(defaultIndexPath("b-macos", { a: 1, b: [1, 2] }), path);
});

test("a second run against the same index reuses the task instead of creating it", async () => {
  const store = new InMemoryQueueIndexStore();
  const record = makeRecord("toolchain-rust", { workerType: "b-linux", cache: {} });
  const expectedPath = `garbage.decision-graph.${defaultIndexPath("b-linux", {})}`;

  const first = newRun(store);
  const created = await findOrCreate(first, record, new Map());
  assert.equal(created.status, "created");
  assert.equal(created.indexPath, expectedPath);

  const again = await findOrCreate(first, record, new Map());
  assert.deepEqual(again, { ...created, status: "cached" });
  assert.deepEqual(first.allTaskIds, [created.taskId]);

  const definition = await store.getTask(created.taskId);
  assert.deepEqual(definition?.routes, [`index.${expectedPath}`]);
  assert.deepEqual(definition?.extra, { index: { expires: "2027-01-01T00:00:00.000Z" } });

  const second = newRun(store);
  const found = await findOrCreate(second, record, new Map());
  assert.deepEqual(found, { label: "toolchain-rust", taskId: created.taskId, status: "found", indexPath: expectedPath });
  assert.deepEqual(second.allTaskIds, [created.taskId]);
  assert.deepEqual(store.listTaskIds(), [created.taskId]);
});

test("a failed index lookup is never treated as a miss", async () => {
  const created: string[] = [];
  const store: QueueIndexStore = {
    async createTask(taskId) {
      created.push(taskId);
    },
    async getTask() {
      return undefined;
    },
    async findTask(indexPath) {
      throw new IndexLookupError(indexPath, "HTTP 500 Internal Server Error: down", { status: 500 });
    },
    async insertTask() {},
  };

  await assert.rejects(
    findOrCreate(newRun(store), makeRecord("toolchain-rust", { cache: {} }), new Map()),
    (err: unknown) => err instanceof IndexLookupError && err.status === 500
  );
  assert.deepEqual(created, []);
});

test("tree placeholders are replaced by the directory's content identity, looked up once", async () => {
  const asked: string[] = [];
  const run = newRun(new InMemoryQueueIndexStore(), {
    treeSha: async (directory) => {
      asked.push(directory);
      return "tree-1";
    },
  });
  const record = makeRecord("toolchain-rust", { cache: { indexPath: "toolchains.{tree:tools/rust}.{tree:tools/rust}.v1" } });

  const first = await findOrCreate(run, record, new Map());
  assert.equal(first.indexPath, "garbage.decision-graph.toolchains.tree-1.tree-1.v1");

  const other = makeRecord("toolchain-rust-lint", { cache: { indexPath: "lint.{tree:tools/rust}" } });
  const second = await findOrCreate(run, other, new Map());
  assert.equal(second.indexPath, "garbage.decision-graph.lint.tree-1");
  assert.deepEqual(asked, ["tools/rust"]);
});

test("created definitions depend on the decision task and carry the run's settings", async () => {
  const store = new InMemoryQueueIndexStore();
  const run = newRun(store, {
    config: makeConfig({ taskNameTemplate: "app: %s", scopesForAllSubtasks: ["queue:route:statuses"] }),
  });
  const record = makeRecord("test-a", { dependencies: ["build-a"], description: "runs the tests" });

  const taskId = await createTask(run, record, new Map([["build-a", "TASK-A"]]));
  const definition = await store.getTask(taskId);
  assert.deepEqual(definition, {
    taskGroupId: "decision-1",
    dependencies: ["decision-1", "TASK-A"],
    schedulerId: "taskcluster-github",
    provisionerId: "built-in",
    workerType: "succeed",
    created: "2026-01-01T00:00:00.000Z",
    deadline: "2026-01-02T00:00:00.000Z",
    expires: "2027-01-01T00:00:00.000Z",
    metadata: {
      name: "app: test-a",
      description: "runs the tests",
      owner: "dev@example.com",
      source: "https://example.com/app/pull/1",
    },
    payload: {},
    scopes: ["queue:route:statuses"],
  });

  await assert.rejects(
    createTask(run, record, new Map()),
    (err: unknown) => err instanceof AmbiguousDependencyError && err.dependency === "build-a"
  );
});

test("task names are inserted into the name template literally", async () => {
  const store = new InMemoryQueueIndexStore();
  const run = newRun(store, { config: makeConfig({ taskNameTemplate: "App: %s" }) });
  const taskId = await createTask(run, makeRecord("cost", { name: "cost $& $1" }), new Map());
  assert.equal((await store.getTask(taskId))?.metadata.name, "App: cost $& $1");
});

function cachedToolchain(cache: JsonObject) {
  return buildTaskRecord(
    {
      label: "toolchain-rust",
      kind: "toolchain",
      workerType: "b-linux",
      cache,
      worker: {
        implementation: "docker-worker",
        dockerImage: "rust:1",
        scripts: ["build-toolchain"],
        artifacts: ["/out/rust.tar.gz"],
        artifactsExpireIn: "1 month",
      },
    },
    makeParams()
  );
}

test("a cached task's index entry expires with its artifacts", async () => {
  const store = new InMemoryQueueIndexStore();
  const created = await findOrCreate(newRun(store), cachedToolchain({ indexPath: "toolchains.rust" }), new Map());
  const definition = await store.getTask(created.taskId);
  assert.deepEqual(definition?.extra, { index: { expires: "2026-02-01T00:00:00.000Z" } });
  assert.deepEqual(definition?.payload.artifacts, {
    "public/rust.tar.gz": { type: "file", path: "/out/rust.tar.gz", expires: "2026-02-01T00:00:00.000Z" },
  });
});

test("cache.expiresIn sets the expiry of both the index entry and the artifacts", async () => {
  const store = new InMemoryQueueIndexStore();
  const record = cachedToolchain({ indexPath: "toolchains.rust", expiresIn: "1 week" });
  const created = await findOrCreate(newRun(store), record, new Map());
  const definition = await store.getTask(created.taskId);
  assert.deepEqual(definition?.extra, { index: { expires: "2026-01-08T00:00:00.000Z" } });
  assert.deepEqual(definition?.payload.artifacts, {
    "public/rust.tar.gz": { type: "file", path: "/out/rust.tar.gz", expires: "2026-01-08T00:00:00.000Z" },
  });
  assert.equal(definition?.expires, "2027-01-01T00:00:00.000Z");
});

test("the in-memory queue accepts a repeated identical definition and rejects a different one", async () => {
  const store = new InMemoryQueueIndexStore();
  const definition: TaskDefinition = {
    taskGroupId: "decision-1",
    dependencies: ["decision-1"],
    schedulerId: "taskcluster-github",
    provisionerId: "built-in",
    workerType: "succeed",
    created: "2026-01-01T00:00:00.000Z",
    deadline: "2026-01-02T00:00:00.000Z",
    expires: "2027-01-01T00:00:00.000Z",
    metadata: { name: "a", description: "", owner: "dev@example.com", source: "https://example.com" },
    payload: {},
    routes: ["index.garbage.a", "notify.email.ci@example.com.on-failed"],
  };

  await store.createTask("T1", definition);
  await store.createTask("T1", structuredClone(definition));
  assert.equal(await store.findTask("garbage.a"), "T1");
  assert.equal(await store.findTask("notify.email.ci@example.com.on-failed"), undefined);

  await assert.rejects(
    store.createTask("T1", { ...definition, workerType: "other" }),
    (err: unknown) => err instanceof QueueRequestError && err.status === 409
  );
});

test("time offsets move the run clock", () => {
  assert.equal(fromNow("2 hours 30 min", NOW).toISOString(), "2026-01-01T02:30:00.000Z");
  assert.equal(fromNow("-1 year", NOW).toISOString(), "2025-01-01T00:00:00.000Z");
  assert.equal(fromNow("1 month 1 week", NOW).toISOString(), "2026-02-08T00:00:00.000Z");
  assert.equal(fromNow("", NOW).toISOString(), NOW.toISOString());
  assert.throws(() => fromNow("soon", NOW), (err: unknown) => err instanceof DecisionError && err.code === "schema_violation");
  assert.throws(() => fromNow("1 fortnight", NOW), /invalid time unit "fortnight"/);
});

test("slug ids are 22 url-safe characters", () => {
  const ids = new Set([slugId(), slugId(), slugId()]);
  assert.equal(ids.size, 3);
  for (const id of ids) assert.match(id, /^[A-Za-z0-9_-]{22}$/);
});
