import test from "node:test";
import assert from "node:assert/strict";
import { existsSync } from "node:fs";
import { mkdtemp, readFile, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import * as yaml from "js-yaml";
import { buildFullTaskGraph, renderParameters, writeChainOfTrust } from "./chain-of-trust.js";
import { runDecisionTask } from "./decision-task.js";
import { DecisionError } from "./errors.js";
import { toJsonValue } from "./json.js";
import { InMemoryQueueIndexStore } from "./persistence.js";
import { FIXTURE_KINDS_DIR, makeConfig, makeParams, silentLogger } from "./test-fixtures.js";

async function withTempDir(fn: (dir: string) => Promise<void>): Promise<void> {
  const dir = await mkdtemp(join(tmpdir(), "decision-graph-"));
  try {
    await fn(dir);
  } finally {
    await rm(dir, { recursive: true, force: true });
  }
}

test("parameters render as YAML with sorted keys", () => {
  const params = makeParams();
  const text = renderParameters(params);
  assert.ok(text.startsWith("buildLevel: 1\ndecisionTaskId: decision-1\n"));
  assert.deepEqual(yaml.load(text), toJsonValue(params));
});

test("the full task graph lists every task of the run by id", async () => {
  const store = new InMemoryQueueIndexStore();
  await assert.rejects(
    buildFullTaskGraph(store, ["missing"]),
    (err: unknown) => err instanceof DecisionError && err.code === "queue_request_failed"
  );
});

test("a decision task writes the chain-of-trust files for what it scheduled", async () => {
  await withTempDir(async (dir) => {
    const store = new InMemoryQueueIndexStore();
    const artifactsDir = join(dir, "public");
    const result = await runDecisionTask({
      config: makeConfig({ kindsDir: FIXTURE_KINDS_DIR, artifactsDir }),
      params: makeParams(),
      store,
      logger: silentLogger,
      now: new Date("2026-03-01T12:00:00.000Z"),
    });

    const graph: unknown = JSON.parse(await readFile(join(artifactsDir, "task-graph.json"), "utf8"));
    const ids = result.scheduled.map((s) => s.taskId);
    assert.deepEqual(graph, toJsonValue(await buildFullTaskGraph(store, ids)));
    assert.equal(ids.length, 4);
    assert.equal(await readFile(join(artifactsDir, "actions.json"), "utf8"), "{}\n");
    assert.equal(await readFile(join(artifactsDir, "parameters.yml"), "utf8"), renderParameters(makeParams()));
  });
});

test("a preview decision task writes nothing", async () => {
  await withTempDir(async (dir) => {
    const artifactsDir = join(dir, "public");
    await runDecisionTask({
      config: makeConfig({ kindsDir: FIXTURE_KINDS_DIR, artifactsDir }),
      params: makeParams({ preview: true }),
      store: new InMemoryQueueIndexStore(),
      logger: silentLogger,
    });
    assert.equal(existsSync(artifactsDir), false);
  });
});

test("files are written for exactly the given task ids", async () => {
  await withTempDir(async (dir) => {
    const store = new InMemoryQueueIndexStore();
    await store.createTask("T1", {
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
    });
    const graph = await writeChainOfTrust(dir, store, ["T1"], makeParams());
    assert.deepEqual(Object.keys(graph), ["T1"]);
    assert.equal(graph.T1.task.workerType, "succeed");
    const text = await readFile(join(dir, "task-graph.json"), "utf8");
    assert.ok(text.startsWith('{\n  "T1": {\n    "task": {\n      "taskGroupId": "decision-1",'));
    assert.ok(text.endsWith("}\n"));
  });
});
