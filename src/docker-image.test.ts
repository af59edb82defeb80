import test from "node:test";
import assert from "node:assert/strict";
import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { runDecision } from "./decision.js";
import { DecisionError, TransformError } from "./errors.js";
import { generateFullTaskGraph, loadKinds } from "./loader.js";
import { dockerfileDigest, expandDockerfile } from "./payloads/docker-image.js";
import { InMemoryQueueIndexStore } from "./persistence.js";
import { DecisionRun } from "./run-context.js";
import { IMAGE_KINDS_DIR, makeConfig, makeParams, silentLogger } from "./test-fixtures.js";

const RUST_DOCKERFILE = "FROM debian:bookworm-slim\nRUN apt-get update\n\nRUN apt-get install -y cargo\n";
const RUST_DIGEST = "4f6fe0a65d8a9a3701177f2480d2d2a708bce7e17c23d2d9372436fe05a014de";
const NOW = new Date("2026-03-01T12:00:00.000Z");

test("a leading % include line is replaced by the included Dockerfile", () => {
  const contents = expandDockerfile(join(IMAGE_KINDS_DIR, "toolchain", "rust.dockerfile"));
  assert.equal(contents, RUST_DOCKERFILE);
  assert.equal(dockerfileDigest(contents), RUST_DIGEST);
  assert.equal(
    expandDockerfile(join(IMAGE_KINDS_DIR, "toolchain", "base.dockerfile")),
    "FROM debian:bookworm-slim\nRUN apt-get update\n"
  );
});

test("Dockerfiles that include each other or do not exist are rejected", async () => {
  const dir = await mkdtemp(join(tmpdir(), "decision-graph-"));
  try {
    await writeFile(join(dir, "a.dockerfile"), "% include b.dockerfile\nRUN true\n");
    await writeFile(join(dir, "b.dockerfile"), "% include a.dockerfile\n");
    assert.throws(
      () => expandDockerfile(join(dir, "a.dockerfile")),
      (err: unknown) => err instanceof DecisionError && err.code === "kind_config_invalid"
    );
    assert.throws(
      () => expandDockerfile(join(dir, "missing.dockerfile")),
      (err: unknown) => err instanceof DecisionError && err.code === "config_missing"
    );
  } finally {
    await rm(dir, { recursive: true, force: true });
  }
});

test("tasks built from a Dockerfile depend on one shared image task", () => {
  const graph = generateFullTaskGraph({
    kinds: loadKinds(IMAGE_KINDS_DIR),
    params: makeParams(),
    maxDependencies: 99,
    logger: silentLogger,
    dockerImages: { kindsDir: IMAGE_KINDS_DIR, expiresIn: "1 month", builderImage: "builder:1" },
  });
  assert.deepEqual(graph.labels(), ["docker-image-rust", "toolchain-rust", "toolchain-clippy", "lint-rust"]);

  const image = graph.get("docker-image-rust");
  assert.equal(image?.description, "Docker image: rust");
  assert.equal(image?.workerType, "b-linux");
  assert.deepEqual(image?.attributes, { kind: "toolchain", "docker-image": "rust" });
  assert.deepEqual(image?.cache, { indexPath: `docker-image.${RUST_DIGEST}`, expiresIn: "1 month" });
  assert.deepEqual(image?.worker, {
    implementation: "docker-worker",
    payload: {
      image: "builder:1",
      maxRunTime: 1800,
      command: [
        "/bin/bash",
        "--login",
        "-x",
        "-e",
        "-c",
        'echo "$DOCKERFILE" | docker build -t taskcluster-built -\n docker save taskcluster-built | lz4 > /image.tar.lz4',
      ],
      env: { DOCKERFILE: RUST_DOCKERFILE },
      features: { dind: true, chainOfTrust: true },
      artifacts: {
        "public/image.tar.lz4": { type: "file", path: "/image.tar.lz4", expiresIn: "1 month" },
      },
    },
  });

  const rust = graph.get("toolchain-rust");
  assert.deepEqual(rust?.dependencies, ["docker-image-rust"]);
  assert.equal(rust?.worker.implementation, "docker-worker");
  if (rust?.worker.implementation === "docker-worker") {
    assert.deepEqual(rust.worker.payload.image, {
      type: "task-image",
      path: "public/image.tar.lz4",
      taskId: { taskLabel: "docker-image-rust" },
    });
  }
  assert.deepEqual(graph.get("toolchain-clippy")?.dependencies, ["docker-image-rust"]);
  assert.deepEqual(graph.get("lint-rust")?.dependencies, ["docker-image-rust", "toolchain-rust"]);
});

test("a Dockerfile without image settings fails the transform", () => {
  assert.throws(
    () =>
      generateFullTaskGraph({
        kinds: loadKinds(IMAGE_KINDS_DIR),
        params: makeParams(),
        maxDependencies: 99,
        logger: silentLogger,
      }),
    (err: unknown) =>
      err instanceof TransformError &&
      err.transform === "docker-image" &&
      err.cause instanceof DecisionError &&
      err.cause.code === "config_missing"
  );
});

test("image tasks are reused across decisions through the index", async () => {
  const store = new InMemoryQueueIndexStore();
  const decide = (decisionTaskId: string) =>
    runDecision(
      new DecisionRun({
        config: makeConfig({ kindsDir: IMAGE_KINDS_DIR, dockerImageBuilder: "builder:1" }),
        params: makeParams({ decisionTaskId }),
        store,
        logger: silentLogger,
        now: NOW,
      }),
      { kinds: loadKinds(IMAGE_KINDS_DIR) }
    );

  const first = await decide("decision-1");
  const ids = new Map(first.scheduled.map((s) => [s.label, s.taskId]));
  const image = first.scheduled.find((s) => s.label === "docker-image-rust");
  assert.equal(image?.status, "created");
  assert.equal(image?.indexPath, `garbage.decision-graph.docker-image.${RUST_DIGEST}`);

  const imageDefinition = await store.getTask(ids.get("docker-image-rust") ?? "");
  assert.deepEqual(imageDefinition?.extra, { index: { expires: "2026-04-01T12:00:00.000Z" } });

  const lint = await store.getTask(ids.get("lint-rust") ?? "");
  assert.deepEqual(lint?.payload.image, {
    type: "task-image",
    path: "public/image.tar.lz4",
    taskId: ids.get("docker-image-rust"),
  });
  assert.deepEqual(lint?.payload.env, { FETCH_1_TASK_ID: ids.get("toolchain-rust") });

  const second = await decide("decision-2");
  assert.deepEqual(
    second.scheduled.find((s) => s.label === "docker-image-rust"),
    { ...image, status: "found" }
  );
});
