import { fileURLToPath } from "node:url";
import { loadConfig, type DecisionConfig } from "./config.js";
import type { RunParameters, TaskRecord } from "./contracts.js";
import { deepFreeze } from "./json.js";
import { createLogger } from "./logger.js";
import { buildRunParameters, type RunParametersInput } from "./parameters.js";

export const FIXTURE_KINDS_DIR = fileURLToPath(new URL("../fixtures/kinds/", import.meta.url));
export const IMAGE_KINDS_DIR = fileURLToPath(new URL("../fixtures/image-kinds/", import.meta.url));

export const silentLogger = createLogger("silent");

export function makeParams(input: Partial<RunParametersInput> = {}): RunParameters {
  return buildRunParameters({
    triggerKind: "pull-request",
    headRepository: "https://example.com/app.git",
    headRef: "refs/heads/main",
    headRev: "abc123",
    owner: "dev@example.com",
    source: "https://example.com/app/pull/1",
    decisionTaskId: "decision-1",
    ...input,
  });
}

export function makeConfig(overrides: Partial<DecisionConfig> = {}): DecisionConfig {
  return { ...loadConfig({ DECISION_LOG_LEVEL: "silent" }), ...overrides };
}

export function makeRecord(label: string, overrides: Partial<TaskRecord> = {}): TaskRecord {
  const { attributes, ...rest } = overrides;
  return {
    label,
    kind: "build",
    name: label,
    description: "",
    schedulerId: "taskcluster-github",
    provisionerId: "built-in",
    workerType: "succeed",
    worker: { implementation: "built-in", payload: {} },
    dependencies: [],
    routes: [],
    scopes: [],
    extra: {},
    deadlineIn: "1 day",
    expiresIn: "1 year",
    ...rest,
    attributes: deepFreeze({ kind: rest.kind ?? "build", ...attributes }),
  };
}
