import type { RunParameters, WorkerImplementation, WorkerSpec } from "../contracts.js";
import { DecisionError } from "../errors.js";
import { isJsonObject, toJsonValue, type JsonObject, type JsonValue } from "../json.js";
import { ajv, assertValid } from "../validation.js";
import {
  buildDockerWorkerPayload,
  dockerWorkerDescriptionSchema,
  dockerWorkerPayloadSchema,
  type DockerWorkerDescription,
} from "./docker-worker.js";
import {
  beetmoverDescriptionSchema,
  beetmoverPayloadSchema,
  buildBeetmoverPayload,
  buildSigningPayload,
  signingDescriptionSchema,
  signingPayloadSchema,
  type BeetmoverDescription,
  type SigningDescription,
} from "./scriptworker.js";

export interface BuiltInDescription {
  implementation: "built-in";
}

export type WorkerDescription =
  | DockerWorkerDescription
  | SigningDescription
  | BeetmoverDescription
  | BuiltInDescription;

const builtInDescriptionSchema = {
  type: "object",
  required: ["implementation"],
  properties: { implementation: { const: "built-in" } },
  additionalProperties: false,
} as const;

export const workerDescriptionSchema = {
  type: "object",
  required: ["implementation"],
  discriminator: { propertyName: "implementation" },
  oneOf: [
    dockerWorkerDescriptionSchema,
    signingDescriptionSchema,
    beetmoverDescriptionSchema,
    builtInDescriptionSchema,
  ],
} as const;

function specSchema(implementation: WorkerImplementation, payload: object) {
  return {
    type: "object",
    required: ["implementation", "payload"],
    properties: { implementation: { const: implementation }, payload },
    additionalProperties: false,
  };
}

export const workerSpecSchema = {
  type: "object",
  required: ["implementation"],
  discriminator: { propertyName: "implementation" },
  oneOf: [
    specSchema("docker-worker", dockerWorkerPayloadSchema),
    specSchema("scriptworker-signing", signingPayloadSchema),
    specSchema("scriptworker-beetmover", beetmoverPayloadSchema),
    specSchema("built-in", { type: "object", additionalProperties: false }),
  ],
} as const;

const validateWorkerDescription = ajv.compile<WorkerDescription>(workerDescriptionSchema);

export const DEFAULT_PROVISIONER_IDS: Record<WorkerImplementation, string> = {
  "docker-worker": "aws-provisioner-v1",
  "scriptworker-signing": "scriptworker-prov-v1",
  "scriptworker-beetmover": "scriptworker-prov-v1",
  "built-in": "built-in",
};

/** Validates a worker description and turns it into the worker's payload. */
export function buildWorkerSpec(worker: unknown, label: string, params: RunParameters): WorkerSpec {
  assertValid(validateWorkerDescription, worker, label, "/worker");
  switch (worker.implementation) {
    case "docker-worker":
      return { implementation: worker.implementation, payload: buildDockerWorkerPayload(worker, params) };
    case "scriptworker-signing":
      return { implementation: worker.implementation, payload: buildSigningPayload(worker) };
    case "scriptworker-beetmover":
      return { implementation: worker.implementation, payload: buildBeetmoverPayload(worker) };
    case "built-in":
      return { implementation: worker.implementation, payload: {} };
  }
}

function referencedLabel(value: JsonValue): string | undefined {
  if (!isJsonObject(value) || Object.keys(value).length !== 1) return undefined;
  return typeof value.taskLabel === "string" ? value.taskLabel : undefined;
}

/**
 * Copy of a payload with every task reference passed through `replace`.
 * References are only looked for where payloads hold them: a task image's
 * `taskId`, each upstream artifact's `taskId` and the values of `env`.
 */
function mapTaskReferences(payload: object, replace: (label: string) => JsonValue): JsonObject {
  const out = toJsonValue(payload);
  if (!isJsonObject(out)) return {};
  const swap = (value: JsonValue): JsonValue => {
    const label = referencedLabel(value);
    return label === undefined ? value : replace(label);
  };

  const image = out.image;
  if (isJsonObject(image) && "taskId" in image) image.taskId = swap(image.taskId);
  const upstream = out.upstreamArtifacts;
  if (Array.isArray(upstream)) {
    for (const artifact of upstream) {
      if (isJsonObject(artifact) && "taskId" in artifact) artifact.taskId = swap(artifact.taskId);
    }
  }
  const env = out.env;
  if (isJsonObject(env)) {
    for (const [name, value] of Object.entries(env)) env[name] = swap(value);
  }
  return out;
}

/** Labels of the tasks a payload references. */
export function collectTaskReferences(payload: object): Set<string> {
  const labels = new Set<string>();
  mapTaskReferences(payload, (label) => {
    labels.add(label);
    return label;
  });
  return labels;
}

/** The payload with task references replaced by task ids. */
export function resolveTaskReferences(
  payload: object,
  taskIds: ReadonlyMap<string, string>,
  label: string
): JsonObject {
  return mapTaskReferences(payload, (referenced) => {
    const taskId = taskIds.get(referenced);
    if (!taskId) {
      throw new DecisionError(
        "ambiguous_dependency",
        `task ${label} references ${referenced}, which has no task id`,
        { label }
      );
    }
    return taskId;
  });
}
