import type { TaskDescription } from "../contracts.js";
import { DecisionError, SchemaViolationError } from "../errors.js";
import { cloneJson, isJsonObject, isRecord, toJsonValue, type JsonObject, type JsonValue } from "../json.js";
import { buildWorkerSpec, collectTaskReferences } from "../payloads/index.js";
import { resolveKeyedByDeep } from "./keyed-by.js";
import type { Transform, TransformContext } from "./pipeline.js";

const VERSION_PLACEHOLDER = "{version}";

function stringList(value: JsonValue | undefined, field: string, label: string): string[] | undefined {
  if (value === undefined) return undefined;
  if (Array.isArray(value) && value.every((v): v is string => typeof v === "string")) return value;
  throw new DecisionError("schema_violation", `task ${label}: ${field} must be a list of strings`, { label });
}

function keysFor(task: TaskDescription, context: TransformContext): Record<string, string | undefined> {
  const keys: Record<string, string | undefined> = {};
  if (isRecord(task.attributes)) {
    for (const [name, value] of Object.entries(task.attributes)) {
      if (typeof value === "string" || typeof value === "number" || typeof value === "boolean") {
        keys[name] = String(value);
      }
    }
  }
  return {
    ...keys,
    kind: context.kind,
    level: String(context.params.buildLevel),
    trigger: context.params.triggerKind,
    "shipping-phase": context.params.shippingPhase,
  };
}

export const resolveKeyedByTransform: Transform = function* (context, tasks) {
  for (const task of tasks) {
    const keys = keysFor(task, context);
    for (const [field, value] of Object.entries(task)) {
      if (field === "label" || field === "kind") continue;
      task[field] = resolveKeyedByDeep(value, keys, task.label, `/${field}`);
    }
    yield task;
  }
};

export const runOnTriggersTransform: Transform = function* (context, tasks) {
  for (const task of tasks) {
    const triggers = stringList(task.runOnTriggers, "runOnTriggers", task.label);
    delete task.runOnTriggers;
    if (triggers && !triggers.includes("all") && !triggers.includes(context.params.triggerKind)) {
      context.logger.debug({ label: task.label }, "dropped: not run for this trigger");
      continue;
    }
    yield task;
  }
};

export const splitByPhaseTransform: Transform = function* (_context, tasks) {
  for (const task of tasks) {
    const phases = stringList(task.shippingPhases, "shippingPhases", task.label);
    delete task.shippingPhases;
    if (!phases) {
      yield task;
      continue;
    }
    for (const phase of phases) {
      const copy = cloneJson(task);
      copy.label = `${task.label}-${phase}`;
      const attributes: JsonObject = isRecord(copy.attributes) ? { ...copy.attributes } : {};
      attributes["shipping-phase"] = phase;
      copy.attributes = attributes;
      yield copy;
    }
  }
};

function substituteVersion(value: JsonValue, version: string | undefined, label: string): JsonValue {
  if (typeof value === "string") {
    if (!value.includes(VERSION_PLACEHOLDER)) return value;
    if (version === undefined) {
      throw new DecisionError(
        "config_missing",
        `task ${label} uses ${VERSION_PLACEHOLDER} but the run has no version`,
        { label }
      );
    }
    return value.split(VERSION_PLACEHOLDER).join(version);
  }
  if (Array.isArray(value)) return value.map((item) => substituteVersion(item, version, label));
  if (typeof value === "object" && value !== null) {
    const out: JsonObject = {};
    for (const [key, child] of Object.entries(value)) out[key] = substituteVersion(child, version, label);
    return out;
  }
  return value;
}

export const versionTransform: Transform = function* (context, tasks) {
  for (const task of tasks) {
    for (const [field, value] of Object.entries(task)) {
      if (field === "label" || field === "kind") continue;
      task[field] = substituteVersion(value, context.params.version, task.label);
    }
    yield task;
  }
};

/**
 * Replaces `worker.dockerfile` with a reference to the task building that
 * image, emitting the image task ahead of the first task that uses it.
 */
export const dockerImageTransform: Transform = function* (context, tasks) {
  for (const task of tasks) {
    const worker = task.worker;
    if (!isJsonObject(worker) || worker.dockerfile === undefined) {
      yield task;
      continue;
    }
    const { dockerfile, ...rest } = worker;
    if (typeof dockerfile !== "string" || rest.dockerImage !== undefined) {
      throw new SchemaViolationError(task.label, "/worker/dockerfile", "must be a path and replaces dockerImage");
    }
    if (!context.dockerImages) {
      throw new DecisionError(
        "config_missing",
        `task ${task.label} builds its image from ${dockerfile}, but no kinds directory is configured`,
        { label: task.label }
      );
    }
    const image = context.dockerImages.imageFor(context.kind, dockerfile, task.label, task.workerType);
    if (image.task) yield image.task;
    task.worker = { ...rest, dockerImage: { taskLabel: image.label } };
    yield task;
  }
};

export const buildPayloadTransform: Transform = function* (context, tasks) {
  for (const task of tasks) {
    const spec = buildWorkerSpec(task.worker, task.label, context.params);
    const dependencies = new Set(stringList(task.dependencies, "dependencies", task.label) ?? []);
    for (const ref of collectTaskReferences(spec.payload)) dependencies.add(ref);
    task.worker = toJsonValue(spec);
    task.dependencies = [...dependencies];
    yield task;
  }
};

export const BUILTIN_TRANSFORMS: Readonly<Record<string, Transform>> = {
  "resolve-keyed-by": resolveKeyedByTransform,
  "run-on-triggers": runOnTriggersTransform,
  "split-by-phase": splitByPhaseTransform,
  version: versionTransform,
  "docker-image": dockerImageTransform,
  "build-payload": buildPayloadTransform,
};

export type TransformRegistry = ReadonlyMap<string, Transform>;

/** Built-in transforms plus project-specific ones; later entries win. */
export function createTransformRegistry(extra: Record<string, Transform> = {}): TransformRegistry {
  return new Map(Object.entries({ ...BUILTIN_TRANSFORMS, ...extra }));
}
