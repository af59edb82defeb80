import { randomUUID } from "node:crypto";
import type { RunParameters, TaskDefinition, TaskRecord } from "./contracts.js";
import type { DecisionConfig } from "./config.js";
import { AmbiguousDependencyError, DecisionError } from "./errors.js";
import { isJsonObject, type JsonObject } from "./json.js";
import { resolveTaskReferences } from "./payloads/index.js";
import { ajv } from "./validation.js";

export const INDEX_ROUTE_PREFIX = "index.";

/** 22-character url-safe base64 form of a random UUID. */
export function slugId(): string {
  return Buffer.from(randomUUID().replace(/-/g, ""), "hex").toString("base64url");
}

const OFFSET_UNITS: ReadonlyArray<[RegExp, "years" | "months" | number]> = [
  [/^(y|yr|years?)$/, "years"],
  [/^(mo|months?)$/, "months"],
  [/^(w|wk|weeks?)$/, 7 * 24 * 3_600_000],
  [/^(d|days?)$/, 24 * 3_600_000],
  [/^(h|hr|hours?)$/, 3_600_000],
  [/^(m|min|minutes?)$/, 60_000],
  [/^(s|sec|seconds?)$/, 1_000],
];

/**
 * `now` moved by an offset such as "1 day", "2 hours 30 min" or "-1 year".
 * The empty offset is `now` itself.
 */
export function fromNow(offset: string, now: Date): Date {
  const trimmed = offset.trim();
  const sign = trimmed.startsWith("-") ? -1 : 1;
  const body = trimmed.replace(/^[-+]\s*/, "");
  const date = new Date(now.getTime());
  if (body === "") return date;

  const parts = [...body.matchAll(/(\d+)\s*([a-z]+)/gi)];
  if (parts.map((part) => part[0]).join("").replace(/\s/g, "") !== body.replace(/\s/g, "")) {
    throw new DecisionError("schema_violation", `invalid time offset "${offset}"`);
  }
  for (const [, amount, unit] of parts) {
    const n = sign * Number(amount);
    const match = OFFSET_UNITS.find(([pattern]) => pattern.test(unit.toLowerCase()));
    if (!match) throw new DecisionError("schema_violation", `invalid time unit "${unit}" in "${offset}"`);
    const [, step] = match;
    if (step === "years") date.setUTCFullYear(date.getUTCFullYear() + n);
    else if (step === "months") date.setUTCMonth(date.getUTCMonth() + n);
    else date.setTime(date.getTime() + n * step);
  }
  return date;
}

export interface DefinitionContext {
  readonly config: Pick<DecisionConfig, "taskNameTemplate" | "scopesForAllSubtasks" | "routesForAllSubtasks">;
  readonly params: RunParameters;
  readonly now: Date;
}

/**
 * The offset both the index entry and the artifacts of `record` expire after:
 * `cache.expiresIn`, else the artifacts' own, else the task's.
 */
export function indexAndArtifactsExpireIn(record: TaskRecord): string {
  if (record.cache?.expiresIn) return record.cache.expiresIn;
  if (record.worker.implementation === "docker-worker") {
    const [first] = Object.values(record.worker.payload.artifacts ?? {});
    if (first) return first.expiresIn;
  }
  return record.expiresIn;
}

function absoluteArtifacts(payload: JsonObject, now: Date, override: string | undefined): JsonObject {
  const artifacts = payload.artifacts;
  if (!isJsonObject(artifacts)) return payload;
  const out: JsonObject = {};
  for (const [name, artifact] of Object.entries(artifacts)) {
    if (isJsonObject(artifact) && typeof artifact.expiresIn === "string") {
      const { expiresIn, ...rest } = artifact;
      out[name] = { ...rest, expires: fromNow(override ?? expiresIn, now).toISOString() };
    } else {
      out[name] = artifact;
    }
  }
  return { ...payload, artifacts: out };
}

/**
 * The payload as the queue receives it, task references replaced by task ids,
 * but with artifact expiry still relative. Index paths are hashed over this
 * form so they do not change with the clock.
 */
export function resolvedPayload(record: TaskRecord, taskIds: ReadonlyMap<string, string>): JsonObject {
  return resolveTaskReferences(record.worker.payload, taskIds, record.label);
}

/**
 * The `createTask` body for `record`. Dependencies and task references must
 * already have task ids in `taskIds`; the decision task is always the first
 * dependency.
 */
export function buildTaskDefinition(
  record: TaskRecord,
  taskIds: ReadonlyMap<string, string>,
  context: DefinitionContext,
  extraRoutes: readonly string[] = []
): TaskDefinition {
  const { config, params, now } = context;
  const dependencies = record.dependencies.map((label) => {
    const taskId = taskIds.get(label);
    if (taskId === undefined) throw new AmbiguousDependencyError(record.label, label);
    return taskId;
  });

  const definition: TaskDefinition = {
    taskGroupId: params.decisionTaskId,
    dependencies: [params.decisionTaskId, ...dependencies],
    schedulerId: record.schedulerId,
    provisionerId: record.provisionerId,
    workerType: record.workerType,
    created: now.toISOString(),
    deadline: fromNow(record.deadlineIn, now).toISOString(),
    expires: fromNow(record.expiresIn, now).toISOString(),
    metadata: {
      name: config.taskNameTemplate.replace("%s", () => record.name),
      description: record.description,
      owner: params.owner,
      source: params.source,
    },
    payload: absoluteArtifacts(resolvedPayload(record, taskIds), now, record.cache?.expiresIn),
  };

  const scopes = [...record.scopes, ...config.scopesForAllSubtasks];
  const routes = [...record.routes, ...extraRoutes, ...config.routesForAllSubtasks];
  const extra: JsonObject = structuredClone(record.extra);
  if (routes.some((route) => route.startsWith(INDEX_ROUTE_PREFIX))) {
    const index = isJsonObject(extra.index) ? extra.index : {};
    extra.index = { ...index, expires: fromNow(indexAndArtifactsExpireIn(record), now).toISOString() };
  }

  if (scopes.length > 0) definition.scopes = scopes;
  if (routes.length > 0) definition.routes = routes;
  if (Object.keys(extra).length > 0) definition.extra = extra;
  return definition;
}

/** Index paths a definition registers itself under once created. */
export function indexPathsOf(definition: TaskDefinition): string[] {
  return (definition.routes ?? [])
    .filter((route) => route.startsWith(INDEX_ROUTE_PREFIX))
    .map((route) => route.slice(INDEX_ROUTE_PREFIX.length));
}

const strings = { type: "array", items: { type: "string" } } as const;

export const taskDefinitionSchema = {
  type: "object",
  required: [
    "taskGroupId",
    "dependencies",
    "schedulerId",
    "provisionerId",
    "workerType",
    "created",
    "deadline",
    "expires",
    "metadata",
    "payload",
  ],
  properties: {
    taskGroupId: { type: "string" },
    dependencies: strings,
    schedulerId: { type: "string" },
    provisionerId: { type: "string" },
    workerType: { type: "string" },
    created: { type: "string" },
    deadline: { type: "string" },
    expires: { type: "string" },
    metadata: {
      type: "object",
      required: ["name", "description", "owner", "source"],
      properties: {
        name: { type: "string" },
        description: { type: "string" },
        owner: { type: "string" },
        source: { type: "string" },
      },
    },
    payload: { type: "object" },
    scopes: strings,
    routes: strings,
    extra: { type: "object" },
  },
} as const;

export const validateTaskDefinition = ajv.compile<TaskDefinition>(taskDefinitionSchema);

/** Parses a stored or fetched definition, rejecting anything that is not one. */
export function parseTaskDefinition(source: unknown, taskId: string): TaskDefinition {
  if (validateTaskDefinition(source)) return source;
  const detail = validateTaskDefinition.errors?.[0]?.message ?? "is invalid";
  throw new DecisionError("queue_request_failed", `task ${taskId} is not a task definition: ${detail}`);
}
