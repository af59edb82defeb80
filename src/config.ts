import { DecisionError } from "./errors.js";

export type StoreKind = "memory" | "redis" | "http";

export interface DecisionConfig {
  /** `%s` is replaced with the task name. */
  taskNameTemplate: string;
  indexPrefix: string;
  scopesForAllSubtasks: string[];
  routesForAllSubtasks: string[];
  /** Platform limit on the number of dependencies of one task. */
  maxDependencies: number;
  kindsDir: string;
  artifactsDir: string;
  /** Image tasks built from Dockerfiles are cached this long. */
  dockerImagesExpireIn: string;
  dockerImageBuilder: string;
  /** Worker type of image builds; the consuming task's when unset. */
  dockerImageBuildWorkerType?: string;
  store: StoreKind;
  redisUrl: string;
  queueUrl: string;
  indexUrl: string;
  host: string;
  port: number;
  logLevel: string;
}

const DEFAULT_MAX_DEPENDENCIES = 99;
const DEFAULT_DOCKER_IMAGE_BUILDER =
  "servobrowser/taskcluster-bootstrap:image-builder@sha256:0a7d012ce444d62ffb9e7f06f0c52fedc24b68c2060711b313263367f7272d9d";

function list(value: string | undefined): string[] {
  if (!value) return [];
  return value
    .split(",")
    .map((v) => v.trim())
    .filter((v) => v.length > 0);
}

function storeKind(value: string | undefined): StoreKind {
  const kind = value ?? "memory";
  if (kind === "memory" || kind === "redis" || kind === "http") return kind;
  throw new DecisionError("config_missing", `DECISION_STORE must be memory, redis or http, got ${kind}`);
}

function positiveInt(name: string, value: string | undefined, fallback: number): number {
  if (value === undefined || value === "") return fallback;
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new DecisionError("config_missing", `${name} must be a positive integer, got ${value}`);
  }
  return parsed;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): DecisionConfig {
  return {
    taskNameTemplate: env.DECISION_TASK_NAME_TEMPLATE ?? "%s",
    indexPrefix: env.DECISION_INDEX_PREFIX ?? "garbage.decision-graph",
    scopesForAllSubtasks: list(env.DECISION_SCOPES_FOR_ALL_SUBTASKS),
    routesForAllSubtasks: list(env.DECISION_ROUTES_FOR_ALL_SUBTASKS),
    maxDependencies: positiveInt(
      "DECISION_MAX_DEPENDENCIES",
      env.DECISION_MAX_DEPENDENCIES,
      DEFAULT_MAX_DEPENDENCIES
    ),
    kindsDir: env.DECISION_KINDS_DIR ?? "taskcluster/kinds",
    artifactsDir: env.DECISION_ARTIFACTS_DIR ?? ".",
    dockerImagesExpireIn: env.DECISION_DOCKER_IMAGES_EXPIRE_IN ?? "1 month",
    dockerImageBuilder: env.DECISION_DOCKER_IMAGE_BUILDER ?? DEFAULT_DOCKER_IMAGE_BUILDER,
    dockerImageBuildWorkerType: env.DECISION_DOCKER_IMAGE_BUILD_WORKER_TYPE || undefined,
    store: storeKind(env.DECISION_STORE),
    redisUrl: env.DECISION_REDIS_URL ?? "redis://localhost:6379",
    // taskclusterProxy endpoints, reachable from inside a decision task
    queueUrl: env.DECISION_QUEUE_URL ?? "http://taskcluster/queue/v1",
    indexUrl: env.DECISION_INDEX_URL ?? "http://taskcluster/index/v1",
    host: env.DECISION_HOST ?? "0.0.0.0",
    port: positiveInt("DECISION_PORT", env.DECISION_PORT, 8787),
    logLevel: env.DECISION_LOG_LEVEL ?? "info",
  };
}
