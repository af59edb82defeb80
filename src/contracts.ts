import type { JsonObject } from "./json.js";

export type TriggerKind = "pull-request" | "push" | "tag-release" | "cron";

export type ShippingPhase = "promote" | "ship";

export type AttributeValue =
  | string
  | number
  | boolean
  | null
  | AttributeValue[]
  | { [key: string]: AttributeValue };

export type Attributes = Record<string, AttributeValue>;

/** Points at another task of the same graph; replaced by its task id at submission. */
export interface TaskReference {
  taskLabel: string;
}

// ── Worker payloads ────────────────────────────────────────────────────────

export interface ArtifactSpec {
  type: "file";
  path: string;
  /** Relative offset, turned into an absolute `expires` in the task definition. */
  expiresIn: string;
}

export interface TaskImage {
  type: "task-image";
  path: string;
  taskId: TaskReference;
}

export interface DockerWorkerPayload {
  image: string | TaskImage;
  /** Seconds. */
  maxRunTime: number;
  command: string[];
  /** A reference value becomes the referenced task's id. */
  env?: Record<string, string | TaskReference>;
  cache?: Record<string, string>;
  features?: Record<string, boolean>;
  artifacts?: Record<string, ArtifactSpec>;
}

export interface UpstreamArtifact {
  taskId: TaskReference;
  taskType: string;
  paths: string[];
  formats?: string[];
}

export interface SigningPayload {
  maxRunTime: number;
  upstreamArtifacts: UpstreamArtifact[];
}

export interface BeetmoverPayload {
  maxRunTime: number;
  features: { chainOfTrust: true };
  releaseProperties: { appName: string };
  upstreamArtifacts: UpstreamArtifact[];
  version: string;
  artifactId: string;
}

export type BuiltInPayload = Record<string, never>;

export type WorkerSpec =
  | { implementation: "docker-worker"; payload: DockerWorkerPayload }
  | { implementation: "scriptworker-signing"; payload: SigningPayload }
  | { implementation: "scriptworker-beetmover"; payload: BeetmoverPayload }
  | { implementation: "built-in"; payload: BuiltInPayload };

export type WorkerImplementation = WorkerSpec["implementation"];

// ── Tasks ──────────────────────────────────────────────────────────────────

export interface TaskCacheConfig {
  /** May contain `{tree:<dir>}` placeholders; defaults to a hash of the payload. */
  indexPath?: string;
  /** How long the index entry lives; matches the expiry of the task's artifacts. */
  expiresIn?: string;
}

export interface TaskRecord {
  label: string;
  kind: string;
  name: string;
  description: string;
  schedulerId: string;
  provisionerId: string;
  workerType: string;
  worker: WorkerSpec;
  dependencies: string[];
  attributes: Readonly<Attributes>;
  routes: string[];
  scopes: string[];
  extra: JsonObject;
  deadlineIn: string;
  expiresIn: string;
  cache?: TaskCacheConfig;
}

/**
 * A task while it moves through its kind's transforms: plain JSON, possibly
 * holding keyed-by values and worker descriptions not yet turned into payloads.
 */
export interface TaskDescription extends JsonObject {
  label: string;
  kind: string;
}

/** The body handed to the queue's `createTask`. */
export interface TaskDefinition {
  taskGroupId: string;
  dependencies: string[];
  schedulerId: string;
  provisionerId: string;
  workerType: string;
  created: string;
  deadline: string;
  expires: string;
  metadata: {
    name: string;
    description: string;
    owner: string;
    source: string;
  };
  payload: JsonObject;
  scopes?: string[];
  routes?: string[];
  extra?: JsonObject;
}

// ── Run parameters ─────────────────────────────────────────────────────────

export interface TriggerOverrides {
  fullCi: boolean;
  skipCi: boolean;
  /** Dependency name → branch to build it from. */
  branches: Record<string, string>;
}

export interface RunParameters {
  readonly triggerKind: TriggerKind;
  readonly title: string;
  readonly overrides: Readonly<TriggerOverrides>;
  readonly buildLevel: number;
  readonly trusted: boolean;
  readonly headRepository: string;
  readonly headRef: string;
  readonly headRev: string;
  readonly owner: string;
  readonly source: string;
  readonly decisionTaskId: string;
  readonly preview: boolean;
  readonly release: boolean;
  readonly version?: string;
  readonly shippingPhase?: ShippingPhase;
  readonly targetTasksMethod?: string;
}

// ── Submission ─────────────────────────────────────────────────────────────

export type ScheduleStatus = "created" | "found" | "cached";

export interface ScheduledTask {
  label: string;
  taskId: string;
  status: ScheduleStatus;
  indexPath?: string;
}
