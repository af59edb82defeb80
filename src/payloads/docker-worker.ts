import { posix } from "node:path";
import type { ArtifactSpec, DockerWorkerPayload, RunParameters, TaskImage, TaskReference } from "../contracts.js";

const DEFAULT_MAX_RUN_TIME_MINUTES = 30;
export const DEFAULT_ARTIFACTS_EXPIRE_IN = "1 year";
export const DEFAULT_IMAGE_ARTIFACT = "public/image.tar.lz4";
const ARTIFACTS_QUEUE_URL = "https://queue.taskcluster.net/v1";

/** A public artifact of another task, downloaded with curl before the scripts run. */
export interface ArtifactFetch {
  taskLabel: string;
  /** Name under `public/`. */
  artifact: string;
  /** Where the file lands; the current directory by default. */
  directory?: string;
}

/** What a kind writes under `worker` for a docker-worker task. */
export interface DockerWorkerDescription {
  implementation: "docker-worker";
  dockerImage: string | { taskLabel: string; path?: string };
  maxRunTimeMinutes?: number;
  scripts: string[];
  env?: Record<string, string>;
  caches?: Record<string, string>;
  features?: string[];
  artifacts?: string[];
  artifactsExpireIn?: string;
  /** Fetch and reset `repo` to the revision under test before the scripts run. */
  checkout?: boolean;
  fetches?: ArtifactFetch[];
}

const stringMap = { type: "object", additionalProperties: { type: "string" } } as const;
const taskReference = {
  type: "object",
  required: ["taskLabel"],
  properties: { taskLabel: { type: "string", minLength: 1 } },
  additionalProperties: false,
} as const;

export const dockerWorkerDescriptionSchema = {
  type: "object",
  required: ["implementation", "dockerImage", "scripts"],
  properties: {
    implementation: { const: "docker-worker" },
    dockerImage: {
      anyOf: [
        { type: "string", minLength: 1 },
        {
          type: "object",
          required: ["taskLabel"],
          properties: { taskLabel: { type: "string", minLength: 1 }, path: { type: "string" } },
          additionalProperties: false,
        },
      ],
    },
    maxRunTimeMinutes: { type: "integer", minimum: 1, maximum: 1440 },
    scripts: { type: "array", items: { type: "string" }, minItems: 1 },
    env: stringMap,
    caches: stringMap,
    features: { type: "array", items: { type: "string" } },
    artifacts: { type: "array", items: { type: "string", minLength: 1 } },
    artifactsExpireIn: { type: "string" },
    checkout: { type: "boolean" },
    fetches: {
      type: "array",
      items: {
        type: "object",
        required: ["taskLabel", "artifact"],
        properties: {
          taskLabel: { type: "string", minLength: 1 },
          artifact: { type: "string", minLength: 1 },
          directory: { type: "string" },
        },
        additionalProperties: false,
      },
    },
  },
  additionalProperties: false,
} as const;

export const dockerWorkerPayloadSchema = {
  type: "object",
  required: ["image", "maxRunTime", "command"],
  properties: {
    image: {
      anyOf: [
        { type: "string", minLength: 1 },
        {
          type: "object",
          required: ["type", "path", "taskId"],
          properties: { type: { const: "task-image" }, path: { type: "string" }, taskId: taskReference },
          additionalProperties: false,
        },
      ],
    },
    maxRunTime: { type: "integer", minimum: 1 },
    command: { type: "array", items: { type: "string" }, minItems: 1 },
    env: { type: "object", additionalProperties: { anyOf: [{ type: "string" }, taskReference] } },
    cache: stringMap,
    features: { type: "object", additionalProperties: { type: "boolean" } },
    artifacts: {
      type: "object",
      additionalProperties: {
        type: "object",
        required: ["type", "path", "expiresIn"],
        properties: {
          type: { const: "file" },
          path: { type: "string" },
          expiresIn: { type: "string" },
        },
        additionalProperties: false,
      },
    },
  },
  additionalProperties: false,
} as const;

/** Collapses the indentation of multi-line script blocks written inline in kind files. */
export function deindent(script: string): string {
  return script.replace(/\n +/g, "\n ").trim();
}

export function urlBasename(url: string): string {
  return url.slice(url.lastIndexOf("/") + 1);
}

function branchEnv(params: RunParameters): Record<string, string> {
  const env: Record<string, string> = {};
  for (const [dependency, branch] of Object.entries(params.overrides.branches)) {
    env[`${dependency.toUpperCase().replace(/[^A-Z0-9]/g, "_")}_BRANCH`] = branch;
  }
  return env;
}

function curlScript(url: string, file: string): string {
  return `
    mkdir -p $(dirname ${file})
    curl --retry 5 --connect-timeout 10 -Lf ${url} -o ${file}
  `;
}

/** The env variable holding the id of the task the n-th fetch downloads from. */
export function fetchTaskIdVariable(index: number): string {
  return `FETCH_${index + 1}_TASK_ID`;
}

function nonEmpty<T extends object>(value: T | undefined): T | undefined {
  return value && Object.keys(value).length > 0 ? value : undefined;
}

export function buildDockerWorkerPayload(
  worker: DockerWorkerDescription,
  params: RunParameters
): DockerWorkerPayload {
  const scripts = [...worker.scripts];
  const env: Record<string, string | TaskReference> = { ...branchEnv(params), ...(worker.env ?? {}) };

  // Downloads run after the checkout and before the task's own scripts.
  const fetchScripts = (worker.fetches ?? []).map((entry, i) => {
    const variable = fetchTaskIdVariable(i);
    env[variable] = { taskLabel: entry.taskLabel };
    return curlScript(
      `${ARTIFACTS_QUEUE_URL}/task/$${variable}/artifacts/public/${entry.artifact}`,
      posix.join(entry.directory ?? "", urlBasename(entry.artifact))
    );
  });
  scripts.unshift(...fetchScripts);

  if (worker.checkout) {
    env.GIT_URL = params.headRepository;
    env.GIT_REF = params.headRef;
    env.GIT_SHA = params.headRev;
    scripts.unshift(`
      cd repo
      git fetch --quiet --tags "$GIT_URL" "$GIT_REF"
      git reset --hard "$GIT_SHA"
    `);
  }

  const image: string | TaskImage =
    typeof worker.dockerImage === "string"
      ? worker.dockerImage
      : {
          type: "task-image",
          path: worker.dockerImage.path ?? DEFAULT_IMAGE_ARTIFACT,
          taskId: { taskLabel: worker.dockerImage.taskLabel },
        };

  const features: Record<string, boolean> = {};
  for (const name of worker.features ?? []) features[name] = true;

  const expiresIn = worker.artifactsExpireIn ?? DEFAULT_ARTIFACTS_EXPIRE_IN;
  const artifacts: Record<string, ArtifactSpec> = {};
  for (const path of worker.artifacts ?? []) {
    artifacts[`public/${urlBasename(path)}`] = { type: "file", path, expiresIn };
  }
  if (Object.keys(artifacts).length > 0 && !("chainOfTrust" in features)) {
    features.chainOfTrust = true;
  }

  const payload: DockerWorkerPayload = {
    image,
    maxRunTime: (worker.maxRunTimeMinutes ?? DEFAULT_MAX_RUN_TIME_MINUTES) * 60,
    command: ["/bin/bash", "--login", "-x", "-e", "-c", deindent(scripts.join("\n"))],
  };
  const nonEmptyEnv = nonEmpty(env);
  const cache = nonEmpty(worker.caches);
  const nonEmptyFeatures = nonEmpty(features);
  const nonEmptyArtifacts = nonEmpty(artifacts);
  if (nonEmptyEnv) payload.env = nonEmptyEnv;
  if (cache) payload.cache = { ...cache };
  if (nonEmptyFeatures) payload.features = nonEmptyFeatures;
  if (nonEmptyArtifacts) payload.artifacts = nonEmptyArtifacts;
  return payload;
}
