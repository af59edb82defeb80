import type { BeetmoverPayload, SigningPayload, UpstreamArtifact } from "../contracts.js";

export interface UpstreamArtifactDescription {
  taskLabel: string;
  taskType?: string;
  paths: string[];
  formats?: string[];
}

export interface SigningDescription {
  implementation: "scriptworker-signing";
  maxRunTimeMinutes?: number;
  upstreamArtifacts: UpstreamArtifactDescription[];
}

export interface BeetmoverDescription {
  implementation: "scriptworker-beetmover";
  maxRunTimeMinutes?: number;
  appName: string;
  appVersion: string;
  artifactId: string;
  upstreamArtifacts: UpstreamArtifactDescription[];
}

const upstreamArtifactDescription = {
  type: "object",
  required: ["taskLabel", "paths"],
  properties: {
    taskLabel: { type: "string", minLength: 1 },
    taskType: { type: "string" },
    paths: { type: "array", items: { type: "string" }, minItems: 1 },
    formats: { type: "array", items: { type: "string" } },
  },
  additionalProperties: false,
} as const;

const upstreamArtifact = {
  type: "object",
  required: ["taskId", "taskType", "paths"],
  properties: {
    taskId: {
      type: "object",
      required: ["taskLabel"],
      properties: { taskLabel: { type: "string", minLength: 1 } },
      additionalProperties: false,
    },
    taskType: { type: "string" },
    paths: { type: "array", items: { type: "string" }, minItems: 1 },
    formats: { type: "array", items: { type: "string" } },
  },
  additionalProperties: false,
} as const;

export const signingDescriptionSchema = {
  type: "object",
  required: ["implementation", "upstreamArtifacts"],
  properties: {
    implementation: { const: "scriptworker-signing" },
    maxRunTimeMinutes: { type: "integer", minimum: 1 },
    upstreamArtifacts: { type: "array", items: upstreamArtifactDescription, minItems: 1 },
  },
  additionalProperties: false,
} as const;

export const beetmoverDescriptionSchema = {
  type: "object",
  required: ["implementation", "appName", "appVersion", "artifactId", "upstreamArtifacts"],
  properties: {
    implementation: { const: "scriptworker-beetmover" },
    maxRunTimeMinutes: { type: "integer", minimum: 1 },
    appName: { type: "string", minLength: 1 },
    appVersion: { type: "string", minLength: 1 },
    artifactId: { type: "string", minLength: 1 },
    upstreamArtifacts: { type: "array", items: upstreamArtifactDescription, minItems: 1 },
  },
  additionalProperties: false,
} as const;

export const signingPayloadSchema = {
  type: "object",
  required: ["maxRunTime", "upstreamArtifacts"],
  properties: {
    maxRunTime: { type: "integer", minimum: 1 },
    upstreamArtifacts: { type: "array", items: upstreamArtifact, minItems: 1 },
  },
  additionalProperties: false,
} as const;

export const beetmoverPayloadSchema = {
  type: "object",
  required: ["maxRunTime", "features", "releaseProperties", "upstreamArtifacts", "version", "artifactId"],
  properties: {
    maxRunTime: { type: "integer", minimum: 1 },
    features: {
      type: "object",
      required: ["chainOfTrust"],
      properties: { chainOfTrust: { const: true } },
      additionalProperties: false,
    },
    releaseProperties: {
      type: "object",
      required: ["appName"],
      properties: { appName: { type: "string" } },
      additionalProperties: false,
    },
    upstreamArtifacts: { type: "array", items: upstreamArtifact, minItems: 1 },
    version: { type: "string" },
    artifactId: { type: "string" },
  },
  additionalProperties: false,
} as const;

function upstream(artifacts: UpstreamArtifactDescription[], defaultType: string): UpstreamArtifact[] {
  return artifacts.map((artifact) => {
    const out: UpstreamArtifact = {
      taskId: { taskLabel: artifact.taskLabel },
      taskType: artifact.taskType ?? defaultType,
      paths: [...artifact.paths],
    };
    if (artifact.formats?.length) out.formats = [...artifact.formats];
    return out;
  });
}

export function buildSigningPayload(worker: SigningDescription): SigningPayload {
  return {
    maxRunTime: (worker.maxRunTimeMinutes ?? 10) * 60,
    upstreamArtifacts: upstream(worker.upstreamArtifacts, "build"),
  };
}

export function buildBeetmoverPayload(worker: BeetmoverDescription): BeetmoverPayload {
  return {
    maxRunTime: (worker.maxRunTimeMinutes ?? 10) * 60,
    features: { chainOfTrust: true },
    releaseProperties: { appName: worker.appName },
    upstreamArtifacts: upstream(worker.upstreamArtifacts, "signing"),
    version: worker.appVersion,
    artifactId: worker.artifactId,
  };
}
