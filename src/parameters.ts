import type { RunParameters, ShippingPhase, TriggerKind, TriggerOverrides } from "./contracts.js";
import { DecisionError } from "./errors.js";
import { deepFreeze } from "./json.js";

const FULL_CI_TAG = /\[ci full\]/i;
const SKIP_CI_TAG = /\[(?:ci skip|skip ci)\]/i;
const BRANCH_TAG = /\[branch:\s*([\w.-]+)\s*=\s*([\w./-]+)\s*\]/gi;

export function parseTriggerTitle(title: string): TriggerOverrides {
  const branches: Record<string, string> = {};
  for (const match of title.matchAll(BRANCH_TAG)) {
    branches[match[1]] = match[2];
  }
  return {
    fullCi: FULL_CI_TAG.test(title),
    skipCi: SKIP_CI_TAG.test(title),
    branches,
  };
}

/** Maps the platform's `TASK_FOR` value (plus the pushed ref) to a trigger kind. */
export function triggerKindFor(taskFor: string, ref = ""): TriggerKind {
  switch (taskFor) {
    case "github-pull-request":
    case "pull-request":
      return "pull-request";
    case "github-push":
    case "push":
      return ref.startsWith("refs/tags/") ? "tag-release" : "push";
    case "github-release":
    case "tag-release":
      return "tag-release";
    case "cron":
      return "cron";
    default:
      throw new DecisionError("invalid_trigger", `unrecognized trigger ${JSON.stringify(taskFor)}`);
  }
}

export interface RunParametersInput {
  triggerKind: TriggerKind;
  title?: string;
  buildLevel?: number;
  headRepository: string;
  headRef: string;
  headRev: string;
  owner: string;
  source: string;
  decisionTaskId: string;
  preview?: boolean;
  version?: string;
  shippingPhase?: ShippingPhase;
  targetTasksMethod?: string;
}

export function buildRunParameters(input: RunParametersInput): RunParameters {
  const buildLevel = input.buildLevel ?? 1;
  if (!Number.isInteger(buildLevel) || buildLevel < 1 || buildLevel > 3) {
    throw new DecisionError("invalid_trigger", `build level must be 1, 2 or 3, got ${buildLevel}`);
  }
  const title = input.title ?? "";
  const params: RunParameters = {
    triggerKind: input.triggerKind,
    title,
    overrides: parseTriggerTitle(title),
    buildLevel,
    trusted: buildLevel === 3,
    headRepository: input.headRepository,
    headRef: input.headRef,
    headRev: input.headRev,
    owner: input.owner,
    source: input.source,
    decisionTaskId: input.decisionTaskId,
    preview: input.preview ?? false,
    release: input.triggerKind === "tag-release",
    ...(input.version !== undefined && { version: input.version }),
    ...(input.shippingPhase !== undefined && { shippingPhase: input.shippingPhase }),
    ...(input.targetTasksMethod !== undefined && { targetTasksMethod: input.targetTasksMethod }),
  };
  return deepFreeze(params);
}

function required(env: NodeJS.ProcessEnv, name: string): string {
  const value = env[name];
  if (!value) throw new DecisionError("config_missing", `${name} is not set`);
  return value;
}

function shippingPhase(value: string | undefined): ShippingPhase | undefined {
  if (value === undefined || value === "") return undefined;
  if (value === "promote" || value === "ship") return value;
  throw new DecisionError("invalid_trigger", `unknown shipping phase ${value}`);
}

/** Reads run parameters from the variables the platform sets on a decision task. */
export function loadRunParameters(env: NodeJS.ProcessEnv = process.env): RunParameters {
  const headRef = required(env, "GIT_REF");
  return buildRunParameters({
    triggerKind: triggerKindFor(required(env, "TASK_FOR"), headRef),
    title: env.DECISION_TRIGGER_TITLE ?? "",
    buildLevel: Number(env.DECISION_BUILD_LEVEL ?? "1"),
    headRepository: required(env, "GIT_URL"),
    headRef,
    headRev: required(env, "GIT_SHA"),
    owner: required(env, "TASK_OWNER"),
    source: required(env, "TASK_SOURCE"),
    decisionTaskId: required(env, "TASK_ID"),
    preview: env.DECISION_PREVIEW === "1" || env.DECISION_PREVIEW === "true",
    version: env.DECISION_VERSION || undefined,
    shippingPhase: shippingPhase(env.DECISION_SHIPPING_PHASE),
    targetTasksMethod: env.DECISION_TARGET_TASKS_METHOD || undefined,
  });
}
