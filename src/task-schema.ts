import type { RunParameters, TaskDescription, TaskRecord, WorkerImplementation } from "./contracts.js";
import { deepFreeze, isRecord } from "./json.js";
import { buildWorkerSpec, collectTaskReferences, DEFAULT_PROVISIONER_IDS, workerSpecSchema } from "./payloads/index.js";
import { ajv, assertValid } from "./validation.js";

/** Keys transforms read and act on; they never reach a task record. */
const TRANSIENT_KEYS = ["runOnTriggers", "shippingPhases"] as const;

const stringList = { type: "array", items: { type: "string", minLength: 1 } } as const;

export const taskRecordSchema = {
  type: "object",
  required: [
    "label",
    "kind",
    "name",
    "description",
    "schedulerId",
    "provisionerId",
    "workerType",
    "worker",
    "dependencies",
    "attributes",
    "routes",
    "scopes",
    "extra",
    "deadlineIn",
    "expiresIn",
  ],
  properties: {
    label: { type: "string", minLength: 1 },
    kind: { type: "string", minLength: 1 },
    name: { type: "string", minLength: 1 },
    description: { type: "string" },
    schedulerId: { type: "string", minLength: 1 },
    provisionerId: { type: "string", minLength: 1 },
    workerType: { type: "string", minLength: 1 },
    worker: workerSpecSchema,
    dependencies: { ...stringList, uniqueItems: true },
    attributes: { type: "object" },
    routes: stringList,
    scopes: stringList,
    extra: { type: "object" },
    deadlineIn: { type: "string", minLength: 1 },
    expiresIn: { type: "string", minLength: 1 },
    cache: {
      type: "object",
      properties: {
        indexPath: { type: "string", minLength: 1 },
        expiresIn: { type: "string", minLength: 1 },
      },
      additionalProperties: false,
    },
  },
  additionalProperties: false,
} as const;

const validateTaskRecord = ajv.compile<TaskRecord>(taskRecordSchema);

function isImplementation(value: unknown): value is WorkerImplementation {
  return typeof value === "string" && Object.hasOwn(DEFAULT_PROVISIONER_IDS, value);
}

function implementationOf(worker: unknown): WorkerImplementation | undefined {
  if (!isRecord(worker)) return undefined;
  return isImplementation(worker.implementation) ? worker.implementation : undefined;
}

/**
 * Fills defaults into a transformed task description, builds its worker
 * payload if no transform did, and validates the result. The returned
 * record's attributes are frozen.
 */
export function buildTaskRecord(description: TaskDescription, params: RunParameters): TaskRecord {
  const draft: Record<string, unknown> = { ...description };
  for (const key of TRANSIENT_KEYS) delete draft[key];

  if (isRecord(draft.worker) && !("payload" in draft.worker)) {
    draft.worker = buildWorkerSpec(draft.worker, description.label, params);
  }

  const implementation = implementationOf(draft.worker);
  const withDefaults: Record<string, unknown> = {
    name: description.label,
    description: "",
    schedulerId: "taskcluster-github",
    provisionerId: implementation ? DEFAULT_PROVISIONER_IDS[implementation] : undefined,
    dependencies: [],
    attributes: {},
    routes: [],
    scopes: [],
    extra: {},
    deadlineIn: "1 day",
    expiresIn: "1 year",
    ...draft,
  };
  for (const key of Object.keys(withDefaults)) {
    if (withDefaults[key] === undefined) delete withDefaults[key];
  }

  assertValid(validateTaskRecord, withDefaults, description.label);
  const record: TaskRecord = withDefaults;

  const dependencies = new Set(record.dependencies);
  for (const ref of collectTaskReferences(record.worker.payload)) dependencies.add(ref);

  return {
    ...record,
    dependencies: [...dependencies],
    attributes: deepFreeze({ kind: record.kind, ...record.attributes }),
  };
}
