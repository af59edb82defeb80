import type { TaskRecord } from "../contracts.js";
import { ChunkingOverflowError, DecisionError } from "../errors.js";
import { deepFreeze, type JsonObject } from "../json.js";
import { collectTaskReferences } from "../payloads/index.js";

const NOTIFY_ROUTE_PREFIX = "notify.";
const INDEX_ROUTE_PREFIX = "index.";

function chunkSuffix(level: number, index: number): string {
  return level === 0 ? `deps-${index + 1}` : `deps-${level + 1}-${index + 1}`;
}

function stripNotify(extra: JsonObject): JsonObject {
  const { notify: _notify, ...rest } = extra;
  return structuredClone(rest);
}

function chunkChild(parent: TaskRecord, suffix: string, dependencies: string[]): TaskRecord {
  return {
    label: `${parent.label}-${suffix}`,
    kind: parent.kind,
    name: `${parent.name}-${suffix}`,
    description: `Dependency fan-in ${suffix} of ${parent.label}`,
    schedulerId: parent.schedulerId,
    provisionerId: "built-in",
    workerType: "succeed",
    worker: { implementation: "built-in", payload: {} },
    dependencies,
    attributes: deepFreeze({ ...structuredClone(parent.attributes), "chunk-of": parent.label }),
    routes: parent.routes.filter(
      (route) => !route.startsWith(NOTIFY_ROUTE_PREFIX) && !route.startsWith(INDEX_ROUTE_PREFIX)
    ),
    scopes: [],
    extra: stripNotify(parent.extra),
    deadlineIn: parent.deadlineIn,
    expiresIn: parent.expiresIn,
  };
}

/**
 * Splits the dependencies of `task` over synthetic `built-in/succeed` tasks
 * holding at most `max` of them each. Returns the chunk tasks followed by the
 * rewritten parent, or `[task]` when it is within the limit. Slices are taken
 * over the sorted dependency list, so the same inputs chunk the same way.
 *
 * Labels the payload references stay direct dependencies of the parent, and
 * only the rest is chunked into the room they leave.
 */
export function chunkDependencies(task: TaskRecord, max: number): TaskRecord[] {
  if (!Number.isInteger(max) || max < 2) {
    throw new DecisionError("config_missing", `maximum dependency count must be at least 2, got ${max}`);
  }
  const unique = [...new Set(task.dependencies)].sort();
  if (unique.length <= max) return [task];

  const references = collectTaskReferences(task.worker.payload);
  const direct = unique.filter((label) => references.has(label));
  let pending = unique.filter((label) => !references.has(label));
  const room = max - direct.length;
  if (room < 1) {
    throw new ChunkingOverflowError(task.label, direct.length + (pending.length > 0 ? 1 : 0), max);
  }

  const chunks: TaskRecord[] = [];
  // More chunks than fit get chunked again, one level up.
  for (let level = 0; pending.length > room; level++) {
    const next: string[] = [];
    for (let start = 0; start < pending.length; start += max) {
      const slice = pending.slice(start, start + max);
      const child = chunkChild(task, chunkSuffix(level, next.length), slice);
      if (child.dependencies.length > max) {
        throw new ChunkingOverflowError(child.label, child.dependencies.length, max);
      }
      chunks.push(child);
      next.push(child.label);
    }
    pending = next;
  }

  return [...chunks, { ...task, dependencies: [...direct, ...pending] }];
}

/** Applies `chunkDependencies` to every task, keeping chunk tasks ahead of their parent. */
export function chunkGraph(tasks: Iterable<TaskRecord>, max: number): TaskRecord[] {
  const out: TaskRecord[] = [];
  for (const task of tasks) out.push(...chunkDependencies(task, max));
  return out;
}
