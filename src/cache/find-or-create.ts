import { createHash } from "node:crypto";
import type { ScheduledTask, TaskRecord } from "../contracts.js";
import { canonicalJson, type JsonObject } from "../json.js";
import type { DecisionRun } from "../run-context.js";
import { buildTaskDefinition, INDEX_ROUTE_PREFIX, resolvedPayload, slugId } from "../task-definition.js";

const TREE_PLACEHOLDER = /\{tree:([^}]+)\}/g;

/** `by-task-definition.<sha256>` over the worker type and the payload. */
export function defaultIndexPath(workerType: string, payload: JsonObject): string {
  const digest = createHash("sha256").update(canonicalJson([workerType, payload])).digest("hex");
  return `by-task-definition.${digest}`;
}

/** Replaces every `{tree:<dir>}` with the content identity of that directory. */
export async function expandIndexPath(run: DecisionRun, template: string): Promise<string> {
  const directories = [...new Set([...template.matchAll(TREE_PLACEHOLDER)].map((match) => match[1]))];
  const shas = new Map<string, string>();
  for (const directory of directories) shas.set(directory, await run.treeSha(directory));
  return template.replace(TREE_PLACEHOLDER, (_match, directory: string) => shas.get(directory) ?? directory);
}

/** `<indexPrefix>.<indexPath>`, hashing the payload when the task names no path. */
export async function computeIndexPath(
  run: DecisionRun,
  record: TaskRecord,
  taskIds: ReadonlyMap<string, string>
): Promise<string> {
  const path = record.cache?.indexPath
    ? await expandIndexPath(run, record.cache.indexPath)
    : defaultIndexPath(record.workerType, resolvedPayload(record, taskIds));
  return `${run.config.indexPrefix}.${path}`;
}

/** Submits `record` to the queue under a fresh task id. */
export async function createTask(
  run: DecisionRun,
  record: TaskRecord,
  taskIds: ReadonlyMap<string, string>,
  extraRoutes: readonly string[] = []
): Promise<string> {
  const taskId = slugId();
  const definition = buildTaskDefinition(record, taskIds, run, extraRoutes);
  await run.store.createTask(taskId, definition);
  run.recordTaskId(taskId);
  run.logger.info({ label: record.label, taskId }, `scheduled ${definition.metadata.name}`);
  return taskId;
}

/**
 * Reuses the task indexed under the record's index path, or creates it with
 * a route registering it there. A failed lookup is never read as a miss.
 */
export async function findOrCreate(
  run: DecisionRun,
  record: TaskRecord,
  taskIds: ReadonlyMap<string, string>
): Promise<ScheduledTask> {
  const indexPath = await computeIndexPath(run, record, taskIds);

  const cached = run.lookupIndexed(indexPath);
  if (cached !== undefined) {
    return { label: record.label, taskId: cached, status: "cached", indexPath };
  }

  const found = await run.store.findTask(indexPath);
  if (found !== undefined) {
    run.recordTaskId(found);
    run.rememberIndexed(indexPath, found);
    run.logger.info({ label: record.label, taskId: found, indexPath }, "reusing indexed task");
    return { label: record.label, taskId: found, status: "found", indexPath };
  }

  const taskId = await createTask(run, record, taskIds, [`${INDEX_ROUTE_PREFIX}${indexPath}`]);
  run.rememberIndexed(indexPath, taskId);
  return { label: record.label, taskId, status: "created", indexPath };
}
