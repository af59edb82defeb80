import { mkdir, writeFile } from "node:fs/promises";
import { join } from "node:path";
import * as yaml from "js-yaml";
import type { RunParameters, TaskDefinition } from "./contracts.js";
import { DecisionError } from "./errors.js";
import { toJsonValue } from "./json.js";
import type { QueueIndexStore } from "./persistence.js";

export type FullTaskGraph = Record<string, { task: TaskDefinition }>;

/** Task id → definition, as the queue holds it, for every task of the run. */
export async function buildFullTaskGraph(
  store: QueueIndexStore,
  taskIds: readonly string[]
): Promise<FullTaskGraph> {
  const graph: FullTaskGraph = {};
  for (const taskId of taskIds) {
    const task = await store.getTask(taskId);
    if (!task) {
      throw new DecisionError("queue_request_failed", `task ${taskId} of this run is unknown to the queue`);
    }
    graph[taskId] = { task };
  }
  return graph;
}

export function renderParameters(params: RunParameters): string {
  return yaml.dump(toJsonValue(params), { sortKeys: true });
}

/**
 * Writes the files chain-of-trust verification reads from the decision
 * task: `task-graph.json`, `actions.json` and `parameters.yml`.
 */
export async function writeChainOfTrust(
  dir: string,
  store: QueueIndexStore,
  taskIds: readonly string[],
  params: RunParameters
): Promise<FullTaskGraph> {
  const graph = await buildFullTaskGraph(store, taskIds);
  await mkdir(dir, { recursive: true });
  await writeFile(join(dir, "task-graph.json"), `${JSON.stringify(graph, null, 2)}\n`);
  await writeFile(join(dir, "actions.json"), "{}\n");
  await writeFile(join(dir, "parameters.yml"), renderParameters(params));
  return graph;
}
