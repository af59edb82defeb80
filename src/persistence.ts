import type { DecisionConfig } from "./config.js";
import type { TaskDefinition } from "./contracts.js";
import { QueueRequestError } from "./errors.js";
import { canonicalJson } from "./json.js";
import { HttpQueueIndexStore } from "./persistence/http-adapter.js";
import { RedisQueueIndexStore } from "./persistence/redis-adapter.js";
import { indexPathsOf } from "./task-definition.js";

/**
 * The remote queue and index a decision run submits to. `findTask` resolves
 * to `undefined` only for a confirmed absence; any other failure rejects.
 */
export interface QueueIndexStore {
  createTask(taskId: string, definition: TaskDefinition): Promise<void>;
  getTask(taskId: string): Promise<TaskDefinition | undefined>;
  findTask(indexPath: string): Promise<string | undefined>;
  insertTask(indexPath: string, taskId: string): Promise<void>;
}

/**
 * Process-local queue and index. Created tasks are indexed under their
 * `index.` routes straight away, as if they had already succeeded.
 */
export class InMemoryQueueIndexStore implements QueueIndexStore {
  private tasks = new Map<string, TaskDefinition>();
  private index = new Map<string, string>();

  async createTask(taskId: string, definition: TaskDefinition): Promise<void> {
    const existing = this.tasks.get(taskId);
    if (existing) {
      if (canonicalJson(existing) === canonicalJson(definition)) return;
      throw new QueueRequestError("createTask", `task ${taskId} already exists with a different definition`, {
        status: 409,
      });
    }
    this.tasks.set(taskId, structuredClone(definition));
    for (const path of indexPathsOf(definition)) this.index.set(path, taskId);
  }

  async getTask(taskId: string): Promise<TaskDefinition | undefined> {
    const task = this.tasks.get(taskId);
    return task ? structuredClone(task) : undefined;
  }

  async findTask(indexPath: string): Promise<string | undefined> {
    return this.index.get(indexPath);
  }

  async insertTask(indexPath: string, taskId: string): Promise<void> {
    this.index.set(indexPath, taskId);
  }

  listTaskIds(): string[] {
    return [...this.tasks.keys()];
  }
}

export function createStore(
  config: Pick<DecisionConfig, "store" | "redisUrl" | "queueUrl" | "indexUrl">
): QueueIndexStore {
  switch (config.store) {
    case "redis":
      return new RedisQueueIndexStore(config.redisUrl);
    case "http":
      return new HttpQueueIndexStore({ queueUrl: config.queueUrl, indexUrl: config.indexUrl });
    case "memory":
      return new InMemoryQueueIndexStore();
  }
}
