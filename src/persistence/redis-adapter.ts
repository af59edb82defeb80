import { Redis } from "ioredis";
import type { TaskDefinition } from "../contracts.js";
import { IndexLookupError, QueueRequestError } from "../errors.js";
import { canonicalJson } from "../json.js";
import type { QueueIndexStore } from "../persistence.js";
import { indexPathsOf, parseTaskDefinition } from "../task-definition.js";

function reason(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export class RedisQueueIndexStore implements QueueIndexStore {
  private readonly redis: Redis;
  private readonly keyPrefix: string;

  constructor(redisOrUrl: Redis | string, options: { keyPrefix?: string } = {}) {
    this.redis = typeof redisOrUrl === "string" ? new Redis(redisOrUrl) : redisOrUrl;
    this.keyPrefix = options.keyPrefix ?? "";
  }

  private taskKey(taskId: string): string {
    return `${this.keyPrefix}task:${taskId}`;
  }

  private indexKey(indexPath: string): string {
    return `${this.keyPrefix}index:${indexPath}`;
  }

  // ── Queue ────────────────────────────────────────────────────────────────

  async createTask(taskId: string, definition: TaskDefinition): Promise<void> {
    const body = JSON.stringify(definition);
    let created: string | null;
    try {
      created = await this.redis.set(this.taskKey(taskId), body, "NX");
    } catch (err) {
      throw new QueueRequestError("createTask", reason(err), { cause: err });
    }

    if (created === null) {
      const existing = await this.getTask(taskId);
      if (!existing || canonicalJson(existing) !== canonicalJson(definition)) {
        throw new QueueRequestError("createTask", `task ${taskId} already exists with a different definition`, {
          status: 409,
        });
      }
      return;
    }

    await this.redis.sadd(`${this.keyPrefix}tasks`, taskId);
    for (const path of indexPathsOf(definition)) {
      await this.redis.set(this.indexKey(path), taskId);
    }
  }

  async getTask(taskId: string): Promise<TaskDefinition | undefined> {
    let raw: string | null;
    try {
      raw = await this.redis.get(this.taskKey(taskId));
    } catch (err) {
      throw new QueueRequestError("getTask", reason(err), { cause: err });
    }
    if (raw === null) return undefined;
    return parseTaskDefinition(JSON.parse(raw), taskId);
  }

  async listTaskIds(): Promise<string[]> {
    const ids = await this.redis.smembers(`${this.keyPrefix}tasks`);
    return ids.sort();
  }

  // ── Index ────────────────────────────────────────────────────────────────

  async findTask(indexPath: string): Promise<string | undefined> {
    try {
      const taskId = await this.redis.get(this.indexKey(indexPath));
      return taskId ?? undefined;
    } catch (err) {
      throw new IndexLookupError(indexPath, reason(err), { cause: err });
    }
  }

  async insertTask(indexPath: string, taskId: string): Promise<void> {
    await this.redis.set(this.indexKey(indexPath), taskId);
  }

  async close(): Promise<void> {
    await this.redis.quit();
  }
}
