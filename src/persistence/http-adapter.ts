import type { TaskDefinition } from "../contracts.js";
import { IndexLookupError, QueueRequestError } from "../errors.js";
import { isRecord } from "../json.js";
import type { QueueIndexStore } from "../persistence.js";
import { parseTaskDefinition } from "../task-definition.js";

export type FetchLike = typeof fetch;

export interface HttpStoreOptions {
  queueUrl: string;
  indexUrl: string;
  fetch?: FetchLike;
  /** Expiry written with `insertTask` registrations. */
  indexExpires?: () => string;
}

function reason(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

function trimSlash(url: string): string {
  return url.replace(/\/+$/, "");
}

/**
 * Queue and index REST services (`/task/<taskId>`, `/task/<indexPath>`).
 * A 404 from the index is the only answer read as "not indexed".
 */
export class HttpQueueIndexStore implements QueueIndexStore {
  private readonly queueUrl: string;
  private readonly indexUrl: string;
  private readonly fetch: FetchLike;
  private readonly indexExpires: () => string;

  constructor(options: HttpStoreOptions) {
    this.queueUrl = trimSlash(options.queueUrl);
    this.indexUrl = trimSlash(options.indexUrl);
    this.fetch = options.fetch ?? ((input, init) => fetch(input, init));
    this.indexExpires =
      options.indexExpires ?? (() => new Date(Date.now() + 365 * 24 * 3_600_000).toISOString());
  }

  private async request(url: string, init: { method?: string; body?: string } = {}): Promise<Response> {
    return this.fetch(url, { ...init, headers: { "content-type": "application/json" } });
  }

  async createTask(taskId: string, definition: TaskDefinition): Promise<void> {
    let res: Response;
    try {
      res = await this.request(`${this.queueUrl}/task/${encodeURIComponent(taskId)}`, {
        method: "PUT",
        body: JSON.stringify(definition),
      });
    } catch (err) {
      throw new QueueRequestError("createTask", reason(err), { cause: err });
    }
    if (!res.ok) {
      const text = await res.text();
      throw new QueueRequestError("createTask", `HTTP ${res.status} ${res.statusText}: ${text}`, {
        status: res.status,
      });
    }
  }

  async getTask(taskId: string): Promise<TaskDefinition | undefined> {
    let res: Response;
    try {
      res = await this.request(`${this.queueUrl}/task/${encodeURIComponent(taskId)}`);
    } catch (err) {
      throw new QueueRequestError("getTask", reason(err), { cause: err });
    }
    if (res.status === 404) return undefined;
    if (!res.ok) {
      const text = await res.text();
      throw new QueueRequestError("getTask", `HTTP ${res.status} ${res.statusText}: ${text}`, {
        status: res.status,
      });
    }
    return parseTaskDefinition(await res.json(), taskId);
  }

  async findTask(indexPath: string): Promise<string | undefined> {
    let res: Response;
    try {
      res = await this.request(`${this.indexUrl}/task/${indexPath}`);
    } catch (err) {
      throw new IndexLookupError(indexPath, reason(err), { cause: err });
    }
    if (res.status === 404) return undefined;
    if (!res.ok) {
      const text = await res.text();
      throw new IndexLookupError(indexPath, `HTTP ${res.status} ${res.statusText}: ${text}`, {
        status: res.status,
      });
    }
    const body: unknown = await res.json();
    if (!isRecord(body) || typeof body.taskId !== "string") {
      throw new IndexLookupError(indexPath, "response has no taskId", { status: res.status });
    }
    return body.taskId;
  }

  async insertTask(indexPath: string, taskId: string): Promise<void> {
    let res: Response;
    try {
      res = await this.request(`${this.indexUrl}/task/${indexPath}`, {
        method: "PUT",
        body: JSON.stringify({ taskId, rank: 0, data: {}, expires: this.indexExpires() }),
      });
    } catch (err) {
      throw new IndexLookupError(indexPath, reason(err), { cause: err });
    }
    if (!res.ok) {
      const text = await res.text();
      throw new IndexLookupError(indexPath, `HTTP ${res.status} ${res.statusText}: ${text}`, {
        status: res.status,
      });
    }
  }
}
