import { execFile } from "node:child_process";
import { promisify } from "node:util";
import type { RunParameters } from "./contracts.js";
import type { DecisionConfig } from "./config.js";
import { DecisionError } from "./errors.js";
import type { Logger } from "./logger.js";
import type { QueueIndexStore } from "./persistence.js";

const execFileAsync = promisify(execFile);

/** Content identity of a source directory, e.g. its git tree sha. */
export type TreeShaProvider = (directory: string) => Promise<string>;

export function gitTreeSha(cwd?: string): TreeShaProvider {
  return async (directory) => {
    try {
      const { stdout } = await execFileAsync("git", ["rev-parse", `HEAD:${directory}`], { cwd });
      return stdout.trim();
    } catch (err) {
      throw new DecisionError("config_missing", `cannot resolve tree sha of ${directory}`, { cause: err });
    }
  };
}

export interface DecisionRunOptions {
  config: DecisionConfig;
  params: RunParameters;
  store: QueueIndexStore;
  logger: Logger;
  now?: Date;
  treeSha?: TreeShaProvider;
}

/**
 * State of one decision run: the clock every offset is measured from, the
 * index paths already found or created, and every task id the run scheduled
 * or reused. Never shared between runs.
 */
export class DecisionRun {
  readonly config: DecisionConfig;
  readonly params: RunParameters;
  readonly store: QueueIndexStore;
  readonly logger: Logger;
  readonly now: Date;

  private readonly foundOrCreated = new Map<string, string>();
  private readonly taskIds: string[] = [];
  private readonly treeShas = new Map<string, Promise<string>>();
  private readonly treeShaProvider: TreeShaProvider;

  constructor(options: DecisionRunOptions) {
    this.config = options.config;
    this.params = options.params;
    this.store = options.store;
    this.now = options.now ?? new Date();
    this.logger = options.logger.child({ decisionTaskId: options.params.decisionTaskId });
    this.treeShaProvider = options.treeSha ?? gitTreeSha();
  }

  lookupIndexed(indexPath: string): string | undefined {
    return this.foundOrCreated.get(indexPath);
  }

  rememberIndexed(indexPath: string, taskId: string): void {
    this.foundOrCreated.set(indexPath, taskId);
  }

  recordTaskId(taskId: string): void {
    if (!this.taskIds.includes(taskId)) this.taskIds.push(taskId);
  }

  get allTaskIds(): readonly string[] {
    return this.taskIds;
  }

  treeSha(directory: string): Promise<string> {
    let sha = this.treeShas.get(directory);
    if (!sha) {
      sha = this.treeShaProvider(directory);
      this.treeShas.set(directory, sha);
    }
    return sha;
  }
}
