import type { RunParameters, TaskRecord } from "../contracts.js";
import type { TaskGraph } from "../graph/task-graph.js";
import type { Logger } from "../logger.js";
import type { QueueIndexStore } from "../persistence.js";

export interface SelectionContext {
  readonly store: QueueIndexStore;
  readonly indexPrefix: string;
  readonly logger: Logger;
}

export interface TargetTasksStrategy {
  readonly description: string;
  select(graph: TaskGraph, params: RunParameters, context: SelectionContext): Promise<string[]>;
}

export type StrategyRegistry = ReadonlyMap<string, TargetTasksStrategy>;

export const RUN_ON_NORMAL_CI = "run-on-normal-ci";
export const RUN_ON_FULL_CI = "run-on-full-ci";
export const RELEASE_ONLY = "release-only";
export const SHIPPING_PHASE = "shipping-phase";

/** Index path a cron decision registers itself under for its head revision. */
export function nightlyIndexPath(indexPrefix: string, headRev: string): string {
  return `${indexPrefix}.nightly.revision.${headRev}`;
}

function filterTasks(graph: TaskGraph, keep: (task: TaskRecord) => boolean): string[] {
  return graph.values().filter(keep).map((task) => task.label);
}

function ciFilter(optOut: string): (task: TaskRecord, params: RunParameters) => boolean {
  return (task, params) => {
    if (task.attributes[optOut] === false) return false;
    if (task.attributes[RELEASE_ONLY] === true && params.triggerKind !== "tag-release") return false;
    return true;
  };
}

function phaseFilter(phase: string): (task: TaskRecord) => boolean {
  return (task) => task.attributes[SHIPPING_PHASE] === phase;
}

const skip: TargetTasksStrategy = {
  description: "Select nothing.",
  async select() {
    return [];
  },
};

const normal: TargetTasksStrategy = {
  description: "Tasks that have not opted out of normal CI.",
  async select(graph, params) {
    const keep = ciFilter(RUN_ON_NORMAL_CI);
    return filterTasks(graph, (task) => keep(task, params));
  },
};

const full: TargetTasksStrategy = {
  description: "Tasks that have not opted out of full CI.",
  async select(graph, params) {
    const keep = ciFilter(RUN_ON_FULL_CI);
    return filterTasks(graph, (task) => keep(task, params));
  },
};

const release: TargetTasksStrategy = {
  description: "Every task, unless a nightly decision already ran for this revision.",
  async select(graph, params, context) {
    if (params.triggerKind === "cron") {
      const path = nightlyIndexPath(context.indexPrefix, params.headRev);
      const previous = await context.store.findTask(path);
      if (previous !== undefined) {
        context.logger.info({ headRev: params.headRev, previous }, "nightly already ran for this revision");
        return [];
      }
    }
    return graph.labels();
  },
};

const promote: TargetTasksStrategy = {
  description: "Tasks of the promote shipping phase.",
  async select(graph) {
    return filterTasks(graph, phaseFilter("promote"));
  },
};

const ship: TargetTasksStrategy = {
  description: "Tasks of the ship shipping phase, plus the promote selection.",
  async select(graph, params, context) {
    const promoted = await promote.select(graph, params, context);
    return [...new Set([...promoted, ...filterTasks(graph, phaseFilter("ship"))])];
  },
};

export const BUILTIN_STRATEGIES: Readonly<Record<string, TargetTasksStrategy>> = {
  skip,
  normal,
  full,
  release,
  nightly: release,
  promote,
  ship,
};

/** Built-in strategies plus project-specific ones; later entries win. */
export function createStrategyRegistry(extra: Record<string, TargetTasksStrategy> = {}): StrategyRegistry {
  return new Map(Object.entries({ ...BUILTIN_STRATEGIES, ...extra }));
}
