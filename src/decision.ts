import type { ScheduledTask } from "./contracts.js";
import { createTask, findOrCreate } from "./cache/find-or-create.js";
import type { TaskGraph } from "./graph/task-graph.js";
import { generateFullTaskGraph, type KindConfig } from "./loader.js";
import type { EmitEvent } from "./plugins/types.js";
import type { DecisionRun } from "./run-context.js";
import { selectTargetTasks } from "./target/select.js";
import { createStrategyRegistry, nightlyIndexPath, type StrategyRegistry } from "./target/strategies.js";
import type { TransformRegistry } from "./transforms/builtins.js";
import type { GroupingRegistry } from "./transforms/from-deps.js";

export interface DecisionOptions {
  kinds: ReadonlyMap<string, KindConfig>;
  transforms?: TransformRegistry;
  groupings?: GroupingRegistry;
  strategies?: StrategyRegistry;
  emit?: EmitEvent;
}

export interface DecisionResult {
  strategy: string;
  fullGraph: TaskGraph;
  targetGraph: TaskGraph;
  /** Empty when the run is a preview. */
  scheduled: ScheduledTask[];
}

/**
 * Submits `graph` in topological order, so every task's dependencies have
 * task ids before it is submitted. Tasks with a cache section go through
 * find-or-create; the rest are always created.
 */
export async function submitGraph(
  run: DecisionRun,
  graph: TaskGraph,
  emit: EmitEvent = () => {}
): Promise<ScheduledTask[]> {
  const taskIds = new Map<string, string>();
  const scheduled: ScheduledTask[] = [];

  for (const label of graph.topologicalOrder()) {
    const record = graph.get(label);
    if (!record) continue;
    const result: ScheduledTask = record.cache
      ? await findOrCreate(run, record, taskIds)
      : { label, taskId: await createTask(run, record, taskIds), status: "created" };
    taskIds.set(label, result.taskId);
    scheduled.push(result);
    emit({
      type: `task.${result.status}`,
      at: Date.now(),
      decisionTaskId: run.params.decisionTaskId,
      label,
      taskId: result.taskId,
    });
  }
  return scheduled;
}

/** Generates the full graph, selects the target tasks and submits them. */
export async function runDecision(run: DecisionRun, options: DecisionOptions): Promise<DecisionResult> {
  const emit = options.emit ?? (() => {});
  const { params, config } = run;
  emit({ type: "decision.started", at: Date.now(), decisionTaskId: params.decisionTaskId });

  const fullGraph = generateFullTaskGraph({
    kinds: options.kinds,
    params,
    maxDependencies: config.maxDependencies,
    logger: run.logger,
    transforms: options.transforms,
    groupings: options.groupings,
    dockerImages: {
      kindsDir: config.kindsDir,
      expiresIn: config.dockerImagesExpireIn,
      builderImage: config.dockerImageBuilder,
      workerType: config.dockerImageBuildWorkerType,
    },
  });
  run.logger.info({ tasks: fullGraph.size }, "full task graph generated");

  const selection = await selectTargetTasks(fullGraph, params, options.strategies ?? createStrategyRegistry(), {
    store: run.store,
    indexPrefix: config.indexPrefix,
    logger: run.logger,
  });

  let scheduled: ScheduledTask[] = [];
  if (params.preview) {
    run.logger.info({ tasks: selection.labels }, "preview run, nothing submitted");
  } else {
    scheduled = await submitGraph(run, selection.graph, emit);
    if (params.triggerKind === "cron" && selection.targets.length > 0) {
      await run.store.insertTask(nightlyIndexPath(config.indexPrefix, params.headRev), params.decisionTaskId);
    }
  }

  emit({
    type: "decision.completed",
    at: Date.now(),
    decisionTaskId: params.decisionTaskId,
    detail: { strategy: selection.strategy, scheduled: scheduled.length, preview: params.preview },
  });
  return { strategy: selection.strategy, fullGraph, targetGraph: selection.graph, scheduled };
}
