import type { RunParameters } from "../contracts.js";
import { DecisionError } from "../errors.js";
import type { TaskGraph } from "../graph/task-graph.js";
import type { SelectionContext, StrategyRegistry } from "./strategies.js";

export function chooseStrategy(params: RunParameters): string {
  if (params.targetTasksMethod) return params.targetTasksMethod;
  if (params.overrides.skipCi) return "skip";
  if (params.shippingPhase) return params.shippingPhase;
  if (params.triggerKind === "tag-release") return "release";
  if (params.triggerKind === "cron") return "nightly";
  if (params.overrides.fullCi) return "full";
  return "normal";
}

export interface TargetSelection {
  strategy: string;
  /** Labels the strategy picked. */
  targets: string[];
  /** Targets plus everything they transitively depend on, in graph order. */
  labels: string[];
  graph: TaskGraph;
}

export async function selectTargetTasks(
  graph: TaskGraph,
  params: RunParameters,
  strategies: StrategyRegistry,
  context: SelectionContext
): Promise<TargetSelection> {
  const name = chooseStrategy(params);
  const strategy = strategies.get(name);
  if (!strategy) {
    throw new DecisionError(
      "unknown_strategy",
      `unknown target tasks method ${name}; known: ${[...strategies.keys()].sort().join(", ")}`
    );
  }

  const targets = await strategy.select(graph, params, context);
  const closure = graph.transitiveClosure(targets);
  const selected = graph.subgraph(closure);
  context.logger.info(
    { strategy: name, targets: targets.length, tasks: selected.size },
    "target tasks selected"
  );
  return { strategy: name, targets, labels: selected.labels(), graph: selected };
}
