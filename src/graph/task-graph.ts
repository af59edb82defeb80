import type { TaskRecord } from "../contracts.js";
import {
  AmbiguousDependencyError,
  DecisionError,
  DependencyCycleError,
} from "../errors.js";

export type Edge = [from: string, to: string];

/**
 * Label → task mapping for one decision run. Insertion order is kept so
 * serialized graphs are stable between runs with the same inputs.
 */
export class TaskGraph {
  private readonly tasks = new Map<string, TaskRecord>();

  static fromTasks(tasks: Iterable<TaskRecord>): TaskGraph {
    const graph = new TaskGraph();
    for (const task of tasks) graph.add(task);
    return graph;
  }

  add(task: TaskRecord): void {
    if (this.tasks.has(task.label)) {
      throw new DecisionError("duplicate_label", `duplicate task label ${task.label}`, {
        label: task.label,
      });
    }
    this.tasks.set(task.label, task);
  }

  get(label: string): TaskRecord | undefined {
    return this.tasks.get(label);
  }

  has(label: string): boolean {
    return this.tasks.has(label);
  }

  get size(): number {
    return this.tasks.size;
  }

  labels(): string[] {
    return [...this.tasks.keys()];
  }

  values(): TaskRecord[] {
    return [...this.tasks.values()];
  }

  [Symbol.iterator](): IterableIterator<TaskRecord> {
    return this.tasks.values();
  }

  /** Dependency edges, dependent first. */
  edges(): Edge[] {
    const edges: Edge[] = [];
    for (const task of this.tasks.values()) {
      for (const dep of task.dependencies) edges.push([task.label, dep]);
    }
    return edges;
  }

  /**
   * Checks that every dependency resolves (to a task of this graph or to a
   * label in `resolved`) and that the graph has no cycle.
   */
  validate(resolved: ReadonlySet<string> = new Set()): void {
    for (const task of this.tasks.values()) {
      for (const dep of task.dependencies) {
        if (!this.tasks.has(dep) && !resolved.has(dep)) {
          throw new AmbiguousDependencyError(task.label, dep);
        }
      }
    }
    this.topologicalOrder();
  }

  /**
   * Dependencies before dependents. Ties are broken by label so the order
   * does not depend on insertion.
   */
  topologicalOrder(): string[] {
    const remaining = new Map<string, number>();
    const dependents = new Map<string, string[]>();

    for (const task of this.tasks.values()) {
      const internal = task.dependencies.filter((dep) => this.tasks.has(dep));
      remaining.set(task.label, new Set(internal).size);
      for (const dep of new Set(internal)) {
        const list = dependents.get(dep) ?? [];
        list.push(task.label);
        dependents.set(dep, list);
      }
    }

    const ready = [...remaining.entries()]
      .filter(([, count]) => count === 0)
      .map(([label]) => label)
      .sort();
    const order: string[] = [];

    while (ready.length > 0) {
      const label = ready.shift();
      if (label === undefined) break;
      order.push(label);

      const released: string[] = [];
      for (const dependent of dependents.get(label) ?? []) {
        const count = (remaining.get(dependent) ?? 0) - 1;
        remaining.set(dependent, count);
        if (count === 0) released.push(dependent);
      }
      if (released.length > 0) {
        ready.push(...released);
        ready.sort();
      }
    }

    if (order.length !== this.tasks.size) {
      const stuck = [...remaining.entries()]
        .filter(([, count]) => count > 0)
        .map(([label]) => label)
        .sort();
      throw new DependencyCycleError(stuck);
    }
    return order;
  }

  /** `labels` plus every task they transitively depend on. */
  transitiveClosure(labels: Iterable<string>): Set<string> {
    const closure = new Set<string>();
    const stack = [...labels];

    while (stack.length > 0) {
      const label = stack.pop();
      if (label === undefined || closure.has(label)) continue;
      const task = this.tasks.get(label);
      if (!task) throw new DecisionError("ambiguous_dependency", `unknown task label ${label}`, { label });
      closure.add(label);
      for (const dep of task.dependencies) {
        if (this.tasks.has(dep) && !closure.has(dep)) stack.push(dep);
      }
    }
    return closure;
  }

  /** The tasks whose labels are in `labels`, in this graph's order. */
  subgraph(labels: Iterable<string>): TaskGraph {
    const keep = new Set(labels);
    return TaskGraph.fromTasks([...this.tasks.values()].filter((task) => keep.has(task.label)));
  }

  toJSON(): Record<string, TaskRecord> {
    return Object.fromEntries(this.tasks);
  }
}
