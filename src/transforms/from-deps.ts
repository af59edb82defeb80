import type { AttributeValue, TaskDescription, TaskRecord } from "../contracts.js";
import { DecisionError } from "../errors.js";
import { canonicalJson, deepFreeze, isRecord, toJsonValue, type JsonObject } from "../json.js";

export const DEFAULT_GROUP_ATTRIBUTE = "component";
export const DEFAULT_ALL_VALUE = "all";

export interface FromDepsConfig {
  /** Kinds to take upstream tasks from; defaults to the kind's `kindDependencies`. */
  kinds?: string[];
  groupBy?: string;
  attribute?: string;
  /** Tasks keyed with this value join every group instead of forming their own. */
  allValue?: string;
  withAttributes?: Record<string, AttributeValue>;
  /** Copy the attributes of the group's first keyed task into the downstream task. */
  copyAttributes?: boolean;
}

export interface TaskGroup {
  key: string;
  tasks: TaskRecord[];
}

/** Returns the grouping key of a task, or `undefined` to leave it out. */
export type GroupingFunction = (task: TaskRecord, config: FromDepsConfig) => string | undefined;

export type GroupingRegistry = ReadonlyMap<string, GroupingFunction>;

function attributeKey(task: TaskRecord, config: FromDepsConfig): string | undefined {
  const value = task.attributes[config.attribute ?? DEFAULT_GROUP_ATTRIBUTE];
  if (typeof value === "string") return value;
  if (typeof value === "number" || typeof value === "boolean") return String(value);
  return undefined;
}

export function createGroupingRegistry(extra: Record<string, GroupingFunction> = {}): GroupingRegistry {
  return new Map(
    Object.entries({
      attribute: attributeKey,
      single: (task: TaskRecord) => task.label,
      kind: (task: TaskRecord) => task.kind,
      ...extra,
    })
  );
}

function copyTask(task: TaskRecord): TaskRecord {
  const copy = structuredClone(task);
  return { ...copy, attributes: deepFreeze(copy.attributes) };
}

function matchesAttributes(task: TaskRecord, wanted: Record<string, AttributeValue> | undefined): boolean {
  if (!wanted) return true;
  return Object.entries(wanted).every(
    ([name, value]) => name in task.attributes && canonicalJson(task.attributes[name]) === canonicalJson(value)
  );
}

/**
 * Groups upstream tasks by key. Tasks keyed with the reserved all-value are
 * added to every group; a group without any keyed task is not formed. Group
 * members are copies, since one upstream task may sit in several groups.
 */
export function groupTasks(
  config: FromDepsConfig,
  upstream: readonly TaskRecord[],
  groupings: GroupingRegistry = createGroupingRegistry()
): TaskGroup[] {
  const groupBy = config.groupBy ?? "attribute";
  const keyOf = groupings.get(groupBy);
  if (!keyOf) {
    throw new DecisionError("kind_config_invalid", `unknown from-deps grouping ${groupBy}`);
  }
  const allValue = config.allValue ?? DEFAULT_ALL_VALUE;

  const keyed = new Map<string, TaskRecord[]>();
  const everywhere: TaskRecord[] = [];
  for (const task of upstream) {
    if (!matchesAttributes(task, config.withAttributes)) continue;
    const key = keyOf(task, config);
    if (key === undefined) continue;
    if (key === allValue) {
      everywhere.push(task);
      continue;
    }
    const members = keyed.get(key) ?? [];
    members.push(task);
    keyed.set(key, members);
  }

  return [...keyed.entries()].map(([key, members]) => ({
    key,
    tasks: [...members, ...everywhere].map(copyTask),
  }));
}

/**
 * One downstream description per group, built from the kind's template:
 * label `<kind>-<key>`, depending on exactly the group's tasks.
 */
export function fromDepsDescriptions(
  kind: string,
  template: JsonObject,
  config: FromDepsConfig,
  groups: readonly TaskGroup[]
): TaskDescription[] {
  const attribute = config.attribute ?? DEFAULT_GROUP_ATTRIBUTE;
  const allValue = config.allValue ?? DEFAULT_ALL_VALUE;

  return groups.map((group) => {
    const primary = group.tasks.find((task) => attributeKey(task, config) !== allValue);
    const inherited: JsonObject = {};
    if (config.copyAttributes && primary) {
      for (const [name, value] of Object.entries(primary.attributes)) {
        if (name !== "kind") inherited[name] = toJsonValue(value);
      }
    }
    const own = isRecord(template.attributes) ? template.attributes : {};
    return {
      ...structuredClone(template),
      label: `${kind}-${group.key}`,
      kind,
      name: group.key,
      dependencies: group.tasks.map((task) => task.label),
      attributes: { ...inherited, ...structuredClone(own), [attribute]: group.key },
    };
  });
}
