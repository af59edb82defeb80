import { existsSync, readdirSync, readFileSync } from "node:fs";
import { join } from "node:path";
import * as yaml from "js-yaml";
import type { RunParameters, TaskDescription, TaskRecord } from "./contracts.js";
import { chunkGraph } from "./graph/chunking.js";
import { TaskGraph } from "./graph/task-graph.js";
import { DecisionError, DependencyCycleError } from "./errors.js";
import { isJsonObject, type JsonObject, type JsonValue } from "./json.js";
import type { Logger } from "./logger.js";
import { DOCKER_IMAGE_ATTRIBUTE, DockerImages, type DockerImageOptions } from "./payloads/docker-image.js";
import { buildTaskRecord } from "./task-schema.js";
import { createTransformRegistry, type TransformRegistry } from "./transforms/builtins.js";
import {
  createGroupingRegistry,
  fromDepsDescriptions,
  groupTasks,
  type FromDepsConfig,
  type GroupingRegistry,
} from "./transforms/from-deps.js";
import { TransformSequence, type TransformContext } from "./transforms/pipeline.js";
import { ajv, describeErrors } from "./validation.js";

export type KindLoader = "default" | "from-deps";

export interface KindConfig {
  loader?: KindLoader;
  kindDependencies?: string[];
  /** Transform names, looked up in the registry; defaults to `DEFAULT_TRANSFORMS`. */
  transforms?: string[];
  /** Deep-merged under every task of the kind. */
  taskDefaults?: JsonObject;
  tasks?: Record<string, JsonObject>;
  /** Task synthesized once per group by the from-deps loader. */
  taskTemplate?: JsonObject;
  fromDeps?: FromDepsConfig;
}

export const DEFAULT_TRANSFORMS = [
  "resolve-keyed-by",
  "run-on-triggers",
  "split-by-phase",
  "version",
  "docker-image",
  "build-payload",
] as const;

const names = { type: "array", items: { type: "string", minLength: 1 } } as const;

export const kindConfigSchema = {
  type: "object",
  properties: {
    loader: { enum: ["default", "from-deps"] },
    kindDependencies: { ...names, uniqueItems: true },
    transforms: names,
    taskDefaults: { type: "object" },
    tasks: { type: "object", additionalProperties: { type: "object" } },
    taskTemplate: { type: "object" },
    fromDeps: {
      type: "object",
      properties: {
        kinds: names,
        groupBy: { type: "string", minLength: 1 },
        attribute: { type: "string", minLength: 1 },
        allValue: { type: "string", minLength: 1 },
        withAttributes: { type: "object" },
        copyAttributes: { type: "boolean" },
      },
      additionalProperties: false,
    },
  },
  additionalProperties: false,
} as const;

const validateKindConfig = ajv.compile<KindConfig>(kindConfigSchema);

export function parseKindConfig(kind: string, source: unknown): KindConfig {
  const config = source ?? {};
  if (!validateKindConfig(config)) {
    const { field, detail } = describeErrors(validateKindConfig.errors);
    throw new DecisionError("kind_config_invalid", `kind ${kind}: ${field || "/"} ${detail}`);
  }
  if (config.loader === "from-deps" && !config.fromDeps) {
    throw new DecisionError("kind_config_invalid", `kind ${kind}: the from-deps loader needs a fromDeps section`);
  }
  return config;
}

/** Reads `<dir>/<kind>/kind.yml` for every kind directory, sorted by kind name. */
export function loadKinds(dir: string): Map<string, KindConfig> {
  if (!existsSync(dir)) {
    throw new DecisionError("config_missing", `kinds directory ${dir} does not exist`);
  }
  const kinds = new Map<string, KindConfig>();
  const entries = readdirSync(dir, { withFileTypes: true })
    .filter((entry) => entry.isDirectory())
    .map((entry) => entry.name)
    .sort();
  for (const kind of entries) {
    const file = join(dir, kind, "kind.yml");
    if (!existsSync(file)) continue;
    let source: unknown;
    try {
      source = yaml.load(readFileSync(file, "utf8"));
    } catch (err) {
      throw new DecisionError("kind_config_invalid", `kind ${kind}: ${file} is not valid YAML`, { cause: err });
    }
    kinds.set(kind, parseKindConfig(kind, source));
  }
  return kinds;
}

function dependenciesOf(config: KindConfig | undefined): string[] {
  return [...new Set([...(config?.kindDependencies ?? []), ...(config?.fromDeps?.kinds ?? [])])];
}

/** Kind names with every kind after the kinds it depends on; ties broken by name. */
export function orderKinds(kinds: ReadonlyMap<string, KindConfig>): string[] {
  for (const [kind, config] of kinds) {
    for (const dep of dependenciesOf(config)) {
      if (!kinds.has(dep)) {
        throw new DecisionError("kind_config_invalid", `kind ${kind} depends on unknown kind ${dep}`);
      }
    }
  }

  const order: string[] = [];
  const done = new Set<string>();
  let pending = [...kinds.keys()].sort();
  while (pending.length > 0) {
    const ready = pending.filter((kind) =>
      dependenciesOf(kinds.get(kind)).every((dep) => done.has(dep))
    );
    if (ready.length === 0) throw new DependencyCycleError(pending);
    for (const kind of ready) {
      order.push(kind);
      done.add(kind);
    }
    pending = pending.filter((kind) => !done.has(kind));
  }
  return order;
}

/** Objects merge key by key; anything else in `override` replaces `base`. */
export function mergeDefaults(base: JsonValue, override: JsonValue): JsonValue {
  if (!isJsonObject(base) || !isJsonObject(override)) return structuredClone(override);
  const out: JsonObject = structuredClone(base);
  for (const [key, value] of Object.entries(override)) {
    const current = out[key];
    out[key] = current === undefined ? structuredClone(value) : mergeDefaults(current, value);
  }
  return out;
}

function mergeObjects(base: JsonObject, override: JsonObject): JsonObject {
  const merged = mergeDefaults(base, override);
  return isJsonObject(merged) ? merged : override;
}

export interface GenerateOptions {
  kinds: ReadonlyMap<string, KindConfig>;
  params: RunParameters;
  maxDependencies: number;
  logger: Logger;
  transforms?: TransformRegistry;
  groupings?: GroupingRegistry;
  /** Enables `worker.dockerfile`. */
  dockerImages?: DockerImageOptions;
}

function sequenceFor(kind: string, config: KindConfig, registry: TransformRegistry): TransformSequence {
  let sequence = new TransformSequence();
  for (const name of config.transforms ?? DEFAULT_TRANSFORMS) {
    const transform = registry.get(name);
    if (!transform) {
      throw new DecisionError("unknown_transform", `kind ${kind} names unknown transform ${name}`);
    }
    sequence = sequence.add(name, transform);
  }
  return sequence;
}

function describeKind(
  kind: string,
  config: KindConfig,
  built: ReadonlyMap<string, readonly TaskRecord[]>,
  groupings: GroupingRegistry
): TaskDescription[] {
  const defaults = config.taskDefaults ?? {};

  if (config.loader === "from-deps" && config.fromDeps) {
    const sources = config.fromDeps.kinds ?? config.kindDependencies ?? [];
    const upstream = sources
      .flatMap((source) => built.get(source) ?? [])
      .filter((task) => task.attributes[DOCKER_IMAGE_ATTRIBUTE] === undefined);
    const groups = groupTasks(config.fromDeps, upstream, groupings);
    return fromDepsDescriptions(kind, mergeObjects(defaults, config.taskTemplate ?? {}), config.fromDeps, groups);
  }

  return Object.entries(config.tasks ?? {}).map(([name, task]) => {
    const merged = mergeObjects(defaults, task);
    return {
      ...merged,
      name: typeof merged.name === "string" ? merged.name : name,
      label: typeof merged.label === "string" ? merged.label : `${kind}-${name}`,
      kind,
    };
  });
}

/**
 * Runs every kind's loader and transforms in dependency order, builds and
 * validates the records, chunks oversized fan-ins, and returns the full
 * candidate graph for the run.
 */
export function generateFullTaskGraph(options: GenerateOptions): TaskGraph {
  const registry = options.transforms ?? createTransformRegistry();
  const groupings = options.groupings ?? createGroupingRegistry();
  const dockerImages = options.dockerImages ? new DockerImages(options.dockerImages) : undefined;
  const built = new Map<string, TaskRecord[]>();

  for (const kind of orderKinds(options.kinds)) {
    const config = options.kinds.get(kind) ?? {};
    const sequence = sequenceFor(kind, config, registry);
    const context: TransformContext = {
      kind,
      config,
      params: options.params,
      kindDependencies: new Map(
        (config.kindDependencies ?? []).map((dep) => [dep, built.get(dep) ?? []])
      ),
      logger: options.logger.child({ kind }),
      dockerImages,
    };

    const descriptions = sequence.run(context, describeKind(kind, config, built, groupings));
    const records = descriptions.map((description) => buildTaskRecord(description, options.params));
    built.set(kind, records);
    options.logger.debug({ kind, tasks: records.length }, "kind loaded");
  }

  const graph = TaskGraph.fromTasks(chunkGraph([...built.values()].flat(), options.maxDependencies));
  graph.validate();
  return graph;
}
