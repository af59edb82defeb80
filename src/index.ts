export * from "./contracts.js";
export * from "./errors.js";
export * from "./json.js";
export { loadConfig, type DecisionConfig, type StoreKind } from "./config.js";
export { createLogger, type Logger } from "./logger.js";
export { buildRunParameters, loadRunParameters, parseTriggerTitle, triggerKindFor } from "./parameters.js";
export type { RunParametersInput } from "./parameters.js";
export { TaskGraph, type Edge } from "./graph/task-graph.js";
export { chunkDependencies, chunkGraph } from "./graph/chunking.js";
export { buildTaskRecord, taskRecordSchema } from "./task-schema.js";
export { buildWorkerSpec, collectTaskReferences, resolveTaskReferences } from "./payloads/index.js";
export type { WorkerDescription } from "./payloads/index.js";
export {
  DOCKER_IMAGE_ATTRIBUTE,
  DockerImages,
  dockerfileDigest,
  expandDockerfile,
  type DockerImageOptions,
} from "./payloads/docker-image.js";
export { TransformSequence } from "./transforms/pipeline.js";
export type { NamedTransform, Transform, TransformContext } from "./transforms/pipeline.js";
export { BUILTIN_TRANSFORMS, createTransformRegistry, type TransformRegistry } from "./transforms/builtins.js";
export { resolveKeyedBy, resolveKeyedByDeep } from "./transforms/keyed-by.js";
export {
  createGroupingRegistry,
  fromDepsDescriptions,
  groupTasks,
  type FromDepsConfig,
  type GroupingFunction,
  type GroupingRegistry,
  type TaskGroup,
} from "./transforms/from-deps.js";
export {
  DEFAULT_TRANSFORMS,
  generateFullTaskGraph,
  loadKinds,
  orderKinds,
  parseKindConfig,
  type GenerateOptions,
  type KindConfig,
} from "./loader.js";
export { DecisionRun, gitTreeSha, type DecisionRunOptions, type TreeShaProvider } from "./run-context.js";
export { buildTaskDefinition, fromNow, indexAndArtifactsExpireIn, slugId } from "./task-definition.js";
export { computeIndexPath, createTask, defaultIndexPath, findOrCreate } from "./cache/find-or-create.js";
export {
  BUILTIN_STRATEGIES,
  createStrategyRegistry,
  nightlyIndexPath,
  type SelectionContext,
  type StrategyRegistry,
  type TargetTasksStrategy,
} from "./target/strategies.js";
export { chooseStrategy, selectTargetTasks, type TargetSelection } from "./target/select.js";
export { runDecision, submitGraph, type DecisionOptions, type DecisionResult } from "./decision.js";
export { createStore, InMemoryQueueIndexStore, type QueueIndexStore } from "./persistence.js";
export { RedisQueueIndexStore } from "./persistence/redis-adapter.js";
export { HttpQueueIndexStore, type FetchLike } from "./persistence/http-adapter.js";
export { buildFullTaskGraph, writeChainOfTrust } from "./chain-of-trust.js";
export { buildDecisionService, type DecisionServiceOptions } from "./decision-service.js";
export { runDecisionTask } from "./decision-task.js";
