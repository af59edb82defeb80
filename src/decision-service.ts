import Fastify from "fastify";
import type { FastifyInstance } from "fastify";
import { loadConfig, type DecisionConfig } from "./config.js";
import { runDecision } from "./decision.js";
import { DecisionError } from "./errors.js";
import { createLogger } from "./logger.js";
import { loadKinds, parseKindConfig, type KindConfig } from "./loader.js";
import { buildRunParameters, type RunParametersInput } from "./parameters.js";
import { createStore, type QueueIndexStore } from "./persistence.js";
import type { DecisionEvent, DecisionPlugin, DecisionPluginContext } from "./plugins/types.js";
import { createTelemetryPlugin } from "./plugins/telemetry-plugin.js";
import { DecisionRun, type TreeShaProvider } from "./run-context.js";
import type { StrategyRegistry } from "./target/strategies.js";
import type { TransformRegistry } from "./transforms/builtins.js";
import { ajv } from "./validation.js";

interface DecisionRequest {
  parameters: RunParametersInput;
  /** Inline kind definitions; the configured kinds directory is read when absent. */
  kinds?: Record<string, unknown>;
}

const decisionRequestSchema = {
  type: "object",
  required: ["parameters"],
  properties: {
    parameters: {
      type: "object",
      required: ["triggerKind", "headRepository", "headRef", "headRev", "owner", "source", "decisionTaskId"],
      properties: {
        triggerKind: { enum: ["pull-request", "push", "tag-release", "cron"] },
        title: { type: "string" },
        buildLevel: { type: "integer" },
        headRepository: { type: "string" },
        headRef: { type: "string" },
        headRev: { type: "string" },
        owner: { type: "string" },
        source: { type: "string" },
        decisionTaskId: { type: "string", minLength: 1 },
        preview: { type: "boolean" },
        version: { type: "string" },
        shippingPhase: { enum: ["promote", "ship"] },
        targetTasksMethod: { type: "string" },
      },
      additionalProperties: false,
    },
    kinds: { type: "object" },
  },
  additionalProperties: false,
} as const;

const validateDecisionRequest = ajv.compile<DecisionRequest>(decisionRequestSchema);

export interface DecisionServiceOptions {
  config?: DecisionConfig;
  store?: QueueIndexStore;
  plugins?: DecisionPlugin[];
  transforms?: TransformRegistry;
  strategies?: StrategyRegistry;
  treeSha?: TreeShaProvider;
}

function kindsFrom(body: DecisionRequest, config: DecisionConfig): Map<string, KindConfig> {
  if (!body.kinds) return loadKinds(config.kindsDir);
  return new Map(
    Object.keys(body.kinds)
      .sort()
      .map((kind): [string, KindConfig] => [kind, parseKindConfig(kind, body.kinds?.[kind])])
  );
}

export function buildDecisionService(options: DecisionServiceOptions = {}): FastifyInstance {
  const config = options.config ?? loadConfig();
  const store = options.store ?? createStore(config);
  const app = Fastify({ logger: { level: config.logLevel } });
  const logger = createLogger(config.logLevel);

  const ctx: DecisionPluginContext = {
    emit(_event: DecisionEvent) {},
  };
  const plugins = options.plugins ?? [createTelemetryPlugin()];
  for (const plugin of plugins) {
    plugin.register(app, ctx);
  }

  app.setErrorHandler((err, req, reply) => {
    if (err instanceof DecisionError) {
      req.log.warn({ code: err.code, label: err.label }, err.message);
      return reply.code(400).send({ ok: false, error: err.code, message: err.message });
    }
    if (err.statusCode !== undefined && err.statusCode < 500) {
      return reply.code(err.statusCode).send({ ok: false, error: "invalid_request", message: err.message });
    }
    req.log.error(err);
    return reply.code(500).send({ ok: false, error: "internal_error", message: err.message });
  });

  app.get("/health", async () => ({ ok: true }));

  app.post("/v1/decisions", async (req, reply) => {
    const body: unknown = req.body;
    if (!validateDecisionRequest(body)) {
      const first = validateDecisionRequest.errors?.[0];
      return reply.code(400).send({
        ok: false,
        error: "invalid_request",
        message: `${first?.instancePath || "/"} ${first?.message ?? "is invalid"}`,
      });
    }

    const params = buildRunParameters(body.parameters);
    const run = new DecisionRun({
      config,
      params,
      store,
      logger: logger.child({ reqId: req.id }),
      treeSha: options.treeSha,
    });
    const result = await runDecision(run, {
      kinds: kindsFrom(body, config),
      transforms: options.transforms,
      strategies: options.strategies,
      emit: (event) => ctx.emit(event),
    });

    return {
      ok: true,
      decisionTaskId: params.decisionTaskId,
      strategy: result.strategy,
      preview: params.preview,
      fullTaskGraph: result.fullGraph.labels(),
      targetTasks: result.targetGraph.labels(),
      scheduled: result.scheduled,
    };
  });

  app.get<{ Params: { taskId: string } }>("/v1/tasks/:taskId", async (req, reply) => {
    const task = await store.getTask(req.params.taskId);
    if (!task) return reply.code(404).send({ ok: false, error: "task_not_found" });
    return { ok: true, taskId: req.params.taskId, task };
  });

  app.get<{ Params: { indexPath: string } }>("/v1/index/:indexPath", async (req, reply) => {
    const taskId = await store.findTask(req.params.indexPath);
    if (taskId === undefined) return reply.code(404).send({ ok: false, error: "not_indexed" });
    return { ok: true, indexPath: req.params.indexPath, taskId };
  });

  return app;
}

export async function startDecisionService() {
  const config = loadConfig();
  const app = buildDecisionService({ config });
  await app.listen({ host: config.host, port: config.port });
  app.log.info(`decision service listening on http://${config.host}:${config.port}`);
  return app;
}

if (import.meta.url === `file://${process.argv[1]}`) {
  startDecisionService().catch((err) => {
    console.error(err);
    process.exit(1);
  });
}

