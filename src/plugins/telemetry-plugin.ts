import type { FastifyInstance } from "fastify";
import type { DecisionEvent, DecisionPlugin, DecisionPluginContext } from "./types.js";

export interface TelemetrySnapshot {
  counters: Record<string, number>;
  events: DecisionEvent[];
}

export interface TelemetryPlugin extends DecisionPlugin {
  snapshot(): TelemetrySnapshot;
}

/** Counts requests and decision events, keeping the latest `maxEvents` of them. */
export function createTelemetryPlugin(options: { maxEvents?: number } = {}): TelemetryPlugin {
  const maxEvents = options.maxEvents ?? 200;
  const counters = new Map<string, number>();
  const events: DecisionEvent[] = [];

  const increment = (key: string) => counters.set(key, (counters.get(key) ?? 0) + 1);
  const snapshot = (): TelemetrySnapshot => ({
    counters: Object.fromEntries(counters),
    events: [...events],
  });

  return {
    name: "telemetry",
    snapshot,
    register(app: FastifyInstance, ctx: DecisionPluginContext) {
      app.addHook("onResponse", async (req, reply) => {
        increment("http.requests.total");
        increment(`http.status.${reply.statusCode}`);
        increment(`http.route.${req.method}:${req.routeOptions.url}`);
      });

      const originalEmit = ctx.emit;
      ctx.emit = (event) => {
        increment(`event.${event.type}`);
        events.push(event);
        if (events.length > maxEvents) events.shift();
        originalEmit(event);
      };

      app.get("/v1/plugins/telemetry", async () => ({
        ok: true,
        plugin: "telemetry",
        ...snapshot(),
      }));
    },
  };
}
