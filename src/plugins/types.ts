import type { FastifyInstance } from "fastify";

export interface DecisionEvent {
  type: string;
  at: number;
  decisionTaskId?: string;
  label?: string;
  taskId?: string;
  detail?: Record<string, unknown>;
}

export type EmitEvent = (event: DecisionEvent) => void;

export interface DecisionPluginContext {
  emit: EmitEvent;
}

export interface DecisionPlugin {
  name: string;
  register(app: FastifyInstance, ctx: DecisionPluginContext): void;
}
