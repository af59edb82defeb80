import { pino, type Logger } from "pino";

export type { Logger };

export function createLogger(level = process.env.DECISION_LOG_LEVEL ?? "info"): Logger {
  return pino({ name: "decision-graph", level });
}
