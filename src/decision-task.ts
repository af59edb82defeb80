import { writeChainOfTrust } from "./chain-of-trust.js";
import { loadConfig, type DecisionConfig } from "./config.js";
import type { RunParameters } from "./contracts.js";
import { runDecision, type DecisionResult } from "./decision.js";
import { loadKinds } from "./loader.js";
import { createLogger, type Logger } from "./logger.js";
import { loadRunParameters } from "./parameters.js";
import { createStore, type QueueIndexStore } from "./persistence.js";
import { DecisionRun, type TreeShaProvider } from "./run-context.js";

export interface DecisionTaskOptions {
  config: DecisionConfig;
  params: RunParameters;
  store: QueueIndexStore;
  logger: Logger;
  treeSha?: TreeShaProvider;
  now?: Date;
}

/**
 * One decision run from the kinds directory. Outside preview runs, the
 * chain-of-trust files describing every task of the run are written to the
 * artifacts directory.
 */
export async function runDecisionTask(options: DecisionTaskOptions): Promise<DecisionResult> {
  const run = new DecisionRun(options);
  const result = await runDecision(run, { kinds: loadKinds(options.config.kindsDir) });
  if (!options.params.preview) {
    await writeChainOfTrust(options.config.artifactsDir, options.store, run.allTaskIds, options.params);
  }
  return result;
}

async function main(): Promise<void> {
  const config = loadConfig();
  const logger = createLogger(config.logLevel);
  const result = await runDecisionTask({
    config,
    params: loadRunParameters(),
    store: createStore(config),
    logger,
  });
  logger.info(
    { strategy: result.strategy, scheduled: result.scheduled.length, tasks: result.fullGraph.size },
    "decision complete"
  );
}

if (import.meta.url === `file://${process.argv[1]}`) {
  main().catch((err) => {
    console.error(err);
    process.exit(1);
  });
}
