/**
 * Entry point: load config, wire adapters and the turn controller, serve HTTP.
 * Without provider keys the stub LLM and hashing embedder are used, so the server still runs offline.
 */

import { loadConfig } from "./config";
import { createLLM } from "./adapters/llm";
import { createKnowledgeStore } from "./adapters/knowledge";
import { FileReflectiveLog } from "./memory/reflective-log";
import { FileLongTermMemory } from "./memory/long-term-memory";
import { loadInstructions } from "./prompts/instructions";
import { createController } from "./pipeline/controller";
import { startServer } from "./server";
import { logger, logError, setStageTrace } from "./logging";

async function main(): Promise<void> {
  const config = loadConfig();
  setStageTrace(config.debug);

  const llm = createLLM(config);
  const knowledge = createKnowledgeStore(config);
  const instructions = loadInstructions(config.instructionsDir);
  const reflectiveLog = new FileReflectiveLog(config.reflectiveLogDir);
  const longTermMemory = new FileLongTermMemory(config.longTermMemoryFile);
  const controller = createController(config, { llm, knowledge, reflectiveLog, longTermMemory, instructions });

  logger.info(
    {
      event: "AGENT_CONFIG",
      provider: config.llm.provider,
      embedder: config.knowledge.embedder,
      namespace: config.knowledge.namespace,
      artifacts: await knowledge.size(),
      debug: config.debug,
    },
    "Agent configured"
  );

  const server = startServer(controller, config.server.port);

  let sweepInterval: ReturnType<typeof setInterval> | null = null;
  if (config.sessions.idleEvictMs > 0) {
    sweepInterval = setInterval(() => {
      const evicted = controller.store.sweepIdle(config.sessions.idleEvictMs);
      if (evicted.length > 0) {
        logger.info({ event: "SESSIONS_EVICTED", count: evicted.length, remaining: controller.store.size() }, "Idle sessions evicted");
      }
    }, config.sessions.sweepIntervalMs);
    sweepInterval.unref();
  }

  let shuttingDown = false;
  const shutdown = async (signal: string): Promise<void> => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info({ event: "SHUTDOWN", signal }, "Shutting down; draining finalize queue");
    if (sweepInterval) clearInterval(sweepInterval);
    server.close();
    await controller.drain();
    process.exit(0);
  };
  for (const signal of ["SIGINT", "SIGTERM"] as const) {
    process.on(signal, () => {
      shutdown(signal).catch((err: unknown) => {
        logError(logger, err instanceof Error ? err : new Error(String(err)), { event: "SHUTDOWN_FAILED" });
        process.exit(1);
      });
    });
  }
}

main().catch((err: unknown) => {
  logError(logger, err instanceof Error ? err : new Error(String(err)));
  process.exit(1);
});
