/**
 * Structured logging for the turn pipeline.
 * Logs stage outcomes, LLM calls, turn events, and errors with timestamps. JSON output for shipping.
 *
 * Env:
 *   LOG_LEVEL   - silent | debug | info | warn | error (default: info; silent under NODE_ENV=test)
 *   LOG_FILE    - If set, append all logs to this path (creates dirs if needed).
 *   ACC_DEBUG   - true enables per-stage trace output (prompts and intermediate results).
 */

import pino from "pino";

export type LogLevel = "silent" | "debug" | "info" | "warn" | "error";

const LOG_LEVELS: readonly LogLevel[] = ["silent", "debug", "info", "warn", "error"];

export interface LoggerConfig {
  level?: LogLevel;
  pretty?: boolean;
}

function parseLevel(raw: string | undefined): LogLevel | undefined {
  const v = raw?.trim().toLowerCase();
  return LOG_LEVELS.find((l) => l === v);
}

const isTest = process.env.NODE_ENV === "test";

const defaultConfig: LoggerConfig = {
  level: parseLevel(process.env.LOG_LEVEL) ?? (isTest ? "silent" : "info"),
  pretty: process.env.NODE_ENV !== "production" && !isTest,
};

export function createLogger(config: LoggerConfig = {}): pino.Logger {
  const opts: pino.LoggerOptions = {
    level: config.level ?? defaultConfig.level,
    base: undefined,
    timestamp: pino.stdTimeFunctions.isoTime,
  };
  const pretty = config.pretty ?? defaultConfig.pretty;
  const logFile = process.env.LOG_FILE?.trim();

  const streams: pino.StreamEntry[] = [];
  if (pretty) {
    streams.push({
      stream: pino.transport({ target: "pino-pretty", options: { colorize: true } }),
    });
  } else {
    streams.push({ stream: process.stdout });
  }
  if (logFile) {
    streams.push({
      stream: pino.destination({ dest: logFile, append: true, mkdir: true }),
    });
  }

  if (streams.length === 1) {
    return pino(opts, streams[0].stream);
  }
  return pino(opts, pino.multistream(streams));
}

export const logger = createLogger();

let traceEnabled = process.env.ACC_DEBUG?.trim().toLowerCase() === "true";

/** Toggle per-stage trace output at runtime (config.debug wins over the env default). */
export function setStageTrace(enabled: boolean): void {
  traceEnabled = enabled;
}

export function isStageTraceEnabled(): boolean {
  return traceEnabled;
}

export type TraceStage = "recall" | "qualify" | "compress" | "reply" | "finalize";

/**
 * Emit a stage's intermediate output for inspection. No-op unless tracing is on.
 * Logged at info so traces survive the default level.
 */
export function logStageTrace(
  log: pino.Logger,
  stage: TraceStage,
  payload: { sessionId: string; turn: number; input?: unknown; output?: unknown }
): void {
  if (!traceEnabled) return;
  log.info({ event: "STAGE_TRACE", stage, ...payload }, `Trace: ${stage}`);
}

/** Log LLM request/response (summary only). */
export function logLlmCall(
  log: pino.Logger,
  label: string,
  messageCount: number,
  responseLength: number,
  durationMs?: number
): void {
  log.debug({ event: "LLM_CALL", label, messageCount, responseLength, durationMs }, "LLM completed");
}

/** Log turn start/end. */
export function logTurn(log: pino.Logger, phase: "start" | "end", sessionId: string, turn: number): void {
  log.info({ event: "TURN", phase, sessionId, turn }, phase === "start" ? "Turn start" : "Turn end");
}

/** Log error. */
export function logError(log: pino.Logger, err: Error, context?: Record<string, unknown>): void {
  log.error({ err: err.message, stack: err.stack, ...context }, "Error");
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
