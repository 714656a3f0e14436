/**
 * Env-based configuration.
 * Load from .env.local (or process.env). Do not commit secrets.
 */

import * as path from "path";
import { config as loadEnv } from "dotenv";
import { DEFAULT_STATE_BOUNDS, type StateBounds } from "../state/schema";

// Load .env.local from project root when not set
const envPath = path.resolve(process.cwd(), ".env.local");
loadEnv({ path: envPath });

export type LlmProvider = "openai" | "anthropic" | "stub";
export type EmbedderKind = "openai" | "hashing";

export interface PipelineConfig {
  /** Recall fan-out (top-K). */
  recallTopK: number;
  /** Per-capability-call timeouts (ms). */
  timeouts: {
    recallMs: number;
    qualifyMs: number;
    compressMs: number;
    replyMs: number;
    finalizeMs: number;
  };
  /** Repair attempts after the first invalid compression (total attempts = 1 + this). */
  compressRepairRetries: number;
  /** Extra finalize attempts before the turn's consolidation is abandoned. */
  finalizeRetries: number;
  finalizeRetryBackoffMs: number;
  maxFactsPerTurn: number;
  /** Characters of artifact text handed past the Qualifier as a digest. */
  digestChars: number;
  replyMaxTokens: number;
  replyTemperature: number;
  /** Most recent long-term memory characters shown to the Compressor. */
  longTermMemoryChars: number;
}

export interface AppConfig {
  /** LLM provider and options */
  llm: {
    provider: LlmProvider;
    openaiApiKey?: string;
    openaiModel?: string;
    openaiBaseUrl?: string;
    anthropicApiKey?: string;
    anthropicModel?: string;
  };

  /** Long-term knowledge store */
  knowledge: {
    embedder: EmbedderKind;
    embeddingModel?: string;
    /** Directory for JSONL persistence. Unset = memory only. */
    dataDir?: string;
    /** Identity/namespace the store and logs are partitioned by. */
    namespace: string;
  };

  state: StateBounds;

  pipeline: PipelineConfig;

  sessions: {
    /** Evict sessions idle longer than this (ms). 0 disables the sweep. */
    idleEvictMs: number;
    sweepIntervalMs: number;
  };

  server: {
    port: number;
  };

  /** Directory holding SOUL.md / USER.md / AGENTS.md. */
  instructionsDir: string;
  /** Directory for per-session reflective logs. */
  reflectiveLogDir: string;
  /** Markdown file of facts remembered across sessions. */
  longTermMemoryFile: string;
  /** Emit per-stage intermediate outputs. */
  debug: boolean;
}

export const DEFAULT_PIPELINE_CONFIG: PipelineConfig = {
  recallTopK: 3,
  timeouts: {
    recallMs: 5_000,
    qualifyMs: 15_000,
    compressMs: 30_000,
    replyMs: 60_000,
    finalizeMs: 30_000,
  },
  compressRepairRetries: 1,
  finalizeRetries: 1,
  finalizeRetryBackoffMs: 500,
  maxFactsPerTurn: 5,
  digestChars: 280,
  replyMaxTokens: 1024,
  replyTemperature: 0.7,
  longTermMemoryChars: 2_000,
};

function getEnv(key: string, defaultValue?: string): string | undefined {
  const v = process.env[key];
  if (v === undefined || v === "") return defaultValue;
  return v.trim();
}

/** Non-negative integer from env; anything unparseable or negative yields the default. */
function getEnvInt(key: string, defaultValue: number): number {
  const v = getEnv(key);
  if (v === undefined) return defaultValue;
  const n = parseInt(v, 10);
  return Number.isNaN(n) || n < 0 ? defaultValue : n;
}

function getEnvFloat(key: string, defaultValue: number): number {
  const v = getEnv(key);
  if (v === undefined) return defaultValue;
  const n = parseFloat(v);
  return Number.isNaN(n) || n < 0 ? defaultValue : n;
}

function getEnvBool(key: string, defaultValue: boolean): boolean {
  const v = getEnv(key)?.toLowerCase();
  if (v === undefined) return defaultValue;
  return v === "true" || v === "1";
}

function parseProvider(v: string | undefined): LlmProvider {
  return v === "anthropic" || v === "stub" ? v : "openai";
}

/**
 * Build config from environment variables.
 * LLM_PROVIDER selects the language model adapter (openai, anthropic, stub); EMBEDDER the
 * knowledge store's embedder (openai, hashing).
 */
export function loadConfig(): AppConfig {
  const namespace = getEnv("ACC_NAMESPACE") || "default";
  const instructionsDir = getEnv("INSTRUCTIONS_DIR") || path.join("agent-settings", namespace);
  const d = DEFAULT_PIPELINE_CONFIG;
  const b = DEFAULT_STATE_BOUNDS;

  return {
    llm: {
      provider: parseProvider(getEnv("LLM_PROVIDER")?.toLowerCase()),
      openaiApiKey: getEnv("OPENAI_API_KEY"),
      openaiModel: getEnv("OPENAI_MODEL_NAME") || "gpt-4o-mini",
      openaiBaseUrl: getEnv("OPENAI_BASE_URL"),
      anthropicApiKey: getEnv("ANTHROPIC_API_KEY"),
      anthropicModel: getEnv("ANTHROPIC_MODEL_NAME") || "claude-3-5-sonnet-20241022",
    },
    knowledge: {
      embedder: getEnv("EMBEDDER")?.toLowerCase() === "openai" ? "openai" : "hashing",
      embeddingModel: getEnv("EMBEDDING_MODEL_NAME"),
      dataDir: getEnv("KNOWLEDGE_DATA_DIR"),
      namespace,
    },
    state: {
      episodicTraceChars: getEnvInt("STATE_EPISODIC_TRACE_CHARS", b.episodicTraceChars),
      semanticGistChars: getEnvInt("STATE_SEMANTIC_GIST_CHARS", b.semanticGistChars),
      goalChars: getEnvInt("STATE_GOAL_CHARS", b.goalChars),
      predictiveCueChars: getEnvInt("STATE_PREDICTIVE_CUE_CHARS", b.predictiveCueChars),
      uncertaintyChars: getEnvInt("STATE_UNCERTAINTY_CHARS", b.uncertaintyChars),
      maxFocalEntities: getEnvInt("STATE_MAX_FOCAL_ENTITIES", b.maxFocalEntities),
      maxRelationalMap: getEnvInt("STATE_MAX_RELATIONAL_MAP", b.maxRelationalMap),
      maxConstraints: getEnvInt("STATE_MAX_CONSTRAINTS", b.maxConstraints),
      maxRetrievedArtifacts: getEnvInt("STATE_MAX_RETRIEVED_ARTIFACTS", b.maxRetrievedArtifacts),
      entryChars: getEnvInt("STATE_ENTRY_CHARS", b.entryChars),
    },
    pipeline: {
      recallTopK: getEnvInt("RECALL_TOP_K", d.recallTopK),
      timeouts: {
        recallMs: getEnvInt("RECALL_TIMEOUT_MS", d.timeouts.recallMs),
        qualifyMs: getEnvInt("QUALIFY_TIMEOUT_MS", d.timeouts.qualifyMs),
        compressMs: getEnvInt("COMPRESS_TIMEOUT_MS", d.timeouts.compressMs),
        replyMs: getEnvInt("REPLY_TIMEOUT_MS", d.timeouts.replyMs),
        finalizeMs: getEnvInt("FINALIZE_TIMEOUT_MS", d.timeouts.finalizeMs),
      },
      compressRepairRetries: getEnvInt("COMPRESS_REPAIR_RETRIES", d.compressRepairRetries),
      finalizeRetries: getEnvInt("FINALIZE_RETRIES", d.finalizeRetries),
      finalizeRetryBackoffMs: getEnvInt("FINALIZE_RETRY_BACKOFF_MS", d.finalizeRetryBackoffMs),
      maxFactsPerTurn: getEnvInt("MAX_FACTS_PER_TURN", d.maxFactsPerTurn),
      digestChars: getEnvInt("ARTIFACT_DIGEST_CHARS", d.digestChars),
      replyMaxTokens: getEnvInt("REPLY_MAX_TOKENS", d.replyMaxTokens),
      replyTemperature: getEnvFloat("REPLY_TEMPERATURE", d.replyTemperature),
      longTermMemoryChars: getEnvInt("LONG_TERM_MEMORY_PROMPT_CHARS", d.longTermMemoryChars),
    },
    sessions: {
      idleEvictMs: getEnvInt("SESSION_IDLE_EVICT_MS", 0),
      sweepIntervalMs: getEnvInt("SESSION_SWEEP_INTERVAL_MS", 60_000),
    },
    server: {
      port: getEnvInt("PORT", 8000),
    },
    instructionsDir,
    reflectiveLogDir: getEnv("REFLECTIVE_LOG_DIR") || path.join("data", "reflective", namespace),
    longTermMemoryFile: getEnv("LONG_TERM_MEMORY_FILE") || path.join(instructionsDir, "MEMORY.md"),
    debug: getEnvBool("ACC_DEBUG", false),
  };
}
