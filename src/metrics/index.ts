/**
 * Per-turn pipeline metrics. Logged as TURN_METRICS; the most recent turn's record is kept for inspection.
 */

import { logger } from "../logging";

/** Last turn timing (ms) and stage counts. */
export interface TurnMetrics {
  sessionId?: string;
  turn?: number;
  /** Time spent waiting for the previous turn's finalize slot. */
  finalizeWaitMs?: number;
  recallMs?: number;
  qualifyMs?: number;
  compressMs?: number;
  /** Turn start to first reply chunk (primary KPI). */
  firstChunkMs?: number;
  replyMs?: number;
  candidates?: number;
  qualified?: number;
  compressionAttempts?: number;
  compressionFallback?: boolean;
  replyChars?: number;
  replyOutcome?: "complete" | "error" | "cancelled";
}

let lastTurnMetrics: TurnMetrics = {};

export function recordTurnMetrics(metrics: TurnMetrics): void {
  lastTurnMetrics = { ...metrics };
  logger.info(
    {
      event: "TURN_METRICS",
      session_id: metrics.sessionId,
      turn: metrics.turn,
      finalize_wait_ms: metrics.finalizeWaitMs,
      recall_ms: metrics.recallMs,
      qualify_ms: metrics.qualifyMs,
      compress_ms: metrics.compressMs,
      first_chunk_ms: metrics.firstChunkMs,
      reply_ms: metrics.replyMs,
      candidates: metrics.candidates,
      qualified: metrics.qualified,
      compression_attempts: metrics.compressionAttempts,
      compression_fallback: metrics.compressionFallback,
      reply_chars: metrics.replyChars,
      reply_outcome: metrics.replyOutcome,
    },
    "Turn metrics"
  );
}

export function getLastTurnMetrics(): TurnMetrics {
  return { ...lastTurnMetrics };
}
