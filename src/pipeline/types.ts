/**
 * Pipeline types: turn identity, reply chunks, stage outcomes.
 */

import type { PipelineErrorCode } from "../errors";
import type { CognitiveState } from "../state/schema";

export interface TurnContext {
  sessionId: string;
  /** Sequence number of the turn being processed (1-based). */
  turn: number;
}

export type ReplyChunk =
  | { kind: "text"; text: string }
  /** Terminal: nothing follows an error chunk. */
  | { kind: "error"; code: PipelineErrorCode; message: string };

export type CompressionOutcome =
  | { kind: "compressed"; state: CognitiveState; attempts: number }
  /** Prior state carried forward with a note in uncertainty_signal. */
  | { kind: "fallback"; state: CognitiveState; attempts: number; reason: string };
