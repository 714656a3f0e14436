/**
 * Finalizer: background consolidation of a completed turn.
 * Extracts durable facts into the knowledge store and long-term memory, records an episodic
 * digest of the exchange, and appends to the session's reflective log.
 *
 * A failed attempt is retried `retries` times with linear backoff, then abandoned. Work already
 * done by an earlier attempt (extraction, individual writes) is not repeated on retry.
 */

import { z } from "zod";
import type { ILLM } from "../adapters/llm";
import { parseStructured } from "../adapters/llm";
import type { Artifact, IKnowledgeStore } from "../adapters/knowledge";
import { originTurnRef } from "../adapters/knowledge";
import type { IReflectiveLog } from "../memory/reflective-log";
import type { ILongTermMemory } from "../memory/long-term-memory";
import type { PromptManager } from "../prompts/prompt-manager";
import type { CognitiveState } from "../state/schema";
import type { TurnContext } from "./types";
import { CapabilityTimeoutError, ConsolidationFailureError } from "../errors";
import { logger, logStageTrace, errorMessage } from "../logging";
import { delay, withTimeout } from "./timeout";

export const FactExtractionSchema = z.object({
  facts: z.array(z.string()).describe("Durable facts worth remembering across sessions"),
});

export interface FinalizeJob extends TurnContext {
  input: string;
  reply: string;
  /** The state committed for this turn. */
  state: CognitiveState;
  /** Reply did not complete normally. */
  partial: boolean;
}

export type FinalizeOutcome =
  | { status: "completed"; attempts: number; artifacts: Artifact[] }
  | { status: "abandoned"; attempts: number; error: string };

export interface FinalizerOptions {
  timeoutMs: number;
  retries: number;
  backoffMs: number;
  maxFacts: number;
  longTermMemory?: ILongTermMemory;
  now?: () => Date;
}

interface Progress {
  facts?: string[];
  written: Artifact[];
  factsWritten: number;
  episodicWritten: boolean;
  remembered: boolean;
  logged: boolean;
}

export function episodicDigest(job: FinalizeJob): string {
  return `User: ${job.input}\nAssistant: ${job.reply}\nGist: ${job.state.semantic_gist}`;
}

export class Finalizer {
  private readonly now: () => Date;

  constructor(
    private readonly llm: ILLM,
    private readonly store: IKnowledgeStore,
    private readonly reflectiveLog: IReflectiveLog,
    private readonly prompts: PromptManager,
    private readonly options: FinalizerOptions
  ) {
    this.now = options.now ?? (() => new Date());
  }

  async run(job: FinalizeJob): Promise<FinalizeOutcome> {
    const ctx = { sessionId: job.sessionId, turn: job.turn };
    const progress: Progress = {
      written: [],
      factsWritten: 0,
      episodicWritten: false,
      remembered: false,
      logged: false,
    };
    const maxAttempts = 1 + this.options.retries;
    let lastError = "";

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      try {
        await this.attempt(job, progress);
        logStageTrace(logger, "finalize", { ...ctx, output: { facts: progress.facts, artifacts: progress.written.map((a) => a.id) } });
        logger.debug({ event: "FINALIZE_COMPLETED", ...ctx, attempts: attempt, artifacts: progress.written.length }, "Turn finalized");
        return { status: "completed", attempts: attempt, artifacts: progress.written };
      } catch (err) {
        lastError = errorMessage(err);
        logger.warn({ event: "FINALIZE_ATTEMPT_FAILED", ...ctx, attempt, err: lastError }, "Finalize attempt failed");
        if (attempt < maxAttempts && this.options.backoffMs > 0) await delay(this.options.backoffMs * attempt);
      }
    }

    logger.error({ event: "FINALIZE_ABANDONED", ...ctx, attempts: maxAttempts, err: lastError }, "Finalize abandoned");
    return { status: "abandoned", attempts: maxAttempts, error: lastError };
  }

  private async attempt(job: FinalizeJob, progress: Progress): Promise<void> {
    const originTurn = originTurnRef(job.sessionId, job.turn);

    progress.facts ??= await this.extractFacts(job);

    for (const fact of progress.facts.slice(progress.factsWritten)) {
      progress.written.push(await this.write({ text: fact, kind: "semantic", originTurn }));
      progress.factsWritten++;
    }

    if (!progress.episodicWritten) {
      progress.written.push(await this.write({ text: episodicDigest(job), kind: "episodic", originTurn }));
      progress.episodicWritten = true;
    }

    const { longTermMemory } = this.options;
    if (longTermMemory && !progress.remembered) {
      if (progress.facts.length > 0) {
        await withTimeout(longTermMemory.append(progress.facts), this.options.timeoutMs, "Long-term memory");
      }
      progress.remembered = true;
    }

    if (!progress.logged) {
      await withTimeout(
        this.reflectiveLog.append({
          sessionId: job.sessionId,
          turn: job.turn,
          timestamp: this.now().toISOString(),
          input: job.input,
          reply: job.reply,
          gist: job.state.semantic_gist,
          facts: progress.facts,
          partial: job.partial,
        }),
        this.options.timeoutMs,
        "Reflective log"
      );
      progress.logged = true;
    }
  }

  /** Extraction problems mean "no facts this turn", not a failed finalize. */
  private async extractFacts(job: FinalizeJob): Promise<string[]> {
    if (this.options.maxFacts <= 0 || !job.reply.trim()) return [];
    const messages = this.prompts.extractMessages({
      input: job.input,
      reply: job.reply,
      state: job.state,
      maxFacts: this.options.maxFacts,
    });
    const abort = new AbortController();
    try {
      const response = await withTimeout(
        this.llm.chat(messages, {
          responseFormat: { name: "memory_extraction", schema: FactExtractionSchema },
          temperature: 0,
          signal: abort.signal,
          label: "extract",
        }),
        this.options.timeoutMs,
        "Extract",
        () => abort.abort()
      );
      const parsed = parseStructured(response.text, FactExtractionSchema);
      if (!parsed.ok) {
        logger.warn({ event: "EXTRACT_INVALID", sessionId: job.sessionId, turn: job.turn, issues: parsed.issues }, "Fact extraction output invalid");
        return [];
      }
      return parsed.value.facts
        .map((f) => f.trim())
        .filter((f) => f.length > 0)
        .slice(0, this.options.maxFacts);
    } catch (err) {
      logger.warn({ event: "EXTRACT_FAILED", sessionId: job.sessionId, turn: job.turn, err: errorMessage(err) }, "Fact extraction failed");
      return [];
    }
  }

  private async write(input: { text: string; kind: Artifact["kind"]; originTurn: string }): Promise<Artifact> {
    const abort = new AbortController();
    try {
      return await withTimeout(
        this.store.append(input, { signal: abort.signal }),
        this.options.timeoutMs,
        "Knowledge append",
        () => abort.abort()
      );
    } catch (err) {
      if (err instanceof CapabilityTimeoutError) {
        logger.warn(
          { event: "KNOWLEDGE_APPEND_TIMED_OUT", originTurn: input.originTurn, kind: input.kind },
          "Append timed out and was aborted; a write already under way may still land"
        );
      }
      throw new ConsolidationFailureError(`Knowledge store write failed: ${errorMessage(err)}`, { cause: err });
    }
  }
}
