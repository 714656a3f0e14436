/**
 * Controller: runs one turn per session at a time.
 *
 * Recall -> Qualify -> Compress -> commit happen under the session lock before any reply text is
 * produced; the reply then streams from the committed state, and Finalize is queued when the
 * reply ends (completed, failed or cancelled). The next turn's Recall waits for that Finalize.
 * A submit arriving while a turn is in flight is rejected, not queued.
 */

import { DEFAULT_PIPELINE_CONFIG, type AppConfig } from "../config";
import type { ILLM } from "../adapters/llm";
import type { IKnowledgeStore } from "../adapters/knowledge";
import type { IReflectiveLog } from "../memory/reflective-log";
import type { ILongTermMemory } from "../memory/long-term-memory";
import { FinalizeQueue } from "../memory/finalize-queue";
import { PromptManager } from "../prompts/prompt-manager";
import type { Instructions } from "../prompts/instructions";
import { SessionStore, type ReadStateResult, type Session } from "../state/session-store";
import { cloneState, type CognitiveState } from "../state/schema";
import { isPipelineError } from "../errors";
import { logger, logError, logTurn, errorMessage } from "../logging";
import { recordTurnMetrics, type TurnMetrics } from "../metrics";
import { Recall } from "./recall";
import { Qualifier } from "./qualify";
import { Compressor } from "./compress";
import { AgentEngine } from "./agent-engine";
import { Finalizer } from "./finalizer";
import { ReplyStream } from "./reply-stream";
import type { ReplyChunk, TurnContext } from "./types";

export interface TurnRequest {
  sessionId: string;
  message: string;
}

export type RejectReason = "turn_in_progress" | "empty_message";

export type TurnSubmission =
  | { status: "rejected"; sessionId: string; reason: RejectReason }
  | {
      status: "accepted";
      sessionId: string;
      turn: number;
      reply: ReplyStream;
      /** Resolves with the state committed for this turn, before any reply text exists. */
      committed: Promise<CognitiveState>;
    };

export interface ControllerStages {
  recall: Recall;
  qualifier: Qualifier;
  compressor: Compressor;
  agent: AgentEngine;
  finalizer: Finalizer;
}

export interface ControllerOptions {
  store?: SessionStore;
  finalizeQueue?: FinalizeQueue;
  /** A reply chunk unread for this long cancels the reply. 0 disables. */
  replyIdleMs?: number;
}

interface Deferred<T> {
  promise: Promise<T>;
  resolve: (value: T) => void;
  reject: (reason: unknown) => void;
}

function deferred<T>(): Deferred<T> {
  let resolve: (value: T) => void = () => {};
  let reject: (reason: unknown) => void = () => {};
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}

export class Controller {
  readonly store: SessionStore;
  private readonly finalizeQueue: FinalizeQueue;
  private readonly replyIdleMs: number;
  /** Sessions whose reply has not ended yet, keyed to the promise that settles when it does. */
  private readonly active = new Map<string, Promise<void>>();

  constructor(
    private readonly stages: ControllerStages,
    options: ControllerOptions = {}
  ) {
    this.store = options.store ?? new SessionStore();
    this.finalizeQueue = options.finalizeQueue ?? new FinalizeQueue();
    this.replyIdleMs = options.replyIdleMs ?? DEFAULT_PIPELINE_CONFIG.timeouts.replyMs;
  }

  submitTurn(request: TurnRequest): TurnSubmission {
    const { sessionId } = request;
    const message = request.message.trim();
    if (!message) return { status: "rejected", sessionId, reason: "empty_message" };

    const session = this.store.getOrCreate(sessionId);
    if (session.phase !== "idle") {
      logger.info({ event: "TURN_REJECTED", sessionId, phase: session.phase }, "Turn already in progress");
      return { status: "rejected", sessionId, reason: "turn_in_progress" };
    }
    this.store.transition(session, "recalling");

    const ctx: TurnContext = { sessionId, turn: session.turn + 1 };
    const startedAt = Date.now();
    const metrics: TurnMetrics = { sessionId, turn: ctx.turn };
    const committed = deferred<CognitiveState>();
    const replyDone = deferred<void>();
    this.active.set(sessionId, replyDone.promise);
    logTurn(logger, "start", sessionId, ctx.turn);

    // The lock is held from Recall until the reply ends.
    this.store
      .withLock(sessionId, async (locked) => {
        try {
          committed.resolve(await this.prepare(locked, ctx, message, metrics));
        } catch (err) {
          committed.reject(err);
          return;
        }
        await replyDone.promise;
      })
      .catch((err: unknown) => {
        logger.error({ event: "TURN_LOCK_FAILED", ...ctx, err: errorMessage(err) }, "Turn lock failed");
      });

    const cancellation = new AbortController();
    const reply = new ReplyStream(
      this.respond(session, ctx, message, committed.promise, cancellation.signal, {
        startedAt,
        metrics,
        done: () => {
          if (this.active.get(sessionId) === replyDone.promise) this.active.delete(sessionId);
          replyDone.resolve();
        },
      }),
      cancellation,
      { idleMs: this.replyIdleMs, sessionId }
    );
    return { status: "accepted", sessionId, turn: ctx.turn, reply, committed: committed.promise };
  }

  readState(sessionId: string): ReadStateResult {
    return this.store.read(sessionId);
  }

  /** Resolves once the session's current reply has ended and its Finalize has settled. */
  async whenFinalized(sessionId: string): Promise<void> {
    await this.active.get(sessionId);
    await this.finalizeQueue.whenClear(sessionId);
  }

  /** Wait for every queued Finalize. Replies still streaming are not waited for. */
  async drain(): Promise<void> {
    await this.finalizeQueue.drain();
  }

  private async prepare(
    session: Session,
    ctx: TurnContext,
    message: string,
    metrics: TurnMetrics
  ): Promise<CognitiveState> {
    let t = Date.now();
    await this.finalizeQueue.whenClear(session.id);
    metrics.finalizeWaitMs = Date.now() - t;

    const prior = session.turn > 0 ? cloneState(session.state) : null;

    t = Date.now();
    const candidates = await this.stages.recall.run(ctx, message, prior);
    metrics.recallMs = Date.now() - t;
    metrics.candidates = candidates.length;
    this.store.transition(session, "qualifying");

    t = Date.now();
    const qualified = await this.stages.qualifier.run(ctx, message, prior, candidates);
    metrics.qualifyMs = Date.now() - t;
    metrics.qualified = qualified.length;
    this.store.transition(session, "compressing");

    t = Date.now();
    const outcome = await this.stages.compressor.run(ctx, message, prior, qualified);
    metrics.compressMs = Date.now() - t;
    metrics.compressionAttempts = outcome.attempts;
    metrics.compressionFallback = outcome.kind === "fallback";

    this.store.commit(session, outcome.state);
    this.store.transition(session, "committed");
    logger.info(
      { event: "TURN_COMMITTED", ...ctx, fallback: outcome.kind === "fallback", qualified: qualified.length },
      "State committed"
    );
    return cloneState(outcome.state);
  }

  private async *respond(
    session: Session,
    ctx: TurnContext,
    message: string,
    committed: Promise<CognitiveState>,
    signal: AbortSignal,
    turn: { startedAt: number; metrics: TurnMetrics; done: () => void }
  ): AsyncGenerator<ReplyChunk, void, undefined> {
    let state: CognitiveState | null = null;
    let reply = "";
    let outcome: "complete" | "error" | "cancelled" = "cancelled";
    let replyStart = Date.now();

    try {
      try {
        state = await committed;
      } catch (err) {
        outcome = "error";
        logError(logger, err instanceof Error ? err : new Error(String(err)), { event: "TURN_FAILED", ...ctx });
        yield {
          kind: "error",
          code: isPipelineError(err) ? err.code : "generation_failure",
          message: "Turn could not be processed",
        };
        return;
      }

      this.store.transition(session, "responding");
      replyStart = Date.now();
      for await (const chunk of this.stages.agent.generate(ctx, message, state, signal)) {
        if (chunk.kind === "text") {
          turn.metrics.firstChunkMs ??= Date.now() - turn.startedAt;
          reply += chunk.text;
        } else {
          outcome = "error";
        }
        yield chunk;
      }
      if (outcome !== "error" && !signal.aborted) outcome = "complete";
    } finally {
      if (session.phase !== "idle") this.store.transition(session, "idle");

      if (state) {
        const job = { ...ctx, input: message, reply, state, partial: outcome !== "complete" };
        this.finalizeQueue.schedule(ctx.sessionId, async () => {
          await this.stages.finalizer.run(job);
        });
      }

      turn.done();
      recordTurnMetrics({
        ...turn.metrics,
        replyMs: Date.now() - replyStart,
        replyChars: reply.length,
        replyOutcome: outcome,
      });
      logTurn(logger, "end", ctx.sessionId, ctx.turn);
    }
  }
}

export interface ControllerDeps {
  llm: ILLM;
  knowledge: IKnowledgeStore;
  reflectiveLog: IReflectiveLog;
  longTermMemory?: ILongTermMemory;
  instructions?: Instructions;
  store?: SessionStore;
}

/** Wire every stage from config. */
export function createController(config: AppConfig, deps: ControllerDeps): Controller {
  const p = config.pipeline;
  const prompts = new PromptManager(deps.instructions);
  return new Controller(
    {
      recall: new Recall(deps.knowledge, { topK: p.recallTopK, timeoutMs: p.timeouts.recallMs }),
      qualifier: new Qualifier(deps.llm, prompts, { timeoutMs: p.timeouts.qualifyMs, digestChars: p.digestChars }),
      compressor: new Compressor(deps.llm, prompts, {
        bounds: config.state,
        timeoutMs: p.timeouts.compressMs,
        repairRetries: p.compressRepairRetries,
        longTermMemory: deps.longTermMemory,
        longTermMemoryChars: p.longTermMemoryChars,
      }),
      agent: new AgentEngine(deps.llm, prompts, {
        timeoutMs: p.timeouts.replyMs,
        maxTokens: p.replyMaxTokens,
        temperature: p.replyTemperature,
      }),
      finalizer: new Finalizer(deps.llm, deps.knowledge, deps.reflectiveLog, prompts, {
        timeoutMs: p.timeouts.finalizeMs,
        retries: p.finalizeRetries,
        backoffMs: p.finalizeRetryBackoffMs,
        maxFacts: p.maxFactsPerTurn,
        longTermMemory: deps.longTermMemory,
      }),
    },
    { store: deps.store, replyIdleMs: p.timeouts.replyMs }
  );
}
