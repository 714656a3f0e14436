/**
 * ReplyStream: the caller's handle on one turn's reply.
 *
 * The underlying generator is started as soon as the stream is created, so the turn's cleanup
 * runs even when the caller cancels before reading a single chunk. The stream can be iterated once.
 * A chunk left unread for `idleMs` cancels the reply, so a caller that walks away does not hold
 * the session.
 */

import type { PipelineErrorCode } from "../errors";
import { logger, errorMessage } from "../logging";
import type { ReplyChunk } from "./types";

export interface CollectedReply {
  text: string;
  error?: { code: PipelineErrorCode; message: string };
}

export interface ReplyStreamOptions {
  /** Cancel when a produced chunk waits this long for the consumer. 0 disables. */
  idleMs?: number;
  sessionId?: string;
}

type Step = IteratorResult<ReplyChunk, void>;

export class ReplyStream implements AsyncIterable<ReplyChunk> {
  private primed: Promise<Step> | null;
  private consumed = false;
  private idleTimer: ReturnType<typeof setTimeout> | null = null;
  private finished = false;
  private readonly idleMs: number;
  private readonly sessionId: string | undefined;

  constructor(
    private readonly source: AsyncGenerator<ReplyChunk, void, undefined>,
    private readonly cancellation: AbortController,
    options: ReplyStreamOptions = {}
  ) {
    this.idleMs = options.idleMs ?? 0;
    this.sessionId = options.sessionId;
    const first = source.next();
    this.primed = first;
    first.then(
      (step) => {
        if (step.done) this.finish();
        else if (this.primed === first) this.armIdle();
      },
      (err: unknown) => {
        this.finish();
        logger.error({ event: "REPLY_STREAM_FAILED", sessionId: this.sessionId, err: errorMessage(err) }, "Reply stream failed");
      }
    );
  }

  [Symbol.asyncIterator](): AsyncIterator<ReplyChunk, void, undefined> {
    if (this.consumed) throw new Error("Reply stream already consumed");
    this.consumed = true;
    return {
      next: () => {
        this.disarmIdle();
        const pending = this.primed ?? this.source.next();
        this.primed = null;
        return pending.then((step) => {
          if (step.done) this.finish();
          else this.armIdle();
          return step;
        });
      },
      return: () => {
        this.finish();
        return this.source.return(undefined);
      },
    };
  }

  get cancelled(): boolean {
    return this.cancellation.signal.aborted;
  }

  /** Stop generation. The turn still finalizes, with whatever reply text was produced. */
  async cancel(): Promise<void> {
    this.consumed = true;
    this.finish();
    this.cancellation.abort();
    await this.source.return(undefined);
  }

  /** Read the whole reply. An error chunk ends the text. */
  async collect(): Promise<CollectedReply> {
    let text = "";
    for await (const chunk of this) {
      if (chunk.kind === "error") return { text, error: { code: chunk.code, message: chunk.message } };
      text += chunk.text;
    }
    return { text };
  }

  private armIdle(): void {
    if (this.finished || this.idleMs <= 0) return;
    this.disarmIdle();
    this.idleTimer = setTimeout(() => {
      this.idleTimer = null;
      logger.warn({ event: "REPLY_CONSUMER_IDLE", sessionId: this.sessionId, idleMs: this.idleMs }, "Reply unread; cancelling");
      this.cancel().catch((err: unknown) => {
        logger.error({ event: "REPLY_CANCEL_FAILED", sessionId: this.sessionId, err: errorMessage(err) }, "Cancel failed");
      });
    }, this.idleMs);
    this.idleTimer.unref();
  }

  private disarmIdle(): void {
    if (this.idleTimer) clearTimeout(this.idleTimer);
    this.idleTimer = null;
  }

  private finish(): void {
    this.finished = true;
    this.disarmIdle();
  }
}
