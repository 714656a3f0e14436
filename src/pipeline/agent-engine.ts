/**
 * Agent Engine: the user-facing reply, generated from the committed state and the current input only.
 *
 * The reply is a single-pass async sequence. Closing it early aborts the provider request;
 * a provider error or timeout ends the sequence with one error chunk after whatever text
 * was already produced. State is never touched here.
 */

import type { ILLM } from "../adapters/llm";
import type { PromptManager } from "../prompts/prompt-manager";
import type { CognitiveState } from "../state/schema";
import type { ReplyChunk, TurnContext } from "./types";
import { GenerationFailureError } from "../errors";
import { logger, logStageTrace, errorMessage } from "../logging";

export interface AgentEngineOptions {
  timeoutMs: number;
  maxTokens: number;
  temperature: number;
}

const ABORTED = Symbol("aborted");

function whenAborted(signal: AbortSignal): Promise<typeof ABORTED> {
  return new Promise((resolve) => {
    if (signal.aborted) resolve(ABORTED);
    else signal.addEventListener("abort", () => resolve(ABORTED), { once: true });
  });
}

/**
 * Iterate `source` until it ends or `signal` fires, whichever comes first. Needed because a
 * provider stream may sit on a pending read without observing the signal.
 */
async function* untilAborted<T>(source: AsyncIterable<T>, signal: AbortSignal): AsyncGenerator<T, void, undefined> {
  const iterator = source[Symbol.asyncIterator]();
  const aborted = whenAborted(signal);
  let exhausted = false;
  try {
    while (true) {
      const next = await Promise.race([iterator.next(), aborted]);
      if (next === ABORTED) return;
      if (next.done) {
        exhausted = true;
        return;
      }
      yield next.value;
    }
  } finally {
    if (!exhausted) {
      iterator.return?.().catch((err: unknown) => {
        logger.debug({ event: "REPLY_STREAM_CLOSE_FAILED", err: errorMessage(err) }, "Closing reply stream failed");
      });
    }
  }
}

export class AgentEngine {
  constructor(
    private readonly llm: ILLM,
    private readonly prompts: PromptManager,
    private readonly options: AgentEngineOptions
  ) {}

  /** `signal` cancels generation from outside; the sequence then ends without an error chunk. */
  async *generate(
    ctx: TurnContext,
    input: string,
    state: CognitiveState,
    signal?: AbortSignal
  ): AsyncGenerator<ReplyChunk, void, undefined> {
    const messages = this.prompts.replyMessages({ input, state });
    const abort = new AbortController();
    const onCancel = () => abort.abort();
    if (signal?.aborted) return;
    signal?.addEventListener("abort", onCancel, { once: true });
    let timedOut = false;
    let finished = false;
    let length = 0;
    const timer = setTimeout(() => {
      timedOut = true;
      abort.abort();
    }, this.options.timeoutMs);

    try {
      const response = await Promise.race([
        this.llm.chat(messages, {
          stream: true,
          maxTokens: this.options.maxTokens,
          temperature: this.options.temperature,
          signal: abort.signal,
          label: "reply",
        }),
        whenAborted(abort.signal),
      ]);
      if (response === ABORTED) throw new GenerationFailureError("Reply request aborted before it started");
      if (response.stream) {
        for await (const text of untilAborted(response.stream, abort.signal)) {
          if (!text) continue;
          length += text.length;
          yield { kind: "text", text };
        }
      } else if (response.text && !timedOut) {
        length += response.text.length;
        yield { kind: "text", text: response.text };
      }
      finished = true;
      if (timedOut) {
        logger.warn({ event: "REPLY_TIMED_OUT", ...ctx, length }, "Reply generation timed out; reply truncated");
        yield { kind: "error", code: "capability_timeout", message: `Reply generation timed out after ${this.options.timeoutMs}ms` };
      }
    } catch (err) {
      finished = true;
      if (signal?.aborted && !timedOut) return;
      const code = timedOut ? "capability_timeout" : "generation_failure";
      logger.warn({ event: "REPLY_FAILED", ...ctx, code, length, err: errorMessage(err) }, "Reply generation failed");
      yield {
        kind: "error",
        code,
        message: timedOut ? `Reply generation timed out after ${this.options.timeoutMs}ms` : errorMessage(err),
      };
    } finally {
      clearTimeout(timer);
      signal?.removeEventListener("abort", onCancel);
      if (!finished || signal?.aborted) {
        // Consumer closed the sequence early.
        abort.abort();
        logger.info({ event: "REPLY_CANCELLED", ...ctx, length }, "Reply cancelled by consumer");
      }
      logStageTrace(logger, "reply", { ...ctx, input: messages, output: { length, timedOut } });
    }
  }
}
