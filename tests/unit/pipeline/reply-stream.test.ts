/**
 * Unit tests for ReplyStream: single consumption and the unread-chunk deadline.
 */

import { ReplyStream } from "../../../src/pipeline/reply-stream";
import { delay } from "../../../src/pipeline/timeout";
import type { ReplyChunk } from "../../../src/pipeline/types";

async function* chunks(log: string[], texts: string[], gapMs = 0): AsyncGenerator<ReplyChunk, void, undefined> {
  try {
    for (const text of texts) {
      if (gapMs > 0) await delay(gapMs);
      yield { kind: "text", text };
    }
    log.push("done");
  } finally {
    log.push("cleanup");
  }
}

describe("ReplyStream", () => {
  it("cancels when a produced chunk is left unread", async () => {
    const log: string[] = [];
    const stream = new ReplyStream(chunks(log, ["a", "b"]), new AbortController(), { idleMs: 20 });
    await delay(100);
    expect(stream.cancelled).toBe(true);
    expect(log).toEqual(["cleanup"]);
  });

  it("keeps going while the consumer reads, however slowly the source produces", async () => {
    const log: string[] = [];
    const stream = new ReplyStream(chunks(log, ["a", "b"], 60), new AbortController(), { idleMs: 20 });
    expect(await stream.collect()).toEqual({ text: "ab" });
    await delay(50);
    expect(stream.cancelled).toBe(false);
    expect(log).toEqual(["done", "cleanup"]);
  });

  it("never cancels on its own when the deadline is disabled", async () => {
    const log: string[] = [];
    const stream = new ReplyStream(chunks(log, ["a"]), new AbortController());
    await delay(30);
    expect(stream.cancelled).toBe(false);
    expect(await stream.collect()).toEqual({ text: "a" });
  });

  it("runs cleanup when cancelled before any read", async () => {
    const log: string[] = [];
    const stream = new ReplyStream(chunks(log, ["a"]), new AbortController(), { idleMs: 1_000 });
    await stream.cancel();
    expect(stream.cancelled).toBe(true);
    expect(log).toEqual(["cleanup"]);
    expect(() => stream[Symbol.asyncIterator]()).toThrow("Reply stream already consumed");
  });
});
