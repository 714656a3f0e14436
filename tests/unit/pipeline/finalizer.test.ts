/**
 * Unit tests for the Finalizer: fact extraction, episodic digest, reflective log, retries.
 */

import { Finalizer, episodicDigest, type FinalizeJob, type FinalizerOptions } from "../../../src/pipeline/finalizer";
import { PromptManager } from "../../../src/prompts/prompt-manager";
import { InMemoryReflectiveLog, type IReflectiveLog, type ReflectiveLogEntry } from "../../../src/memory/reflective-log";
import { InMemoryLongTermMemory } from "../../../src/memory/long-term-memory";
import { VectorKnowledgeStore } from "../../../src/adapters/knowledge";
import type { Artifact, ArtifactInput, IKnowledgeStore } from "../../../src/adapters/knowledge";
import { FailingKnowledgeStore, FakeLLM, KeywordEmbedder, fail, state } from "../../helpers/fakes";

const NOW = new Date("2026-03-04T05:06:07.000Z");

const job: FinalizeJob = {
  sessionId: "s1",
  turn: 2,
  input: "I'm Aiko and I prefer email over phone.",
  reply: "Noted, Aiko. I'll use email.",
  state: state({ semantic_gist: "Contact preference set" }),
  partial: false,
};

function finalizer(
  llm: FakeLLM,
  store: IKnowledgeStore,
  log: IReflectiveLog,
  retries = 1,
  extra: Partial<FinalizerOptions> = {}
): Finalizer {
  return new Finalizer(llm, store, log, new PromptManager(), {
    timeoutMs: 1_000,
    retries,
    backoffMs: 0,
    maxFacts: 2,
    now: () => NOW,
    ...extra,
  });
}

/** Never settles the first append until it is aborted; later appends go through. */
class StallingStore implements IKnowledgeStore {
  readonly signals: Array<AbortSignal | undefined> = [];

  constructor(private readonly inner: IKnowledgeStore) {}

  search = (query: string, k: number) => this.inner.search(query, k);
  get = (id: string) => this.inner.get(id);
  size = () => this.inner.size();

  append(input: ArtifactInput, options?: { signal?: AbortSignal }): Promise<Artifact> {
    this.signals.push(options?.signal);
    if (this.signals.length > 1) return this.inner.append(input, options);
    return new Promise<Artifact>((_resolve, reject) => {
      options?.signal?.addEventListener("abort", () => reject(new Error("append aborted")), { once: true });
    });
  }
}

/** Fails its first append. */
class FlakyLog implements IReflectiveLog {
  readonly entries: ReflectiveLogEntry[] = [];
  private calls = 0;

  async append(entry: ReflectiveLogEntry): Promise<void> {
    this.calls++;
    if (this.calls === 1) throw new Error("log locked");
    this.entries.push(entry);
  }
}

/** Fails the appends whose 1-based call number is listed, delegating the rest. */
class FlakyStore implements IKnowledgeStore {
  readonly appended: ArtifactInput[] = [];
  private calls = 0;

  constructor(
    private readonly inner: IKnowledgeStore,
    private readonly failOn: number[]
  ) {}

  search = (query: string, k: number) => this.inner.search(query, k);
  get = (id: string) => this.inner.get(id);
  size = () => this.inner.size();

  async append(input: ArtifactInput): Promise<Artifact> {
    this.calls++;
    if (this.failOn.includes(this.calls)) throw new Error("disk full");
    this.appended.push(input);
    return this.inner.append(input);
  }
}

function memoryStore(): VectorKnowledgeStore {
  return new VectorKnowledgeStore({ embedder: new KeywordEmbedder(["email", "aiko"]) });
}

describe("episodicDigest", () => {
  it("records input, reply and gist", () => {
    expect(episodicDigest(job)).toBe(
      "User: I'm Aiko and I prefer email over phone.\nAssistant: Noted, Aiko. I'll use email.\nGist: Contact preference set"
    );
  });
});

describe("Finalizer", () => {
  it("writes extracted facts, one episodic digest, and a log entry", async () => {
    const llm = new FakeLLM().on("extract", '{"facts":["User is Aiko", " ", "Prefers email", "Third fact"]}');
    const store = memoryStore();
    const log = new InMemoryReflectiveLog();
    const outcome = await finalizer(llm, store, log).run(job);

    expect(outcome.status).toBe("completed");
    if (outcome.status !== "completed") return;
    expect(outcome.attempts).toBe(1);
    expect(outcome.artifacts.map((a) => [a.kind, a.text, a.originTurn])).toEqual([
      ["semantic", "User is Aiko", "s1#2"],
      ["semantic", "Prefers email", "s1#2"],
      ["episodic", episodicDigest(job), "s1#2"],
    ]);
    expect(await store.size()).toBe(3);
    expect(log.list("s1")).toEqual([
      {
        sessionId: "s1",
        turn: 2,
        timestamp: "2026-03-04T05:06:07.000Z",
        input: job.input,
        reply: job.reply,
        gist: "Contact preference set",
        facts: ["User is Aiko", "Prefers email"],
        partial: false,
      },
    ]);
  });

  it("treats unusable extraction output as no facts", async () => {
    const llm = new FakeLLM().on("extract", fail("provider down"));
    const store = memoryStore();
    const log = new InMemoryReflectiveLog();
    const outcome = await finalizer(llm, store, log).run(job);
    expect(outcome.status).toBe("completed");
    if (outcome.status === "completed") expect(outcome.artifacts.map((a) => a.kind)).toEqual(["episodic"]);
    expect(log.list()[0].facts).toEqual([]);
  });

  it("skips extraction for an empty reply and marks partial entries", async () => {
    const llm = new FakeLLM().on("extract", '{"facts":["should not be asked"]}');
    const log = new InMemoryReflectiveLog();
    await finalizer(llm, memoryStore(), log).run({ ...job, reply: "", partial: true });
    expect(llm.callsFor("extract")).toHaveLength(0);
    expect(log.list()[0]).toMatchObject({ reply: "", partial: true, facts: [] });
  });

  it("retries without duplicating writes that already succeeded", async () => {
    const llm = new FakeLLM().on("extract", '{"facts":["User is Aiko"]}');
    // The fact write succeeds; the episodic write fails once.
    const store = new FlakyStore(memoryStore(), [2]);
    const log = new InMemoryReflectiveLog();
    const outcome = await finalizer(llm, store, log).run(job);

    expect(outcome).toMatchObject({ status: "completed", attempts: 2 });
    expect(store.appended.map((a) => a.kind)).toEqual(["semantic", "episodic"]);
    expect(llm.callsFor("extract")).toHaveLength(1);
    expect(log.list()).toHaveLength(1);
  });

  it("abandons after the retries are spent", async () => {
    const llm = new FakeLLM().on("extract", '{"facts":[]}');
    const log = new InMemoryReflectiveLog();
    const outcome = await finalizer(llm, new FailingKnowledgeStore(), log, 2).run(job);
    expect(outcome).toEqual({
      status: "abandoned",
      attempts: 3,
      error: "Knowledge store write failed: store offline",
    });
    expect(log.list()).toEqual([]);
  });

  it("remembers extracted facts once, across a retry", async () => {
    const llm = new FakeLLM().on("extract", '{"facts":["User is Aiko"]}');
    const memory = new InMemoryLongTermMemory();
    const log = new FlakyLog();
    const outcome = await finalizer(llm, memoryStore(), log, 1, { longTermMemory: memory }).run(job);
    expect(outcome).toMatchObject({ status: "completed", attempts: 2 });
    expect(memory.list()).toEqual(["User is Aiko"]);
    expect(log.entries).toHaveLength(1);
  });

  it("leaves long-term memory alone when nothing was extracted", async () => {
    const llm = new FakeLLM().on("extract", '{"facts":[]}');
    const memory = new InMemoryLongTermMemory();
    await finalizer(llm, memoryStore(), new InMemoryReflectiveLog(), 1, { longTermMemory: memory }).run(job);
    expect(memory.list()).toEqual([]);
  });

  it("aborts a knowledge write that times out before retrying it", async () => {
    const llm = new FakeLLM().on("extract", '{"facts":[]}');
    const inner = memoryStore();
    const store = new StallingStore(inner);
    const outcome = await finalizer(llm, store, new InMemoryReflectiveLog(), 1, { timeoutMs: 20 }).run(job);
    expect(outcome).toMatchObject({ status: "completed", attempts: 2 });
    expect(store.signals[0]?.aborted).toBe(true);
    expect(await inner.size()).toBe(1);
  });

  it("recovers on retry from a transient store failure", async () => {
    const llm = new FakeLLM().on("extract", '{"facts":[]}');
    const store = new FlakyStore(memoryStore(), [1]);
    const outcome = await finalizer(llm, store, new InMemoryReflectiveLog()).run(job);
    expect(outcome).toMatchObject({ status: "completed", attempts: 2 });
    expect(store.appended).toHaveLength(1);
  });
});
