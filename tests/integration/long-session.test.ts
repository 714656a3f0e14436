/**
 * Multi-turn sessions through the full pipeline with a scripted model.
 */

import { createController, type Controller } from "../../src/pipeline/controller";
import { HashingEmbedder, VectorKnowledgeStore } from "../../src/adapters/knowledge";
import { InMemoryReflectiveLog } from "../../src/memory/reflective-log";
import { InMemoryLongTermMemory } from "../../src/memory/long-term-memory";
import { SessionStore } from "../../src/state/session-store";
import { DEFAULT_STATE_BOUNDS, validateState, type CognitiveState } from "../../src/state/schema";
import { constraintOverflowNote } from "../../src/pipeline/compress";
import { FakeLLM, compression, state, testConfig } from "../helpers/fakes";

function build(llm: FakeLLM): { controller: Controller; reflectiveLog: InMemoryReflectiveLog } {
  const knowledge = new VectorKnowledgeStore({ embedder: new HashingEmbedder() });
  const reflectiveLog = new InMemoryReflectiveLog();
  return { controller: createController(testConfig(), { llm, knowledge, reflectiveLog }), reflectiveLog };
}

async function runTurn(controller: Controller, sessionId: string, message: string): Promise<{ state: CognitiveState; reply: string }> {
  const submission = controller.submitTurn({ sessionId, message });
  if (submission.status !== "accepted") throw new Error(`turn rejected: ${submission.reason}`);
  const state = await submission.committed;
  const { text } = await submission.reply.collect();
  await controller.whenFinalized(sessionId);
  return { state, reply: text };
}

describe("long session", () => {
  it("stays within bounds while the model keeps adding constraints", async () => {
    let n = 0;
    const llm = new FakeLLM()
      .on("compress", () => {
        n++;
        return { text: compression({ semantic_gist: `Turn summary ${n}`, constraints: [`Rule ${n}`] }) };
      })
      .on("reply", "ack");
    const { controller, reflectiveLog } = build(llm);

    let last: CognitiveState | undefined;
    for (let turn = 1; turn <= 30; turn++) {
      const { state } = await runTurn(controller, "long", `message number ${turn}`);
      expect(validateState(state, DEFAULT_STATE_BOUNDS).ok).toBe(true);
      last = state;
    }

    expect(last?.constraints).toHaveLength(DEFAULT_STATE_BOUNDS.maxConstraints);
    expect(last?.constraints[0]).toBe("Rule 1");
    expect(last?.constraints[DEFAULT_STATE_BOUNDS.maxConstraints - 1]).toBe(`Rule ${DEFAULT_STATE_BOUNDS.maxConstraints}`);
    expect(last?.semantic_gist).toBe("Turn summary 30");
    expect(last?.uncertainty_signal).toBe(constraintOverflowNote(["Rule 30"]));
    expect(llm.callsFor("compress")).toHaveLength(30);
    expect(controller.readState("long")).toMatchObject({ found: true, turn: 30 });
    expect(reflectiveLog.list("long")).toHaveLength(30);
  });

  it("keeps a constraint from turn 1 through ten unrelated turns", async () => {
    let calls = 0;
    const llm = new FakeLLM()
      .on("compress", () => {
        calls++;
        const constraints = calls === 1 ? ["Never delete production data"] : [];
        return { text: compression({ semantic_gist: `Ops chat ${calls}`, constraints }) };
      })
      .on("reply", "done");
    const { controller } = build(llm);

    await runTurn(controller, "ops", "Never delete production data.");
    for (let turn = 2; turn <= 11; turn++) {
      const { state } = await runTurn(controller, "ops", `rotate the logs on host ${turn}`);
      expect(state.constraints).toEqual(["Never delete production data"]);
    }

    expect(controller.readState("ops")).toMatchObject({ found: true, turn: 11 });
    const replies = llm.callsFor("reply");
    expect(replies).toHaveLength(11);
    expect(replies[10].messages[0].content).toContain("Never delete production data");
    expect(replies[10].messages[1].content).toBe("rotate the logs on host 11");
  });

  it("keeps the weekday-only rule when asked to cancel a hotel booking", async () => {
    const store = new SessionStore();
    store.commit(
      store.getOrCreate("hotel"),
      state({
        episodic_trace: "ホテルの予約内容を確認した",
        semantic_gist: "ホテル予約の手続き中",
        goal_orientation: "ホテル予約を完了する",
        constraints: ["平日のみキャンセル可能"],
      })
    );
    const llm = new FakeLLM()
      .on(
        "compress",
        compression({
          episodic_trace: "ユーザーがキャンセルを依頼した",
          semantic_gist: "ホテル予約のキャンセル依頼",
          predictive_cue: "キャンセル可能日の案内",
        })
      )
      .on("reply", "キャンセルは平日のみ承れます。");
    const knowledge = new VectorKnowledgeStore({ embedder: new HashingEmbedder() });
    const controller = createController(testConfig(), { llm, knowledge, reflectiveLog: new InMemoryReflectiveLog(), store });

    const { state: committed, reply } = await runTurn(controller, "hotel", "キャンセルして");

    expect(llm.callsFor("qualify")).toHaveLength(0);
    expect(committed.constraints).toEqual(["平日のみキャンセル可能"]);
    expect(committed.goal_orientation).toBe("ホテル予約を完了する");
    expect(committed.episodic_trace).toBe("ユーザーがキャンセルを依頼した");
    expect(committed.semantic_gist).toBe("ホテル予約のキャンセル依頼");
    expect(committed.retrieved_artifacts).toEqual([]);
    expect(controller.readState("hotel")).toMatchObject({ found: true, turn: 2 });

    const [replyCall] = llm.callsFor("reply");
    expect(replyCall.messages[0].content).toContain("平日のみキャンセル可能");
    expect(replyCall.messages[1].content).toBe("キャンセルして");
    expect(reply).toBe("キャンセルは平日のみ承れます。");
  });

  it("shows facts remembered in earlier turns to later compressions", async () => {
    const llm = new FakeLLM()
      .on("compress", compression({ semantic_gist: "Introductions" }))
      .on("reply", "Nice to meet you.")
      .on("extract", '{"facts":["User is Aiko"]}', '{"facts":[]}');
    const knowledge = new VectorKnowledgeStore({ embedder: new HashingEmbedder() });
    const longTermMemory = new InMemoryLongTermMemory();
    const controller = createController(testConfig(), {
      llm,
      knowledge,
      reflectiveLog: new InMemoryReflectiveLog(),
      longTermMemory,
    });

    await runTurn(controller, "intro", "I'm Aiko");
    await runTurn(controller, "intro", "what should we do today?");

    expect(longTermMemory.list()).toEqual(["User is Aiko"]);
    const [first, second] = llm.callsFor("compress");
    expect(first.messages[0].content).toContain("# Existing long-term knowledge\n(none)");
    expect(second.messages[0].content).toContain("# Existing long-term knowledge\n- User is Aiko");
  });

  it("revises the goal on a cancellation request and keeps the order id in focus", async () => {
    const llm = new FakeLLM()
      .on(
        "compress",
        compression({
          semantic_gist: "注文ABC-123の配送状況の確認依頼",
          focal_entities: ["ABC-123"],
          goal_orientation: "注文ABC-123の配送状況を確認する",
        }),
        compression(
          {
            semantic_gist: "注文ABC-123のキャンセル依頼",
            focal_entities: ["ABC-123"],
            goal_orientation: "注文ABC-123をキャンセルする",
            predictive_cue: "キャンセル完了の確認",
          },
          { goal_revised: true }
        )
      )
      .on("reply", "承知しました。");
    const { controller } = build(llm);

    const first = await runTurn(controller, "jp", "注文番号ABC-123の配送状況を確認して");
    expect(first.state.goal_orientation).toBe("注文ABC-123の配送状況を確認する");

    const second = await runTurn(controller, "jp", "やっぱりキャンセルして");
    expect(second.state.goal_orientation).toBe("注文ABC-123をキャンセルする");
    expect(second.state.focal_entities).toEqual(["ABC-123"]);
    expect(second.state.predictive_cue).toBe("キャンセル完了の確認");
    expect(second.reply).toBe("承知しました。");

    const [, replyCall] = llm.callsFor("reply");
    expect(replyCall.messages[0].content).toContain("注文ABC-123をキャンセルする");
    expect(replyCall.messages[1].content).toBe("やっぱりキャンセルして");
  });
});
