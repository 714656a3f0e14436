import type { Message } from "../adapters/llm";
import type { CognitiveState } from "../state/schema";
import type { Instructions } from "./instructions";
import { EMPTY_INSTRUCTIONS } from "./instructions";

/** What the Qualifier sees of a recalled artifact. */
export interface CandidateView {
  id: string;
  text: string;
}

/** What survives qualification: a reference plus a short digest, never the full record. */
export interface QualifiedArtifact {
  id: string;
  digest: string;
  score: number;
}

const NONE = "(none)";

function renderState(state: CognitiveState | null): string {
  return state ? JSON.stringify(state, null, 2) : "(none: first turn)";
}

function section(title: string, body: string): string {
  return `# ${title}\n${body.trim() || NONE}`;
}

/**
 * PromptManager
 *
 * Centralizes the prompts for every model-backed stage so wording can evolve
 * without touching the pipeline. Instruction text is inserted verbatim.
 */
export class PromptManager {
  constructor(private readonly instructions: Instructions = EMPTY_INSTRUCTIONS) {}

  qualifyMessages(args: { input: string; prior: CognitiveState | null; candidates: CandidateView[] }): Message[] {
    const list = args.candidates.map((c) => `- [${c.id}] ${c.text}`).join("\n");
    const system = [
      "You screen recalled long-term facts.",
      "Keep only the facts that are indispensable for deciding or answering the current input correctly.",
      "Drop anything weakly related or already inferable from the previous state or the input.",
      'Return JSON {"selected": [ids]} using the bracketed ids exactly; an empty list when nothing qualifies.',
      "",
      section("Previous state", renderState(args.prior)),
      "",
      section("Current input", args.input),
      "",
      section("Recalled facts", list),
    ].join("\n");
    return [{ role: "system", content: system }];
  }

  compressMessages(args: {
    input: string;
    prior: CognitiveState | null;
    qualified: QualifiedArtifact[];
    longTermMemory?: string;
  }): Message[] {
    const facts = args.qualified.map((a) => `- [${a.id}] ${a.digest}`).join("\n");
    const system = [
      "You are the cognitive manager of an assistant. Do not keep the conversation log;",
      "rewrite the bounded state that the next decision needs.",
      "",
      section("Operating protocol", this.instructions.agents),
      "",
      section("Existing long-term knowledge", args.longTermMemory ?? ""),
      "",
      section("Previous state", renderState(args.prior)),
      "",
      section("Qualified facts", facts),
      "",
      "Rules:",
      "1. goal_orientation and constraints persist verbatim unless the current input explicitly changes them.",
      "   Set goal_revised=true only when it does; list revoked constraints verbatim in retired_constraints.",
      "2. Forget unimportant detail; overwrite every field with the latest facts, keep each field short.",
      "3. episodic_trace records what just happened; semantic_gist summarizes the situation as a whole.",
      "4. focal_entities lists identifiers and proper nouns that matter now, without duplicates.",
      "5. Put unverified items and open risks in uncertainty_signal; predictive_cue is the likely next step or null.",
      "6. Do not copy into the state what the existing long-term knowledge already records.",
    ].join("\n");
    return [
      { role: "system", content: system },
      { role: "user", content: args.input },
    ];
  }

  /** Follow-up after an invalid compression: show the model its output and what was wrong. */
  repairMessages(base: Message[], previousOutput: string, issues: string[]): Message[] {
    return [
      ...base,
      { role: "assistant", content: previousOutput || "(empty)" },
      {
        role: "user",
        content: [
          "That output failed validation:",
          ...issues.map((i) => `- ${i}`),
          "Return the corrected JSON object only, keeping every field within its limits.",
        ].join("\n"),
      },
    ];
  }

  /** Reply prompt: instructions, the committed state and the input. No transcript. */
  replyMessages(args: { input: string; state: CognitiveState }): Message[] {
    const system = [
      this.instructions.soul.trim(),
      this.instructions.user.trim(),
      this.instructions.agents.trim(),
      "You are an AI assistant. The compressed cognitive state below is your only context;",
      "there is no raw conversation history. Answer the user's input from it, in the user's language.",
      "Always honor the constraints.",
      "",
      section("Current cognitive state", renderState(args.state)),
    ]
      .filter((part, i) => i > 2 || part.length > 0)
      .join("\n");
    return [
      { role: "system", content: system },
      { role: "user", content: args.input },
    ];
  }

  extractMessages(args: { input: string; reply: string; state: CognitiveState; maxFacts: number }): Message[] {
    const system = [
      "You select what the assistant should remember long-term from one exchange.",
      `Return JSON {"facts": [...]} with at most ${args.maxFacts} short standalone statements.`,
      "Keep: user attributes and self-introductions, preferences, project decisions, prohibitions.",
      "Skip: greetings and pleasantries, one-off small talk, feedback on the assistant's own behavior.",
      "",
      section("User input", args.input),
      "",
      section("Assistant reply", args.reply),
      "",
      section("Current gist", args.state.semantic_gist),
    ].join("\n");
    return [{ role: "system", content: system }];
  }
}
