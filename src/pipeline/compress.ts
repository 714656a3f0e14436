/**
 * Compressor: fuses input, prior state and qualified artifacts into the next bounded state.
 *
 * Attempt policy: one structured request, then up to `repairRetries` repair requests quoting
 * the validation issues. A capability error or timeout, or exhausting the repairs, selects the
 * fallback: the prior state carried forward with a note in uncertainty_signal.
 */

import type { ILLM, Message } from "../adapters/llm";
import { parseStructured } from "../adapters/llm";
import type { PromptManager, QualifiedArtifact } from "../prompts/prompt-manager";
import {
  CompressionResultSchema,
  clampText,
  cloneState,
  dedupe,
  emptyState,
  validateState,
  type CognitiveState,
  type CompressionResult,
  type StateBounds,
} from "../state/schema";
import type { ILongTermMemory } from "../memory/long-term-memory";
import type { CompressionOutcome, TurnContext } from "./types";
import { CapabilityTimeoutError } from "../errors";
import { logger, logStageTrace, errorMessage } from "../logging";
import { withTimeout } from "./timeout";

export interface CompressorOptions {
  bounds: StateBounds;
  timeoutMs: number;
  repairRetries: number;
  maxTokens?: number;
  /** Facts already remembered, shown so the state does not duplicate them. */
  longTermMemory?: ILongTermMemory;
  longTermMemoryChars?: number;
}

export function constraintOverflowNote(dropped: readonly string[]): string {
  return `constraint limit reached; not recorded: ${dropped.map((c) => JSON.stringify(c)).join(", ")}`;
}

/**
 * Apply the persistence rules to a model result: the goal is kept verbatim unless revised,
 * prior constraints are kept verbatim unless retired, and retrieved_artifacts holds references
 * to this turn's qualified artifacts.
 *
 * Constraints are capped at the bound with the kept ones first; new constraints past the cap are
 * dropped and named in uncertainty_signal.
 */
export function applyCarryForward(
  prior: CognitiveState | null,
  result: CompressionResult,
  references: string[],
  bounds: StateBounds
): CognitiveState {
  const draft = result.state;
  const keepGoal = prior !== null && prior.goal_orientation.length > 0 && !result.goal_revised;
  const retired = new Set(result.retired_constraints);
  const keptConstraints = prior ? prior.constraints.filter((c) => !retired.has(c)) : [];
  const constraints = dedupe([...keptConstraints, ...draft.constraints]);
  const dropped = constraints.splice(bounds.maxConstraints);
  let uncertainty = draft.uncertainty_signal;
  if (dropped.length > 0) {
    const note = constraintOverflowNote(dropped);
    uncertainty = clampText(uncertainty ? `${uncertainty}\n${note}` : note, bounds.uncertaintyChars, "end");
  }
  return {
    episodic_trace: draft.episodic_trace,
    semantic_gist: draft.semantic_gist,
    focal_entities: dedupe(draft.focal_entities),
    relational_map: draft.relational_map,
    goal_orientation: keepGoal && prior ? prior.goal_orientation : draft.goal_orientation,
    constraints,
    predictive_cue: draft.predictive_cue,
    uncertainty_signal: uncertainty,
    retrieved_artifacts: references.slice(0, bounds.maxRetrievedArtifacts),
  };
}

export function compressionFailureNote(turn: number, reason: string): string {
  return `[turn ${turn}] state compression failed (${reason}); previous state carried forward unchanged.`;
}

/** Prior state unchanged except for the failure note, trimmed to the uncertainty bound. */
export function fallbackState(
  prior: CognitiveState | null,
  turn: number,
  reason: string,
  bounds: StateBounds
): CognitiveState {
  const base = prior ? cloneState(prior) : emptyState();
  const note = compressionFailureNote(turn, reason);
  const combined = base.uncertainty_signal ? `${base.uncertainty_signal}\n${note}` : note;
  return { ...base, uncertainty_signal: clampText(combined, bounds.uncertaintyChars, "end") };
}

export class Compressor {
  constructor(
    private readonly llm: ILLM,
    private readonly prompts: PromptManager,
    private readonly options: CompressorOptions
  ) {}

  async run(
    ctx: TurnContext,
    input: string,
    prior: CognitiveState | null,
    qualified: QualifiedArtifact[]
  ): Promise<CompressionOutcome> {
    const { bounds } = this.options;
    const longTermMemory = await this.readLongTermMemory(ctx);
    const base = this.prompts.compressMessages({ input, prior, qualified, longTermMemory });
    const references = qualified.map((a) => a.id);
    const maxAttempts = 1 + this.options.repairRetries;

    let messages: Message[] = base;
    let issues: string[] = [];
    let attempts = 0;
    while (attempts < maxAttempts) {
      attempts++;
      let text: string;
      try {
        text = await this.request(messages);
      } catch (err) {
        logger.warn({ event: "COMPRESS_CAPABILITY_FAILED", ...ctx, attempts, err: errorMessage(err) }, "Compression call failed");
        const reason = err instanceof CapabilityTimeoutError ? "model call timed out" : "model call failed";
        return this.fallback(ctx, prior, attempts, reason);
      }

      const parsed = parseStructured(text, CompressionResultSchema);
      if (parsed.ok) {
        const candidate = applyCarryForward(prior, parsed.value, references, bounds);
        const validation = validateState(candidate, bounds);
        if (validation.ok) {
          logStageTrace(logger, "compress", { ...ctx, input: messages, output: validation.state });
          return { kind: "compressed", state: validation.state, attempts };
        }
        issues = validation.issues;
      } else {
        issues = parsed.issues;
      }

      logger.warn({ event: "STATE_VALIDATION_FAILED", ...ctx, attempts, issues }, "Compressed state failed validation");
      messages = this.prompts.repairMessages(base, text, issues);
    }
    return this.fallback(ctx, prior, attempts, `output invalid after ${attempts} attempt(s)`);
  }

  /** Unreadable memory means an empty section, not a failed turn. */
  private async readLongTermMemory(ctx: TurnContext): Promise<string> {
    const { longTermMemory, longTermMemoryChars = 0 } = this.options;
    if (!longTermMemory || longTermMemoryChars <= 0) return "";
    try {
      return await withTimeout(longTermMemory.read(longTermMemoryChars), this.options.timeoutMs, "Long-term memory read");
    } catch (err) {
      logger.warn({ event: "LONG_TERM_MEMORY_READ_FAILED", ...ctx, err: errorMessage(err) }, "Long-term memory unavailable");
      return "";
    }
  }

  private async request(messages: Message[]): Promise<string> {
    const abort = new AbortController();
    const response = await withTimeout(
      this.llm.chat(messages, {
        responseFormat: { name: "compression_result", schema: CompressionResultSchema },
        temperature: 0,
        maxTokens: this.options.maxTokens ?? 1024,
        signal: abort.signal,
        label: "compress",
      }),
      this.options.timeoutMs,
      "Compress",
      () => abort.abort()
    );
    return response.text;
  }

  private fallback(
    ctx: TurnContext,
    prior: CognitiveState | null,
    attempts: number,
    reason: string
  ): CompressionOutcome {
    const state = fallbackState(prior, ctx.turn, reason, this.options.bounds);
    logger.warn({ event: "COMPRESS_FALLBACK", ...ctx, attempts, reason }, "Carrying previous state forward");
    logStageTrace(logger, "compress", { ...ctx, output: state });
    return { kind: "fallback", state, attempts, reason };
  }
}
