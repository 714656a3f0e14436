/**
 * Qualifier: keeps the recalled candidates this turn genuinely needs.
 * Fails closed: any model failure or timeout means nothing qualifies.
 * Only a reference and a short digest leave this stage.
 */

import { z } from "zod";
import type { ILLM } from "../adapters/llm";
import { parseStructured } from "../adapters/llm";
import type { ScoredArtifact } from "../adapters/knowledge";
import type { PromptManager, QualifiedArtifact } from "../prompts/prompt-manager";
import type { CognitiveState } from "../state/schema";
import { clampText } from "../state/schema";
import type { TurnContext } from "./types";
import { QualificationFailureError } from "../errors";
import { logger, logStageTrace, errorMessage } from "../logging";
import { withTimeout } from "./timeout";

export const QualificationSchema = z.object({
  selected: z.array(z.string()).describe("Ids of the facts that are indispensable for this turn"),
});

export interface QualifierOptions {
  timeoutMs: number;
  /** Characters of artifact text kept as the digest. */
  digestChars: number;
}

export class Qualifier {
  constructor(
    private readonly llm: ILLM,
    private readonly prompts: PromptManager,
    private readonly options: QualifierOptions
  ) {}

  async run(
    ctx: TurnContext,
    input: string,
    prior: CognitiveState | null,
    candidates: ScoredArtifact[]
  ): Promise<QualifiedArtifact[]> {
    if (candidates.length === 0) return [];
    const messages = this.prompts.qualifyMessages({
      input,
      prior,
      candidates: candidates.map((c) => ({ id: c.artifact.id, text: c.artifact.text })),
    });
    const abort = new AbortController();
    try {
      const response = await withTimeout(
        this.llm.chat(messages, {
          responseFormat: { name: "qualified_artifacts", schema: QualificationSchema },
          temperature: 0,
          signal: abort.signal,
          label: "qualify",
        }),
        this.options.timeoutMs,
        "Qualify",
        () => abort.abort()
      );
      const parsed = parseStructured(response.text, QualificationSchema);
      if (!parsed.ok) {
        throw new QualificationFailureError(`Unusable qualification output: ${parsed.issues.join("; ")}`);
      }
      const selected = new Set(parsed.value.selected);
      // Candidate order wins over the model's order; unknown ids are ignored.
      const qualified = candidates
        .filter((c) => selected.has(c.artifact.id))
        .map((c) => ({
          id: c.artifact.id,
          digest: clampText(c.artifact.text, this.options.digestChars),
          score: c.score,
        }));
      logStageTrace(logger, "qualify", { ...ctx, input: messages, output: qualified });
      return qualified;
    } catch (err) {
      logger.warn({ event: "QUALIFY_FAILED", ...ctx, err: errorMessage(err) }, "Qualification failed; no artifacts qualify");
      return [];
    }
  }
}
