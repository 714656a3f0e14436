/**
 * Recall: top-K candidate artifacts for the current turn. Read-only.
 * An unreachable or slow store yields an empty list; the turn continues.
 */

import type { IKnowledgeStore, ScoredArtifact } from "../adapters/knowledge";
import type { CognitiveState } from "../state/schema";
import type { TurnContext } from "./types";
import { RetrievalUnavailableError } from "../errors";
import { logger, logStageTrace, errorMessage } from "../logging";
import { withTimeout } from "./timeout";

export interface RecallOptions {
  topK: number;
  timeoutMs: number;
}

/** The input, biased by the prior gist and focal entities. */
export function buildRecallQuery(input: string, prior: CognitiveState | null): string {
  const parts = [input];
  if (prior?.semantic_gist) parts.push(`Context: ${prior.semantic_gist}`);
  if (prior && prior.focal_entities.length > 0) parts.push(`Entities: ${prior.focal_entities.join(", ")}`);
  return parts.join("\n");
}

export class Recall {
  constructor(
    private readonly store: IKnowledgeStore,
    private readonly options: RecallOptions
  ) {}

  async run(ctx: TurnContext, input: string, prior: CognitiveState | null): Promise<ScoredArtifact[]> {
    const query = buildRecallQuery(input, prior);
    const abort = new AbortController();
    try {
      const results = await withTimeout(
        this.store.search(query, this.options.topK, { signal: abort.signal }).catch((err: unknown) => {
          throw new RetrievalUnavailableError(`Knowledge store search failed: ${errorMessage(err)}`, { cause: err });
        }),
        this.options.timeoutMs,
        "Recall",
        () => abort.abort()
      );
      logStageTrace(logger, "recall", {
        ...ctx,
        input: query,
        output: results.map((r) => ({ id: r.artifact.id, score: r.score })),
      });
      return results;
    } catch (err) {
      logger.warn({ event: "RECALL_FAILED", ...ctx, err: errorMessage(err) }, "Recall unavailable; continuing with no candidates");
      return [];
    }
  }
}
