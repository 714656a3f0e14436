/**
 * Knowledge store factory: embedder and persistence chosen from config.
 */

import * as path from "path";
import type { AppConfig } from "../../config";
import type { IEmbedder, IKnowledgeStore } from "./types";
import { HashingEmbedder, OpenAIEmbedder } from "./embedders";
import { VectorKnowledgeStore } from "./vector-store";
import { logger } from "../../logging";

export type { Artifact, ArtifactInput, ArtifactKind, ScoredArtifact, IKnowledgeStore, IEmbedder } from "./types";
export { originTurnRef } from "./types";
export { HashingEmbedder, OpenAIEmbedder, cosineSimilarity } from "./embedders";
export { VectorKnowledgeStore } from "./vector-store";

export function createEmbedder(config: AppConfig): IEmbedder {
  const { embedder, embeddingModel } = config.knowledge;
  if (embedder === "openai") {
    if (config.llm.openaiApiKey) {
      return new OpenAIEmbedder({
        apiKey: config.llm.openaiApiKey,
        model: embeddingModel,
        baseUrl: config.llm.openaiBaseUrl,
      });
    }
    logger.warn({ event: "EMBEDDER_FALLBACK" }, "EMBEDDER=openai without OPENAI_API_KEY; using hashing embedder");
  }
  return new HashingEmbedder();
}

export function createKnowledgeStore(config: AppConfig): IKnowledgeStore {
  const { dataDir, namespace } = config.knowledge;
  return new VectorKnowledgeStore({
    embedder: createEmbedder(config),
    filePath: dataDir ? path.join(dataDir, `${namespace}.artifacts.jsonl`) : undefined,
  });
}
