/**
 * Artifact store ranked by cosine similarity over embedder vectors.
 * Held in memory; when a file path is given, records are appended as JSONL and reloaded on first use.
 */

import * as fs from "fs";
import * as path from "path";
import { randomUUID } from "crypto";
import { z } from "zod";
import type { Artifact, ArtifactInput, IEmbedder, IKnowledgeStore, ScoredArtifact } from "./types";
import { cosineSimilarity } from "./embedders";
import { logger } from "../../logging";

export interface VectorKnowledgeStoreOptions {
  embedder: IEmbedder;
  /** JSONL file for persistence. Unset = memory only. */
  filePath?: string;
  /** Results scoring at or below this are dropped (default 0). */
  minScore?: number;
  now?: () => Date;
}

export class VectorKnowledgeStore implements IKnowledgeStore {
  private readonly artifacts = new Map<string, Artifact>();
  private readonly embedder: IEmbedder;
  private readonly filePath: string | undefined;
  private readonly minScore: number;
  private readonly now: () => Date;
  private loaded: Promise<void> | null = null;

  constructor(options: VectorKnowledgeStoreOptions) {
    this.embedder = options.embedder;
    this.filePath = options.filePath;
    this.minScore = options.minScore ?? 0;
    this.now = options.now ?? (() => new Date());
  }

  async search(query: string, k: number, options?: { signal?: AbortSignal }): Promise<ScoredArtifact[]> {
    await this.ensureLoaded();
    if (k <= 0 || this.artifacts.size === 0) return [];
    const queryVector = await this.embedder.embed(query, options);
    return [...this.artifacts.values()]
      .map((artifact) => ({ artifact, score: cosineSimilarity(queryVector, artifact.similarity) }))
      .filter((r) => Number.isFinite(r.score) && r.score > this.minScore)
      .sort((a, b) => b.score - a.score)
      .slice(0, k);
  }

  async append(input: ArtifactInput, options?: { signal?: AbortSignal }): Promise<Artifact> {
    await this.ensureLoaded();
    const artifact: Artifact = {
      id: randomUUID(),
      text: input.text,
      kind: input.kind,
      similarity: await this.embedder.embed(input.text, options),
      timestamp: this.now().toISOString(),
      originTurn: input.originTurn,
    };
    if (options?.signal?.aborted) throw new Error("Knowledge append aborted");
    if (this.filePath) {
      await fs.promises.mkdir(path.dirname(this.filePath), { recursive: true });
      await fs.promises.appendFile(this.filePath, JSON.stringify(artifact) + "\n", "utf8");
    }
    this.artifacts.set(artifact.id, artifact);
    return artifact;
  }

  async get(id: string): Promise<Artifact | undefined> {
    await this.ensureLoaded();
    return this.artifacts.get(id);
  }

  async size(): Promise<number> {
    await this.ensureLoaded();
    return this.artifacts.size;
  }

  /** A failed load is not cached; the next call reads again. */
  private ensureLoaded(): Promise<void> {
    this.loaded ??= this.load().catch((err: unknown) => {
      this.loaded = null;
      throw err;
    });
    return this.loaded;
  }

  private async load(): Promise<void> {
    if (!this.filePath || !fs.existsSync(this.filePath)) return;
    const raw = await fs.promises.readFile(this.filePath, "utf8");
    let skipped = 0;
    for (const line of raw.split("\n")) {
      if (!line.trim()) continue;
      const artifact = parseArtifactLine(line);
      if (artifact) this.artifacts.set(artifact.id, artifact);
      else skipped++;
    }
    if (skipped > 0) {
      logger.warn({ event: "KNOWLEDGE_LINES_SKIPPED", filePath: this.filePath, skipped }, "Skipped unreadable artifact lines");
    }
  }
}

const ArtifactLineSchema = z.object({
  id: z.string(),
  text: z.string(),
  kind: z.enum(["semantic", "episodic"]),
  similarity: z.array(z.number()),
  timestamp: z.string(),
  originTurn: z.string(),
});

function parseArtifactLine(line: string): Artifact | null {
  let raw: unknown;
  try {
    raw = JSON.parse(line);
  } catch {
    return null;
  }
  const result = ArtifactLineSchema.safeParse(raw);
  return result.success ? result.data : null;
}
