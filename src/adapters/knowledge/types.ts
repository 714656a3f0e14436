/**
 * Knowledge Store capability: long-term fact records with semantic search.
 * Records are append-only; a superseding fact is a new record.
 */

export type ArtifactKind = "semantic" | "episodic";

export interface Artifact {
  id: string;
  text: string;
  kind: ArtifactKind;
  /** Opaque to the core: whatever the store ranks by. */
  similarity: number[];
  /** ISO-8601 creation time. */
  timestamp: string;
  /** `<sessionId>#<turn>` of the turn that produced the record. */
  originTurn: string;
}

export interface ArtifactInput {
  text: string;
  kind: ArtifactKind;
  originTurn: string;
}

export interface ScoredArtifact {
  artifact: Artifact;
  /** Higher is more relevant. */
  score: number;
}

export interface IKnowledgeStore {
  /** Top-k artifacts for the query, best first. */
  search(query: string, k: number, options?: { signal?: AbortSignal }): Promise<ScoredArtifact[]>;
  /** An aborted signal stops the write if it has not reached storage yet. */
  append(input: ArtifactInput, options?: { signal?: AbortSignal }): Promise<Artifact>;
  /** Resolve a reference held in retrieved_artifacts. */
  get(id: string): Promise<Artifact | undefined>;
  size(): Promise<number>;
}

/** Turns text into a similarity vector. */
export interface IEmbedder {
  readonly name: string;
  embed(text: string, options?: { signal?: AbortSignal }): Promise<number[]>;
}

export function originTurnRef(sessionId: string, turn: number): string {
  return `${sessionId}#${turn}`;
}
