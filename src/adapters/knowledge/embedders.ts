import OpenAI from "openai";
import type { IEmbedder } from "./types";

const DEFAULT_OPENAI_MODEL = "text-embedding-3-small";
const MAX_EMBED_INPUT_CHARS = 8000;

export class OpenAIEmbedder implements IEmbedder {
  readonly name: string;
  private client: OpenAI;

  constructor(cfg: { apiKey: string; model?: string; baseUrl?: string }) {
    this.name = cfg.model ?? DEFAULT_OPENAI_MODEL;
    this.client = new OpenAI({
      apiKey: cfg.apiKey,
      ...(cfg.baseUrl ? { baseURL: cfg.baseUrl } : {}),
    });
  }

  async embed(text: string, options?: { signal?: AbortSignal }): Promise<number[]> {
    const response = await this.client.embeddings.create(
      { model: this.name, input: text.slice(0, MAX_EMBED_INPUT_CHARS) },
      { signal: options?.signal }
    );
    return response.data[0]?.embedding ?? [];
  }
}

/**
 * Deterministic feature hashing over lowercase word tokens and character bigrams.
 * Bigrams give scripts without word spacing (Japanese, Chinese) usable overlap.
 * No network; used when no embedding provider is configured.
 */
export class HashingEmbedder implements IEmbedder {
  readonly name = "hashing";

  constructor(private readonly dimensions = 256) {}

  async embed(text: string): Promise<number[]> {
    const vector = new Array<number>(this.dimensions).fill(0);
    for (const feature of features(text)) {
      vector[fnv1a(feature) % this.dimensions] += 1;
    }
    return vector;
  }
}

export function features(text: string): string[] {
  const normalized = text.toLowerCase();
  const words = normalized.match(/[\p{L}\p{N}]+/gu) ?? [];
  const out: string[] = [];
  for (const word of words) {
    if (word.length > 1 && /^[\p{Script=Latin}\p{N}]+$/u.test(word)) {
      out.push(`w:${word}`);
      continue;
    }
    const chars = [...word];
    if (chars.length === 1) out.push(`c:${chars[0]}`);
    for (let i = 0; i + 1 < chars.length; i++) out.push(`b:${chars[i]}${chars[i + 1]}`);
  }
  return out;
}

function fnv1a(input: string): number {
  let hash = 0x811c9dc5;
  for (let i = 0; i < input.length; i++) {
    hash ^= input.charCodeAt(i);
    hash = Math.imul(hash, 0x01000193);
  }
  return hash >>> 0;
}

export function cosineSimilarity(a: number[], b: number[]): number {
  const n = Math.min(a.length, b.length);
  if (n === 0) return 0;
  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < n; i++) {
    const av = a[i] ?? 0;
    const bv = b[i] ?? 0;
    dot += av * bv;
    normA += av * av;
    normB += bv * bv;
  }
  const denom = Math.sqrt(normA) * Math.sqrt(normB);
  if (denom === 0) return 0;
  return dot / denom;
}
