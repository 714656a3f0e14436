/**
 * Pull JSON payloads out of model output and validate them against a schema.
 *
 * Failure modes seen in practice:
 * - fenced ```json blocks
 * - leading/trailing prose around the JSON
 * - several JSON blocks, of which only one is the answer
 */

import type { z } from "zod";
import { formatIssues } from "../../state/schema";

export function stripCodeFences(text: string): string {
  return text.replace(/```(?:json)?\s*([\s\S]*?)```/gi, (_m, inner: string) => inner.trim());
}

export function extractJsonCandidates(text: string): string[] {
  const cleaned = stripCodeFences(text.trim());
  const candidates: string[] = [];

  if (cleaned.length > 0) candidates.push(cleaned);
  candidates.push(...scanBalancedJsonBlocks(cleaned));

  const seen = new Set<string>();
  return candidates
    .map((c) => c.trim())
    .filter((c) => c.length > 0)
    .filter((c) => {
      if (seen.has(c)) return false;
      seen.add(c);
      return true;
    });
}

function scanBalancedJsonBlocks(text: string): string[] {
  const out: string[] = [];
  const closes: Record<string, string> = { "{": "}", "[": "]" };

  for (let i = 0; i < text.length; i++) {
    const start = text[i];
    const expectedClose = closes[start];
    if (!expectedClose) continue;

    let depth = 0;
    let inString = false;
    let escape = false;

    for (let j = i; j < text.length; j++) {
      const ch = text[j];

      if (inString) {
        if (escape) {
          escape = false;
        } else if (ch === "\\") {
          escape = true;
        } else if (ch === "\"") {
          inString = false;
        }
        continue;
      }

      if (ch === "\"") {
        inString = true;
        continue;
      }

      if (ch === start) depth++;
      if (ch === expectedClose) depth--;

      if (depth === 0) {
        out.push(text.slice(i, j + 1).trim());
        i = j;
        break;
      }
    }
  }

  return out;
}

export type StructuredParse<T> = { ok: true; value: T } | { ok: false; issues: string[] };

/**
 * Try each JSON candidate in order; the first that parses and validates wins.
 * On failure, reports the schema issues of the first candidate that was valid JSON.
 */
export function parseStructured<S extends z.ZodTypeAny>(text: string, schema: S): StructuredParse<z.output<S>> {
  const candidates = extractJsonCandidates(text);
  if (candidates.length === 0) return { ok: false, issues: ["(root): empty response"] };

  let firstIssues: string[] | undefined;
  for (const candidate of candidates) {
    let raw: unknown;
    try {
      raw = JSON.parse(candidate);
    } catch {
      continue;
    }
    const result = schema.safeParse(raw);
    if (result.success) return { ok: true, value: result.data };
    firstIssues ??= formatIssues(result.error);
  }
  return { ok: false, issues: firstIssues ?? ["(root): response is not valid JSON"] };
}
