/**
 * Bounded Cognitive State: the only memory object a session carries between turns.
 * Field names are the wire names (flat record, snake_case).
 */

import { z } from "zod";
import { StateValidationError } from "../errors";
import { errorMessage } from "../logging";

export interface StateBounds {
  episodicTraceChars: number;
  semanticGistChars: number;
  goalChars: number;
  predictiveCueChars: number;
  uncertaintyChars: number;
  maxFocalEntities: number;
  maxRelationalMap: number;
  maxConstraints: number;
  maxRetrievedArtifacts: number;
  /** Max length of a single collection entry (entity, relation, constraint, reference). */
  entryChars: number;
}

export const DEFAULT_STATE_BOUNDS: StateBounds = {
  episodicTraceChars: 600,
  semanticGistChars: 600,
  goalChars: 300,
  predictiveCueChars: 300,
  uncertaintyChars: 600,
  maxFocalEntities: 12,
  maxRelationalMap: 12,
  maxConstraints: 16,
  maxRetrievedArtifacts: 8,
  entryChars: 200,
};

export interface CognitiveState {
  episodic_trace: string;
  semantic_gist: string;
  focal_entities: string[];
  relational_map: string[];
  goal_orientation: string;
  constraints: string[];
  predictive_cue: string | null;
  uncertainty_signal: string;
  retrieved_artifacts: string[];
}

export const STATE_FIELDS = [
  "episodic_trace",
  "semantic_gist",
  "focal_entities",
  "relational_map",
  "goal_orientation",
  "constraints",
  "predictive_cue",
  "uncertainty_signal",
  "retrieved_artifacts",
] as const satisfies ReadonlyArray<keyof CognitiveState>;

/**
 * What the language model is asked to produce. Unbounded on purpose: provider-side structured
 * output rejects length keywords, so bounds are checked locally by buildStateSchema.
 * retrieved_artifacts is absent; the core fills it with references.
 */
export const StateDraftSchema = z.object({
  episodic_trace: z.string().describe("Concise record of the most recent observed facts, user input and tool results"),
  semantic_gist: z.string().describe("Abstract summary of the current topic and situation"),
  focal_entities: z.array(z.string()).describe("Identifiers and proper nouns currently relevant"),
  relational_map: z.array(z.string()).describe("Causal or temporal dependencies between events"),
  goal_orientation: z.string().describe("The standing task objective"),
  constraints: z.array(z.string()).describe("Hard rules, prohibitions and policies that must never be violated"),
  predictive_cue: z.string().nullable().describe("Anticipated next step, or null"),
  uncertainty_signal: z.string().describe("Unverified items and open risks"),
});

export type StateDraft = z.infer<typeof StateDraftSchema>;

export const CompressionResultSchema = z.object({
  state: StateDraftSchema,
  goal_revised: z
    .boolean()
    .describe("True only if the current input explicitly changes or completes the goal"),
  retired_constraints: z
    .array(z.string())
    .describe("Previous constraints the current input explicitly revokes, copied verbatim"),
});

export type CompressionResult = z.infer<typeof CompressionResultSchema>;

export function dedupe(values: readonly string[]): string[] {
  const seen = new Set<string>();
  const out: string[] = [];
  for (const v of values) {
    if (seen.has(v)) continue;
    seen.add(v);
    out.push(v);
  }
  return out;
}

/** Build the bounded validation schema for the configured limits. */
export function buildStateSchema(bounds: StateBounds) {
  const entry = z.string().max(bounds.entryChars);
  return z.object({
    episodic_trace: z.string().max(bounds.episodicTraceChars),
    semantic_gist: z.string().max(bounds.semanticGistChars),
    focal_entities: z
      .array(entry)
      .transform(dedupe)
      .refine((a) => a.length <= bounds.maxFocalEntities, {
        message: `Array must contain at most ${bounds.maxFocalEntities} element(s)`,
      }),
    relational_map: z.array(entry).max(bounds.maxRelationalMap),
    goal_orientation: z.string().max(bounds.goalChars),
    constraints: z.array(entry).max(bounds.maxConstraints),
    predictive_cue: z.string().max(bounds.predictiveCueChars).nullable(),
    uncertainty_signal: z.string().max(bounds.uncertaintyChars),
    retrieved_artifacts: z.array(entry).max(bounds.maxRetrievedArtifacts),
  });
}

export type StateValidation = { ok: true; state: CognitiveState } | { ok: false; issues: string[] };

export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`);
}

export function validateState(candidate: unknown, bounds: StateBounds): StateValidation {
  const result = buildStateSchema(bounds).safeParse(candidate);
  if (!result.success) return { ok: false, issues: formatIssues(result.error) };
  return { ok: true, state: result.data };
}

export function emptyState(): CognitiveState {
  return {
    episodic_trace: "",
    semantic_gist: "",
    focal_entities: [],
    relational_map: [],
    goal_orientation: "",
    constraints: [],
    predictive_cue: null,
    uncertainty_signal: "",
    retrieved_artifacts: [],
  };
}

export function cloneState(state: CognitiveState): CognitiveState {
  return {
    ...state,
    focal_entities: [...state.focal_entities],
    relational_map: [...state.relational_map],
    constraints: [...state.constraints],
    retrieved_artifacts: [...state.retrieved_artifacts],
  };
}

/** Serialize with a fixed field order so equal states serialize identically. */
export function serializeState(state: CognitiveState): string {
  const ordered: Record<string, unknown> = {};
  for (const field of STATE_FIELDS) ordered[field] = state[field];
  return JSON.stringify(ordered);
}

export function parseState(json: string, bounds: StateBounds): CognitiveState {
  let raw: unknown;
  try {
    raw = JSON.parse(json);
  } catch (err) {
    throw new StateValidationError([`(root): invalid JSON (${errorMessage(err)})`]);
  }
  const result = validateState(raw, bounds);
  if (!result.ok) throw new StateValidationError(result.issues);
  return result.state;
}

/** Cut text to at most `max` characters, keeping the tail when `keep` is "end". */
export function clampText(text: string, max: number, keep: "start" | "end" = "start"): string {
  if (text.length <= max) return text;
  return keep === "end" ? text.slice(text.length - max) : text.slice(0, max);
}
