/**
 * Failure taxonomy for the turn pipeline.
 * Stage code catches these and degrades; none of them escape a turn.
 */

export type PipelineErrorCode =
  | "state_validation"
  | "retrieval_unavailable"
  | "qualification_failure"
  | "generation_failure"
  | "consolidation_failure"
  | "capability_timeout";

export class PipelineError extends Error {
  constructor(
    readonly code: PipelineErrorCode,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Compressor output failed schema conformance. Carries the issue list for the repair prompt. */
export class StateValidationError extends PipelineError {
  constructor(readonly issues: string[]) {
    super("state_validation", `State validation failed: ${issues.join("; ")}`);
  }
}

export class RetrievalUnavailableError extends PipelineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("retrieval_unavailable", message, options);
  }
}

export class QualificationFailureError extends PipelineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("qualification_failure", message, options);
  }
}

export class GenerationFailureError extends PipelineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("generation_failure", message, options);
  }
}

export class ConsolidationFailureError extends PipelineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("consolidation_failure", message, options);
  }
}

export class CapabilityTimeoutError extends PipelineError {
  constructor(
    readonly label: string,
    readonly timeoutMs: number
  ) {
    super("capability_timeout", `${label} timed out after ${timeoutMs}ms`);
  }
}

export function isPipelineError(err: unknown): err is PipelineError {
  return err instanceof PipelineError;
}
