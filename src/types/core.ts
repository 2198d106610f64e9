/**
 * Result type for explicit error handling.
 *
 * Expected failures (a missing path, a tool that is not installed, no context
 * selected) travel as values; thrown errors are reserved for programming
 * mistakes and are converted to Failures at the orchestrator boundary.
 */

/**
 * Actionable guidance attached to a failed Result
 */
export interface ErrorGuidance {
  /** Short restatement of what went wrong */
  message?: string;
  /** Why it probably happened */
  hint?: string;
  /** What the caller can do about it */
  resolution?: string;
  /** Structured data for programmatic consumers (e.g. the error kind) */
  details?: Record<string, unknown>;
}

export type Result<T> =
  | { ok: true; value: T }
  | { ok: false; error: string; guidance?: ErrorGuidance };

export function Success<T>(value: T): Result<T> {
  return { ok: true, value };
}

export function Failure<T = never>(error: string, guidance?: ErrorGuidance): Result<T> {
  return guidance ? { ok: false, error, guidance } : { ok: false, error };
}
