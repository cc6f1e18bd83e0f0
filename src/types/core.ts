/**
 * Result type for operations that can fail.
 *
 * Failures carry a message plus optional guidance the CLI prints
 * so the user knows what to try next.
 */

export interface ErrorGuidance {
  /** Short description of what went wrong */
  message?: string;
  /** Why it probably happened */
  hint?: string;
  /** What the user can do about it */
  resolution?: string;
  /** Structured context for debugging */
  details?: Record<string, unknown>;
}

export type Result<T> =
  | { ok: true; value: T }
  | { ok: false; error: string; guidance?: ErrorGuidance };

export const Success = <T>(value: T): Result<T> => ({ ok: true, value });

export const Failure = <T = never>(error: string, guidance?: ErrorGuidance): Result<T> =>
  guidance === undefined ? { ok: false, error } : { ok: false, error, guidance };
