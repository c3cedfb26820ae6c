/**
 * Result type and error guidance shared by every publish stage.
 */

import type { PublishError } from './errors';

/**
 * Operator-facing explanation attached to a failure.
 */
export interface ErrorGuidance {
  /** Short description of what went wrong */
  message: string;
  /** Likely cause */
  hint?: string;
  /** What the operator can do about it */
  resolution?: string;
  /** Structured context for logs and JSON output (never credentials) */
  details?: Record<string, unknown>;
}

export interface Ok<T> {
  ok: true;
  value: T;
}

export interface Err<E> {
  ok: false;
  /** Human-readable error message */
  error: string;
  /** Typed failure reason used for routing, retry decisions and exit codes */
  reason: E;
  guidance?: ErrorGuidance;
}

/**
 * Result of a fallible operation. Failures carry a typed reason
 * (a {@link PublishError} unless the layer declares its own).
 */
export type Result<T, E = PublishError> = Ok<T> | Err<E>;

export function Success<T>(value: T): Ok<T> {
  return { ok: true, value };
}

export function Failure<E>(error: string, reason: E, guidance?: ErrorGuidance): Err<E> {
  const failure: Err<E> = { ok: false, error, reason };
  if (guidance !== undefined) failure.guidance = guidance;
  return failure;
}
