/**
 * Core Run Context
 *
 * Provides the RunContext interface and factory function handed to every
 * publish stage. This module is the single source of truth for RunContext.
 */

import type { Logger } from 'pino';

// ===== TYPES =====

/**
 * Progress reporting function for run feedback.
 *
 * Stages call this when a variant or target changes state. The implementation
 * may forward updates to the console, a UI or a test recorder.
 *
 * @param message - Human-readable progress message
 * @param progress - Current progress value (optional)
 * @param total - Total progress value (optional)
 */
export type ProgressReporter = (
  message: string,
  progress?: number,
  total?: number,
) => Promise<void>;

/**
 * Context every stage receives during a run.
 */
export interface RunContext {
  /**
   * Optional abort signal for cancellation support.
   * Long-running stages pass it on to the build engine and the Docker daemon.
   */
  signal?: AbortSignal;

  /**
   * Optional progress reporting function for user feedback.
   */
  progress?: ProgressReporter;

  /**
   * Logger for debugging and error tracking.
   * Required for all stages - use this for structured logging instead of console.log.
   */
  logger: Logger;
}

// ===== CONTEXT OPTIONS =====

/**
 * Options for creating a run context.
 */
export interface ContextOptions {
  /** Optional abort signal for cancellation */
  signal?: AbortSignal;

  /** Optional progress reporter function */
  progress?: ProgressReporter;
}

// ===== CONTEXT FACTORY =====

/**
 * Create a RunContext for a publish run.
 *
 * @example
 * ```typescript
 * const logger = createLogger({ name: 'publish' });
 * const controller = new AbortController();
 * const ctx = createRunContext(logger, {
 *   signal: controller.signal,
 *   progress: async (msg) => console.error(msg),
 * });
 * ```
 */
export function createRunContext(logger: Logger, options: ContextOptions = {}): RunContext {
  const { signal, progress } = options;

  // Only include optional properties if defined
  const ctx: RunContext = { logger };

  if (signal !== undefined) ctx.signal = signal;
  if (progress !== undefined) ctx.progress = progress;

  return ctx;
}

/**
 * Report progress if the context has a reporter. Reporter failures are logged
 * and never interrupt the run.
 */
export async function reportProgress(ctx: RunContext, message: string, progress?: number, total?: number): Promise<void> {
  if (!ctx.progress) return;
  try {
    await ctx.progress(message, progress, total);
  } catch (error) {
    ctx.logger.warn({ error, message }, 'Progress reporter failed');
  }
}
