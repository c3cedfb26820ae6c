/**
 * Core type definitions for the publish orchestrator.
 * Provides the Result type, the failure taxonomy and the run domain model.
 */

export * from './core';
export * from './errors';
export * from './publish';

/**
 * Run execution context
 *
 * @remarks
 * RunContext carries what every stage needs:
 * - `logger`: Structured logging with Pino
 * - `signal`: Optional AbortSignal for cancellation
 * - `progress`: Optional progress reporting callback
 *
 * @public
 */
export type { RunContext } from '../core/context';
