/**
 * Shared Runtime Logging - Run Start/Summary/Abort Logging
 *
 * Provides consistent logging behavior for CLI commands: structured pino
 * records plus short human lines written through `output` (stderr in the
 * CLI). Without `output` only the structured records are written.
 */

import type { Logger } from 'pino';
import { EXIT_CODES } from '@/types';
import type { RunSummary } from '@/app/orchestrator-types';
import { formatSummaryLines } from '@/app/summary';

/**
 * Run startup information
 */
export interface RunStartInfo {
  /** Application version */
  version: string;
  /** Configuration file path */
  configPath: string;
  /** `registry/repository` being published */
  repository: string;
  variants: string[];
  /** Log level */
  logLevel: string;
}

export type LineWriter = (line: string) => void;

/**
 * Log run start in a consistent format
 */
export function logRunStart(info: RunStartInfo, logger: Logger, output?: LineWriter): void {
  logger.info(
    {
      version: info.version,
      config: info.configPath,
      repository: info.repository,
      variants: info.variants,
      logLevel: info.logLevel,
    },
    'Starting image publish',
  );

  if (output) {
    output('🚀 Starting image publish...');
    output(`📦 Repository: ${info.repository}`);
    output(`🧩 Variants: ${info.variants.join(', ')}`);
  }
}

/**
 * Log the run summary: one line per variant plus totals
 */
export function logRunSummary(summary: RunSummary, logger: Logger, output?: LineWriter): void {
  const log = summary.state === 'Done' ? logger.info.bind(logger) : logger.error.bind(logger);
  log(
    {
      runId: summary.runId,
      state: summary.state,
      failedStage: summary.failedStage,
      error: summary.error?.kind,
      exitCode: summary.exitCode,
      published: summary.published.length,
      failed: summary.failed.length,
      cancelled: summary.cancelled.length,
      durationMs: summary.durationMs,
    },
    'Publish run summary',
  );

  if (output) {
    formatSummaryLines(summary).forEach((line) => output(line));
  }
}

/**
 * Log run failure outside the orchestrator (configuration, unexpected errors)
 */
export function logRunFailure(error: Error, logger: Logger, output?: LineWriter): void {
  logger.error({ error }, 'Image publish failed');

  if (output) {
    output('❌ Image publish failed');
    output(`🔍 Error: ${error.message}`);
  }
}

/**
 * Install SIGINT/SIGTERM handlers that abort the run. A second signal exits
 * immediately. Returns a function that removes the handlers.
 */
export function installAbortHandlers(
  controller: AbortController,
  logger: Logger,
  output?: LineWriter,
  exit: (code: number) => void = (code) => process.exit(code),
): () => void {
  const onSignal = (signal: NodeJS.Signals): void => {
    if (controller.signal.aborted) {
      logger.error({ signal }, 'Second signal received, exiting immediately');
      exit(EXIT_CODES.cancelled);
      return;
    }

    logger.warn({ signal }, 'Abort requested, cancelling in-flight builds and pushes');
    output?.(`🛑 Received ${signal}, cancelling (press again to exit immediately)...`);
    controller.abort(new Error(`Received ${signal}`));
  };

  process.on('SIGINT', onSignal);
  process.on('SIGTERM', onSignal);

  return () => {
    process.off('SIGINT', onSignal);
    process.off('SIGTERM', onSignal);
  };
}
