/**
 * Pino logger factory.
 *
 * Logs go to stderr so stdout stays free for machine-readable output.
 * Credential-bearing paths are redacted at the logger level.
 */

import pino, { type DestinationStream, type LevelWithSilent, type Logger } from 'pino';

export const REDACTED_PATHS = [
  'token',
  'password',
  'auth',
  'authConfig',
  'credential.token',
  'credentials.token',
  '*.token',
  '*.password',
  '*.auth',
  '*.authConfig',
];

export interface LoggerOptions {
  name: string;
  level?: LevelWithSilent;
  /** Write destination; defaults to stderr */
  destination?: DestinationStream;
}

const LOG_LEVELS: readonly LevelWithSilent[] = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'];

export function isLogLevel(value: string): value is LevelWithSilent {
  return LOG_LEVELS.some((level) => level === value);
}

function levelFromEnv(): LevelWithSilent {
  const fromEnv = process.env.LOG_LEVEL?.toLowerCase();
  return fromEnv && isLogLevel(fromEnv) ? fromEnv : 'info';
}

export function createLogger(options: LoggerOptions): Logger {
  return pino(
    {
      name: options.name,
      level: options.level ?? levelFromEnv(),
      redact: { paths: REDACTED_PATHS, censor: '[redacted]' },
    },
    options.destination ?? pino.destination(2),
  );
}

/**
 * Child logger scoped to one publish component.
 */
export function getComponentLogger(logger: Logger, component: string): Logger {
  return logger.child({ component });
}

export interface Timer {
  end(details?: Record<string, unknown>): number;
  error(error: unknown, details?: Record<string, unknown>): number;
}

/**
 * Measure and log the duration of an operation.
 */
export function createTimer(logger: Logger, operation: string): Timer {
  const startedAt = Date.now();
  return {
    end(details = {}) {
      const durationMs = Date.now() - startedAt;
      logger.debug({ operation, durationMs, ...details }, 'Operation completed');
      return durationMs;
    },
    error(error, details = {}) {
      const durationMs = Date.now() - startedAt;
      logger.error({ operation, durationMs, error, ...details }, 'Operation failed');
      return durationMs;
    },
  };
}
