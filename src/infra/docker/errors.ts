/**
 * Docker error normalisation.
 *
 * dockerode surfaces daemon failures as Errors decorated with the HTTP status
 * and the daemon's JSON body; network failures carry a Node error code.
 * Push progress errors arrive as plain strings.
 */

import type { ErrorGuidance } from '@/types';

export interface DockerodeError extends Error {
  statusCode?: number;
  json?: Record<string, unknown>;
  reason?: string;
  code?: string;
}

function hasDockerodeProperties(error: Error): error is DockerodeError {
  return (
    'statusCode' in error ||
    'json' in error ||
    'reason' in error ||
    'code' in error
  );
}

const TRANSIENT_CODES = new Set([
  'ECONNRESET',
  'ECONNREFUSED',
  'ECONNABORTED',
  'ETIMEDOUT',
  'EPIPE',
  'EAI_AGAIN',
  'ENOTFOUND',
  'ENETUNREACH',
  'EHOSTUNREACH',
]);

const TRANSIENT_MESSAGES = [
  'timeout',
  'timed out',
  'connection reset',
  'connection refused',
  'broken pipe',
  'socket hang up',
  'tls handshake',
  'unexpected eof',
  'i/o timeout',
  'too many requests',
  'internal server error',
  'service unavailable',
  'bad gateway',
  'gateway timeout',
  'temporary failure',
];

// Push progress events carry the registry status only as text
const SERVER_STATUS_IN_MESSAGE = /\b(?:status|code)\b\D{0,8}\b5\d\d\b/;

/**
 * Failure raised by the Docker client layer.
 */
export interface EngineError {
  operation: 'auth' | 'inspect' | 'tag' | 'push' | 'remove' | 'ping';
  message: string;
  statusCode?: number;
  code?: string;
  /** Worth retrying: network trouble, 5xx or 429 */
  transient: boolean;
}

export function statusCodeOf(error: unknown): number | undefined {
  if (error instanceof Error && hasDockerodeProperties(error) && typeof error.statusCode === 'number') {
    return error.statusCode;
  }
  return undefined;
}

function daemonMessage(error: DockerodeError): string | undefined {
  const message = error.json?.message;
  return typeof message === 'string' ? message : undefined;
}

/**
 * Transient errors are retried by the publisher; everything else is final.
 */
export function isTransientDockerError(error: unknown): boolean {
  const statusCode = statusCodeOf(error);
  if (statusCode !== undefined) {
    return statusCode >= 500 || statusCode === 429 || statusCode === 408;
  }

  if (error instanceof Error && hasDockerodeProperties(error) && error.code && TRANSIENT_CODES.has(error.code)) {
    return true;
  }

  const message = (error instanceof Error ? error.message : String(error)).toLowerCase();
  if (message.includes('unauthorized') || message.includes('denied') || message.includes('forbidden')) {
    return false;
  }
  return TRANSIENT_MESSAGES.some((fragment) => message.includes(fragment)) || SERVER_STATUS_IN_MESSAGE.test(message);
}

/**
 * Turn any Docker failure into operator guidance.
 */
export function extractDockerErrorGuidance(error: unknown): ErrorGuidance & { details: Record<string, unknown> } {
  if (!(error instanceof Error)) {
    return {
      message: String(error),
      hint: 'An unexpected non-Error value was thrown by the Docker client',
      resolution: 'Re-run with LOG_LEVEL=debug for more context',
      details: {},
    };
  }

  const details: Record<string, unknown> = {};
  let message = error.message;

  if (hasDockerodeProperties(error)) {
    if (error.statusCode !== undefined) details.statusCode = error.statusCode;
    if (error.code !== undefined) details.code = error.code;
    if (error.reason !== undefined) details.reason = error.reason;
    message = daemonMessage(error) ?? message;

    if (error.code === 'ENOENT' || error.code === 'ECONNREFUSED') {
      return {
        message: `Cannot reach the Docker daemon: ${message}`,
        hint: 'Docker is not running or the socket path is wrong',
        resolution: 'Start Docker, or point DOCKER_SOCKET / --docker-socket at the daemon socket',
        details,
      };
    }

    if (error.statusCode === 401 || error.statusCode === 403) {
      return {
        message,
        hint: 'The registry rejected the supplied credentials',
        resolution: 'Check the username and that the token has package write permission',
        details,
      };
    }

    if (error.statusCode === 404) {
      return {
        message,
        hint: 'The image or tag does not exist locally',
        resolution: 'Make sure the build completed and loaded the image into the local image store',
        details,
      };
    }
  }

  if (isTransientDockerError(error)) {
    return {
      message,
      hint: 'The registry or network failed transiently',
      resolution: 'The push is retried with backoff; check connectivity if it keeps failing',
      details,
    };
  }

  return {
    message,
    hint: 'The Docker daemon reported an error',
    resolution: 'Check the daemon logs for details',
    details,
  };
}

export function toEngineError(operation: EngineError['operation'], error: unknown): EngineError {
  const guidance = extractDockerErrorGuidance(error);
  const engineError: EngineError = {
    operation,
    message: guidance.message,
    transient: isTransientDockerError(error),
  };
  const statusCode = statusCodeOf(error);
  if (statusCode !== undefined) engineError.statusCode = statusCode;
  if (error instanceof Error && hasDockerodeProperties(error) && error.code) engineError.code = error.code;
  return engineError;
}
