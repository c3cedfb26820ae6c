/**
 * Failure taxonomy of a publish run.
 */

import type { PublishTarget, Stage } from './publish';

export type TimedStage = 'login' | 'build' | 'push';

export type PublishError =
  | { kind: 'ConfigInvalid'; issues: string[] }
  | { kind: 'UnknownVariant'; variant: string }
  | { kind: 'CredentialMissing'; fields: string[] }
  | { kind: 'CredentialInvalid'; server: string }
  | { kind: 'AuthFailed'; server: string; statusCode?: number }
  | { kind: 'BuildFailed'; variant: string; exitCode: number; stderrTail: string }
  | { kind: 'PushFailed'; target: PublishTarget; reason: string }
  | { kind: 'DigestMismatch'; target: PublishTarget; expected: string; actual: string }
  | { kind: 'Timeout'; stage: TimedStage }
  | { kind: 'Cancelled'; stage: Stage };

export type PublishErrorKind = PublishError['kind'];

/**
 * Process exit codes, one per failure category.
 */
export const EXIT_CODES = {
  success: 0,
  unexpected: 1,
  config: 2,
  auth: 3,
  build: 4,
  push: 5,
  timeout: 6,
  cancelled: 130,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

export function exitCodeFor(error: PublishError): ExitCode {
  switch (error.kind) {
    case 'ConfigInvalid':
    case 'UnknownVariant':
    case 'CredentialMissing':
    case 'CredentialInvalid':
      return EXIT_CODES.config;
    case 'AuthFailed':
      return EXIT_CODES.auth;
    case 'BuildFailed':
      return EXIT_CODES.build;
    case 'PushFailed':
    case 'DigestMismatch':
      return EXIT_CODES.push;
    case 'Timeout':
      return EXIT_CODES.timeout;
    case 'Cancelled':
      return EXIT_CODES.cancelled;
  }
}

function targetRef(target: PublishTarget): string {
  return `${target.registry}/${target.repository}:${target.tag}`;
}

/**
 * One-line description of a failure. Never includes credential values.
 */
export function describePublishError(error: PublishError): string {
  switch (error.kind) {
    case 'ConfigInvalid':
      return `Invalid configuration: ${error.issues.join('; ')}`;
    case 'UnknownVariant':
      return `No tag convention configured for variant "${error.variant}"`;
    case 'CredentialMissing':
      return `Registry credential is missing required field(s): ${error.fields.join(', ')}`;
    case 'CredentialInvalid':
      return `Registry server "${error.server}" is not a well-formed host`;
    case 'AuthFailed':
      return error.statusCode !== undefined
        ? `Registry ${error.server} rejected login (HTTP ${error.statusCode})`
        : `Registry ${error.server} rejected login`;
    case 'BuildFailed':
      return `Build of variant "${error.variant}" failed with exit code ${error.exitCode}`;
    case 'PushFailed':
      return `Push of ${targetRef(error.target)} failed: ${error.reason}`;
    case 'DigestMismatch':
      return `Digest mismatch for ${targetRef(error.target)}: expected ${error.expected}, registry reported ${error.actual || 'no digest'}`;
    case 'Timeout':
      return `Timed out during ${error.stage}`;
    case 'Cancelled':
      return `Cancelled during ${error.stage}`;
  }
}
