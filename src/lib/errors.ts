/**
 * Error helpers: message extraction, guidance construction and the
 * conversion of a {@link PublishError} into a failed Result.
 */

import {
  Failure,
  describePublishError,
  type Err,
  type ErrorGuidance,
  type PublishError,
} from '@/types';

export function extractErrorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === 'string') return error;
  return String(error);
}

export function createErrorGuidance(
  message: string,
  hint?: string,
  resolution?: string,
  details?: Record<string, unknown>,
): ErrorGuidance {
  const guidance: ErrorGuidance = { message };
  if (hint !== undefined) guidance.hint = hint;
  if (resolution !== undefined) guidance.resolution = resolution;
  if (details !== undefined) guidance.details = details;
  return guidance;
}

/**
 * Hint and resolution text per failure kind, shown by the CLI.
 */
export function guidanceFor(error: PublishError): ErrorGuidance {
  const message = describePublishError(error);
  switch (error.kind) {
    case 'ConfigInvalid':
      return createErrorGuidance(
        message,
        'The publish configuration failed validation',
        'Fix the listed issues in the configuration file and re-run `image-publish validate`',
        { issues: error.issues },
      );
    case 'UnknownVariant':
      return createErrorGuidance(
        message,
        'Every variant needs an entry under tagging.rules',
        `Add a rule for "${error.variant}" (e.g. "{baseTag}-${error.variant}")`,
        { variant: error.variant },
      );
    case 'CredentialMissing':
      return createErrorGuidance(
        message,
        'Registry credentials are resolved before anything is built',
        'Export REGISTRY_USERNAME and REGISTRY_TOKEN (and REGISTRY_SERVER if it differs from the configured registry)',
        { fields: error.fields },
      );
    case 'CredentialInvalid':
      return createErrorGuidance(
        message,
        'The server must be a registry host such as ghcr.io or localhost:5000',
        'Remove any path from the server value and check the port',
        { server: error.server },
      );
    case 'AuthFailed':
      return createErrorGuidance(
        message,
        'The registry did not accept the username and token',
        'Generate a new personal access token with package write scope and export it as REGISTRY_TOKEN',
        { server: error.server, statusCode: error.statusCode },
      );
    case 'BuildFailed':
      return createErrorGuidance(
        message,
        'The build engine exited with an error; builds are not retried automatically',
        'Inspect the stderr tail, fix the Dockerfile or build arguments, then re-run',
        { variant: error.variant, exitCode: error.exitCode, stderrTail: error.stderrTail },
      );
    case 'PushFailed':
      return createErrorGuidance(
        message,
        'The registry push failed after the configured retries',
        'Check network connectivity and that the token can write to this repository',
        { target: error.target },
      );
    case 'DigestMismatch':
      return createErrorGuidance(
        message,
        'The registry stored a manifest different from the one that was built',
        'Treat the pushed tag as untrusted: rebuild and push again, and audit the registry',
        { target: error.target, expected: error.expected, actual: error.actual },
      );
    case 'Timeout':
      return createErrorGuidance(
        message,
        `The ${error.stage} stage exceeded its deadline`,
        `Raise ${error.stage}TimeoutSeconds in the configuration or check engine and registry responsiveness`,
        { stage: error.stage },
      );
    case 'Cancelled':
      return createErrorGuidance(message, 'The run was aborted', 'Re-run the publish when ready', {
        stage: error.stage,
      });
  }
}

/**
 * Failed Result for a publish error, with message and guidance derived from it.
 */
export function publishFailure(reason: PublishError): Err<PublishError> {
  return Failure(describePublishError(reason), reason, guidanceFor(reason));
}
