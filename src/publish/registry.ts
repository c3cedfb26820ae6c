/**
 * Registry Publisher
 *
 * Logs in once per run and pushes targets with bounded retry. Every push is
 * verified against the digest the build produced; a target only counts as
 * published when the registry reports that same manifest.
 */

import { randomUUID } from 'crypto';
import {
  Success,
  formatTarget,
  type PublishError,
  type PublishResult,
  type PublishTarget,
  type RegistryAuth,
  type RegistryCredential,
  type Result,
  type RunContext,
  type Session,
} from '@/types';
import { extractErrorMessage, publishFailure } from '@/lib/errors';
import { runWithDeadline, sleep, type DeadlineOutcome } from '@/lib/deadline';
import { calculateBackoff, type RetryPolicy } from '@/lib/retry';
import { getComponentLogger } from '@/lib/logger';
import { qualifiedRepository } from '@/lib/image-ref';
import type { DockerAuthResult, DockerClient, DockerPushResult, DockerResult } from '@/infra/docker/client';
import { toServerAddress } from '@/infra/docker/credential-helpers';

export interface RegistryPublisherOptions {
  client: DockerClient;
  retry: RetryPolicy;
  /** Deadline of the login call; 0 disables it */
  loginTimeoutMs: number;
  /** Deadline of a single push attempt; 0 disables it */
  pushTimeoutMs: number;
  /** Jitter source, `Math.random` by default */
  random?: () => number;
}

export interface RegistryPublisher {
  login(credential: RegistryCredential, ctx: RunContext): Promise<Result<Session>>;
  push(
    session: Session,
    localImage: string,
    target: PublishTarget,
    expectedDigest: string,
    ctx: RunContext,
  ): Promise<PublishResult>;
}

type AttemptOutcome =
  | { status: 'published'; digest: string }
  | { status: 'retryable'; error: PublishError }
  | { status: 'final'; error: PublishError; digest?: string };

export function toRegistryAuth(credential: RegistryCredential): RegistryAuth {
  const auth: RegistryAuth = {
    username: credential.username,
    password: credential.token,
    serveraddress: toServerAddress(credential.server),
  };
  if (credential.email) auth.email = credential.email;
  return auth;
}

export function digestsMatch(expected: string, actual: string): boolean {
  return actual.length > 0 && expected.toLowerCase() === actual.toLowerCase();
}

function result(target: PublishTarget, attempts: number, digest: string, error?: PublishError): PublishResult {
  const published: PublishResult = {
    target: { ...target },
    digest,
    succeeded: error === undefined,
    attempts,
  };
  if (error !== undefined) published.error = error;
  return Object.freeze(published);
}

export function createRegistryPublisher(options: RegistryPublisherOptions): RegistryPublisher {
  const { client, retry } = options;
  const random = options.random ?? Math.random;

  const attemptPush = async (
    session: Session,
    localImage: string,
    target: PublishTarget,
    expectedDigest: string,
    ctx: RunContext,
  ): Promise<AttemptOutcome> => {
    const repository = qualifiedRepository(target);

    const tagged = await client.tagImage(localImage, repository, target.tag);
    if (!tagged.ok) {
      const error: PublishError = { kind: 'PushFailed', target, reason: tagged.error };
      return tagged.reason.transient ? { status: 'retryable', error } : { status: 'final', error };
    }

    let outcome: DeadlineOutcome<DockerResult<DockerPushResult>>;
    try {
      outcome = await runWithDeadline((signal) => client.pushImage(repository, target.tag, session.auth, signal), {
        timeoutMs: options.pushTimeoutMs,
        ...(ctx.signal && { signal: ctx.signal }),
      });
    } catch (error) {
      return { status: 'retryable', error: { kind: 'PushFailed', target, reason: extractErrorMessage(error) } };
    }

    if (outcome.status === 'timeout') {
      return { status: 'retryable', error: { kind: 'Timeout', stage: 'push' } };
    }
    if (outcome.status === 'cancelled') {
      return { status: 'final', error: { kind: 'Cancelled', stage: 'push' } };
    }

    const pushed = outcome.value;
    if (!pushed.ok) {
      const error: PublishError = { kind: 'PushFailed', target, reason: pushed.error };
      return pushed.reason.transient ? { status: 'retryable', error } : { status: 'final', error };
    }

    const actual = pushed.value.digest;
    if (!digestsMatch(expectedDigest, actual)) {
      return {
        status: 'final',
        error: { kind: 'DigestMismatch', target, expected: expectedDigest, actual },
        digest: actual,
      };
    }
    return { status: 'published', digest: actual };
  };

  return {
    async login(credential, ctx) {
      const logger = getComponentLogger(ctx.logger, 'registry');
      const auth = toRegistryAuth(credential);

      let outcome: DeadlineOutcome<DockerResult<DockerAuthResult>>;
      try {
        outcome = await runWithDeadline((signal) => client.checkAuth(auth, signal), {
          timeoutMs: options.loginTimeoutMs,
          ...(ctx.signal && { signal: ctx.signal }),
        });
      } catch (error) {
        logger.error({ server: credential.server, error: extractErrorMessage(error) }, 'Registry login failed');
        return publishFailure({ kind: 'AuthFailed', server: credential.server });
      }

      if (outcome.status === 'timeout') {
        return publishFailure({ kind: 'Timeout', stage: 'login' });
      }
      if (outcome.status === 'cancelled') {
        return publishFailure({ kind: 'Cancelled', stage: 'login' });
      }
      if (!outcome.value.ok) {
        const { statusCode } = outcome.value.reason;
        return publishFailure(
          statusCode !== undefined
            ? { kind: 'AuthFailed', server: credential.server, statusCode }
            : { kind: 'AuthFailed', server: credential.server },
        );
      }

      const session: Session = {
        id: randomUUID(),
        server: credential.server,
        username: credential.username,
        auth,
      };
      logger.info({ sessionId: session.id, server: session.server, username: session.username }, 'Logged in to registry');
      return Success(session);
    },

    async push(session, localImage, target, expectedDigest, ctx) {
      const ref = formatTarget(target);
      const logger = getComponentLogger(ctx.logger, 'registry').child({ target: ref, sessionId: session.id });

      let attempts = 0;
      let lastError: PublishError = { kind: 'Cancelled', stage: 'push' };
      let lastDigest = '';

      while (attempts < retry.attempts) {
        if (ctx.signal?.aborted) {
          lastError = { kind: 'Cancelled', stage: 'push' };
          break;
        }

        attempts++;
        logger.debug({ attempt: attempts, maxAttempts: retry.attempts }, 'Pushing target');
        const outcome = await attemptPush(session, localImage, target, expectedDigest, ctx);

        if (outcome.status === 'published') {
          logger.info({ digest: outcome.digest, attempts }, 'Target published');
          return result(target, attempts, outcome.digest);
        }

        lastError = outcome.error;
        if (outcome.status === 'final') {
          lastDigest = outcome.digest ?? '';
          break;
        }

        if (attempts < retry.attempts) {
          const delayMs = calculateBackoff(attempts - 1, retry, random);
          logger.warn({ attempt: attempts, delayMs, error: lastError.kind }, 'Push attempt failed, retrying');
          if (!(await sleep(delayMs, ctx.signal))) {
            lastError = { kind: 'Cancelled', stage: 'push' };
            break;
          }
        }
      }

      logger.error({ attempts, error: lastError.kind }, 'Target not published');

      if (attempts > 0) {
        const untagged = await client.removeImage(ref, { noprune: true });
        if (!untagged.ok) {
          logger.warn({ error: untagged.error }, 'Could not remove local target tag');
        }
      }

      return result(target, attempts, lastDigest, lastError);
    },
  };
}
