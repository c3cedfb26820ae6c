/**
 * Unit tests for the registry publisher
 */

import { describe, it, expect } from '@jest/globals';
import { createRegistryPublisher, digestsMatch, toRegistryAuth } from '@/publish/registry';
import { Failure, type PublishTarget, type Session } from '@/types';
import type { RetryPolicy } from '@/lib/retry';
import {
  OTHER_DIGEST,
  TEST_DIGEST,
  createFakeDockerClient,
  createTestContext,
  createTestCredential,
  engineError,
  hangingPush,
  type FakeDockerClient,
} from '../../__support__/utilities/mocks';

const retry: RetryPolicy = { attempts: 3, initialDelayMs: 0, maxDelayMs: 0, multiplier: 2, jitter: 0 };

const target: PublishTarget = { registry: 'ghcr.io', repository: 'henn-dt/open-webui', tag: 'rag-debug' };

const session: Session = {
  id: 'session-1',
  server: 'ghcr.io',
  username: 'publisher',
  auth: toRegistryAuth(createTestCredential()),
};

function publisher(client: FakeDockerClient, overrides: { loginTimeoutMs?: number; pushTimeoutMs?: number } = {}) {
  return createRegistryPublisher({
    client,
    retry,
    loginTimeoutMs: overrides.loginTimeoutMs ?? 0,
    pushTimeoutMs: overrides.pushTimeoutMs ?? 0,
  });
}

describe('toRegistryAuth', () => {
  it('should map the credential onto the engine auth config', () => {
    expect(toRegistryAuth(createTestCredential())).toEqual({
      username: 'publisher',
      password: 'test-secret',
      serveraddress: 'ghcr.io',
    });
  });

  it('should use the legacy index address for Docker Hub and keep the email', () => {
    expect(toRegistryAuth(createTestCredential({ server: 'docker.io', email: 'ops@example.com' }))).toEqual({
      username: 'publisher',
      password: 'test-secret',
      serveraddress: 'https://index.docker.io/v1/',
      email: 'ops@example.com',
    });
  });
});

describe('digestsMatch', () => {
  it('should compare digests case-insensitively', () => {
    expect(digestsMatch('sha256:ABC', 'sha256:abc')).toBe(true);
  });

  it('should never match an empty reported digest', () => {
    expect(digestsMatch('', '')).toBe(false);
    expect(digestsMatch(TEST_DIGEST, '')).toBe(false);
  });
});

describe('login', () => {
  it('should return a session for accepted credentials', async () => {
    const client = createFakeDockerClient();

    const result = await publisher(client).login(createTestCredential(), createTestContext());

    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.value.server).toBe('ghcr.io');
      expect(result.value.username).toBe('publisher');
      expect(result.value.id).toMatch(/^[0-9a-f-]{36}$/);
    }
    expect(client.checkAuth).toHaveBeenCalledTimes(1);
  });

  it('should report rejected credentials as AuthFailed with the status code', async () => {
    const client = createFakeDockerClient();
    client.checkAuth.mockResolvedValue(
      Failure('unauthorized', engineError({ operation: 'auth', message: 'unauthorized', statusCode: 401 })),
    );

    const result = await publisher(client).login(createTestCredential(), createTestContext());

    expect(!result.ok && result.reason).toEqual({ kind: 'AuthFailed', server: 'ghcr.io', statusCode: 401 });
    expect(JSON.stringify(result)).not.toContain('test-secret');
  });

  it('should time out a login that never answers', async () => {
    const client = createFakeDockerClient();
    client.checkAuth.mockImplementation(() => new Promise(() => undefined));

    const result = await publisher(client, { loginTimeoutMs: 10 }).login(createTestCredential(), createTestContext());

    expect(!result.ok && result.reason).toEqual({ kind: 'Timeout', stage: 'login' });
  });
});

describe('push', () => {
  it('should tag, push and verify a target', async () => {
    const client = createFakeDockerClient();

    const result = await publisher(client).push(session, 'publish-local:debug', target, TEST_DIGEST, createTestContext());

    expect(result).toEqual({ target, digest: TEST_DIGEST, succeeded: true, attempts: 1 });
    expect(Object.isFrozen(result)).toBe(true);
    expect(client.tagImage).toHaveBeenCalledWith('publish-local:debug', 'ghcr.io/henn-dt/open-webui', 'rag-debug');
    expect(client.pushImage).toHaveBeenCalledWith(
      'ghcr.io/henn-dt/open-webui',
      'rag-debug',
      session.auth,
      expect.any(AbortSignal),
    );
  });

  it('should retry a transient failure', async () => {
    const client = createFakeDockerClient();
    client.pushImage.mockResolvedValueOnce(Failure('connection reset', engineError({ transient: true })));

    const result = await publisher(client).push(session, 'publish-local:debug', target, TEST_DIGEST, createTestContext());

    expect(result).toEqual({ target, digest: TEST_DIGEST, succeeded: true, attempts: 2 });
    expect(client.pushImage).toHaveBeenCalledTimes(2);
    expect(client.removeImage).not.toHaveBeenCalled();
  });

  it('should retry an attempt that exceeds the push deadline', async () => {
    const client = createFakeDockerClient();
    client.pushImage.mockImplementationOnce(hangingPush);

    const result = await publisher(client, { pushTimeoutMs: 20 }).push(
      session,
      'publish-local:debug',
      target,
      TEST_DIGEST,
      createTestContext(),
    );

    expect(result).toEqual({ target, digest: TEST_DIGEST, succeeded: true, attempts: 2 });
  });

  it('should stop on a permanent failure and remove the local tag', async () => {
    const client = createFakeDockerClient();
    client.pushImage.mockResolvedValue(Failure('denied: requested access to the resource is denied', engineError()));

    const result = await publisher(client).push(session, 'publish-local:debug', target, TEST_DIGEST, createTestContext());

    expect(result).toEqual({
      target,
      digest: '',
      succeeded: false,
      attempts: 1,
      error: { kind: 'PushFailed', target, reason: 'denied: requested access to the resource is denied' },
    });
    expect(client.removeImage).toHaveBeenCalledWith('ghcr.io/henn-dt/open-webui:rag-debug', { noprune: true });
  });

  it('should give up after the configured attempts', async () => {
    const client = createFakeDockerClient();
    client.pushImage.mockResolvedValue(Failure('service unavailable', engineError({ transient: true })));

    const result = await publisher(client).push(session, 'publish-local:debug', target, TEST_DIGEST, createTestContext());

    expect(result.succeeded).toBe(false);
    expect(result.attempts).toBe(3);
    expect(result.error).toEqual({ kind: 'PushFailed', target, reason: 'service unavailable' });
  });

  it('should fail on a digest mismatch without retrying', async () => {
    const client = createFakeDockerClient(OTHER_DIGEST);

    const result = await publisher(client).push(session, 'publish-local:debug', target, TEST_DIGEST, createTestContext());

    expect(result).toEqual({
      target,
      digest: OTHER_DIGEST,
      succeeded: false,
      attempts: 1,
      error: { kind: 'DigestMismatch', target, expected: TEST_DIGEST, actual: OTHER_DIGEST },
    });
    expect(client.pushImage).toHaveBeenCalledTimes(1);
  });

  it('should retry a failed tag call when it is transient', async () => {
    const client = createFakeDockerClient();
    client.tagImage.mockResolvedValueOnce(Failure('socket hang up', engineError({ operation: 'tag', transient: true })));

    const result = await publisher(client).push(session, 'publish-local:debug', target, TEST_DIGEST, createTestContext());

    expect(result.succeeded).toBe(true);
    expect(result.attempts).toBe(2);
  });

  it('should make no attempt once the run is cancelled', async () => {
    const client = createFakeDockerClient();
    const controller = new AbortController();
    controller.abort();

    const result = await publisher(client).push(
      session,
      'publish-local:debug',
      target,
      TEST_DIGEST,
      createTestContext({ signal: controller.signal }),
    );

    expect(result).toEqual({
      target,
      digest: '',
      succeeded: false,
      attempts: 0,
      error: { kind: 'Cancelled', stage: 'push' },
    });
    expect(client.tagImage).not.toHaveBeenCalled();
    expect(client.removeImage).not.toHaveBeenCalled();
  });

  it('should stop a hanging push when the run is cancelled', async () => {
    const client = createFakeDockerClient();
    client.pushImage.mockImplementation(hangingPush);
    const controller = new AbortController();

    const pushing = publisher(client).push(
      session,
      'publish-local:debug',
      target,
      TEST_DIGEST,
      createTestContext({ signal: controller.signal }),
    );
    setTimeout(() => controller.abort(), 5);
    const result = await pushing;

    expect(result.succeeded).toBe(false);
    expect(result.attempts).toBe(1);
    expect(result.error).toEqual({ kind: 'Cancelled', stage: 'push' });
  });
});
