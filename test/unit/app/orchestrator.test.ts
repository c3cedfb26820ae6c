/**
 * Unit tests for the publish orchestrator
 */

import { describe, it, expect, jest } from '@jest/globals';
import yaml from 'js-yaml';
import { createOrchestrator, earliestFailure } from '@/app/orchestrator';
import type { PublishRequest, RunSummary, VariantReport } from '@/app/orchestrator-types';
import { createBuildInvoker } from '@/publish/builder';
import { createRegistryPublisher } from '@/publish/registry';
import { resolveCredentials } from '@/publish/credentials';
import { REDACTED_SECRET_DATA, encodeDockerConfigJson } from '@/publish/deployment';
import { Failure, Success, formatTarget, type ImageVariant, type PublishTarget } from '@/types';
import type { TagConvention } from '@/config/schema';
import {
  OTHER_DIGEST,
  TEST_DIGEST,
  createFakeBuildEngine,
  createFakeDockerClient,
  createTestContext,
  createTestCredential,
  engineError,
  hangingPush,
  type FakeBuildEngine,
  type FakeDockerClient,
} from '../../__support__/utilities/mocks';

const PLATFORMS = ['linux/amd64', 'linux/arm64'];

const debug: ImageVariant = { name: 'debug', buildArgs: { USE_OLLAMA: 'false' }, platforms: PLATFORMS };
const withOllama: ImageVariant = {
  name: 'debug-with-ollama',
  buildArgs: { USE_OLLAMA: 'true' },
  platforms: PLATFORMS,
};

const convention: TagConvention = {
  baseTag: 'rag-debug',
  rules: { debug: '{baseTag}', 'debug-with-ollama': '{baseTag}-with-ollama' },
  aliases: {},
};

const debugTarget: PublishTarget = { registry: 'ghcr.io', repository: 'henn-dt/open-webui', tag: 'rag-debug' };
const ollamaTarget: PublishTarget = {
  registry: 'ghcr.io',
  repository: 'henn-dt/open-webui',
  tag: 'rag-debug-with-ollama',
};

interface Harness {
  engine: FakeBuildEngine;
  client: FakeDockerClient;
  run: (request?: Partial<PublishRequest>, signal?: AbortSignal) => Promise<RunSummary>;
  progress: string[];
}

function harness(
  options: { digests?: Record<string, string>; pushTimeoutMs?: number; rerunFailedBuild?: boolean } = {},
): Harness {
  const engine = createFakeBuildEngine(options.digests);
  const client = createFakeDockerClient();
  const progress: string[] = [];
  const orchestrator = createOrchestrator({
    dependencies: {
      builder: createBuildInvoker({
        engine,
        context: '.',
        dockerfile: 'Dockerfile',
        localRepository: 'publish-local',
        timeoutMs: 0,
      }),
      publisher: createRegistryPublisher({
        client,
        retry: { attempts: 3, initialDelayMs: 0, maxDelayMs: 0, multiplier: 2, jitter: 0 },
        loginTimeoutMs: 0,
        pushTimeoutMs: options.pushTimeoutMs ?? 0,
      }),
    },
    config: { concurrencyLimit: 2, rerunFailedBuild: options.rerunFailedBuild ?? false },
  });

  const run = (request: Partial<PublishRequest> = {}, signal?: AbortSignal): Promise<RunSummary> =>
    orchestrator.run(
      {
        variants: [debug, withOllama],
        baseRepository: 'ghcr.io/henn-dt/open-webui',
        convention,
        resolveCredential: async () => Success(createTestCredential()),
        ...request,
      },
      createTestContext({
        ...(signal && { signal }),
        progress: async (message) => {
          progress.push(message);
        },
      }),
    );

  return { engine, client, run, progress };
}

function report(summary: RunSummary, variant: string): VariantReport | undefined {
  return summary.variants.find((candidate) => candidate.variant === variant);
}

describe('createOrchestrator', () => {
  describe('successful runs', () => {
    it('should build and publish every variant', async () => {
      const { engine, client, run } = harness();

      const summary = await run();

      expect(summary.state).toBe('Done');
      expect(summary.exitCode).toBe(0);
      expect(summary.error).toBeUndefined();
      expect(summary.published).toEqual([debugTarget, ollamaTarget]);
      expect(summary.failed).toEqual([]);
      expect(summary.cancelled).toEqual([]);
      expect(engine.build).toHaveBeenCalledTimes(2);
      expect(client.checkAuth).toHaveBeenCalledTimes(1);
    });

    it('should record per-platform status and the built digest', async () => {
      const { run } = harness();

      const summary = await run();

      expect(report(summary, 'debug')).toMatchObject({
        state: 'Done',
        localImage: 'publish-local:debug',
        digest: TEST_DIGEST,
        platforms: { 'linux/amd64': 'built', 'linux/arm64': 'built' },
        buildAttempts: 1,
      });
    });

    it('should publish the debug variants under their conventional tags', async () => {
      const { client, run } = harness();

      const summary = await run();

      expect(summary.published.map(formatTarget)).toEqual([
        'ghcr.io/henn-dt/open-webui:rag-debug',
        'ghcr.io/henn-dt/open-webui:rag-debug-with-ollama',
      ]);
      expect(client.tagImage).toHaveBeenCalledWith('publish-local:debug', 'ghcr.io/henn-dt/open-webui', 'rag-debug');
      expect(client.tagImage).toHaveBeenCalledWith(
        'publish-local:debug-with-ollama',
        'ghcr.io/henn-dt/open-webui',
        'rag-debug-with-ollama',
      );
    });

    it('should produce the same targets when run twice', async () => {
      const { run } = harness();

      const first = await run();
      const second = await run();

      expect(second.published).toEqual(first.published);
      expect(second.exitCode).toBe(first.exitCode);
      expect(second.runId).not.toBe(first.runId);
    });

    it('should report progress in stage order', async () => {
      const { run, progress } = harness();

      await run({ variants: [debug] });

      expect(progress).toEqual([
        'Logged in to ghcr.io',
        'Built debug (sha256:111111111111)',
        'Published debug: ghcr.io/henn-dt/open-webui:rag-debug',
      ]);
    });
  });

  describe('pre-flight failures', () => {
    it('should fail every variant at config for a variant without a tag rule', async () => {
      const { engine, client, run } = harness();
      const resolveCredential = jest.fn<PublishRequest['resolveCredential']>(async () =>
        Success(createTestCredential()),
      );

      const summary = await run({
        variants: [debug, { name: 'release', buildArgs: {}, platforms: PLATFORMS }],
        resolveCredential,
      });

      expect(summary.exitCode).toBe(2);
      expect(summary.failedStage).toBe('config');
      expect(summary.error).toEqual({ kind: 'UnknownVariant', variant: 'release' });
      expect(resolveCredential).not.toHaveBeenCalled();
      expect(client.checkAuth).not.toHaveBeenCalled();
      expect(engine.build).not.toHaveBeenCalled();
    });

    it('should not build anything when the token is empty', async () => {
      const { engine, client, run } = harness();

      const summary = await run({
        resolveCredential: async () =>
          resolveCredentials({
            kind: 'env',
            env: { REGISTRY_USERNAME: 'publisher', REGISTRY_TOKEN: '' },
            defaultServer: 'ghcr.io',
          }),
      });

      expect(engine.build).toHaveBeenCalledTimes(0);
      expect(client.checkAuth).not.toHaveBeenCalled();
      expect(client.pushImage).not.toHaveBeenCalled();
      expect(summary.exitCode).toBe(2);
      expect(summary.error).toEqual({ kind: 'CredentialMissing', fields: ['token'] });
      expect(summary.variants.map((variant) => [variant.state, variant.failedStage])).toEqual([
        ['Failed', 'credentials'],
        ['Failed', 'credentials'],
      ]);
      expect(summary.published).toEqual([]);
      expect(summary.failed).toEqual([debugTarget, ollamaTarget]);
    });

    it('should stop after a rejected login', async () => {
      const { engine, client, run } = harness();
      client.checkAuth.mockResolvedValue(
        Failure('unauthorized', engineError({ operation: 'auth', statusCode: 401 })),
      );

      const summary = await run();

      expect(summary.exitCode).toBe(3);
      expect(summary.failedStage).toBe('login');
      expect(summary.error).toEqual({ kind: 'AuthFailed', server: 'ghcr.io', statusCode: 401 });
      expect(engine.build).not.toHaveBeenCalled();
    });
  });

  describe('variant isolation', () => {
    it('should fail only the variant whose build fails', async () => {
      const { engine, client, run } = harness();
      engine.build.mockImplementation(async (request) =>
        request.tag === 'publish-local:debug'
          ? { exitCode: 1, stderr: 'ERROR: failed to solve' }
          : { exitCode: 0, stderr: '', digest: TEST_DIGEST },
      );

      const summary = await run();

      expect(report(summary, 'debug')).toMatchObject({
        state: 'Failed',
        failedStage: 'build',
        platforms: { 'linux/amd64': 'failed', 'linux/arm64': 'failed' },
        error: { kind: 'BuildFailed', variant: 'debug', exitCode: 1, stderrTail: 'ERROR: failed to solve' },
      });
      expect(report(summary, 'debug-with-ollama')?.state).toBe('Done');
      expect(summary.published).toEqual([ollamaTarget]);
      expect(summary.failed).toEqual([debugTarget]);
      expect(summary.exitCode).toBe(4);
      expect(client.tagImage).not.toHaveBeenCalledWith(
        'publish-local:debug',
        expect.any(String),
        expect.any(String),
      );
    });

    it('should fail only the variant whose pushed digest differs', async () => {
      const { run } = harness({ digests: { 'publish-local:debug-with-ollama': OTHER_DIGEST } });

      const summary = await run();

      expect(report(summary, 'debug')?.state).toBe('Done');
      expect(report(summary, 'debug-with-ollama')).toMatchObject({
        state: 'Failed',
        failedStage: 'push',
        error: { kind: 'DigestMismatch', target: ollamaTarget, expected: OTHER_DIGEST, actual: TEST_DIGEST },
      });
      expect(summary.published).toEqual([debugTarget]);
      expect(summary.failed).toEqual([ollamaTarget]);
      expect(summary.exitCode).toBe(5);
    });

    it('should re-run a failed build once when configured', async () => {
      const { engine, run } = harness({ rerunFailedBuild: true });
      engine.build.mockResolvedValueOnce({ exitCode: 1, stderr: 'flaky mirror' });

      const summary = await run({ variants: [debug] });

      expect(summary.exitCode).toBe(0);
      expect(report(summary, 'debug')?.buildAttempts).toBe(2);
    });
  });

  describe('retries and cancellation', () => {
    it('should record a single result for a push that times out then succeeds', async () => {
      const { client, run } = harness({ pushTimeoutMs: 20 });
      client.pushImage.mockImplementationOnce(hangingPush);

      const summary = await run({ variants: [debug] });

      expect(summary.exitCode).toBe(0);
      expect(report(summary, 'debug')?.targets).toEqual([
        { target: debugTarget, digest: TEST_DIGEST, succeeded: true, attempts: 2 },
      ]);
      expect(summary.published).toEqual([debugTarget]);
    });

    it('should report in-flight pushes as cancelled when the run is aborted', async () => {
      const { client, run } = harness();
      const controller = new AbortController();
      client.pushImage.mockImplementation((repository, tag, auth, signal) => {
        setTimeout(() => controller.abort(), 0);
        return hangingPush(repository, tag, auth, signal);
      });

      const summary = await run({}, controller.signal);

      expect(summary.state).toBe('Failed');
      expect(summary.exitCode).toBe(130);
      expect(summary.error?.kind).toBe('Cancelled');
      expect(summary.published).toEqual([]);
      expect(summary.failed).toEqual([]);
      expect(summary.cancelled).toEqual([debugTarget, ollamaTarget]);
    });

    it('should keep completed targets published when the run is aborted mid-push', async () => {
      const { client, run } = harness();
      const controller = new AbortController();
      const aliasTarget: PublishTarget = { ...debugTarget, tag: 'rag-debug-alias' };
      client.pushImage.mockImplementation(async (repository, tag, auth, signal) => {
        if (tag !== aliasTarget.tag) return Success({ digest: TEST_DIGEST });
        setTimeout(() => controller.abort(), 0);
        return hangingPush(repository, tag, auth, signal);
      });

      const summary = await run(
        { variants: [debug], convention: { ...convention, aliases: { debug: ['{baseTag}-alias'] } } },
        controller.signal,
      );

      expect(summary.exitCode).toBe(130);
      expect(summary.error?.kind).toBe('Cancelled');
      expect(summary.published).toEqual([debugTarget]);
      expect(summary.cancelled).toEqual([aliasTarget]);
      expect(summary.failed).toEqual([]);
      expect(report(summary, 'debug')?.targets.map((result) => [result.target.tag, result.succeeded])).toEqual([
        ['rag-debug', true],
        ['rag-debug-alias', false],
      ]);
    });
  });

  describe('deployment fragment', () => {
    it('should render a redacted fragment pinned to the digest', async () => {
      const { run } = harness();

      const summary = await run({
        deployment: { secretName: 'ghcr-pull', namespace: 'webui', pinDigest: true },
      });

      expect(summary.deployment?.variant).toBe('debug');
      expect(summary.deployment?.image).toBe(`ghcr.io/henn-dt/open-webui:rag-debug@${TEST_DIGEST}`);
      expect(yaml.loadAll(summary.deployment?.yaml ?? '')[0]).toMatchObject({
        data: { '.dockerconfigjson': REDACTED_SECRET_DATA },
      });
      expect(summary.deployment?.yaml).not.toContain(encodeDockerConfigJson(createTestCredential()));
    });

    it('should skip the fragment when its variant was not published', async () => {
      const { run } = harness({ digests: { 'publish-local:debug-with-ollama': OTHER_DIGEST } });

      const summary = await run({
        deployment: { secretName: 'ghcr-pull', namespace: 'webui', variant: 'debug-with-ollama', pinDigest: false },
      });

      expect(summary.deployment).toBeUndefined();
    });
  });
});

describe('earliestFailure', () => {
  const base: VariantReport = {
    variant: 'a',
    state: 'Failed',
    platforms: {},
    targets: [],
    buildAttempts: 0,
    durationMs: 0,
  };

  it('should pick the failure from the earliest stage', () => {
    const failure = earliestFailure([
      { ...base, variant: 'a', failedStage: 'push', error: { kind: 'Timeout', stage: 'push' } },
      { ...base, variant: 'b', failedStage: 'build', error: { kind: 'Timeout', stage: 'build' } },
    ]);

    expect(failure).toEqual({ stage: 'build', error: { kind: 'Timeout', stage: 'build' } });
  });

  it('should prefer the earlier variant on ties', () => {
    const failure = earliestFailure([
      { ...base, variant: 'a', failedStage: 'push', error: { kind: 'Timeout', stage: 'push' } },
      { ...base, variant: 'b', failedStage: 'push', error: { kind: 'Cancelled', stage: 'push' } },
    ]);

    expect(failure?.error).toEqual({ kind: 'Timeout', stage: 'push' });
  });

  it('should return undefined when nothing failed', () => {
    expect(earliestFailure([{ ...base, state: 'Done' }])).toBeUndefined();
  });
});
