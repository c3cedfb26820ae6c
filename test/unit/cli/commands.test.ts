/**
 * Unit tests for CLI command handlers
 */

import { describe, it, expect, beforeEach, afterEach, jest } from '@jest/globals';
import { writeFileSync } from 'fs';
import { join } from 'path';
import tmp from 'tmp';
import yaml from 'js-yaml';
import { createApp } from '@/app';
import {
  runHealth,
  runPublish,
  runRenderDeployment,
  runTags,
  runValidate,
  type CommandContext,
  type CommandIO,
} from '@/cli/commands';
import { Failure } from '@/types';
import {
  createFakeBuildEngine,
  createFakeDockerClient,
  createTestLogger,
  engineError,
  type FakeDockerClient,
} from '../../__support__/utilities/mocks';

const BASE_CONFIG = {
  registry: 'ghcr.io',
  repository: 'henn-dt/open-webui',
  platforms: ['linux/amd64'],
  variants: [{ name: 'debug' }, { name: 'debug-with-ollama', buildArgs: { USE_OLLAMA: 'true' } }],
  tagging: {
    baseTag: 'rag-debug',
    rules: { debug: '{baseTag}', 'debug-with-ollama': '{baseTag}-with-ollama' },
  },
};

interface Recorder {
  context: CommandContext;
  stdout: string[];
  stderr: string[];
  writeFile: jest.Mock<CommandIO['writeFile']>;
}

function recorder(
  env: NodeJS.ProcessEnv = { REGISTRY_USERNAME: 'publisher', REGISTRY_TOKEN: 'test-secret' },
  dockerClient: FakeDockerClient = createFakeDockerClient(),
): Recorder {
  const stdout: string[] = [];
  const stderr: string[] = [];
  const writeFile = jest.fn<CommandIO['writeFile']>(async () => undefined);
  const logger = createTestLogger();
  const context: CommandContext = {
    logger,
    version: '0.1.0',
    logLevel: 'silent',
    io: {
      stdout: (line) => stdout.push(line),
      stderr: (line) => stderr.push(line),
      writeFile,
    },
    createApp: () =>
      createApp({
        logger,
        env,
        dockerClient,
        buildEngine: createFakeBuildEngine(),
      }),
  };
  return { context, stdout, stderr, writeFile };
}

describe('CLI commands', () => {
  let dir: tmp.DirResult;

  beforeEach(() => {
    dir = tmp.dirSync({ unsafeCleanup: true });
  });

  afterEach(() => {
    dir.removeCallback();
  });

  function configFile(overrides: Record<string, unknown> = {}): string {
    const path = join(dir.name, 'publish.yaml');
    writeFileSync(path, yaml.dump({ ...BASE_CONFIG, ...overrides }));
    return path;
  }

  describe('runPublish', () => {
    it('should publish and print the JSON summary', async () => {
      const { context, stdout, stderr } = recorder();

      const code = await runPublish({ config: configFile(), json: true }, context);

      expect(code).toBe(0);
      expect(stdout).toHaveLength(1);
      const summary: unknown = JSON.parse(stdout[0] ?? '');
      expect(summary).toMatchObject({ state: 'Done', exitCode: 0 });
      expect(stderr.slice(0, 3)).toEqual([
        '🚀 Starting image publish...',
        '📦 Repository: ghcr.io/henn-dt/open-webui',
        '🧩 Variants: debug, debug-with-ollama',
      ]);
      expect(stderr).toContain('⏳ Logged in to ghcr.io');
    });

    it('should return the credential exit code and print guidance', async () => {
      const { context, stderr } = recorder({ REGISTRY_USERNAME: 'publisher' });

      const code = await runPublish({ config: configFile() }, context);

      expect(code).toBe(2);
      expect(stderr).toContain('🔍 Error: Registry credential is missing required field(s): token');
    });

    it('should write the deployment fragment when asked', async () => {
      const { context, stderr, writeFile } = recorder();
      const out = join(dir.name, 'deployment.yaml');

      const code = await runPublish(
        { config: configFile({ deployment: { secretName: 'ghcr-pull' } }), deploymentOut: out },
        context,
      );

      expect(code).toBe(0);
      expect(writeFile).toHaveBeenCalledWith(out, expect.stringContaining('ghcr.io/henn-dt/open-webui:rag-debug'));
      expect(stderr).toContain(`📝 Deployment fragment for debug written to ${out}`);
    });

    it('should warn when no deployment fragment could be rendered', async () => {
      const { context, stderr, writeFile } = recorder();

      await runPublish({ config: configFile(), deploymentOut: join(dir.name, 'deployment.yaml') }, context);

      expect(writeFile).not.toHaveBeenCalled();
      expect(stderr).toContain('⚠️ No deployment fragment rendered: configure `deployment` and publish its variant');
    });

    it('should report an unreadable configuration', async () => {
      const { context, stderr } = recorder();

      const code = await runPublish({ config: join(dir.name, 'missing.yaml') }, context);

      expect(code).toBe(2);
      expect(stderr[0]).toMatch(/^🔍 Error: Invalid configuration: cannot read /);
      expect(stderr[1]).toBe('💡 The publish configuration failed validation');
    });
  });

  describe('runTags', () => {
    it('should print one line per variant', async () => {
      const { context, stdout } = recorder();

      const code = await runTags({ config: configFile() }, context);

      expect(code).toBe(0);
      expect(stdout).toEqual([
        'debug: ghcr.io/henn-dt/open-webui:rag-debug',
        'debug-with-ollama: ghcr.io/henn-dt/open-webui:rag-debug-with-ollama',
      ]);
    });

    it('should print targets as JSON', async () => {
      const { context, stdout } = recorder();

      await runTags({ config: configFile(), json: true }, context);

      expect(JSON.parse(stdout[0] ?? '')).toEqual({
        debug: ['ghcr.io/henn-dt/open-webui:rag-debug'],
        'debug-with-ollama': ['ghcr.io/henn-dt/open-webui:rag-debug-with-ollama'],
      });
    });
  });

  describe('runValidate', () => {
    it('should count variants and targets', async () => {
      const { context, stderr } = recorder();

      const code = await runValidate({ config: configFile() }, context);

      expect(code).toBe(0);
      expect(stderr).toEqual(['✅ Configuration valid: 2 variant(s), 2 target(s)']);
    });

    it('should reject tag collisions', async () => {
      const { context, stderr } = recorder();

      const code = await runValidate(
        {
          config: configFile({
            tagging: { baseTag: 'v1', rules: { debug: '{baseTag}', 'debug-with-ollama': '{baseTag}' } },
          }),
        },
        context,
      );

      expect(code).toBe(2);
      expect(stderr[0]).toBe(
        '🔍 Error: Invalid configuration: tag "v1" is claimed by variants "debug" and "debug-with-ollama"',
      );
    });
  });

  describe('runRenderDeployment', () => {
    it('should print the fragment for the requested variant', async () => {
      const { context, stdout } = recorder();

      const code = await runRenderDeployment(
        { config: configFile({ deployment: { secretName: 'ghcr-pull' } }), variant: 'debug-with-ollama' },
        context,
      );

      expect(code).toBe(0);
      const [, deployment] = yaml.loadAll(stdout[0] ?? '');
      expect(deployment).toEqual({
        spec: {
          template: {
            spec: {
              imagePullSecrets: [{ name: 'ghcr-pull' }],
              containers: [{ name: 'open-webui', image: 'ghcr.io/henn-dt/open-webui:rag-debug-with-ollama' }],
            },
          },
        },
      });
    });

    it('should fail for an unknown variant', async () => {
      const { context, stdout } = recorder();

      const code = await runRenderDeployment(
        { config: configFile({ deployment: { secretName: 'ghcr-pull' } }), variant: 'release' },
        context,
      );

      expect(code).toBe(2);
      expect(stdout).toEqual([]);
    });
  });

  describe('runHealth', () => {
    it('should succeed when the daemon answers', async () => {
      const { context, stderr } = recorder();

      await expect(runHealth(context)).resolves.toBe(0);
      expect(stderr).toEqual(['✅ Docker daemon: available']);
    });

    it('should fail when the daemon is unreachable', async () => {
      const dockerClient = createFakeDockerClient();
      dockerClient.ping.mockResolvedValue(Failure('daemon down', engineError({ operation: 'ping' })));
      const { context, stderr } = recorder(undefined, dockerClient);

      await expect(runHealth(context)).resolves.toBe(1);
      expect(stderr).toEqual(['❌ Docker daemon: unavailable (daemon down)']);
    });
  });
});
