/**
 * Application Entry Point
 * Wires configuration, logging, the Docker client and the build engine into
 * the publish orchestrator
 */

import type { Logger } from 'pino';

import { createLogger } from '@/lib/logger';
import { publishFailure } from '@/lib/errors';
import {
  Success,
  type PublishTarget,
  type RegistryCredential,
  type Result,
  type RunContext,
} from '@/types';
import { createRunContext, type ContextOptions } from '@/core/context';
import type { PublishConfig } from '@/config/schema';
import { baseRepositoryOf, toRetryPolicy, toVariants } from '@/config/loader';
import { createDockerClient, type DockerClient } from '@/infra/docker/client';
import { createBuildxEngine, type BuildEngine } from '@/infra/buildx/engine';
import { resolveCredentials, resolveDockerConfigCredentials } from '@/publish/credentials';
import { createBuildInvoker } from '@/publish/builder';
import { createRegistryPublisher } from '@/publish/registry';
import { resolveAllTags } from '@/publish/tags';
import {
  buildPullSecretSpec,
  renderDeploymentFragment,
  type DeploymentFragment,
} from '@/publish/deployment';
import { normalizeRegistryHost } from '@/lib/image-ref';
import { createOrchestrator } from './orchestrator';
import type { PublishRequest, RunSummary } from './orchestrator-types';

export interface AppOptions {
  logger?: Logger;
  /** Docker daemon socket; auto-detected when unset */
  dockerSocket?: string;
  /** Environment holding the registry credential variables */
  env?: NodeJS.ProcessEnv;
  /** Directory holding the Docker config.json */
  dockerConfigDir?: string;
  dockerClient?: DockerClient;
  buildEngine?: BuildEngine;
}

export interface RenderDeploymentOptions {
  /** Variant to deploy; defaults to deployment.variant, then the first variant */
  variant?: string;
  digest?: string;
  includeSecretData?: boolean;
}

export interface HealthStatus {
  docker: { available: boolean; error?: string };
}

export interface PublishApp {
  /** Run the full publish pipeline */
  publish(config: PublishConfig, metadata?: ContextOptions): Promise<RunSummary>;
  /** Targets of every variant, without touching the network */
  resolveTargets(config: PublishConfig): Result<Map<string, PublishTarget[]>>;
  resolveCredential(config: PublishConfig, ctx?: RunContext): Promise<Result<RegistryCredential>>;
  renderDeployment(config: PublishConfig, options?: RenderDeploymentOptions): Promise<Result<DeploymentFragment>>;
  healthCheck(): Promise<HealthStatus>;
}

const SECONDS = 1_000;

/**
 * Create the publish application
 */
export function createApp(options: AppOptions = {}): PublishApp {
  const logger = options.logger ?? createLogger({ name: 'image-publish' });

  let dockerClient = options.dockerClient;
  const getDockerClient = (): DockerClient => {
    if (!dockerClient) {
      dockerClient = createDockerClient(logger, options.dockerSocket ? { socketPath: options.dockerSocket } : {});
    }
    return dockerClient;
  };

  let buildEngine = options.buildEngine;
  const getBuildEngine = (): BuildEngine => {
    if (!buildEngine) {
      buildEngine = createBuildxEngine(logger);
    }
    return buildEngine;
  };

  async function resolveCredential(config: PublishConfig, ctx?: RunContext): Promise<Result<RegistryCredential>> {
    const log = ctx?.logger ?? logger;
    const { source, envPrefix, email } = config.credentials;

    const resolved =
      source === 'docker-config'
        ? await resolveDockerConfigCredentials(config.registry, log, {
            ...(options.dockerConfigDir !== undefined && { configDir: options.dockerConfigDir }),
            ...(email !== undefined ? { email } : {}),
          })
        : resolveCredentials({
            kind: 'env',
            prefix: envPrefix,
            defaultServer: config.registry,
            ...(options.env && { env: options.env }),
          });
    if (!resolved.ok) return resolved;

    const credential = resolved.value;
    if (credential.server !== normalizeRegistryHost(config.registry)) {
      log.warn({ server: credential.server, registry: config.registry }, 'Credential server differs from configured registry');
    }
    if (!credential.email && email) {
      return Success({ ...credential, email });
    }
    return Success(credential);
  }

  function resolveTargets(config: PublishConfig): Result<Map<string, PublishTarget[]>> {
    return resolveAllTags(toVariants(config), baseRepositoryOf(config), config.tagging);
  }

  return {
    async publish(config, metadata = {}) {
      const ctx = createRunContext(logger, metadata);
      const client = getDockerClient();

      const orchestrator = createOrchestrator({
        dependencies: {
          builder: createBuildInvoker({
            engine: getBuildEngine(),
            context: config.build.context,
            dockerfile: config.build.dockerfile,
            localRepository: config.build.localRepository,
            timeoutMs: config.buildTimeoutSeconds * SECONDS,
          }),
          publisher: createRegistryPublisher({
            client,
            retry: toRetryPolicy(config),
            loginTimeoutMs: config.loginTimeoutSeconds * SECONDS,
            pushTimeoutMs: config.pushTimeoutSeconds * SECONDS,
          }),
        },
        config: {
          concurrencyLimit: config.concurrencyLimit,
          rerunFailedBuild: config.build.rerunFailed,
        },
      });

      const request: PublishRequest = {
        variants: toVariants(config),
        baseRepository: baseRepositoryOf(config),
        convention: config.tagging,
        resolveCredential: (runCtx) => resolveCredential(config, runCtx),
      };
      if (config.deployment) {
        const { secretName, namespace, containerName, variant, pinDigest } = config.deployment;
        request.deployment = {
          secretName,
          namespace,
          pinDigest,
          ...(containerName !== undefined ? { containerName } : {}),
          ...(variant !== undefined ? { variant } : {}),
        };
      }

      return orchestrator.run(request, ctx);
    },

    resolveTargets,

    resolveCredential,

    async renderDeployment(config, renderOptions = {}) {
      const deployment = config.deployment;
      if (!deployment) {
        return publishFailure({ kind: 'ConfigInvalid', issues: ['deployment: section is required to render a deployment'] });
      }

      const variant = renderOptions.variant ?? deployment.variant ?? config.variants[0]?.name ?? '';
      const targets = resolveTargets(config);
      if (!targets.ok) return targets;
      const image = targets.value.get(variant)?.[0];
      if (!image) {
        return publishFailure({ kind: 'UnknownVariant', variant });
      }

      const credential = await resolveCredential(config);
      if (!credential.ok) return credential;

      const patch = buildPullSecretSpec(credential.value, deployment.secretName, deployment.namespace);
      if (!patch.ok) return patch;

      return renderDeploymentFragment(patch.value, image, {
        ...(deployment.containerName !== undefined ? { containerName: deployment.containerName } : {}),
        ...(renderOptions.digest !== undefined ? { digest: renderOptions.digest } : {}),
        includeSecretData: renderOptions.includeSecretData ?? false,
      });
    },

    async healthCheck() {
      const pinged = await getDockerClient().ping();
      return pinged.ok
        ? { docker: { available: true } }
        : { docker: { available: false, error: pinged.error } };
    },
  };
}

export type { RunSummary, VariantReport, PublishRequest } from './orchestrator-types';
