/**
 * Publish configuration schema.
 * Defines the structure, defaults and validation rules of a publish file.
 */

import { z } from 'zod';
import { TAG_PATTERN } from '@/lib/image-ref';
import {
  BUILD_DEFAULTS,
  DEFAULT_CONCURRENCY_LIMIT,
  DEFAULT_CREDENTIAL_ENV_PREFIX,
  DEFAULT_RETRY_ATTEMPTS,
  DEFAULT_TIMEOUTS,
  LIMITS,
} from './constants';
import { DEFAULT_RETRY_POLICY } from '@/lib/retry';

/**
 * Supported Docker platforms for multi-architecture builds
 * See: https://docs.docker.com/build/building/multi-platform/
 */
export const DOCKER_PLATFORMS = [
  'linux/amd64',
  'linux/arm64',
  'linux/arm/v7',
  'linux/arm/v6',
  'linux/386',
  'linux/ppc64le',
  'linux/s390x',
  'linux/riscv64',
  'windows/amd64',
] as const;

export type DockerPlatform = (typeof DOCKER_PLATFORMS)[number];

const K8S_NAME = /^[a-z0-9]([-a-z0-9]*[a-z0-9])?$/;

export const platform = z.enum(DOCKER_PLATFORMS).describe('Target platform, e.g. linux/arm64');

export const tagToken = z
  .string()
  .regex(TAG_PATTERN, 'must be a valid tag (alphanumerics, ".", "_", "-", at most 128 characters)');

export const k8sName = z
  .string()
  .max(LIMITS.maxK8sNameLength)
  .regex(K8S_NAME, 'must be a lowercase RFC 1123 label');

export const buildArgs = z.record(z.string(), z.string()).describe('Build arguments');

export const variantSchema = z.object({
  name: tagToken.describe('Variant name, unique within the file'),
  buildArgs: buildArgs.default({}),
  platforms: z.array(platform).min(1).optional().describe('Overrides the global platform list'),
});

const timeoutSeconds = z.number().int().positive();

export const publishConfigSchema = z
  .object({
    registry: z.string().min(1).max(LIMITS.maxRegistryHostLength).describe('Registry host, e.g. ghcr.io'),
    repository: z.string().min(1).describe('Repository path, e.g. henn-dt/open-webui'),
    platforms: z.array(platform).min(1),
    variants: z.array(variantSchema).min(1),
    concurrencyLimit: z.number().int().min(1).max(LIMITS.maxConcurrency).default(DEFAULT_CONCURRENCY_LIMIT),
    pushTimeoutSeconds: timeoutSeconds.default(DEFAULT_TIMEOUTS.push),
    buildTimeoutSeconds: timeoutSeconds.default(DEFAULT_TIMEOUTS.build),
    loginTimeoutSeconds: timeoutSeconds.default(DEFAULT_TIMEOUTS.login),
    retryAttempts: z.number().int().min(1).max(LIMITS.maxRetryAttempts).default(DEFAULT_RETRY_ATTEMPTS),
    retryBackoff: z
      .object({
        initialDelayMs: z.number().int().min(0).default(DEFAULT_RETRY_POLICY.initialDelayMs),
        maxDelayMs: z.number().int().min(0).default(DEFAULT_RETRY_POLICY.maxDelayMs),
        multiplier: z.number().min(1).default(DEFAULT_RETRY_POLICY.multiplier),
        jitter: z.number().min(0).max(1).default(DEFAULT_RETRY_POLICY.jitter),
      })
      .default({}),
    build: z
      .object({
        context: z.string().min(1).default(BUILD_DEFAULTS.context),
        dockerfile: z.string().min(1).default(BUILD_DEFAULTS.dockerfile),
        localRepository: z.string().min(1).default(BUILD_DEFAULTS.localRepository),
        rerunFailed: z.boolean().default(false).describe('Re-run a failed build once'),
      })
      .default({}),
    tagging: z.object({
      baseTag: z.string().default(''),
      rules: z
        .record(z.string(), z.string().min(1))
        .describe('Variant name to tag template; templates use {baseTag} and {variant}'),
      aliases: z.record(z.string(), z.array(z.string().min(1))).default({}),
    }),
    credentials: z
      .object({
        source: z.enum(['env', 'docker-config']).default('env'),
        envPrefix: z.string().min(1).default(DEFAULT_CREDENTIAL_ENV_PREFIX),
        email: z.string().optional(),
      })
      .default({}),
    deployment: z
      .object({
        secretName: k8sName,
        namespace: k8sName.default('default'),
        containerName: k8sName.optional(),
        variant: z.string().optional().describe('Variant to deploy; defaults to the first'),
        pinDigest: z.boolean().default(false),
      })
      .optional(),
  })
  .superRefine((config, ctx) => {
    const seen = new Set<string>();
    config.variants.forEach((variant, index) => {
      if (seen.has(variant.name)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['variants', index, 'name'],
          message: `duplicate variant name "${variant.name}"`,
        });
      }
      seen.add(variant.name);
    });

    const deploymentVariant = config.deployment?.variant;
    if (deploymentVariant !== undefined && !seen.has(deploymentVariant)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['deployment', 'variant'],
        message: `unknown variant "${deploymentVariant}"`,
      });
    }
  });

export type PublishConfigInput = z.input<typeof publishConfigSchema>;
export type PublishConfig = z.infer<typeof publishConfigSchema>;
export type DeploymentConfig = NonNullable<PublishConfig['deployment']>;
export type TagConvention = PublishConfig['tagging'];
