/**
 * Configuration loading: read a YAML or JSON publish file, validate it and
 * derive the run's variants, retry policy and base repository.
 */

import { readFile } from 'node:fs/promises';
import { extname } from 'node:path';
import yaml from 'js-yaml';
import type { Logger } from 'pino';
import type { ZodError } from 'zod';
import { Success, type ImageVariant, type Result } from '@/types';
import { extractErrorMessage, publishFailure } from '@/lib/errors';
import type { RetryPolicy } from '@/lib/retry';
import { publishConfigSchema, type PublishConfig } from './schema';

function formatIssues(error: ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.join('.');
    return path ? `${path}: ${issue.message}` : issue.message;
  });
}

function configFailure(issues: string[]): Result<never> {
  return publishFailure({ kind: 'ConfigInvalid', issues });
}

/**
 * Validate an already-parsed configuration object.
 */
export function parseConfig(raw: unknown): Result<PublishConfig> {
  const parsed = publishConfigSchema.safeParse(raw);
  if (!parsed.success) {
    return configFailure(formatIssues(parsed.error));
  }
  return Success(parsed.data);
}

/**
 * Read and validate a publish file. `.json` files are parsed as JSON,
 * anything else as YAML.
 */
export async function loadConfig(path: string, logger: Logger): Promise<Result<PublishConfig>> {
  let content: string;
  try {
    content = await readFile(path, 'utf-8');
  } catch (error) {
    logger.error({ path, error: extractErrorMessage(error) }, 'Failed to read configuration');
    return configFailure([`cannot read ${path}: ${extractErrorMessage(error)}`]);
  }

  let raw: unknown;
  try {
    raw = extname(path).toLowerCase() === '.json' ? JSON.parse(content) : yaml.load(content);
  } catch (error) {
    return configFailure([`cannot parse ${path}: ${extractErrorMessage(error)}`]);
  }

  const result = parseConfig(raw);
  if (result.ok) {
    logger.debug(
      { path, variants: result.value.variants.map((v) => v.name), registry: result.value.registry },
      'Loaded configuration',
    );
  }
  return result;
}

/**
 * Ordered platform list without duplicates (first occurrence wins).
 */
export function uniquePlatforms(platforms: readonly string[]): string[] {
  return [...new Set(platforms)];
}

/**
 * Variants with inherited platforms and deduplicated platform sets.
 */
export function toVariants(config: PublishConfig): ImageVariant[] {
  return config.variants.map((variant) => ({
    name: variant.name,
    buildArgs: { ...variant.buildArgs },
    platforms: uniquePlatforms(variant.platforms ?? config.platforms),
  }));
}

export function toRetryPolicy(config: PublishConfig): RetryPolicy {
  return {
    attempts: config.retryAttempts,
    initialDelayMs: config.retryBackoff.initialDelayMs,
    maxDelayMs: config.retryBackoff.maxDelayMs,
    multiplier: config.retryBackoff.multiplier,
    jitter: config.retryBackoff.jitter,
  };
}

/**
 * `registry/repository`, without prefixing the registry twice when the
 * repository already carries it.
 */
export function baseRepositoryOf(config: Pick<PublishConfig, 'registry' | 'repository'>): string {
  const registry = config.registry.replace(/^https?:\/\//i, '').replace(/\/+$/, '');
  const repository = config.repository.replace(/^\/+/, '');
  if (repository === registry || repository.startsWith(`${registry}/`)) {
    return repository;
  }
  return `${registry}/${repository}`;
}
