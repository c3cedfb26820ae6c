/**
 * CLI command handlers. Each returns the process exit code; output goes
 * through the injected writers so commands can run without a terminal.
 */

import type { Logger } from 'pino';
import { exitCodeFor, formatTarget, EXIT_CODES, type Err, type PublishError } from '@/types';
import { guidanceFor } from '@/lib/errors';
import { loadConfig, baseRepositoryOf } from '@/config/loader';
import type { PublishConfig } from '@/config/schema';
import type { PublishApp } from '@/app';
import { summaryToJson } from '@/app/summary';
import { logRunStart, logRunSummary, type LineWriter } from '@/lib/runtime-logging';
import { formatGuidance } from './guidance';

export interface CommandIO {
  stdout: LineWriter;
  stderr: LineWriter;
  writeFile: (path: string, content: string) => Promise<void>;
}

export interface CommandContext {
  logger: Logger;
  io: CommandIO;
  /** Creates the application once the configuration is known to be valid */
  createApp: () => PublishApp;
  version: string;
  logLevel: string;
}

export interface ConfigOption {
  config: string;
}

export interface PublishCommandOptions extends ConfigOption {
  json?: boolean;
  deploymentOut?: string;
}

export interface TagsCommandOptions extends ConfigOption {
  json?: boolean;
}

export interface RenderDeploymentCommandOptions extends ConfigOption {
  variant?: string;
  digest?: string;
  includeSecret?: boolean;
}

function reportFailure(failure: Err<PublishError>, io: CommandIO): number {
  formatGuidance(failure.guidance ?? guidanceFor(failure.reason)).forEach((line) => io.stderr(line));
  return exitCodeFor(failure.reason);
}

async function load(options: ConfigOption, context: CommandContext): Promise<PublishConfig | number> {
  const config = await loadConfig(options.config, context.logger);
  if (!config.ok) return reportFailure(config, context.io);
  return config.value;
}

/**
 * `publish`: run the whole pipeline and report the summary.
 */
export async function runPublish(
  options: PublishCommandOptions,
  context: CommandContext,
  signal?: AbortSignal,
): Promise<number> {
  const { io, logger } = context;
  const config = await load(options, context);
  if (typeof config === 'number') return config;

  logRunStart(
    {
      version: context.version,
      configPath: options.config,
      repository: baseRepositoryOf(config),
      variants: config.variants.map((variant) => variant.name),
      logLevel: context.logLevel,
    },
    logger,
    io.stderr,
  );

  const app = context.createApp();
  const summary = await app.publish(config, {
    ...(signal && { signal }),
    progress: async (message) => {
      io.stderr(`⏳ ${message}`);
    },
  });

  logRunSummary(summary, logger, io.stderr);
  if (summary.error) {
    formatGuidance(guidanceFor(summary.error)).forEach((line) => io.stderr(line));
  }

  if (options.json) {
    io.stdout(summaryToJson(summary));
  }

  if (options.deploymentOut) {
    if (summary.deployment) {
      await io.writeFile(options.deploymentOut, summary.deployment.yaml);
      io.stderr(`📝 Deployment fragment for ${summary.deployment.variant} written to ${options.deploymentOut}`);
    } else {
      io.stderr('⚠️ No deployment fragment rendered: configure `deployment` and publish its variant');
    }
  }

  return summary.exitCode;
}

/**
 * `tags`: print every variant's targets without touching the network.
 */
export async function runTags(options: TagsCommandOptions, context: CommandContext): Promise<number> {
  const config = await load(options, context);
  if (typeof config === 'number') return config;

  const targets = context.createApp().resolveTargets(config);
  if (!targets.ok) return reportFailure(targets, context.io);

  if (options.json) {
    const byVariant = Object.fromEntries(
      [...targets.value].map(([variant, resolved]) => [variant, resolved.map(formatTarget)]),
    );
    context.io.stdout(JSON.stringify(byVariant, null, 2));
  } else {
    for (const [variant, resolved] of targets.value) {
      context.io.stdout(`${variant}: ${resolved.map(formatTarget).join(' ')}`);
    }
  }
  return EXIT_CODES.success;
}

/**
 * `render-deployment`: print the pull secret and deployment fragment.
 */
export async function runRenderDeployment(
  options: RenderDeploymentCommandOptions,
  context: CommandContext,
): Promise<number> {
  const config = await load(options, context);
  if (typeof config === 'number') return config;

  const fragment = await context.createApp().renderDeployment(config, {
    ...(options.variant !== undefined ? { variant: options.variant } : {}),
    ...(options.digest !== undefined ? { digest: options.digest } : {}),
    includeSecretData: options.includeSecret ?? false,
  });
  if (!fragment.ok) return reportFailure(fragment, context.io);

  context.io.stdout(fragment.value.yaml);
  return EXIT_CODES.success;
}

/**
 * `health`: check that the Docker daemon answers.
 */
export async function runHealth(context: CommandContext): Promise<number> {
  context.logger.info('Performing health check');
  const health = await context.createApp().healthCheck();

  if (health.docker.available) {
    context.io.stderr('✅ Docker daemon: available');
    return EXIT_CODES.success;
  }
  context.io.stderr(`❌ Docker daemon: unavailable (${health.docker.error ?? 'no response'})`);
  return EXIT_CODES.unexpected;
}

/**
 * `validate`: check the configuration and the tag conventions.
 */
export async function runValidate(options: ConfigOption, context: CommandContext): Promise<number> {
  const config = await load(options, context);
  if (typeof config === 'number') return config;

  const targets = context.createApp().resolveTargets(config);
  if (!targets.ok) return reportFailure(targets, context.io);

  const count = [...targets.value.values()].reduce((total, resolved) => total + resolved.length, 0);
  context.io.stderr(`✅ Configuration valid: ${targets.value.size} variant(s), ${count} target(s)`);
  return EXIT_CODES.success;
}
