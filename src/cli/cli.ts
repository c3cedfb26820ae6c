#!/usr/bin/env node
/**
 * Image Publish CLI
 * Command-line interface for the multi-platform image publish orchestrator
 */

import { Command } from 'commander';
import { readFileSync } from 'node:fs';
import { writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { argv, env, exit } from 'node:process';
import type { Logger } from 'pino';
import { createApp } from '@/app';
import { createLogger, isLogLevel } from '@/lib/logger';
import { installAbortHandlers, logRunFailure } from '@/lib/runtime-logging';
import { EXIT_CODES } from '@/types';
import { ENV_VARS } from '@/config/constants';
import { provideContextualGuidance } from './guidance';
import {
  runHealth,
  runPublish,
  runRenderDeployment,
  runTags,
  runValidate,
  type CommandContext,
} from './commands';

function readVersion(): string {
  // src/cli/ and dist/cli/ both sit two levels below the package root
  const packageJson: unknown = JSON.parse(readFileSync(join(__dirname, '../../package.json'), 'utf-8'));
  if (typeof packageJson === 'object' && packageJson !== null && 'version' in packageJson) {
    const { version } = packageJson;
    if (typeof version === 'string') return version;
  }
  return '0.0.0';
}

interface GlobalOptions {
  logLevel?: string;
  dockerSocket?: string;
}

const version = readVersion();
const writeLine = (stream: NodeJS.WriteStream) => (line: string) => {
  stream.write(`${line}\n`);
};

function createContext(options: GlobalOptions): { context: CommandContext; logger: Logger } {
  const requested = options.logLevel?.toLowerCase();
  const level = requested && isLogLevel(requested) ? requested : undefined;
  if (level) env[ENV_VARS.LOG_LEVEL] = level;
  if (options.dockerSocket) env[ENV_VARS.DOCKER_SOCKET] = options.dockerSocket;

  const logger = createLogger({ name: 'image-publish', ...(level && { level }) });
  const context: CommandContext = {
    logger,
    version,
    logLevel: level ?? env[ENV_VARS.LOG_LEVEL] ?? 'info',
    io: {
      stdout: writeLine(process.stdout),
      stderr: writeLine(process.stderr),
      writeFile: (path, content) => writeFile(path, content, 'utf-8'),
    },
    createApp: () =>
      createApp({
        logger,
        ...(options.dockerSocket ? { dockerSocket: options.dockerSocket } : {}),
      }),
  };
  return { context, logger };
}

async function execute(options: GlobalOptions, command: (context: CommandContext) => Promise<number>): Promise<void> {
  const { context, logger } = createContext(options);
  try {
    exit(await command(context));
  } catch (error) {
    const failure = error instanceof Error ? error : new Error(String(error));
    logRunFailure(failure, logger, context.io.stderr);
    provideContextualGuidance(failure, { dev: logger.isLevelEnabled('debug') });
    exit(EXIT_CODES.unexpected);
  }
}

const program = new Command();

program
  .name('image-publish')
  .description('Build, tag, push and verify multi-platform container images')
  .version(version)
  .option('--log-level <level>', 'logging level: trace, debug, info, warn, error, silent')
  .option('--docker-socket <path>', 'Docker socket path (default: auto-detected)')
  .addHelpText(
    'after',
    `

Examples:
  $ image-publish validate -c publish.yaml            Check configuration and tag conventions
  $ image-publish tags -c publish.yaml                Show the tags each variant will be pushed as
  $ image-publish publish -c publish.yaml --json      Build and publish every variant
  $ image-publish render-deployment -c publish.yaml   Print the pull secret and deployment fragment
  $ image-publish health                              Check that the Docker daemon answers

Environment Variables:
  LOG_LEVEL                                    Logging level
  DOCKER_SOCKET                                Docker daemon socket path
  DOCKER_CONFIG                                Directory holding config.json
  REGISTRY_SERVER                              Registry host (defaults to the configured registry)
  REGISTRY_USERNAME                            Registry username
  REGISTRY_TOKEN                               Registry token (personal access token)
  REGISTRY_EMAIL                               Optional email for the pull secret
`,
  );

program
  .command('publish')
  .description('build, tag, push and verify every variant')
  .requiredOption('-c, --config <file>', 'publish configuration (YAML or JSON)')
  .option('--json', 'print the run summary as JSON on stdout')
  .option('--deployment-out <file>', 'write the rendered deployment fragment to a file')
  .action(async (options: { config: string; json?: boolean; deploymentOut?: string }) => {
    await execute(program.opts<GlobalOptions>(), async (context) => {
      const controller = new AbortController();
      const uninstall = installAbortHandlers(controller, context.logger, context.io.stderr);
      try {
        return await runPublish(options, context, controller.signal);
      } finally {
        uninstall();
      }
    });
  });

program
  .command('tags')
  .description('print the resolved targets of every variant')
  .requiredOption('-c, --config <file>', 'publish configuration (YAML or JSON)')
  .option('--json', 'print targets as JSON')
  .action(async (options: { config: string; json?: boolean }) => {
    await execute(program.opts<GlobalOptions>(), (context) => runTags(options, context));
  });

program
  .command('render-deployment')
  .description('print the image pull secret and deployment fragment')
  .requiredOption('-c, --config <file>', 'publish configuration (YAML or JSON)')
  .option('--variant <name>', 'variant to deploy')
  .option('--digest <digest>', 'pin the image to a manifest digest')
  .option('--include-secret', 'emit the real secret data instead of a placeholder')
  .action(async (options: { config: string; variant?: string; digest?: string; includeSecret?: boolean }) => {
    await execute(program.opts<GlobalOptions>(), (context) => runRenderDeployment(options, context));
  });

program
  .command('validate')
  .description('validate the configuration and tag conventions')
  .requiredOption('-c, --config <file>', 'publish configuration (YAML or JSON)')
  .action(async (options: { config: string }) => {
    await execute(program.opts<GlobalOptions>(), (context) => runValidate(options, context));
  });

program
  .command('health')
  .description('check that the Docker daemon is reachable')
  .action(async () => {
    await execute(program.opts<GlobalOptions>(), (context) => runHealth(context));
  });

program.parseAsync(argv).catch((error: unknown) => {
  console.error(error instanceof Error ? error.message : String(error));
  exit(EXIT_CODES.unexpected);
});
