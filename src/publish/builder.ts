/**
 * Build Invoker
 *
 * Runs one engine build per variant under the build deadline and turns the
 * engine's exit status into a {@link BuildOutcome} or a typed failure.
 * Builds are never retried here.
 */

import { Success, type BuildOutcome, type ImageVariant, type Result, type RunContext } from '@/types';
import { extractErrorMessage, publishFailure } from '@/lib/errors';
import { runWithDeadline, type DeadlineOutcome } from '@/lib/deadline';
import { createTimer, getComponentLogger } from '@/lib/logger';
import { BUILD_DEFAULTS, SENSITIVE_BUILD_ARG_KEYS } from '@/config/constants';
import type { BuildEngine, BuildProcessResult, BuildRequest } from '@/infra/buildx/engine';

export const NO_DIGEST_TAIL = 'build engine reported no image digest';
const MASK = '***';

export interface BuildInvokerOptions {
  engine: BuildEngine;
  context: string;
  dockerfile: string;
  /** Repository of the local image; the variant name is its tag */
  localRepository: string;
  /** 0 disables the deadline */
  timeoutMs: number;
}

export interface BuildInvoker {
  build(variant: ImageVariant, ctx: RunContext): Promise<Result<BuildOutcome>>;
}

function isSensitiveKey(key: string): boolean {
  const lowered = key.toLowerCase();
  return SENSITIVE_BUILD_ARG_KEYS.some((fragment) => lowered.includes(fragment));
}

/**
 * Last `lines` non-empty lines of engine stderr, with the values of
 * secret-looking build args masked.
 */
export function stderrTail(
  stderr: string,
  buildArgs: Record<string, string>,
  lines: number = BUILD_DEFAULTS.stderrTailLines,
): string {
  const secrets = Object.entries(buildArgs)
    .filter(([key, value]) => isSensitiveKey(key) && value.length > 0)
    .map(([, value]) => value);

  return stderr
    .split(/\r?\n/)
    .filter((line) => line.trim().length > 0)
    .slice(-lines)
    .map((line) => secrets.reduce((masked, secret) => masked.split(secret).join(MASK), line))
    .join('\n');
}

export function localImageFor(localRepository: string, variant: string): string {
  return `${localRepository}:${variant}`;
}

export function createBuildInvoker(options: BuildInvokerOptions): BuildInvoker {
  return {
    async build(variant, ctx) {
      const logger = getComponentLogger(ctx.logger, 'builder').child({ variant: variant.name });
      const localImage = localImageFor(options.localRepository, variant.name);
      const request: BuildRequest = {
        context: options.context,
        dockerfile: options.dockerfile,
        tag: localImage,
        platforms: variant.platforms,
        buildArgs: variant.buildArgs,
      };
      const timer = createTimer(logger, 'build');

      logger.info({ platforms: variant.platforms, localImage }, 'Building variant');

      let outcome: DeadlineOutcome<BuildProcessResult>;
      try {
        outcome = await runWithDeadline((signal) => options.engine.build(request, signal), {
          timeoutMs: options.timeoutMs,
          ...(ctx.signal && { signal: ctx.signal }),
        });
      } catch (error) {
        timer.error(error);
        return publishFailure({
          kind: 'BuildFailed',
          variant: variant.name,
          exitCode: -1,
          stderrTail: stderrTail(extractErrorMessage(error), variant.buildArgs),
        });
      }

      if (outcome.status === 'timeout') {
        logger.warn({ timeoutMs: options.timeoutMs }, 'Build exceeded its deadline');
        return publishFailure({ kind: 'Timeout', stage: 'build' });
      }
      if (outcome.status === 'cancelled') {
        logger.info('Build cancelled');
        return publishFailure({ kind: 'Cancelled', stage: 'build' });
      }

      const { exitCode, stderr, digest } = outcome.value;
      if (exitCode !== 0) {
        timer.error(new Error(`exit code ${exitCode}`));
        return publishFailure({
          kind: 'BuildFailed',
          variant: variant.name,
          exitCode,
          stderrTail: stderrTail(stderr, variant.buildArgs),
        });
      }
      if (!digest) {
        timer.error(new Error(NO_DIGEST_TAIL));
        return publishFailure({ kind: 'BuildFailed', variant: variant.name, exitCode, stderrTail: NO_DIGEST_TAIL });
      }

      const durationMs = timer.end({ digest });
      logger.info({ digest, durationMs }, 'Variant built');
      return Success({
        variant: variant.name,
        localImage,
        digest,
        platforms: [...variant.platforms],
        durationMs,
      });
    },
  };
}
