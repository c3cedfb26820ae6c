/**
 * Build engine adapter over `docker buildx build`.
 *
 * One invocation per variant: every platform of the variant goes into a
 * single multi-platform build, and the manifest digest is read back from the
 * buildx metadata file.
 */

import { spawn } from 'child_process';
import { readFile } from 'fs/promises';
import tmp from 'tmp';
import type { Logger } from 'pino';

export interface BuildRequest {
  /** Build context directory */
  context: string;
  /** Dockerfile path, relative to the working directory */
  dockerfile: string;
  /** Local image reference to tag the result with */
  tag: string;
  platforms: string[];
  buildArgs: Record<string, string>;
}

export interface BuildProcessResult {
  /** Process exit code; -1 when the engine could not be started or was killed */
  exitCode: number;
  stderr: string;
  /** Manifest digest from the metadata file, when the engine wrote one */
  digest?: string;
}

/**
 * Anything that can turn a {@link BuildRequest} into an image.
 * The signal kills the engine process.
 */
export interface BuildEngine {
  build(request: BuildRequest, signal?: AbortSignal): Promise<BuildProcessResult>;
}

export interface BuildxEngineOptions {
  /** Docker CLI binary, `docker` by default */
  binary?: string;
  /** Extra environment for the engine process */
  env?: NodeJS.ProcessEnv;
}

/**
 * Command-line arguments for a buildx invocation.
 */
export function buildxArguments(request: BuildRequest, metadataFile: string): string[] {
  const args = ['buildx', 'build', '--platform', request.platforms.join(',')];
  for (const [key, value] of Object.entries(request.buildArgs)) {
    args.push('--build-arg', `${key}=${value}`);
  }
  args.push('--file', request.dockerfile, '--tag', request.tag, '--metadata-file', metadataFile, '--load', request.context);
  return args;
}

function stringField(record: Record<string, unknown>, key: string): string | undefined {
  const value = record[key];
  return typeof value === 'string' && value.length > 0 ? value : undefined;
}

/**
 * Manifest digest from buildx metadata JSON (`containerimage.digest`).
 * `containerimage.config.digest` names the config blob, never the manifest,
 * so it is not accepted in its place.
 */
export function parseBuildMetadata(content: string): string | undefined {
  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch {
    return undefined;
  }
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    return undefined;
  }
  const record: Record<string, unknown> = { ...parsed };
  return stringField(record, 'containerimage.digest');
}

async function readDigest(metadataFile: string, logger: Logger): Promise<string | undefined> {
  try {
    return parseBuildMetadata(await readFile(metadataFile, 'utf-8'));
  } catch (error) {
    logger.debug({ metadataFile, error: error instanceof Error ? error.message : String(error) }, 'No build metadata written');
    return undefined;
  }
}

/**
 * Create a build engine that shells out to `docker buildx build`.
 */
export function createBuildxEngine(logger: Logger, options: BuildxEngineOptions = {}): BuildEngine {
  const binary = options.binary ?? 'docker';

  return {
    async build(request, signal) {
      const metadata = tmp.fileSync({ prefix: 'buildx-metadata-', postfix: '.json' });
      try {
        const args = buildxArguments(request, metadata.name);
        logger.debug({ binary, tag: request.tag, platforms: request.platforms }, 'Starting buildx build');

        const { exitCode, stderr } = await new Promise<{ exitCode: number; stderr: string }>((resolve) => {
          const child = spawn(binary, args, {
            stdio: ['ignore', 'pipe', 'pipe'],
            env: { ...process.env, ...options.env },
            ...(signal && { signal }),
          });

          let stderrOutput = '';
          child.stdout?.on('data', (data: Buffer) => {
            logger.trace({ output: data.toString() }, 'buildx stdout');
          });
          child.stderr?.on('data', (data: Buffer) => {
            stderrOutput += data.toString();
          });

          child.on('error', (error) => {
            resolve({ exitCode: -1, stderr: `${stderrOutput}\n${error.message}` });
          });
          child.on('close', (code) => {
            resolve({ exitCode: code ?? -1, stderr: stderrOutput });
          });
        });

        if (exitCode !== 0) {
          return { exitCode, stderr };
        }

        const digest = await readDigest(metadata.name, logger);
        return digest ? { exitCode, stderr, digest } : { exitCode, stderr };
      } finally {
        metadata.removeCallback();
      }
    },
  };
}
