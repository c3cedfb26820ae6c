/**
 * Docker client for registry operations: authenticate, tag, push, untag.
 */

import Docker, { type DockerOptions } from 'dockerode';
import type { Logger } from 'pino';
import { Success, Failure, type RegistryAuth, type Result } from '@/types';
import { extractDockerErrorGuidance, toEngineError, type EngineError } from './errors';
import { autoDetectDockerSocket } from './socket';

/**
 * Docker client configuration options.
 */
export interface DockerClientConfig {
  /** Docker socket path (defaults to auto-detection with Colima support) */
  socketPath?: string;
  /** Docker daemon host (for TCP connections) */
  host?: string;
  /** Docker daemon port (for TCP connections) */
  port?: number;
  /** Connection timeout in milliseconds */
  timeout?: number;
}

/**
 * Result of a registry login check.
 */
export interface DockerAuthResult {
  /** Status text returned by the daemon, e.g. "Login Succeeded" */
  status: string;
}

/**
 * Result of pushing a Docker image to a registry.
 */
export interface DockerPushResult {
  /** Manifest digest reported by the registry; empty when none was reported */
  digest: string;
  /** Size of the pushed manifest in bytes */
  size?: number;
}

/**
 * Information about a Docker image.
 */
export interface DockerImageInfo {
  /** Unique identifier of the image */
  Id: string;
  /** Repository tags associated with the image */
  RepoTags: string[];
  /** `repository@digest` entries for pushed images */
  RepoDigests: string[];
}

export type DockerResult<T> = Result<T, EngineError>;

/**
 * Docker client interface for registry operations.
 */
export interface DockerClient {
  /**
   * Validates registry credentials with the daemon.
   * @param auth - Registry auth config
   * @param signal - Aborts the request
   */
  checkAuth: (auth: RegistryAuth, signal?: AbortSignal) => Promise<DockerResult<DockerAuthResult>>;

  /**
   * Retrieves information about a local image.
   * @param reference - Image ID or `repository:tag`
   */
  inspectImage: (reference: string) => Promise<DockerResult<DockerImageInfo>>;

  /**
   * Tags a local image with a new repository and tag.
   * @param source - Image ID or reference to tag
   * @param repository - Target repository, including the registry host
   * @param tag - Target tag name
   */
  tagImage: (source: string, repository: string, tag: string) => Promise<DockerResult<void>>;

  /**
   * Pushes `repository:tag` to its registry.
   * @param auth - Auth config sent with the push
   * @param signal - Aborts the push
   */
  pushImage: (
    repository: string,
    tag: string,
    auth: RegistryAuth,
    signal?: AbortSignal,
  ) => Promise<DockerResult<DockerPushResult>>;

  /**
   * Removes a local image reference. Removing one tag of a multi-tagged image
   * only untags it.
   */
  removeImage: (reference: string, options?: { force?: boolean; noprune?: boolean }) => Promise<DockerResult<void>>;

  /**
   * Checks that the daemon is reachable.
   */
  ping: () => Promise<DockerResult<void>>;
}

interface DockerPushEvent {
  status?: string;
  progressDetail?: Record<string, unknown>;
  error?: string;
  errorDetail?: { message?: string };
  aux?: {
    Tag?: string;
    Digest?: string;
    Size?: number;
  };
}

function authStatus(response: unknown): string {
  if (typeof response === 'object' && response !== null && 'Status' in response) {
    const status: unknown = response.Status;
    if (typeof status === 'string') return status;
  }
  return 'Login Succeeded';
}

function digestFromRepoDigests(repoDigests: string[], repository: string): string {
  const entry = repoDigests.find((candidate) => candidate.startsWith(`${repository}@`));
  return entry?.split('@')[1] ?? '';
}

/**
 * Create base Docker client implementation
 */
function createBaseDockerClient(docker: Docker, logger: Logger): DockerClient {
  const fail = (
    operation: EngineError['operation'],
    error: unknown,
    context: Record<string, unknown>,
    logMessage: string,
  ): DockerResult<never> => {
    const guidance = extractDockerErrorGuidance(error);
    const engineError = toEngineError(operation, error);

    logger.error(
      {
        error: guidance.message,
        hint: guidance.hint,
        resolution: guidance.resolution,
        errorDetails: guidance.details,
        transient: engineError.transient,
        ...context,
      },
      logMessage,
    );

    return Failure(guidance.message, engineError, guidance);
  };

  const fetchImageInfo = async (reference: string): Promise<DockerResult<DockerImageInfo>> => {
    try {
      const inspect = await docker.getImage(reference).inspect();
      return Success({
        Id: inspect.Id,
        RepoTags: inspect.RepoTags ?? [],
        RepoDigests: inspect.RepoDigests ?? [],
      });
    } catch (error) {
      return fail('inspect', error, { reference }, 'Docker inspect image failed');
    }
  };

  return {
    async checkAuth(auth, signal) {
      try {
        logger.debug({ serveraddress: auth.serveraddress, username: auth.username }, 'Checking registry login');
        const response: unknown = await docker.checkAuth({ ...auth, ...(signal && { abortSignal: signal }) });
        const status = authStatus(response);
        logger.info({ serveraddress: auth.serveraddress, status }, 'Registry login accepted');
        return Success({ status });
      } catch (error) {
        return fail('auth', error, { serveraddress: auth.serveraddress }, 'Docker registry login failed');
      }
    },

    inspectImage: fetchImageInfo,

    async tagImage(source, repository, tag) {
      try {
        await docker.getImage(source).tag({ repo: repository, tag });

        logger.debug({ source, repository, tag }, 'Image tagged');
        return Success(undefined);
      } catch (error) {
        return fail('tag', error, { source, repository, tag }, 'Docker tag image failed');
      }
    },

    async pushImage(repository, tag, auth, signal) {
      try {
        const image = docker.getImage(`${repository}:${tag}`);
        const stream = await image.push({
          authconfig: auth,
          ...(signal && { abortSignal: signal }),
        });

        let digest = '';
        let size: number | undefined;

        await new Promise<void>((resolve, reject) => {
          let pushError: Error | null = null;

          docker.modem.followProgress(
            stream,
            (err: Error | null) => {
              if (err) {
                reject(err);
              } else if (pushError) {
                // Reject if we encountered an error event during the push
                reject(pushError);
              } else {
                resolve();
              }
            },
            (event: DockerPushEvent) => {
              logger.trace(event, 'Docker push progress');

              if (event.error || event.errorDetail) {
                const errorMsg = event.error || event.errorDetail?.message || 'Unknown push error';
                // Keep the first error; later events are usually consequences of it
                if (!pushError) {
                  pushError = new Error(errorMsg);
                  logger.debug({ errorEvent: event }, 'Docker push error event received');
                }
              }

              if (event.aux?.Digest) {
                digest = event.aux.Digest;
              }
              if (event.aux?.Size) {
                size = event.aux.Size;
              }
            },
          );
        });

        if (!digest) {
          const inspected = await fetchImageInfo(`${repository}:${tag}`);
          if (inspected.ok) {
            digest = digestFromRepoDigests(inspected.value.RepoDigests, repository);
          }
          if (!digest) {
            logger.warn({ repository, tag }, 'Registry reported no digest for push');
          }
        }

        logger.info({ repository, tag, digest }, 'Image pushed');
        const result: DockerPushResult = { digest };
        if (size !== undefined) {
          result.size = size;
        }
        return Success(result);
      } catch (error) {
        return fail('push', error, { repository, tag }, 'Docker push image failed');
      }
    },

    async removeImage(reference, options = {}) {
      try {
        logger.debug({ reference, ...options }, 'Removing Docker image reference');
        await docker.getImage(reference).remove({ force: options.force ?? false, noprune: options.noprune ?? false });
        return Success(undefined);
      } catch (error) {
        return fail('remove', error, { reference }, 'Docker remove image failed');
      }
    },

    async ping() {
      try {
        await docker.ping();
        return Success(undefined);
      } catch (error) {
        return fail('ping', error, {}, 'Docker daemon is not reachable');
      }
    },
  };
}

/**
 * Create a Docker client for registry operations
 * @param logger - Logger instance for debug output
 * @param config - Optional Docker client configuration
 */
export const createDockerClient = (logger: Logger, config?: DockerClientConfig): DockerClient => {
  let socketPath: string;

  if (config?.socketPath) {
    socketPath = config.socketPath;
  } else {
    socketPath = autoDetectDockerSocket();
    logger.debug({ socketPath }, 'Auto-detected Docker socket');
  }

  const dockerOptions: DockerOptions = {};

  if (socketPath.startsWith('tcp://') || socketPath.startsWith('http://')) {
    const url = new URL(socketPath.replace(/^tcp:/, 'http:'));
    dockerOptions.host = config?.host || url.hostname || 'localhost';
    dockerOptions.port = config?.port || Number(url.port) || 2375;
  } else {
    dockerOptions.socketPath = socketPath;
  }

  if (config?.timeout) {
    dockerOptions.timeout = config.timeout;
  }

  const docker = new Docker(dockerOptions);

  logger.debug({ dockerOptions }, 'Created Docker client');

  return createBaseDockerClient(docker, logger);
};

export { createBaseDockerClient };
