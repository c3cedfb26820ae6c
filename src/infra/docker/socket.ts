/**
 * Docker socket detection.
 */

import { existsSync } from 'node:fs';
import { homedir } from 'node:os';
import { join } from 'node:path';
import { ENV_VARS } from '@/config/constants';

const WINDOWS_PIPE = '//./pipe/docker_engine';

/**
 * Candidate sockets in priority order: DOCKER_HOST (unix://), the default
 * socket, then Colima and Docker Desktop user sockets.
 */
export function socketCandidates(env: NodeJS.ProcessEnv = process.env, home: string = homedir()): string[] {
  const candidates: string[] = [];
  const dockerHost = env.DOCKER_HOST;
  if (dockerHost?.startsWith('unix://')) {
    candidates.push(dockerHost.substring('unix://'.length));
  }

  candidates.push(
    '/var/run/docker.sock',
    join(home, '.colima', 'default', 'docker.sock'),
    join(home, '.docker', 'run', 'docker.sock'),
  );
  return candidates;
}

export function autoDetectDockerSocket(
  env: NodeJS.ProcessEnv = process.env,
  exists: (path: string) => boolean = existsSync,
): string {
  const explicit = env[ENV_VARS.DOCKER_SOCKET];
  if (explicit) return explicit;
  if (process.platform === 'win32') return WINDOWS_PIPE;

  const candidates = socketCandidates(env);
  return candidates.find((candidate) => exists(candidate)) ?? '/var/run/docker.sock';
}
