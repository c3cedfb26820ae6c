/**
 * Image reference helpers: tag tokens, registry hosts and repository paths.
 */

import { Success, Failure, type Result } from '@/types';

/** Registry tag grammar: word character first, then up to 127 of `[\w.-]` */
export const TAG_PATTERN = /^[A-Za-z0-9_][A-Za-z0-9._-]{0,127}$/;

const REPOSITORY_COMPONENT = /^[a-z0-9]+(?:(?:[._]|__|-+)[a-z0-9]+)*$/;
const HOST_LABEL = /^[a-z0-9](?:[a-z0-9-]{0,61}[a-z0-9])?$/;

export const DOCKER_HUB = 'docker.io';

export function isValidTag(tag: string): boolean {
  return TAG_PATTERN.test(tag);
}

/**
 * Strip scheme, trailing slash and case from a registry server value.
 */
export function normalizeRegistryHost(server: string): string {
  return server
    .trim()
    .replace(/^https?:\/\//i, '')
    .replace(/\/+$/, '')
    .toLowerCase();
}

/**
 * A host is well formed when it is made of DNS labels with an optional port,
 * and either contains a dot, is `localhost`, or carries a port.
 */
export function isValidRegistryHost(host: string): boolean {
  const match = /^([^:/]+)(?::(\d{1,5}))?$/.exec(host);
  if (!match) return false;

  const [, hostname = '', port] = match;
  if (port !== undefined) {
    const portNumber = Number(port);
    if (portNumber < 1 || portNumber > 65535) return false;
  }

  const labels = hostname.split('.');
  if (!labels.every((label) => HOST_LABEL.test(label))) return false;

  return labels.length > 1 || hostname === 'localhost' || port !== undefined;
}

function looksLikeRegistry(segment: string): boolean {
  return segment.includes('.') || segment.includes(':') || segment === 'localhost';
}

export interface RepositoryRef {
  registry: string;
  repository: string;
}

/**
 * Split `registry/namespace/name` into registry and repository path.
 * Without a registry-looking first segment the registry is Docker Hub.
 */
export function parseRepository(reference: string): Result<RepositoryRef> {
  const trimmed = reference.trim().replace(/^https?:\/\//i, '').replace(/\/+$/, '');
  const segments = trimmed.split('/');
  const first = segments[0] ?? '';

  let registry = DOCKER_HUB;
  let path = segments;
  if (segments.length > 1 && looksLikeRegistry(first)) {
    registry = first.toLowerCase();
    path = segments.slice(1);
  }

  const issues: string[] = [];
  if (trimmed.includes('@') || /:[^/]*$/.test(path.join('/'))) {
    issues.push(`repository "${reference}" must not include a tag or digest`);
  } else if (path.length === 0 || !path.every((component) => REPOSITORY_COMPONENT.test(component))) {
    issues.push(`repository "${reference}" is not a valid repository path`);
  }
  if (registry !== DOCKER_HUB && !isValidRegistryHost(registry)) {
    issues.push(`registry "${registry}" is not a well-formed host`);
  }

  if (issues.length > 0) {
    return Failure(issues.join('; '), { kind: 'ConfigInvalid', issues });
  }
  return Success({ registry, repository: path.join('/') });
}

/**
 * `registry/repository` as the engine expects it for tag and push calls.
 */
export function qualifiedRepository(ref: RepositoryRef): string {
  return `${ref.registry}/${ref.repository}`;
}

/**
 * Abbreviate a digest to algorithm + 12 hex characters.
 */
export function shortDigest(digest: string): string {
  const colon = digest.indexOf(':');
  return colon >= 0 && digest.length > colon + 13 ? digest.substring(0, colon + 13) : digest;
}
