/**
 * Domain model of a publish run.
 */

import type { PublishError } from './errors';

/**
 * Pipeline stages, in execution order. `config` and `credentials` run before
 * any network activity.
 */
export const STAGES = ['config', 'credentials', 'login', 'build', 'tag', 'push'] as const;
export type Stage = (typeof STAGES)[number];

/**
 * A named build configuration.
 */
export interface ImageVariant {
  /** Unique within a run; also used as the local build tag */
  name: string;
  /** Build-time arguments (Docker ARG values) */
  buildArgs: Record<string, string>;
  /** Ordered, duplicate-free platform identifiers, e.g. `linux/arm64` */
  platforms: string[];
}

export interface RegistryCredential {
  /** Normalised registry host, e.g. `ghcr.io` or `localhost:5000` */
  server: string;
  username: string;
  token: string;
  /** May be empty */
  email: string;
}

export interface PublishTarget {
  registry: string;
  /** Repository path below the registry, e.g. `henn-dt/open-webui` */
  repository: string;
  tag: string;
}

export interface PublishResult {
  target: PublishTarget;
  /** Registry-confirmed manifest digest, or the last digest observed */
  digest: string;
  succeeded: boolean;
  error?: PublishError;
  /** Push attempts made for this target */
  attempts: number;
}

/**
 * Authenticated registry context returned by `login` and passed to every push.
 */
export interface Session {
  id: string;
  server: string;
  username: string;
  /** Auth config handed to the engine; holds the token, never logged */
  readonly auth: RegistryAuth;
}

export interface RegistryAuth {
  username: string;
  password: string;
  serveraddress: string;
  email?: string;
}

export interface BuildOutcome {
  variant: string;
  /** Local image reference produced by the build */
  localImage: string;
  /** Manifest (list) digest reported by the engine */
  digest: string;
  platforms: string[];
  durationMs: number;
}

/**
 * Kubernetes pull-secret and deployment patch inputs.
 */
export interface DeploymentPatch {
  secretName: string;
  namespace: string;
  /** Set once the image to deploy is known */
  image?: PublishTarget;
  pullSecret: PullSecretManifest;
}

export interface PullSecretManifest {
  apiVersion: 'v1';
  kind: 'Secret';
  metadata: { name: string; namespace: string };
  type: 'kubernetes.io/dockerconfigjson';
  data: { '.dockerconfigjson': string };
}

/**
 * Render a target as `registry/repository:tag`.
 */
export function formatTarget(target: PublishTarget): string {
  return `${target.registry}/${target.repository}:${target.tag}`;
}
