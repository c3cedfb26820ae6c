/**
 * Deployment Patcher
 *
 * Builds the image pull secret and the deployment fragment that points a
 * container at a published image. Documents are rendered for review and for
 * an external `kubectl apply`; nothing here talks to a cluster.
 */

import yaml from 'js-yaml';
import {
  Success,
  formatTarget,
  type DeploymentPatch,
  type PublishTarget,
  type PullSecretManifest,
  type RegistryCredential,
  type Result,
} from '@/types';
import { publishFailure } from '@/lib/errors';
import { LIMITS } from '@/config/constants';

export const REDACTED_SECRET_DATA = '<redacted>';

const RFC1123_LABEL = /^[a-z0-9]([-a-z0-9]*[a-z0-9])?$/;

export interface RenderOptions {
  /** Container to update; defaults to the last repository segment */
  containerName?: string;
  /** Pin the image to this manifest digest */
  digest?: string;
  /** Emit the real `.dockerconfigjson` instead of a placeholder */
  includeSecretData?: boolean;
}

/**
 * Strategic-merge fragment for a Deployment.
 */
export interface DeploymentSpecFragment {
  spec: {
    template: {
      spec: {
        imagePullSecrets: Array<{ name: string }>;
        containers: Array<{ name: string; image: string }>;
      };
    };
  };
}

export interface DeploymentFragment {
  patch: DeploymentPatch & { image: PublishTarget };
  /** Image reference written into the container */
  image: string;
  deployment: DeploymentSpecFragment;
  /** Secret and deployment fragment as a multi-document YAML stream */
  yaml: string;
}

function isLabel(value: string): boolean {
  return value.length <= LIMITS.maxK8sNameLength && RFC1123_LABEL.test(value);
}

/**
 * `.dockerconfigjson` payload for a credential, base64-encoded.
 */
export function encodeDockerConfigJson(credential: RegistryCredential): string {
  const auth = Buffer.from(`${credential.username}:${credential.token}`).toString('base64');
  const config = {
    auths: {
      [credential.server]: {
        username: credential.username,
        password: credential.token,
        email: credential.email,
        auth,
      },
    },
  };
  return Buffer.from(JSON.stringify(config)).toString('base64');
}

/**
 * Pull-secret patch for a credential. Secret name and namespace must be
 * RFC 1123 labels.
 */
export function buildPullSecretSpec(
  credential: RegistryCredential,
  secretName: string,
  namespace: string,
): Result<DeploymentPatch> {
  const issues: string[] = [];
  if (!isLabel(secretName)) issues.push(`secret name "${secretName}" is not a valid RFC 1123 label`);
  if (!isLabel(namespace)) issues.push(`namespace "${namespace}" is not a valid RFC 1123 label`);
  if (issues.length > 0) {
    return publishFailure({ kind: 'ConfigInvalid', issues });
  }

  const pullSecret: PullSecretManifest = {
    apiVersion: 'v1',
    kind: 'Secret',
    metadata: { name: secretName, namespace },
    type: 'kubernetes.io/dockerconfigjson',
    data: { '.dockerconfigjson': encodeDockerConfigJson(credential) },
  };
  return Success({ secretName, namespace, pullSecret });
}

function defaultContainerName(target: PublishTarget): string {
  const segments = target.repository.split('/');
  return segments[segments.length - 1] ?? target.repository;
}

/**
 * Attach the image to a patch and render the deployment fragment.
 * The Secret's data is replaced by a placeholder unless
 * `includeSecretData` is set.
 */
export function renderDeploymentFragment(
  patch: DeploymentPatch,
  image: PublishTarget,
  options: RenderOptions = {},
): Result<DeploymentFragment> {
  const containerName = options.containerName ?? defaultContainerName(image);
  if (!isLabel(containerName)) {
    return publishFailure({
      kind: 'ConfigInvalid',
      issues: [`container name "${containerName}" is not a valid RFC 1123 label; set deployment.containerName`],
    });
  }

  const reference = options.digest ? `${formatTarget(image)}@${options.digest}` : formatTarget(image);
  const deployment: DeploymentSpecFragment = {
    spec: {
      template: {
        spec: {
          imagePullSecrets: [{ name: patch.secretName }],
          containers: [{ name: containerName, image: reference }],
        },
      },
    },
  };

  const secret: PullSecretManifest = options.includeSecretData
    ? patch.pullSecret
    : { ...patch.pullSecret, data: { '.dockerconfigjson': REDACTED_SECRET_DATA } };

  const documents = [secret, deployment].map((document) => yaml.dump(document, { noRefs: true, lineWidth: -1 }));

  return Success({
    patch: { ...patch, image: { ...image } },
    image: reference,
    deployment,
    yaml: documents.join('---\n'),
  });
}
