/**
 * Credential Store Adapter
 *
 * Resolves the registry credential for a run from the environment or an
 * explicit secret. Resolution is pure: no network call, nothing written to
 * disk, and the token never appears in a message or log line.
 */

import type { Logger } from 'pino';
import { Success, type PublishError, type RegistryCredential, type Result } from '@/types';
import { publishFailure } from '@/lib/errors';
import { isValidRegistryHost, normalizeRegistryHost } from '@/lib/image-ref';
import { DEFAULT_CREDENTIAL_ENV_PREFIX, LIMITS } from '@/config/constants';
import {
  getRegistryCredentials,
  type CredentialLookupOptions,
} from '@/infra/docker/credential-helpers';

/**
 * Raw credential fields as supplied by an operator or a secret store.
 */
export interface CredentialInput {
  server?: string | undefined;
  username?: string | undefined;
  token?: string | undefined;
  email?: string | undefined;
}

export type CredentialSource =
  | {
      kind: 'env';
      /** Defaults to `process.env` */
      env?: NodeJS.ProcessEnv;
      /** Variable prefix, `REGISTRY_` by default */
      prefix?: string;
      /** Used when `<prefix>SERVER` is unset */
      defaultServer?: string;
    }
  | { kind: 'secret'; secret: CredentialInput };

const REQUIRED_FIELDS = ['server', 'username', 'token'] as const;

function present(value: string | undefined): value is string {
  return value !== undefined && value.trim().length > 0;
}

function readEnv(source: Extract<CredentialSource, { kind: 'env' }>): CredentialInput {
  const env = source.env ?? process.env;
  const prefix = source.prefix ?? DEFAULT_CREDENTIAL_ENV_PREFIX;
  const server = env[`${prefix}SERVER`];
  return {
    server: present(server) ? server : source.defaultServer,
    username: env[`${prefix}USERNAME`],
    token: env[`${prefix}TOKEN`],
    email: env[`${prefix}EMAIL`],
  };
}

/**
 * Validate raw credential fields into a {@link RegistryCredential}.
 * Missing (or blank) server, username or token fail with `CredentialMissing`
 * listing field names only; a malformed server fails with `CredentialInvalid`.
 */
export function validateCredentialInput(input: CredentialInput): Result<RegistryCredential> {
  const missing = REQUIRED_FIELDS.filter((field) => !present(input[field]));
  if (missing.length > 0) {
    return publishFailure({ kind: 'CredentialMissing', fields: [...missing] });
  }

  const { server = '', username = '', token = '', email = '' } = input;
  const host = normalizeRegistryHost(server);
  if (host.length > LIMITS.maxRegistryHostLength || !isValidRegistryHost(host)) {
    const shown = host.length > 100 ? `${host.substring(0, 100)}...` : host;
    const reason: PublishError = { kind: 'CredentialInvalid', server: shown };
    return publishFailure(reason);
  }

  return Success({
    server: host,
    username: username.trim(),
    token: token.trim(),
    email: email.trim(),
  });
}

/**
 * Resolve a registry credential from its source.
 *
 * @example
 * ```typescript
 * const credential = resolveCredentials({ kind: 'env', defaultServer: 'ghcr.io' });
 * if (!credential.ok) return credential;
 * ```
 */
export function resolveCredentials(source: CredentialSource): Result<RegistryCredential> {
  const input = source.kind === 'env' ? readEnv(source) : source.secret;
  return validateCredentialInput(input);
}

/**
 * Resolve a credential from the local Docker config (explicit `auths`
 * entries or credential helpers) and validate it like any other source.
 * Nothing found, or an unusable Docker config, fails with `CredentialMissing`.
 */
export async function resolveDockerConfigCredentials(
  server: string,
  logger: Logger,
  options: CredentialLookupOptions & { email?: string } = {},
): Promise<Result<RegistryCredential>> {
  const host = normalizeRegistryHost(server);
  if (!isValidRegistryHost(host)) {
    return publishFailure({ kind: 'CredentialInvalid', server: host.substring(0, 100) });
  }

  const lookup = await getRegistryCredentials(host, logger, options);
  if (!lookup.ok) {
    logger.warn({ server: host, reason: lookup.reason.kind }, 'Docker config credential lookup failed');
    return publishFailure({ kind: 'CredentialMissing', fields: ['username', 'token'] });
  }
  if (lookup.value === null) {
    return publishFailure({ kind: 'CredentialMissing', fields: ['username', 'token'] });
  }

  return validateCredentialInput({
    server: host,
    username: lookup.value.username,
    token: lookup.value.password,
    email: options.email ?? lookup.value.email,
  });
}
