/**
 * Docker Credential Helper Integration
 *
 * Looks registry credentials up the way the Docker CLI does: explicit
 * `auths` entries in config.json first, then a registry-specific
 * `credHelpers` entry, then the global `credsStore`.
 */

import { readFile } from 'fs/promises';
import { homedir } from 'os';
import { join } from 'path';
import { spawn } from 'child_process';
import type { Logger } from 'pino';
import { Success, Failure, type Result } from '@/types';
import { DEFAULT_TIMEOUTS, ENV_VARS, LIMITS } from '@/config/constants';

/**
 * Docker configuration structure from ~/.docker/config.json
 */
export interface DockerConfig {
  auths?: Record<string, { auth?: string; username?: string; password?: string; email?: string }>;
  credsStore?: string;
  credHelpers?: Record<string, string>;
}

/**
 * Credentials returned by credential helpers
 */
export interface CredentialHelperResult {
  ServerURL: string;
  Username: string;
  Secret: string;
}

/**
 * Credentials found for a registry
 */
export interface DockerConfigCredential {
  username: string;
  password: string;
  serveraddress: string;
  email?: string;
}

export type CredentialLookupError =
  | { kind: 'InvalidRegistry'; registry: string }
  | { kind: 'ConfigUnreadable'; path: string }
  | { kind: 'HelperFailed'; helper: string };

/**
 * Runs `docker-credential-<helper> get` for a server URL.
 */
export type CredentialHelperRunner = (
  helperName: string,
  serverUrl: string,
  logger: Logger,
) => Promise<Result<CredentialHelperResult, CredentialLookupError>>;

export interface CredentialLookupOptions {
  /** Directory holding config.json; defaults to $DOCKER_CONFIG or ~/.docker */
  configDir?: string;
  /** Helper runner; defaults to spawning the helper binary */
  runHelper?: CredentialHelperRunner;
}

function isCredentialHelperResult(value: unknown): value is CredentialHelperResult {
  if (typeof value !== 'object' || value === null) return false;
  const record: Record<string, unknown> = { ...value };
  return (
    typeof record.ServerURL === 'string' &&
    typeof record.Username === 'string' &&
    typeof record.Secret === 'string'
  );
}

function isDockerConfig(value: unknown): value is DockerConfig {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Read and parse Docker configuration file
 */
async function readDockerConfig(
  configDir: string,
  logger: Logger,
): Promise<Result<DockerConfig, CredentialLookupError>> {
  const configPath = join(configDir, 'config.json');
  try {
    const configContent = await readFile(configPath, 'utf-8');
    const parsed: unknown = JSON.parse(configContent);
    if (!isDockerConfig(parsed)) {
      return Failure('Docker config is not a JSON object', { kind: 'ConfigUnreadable', path: configPath });
    }

    logger.debug({ configPath, hasCredsStore: !!parsed.credsStore }, 'Read Docker config');
    return Success(parsed);
  } catch (error) {
    const errorMessage = error instanceof Error ? error.message : String(error);

    // If config file doesn't exist, return empty config (not an error)
    if (errorMessage.includes('ENOENT') || errorMessage.includes('no such file')) {
      logger.debug({ configPath }, 'Docker config file not found, using empty config');
      return Success({});
    }

    return Failure(`Failed to read Docker config: ${errorMessage}`, { kind: 'ConfigUnreadable', path: configPath }, {
      message: 'Unable to read Docker configuration',
      hint: 'Docker config file is corrupted or inaccessible',
      resolution: `Check ${configPath} file permissions and format`,
      details: { error: errorMessage },
    });
  }
}

function hostnameOf(registry: string): string {
  let hostname: string;

  try {
    const urlString = registry.includes('://') ? registry : `https://${registry}`;
    const url = new URL(urlString);
    hostname = url.host || registry;
  } catch {
    hostname = (registry
      .replace(/^https?:\/\//, '')
      .split('/')[0]
      ?.split('?')[0]
      ?.split('#')[0]) ?? registry;
  }

  return hostname.toLowerCase().trim();
}

/**
 * Host used as the key in config.json and as the credential helper server URL.
 * Docker Hub aliases collapse to `docker.io`; ports are kept since
 * `localhost:5000` and `localhost:5001` are different registries.
 */
export function normalizeRegistryHostname(registry: string): string {
  const hostname = hostnameOf(registry);

  if (
    hostname === 'docker.io' ||
    hostname === 'index.docker.io' ||
    hostname === 'registry-1.docker.io' ||
    hostname === 'registry.hub.docker.com'
  ) {
    return 'docker.io';
  }

  return hostname;
}

export function isAzureACR(serverUrl: string): boolean {
  const hostname = hostnameOf(serverUrl).split(':')[0] ?? '';
  return hostname.endsWith('.azurecr.io') && hostname.length > '.azurecr.io'.length;
}

/**
 * `serveraddress` the Docker daemon expects for a registry host.
 * Docker Hub uses its legacy index URL; Azure ACR requires https://.
 */
export function toServerAddress(registry: string): string {
  const normalized = normalizeRegistryHostname(registry);
  if (normalized === 'docker.io') {
    return 'https://index.docker.io/v1/';
  }
  if (isAzureACR(normalized)) {
    return `https://${normalized}`;
  }
  return normalized;
}

/**
 * Validate that credential helper response matches expected registry
 *
 * SECURITY: Prevents credential leakage when helper returns credentials
 * for a different host than requested.
 */
function validateCredentialHelperResponse(
  expectedRegistry: string,
  credentialResponse: CredentialHelperResult,
  logger: Logger,
): boolean {
  const normalizedExpected = normalizeRegistryHostname(expectedRegistry);
  const normalizedResponse = normalizeRegistryHostname(credentialResponse.ServerURL);

  if (normalizedExpected !== normalizedResponse) {
    logger.warn(
      {
        expected: normalizedExpected,
        received: normalizedResponse,
      },
      'SECURITY: Credential helper returned credentials for different host than requested',
    );
    return false;
  }

  return true;
}

/**
 * Execute a credential helper command
 */
export const executeCredentialHelper: CredentialHelperRunner = (helperName, serverUrl, logger) =>
  new Promise((resolve) => {
    const helperCommand = `docker-credential-${helperName}`;
    const helperFailed = { kind: 'HelperFailed', helper: helperCommand } as const;

    logger.debug({ helperCommand, serverUrl }, 'Executing credential helper');

    const child = spawn(helperCommand, ['get'], {
      stdio: ['pipe', 'pipe', 'pipe'],
      timeout: DEFAULT_TIMEOUTS.credentialHelper * 1000,
    });

    let stdout = '';
    let stderr = '';

    child.stdout?.on('data', (data: Buffer) => {
      stdout += data.toString();
    });

    child.stderr?.on('data', (data: Buffer) => {
      stderr += data.toString();
    });

    child.on('error', (error) => {
      const errorMessage = error.message;

      if (errorMessage.includes('ENOENT') || errorMessage.includes('command not found')) {
        resolve(Failure(`Credential helper not found: ${helperCommand}`, helperFailed, {
          message: 'Docker credential helper not installed',
          hint: `The credential helper '${helperCommand}' is not available`,
          resolution: 'Install the required credential helper or use REGISTRY_* environment variables',
          details: { helperName, serverUrl },
        }));
      } else {
        resolve(Failure(`Credential helper failed: ${errorMessage}`, helperFailed));
      }
    });

    child.on('close', (code) => {
      if (code !== 0) {
        const errorMessage = stderr.trim() || `Process exited with code ${code}`;

        if (errorMessage.includes('credentials not found') || errorMessage.includes('not logged in')) {
          resolve(Failure('No credentials found for registry', helperFailed, {
            message: 'Registry credentials not found in credential store',
            hint: 'You may need to log in to the registry first',
            resolution: 'Run the registry login command for this host, or export REGISTRY_* variables',
            details: { helperName, serverUrl },
          }));
        } else {
          resolve(Failure(`Credential helper failed: ${errorMessage}`, helperFailed));
        }
        return;
      }

      if (stderr) {
        logger.warn({ stderr, helperCommand }, 'Credential helper produced stderr output');
      }

      try {
        const result: unknown = JSON.parse(stdout);

        if (!isCredentialHelperResult(result) || !result.Username || !result.Secret || !result.ServerURL) {
          resolve(Failure('Invalid credential helper response', helperFailed, {
            message: 'Credential helper returned incomplete credentials',
            hint: 'Credential helper response missing required fields',
            resolution: 'Check credential helper configuration and re-run the registry login',
            details: { helperCommand, serverUrl },
          }));
          return;
        }

        logger.debug({ helperCommand, serverUrl, username: result.Username }, 'Credential helper executed successfully');
        resolve(Success(result));
      } catch (parseError) {
        const errorMessage = parseError instanceof Error ? parseError.message : String(parseError);
        resolve(Failure(`Failed to parse credential helper response: ${errorMessage}`, helperFailed));
      }
    });

    // Write the server URL to stdin and close it
    child.stdin?.write(serverUrl);
    child.stdin?.end();
  });

async function fromHelper(
  helperName: string,
  registry: string,
  runHelper: CredentialHelperRunner,
  logger: Logger,
): Promise<DockerConfigCredential | null> {
  const credResult = await runHelper(helperName, registry, logger);
  if (!credResult.ok) {
    logger.debug({ helperName, error: credResult.error }, 'Credential helper lookup failed');
    return null;
  }

  const creds = credResult.value;
  if (!validateCredentialHelperResponse(registry, creds, logger)) {
    return null;
  }

  return {
    username: creds.Username,
    password: creds.Secret,
    serveraddress: toServerAddress(creds.ServerURL),
  };
}

/**
 * Get credentials for a registry from the Docker config and its credential
 * helpers. `Success(null)` means nothing was found.
 */
export async function getRegistryCredentials(
  registry: string,
  logger: Logger,
  options: CredentialLookupOptions = {},
): Promise<Result<DockerConfigCredential | null, CredentialLookupError>> {
  // SECURITY: Validate input to prevent malicious registry hostnames
  if (!registry || registry.length > LIMITS.maxRegistryHostLength) {
    return Failure('Invalid registry hostname', { kind: 'InvalidRegistry', registry: registry.substring(0, 100) }, {
      message: 'Registry hostname must be a non-empty string of at most 255 characters',
      hint: 'Registry parameter is missing or invalid',
      resolution: 'Provide a valid registry hostname',
    });
  }

  const configDir = options.configDir ?? process.env[ENV_VARS.DOCKER_CONFIG] ?? join(homedir(), '.docker');
  const runHelper = options.runHelper ?? executeCredentialHelper;

  const configResult = await readDockerConfig(configDir, logger);
  if (!configResult.ok) {
    return configResult;
  }

  const config = configResult.value;
  const normalizedRegistry = normalizeRegistryHostname(registry);

  logger.debug({ registry, normalizedRegistry }, 'Looking up credentials for registry');

  // Check if there are explicit credentials in auths section
  const auth = config.auths?.[normalizedRegistry] ?? config.auths?.[toServerAddress(normalizedRegistry)];
  if (auth) {
    const email = auth.email ? { email: auth.email } : {};
    if (auth.username && auth.password) {
      logger.debug({ registry: normalizedRegistry }, 'Using explicit credentials from config');
      return Success({
        username: auth.username,
        password: auth.password,
        serveraddress: toServerAddress(normalizedRegistry),
        ...email,
      });
    }

    // Handle base64 encoded auth
    if (auth.auth) {
      const decoded = Buffer.from(auth.auth, 'base64').toString('utf-8');
      const separator = decoded.indexOf(':');
      const username = separator > 0 ? decoded.substring(0, separator) : '';
      const password = separator > 0 ? decoded.substring(separator + 1) : '';
      if (username && password) {
        logger.debug({ registry: normalizedRegistry }, 'Using base64 encoded credentials from config');
        return Success({
          username,
          password,
          serveraddress: toServerAddress(normalizedRegistry),
          ...email,
        });
      }
      logger.warn({ registry: normalizedRegistry }, 'Ignoring malformed base64 auth entry');
    }
  }

  // Check for registry-specific credential helper
  const registryHelper = config.credHelpers?.[normalizedRegistry];
  if (registryHelper) {
    logger.debug({ registry: normalizedRegistry, helperName: registryHelper }, 'Using registry-specific credential helper');
    const found = await fromHelper(registryHelper, normalizedRegistry, runHelper, logger);
    if (found) return Success(found);
  }

  // Check for global credential store
  if (config.credsStore) {
    logger.debug({ registry: normalizedRegistry, helperName: config.credsStore }, 'Using global credential store');
    const found = await fromHelper(config.credsStore, normalizedRegistry, runHelper, logger);
    if (found) return Success(found);
  }

  logger.debug({ registry: normalizedRegistry }, 'No credentials found for registry');
  return Success(null);
}
