/**
 * Application Constants and Defaults
 *
 * Consolidated default values for the publish orchestrator.
 */

/**
 * Environment variable names read by the CLI and the credential adapter
 */
export const ENV_VARS = {
  LOG_LEVEL: 'LOG_LEVEL',
  DOCKER_SOCKET: 'DOCKER_SOCKET',
  DOCKER_CONFIG: 'DOCKER_CONFIG',
} as const;

/** Prefix of the registry credential variables (`REGISTRY_SERVER`, `REGISTRY_TOKEN`, ...) */
export const DEFAULT_CREDENTIAL_ENV_PREFIX = 'REGISTRY_';

/**
 * Default timeout values in seconds
 */
export const DEFAULT_TIMEOUTS = {
  /** Registry login: 30 seconds. */
  login: 30,
  /** Multi-platform build: 1 hour, emulated builds are slow. */
  build: 3_600,
  /** Single push attempt: 10 minutes. */
  push: 600,
  /** Credential helper invocation: 10 seconds. */
  credentialHelper: 10,
} as const;

export const DEFAULT_CONCURRENCY_LIMIT = 2;
export const DEFAULT_RETRY_ATTEMPTS = 3;

/**
 * Build defaults
 */
export const BUILD_DEFAULTS = {
  context: '.',
  dockerfile: 'Dockerfile',
  localRepository: 'publish-local',
  /** Lines of engine stderr kept in a BuildFailed report */
  stderrTailLines: 20,
} as const;

/**
 * Validation limits
 */
export const LIMITS = {
  /** Maximum registry tag length */
  maxTagLength: 128,
  /** Maximum RFC 1123 label length for secret names and namespaces */
  maxK8sNameLength: 63,
  /** Maximum registry hostname length */
  maxRegistryHostLength: 255,
  maxConcurrency: 32,
  maxRetryAttempts: 10,
} as const;

/**
 * Build-arg keys whose values are masked in reports
 */
export const SENSITIVE_BUILD_ARG_KEYS = ['password', 'token', 'key', 'secret', 'api_key', 'apikey'] as const;
