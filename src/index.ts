/**
 * Public API of the image publish orchestrator
 * Provides the application facade and the individual publish components
 */

/**
 * Creates the publish application: configuration in, run summary out.
 *
 * @example
 * ```typescript
 * import { createApp, loadConfig, createLogger } from 'image-publish-orchestrator';
 *
 * const logger = createLogger({ name: 'publish' });
 * const config = await loadConfig('publish.yaml', logger);
 * if (config.ok) {
 *   const summary = await createApp({ logger }).publish(config.value);
 *   process.exitCode = summary.exitCode;
 * }
 * ```
 *
 * @public
 */
export { createApp } from './app/index';
export type {
  AppOptions,
  PublishApp,
  RenderDeploymentOptions,
  HealthStatus,
} from './app/index';

/**
 * Orchestrator and run summary types.
 *
 * @public
 */
export { createOrchestrator, earliestFailure } from './app/orchestrator';
export { VARIANTSTATE } from './app/orchestrator-types';
export type {
  DeploymentRequest,
  DeploymentSummary,
  OrchestratorConfig,
  OrchestratorDependencies,
  PlatformStatus,
  PublishOrchestrator,
  PublishRequest,
  RunSummary,
  VariantReport,
  VariantState,
} from './app/orchestrator-types';
export { formatSummaryLines, formatVariantLine, summaryToJson } from './app/summary';

/**
 * Result type, failure taxonomy and domain model.
 *
 * @public
 */
export * from './types/index';
export { createRunContext, type ContextOptions, type ProgressReporter } from './core/context';

/**
 * Publish components.
 *
 * @public
 */
export { resolveCredentials, resolveDockerConfigCredentials, validateCredentialInput } from './publish/credentials';
export type { CredentialInput, CredentialSource } from './publish/credentials';
export { createBuildInvoker, type BuildInvoker, type BuildInvokerOptions } from './publish/builder';
export { resolveTags, resolveAllTags, renderTagTemplate } from './publish/tags';
export { createRegistryPublisher, type RegistryPublisher, type RegistryPublisherOptions } from './publish/registry';
export {
  buildPullSecretSpec,
  renderDeploymentFragment,
  type DeploymentFragment,
  type RenderOptions,
} from './publish/deployment';

/**
 * Infrastructure adapters.
 *
 * @public
 */
export { createDockerClient, type DockerClient, type DockerClientConfig } from './infra/docker/client';
export { createBuildxEngine, type BuildEngine, type BuildRequest, type BuildProcessResult } from './infra/buildx/engine';

/**
 * Configuration and logging.
 *
 * @public
 */
export { loadConfig, parseConfig, toVariants } from './config/loader';
export { publishConfigSchema, type PublishConfig, type PublishConfigInput, type TagConvention } from './config/schema';
export { createLogger } from './lib/logger';
