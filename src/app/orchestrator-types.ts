/**
 * Orchestrator Types
 * Types for publish runs and their summaries
 */

import type {
  ExitCode,
  ImageVariant,
  PublishError,
  PublishResult,
  PublishTarget,
  RegistryCredential,
  Result,
  RunContext,
  Stage,
} from '@/types';
import type { TagConvention } from '@/config/schema';
import type { BuildInvoker } from '@/publish/builder';
import type { RegistryPublisher } from '@/publish/registry';

/**
 * Per-variant lifecycle. `Failed` is terminal and records the stage it failed in.
 */
export const VARIANTSTATE = {
  IDLE: 'Idle',
  AUTHENTICATED: 'Authenticated',
  BUILT: 'Built',
  TAGGED: 'Tagged',
  PUBLISHED: 'Published',
  DONE: 'Done',
  FAILED: 'Failed',
} as const;
export type VariantState = (typeof VARIANTSTATE)[keyof typeof VARIANTSTATE];

export type PlatformStatus = 'built' | 'failed' | 'skipped';

export interface VariantReport {
  variant: string;
  state: VariantState;
  failedStage?: Stage;
  error?: PublishError;
  /** Human-readable form of `error` */
  message?: string;
  localImage?: string;
  /** Digest produced by the build */
  digest?: string;
  platforms: Record<string, PlatformStatus>;
  /** One result per target, in tag order */
  targets: PublishResult[];
  buildAttempts: number;
  durationMs: number;
}

export interface DeploymentSummary {
  variant: string;
  /** Image reference written into the deployment */
  image: string;
  /** Secret (redacted) and deployment fragment YAML */
  yaml: string;
}

export interface RunSummary {
  runId: string;
  state: 'Done' | 'Failed';
  failedStage?: Stage;
  error?: PublishError;
  message?: string;
  exitCode: ExitCode;
  variants: VariantReport[];
  published: PublishTarget[];
  cancelled: PublishTarget[];
  failed: PublishTarget[];
  startedAt: string;
  finishedAt: string;
  durationMs: number;
  deployment?: DeploymentSummary;
}

export interface DeploymentRequest {
  secretName: string;
  namespace: string;
  containerName?: string;
  /** Variant to deploy; the first variant when unset */
  variant?: string;
  pinDigest: boolean;
}

/**
 * Everything a run needs besides its collaborators.
 */
export interface PublishRequest {
  variants: ImageVariant[];
  /** `registry/namespace/name` */
  baseRepository: string;
  convention: TagConvention;
  /** Resolves the run's credential; called once, before login */
  resolveCredential: (ctx: RunContext) => Promise<Result<RegistryCredential>>;
  deployment?: DeploymentRequest;
}

/**
 * Orchestrator configuration
 */
export interface OrchestratorConfig {
  /** Builds in flight and pushes in flight, each */
  concurrencyLimit: number;
  /** Re-run a failed build once */
  rerunFailedBuild: boolean;
}

export interface OrchestratorDependencies {
  builder: BuildInvoker;
  publisher: RegistryPublisher;
}

/**
 * Orchestrator interface
 */
export interface PublishOrchestrator {
  run(request: PublishRequest, ctx: RunContext): Promise<RunSummary>;
}
