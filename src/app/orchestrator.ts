/**
 * Publish Orchestrator
 *
 * Drives every variant through `Idle → Authenticated → Built → Tagged →
 * Published → Done`, or into `Failed(stage)`. Tags and credentials are
 * resolved before any network activity; login happens once per run; builds
 * and pushes run in bounded pools and pushes to the same target never
 * overlap. Variants are independent of each other.
 */

import { randomUUID } from 'crypto';
import {
  EXIT_CODES,
  STAGES,
  describePublishError,
  exitCodeFor,
  formatTarget,
  type BuildOutcome,
  type ImageVariant,
  type PublishError,
  type PublishTarget,
  type RegistryCredential,
  type RunContext,
  type Session,
  type Stage,
} from '@/types';
import { createRunContext, reportProgress } from '@/core/context';
import { createKeyedLock, createLimiter, type KeyedLock, type Limiter } from '@/lib/concurrency';
import { shortDigest } from '@/lib/image-ref';
import { resolveAllTags } from '@/publish/tags';
import { buildPullSecretSpec, renderDeploymentFragment } from '@/publish/deployment';
import {
  VARIANTSTATE,
  type DeploymentSummary,
  type OrchestratorConfig,
  type OrchestratorDependencies,
  type PlatformStatus,
  type PublishOrchestrator,
  type PublishRequest,
  type RunSummary,
  type VariantReport,
  type VariantState,
} from './orchestrator-types';

// ===== State machine =====

const TRANSITIONS: Record<VariantState, readonly VariantState[]> = {
  [VARIANTSTATE.IDLE]: [VARIANTSTATE.AUTHENTICATED, VARIANTSTATE.FAILED],
  [VARIANTSTATE.AUTHENTICATED]: [VARIANTSTATE.BUILT, VARIANTSTATE.FAILED],
  [VARIANTSTATE.BUILT]: [VARIANTSTATE.TAGGED, VARIANTSTATE.FAILED],
  [VARIANTSTATE.TAGGED]: [VARIANTSTATE.PUBLISHED, VARIANTSTATE.FAILED],
  [VARIANTSTATE.PUBLISHED]: [VARIANTSTATE.DONE],
  [VARIANTSTATE.DONE]: [],
  [VARIANTSTATE.FAILED]: [],
};

interface VariantRun {
  variant: ImageVariant;
  report: VariantReport;
  /** Pre-resolved targets, canonical tag first */
  targets: PublishTarget[];
  startedAt: number;
}

function transition(report: VariantReport, next: VariantState): void {
  if (!TRANSITIONS[report.state].includes(next)) {
    throw new Error(`Invalid transition for variant "${report.variant}": ${report.state} -> ${next}`);
  }
  report.state = next;
}

function fail(run: VariantRun, stage: Stage, error: PublishError): void {
  transition(run.report, VARIANTSTATE.FAILED);
  run.report.failedStage = stage;
  run.report.error = error;
  run.report.message = describePublishError(error);
}

function platformStatuses(platforms: readonly string[], status: PlatformStatus): Record<string, PlatformStatus> {
  return Object.fromEntries(platforms.map((platform) => [platform, status]));
}

function newRun(variant: ImageVariant): VariantRun {
  return {
    variant,
    targets: [],
    startedAt: Date.now(),
    report: {
      variant: variant.name,
      state: VARIANTSTATE.IDLE,
      platforms: platformStatuses(variant.platforms, 'skipped'),
      targets: [],
      buildAttempts: 0,
      durationMs: 0,
    },
  };
}

/**
 * The run's error is the one from the earliest stage; ties go to the
 * earlier variant.
 */
export function earliestFailure(reports: readonly VariantReport[]): { stage: Stage; error: PublishError } | undefined {
  let earliest: { stage: Stage; error: PublishError } | undefined;
  for (const report of reports) {
    if (report.failedStage === undefined || report.error === undefined) continue;
    if (earliest === undefined || STAGES.indexOf(report.failedStage) < STAGES.indexOf(earliest.stage)) {
      earliest = { stage: report.failedStage, error: report.error };
    }
  }
  return earliest;
}

// ===== Orchestrator =====

interface RunState {
  session: Session;
  buildLimiter: Limiter;
  pushLimiter: Limiter;
  lock: KeyedLock;
}

/**
 * Create a publish orchestrator
 */
export function createOrchestrator(options: {
  dependencies: OrchestratorDependencies;
  config: OrchestratorConfig;
}): PublishOrchestrator {
  const { builder, publisher } = options.dependencies;
  const { concurrencyLimit, rerunFailedBuild } = options.config;

  async function buildVariant(run: VariantRun, ctx: RunContext): Promise<BuildOutcome | undefined> {
    const { variant, report } = run;

    report.buildAttempts++;
    let built = await builder.build(variant, ctx);
    if (!built.ok && built.reason.kind === 'BuildFailed' && rerunFailedBuild && !ctx.signal?.aborted) {
      ctx.logger.warn({ variant: variant.name, exitCode: built.reason.exitCode }, 'Build failed, re-running once');
      report.buildAttempts++;
      built = await builder.build(variant, ctx);
    }

    if (!built.ok) {
      report.platforms = platformStatuses(variant.platforms, built.reason.kind === 'Cancelled' ? 'skipped' : 'failed');
      fail(run, 'build', built.reason);
      return undefined;
    }

    report.platforms = platformStatuses(built.value.platforms, 'built');
    report.localImage = built.value.localImage;
    report.digest = built.value.digest;
    transition(report, VARIANTSTATE.BUILT);
    await reportProgress(ctx, `Built ${variant.name} (${shortDigest(built.value.digest)})`);
    return built.value;
  }

  async function processVariant(run: VariantRun, state: RunState, ctx: RunContext): Promise<void> {
    const { report } = run;
    const built = await state.buildLimiter(() => buildVariant(run, ctx));
    if (!built) return;

    transition(report, VARIANTSTATE.TAGGED);

    const results = await Promise.all(
      run.targets.map((target) =>
        state.pushLimiter(() =>
          state.lock.run(formatTarget(target), () =>
            publisher.push(state.session, built.localImage, target, built.digest, ctx),
          ),
        ),
      ),
    );
    report.targets = results;

    const failure = results.find((result) => !result.succeeded);
    if (failure) {
      fail(run, 'push', failure.error ?? { kind: 'Cancelled', stage: 'push' });
      return;
    }

    transition(report, VARIANTSTATE.PUBLISHED);
    await reportProgress(ctx, `Published ${report.variant}: ${run.targets.map(formatTarget).join(', ')}`);
    transition(report, VARIANTSTATE.DONE);
  }

  function renderDeployment(
    request: PublishRequest,
    runs: readonly VariantRun[],
    credential: RegistryCredential,
    ctx: RunContext,
  ): DeploymentSummary | undefined {
    const deployment = request.deployment;
    if (!deployment) return undefined;

    const chosen = deployment.variant ?? runs[0]?.variant.name;
    const run = runs.find((candidate) => candidate.variant.name === chosen);
    const image = run?.targets[0];
    if (!run || run.report.state !== VARIANTSTATE.DONE || !image) {
      ctx.logger.info({ variant: chosen }, 'Deployment variant not published, skipping deployment fragment');
      return undefined;
    }

    const patch = buildPullSecretSpec(credential, deployment.secretName, deployment.namespace);
    if (!patch.ok) {
      ctx.logger.error({ error: patch.error }, 'Cannot build pull secret');
      return undefined;
    }

    const digest = deployment.pinDigest ? run.report.digest : undefined;
    const fragment = renderDeploymentFragment(patch.value, image, {
      ...(deployment.containerName !== undefined ? { containerName: deployment.containerName } : {}),
      ...(digest !== undefined ? { digest } : {}),
    });
    if (!fragment.ok) {
      ctx.logger.error({ error: fragment.error }, 'Cannot render deployment fragment');
      return undefined;
    }

    return { variant: run.variant.name, image: fragment.value.image, yaml: fragment.value.yaml };
  }

  function summarize(
    runId: string,
    runs: readonly VariantRun[],
    startedAt: Date,
    deployment: DeploymentSummary | undefined,
  ): RunSummary {
    const published: PublishTarget[] = [];
    const cancelled: PublishTarget[] = [];
    const failed: PublishTarget[] = [];

    for (const run of runs) {
      const { report } = run;
      if (report.targets.length > 0) {
        for (const result of report.targets) {
          if (result.succeeded) published.push(result.target);
          else if (result.error?.kind === 'Cancelled') cancelled.push(result.target);
          else failed.push(result.target);
        }
      } else if (report.state === VARIANTSTATE.FAILED) {
        // Targets that were never pushed
        const bucket = report.error?.kind === 'Cancelled' ? cancelled : failed;
        bucket.push(...run.targets);
      }
    }

    const finishedAt = new Date();
    const failure = earliestFailure(runs.map((run) => run.report));
    const summary: RunSummary = {
      runId,
      state: failure ? 'Failed' : 'Done',
      exitCode: failure ? exitCodeFor(failure.error) : EXIT_CODES.success,
      variants: runs.map((run) => run.report),
      published,
      cancelled,
      failed,
      startedAt: startedAt.toISOString(),
      finishedAt: finishedAt.toISOString(),
      durationMs: finishedAt.getTime() - startedAt.getTime(),
    };
    if (failure) {
      summary.failedStage = failure.stage;
      summary.error = failure.error;
      summary.message = describePublishError(failure.error);
    }
    if (deployment) summary.deployment = deployment;
    return summary;
  }

  async function run(request: PublishRequest, parent: RunContext): Promise<RunSummary> {
    const runId = randomUUID();
    const startedAt = new Date();
    const ctx = createRunContext(parent.logger.child({ runId }), {
      ...(parent.signal && { signal: parent.signal }),
      ...(parent.progress && { progress: parent.progress }),
    });
    const runs = request.variants.map(newRun);

    const finish = (deployment?: DeploymentSummary): RunSummary => {
      const finishedAt = Date.now();
      for (const variantRun of runs) {
        variantRun.report.durationMs = finishedAt - variantRun.startedAt;
      }
      const summary = summarize(runId, runs, startedAt, deployment);
      ctx.logger.info(
        { state: summary.state, exitCode: summary.exitCode, published: summary.published.length },
        'Publish run finished',
      );
      return summary;
    };
    const failAll = (stage: Stage, error: PublishError): RunSummary => {
      for (const variantRun of runs) fail(variantRun, stage, error);
      return finish();
    };

    ctx.logger.info(
      { variants: request.variants.map((variant) => variant.name), repository: request.baseRepository },
      'Publish run started',
    );

    // Pre-flight: nothing below touches the network or the build engine
    const tags = resolveAllTags(request.variants, request.baseRepository, request.convention);
    if (!tags.ok) {
      ctx.logger.error({ error: tags.error }, 'Tag resolution failed');
      return failAll('config', tags.reason);
    }
    for (const variantRun of runs) {
      variantRun.targets = tags.value.get(variantRun.variant.name) ?? [];
    }

    const credential = await request.resolveCredential(ctx);
    if (!credential.ok) {
      ctx.logger.error({ error: credential.error }, 'Credential resolution failed');
      return failAll('credentials', credential.reason);
    }

    const session = await publisher.login(credential.value, ctx);
    if (!session.ok) {
      ctx.logger.error({ error: session.error }, 'Registry login failed');
      return failAll('login', session.reason);
    }
    for (const variantRun of runs) transition(variantRun.report, VARIANTSTATE.AUTHENTICATED);
    await reportProgress(ctx, `Logged in to ${session.value.server}`);

    const state: RunState = {
      session: session.value,
      buildLimiter: createLimiter(concurrencyLimit),
      pushLimiter: createLimiter(concurrencyLimit),
      lock: createKeyedLock(),
    };
    await Promise.all(runs.map((variantRun) => processVariant(variantRun, state, ctx)));

    return finish(renderDeployment(request, runs, credential.value, ctx));
  }

  return { run };
}
