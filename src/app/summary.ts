/**
 * Run summary rendering for terminals and machines.
 */

import { formatTarget } from '@/types';
import { shortDigest } from '@/lib/image-ref';
import type { RunSummary, VariantReport } from './orchestrator-types';

/**
 * One line per variant, e.g.
 * `✅ debug: Done sha256:0123456789ab → ghcr.io/henn-dt/open-webui:rag-debug`
 */
export function formatVariantLine(report: VariantReport): string {
  if (report.state === 'Done') {
    const targets = report.targets.map((result) => formatTarget(result.target)).join(', ');
    const digest = report.digest ? ` ${shortDigest(report.digest)}` : '';
    return `✅ ${report.variant}: Done${digest} → ${targets}`;
  }

  const stage = report.failedStage ?? 'unknown';
  const icon = report.error?.kind === 'Cancelled' ? '⏹️' : '❌';
  return `${icon} ${report.variant}: Failed(${stage}) ${report.message ?? ''}`.trimEnd();
}

export function formatSummaryLines(summary: RunSummary): string[] {
  const lines = summary.variants.map(formatVariantLine);
  lines.push(
    `📊 ${summary.published.length} published, ${summary.failed.length} failed, ${summary.cancelled.length} cancelled (${summary.durationMs}ms)`,
  );
  return lines;
}

export function summaryToJson(summary: RunSummary): string {
  return JSON.stringify(summary, null, 2);
}
