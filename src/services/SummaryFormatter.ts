import chalk from 'chalk';
import type { RunSummary } from '../domain/entities/RunSummary.js';
import { formatDuration } from './format.js';

const RULE = '='.repeat(60);

/**
 * Renders the end-of-run breakdown printed to the operator
 */
export function formatSummary(summary: RunSummary, options: { cliName?: string } = {}): string {
  const cliName = options.cliName ?? 'labfleet';
  const lines: string[] = [
    RULE,
    chalk.bold(`Run ${summary.runId}${summary.interrupted ? chalk.yellow(' (interrupted)') : ''}`),
    RULE,
    `Targets:        ${summary.total}`,
    `Succeeded:      ${chalk.green(String(summary.succeeded))}`,
    `Failed:         ${summary.failed > 0 ? chalk.red(String(summary.failed)) : '0'}`,
    `Total attempts: ${summary.totalAttempts}`,
    `Retried:        ${summary.retriedTargets}`,
    `Duration:       ${formatDuration(summary.durationMs)}`,
  ];

  const failed = summary.targets.filter((target) => target.status === 'failed');
  if (failed.length > 0) {
    lines.push('', chalk.red.bold('Failed targets:'));
    for (const target of failed) {
      const error = target.lastError;
      lines.push(
        `  ${chalk.bold(target.name)}  ${error ? `${error.kind}: ${error.message}` : 'no attempt recorded'}` +
          ` (${target.attempts} attempt${target.attempts === 1 ? '' : 's'})`
      );
      if (error?.preview) {
        lines.push(`    ${chalk.dim(error.preview)}`);
      }
      if (target.logFile) {
        lines.push(`    log: ${target.logFile}`);
      }
    }
  }

  if (summary.warnings.length > 0) {
    lines.push('', chalk.yellow.bold('Warnings:'));
    for (const warning of summary.warnings) {
      lines.push(`  ${warning}`);
    }
  }

  lines.push('', `Run log: ${summary.runLog}`);
  if (summary.summaryFile) {
    lines.push(`Summary: ${summary.summaryFile}`);
  }
  if (summary.failedTargets.length > 0) {
    lines.push('', 'Re-run the failed targets with:');
    lines.push(
      summary.summaryFile
        ? `  ${cliName} run --from-summary ${summary.summaryFile}`
        : `  ${cliName} run --only ${summary.failedTargets.join(',')}`
    );
  }
  lines.push(RULE);

  return lines.join('\n');
}
