/**
 * RunSummary entity - aggregate result of one orchestration run.
 * Read-only once the run ends; failedTargets drives selective re-runs.
 */
import type { JobFailure, JobStatus } from './Job.js';
import type { MetadataValue } from './Target.js';

export type TerminalStatus = Extract<JobStatus, 'succeeded' | 'failed'>;

export interface TargetOutcome {
  name: string;
  status: TerminalStatus;
  attempts: number;
  durationMs: number;
  lastError: JobFailure | null;
  logFile: string | null;
  metadata: Record<string, MetadataValue>;
}

export interface RunSummary {
  runId: string;
  startedAt: string;
  finishedAt: string;
  durationMs: number;
  total: number;
  succeeded: number;
  failed: number;
  interrupted: boolean;
  totalAttempts: number;
  retriedTargets: number;
  targets: TargetOutcome[];
  failedTargets: string[];
  logDirectory: string;
  runLog: string;
  /** Machine-readable copy of this summary, null when it could not be written */
  summaryFile: string | null;
  warnings: string[];
}

/**
 * Builds the summary from terminal outcomes, preserving their order
 */
export function createRunSummary(params: {
  runId: string;
  startedAt: Date;
  finishedAt: Date;
  interrupted: boolean;
  outcomes: TargetOutcome[];
  logDirectory: string;
  runLog: string;
  summaryFile?: string | null;
  warnings?: string[];
}): RunSummary {
  const succeeded = params.outcomes.filter((o) => o.status === 'succeeded').length;
  const failedTargets = params.outcomes.filter((o) => o.status === 'failed').map((o) => o.name);

  return {
    runId: params.runId,
    startedAt: params.startedAt.toISOString(),
    finishedAt: params.finishedAt.toISOString(),
    durationMs: Math.max(0, params.finishedAt.getTime() - params.startedAt.getTime()),
    total: params.outcomes.length,
    succeeded,
    failed: failedTargets.length,
    interrupted: params.interrupted,
    totalAttempts: params.outcomes.reduce((sum, o) => sum + o.attempts, 0),
    retriedTargets: params.outcomes.filter((o) => o.attempts > 1).length,
    targets: params.outcomes,
    failedTargets,
    logDirectory: params.logDirectory,
    runLog: params.runLog,
    summaryFile: params.summaryFile ?? null,
    warnings: params.warnings ?? [],
  };
}
