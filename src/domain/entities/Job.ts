/**
 * Job entity - execution record tracking one target's attempts during a run
 */
import type { ExecutionErrorKind } from '../errors.js';
import type { Target } from './Target.js';

export type JobStatus = 'pending' | 'running' | 'awaiting_retry' | 'succeeded' | 'failed';

export type JobFailureKind = ExecutionErrorKind | 'interrupted';

export interface JobFailure {
  kind: JobFailureKind;
  message: string;
  /** First non-empty stderr line of the failed attempt, truncated */
  preview: string | null;
}

export interface Job {
  id: string;
  target: Target;
  status: JobStatus;
  attempt: number;
  startedAt: Date | null;
  attemptStartedAt: Date | null;
  attemptEndedAt: Date | null;
  completedAt: Date | null;
  retryAt: Date | null;
  lastExitStatus: number | null;
  lastError: JobFailure | null;
  logFile: string | null;
}

export const jobTransitions: Record<JobStatus, JobStatus[]> = {
  pending: ['running', 'failed'],
  running: ['succeeded', 'awaiting_retry', 'failed'],
  awaiting_retry: ['running', 'failed'],
  succeeded: [],
  failed: [],
};

export function isTerminalStatus(status: JobStatus): boolean {
  return status === 'succeeded' || status === 'failed';
}

/**
 * Factory function to create a new Job
 */
export function createJob(params: { id: string; target: Target; logFile?: string | null }): Job {
  return {
    id: params.id,
    target: params.target,
    status: 'pending',
    attempt: 0,
    startedAt: null,
    attemptStartedAt: null,
    attemptEndedAt: null,
    completedAt: null,
    retryAt: null,
    lastExitStatus: null,
    lastError: null,
    logFile: params.logFile ?? null,
  };
}
