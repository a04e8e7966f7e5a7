/**
 * JobEvent entity - immutable record of one job status transition
 */
import type { JobFailure, JobStatus } from './Job.js';

export interface JobEvent {
  jobId: string;
  target: string;
  status: JobStatus;
  attempt: number;
  maxAttempts: number;
  elapsedMs: number;
  message: string | null;
  error: JobFailure | null;
  createdAt: Date;
}

/**
 * Factory function to create a new JobEvent
 */
export function createJobEvent(params: {
  jobId: string;
  target: string;
  status: JobStatus;
  attempt: number;
  maxAttempts: number;
  elapsedMs: number;
  message?: string | null;
  error?: JobFailure | null;
}): JobEvent {
  return {
    jobId: params.jobId,
    target: params.target,
    status: params.status,
    attempt: params.attempt,
    maxAttempts: params.maxAttempts,
    elapsedMs: params.elapsedMs,
    message: params.message ?? null,
    error: params.error ?? null,
    createdAt: new Date(),
  };
}
