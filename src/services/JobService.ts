import { randomUUID } from 'node:crypto';
import type { Job, JobFailure, JobStatus } from '../domain/entities/Job.js';
import { createJob, jobTransitions } from '../domain/entities/Job.js';
import { createJobEvent } from '../domain/entities/JobEvent.js';
import type { Target } from '../domain/entities/Target.js';
import { NotFoundError, ValidationError } from '../domain/errors.js';
import { logger } from '../infra/logger.js';
import type { JobEventBus } from './JobEventBus.js';

/**
 * JobService - owns the in-memory job records of one run and their status updates.
 * Every transition is checked against the job state machine and published on the event bus.
 */
export class JobService {
  private jobs = new Map<string, Job>();

  constructor(
    private eventBus: JobEventBus,
    private maxAttempts: number
  ) {}

  createJob(params: { target: Target; logFile?: string | null }): Job {
    const job = createJob({ id: randomUUID(), target: params.target, logFile: params.logFile });
    this.jobs.set(job.id, job);
    logger.debug('Job created', { jobId: job.id, target: job.target.name });
    return job;
  }

  getJob(jobId: string): Job {
    const job = this.jobs.get(jobId);
    if (!job) {
      throw new NotFoundError('Job', jobId);
    }
    return job;
  }

  listJobs(status?: JobStatus): Job[] {
    const jobs = [...this.jobs.values()];
    return status ? jobs.filter((job) => job.status === status) : jobs;
  }

  markRunning(jobId: string, command: string): Job {
    const job = this.getJob(jobId);
    this.assertTransition(job.status, 'running');
    const now = new Date();
    job.status = 'running';
    job.attempt += 1;
    job.startedAt = job.startedAt ?? now;
    job.attemptStartedAt = now;
    job.attemptEndedAt = null;
    job.retryAt = null;
    this.publish(job, command);
    return job;
  }

  markSucceeded(jobId: string, exitStatus: number | null): Job {
    const job = this.getJob(jobId);
    this.assertTransition(job.status, 'succeeded');
    const now = new Date();
    job.status = 'succeeded';
    job.attemptEndedAt = now;
    job.completedAt = now;
    job.lastExitStatus = exitStatus;
    this.publish(job, 'Remote command succeeded');
    return job;
  }

  markAwaitingRetry(
    jobId: string,
    failure: JobFailure,
    exitStatus: number | null,
    retryAt: Date
  ): Job {
    const job = this.getJob(jobId);
    this.assertTransition(job.status, 'awaiting_retry');
    job.status = 'awaiting_retry';
    job.attemptEndedAt = new Date();
    job.lastExitStatus = exitStatus;
    job.lastError = failure;
    job.retryAt = retryAt;
    const delaySeconds = Math.max(0, Math.round((retryAt.getTime() - Date.now()) / 1000));
    this.publish(job, `${failure.message}; retrying in ${delaySeconds}s`);
    return job;
  }

  markFailed(jobId: string, failure: JobFailure, exitStatus: number | null = null): Job {
    const job = this.getJob(jobId);
    this.assertTransition(job.status, 'failed');
    const now = new Date();
    if (job.status === 'running') {
      job.attemptEndedAt = now;
      job.lastExitStatus = exitStatus;
    }
    job.status = 'failed';
    job.completedAt = now;
    job.retryAt = null;
    job.lastError = failure;
    this.publish(job, failure.message);
    return job;
  }

  private assertTransition(from: JobStatus, to: JobStatus): void {
    const allowed = jobTransitions[from] || [];
    if (!allowed.includes(to)) {
      throw new ValidationError(`Invalid job status transition: ${from} -> ${to}`);
    }
  }

  private publish(job: Job, message: string): void {
    this.eventBus.emitJob(
      createJobEvent({
        jobId: job.id,
        target: job.target.name,
        status: job.status,
        attempt: job.attempt,
        maxAttempts: this.maxAttempts,
        elapsedMs: job.startedAt ? Date.now() - job.startedAt.getTime() : 0,
        message,
        error: job.status === 'failed' || job.status === 'awaiting_retry' ? job.lastError : null,
      })
    );
  }
}
