import type { Writable } from 'node:stream';
import type { Job, JobFailure } from '../domain/entities/Job.js';
import type { Target } from '../domain/entities/Target.js';
import { ExecutionError, InterruptedError, formatErrorMessage } from '../domain/errors.js';
import { logger } from '../infra/logger.js';
import type { RemoteExecutor } from '../infra/remote/RemoteExecutor.js';
import type { JobService } from './JobService.js';
import type { RetryAction, RetryPolicy } from './RetryPolicy.js';

const PREVIEW_LENGTH = 100;

export interface JobSchedulerOptions {
  concurrency: number;
  /** Minimum spacing between two consecutive attempt launches */
  dispatchStaggerMs: number;
  attemptTimeoutMs: number;
}

export interface ScheduledTarget {
  target: Target;
  command: string;
  logFile?: string | null;
}

export interface JobSchedulerDeps {
  jobService: JobService;
  executor: RemoteExecutor;
  retryPolicy: RetryPolicy;
  /** Sink for the raw output of every attempt against a target, looked up per attempt */
  outputFor: (target: Target) => Writable;
}

interface QueuedJob {
  job: Job;
  command: string;
}

const INTERRUPTED: JobFailure = {
  kind: 'interrupted',
  message: 'Interrupted by operator',
  preview: null,
};

/**
 * JobScheduler - runs one job per target over a fixed pool of worker slots.
 * Jobs waiting out a retry delay are parked on a timer and hold no slot.
 * Per-target failures end up on the job records; run() resolves once every job is terminal.
 */
export class JobScheduler {
  constructor(
    private deps: JobSchedulerDeps,
    private options: JobSchedulerOptions
  ) {
    if (!Number.isInteger(options.concurrency) || options.concurrency < 1) {
      throw new RangeError(`concurrency must be a positive integer, got ${options.concurrency}`);
    }
  }

  run(entries: ScheduledTarget[], signal?: AbortSignal): Promise<Job[]> {
    const queued: QueuedJob[] = entries.map((entry) => ({
      job: this.deps.jobService.createJob({ target: entry.target, logFile: entry.logFile }),
      command: entry.command,
    }));
    const jobs = queued.map((item) => item.job);

    return new Promise<Job[]>((resolve, reject) => {
      const ready: QueuedJob[] = [...queued];
      const parked = new Map<string, { item: QueuedJob; timer: NodeJS.Timeout }>();
      let active = 0;
      let lastLaunchAt: number | null = null;
      let staggerTimer: NodeJS.Timeout | null = null;
      let aborted = false;
      let settled = false;

      const finish = (error?: unknown): void => {
        if (settled) {
          return;
        }
        settled = true;
        signal?.removeEventListener('abort', onAbort);
        if (staggerTimer) {
          clearTimeout(staggerTimer);
        }
        for (const { timer } of parked.values()) {
          clearTimeout(timer);
        }
        if (error === undefined) {
          resolve(jobs);
        } else {
          reject(error);
        }
      };

      const settleIfIdle = (): void => {
        if (active === 0 && ready.length === 0 && parked.size === 0) {
          finish();
        }
      };

      const launch = (item: QueuedJob): void => {
        active += 1;
        lastLaunchAt = Date.now();
        this.attempt(item, signal)
          .then((action) => {
            active -= 1;
            if (action?.type === 'retry' && aborted) {
              this.deps.jobService.markFailed(item.job.id, INTERRUPTED);
            } else if (action?.type === 'retry') {
              const timer = setTimeout(() => {
                parked.delete(item.job.id);
                ready.push(item);
                pump();
              }, action.delayMs);
              parked.set(item.job.id, { item, timer });
            }
            pump();
          })
          .catch((error: unknown) => {
            logger.error('Scheduler failed to record attempt', {
              target: item.job.target.name,
              error: formatErrorMessage(error),
            });
            finish(error);
          });
      };

      const pump = (): void => {
        if (settled || staggerTimer) {
          return;
        }
        while (!aborted && active < this.options.concurrency && ready.length > 0) {
          const wait =
            lastLaunchAt === null ? 0 : lastLaunchAt + this.options.dispatchStaggerMs - Date.now();
          if (this.options.dispatchStaggerMs > 0 && wait > 0) {
            staggerTimer = setTimeout(() => {
              staggerTimer = null;
              pump();
            }, wait);
            return;
          }
          const next = ready.shift();
          if (next) {
            launch(next);
          }
        }
        settleIfIdle();
      };

      const onAbort = (): void => {
        if (aborted) {
          return;
        }
        aborted = true;
        logger.warn('Run interrupted, cancelling queued jobs', {
          queued: ready.length,
          parked: parked.size,
          running: active,
        });
        if (staggerTimer) {
          clearTimeout(staggerTimer);
          staggerTimer = null;
        }
        try {
          for (const [jobId, { timer }] of parked) {
            clearTimeout(timer);
            this.deps.jobService.markFailed(jobId, INTERRUPTED);
          }
          parked.clear();
          for (const item of ready.splice(0)) {
            this.deps.jobService.markFailed(item.job.id, INTERRUPTED);
          }
        } catch (error) {
          finish(error);
          return;
        }
        settleIfIdle();
      };

      if (signal?.aborted) {
        onAbort();
        return;
      }
      signal?.addEventListener('abort', onAbort, { once: true });
      pump();
    });
  }

  /**
   * Runs one attempt and records its outcome.
   * Resolves with the retry decision when the job is not finished yet.
   */
  private async attempt(item: QueuedJob, signal?: AbortSignal): Promise<RetryAction | null> {
    const { job, command } = item;
    const { jobService, executor, retryPolicy, outputFor } = this.deps;

    jobService.markRunning(job.id, command);
    try {
      const result = await executor.run({
        target: job.target,
        command,
        timeoutMs: this.options.attemptTimeoutMs,
        output: outputFor(job.target),
        signal,
      });
      jobService.markSucceeded(job.id, result.exitStatus);
      return null;
    } catch (error) {
      const exitStatus = error instanceof ExecutionError ? (error.output?.exitStatus ?? null) : null;
      if (error instanceof InterruptedError || signal?.aborted) {
        jobService.markFailed(job.id, INTERRUPTED, exitStatus);
        return null;
      }

      const failure = toJobFailure(error);
      const action = retryPolicy.nextAction({ attempt: job.attempt, lastError: failure });
      if (action.type === 'give_up') {
        jobService.markFailed(job.id, failure, exitStatus);
        return null;
      }

      jobService.markAwaitingRetry(
        job.id,
        failure,
        exitStatus,
        new Date(Date.now() + action.delayMs)
      );
      return action;
    }
  }
}

export function toJobFailure(error: unknown): JobFailure {
  if (error instanceof InterruptedError) {
    return INTERRUPTED;
  }
  if (error instanceof ExecutionError) {
    return {
      kind: error.kind,
      message: error.message,
      preview: firstLinePreview(error.output?.stderrTail),
    };
  }
  return { kind: 'launch_failed', message: formatErrorMessage(error), preview: null };
}

function firstLinePreview(text: string | undefined): string | null {
  const line = text
    ?.split('\n')
    .map((entry) => entry.trim())
    .find((entry) => entry.length > 0);
  return line ? line.slice(0, PREVIEW_LENGTH) : null;
}
