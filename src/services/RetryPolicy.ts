import type { ExecutionErrorKind } from '../domain/errors.js';
import type { Job } from '../domain/entities/Job.js';
import type { RetryDelayMode } from '../infra/runConfig.js';

export interface RetryPolicyConfig {
  maxRetries: number;
  retryDelayMs: number;
  retryDelayMode: RetryDelayMode;
  maxRetryDelayMs: number;
  /** Failure kinds that give up immediately; empty retries every kind alike */
  nonRetryableKinds?: readonly ExecutionErrorKind[];
}

export type RetryAction = { type: 'retry'; delayMs: number } | { type: 'give_up' };

/**
 * RetryPolicy - decides whether a failed job gets another attempt.
 * Pure function of the job's attempt count, last failure kind, and configuration.
 */
export class RetryPolicy {
  constructor(private readonly config: RetryPolicyConfig) {}

  get maxAttempts(): number {
    return this.config.maxRetries + 1;
  }

  nextAction(job: Pick<Job, 'attempt' | 'lastError'>): RetryAction {
    if (job.attempt > this.config.maxRetries) {
      return { type: 'give_up' };
    }

    const kind = job.lastError?.kind;
    if (kind === 'interrupted') {
      return { type: 'give_up' };
    }
    if (kind && this.config.nonRetryableKinds?.includes(kind)) {
      return { type: 'give_up' };
    }

    return { type: 'retry', delayMs: this.delayFor(job.attempt) };
  }

  delayFor(attempt: number): number {
    const base =
      this.config.retryDelayMode === 'linear'
        ? this.config.retryDelayMs * Math.max(1, attempt)
        : this.config.retryDelayMs;
    return Math.min(base, this.config.maxRetryDelayMs);
  }
}
