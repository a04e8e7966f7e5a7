import { EventEmitter } from 'node:events';
import type { JobEvent } from '../domain/entities/JobEvent.js';
import { formatErrorMessage } from '../domain/errors.js';
import { logger } from '../infra/logger.js';

type JobListener = (event: JobEvent) => void;

/**
 * JobEventBus - carries job transitions from the scheduler to its observers.
 * A throwing listener is logged and never reaches the scheduler.
 */
export class JobEventBus {
  private emitter = new EventEmitter();
  private wrapped = new Map<JobListener, JobListener>();

  constructor() {
    this.emitter.setMaxListeners(0);
  }

  onJob(listener: JobListener): void {
    const guarded: JobListener = (event) => {
      try {
        listener(event);
      } catch (error) {
        logger.error('Job event listener failed', {
          jobId: event.jobId,
          status: event.status,
          error: formatErrorMessage(error),
        });
      }
    };
    this.wrapped.set(listener, guarded);
    this.emitter.on('job', guarded);
  }

  offJob(listener: JobListener): void {
    const guarded = this.wrapped.get(listener);
    if (guarded) {
      this.emitter.off('job', guarded);
      this.wrapped.delete(listener);
    }
  }

  emitJob(event: JobEvent): void {
    this.emitter.emit('job', event);
  }
}
