import type { Writable } from 'node:stream';
import type { ExecutionOutput } from '../../domain/errors.js';
import type { Target } from '../../domain/entities/Target.js';

export interface ExecutionRequest {
  target: Target;
  /** Fully rendered remote command */
  command: string;
  timeoutMs: number;
  /** Receives raw stdout/stderr as it streams */
  output: Writable;
  signal?: AbortSignal;
}

export type ExecutionResult = ExecutionOutput;

/**
 * Runs one attempt of the remote command against one target.
 * Resolves on exit status zero; rejects with ExecutionError on any failure
 * kind and with InterruptedError when the signal aborts the attempt.
 */
export interface RemoteExecutor {
  run(request: ExecutionRequest): Promise<ExecutionResult>;
}
