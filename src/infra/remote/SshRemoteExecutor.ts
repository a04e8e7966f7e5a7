import { ExecutionError, InterruptedError, formatErrorMessage } from '../../domain/errors.js';
import type { ExecutionErrorKind } from '../../domain/errors.js';
import { logger } from '../logger.js';
import { spawnProcess, type ProcessHandle, type ProcessLauncher } from '../process/ProcessLauncher.js';
import { superviseProcess, type SupervisedExit } from '../process/superviseProcess.js';
import { TailBuffer } from '../process/TailBuffer.js';
import { buildSshInvocation, type SshOptions } from './buildSshInvocation.js';
import { classifySshFailure } from './classifySshFailure.js';
import type { ExecutionRequest, ExecutionResult, RemoteExecutor } from './RemoteExecutor.js';

export interface SshRemoteExecutorOptions {
  ssh: SshOptions;
  launch?: ProcessLauncher;
  env?: NodeJS.ProcessEnv;
  /** Delay between SIGTERM and SIGKILL when an attempt is cut short */
  killGraceMs?: number;
  tailLines?: number;
}

const FAILURE_LABELS: Record<ExecutionErrorKind, string> = {
  relay_unreachable: 'Relay or target unreachable',
  auth_rejected: 'Authentication rejected',
  connection_dropped: 'Connection dropped',
  timeout: 'Timed out',
  nonzero_exit: 'Remote command failed',
  launch_failed: 'Could not start ssh',
};

/**
 * SshRemoteExecutor - runs the remote command through the target's relay
 * with the system ssh client, streaming output into the target's log.
 */
export class SshRemoteExecutor implements RemoteExecutor {
  private readonly launch: ProcessLauncher;
  private readonly killGraceMs: number;
  private readonly tailLines: number;

  constructor(private readonly options: SshRemoteExecutorOptions) {
    this.launch = options.launch ?? spawnProcess;
    this.killGraceMs = options.killGraceMs ?? 10_000;
    this.tailLines = options.tailLines ?? 20;
  }

  async run(request: ExecutionRequest): Promise<ExecutionResult> {
    if (request.signal?.aborted) {
      throw new InterruptedError();
    }

    const invocation = buildSshInvocation(
      request.target,
      request.command,
      this.options.ssh,
      this.options.env ?? process.env
    );
    const startedAt = Date.now();
    const stdoutTail = new TailBuffer(this.tailLines);
    const stderrTail = new TailBuffer(this.tailLines);

    let handle: ProcessHandle;
    try {
      handle = this.launch(invocation.file, invocation.args, { env: invocation.env });
    } catch (error) {
      throw new ExecutionError(
        `${FAILURE_LABELS.launch_failed}: ${formatErrorMessage(error)}`,
        'launch_failed'
      );
    }

    handle.stdout.on('data', (chunk: Buffer) => {
      stdoutTail.push(chunk);
      request.output.write(chunk);
    });
    handle.stderr.on('data', (chunk: Buffer) => {
      stderrTail.push(chunk);
      request.output.write(chunk);
    });

    let exit: SupervisedExit;
    try {
      exit = await superviseProcess(handle, {
        timeoutMs: request.timeoutMs,
        killGraceMs: this.killGraceMs,
        signal: request.signal,
        onTimeout: () => logger.warn('Attempt timed out, terminating ssh', { target: request.target.name }),
      });
    } catch (error) {
      throw new ExecutionError(
        `${FAILURE_LABELS.launch_failed}: ${formatErrorMessage(error)}`,
        'launch_failed'
      );
    }

    const result: ExecutionResult = {
      exitStatus: exit.code,
      stdoutTail: stdoutTail.toString(),
      stderrTail: stderrTail.toString(),
      durationMs: Date.now() - startedAt,
    };

    if (exit.interrupted) {
      throw new InterruptedError();
    }
    if (exit.timedOut) {
      throw new ExecutionError(
        `${FAILURE_LABELS.timeout} after ${Math.round(request.timeoutMs / 1000)}s`,
        'timeout',
        result
      );
    }
    if (exit.code === 0) {
      return result;
    }
    if (exit.code === null) {
      throw new ExecutionError(
        `${FAILURE_LABELS.connection_dropped}: ssh terminated by ${exit.signal ?? 'signal'}`,
        'connection_dropped',
        result
      );
    }

    const kind = classifySshFailure({
      exitStatus: exit.code,
      stderr: result.stderrTail,
      producedOutput: !stdoutTail.isEmpty,
    });
    throw new ExecutionError(`${FAILURE_LABELS[kind]} (exit ${exit.code})`, kind, result);
  }
}
