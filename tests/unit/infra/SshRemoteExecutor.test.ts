import { Writable } from 'node:stream';
import { describe, it, expect, vi } from 'vitest';
import { SshRemoteExecutor } from '../../../src/infra/remote/SshRemoteExecutor.js';
import { ExecutionError, InterruptedError } from '../../../src/domain/errors.js';
import type { ProcessLauncher } from '../../../src/infra/process/ProcessLauncher.js';
import { fakeLauncher, makeTarget, type FakeProcess } from '../../helpers/fakes.js';

const loggerMock = vi.hoisted(() => ({
  logger: {
    info: vi.fn(),
    error: vi.fn(),
    warn: vi.fn(),
    debug: vi.fn(),
  },
}));

vi.mock('../../../src/infra/logger.js', () => loggerMock);

function sink(): { stream: Writable; text: () => string } {
  const chunks: string[] = [];
  const stream = new Writable({
    write(chunk, _encoding, callback) {
      chunks.push(String(chunk));
      callback();
    },
  });
  return { stream, text: () => chunks.join('') };
}

function executor(launch: ProcessLauncher, killGraceMs = 50): SshRemoteExecutor {
  return new SshRemoteExecutor({
    launch,
    killGraceMs,
    env: {},
    ssh: { sshBinary: 'ssh', sshpassBinary: 'sshpass', connectTimeoutSeconds: 5 },
  });
}

async function captureError(promise: Promise<unknown>): Promise<unknown> {
  try {
    await promise;
  } catch (error) {
    return error;
  }
  throw new Error('expected the attempt to fail');
}

const target = makeTarget('lab-01', { host: '10.0.1.10', relay: 'jump@relay.test' });

describe('SshRemoteExecutor', () => {
  it('should stream output into the sink and resolve on exit 0', async () => {
    const { launch, calls } = fakeLauncher((proc: FakeProcess) => {
      proc.stdout.write('provisioning\n');
      proc.stderr.write('warning: slow mirror\n');
      proc.stdout.write('done\n');
      proc.exit(0);
    });
    const output = sink();

    const result = await executor(launch).run({
      target,
      command: './provision.sh',
      timeoutMs: 5_000,
      output: output.stream,
    });

    expect(calls[0].file).toBe('ssh');
    expect(calls[0].args.slice(-3)).toEqual(['jump@relay.test', 'labadmin@10.0.1.10', './provision.sh']);
    expect(result.exitStatus).toBe(0);
    expect(result.stdoutTail).toBe('provisioning\ndone');
    expect(result.stderrTail).toBe('warning: slow mirror');
    expect(output.text()).toContain('provisioning\n');
    expect(output.text()).toContain('warning: slow mirror\n');
  });

  it('should report a failing remote command as nonzero_exit', async () => {
    const { launch } = fakeLauncher((proc) => {
      proc.stderr.write('provision failed\n');
      proc.exit(3);
    });

    const error = await captureError(
      executor(launch).run({ target, command: 'x', timeoutMs: 5_000, output: sink().stream })
    );

    expect(error).toBeInstanceOf(ExecutionError);
    expect(error).toMatchObject({
      kind: 'nonzero_exit',
      message: 'Remote command failed (exit 3)',
      output: { exitStatus: 3, stderrTail: 'provision failed' },
    });
  });

  it('should classify ssh failures from stderr', async () => {
    const { launch } = fakeLauncher((proc) => {
      proc.stderr.write('labadmin@10.0.1.10: Permission denied (publickey).\n');
      proc.exit(255);
    });

    const error = await captureError(
      executor(launch).run({ target, command: 'x', timeoutMs: 5_000, output: sink().stream })
    );

    expect(error).toMatchObject({ kind: 'auth_rejected', message: 'Authentication rejected (exit 255)' });
  });

  it('should terminate the attempt when it runs past its time limit', async () => {
    const { launch, calls } = fakeLauncher(() => undefined);

    const error = await captureError(
      executor(launch).run({ target, command: 'sleep 9999', timeoutMs: 20, output: sink().stream })
    );

    expect(error).toBeInstanceOf(ExecutionError);
    expect(error).toMatchObject({ kind: 'timeout' });
    expect(calls[0].process.kills).toEqual(['SIGTERM']);
  });

  it('should escalate to SIGKILL when SIGTERM is ignored', async () => {
    const { launch, calls } = fakeLauncher((proc) => {
      proc.exitOnKill = false;
    });

    const error = await captureError(
      executor(launch, 10).run({ target, command: 'x', timeoutMs: 20, output: sink().stream })
    );

    expect(error).toMatchObject({ kind: 'timeout' });
    expect(calls[0].process.kills).toEqual(['SIGTERM', 'SIGKILL']);
  });

  it('should kill the process and report interruption on abort', async () => {
    const controller = new AbortController();
    const { launch, calls } = fakeLauncher(() => controller.abort());

    const error = await captureError(
      executor(launch).run({
        target,
        command: 'x',
        timeoutMs: 5_000,
        output: sink().stream,
        signal: controller.signal,
      })
    );

    expect(error).toBeInstanceOf(InterruptedError);
    expect(calls[0].process.kills).toEqual(['SIGTERM']);
  });

  it('should not launch anything once the run is aborted', async () => {
    const controller = new AbortController();
    controller.abort();
    const { launch, calls } = fakeLauncher(() => undefined);

    const error = await captureError(
      executor(launch).run({ target, command: 'x', timeoutMs: 5_000, output: sink().stream, signal: controller.signal })
    );

    expect(error).toBeInstanceOf(InterruptedError);
    expect(calls).toHaveLength(0);
  });

  it('should report a missing ssh client as launch_failed', async () => {
    const { launch } = fakeLauncher((proc) => proc.failToStart(new Error('spawn ssh ENOENT')));

    const error = await captureError(
      executor(launch).run({ target, command: 'x', timeoutMs: 5_000, output: sink().stream })
    );

    expect(error).toMatchObject({ kind: 'launch_failed', message: 'Could not start ssh: spawn ssh ENOENT' });
  });

  it('should treat a signal-terminated ssh as a dropped connection', async () => {
    const { launch } = fakeLauncher((proc) => proc.exit(null, 'SIGHUP'));

    const error = await captureError(
      executor(launch).run({ target, command: 'x', timeoutMs: 5_000, output: sink().stream })
    );

    expect(error).toMatchObject({
      kind: 'connection_dropped',
      message: 'Connection dropped: ssh terminated by SIGHUP',
    });
  });
});
