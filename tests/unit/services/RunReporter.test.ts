import { mkdir, mkdtemp, readFile, readdir } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';
import { RunReporter } from '../../../src/services/RunReporter.js';
import { JobEventBus } from '../../../src/services/JobEventBus.js';
import { JobScheduler } from '../../../src/services/JobScheduler.js';
import { JobService } from '../../../src/services/JobService.js';
import { RetryPolicy } from '../../../src/services/RetryPolicy.js';
import { createJobEvent } from '../../../src/domain/entities/JobEvent.js';
import type { JobFailure, JobStatus } from '../../../src/domain/entities/Job.js';
import { ExecutionError } from '../../../src/domain/errors.js';
import { makeTarget, okResult, ScriptedExecutor } from '../../helpers/fakes.js';

const loggerMock = vi.hoisted(() => ({
  logger: {
    info: vi.fn(),
    error: vi.fn(),
    warn: vi.fn(),
    debug: vi.fn(),
  },
}));

vi.mock('../../../src/infra/logger.js', () => loggerMock);

const FIXED_NOW = new Date(2026, 0, 5, 7, 8, 9);
const STAMP = '20260105_070809';

const event = (
  target: string,
  status: JobStatus,
  attempt: number,
  extra: { message?: string; error?: JobFailure; elapsedMs?: number } = {}
) =>
  createJobEvent({
    jobId: `job-${target}`,
    target,
    status,
    attempt,
    maxAttempts: 3,
    elapsedMs: extra.elapsedMs ?? 0,
    message: extra.message ?? null,
    error: extra.error ?? null,
  });

describe('RunReporter', () => {
  let logDirectory: string;

  beforeEach(async () => {
    logDirectory = path.join(await mkdtemp(path.join(os.tmpdir(), 'labfleet-')), 'logs');
  });

  afterEach(() => {
    vi.clearAllMocks();
  });

  const reporter = () => new RunReporter({ logDirectory, now: () => FIXED_NOW });

  it('should create the log directory and never reuse a run stamp', async () => {
    const first = reporter();
    await first.open([makeTarget('lab-01')]);
    const second = reporter();
    await second.open([makeTarget('lab-01')]);

    expect(first.runId).toBe(STAMP);
    expect(second.runId).toBe(`${STAMP}_1`);
    expect(first.runLogPath).toBe(path.join(logDirectory, `run_${STAMP}.log`));
    expect(first.targetLogPath('lab-01')).toBe(path.join(logDirectory, `lab-01_${STAMP}.log`));

    await first.close();
    await second.close();
  });

  it('should write target logs, the combined log and the summary file', async () => {
    const failure: JobFailure = { kind: 'nonzero_exit', message: 'Remote command failed (exit 2)', preview: 'boom' };
    const instance = reporter();
    await instance.open([makeTarget('lab-01', { metadata: { network_id: 1 } }), makeTarget('lab-02')]);

    instance.onEvent(event('lab-01', 'running', 1, { message: './provision.sh lab-01' }));
    instance.targetLog('lab-01').write('hello from lab-01\n');
    instance.onEvent(event('lab-01', 'succeeded', 1, { message: 'Remote command succeeded', elapsedMs: 1500 }));
    instance.onEvent(event('lab-02', 'running', 1, { message: './provision.sh lab-02' }));
    instance.onEvent(event('lab-02', 'awaiting_retry', 1, { error: failure, message: 'retrying', elapsedMs: 1000 }));
    instance.onEvent(event('lab-02', 'running', 2, { message: './provision.sh lab-02', elapsedMs: 2000 }));
    instance.onEvent(event('lab-02', 'failed', 2, { error: failure, message: failure.message, elapsedMs: 4000 }));

    const summary = await instance.finalize({ interrupted: false });

    expect(summary).toMatchObject({
      runId: STAMP,
      total: 2,
      succeeded: 1,
      failed: 1,
      failedTargets: ['lab-02'],
      totalAttempts: 3,
      retriedTargets: 1,
      interrupted: false,
      warnings: [],
    });
    expect(summary.targets[0]).toEqual({
      name: 'lab-01',
      status: 'succeeded',
      attempts: 1,
      durationMs: 1500,
      lastError: null,
      logFile: path.join(logDirectory, `lab-01_${STAMP}.log`),
      metadata: { network_id: 1 },
    });
    expect(summary.targets[1].lastError).toEqual(failure);

    expect(summary.summaryFile).toBe(path.join(logDirectory, `summary_${STAMP}.json`));
    const written: unknown = JSON.parse(await readFile(path.join(logDirectory, `summary_${STAMP}.json`), 'utf-8'));
    expect(written).toEqual(summary);

    const targetLog = (await readFile(summary.targets[0].logFile ?? '', 'utf-8')).trimEnd().split('\n');
    expect(targetLog).toHaveLength(3);
    expect(targetLog[0]).toMatch(/^===== \S+ running \(attempt 1\/3\) command: \.\/provision\.sh lab-01 =====$/);
    expect(targetLog[1]).toBe('hello from lab-01');
    expect(targetLog[2]).toMatch(/^===== \S+ succeeded \(attempt 1\/3\) Remote command succeeded =====$/);

    const lab02Log = await readFile(path.join(logDirectory, `lab-02_${STAMP}.log`), 'utf-8');
    expect(lab02Log).toContain('failed (attempt 2/3) nonzero_exit: Remote command failed (exit 2) | boom =====');

    const runLog = (await readFile(summary.runLog, 'utf-8')).trimEnd().split('\n');
    expect(runLog).toHaveLength(8);
    expect(runLog[0]).toMatch(new RegExp(`run ${STAMP} started with 2 target\\(s\\)$`));
    expect(runLog[1]).toMatch(/^\S+ lab-01 running attempt 1\/3 0s$/);
    expect(runLog[6]).toMatch(/^\S+ lab-02 failed attempt 2\/3 4s Remote command failed \(exit 2\)$/);
    expect(runLog[7]).toMatch(new RegExp(`run ${STAMP} finished$`));
  });

  it('should leave untouched targets without a log file', async () => {
    const instance = reporter();
    await instance.open([makeTarget('lab-01'), makeTarget('lab-02')]);

    instance.onEvent(event('lab-01', 'running', 1, { message: 'x' }));
    instance.onEvent(event('lab-01', 'failed', 1, { error: { kind: 'interrupted', message: 'Interrupted by operator', preview: null } }));
    instance.onEvent(event('lab-02', 'failed', 0, { error: { kind: 'interrupted', message: 'Interrupted by operator', preview: null } }));
    const summary = await instance.finalize({ interrupted: true });

    expect(summary.interrupted).toBe(true);
    expect(summary.failedTargets).toEqual(['lab-01', 'lab-02']);
    expect(summary.targets[1].logFile).toBeNull();
    expect((await readdir(logDirectory)).sort()).toEqual(
      [`lab-01_${STAMP}.log`, `run_${STAMP}.log`, `summary_${STAMP}.json`].sort()
    );
  });

  it('should mask secrets in the command recorded in target logs', async () => {
    const instance = reporter();
    await instance.open([makeTarget('lab-01')]);

    instance.onEvent(event('lab-01', 'running', 1, { message: './provision.sh --password=test-secret' }));
    await instance.close();

    const log = (await readFile(path.join(logDirectory, `lab-01_${STAMP}.log`), 'utf-8')).trimEnd();
    expect(log).toMatch(
      /^===== \S+ running \(attempt 1\/3\) command: \.\/provision\.sh --password=\*\*\*REDACTED\*\*\* =====$/
    );
  });

  it('should record write failures as warnings instead of throwing', async () => {
    await mkdir(path.join(logDirectory, `lab-01_${STAMP}.log`), { recursive: true });
    const instance = reporter();
    await instance.open([makeTarget('lab-01')]);

    instance.onEvent(event('lab-01', 'running', 1, { message: 'x' }));
    instance.onEvent(event('lab-01', 'succeeded', 1));
    const summary = await instance.finalize({ interrupted: false });

    expect(summary.succeeded).toBe(1);
    expect(summary.warnings).toHaveLength(1);
    expect(summary.warnings[0]).toMatch(new RegExp(`^Could not write .*lab-01_${STAMP}\\.log: `));
    expect(loggerMock.logger.error).toHaveBeenCalledWith(summary.warnings[0], { code: 'AGGREGATION_ERROR' });
  });

  it('should record every transition once in both the target log and the combined log', async () => {
    const targets = ['lab-01', 'lab-02', 'lab-03', 'lab-04'].map((name) => makeTarget(name));
    const instance = reporter();
    await instance.open(targets);

    const bus = new JobEventBus();
    let emitted = 0;
    bus.onJob((e) => {
      emitted += 1;
      instance.onEvent(e);
    });
    const executor = new ScriptedExecutor((target, attempt) => async (request) => {
      request.output.write(`${target} attempt ${attempt} output\n`);
      if (target === 'lab-02' && attempt === 1) {
        throw new ExecutionError('Connection dropped (exit 255)', 'connection_dropped');
      }
      if (target === 'lab-04') {
        throw new ExecutionError('Remote command failed (exit 1)', 'nonzero_exit');
      }
      return okResult();
    });
    const retryPolicy = new RetryPolicy({ maxRetries: 1, retryDelayMs: 0, retryDelayMode: 'fixed', maxRetryDelayMs: 0 });
    const scheduler = new JobScheduler(
      {
        jobService: new JobService(bus, retryPolicy.maxAttempts),
        executor,
        retryPolicy,
        outputFor: (target) => instance.targetLog(target.name),
      },
      { concurrency: 2, dispatchStaggerMs: 0, attemptTimeoutMs: 60_000 }
    );

    await scheduler.run(targets.map((target) => ({ target, command: 'x' })));
    const summary = await instance.finalize({ interrupted: false });

    expect(summary.succeeded + summary.failed).toBe(summary.total);
    expect(summary.failedTargets).toEqual(['lab-04']);

    const runLog = (await readFile(summary.runLog, 'utf-8')).trimEnd().split('\n');
    let recorded = 0;
    for (const target of targets) {
      const targetLog = await readFile(instance.targetLogPath(target.name), 'utf-8');
      const markers = targetLog.split('\n').filter((line) => line.startsWith('===== '));
      const combined = runLog.filter((line) => line.split(' ')[1] === target.name);
      expect(markers.length).toBe(combined.length);
      recorded += combined.length;
    }
    expect(recorded).toBe(emitted);
  });
});
