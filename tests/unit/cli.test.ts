import { mkdtemp, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import chalk from 'chalk';
import { beforeAll, beforeEach, describe, it, expect, vi } from 'vitest';
import {
  EXIT_INTERRUPTED,
  EXIT_OK,
  EXIT_SETUP_FAILED,
  EXIT_TARGETS_FAILED,
  describeCredential,
  exitCodeForError,
  exitCodeForSummary,
  formatTargetLine,
  main,
  type CliIo,
} from '../../src/cli.js';
import { createRunSummary, type TargetOutcome } from '../../src/domain/entities/RunSummary.js';
import { ExecutionError, InterruptedError, InventoryError, TemplateError } from '../../src/domain/errors.js';
import { makeTarget } from '../helpers/fakes.js';

vi.mock('../../src/infra/logger.js', () => ({
  logger: {
    info: vi.fn(),
    error: vi.fn(),
    warn: vi.fn(),
    debug: vi.fn(),
  },
  createLogger: vi.fn(),
  setLogger: vi.fn(),
}));

const INVENTORY = `[deployment_boxes]
lab-01 ansible_host=10.0.1.10 network_id=1
lab-02 ansible_host=10.0.2.10 ansible_port=2222 network_id=2

[deployment_boxes:vars]
ansible_user=labadmin
ansible_ssh_common_args='-J jump@relay.test'
`;

const outcome = (name: string, status: TargetOutcome['status']): TargetOutcome => ({
  name,
  status,
  attempts: 1,
  durationMs: 1000,
  lastError: null,
  logFile: null,
  metadata: {},
});

const summaryWith = (failed: string[], interrupted = false) =>
  createRunSummary({
    runId: '20260105_070809',
    startedAt: new Date('2026-01-05T07:08:09Z'),
    finishedAt: new Date('2026-01-05T07:08:19Z'),
    interrupted,
    outcomes: [outcome('lab-01', 'succeeded'), ...failed.map((name) => outcome(name, 'failed'))],
    logDirectory: '/logs',
    runLog: '/logs/run_20260105_070809.log',
  });

describe('exit codes', () => {
  it('should map run outcomes', () => {
    expect(exitCodeForSummary(null)).toBe(EXIT_OK);
    expect(exitCodeForSummary(summaryWith([]))).toBe(EXIT_OK);
    expect(exitCodeForSummary(summaryWith(['lab-02']))).toBe(EXIT_TARGETS_FAILED);
    expect(exitCodeForSummary(summaryWith(['lab-02'], true))).toBe(EXIT_INTERRUPTED);
  });

  it('should map setup errors', () => {
    expect(exitCodeForError(new InventoryError('bad inventory'))).toBe(EXIT_SETUP_FAILED);
    expect(exitCodeForError(new TemplateError('bad template'))).toBe(EXIT_SETUP_FAILED);
    expect(exitCodeForError(new InterruptedError())).toBe(EXIT_INTERRUPTED);
    expect(
      exitCodeForError(
        new ExecutionError('boom', 'launch_failed', { exitStatus: null, stdoutTail: '', stderrTail: '', durationMs: 0 })
      )
    ).toBe(EXIT_TARGETS_FAILED);
  });
});

describe('target listing', () => {
  beforeAll(() => {
    chalk.level = 0;
  });

  it('should describe credentials without revealing secrets', () => {
    expect(describeCredential({ type: 'agent' })).toBe('ssh-agent');
    expect(describeCredential({ type: 'key', path: '/keys/lab' })).toBe('key /keys/lab');
    expect(describeCredential({ type: 'password', env: 'LAB_PASSWORD' })).toBe('password from $LAB_PASSWORD');
    expect(describeCredential({ type: 'password', secret: 'test-secret' })).toBe('password (inventory)');
  });

  it('should format one line per target', () => {
    const target = makeTarget('lab-02', { host: '10.0.2.10', port: 2222, metadata: { network_id: 2 } });

    expect(formatTargetLine(target)).toBe(
      'lab-02  labadmin@10.0.2.10:2222  via jump@relay.test  [ssh-agent]  network_id=2'
    );
  });
});

describe('main', () => {
  let dir: string;
  let inventory: string;
  let out: string[];
  let err: string[];
  let io: CliIo;

  beforeAll(() => {
    chalk.level = 0;
  });

  beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), 'labfleet-cli-'));
    inventory = path.join(dir, 'hosts');
    await writeFile(inventory, INVENTORY);
    out = [];
    err = [];
    io = {
      out: (text) => out.push(text),
      err: (text) => err.push(text),
      env: { FLEET_INVENTORY: inventory, FLEET_LOG_DIR: path.join(dir, 'logs') },
    };
  });

  it('should list the selected targets with their rendered commands', async () => {
    const code = await main(
      ['node', 'labfleet', 'list', '--only', 'lab-02', '--command', './provision.sh {{ name }} {{ vars.branch }}', '--var', 'branch=main'],
      io
    );

    expect(code).toBe(EXIT_OK);
    expect(out).toEqual([
      'lab-02  labadmin@10.0.2.10:2222  via jump@relay.test  [ssh-agent]  network_id=2',
      '    ./provision.sh lab-02 main',
      '1 target(s)',
    ]);
  });

  it('should refuse to run without a command template', async () => {
    const code = await main(['node', 'labfleet', 'run'], io);

    expect(code).toBe(EXIT_SETUP_FAILED);
    expect(err).toEqual(['Error: A command template is required (--command or FLEET_COMMAND_TEMPLATE)']);
  });

  it('should report unknown targets as a setup failure', async () => {
    const code = await main(['node', 'labfleet', 'list', '--only', 'lab-09'], io);

    expect(code).toBe(EXIT_SETUP_FAILED);
    expect(err).toEqual(['Error: Unknown target(s): lab-09']);
  });

  it('should treat usage errors as setup failures', async () => {
    await expect(main(['node', 'labfleet', 'deploy'], io)).resolves.toBe(EXIT_SETUP_FAILED);
    await expect(main(['node', 'labfleet', '--version'], io)).resolves.toBe(EXIT_OK);
    expect(out).toEqual(['1.0.0']);
  });
});
