import { readFile } from 'node:fs/promises';
import path from 'node:path';
import type { Writable } from 'node:stream';
import { z } from 'zod';
import { TARGET_NAME_PATTERN } from '../domain/entities/Target.js';
import {
  ConfigError,
  InterruptedError,
  PreflightError,
  formatErrorMessage,
} from '../domain/errors.js';
import { MAX_TIMER_SECONDS } from '../infra/env.js';
import { logger } from '../infra/logger.js';
import {
  spawnProcess,
  type ProcessHandle,
  type ProcessLauncher,
} from '../infra/process/ProcessLauncher.js';
import { superviseProcess, type SupervisedExit } from '../infra/process/superviseProcess.js';
import { TailBuffer } from '../infra/process/TailBuffer.js';

const stepSchema = z.object({
  name: z.string().regex(TARGET_NAME_PATTERN, 'must be usable as a file name'),
  command: z.string().min(1),
  args: z.array(z.string()).default([]),
  cwd: z.string().optional(),
  timeoutSeconds: z.number().int().positive().max(MAX_TIMER_SECONDS).default(3600),
  required: z.boolean().default(true),
});

const preflightFileSchema = z.object({
  steps: z.array(stepSchema),
});

export type PreflightStep = z.infer<typeof stepSchema>;

export interface PreflightResult {
  name: string;
  status: 'succeeded' | 'failed';
  exitStatus: number | null;
  durationMs: number;
  logFile: string;
  message: string | null;
}

export interface PreflightRunnerOptions {
  launch?: ProcessLauncher;
  killGraceMs?: number;
  tailLines?: number;
}

/**
 * PreflightRunner - runs local preparation commands once, before any target is dispatched.
 * A failing required step aborts the run; an optional one is reported and skipped past.
 */
export class PreflightRunner {
  private readonly launch: ProcessLauncher;
  private readonly killGraceMs: number;
  private readonly tailLines: number;

  constructor(options: PreflightRunnerOptions = {}) {
    this.launch = options.launch ?? spawnProcess;
    this.killGraceMs = options.killGraceMs ?? 10_000;
    this.tailLines = options.tailLines ?? 20;
  }

  async loadSteps(file: string): Promise<PreflightStep[]> {
    let raw: unknown;
    try {
      raw = JSON.parse(await readFile(file, 'utf-8'));
    } catch (error) {
      throw new ConfigError(`Cannot read preflight file ${file}: ${formatErrorMessage(error)}`);
    }

    const result = preflightFileSchema.safeParse(raw);
    if (!result.success) {
      const issues = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
      throw new ConfigError(`Invalid preflight file ${file}:\n  - ${issues.join('\n  - ')}`, {
        issues,
      });
    }

    const baseDir = path.dirname(file);
    return result.data.steps.map((step) => ({
      ...step,
      cwd: step.cwd ? path.resolve(baseDir, step.cwd) : undefined,
    }));
  }

  async run(
    steps: PreflightStep[],
    logFor: (step: PreflightStep) => { file: string; stream: Writable },
    signal?: AbortSignal
  ): Promise<PreflightResult[]> {
    const results: PreflightResult[] = [];
    for (const step of steps) {
      if (signal?.aborted) {
        throw new InterruptedError();
      }
      const result = await this.runStep(step, logFor(step), signal);
      results.push(result);

      if (result.status === 'succeeded') {
        logger.info(`Preflight step ${step.name} succeeded`, { durationMs: result.durationMs });
        continue;
      }
      if (step.required) {
        throw new PreflightError(`Preflight step "${step.name}" failed: ${result.message}`, step.name, {
          exitStatus: result.exitStatus,
          logFile: result.logFile,
        });
      }
      logger.warn(`Optional preflight step ${step.name} failed, continuing`, {
        exitStatus: result.exitStatus,
        logFile: result.logFile,
      });
    }
    return results;
  }

  private async runStep(
    step: PreflightStep,
    log: { file: string; stream: Writable },
    signal?: AbortSignal
  ): Promise<PreflightResult> {
    const startedAt = Date.now();
    const tail = new TailBuffer(this.tailLines);
    const commandLine = [step.command, ...step.args].join(' ');
    log.stream.write(`===== ${new Date(startedAt).toISOString()} ${step.name}: ${commandLine} =====\n`);
    logger.info(`Running preflight step ${step.name}`, { command: commandLine, cwd: step.cwd });

    const failed = (exitStatus: number | null, message: string): PreflightResult => {
      logger.error(`Preflight step ${step.name} failed: ${message}`);
      if (!tail.isEmpty) {
        logger.error(`Last ${this.tailLines} lines of ${step.name}:\n${tail.toString()}`);
      }
      return {
        name: step.name,
        status: 'failed',
        exitStatus,
        durationMs: Date.now() - startedAt,
        logFile: log.file,
        message,
      };
    };

    let handle: ProcessHandle;
    try {
      handle = this.launch(step.command, step.args, { cwd: step.cwd });
    } catch (error) {
      return failed(null, `could not start ${step.command}: ${formatErrorMessage(error)}`);
    }

    const capture = (chunk: Buffer): void => {
      tail.push(chunk);
      log.stream.write(chunk);
    };
    handle.stdout.on('data', capture);
    handle.stderr.on('data', capture);

    let exit: SupervisedExit;
    try {
      exit = await superviseProcess(handle, {
        timeoutMs: step.timeoutSeconds * 1000,
        killGraceMs: this.killGraceMs,
        signal,
      });
    } catch (error) {
      return failed(null, `could not start ${step.command}: ${formatErrorMessage(error)}`);
    }

    if (exit.interrupted) {
      throw new InterruptedError();
    }
    if (exit.timedOut) {
      return failed(exit.code, `timed out after ${step.timeoutSeconds}s`);
    }
    if (exit.code !== 0) {
      return failed(exit.code, exit.code === null ? `terminated by ${exit.signal ?? 'signal'}` : `exit ${exit.code}`);
    }

    return {
      name: step.name,
      status: 'succeeded',
      exitStatus: 0,
      durationMs: Date.now() - startedAt,
      logFile: log.file,
      message: null,
    };
  }
}
