import { createWriteStream, type WriteStream } from 'node:fs';
import { access, mkdir, writeFile } from 'node:fs/promises';
import path from 'node:path';
import type { Writable } from 'node:stream';
import chalk from 'chalk';
import type { JobFailure, JobStatus } from '../domain/entities/Job.js';
import type { JobEvent } from '../domain/entities/JobEvent.js';
import {
  createRunSummary,
  type RunSummary,
  type TargetOutcome,
} from '../domain/entities/RunSummary.js';
import type { MetadataValue, Target } from '../domain/entities/Target.js';
import { AggregationError, formatErrorMessage } from '../domain/errors.js';
import { logger } from '../infra/logger.js';
import { redactText } from '../infra/redact.js';
import { formatDuration, formatRunTimestamp } from './format.js';

export interface RunReporterOptions {
  logDirectory: string;
  now?: () => Date;
}

interface TargetProgress {
  name: string;
  status: JobStatus;
  attempts: number;
  durationMs: number;
  lastError: JobFailure | null;
  logFile: string;
  metadata: Record<string, MetadataValue>;
}

const STATUS_COLORS: Record<JobStatus, (text: string) => string> = {
  pending: chalk.gray,
  running: chalk.cyan,
  awaiting_retry: chalk.yellow,
  succeeded: chalk.green,
  failed: chalk.red,
};

/**
 * RunReporter - per-target logs, the combined run log, live progress, and the run summary.
 * onEvent() is the only place run state is aggregated.
 */
export class RunReporter {
  private readonly now: () => Date;
  private stamp: string | null = null;
  private startedAt: Date | null = null;
  private runLog: WriteStream | null = null;
  private readonly targetStreams = new Map<string, WriteStream>();
  private readonly auxiliaryStreams: WriteStream[] = [];
  private readonly progress = new Map<string, TargetProgress>();
  private readonly failedFiles = new Set<string>();
  private readonly warnings: string[] = [];
  private finished = 0;

  constructor(private readonly options: RunReporterOptions) {
    this.now = options.now ?? (() => new Date());
  }

  get runId(): string {
    if (!this.stamp) {
      throw new AggregationError('Reporter is not open');
    }
    return this.stamp;
  }

  get runLogPath(): string {
    return path.join(this.options.logDirectory, `run_${this.runId}.log`);
  }

  /**
   * Creates the log directory and the combined log for a run over `targets`.
   * Picks a `_N` suffix when a run log with the same stamp already exists.
   */
  async open(targets: readonly Target[]): Promise<void> {
    this.startedAt = this.now();
    await mkdir(this.options.logDirectory, { recursive: true });
    this.stamp = await this.allocateStamp(formatRunTimestamp(this.startedAt));

    this.runLog = this.openStream(this.runLogPath);
    for (const target of targets) {
      this.progress.set(target.name, {
        name: target.name,
        status: 'pending',
        attempts: 0,
        durationMs: 0,
        lastError: null,
        logFile: this.targetLogPath(target.name),
        metadata: { ...target.metadata },
      });
    }

    this.writeLine(
      this.runLog,
      this.runLogPath,
      `${this.startedAt.toISOString()} run ${this.runId} started with ${targets.length} target(s)`
    );
    logger.info(`Run ${this.runId}: ${targets.length} target(s), logs in ${this.options.logDirectory}`);
  }

  targetLogPath(name: string): string {
    return path.join(this.options.logDirectory, `${name}_${this.runId}.log`);
  }

  /**
   * Append-only log of one target; every attempt of the run writes into the same file
   */
  targetLog(name: string): Writable {
    const existing = this.targetStreams.get(name);
    if (existing) {
      return existing;
    }
    const stream = this.openStream(this.targetLogPath(name));
    this.targetStreams.set(name, stream);
    return stream;
  }

  /**
   * Opens a log file beside the run logs, named with the run stamp
   */
  auxiliaryLog(label: string): { file: string; stream: Writable } {
    const file = path.join(this.options.logDirectory, `${label}_${this.runId}.log`);
    const stream = this.openStream(file);
    this.auxiliaryStreams.push(stream);
    return { file, stream };
  }

  onEvent(event: JobEvent): void {
    const entry = this.progress.get(event.target);
    if (!entry) {
      this.recordWarning(new AggregationError(`Event for unknown target "${event.target}"`));
      return;
    }

    entry.status = event.status;
    entry.attempts = Math.max(entry.attempts, event.attempt);
    entry.durationMs = event.elapsedMs;
    if (event.error) {
      entry.lastError = event.error;
    }
    if (event.status === 'succeeded' || event.status === 'failed') {
      this.finished += 1;
    }

    const timestamp = event.createdAt.toISOString();
    const attempt = `attempt ${event.attempt}/${event.maxAttempts}`;
    const detail = event.message ?? '';

    if (event.attempt > 0) {
      this.writeLine(
        this.targetLog(event.target),
        entry.logFile,
        redactText(`===== ${timestamp} ${event.status} (${attempt}) ${markerDetail(event)} =====`)
      );
    }
    if (this.runLog) {
      this.writeLine(
        this.runLog,
        this.runLogPath,
        `${timestamp} ${event.target} ${event.status} ${attempt} ${formatDuration(event.elapsedMs)}${
          event.status === 'running' ? '' : ` ${detail}`
        }`.trimEnd()
      );
    }

    const color = STATUS_COLORS[event.status];
    const counter = chalk.dim(`[${this.finished}/${this.progress.size}]`);
    const line = `${counter} ${chalk.bold(event.target)} ${color(event.status)} (${attempt}, ${formatDuration(
      event.elapsedMs
    )})`;
    if (event.status === 'failed' || event.status === 'awaiting_retry') {
      logger.warn(`${line} ${detail}`);
    } else {
      logger.info(line);
    }
  }

  /**
   * Closes every stream, writes summary_<stamp>.json, and returns the summary
   */
  async finalize(params: { interrupted: boolean }): Promise<RunSummary> {
    const finishedAt = this.now();
    const outcomes: TargetOutcome[] = [];
    for (const entry of this.progress.values()) {
      if (entry.status !== 'succeeded' && entry.status !== 'failed') {
        this.recordWarning(
          new AggregationError(`Target "${entry.name}" ended the run in status ${entry.status}`)
        );
      }
      outcomes.push({
        name: entry.name,
        status: entry.status === 'succeeded' ? 'succeeded' : 'failed',
        attempts: entry.attempts,
        durationMs: entry.durationMs,
        lastError: entry.lastError,
        logFile: entry.attempts > 0 ? entry.logFile : null,
        metadata: entry.metadata,
      });
    }

    if (this.runLog) {
      this.writeLine(
        this.runLog,
        this.runLogPath,
        `${finishedAt.toISOString()} run ${this.runId} finished${params.interrupted ? ' (interrupted)' : ''}`
      );
    }
    await this.close();

    const summaryFile = path.join(this.options.logDirectory, `summary_${this.runId}.json`);
    const build = (file: string | null): RunSummary =>
      createRunSummary({
        runId: this.runId,
        startedAt: this.startedAt ?? finishedAt,
        finishedAt,
        interrupted: params.interrupted,
        outcomes,
        logDirectory: this.options.logDirectory,
        runLog: this.runLogPath,
        summaryFile: file,
        warnings: [...this.warnings],
      });

    const summary = build(summaryFile);
    try {
      await writeFile(summaryFile, `${JSON.stringify(summary, null, 2)}\n`, 'utf8');
      return summary;
    } catch (error) {
      this.recordWarning(
        new AggregationError(`Could not write ${summaryFile}: ${formatErrorMessage(error)}`)
      );
      return build(null);
    }
  }

  /**
   * Closes every open log without writing a summary
   */
  async close(): Promise<void> {
    const streams = [...this.targetStreams.values(), ...this.auxiliaryStreams];
    if (this.runLog) {
      streams.push(this.runLog);
    }
    await Promise.all(streams.map(closeStream));
  }

  private async allocateStamp(base: string): Promise<string> {
    let candidate = base;
    for (let suffix = 1; await exists(path.join(this.options.logDirectory, `run_${candidate}.log`)); suffix++) {
      candidate = `${base}_${suffix}`;
    }
    return candidate;
  }

  private openStream(file: string): WriteStream {
    const stream = createWriteStream(file, { flags: 'a' });
    stream.on('error', (error) => {
      if (!this.failedFiles.has(file)) {
        this.failedFiles.add(file);
        this.recordWarning(new AggregationError(`Could not write ${file}: ${error.message}`));
      }
    });
    return stream;
  }

  private writeLine(stream: Writable, file: string, line: string): void {
    if (this.failedFiles.has(file) || stream.destroyed) {
      return;
    }
    stream.write(`${line}\n`);
  }

  private recordWarning(error: AggregationError): void {
    this.warnings.push(error.message);
    logger.error(error.message, { code: error.code });
  }
}

function markerDetail(event: JobEvent): string {
  if (event.status === 'running') {
    return `command: ${event.message ?? ''}`;
  }
  if (event.error) {
    const preview = event.error.preview ? ` | ${event.error.preview}` : '';
    return `${event.error.kind}: ${event.error.message}${preview}`;
  }
  return event.message ?? '';
}

function closeStream(stream: WriteStream): Promise<void> {
  return new Promise((resolve) => {
    if (stream.destroyed) {
      resolve();
      return;
    }
    stream.end(() => resolve());
  });
}

async function exists(file: string): Promise<boolean> {
  try {
    await access(file);
    return true;
  } catch {
    return false;
  }
}
