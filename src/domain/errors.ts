/**
 * Application error types
 * Each error type carries a stable code; run-fatal errors map to the CLI exit status
 */

export class AppError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly details?: unknown
  ) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Configuration errors - fail fast on startup
 */
export class ConfigError extends AppError {
  constructor(message: string, details?: unknown) {
    super(message, 'CONFIG_ERROR', details);
  }
}

/**
 * Validation errors from operator input or illegal state transitions
 */
export class ValidationError extends AppError {
  constructor(message: string, details?: unknown) {
    super(message, 'VALIDATION_ERROR', details);
  }
}

/**
 * Lookup of an unknown record
 */
export class NotFoundError extends AppError {
  constructor(resource: string, id: string) {
    super(`${resource} not found: ${id}`, 'NOT_FOUND', { resource, id });
  }
}

/**
 * Inventory missing, malformed, or containing duplicate targets.
 * Raised before any job exists.
 */
export class InventoryError extends AppError {
  constructor(message: string, details?: unknown) {
    super(message, 'INVENTORY_ERROR', details);
  }
}

/**
 * Command template could not be parsed or rendered for a target
 */
export class TemplateError extends AppError {
  constructor(message: string, details?: unknown) {
    super(message, 'TEMPLATE_ERROR', details);
  }
}

/**
 * A required preflight step failed
 */
export class PreflightError extends AppError {
  constructor(
    message: string,
    public readonly step: string,
    details?: unknown
  ) {
    super(message, 'PREFLIGHT_ERROR', { step, ...toRecord(details) });
  }
}

export type ExecutionErrorKind =
  | 'relay_unreachable'
  | 'auth_rejected'
  | 'connection_dropped'
  | 'timeout'
  | 'nonzero_exit'
  | 'launch_failed';

export const EXECUTION_ERROR_KINDS: readonly ExecutionErrorKind[] = [
  'relay_unreachable',
  'auth_rejected',
  'connection_dropped',
  'timeout',
  'nonzero_exit',
  'launch_failed',
];

export interface ExecutionOutput {
  exitStatus: number | null;
  stdoutTail: string;
  stderrTail: string;
  durationMs: number;
}

/**
 * A single remote attempt failed. Recovered by the retry policy.
 */
export class ExecutionError extends AppError {
  constructor(
    message: string,
    public readonly kind: ExecutionErrorKind,
    public readonly output?: ExecutionOutput
  ) {
    super(message, 'EXECUTION_ERROR', { kind, exitStatus: output?.exitStatus ?? null });
  }
}

/**
 * Operator aborted the run while the attempt was in flight or queued
 */
export class InterruptedError extends AppError {
  constructor(message = 'Interrupted by operator') {
    super(message, 'INTERRUPTED');
  }
}

/**
 * Writing a log or the summary failed. Reported, never rethrown.
 */
export class AggregationError extends AppError {
  constructor(message: string, details?: unknown) {
    super(message, 'AGGREGATION_ERROR', details);
  }
}

/**
 * Type guard to check if error is an AppError
 */
export function isAppError(error: unknown): error is AppError {
  return error instanceof AppError;
}

export function isExecutionErrorKind(value: string): value is ExecutionErrorKind {
  return EXECUTION_ERROR_KINDS.some((kind) => kind === value);
}

export function formatErrorMessage(error: unknown): string {
  if (error instanceof Error && error.message.trim().length > 0) {
    return error.message;
  }
  return 'Unexpected error';
}

function toRecord(details: unknown): Record<string, unknown> {
  if (details && typeof details === 'object' && !Array.isArray(details)) {
    return { ...details };
  }
  return details === undefined ? {} : { details };
}
