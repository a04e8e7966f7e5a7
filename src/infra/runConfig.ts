import path from 'node:path';
import { z } from 'zod';
import { ConfigError, isExecutionErrorKind, type ExecutionErrorKind } from '../domain/errors.js';
import { MAX_TIMER_MS, MAX_TIMER_SECONDS, type Env } from './env.js';

export type RetryDelayMode = 'fixed' | 'linear';

export interface RunConfig {
  inventoryPath: string;
  inventoryFormat: 'auto' | 'json' | 'ini';
  inventoryGroup: string;
  relay: string | null;
  commandTemplate: string;
  vars: Record<string, string>;
  only: string[];
  fromSummary: string | null;
  concurrency: number;
  dispatchStaggerMs: number;
  maxRetries: number;
  retryDelayMs: number;
  retryDelayMode: RetryDelayMode;
  maxRetryDelayMs: number;
  nonRetryableKinds: ExecutionErrorKind[];
  attemptTimeoutMs: number;
  sshBinary: string;
  sshpassBinary: string;
  sshConnectTimeoutSeconds: number;
  logDirectory: string;
  preflightFile: string | null;
}

/**
 * Flags accepted by `labfleet run` / `labfleet list`; every field overrides its env counterpart
 */
export interface RunConfigOverrides {
  inventory?: string;
  inventoryFormat?: string;
  group?: string;
  relay?: string;
  command?: string;
  var?: string[];
  only?: string[];
  fromSummary?: string;
  concurrency?: string;
  stagger?: string;
  retries?: string;
  retryDelay?: string;
  retryDelayMode?: string;
  maxRetryDelay?: string;
  noRetryOn?: string;
  timeout?: string;
  logDir?: string;
  preflight?: string;
}

const overridesSchema = z.object({
  concurrency: z.coerce.number().int().min(1).optional(),
  stagger: z.coerce.number().int().min(0).max(MAX_TIMER_MS).optional(),
  retries: z.coerce.number().int().min(0).optional(),
  retryDelay: z.coerce.number().min(0).max(MAX_TIMER_SECONDS).optional(),
  retryDelayMode: z.enum(['fixed', 'linear']).optional(),
  maxRetryDelay: z.coerce.number().min(0).max(MAX_TIMER_SECONDS).optional(),
  timeout: z.coerce.number().int().min(1).max(MAX_TIMER_SECONDS).optional(),
  inventoryFormat: z.enum(['auto', 'json', 'ini']).optional(),
});

/**
 * Merges validated env with CLI flags into the configuration for one run
 */
export function resolveRunConfig(
  env: Env,
  overrides: RunConfigOverrides = {},
  options: { requireCommand?: boolean } = {}
): RunConfig {
  const parsed = overridesSchema.safeParse({
    concurrency: overrides.concurrency,
    stagger: overrides.stagger,
    retries: overrides.retries,
    retryDelay: overrides.retryDelay,
    retryDelayMode: overrides.retryDelayMode,
    maxRetryDelay: overrides.maxRetryDelay,
    timeout: overrides.timeout,
    inventoryFormat: overrides.inventoryFormat,
  });
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `--${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigError(`Invalid options:\n  - ${issues.join('\n  - ')}`, { issues });
  }
  const flags = parsed.data;

  const commandTemplate = overrides.command ?? env.FLEET_COMMAND_TEMPLATE ?? '';
  if ((options.requireCommand ?? true) && commandTemplate.trim().length === 0) {
    throw new ConfigError('A command template is required (--command or FLEET_COMMAND_TEMPLATE)');
  }

  return {
    inventoryPath: path.resolve(overrides.inventory ?? env.FLEET_INVENTORY),
    inventoryFormat: flags.inventoryFormat ?? 'auto',
    inventoryGroup: overrides.group ?? env.FLEET_INVENTORY_GROUP,
    relay: overrides.relay ?? env.FLEET_RELAY ?? null,
    commandTemplate,
    vars: parseVars(overrides.var ?? []),
    only: (overrides.only ?? []).flatMap(splitList),
    fromSummary: overrides.fromSummary ? path.resolve(overrides.fromSummary) : null,
    concurrency: flags.concurrency ?? env.FLEET_CONCURRENCY,
    dispatchStaggerMs: flags.stagger ?? env.FLEET_DISPATCH_STAGGER_MS,
    maxRetries: flags.retries ?? env.FLEET_MAX_RETRIES,
    retryDelayMs: Math.round((flags.retryDelay ?? env.FLEET_RETRY_DELAY_SECONDS) * 1000),
    retryDelayMode: flags.retryDelayMode ?? env.FLEET_RETRY_DELAY_MODE,
    maxRetryDelayMs: Math.round((flags.maxRetryDelay ?? env.FLEET_MAX_RETRY_DELAY_SECONDS) * 1000),
    nonRetryableKinds: parseKinds(overrides.noRetryOn ?? env.FLEET_NO_RETRY_ON ?? ''),
    attemptTimeoutMs: (flags.timeout ?? env.FLEET_ATTEMPT_TIMEOUT_SECONDS) * 1000,
    sshBinary: env.FLEET_SSH_BINARY,
    sshpassBinary: env.FLEET_SSHPASS_BINARY,
    sshConnectTimeoutSeconds: env.FLEET_SSH_CONNECT_TIMEOUT_SECONDS,
    logDirectory: path.resolve(overrides.logDir ?? env.FLEET_LOG_DIR),
    preflightFile: resolveOptionalPath(overrides.preflight ?? env.FLEET_PREFLIGHT_FILE),
  };
}

export function parseVars(entries: string[]): Record<string, string> {
  const vars: Record<string, string> = {};
  for (const entry of entries) {
    const index = entry.indexOf('=');
    const key = index > 0 ? entry.slice(0, index).trim() : '';
    if (!/^[A-Za-z_][A-Za-z0-9_]*$/.test(key)) {
      throw new ConfigError(`Invalid --var "${entry}": expected key=value`);
    }
    vars[key] = entry.slice(index + 1);
  }
  return vars;
}

function parseKinds(list: string): ExecutionErrorKind[] {
  const kinds: ExecutionErrorKind[] = [];
  for (const value of splitList(list)) {
    if (!isExecutionErrorKind(value)) {
      throw new ConfigError(`Unknown failure kind "${value}" in no-retry list`);
    }
    kinds.push(value);
  }
  return kinds;
}

function splitList(value: string): string[] {
  return value
    .split(',')
    .map((v) => v.trim())
    .filter(Boolean);
}

function resolveOptionalPath(value: string | undefined): string | null {
  return value ? path.resolve(value) : null;
}
