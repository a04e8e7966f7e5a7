import { Command, CommanderError } from 'commander';
import chalk from 'chalk';
import dotenv from 'dotenv';
import type { RunSummary } from './domain/entities/RunSummary.js';
import { formatDestination, type Credential, type Target } from './domain/entities/Target.js';
import {
  ConfigError,
  InterruptedError,
  InventoryError,
  PreflightError,
  TemplateError,
  ValidationError,
  formatErrorMessage,
} from './domain/errors.js';
import { validateEnv, type Env } from './infra/env.js';
import { createLogger, logger, setLogger } from './infra/logger.js';
import { SshRemoteExecutor } from './infra/remote/SshRemoteExecutor.js';
import { resolveRunConfig, type RunConfig, type RunConfigOverrides } from './infra/runConfig.js';
import { CommandTemplate } from './services/CommandTemplate.js';
import { FleetOrchestrator } from './services/FleetOrchestrator.js';
import { PreflightRunner } from './services/PreflightRunner.js';
import { formatSummary } from './services/SummaryFormatter.js';
import { TargetRegistry } from './services/TargetRegistry.js';

export const EXIT_OK = 0;
export const EXIT_TARGETS_FAILED = 1;
export const EXIT_SETUP_FAILED = 2;
export const EXIT_INTERRUPTED = 130;

interface SelectionOptions {
  inventory?: string;
  inventoryFormat?: string;
  group?: string;
  relay?: string;
  only: string[];
  fromSummary?: string;
}

interface RunCommandOptions extends SelectionOptions {
  command?: string;
  var: string[];
  concurrency?: string;
  stagger?: string;
  retries?: string;
  retryDelay?: string;
  retryDelayMode?: string;
  maxRetryDelay?: string;
  giveUpOn?: string;
  timeout?: string;
  logDir?: string;
  preflight?: string;
}

interface ListCommandOptions extends SelectionOptions {
  command?: string;
  var: string[];
}

export interface CliIo {
  out: (text: string) => void;
  err: (text: string) => void;
  env?: NodeJS.ProcessEnv;
}

const collect = (value: string, previous: string[]): string[] => [...previous, value];

export function exitCodeForSummary(summary: RunSummary | null): number {
  if (!summary) {
    return EXIT_OK;
  }
  if (summary.interrupted) {
    return EXIT_INTERRUPTED;
  }
  return summary.failed > 0 ? EXIT_TARGETS_FAILED : EXIT_OK;
}

export function exitCodeForError(error: unknown): number {
  if (error instanceof CommanderError) {
    return error.exitCode === 0 ? EXIT_OK : EXIT_SETUP_FAILED;
  }
  if (error instanceof InterruptedError) {
    return EXIT_INTERRUPTED;
  }
  if (
    error instanceof ConfigError ||
    error instanceof InventoryError ||
    error instanceof TemplateError ||
    error instanceof PreflightError ||
    error instanceof ValidationError
  ) {
    return EXIT_SETUP_FAILED;
  }
  return EXIT_TARGETS_FAILED;
}

export function describeCredential(credential: Credential): string {
  switch (credential.type) {
    case 'agent':
      return 'ssh-agent';
    case 'key':
      return `key ${credential.path}`;
    case 'password':
      return 'env' in credential ? `password from $${credential.env}` : 'password (inventory)';
  }
}

function addSelectionOptions(command: Command): Command {
  return command
    .option('-i, --inventory <path>', 'inventory file (INI or JSON)')
    .option('--inventory-format <format>', 'auto | ini | json')
    .option('-g, --group <name>', 'host group read from INI inventories')
    .option('--relay <host>', 'relay host for every target, [user@]host[:port]')
    .option('--only <names>', 'comma-separated target names (repeatable)', collect, [])
    .option('--from-summary <file>', "select the failed targets of a previous run's summary");
}

function loadEnvironment(io: CliIo): Env {
  if (!io.env) {
    dotenv.config();
  }
  const env = validateEnv(io.env ?? process.env);
  setLogger(createLogger(env));
  return env;
}

function toOverrides(options: SelectionOptions & Partial<RunCommandOptions>): RunConfigOverrides {
  return {
    inventory: options.inventory,
    inventoryFormat: options.inventoryFormat,
    group: options.group,
    relay: options.relay,
    command: options.command,
    var: options.var,
    only: options.only,
    fromSummary: options.fromSummary,
    concurrency: options.concurrency,
    stagger: options.stagger,
    retries: options.retries,
    retryDelay: options.retryDelay,
    retryDelayMode: options.retryDelayMode,
    maxRetryDelay: options.maxRetryDelay,
    noRetryOn: options.giveUpOn,
    timeout: options.timeout,
    logDir: options.logDir,
    preflight: options.preflight,
  };
}

function createOrchestrator(config: RunConfig, env: NodeJS.ProcessEnv): FleetOrchestrator {
  return new FleetOrchestrator(config, {
    registry: new TargetRegistry(),
    preflight: new PreflightRunner(),
    executor: new SshRemoteExecutor({
      env,
      ssh: {
        sshBinary: config.sshBinary,
        sshpassBinary: config.sshpassBinary,
        connectTimeoutSeconds: config.sshConnectTimeoutSeconds,
      },
    }),
  });
}

async function runCommand(options: RunCommandOptions, io: CliIo): Promise<number> {
  const env = loadEnvironment(io);
  const config = resolveRunConfig(env, toOverrides(options));
  const orchestrator = createOrchestrator(config, io.env ?? process.env);

  const controller = new AbortController();
  const onSignal = (signal: NodeJS.Signals): void => {
    if (controller.signal.aborted) {
      logger.error(`Received ${signal} again, exiting without a summary`);
      process.exit(EXIT_INTERRUPTED);
    }
    logger.warn(`Received ${signal}, stopping running attempts (press Ctrl-C again to force)`);
    controller.abort();
  };
  process.on('SIGINT', onSignal);
  process.on('SIGTERM', onSignal);

  let summary: RunSummary | null;
  try {
    summary = await orchestrator.run({ signal: controller.signal });
  } finally {
    process.off('SIGINT', onSignal);
    process.off('SIGTERM', onSignal);
  }

  if (!summary) {
    io.out(chalk.yellow('No targets selected, nothing to do.'));
  } else {
    io.out(formatSummary(summary));
  }
  return exitCodeForSummary(summary);
}

async function listCommand(options: ListCommandOptions, io: CliIo): Promise<number> {
  const env = loadEnvironment(io);
  const config = resolveRunConfig(env, toOverrides(options), { requireCommand: false });
  const targets = await createOrchestrator(config, io.env ?? process.env).resolveTargets();
  const template = config.commandTemplate ? CommandTemplate.compile(config.commandTemplate) : null;

  for (const target of targets) {
    io.out(formatTargetLine(target));
    if (template) {
      io.out(`    ${chalk.dim(template.render(target, config.vars))}`);
    }
  }
  io.out(chalk.dim(`${targets.length} target(s)`));
  return EXIT_OK;
}

export function formatTargetLine(target: Target): string {
  const metadata = Object.entries(target.metadata)
    .map(([key, value]) => `${key}=${value}`)
    .join(' ');
  return [
    chalk.bold(target.name),
    formatDestination(target.destination),
    `via ${target.relay}`,
    `[${describeCredential(target.credential)}]`,
    metadata,
  ]
    .filter(Boolean)
    .join('  ');
}

export function createProgram(io: CliIo, setExitCode: (code: number) => void): Command {
  const program = new Command();

  program
    .name('labfleet')
    .description('Run a provisioning command on every lab target through its relay host')
    .version('1.0.0')
    .exitOverride()
    .configureOutput({
      writeOut: (text) => io.out(text.trimEnd()),
      writeErr: (text) => io.err(text.trimEnd()),
    });

  addSelectionOptions(
    program
      .command('run')
      .description('Provision the selected targets')
      .option('-c, --command <template>', 'remote command template with {{ placeholders }}')
      .option('--var <key=value>', 'value for {{ vars.key }} (repeatable)', collect, [])
      .option('-j, --concurrency <n>', 'maximum targets in flight')
      .option('--stagger <ms>', 'minimum spacing between launches')
      .option('-r, --retries <n>', 'retries per target after the first attempt')
      .option('--retry-delay <seconds>', 'delay before a retry')
      .option('--retry-delay-mode <mode>', 'fixed | linear')
      .option('--max-retry-delay <seconds>', 'cap on the retry delay')
      .option('--give-up-on <kinds>', 'failure kinds that are not retried, comma-separated')
      .option('-t, --timeout <seconds>', 'time limit of a single attempt')
      .option('--log-dir <dir>', 'directory for per-target logs and the run summary')
      .option('--preflight <file>', 'JSON file of local steps to run before dispatch')
  ).action(async (options: RunCommandOptions) => {
    setExitCode(await runCommand(options, io));
  });

  addSelectionOptions(
    program
      .command('list')
      .description('Show the targets a run would provision')
      .option('-c, --command <template>', 'also render the command for each target')
      .option('--var <key=value>', 'value for {{ vars.key }} (repeatable)', collect, [])
  ).action(async (options: ListCommandOptions) => {
    setExitCode(await listCommand(options, io));
  });

  return program;
}

/**
 * Parses argv, runs the selected command, and resolves with the process exit status
 */
export async function main(argv: string[], io?: CliIo): Promise<number> {
  const cliIo: CliIo = io ?? {
    out: (text) => console.log(text),
    err: (text) => console.error(text),
  };
  let exitCode = EXIT_OK;
  const program = createProgram(cliIo, (code) => {
    exitCode = code;
  });

  try {
    await program.parseAsync(argv);
    return exitCode;
  } catch (error) {
    const code = exitCodeForError(error);
    if (!(error instanceof CommanderError)) {
      cliIo.err(chalk.red(`Error: ${formatErrorMessage(error)}`));
      logger.debug('Command failed', {
        error: formatErrorMessage(error),
        stack: error instanceof Error ? error.stack : undefined,
      });
    }
    return code;
  }
}
