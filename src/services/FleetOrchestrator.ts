import type { RunSummary } from '../domain/entities/RunSummary.js';
import type { Target } from '../domain/entities/Target.js';
import type { JobEvent } from '../domain/entities/JobEvent.js';
import { logger } from '../infra/logger.js';
import type { RemoteExecutor } from '../infra/remote/RemoteExecutor.js';
import type { RunConfig } from '../infra/runConfig.js';
import { CommandTemplate } from './CommandTemplate.js';
import { JobEventBus } from './JobEventBus.js';
import { JobScheduler, type ScheduledTarget } from './JobScheduler.js';
import { JobService } from './JobService.js';
import type { PreflightRunner } from './PreflightRunner.js';
import { RetryPolicy } from './RetryPolicy.js';
import { RunReporter } from './RunReporter.js';
import type { TargetRegistry } from './TargetRegistry.js';

export interface FleetOrchestratorDeps {
  registry: TargetRegistry;
  executor: RemoteExecutor;
  preflight: PreflightRunner;
  createReporter?: (logDirectory: string) => RunReporter;
}

/**
 * FleetOrchestrator - wires one run together
 * Inventory and template errors surface before any job exists; per-target failures only in the summary.
 */
export class FleetOrchestrator {
  private readonly createReporter: (logDirectory: string) => RunReporter;

  constructor(
    private config: RunConfig,
    private deps: FleetOrchestratorDeps
  ) {
    this.createReporter =
      deps.createReporter ?? ((logDirectory) => new RunReporter({ logDirectory }));
  }

  /**
   * Loads the inventory and narrows it to --only and --from-summary selections
   */
  async resolveTargets(): Promise<Target[]> {
    const { registry } = this.deps;
    const inventory = await registry.load({
      path: this.config.inventoryPath,
      format: this.config.inventoryFormat,
      group: this.config.inventoryGroup,
      relay: this.config.relay,
    });
    const selected = registry.select(inventory, this.config.only);
    if (!this.config.fromSummary) {
      return selected;
    }

    const failed = new Set(await registry.readFailedTargets(this.config.fromSummary));
    const known = new Set(inventory.map((target) => target.name));
    const missing = [...failed].filter((name) => !known.has(name));
    if (missing.length > 0) {
      logger.warn('Failed targets from the previous run are no longer in the inventory', {
        missing,
      });
    }
    return selected.filter((target) => failed.has(target.name));
  }

  /**
   * Executes the run. Resolves with null when nothing is selected.
   */
  async run(options: { signal?: AbortSignal } = {}): Promise<RunSummary | null> {
    const { signal } = options;
    const targets = await this.resolveTargets();
    if (targets.length === 0) {
      logger.warn('No targets selected, nothing to do');
      return null;
    }

    const template = CommandTemplate.compile(this.config.commandTemplate);
    const rendered: ScheduledTarget[] = targets.map((target) => ({
      target,
      command: template.render(target, this.config.vars),
    }));
    const steps = this.config.preflightFile
      ? await this.deps.preflight.loadSteps(this.config.preflightFile)
      : [];

    const reporter = this.createReporter(this.config.logDirectory);
    await reporter.open(targets);

    const eventBus = new JobEventBus();
    const onJob = (event: JobEvent): void => reporter.onEvent(event);
    eventBus.onJob(onJob);

    try {
      if (steps.length > 0) {
        await this.deps.preflight.run(
          steps,
          (step) => reporter.auxiliaryLog(`preflight-${step.name}`),
          signal
        );
      }

      const retryPolicy = new RetryPolicy(this.config);
      const scheduler = new JobScheduler(
        {
          jobService: new JobService(eventBus, retryPolicy.maxAttempts),
          executor: this.deps.executor,
          retryPolicy,
          outputFor: (target) => reporter.targetLog(target.name),
        },
        {
          concurrency: this.config.concurrency,
          dispatchStaggerMs: this.config.dispatchStaggerMs,
          attemptTimeoutMs: this.config.attemptTimeoutMs,
        }
      );

      logger.info('Dispatching targets', {
        targets: targets.length,
        concurrency: this.config.concurrency,
        maxAttempts: retryPolicy.maxAttempts,
      });
      await scheduler.run(
        rendered.map((entry) => ({ ...entry, logFile: reporter.targetLogPath(entry.target.name) })),
        signal
      );
    } catch (error) {
      await reporter.close();
      throw error;
    } finally {
      eventBus.offJob(onJob);
    }

    return reporter.finalize({ interrupted: signal?.aborted ?? false });
  }
}
