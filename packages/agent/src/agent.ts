import { hostname } from 'node:os';
import type { Config, ConfigOptions } from './config.js';
import type { FrameworkIntegration } from './integrations/base.js';
import { addReportHandler } from './integrations/report-handler.js';
import { ConfigLifecycle, type ConfigLifecycleOptions, type LifecycleState } from './lifecycle.js';
import { MetricApi, type MetricValue } from './metrics.js';
import { ProbeRegistry } from './probes/registry.js';
import { createRuntimeProbe, RUNTIME_PROBE_NAME } from './probes/runtime-probe.js';
import { ProbeScheduler } from './probes/scheduler.js';
import { type SendErrorOptions, SubmissionPipeline } from './submission.js';
import { Supervisor, type SupervisorOptions } from './supervisor.js';
import type { Tags } from './tags.js';
import type { Transaction, TransactionFactory } from './transaction.js';
import { getLogger } from './utils/logging.js';

const logger = getLogger('agent');

const DEFAULT_PROBE_INTERVAL_MS = 60000;

export type AgentOptions = ConfigLifecycleOptions & {
  transactionFactory?: TransactionFactory;

  /** Framework hooks attached once at start when their framework is present */
  integrations?: FrameworkIntegration[];

  supervisor?: SupervisorOptions;

  /** Report uncaught exceptions before the process exits (default: true) */
  reportUncaughtExceptions?: boolean;
};

/**
 * The agent embedded in a host application.
 *
 * @example
 * ```typescript
 * const agent = new Agent({ config: { name: 'checkout', environment: 'production' } });
 * await agent.start();
 *
 * agent.incrementCounter('orders_placed', 1, { region: 'eu' });
 * agent.sendError(new Error('card declined'), { prefix: 'checkout', stack: [] });
 *
 * await agent.stop();
 * ```
 */
export class Agent {
  readonly lifecycle: ConfigLifecycle;
  readonly metrics: MetricApi;
  readonly errors: SubmissionPipeline;
  readonly probes = new ProbeRegistry();
  private readonly supervisor: Supervisor;
  private readonly scheduler: ProbeScheduler;
  private readonly integrations: FrameworkIntegration[];
  private readonly attachedIntegrations = new Set<string>();
  private readonly reportUncaughtExceptions: boolean;
  private removeReportHandler: (() => void) | null = null;
  private started = false;

  constructor(options: AgentOptions = {}) {
    this.lifecycle = new ConfigLifecycle(options);
    this.metrics = new MetricApi(this.lifecycle);
    this.errors = new SubmissionPipeline(this.lifecycle, options.transactionFactory);
    this.integrations = options.integrations ?? [];
    this.reportUncaughtExceptions = options.reportUncaughtExceptions ?? true;

    this.scheduler = new ProbeScheduler(this.probes, {
      intervalMs: () => this.config()?.probeIntervalMs ?? DEFAULT_PROBE_INTERVAL_MS,
      enabled: () => this.config()?.enableMinutelyProbes ?? false,
    });
    this.supervisor = new Supervisor(options.supervisor);
    this.supervisor.add({
      id: 'probes',
      restart: 'permanent',
      start: () => this.scheduler.run(),
      stop: () => this.scheduler.stop(),
    });
  }

  /**
   * Initialize configuration and the backend, then start the supervised
   * workers. Resolves with the lifecycle state; never rejects.
   */
  async start(): Promise<LifecycleState> {
    if (this.started) {
      return this.lifecycle.getState();
    }
    this.started = true;

    const state = await this.lifecycle.initialize();

    if (this.reportUncaughtExceptions) {
      this.removeReportHandler = addReportHandler(this.errors);
    }
    this.attachIntegrations();
    this.supervisor.start();
    this.addDefaultProbes();

    return state;
  }

  async stop(): Promise<void> {
    logger.debug('Vigil stopping.');
    this.removeReportHandler?.();
    this.removeReportHandler = null;
    await this.supervisor.stop();
    await this.lifecycle.stop();
    this.started = false;
  }

  /**
   * Reload configuration and restart the backend in the background.
   *
   * Returns immediately; safe to call from a config-change callback.
   */
  reconfigure(overrides?: ConfigOptions): void {
    this.lifecycle.reconfigure(overrides);
  }

  setGauge(key: string, value: MetricValue, tags?: Tags): true {
    return this.metrics.setGauge(key, value, tags);
  }

  incrementCounter(key: string, amount?: MetricValue, tags?: Tags): true {
    return this.metrics.incrementCounter(key, amount, tags);
  }

  addDistributionValue(key: string, value: MetricValue, tags?: Tags): true {
    return this.metrics.addDistributionValue(key, value, tags);
  }

  sendError(error: unknown, options?: SendErrorOptions): Transaction | null {
    return this.errors.sendError(error, options);
  }

  private attachIntegrations(): void {
    for (const integration of this.integrations) {
      if (this.attachedIntegrations.has(integration.name)) {
        continue;
      }

      try {
        if (!integration.isPresent()) {
          continue;
        }
        integration.attach(this);
        this.attachedIntegrations.add(integration.name);
        logger.debug(`Attached ${integration.name} integration`);
      } catch (error) {
        logger.error(`Failed to attach ${integration.name} integration`, error);
      }
    }
  }

  private addDefaultProbes(): void {
    if (this.probes.has(RUNTIME_PROBE_NAME)) {
      return;
    }
    this.probes.register(
      RUNTIME_PROBE_NAME,
      createRuntimeProbe(this.metrics, () => this.config()?.hostname ?? hostname())
    );
  }

  private config(): Readonly<Config> | null {
    return this.lifecycle.snapshot().config;
  }
}
