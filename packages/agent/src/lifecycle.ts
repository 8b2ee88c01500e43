import type { Backend } from './backend/base.js';
import { createBackend } from './backend/create-backend.js';
import { type Config, type ConfigOptions, describeConfigError, resolveConfig } from './config.js';
import { ConfigCell } from './config-cell.js';
import { configureLogging, getLogger } from './utils/logging.js';

const logger = getLogger('lifecycle');

/**
 * - `uninitialized`: `initialize()` has not run yet
 * - `disabled`: not configured as active, or stopped
 * - `pending`: configuration is valid and the backend is starting
 * - `active`: the backend reported itself loaded
 * - `failed`: invalid configuration or a backend that did not load
 */
export type LifecycleState = 'uninitialized' | 'disabled' | 'pending' | 'active' | 'failed';

export type LifecycleSnapshot = Readonly<{
  version: number;
  state: LifecycleState;
  config: Readonly<Config> | null;
}>;

export type ConfigLifecycleOptions = {
  /** Settings from code; environment variables fill in what is missing */
  config?: ConfigOptions;

  /** Backend to use for every configuration; chosen from `config.transport` when omitted */
  backend?: Backend;

  /** Factory used when no fixed backend is given */
  createBackend?: (transport: Config['transport']) => Backend;
};

export const BACKEND_UNAVAILABLE_MESSAGE =
  'Failed to start Vigil. Please run `vigil diagnose` to debug your installation.';

export const CONFIG_INVALID_MESSAGE =
  'Warning: No valid Vigil configuration found, continuing with Vigil metrics disabled.';

/**
 * Owns the configuration and the backend connection.
 *
 * Metric and error calls read the lifecycle through `snapshot()` and
 * `activeBackend()`, which never block. `reconfigure()` runs detached from the
 * caller so it can be triggered from code that is itself servicing a call.
 */
export class ConfigLifecycle {
  private readonly cell = new ConfigCell();
  private readonly fixedBackend: Backend | null;
  private readonly backendFactory: (transport: Config['transport']) => Backend;
  private options: ConfigOptions;
  private state: LifecycleState = 'uninitialized';
  private backend: Backend | null;
  private backendTransport: Config['transport'] | null = null;
  private backendStarted = false;
  private reloadChain: Promise<void> = Promise.resolve();
  private stops = 0;

  constructor(options: ConfigLifecycleOptions = {}) {
    this.options = { ...options.config };
    this.fixedBackend = options.backend ?? null;
    this.backend = this.fixedBackend;
    this.backendFactory = options.createBackend ?? createBackend;
  }

  /**
   * Validate configuration and start the backend.
   *
   * Never throws: invalid configuration and backends that fail to load are
   * logged and leave the agent in a no-op state.
   *
   * @param overrides - Settings merged over the ones given at construction; kept for later reloads
   */
  async initialize(overrides?: ConfigOptions): Promise<LifecycleState> {
    if (overrides) {
      this.options = { ...this.options, ...overrides };
    }

    try {
      await this.applyConfiguration();
    } catch (error) {
      logger.error('Unexpected error while initializing', error);
      this.transition('failed', this.cell.read().config);
    }
    return this.state;
  }

  /**
   * Reload configuration and restart the backend without blocking the caller.
   *
   * The reload runs on a later turn of the event loop; concurrent calls are
   * applied in order. Use `settled()` to wait for them. A reload scheduled
   * before `stop()` is skipped.
   */
  reconfigure(overrides?: ConfigOptions): void {
    logger.debug('Reconfigure scheduled');
    const stops = this.stops;
    this.reloadChain = this.reloadChain
      .then(() => new Promise<void>((resolve) => setImmediate(resolve)))
      .then(async () => {
        if (stops !== this.stops) {
          logger.debug('Reconfigure skipped: stopped since it was scheduled');
          return;
        }
        await this.initialize(overrides);
      })
      .catch((error: unknown) => {
        logger.error('Reconfigure failed', error);
      });
  }

  /**
   * Resolves once every scheduled reconfigure has finished
   */
  settled(): Promise<void> {
    return this.reloadChain;
  }

  /**
   * Tear down the backend connection. Safe to call repeatedly.
   *
   * Waits for a reload already in progress; reloads still queued are dropped.
   */
  async stop(): Promise<void> {
    this.stops += 1;
    await this.reloadChain;
    await this.stopBackend();
    this.transition('disabled', null);
  }

  snapshot(): LifecycleSnapshot {
    const { version, config } = this.cell.read();
    return { version, state: this.state, config };
  }

  getState(): LifecycleState {
    return this.state;
  }

  isActive(): boolean {
    return this.state === 'active' && this.backend !== null && this.backend.isLoaded();
  }

  /**
   * The backend when metric and error calls may use it, otherwise null
   */
  activeBackend(): Backend | null {
    return this.isActive() ? this.backend : null;
  }

  private async applyConfiguration(): Promise<void> {
    // A running backend keeps the settings it was started with
    await this.stopBackend();
    const resolution = resolveConfig(this.options);

    if (!resolution.active) {
      logger.info('Vigil disabled.');
      this.transition('disabled', null);
      return;
    }

    if (!resolution.result.success) {
      logger.warn(CONFIG_INVALID_MESSAGE);
      for (const issue of describeConfigError(resolution.result.error)) {
        logger.warn(`  ${issue}`);
      }
      this.transition('failed', null);
      return;
    }

    const config = resolution.result.config;
    configureLogging(config.logLevel);
    logger.debug('Vigil starting.');

    const backend = this.backendFor(config);
    this.transition('pending', config);
    const published = this.cell.read().config ?? config;

    this.backendStarted = true;
    try {
      await backend.start(published);
    } catch (error) {
      logger.error('Backend start threw', error);
    }

    if (backend.isLoaded()) {
      logger.debug('Vigil started.');
      this.transition('active', published);
    } else {
      logger.error(BACKEND_UNAVAILABLE_MESSAGE);
      this.transition('failed', published);
    }
  }

  private backendFor(config: Config): Backend {
    if (this.fixedBackend) {
      return this.fixedBackend;
    }

    if (this.backend && this.backendTransport === config.transport) {
      return this.backend;
    }

    const backend = this.backendFactory(config.transport);
    this.backend = backend;
    this.backendTransport = config.transport;
    return backend;
  }

  private async stopBackend(): Promise<void> {
    if (!this.backend || !this.backendStarted) {
      return;
    }

    this.backendStarted = false;
    try {
      await this.backend.stop();
    } catch (error) {
      logger.error('Backend stop threw', error);
    }
  }

  private transition(state: LifecycleState, config: Readonly<Config> | null): void {
    if (config !== this.cell.read().config) {
      this.cell.swap(config);
    }
    this.state = state;
  }
}
