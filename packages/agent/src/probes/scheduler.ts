import type { ProbeRegistry } from './registry.js';

export type ProbeSchedulerOptions = {
  /** Read before every wait, so a reconfigured interval applies from the next tick */
  intervalMs: () => number;

  /** Ticks where this returns false skip the probes */
  enabled?: () => boolean;
};

/**
 * Runs every registered probe on a fixed interval.
 *
 * `run()` resolves when the scheduler is stopped, which makes it usable as a
 * supervised child.
 */
export class ProbeScheduler {
  private stopped = true;
  private wakeUp: (() => void) | null = null;

  constructor(
    private readonly registry: ProbeRegistry,
    private readonly options: ProbeSchedulerOptions
  ) {}

  async run(): Promise<void> {
    this.stopped = false;
    while (!this.stopped) {
      await this.sleep();
      if (this.stopped) {
        return;
      }
      await this.tick();
    }
  }

  /**
   * Run all probes once, unless probes are disabled
   */
  async tick(): Promise<void> {
    if (this.options.enabled && !this.options.enabled()) {
      return;
    }
    await this.registry.runAll();
  }

  stop(): void {
    this.stopped = true;
    this.wakeUp?.();
  }

  isRunning(): boolean {
    return !this.stopped;
  }

  private sleep(): Promise<void> {
    return new Promise((resolve) => {
      const timer = setTimeout(() => {
        this.wakeUp = null;
        resolve();
      }, this.options.intervalMs()).unref();
      this.wakeUp = () => {
        clearTimeout(timer);
        this.wakeUp = null;
        resolve();
      };
    });
  }
}
