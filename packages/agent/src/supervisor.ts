import { getLogger } from './utils/logging.js';

const logger = getLogger('supervisor');

const DEFAULT_MAX_RESTARTS = 3;
const DEFAULT_PERIOD_MS = 5000;

/**
 * - `permanent`: always restarted, whether it crashed or returned
 * - `transient`: restarted only after a crash
 * - `temporary`: never restarted
 */
export type RestartPolicy = 'permanent' | 'transient' | 'temporary';

export interface ChildSpec {
  id: string;
  restart: RestartPolicy;

  /** Runs the child; resolves when it exits normally and rejects when it crashes */
  start(): Promise<void>;

  /** Asks a running child to exit */
  stop(): void | Promise<void>;
}

export interface SupervisorOptions {
  /** Restarts allowed per child within `periodMs` before the child is abandoned */
  maxRestarts?: number;
  periodMs?: number;
}

/**
 * One-for-one supervisor: a crashing child is restarted on its own without
 * touching its siblings.
 */
export class Supervisor {
  private readonly children = new Map<string, ChildSpec>();
  private readonly loops = new Map<string, Promise<void>>();
  private readonly maxRestarts: number;
  private readonly periodMs: number;
  private running = false;

  constructor(options: SupervisorOptions = {}) {
    this.maxRestarts = Math.max(options.maxRestarts ?? DEFAULT_MAX_RESTARTS, 0);
    this.periodMs = Math.max(options.periodMs ?? DEFAULT_PERIOD_MS, 0);
  }

  /**
   * Add a child; it starts immediately when the supervisor is running
   */
  add(spec: ChildSpec): void {
    if (this.children.has(spec.id)) {
      throw new Error(`Supervisor already has a child named "${spec.id}"`);
    }

    this.children.set(spec.id, spec);
    if (this.running) {
      this.launch(spec);
    }
  }

  start(): void {
    if (this.running) {
      return;
    }

    this.running = true;
    for (const spec of this.children.values()) {
      this.launch(spec);
    }
  }

  async stop(): Promise<void> {
    if (!this.running) {
      return;
    }

    this.running = false;
    for (const spec of this.children.values()) {
      try {
        await spec.stop();
      } catch (error) {
        logger.error(`Child "${spec.id}" failed to stop`, error);
      }
    }
    await Promise.all(this.loops.values());
    this.loops.clear();
  }

  isRunning(id: string): boolean {
    return this.loops.has(id);
  }

  private launch(spec: ChildSpec): void {
    if (this.loops.has(spec.id)) {
      return;
    }

    const loop = this.supervise(spec).finally(() => {
      if (this.loops.get(spec.id) === loop) {
        this.loops.delete(spec.id);
      }
    });
    this.loops.set(spec.id, loop);
  }

  private async supervise(spec: ChildSpec): Promise<void> {
    const restarts: number[] = [];

    while (this.running) {
      let crashed = false;
      try {
        await spec.start();
      } catch (error) {
        crashed = true;
        logger.error(`Child "${spec.id}" crashed`, error);
      }

      const restart =
        spec.restart === 'permanent' || (spec.restart === 'transient' && crashed);
      if (!this.running || !restart) {
        return;
      }

      const now = Date.now();
      restarts.push(now);
      while (restarts.length > 0 && now - restarts[0] > this.periodMs) {
        restarts.shift();
      }
      if (restarts.length > this.maxRestarts) {
        logger.error(
          `Child "${spec.id}" exceeded ${this.maxRestarts} restarts in ${this.periodMs}ms; giving up`
        );
        return;
      }

      logger.warn(`Restarting child "${spec.id}"`);
    }
  }
}
