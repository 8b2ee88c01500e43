import type { Queue } from '../queue/base.js';
import { getLogger } from '../utils/logging.js';

const logger = getLogger('worker');

type WorkerConfig = { batchSize: number; intervalMs: number };

export type BatchHandler<T> = (batch: T[]) => Promise<void>;

/**
 * Drains a queue in batches. A batch whose delivery fails is kept and retried
 * on the next interval; items are only dropped when `close()` times out.
 */
export class BackendWorker<T> {
  private closed = false;
  private abandoned = false;
  private inFlightPromise: Promise<void> | null = null;
  private loopPromise: Promise<void>;
  private pendingBatch: T[] | null = null;
  private wakeUp: (() => void) | null = null;

  constructor(
    private queue: Queue<T>,
    private handler: BatchHandler<T>,
    private config: WorkerConfig
  ) {
    this.loopPromise = this.run();
  }

  private async run(): Promise<void> {
    while (!this.abandoned && (!this.closed || this.pendingBatch || this.queue.size() > 0)) {
      const batch = this.pendingBatch ?? this.queue.dequeueBatch(this.config.batchSize);
      if (batch.length === 0) {
        await this.sleep();
        continue;
      }

      try {
        const inFlight = this.handler(batch);
        this.inFlightPromise = inFlight;
        await inFlight;
        this.pendingBatch = null;
      } catch (error) {
        this.pendingBatch = batch;
        logger.error('Batch delivery failed, retrying on next interval', error);
        await this.sleep();
      } finally {
        this.inFlightPromise = null;
      }
    }
  }

  private sleep(): Promise<void> {
    return new Promise((resolve) => {
      // must not hold the host process open
      const timer = setTimeout(() => {
        this.wakeUp = null;
        resolve();
      }, this.config.intervalMs).unref();
      this.wakeUp = () => {
        clearTimeout(timer);
        this.wakeUp = null;
        resolve();
      };
    });
  }

  async flush(timeoutMs: number): Promise<void> {
    const start = Date.now();
    while (
      (this.queue.size() > 0 || this.pendingBatch || this.inFlightPromise) &&
      Date.now() - start < timeoutMs
    ) {
      await new Promise((resolve) => setTimeout(resolve, Math.min(this.config.intervalMs, 10)));
    }
  }

  /**
   * Stop accepting new work, drain what is queued and wait for the loop to
   * exit, bounded by `timeoutMs`.
   */
  async close(timeoutMs = this.config.intervalMs * 50): Promise<void> {
    this.closed = true;
    this.wakeUp?.();

    let timeoutId: ReturnType<typeof setTimeout> | undefined;
    const timeoutPromise = new Promise<false>((resolve) => {
      timeoutId = setTimeout(() => resolve(false), timeoutMs);
    });
    const completed = await Promise.race([this.loopPromise.then(() => true), timeoutPromise]);
    clearTimeout(timeoutId);

    if (!completed) {
      this.abandoned = true;
      this.wakeUp?.();
      logger.warn(
        `Worker close timed out with ${this.queue.size()} queued item(s); remaining items are dropped`
      );
    }
  }
}
