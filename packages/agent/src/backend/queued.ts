import type { Config } from '../config.js';
import { InMemoryQueue } from '../queue/in-memory.js';
import { decodeTags, type EncodedTags } from '../tags.js';
import type { Backend, BackendAction, ErrorSubmission } from './base.js';
import { BackendWorker } from './worker.js';

const MAX_QUEUED_ACTIONS = 10_000;

/**
 * Base for backends that batch actions through an in-memory queue.
 *
 * Subclasses only implement `deliver()`; queueing, batching and retrying of
 * failed batches are handled here.
 */
export abstract class QueuedBackend implements Backend {
  private queue: InMemoryQueue<BackendAction> | null = null;
  private worker: BackendWorker<BackendAction> | null = null;
  protected config: Readonly<Config> | null = null;

  start(config: Readonly<Config>): void {
    if (this.worker) {
      return;
    }

    this.config = config;
    const queue = new InMemoryQueue<BackendAction>(MAX_QUEUED_ACTIONS);
    this.queue = queue;
    this.worker = new BackendWorker(queue, (batch) => this.deliver(batch), {
      batchSize: config.batchSize,
      intervalMs: config.flushIntervalMs,
    });
  }

  async stop(): Promise<void> {
    const worker = this.worker;
    this.worker = null;
    this.queue = null;
    if (worker) {
      await worker.close();
    }
  }

  isLoaded(): boolean {
    return this.worker !== null;
  }

  /**
   * Wait until queued actions have been delivered, bounded by `timeoutMs`
   */
  async flush(timeoutMs = 5000): Promise<void> {
    await this.worker?.flush(timeoutMs);
  }

  setGauge(key: string, value: number, tags: EncodedTags): void {
    this.enqueue({ type: 'set_gauge', data: { key, value, tags: decodeTags(tags) } });
  }

  incrementCounter(key: string, amount: number, tags: EncodedTags): void {
    this.enqueue({
      type: 'increment_counter',
      data: { key, value: amount, tags: decodeTags(tags) },
    });
  }

  addDistributionValue(key: string, value: number, tags: EncodedTags): void {
    this.enqueue({
      type: 'add_distribution_value',
      data: { key, value, tags: decodeTags(tags) },
    });
  }

  submitError(submission: ErrorSubmission): void {
    this.enqueue({
      type: 'error',
      data: { ...submission, tags: decodeTags(submission.tags), timestamp: Date.now() },
    });
  }

  protected abstract deliver(batch: BackendAction[]): Promise<void>;

  private enqueue(action: BackendAction): void {
    if (!this.queue) {
      throw new Error(`Backend is not started; dropping ${action.type}`);
    }
    if (!this.queue.enqueue(action)) {
      throw new Error(`Backend queue is full; dropping ${action.type}`);
    }
  }
}
