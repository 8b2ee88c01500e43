import type { Config } from '../config.js';
import { getLogger } from '../utils/logging.js';
import type { BackendAction } from './base.js';
import {
  type BatchPayload,
  CollectorClient,
  type CollectorClientDependencies,
  SubmissionFailedError,
} from './http/collector-client.js';
import { QueuedBackend } from './queued.js';

const logger = getLogger('http');

/**
 * Posts batches of actions to the collector endpoint.
 *
 * Transient failures are retried inside `CollectorClient`; a batch that still
 * fails is handed back to the worker and retried on its next interval. A batch
 * the collector rejects is dropped.
 */
export class HttpBackend extends QueuedBackend {
  private client: CollectorClient | null = null;

  constructor(private readonly dependencies: CollectorClientDependencies = {}) {
    super();
  }

  override start(config: Readonly<Config>): void {
    if (this.isLoaded()) {
      return;
    }
    this.client = new CollectorClient(config, this.dependencies);
    super.start(config);
  }

  protected async deliver(batch: BackendAction[]): Promise<void> {
    const config = this.config;
    if (!this.client || !config) {
      throw new Error('HttpBackend used before start()');
    }

    const payload: BatchPayload = {
      app: config.name ?? null,
      environment: config.environment,
      hostname: config.hostname,
      revision: config.revision ?? null,
      actions: batch,
    };

    try {
      const receipt = await this.client.submitBatch(payload);
      logger.debug(`Delivered ${batch.length} action(s) in ${receipt.attempts} attempt(s)`);
    } catch (error) {
      if (error instanceof SubmissionFailedError && error.reason === 'rejected') {
        logger.error(
          `Collector rejected a batch of ${error.actionCount} action(s); dropping it`,
          error.message
        );
        return;
      }
      throw error;
    }
  }
}
