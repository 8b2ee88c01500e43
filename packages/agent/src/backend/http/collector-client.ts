import type { Config } from '../../config.js';
import { truncateString } from '../../utils/serialization.js';
import type { BackendAction } from '../base.js';
import { calculateRetryDelay, shouldRetryStatusCode } from './retry-policy.js';

export const BATCH_PATH = '/v1/batch';

const MAX_DETAIL_LENGTH = 200;

export type FetchLike = (input: string | URL | Request, init?: RequestInit) => Promise<Response>;

export type BatchPayload = {
  app: string | null;
  environment: string;
  hostname: string;
  revision: string | null;
  actions: BackendAction[];
};

export type CollectorClientConfig = Pick<
  Config,
  | 'endpoint'
  | 'pushApiKey'
  | 'requestTimeout'
  | 'maxRetries'
  | 'initialRetryDelay'
  | 'maxRetryDelay'
  | 'retryMultiplier'
  | 'retryOnStatusCodes'
>;

export type CollectorClientDependencies = {
  fetchFn?: FetchLike;
  sleep?: (delayMs: number) => Promise<void>;
  random?: () => number;
};

/**
 * - `rejected`: the collector refused the batch itself; sending it again will not help
 * - `unavailable`: the collector kept answering with a server or retryable status
 * - `unreachable`: no response was received
 */
export type SubmissionFailureReason = 'rejected' | 'unavailable' | 'unreachable';

type SubmissionFailedOptions = {
  reason: SubmissionFailureReason;
  status?: number;
  attempts: number;
  actionCount: number;
  cause?: unknown;
};

export class SubmissionFailedError extends Error {
  readonly reason: SubmissionFailureReason;
  readonly status: number | null;
  readonly attempts: number;
  readonly actionCount: number;

  constructor(message: string, options: SubmissionFailedOptions) {
    super(message, { cause: options.cause });
    this.name = 'SubmissionFailedError';
    this.reason = options.reason;
    this.status = options.status ?? null;
    this.attempts = options.attempts;
    this.actionCount = options.actionCount;
  }
}

export type BatchReceipt = {
  status: number;
  attempts: number;
};

/**
 * Submits action batches to the collector, retrying transient failures with
 * exponential backoff.
 */
export class CollectorClient {
  readonly url: string;
  private readonly fetchFn: FetchLike;
  private readonly sleep: (delayMs: number) => Promise<void>;
  private readonly random: () => number;

  constructor(
    private readonly config: CollectorClientConfig,
    dependencies: CollectorClientDependencies = {}
  ) {
    this.url = new URL(BATCH_PATH, config.endpoint).toString();
    this.fetchFn = dependencies.fetchFn ?? fetch;
    this.sleep =
      dependencies.sleep ?? ((delayMs) => new Promise((resolve) => setTimeout(resolve, delayMs)));
    this.random = dependencies.random ?? Math.random;
  }

  async submitBatch(payload: BatchPayload): Promise<BatchReceipt> {
    const body = JSON.stringify(payload);
    const actionCount = payload.actions.length;

    for (let attempt = 0; ; attempt += 1) {
      let response: Response;
      try {
        response = await this.fetchFn(this.url, {
          method: 'POST',
          headers: {
            Authorization: `Bearer ${this.config.pushApiKey}`,
            'Content-Type': 'application/json',
          },
          body,
          signal: AbortSignal.timeout(this.config.requestTimeout),
        });
      } catch (error) {
        if (attempt < this.config.maxRetries && isTransientNetworkError(error)) {
          await this.backoff(attempt);
          continue;
        }
        throw new SubmissionFailedError(`Collector unreachable at ${this.url}`, {
          reason: 'unreachable',
          attempts: attempt + 1,
          actionCount,
          cause: error,
        });
      }

      if (response.ok) {
        return { status: response.status, attempts: attempt + 1 };
      }

      const retryable = shouldRetryStatusCode(response.status, this.config.retryOnStatusCodes);
      if (retryable && attempt < this.config.maxRetries) {
        await this.backoff(attempt);
        continue;
      }

      const detail = await readDetail(response);
      throw new SubmissionFailedError(
        detail
          ? `Collector answered ${response.status}: ${detail}`
          : `Collector answered ${response.status}`,
        {
          reason: retryable || response.status >= 500 ? 'unavailable' : 'rejected',
          status: response.status,
          attempts: attempt + 1,
          actionCount,
        }
      );
    }
  }

  private backoff(attempt: number): Promise<void> {
    return this.sleep(calculateRetryDelay(attempt, this.config, this.random));
  }
}

function isTransientNetworkError(error: unknown): boolean {
  if (error instanceof TypeError) {
    return true;
  }

  return error instanceof Error && (error.name === 'AbortError' || error.name === 'TimeoutError');
}

async function readDetail(response: Response): Promise<string> {
  try {
    return truncateString((await response.text()).trim(), MAX_DETAIL_LENGTH);
  } catch {
    return '';
  }
}
