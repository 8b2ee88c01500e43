import type { Config } from '../config.js';
import type { EncodedTags, TagValue } from '../tags.js';
import type { TransactionRecord } from '../transaction.js';

/**
 * Everything an error submission hands to the backend
 */
export interface ErrorSubmission {
  transaction: TransactionRecord;
  kind: string;
  message: string;
  backtrace: string[];
  tags: EncodedTags;
  context: unknown;
}

export type MetricSample = {
  key: string;
  value: number;
  tags: Record<string, TagValue>;
};

export type ErrorPayload = Omit<ErrorSubmission, 'tags'> & {
  tags: Record<string, TagValue>;
  timestamp: number;
};

export type BackendAction =
  | { type: 'set_gauge'; data: MetricSample }
  | { type: 'increment_counter'; data: MetricSample }
  | { type: 'add_distribution_value'; data: MetricSample }
  | { type: 'error'; data: ErrorPayload };

/**
 * Transmission layer that delivers metrics and errors to a collector.
 *
 * Metric and error calls are fire-and-forget: they must return quickly and
 * may throw only to signal that the item was not accepted.
 */
export interface Backend {
  start(config: Readonly<Config>): void | Promise<void>;

  /**
   * Stop the backend and flush any pending data
   */
  stop(): void | Promise<void>;

  isLoaded(): boolean;

  setGauge(key: string, value: number, tags: EncodedTags): void;

  incrementCounter(key: string, amount: number, tags: EncodedTags): void;

  addDistributionValue(key: string, value: number, tags: EncodedTags): void;

  submitError(submission: ErrorSubmission): void;
}
