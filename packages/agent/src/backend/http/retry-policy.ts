import type { Config } from '../../config.js';

const JITTER_MIN = 0.5;

export type RetryConfig = Pick<Config, 'initialRetryDelay' | 'maxRetryDelay' | 'retryMultiplier'>;

export function shouldRetryStatusCode(
  statusCode: number,
  retryOnStatusCodes: readonly number[]
): boolean {
  return retryOnStatusCodes.includes(statusCode);
}

/**
 * Exponential backoff capped at `maxRetryDelay`, with jitter between 50% and 100%
 */
export function calculateRetryDelay(
  attempt: number,
  config: RetryConfig,
  random: () => number = Math.random
): number {
  const baseDelay = Math.min(
    config.initialRetryDelay * config.retryMultiplier ** attempt,
    config.maxRetryDelay
  );
  const jitterMultiplier = JITTER_MIN + random() * JITTER_MIN;
  return Math.round(baseDelay * jitterMultiplier);
}
