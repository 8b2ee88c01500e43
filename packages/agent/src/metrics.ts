import type { Backend } from './backend/base.js';
import type { ConfigLifecycle } from './lifecycle.js';
import { encodeTags, type EncodedTags, type Tags } from './tags.js';
import { getLogger } from './utils/logging.js';

const logger = getLogger('metrics');

export type MetricValue = number | bigint;

type MetricCall = (backend: Backend, key: string, value: number, tags: EncodedTags) => void;

/**
 * Gauge, counter and distribution entry points.
 *
 * Every call returns `true`. When the agent is not active, or the value is
 * not a finite number, nothing reaches the backend.
 */
export class MetricApi {
  constructor(private readonly lifecycle: ConfigLifecycle) {}

  /**
   * Set a gauge for a measurement of some metric.
   */
  setGauge(key: string, value: MetricValue, tags: Tags = {}): true {
    return this.emit('setGauge', key, value, tags, (backend, k, v, t) => backend.setGauge(k, v, t));
  }

  /**
   * Increment a counter of some metric.
   */
  incrementCounter(key: string, amount: MetricValue = 1, tags: Tags = {}): true {
    return this.emit('incrementCounter', key, amount, tags, (backend, k, v, t) =>
      backend.incrementCounter(k, v, t)
    );
  }

  /**
   * Add a value to a distribution.
   *
   * Use this to collect multiple data points that will be merged into a graph.
   */
  addDistributionValue(key: string, value: MetricValue, tags: Tags = {}): true {
    return this.emit('addDistributionValue', key, value, tags, (backend, k, v, t) =>
      backend.addDistributionValue(k, v, t)
    );
  }

  private emit(name: string, key: string, value: MetricValue, tags: Tags, call: MetricCall): true {
    const backend = this.lifecycle.activeBackend();
    if (!backend) {
      return true;
    }

    const coerced = toFloat(value);
    if (coerced === null) {
      logger.warn(`${name}("${key}") ignored: value ${String(value)} is not a finite number`);
      return true;
    }

    try {
      call(backend, key, coerced, encodeTags(tags));
    } catch (error) {
      logger.error(`${name}("${key}") was not accepted by the backend`, error);
    }
    return true;
  }
}

/**
 * Widen a metric value to a float; null for values that cannot be sent
 */
export function toFloat(value: unknown): number | null {
  const number = typeof value === 'bigint' ? Number(value) : value;
  return typeof number === 'number' && Number.isFinite(number) ? number : null;
}
