import { performance, type EventLoopUtilization } from 'node:perf_hooks';
import type { MetricApi } from '../metrics.js';

export const RUNTIME_PROBE_NAME = 'runtime';

/**
 * Default probe reporting memory, event loop utilization and uptime of the
 * Node.js process.
 */
export function createRuntimeProbe(metrics: MetricApi, hostname: () => string): () => void {
  let lastUtilization: EventLoopUtilization | undefined;

  return () => {
    const host = hostname();
    const memory = process.memoryUsage();
    const memoryByType: Array<[string, number]> = [
      ['rss', memory.rss],
      ['heap_total', memory.heapTotal],
      ['heap_used', memory.heapUsed],
      ['external', memory.external],
    ];
    for (const [type, bytes] of memoryByType) {
      metrics.setGauge('nodejs_memory_bytes', bytes, { type, hostname: host });
    }

    const utilization = performance.eventLoopUtilization(lastUtilization);
    lastUtilization = performance.eventLoopUtilization();
    metrics.setGauge('nodejs_event_loop_utilization', utilization.utilization, { hostname: host });

    metrics.setGauge('nodejs_uptime_seconds', process.uptime(), { hostname: host });
  };
}
