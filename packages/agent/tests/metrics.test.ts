import { afterEach, beforeEach, describe, expect, test, vi } from 'vitest';
import { ConfigLifecycle } from '../src/lifecycle.js';
import { MetricApi, toFloat } from '../src/metrics.js';
import { isolateEnv, MockBackend, testConfig } from './helpers/mock-backend.js';

describe('MetricApi', () => {
  let restoreEnv: () => void;
  let backend: MockBackend;
  let lifecycle: ConfigLifecycle;
  let metrics: MetricApi;

  beforeEach(async () => {
    restoreEnv = isolateEnv();
    backend = new MockBackend();
    lifecycle = new ConfigLifecycle({ config: testConfig, backend });
    metrics = new MetricApi(lifecycle);
    await lifecycle.initialize();
  });

  afterEach(async () => {
    await lifecycle.stop();
    restoreEnv();
  });

  test('forwards integer and float values identically', () => {
    expect(metrics.setGauge('memory', 5)).toBe(true);
    expect(metrics.setGauge('memory', 5.0)).toBe(true);
    expect(metrics.setGauge('memory', 5n)).toBe(true);

    expect(backend.gauges).toEqual([
      ['memory', 5, []],
      ['memory', 5, []],
      ['memory', 5, []],
    ]);
  });

  test('encodes tags before calling the backend', () => {
    metrics.incrementCounter('requests', 2, { route: '/orders', method: 'GET', user: null });

    expect(backend.counters).toEqual([
      [
        'requests',
        2,
        [
          ['method', 'GET'],
          ['route', '/orders'],
        ],
      ],
    ]);
  });

  test('increments counters by one by default', () => {
    metrics.incrementCounter('jobs_done');

    expect(backend.counters).toEqual([['jobs_done', 1, []]]);
  });

  test('adds distribution values', () => {
    metrics.addDistributionValue('response_time', 12.5, { region: 'eu' });

    expect(backend.distributions).toEqual([['response_time', 12.5, [['region', 'eu']]]]);
  });

  test('ignores values that are not finite numbers', () => {
    const warnSpy = vi.spyOn(console, 'warn').mockImplementation(() => {});

    expect(metrics.setGauge('memory', Number.NaN)).toBe(true);

    expect(backend.gauges).toEqual([]);
    expect(warnSpy).toHaveBeenCalledWith(
      '[vigil:metrics] setGauge("memory") ignored: value NaN is not a finite number'
    );
  });

  test('absorbs backend failures', () => {
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
    backend.throwOnCall = new Error('queue full');

    expect(metrics.incrementCounter('requests')).toBe(true);
    expect(errorSpy).toHaveBeenCalledTimes(1);
  });

  test('does nothing once the lifecycle is stopped', async () => {
    await lifecycle.stop();

    expect(metrics.setGauge('memory', 1)).toBe(true);
    expect(metrics.incrementCounter('requests')).toBe(true);
    expect(backend.gauges).toEqual([]);
    expect(backend.counters).toEqual([]);
  });
});

describe('MetricApi without an active backend', () => {
  test('returns true without touching the backend', () => {
    const backend = new MockBackend();
    const metrics = new MetricApi(new ConfigLifecycle({ config: testConfig, backend }));

    expect(metrics.setGauge('memory', 1)).toBe(true);
    expect(metrics.addDistributionValue('latency', 3)).toBe(true);
    expect(backend.gauges).toEqual([]);
    expect(backend.distributions).toEqual([]);
  });
});

describe('toFloat', () => {
  test('widens numbers and bigints', () => {
    expect(toFloat(3)).toBe(3);
    expect(toFloat(2n)).toBe(2);
  });

  test('rejects values that cannot be sent', () => {
    expect(toFloat('5')).toBeNull();
    expect(toFloat(Number.POSITIVE_INFINITY)).toBeNull();
    expect(toFloat(undefined)).toBeNull();
  });
});
