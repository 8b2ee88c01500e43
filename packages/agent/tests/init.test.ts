import { afterEach, beforeEach, describe, expect, test } from 'vitest';
import {
  addDistributionValue,
  getAgent,
  incrementCounter,
  init,
  reconfigure,
  sendError,
  setGauge,
  shutdown,
} from '../src/init.js';
import { isolateEnv, MockBackend, testConfig } from './helpers/mock-backend.js';

describe('process-wide agent', () => {
  let restoreEnv: () => void;

  beforeEach(() => {
    restoreEnv = isolateEnv();
  });

  afterEach(async () => {
    await shutdown();
    restoreEnv();
  });

  test('init creates one agent per process', async () => {
    const first = await init({ config: testConfig, backend: new MockBackend() });
    const second = await init({ config: testConfig, backend: new MockBackend() });

    expect(second).toBe(first);
    expect(getAgent()).toBe(first);
  });

  test('module functions delegate to the agent', async () => {
    const backend = new MockBackend();
    await init({ config: testConfig, backend });

    setGauge('memory', 5, { region: 'eu' });
    incrementCounter('requests');
    addDistributionValue('latency', 2);
    const transaction = sendError(new Error('boom'), { stack: [] });

    expect(backend.gauges).toEqual([['memory', 5, [['region', 'eu']]]]);
    expect(backend.counters).toEqual([['requests', 1, []]]);
    expect(backend.distributions).toEqual([['latency', 2, []]]);
    expect(transaction).not.toBeNull();
  });

  test('reconfigure reaches the running agent', async () => {
    const backend = new MockBackend();
    const agent = await init({ config: testConfig, backend });

    reconfigure({ environment: 'staging' });
    await agent.lifecycle.settled();

    expect(agent.lifecycle.snapshot().config?.environment).toBe('staging');
  });

  test('module functions are no-ops without an agent', async () => {
    await shutdown();

    expect(getAgent()).toBeNull();
    expect(setGauge('memory', 1)).toBe(true);
    expect(incrementCounter('requests')).toBe(true);
    expect(addDistributionValue('latency', 1)).toBe(true);
    expect(sendError(new Error('boom'), { stack: [] })).toBeNull();
    expect(() => reconfigure()).not.toThrow();
  });

  test('shutdown stops the agent', async () => {
    const backend = new MockBackend();
    await init({ config: testConfig, backend });

    await shutdown();

    expect(getAgent()).toBeNull();
    expect(backend.stopCalls).toBe(1);
  });
});
