import { afterEach, beforeEach, describe, expect, test, vi } from 'vitest';
import { Agent } from '../src/agent.js';
import type { FrameworkIntegration } from '../src/integrations/base.js';
import { RUNTIME_PROBE_NAME } from '../src/probes/runtime-probe.js';
import { isolateEnv, MockBackend, testConfig, waitFor } from './helpers/mock-backend.js';

describe('Agent', () => {
  let restoreEnv: () => void;

  beforeEach(() => {
    restoreEnv = isolateEnv();
  });

  afterEach(() => {
    restoreEnv();
  });

  test('starts the backend and registers the runtime probe', async () => {
    const backend = new MockBackend();
    const agent = new Agent({ config: testConfig, backend });

    expect(await agent.start()).toBe('active');
    expect(await agent.start()).toBe('active');

    expect(backend.startCalls).toHaveLength(1);
    expect(agent.probes.has(RUNTIME_PROBE_NAME)).toBe(true);

    await agent.stop();
  });

  test('forwards metrics and errors to the backend', async () => {
    const backend = new MockBackend();
    const agent = new Agent({ config: testConfig, backend });
    await agent.start();

    agent.setGauge('memory', 5);
    agent.incrementCounter('requests');
    agent.addDistributionValue('latency', 1.5);
    const transaction = agent.sendError(new Error('boom'), { prefix: 'job', stack: [] });

    expect(backend.gauges).toEqual([['memory', 5, []]]);
    expect(backend.counters).toEqual([['requests', 1, []]]);
    expect(backend.distributions).toEqual([['latency', 1.5, []]]);
    expect(backend.errors[0]?.message).toBe('job: boom');
    expect(backend.errors[0]?.transaction.id).toBe(transaction?.id);

    await agent.stop();
  });

  test('stop tears down the backend and the report handler', async () => {
    const listenersBefore = process.listenerCount('uncaughtExceptionMonitor');
    const backend = new MockBackend();
    const agent = new Agent({ config: testConfig, backend });

    await agent.start();
    expect(process.listenerCount('uncaughtExceptionMonitor')).toBe(listenersBefore + 1);

    await agent.stop();

    expect(process.listenerCount('uncaughtExceptionMonitor')).toBe(listenersBefore);
    expect(backend.stopCalls).toBe(1);
    expect(agent.lifecycle.getState()).toBe('disabled');
    expect(agent.setGauge('memory', 1)).toBe(true);
    expect(backend.gauges).toEqual([]);
  });

  test('skips the report handler when disabled', async () => {
    const listenersBefore = process.listenerCount('uncaughtExceptionMonitor');
    const agent = new Agent({
      config: testConfig,
      backend: new MockBackend(),
      reportUncaughtExceptions: false,
    });

    await agent.start();

    expect(process.listenerCount('uncaughtExceptionMonitor')).toBe(listenersBefore);
    await agent.stop();
  });

  test('stop wins over a reconfigure that has not run yet', async () => {
    const backend = new MockBackend();
    const agent = new Agent({ config: testConfig, backend });
    await agent.start();

    agent.reconfigure({ environment: 'staging' });
    await agent.stop();
    await agent.lifecycle.settled();

    expect(agent.lifecycle.getState()).toBe('disabled');
    expect(backend.isLoaded()).toBe(false);
    expect(backend.startCalls).toHaveLength(1);
  });

  test('reconfigure restarts the backend in the background', async () => {
    const backend = new MockBackend();
    const agent = new Agent({ config: testConfig, backend });
    await agent.start();

    agent.reconfigure({ environment: 'staging' });
    expect(backend.stopCalls).toBe(0);

    await agent.lifecycle.settled();

    expect(backend.startCalls.map((config) => config.environment)).toEqual([
      'development',
      'staging',
    ]);
    await agent.stop();
  });

  test('attaches present integrations once', async () => {
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
    const attached: string[] = [];
    const integration = (name: string, present: boolean): FrameworkIntegration => ({
      name,
      isPresent: () => present,
      attach: (agent) => {
        expect(agent).toBeInstanceOf(Agent);
        attached.push(name);
      },
    });
    const agent = new Agent({
      config: testConfig,
      backend: new MockBackend(),
      integrations: [
        integration('http', true),
        integration('queue', false),
        {
          name: 'broken',
          isPresent: () => true,
          attach: () => {
            throw new Error('hook failed');
          },
        },
      ],
    });

    await agent.start();
    await agent.stop();
    await agent.start();

    expect(attached).toEqual(['http']);
    expect(errorSpy).toHaveBeenCalledTimes(2);

    await agent.stop();
  });

  test('runs probes on the configured interval while enabled', async () => {
    const agent = new Agent({
      config: { ...testConfig, enableMinutelyProbes: true, probeIntervalMs: 1 },
      backend: new MockBackend(),
    });
    let runs = 0;
    agent.probes.register('custom', () => {
      runs += 1;
    });

    await agent.start();
    await waitFor(() => runs >= 2);
    await agent.stop();

    const runsAfterStop = runs;
    await new Promise((resolve) => setTimeout(resolve, 10));
    expect(runs).toBe(runsAfterStop);
  });

  test('does not run probes while they are disabled', async () => {
    const agent = new Agent({
      config: { ...testConfig, enableMinutelyProbes: false, probeIntervalMs: 1 },
      backend: new MockBackend(),
    });
    let runs = 0;
    agent.probes.register('custom', () => {
      runs += 1;
    });

    await agent.start();
    await new Promise((resolve) => setTimeout(resolve, 20));
    await agent.stop();

    expect(runs).toBe(0);
  });
});
