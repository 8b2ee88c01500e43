import type { Backend, ErrorSubmission } from '../../src/backend/base.js';
import type { Config, ConfigOptions } from '../../src/config.js';
import type { EncodedTags } from '../../src/tags.js';

export type MetricCall = [key: string, value: number, tags: EncodedTags];

export const testConfig: ConfigOptions = {
  active: true,
  pushApiKey: 'test-secret',
  name: 'test-app',
  hostname: 'test-host',
  enableMinutelyProbes: false,
};

export class MockBackend implements Backend {
  loadOnStart = true;
  startError: Error | null = null;
  throwOnCall: Error | null = null;
  startCalls: Readonly<Config>[] = [];
  stopCalls = 0;
  gauges: MetricCall[] = [];
  counters: MetricCall[] = [];
  distributions: MetricCall[] = [];
  errors: ErrorSubmission[] = [];
  private loaded = false;

  start(config: Readonly<Config>): void {
    this.startCalls.push(config);
    if (this.startError) {
      throw this.startError;
    }
    this.loaded = this.loadOnStart;
  }

  stop(): void {
    this.stopCalls += 1;
    this.loaded = false;
  }

  isLoaded(): boolean {
    return this.loaded;
  }

  setGauge(key: string, value: number, tags: EncodedTags): void {
    this.check();
    this.gauges.push([key, value, tags]);
  }

  incrementCounter(key: string, amount: number, tags: EncodedTags): void {
    this.check();
    this.counters.push([key, amount, tags]);
  }

  addDistributionValue(key: string, value: number, tags: EncodedTags): void {
    this.check();
    this.distributions.push([key, value, tags]);
  }

  submitError(submission: ErrorSubmission): void {
    this.check();
    this.errors.push(submission);
  }

  private check(): void {
    if (this.throwOnCall) {
      throw this.throwOnCall;
    }
  }
}

/**
 * Remove every VIGIL_* variable and return a function that restores them
 */
export function isolateEnv(): () => void {
  const saved = new Map<string, string>();
  for (const [key, value] of Object.entries(process.env)) {
    if (key.startsWith('VIGIL_') && value !== undefined) {
      saved.set(key, value);
      delete process.env[key];
    }
  }

  return () => {
    for (const key of Object.keys(process.env)) {
      if (key.startsWith('VIGIL_')) {
        delete process.env[key];
      }
    }
    for (const [key, value] of saved) {
      process.env[key] = value;
    }
  };
}

export async function waitFor(condition: () => boolean, timeoutMs = 1000): Promise<void> {
  const start = Date.now();
  while (!condition()) {
    if (Date.now() - start > timeoutMs) {
      throw new Error('Timed out waiting for condition');
    }
    await new Promise((resolve) => setTimeout(resolve, 1));
  }
}

export type Deferred<T> = {
  promise: Promise<T>;
  resolve: (value: T | PromiseLike<T>) => void;
  reject: (reason?: unknown) => void;
};

export const createDeferred = <T>(): Deferred<T> => {
  let resolve: (value: T | PromiseLike<T>) => void = () => {};
  let reject: (reason?: unknown) => void = () => {};
  const promise = new Promise<T>((resolvePromise, rejectPromise) => {
    resolve = resolvePromise;
    reject = rejectPromise;
  });
  return { promise, resolve, reject };
};
