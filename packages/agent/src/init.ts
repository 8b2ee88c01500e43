import { Agent, type AgentOptions } from './agent.js';
import type { ConfigOptions } from './config.js';
import type { MetricValue } from './metrics.js';
import type { SendErrorOptions } from './submission.js';
import type { Tags } from './tags.js';
import type { Transaction } from './transaction.js';

let agent: Agent | null = null;

/**
 * Create and start the process-wide agent. Later calls return the same agent.
 */
export async function init(options?: AgentOptions): Promise<Agent> {
  if (agent) {
    return agent;
  }

  const created = new Agent(options);
  agent = created;
  await created.start();
  return created;
}

export function getAgent(): Agent | null {
  return agent;
}

/**
 * Stop the process-wide agent and flush its backend
 */
export async function shutdown(): Promise<void> {
  const current = agent;
  agent = null;
  await current?.stop();
}

export function reconfigure(overrides?: ConfigOptions): void {
  agent?.reconfigure(overrides);
}

export function setGauge(key: string, value: MetricValue, tags?: Tags): true {
  return agent?.setGauge(key, value, tags) ?? true;
}

export function incrementCounter(key: string, amount?: MetricValue, tags?: Tags): true {
  return agent?.incrementCounter(key, amount, tags) ?? true;
}

export function addDistributionValue(key: string, value: MetricValue, tags?: Tags): true {
  return agent?.addDistributionValue(key, value, tags) ?? true;
}

/**
 * Send an error through the process-wide agent
 *
 * @example
 * ```typescript
 * sendError(error, { prefix: 'import', stack: error.stack, namespace: Namespace.BACKGROUND });
 * ```
 */
export function sendError(error: unknown, options?: SendErrorOptions): Transaction | null {
  return agent?.sendError(error, options) ?? null;
}
