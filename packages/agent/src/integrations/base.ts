import type { Agent } from '../agent.js';

/**
 * Hook into a host framework's instrumentation events.
 *
 * `attach` is called once, when the agent starts, for every integration
 * whose framework is present.
 */
export interface FrameworkIntegration {
  name: string;
  isPresent(): boolean;
  attach(agent: Agent): void;
}
