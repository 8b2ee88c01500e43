import { getLogger } from '../utils/logging.js';

const logger = getLogger('probes');

/**
 * A periodically invoked callback that emits metrics
 */
export type Probe = () => void | Promise<void>;

export type RegisterProbeOptions = {
  /** Replace an existing probe with the same name instead of rejecting the registration */
  replace?: boolean;
};

export type ProbeRunResult = {
  name: string;
  ok: boolean;
  error?: unknown;
};

/**
 * Named probes, unique by name.
 */
export class ProbeRegistry {
  private readonly probes = new Map<string, Probe>();

  /**
   * Register a probe under a unique name.
   *
   * @returns false when the name is taken and `replace` was not set
   */
  register(name: string, probe: Probe, options: RegisterProbeOptions = {}): boolean {
    if (this.probes.has(name) && !options.replace) {
      logger.warn(
        `A probe named "${name}" is already registered; pass { replace: true } to replace it.`
      );
      return false;
    }

    this.probes.set(name, probe);
    return true;
  }

  unregister(name: string): boolean {
    return this.probes.delete(name);
  }

  has(name: string): boolean {
    return this.probes.has(name);
  }

  names(): string[] {
    return [...this.probes.keys()];
  }

  /**
   * Run every probe once. A failing probe is logged and does not stop the others.
   */
  async runAll(): Promise<ProbeRunResult[]> {
    const entries = [...this.probes.entries()];
    return Promise.all(entries.map(([name, probe]) => this.runProbe(name, probe)));
  }

  private async runProbe(name: string, probe: Probe): Promise<ProbeRunResult> {
    try {
      await probe();
      return { name, ok: true };
    } catch (error) {
      logger.error(`Probe "${name}" failed`, error);
      return { name, ok: false, error };
    }
  }
}
