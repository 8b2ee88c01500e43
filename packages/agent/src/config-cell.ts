import type { Config } from './config.js';

export type ConfigSnapshot = Readonly<{
  version: number;
  config: Readonly<Config> | null;
}>;

/**
 * Versioned holder for the process-wide configuration.
 *
 * Readers always get a complete frozen snapshot; a reconfigure replaces the
 * whole snapshot in one assignment and never edits the previous one.
 */
export class ConfigCell {
  private current: ConfigSnapshot = Object.freeze({ version: 0, config: null });

  read(): ConfigSnapshot {
    return this.current;
  }

  swap(config: Config | null): ConfigSnapshot {
    const next = Object.freeze({
      version: this.current.version + 1,
      config: config ? freezeConfig(config) : null,
    });
    this.current = next;
    return next;
  }
}

function freezeConfig(config: Config): Readonly<Config> {
  return Object.freeze({
    ...config,
    ignoreErrors: [...config.ignoreErrors],
    ignoreNamespaces: [...config.ignoreNamespaces],
    filterParameters: [...config.filterParameters],
    retryOnStatusCodes: [...config.retryOnStatusCodes],
  });
}
