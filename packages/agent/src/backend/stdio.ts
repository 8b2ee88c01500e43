import type { Writable } from 'node:stream';
import { serializeValue } from '../utils/serialization.js';
import type { BackendAction } from './base.js';
import { QueuedBackend } from './queued.js';

/**
 * Writes every action as newline-delimited JSON, by default to stdout.
 *
 * Useful for local development and for piping agent output into other tools.
 *
 * @example
 * ```typescript
 * const agent = new Agent({ backend: new StdioBackend() });
 * ```
 */
export class StdioBackend extends QueuedBackend {
  private writeLock: Promise<void> = Promise.resolve();

  constructor(private readonly output: Writable = process.stdout) {
    super();
  }

  protected async deliver(batch: BackendAction[]): Promise<void> {
    const config = this.config;
    const lines = batch.map((action) =>
      JSON.stringify(
        serializeValue(
          {
            app: config?.name ?? null,
            environment: config?.environment ?? null,
            hostname: config?.hostname ?? null,
            ...action,
          },
          { maxLength: null }
        )
      )
    );

    // Queue write to maintain ordering; a failed write is reported to this
    // batch only and does not block later ones.
    const write = this.writeLock.then(() => this.write(`${lines.join('\n')}\n`));
    this.writeLock = write.catch(() => undefined);
    await write;
  }

  private write(chunk: string): Promise<void> {
    return new Promise((resolve, reject) => {
      this.output.write(chunk, (error) => {
        if (error) {
          reject(error);
          return;
        }
        resolve();
      });
    });
  }
}
