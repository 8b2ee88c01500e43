import type { SubmissionPipeline } from '../submission.js';
import { Namespace } from '../transaction.js';

export type UncaughtExceptionListener = (
  error: unknown,
  origin: NodeJS.UncaughtExceptionOrigin
) => void;

/**
 * Listener reporting errors that are about to crash the process. Registered
 * on `uncaughtExceptionMonitor`, so Node's own crash behaviour is unchanged.
 */
export function createReportHandler(pipeline: SubmissionPipeline): UncaughtExceptionListener {
  return (error, origin) => {
    const stack = error instanceof Error && error.stack ? error.stack : [];
    pipeline.sendError(error, {
      stack,
      namespace: Namespace.BACKGROUND,
      tags: { origin },
    });
  };
}

/**
 * Register the report handler on the process
 *
 * @returns Function that removes the handler again
 */
export function addReportHandler(pipeline: SubmissionPipeline): () => void {
  const listener = createReportHandler(pipeline);
  process.on('uncaughtExceptionMonitor', listener);
  return () => {
    process.off('uncaughtExceptionMonitor', listener);
  };
}
