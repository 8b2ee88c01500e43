/**
 * In-process observability agent for Node.js applications.
 *
 * ## What this package is
 *
 * `@vigil/agent` runs inside your application. It owns a reloadable
 * configuration and backend connection, forwards ad-hoc metrics, reports
 * errors even when no transaction is in progress and runs periodic probes.
 * Nothing it does can throw into your code: failures end up in its own log.
 *
 * ## Example: process-wide agent
 *
 * ```ts
 * import { init, incrementCounter, sendError, shutdown } from '@vigil/agent';
 *
 * await init({ config: { name: 'checkout', pushApiKey: process.env.VIGIL_PUSH_API_KEY } });
 *
 * incrementCounter('orders_placed', 1, { region: 'eu' });
 *
 * try {
 *   await chargeCard(order);
 * } catch (error) {
 *   sendError(error, { prefix: 'checkout', stack: error instanceof Error ? error.stack : [] });
 * }
 *
 * await shutdown();
 * ```
 *
 * ## Example: custom backend
 *
 * ```ts
 * import { Agent, StdioBackend } from '@vigil/agent';
 *
 * const agent = new Agent({ backend: new StdioBackend(), config: { pushApiKey: 'local' } });
 * await agent.start();
 * ```
 *
 * @module @vigil/agent
 * @packageDocumentation
 */

export { Agent, type AgentOptions } from './agent.js';
// Backends
export type {
  Backend,
  BackendAction,
  ErrorPayload,
  ErrorSubmission,
  MetricSample,
} from './backend/base.js';
export { createBackend } from './backend/create-backend.js';
export { HttpBackend } from './backend/http.js';
export {
  BATCH_PATH,
  type BatchPayload,
  type BatchReceipt,
  CollectorClient,
  type CollectorClientDependencies,
  type FetchLike,
  SubmissionFailedError,
  type SubmissionFailureReason,
} from './backend/http/collector-client.js';
export { QueuedBackend } from './backend/queued.js';
export { StdioBackend } from './backend/stdio.js';
// CLI
export { createCli, runCli } from './cli/cli.js';
export { collectDiagnostics, type DiagnoseReport } from './cli/commands/diagnose.js';
// Config
export {
  type Config,
  type ConfigOptions,
  type ConfigResolution,
  ConfigSchema,
  createConfig,
  DEFAULT_ENDPOINT,
  describeConfigError,
  resolveConfig,
} from './config.js';
export { ConfigCell, type ConfigSnapshot } from './config-cell.js';
// Errors
export {
  formatBacktrace,
  parseStack,
  type RawStackFrame,
  type SourceLocation,
  type StackFrame,
  type StackInput,
} from './errors/backtrace.js';
export {
  classifyError,
  type ErrorVariant,
  GENERIC_ERROR_KIND,
  type NormalizedError,
  normalizeError,
} from './errors/normalizer.js';
export {
  addDistributionValue,
  getAgent,
  incrementCounter,
  init,
  reconfigure,
  sendError,
  setGauge,
  shutdown,
} from './init.js';
export type { FrameworkIntegration } from './integrations/base.js';
export { addReportHandler, createReportHandler } from './integrations/report-handler.js';
export {
  ConfigLifecycle,
  type ConfigLifecycleOptions,
  type LifecycleSnapshot,
  type LifecycleState,
} from './lifecycle.js';
export { MetricApi, type MetricValue } from './metrics.js';
// Probes
export { type Probe, ProbeRegistry, type RegisterProbeOptions } from './probes/registry.js';
export { createRuntimeProbe, RUNTIME_PROBE_NAME } from './probes/runtime-probe.js';
export { ProbeScheduler } from './probes/scheduler.js';
export { type SendErrorOptions, SubmissionPipeline } from './submission.js';
export { type ChildSpec, type RestartPolicy, Supervisor } from './supervisor.js';
export { decodeTags, type EncodedTags, encodeTags, type Tags, type TagValue } from './tags.js';
export {
  type CreateTransactionOptions,
  DefaultTransactionFactory,
  defineNamespace,
  Namespace,
  Transaction,
  type TransactionFactory,
  type TransactionRecord,
} from './transaction.js';
// Utilities
export { configureLogging, getLogger } from './utils/logging.js';
export { serializeValue, truncateString } from './utils/serialization.js';
