import type { Backend, ErrorSubmission } from './backend/base.js';
import type { Config } from './config.js';
import { formatBacktrace, type StackInput } from './errors/backtrace.js';
import { normalizeError, UNPRINTABLE_MESSAGE } from './errors/normalizer.js';
import type { ConfigLifecycle } from './lifecycle.js';
import { encodeTags, type Tags } from './tags.js';
import {
  DefaultTransactionFactory,
  Namespace,
  Transaction,
  type TransactionFactory,
} from './transaction.js';
import { getLogger } from './utils/logging.js';
import { serializeValue } from './utils/serialization.js';

const logger = getLogger('errors');

export const MISSING_STACK_WARNING =
  'sendError() without passing a stack trace is deprecated, and defaults to passing an empty ' +
  'stack trace. Please explicitly pass a stack trace or an empty list.';

export const MISSING_STACK_WARNING_CODE = 'VIGIL_DEP_SEND_ERROR_STACK';

/**
 * Options for `sendError`
 */
export interface SendErrorOptions {
  /** Prepended to the error message as `"<prefix>: <message>"` when non-empty */
  prefix?: string;

  /**
   * Stack of the error: `error.stack` or frames. Omitting it is deprecated and
   * sends an empty backtrace.
   */
  stack?: StackInput;

  /** Tags attached to the submission */
  tags?: Tags;

  /** Request or connection context, serialized with filtered parameters masked */
  context?: unknown;

  /**
   * Runs with the new transaction before submission. Return another
   * transaction to submit the error on that one instead.
   */
  customize?: (transaction: Transaction) => Transaction | void;

  /** Defaults to `Namespace.HTTP_REQUEST` */
  namespace?: Namespace;
}

/**
 * Reports errors when no transaction is in progress by creating one per call.
 *
 * Everything runs synchronously in the caller. Nothing is thrown back: a
 * failed submission is logged and dropped.
 */
export class SubmissionPipeline {
  constructor(
    private readonly lifecycle: ConfigLifecycle,
    private readonly transactions: TransactionFactory = new DefaultTransactionFactory()
  ) {}

  /**
   * Send an error
   *
   * @returns The transaction the error was submitted on, or null when it was not submitted
   *
   * @example
   * ```typescript
   * try {
   *   await chargeCard(order);
   * } catch (error) {
   *   pipeline.sendError(error, {
   *     prefix: 'checkout',
   *     stack: error instanceof Error ? error.stack : [],
   *     tags: { orderId: order.id },
   *     customize: (transaction) => {
   *       transaction.setSampleData('order', { total: order.total });
   *     },
   *   });
   * }
   * ```
   */
  sendError(error: unknown, options: SendErrorOptions = {}): Transaction | null {
    let stack = options.stack;
    if (stack === undefined) {
      process.emitWarning(MISSING_STACK_WARNING, {
        type: 'DeprecationWarning',
        code: MISSING_STACK_WARNING_CODE,
      });
      stack = [];
    }

    const backend = this.lifecycle.activeBackend();
    const { config } = this.lifecycle.snapshot();
    if (!backend || !config) {
      return null;
    }

    try {
      return this.submit(backend, config, error, stack, options);
    } catch (pipelineError) {
      logger.error('sendError failed; dropping the error report', pipelineError);
      return null;
    }
  }

  private submit(
    backend: Backend,
    config: Readonly<Config>,
    error: unknown,
    stack: StackInput,
    options: SendErrorOptions
  ): Transaction | null {
    const namespace = options.namespace ?? Namespace.HTTP_REQUEST;
    const created = this.transactions.create({
      id: `_${this.transactions.generateId()}`,
      namespace,
    });
    const transaction = this.customize(created, options.customize);

    const normalized = normalizeError(error, stack);

    if (config.ignoreErrors.includes(normalized.kind)) {
      logger.debug(`Ignoring ${normalized.kind}: listed in ignoreErrors`);
      return null;
    }
    if (config.ignoreNamespaces.includes(transaction.namespace)) {
      logger.debug(`Ignoring error in ${transaction.namespace}: listed in ignoreNamespaces`);
      return null;
    }

    const submission: ErrorSubmission = {
      transaction: transaction.toJSON(),
      kind: normalized.kind,
      message: prefixed(options.prefix, normalized.message),
      backtrace: formatBacktrace(normalized.frames),
      tags: encodeTags(options.tags),
      context: this.serializeContext(options.context, config),
    };

    try {
      backend.submitError(submission);
    } catch (submitError) {
      logger.error(
        `Failed to submit ${normalized.kind} on transaction ${transaction.id}`,
        submitError
      );
      return null;
    }

    return transaction;
  }

  private serializeContext(context: unknown, config: Readonly<Config>): unknown {
    try {
      return serializeValue(context ?? null, { filterKeys: config.filterParameters });
    } catch (error) {
      logger.warn('sendError context could not be serialized; sending a placeholder', error);
      return UNPRINTABLE_MESSAGE;
    }
  }

  private customize(transaction: Transaction, hook: SendErrorOptions['customize']): Transaction {
    if (!hook) {
      return transaction;
    }

    try {
      const result = hook(transaction);
      return result instanceof Transaction ? result : transaction;
    } catch (error) {
      logger.error('sendError customize callback threw; using the created transaction', error);
      return transaction;
    }
  }
}

/**
 * Compose the submitted message from an optional prefix
 */
export function prefixed(prefix: string | undefined, message: string): string {
  return typeof prefix === 'string' && prefix.length > 0 ? `${prefix}: ${message}` : message;
}
