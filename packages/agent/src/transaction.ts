import { v4 as uuidv4 } from 'uuid';

/**
 * Branded type for transaction namespaces
 *
 * Namespaces classify where a transaction came from. Use the predefined
 * constants or `defineNamespace()` for custom ones.
 */
export type Namespace = string & { readonly __namespaceBrand: unique symbol };

function createNamespace<T extends string>(name: T): Namespace {
  return name as unknown as Namespace;
}

/**
 * Pre-defined namespaces
 */
export const Namespace = {
  HTTP_REQUEST: createNamespace('http_request'),
  BACKGROUND: createNamespace('background'),
} as const;

/**
 * Define a custom namespace
 *
 * @example
 * ```typescript
 * const CRON = defineNamespace('cron');
 * sendError(error, { namespace: CRON, stack: error.stack });
 * ```
 */
export function defineNamespace<T extends string>(name: T): Namespace {
  if (name.trim().length === 0) {
    throw new Error('Namespace name must not be empty');
  }
  return createNamespace(name);
}

/**
 * Serialized form of a transaction handed to a backend
 */
export interface TransactionRecord {
  id: string;
  namespace: string;
  action: string | null;
  sampleData: Record<string, unknown>;
}

/**
 * A submittable unit of error-report data
 */
export class Transaction {
  private action: string | null = null;
  private readonly sampleData: Record<string, unknown> = {};

  constructor(
    readonly id: string,
    readonly namespace: Namespace
  ) {
    if (id.length === 0) {
      throw new Error('Transaction id must not be empty');
    }
  }

  /**
   * Attach sample data under a key, replacing any previous value for it
   */
  setSampleData(key: string, data: unknown): this {
    this.sampleData[key] = data;
    return this;
  }

  getSampleData(): Readonly<Record<string, unknown>> {
    return this.sampleData;
  }

  /**
   * Name the action (route, job, handler) the transaction belongs to
   */
  setAction(action: string): this {
    this.action = action;
    return this;
  }

  getAction(): string | null {
    return this.action;
  }

  toJSON(): TransactionRecord {
    return {
      id: this.id,
      namespace: this.namespace,
      action: this.action,
      sampleData: { ...this.sampleData },
    };
  }
}

export type CreateTransactionOptions = {
  /** Identifier to use; a fresh one is generated when omitted or empty */
  id?: string;
  namespace?: Namespace;
};

/**
 * Construction contract for transactions used by error submission
 */
export interface TransactionFactory {
  generateId(): string;
  create(options?: CreateTransactionOptions): Transaction;
}

export class DefaultTransactionFactory implements TransactionFactory {
  generateId(): string {
    return uuidv4();
  }

  create(options: CreateTransactionOptions = {}): Transaction {
    const id = options.id || this.generateId();
    return new Transaction(id, options.namespace ?? Namespace.HTTP_REQUEST);
  }
}
