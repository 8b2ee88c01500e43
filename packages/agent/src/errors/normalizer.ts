import { parseStack, type StackFrame, type StackInput } from './backtrace.js';

/** Kind reported for thrown values that are not errors */
export const GENERIC_ERROR_KIND = 'Error';

/** Message used when a thrown value cannot be turned into a string */
export const UNPRINTABLE_MESSAGE = '<unprintable value>';

export interface NormalizedError {
  readonly kind: string;
  readonly message: string;
  readonly frames: readonly StackFrame[];
}

type ErrorLike = { name: string; message: string };

/**
 * The two shapes a reported value can take before normalization
 */
export type ErrorVariant =
  | { variant: 'structured'; error: ErrorLike }
  | { variant: 'plain'; value: unknown };

export function classifyError(error: unknown): ErrorVariant {
  try {
    if (error instanceof Error || isErrorLike(error)) {
      return { variant: 'structured', error };
    }
  } catch {
    return { variant: 'plain', value: UNPRINTABLE_MESSAGE };
  }
  return { variant: 'plain', value: error };
}

/**
 * Normalize an arbitrary reported value and its stack into `(kind, message, frames)`.
 *
 * @example
 * ```typescript
 * normalizeError(new TypeError('bad input'), error.stack);
 * // { kind: 'TypeError', message: 'bad input', frames: [...] }
 * normalizeError('oops', []);
 * // { kind: 'Error', message: 'oops', frames: [] }
 * ```
 */
export function normalizeError(error: unknown, stack: StackInput = []): NormalizedError {
  const classified = classifyError(error);
  const { kind, message } =
    classified.variant === 'structured'
      ? fromStructured(classified.error)
      : { kind: GENERIC_ERROR_KIND, message: stringify(classified.value) };

  return Object.freeze({
    kind: kind || GENERIC_ERROR_KIND,
    message,
    frames: Object.freeze(parseStack(stack)),
  });
}

// Getters and proxy traps on the reported value may throw
function fromStructured(error: ErrorLike): { kind: string; message: string } {
  try {
    const name: unknown = error.name;
    const constructorName = constructorNameOf(error);
    const kind =
      typeof name === 'string' && name && name !== GENERIC_ERROR_KIND
        ? name
        : constructorName && constructorName !== 'Object'
          ? constructorName
          : GENERIC_ERROR_KIND;

    return { kind, message: stringify(error.message) };
  } catch {
    return { kind: GENERIC_ERROR_KIND, message: UNPRINTABLE_MESSAGE };
  }
}

function isErrorLike(value: unknown): value is ErrorLike {
  if (value === null || typeof value !== 'object') {
    return false;
  }
  return (
    'name' in value &&
    typeof value.name === 'string' &&
    'message' in value &&
    typeof value.message === 'string'
  );
}

function constructorNameOf(value: object): string | undefined {
  const prototype: unknown = Object.getPrototypeOf(value);
  if (prototype === null || typeof prototype !== 'object') {
    return undefined;
  }
  const ctor: unknown = 'constructor' in prototype ? prototype.constructor : undefined;
  return typeof ctor === 'function' && ctor.name ? ctor.name : undefined;
}

function stringify(value: unknown): string {
  if (typeof value === 'string') {
    return value;
  }

  try {
    if (Array.isArray(value) || isPlainObject(value)) {
      return JSON.stringify(value) ?? String(value);
    }
    return String(value);
  } catch {
    return UNPRINTABLE_MESSAGE;
  }
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (value === null || typeof value !== 'object') {
    return false;
  }

  const prototype = Object.getPrototypeOf(value);
  return prototype === Object.prototype || prototype === null;
}
