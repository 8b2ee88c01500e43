export const FILTERED_VALUE = '[FILTERED]';

/**
 * Truncate a string to a maximum length, adding an ellipsis if truncated
 */
export function truncateString(value: string, maxLength: number): string {
  if (value.length <= maxLength) {
    return value;
  }
  return `${value.slice(0, maxLength)}... [truncated]`;
}

export type SerializeOptions = {
  /** Maximum length for strings (null for no truncation) */
  maxLength?: number | null;
  /** Keys whose values are replaced by `[FILTERED]`, matched case-insensitively at any depth */
  filterKeys?: readonly string[];
};

/**
 * Serialize a value for JSON output, handling non-serializable types,
 * truncating long strings and masking filtered keys.
 *
 * @example
 * ```typescript
 * serializeValue({ params: { password: 'test-secret' } }, { filterKeys: ['password'] });
 * // Result: { params: { password: '[FILTERED]' } }
 * ```
 */
export function serializeValue(value: unknown, options: SerializeOptions = {}): unknown {
  const maxLength = options.maxLength === undefined ? 10000 : options.maxLength;
  const filterKeys = new Set((options.filterKeys ?? []).map((key) => key.toLowerCase()));
  return serialize(value, maxLength, filterKeys, new Set());
}

function serialize(
  value: unknown,
  maxLength: number | null,
  filterKeys: Set<string>,
  seen: Set<object>
): unknown {
  if (value === null || value === undefined) {
    return value;
  }

  if (typeof value === 'boolean' || typeof value === 'number') {
    return value;
  }

  if (typeof value === 'string') {
    return maxLength !== null ? truncateString(value, maxLength) : value;
  }

  if (typeof value === 'bigint') {
    return value.toString();
  }

  if (typeof value === 'object') {
    if (value instanceof Date) {
      return Number.isNaN(value.getTime()) ? 'Invalid Date' : value.toISOString();
    }

    if (seen.has(value)) {
      return '[Circular]';
    }

    seen.add(value);
    try {
      if (Array.isArray(value)) {
        return value.map((item) => serialize(item, maxLength, filterKeys, seen));
      }

      const result: Record<string, unknown> = {};
      for (const [key, val] of Object.entries(value)) {
        result[key] = filterKeys.has(key.toLowerCase())
          ? FILTERED_VALUE
          : serialize(val, maxLength, filterKeys, seen);
      }
      return result;
    } finally {
      seen.delete(value);
    }
  }

  try {
    return String(value);
  } catch {
    return `<${typeof value} object>`;
  }
}
