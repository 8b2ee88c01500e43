export type TagValue = string | number | boolean;

/**
 * Metadata attached to a metric or error submission
 */
export type Tags = Readonly<Record<string, TagValue | null | undefined>>;

/**
 * Tag set in the form backends receive: entries sorted by key, so two tag sets
 * with the same entries encode identically regardless of insertion order.
 */
export type EncodedTags = ReadonlyArray<readonly [key: string, value: TagValue]>;

const EMPTY_TAGS: EncodedTags = Object.freeze([]);

/**
 * Encode a tag set for a backend call.
 *
 * `null` and `undefined` values are dropped. Values that are not scalars, and
 * numbers that are not finite, are stringified.
 *
 * @example
 * ```typescript
 * encodeTags({ region: 'eu', env: 'prod' });
 * // [['env', 'prod'], ['region', 'eu']]
 * ```
 */
export function encodeTags(tags: Tags = {}): EncodedTags {
  const entries: Array<readonly [string, TagValue]> = [];

  for (const [key, value] of Object.entries(tags)) {
    if (value === null || value === undefined) {
      continue;
    }
    entries.push(Object.freeze([key, encodeValue(value)] as const));
  }

  if (entries.length === 0) {
    return EMPTY_TAGS;
  }

  entries.sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
  return Object.freeze(entries);
}

/**
 * Decode an encoded tag set back into a plain record
 */
export function decodeTags(encoded: EncodedTags): Record<string, TagValue> {
  return Object.fromEntries(encoded);
}

function encodeValue(value: unknown): TagValue {
  if (typeof value === 'string' || typeof value === 'boolean') {
    return value;
  }
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : String(value);
  }
  try {
    return String(value);
  } catch {
    return `<${typeof value}>`;
  }
}
