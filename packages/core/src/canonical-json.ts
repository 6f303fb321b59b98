/**
 * Canonical JSON
 *
 * Serialization with object keys sorted at every depth, so structurally-equal
 * values serialize identically regardless of key insertion order.
 */

import { DateTime } from 'luxon';

export type CanonicalValue =
  | null
  | boolean
  | number
  | string
  | CanonicalValue[]
  | { [key: string]: CanonicalValue };

/**
 * Render a Date the same way everywhere: UTC ISO-8601 with milliseconds
 *
 * @throws TypeError for invalid dates
 */
export function canonicalDate(value: Date): string {
  const iso = DateTime.fromJSDate(value, { zone: 'utc' }).toISO();
  if (iso === null) {
    throw new TypeError('Cannot canonicalize an invalid Date');
  }
  return iso;
}

/**
 * Normalize a value into canonical form.
 *
 * - objects: keys sorted, `undefined` members dropped
 * - arrays: order kept, `undefined` entries become null (as JSON does)
 * - Dates: UTC ISO strings
 * - NaN, Infinity and invalid Dates: rejected, since null already means null
 * - bigint: decimal string
 * - functions and symbols: dropped from objects, null in arrays
 *
 * @throws TypeError for non-finite numbers and invalid dates
 */
export function canonicalize(value: unknown): CanonicalValue {
  if (value === null || value === undefined) {
    return null;
  }
  if (value instanceof Date) {
    return canonicalDate(value);
  }
  if (Array.isArray(value)) {
    return value.map((item) => canonicalize(item));
  }
  switch (typeof value) {
    case 'string':
    case 'boolean':
      return value;
    case 'number':
      if (!Number.isFinite(value)) {
        throw new TypeError(`Cannot canonicalize non-finite number ${value}`);
      }
      return value;
    case 'bigint':
      return value.toString();
    case 'object': {
      if (value instanceof Map) {
        return canonicalize(Object.fromEntries(value));
      }
      if (value instanceof Set) {
        return canonicalize([...value]);
      }
      const result: { [key: string]: CanonicalValue } = {};
      for (const [key, member] of Object.entries(value).sort(([a], [b]) =>
        a < b ? -1 : a > b ? 1 : 0
      )) {
        if (member === undefined || typeof member === 'function' || typeof member === 'symbol') {
          continue;
        }
        result[key] = canonicalize(member);
      }
      return result;
    }
    default:
      return null;
  }
}

/**
 * Canonical JSON string for any value
 */
export function canonicalStringify(value: unknown): string {
  return JSON.stringify(canonicalize(value));
}
