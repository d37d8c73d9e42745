/**
 * Date conversion for metadata headed to the remote API, which only accepts
 * JSON values.
 */

import { isPlainObject } from '../validation/normalize.js';

/**
 * Recursively convert Date values inside plain objects and arrays to ISO
 * strings. Returns a copy; the input is left untouched.
 */
export function convertDatetimes(data: unknown): unknown {
  if (data instanceof Date) {
    return isNaN(data.getTime()) ? data : data.toISOString();
  }
  if (Array.isArray(data)) {
    return data.map((item: unknown) => convertDatetimes(item));
  }
  if (isPlainObject(data)) {
    return Object.fromEntries(
      Object.entries(data).map(([key, value]) => [key, convertDatetimes(value)]),
    );
  }
  return data;
}

/**
 * Timestamp as an ISO-8601 string.
 */
export function toTimestamp(value: Date | string): string {
  return value instanceof Date ? value.toISOString() : value;
}
