/**
 * Record normalization: canonical field order plus the documented coercions.
 *
 * Never mutates its input and shares no objects or arrays with it. Fields
 * the schema does not declare are deep-copied through unchanged, after the
 * declared ones.
 */

import type { MetadataRecord } from '../../types/validation.js';
import { canonicalDate } from './formats.js';
import type { JsonType, PropertySchema } from './schema-documents.js';

const INTEGER_STRING = /^\s*[+-]?\d+\s*$/;
const NUMBER_STRING = /^\s*[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?\s*$/;

/** Plain object check; arrays and Date instances are not plain objects. */
export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value) && !(value instanceof Date);
}

/** Declared types of a property, as a list. */
export function declaredTypes(property: PropertySchema): JsonType[] {
  if (property.type === undefined) return [];
  return Array.isArray(property.type) ? property.type : [property.type];
}

/**
 * Deep copy of a JSON-like value: plain objects, arrays and dates are
 * rebuilt, everything else is returned as is.
 */
export function copyValue(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map((item: unknown) => copyValue(item));
  }
  if (value instanceof Date) {
    return new Date(value.getTime());
  }
  if (isPlainObject(value)) {
    return Object.fromEntries(
      Object.entries(value).map(([key, field]): [string, unknown] => [key, copyValue(field)]),
    );
  }
  return value;
}

function coerceString(value: unknown, property: PropertySchema): unknown {
  if (value instanceof Date) {
    if (isNaN(value.getTime())) return copyValue(value);
    const iso = value.toISOString();
    return property.format === 'date' ? iso.slice(0, 10) : iso;
  }
  if (typeof value === 'string' && property.format === 'date') {
    return canonicalDate(value) ?? value;
  }
  return copyValue(value);
}

function coerceNumeric(value: string, types: JsonType[]): unknown {
  if (types.includes('integer') && INTEGER_STRING.test(value)) {
    const parsed = Number(value.trim());
    return Number.isSafeInteger(parsed) ? parsed : value;
  }
  if (types.includes('number') && NUMBER_STRING.test(value)) {
    return Number(value.trim());
  }
  return value;
}

/**
 * Coerce one value against its property schema.
 */
export function coerceValue(value: unknown, property: PropertySchema): unknown {
  if (value === null || value === undefined) return value;
  const types = declaredTypes(property);

  if (typeof value === 'string' && !types.includes('string')) {
    return coerceNumeric(value, types);
  }
  if (types.includes('string')) {
    return coerceString(value, property);
  }
  if (types.includes('object') && isPlainObject(value) && property.properties) {
    return orderFields(value, property.properties);
  }
  if (types.includes('array') && Array.isArray(value) && property.items) {
    const items = property.items;
    return value.map((item: unknown) => coerceValue(item, items));
  }
  return copyValue(value);
}

/**
 * Copy an object with declared properties first (declaration order, coerced),
 * then undeclared ones in input order, deep-copied but otherwise untouched.
 */
export function orderFields(
  value: Record<string, unknown>,
  properties: Record<string, PropertySchema>,
): Record<string, unknown> {
  const entries: Array<[string, unknown]> = [];
  for (const [key, property] of Object.entries(properties)) {
    if (Object.hasOwn(value, key)) {
      entries.push([key, coerceValue(value[key], property)]);
    }
  }
  for (const [key, field] of Object.entries(value)) {
    if (!Object.hasOwn(properties, key)) {
      entries.push([key, copyValue(field)]);
    }
  }
  return Object.fromEntries(entries);
}

/**
 * Normalized copy of a record.
 */
export function normalizeRecord(
  record: MetadataRecord,
  properties: Record<string, PropertySchema>,
): MetadataRecord {
  return orderFields(record, properties);
}

/**
 * The view handed to the schema check: nulls on properties that do not allow
 * null are dropped, so an optional null counts as absent and a required null
 * is reported as missing rather than as a type mismatch.
 */
export function checkView(value: unknown, property: PropertySchema): unknown {
  if (isPlainObject(value)) {
    const properties = property.properties ?? {};
    const entries: Array<[string, unknown]> = [];
    for (const [key, field] of Object.entries(value)) {
      const declared = properties[key];
      if (field === null && !(declared && declaredTypes(declared).includes('null'))) {
        continue;
      }
      entries.push([key, declared ? checkView(field, declared) : field]);
    }
    return Object.fromEntries(entries);
  }
  if (Array.isArray(value) && property.items) {
    const items = property.items;
    return value.map((item: unknown) => checkView(item, items));
  }
  return value;
}
