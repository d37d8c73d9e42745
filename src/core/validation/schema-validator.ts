/**
 * Record validator.
 *
 * Checks a UserProfile, SessionMetadata or TaggedInterval record against the
 * schema variant selected by kind and version, then runs the kind's business
 * rules. Every defect is collected in one pass and returned as data; only an
 * unknown {kind, version} pair throws.
 *
 * Error order: by the schema declaration order of the top-level field
 * concerned, required before type before format for the same field, then
 * business-rule (`Custom`) errors.
 */

import type { ErrorObject } from 'ajv';
import { SCHEMA_DOCUMENT_KEYS, RECORD_KINDS, type RecordKind } from '../../types/records.js';
import type { FieldError, FieldErrorKind, MetadataRecord, ValidationResult } from '../../types/validation.js';
import { BrainmetaError } from '../errors.js';
import { getLogger } from '../logger.js';
import { applyBusinessRules } from './business-rules.js';
import type { ChannelRegistry } from './channel-registry.js';
import { checkView, isPlainObject, normalizeRecord } from './normalize.js';
import type { ObjectSchema } from './schema-documents.js';
import { getSchemaTable, type SchemaTable } from './schema-table.js';

const PHASE: Record<FieldErrorKind, number> = {
  MissingRequired: 0,
  WrongType: 1,
  WrongFormat: 2,
  Custom: 3,
};

/**
 * Convert an ajv instance path (`/tags/0/tag`) to a dotted path (`tags.0.tag`).
 */
export function pointerToPath(pointer: string): string {
  return pointer
    .split('/')
    .slice(1)
    .map((segment) => segment.replace(/~1/g, '/').replace(/~0/g, '~'))
    .join('.');
}

function joinPath(parent: string, key: string): string {
  return parent === '' ? key : `${parent}.${key}`;
}

function stringParam(err: ErrorObject, name: string): string {
  const value: unknown = err.params[name];
  if (typeof value === 'string') return value;
  if (Array.isArray(value)) return value.join(' or ');
  return '';
}

/**
 * Map one ajv error to a field error.
 */
export function toFieldError(err: ErrorObject): FieldError {
  const parent = pointerToPath(err.instancePath);
  switch (err.keyword) {
    case 'required': {
      const path = joinPath(parent, stringParam(err, 'missingProperty'));
      return { path, kind: 'MissingRequired', message: `Required field '${path}' is missing` };
    }
    case 'type':
      return {
        path: parent,
        kind: 'WrongType',
        message: `'${parent}' must be of type ${stringParam(err, 'type')}`,
      };
    case 'format':
      return {
        path: parent,
        kind: 'WrongFormat',
        message: `'${parent}' is not a valid ${stringParam(err, 'format')}`,
      };
    default:
      return {
        path: parent,
        kind: 'WrongFormat',
        message: `'${parent}' ${err.message ?? `fails ${err.keyword}`}`,
      };
  }
}

/**
 * Sort key of a field: position in `properties`, then in `required` for
 * required-but-undeclared fields, then after everything declared.
 */
function fieldRank(schema: ObjectSchema): (path: string) => number {
  const declared = Object.keys(schema.properties);
  const required = schema.required ?? [];
  return (path) => {
    if (path === '') return -1;
    const field = path.split('.')[0] ?? path;
    const index = declared.indexOf(field);
    if (index >= 0) return index;
    const requiredIndex = required.indexOf(field);
    return declared.length + (requiredIndex >= 0 ? requiredIndex : required.length);
  };
}

function orderSchemaErrors(errors: FieldError[], schema: ObjectSchema): FieldError[] {
  const rank = fieldRank(schema);
  return [...errors].sort(
    (a, b) => rank(a.path) - rank(b.path) || PHASE[a.kind] - PHASE[b.kind],
  );
}

export interface RecordValidatorOptions {
  /** Schema table to select variants from. Defaults to the bundled table. */
  table?: SchemaTable;
  /** Channel registry for the advisory channel check. Absent means advisory pass. */
  channels?: ChannelRegistry;
}

export class RecordValidator {
  private readonly table: SchemaTable;
  private readonly channels?: ChannelRegistry;

  constructor(options: RecordValidatorOptions = {}) {
    this.table = options.table ?? getSchemaTable();
    this.channels = options.channels;
  }

  /**
   * Validate one record.
   *
   * @throws UnknownSchemaError when {kind, version} is not registered
   */
  validate(record: unknown, kind: string, version: string): ValidationResult {
    const variant = this.table.get(kind, version);

    if (!isPlainObject(record)) {
      return {
        ok: false,
        kind: variant.kind,
        version,
        normalized: null,
        errors: [{ path: '', kind: 'WrongType', message: 'Record must be an object' }],
        advisories: [],
      };
    }

    const coerced = normalizeRecord(record, variant.schema.properties);

    variant.check(checkView(coerced, variant.schema));
    const schemaErrors = orderSchemaErrors(
      (variant.check.errors ?? []).map(toFieldError),
      variant.schema,
    );

    const rules = applyBusinessRules(variant.kind, coerced, { channels: this.channels });
    const errors = [...schemaErrors, ...rules.errors];
    const ok = errors.length === 0;

    if (!ok) {
      getLogger('validator').debug({ kind, version, errors: errors.length }, 'Record failed validation');
    }

    return {
      ok,
      kind: variant.kind,
      version,
      normalized: ok ? coerced : null,
      errors,
      advisories: rules.advisories,
    };
  }
}

let defaultValidator: RecordValidator | null = null;

/**
 * Validate a record against the bundled schema table.
 *
 * @throws UnknownSchemaError when {kind, version} is not registered
 */
export function validate(record: unknown, kind: string, version: string): ValidationResult {
  if (!defaultValidator) {
    defaultValidator = new RecordValidator();
  }
  return defaultValidator.validate(record, kind, version);
}

/**
 * Drop the shared validator (useful for testing, alongside resetSchemaTable()).
 */
export function resetValidator(): void {
  defaultValidator = null;
}

function kindForDocumentKey(schemaName: string): RecordKind | null {
  return RECORD_KINDS.find((kind) => SCHEMA_DOCUMENT_KEYS[kind] === schemaName) ?? null;
}

/**
 * Boolean check addressed by document key (`userSchema`, `sessionSchema`,
 * `tagSchema`), logging the outcome. Unknown names and versions yield false.
 */
export function isValidMetadata(
  metadata: MetadataRecord,
  schemaName: string,
  version = 'v2',
  validator: RecordValidator = new RecordValidator(),
): boolean {
  const kind = kindForDocumentKey(schemaName);
  if (!kind) {
    getLogger('validator').error({ schemaName }, 'No such schema document key');
    return false;
  }
  try {
    const result = validator.validate(metadata, kind, version);
    if (result.ok) {
      getLogger('validator').info({ schemaName, version }, 'Metadata validation successful');
    } else {
      getLogger('validator').warn({ schemaName, version, errors: result.errors }, 'Metadata validation failed');
    }
    return result.ok;
  } catch (err) {
    if (err instanceof BrainmetaError) {
      getLogger('validator').error({ schemaName, version, err }, 'Metadata validation could not run');
      return false;
    }
    throw err;
  }
}
