/**
 * Versioned schema table.
 *
 * One variant per {kind, version} pair, compiled with ajv when the table is
 * built and read-only afterwards. Adding a revision means adding a
 * metadata.<version>.json document; nothing here branches on versions.
 */

import AjvModule from 'ajv';
import addFormatsModule from 'ajv-formats';
import type { ValidateFunction } from 'ajv';
import { RECORD_KINDS, SCHEMA_DOCUMENT_KEYS, type RecordKind } from '../../types/records.js';
import { UnknownSchemaError } from '../errors.js';
import { getLogger } from '../logger.js';
import { getBundledSchemasDir } from '../paths.js';
import { isCalendarDate, isEmail } from './formats.js';
import { loadSchemaDocuments, type ObjectSchema, type SchemaDocument } from './schema-documents.js';

// Handle ESM/CJS interop for Ajv and ajv-formats
const Ajv = AjvModule.default;
const addFormats = addFormatsModule.default;

type AjvInstance = InstanceType<typeof Ajv>;

/** A compiled schema revision for one record kind. */
export interface SchemaVariant {
  readonly kind: RecordKind;
  readonly version: string;
  readonly schema: ObjectSchema;
  readonly check: ValidateFunction;
}

/** `Kind@version` key of a variant. */
export function variantKey(kind: string, version: string): string {
  return `${kind}@${version}`;
}

/**
 * Create an Ajv instance configured for metadata schemas.
 * `date` and `email` use the validator's own rules; `date-time` comes from ajv-formats.
 */
function createAjv(): AjvInstance {
  const ajv = new Ajv({
    allErrors: true,
    strict: false,
    validateFormats: true,
  });
  addFormats(ajv, ['date-time']);
  ajv.addFormat('date', { type: 'string', validate: isCalendarDate });
  ajv.addFormat('email', { type: 'string', validate: isEmail });
  return ajv;
}

function compareVersions(a: string, b: string): number {
  return Number(a.slice(1)) - Number(b.slice(1));
}

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === 'object') {
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
    Object.freeze(value);
  }
  return value;
}

export class SchemaTable {
  private readonly variants: ReadonlyMap<string, SchemaVariant>;

  constructor(documents: ReadonlyMap<string, SchemaDocument>) {
    const ajv = createAjv();
    const variants = new Map<string, SchemaVariant>();
    const versions = [...documents.keys()].sort(compareVersions);

    for (const kind of RECORD_KINDS) {
      for (const version of versions) {
        const source = documents.get(version)?.[SCHEMA_DOCUMENT_KEYS[kind]];
        if (!source) continue;
        // Private copy: later edits to the caller's document cannot reach the table.
        const schema = structuredClone(source);
        const check = ajv.compile(schema);
        variants.set(
          variantKey(kind, version),
          Object.freeze({ kind, version, schema: deepFreeze(schema), check }),
        );
      }
    }

    this.variants = variants;
    getLogger('schema-table').info({ variants: [...variants.keys()] }, 'Schema table built');
  }

  /**
   * Build a table from one or more directories of schema documents.
   * A document in a later directory replaces the same version from an earlier one.
   */
  static fromDirectories(dirs: string[]): SchemaTable {
    const documents = new Map<string, SchemaDocument>();
    for (const dir of dirs) {
      for (const [version, document] of loadSchemaDocuments(dir)) {
        documents.set(version, document);
      }
    }
    return new SchemaTable(documents);
  }

  has(kind: string, version: string): boolean {
    return this.variants.has(variantKey(kind, version));
  }

  /**
   * Look up a variant.
   * @throws UnknownSchemaError when the pair is not registered
   */
  get(kind: string, version: string): SchemaVariant {
    const variant = this.variants.get(variantKey(kind, version));
    if (!variant) {
      getLogger('schema-table').warn({ kind, version }, 'Unknown schema requested');
      throw new UnknownSchemaError(kind, version, this.keys());
    }
    return variant;
  }

  /** Variants ordered by kind, then by version. */
  list(): SchemaVariant[] {
    return [...this.variants.values()];
  }

  keys(): string[] {
    return [...this.variants.keys()];
  }
}

/** Process-wide table over the bundled documents. */
let defaultTable: SchemaTable | null = null;

/**
 * Get the shared table, loading the bundled schema documents on first use.
 */
export function getSchemaTable(): SchemaTable {
  if (!defaultTable) {
    defaultTable = SchemaTable.fromDirectories([getBundledSchemasDir()]);
  }
  return defaultTable;
}

/**
 * Drop the shared table (useful for testing).
 */
export function resetSchemaTable(): void {
  defaultTable = null;
}
