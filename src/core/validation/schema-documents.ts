/**
 * Schema documents: one JSON file per revision holding `sessionSchema`,
 * `userSchema` and (from v2) `tagSchema`, each a draft-07 object schema.
 *
 * Documents are shape-checked with zod before ajv compiles them, so a broken
 * file fails at load time rather than on the first validation.
 */

import { readdirSync } from 'node:fs';
import { join } from 'node:path';
import { z } from 'zod';
import { readJsonSync } from '../../store/json.js';
import { BrainmetaError } from '../errors.js';
import { ExitCode } from '../../types/exit-codes.js';

/** JSON-Schema primitive type names understood by the validator. */
export const JSON_TYPES = ['string', 'integer', 'number', 'boolean', 'array', 'object', 'null'] as const;

export type JsonType = (typeof JSON_TYPES)[number];

/** The subset of a draft-07 property schema the validator reads. */
export interface PropertySchema {
  type?: JsonType | JsonType[];
  format?: string;
  description?: string;
  items?: PropertySchema;
  properties?: Record<string, PropertySchema>;
  required?: string[];
  [keyword: string]: unknown;
}

/** A top-level record schema. */
export interface ObjectSchema extends PropertySchema {
  type: 'object';
  properties: Record<string, PropertySchema>;
  required?: string[];
}

const jsonTypeSchema = z.enum(JSON_TYPES);

const propertySchema: z.ZodType<PropertySchema, z.ZodTypeDef, unknown> = z.lazy(() =>
  z
    .object({
      type: z.union([jsonTypeSchema, z.array(jsonTypeSchema)]).optional(),
      format: z.string().optional(),
      description: z.string().optional(),
      items: propertySchema.optional(),
      properties: z.record(propertySchema).optional(),
      required: z.array(z.string()).optional(),
    })
    .passthrough(),
);

const objectSchema: z.ZodType<ObjectSchema, z.ZodTypeDef, unknown> = z
  .object({
    type: z.literal('object'),
    properties: z.record(propertySchema),
    required: z.array(z.string()).optional(),
  })
  .passthrough();

const schemaDocument = z
  .object({
    sessionSchema: objectSchema,
    userSchema: objectSchema,
    tagSchema: objectSchema.optional(),
  })
  .passthrough();

export type SchemaDocument = z.infer<typeof schemaDocument>;

/** File name pattern of schema documents: metadata.<version>.json */
const DOCUMENT_FILE = /^metadata\.(v\d+)\.json$/;

/**
 * Check a parsed document and return it typed.
 *
 * @param source - File name or label used in the error message
 */
export function parseSchemaDocument(data: unknown, source: string): SchemaDocument {
  const result = schemaDocument.safeParse(data);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new BrainmetaError(
      ExitCode.SCHEMA_LOAD_FAILED,
      `Malformed schema document ${source}: ${issues}`,
    );
  }
  return result.data;
}

/**
 * Load every metadata.<version>.json document in a directory, keyed by version.
 */
export function loadSchemaDocuments(dir: string): Map<string, SchemaDocument> {
  let entries: string[];
  try {
    entries = readdirSync(dir);
  } catch (err) {
    throw new BrainmetaError(
      ExitCode.SCHEMA_LOAD_FAILED,
      `Schema directory not readable: ${dir}`,
      { cause: err },
    );
  }

  const documents = new Map<string, SchemaDocument>();
  for (const entry of entries.sort()) {
    const match = DOCUMENT_FILE.exec(entry);
    const version = match?.[1];
    if (!version) continue;
    const path = join(dir, entry);
    let data: unknown;
    try {
      data = readJsonSync(path);
    } catch (err) {
      throw new BrainmetaError(
        ExitCode.SCHEMA_LOAD_FAILED,
        `Schema document not loadable: ${path}`,
        { cause: err },
      );
    }
    documents.set(version, parseSchemaDocument(data, path));
  }
  return documents;
}
