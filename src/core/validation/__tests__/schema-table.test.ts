/**
 * Tests for schema document loading and the versioned schema table.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile, readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { SchemaTable, getSchemaTable, resetSchemaTable, variantKey } from '../schema-table.js';
import { loadSchemaDocuments, parseSchemaDocument } from '../schema-documents.js';
import { RecordValidator } from '../schema-validator.js';
import { BrainmetaError, UnknownSchemaError } from '../../errors.js';
import { getBundledSchemasDir } from '../../paths.js';
import { ExitCode } from '../../../types/exit-codes.js';

function thrownCode(fn: () => unknown): ExitCode | null {
  try {
    fn();
  } catch (err) {
    return err instanceof BrainmetaError ? err.code : null;
  }
  return null;
}

const minimalSchema = { type: 'object', properties: { id: { type: 'string' } }, required: ['id'] };

describe('bundled schema table', () => {
  beforeEach(() => {
    resetSchemaTable();
  });

  it('registers one variant per kind and version', () => {
    expect(getSchemaTable().keys()).toEqual([
      'UserProfile@v1',
      'UserProfile@v2',
      'SessionMetadata@v1',
      'SessionMetadata@v2',
      'TaggedInterval@v2',
    ]);
  });

  it('returns the same table until reset', () => {
    const table = getSchemaTable();
    expect(getSchemaTable()).toBe(table);
    resetSchemaTable();
    expect(getSchemaTable()).not.toBe(table);
  });

  it('exposes required fields per revision', () => {
    const table = getSchemaTable();
    expect(table.get('UserProfile', 'v1').schema.required).toEqual(['email']);
    expect(table.get('UserProfile', 'v2').schema.required).toEqual(['email', 'role']);
    expect(table.get('SessionMetadata', 'v2').schema.required).toEqual(['user_id', 'session_date', 'session_type']);
    expect(table.get('TaggedInterval', 'v2').schema.required).toEqual(['session_id', 'start_time', 'end_time', 'tags']);
  });

  it('replaces sex with gender in the v2 user profile', () => {
    const table = getSchemaTable();
    expect(Object.keys(table.get('UserProfile', 'v1').schema.properties)).toContain('sex');
    const v2 = Object.keys(table.get('UserProfile', 'v2').schema.properties);
    expect(v2).toContain('gender');
    expect(v2).not.toContain('sex');
  });

  it('throws UnknownSchemaError listing registered variants', () => {
    const table = getSchemaTable();
    expect(table.has('TaggedInterval', 'v1')).toBe(false);
    try {
      table.get('TaggedInterval', 'v1');
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(UnknownSchemaError);
      if (err instanceof BrainmetaError) {
        expect(err.code).toBe(ExitCode.UNKNOWN_SCHEMA);
        expect(err.fix).toBe(`Registered schemas: ${table.keys().join(', ')}`);
      }
    }
  });
});

describe('SchemaTable.fromDirectories', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await mkdtemp(join(tmpdir(), 'brainmeta-schema-test-'));
  });

  afterEach(async () => {
    await rm(tempDir, { recursive: true, force: true });
  });

  it('adds a revision by adding a document', async () => {
    const v2 = JSON.parse(await readFile(join(getBundledSchemasDir(), 'metadata.v2.json'), 'utf-8'));
    await writeFile(join(tempDir, 'metadata.v3.json'), JSON.stringify(v2));

    const table = SchemaTable.fromDirectories([getBundledSchemasDir(), tempDir]);
    expect(table.has('UserProfile', 'v3')).toBe(true);
    expect(table.has('TaggedInterval', 'v3')).toBe(true);
    expect(table.keys().filter((key) => key.startsWith('UserProfile@'))).toEqual([
      'UserProfile@v1',
      'UserProfile@v2',
      'UserProfile@v3',
    ]);
  });

  it('lets a later directory override a bundled revision', async () => {
    await writeFile(
      join(tempDir, 'metadata.v2.json'),
      JSON.stringify({ sessionSchema: minimalSchema, userSchema: minimalSchema }),
    );
    const table = SchemaTable.fromDirectories([getBundledSchemasDir(), tempDir]);
    const validator = new RecordValidator({ table });

    expect(validator.validate({ id: 'x' }, 'UserProfile', 'v2').ok).toBe(true);
    expect(table.has('TaggedInterval', 'v2')).toBe(false);
    expect(table.has('UserProfile', 'v1')).toBe(true);
  });

  it('ignores files that are not schema documents', async () => {
    await writeFile(join(tempDir, 'notes.json'), '{}');
    await writeFile(
      join(tempDir, 'metadata.v1.json'),
      JSON.stringify({ sessionSchema: minimalSchema, userSchema: minimalSchema }),
    );
    expect([...loadSchemaDocuments(tempDir).keys()]).toEqual(['v1']);
  });

  it('rejects documents missing a required schema', async () => {
    await writeFile(join(tempDir, 'metadata.v9.json'), JSON.stringify({ userSchema: minimalSchema }));
    expect(thrownCode(() => SchemaTable.fromDirectories([tempDir]))).toBe(ExitCode.SCHEMA_LOAD_FAILED);
  });

  it('rejects documents that are not JSON', async () => {
    await writeFile(join(tempDir, 'metadata.v9.json'), '{ not json');
    expect(thrownCode(() => loadSchemaDocuments(tempDir))).toBe(ExitCode.SCHEMA_LOAD_FAILED);
  });

  it('rejects a missing directory', () => {
    expect(thrownCode(() => loadSchemaDocuments(join(tempDir, 'absent')))).toBe(ExitCode.SCHEMA_LOAD_FAILED);
  });
});

describe('parseSchemaDocument', () => {
  it('names the offending path', () => {
    expect(() =>
      parseSchemaDocument({ sessionSchema: { type: 'array', properties: {} }, userSchema: minimalSchema }, 'doc'),
    ).toThrow(/Malformed schema document doc: sessionSchema\.type/);
  });

  it('accepts an optional tagSchema', () => {
    const doc = parseSchemaDocument({ sessionSchema: minimalSchema, userSchema: minimalSchema }, 'doc');
    expect(doc.tagSchema).toBeUndefined();
  });
});

describe('variantKey', () => {
  it('joins kind and version', () => {
    expect(variantKey('SessionMetadata', 'v2')).toBe('SessionMetadata@v2');
  });
});

describe('table immutability', () => {
  function tableOf(): { table: SchemaTable; doc: ReturnType<typeof parseSchemaDocument> } {
    const doc = parseSchemaDocument({ sessionSchema: minimalSchema, userSchema: minimalSchema }, 'doc');
    return { table: new SchemaTable(new Map([['v1', doc]])), doc };
  }

  it('freezes variant schemas all the way down', () => {
    const { schema } = tableOf().table.get('UserProfile', 'v1');
    expect(Object.isFrozen(schema)).toBe(true);
    expect(Object.isFrozen(schema.properties)).toBe(true);
    expect(Object.isFrozen(schema.properties['id'])).toBe(true);
    expect(Object.isFrozen(schema.required)).toBe(true);
  });

  it('ignores later edits to the source document', () => {
    const { table, doc } = tableOf();
    doc.userSchema.required?.push('name');
    doc.userSchema.properties['name'] = { type: 'string' };

    const variant = table.get('UserProfile', 'v1');
    expect(variant.schema.required).toEqual(['id']);
    expect(Object.keys(variant.schema.properties)).toEqual(['id']);
    expect(new RecordValidator({ table }).validate({ id: 'x' }, 'UserProfile', 'v1').ok).toBe(true);
  });
});
