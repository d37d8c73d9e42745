/**
 * Tests for JSON file reading.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { isJsonObject, readJson, readJsonRequired, readJsonSync } from '../json.js';
import { BrainmetaError } from '../../core/errors.js';
import { ExitCode } from '../../types/exit-codes.js';

function syncCode(fn: () => unknown): number | null {
  try {
    fn();
  } catch (err) {
    return err instanceof BrainmetaError ? err.code : null;
  }
  return null;
}

describe('readJson', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await mkdtemp(join(tmpdir(), 'brainmeta-test-'));
  });

  afterEach(async () => {
    await rm(tempDir, { recursive: true, force: true });
  });

  it('reads and parses valid JSON', async () => {
    const filePath = join(tempDir, 'data.json');
    await writeFile(filePath, '{"key": "value"}');
    expect(await readJson(filePath)).toEqual({ key: 'value' });
  });

  it('returns null for missing files', async () => {
    expect(await readJson(join(tempDir, 'missing.json'))).toBeNull();
  });

  it('throws on invalid JSON', async () => {
    const filePath = join(tempDir, 'bad.json');
    await writeFile(filePath, '{invalid}');
    await expect(readJson(filePath)).rejects.toThrow('Invalid JSON');
  });
});

describe('readJsonRequired', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await mkdtemp(join(tmpdir(), 'brainmeta-test-'));
  });

  afterEach(async () => {
    await rm(tempDir, { recursive: true, force: true });
  });

  it('returns data for existing files', async () => {
    const filePath = join(tempDir, 'data.json');
    await writeFile(filePath, '[1, 2]');
    expect(await readJsonRequired(filePath)).toEqual([1, 2]);
  });

  it('throws for missing files', async () => {
    await expect(readJsonRequired(join(tempDir, 'missing.json'))).rejects.toThrow('Required file not found');
  });
});

describe('readJsonSync', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await mkdtemp(join(tmpdir(), 'brainmeta-test-'));
  });

  afterEach(async () => {
    await rm(tempDir, { recursive: true, force: true });
  });

  it('parses a file', async () => {
    const filePath = join(tempDir, 'doc.json');
    await writeFile(filePath, '{"a": 1}');
    expect(readJsonSync(filePath)).toEqual({ a: 1 });
  });

  it('maps a missing file to NOT_FOUND and bad JSON to INVALID_INPUT', async () => {
    const filePath = join(tempDir, 'bad.json');
    await writeFile(filePath, 'nope');
    expect(syncCode(() => readJsonSync(join(tempDir, 'absent.json')))).toBe(ExitCode.NOT_FOUND);
    expect(syncCode(() => readJsonSync(filePath))).toBe(ExitCode.INVALID_INPUT);
  });
});

describe('isJsonObject', () => {
  it('accepts plain objects only', () => {
    expect(isJsonObject({})).toBe(true);
    expect(isJsonObject([])).toBe(false);
    expect(isJsonObject(null)).toBe(false);
    expect(isJsonObject('x')).toBe(false);
  });
});
