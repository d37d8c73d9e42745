/**
 * JSON file reading for brainmeta data files (config, schema documents,
 * records handed to the CLI).
 */

import { readFile } from 'node:fs/promises';
import { readFileSync } from 'node:fs';
import { BrainmetaError } from '../core/errors.js';
import { ExitCode } from '../types/exit-codes.js';

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

/**
 * Read a file and return its contents.
 * Returns null if the file does not exist.
 */
export async function safeReadFile(filePath: string): Promise<string | null> {
  try {
    return await readFile(filePath, 'utf8');
  } catch (err: unknown) {
    if (isMissingFile(err)) {
      return null;
    }
    throw new BrainmetaError(
      ExitCode.FILE_ERROR,
      `Failed to read: ${filePath}`,
      { cause: err },
    );
  }
}

function parseJson(content: string, filePath: string): unknown {
  try {
    return JSON.parse(content);
  } catch (err) {
    throw new BrainmetaError(
      ExitCode.INVALID_INPUT,
      `Invalid JSON in: ${filePath}`,
      { cause: err },
    );
  }
}

/**
 * Read and parse a JSON file.
 * Returns null if the file does not exist.
 */
export async function readJson(filePath: string): Promise<unknown> {
  const content = await safeReadFile(filePath);
  if (content === null) return null;
  return parseJson(content, filePath);
}

/**
 * Read a JSON file, throwing if it doesn't exist.
 */
export async function readJsonRequired(filePath: string): Promise<unknown> {
  const data = await readJson(filePath);
  if (data === null) {
    throw new BrainmetaError(
      ExitCode.NOT_FOUND,
      `Required file not found: ${filePath}`,
    );
  }
  return data;
}

/**
 * Synchronous read used at startup, where the schema table is built once.
 */
export function readJsonSync(filePath: string): unknown {
  let content: string;
  try {
    content = readFileSync(filePath, 'utf8');
  } catch (err) {
    throw new BrainmetaError(
      isMissingFile(err) ? ExitCode.NOT_FOUND : ExitCode.FILE_ERROR,
      `Failed to read: ${filePath}`,
      { cause: err },
    );
  }
  return parseJson(content, filePath);
}

/**
 * Check that a parsed JSON value is a plain object.
 */
export function isJsonObject(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}
