/**
 * Per-process CLI context: resolved configuration and the schema table
 * built from the bundled documents plus the configured extra directory.
 */

import { resolve } from 'node:path';
import type { Command } from 'commander';
import type { BrainmetaConfig } from '../types/config.js';
import { loadConfig } from '../core/config.js';
import { getBundledSchemasDir } from '../core/paths.js';
import { SchemaTable } from '../core/validation/schema-table.js';

export interface CliContext {
  config: BrainmetaConfig;
  table: SchemaTable;
}

let context: CliContext | null = null;

/**
 * Build a context from a resolved configuration.
 */
export function createCliContext(config: BrainmetaConfig, cwd: string = process.cwd()): CliContext {
  const dirs = [getBundledSchemasDir()];
  if (config.schemas.dir) {
    dirs.push(resolve(cwd, config.schemas.dir));
  }
  return { config, table: SchemaTable.fromDirectories(dirs) };
}

/**
 * Load (once) the context for the current working directory.
 */
export async function getCliContext(): Promise<CliContext> {
  if (!context) {
    context = createCliContext(await loadConfig());
  }
  return context;
}

/**
 * Whether JSON output is indented: the global `--pretty` flag or `output.pretty`.
 */
export function isPretty(command: Command, config?: BrainmetaConfig): boolean {
  return command.optsWithGlobals()['pretty'] === true || config?.output.pretty === true;
}
