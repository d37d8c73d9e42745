/**
 * CLI schemas command - list registered schema variants.
 */

import { Command } from 'commander';
import { formatError, formatSuccess } from '../../core/output.js';
import { BrainmetaError } from '../../core/errors.js';
import { ExitCode } from '../../types/exit-codes.js';
import type { RecordKind } from '../../types/records.js';
import { variantKey, type SchemaTable } from '../../core/validation/schema-table.js';
import { getCliContext, isPretty } from '../context.js';

export interface SchemaSummary {
  key: string;
  kind: RecordKind;
  version: string;
  required: string[];
  properties: string[];
}

export function listSchemas(table: SchemaTable): SchemaSummary[] {
  return table.list().map((variant) => ({
    key: variantKey(variant.kind, variant.version),
    kind: variant.kind,
    version: variant.version,
    required: [...(variant.schema.required ?? [])],
    properties: Object.keys(variant.schema.properties),
  }));
}

export function registerSchemasCommand(program: Command): void {
  program
    .command('schemas')
    .description('List registered schema variants and their required fields')
    .action(async (_opts: Record<string, unknown>, command: Command) => {
      try {
        const context = await getCliContext();
        console.log(formatSuccess(
          { schemas: listSchemas(context.table) },
          { operation: 'schemas', pretty: isPretty(command, context.config) },
        ));
      } catch (err) {
        console.error(formatError(err, { operation: 'schemas', pretty: isPretty(command) }));
        process.exit(err instanceof BrainmetaError ? err.code : ExitCode.GENERAL_ERROR);
      }
    });
}
