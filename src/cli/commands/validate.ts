/**
 * CLI validate command - check metadata records on disk before upload.
 */

import { Command } from 'commander';
import { formatError, formatSuccess } from '../../core/output.js';
import { BrainmetaError } from '../../core/errors.js';
import { ExitCode } from '../../types/exit-codes.js';
import type { FieldError, MetadataRecord } from '../../types/validation.js';
import { readJsonRequired } from '../../store/json.js';
import { InMemoryChannelRegistry } from '../../core/validation/channel-registry.js';
import { RecordValidator } from '../../core/validation/schema-validator.js';
import { getLogger } from '../../core/logger.js';
import { getCliContext, isPretty, type CliContext } from '../context.js';

export interface ValidateCommandOptions {
  kind: string;
  schemaVersion?: string;
  /** JSON file mapping session ids to channel ids. */
  channels?: string;
  /** Treat advisories as failures. */
  strict?: boolean;
}

export interface RecordReport {
  index: number;
  ok: boolean;
  errors: FieldError[];
  advisories: FieldError[];
  normalized: MetadataRecord | null;
}

export interface ValidateReport {
  file: string;
  kind: string;
  version: string;
  total: number;
  valid: number;
  invalid: number;
  advisories: number;
  results: RecordReport[];
}

/**
 * Validate every record of a JSON file (one record or an array of records).
 *
 * @throws UnknownSchemaError for an unregistered kind/version
 */
export async function runValidate(
  filePath: string,
  opts: ValidateCommandOptions,
  context: CliContext,
): Promise<ValidateReport> {
  const data = await readJsonRequired(filePath);
  const records: unknown[] = Array.isArray(data) ? data : [data];
  const version = opts.schemaVersion ?? context.config.schemas.defaultVersion;

  const channels = opts.channels
    ? InMemoryChannelRegistry.fromJson(await readJsonRequired(opts.channels))
    : undefined;
  const validator = new RecordValidator({ table: context.table, channels });

  const results = records.map((record, index): RecordReport => {
    const result = validator.validate(record, opts.kind, version);
    return {
      index,
      ok: result.ok,
      errors: result.errors,
      advisories: result.advisories,
      normalized: result.normalized,
    };
  });

  const valid = results.filter((r) => r.ok).length;
  return {
    file: filePath,
    kind: opts.kind,
    version,
    total: results.length,
    valid,
    invalid: results.length - valid,
    advisories: results.reduce((sum, r) => sum + r.advisories.length, 0),
    results,
  };
}

/**
 * Whether a report should fail the command.
 */
export function reportFailed(report: ValidateReport, strict: boolean): boolean {
  return report.invalid > 0 || (strict && report.advisories > 0);
}

export function registerValidateCommand(program: Command): void {
  program
    .command('validate <file>')
    .description('Validate metadata records (a JSON object or array) against a schema revision')
    .requiredOption('-k, --kind <kind>', 'Record kind: UserProfile | SessionMetadata | TaggedInterval')
    .option('-s, --schema-version <version>', 'Schema revision (default from config)')
    .option('-c, --channels <file>', 'JSON file mapping session ids to known channel ids')
    .option('--strict', 'Treat advisories as errors')
    .action(async (file: string, opts: ValidateCommandOptions, command: Command) => {
      try {
        const context = await getCliContext();
        const report = await runValidate(file, opts, context);
        const failed = reportFailed(report, opts.strict === true);
        getLogger('cli').info(
          { file, kind: report.kind, version: report.version, invalid: report.invalid },
          'validate finished',
        );
        console.log(formatSuccess(report, {
          operation: 'validate',
          pretty: isPretty(command, context.config),
        }));
        if (failed) {
          process.exit(ExitCode.VALIDATION_ERROR);
        }
      } catch (err) {
        console.error(formatError(err, { operation: 'validate', pretty: isPretty(command) }));
        process.exit(err instanceof BrainmetaError ? err.code : ExitCode.GENERAL_ERROR);
      }
    });
}
