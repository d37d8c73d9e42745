/**
 * CLI version command.
 */

import { Command } from 'commander';
import { formatError, formatSuccess } from '../../core/output.js';
import { BrainmetaError } from '../../core/errors.js';
import { ExitCode } from '../../types/exit-codes.js';
import { getCliContext, isPretty } from '../context.js';

export function registerVersionCommand(program: Command, version: string): void {
  program
    .command('version')
    .description('Display brainmeta version')
    .action(async (_opts: Record<string, unknown>, command: Command) => {
      try {
        const { config } = await getCliContext();
        console.log(formatSuccess({ version }, { operation: 'version', pretty: isPretty(command, config) }));
      } catch (err) {
        console.error(formatError(err, { operation: 'version', pretty: isPretty(command) }));
        process.exit(err instanceof BrainmetaError ? err.code : ExitCode.GENERAL_ERROR);
      }
    });
}
