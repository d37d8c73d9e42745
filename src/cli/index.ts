#!/usr/bin/env node
/**
 * brainmeta CLI entry point.
 */

import { Command } from 'commander';
import { readFileSync } from 'node:fs';
import { join } from 'node:path';
import { registerValidateCommand } from './commands/validate.js';
import { registerSchemasCommand } from './commands/schemas.js';
import { registerVersionCommand } from './commands/version.js';
import { getPackageRoot, getBrainmetaDir } from '../core/paths.js';

// Centralized pino logger
import { initLogger, getLogger } from '../core/logger.js';
import { getCliContext } from './context.js';

/** Read version from package.json (single source of truth). */
function getPackageVersion(): string {
  try {
    const pkg: unknown = JSON.parse(readFileSync(join(getPackageRoot(), 'package.json'), 'utf-8'));
    if (pkg !== null && typeof pkg === 'object' && 'version' in pkg && typeof pkg.version === 'string') {
      return pkg.version;
    }
  } catch (err) {
    getLogger('cli').debug({ err }, 'package.json not readable');
  }
  return '0.0.0';
}

const CLI_VERSION = getPackageVersion();
const program = new Command();

program
  .name('brainmeta')
  .description('Validate EEG session, user and tagged-interval metadata before upload')
  .version(CLI_VERSION)
  .option('--pretty', 'Indent JSON output');

registerVersionCommand(program, CLI_VERSION);
registerValidateCommand(program);
registerSchemasCommand(program);

// Initialize the file logger before any command runs.
// If config loading fails here, the command reports the config error itself.
let loggerInitialized = false;
program.hook('preAction', async () => {
  if (loggerInitialized) return;
  loggerInitialized = true;
  try {
    const { config } = await getCliContext();
    initLogger(getBrainmetaDir(), config.logging);
  } catch (err) {
    getLogger('cli').warn({ err }, 'File logging unavailable, using stderr');
  }
});

await program.parseAsync();
