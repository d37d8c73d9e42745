/**
 * Path resolution for brainmeta.
 *
 * Environment variables:
 *   BRAINMETA_HOME   - Global directory (default: ~/.brainmeta)
 *   BRAINMETA_DIR    - Project data directory (default: .brainmeta)
 */

import { resolve, join } from 'node:path';
import { homedir } from 'node:os';
import { fileURLToPath } from 'node:url';

/**
 * Get the global brainmeta home directory.
 * Respects BRAINMETA_HOME env var, defaults to ~/.brainmeta.
 */
export function getBrainmetaHome(): string {
  return process.env['BRAINMETA_HOME'] ?? join(homedir(), '.brainmeta');
}

/**
 * Get the absolute path to the project brainmeta directory.
 * Respects BRAINMETA_DIR env var, defaults to "<cwd>/.brainmeta".
 */
export function getBrainmetaDir(cwd?: string): string {
  const dir = process.env['BRAINMETA_DIR'] ?? '.brainmeta';
  return resolve(cwd ?? process.cwd(), dir);
}

/**
 * Get the path to the project's config.json file.
 */
export function getConfigPath(cwd?: string): string {
  return join(getBrainmetaDir(cwd), 'config.json');
}

/**
 * Get the path to the global config.json file.
 */
export function getGlobalConfigPath(): string {
  return join(getBrainmetaHome(), 'config.json');
}

/**
 * Locate the package root (the directory holding package.json and schemas/).
 * Same depth from src/core/ and from the build output dist/core/.
 */
export function getPackageRoot(): string {
  return fileURLToPath(new URL('../../', import.meta.url));
}

/**
 * Get the bundled schemas/ directory.
 */
export function getBundledSchemasDir(): string {
  return join(getPackageRoot(), 'schemas');
}
