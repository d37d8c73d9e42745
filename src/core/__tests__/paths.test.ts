/**
 * Tests for path resolution.
 */

import { describe, it, expect, afterEach } from 'vitest';
import { existsSync } from 'node:fs';
import { join, resolve } from 'node:path';
import {
  getBrainmetaDir,
  getBrainmetaHome,
  getBundledSchemasDir,
  getConfigPath,
  getGlobalConfigPath,
} from '../paths.js';

describe('paths', () => {
  const savedHome = process.env['BRAINMETA_HOME'];
  const savedDir = process.env['BRAINMETA_DIR'];

  afterEach(() => {
    if (savedHome !== undefined) process.env['BRAINMETA_HOME'] = savedHome;
    else delete process.env['BRAINMETA_HOME'];
    if (savedDir !== undefined) process.env['BRAINMETA_DIR'] = savedDir;
    else delete process.env['BRAINMETA_DIR'];
  });

  it('resolves the project directory against cwd', () => {
    delete process.env['BRAINMETA_DIR'];
    expect(getBrainmetaDir('/work/project')).toBe(resolve('/work/project', '.brainmeta'));
    expect(getConfigPath('/work/project')).toBe(join(resolve('/work/project', '.brainmeta'), 'config.json'));
  });

  it('honours BRAINMETA_HOME for the global config', () => {
    process.env['BRAINMETA_HOME'] = '/opt/brainmeta';
    expect(getBrainmetaHome()).toBe('/opt/brainmeta');
    expect(getGlobalConfigPath()).toBe(join('/opt/brainmeta', 'config.json'));
  });

  it('finds the bundled schema documents', () => {
    expect(existsSync(join(getBundledSchemasDir(), 'metadata.v1.json'))).toBe(true);
    expect(existsSync(join(getBundledSchemasDir(), 'metadata.v2.json'))).toBe(true);
  });
});
