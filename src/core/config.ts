/**
 * Configuration engine for brainmeta.
 *
 * Resolution priority: Environment vars > Project config > Global config > Defaults
 */

import { z } from 'zod';
import type { BrainmetaConfig, ConfigSource, ResolvedValue } from '../types/config.js';
import { readJson, isJsonObject } from '../store/json.js';
import { getConfigPath, getGlobalConfigPath } from './paths.js';
import { BrainmetaError } from './errors.js';
import { ExitCode } from '../types/exit-codes.js';

/** Default configuration values. */
const DEFAULTS: BrainmetaConfig = {
  logging: {
    level: 'info',
    filePath: 'logs/brainmeta.log',
    maxFileSize: 10 * 1024 * 1024, // 10MB
    maxFiles: 5,
  },
  schemas: {
    defaultVersion: 'v2',
    dir: null,
  },
  output: {
    pretty: false,
  },
};

const configSchema = z.object({
  logging: z.object({
    level: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']),
    filePath: z.string().min(1),
    maxFileSize: z.number().int().positive(),
    maxFiles: z.number().int().positive(),
  }),
  schemas: z.object({
    defaultVersion: z.string().min(1),
    dir: z.string().min(1).nullable(),
  }),
  output: z.object({
    pretty: z.boolean(),
  }),
}) satisfies z.ZodType<BrainmetaConfig>;

/** Environment variable to config path mapping. */
const ENV_MAP: Record<string, string> = {
  'BRAINMETA_LOG_LEVEL': 'logging.level',
  'BRAINMETA_LOG_FILE': 'logging.filePath',
  'BRAINMETA_SCHEMA_VERSION': 'schemas.defaultVersion',
  'BRAINMETA_SCHEMAS_DIR': 'schemas.dir',
  'BRAINMETA_PRETTY': 'output.pretty',
};

/** Keys whose env value stays a string even when it looks numeric. */
const STRING_PATHS = new Set(['schemas.defaultVersion', 'schemas.dir', 'logging.filePath']);

/**
 * Get a value at a dotted path from an object.
 */
function getNestedValue(obj: Record<string, unknown>, path: string): unknown {
  let current: unknown = obj;
  for (const part of path.split('.')) {
    if (!isJsonObject(current)) {
      return undefined;
    }
    current = current[part];
  }
  return current;
}

/**
 * Set a value at a dotted path in an object (mutates).
 */
function setNestedValue(obj: Record<string, unknown>, path: string, value: unknown): void {
  const parts = path.split('.');
  const last = parts.pop();
  if (last === undefined) return;
  let current = obj;
  for (const part of parts) {
    const next = current[part];
    if (isJsonObject(next)) {
      current = next;
    } else {
      const created: Record<string, unknown> = {};
      current[part] = created;
      current = created;
    }
  }
  current[last] = value;
}

/**
 * Deep merge two objects. Source values override target values.
 * Arrays are replaced (not merged).
 */
function deepMerge(target: Record<string, unknown>, source: Record<string, unknown>): Record<string, unknown> {
  const result = { ...target };
  for (const key of Object.keys(source)) {
    const sourceVal = source[key];
    const targetVal = result[key];
    if (isJsonObject(sourceVal) && isJsonObject(targetVal)) {
      result[key] = deepMerge(targetVal, sourceVal);
    } else {
      result[key] = sourceVal;
    }
  }
  return result;
}

/**
 * Parse an environment variable value to the appropriate type.
 */
function parseEnvValue(value: string, path: string): unknown {
  if (STRING_PATHS.has(path)) return value;
  if (value === 'true') return true;
  if (value === 'false') return false;
  const num = Number(value);
  if (!isNaN(num) && value.trim() !== '') return num;
  return value;
}

async function readConfigFile(filePath: string): Promise<Record<string, unknown> | null> {
  const data = await readJson(filePath);
  if (data === null) return null;
  if (!isJsonObject(data)) {
    throw new BrainmetaError(
      ExitCode.CONFIG_ERROR,
      `Config file must contain a JSON object: ${filePath}`,
    );
  }
  return data;
}

/**
 * A copy of the default configuration.
 */
export function getDefaultConfig(): BrainmetaConfig {
  return structuredClone(DEFAULTS);
}

function defaultsAsRecord(): Record<string, unknown> {
  const copy: unknown = JSON.parse(JSON.stringify(DEFAULTS));
  return isJsonObject(copy) ? copy : {};
}

/**
 * Load and merge configuration from all sources.
 * Priority: defaults < global config < project config < environment vars
 */
export async function loadConfig(cwd?: string): Promise<BrainmetaConfig> {
  let merged = defaultsAsRecord();

  // Layer 1: Global config
  const globalConfig = await readConfigFile(getGlobalConfigPath());
  if (globalConfig) {
    merged = deepMerge(merged, globalConfig);
  }

  // Layer 2: Project config
  const projectConfig = await readConfigFile(getConfigPath(cwd));
  if (projectConfig) {
    merged = deepMerge(merged, projectConfig);
  }

  // Layer 3: Environment variables
  for (const [envKey, configPath] of Object.entries(ENV_MAP)) {
    const envValue = process.env[envKey];
    if (envValue !== undefined) {
      setNestedValue(merged, configPath, parseEnvValue(envValue, configPath));
    }
  }

  const parsed = configSchema.safeParse(merged);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new BrainmetaError(
      ExitCode.CONFIG_ERROR,
      `Invalid configuration: ${issues}`,
      { fix: `Check ${getConfigPath(cwd)} and BRAINMETA_* environment variables` },
    );
  }
  return parsed.data;
}

/**
 * Get a single config value with source tracking.
 * Returns the value and which source it came from.
 */
export async function getConfigValue(
  path: string,
  cwd?: string,
): Promise<ResolvedValue<unknown>> {
  // Check environment variables first
  for (const [envKey, configPath] of Object.entries(ENV_MAP)) {
    const envValue = process.env[envKey];
    if (configPath === path && envValue !== undefined) {
      return { value: parseEnvValue(envValue, path), source: 'env' };
    }
  }

  const layers: Array<[ConfigSource, string]> = [
    ['project', getConfigPath(cwd)],
    ['global', getGlobalConfigPath()],
  ];
  for (const [source, filePath] of layers) {
    const config = await readConfigFile(filePath);
    if (config) {
      const val = getNestedValue(config, path);
      if (val !== undefined) {
        return { value: val, source };
      }
    }
  }

  return { value: getNestedValue(defaultsAsRecord(), path), source: 'default' };
}
