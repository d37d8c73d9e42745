/**
 * Configuration type definitions for brainmeta.
 * Covers project and global config with cascade resolution.
 */

/** Pino log levels. */
export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal' | 'silent';

/** Logging configuration. */
export interface LoggingConfig {
  /** Minimum log level to record (default: 'info') */
  level: LogLevel;
  /** Log file path relative to .brainmeta/ (default: 'logs/brainmeta.log') */
  filePath: string;
  /** Max log file size in bytes before rotation (default: 10MB) */
  maxFileSize: number;
  /** Number of rotated log files to retain (default: 5) */
  maxFiles: number;
}

/** Schema table configuration. */
export interface SchemasConfig {
  /** Revision used when a caller does not name one (default: 'v2') */
  defaultVersion: string;
  /** Extra directory of metadata.<version>.json documents; overrides bundled ones. */
  dir: string | null;
}

/** Output configuration. */
export interface OutputConfig {
  pretty: boolean;
}

/** brainmeta configuration (config.json). */
export interface BrainmetaConfig {
  logging: LoggingConfig;
  schemas: SchemasConfig;
  output: OutputConfig;
}

/** Configuration resolution priority. */
export type ConfigSource = 'env' | 'project' | 'global' | 'default';

/** A resolved config value with its source. */
export interface ResolvedValue<T> {
  value: T;
  source: ConfigSource;
}
