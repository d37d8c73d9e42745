/**
 * Centralized pino logger factory for brainmeta.
 *
 * Singleton pattern. Uses pino-roll for automatic file rotation and retention.
 * Custom formatters for uppercase level labels and ISO timestamps.
 * Context via child loggers (getLogger('subsystem')).
 *
 * stdout is reserved for command output; diagnostics go to the log file,
 * or to stderr before initLogger() has run.
 */

import pino from 'pino';
import { join, dirname } from 'node:path';
import { mkdirSync } from 'node:fs';
import type { LoggingConfig } from '../types/config.js';

let rootLogger: pino.Logger | null = null;
let fallbackLogger: pino.Logger | null = null;
let currentLogDir: string | null = null;

/**
 * Convert bytes to a human-readable size string for pino-roll.
 * pino-roll accepts '10m', '1g', '500k', etc.
 */
export function bytesToSizeString(bytes: number): string {
  if (bytes >= 1024 * 1024 * 1024) return `${Math.floor(bytes / (1024 * 1024 * 1024))}g`;
  if (bytes >= 1024 * 1024) return `${Math.floor(bytes / (1024 * 1024))}m`;
  if (bytes >= 1024) return `${Math.floor(bytes / 1024)}k`;
  return `${bytes}`;
}

const levelFormatter = (label: string) => ({ level: label.toUpperCase() });

/**
 * Initialize the root logger. Call once at startup.
 *
 * @param baseDir - Absolute path to the .brainmeta directory
 * @param config  - Logging section of the resolved configuration
 */
export function initLogger(baseDir: string, config: LoggingConfig): pino.Logger {
  const dest = join(baseDir, config.filePath);
  currentLogDir = dirname(dest);

  mkdirSync(currentLogDir, { recursive: true });

  // pino.transport() runs in a worker thread; pino-roll handles size and
  // daily rotation plus retention.
  const transport = pino.transport({
    target: 'pino-roll',
    options: {
      file: dest,
      size: bytesToSizeString(config.maxFileSize),
      frequency: 'daily',
      mkdir: true,
      limit: {
        count: config.maxFiles,
      },
    },
  });

  rootLogger = pino(
    {
      level: config.level,
      formatters: { level: levelFormatter },
      timestamp: pino.stdTimeFunctions.isoTime,
    },
    transport,
  );

  return rootLogger;
}

/**
 * Get a child logger bound to a subsystem name.
 *
 * Safe to call before initLogger: returns a stderr logger at 'warn',
 * so library callers and tests never need to set up logging.
 *
 * @param subsystem - Logical subsystem name (e.g. 'schema-table', 'validator', 'cli')
 */
export function getLogger(subsystem: string): pino.Logger {
  if (rootLogger) {
    return rootLogger.child({ subsystem });
  }
  if (!fallbackLogger) {
    fallbackLogger = pino(
      {
        level: 'warn',
        formatters: { level: levelFormatter },
      },
      pino.destination(2),
    );
  }
  return fallbackLogger.child({ subsystem });
}

/**
 * Get the current log directory path, or null before initLogger().
 */
export function getLogDir(): string | null {
  return currentLogDir;
}

/**
 * Flush and close the logger. Call during shutdown.
 */
export function closeLogger(): void {
  if (rootLogger) {
    rootLogger.flush();
  }
  rootLogger = null;
  currentLogDir = null;
}
