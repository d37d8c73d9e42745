/**
 * brainmeta error type with exit code integration.
 */

import { ExitCode, getExitCodeName } from '../types/exit-codes.js';

/**
 * Structured error class for brainmeta operations.
 * Carries an exit code, human-readable message, and an optional fix suggestion.
 *
 * Record defects are never thrown; they are reported in a ValidationResult.
 * This class covers caller errors (unknown schema) and environment failures
 * (unreadable files, malformed schema documents, bad config).
 */
export class BrainmetaError extends Error {
  readonly code: ExitCode;
  readonly fix?: string;

  constructor(
    code: ExitCode,
    message: string,
    options?: {
      fix?: string;
      cause?: unknown;
    },
  ) {
    super(message, { cause: options?.cause });
    this.name = 'BrainmetaError';
    this.code = code;
    this.fix = options?.fix;
  }

  /** Structured JSON representation used in error envelopes. */
  toJSON(): Record<string, unknown> {
    return {
      code: this.code,
      name: getExitCodeName(this.code),
      message: this.message,
      ...(this.fix && { fix: this.fix }),
    };
  }
}

/**
 * Thrown when a {kind, version} pair is not in the schema table.
 */
export class UnknownSchemaError extends BrainmetaError {
  readonly kind: string;
  readonly version: string;

  constructor(kind: string, version: string, known: string[]) {
    super(
      ExitCode.UNKNOWN_SCHEMA,
      `Unknown schema: ${kind}@${version}`,
      { fix: known.length > 0 ? `Registered schemas: ${known.join(', ')}` : undefined },
    );
    this.name = 'UnknownSchemaError';
    this.kind = kind;
    this.version = version;
  }
}
