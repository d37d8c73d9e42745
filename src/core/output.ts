/**
 * JSON envelope formatter for CLI output.
 *
 * Every command prints one envelope on stdout:
 *   { _meta, success: true, result }   or   { _meta, success: false, result: null, error }
 */

import { randomUUID } from 'node:crypto';
import { BrainmetaError } from './errors.js';
import { ExitCode } from '../types/exit-codes.js';

export interface EnvelopeMeta {
  operation: string;
  timestamp: string;
  requestId: string;
}

export interface SuccessEnvelope<T> {
  _meta: EnvelopeMeta;
  success: true;
  result: T;
  message?: string;
}

export interface ErrorEnvelope {
  _meta: EnvelopeMeta;
  success: false;
  result: null;
  error: Record<string, unknown>;
}

/** Options for envelope formatting. */
export interface FormatOptions {
  operation?: string;
  message?: string;
  /** Indent JSON for humans. */
  pretty?: boolean;
}

function createMeta(operation: string): EnvelopeMeta {
  return {
    operation,
    timestamp: new Date().toISOString(),
    requestId: randomUUID(),
  };
}

function stringify(envelope: unknown, pretty: boolean | undefined): string {
  return pretty ? JSON.stringify(envelope, null, 2) : JSON.stringify(envelope);
}

/**
 * Format a successful result as an envelope.
 * When operation is omitted, defaults to 'cli.output'.
 */
export function formatSuccess<T>(data: T, opts: FormatOptions = {}): string {
  const envelope: SuccessEnvelope<T> = {
    _meta: createMeta(opts.operation ?? 'cli.output'),
    success: true,
    result: data,
    ...(opts.message && { message: opts.message }),
  };
  return stringify(envelope, opts.pretty);
}

/**
 * Format an error as an envelope. Non-brainmeta errors are wrapped as GENERAL_ERROR.
 */
export function formatError(error: unknown, opts: FormatOptions = {}): string {
  const wrapped = error instanceof BrainmetaError
    ? error
    : new BrainmetaError(
      ExitCode.GENERAL_ERROR,
      error instanceof Error ? error.message : String(error),
      { cause: error },
    );
  const envelope: ErrorEnvelope = {
    _meta: createMeta(opts.operation ?? 'cli.output'),
    success: false,
    result: null,
    error: wrapped.toJSON(),
  };
  return stringify(envelope, opts.pretty);
}
