/**
 * Validation result types shared by the record validator and its callers.
 */

import type { RecordKind } from './records.js';

/** Category of a single record defect. */
export type FieldErrorKind = 'MissingRequired' | 'WrongType' | 'WrongFormat' | 'Custom';

/**
 * A single structured validation defect.
 * `path` is dotted (`tags.0.tag`); the record itself is `''`.
 */
export interface FieldError {
  path: string;
  kind: FieldErrorKind;
  message: string;
}

/** Plain JSON-like record as received from a caller. */
export type MetadataRecord = Record<string, unknown>;

/**
 * Outcome of validating one record.
 * `ok` iff `errors` is empty; `normalized` is only set when ok.
 * `advisories` never affect `ok`.
 */
export interface ValidationResult {
  ok: boolean;
  kind: RecordKind;
  version: string;
  normalized: MetadataRecord | null;
  errors: FieldError[];
  advisories: FieldError[];
}
