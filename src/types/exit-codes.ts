/**
 * brainmeta exit codes.
 * Ranges: 0 = success, 1-9 = general errors, 10-19 = schema errors.
 */

export enum ExitCode {
  // === SUCCESS (0) ===
  SUCCESS = 0,

  // === GENERAL ERRORS (1-9) ===
  GENERAL_ERROR = 1,
  INVALID_INPUT = 2,
  FILE_ERROR = 3,
  NOT_FOUND = 4,
  VALIDATION_ERROR = 6,
  CONFIG_ERROR = 8,

  // === SCHEMA ERRORS (10-19) ===
  UNKNOWN_SCHEMA = 10,
  SCHEMA_LOAD_FAILED = 11,
}

/** Check if an exit code represents an error. */
export function isErrorCode(code: ExitCode): boolean {
  return code !== ExitCode.SUCCESS;
}

/** Get the symbolic name of an exit code. */
export function getExitCodeName(code: ExitCode): string {
  return ExitCode[code] ?? 'UNKNOWN';
}
