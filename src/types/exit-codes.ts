/**
 * stacksmith exit codes.
 * Every fatal condition exits with GENERAL_ERROR; the error kind carries the detail.
 */

export enum ExitCode {
  SUCCESS = 0,
  GENERAL_ERROR = 1,
}

/** Get the symbolic name for an exit code. */
export function getExitCodeName(code: ExitCode): string {
  return ExitCode[code] ?? 'UNKNOWN';
}

