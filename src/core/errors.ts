/**
 * stacksmith error type and step result shape.
 *
 * Lower layers never terminate the process: they return a failed StepResult
 * and the CLI layer renders the error and sets the exit status.
 */

import { ExitCode, getExitCodeName } from '../types/exit-codes.js';

/** Fatal condition categories. */
export type StackErrorKind = 'TOOL_MISSING' | 'COMMAND_FAILED' | 'WRITE_FAILED';

/** Exit code used for each error kind. */
const EXIT_CODES: Record<StackErrorKind, ExitCode> = {
  TOOL_MISSING: ExitCode.GENERAL_ERROR,
  COMMAND_FAILED: ExitCode.GENERAL_ERROR,
  WRITE_FAILED: ExitCode.GENERAL_ERROR,
};

/**
 * Structured error for setup operations.
 * Carries the failure kind, a human-readable message and an optional fix hint.
 */
export class StackError extends Error {
  readonly kind: StackErrorKind;
  readonly fix?: string;
  /** Process exit status, set only for COMMAND_FAILED. */
  readonly commandExitCode?: number;

  constructor(
    kind: StackErrorKind,
    message: string,
    options?: {
      fix?: string;
      commandExitCode?: number;
      cause?: unknown;
    },
  ) {
    super(message, { cause: options?.cause });
    this.name = 'StackError';
    this.kind = kind;
    this.fix = options?.fix;
    this.commandExitCode = options?.commandExitCode;
  }

  get exitCode(): ExitCode {
    return EXIT_CODES[this.kind];
  }

  toJSON(): Record<string, unknown> {
    return {
      success: false,
      error: {
        kind: this.kind,
        code: this.exitCode,
        name: getExitCodeName(this.exitCode),
        message: this.message,
        ...(this.fix && { fix: this.fix }),
        ...(this.commandExitCode !== undefined && { commandExitCode: this.commandExitCode }),
      },
    };
  }
}

/** Result of a fallible setup step. */
export type StepResult<T> =
  | { success: true; data: T }
  | { success: false; error: StackError };

export function ok<T>(data: T): StepResult<T> {
  return { success: true, data };
}

export function fail<T = never>(error: StackError): StepResult<T> {
  return { success: false, error };
}

/** Extract a message from an unknown thrown value. */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** Read the `code` of a Node.js system error, if any. */
export function errnoCode(err: unknown): string | undefined {
  if (err instanceof Error && 'code' in err && typeof err.code === 'string') {
    return err.code;
  }
  return undefined;
}
