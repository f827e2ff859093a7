/**
 * Error classes for run-fatal failures.
 *
 * Per-citation and per-file problems are not thrown; they are collected as
 * LinkerIssue records and surfaced in the end-of-run report. Only the
 * errors below stop a run (or, for TransientIoError, a single retry loop).
 */

export type LinkerErrorCode =
  | 'SOURCE_UNREADABLE'
  | 'SANITIZATION_CONFLICT'
  | 'SANITIZATION_FAILED'
  | 'CONFIG_INVALID'
  | 'TRANSIENT_IO_FAILURE'
  | 'PDF_UNREADABLE';

export interface ErrorDetail {
  field?: string;
  path?: string;
  message: string;
}

export interface SerializedLinkerError {
  code: LinkerErrorCode;
  message: string;
  details?: ErrorDetail[];
}

export class LinkerError extends Error {
  constructor(
    public readonly code: LinkerErrorCode,
    message: string,
    public readonly details?: ErrorDetail[],
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = this.constructor.name;
    Object.setPrototypeOf(this, new.target.prototype);
  }

  toJSON(): SerializedLinkerError {
    return {
      code: this.code,
      message: this.message,
      ...(this.details && { details: this.details }),
    };
  }
}

/**
 * The source document could not be opened or read at all
 */
export class SourceUnreadableError extends LinkerError {
  constructor(path: string, cause?: unknown) {
    super('SOURCE_UNREADABLE', `Cannot read source document: ${path}`, [{ path, message: describeError(cause) }], { cause });
  }
}

/**
 * Two referenced files would be renamed to the same name, or a target name is taken.
 * Raised before any file is renamed.
 */
export class SanitizationConflictError extends LinkerError {
  constructor(public readonly conflicts: ErrorDetail[]) {
    super('SANITIZATION_CONFLICT', `Filename sanitization aborted: ${conflicts.length} conflicting name(s)`, conflicts);
  }
}

/**
 * A rename kept failing. Completed renames were rolled back; stranded lists
 * the ones that could not be undone and are still under their new names.
 */
export class SanitizationFailedError extends LinkerError {
  constructor(cause: unknown, public readonly stranded: ReadonlyArray<{ from: string; to: string }>) {
    super(
      'SANITIZATION_FAILED',
      stranded.length === 0
        ? 'Filename sanitization failed; all renames were rolled back'
        : `Filename sanitization failed; ${stranded.length} rename(s) could not be rolled back`,
      [
        { message: describeError(cause) },
        ...stranded.map((step) => ({ path: step.to, message: `could not restore ${step.from}` })),
      ],
      { cause }
    );
  }
}

export class ConfigValidationError extends LinkerError {
  constructor(details: ErrorDetail[]) {
    super('CONFIG_INVALID', 'Invalid linker configuration', details);
  }

  static fromZodError(error: { issues: Array<{ path: (string | number)[]; message: string }> }): ConfigValidationError {
    return new ConfigValidationError(
      error.issues.map((issue) => ({ field: issue.path.join('.'), message: issue.message }))
    );
  }
}

/**
 * A read kept failing with a transient error after every retry
 */
export class TransientIoError extends LinkerError {
  constructor(path: string, public readonly attempts: number, cause?: unknown) {
    super('TRANSIENT_IO_FAILURE', `Gave up on ${path} after ${attempts} attempt(s)`, [{ path, message: describeError(cause) }], { cause });
  }
}

export class PdfUnreadableError extends LinkerError {
  constructor(path: string, cause?: unknown) {
    super('PDF_UNREADABLE', `Cannot read PDF: ${path}`, [{ path, message: describeError(cause) }], { cause });
  }
}

export function isLinkerError(error: unknown): error is LinkerError {
  return error instanceof LinkerError;
}

export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  return error === undefined ? 'unknown error' : String(error);
}
