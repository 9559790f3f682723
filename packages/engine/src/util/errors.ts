/**
 * Error types raised by the engine.
 *
 * Every validation failure is raised before any field of the addressed part
 * is written. Export failures abort the export; pattern files written before
 * the failure are left on disk.
 */

export type SyroErrorCode =
  | 'INVALID_SELECTOR'
  | 'UNKNOWN_PARAMETER'
  | 'UNKNOWN_FUNCTION'
  | 'OUT_OF_RANGE'
  | 'MALFORMED_MOTION_INPUT'
  | 'MISSING_ARGUMENT'
  | 'IO_FAILURE'
  | 'UNSUPPORTED_PLATFORM'
  | 'ENCODER_FAILED'
  | 'SCRIPT_ERROR'
  | 'LAYOUT_ERROR';

export class SyroError extends Error {
  readonly code: SyroErrorCode;

  constructor(code: SyroErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** Pattern, part or step number outside [1,10] / [1,16]. */
export class InvalidSelectorError extends SyroError {
  constructor(message: string) {
    super('INVALID_SELECTOR', message);
  }
}

export class UnknownParameterError extends SyroError {
  constructor(readonly param: string) {
    super('UNKNOWN_PARAMETER', `unrecognised parameter name '${param}'`);
  }
}

export class UnknownFunctionError extends SyroError {
  constructor(readonly func: string) {
    super('UNKNOWN_FUNCTION', `unrecognised function name '${func}'`);
  }
}

export class OutOfRangeError extends SyroError {
  constructor(message: string) {
    super('OUT_OF_RANGE', message);
  }
}

export class MalformedMotionInputError extends SyroError {
  constructor(message: string) {
    super('MALFORMED_MOTION_INPUT', message);
  }
}

/** A setter called with nothing to set. */
export class MissingArgumentError extends SyroError {
  constructor(message: string) {
    super('MISSING_ARGUMENT', message);
  }
}

export class IOFailureError extends SyroError {
  constructor(readonly path: string, cause: unknown) {
    super('IO_FAILURE', `failed to write '${path}': ${describeCause(cause)}`, { cause });
  }
}

export class UnsupportedPlatformError extends SyroError {
  constructor(message: string) {
    super('UNSUPPORTED_PLATFORM', message);
  }
}

export class EncoderFailedError extends SyroError {
  constructor(readonly exitCode: number | null, message: string) {
    super('ENCODER_FAILED', message);
  }
}

/** A script statement failed; `line` and `column` are 1-based. */
export class ScriptError extends SyroError {
  constructor(message: string, readonly line: number, readonly column: number, options?: { cause?: unknown }) {
    super('SCRIPT_ERROR', message, options);
  }
}

/** Broken in-memory state or a malformed binary file. Not recoverable. */
export class LayoutError extends SyroError {
  constructor(message: string) {
    super('LAYOUT_ERROR', message);
  }
}

export function describeCause(cause: unknown): string {
  if (cause instanceof Error) return cause.message;
  return String(cause);
}
