/**
 * Custom Error Classes
 */

export type ErrorCode =
  | 'VALIDATION_ERROR'
  | 'INVALID_FRAGMENT'
  | 'MISSING_INPUT'
  | 'EXECUTABLE_NOT_FOUND'
  | 'PROCESS_START_FAILED'
  | 'PROCESS_EXITED_NONZERO'
  | 'STREAM_INTERRUPTED';

/**
 * Base error class for all ytp-forge errors
 */
export class YtpForgeError extends Error {
  public readonly code: ErrorCode;
  public readonly details?: Record<string, unknown>;

  constructor(
    message: string,
    code: ErrorCode,
    details?: Record<string, unknown>,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'YtpForgeError';
    this.code = code;
    this.details = details;

    // Maintains proper stack trace
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Validation error for invalid configuration or recipe input
 */
export class ValidationError extends YtpForgeError {
  constructor(field: string, message: string) {
    super(
      `Validation failed for ${field}: ${message}`,
      'VALIDATION_ERROR',
      { field, message }
    );
    this.name = 'ValidationError';
  }
}

/**
 * An effect fragment referenced an input it never declared
 */
export class InvalidFragmentError extends YtpForgeError {
  constructor(template: string, placeholder: string, inputCount: number) {
    super(
      `Fragment references ${placeholder} but declares ${inputCount} extra input(s)`,
      'INVALID_FRAGMENT',
      { template, placeholder, inputCount }
    );
    this.name = 'InvalidFragmentError';
  }
}

export type InputRole = 'primary' | 'extra';

export interface MissingInput {
  role: InputRole;
  path: string;
}

/**
 * One or more input files do not exist. Raised before anything is spawned.
 */
export class MissingInputError extends YtpForgeError {
  public readonly missing: MissingInput[];

  constructor(missing: MissingInput[]) {
    const lines = missing.map(
      (entry) => `${entry.role} input file not found: ${JSON.stringify(entry.path)}`
    );
    super(
      `Missing input files:\n${lines.join('\n')}`,
      'MISSING_INPUT',
      { missing }
    );
    this.name = 'MissingInputError';
    this.missing = missing;
  }
}

export class ExecutableNotFoundError extends YtpForgeError {
  public readonly executable: string;

  constructor(executable: string) {
    super(
      `Executable not found: ${executable}. Ensure it is installed and available on PATH.`,
      'EXECUTABLE_NOT_FOUND',
      { executable }
    );
    this.name = 'ExecutableNotFoundError';
    this.executable = executable;
  }
}

export class ProcessStartError extends YtpForgeError {
  constructor(executable: string, reason: string, cause?: unknown) {
    super(
      `Failed to start process ${executable}: ${reason}`,
      'PROCESS_START_FAILED',
      { executable, reason },
      { cause }
    );
    this.name = 'ProcessStartError';
  }
}

/**
 * External command finished with a nonzero status
 */
export class ProcessExitError extends YtpForgeError {
  public readonly exitCode: number;
  public readonly normalizedExitCode: number;

  constructor(
    command: string,
    exitCode: number,
    normalizedExitCode: number,
    signal: string | null = null
  ) {
    super(
      `Process exited with code ${exitCode} (interpreted as ${normalizedExitCode})`,
      'PROCESS_EXITED_NONZERO',
      { command, exitCode, normalizedExitCode, signal }
    );
    this.name = 'ProcessExitError';
    this.exitCode = exitCode;
    this.normalizedExitCode = normalizedExitCode;
  }
}

/**
 * Reading the process output failed; the child has already been killed
 */
export class StreamInterruptedError extends YtpForgeError {
  constructor(command: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(
      `Output stream interrupted: ${reason}`,
      'STREAM_INTERRUPTED',
      { command, reason },
      { cause }
    );
    this.name = 'StreamInterruptedError';
  }
}
