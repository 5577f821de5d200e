/**
 * Error classes and the shared error envelope for every CLI command.
 *
 * External work only ever fails with an ExecutionError. Bad input and a
 * broken environment fail before any command is spawned.
 */

import { redactString } from './redact.js';

// ---- Exit codes -------------------------------------------------------
export const EXIT_SUCCESS = 0;
export const EXIT_VALIDATION = 2;
export const EXIT_DEPENDENCY = 3;
export const EXIT_BUG = 4;

// ---- Error classes ----------------------------------------------------

export interface ExecutionErrorDetails {
  program: string;
  args: readonly string[];
  /** `null` when the process never started or was killed by a signal. */
  exitCode: number | null;
  output: string;
}

/**
 * An external command exited non-zero (or could not run at all).
 * Instances are never mutated; build a new one to change a field.
 */
export class ExecutionError extends Error {
  readonly program: string;
  readonly args: readonly string[];
  readonly exitCode: number | null;
  readonly output: string;

  constructor(details: ExecutionErrorDetails) {
    const status = details.exitCode === null ? 'did not exit normally' : `returned non-zero exit status ${details.exitCode}`;
    super(`Command '${[details.program, ...details.args].join(' ')}' ${status}`);
    this.name = 'ExecutionError';
    this.program = details.program;
    this.args = Object.freeze([...details.args]);
    this.exitCode = details.exitCode;
    this.output = details.output;
  }

  get command(): readonly string[] {
    return [this.program, ...this.args];
  }

  /** Copy of this error with some fields replaced. */
  with(changes: Partial<ExecutionErrorDetails>): ExecutionError {
    return new ExecutionError({
      program: changes.program ?? this.program,
      args: changes.args ?? this.args,
      exitCode: changes.exitCode !== undefined ? changes.exitCode : this.exitCode,
      output: changes.output ?? this.output,
    });
  }
}

export class ValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ValidationError';
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

// ---- Error envelope ---------------------------------------------------

export interface RunnerErrorEnvelope {
  code: ErrorCode;
  message: string;
  userMessage: string;
  retryable: boolean;
  cause?: string;
  context?: Record<string, unknown>;
}

export type ErrorCode =
  | 'VALIDATION_ERROR'
  | 'CONFIG_ERROR'
  | 'EXECUTION_ERROR'
  | 'INTERNAL_ERROR';

const CODE_TO_EXIT: Record<ErrorCode, number> = {
  VALIDATION_ERROR: EXIT_VALIDATION,
  CONFIG_ERROR: EXIT_VALIDATION,
  EXECUTION_ERROR: EXIT_DEPENDENCY,
  INTERNAL_ERROR: EXIT_BUG,
};

export function exitCodeFor(code: ErrorCode): number {
  return CODE_TO_EXIT[code];
}

export function createErrorEnvelope(
  code: ErrorCode,
  message: string,
  opts: { cause?: unknown; context?: Record<string, unknown> } = {},
): RunnerErrorEnvelope {
  const causeMsg = opts.cause instanceof Error
    ? opts.cause.stack ?? opts.cause.message
    : opts.cause != null
      ? String(opts.cause)
      : undefined;

  return {
    code,
    message,
    userMessage: redactString(message),
    // Nothing is retried automatically; CI re-triggers are manual.
    retryable: false,
    cause: causeMsg ? redactString(causeMsg) : undefined,
    context: opts.context,
  };
}

/**
 * Wrap an unknown thrown value into a RunnerErrorEnvelope.
 */
export function wrapError(err: unknown): RunnerErrorEnvelope {
  if (err instanceof ExecutionError) {
    return createErrorEnvelope('EXECUTION_ERROR', err.message, {
      cause: err,
      context: { program: err.program, args: err.args, exit_code: err.exitCode },
    });
  }
  if (err instanceof ValidationError) {
    return createErrorEnvelope('VALIDATION_ERROR', err.message, { cause: err });
  }
  if (err instanceof ConfigError) {
    return createErrorEnvelope('CONFIG_ERROR', err.message, { cause: err });
  }
  if (err instanceof Error) {
    return createErrorEnvelope('INTERNAL_ERROR', err.message, { cause: err });
  }
  return createErrorEnvelope('INTERNAL_ERROR', String(err));
}
