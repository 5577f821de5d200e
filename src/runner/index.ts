/**
 * Runner infrastructure — shared across all CLI commands.
 *
 * Re-exports the standard building blocks every command needs:
 * command execution, structured logging, error envelopes and redaction.
 */

// Execution
export {
  runCommand,
  formatCommand,
  type CommandRunner,
  type RunOptions,
} from './exec.js';

export {
  executeSequence,
  type SequenceOptions,
} from './sequence.js';

// Logger
export {
  createLogger,
  type StructuredLogger,
  type LoggerOptions,
  type LogEntry,
  type LogLevel,
  type LineWriter,
} from './logger.js';

// Errors
export {
  ExecutionError,
  ValidationError,
  ConfigError,
  createErrorEnvelope,
  wrapError,
  exitCodeFor,
  EXIT_SUCCESS,
  EXIT_VALIDATION,
  EXIT_DEPENDENCY,
  EXIT_BUG,
  type ExecutionErrorDetails,
  type RunnerErrorEnvelope,
  type ErrorCode,
} from './errors.js';

// Redaction
export {
  redact,
  redactRecord,
  redactString,
  maskSecret,
  maskArg,
  REDACT_DENYLIST_KEYS,
} from './redact.js';
