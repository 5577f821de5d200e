/**
 * Structured JSON-lines logger for CLI commands.
 *
 * Every entry is kept in memory, optionally appended to a log file and
 * mirrored to the console: a plain message line by default, or the JSON
 * line itself in `json` mode. Entry data is redacted before it is stored.
 */

import { appendFileSync, mkdirSync } from 'fs';
import { dirname } from 'path';
import { redactRecord } from './redact.js';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'fatal';

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  module: string;
  action: string;
  message: string;
  data?: Record<string, unknown>;
}

export interface StructuredLogger {
  debug(action: string, message: string, data?: Record<string, unknown>): void;
  info(action: string, message: string, data?: Record<string, unknown>): void;
  warn(action: string, message: string, data?: Record<string, unknown>): void;
  error(action: string, message: string, data?: Record<string, unknown>): void;
  fatal(action: string, message: string, data?: Record<string, unknown>): void;
  flush(): void;
  /** Return all entries collected so far. */
  entries(): readonly LogEntry[];
}

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  fatal: 4,
};

export type LineWriter = (line: string) => void;

export interface LoggerOptions {
  module: string;
  filePath?: string;
  minLevel?: LogLevel;
  /** Mirror JSON lines to stderr instead of plain messages. */
  json?: boolean;
  /** Mirror entries to the console at all. Defaults to true. */
  echo?: boolean;
  stdout?: LineWriter;
  stderr?: LineWriter;
}

const writeStdout: LineWriter = (line) => {
  process.stdout.write(line + '\n');
};

const writeStderr: LineWriter = (line) => {
  process.stderr.write(line + '\n');
};

export function createLogger(opts: LoggerOptions): StructuredLogger {
  const buffer: LogEntry[] = [];
  const minPriority = LEVEL_PRIORITY[opts.minLevel ?? 'info'];
  const stdout = opts.stdout ?? writeStdout;
  const stderr = opts.stderr ?? writeStderr;
  const echo = opts.echo ?? true;

  function shouldLog(level: LogLevel): boolean {
    return LEVEL_PRIORITY[level] >= minPriority;
  }

  function emit(level: LogLevel, action: string, message: string, data?: Record<string, unknown>): void {
    if (!shouldLog(level)) return;

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      module: opts.module,
      action,
      message,
      ...(data && { data: redactRecord(data) }),
    };

    buffer.push(entry);

    const line = JSON.stringify(entry);

    if (opts.filePath) {
      mkdirSync(dirname(opts.filePath), { recursive: true });
      appendFileSync(opts.filePath, line + '\n', 'utf-8');
    }

    if (opts.json) {
      stderr(line);
    } else if (echo || level === 'error' || level === 'fatal') {
      (LEVEL_PRIORITY[level] >= LEVEL_PRIORITY.error ? stderr : stdout)(message);
    }
  }

  return {
    debug: (action, message, data) => emit('debug', action, message, data),
    info: (action, message, data) => emit('info', action, message, data),
    warn: (action, message, data) => emit('warn', action, message, data),
    error: (action, message, data) => emit('error', action, message, data),
    fatal: (action, message, data) => emit('fatal', action, message, data),
    flush: (): void => { /* sync writes, nothing to flush */ },
    entries: (): readonly LogEntry[] => buffer,
  };
}
