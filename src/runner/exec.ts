/**
 * Synchronous external command execution.
 *
 * The child's stdout and stderr share one file description, so the
 * captured output keeps the order the process wrote it in.
 */

import { spawnSync, type SpawnSyncReturns } from 'child_process';
import { closeSync, mkdtempSync, openSync, readFileSync, rmSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { CommandSchema, type Command } from '../contracts/index.js';
import { ExecutionError, ValidationError } from './errors.js';
import type { StructuredLogger } from './logger.js';

export interface RunOptions {
  verbose?: boolean;
  log?: StructuredLogger;
}

/** Runs one command and returns its combined output. */
export type CommandRunner = (command: Command, opts?: RunOptions) => string;

export function formatCommand(command: readonly string[]): string {
  return command.join(' ');
}

function spawnInto(fd: number, program: string, args: string[]): SpawnSyncReturns<Buffer> {
  try {
    return spawnSync(program, args, { stdio: ['ignore', fd, fd] });
  } finally {
    closeSync(fd);
  }
}

interface CapturedRun {
  status: number | null;
  signal: NodeJS.Signals | null;
  output: string;
  error?: Error;
}

function captureCombinedOutput(program: string, args: string[]): CapturedRun {
  const dir = mkdtempSync(join(tmpdir(), 'condaci-'));
  try {
    const outPath = join(dir, 'output.log');
    const result = spawnInto(openSync(outPath, 'w+'), program, args);
    return {
      status: result.status,
      signal: result.signal,
      output: readFileSync(outPath, 'utf-8'),
      ...(result.error && { error: result.error }),
    };
  } finally {
    rmSync(dir, { recursive: true, force: true });
  }
}

export const runCommand: CommandRunner = (command, opts = {}) => {
  const parsed = CommandSchema.safeParse(command);
  if (!parsed.success) {
    throw new ValidationError('A command needs at least a program name');
  }
  const [program, ...args] = parsed.data;
  const { verbose = false, log } = opts;

  if (verbose) {
    log?.info('exec.command', `> ${formatCommand(parsed.data)}`, { program, args });
  }

  const { status, signal, output, error } = captureCombinedOutput(program, args);

  if (error) {
    throw new ExecutionError({ program, args, exitCode: null, output: output + error.message });
  }
  if (status === null) {
    throw new ExecutionError({ program, args, exitCode: null, output: `${output}terminated by signal ${signal ?? 'unknown'}` });
  }
  if (status !== 0) {
    throw new ExecutionError({ program, args, exitCode: status, output });
  }

  // Failed output is reported once, by whoever catches the error.
  if (verbose) {
    log?.info('exec.output', output);
  }
  return output;
};
