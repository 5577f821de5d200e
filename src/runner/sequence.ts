import type { Command } from '../contracts/index.js';
import { ExecutionError } from './errors.js';
import { runCommand, type CommandRunner } from './exec.js';
import type { StructuredLogger } from './logger.js';

export interface SequenceOptions {
  verbose?: boolean;
  runner?: CommandRunner;
  log?: StructuredLogger;
}

/**
 * Run commands one after another, stopping at the first failure.
 *
 * The failing command's output is logged and the same error re-thrown.
 * Commands that already ran are not undone.
 */
export function executeSequence(commands: readonly Command[], opts: SequenceOptions = {}): string[] {
  const { verbose = true, runner = runCommand, log } = opts;
  const outputs: string[] = [];

  try {
    for (const command of commands) {
      outputs.push(runner(command, { verbose, log }));
    }
  } catch (err) {
    if (err instanceof ExecutionError) {
      log?.error('sequence.failed', ` -> ${err.output}`, { program: err.program, exit_code: err.exitCode });
    }
    throw err;
  }

  return outputs;
}
