import type { Command } from '../contracts/index.js';
import {
  ExecutionError,
  createLogger,
  type CommandRunner,
  type StructuredLogger,
} from '../runner/index.js';

export interface RecordedCall {
  command: readonly string[];
  verbose: boolean;
}

export interface FakeRunner {
  runner: CommandRunner;
  calls: RecordedCall[];
  programs(): string[];
}

/**
 * In-process stand-in for the command runner. `respond` returns the
 * command's output, or an ExecutionError to throw.
 */
export function createFakeRunner(
  respond: (command: Command) => string | ExecutionError = () => '',
): FakeRunner {
  const calls: RecordedCall[] = [];
  const runner: CommandRunner = (command, opts = {}) => {
    calls.push({ command: [...command], verbose: opts.verbose ?? false });
    const result = respond(command);
    if (result instanceof ExecutionError) throw result;
    return result;
  };
  return {
    runner,
    calls,
    programs: () => calls.map((c) => c.command.join(' ')),
  };
}

export function failWith(command: Command, exitCode: number, output: string): ExecutionError {
  const [program, ...args] = command;
  return new ExecutionError({ program, args, exitCode, output });
}

export function silentLogger(): StructuredLogger {
  return createLogger({ module: 'condaci-test', echo: false, stderr: () => undefined });
}

export function messages(log: StructuredLogger): string[] {
  return log.entries().map((e) => e.message);
}

export function catchError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  throw new Error('expected the call to throw');
}
