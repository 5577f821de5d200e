/**
 * Publishing a built package with the binstar client.
 */

import { UploadTargetSchema, type Command, type ToolConfig, type UploadTarget } from '../contracts/index.js';
import { binstarBin } from '../config/index.js';
import {
  ExecutionError,
  maskArg,
  maskSecret,
  runCommand,
  ValidationError,
  type CommandRunner,
  type StructuredLogger,
} from '../runner/index.js';

/** Stands in for the upload key in anything that outlives the call. */
export const KEY_PLACEHOLDER = 'BINSTAR_KEY';

/** Position of the key within the upload command's arguments. */
const KEY_ARG_INDEX = 1;

export interface PublishOptions {
  config: ToolConfig;
  runner?: CommandRunner;
  log?: StructuredLogger;
}

export function buildUploadCommand(target: UploadTarget, config: ToolConfig): Command {
  return [
    binstarBin(config),
    '-t', target.key,
    'upload', '--force',
    '-u', target.user,
    '-c', target.channel,
    target.artifactPath,
  ];
}

/**
 * Upload `target.artifactPath`, overwriting an existing file of the same
 * name. The command is never echoed. A failure is re-thrown as a new
 * ExecutionError with the key masked in its arguments and output.
 * An empty key, user or artifact path is a ValidationError and nothing runs.
 */
export function binstarUpload(target: UploadTarget, opts: PublishOptions): void {
  const { config, runner = runCommand, log } = opts;
  const checked = UploadTargetSchema.safeParse(target);
  if (!checked.success) {
    throw new ValidationError(`Invalid upload target: ${checked.error.errors.map((e) => e.message).join('; ')}`);
  }
  try {
    runner(buildUploadCommand(target, config), { verbose: false, log });
  } catch (err) {
    if (!(err instanceof ExecutionError)) throw err;
    throw err.with({
      args: maskArg(err.args, KEY_ARG_INDEX, KEY_PLACEHOLDER),
      output: maskSecret(err.output, target.key, KEY_PLACEHOLDER),
    });
  }
}
