/**
 * conda-build invocations: building a recipe and asking where its
 * package ends up.
 */

import type { ToolConfig } from '../contracts/index.js';
import { condaBin } from '../config/index.js';
import {
  executeSequence,
  runCommand,
  ValidationError,
  type CommandRunner,
  type StructuredLogger,
} from '../runner/index.js';

export interface BuildOptions {
  config: ToolConfig;
  runner?: CommandRunner;
  log?: StructuredLogger;
}

/** Without a path, conda-build itself reports the missing recipe. */
function recipeArgs(path: string | undefined): string[] {
  return path === undefined ? [] : [path];
}

export function buildPackage(path: string | undefined, opts: BuildOptions): void {
  const { config, runner, log } = opts;
  executeSequence([[condaBin(config), 'build', '-q', ...recipeArgs(path)]], { runner, log });
}

/**
 * Path of the package file `conda build` produces for the recipe at
 * `path`. conda-build may print warnings first; the path is the last line.
 */
export function resolveBuildOutputPath(path: string | undefined, opts: BuildOptions): string {
  const { config, runner = runCommand, log } = opts;
  const output = runner([condaBin(config), 'build', '--output', ...recipeArgs(path)], { verbose: false, log });
  const lines = output.split(/\r?\n/).map((line) => line.trim()).filter((line) => line !== '');
  const artifactPath = lines.at(-1);
  if (artifactPath === undefined) {
    throw new ValidationError(`conda build --output reported no package path for ${path ?? '(no recipe path)'}`);
  }
  return artifactPath;
}
