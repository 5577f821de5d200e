/**
 * Build a recipe, then upload the package when credentials are given
 * and the CI state allows it.
 */

import type { CiState, ToolConfig } from '../contracts/index.js';
import { buildPackage, resolveBuildOutputPath } from '../build/index.js';
import type { CommandRunner, StructuredLogger } from '../runner/index.js';
import { canUpload, resolveChannel } from './gate.js';
import { binstarUpload } from './publisher.js';

export { canUpload, resolveChannel, RELEASE_CHANNEL } from './gate.js';
export { binstarUpload, buildUploadCommand, KEY_PLACEHOLDER } from './publisher.js';

export interface BuildAndUploadOptions {
  user?: string;
  key?: string;
  /** Called only once an upload is otherwise possible. */
  readCiState: () => CiState;
  config: ToolConfig;
  runner?: CommandRunner;
  log?: StructuredLogger;
}

export type BuildAndUploadResult =
  | { status: 'no-credentials' }
  | { status: 'ineligible' }
  | { status: 'published'; channel: string; artifactPath: string };

export function buildAndUpload(path: string | undefined, opts: BuildAndUploadOptions): BuildAndUploadResult {
  const { user, key, readCiState, config, runner, log } = opts;

  log?.info('build.start', `Building package at path ${path ?? ''}`, { path });
  buildPackage(path, { config, runner, log });

  if (key === undefined) log?.info('upload.no_key', 'No binstar key provided');
  if (user === undefined) log?.info('upload.no_user', 'No binstar user provided');
  if (user === undefined || key === undefined) {
    log?.info('upload.skipped', '-> Unable to upload to binstar');
    return { status: 'no-credentials' };
  }

  const ci = readCiState();
  if (!canUpload(ci, log)) {
    return { status: 'ineligible' };
  }

  const channel = resolveChannel(ci, log);
  log?.info('upload.start', `Uploading to ${user}/${channel}`, { user, channel });
  const artifactPath = resolveBuildOutputPath(path, { config, runner, log });
  binstarUpload({ key, user, channel, artifactPath }, { config, runner, log });

  return { status: 'published', channel, artifactPath };
}
