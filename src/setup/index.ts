/**
 * Environment provisioning: download and install Miniconda, bring conda
 * up to date, install the build/upload plugins and optionally register
 * an extra channel for dependencies.
 */

import type { Command, ToolConfig } from '../contracts/index.js';
import { condaBin } from '../config/index.js';
import { executeSequence, type CommandRunner, type StructuredLogger } from '../runner/index.js';

export interface SetupOptions {
  channel?: string;
  config: ToolConfig;
  runner?: CommandRunner;
  log?: StructuredLogger;
}

export function buildSetupCommands(url: string, channel: string | undefined, config: ToolConfig): Command[] {
  const conda = condaBin(config);
  const commands: Command[] = [
    ['wget', '-nv', url, '-O', config.installerFile],
    [config.python, config.installerFile, '-b', '-p', config.minicondaDir],
    [conda, 'update', '-q', '--yes', 'conda'],
    [conda, 'install', '-q', '--yes', ...config.plugins],
  ];
  if (channel !== undefined) {
    commands.push([conda, 'config', '--add', 'channels', channel]);
  }
  return commands;
}

export function setupMiniconda(url: string, opts: SetupOptions): void {
  const { channel, config, runner, log } = opts;
  log?.info('setup.start', `Setting up miniconda from URL ${url}`, { url });

  if (channel !== undefined) {
    log?.info('setup.channel', `(adding channel '${channel}' for dependencies)`, { channel });
  } else {
    log?.info('setup.channel', 'No channels have been configured (all dependencies have to be sourceable from anaconda)');
  }

  executeSequence(buildSetupCommands(url, channel, config), { runner, log });
}
