/**
 * Tool configuration
 *
 * Where Miniconda lives and how it is installed. Defaults match a
 * Travis CI agent; each can be overridden from the environment.
 */

import { homedir } from 'os';
import { join } from 'path';
import { ToolConfigSchema, type ToolConfig } from '../contracts/index.js';
import { ConfigError } from '../runner/index.js';

export const DEFAULT_INSTALLER_FILE = 'miniconda.sh';
export const DEFAULT_PYTHON = 'python';
export const DEFAULT_PLUGINS: ToolConfig['plugins'] = ['conda-build', 'jinja2', 'binstar'];

export function defaultToolConfig(home: string = homedir()): ToolConfig {
  return {
    minicondaDir: join(home, 'miniconda'),
    installerFile: DEFAULT_INSTALLER_FILE,
    python: DEFAULT_PYTHON,
    plugins: DEFAULT_PLUGINS,
  };
}

/**
 * Build the config from defaults plus `CONDACI_*` overrides.
 * An override set to the empty string is rejected.
 */
export function loadToolConfig(
  env: NodeJS.ProcessEnv = process.env,
  home: string = homedir(),
): ToolConfig {
  const defaults = defaultToolConfig(home);
  const parsed = ToolConfigSchema.safeParse({
    minicondaDir: env.CONDACI_MINICONDA_DIR ?? defaults.minicondaDir,
    installerFile: env.CONDACI_INSTALLER_FILE ?? defaults.installerFile,
    python: env.CONDACI_PYTHON ?? defaults.python,
    plugins: defaults.plugins,
  });

  if (!parsed.success) {
    const fields = parsed.error.errors.map((e) => e.path.join('.')).join(', ');
    throw new ConfigError(`Invalid tool configuration: ${fields}`);
  }
  return parsed.data;
}

export function condaBin(config: ToolConfig): string {
  return join(config.minicondaDir, 'bin', 'conda');
}

export function binstarBin(config: ToolConfig): string {
  return join(config.minicondaDir, 'bin', 'binstar');
}
