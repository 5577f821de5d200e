import { describe, expect, it } from 'vitest';
import {
  binstarBin,
  condaBin,
  defaultToolConfig,
  loadToolConfig,
} from '../config/index.js';
import { readCiState } from '../ci/index.js';
import { CommandSchema } from '../contracts/index.js';
import { ConfigError } from '../runner/index.js';

describe('Tool configuration', () => {
  it('defaults to Miniconda in the home directory', () => {
    expect(defaultToolConfig('/home/ci')).toEqual({
      minicondaDir: '/home/ci/miniconda',
      installerFile: 'miniconda.sh',
      python: 'python',
      plugins: ['conda-build', 'jinja2', 'binstar'],
    });
  });

  it('derives the conda and binstar binaries', () => {
    const config = defaultToolConfig('/home/ci');
    expect(condaBin(config)).toBe('/home/ci/miniconda/bin/conda');
    expect(binstarBin(config)).toBe('/home/ci/miniconda/bin/binstar');
  });

  it('applies environment overrides', () => {
    const config = loadToolConfig(
      { CONDACI_MINICONDA_DIR: '/opt/conda', CONDACI_INSTALLER_FILE: 'mc.sh', CONDACI_PYTHON: 'python3' },
      '/home/ci',
    );
    expect(config.minicondaDir).toBe('/opt/conda');
    expect(config.installerFile).toBe('mc.sh');
    expect(config.python).toBe('python3');
  });

  it('falls back to defaults for unset variables', () => {
    expect(loadToolConfig({}, '/home/ci')).toEqual(defaultToolConfig('/home/ci'));
  });

  it('rejects an empty override', () => {
    expect(() => loadToolConfig({ CONDACI_PYTHON: '' }, '/home/ci')).toThrow(ConfigError);
    expect(() => loadToolConfig({ CONDACI_PYTHON: '' }, '/home/ci')).toThrow('Invalid tool configuration: python');
  });
});

describe('readCiState', () => {
  it('reads the pull-request flag, branch and tag', () => {
    const env = { TRAVIS_PULL_REQUEST: 'false', TRAVIS_BRANCH: 'master', TRAVIS_TAG: '' };
    expect(readCiState(env)).toEqual({ pullRequest: 'false', branch: 'master', tag: '' });
  });

  it('keeps values as opaque strings', () => {
    const env = { TRAVIS_PULL_REQUEST: '17', TRAVIS_BRANCH: ' spaced ', TRAVIS_TAG: 'v1' };
    expect(readCiState(env)).toEqual({ pullRequest: '17', branch: ' spaced ', tag: 'v1' });
  });

  it('names every missing variable', () => {
    expect(() => readCiState({ TRAVIS_PULL_REQUEST: 'false' })).toThrow(ConfigError);
    expect(() => readCiState({ TRAVIS_PULL_REQUEST: 'false' })).toThrow(
      'TRAVIS_BRANCH is not set; TRAVIS_TAG is not set',
    );
  });
});

describe('CommandSchema', () => {
  it('requires a program name', () => {
    expect(CommandSchema.safeParse([]).success).toBe(false);
    expect(CommandSchema.safeParse(['conda']).success).toBe(true);
  });
});
