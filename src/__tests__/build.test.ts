import { describe, expect, it } from 'vitest';
import { defaultToolConfig } from '../config/index.js';
import { buildPackage, resolveBuildOutputPath } from '../build/index.js';
import { ExecutionError, ValidationError } from '../runner/index.js';
import { createFakeRunner, failWith, silentLogger } from './helpers.js';

const config = defaultToolConfig('/home/ci');
const conda = '/home/ci/miniconda/bin/conda';

describe('buildPackage', () => {
  it('runs conda build quietly on the recipe', () => {
    const fake = createFakeRunner();
    buildPackage('/pkg', { config, runner: fake.runner, log: silentLogger() });
    expect(fake.calls).toEqual([{ command: [conda, 'build', '-q', '/pkg'], verbose: true }]);
  });

  it('leaves the recipe out when no path is given', () => {
    const fake = createFakeRunner();
    buildPackage(undefined, { config, runner: fake.runner });
    expect(fake.calls[0]?.command).toEqual([conda, 'build', '-q']);
  });

  it('surfaces build failures as ExecutionError', () => {
    const fake = createFakeRunner((command) => failWith(command, 1, 'missing meta.yaml'));
    expect(() => buildPackage('/pkg', { config, runner: fake.runner, log: silentLogger() })).toThrow(ExecutionError);
  });
});

describe('resolveBuildOutputPath', () => {
  it('asks conda build for the output path without echoing', () => {
    const fake = createFakeRunner(() => '/home/ci/miniconda/conda-bld/linux-64/pkg-1.0-0.tar.bz2\n');
    const path = resolveBuildOutputPath('/pkg', { config, runner: fake.runner });
    expect(path).toBe('/home/ci/miniconda/conda-bld/linux-64/pkg-1.0-0.tar.bz2');
    expect(fake.calls).toEqual([{ command: [conda, 'build', '--output', '/pkg'], verbose: false }]);
  });

  it('takes the last non-empty line when warnings come first', () => {
    const fake = createFakeRunner(() => 'WARNING: old numpy pin\r\n/out/pkg-2.0-0.tar.bz2\r\n\r\n');
    expect(resolveBuildOutputPath('/pkg', { config, runner: fake.runner })).toBe('/out/pkg-2.0-0.tar.bz2');
  });

  it('rejects an empty answer', () => {
    const fake = createFakeRunner(() => '\n  \n');
    expect(() => resolveBuildOutputPath('/pkg', { config, runner: fake.runner })).toThrow(ValidationError);
  });
});
