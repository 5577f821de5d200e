import { describe, expect, it } from 'vitest';
import { defaultToolConfig } from '../config/index.js';
import { binstarUpload, buildUploadCommand, KEY_PLACEHOLDER } from '../upload/index.js';
import { ExecutionError, ValidationError } from '../runner/index.js';
import { catchError, createFakeRunner, failWith, messages, silentLogger } from './helpers.js';

const config = defaultToolConfig('/home/ci');
const binstar = '/home/ci/miniconda/bin/binstar';
const target = { key: 'test-secret', user: 'ci-user', channel: 'dev', artifactPath: '/out/pkg-1.0-0.tar.bz2' };

describe('buildUploadCommand', () => {
  it('forces the upload to the user and channel', () => {
    expect(buildUploadCommand(target, config)).toEqual([
      binstar, '-t', 'test-secret', 'upload', '--force', '-u', 'ci-user', '-c', 'dev', '/out/pkg-1.0-0.tar.bz2',
    ]);
  });
});

describe('binstarUpload', () => {
  it('runs the upload without echoing the command', () => {
    const fake = createFakeRunner();
    const log = silentLogger();
    binstarUpload(target, { config, runner: fake.runner, log });
    expect(fake.calls).toHaveLength(1);
    expect(fake.calls[0]?.verbose).toBe(false);
    expect(messages(log)).toEqual([]);
  });

  it('masks the key in a failed upload', () => {
    const raised: ExecutionError[] = [];
    const fake = createFakeRunner((command) => {
      const failure = failWith(command, 1, 'token test-secret rejected');
      raised.push(failure);
      return failure;
    });

    const err = catchError(() => binstarUpload(target, { config, runner: fake.runner }));

    expect(err).toBeInstanceOf(ExecutionError);
    if (!(err instanceof ExecutionError)) return;
    expect(err).not.toBe(raised[0]);
    expect(err.program).toBe(binstar);
    expect(err.args).toEqual([
      '-t', KEY_PLACEHOLDER, 'upload', '--force', '-u', 'ci-user', '-c', 'dev', '/out/pkg-1.0-0.tar.bz2',
    ]);
    expect(err.output).toBe('token BINSTAR_KEY rejected');
    expect(err.exitCode).toBe(1);
    expect(err.cause).toBeUndefined();

    const serialized = JSON.stringify({
      message: err.message,
      program: err.program,
      args: err.args,
      output: err.output,
      stack: err.stack,
    });
    expect(serialized).not.toContain('test-secret');
  });

  it('leaves the original error untouched', () => {
    const raised: ExecutionError[] = [];
    const fake = createFakeRunner((command) => {
      const failure = failWith(command, 1, 'token test-secret rejected');
      raised.push(failure);
      return failure;
    });

    catchError(() => binstarUpload(target, { config, runner: fake.runner }));

    expect(raised).toHaveLength(1);
    expect(raised[0]?.args[1]).toBe('test-secret');
    expect(raised[0]?.output).toBe('token test-secret rejected');
  });

  it.each([
    { field: 'key', message: 'binstar key is empty' },
    { field: 'user', message: 'binstar user is empty' },
    { field: 'artifactPath', message: 'artifact path is empty' },
  ])('refuses an empty $field before running anything', ({ field, message }) => {
    const fake = createFakeRunner();
    const err = catchError(() => binstarUpload({ ...target, [field]: '' }, { config, runner: fake.runner }));
    expect(err).toBeInstanceOf(ValidationError);
    expect(err).toHaveProperty('message', `Invalid upload target: ${message}`);
    expect(fake.calls).toHaveLength(0);
  });

  it('uploads to an empty channel', () => {
    const fake = createFakeRunner();
    binstarUpload({ ...target, channel: '' }, { config, runner: fake.runner });
    expect(fake.calls[0]?.command.slice(-2)).toEqual(['', '/out/pkg-1.0-0.tar.bz2']);
  });

  it('lets other errors through unchanged', () => {
    const boom = new RangeError('unexpected');
    const fake = createFakeRunner(() => {
      throw boom;
    });
    expect(catchError(() => binstarUpload(target, { config, runner: fake.runner }))).toBe(boom);
  });
});
