import { describe, it, expect } from '@jest/globals';
import { CloneFailedError, CloneTimeoutError, CommandTimeoutError } from '../src/errors.js';
import { GitCloner } from '../src/source/git-cloner.js';
import { createFakeRunner } from './helpers/test-utils.js';

const REQUEST = {
  url: 'https://github.com/octo/widgets.git',
  destination: '/tmp/checkout',
  ref: 'main',
  token: 'test-secret',
  shallow: true,
};

describe('GitCloner', () => {
  it('builds a shallow single-branch clone with the token as userinfo', () => {
    expect(GitCloner.buildArgs(REQUEST)).toEqual([
      'clone',
      '--depth',
      '1',
      '--branch',
      'main',
      '--single-branch',
      'https://test-secret@github.com/octo/widgets.git',
      '/tmp/checkout',
    ]);
  });

  it('omits depth and branch flags when not requested', () => {
    expect(GitCloner.buildArgs({ url: REQUEST.url, destination: '/tmp/full', shallow: false })).toEqual([
      'clone',
      'https://github.com/octo/widgets.git',
      '/tmp/full',
    ]);
  });

  it('runs git with the configured timeout', async () => {
    const { runner, calls } = createFakeRunner(() => ({ exitCode: 0 }));
    const cloner = new GitCloner({ timeoutMs: 5000, runner });

    await cloner.clone(REQUEST);

    expect(calls).toHaveLength(1);
    expect(calls[0]?.command).toBe('git');
    expect(calls[0]?.options).toEqual({ timeoutMs: 5000 });
  });

  it('raises CloneFailedError on a non-zero exit without leaking the token', async () => {
    const { runner } = createFakeRunner(() => ({
      exitCode: 128,
      stderr: "fatal: could not read from 'https://test-secret@github.com/octo/widgets.git'",
    }));
    const cloner = new GitCloner({ timeoutMs: 5000, runner });

    const error = await cloner.clone(REQUEST).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(CloneFailedError);
    expect(error).toMatchObject({ exitCode: 128 });
    expect(String(error)).not.toContain('test-secret');
  });

  it('raises CloneTimeoutError when git exceeds the timeout', async () => {
    const { runner } = createFakeRunner(() => new CommandTimeoutError('git clone', 5000));
    const cloner = new GitCloner({ timeoutMs: 5000, runner });

    await expect(cloner.clone(REQUEST)).rejects.toBeInstanceOf(CloneTimeoutError);
  });
});
