import { describe, expect, it } from 'vitest';
import { collect, prepareArgv, splitNames, splitUserArgs, tokenizeAddopts } from '../src/args.js';

describe('splitUserArgs', () => {
  it('splits at the first separator', () => {
    expect(splitUserArgs(['-j', '2', 'test', '--', '-x', '--', 'y'])).toEqual({
      args: ['-j', '2', 'test'],
      userArgs: ['-x', '--', 'y'],
    });
  });

  it('has no user arguments without a separator', () => {
    expect(splitUserArgs(['--list'])).toEqual({ args: ['--list'], userArgs: [] });
  });
});

describe('prepareArgv', () => {
  it('puts the extra options before the literal arguments', () => {
    expect(prepareArgv(['-j', '4', '--', '-k', 'slow'], '--fail-fast -j 2')).toEqual({
      args: ['--fail-fast', '-j', '2', '-j', '4'],
      userArgs: ['-k', 'slow'],
    });
  });

  it('respects quotes in the extra options', () => {
    expect(tokenizeAddopts(`--cache-dir "/tmp/my cache"`)).toEqual(['--cache-dir', '/tmp/my cache']);
    expect(tokenizeAddopts('   ')).toEqual([]);
    expect(tokenizeAddopts(undefined)).toEqual([]);
  });
});

describe('splitNames', () => {
  it('flattens comma separated values', () => {
    expect(splitNames(['lint, test', 'build', ' ,'])).toEqual(['lint', 'test', 'build']);
  });

  it('collects repeated options', () => {
    expect(collect('b', collect('a', []))).toEqual(['a', 'b']);
  });
});
