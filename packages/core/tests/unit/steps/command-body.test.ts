import { describe, expect, it } from 'vitest';
import { createCommandBody, renderCommand } from '../../../src/steps/command-body.js';
import { fakeContext } from '../../helpers/context.js';

describe('renderCommand', () => {
  it('fills parameters and builtin placeholders', () => {
    const { ctx } = fakeContext({ parameters: { node: 20 } });
    expect(renderCommand(['build', '--node={node}', '--out', '{cache}', '--env', '{env}'], ctx)).toEqual([
      'build',
      '--node=20',
      '--out',
      '/tmp/cache/test',
      '--env',
      '/tmp/envs/test',
    ]);
  });

  it('expands a standalone {args} word into separate arguments', () => {
    const { ctx } = fakeContext({ userArgs: ['--fix', 'src'] });
    expect(renderCommand(['eslint', '{args}', '.'], ctx)).toEqual(['eslint', '--fix', 'src', '.']);
  });

  it('joins user arguments inside a word', () => {
    const { ctx } = fakeContext({ userArgs: ['a', 'b'] });
    expect(renderCommand(['run', '--grep={args}'], ctx)).toEqual(['run', '--grep=a b']);
  });

  it('appends user arguments on request', () => {
    const { ctx } = fakeContext({ userArgs: ['-x'] });
    expect(renderCommand(['vitest', 'run'], ctx, true)).toEqual(['vitest', 'run', '-x']);
  });
});

describe('createCommandBody', () => {
  it('appends user arguments to the last run command only', async () => {
    const body = createCommandBody({
      run: [['echo', 'start'], ['vitest', 'run']],
      cwd: '/project',
    });
    const { ctx, commands } = fakeContext({ userArgs: ['-x'] });
    await body.run(ctx);
    expect(commands).toEqual([
      { command: ['echo', 'start'], cwd: '/project' },
      { command: ['vitest', 'run', '-x'], cwd: '/project' },
    ]);
  });

  it('does not append when a run command uses {args}', async () => {
    const body = createCommandBody({ run: [['eslint', '{args}'], ['echo', 'done']] });
    const { ctx, commands } = fakeContext({ userArgs: ['--fix'] });
    await body.run(ctx);
    expect(commands.map((c) => c.command)).toEqual([
      ['eslint', '--fix'],
      ['echo', 'done'],
    ]);
  });

  it('skips commands that render to nothing', async () => {
    const body = createCommandBody({ run: [['{args}']] });
    const { ctx, commands } = fakeContext();
    await body.run(ctx);
    expect(commands).toEqual([]);
  });

  it('runs setup commands without user arguments', async () => {
    const body = createCommandBody({ run: [], setup: [['npm', 'ci']] });
    const { ctx, commands } = fakeContext({ userArgs: ['-x'] });
    await body.setup?.(ctx);
    expect(commands.map((c) => c.command)).toEqual([['npm', 'ci']]);
  });
});
