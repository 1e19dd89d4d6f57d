import { describe, it, expect } from 'vitest';

import { isAnonymousScope, toSourceLabel } from './source-label.js';

describe('toSourceLabel', () => {
  it('turns a project file and function into a dotted label', () => {
    expect(toSourceLabel('/repo/src/commands/run.ts', 'RunCommand.execute', '/repo')).toBe(
      'src.commands.run.RunCommand.execute',
    );
  });

  it('leaves out module-level and anonymous scopes', () => {
    expect(toSourceLabel('/repo/src/index.ts', undefined, '/repo')).toBe('src.index');
    expect(toSourceLabel('/repo/src/index.ts', 'Object.<anonymous>', '/repo')).toBe('src.index');
    expect(toSourceLabel('/repo/src/index.ts', '<anonymous>', '/repo')).toBe('src.index');
    expect(toSourceLabel('/repo/src/index.ts', '<module>', '/repo')).toBe('src.index');
  });

  it('labels installed code from its package directory', () => {
    expect(
      toSourceLabel(
        '/usr/local/lib/node_modules/xacker/dist/commands/run.js',
        'RunCommand.execute',
        '/home/dev',
      ),
    ).toBe('xacker.dist.commands.run.RunCommand.execute');
  });

  it('accepts file URLs', () => {
    expect(toSourceLabel('file:///repo/src/cli.ts', 'createProgram', '/repo')).toBe(
      'src.cli.createProgram',
    );
  });

  it('handles Windows paths', () => {
    expect(toSourceLabel('C:\\repo\\src\\cli.ts', 'main', 'C:\\repo')).toBe('src.cli.main');
  });

  it('keeps the full path for files outside the working directory', () => {
    expect(toSourceLabel('/opt/tools/build.mjs', 'main', '/repo')).toBe('opt.tools.build.main');
  });

  it('returns "shell" when there is no real module', () => {
    expect(toSourceLabel(undefined)).toBe('shell');
    expect(toSourceLabel('[eval]', 'x')).toBe('shell');
    expect(toSourceLabel('REPL3')).toBe('shell');
    expect(toSourceLabel('node:repl')).toBe('shell');
    expect(toSourceLabel('<stdin>')).toBe('shell');
  });

  it('is idempotent', () => {
    const label = toSourceLabel('/repo/src/commands/run.ts', 'RunCommand.execute', '/repo');
    expect(toSourceLabel(label, 'RunCommand.execute', '/repo')).toBe(label);
    expect(toSourceLabel(label, undefined, '/repo')).toBe(label);
    expect(toSourceLabel('shell')).toBe('shell');
  });
});

describe('isAnonymousScope', () => {
  it('recognises unnamed scopes', () => {
    expect(isAnonymousScope(undefined)).toBe(true);
    expect(isAnonymousScope('<lambda>')).toBe(true);
    expect(isAnonymousScope('main')).toBe(false);
  });
});
