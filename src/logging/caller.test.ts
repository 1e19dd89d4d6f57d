import { describe, it, expect } from 'vitest';

import { captureCaller, firstStackFrame, isExternalFrame, parseStackFrame } from './caller.js';

describe('parseStackFrame', () => {
  it('parses a named frame', () => {
    expect(parseStackFrame('    at RunCommand.execute (/repo/src/commands/run.ts:42:7)')).toEqual({
      func: 'RunCommand.execute',
      file: '/repo/src/commands/run.ts',
      line: 42,
      column: 7,
    });
  });

  it('parses async frames with file URLs', () => {
    expect(parseStackFrame('    at async main (file:///repo/src/index.ts:10:3)')).toEqual({
      func: 'main',
      file: 'file:///repo/src/index.ts',
      line: 10,
      column: 3,
    });
  });

  it('parses anonymous frames', () => {
    expect(parseStackFrame('    at /repo/src/index.ts:3:1')).toEqual({
      func: undefined,
      file: '/repo/src/index.ts',
      line: 3,
      column: 1,
    });
  });

  it('drops the "new" of constructor frames', () => {
    expect(parseStackFrame('    at new DockerRuntime (/repo/x.ts:5:9)')?.func).toBe('DockerRuntime');
  });

  it('returns null for the message line', () => {
    expect(parseStackFrame('TypeError: boom')).toBeNull();
  });
});

describe('firstStackFrame', () => {
  it('skips the message line', () => {
    expect(firstStackFrame('Error: x\n    at foo (/a.js:1:2)\n    at bar (/b.js:3:4)')?.func).toBe(
      'foo',
    );
  });

  it('skips Node internals and installed packages', () => {
    const stack = [
      'Error: Command failed: docker ps -a',
      '    at genericNodeError (node:internal/errors:984:15)',
      '    at checkExecSyncError (node:child_process:890:11)',
      '    at wrapped (/app/node_modules/some-lib/index.js:7:3)',
      '    at DockerRuntime.containerExists (/app/src/interfaces/docker-runtime.ts:74:17)',
    ].join('\n');
    expect(firstStackFrame(stack)).toEqual({
      func: 'DockerRuntime.containerExists',
      file: '/app/src/interfaces/docker-runtime.ts',
      line: 74,
      column: 17,
    });
  });

  it('falls back to the innermost frame when every frame is external', () => {
    expect(firstStackFrame('Error: x\n    at a (node:fs:10:1)\n    at b (node:fs:20:1)')?.func).toBe('a');
  });

  it('returns null without a stack', () => {
    expect(firstStackFrame(undefined)).toBeNull();
    expect(firstStackFrame('Error: x')).toBeNull();
  });
});

describe('isExternalFrame', () => {
  it('recognises node: modules and node_modules paths', () => {
    expect(isExternalFrame('node:internal/errors')).toBe(true);
    expect(isExternalFrame('/app/node_modules/pino/lib/proto.js')).toBe(true);
    expect(isExternalFrame('file:///app/node_modules/commander/index.js')).toBe(true);
    expect(isExternalFrame('/app/src/cli.ts')).toBe(false);
  });
});

describe('captureCaller', () => {
  it('points at the calling file', () => {
    const location = captureCaller();
    expect(location.file).toContain('caller.test.ts');
    expect(location.line).toBeGreaterThan(0);
  });
});
