import path from 'path';
import { describe, it, expect } from 'vitest';

import {
  COLOR_FORMAT,
  formatError,
  GRAY,
  LEVEL_HUES,
  type LogEvent,
  LogFormatter,
  RESET,
  stripAnsi,
} from './formatter.js';
import { LEVELS } from './levels.js';

const event: LogEvent = {
  time: new Date(2022, 9, 2, 14, 5, 9).getTime(),
  level: 'info',
  name: 'xacker.main',
  source: {
    file: path.join(process.cwd(), 'src', 'commands', 'run.ts'),
    func: 'RunCommand.execute',
    line: 42,
  },
  message: 'Spawning a temporary container...',
};

const PLAIN_LINE =
  '2022-10-02T14:05:09Z     INFO src.commands.run.RunCommand.execute:42 : Spawning a temporary container...';

describe('LogFormatter', () => {
  it('renders the plain template', () => {
    expect(new LogFormatter({ color: false }).format(event, false)).toBe(PLAIN_LINE);
  });

  it('renders the color template without colors on non-interactive destinations', () => {
    const formatter = new LogFormatter();
    expect(formatter.template).toBe(COLOR_FORMAT);
    expect(formatter.format(event, false)).toBe(PLAIN_LINE);
  });

  it('colors level and metadata on interactive destinations', () => {
    const line = new LogFormatter().format(event, true);
    expect(line).toBe(
      `${GRAY}2022-10-02T14:05:09Z${RESET} ${LEVEL_HUES.info}    INFO${RESET} ` +
        `${GRAY}src.commands.run.RunCommand.execute:42${RESET} : Spawning a temporary container...`,
    );
  });

  it('emits one reset per colored field', () => {
    const line = new LogFormatter().format(event, true);
    expect(line.split(RESET)).toHaveLength(4);
  });

  it('never emits escape codes for non-interactive destinations', () => {
    const formatter = new LogFormatter();
    for (const level of LEVELS) {
      const line = formatter.format({ ...event, level, message: '\x1b[31mred\x1b[0m text' }, false);
      expect(line).not.toContain('\x1b');
      expect(line.endsWith(' : red text')).toBe(true);
    }
  });

  it('keeps escape codes in the message on interactive destinations', () => {
    const line = new LogFormatter().format({ ...event, message: '\x1b[31mred\x1b[0m' }, true);
    expect(line.endsWith(' : \x1b[31mred\x1b[0m')).toBe(true);
  });

  it('uses a distinct hue for every level', () => {
    expect(new Set(LEVELS.map((level) => LEVEL_HUES[level])).size).toBe(LEVELS.length);
  });

  it('fills custom templates and leaves unknown placeholders alone', () => {
    const formatter = new LogFormatter({ format: '[{name}] {level}|{message}|{unknown}' });
    expect(formatter.format({ ...event, level: 'warn' }, false)).toBe(
      '[xacker.main]     WARN|Spawning a temporary container...|{unknown}',
    );
  });

  it('applies the date format', () => {
    const formatter = new LogFormatter({ format: '{time}', dateFormat: '%H:%M' });
    expect(formatter.format(event, false)).toBe('14:05');
  });

  it('replaces the message with the error description', () => {
    const formatter = new LogFormatter({ format: '{message}' });
    const line = formatter.format(
      {
        ...event,
        message: 'Failed to list containers',
        error: {
          type: 'TypeError',
          message: 'boom',
          stack: 'TypeError: boom\n    at DockerRuntime.containerExists (/repo/src/x.ts:12:5)',
        },
      },
      false,
    );
    expect(line).toBe('TypeError: boom in DockerRuntime.containerExists() on line 12');
  });
});

describe('formatError', () => {
  it('says only "on" for anonymous frames', () => {
    expect(formatError({ type: 'Error', message: 'x', stack: 'Error: x\n    at /a/b.js:3:1' })).toBe(
      'Error: x on line 3',
    );
  });

  it('names the first frame in project code', () => {
    const stack = [
      'Error: Command failed: docker ps -a',
      '    at genericNodeError (node:internal/errors:984:15)',
      '    at checkExecSyncError (node:child_process:890:11)',
      '    at execFileSync (node:child_process:931:15)',
      '    at DockerRuntime.containerExists (/app/src/interfaces/docker-runtime.ts:74:17)',
    ].join('\n');
    expect(formatError({ type: 'Error', message: 'Command failed: docker ps -a', stack })).toBe(
      'Error: Command failed: docker ps -a in DockerRuntime.containerExists() on line 74',
    );
  });

  it('falls back to line 0 without a stack', () => {
    expect(formatError({ type: 'RangeError', message: 'nope' })).toBe('RangeError: nope on line 0');
  });
});

describe('stripAnsi', () => {
  it('removes color sequences', () => {
    expect(stripAnsi(`${GRAY}gray${RESET} ${LEVEL_HUES.error}red${RESET}`)).toBe('gray red');
  });
});
