import type { Level } from 'pino';

import { DEFAULT_DATE_FORMAT } from '../config.js';

import { firstStackFrame, type SourceLocation } from './caller.js';
import { formatDate } from './date-format.js';
import { isAnonymousScope, toSourceLabel } from './source-label.js';

export interface ErrorInfo {
  readonly type: string;
  readonly message: string;
  readonly stack?: string;
}

export interface LogEvent {
  readonly time: number;
  readonly level: Level;
  readonly name?: string;
  readonly source: Readonly<SourceLocation>;
  readonly message: string;
  readonly error?: ErrorInfo;
}

// 256-color foreground per level.
export const LEVEL_HUES: Readonly<Record<Level, string>> = {
  trace: '\x1b[38;5;128m',
  fatal: '\x1b[38;5;197m',
  error: '\x1b[38;5;204m',
  warn: '\x1b[38;5;215m',
  info: '\x1b[38;5;41m',
  debug: '\x1b[38;5;14m',
};
export const GRAY = '\x1b[38;5;242m';
export const RESET = '\x1b[0m';

export const PLAIN_FORMAT = '{time} {level} {source}:{line} : {message}';
export const COLOR_FORMAT =
  '{gray}{time}{reset} {color}{level}{reset} {gray}{source}:{line}{reset} : {message}';

const ANSI_ESCAPE = /\x1B(?:[@-Z\\-_]|\[[0-?]*[ -/]*[@-~])/g;

export function stripAnsi(text: string): string {
  return text.replace(ANSI_ESCAPE, '');
}

/**
 * `TypeError: boom in run() on line 12`, or `... on line 12` when the
 * error came from module-level or anonymous code.
 */
export function formatError(error: ErrorInfo): string {
  const frame = firstStackFrame(error.stack);
  const func = frame?.func;
  const where = isAnonymousScope(func) ? 'on' : `in ${func}() on`;
  return `${error.type}: ${error.message} ${where} line ${frame?.line ?? 0}`;
}

export interface LogFormatterOptions {
  /** Template with {time} {level} {name} {source} {line} {message} {color} {gray} {reset}. */
  format?: string;
  /** strftime-style format for {time}. */
  dateFormat?: string;
  /** Picks the default template when `format` is not given. */
  color?: boolean;
}

/**
 * Renders a LogEvent as one line. Colors are only filled in for
 * interactive destinations; otherwise every color field is empty and
 * escape codes in the message itself are stripped.
 */
export class LogFormatter {
  readonly template: string;
  readonly dateFormat: string;

  constructor(options: LogFormatterOptions = {}) {
    this.template =
      options.format ?? (options.color === false ? PLAIN_FORMAT : COLOR_FORMAT);
    this.dateFormat = options.dateFormat ?? DEFAULT_DATE_FORMAT;
  }

  format(event: LogEvent, interactive: boolean): string {
    const body = event.error ? formatError(event.error) : event.message;
    const fields: Record<string, string> = {
      color: interactive ? LEVEL_HUES[event.level] : '',
      gray: interactive ? GRAY : '',
      reset: interactive ? RESET : '',
      time: formatDate(new Date(event.time), this.dateFormat),
      level: event.level.toUpperCase().padStart(8),
      name: event.name ?? '',
      source: toSourceLabel(event.source.file, event.source.func),
      line: String(event.source.line),
      message: interactive ? body : stripAnsi(body),
    };
    return this.template.replace(/\{(\w+)\}/g, (match, key: string) =>
      key in fields ? fields[key] : match,
    );
  }
}
