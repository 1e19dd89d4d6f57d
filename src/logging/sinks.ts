import fs from 'fs';
import path from 'path';
import pino from 'pino';

import { safeParse } from '../safe-parse.js';

import type { SourceLocation } from './caller.js';
import type { ErrorInfo, LogEvent, LogFormatter } from './formatter.js';
import { isLevel } from './levels.js';

type FileDestination = ReturnType<typeof pino.destination>;

/** Where formatted records end up. Receives raw pino JSON lines. */
export interface LogSink {
  readonly kind: 'console' | 'file';
  write(record: string): void;
  close(): void;
}

export interface ConsoleStream {
  write(chunk: string): unknown;
  isTTY?: boolean;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toSource(value: unknown): SourceLocation {
  if (!isRecord(value)) return { line: 0 };
  return {
    file: typeof value.file === 'string' ? value.file : undefined,
    func: typeof value.func === 'string' ? value.func : undefined,
    line: typeof value.line === 'number' ? value.line : 0,
  };
}

function toErrorInfo(value: unknown): ErrorInfo | undefined {
  if (!isRecord(value) || typeof value.message !== 'string') return undefined;
  return {
    type: typeof value.type === 'string' ? value.type : 'Error',
    message: value.message,
    stack: typeof value.stack === 'string' ? value.stack : undefined,
  };
}

/** Parse one pino JSON line. Returns null for anything that is not a log record. */
export function toLogEvent(line: string): LogEvent | null {
  const record = safeParse(line);
  if (!isRecord(record) || typeof record.level !== 'number') return null;
  const level = pino.levels.labels[record.level];
  if (!isLevel(level)) return null;

  return {
    time: typeof record.time === 'number' ? record.time : Date.now(),
    level,
    name: typeof record.name === 'string' ? record.name : undefined,
    source: toSource(record.caller),
    message: typeof record.msg === 'string' ? record.msg : '',
    error: toErrorInfo(record.err),
  };
}

/** Writes to stderr (or any stream), colored when the stream is a TTY. */
export class ConsoleSink implements LogSink {
  readonly kind = 'console';

  constructor(
    private readonly formatter: LogFormatter,
    private readonly stream: ConsoleStream = process.stderr,
  ) {}

  get interactive(): boolean {
    return this.stream.isTTY === true;
  }

  write(record: string): void {
    const event = toLogEvent(record);
    if (!event) return;
    this.stream.write(`${this.formatter.format(event, this.interactive)}\n`);
  }

  close(): void {
    // The stream belongs to the process, not to the sink.
  }
}

export interface RotatingFileSinkOptions {
  formatter: LogFormatter;
  filename: string;
  /** Roll over before a write that would make the file reach this size. 0 disables rotation. */
  maxBytes: number;
  /** Number of rolled files kept as `<filename>.1` ... `<filename>.<n>`. 0 disables rotation. */
  backupCount: number;
}

/**
 * Plain-text log file with size based rotation. Writes are synchronous so
 * nothing is lost when the process is replaced by the runtime right after
 * logging.
 */
export class RotatingFileSink implements LogSink {
  readonly kind = 'file';
  readonly filename: string;

  private readonly formatter: LogFormatter;
  private readonly maxBytes: number;
  private readonly backupCount: number;
  private readonly destination: FileDestination;
  private size: number;
  private closed = false;
  private rotationFailed = false;

  constructor(options: RotatingFileSinkOptions) {
    this.formatter = options.formatter;
    this.filename = options.filename;
    this.maxBytes = options.maxBytes;
    this.backupCount = options.backupCount;

    fs.mkdirSync(path.dirname(this.filename), { recursive: true });
    this.size = fs.existsSync(this.filename) ? fs.statSync(this.filename).size : 0;
    this.destination = pino.destination({
      dest: this.filename,
      append: true,
      mkdir: true,
      sync: true,
    });
  }

  write(record: string): void {
    if (this.closed) return;
    const event = toLogEvent(record);
    if (!event) return;
    const line = `${this.formatter.format(event, false)}\n`;
    const bytes = Buffer.byteLength(line);
    if (this.shouldRollover(bytes)) this.rollover();
    this.destination.write(line);
    this.size += bytes;
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.destination.end();
  }

  private shouldRollover(bytes: number): boolean {
    if (this.rotationFailed || this.maxBytes <= 0 || this.backupCount <= 0) return false;
    return this.size > 0 && this.size + bytes >= this.maxBytes;
  }

  // session.log -> session.log.1 -> ... -> session.log.<backupCount>; the oldest is overwritten.
  // A failed rename stops rotation for this sink; records keep going to the open file.
  private rollover(): void {
    try {
      for (let i = this.backupCount - 1; i > 0; i--) {
        const source = `${this.filename}.${i}`;
        if (fs.existsSync(source)) fs.renameSync(source, `${this.filename}.${i + 1}`);
      }
      if (fs.existsSync(this.filename)) fs.renameSync(this.filename, `${this.filename}.1`);
      this.destination.reopen();
      this.size = 0;
    } catch (err) {
      this.rotationFailed = true;
      const reason = err instanceof Error ? err.message : String(err);
      // Reported asynchronously through the 'warning' event, outside this write.
      process.emitWarning(`Log rotation stopped for ${this.filename}: ${reason}`, 'LogRotationWarning');
    }
  }
}
