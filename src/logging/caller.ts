import path from 'path';
import { fileURLToPath } from 'url';

export interface StackFrame {
  func?: string;
  file: string;
  line: number;
  column: number;
}

/** Where a log call was made. `line` is 0 when it could not be found. */
export interface SourceLocation {
  file?: string;
  func?: string;
  line: number;
}

// "    at fn (file:line:col)", "    at async fn (file:line:col)", "    at file:line:col"
const FRAME_PATTERN = /^\s*at (?:(?:async )?(.*?) \()?(.+?):(\d+):(\d+)\)?$/;

const THIS_FILE = fileURLToPath(import.meta.url);
const NODE_MODULES_DIR = `${path.sep}node_modules${path.sep}`;
const PINO_DIR = `${NODE_MODULES_DIR}pino${path.sep}`;

export function parseStackFrame(text: string): StackFrame | null {
  const match = FRAME_PATTERN.exec(text);
  if (!match) return null;
  const func: string | undefined = match[1];
  return {
    func: func ? func.replace(/^new /, '') : undefined,
    file: match[2],
    line: Number(match[3]),
    column: Number(match[4]),
  };
}

function toFilePath(file: string): string {
  return file.startsWith('file://') ? fileURLToPath(file) : file;
}

/** Node internals and installed packages. */
export function isExternalFrame(file: string): boolean {
  const filePath = toFilePath(file);
  return filePath.startsWith('node:') || filePath.includes(NODE_MODULES_DIR);
}

/**
 * First frame of an `Error#stack` in project code, skipping the message
 * line. Falls back to the innermost frame when the whole stack is external.
 */
export function firstStackFrame(stack: string | undefined): StackFrame | null {
  if (!stack) return null;
  let innermost: StackFrame | null = null;
  for (const text of stack.split('\n').slice(1)) {
    const frame = parseStackFrame(text);
    if (!frame) continue;
    if (!isExternalFrame(frame.file)) return frame;
    innermost ??= frame;
  }
  return innermost;
}

function isLoggingFrame(file: string): boolean {
  const filePath = toFilePath(file);
  return filePath === THIS_FILE || filePath.startsWith('node:') || filePath.includes(PINO_DIR);
}

/** Location of the first stack frame outside pino and this module. */
export function captureCaller(): SourceLocation {
  const limit = Error.stackTraceLimit;
  Error.stackTraceLimit = 20;
  const stack = new Error().stack;
  Error.stackTraceLimit = limit;

  for (const text of (stack ?? '').split('\n').slice(1)) {
    const frame = parseStackFrame(text);
    if (!frame || isLoggingFrame(frame.file)) continue;
    return { file: frame.file, func: frame.func, line: frame.line };
  }
  return { line: 0 };
}

/** pino `mixin`: attaches the call site to every record. */
export function callerMixin(): { caller: SourceLocation } {
  return { caller: captureCaller() };
}
