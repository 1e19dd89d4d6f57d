import pino, { type Logger } from 'pino';

import {
  DEFAULT_BACKUP_COUNT,
  DEFAULT_DATE_FORMAT,
  DEFAULT_MAX_BYTES,
  type EnvOverrides,
  LOG_FILE,
  LOGGER_NAME,
  LOGGING_LEVEL_ENV,
  readEnvOverrides,
  SKIP_LOGGING_ENV,
  TRUTHY_ENV_VALUES,
} from '../config.js';

import { callerMixin } from './caller.js';
import { LogFormatter } from './formatter.js';
import { resolveLevel } from './levels.js';
import { ConsoleSink, type ConsoleStream, type LogSink, RotatingFileSink } from './sinks.js';

export interface LogOptions {
  /** Explicit numeric level (10 debug ... 50 fatal). */
  level?: number;
  /** Count of -v flags. */
  verbosity?: number;
  format?: string;
  dateFormat?: string;
  color?: boolean;
  filename?: string;
  maxBytes?: number;
  backupCount?: number;
  /** Skip the log file (--no-output). */
  skipFile?: boolean;
  /** Route Node process warnings through the logger. */
  captureWarnings?: boolean;
  /** Console destination, stderr by default. */
  stream?: ConsoleStream;
  /** Environment overrides; read from process.env and .env when omitted. */
  env?: EnvOverrides;
}

export function shouldSkipFile(skipFile: boolean, envValue: string | undefined): boolean {
  return skipFile || (envValue !== undefined && TRUTHY_ENV_VALUES.includes(envValue));
}

/**
 * Owns the process-wide logger and the sinks behind it.
 *
 * There is a single pino instance for the whole process; `initialize()`
 * swaps the sinks it writes to and its level. Until the first call, records
 * go to stderr at warn level with the default format.
 */
export class LogManager {
  readonly logger: Logger;

  private sinks: LogSink[];
  private warningListener: ((warning: Error) => void) | null = null;
  private displacedWarningListeners: Array<(warning: Error) => void> = [];

  constructor(name: string = LOGGER_NAME) {
    this.sinks = [new ConsoleSink(new LogFormatter())];
    this.logger = pino(
      { name, level: 'warn', base: undefined, mixin: callerMixin },
      { write: (record: string) => this.fanOut(record) },
    );
  }

  get activeSinks(): readonly LogSink[] {
    return this.sinks;
  }

  initialize(options: LogOptions = {}): Logger {
    const env = options.env ?? readEnvOverrides();
    // Resolve first so a bad level name leaves the previous sinks in place.
    const level = resolveLevel({
      env: env[LOGGING_LEVEL_ENV],
      level: options.level,
      verbosity: options.verbosity,
    });

    const formatter = new LogFormatter({
      format: options.format,
      dateFormat: options.dateFormat ?? DEFAULT_DATE_FORMAT,
      color: options.color ?? true,
    });
    const sinks: LogSink[] = [new ConsoleSink(formatter, options.stream)];
    const filename = options.filename ?? LOG_FILE;
    let fileError: string | null = null;
    if (!shouldSkipFile(options.skipFile ?? false, env[SKIP_LOGGING_ENV])) {
      try {
        sinks.push(
          new RotatingFileSink({
            formatter,
            filename,
            maxBytes: options.maxBytes ?? DEFAULT_MAX_BYTES,
            backupCount: options.backupCount ?? DEFAULT_BACKUP_COUNT,
          }),
        );
      } catch (err) {
        fileError = err instanceof Error ? err.message : String(err);
      }
    }

    this.closeSinks();
    this.sinks = sinks;
    this.logger.level = level;
    this.captureWarnings(options.captureWarnings ?? true);
    if (fileError !== null) {
      this.logger.warn(`Cannot write the log file ${filename}, logging to the console only: ${fileError}`);
    }
    return this.logger;
  }

  /** Close every sink and stop capturing warnings. Records are dropped until the next initialize(). */
  shutdown(): void {
    this.closeSinks();
    this.captureWarnings(false);
  }

  private fanOut(record: string): void {
    for (const sink of this.sinks) sink.write(record);
  }

  private closeSinks(): void {
    const previous = this.sinks;
    this.sinks = [];
    for (const sink of previous) sink.close();
  }

  // Node's default printer is a 'warning' listener too. It is set aside
  // while warnings are captured and put back afterwards.
  private captureWarnings(enabled: boolean): void {
    if (enabled && !this.warningListener) {
      this.displacedWarningListeners = process.listeners('warning');
      for (const displaced of this.displacedWarningListeners) {
        process.removeListener('warning', displaced);
      }
      const listener = (warning: Error): void => {
        this.logger.warn(`${warning.name}: ${warning.message}`);
      };
      process.on('warning', listener);
      this.warningListener = listener;
    } else if (!enabled && this.warningListener) {
      process.removeListener('warning', this.warningListener);
      this.warningListener = null;
      for (const displaced of this.displacedWarningListeners) {
        process.on('warning', displaced);
      }
      this.displacedWarningListeners = [];
    }
  }
}
