import fs from 'fs';
import os from 'os';
import path from 'path';

export const APP_NAME = 'xacker';
export const VERSION = '2.0.0';

// Environment overrides. Read from process.env first, then from a .env file
// in the working directory.
export const LOGGING_LEVEL_ENV = 'XACKER_LOGGING_LEVEL';
export const SKIP_LOGGING_ENV = 'XACKER_SKIP_LOGGING';
export const TRUTHY_ENV_VALUES: readonly string[] = ['TRUE', 'True', 'true', 't'];

export type EnvOverrides = Record<string, string | undefined>;

// KEY=value, optionally prefixed with `export` and wrapped in matching quotes.
const DOTENV_LINE = /^\s*(?:export\s+)?([A-Za-z_][A-Za-z0-9_]*)\s*=\s*(?:"(.*)"|'(.*)'|(.*?))\s*$/;

/** Assignments in .env content. Comments, blank and malformed lines are skipped; empty values are dropped. */
export function parseDotEnv(content: string): Map<string, string> {
  const values = new Map<string, string>();
  for (const line of content.split(/\r?\n/)) {
    if (line.trimStart().startsWith('#')) continue;
    const match = DOTENV_LINE.exec(line);
    if (!match) continue;
    const value = match[2] ?? match[3] ?? match[4] ?? '';
    if (value) values.set(match[1], value);
  }
  return values;
}

function readDotEnv(dir: string): Map<string, string> {
  try {
    return parseDotEnv(fs.readFileSync(path.join(dir, '.env'), 'utf-8'));
  } catch {
    return new Map();
  }
}

/** Logging overrides: process.env first, then `<dir>/.env`. Empty values count as unset. */
export function readEnvOverrides(dir: string = process.cwd()): EnvOverrides {
  const dotEnv = readDotEnv(dir);
  const lookup = (key: string): string | undefined => process.env[key] || dotEnv.get(key);
  return {
    [LOGGING_LEVEL_ENV]: lookup(LOGGING_LEVEL_ENV),
    [SKIP_LOGGING_ENV]: lookup(SKIP_LOGGING_ENV),
  };
}

// --- Logging ---

export const LOGGER_NAME = `${APP_NAME}.main`;
export const LOG_FILE = path.join(os.homedir(), `.${APP_NAME}`, 'session.log');
export const DEFAULT_DATE_FORMAT = '%Y-%m-%dT%H:%M:%SZ';
export const DEFAULT_MAX_BYTES = 10_000_000; // 10MB before rollover
export const DEFAULT_BACKUP_COUNT = 10;

// --- Container runtime ---

export const CONTAINER_RUNTIME_BIN = 'docker';
export const DEFAULT_DAEMON_WAIT = 20000;

/** Milliseconds from XACKER_DAEMON_WAIT; unset or non-numeric falls back, negatives clamp to 0. */
export function parseDaemonWait(raw: string | undefined): number {
  const parsed = Number.parseInt(raw ?? '', 10);
  return Number.isNaN(parsed) ? DEFAULT_DAEMON_WAIT : Math.max(0, parsed);
}

// Fixed grace period after asking the daemon to start, no polling.
export const DAEMON_WAIT = parseDaemonWait(process.env.XACKER_DAEMON_WAIT);

// How to ask each platform to start the Docker daemon in the background.
export const DAEMON_LAUNCHERS: Partial<Record<NodeJS.Platform, readonly string[]>> = {
  darwin: ['open', '--background', '-a', 'Docker'],
  linux: ['systemctl', 'start', 'docker'],
};

export const DEFAULT_WORKDIR = '/tmp/code';
export const DEFAULT_HOSTNAME = `${APP_NAME}-container`;
