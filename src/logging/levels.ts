import type { Level } from 'pino';

import { ConfigurationError } from '../errors.js';

export const LEVELS: readonly Level[] = ['trace', 'debug', 'info', 'warn', 'error', 'fatal'];

// Symbolic names accepted from the environment.
const NAMED_LEVELS: Record<string, Level> = {
  TRACE: 'trace',
  FATAL: 'fatal',
  CRITICAL: 'fatal',
  ERROR: 'error',
  WARN: 'warn',
  WARNING: 'warn',
  INFO: 'info',
  DEBUG: 'debug',
  NOTSET: 'trace',
};

// Numeric levels accepted on the command line (0 means "everything").
const NUMERIC_LEVELS: Record<number, Level> = {
  0: 'trace',
  5: 'trace',
  10: 'debug',
  20: 'info',
  30: 'warn',
  40: 'error',
  50: 'fatal',
};

const VERBOSITY_LEVELS: readonly Level[] = ['warn', 'info', 'debug'];

export interface LevelSelection {
  /** Symbolic level from the environment. Wins over everything else. */
  env?: string;
  /** Explicit numeric level from the command line. */
  level?: number;
  /** How many times -v was given. */
  verbosity?: number;
}

export function isLevel(value: unknown): value is Level {
  return LEVELS.some((level) => level === value);
}

export function levelFromName(name: string): Level {
  const level = NAMED_LEVELS[name.trim().toUpperCase()];
  if (!level) {
    throw new ConfigurationError(`Unknown logging level: ${name}`, {
      level: name,
      accepted: Object.keys(NAMED_LEVELS),
    });
  }
  return level;
}

export function levelFromVerbosity(count: number): Level {
  const index = Math.min(Math.max(Math.trunc(count), 0), VERBOSITY_LEVELS.length - 1);
  return VERBOSITY_LEVELS[index];
}

/**
 * Pick the minimum level: environment override, then explicit numeric
 * level, then the verbosity counter (0 -> warn, 1 -> info, 2+ -> debug).
 * A numeric level that is not one of the known values is read as a
 * verbosity count.
 */
export function resolveLevel(selection: LevelSelection): Level {
  if (selection.env) return levelFromName(selection.env);
  if (selection.level !== undefined) {
    return NUMERIC_LEVELS[selection.level] ?? levelFromVerbosity(selection.level);
  }
  return levelFromVerbosity(selection.verbosity ?? 0);
}
