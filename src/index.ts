#!/usr/bin/env node
import fs from 'fs';
import { fileURLToPath } from 'url';

import { createProgram } from './cli.js';
import { APP_NAME } from './config.js';
import { ConfigurationError, InvocationError, NoArgumentsError } from './errors.js';
import { DockerRuntime, SpawnSyncExecutor } from './interfaces/index.js';
import type { LogOptions } from './logging/log-manager.js';
import { logger, logManager } from './logger.js';

function initializeLogging(options: LogOptions): void {
  logManager.initialize(options);
  logger.debug(`Node.js version: ${process.version}`);
  logger.debug(`Start command for ${APP_NAME}: ${process.argv.join(' ')}`);
}

/** Run the CLI. Resolves with the exit status when no runtime command took over. */
export async function main(argv: readonly string[] = process.argv): Promise<number> {
  const program = createProgram({
    runtime: new DockerRuntime(),
    executor: new SpawnSyncExecutor(),
    initializeLogging,
  });

  try {
    await program.parseAsync([...argv]);
  } catch (err) {
    if (err instanceof NoArgumentsError) {
      logger.error({ command: err.command, missing: err.missing }, 'No arguments passed to the command!');
      return 0;
    }
    if (err instanceof ConfigurationError) {
      logger.fatal({ err }, err.message);
      return 1;
    }
    if (err instanceof InvocationError) {
      logger.fatal({ err }, err.message);
      return err.exitCode;
    }
    throw err;
  }
  return 0;
}

// Guard: only run when executed directly (or through the npm bin link), not when imported by tests
function isDirectRun(): boolean {
  const script = process.argv[1];
  if (!script) return false;
  try {
    return fs.realpathSync(script) === fileURLToPath(import.meta.url);
  } catch {
    return false;
  }
}

if (isDirectRun()) {
  main()
    .then((code) => {
      process.exitCode = code;
    })
    .catch((err) => {
      logger.fatal({ err }, `Unexpected failure in ${APP_NAME}`);
      process.exitCode = 1;
    });
}
