import { Command, InvalidArgumentError } from 'commander';

import {
  type BaseCommand,
  type CommandContext,
  ListCommand,
  RemoveCommand,
  RunCommand,
} from './commands/index.js';
import { type OptionValues, optionalNumber, optionalString } from './commands/option-values.js';
import {
  APP_NAME,
  DEFAULT_BACKUP_COUNT,
  DEFAULT_DATE_FORMAT,
  DEFAULT_HOSTNAME,
  DEFAULT_MAX_BYTES,
  DEFAULT_WORKDIR,
  LOG_FILE,
  LOGGING_LEVEL_ENV,
  SKIP_LOGGING_ENV,
  VERSION,
} from './config.js';
import type { LogOptions } from './logging/log-manager.js';

export interface CliDeps extends CommandContext {
  /** Called once, before the selected subcommand runs. */
  initializeLogging: (options: LogOptions) => void;
}

function parseInteger(value: string): number {
  const parsed = Number.parseInt(value, 10);
  if (Number.isNaN(parsed)) throw new InvalidArgumentError('Not a number.');
  return parsed;
}

function increaseVerbosity(_value: string, previous: number): number {
  return previous + 1;
}

/** Map the global logging flags onto LogManager options. */
export function toLogOptions(options: OptionValues): LogOptions {
  return {
    verbosity: optionalNumber(options.verbose) ?? 0,
    level: optionalNumber(options.level),
    filename: optionalString(options.log),
    maxBytes: optionalNumber(options.maxBytes),
    backupCount: optionalNumber(options.backupCount),
    format: optionalString(options.format),
    dateFormat: optionalString(options.datefmt),
    color: options.color !== false,
    skipFile: options.output === false,
  };
}

function bindAction<T>(command: BaseCommand<T>, deps: CliDeps) {
  return (options: OptionValues, cmd: Command): Promise<never> =>
    command.handle(options, cmd.args, { runtime: deps.runtime, executor: deps.executor });
}

export function createProgram(deps: CliDeps): Command {
  const program = new Command(APP_NAME);

  program
    .usage('<command> [options]')
    .description('A quick, easy and flexible development container helper built on Docker.')
    .version(`${APP_NAME} v${VERSION}`, '-V, --version', "Show xacker's installed version and exit.")
    .helpOption('-h, --help', 'Show this help message.')
    .option(
      '-v, --verbose',
      `Increase the logging verbosity (additive). ${LOGGING_LEVEL_ENV} overrides it.`,
      increaseVerbosity,
      0,
    )
    .option(
      '-l, --level <level>',
      `Minimum numeric logging level (10 debug, 20 info, 30 warn, 40 error, 50 fatal). ${LOGGING_LEVEL_ENV} overrides it.`,
      parseInteger,
    )
    .option('--log <path>', 'Path of the historical log file.', LOG_FILE)
    .option('-b, --max-bytes <bytes>', 'Log file size in bytes before rollover.', parseInteger, DEFAULT_MAX_BYTES)
    .option('--backup-count <count>', 'Rolled over log files to keep.', parseInteger, DEFAULT_BACKUP_COUNT)
    .option('--format <format>', 'Log line template, e.g. "{time} {level} {source}:{line} : {message}".')
    .option('--datefmt <format>', 'strftime-style format for log timestamps.', DEFAULT_DATE_FORMAT)
    .option('--no-output', `Do not write the log file. ${SKIP_LOGGING_ENV}=true does the same.`)
    .option('--no-color', 'Suppress colored output.')
    .action(() => {
      program.outputHelp();
    });

  program.hook('preAction', (_program, actionCommand) => {
    if (actionCommand === program) return;
    deps.initializeLogging(toLogOptions(actionCommand.optsWithGlobals()));
  });

  program
    .command('run')
    .summary('Run docker containers.')
    .description(
      'Run a new container or attach to an existing one with the same name. ' +
        'STDIN, STDOUT and STDERR stay attached and a pseudo-TTY is allocated.',
    )
    .option('-c, --command <command>', 'Command to execute in the running container.')
    .option('-n, --name <name>', 'Name for the container.')
    .option('-w, --workdir <path>', 'Working directory inside the container.', DEFAULT_WORKDIR)
    .option('--hostname <hostname>', 'Container host name.', DEFAULT_HOSTNAME)
    .option('--image <image>', 'Image to create the development container from.')
    .allowUnknownOption()
    .allowExcessArguments()
    .action(bindAction(new RunCommand(), deps));

  program
    .command('ls')
    .summary('List docker containers.')
    .description('List all containers, running or stopped.')
    .allowUnknownOption()
    .allowExcessArguments()
    .action(bindAction(new ListCommand(), deps));

  program
    .command('rm')
    .summary('Remove docker containers or images.')
    .description('Remove containers or images. Containers take precedence over images.')
    .option('-c, --container <container...>', 'Containers to remove.')
    .option('-i, --image <image...>', 'Images to remove.')
    .allowUnknownOption()
    .allowExcessArguments()
    .action(bindAction(new RemoveCommand(), deps));

  return program;
}
