import { NoArgumentsError } from '../errors.js';
import { logger } from '../logger.js';

import { BaseCommand, type CommandContext } from './base-command.js';
import { type OptionValues, optionalString } from './option-values.js';

export interface ContainerRunRequest {
  name?: string;
  hostname?: string;
  workdir?: string;
  image?: string;
  command?: string;
  /** Options xacker does not know, forwarded to `docker run` as-is. */
  passthrough: string[];
}

function flag(name: string, value: string | undefined): string[] {
  return value ? [name, value] : [];
}

/** Attach interactively to an existing container. */
export function buildStartArgs(name: string): string[] {
  return ['start', '-ia', name];
}

/**
 * `run -ti` with `--rm` for unnamed containers or `--name <name>`, then
 * hostname, workdir, passthrough options, image and command. Unset and
 * empty values are left out.
 */
export function buildRunArgs(request: ContainerRunRequest): string[] {
  const identity = request.name ? ['--name', request.name] : ['--rm'];
  return [
    'run',
    '-ti',
    ...identity,
    ...flag('--hostname', request.hostname),
    ...flag('--workdir', request.workdir),
    ...request.passthrough,
    request.image,
    request.command,
  ].filter((arg): arg is string => Boolean(arg));
}

export class RunCommand extends BaseCommand<ContainerRunRequest> {
  readonly name = 'run';

  validate(options: OptionValues, passthrough: readonly string[]): ContainerRunRequest {
    return {
      name: optionalString(options.name),
      hostname: optionalString(options.hostname),
      workdir: optionalString(options.workdir),
      image: optionalString(options.image),
      command: optionalString(options.command),
      passthrough: [...passthrough],
    };
  }

  async execute(request: ContainerRunRequest, { runtime, executor }: CommandContext): Promise<never> {
    await runtime.ensureRunning();

    if (request.name && runtime.containerExists(request.name)) {
      logger.info(`Container: ${request.name} already exists! Starting now...`);
      return executor.exec(runtime.bin, buildStartArgs(request.name));
    }
    // Only resuming works without an image.
    if (!request.image) throw new NoArgumentsError(this.name, ['image']);

    if (request.name) {
      logger.info(`Spawning new container: ${request.name}...`);
    } else {
      logger.info('Spawning a temporary container...');
    }
    const args = buildRunArgs(request);
    logger.debug(`Executing docker command: ${[runtime.bin, ...args].join(' ')}`);
    return executor.exec(runtime.bin, args);
  }
}
