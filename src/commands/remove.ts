import { APP_NAME } from '../config.js';
import { NoArgumentsError } from '../errors.js';
import { logger } from '../logger.js';

import { BaseCommand, type CommandContext } from './base-command.js';
import { type OptionValues, stringList } from './option-values.js';

export interface RemoveRequest {
  containers: string[];
  images: string[];
  passthrough: string[];
}

/** Containers take precedence: images are only removed when no container was named. */
export function buildRemoveArgs(request: RemoveRequest): string[] {
  if (request.containers.length > 0) {
    return ['rm', ...request.containers, ...request.passthrough];
  }
  return ['rmi', ...request.images, ...request.passthrough];
}

export class RemoveCommand extends BaseCommand<RemoveRequest> {
  readonly name = 'rm';

  validate(options: OptionValues, passthrough: readonly string[]): RemoveRequest {
    const request = {
      containers: stringList(options.container),
      images: stringList(options.image),
      passthrough: [...passthrough],
    };
    if (request.containers.length === 0 && request.images.length === 0) {
      throw new NoArgumentsError(this.name, ['container', 'image']);
    }
    return request;
  }

  async execute(request: RemoveRequest, { runtime, executor }: CommandContext): Promise<never> {
    await runtime.ensureRunning();

    if (request.containers.length > 0 && request.images.length > 0) {
      logger.error("Can't remove containers and images simultaneously!");
      logger.warn(
        `Container(s) will be removed. For removing image(s) run: ${APP_NAME} rm --image ${request.images.join(' ')}`,
      );
    }
    const args = buildRemoveArgs(request);
    logger.debug(`Executing docker command: ${[runtime.bin, ...args].join(' ')}`);
    return executor.exec(runtime.bin, args);
  }
}
