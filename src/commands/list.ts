import { logger } from '../logger.js';

import { BaseCommand, type CommandContext } from './base-command.js';
import type { OptionValues } from './option-values.js';

export interface ListRequest {
  passthrough: string[];
}

export function buildListArgs(passthrough: readonly string[]): string[] {
  return ['ps', '-a', ...passthrough];
}

export class ListCommand extends BaseCommand<ListRequest> {
  readonly name = 'ls';

  validate(_options: OptionValues, passthrough: readonly string[]): ListRequest {
    return { passthrough: [...passthrough] };
  }

  async execute(request: ListRequest, { runtime, executor }: CommandContext): Promise<never> {
    await runtime.ensureRunning();
    const args = buildListArgs(request.passthrough);
    logger.debug(`Executing docker command: ${[runtime.bin, ...args].join(' ')}`);
    return executor.exec(runtime.bin, args);
  }
}
