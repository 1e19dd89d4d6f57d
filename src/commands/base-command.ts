import type { IContainerRuntime } from '../interfaces/container-runtime.js';
import type { IProcessExecutor } from '../interfaces/process-executor.js';

import type { OptionValues } from './option-values.js';

export interface CommandContext {
  runtime: IContainerRuntime;
  executor: IProcessExecutor;
}

/**
 * A subcommand that ends by handing the terminal to the container runtime.
 * `validate` turns the parsed options into a typed request; `execute` never
 * returns normally.
 */
export abstract class BaseCommand<T> {
  abstract readonly name: string;

  abstract validate(options: OptionValues, passthrough: readonly string[]): T;
  abstract execute(request: T, context: CommandContext): Promise<never>;

  async handle(
    options: OptionValues,
    passthrough: readonly string[],
    context: CommandContext,
  ): Promise<never> {
    const request = this.validate(options, passthrough);
    return this.execute(request, context);
  }
}
