export { BaseCommand, type CommandContext } from './base-command.js';
export { ListCommand, buildListArgs } from './list.js';
export { RemoveCommand, buildRemoveArgs, type RemoveRequest } from './remove.js';
export { RunCommand, buildRunArgs, buildStartArgs, type ContainerRunRequest } from './run.js';
