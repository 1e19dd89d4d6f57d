// Interfaces
export type { IContainerRuntime } from './container-runtime.js';
export type { IProcessExecutor } from './process-executor.js';

// Implementations
export { DockerRuntime, parseContainerNames } from './docker-runtime.js';
export { SpawnSyncExecutor } from './spawn-executor.js';
