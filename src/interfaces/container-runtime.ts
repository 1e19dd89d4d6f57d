/**
 * IContainerRuntime: what the commands need to know about the container runtime.
 * Consumers depend on this interface; the Docker implementation lives in docker-runtime.ts.
 */
export interface IContainerRuntime {
  /** The container runtime binary name (e.g. 'docker'). */
  readonly bin: string;

  /** Whether the daemon answers a status query right now. Never cached. */
  isReachable(): boolean;

  /** Start the daemon if it is not reachable and wait a fixed grace period. */
  ensureRunning(): Promise<void>;

  /** Whether a container (running or stopped) with exactly this name exists. */
  containerExists(name: string): boolean;
}
