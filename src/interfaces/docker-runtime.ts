/**
 * DockerRuntime: Docker implementation of IContainerRuntime.
 */
import { execFileSync, spawn, spawnSync } from 'child_process';
import { setTimeout as delay } from 'timers/promises';

import { CONTAINER_RUNTIME_BIN, DAEMON_LAUNCHERS, DAEMON_WAIT } from '../config.js';
import { logger } from '../logger.js';
import type { IContainerRuntime } from './container-runtime.js';

export interface DockerRuntimeOptions {
  bin?: string;
  /** Command that starts the daemon in the background; null when the platform has none. */
  launcher?: readonly string[] | null;
  /** Grace period after asking the daemon to start, in ms. */
  daemonWait?: number;
  sleep?: (ms: number) => Promise<unknown>;
}

/**
 * Container names from `docker ps -a` output: the last whitespace-separated
 * field of every line after the header.
 */
export function parseContainerNames(listing: string): string[] {
  return listing
    .split('\n')
    .slice(1)
    .map((line) => line.trim())
    .filter(Boolean)
    .map((line) => {
      const fields = line.split(/\s+/);
      return fields[fields.length - 1];
    });
}

export class DockerRuntime implements IContainerRuntime {
  readonly bin: string;
  private readonly launcher: readonly string[] | null;
  private readonly daemonWait: number;
  private readonly sleep: (ms: number) => Promise<unknown>;

  constructor(options: DockerRuntimeOptions = {}) {
    this.bin = options.bin ?? CONTAINER_RUNTIME_BIN;
    this.launcher =
      options.launcher === undefined
        ? DAEMON_LAUNCHERS[process.platform] ?? null
        : options.launcher;
    this.daemonWait = options.daemonWait ?? DAEMON_WAIT;
    this.sleep = options.sleep ?? delay;
  }

  isReachable(): boolean {
    logger.debug('Checking if the docker daemon is running...');
    const result = spawnSync(this.bin, ['ps'], { stdio: 'ignore' });
    return !result.error && result.status === 0;
  }

  async ensureRunning(): Promise<void> {
    if (!this.isReachable()) {
      logger.warn('Docker daemon is not running. Starting docker...');
      this.launchDaemon();
      logger.info(
        `Docker daemon starting in the background, expected start time ${this.daemonWait / 1000} secs`,
      );
      // No readiness polling: wait the full grace period and carry on.
      await this.sleep(this.daemonWait);
    }
    logger.info('Docker daemon is running...');
  }

  containerExists(name: string): boolean {
    logger.info('Checking if the container exists...');
    let listing: string;
    try {
      listing = execFileSync(this.bin, ['ps', '-a'], {
        encoding: 'utf-8',
        stdio: ['ignore', 'pipe', 'ignore'],
      });
    } catch (err) {
      logger.warn({ err }, 'Failed to list containers');
      return false;
    }
    return parseContainerNames(listing).includes(name);
  }

  private launchDaemon(): void {
    if (!this.launcher || this.launcher.length === 0) {
      logger.warn({ platform: process.platform }, 'No known way to start the docker daemon on this platform');
      return;
    }
    const [command, ...args] = this.launcher;
    const child = spawn(command, args, { detached: true, stdio: 'ignore' });
    child.on('error', (err) => {
      logger.debug({ err, command }, 'Docker daemon launcher failed');
    });
    child.unref();
  }
}
