import { spawnSync } from 'child_process';

import { InvocationError } from '../errors.js';
import type { IProcessExecutor } from './process-executor.js';

/**
 * Node cannot replace its own process image, so the program runs in the
 * foreground with inherited stdio and this process then exits with the
 * program's status (or dies from the same signal).
 */
export class SpawnSyncExecutor implements IProcessExecutor {
  exec(bin: string, args: readonly string[]): never {
    const result = spawnSync(bin, args, { stdio: 'inherit' });
    if (result.error) throw new InvocationError(bin, result.error);
    if (result.signal) process.kill(process.pid, result.signal);
    return process.exit(result.status ?? 1);
  }
}
