/**
 * Local process helpers
 * @module @loadramp/runtime/hosts/process
 */

import type { ChildProcess } from 'child_process';

/**
 * Whether a local process with `pid` exists. A process owned by another
 * user still counts as alive.
 */
export function isProcessAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch (error) {
    return error instanceof Error && 'code' in error && error.code === 'EPERM';
  }
}

/**
 * Resolve with the exit code once `child` closes. An abort through
 * `signal` resolves with 130.
 */
export function waitForExit(child: ChildProcess, signal?: AbortSignal): Promise<number> {
  return new Promise((resolve, reject) => {
    child.on('error', (error) => {
      if (signal?.aborted) {
        resolve(130);
      } else {
        reject(error);
      }
    });
    child.on('close', (code) => resolve(signal?.aborted ? 130 : (code ?? 1)));
  });
}
