/**
 * Starts the results watcher as a background process of this CLI
 * @module @loadramp/runtime/hosts/watcher-launcher
 */

import { spawn } from 'child_process';
import { once } from 'events';
import type { IWatcherLauncher } from '@loadramp/shared';
import { createServiceLogger, errorMessage } from '@loadramp/shared';
import { selfEntrypoint } from './local-execution-host';

const logger = createServiceLogger(
  {
    level: 'debug',
    service: 'loadramp',
  },
  { component: 'watcher-launcher' },
);

/**
 * Arguments of the `cluster watch` command for a launch
 */
export function watchArgs(target: string, launchedAt: Date): string[] {
  return ['cluster', 'watch', target, '--since', launchedAt.toISOString()];
}

export class LocalWatcherLauncher implements IWatcherLauncher {
  constructor(private readonly entrypoint: string[] = selfEntrypoint()) {}

  async launch(target: string, launchedAt: Date): Promise<number | null> {
    const [command, ...rest] = this.entrypoint;
    if (!command) return null;
    try {
      const child = spawn(command, [...rest, ...watchArgs(target, launchedAt)], { detached: true, stdio: 'ignore' });
      await once(child, 'spawn');
      child.unref();
      return child.pid ?? null;
    } catch (error) {
      logger.warn('Results watcher could not start', { target, error: errorMessage(error) });
      return null;
    }
  }
}
