/**
 * Cleanup Command
 *
 * Drains all synthetic load: empty target set, push generator stopped and
 * gateway groups deleted.
 * @module @loadramp/cli/commands/cleanup
 */

import { Command } from 'commander';
import { LoadRampError, ErrorCode } from '@loadramp/shared';
import type { CliContext } from '../context.js';
import { info, success } from '../output.js';

export function createCleanupCommand(getContext: () => CliContext): Command {
  return new Command('cleanup')
    .description('Drain synthetic load to zero')
    .action(async () => {
      const { loadController, runState } = getContext();

      const current = await runState.resolve();
      if (current.state === 'running') {
        info(`Run of ${current.scenarioId} is active (pid ${current.pid}); draining anyway`);
      }

      const result = await loadController.drain();
      if (!result.success) {
        throw new LoadRampError(
          `Drain failed: ${result.error?.message ?? 'unknown error'}`,
          ErrorCode.LOAD_APPLY_FAILED,
          result.error?.details ?? {},
        );
      }
      success('Load drained to 0');
    });
}
