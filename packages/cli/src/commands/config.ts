/**
 * Config Command
 * @module @loadramp/cli/commands/config
 */

import { Command } from 'commander';
import { ValidationError, type LoadRampConfig } from '@loadramp/shared';
import { USER_CONFIG_FILE, saveUserSetting } from '../config.js';
import { output, success } from '../output.js';

/**
 * Splits "key=value" at the first "="
 */
export function parseAssignment(text: string): { key: string; value: string } {
  const index = text.indexOf('=');
  if (index <= 0) {
    throw ValidationError.invalidFormat('set', 'key=value', text);
  }
  return { key: text.slice(0, index).trim(), value: text.slice(index + 1) };
}

export function createConfigCommand(getConfig: () => LoadRampConfig): Command {
  return new Command('config')
    .description('Show or change configuration')
    .option('--show', 'Print the merged configuration')
    .option('--set <key=value>', `Write a setting to ${USER_CONFIG_FILE}`)
    .action((options: { show?: boolean; set?: string }) => {
      if (options.set) {
        const { key, value } = parseAssignment(options.set);
        saveUserSetting(key, value);
        success(`Set ${key} in ${USER_CONFIG_FILE}`);
        return;
      }
      output(getConfig(), 'json');
    });
}
