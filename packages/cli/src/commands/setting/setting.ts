import { Command } from 'commander';
import { withOutputOptions } from '../../base/base-command';
import { SettingCommand } from './setting-command';
import type { SettingCommandOptions, SettingGetOptions } from './setting-command';

export function registerSettingCommands(program: Command): void {
  const settingCommand = new SettingCommand();

  const setting = program
    .command('setting')
    .description('Read and change integer settings')
    .alias('s');

  // themekit setting get <key> [--default <n>]
  withOutputOptions(
    setting
      .command('get <key>')
      .description('Print a setting value')
      .option('-d, --default <value>', 'Value to print when the setting is not set')
  ).action(async (key: string, options: SettingGetOptions) => {
    await settingCommand.executeGet(key, options);
  });

  // themekit setting set <key> <value>
  withOutputOptions(
    setting
      .command('set <key> <value>')
      .description('Set an integer setting')
  ).action(async (key: string, value: string, options: SettingCommandOptions) => {
    await settingCommand.executeSet(key, value, options);
  });

  // themekit setting list
  withOutputOptions(
    setting
      .command('list')
      .description('List all settings')
      .alias('ls')
  ).action(async (options: SettingCommandOptions) => {
    await settingCommand.executeList(options);
  });
}
