import { Command } from 'commander';
import { withOutputOptions } from '../../base/base-command';
import { ConfigCommand } from './config-command';
import type { ConfigCommandOptions } from './config-command';

export function registerConfigCommands(program: Command): void {
  const configCommand = new ConfigCommand();

  const config = program
    .command('config')
    .description('Inspect the configuration file');

  // themekit config path
  withOutputOptions(
    config
      .command('path')
      .description('Print the configuration file path')
  ).action(async (options: ConfigCommandOptions) => {
    await configCommand.executePath(options);
  });

  // themekit config show
  withOutputOptions(
    config
      .command('show')
      .description('Print the loaded configuration, defaults included')
  ).action(async (options: ConfigCommandOptions) => {
    await configCommand.executeShow(options);
  });
}
