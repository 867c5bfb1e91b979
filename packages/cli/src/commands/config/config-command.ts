import { Command } from 'commander';
import { BaseCommand } from '../../base/base-command';
import type { BaseCommandOptions } from '../../interfaces/command';

export interface ConfigCommandOptions extends BaseCommandOptions {}

export class ConfigCommand extends BaseCommand<ConfigCommandOptions> {

  register(_program: Command): void {
    // Registration handled by registerConfigCommands() in config.ts
  }

  async executePath(options: ConfigCommandOptions): Promise<void> {
    const configPath = this.dependencyService.getConfigPath();
    this.handleOutput({ path: configPath }, configPath, options);
  }

  async executeShow(options: ConfigCommandOptions): Promise<void> {
    const config = this.dependencyService.getConfigManager().loadConfig();
    this.handleOutput(config, JSON.stringify(config, null, 2), options);
  }
}
