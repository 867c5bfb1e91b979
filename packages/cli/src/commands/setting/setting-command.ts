import { Command } from 'commander';
import { parseSettingValue } from '@themekit/core';
import { BaseCommand, errorMessage } from '../../base/base-command';
import type { BaseCommandOptions } from '../../interfaces/command';

export interface SettingGetOptions extends BaseCommandOptions {
  default?: string;
}

export interface SettingCommandOptions extends BaseCommandOptions {}

export class SettingCommand extends BaseCommand<SettingCommandOptions> {

  register(_program: Command): void {
    // Registration handled by registerSettingCommands() in setting.ts
  }

  async executeGet(key: string, options: SettingGetOptions): Promise<void> {
    try {
      const defaultValue = options.default === undefined ? undefined : parseSettingValue(options.default);
      const value = this.dependencyService.getConfigManager().getSetting(key, defaultValue);

      if (value === undefined) {
        this.handleError(`Setting not found: ${key}`, options);
        return;
      }

      this.handleOutput({ key, value }, String(value), options);
    } catch (error) {
      this.handleError(
        `Failed to read setting: ${errorMessage(error)}`,
        options,
        error instanceof Error ? error : undefined
      );
    }
  }

  async executeSet(key: string, rawValue: string, options: SettingCommandOptions): Promise<void> {
    try {
      const value = parseSettingValue(rawValue);
      const result = this.dependencyService.getConfigManager().setSettingResult(key, value);

      if (result.status === 'saved') {
        this.handleSuccess({ key, value }, options, `Setting updated: ${key} = ${value}`);
        return;
      }

      this.handleError(`Failed to write configuration: ${this.dependencyService.getConfigPath()}`, options);
    } catch (error) {
      this.handleError(
        `Failed to set setting: ${errorMessage(error)}`,
        options,
        error instanceof Error ? error : undefined
      );
    }
  }

  async executeList(options: SettingCommandOptions): Promise<void> {
    const settings = this.dependencyService.getConfigManager().listSettings();
    const lines = Object.entries(settings).map(([key, value]) => `${key} = ${value}`);
    const text = lines.length > 0 ? lines.join('\n') : 'No settings configured';

    this.handleOutput({ settings }, text, options);
  }
}
