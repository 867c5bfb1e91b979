/**
 * Base Command Class for the themekit CLI
 *
 * Provides common output and error handling across all commands.
 */

import { Command } from 'commander';
import { DependencyInjectionService } from '../services/dependency-injection';
import type { BaseCommandOptions, ICommand } from '../interfaces/command';

/**
 * Standard options shared by every sub-command
 */
export function withOutputOptions(command: Command): Command {
  return command
    .option('--json', 'Output as JSON')
    .option('-v, --verbose', 'Verbose output')
    .option('-q, --quiet', 'Quiet output');
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Abstract base class for all CLI commands
 */
export abstract class BaseCommand<TOptions extends BaseCommandOptions = BaseCommandOptions>
  implements ICommand {

  protected readonly dependencyService = DependencyInjectionService.getInstance();

  /**
   * Register the command with Commander.js
   * Must be implemented by each command
   */
  abstract register(program: Command): void;

  /**
   * Handle errors consistently across all commands
   */
  protected handleError(message: string, options: TOptions, error?: Error, exitCode: number = 1): void {
    const isJson = options.json || false;
    const isVerbose = options.verbose || false;

    if (isJson) {
      console.log(JSON.stringify({
        success: false,
        error: message,
        exitCode
      }, null, 2));
    } else {
      const formattedMessage = message.startsWith('❌') ? message : `❌ ${message}`;
      console.error(formattedMessage);
      if (isVerbose && error) {
        console.error(`🔍 Technical details: ${error.stack}`);
      }
    }

    process.exit(exitCode);
  }

  /**
   * Report a completed change
   */
  protected handleSuccess(data: unknown, options: TOptions, message: string): void {
    if (options.json) {
      console.log(JSON.stringify({
        success: true,
        data
      }, null, 2));
    } else if (!options.quiet) {
      console.log(`✅ ${message}`);
    }
  }

  /**
   * Print query results: JSON envelope with data, or plain text
   */
  protected handleOutput(data: unknown, text: string, options: TOptions): void {
    if (options.json) {
      console.log(JSON.stringify({
        success: true,
        data
      }, null, 2));
    } else if (!options.quiet) {
      console.log(text);
    }
  }
}
