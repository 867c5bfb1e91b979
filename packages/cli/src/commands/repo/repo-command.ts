import { Command } from 'commander';
import { BaseCommand, errorMessage } from '../../base/base-command';
import type { BaseCommandOptions } from '../../interfaces/command';

export interface RepoCommandOptions extends BaseCommandOptions {}

export class RepoCommand extends BaseCommand<RepoCommandOptions> {

  register(_program: Command): void {
    // Registration handled by registerRepoCommands() in repo.ts
  }

  async executeAdd(url: string, options: RepoCommandOptions): Promise<void> {
    try {
      const result = this.dependencyService.getConfigManager().addRepositoryResult(url);

      switch (result.status) {
        case 'saved':
          this.handleSuccess({ url, status: 'added' }, options, `Repository added: ${url}`);
          return;
        case 'already_exists':
          this.handleError(`Repository already exists: ${url}`, options);
          return;
        default:
          this.handleError(`Failed to write configuration: ${this.dependencyService.getConfigPath()}`, options);
      }
    } catch (error) {
      this.handleError(
        `Failed to add repository: ${errorMessage(error)}`,
        options,
        error instanceof Error ? error : undefined
      );
    }
  }

  async executeRemove(url: string, options: RepoCommandOptions): Promise<void> {
    try {
      const result = this.dependencyService.getConfigManager().removeRepositoryResult(url);

      switch (result.status) {
        case 'saved':
          this.handleSuccess({ url, status: 'removed' }, options, `Repository removed: ${url}`);
          return;
        case 'not_found':
          this.handleError(`Repository not found: ${url}`, options);
          return;
        default:
          this.handleError(`Failed to write configuration: ${this.dependencyService.getConfigPath()}`, options);
      }
    } catch (error) {
      this.handleError(
        `Failed to remove repository: ${errorMessage(error)}`,
        options,
        error instanceof Error ? error : undefined
      );
    }
  }

  async executeList(options: RepoCommandOptions): Promise<void> {
    const repositories = this.dependencyService.getConfigManager().listRepositories();
    const text = repositories.length > 0
      ? repositories.join('\n')
      : 'No custom repositories configured';

    this.handleOutput({ repositories }, text, options);
  }
}
