import { Command } from 'commander';
import { withOutputOptions } from '../../base/base-command';
import { RepoCommand } from './repo-command';
import type { RepoCommandOptions } from './repo-command';

export function registerRepoCommands(program: Command): void {
  const repoCommand = new RepoCommand();

  const repo = program
    .command('repo')
    .description('Manage custom theme repositories')
    .alias('r');

  // themekit repo add <url>
  withOutputOptions(
    repo
      .command('add <url>')
      .description('Add a custom repository URL')
  ).action(async (url: string, options: RepoCommandOptions) => {
    await repoCommand.executeAdd(url, options);
  });

  // themekit repo remove <url>
  withOutputOptions(
    repo
      .command('remove <url>')
      .description('Remove a custom repository URL')
      .alias('rm')
  ).action(async (url: string, options: RepoCommandOptions) => {
    await repoCommand.executeRemove(url, options);
  });

  // themekit repo list
  withOutputOptions(
    repo
      .command('list')
      .description('List custom repositories')
      .alias('ls')
  ).action(async (options: RepoCommandOptions) => {
    await repoCommand.executeList(options);
  });
}
