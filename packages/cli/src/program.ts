import { Command } from 'commander';
import { registerRepoCommands } from './commands/repo/repo';
import { registerSettingCommands } from './commands/setting/setting';
import { registerConfigCommands } from './commands/config/config';
import { DependencyInjectionService } from './services/dependency-injection';

type GlobalOptions = {
  configDir?: string;
};

export function createProgram(): Command {
  const program = new Command();

  program
    .name('themekit')
    .description('Manage theme repositories and settings')
    .version('0.1.0')
    .option('-c, --config-dir <dir>', 'Configuration directory (default: $THEMEKIT_CONFIG_DIR or ~/.config/themekit)');

  // Point the shared ConfigManager at --config-dir before any command runs
  program.hook('preAction', () => {
    const { configDir } = program.opts<GlobalOptions>();
    DependencyInjectionService.getInstance().configure(configDir ? { configDir } : {});
  });

  registerRepoCommands(program);
  registerSettingCommands(program);
  registerConfigCommands(program);

  return program;
}
