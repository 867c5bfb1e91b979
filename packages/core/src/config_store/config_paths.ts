import * as os from 'os';
import * as path from 'path';

export const CONFIG_DIR_ENV = 'THEMEKIT_CONFIG_DIR';
export const DEFAULT_CONFIG_FILE_NAME = 'config.json';

export interface ConfigPathOptions {
  /** Directory holding the config file (default: $THEMEKIT_CONFIG_DIR or ~/.config/themekit) */
  configDir?: string;
  /** Config file name inside configDir (default: 'config.json') */
  fileName?: string;
}

export interface ConfigPaths {
  configDir: string;
  configFile: string;
}

/**
 * Expand a leading `~` to the user's home directory.
 */
export function expandHome(dir: string, homeDir: string = os.homedir()): string {
  if (dir === '~') {
    return homeDir;
  }
  if (dir.startsWith('~/')) {
    return path.join(homeDir, dir.slice(2));
  }
  return dir;
}

export function defaultConfigDir(homeDir: string = os.homedir()): string {
  return path.join(homeDir, '.config', 'themekit');
}

/**
 * Resolve where the configuration lives.
 *
 * Priority: explicit option, then THEMEKIT_CONFIG_DIR, then ~/.config/themekit.
 */
export function resolveConfigPaths(
  options: ConfigPathOptions = {},
  env: NodeJS.ProcessEnv = process.env
): ConfigPaths {
  const homeDir = os.homedir();
  const fromEnv = env[CONFIG_DIR_ENV];
  const rawDir = options.configDir || fromEnv || defaultConfigDir(homeDir);
  const configDir = path.resolve(expandHome(rawDir, homeDir));

  return {
    configDir,
    configFile: path.join(configDir, options.fileName || DEFAULT_CONFIG_FILE_NAME),
  };
}
