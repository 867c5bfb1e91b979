/**
 * FsConfigStore - Filesystem implementation of ConfigStore
 *
 * Handles persistence of config.json to the local filesystem.
 * Single-writer: there is no locking and writes are not atomic, so a
 * crash mid-write can leave a truncated file. The next load() then falls
 * back to defaults.
 */

import { existsSync, mkdirSync, writeFileSync } from 'fs';
import type { ConfigStore } from '../config_store';
import type { ThemeConfig } from '../../config_manager/config_manager.types';
import { ConfigManager } from '../../config_manager/config_manager';
import { resolveConfigPaths } from '../config_paths';
import type { ConfigPathOptions } from '../config_paths';
import { collapseToConfig, readConfigDocument } from '../config_reader';
import type { ConfigReadResult } from '../config_reader';
import { createLogger } from '../../logger';

const logger = createLogger('[FsConfigStore] ');

export type FsConfigStoreOptions = ConfigPathOptions;

/**
 * Filesystem-based ConfigStore implementation.
 *
 * Stores configuration in <configDir>/<fileName>, by default
 * ~/.config/themekit/config.json.
 *
 * @example
 * ```typescript
 * const store = new FsConfigStore({ configDir: '/tmp/themekit-test' });
 * const config = store.load();
 * config.custom_repositories.push('https://example.com/themes');
 * store.save(config);
 * ```
 */
export class FsConfigStore implements ConfigStore {
  private readonly configDir: string;
  private readonly configFile: string;

  constructor(options: FsConfigStoreOptions = {}) {
    const paths = resolveConfigPaths(options);
    this.configDir = paths.configDir;
    this.configFile = paths.configFile;
  }

  getConfigDir(): string {
    return this.configDir;
  }

  getConfigPath(): string {
    return this.configFile;
  }

  ensureDirectory(): void {
    if (!existsSync(this.configDir)) {
      mkdirSync(this.configDir, { recursive: true });
    }
  }

  /**
   * Read config.json without collapsing failures to defaults.
   */
  read(): ConfigReadResult {
    return readConfigDocument(this.configFile);
  }

  /**
   * Load configuration from config.json
   *
   * Missing file: defaults, nothing created.
   * Unreadable, malformed or wrongly shaped file: defaults.
   */
  load(): ThemeConfig {
    return collapseToConfig(this.read(), this.configFile);
  }

  /**
   * Save configuration to config.json (2-space indentation, full overwrite)
   *
   * Errors creating the directory propagate; write errors return false.
   */
  save(config: ThemeConfig): boolean {
    this.ensureDirectory();

    try {
      writeFileSync(this.configFile, JSON.stringify(config, null, 2), 'utf-8');
      return true;
    } catch (error) {
      logger.debug(
        `Failed to write ${this.configFile}: ${error instanceof Error ? error.message : String(error)}`
      );
      return false;
    }
  }
}

/**
 * Create a ConfigManager backed by the filesystem.
 *
 * @param options - Config directory and file name (defaults to ~/.config/themekit/config.json)
 */
export function createConfigManager(options: FsConfigStoreOptions = {}): ConfigManager {
  return new ConfigManager(new FsConfigStore(options));
}
