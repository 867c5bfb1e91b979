/**
 * ConfigManager - Themekit Configuration Manager
 *
 * Provides typed access to custom repositories and settings.
 * Every operation is a full load → mutate → save round trip against the
 * ConfigStore; nothing is cached between calls.
 */

import type { ConfigStore } from '../config_store/config_store';
import type {
  IConfigManager,
  ThemeConfig,
  ConfigMutationResult,
} from './config_manager.types';

/**
 * Configuration Manager Class
 *
 * @example
 * ```typescript
 * // Production usage
 * import { FsConfigStore } from '@themekit/core/fs';
 * const configManager = new ConfigManager(new FsConfigStore());
 *
 * // Test usage
 * import { MemoryConfigStore } from '@themekit/core/memory';
 * const configManager = new ConfigManager(new MemoryConfigStore());
 * ```
 */
export class ConfigManager implements IConfigManager {
  private readonly configStore: ConfigStore;

  constructor(configStore: ConfigStore) {
    this.configStore = configStore;
  }

  /**
   * Load configuration (defaults back-filled)
   */
  loadConfig(): ThemeConfig {
    return this.configStore.load();
  }

  private persist(config: ThemeConfig): ConfigMutationResult {
    return this.configStore.save(config) ? { status: 'saved' } : { status: 'write_failed' };
  }

  /**
   * Append a repository URL unless it is already configured
   */
  addRepositoryResult(url: string): ConfigMutationResult {
    const config = this.loadConfig();

    if (config.custom_repositories.includes(url)) {
      return { status: 'already_exists' };
    }

    config.custom_repositories.push(url);
    return this.persist(config);
  }

  /**
   * @returns true if added and saved, false if already present or the write failed
   */
  addRepository(url: string): boolean {
    return this.addRepositoryResult(url).status === 'saved';
  }

  /**
   * Remove a repository URL. Nothing is written when it is not configured.
   */
  removeRepositoryResult(url: string): ConfigMutationResult {
    const config = this.loadConfig();
    const index = config.custom_repositories.indexOf(url);

    if (index === -1) {
      return { status: 'not_found' };
    }

    config.custom_repositories.splice(index, 1);
    return this.persist(config);
  }

  /**
   * @returns true if removed and saved, false if not found or the write failed
   */
  removeRepository(url: string): boolean {
    return this.removeRepositoryResult(url).status === 'saved';
  }

  listRepositories(): string[] {
    return this.loadConfig().custom_repositories || [];
  }

  /**
   * Get a setting, or defaultValue when the key is not set
   */
  getSetting(key: string): number | undefined;
  getSetting(key: string, defaultValue: number): number;
  getSetting(key: string, defaultValue?: number): number | undefined;
  getSetting(key: string, defaultValue?: number): number | undefined {
    const settings = this.loadConfig().settings || {};
    return Object.hasOwn(settings, key) ? settings[key] : defaultValue;
  }

  setSettingResult(key: string, value: number): ConfigMutationResult {
    const config = this.loadConfig();

    config.settings = { ...config.settings, [key]: value };
    return this.persist(config);
  }

  /**
   * @returns true if the setting was saved
   */
  setSetting(key: string, value: number): boolean {
    return this.setSettingResult(key, value).status === 'saved';
  }

  listSettings(): Record<string, number> {
    return { ...this.loadConfig().settings };
  }
}
