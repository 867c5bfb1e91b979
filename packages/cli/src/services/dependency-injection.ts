import { ConfigManager, FsConfigStore } from '@themekit/core';
import type { FsConfigStoreOptions } from '@themekit/core';

/**
 * Dependency Injection Service for the themekit CLI
 *
 * Builds the config store and manager once per process, using the
 * directory given by --config-dir (or the core defaults).
 */
export class DependencyInjectionService {
  private static instance: DependencyInjectionService | null = null;
  private storeOptions: FsConfigStoreOptions = {};
  private configStore: FsConfigStore | null = null;
  private configManager: ConfigManager | null = null;

  private constructor() { }

  /**
   * Singleton pattern to ensure single instance across CLI
   */
  static getInstance(): DependencyInjectionService {
    if (!DependencyInjectionService.instance) {
      DependencyInjectionService.instance = new DependencyInjectionService();
    }
    return DependencyInjectionService.instance;
  }

  /**
   * Drop the singleton (tests)
   */
  static resetInstance(): void {
    DependencyInjectionService.instance = null;
  }

  /**
   * Set where the configuration lives. Discards already built instances.
   */
  configure(options: FsConfigStoreOptions): void {
    this.storeOptions = { ...options };
    this.configStore = null;
    this.configManager = null;
  }

  getConfigStore(): FsConfigStore {
    if (!this.configStore) {
      this.configStore = new FsConfigStore(this.storeOptions);
    }
    return this.configStore;
  }

  getConfigManager(): ConfigManager {
    if (!this.configManager) {
      this.configManager = new ConfigManager(this.getConfigStore());
    }
    return this.configManager;
  }

  getConfigPath(): string {
    return this.getConfigStore().getConfigPath();
  }
}
