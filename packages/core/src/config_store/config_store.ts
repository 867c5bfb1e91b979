/**
 * ConfigStore Interface
 *
 * Abstraction for config.json persistence.
 * Enables backend-agnostic access to the themekit configuration
 * (filesystem, memory for tests).
 */

import type { ThemeConfig } from '../config_manager/config_manager.types';

/**
 * Interface for configuration persistence.
 *
 * Every call is a stateless, synchronous transaction against the backing
 * storage. Nothing is cached between calls.
 *
 * Implementations:
 * - FsConfigStore: Filesystem-based (~/.config/themekit/config.json)
 * - MemoryConfigStore: In-memory for tests
 *
 * @example
 * ```typescript
 * // Production with filesystem
 * const store = new FsConfigStore({ configDir: '/tmp/themekit' });
 * const config = store.load();
 *
 * // Tests with memory
 * const store = new MemoryConfigStore();
 * store.save({ custom_repositories: [], settings: {} });
 * ```
 */
export interface ConfigStore {
  /**
   * Create the configuration directory (and parents) if absent.
   * Filesystem errors are not caught.
   */
  ensureDirectory(): void;

  /**
   * Load configuration, back-filling missing top-level defaults.
   *
   * Never throws: a missing, unreadable or corrupt document yields the
   * default configuration.
   */
  load(): ThemeConfig;

  /**
   * Overwrite the stored configuration.
   *
   * @returns true if written, false on a write failure
   */
  save(config: ThemeConfig): boolean;
}
