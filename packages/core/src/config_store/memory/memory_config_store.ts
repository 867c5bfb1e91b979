/**
 * MemoryConfigStore - In-memory implementation of ConfigStore
 *
 * Useful for testing where filesystem access is not wanted.
 * The configuration is kept as serialized text, so load() behaves like a
 * fresh read: callers never share object identity with the store.
 */

import type { ConfigStore } from '../config_store';
import type { ThemeConfig } from '../../config_manager/config_manager.types';
import { collapseToConfig, parseConfigDocument } from '../config_reader';

/**
 * In-memory ConfigStore implementation for tests.
 *
 * @example
 * ```typescript
 * const store = new MemoryConfigStore();
 * store.setRawContent('not json');
 *
 * const manager = new ConfigManager(store);
 * manager.listRepositories(); // []
 * ```
 */
export class MemoryConfigStore implements ConfigStore {
  private content: string | null = null;
  private directoryCreated = false;
  private saveCount = 0;

  /** When true, save() reports a write failure and keeps the old content */
  failWrites = false;

  ensureDirectory(): void {
    this.directoryCreated = true;
  }

  load(): ThemeConfig {
    if (this.content === null) {
      return collapseToConfig({ status: 'missing' }, 'memory config');
    }
    return collapseToConfig(parseConfigDocument(this.content), 'memory config');
  }

  save(config: ThemeConfig): boolean {
    this.ensureDirectory();
    if (this.failWrites) {
      return false;
    }
    this.content = JSON.stringify(config, null, 2);
    this.saveCount++;
    return true;
  }

  // ==================== Test Helper Methods ====================

  /**
   * Seed stored text directly; null simulates a missing file
   */
  setRawContent(content: string | null): void {
    this.content = content;
  }

  getRawContent(): string | null {
    return this.content;
  }

  getSaveCount(): number {
    return this.saveCount;
  }

  hasDirectory(): boolean {
    return this.directoryCreated;
  }

  /**
   * Reset store to its initial state
   */
  clear(): void {
    this.content = null;
    this.directoryCreated = false;
    this.saveCount = 0;
    this.failWrites = false;
  }
}
