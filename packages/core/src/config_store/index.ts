/**
 * ConfigStore - Configuration persistence abstraction
 *
 * This module exports the interface plus the pieces shared by every
 * backend (paths, defaults, fail-safe reader).
 *
 * For implementations, use:
 * - @themekit/core/fs for FsConfigStore and createConfigManager
 * - @themekit/core/memory for MemoryConfigStore
 */

export type { ConfigStore } from './config_store';
export {
  createDefaultConfig,
  DEFAULT_CACHE_EXPIRY,
  DEFAULT_MAX_CACHE_SIZE,
} from './config_defaults';
export {
  resolveConfigPaths,
  defaultConfigDir,
  expandHome,
  CONFIG_DIR_ENV,
  DEFAULT_CONFIG_FILE_NAME,
} from './config_paths';
export type { ConfigPathOptions, ConfigPaths } from './config_paths';
export {
  readConfigDocument,
  parseConfigDocument,
  checkConfigDocument,
  mergeWithDefaults,
  collapseToConfig,
  STORED_CONFIG_SCHEMA,
} from './config_reader';
export type { ConfigReadResult, ConfigReadStatus, StoredConfigDocument } from './config_reader';
