/**
 * Filesystem-dependent implementations
 *
 * This module exports all implementations that require filesystem access.
 */

export { FsConfigStore, createConfigManager } from './config_store/fs';
export type { FsConfigStoreOptions } from './config_store/fs';
