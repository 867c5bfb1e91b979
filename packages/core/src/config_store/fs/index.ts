export { FsConfigStore, createConfigManager } from './fs_config_store';
export type { FsConfigStoreOptions } from './fs_config_store';
