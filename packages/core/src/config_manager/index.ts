export { ConfigManager } from './config_manager';
export type {
  IConfigManager,
  ThemeConfig,
  ConfigMutationResult,
  ConfigMutationStatus,
} from './config_manager.types';
