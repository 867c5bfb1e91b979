// Configuration
export { ConfigManager } from "./config_manager";
export type {
  IConfigManager,
  ThemeConfig,
  ConfigMutationResult,
  ConfigMutationStatus,
} from "./config_manager";

// Persistence
export * from "./config_store";
export * from "./fs";
export * from "./memory";

// Setting values
export { parseSettingValue, InvalidSettingValueError } from "./setting_value";

// Logging
export * as Logger from "./logger";
