import type { ThemeConfig } from '../config_manager/config_manager.types';

export const DEFAULT_CACHE_EXPIRY = 300;
export const DEFAULT_MAX_CACHE_SIZE = 50;

/**
 * Built-in configuration. Returns a new object on every call so callers
 * are free to mutate the result.
 */
export function createDefaultConfig(): ThemeConfig {
  return {
    custom_repositories: [],
    settings: {
      cache_expiry: DEFAULT_CACHE_EXPIRY,
      max_cache_size: DEFAULT_MAX_CACHE_SIZE,
    },
  };
}
