/**
 * ConfigManager Types
 */

/**
 * Themekit configuration document (config.json).
 *
 * Field names match the keys written to disk. Top-level keys other than
 * `custom_repositories` and `settings` are carried through untouched.
 */
export type ThemeConfig = {
  custom_repositories: string[];
  settings: Record<string, number>;
  [key: string]: unknown;
};

/**
 * Outcome of a load → mutate → save round trip.
 *
 * - saved: the mutation was written
 * - already_exists: repository was already configured, nothing written
 * - not_found: repository was not configured, nothing written
 * - write_failed: the config file could not be written
 */
export type ConfigMutationResult =
  | { status: 'saved' }
  | { status: 'already_exists' }
  | { status: 'not_found' }
  | { status: 'write_failed' };

export type ConfigMutationStatus = ConfigMutationResult['status'];

/**
 * Public interface of ConfigManager
 */
export interface IConfigManager {
  loadConfig(): ThemeConfig;
  addRepository(url: string): boolean;
  addRepositoryResult(url: string): ConfigMutationResult;
  removeRepository(url: string): boolean;
  removeRepositoryResult(url: string): ConfigMutationResult;
  listRepositories(): string[];
  getSetting(key: string): number | undefined;
  getSetting(key: string, defaultValue: number): number;
  getSetting(key: string, defaultValue?: number): number | undefined;
  setSetting(key: string, value: number): boolean;
  setSettingResult(key: string, value: number): ConfigMutationResult;
  listSettings(): Record<string, number>;
}
