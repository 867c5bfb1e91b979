/**
 * Fail-safe reading of config.json.
 *
 * Reading never throws. Every outcome is a ConfigReadResult, and
 * collapseToConfig() turns anything but 'ok' into the default configuration.
 */

import Ajv from 'ajv';
import type { ErrorObject } from 'ajv';
import { existsSync, readFileSync } from 'fs';
import type { ThemeConfig } from '../config_manager/config_manager.types';
import { createLogger } from '../logger';
import { createDefaultConfig } from './config_defaults';

const logger = createLogger('[ConfigReader] ');

/**
 * A parsed document before defaults are back-filled: any JSON object.
 */
export type StoredConfigDocument = {
  [key: string]: unknown;
};

export type ConfigReadResult =
  | { status: 'ok'; document: StoredConfigDocument }
  | { status: 'missing' }
  | { status: 'unreadable'; error: Error }
  | { status: 'malformed'; error: Error }
  | { status: 'invalid'; errors: ErrorObject[] };

export type ConfigReadStatus = ConfigReadResult['status'];

/**
 * Only the top level must be an object. Element types of the known keys
 * are not checked; stored values are used as-is.
 */
export const STORED_CONFIG_SCHEMA = { type: 'object' } as const;

const ajv = new Ajv({ allErrors: true });
const validateStoredConfig = ajv.compile<StoredConfigDocument>(STORED_CONFIG_SCHEMA);
const isRepositoryList = ajv.compile<string[]>({ type: 'array' });
const isSettingsMap = ajv.compile<Record<string, number>>({ type: 'object' });

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * Check a parsed JSON value against the stored document shape.
 */
export function checkConfigDocument(value: unknown): ConfigReadResult {
  if (validateStoredConfig(value)) {
    return { status: 'ok', document: value };
  }
  return { status: 'invalid', errors: validateStoredConfig.errors ?? [] };
}

/**
 * Parse config text. Never throws.
 */
export function parseConfigDocument(content: string): ConfigReadResult {
  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (error) {
    return { status: 'malformed', error: toError(error) };
  }
  return checkConfigDocument(parsed);
}

/**
 * Read and parse a config file. Never throws.
 */
export function readConfigDocument(configFile: string): ConfigReadResult {
  if (!existsSync(configFile)) {
    return { status: 'missing' };
  }

  let content: string;
  try {
    content = readFileSync(configFile, 'utf-8');
  } catch (error) {
    return { status: 'unreadable', error: toError(error) };
  }

  return parseConfigDocument(content);
}

/**
 * Back-fill each missing top-level default key.
 *
 * Only the top level is merged: a stored `settings` object is kept as-is,
 * without the default setting keys. A known key holding the wrong kind of
 * value (settings as a list, repositories as a string) falls back to its
 * default alone; every other key is kept.
 */
export function mergeWithDefaults(document: StoredConfigDocument): ThemeConfig {
  const defaults = createDefaultConfig();
  const repositories = document['custom_repositories'];
  const settings = document['settings'];

  if (repositories !== undefined && !isRepositoryList(repositories)) {
    logger.debug('Ignoring custom_repositories that is not a list');
  }
  if (settings !== undefined && !isSettingsMap(settings)) {
    logger.debug('Ignoring settings that is not an object');
  }

  return {
    ...document,
    custom_repositories: isRepositoryList(repositories) ? repositories : defaults.custom_repositories,
    settings: isSettingsMap(settings) ? settings : defaults.settings,
  };
}

/**
 * Turn a read result into a usable configuration.
 */
export function collapseToConfig(result: ConfigReadResult, source: string = 'config'): ThemeConfig {
  switch (result.status) {
    case 'ok':
      return mergeWithDefaults(result.document);
    case 'missing':
      return createDefaultConfig();
    case 'unreadable':
    case 'malformed':
      logger.debug(`Ignoring ${result.status} ${source}: ${result.error.message}`);
      return createDefaultConfig();
    case 'invalid':
      logger.debug(`Ignoring ${source} with unexpected shape: ${ajv.errorsText(result.errors)}`);
      return createDefaultConfig();
  }
}
