import { homedir } from 'os';
import { join } from 'path';
import { mkdirSync, existsSync, readFileSync, writeFileSync } from 'fs';
import {
  UserConfig,
  ResolvedConfig,
  DEFAULT_CONFIG,
  MAX_LOG_LIMIT,
  VALID_CONFIG_KEYS,
  ConfigKey,
} from '../types/config';
import { isValidTimeZone } from './timezone';
import { logger } from './logger';

/**
 * Get the data directory for the ledger
 * Respects TL_DATA_DIR environment variable
 */
export function getDataDir(): string {
  const customDir = process.env.TL_DATA_DIR;

  if (customDir) {
    return customDir;
  }

  // Default to ~/.local/share/tl
  return join(homedir(), '.local', 'share', 'tl');
}

/**
 * Get the config directory
 * Respects TL_CONFIG_DIR environment variable
 */
export function getConfigDir(): string {
  return process.env.TL_CONFIG_DIR || join(homedir(), '.config', 'tl');
}

export function getConfigPath(): string {
  return join(getConfigDir(), 'config.json');
}

export function getDatabasePath(): string {
  return join(getDataDir(), 'tl.db');
}

export function ensureDataDir(): void {
  const dataDir = getDataDir();

  if (!existsSync(dataDir)) {
    mkdirSync(dataDir, { recursive: true });
  }
}

export function ensureConfigDir(): void {
  const configDir = getConfigDir();

  if (!existsSync(configDir)) {
    mkdirSync(configDir, { recursive: true });
  }
}

/**
 * Split a comma-separated name list, dropping blanks
 */
export function parseNameList(value: string): string[] {
  return value
    .split(',')
    .map((name) => name.trim())
    .filter((name) => name.length > 0);
}

function isPositiveInteger(value: unknown): value is number {
  return typeof value === 'number' && Number.isInteger(value) && value > 0;
}

function field(source: object, key: ConfigKey): unknown {
  return key in source ? Reflect.get(source, key) : undefined;
}

/**
 * Load the values stored in the config file, without defaults or
 * environment overrides. Invalid values are dropped with a warning.
 */
export function loadConfigFile(): UserConfig {
  const configPath = getConfigPath();

  if (!existsSync(configPath)) {
    return {};
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(configPath, 'utf-8'));
  } catch (error) {
    logger.warning(`Could not parse config file, using defaults: ${error}`);
    return {};
  }

  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    logger.warning(`Config file ${configPath} is not a JSON object, using defaults`);
    return {};
  }

  const config: UserConfig = {};

  const timezone = field(parsed, 'timezone');
  if (typeof timezone === 'string' && isValidTimeZone(timezone)) {
    config.timezone = timezone;
  } else if (timezone !== undefined) {
    logger.warning(`Ignoring invalid timezone in config: ${String(timezone)}`);
  }

  const allowedUsers = field(parsed, 'allowedUsers');
  if (Array.isArray(allowedUsers)) {
    config.allowedUsers = allowedUsers
      .filter((name): name is string => typeof name === 'string')
      .map((name) => name.trim())
      .filter((name) => name.length > 0);
  }

  const logLimit = field(parsed, 'logLimit');
  if (isPositiveInteger(logLimit)) {
    config.logLimit = Math.min(logLimit, MAX_LOG_LIMIT);
  }

  const currentUser = field(parsed, 'currentUser');
  if (typeof currentUser === 'string' && currentUser.trim()) {
    config.currentUser = currentUser.trim();
  }

  return config;
}

/**
 * Load configuration: defaults, then the config file, then environment
 * (TL_TIMEZONE, TL_ALLOWED_USERS).
 */
export function loadConfig(): ResolvedConfig {
  const file = loadConfigFile();

  const config: ResolvedConfig = {
    timezone: file.timezone ?? DEFAULT_CONFIG.timezone,
    allowedUsers: file.allowedUsers ?? [...DEFAULT_CONFIG.allowedUsers],
    logLimit: file.logLimit ?? DEFAULT_CONFIG.logLimit,
    currentUser: file.currentUser,
  };

  const envTimezone = process.env.TL_TIMEZONE;
  if (envTimezone) {
    if (isValidTimeZone(envTimezone)) {
      config.timezone = envTimezone;
    } else {
      logger.warning(`Ignoring invalid TL_TIMEZONE: ${envTimezone}`);
    }
  }

  const envUsers = process.env.TL_ALLOWED_USERS;
  if (envUsers !== undefined) {
    config.allowedUsers = parseNameList(envUsers);
  }

  return config;
}

/**
 * Save user configuration
 * Only non-default values are written.
 */
export function saveConfig(config: UserConfig): void {
  ensureConfigDir();

  const toSave: UserConfig = {};

  if (config.timezone && config.timezone !== DEFAULT_CONFIG.timezone) {
    toSave.timezone = config.timezone;
  }
  if (config.allowedUsers && config.allowedUsers.length > 0) {
    toSave.allowedUsers = config.allowedUsers;
  }
  if (config.logLimit && config.logLimit !== DEFAULT_CONFIG.logLimit) {
    toSave.logLimit = config.logLimit;
  }
  if (config.currentUser) {
    toSave.currentUser = config.currentUser;
  }

  writeFileSync(getConfigPath(), JSON.stringify(toSave, null, 2) + '\n', 'utf-8');
}

/**
 * Validate a config key
 */
export function isValidConfigKey(key: string): key is ConfigKey {
  return VALID_CONFIG_KEYS.some((valid) => valid === key);
}

/**
 * Convert a raw string into the stored value for a key.
 * Returns undefined when the value is not acceptable.
 */
export function parseConfigValue(key: ConfigKey, value: string): UserConfig | undefined {
  switch (key) {
    case 'timezone':
      return isValidTimeZone(value) ? { timezone: value } : undefined;
    case 'allowedUsers':
      return { allowedUsers: parseNameList(value) };
    case 'logLimit': {
      const limit = Number(value);
      return isPositiveInteger(limit) && limit <= MAX_LOG_LIMIT ? { logLimit: limit } : undefined;
    }
    case 'currentUser':
      return value.trim() ? { currentUser: value.trim() } : undefined;
    default:
      return undefined;
  }
}

/**
 * Render a config value for display
 */
export function formatConfigValue(config: ResolvedConfig, key: ConfigKey): string {
  switch (key) {
    case 'allowedUsers':
      return config.allowedUsers.join(',');
    case 'logLimit':
      return String(config.logLimit);
    case 'timezone':
      return config.timezone;
    case 'currentUser':
      return config.currentUser ?? '';
    default:
      return '';
  }
}
