import chalk from 'chalk';
import {
  loadConfig,
  loadConfigFile,
  saveConfig,
  getConfigPath,
  isValidConfigKey,
  parseConfigValue,
  formatConfigValue,
} from '../../utils/config';
import { DEFAULT_CONFIG, ConfigKey, VALID_CONFIG_KEYS, MAX_LOG_LIMIT } from '../../types/config';
import { ValidationError } from '../../types/errors';
import { handleCommandError } from '../context';

/**
 * tl config command implementation
 * Manages user configuration
 */
export function configCommand(subcommand?: string, args: string[] = []): void {
  try {
    // No subcommand: show current config
    if (!subcommand) {
      showConfig();
      return;
    }

    switch (subcommand) {
      case 'get':
        if (args.length === 0) {
          throw new ValidationError('Missing config key. Usage: tl config get <key>');
        }
        getConfigValue(args[0]);
        break;

      case 'set':
        if (args.length < 2) {
          throw new ValidationError('Missing config key or value. Usage: tl config set <key> <value>');
        }
        setConfigValue(args[0], args.slice(1).join(' '));
        break;

      case 'path':
        console.log(getConfigPath());
        break;

      default:
        throw new ValidationError(`Unknown subcommand '${subcommand}'. Available subcommands: get, set, path`);
    }
  } catch (error) {
    handleCommandError(error);
  }
}

function requireKey(key: string): ConfigKey {
  if (!isValidConfigKey(key)) {
    throw new ValidationError(`Invalid config key '${key}'. Valid keys: ${VALID_CONFIG_KEYS.join(', ')}`);
  }
  return key;
}

/**
 * Show current configuration
 */
function showConfig(): void {
  const config = loadConfig();

  console.log(chalk.bold('\nCurrent Configuration:\n'));
  console.log(`${chalk.gray('Config file:')} ${getConfigPath()}\n`);

  const isDefault = (key: ConfigKey) =>
    key !== 'currentUser' && formatConfigValue(config, key) === formatConfigValue(DEFAULT_CONFIG, key);

  for (const key of VALID_CONFIG_KEYS) {
    const value = formatConfigValue(config, key) || chalk.gray('(not set)');
    const suffix = isDefault(key) ? chalk.gray(' (default)') : '';
    console.log(`${chalk.cyan(`${key}:`.padEnd(15))} ${value}${suffix}`);
  }

  console.log(chalk.gray('\nCommands:'));
  console.log(chalk.gray('  tl config get <key>         Get a config value'));
  console.log(chalk.gray('  tl config set <key> <value> Set a config value'));
  console.log(chalk.gray('  tl config path              Show config file path'));
}

/**
 * Get a single config value
 */
function getConfigValue(rawKey: string): void {
  const key = requireKey(rawKey);
  console.log(formatConfigValue(loadConfig(), key));
}

/**
 * Set a config value
 */
function setConfigValue(rawKey: string, value: string): void {
  const key = requireKey(rawKey);
  const update = parseConfigValue(key, value);

  if (!update) {
    throw new ValidationError(`Invalid value '${value}' for ${key}. ${getValidValuesHint(key)}`);
  }

  saveConfig({ ...loadConfigFile(), ...update });

  console.log(chalk.green(`✓ Set ${chalk.cyan(key)} = ${chalk.bold(value)}`));
}

/**
 * Get hint for valid values for a config key
 */
function getValidValuesHint(key: ConfigKey): string {
  switch (key) {
    case 'timezone':
      return 'Valid value: an IANA timezone (e.g., Europe/Zurich, UTC)';
    case 'allowedUsers':
      return 'Valid value: comma-separated names (empty allows anyone)';
    case 'logLimit':
      return `Valid value: a whole number from 1 to ${MAX_LOG_LIMIT}`;
    case 'currentUser':
      return 'Valid value: a user name';
    default:
      return '';
  }
}
