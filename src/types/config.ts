import { MAX_LOG_ENTRIES } from './ledger';

/**
 * User configuration schema
 * Stored in ~/.config/tl/config.json
 */

export interface UserConfig {
  /**
   * IANA timezone used for month buckets and displayed timestamps
   * @default "Europe/Zurich"
   */
  timezone?: string;

  /**
   * Names allowed to log in. Empty means anyone.
   * @default []
   */
  allowedUsers?: string[];

  /**
   * Number of log entries shown by `tl log`
   * @default 500
   */
  logLimit?: number;

  /**
   * Name remembered by the last `tl login`
   */
  currentUser?: string;
}

export type ResolvedConfig = Required<Omit<UserConfig, 'currentUser'>> & Pick<UserConfig, 'currentUser'>;

export const MAX_LOG_LIMIT = MAX_LOG_ENTRIES;

export const DEFAULT_CONFIG: ResolvedConfig = {
  timezone: 'Europe/Zurich',
  allowedUsers: [],
  logLimit: MAX_LOG_LIMIT,
};

export const VALID_CONFIG_KEYS = [
  'timezone',
  'allowedUsers',
  'logLimit',
  'currentUser',
] as const;

export type ConfigKey = typeof VALID_CONFIG_KEYS[number];
