import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import {
  getConfigPath,
  getDatabasePath,
  isValidConfigKey,
  loadConfig,
  loadConfigFile,
  parseConfigValue,
  parseNameList,
  saveConfig,
} from '../config';
import { logger } from '../logger';

describe('config', () => {
  let configDir: string;
  let warningSpy: jest.SpyInstance;
  const savedEnv = { ...process.env };

  const writeConfig = (contents: string) => {
    fs.mkdirSync(configDir, { recursive: true });
    fs.writeFileSync(path.join(configDir, 'config.json'), contents, 'utf-8');
  };

  beforeEach(() => {
    configDir = fs.mkdtempSync(path.join(os.tmpdir(), 'tl-config-'));
    process.env.TL_CONFIG_DIR = configDir;
    delete process.env.TL_TIMEZONE;
    delete process.env.TL_ALLOWED_USERS;
    warningSpy = jest.spyOn(logger, 'warning').mockImplementation();
  });

  afterEach(() => {
    warningSpy.mockRestore();
    fs.rmSync(configDir, { recursive: true, force: true });
    process.env = { ...savedEnv };
  });

  describe('paths', () => {
    it('should honour TL_CONFIG_DIR and TL_DATA_DIR', () => {
      process.env.TL_DATA_DIR = '/tmp/tl-data';
      expect(getConfigPath()).toBe(path.join(configDir, 'config.json'));
      expect(getDatabasePath()).toBe(path.join('/tmp/tl-data', 'tl.db'));
    });
  });

  describe('loadConfig', () => {
    it('should return defaults without a config file', () => {
      expect(loadConfig()).toEqual({
        timezone: 'Europe/Zurich',
        allowedUsers: [],
        logLimit: 500,
        currentUser: undefined,
      });
    });

    it('should read and clean values from the file', () => {
      writeConfig(
        JSON.stringify({
          timezone: 'UTC',
          allowedUsers: [' Alice ', 3, '', 'Bob'],
          logLimit: 900,
          currentUser: 'Alice',
        })
      );

      expect(loadConfig()).toEqual({
        timezone: 'UTC',
        allowedUsers: ['Alice', 'Bob'],
        logLimit: 500,
        currentUser: 'Alice',
      });
    });

    it('should ignore an unknown timezone with a warning', () => {
      writeConfig(JSON.stringify({ timezone: 'Mars/Olympus' }));

      expect(loadConfig().timezone).toBe('Europe/Zurich');
      expect(warningSpy).toHaveBeenCalledWith('Ignoring invalid timezone in config: Mars/Olympus');
    });

    it('should fall back to defaults for malformed JSON', () => {
      writeConfig('{ not json');

      expect(loadConfig().timezone).toBe('Europe/Zurich');
      expect(warningSpy).toHaveBeenCalledTimes(1);
    });

    it('should let the environment override the file', () => {
      writeConfig(JSON.stringify({ timezone: 'UTC', allowedUsers: ['Alice'] }));
      process.env.TL_TIMEZONE = 'America/New_York';
      process.env.TL_ALLOWED_USERS = 'Dana, Eve,';

      const config = loadConfig();
      expect(config.timezone).toBe('America/New_York');
      expect(config.allowedUsers).toEqual(['Dana', 'Eve']);
    });

    it('should keep environment values out of loadConfigFile', () => {
      writeConfig(JSON.stringify({ timezone: 'UTC' }));
      process.env.TL_TIMEZONE = 'America/New_York';

      expect(loadConfigFile()).toEqual({ timezone: 'UTC' });
    });
  });

  describe('saveConfig', () => {
    it('should only write non-default values', () => {
      saveConfig({ timezone: 'Europe/Zurich', logLimit: 100, currentUser: 'Bob', allowedUsers: [] });

      const written = JSON.parse(fs.readFileSync(path.join(configDir, 'config.json'), 'utf-8'));
      expect(written).toEqual({ logLimit: 100, currentUser: 'Bob' });
    });

    it('should round-trip through loadConfigFile', () => {
      saveConfig({ timezone: 'UTC', allowedUsers: ['Alice'] });
      expect(loadConfigFile()).toEqual({ timezone: 'UTC', allowedUsers: ['Alice'] });
    });
  });

  describe('parseConfigValue', () => {
    it('should validate timezones', () => {
      expect(parseConfigValue('timezone', 'UTC')).toEqual({ timezone: 'UTC' });
      expect(parseConfigValue('timezone', 'Mars/Olympus')).toBeUndefined();
    });

    it('should validate log limits', () => {
      expect(parseConfigValue('logLimit', '20')).toEqual({ logLimit: 20 });
      expect(parseConfigValue('logLimit', '0')).toBeUndefined();
      expect(parseConfigValue('logLimit', '501')).toBeUndefined();
      expect(parseConfigValue('logLimit', '2.5')).toBeUndefined();
    });

    it('should split allowed users', () => {
      expect(parseConfigValue('allowedUsers', 'Alice,Bob')).toEqual({ allowedUsers: ['Alice', 'Bob'] });
    });
  });

  it('should recognise config keys', () => {
    expect(isValidConfigKey('timezone')).toBe(true);
    expect(isValidConfigKey('editor')).toBe(false);
  });

  it('should parse name lists', () => {
    expect(parseNameList(' a ,, b ')).toEqual(['a', 'b']);
    expect(parseNameList('')).toEqual([]);
  });
});
