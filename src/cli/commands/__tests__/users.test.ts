import * as fs from 'fs';

// Set up test database path - use fixed path for this test file
const testDataDir = '/tmp/tl-test-users-cmd';
const testDbPath = `${testDataDir}/test.db`;

// Turn process.exit into an exception the test can assert on
jest.spyOn(process, 'exit').mockImplementation(() => {
  throw new Error('process.exit');
});

// Mock chalk so output can be compared as plain text
jest.mock('chalk', () => {
  const mockFn = (s: string) => s;
  const mockChalk = {
    green: Object.assign(mockFn, { bold: mockFn }),
    gray: mockFn,
    red: mockFn,
    yellow: mockFn,
    cyan: mockFn,
    bold: mockFn,
  };
  return {
    default: mockChalk,
    ...mockChalk,
  };
});

// Mock logger
jest.mock('../../../utils/logger', () => ({
  logger: {
    debug: jest.fn(),
    info: jest.fn(),
    warning: jest.fn(),
    error: jest.fn(),
    setVerbose: jest.fn(),
  },
}));

// Mock config to use test paths
jest.mock('../../../utils/config', () => {
  const fs = require('fs');
  const testDataDir = '/tmp/tl-test-users-cmd';

  return {
    getDatabasePath: jest.fn(() => `${testDataDir}/test.db`),
    ensureDataDir: jest.fn(() => {
      fs.mkdirSync(testDataDir, { recursive: true });
    }),
    loadConfig: jest.fn(() => ({
      timezone: 'UTC',
      allowedUsers: [],
      logLimit: 500,
      currentUser: 'Alice',
    })),
    loadConfigFile: jest.fn(() => ({})),
    saveConfig: jest.fn(),
  };
});

import { usersCommand, removeUserCommand } from '../users';
import { migrateCommand } from '../migrate';
import { LedgerDB } from '../../../db/database';

describe('user management commands', () => {
  let db: LedgerDB;
  let logSpy: jest.SpyInstance;
  let errorSpy: jest.SpyInstance;

  beforeEach(() => {
    fs.rmSync(testDataDir, { recursive: true, force: true });
    fs.mkdirSync(testDataDir, { recursive: true });

    db = new LedgerDB(testDbPath);

    jest.clearAllMocks();
    logSpy = jest.spyOn(console, 'log').mockImplementation();
    errorSpy = jest.spyOn(console, 'error').mockImplementation();
  });

  afterEach(() => {
    db.close();
    logSpy.mockRestore();
    errorSpy.mockRestore();
  });

  describe('users', () => {
    it('should mark the current user and running sessions', () => {
      const alice = db.findOrCreateUser('Alice');
      db.findOrCreateUser('Bob');
      db.insertSession(alice.id, new Date('2024-03-10T10:00:00Z'));

      usersCommand();

      expect(logSpy.mock.calls).toEqual([['* Alice (running)'], ['  Bob']]);
    });

    it('should hint at login when there are no users', () => {
      usersCommand();

      expect(logSpy).toHaveBeenCalledWith('No users yet. Create one with: tl login <name>');
    });
  });

  describe('remove-user', () => {
    it('should require --force', () => {
      db.findOrCreateUser('Bob');

      expect(() => removeUserCommand('Bob', {})).toThrow('process.exit');

      expect(errorSpy).toHaveBeenCalledWith(
        'Error: Removing "Bob" deletes all of its records. Re-run with --force to confirm'
      );
      expect(db.getUserByName('Bob')).not.toBeNull();
    });

    it('should remove the user with --force', () => {
      db.findOrCreateUser('Bob');

      removeUserCommand('Bob', { force: true });

      expect(db.getUserByName('Bob')).toBeNull();
      expect(logSpy).toHaveBeenCalledWith('✓ Removed Bob');
    });

    it('should report an unknown user', () => {
      expect(() => removeUserCommand('Zed', { force: true })).toThrow('process.exit');

      expect(errorSpy).toHaveBeenCalledWith('Error: Unknown user "Zed"');
    });
  });

  describe('migrate', () => {
    it('should do nothing on a database already in minutes', () => {
      migrateCommand();

      expect(logSpy).toHaveBeenCalledWith('Durations are already stored in minutes. Nothing to do.');
    });

    it('should convert a database stored in seconds', () => {
      const alice = db.findOrCreateUser('Alice');
      const session = db.insertSession(alice.id, new Date('2024-03-10T10:00:00Z'));
      db.finishSession(session.id, new Date('2024-03-10T10:02:30Z'), 150);
      db.insertAdjustment(alice.id, -20, undefined, new Date('2024-03-10T11:00:00Z'));
      db.setDurationUnit('seconds');

      migrateCommand();

      expect(db.getDurationUnit()).toBe('minutes');
      expect(db.getSessionById(session.id)?.minutes).toBe(3);
      expect(db.listAdjustments(alice.id)[0].minutes).toBe(-1);
      expect(logSpy).toHaveBeenCalledWith('  Sessions: 1');
      expect(logSpy).toHaveBeenCalledWith('  Adjustments: 1');
    });
  });
});
