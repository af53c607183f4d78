// Mock chalk so output can be compared as plain text
jest.mock('chalk', () => {
  const mockFn = (s: string) => s;
  const mockChalk = {
    green: mockFn,
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

import { formatLogTable, formatMonthsTable } from '../terminal';

describe('terminal formatters', () => {
  describe('formatMonthsTable', () => {
    it('should align months and totals', () => {
      expect(
        formatMonthsTable([
          { month: '2024-04', minutes: 125 },
          { month: '2024-03', minutes: -15 },
        ])
      ).toBe(['Month         Total', '2024-04       2h 5m', '2024-03        -15m'].join('\n'));
    });

    it('should say when nothing is booked', () => {
      expect(formatMonthsTable([])).toBe('No time booked yet.');
    });
  });

  describe('formatLogTable', () => {
    it('should print one line per entry', () => {
      const output = formatLogTable(
        [
          {
            id: 2,
            userId: 1,
            kind: 'stop',
            timestamp: new Date('2024-04-01T09:30:00Z'),
            minutes: 30,
            details: 'Stopped at 2024-04-01 09:30:00 (00:30:00)',
          },
          {
            id: 1,
            userId: 1,
            kind: 'start',
            timestamp: new Date('2024-04-01T09:00:00Z'),
            details: 'Started at 2024-04-01 09:00:00',
          },
        ],
        'UTC'
      );

      expect(output.split('\n')).toEqual([
        '2024-04-01 09:30:00  stop        30m  Stopped at 2024-04-01 09:30:00 (00:30:00)',
        '2024-04-01 09:00:00  start            Started at 2024-04-01 09:00:00',
      ]);
    });

    it('should say when the log is empty', () => {
      expect(formatLogTable([], 'UTC')).toBe('No log entries.');
    });
  });
});
