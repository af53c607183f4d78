import { escapeCSV, formatLogsCsv, formatMonthsCsv } from '../csv';
import { LogEntry } from '../../../types/ledger';

describe('CSV formatters', () => {
  describe('escapeCSV', () => {
    it('should leave plain values alone', () => {
      expect(escapeCSV('2024-04')).toBe('2024-04');
      expect(escapeCSV(-15)).toBe('-15');
      expect(escapeCSV(undefined)).toBe('');
    });

    it('should quote commas, quotes and newlines', () => {
      expect(escapeCSV('fix, "urgent"')).toBe('"fix, ""urgent"""');
      expect(escapeCSV('line\nbreak')).toBe('"line\nbreak"');
    });
  });

  it('should render month totals', () => {
    const csv = formatMonthsCsv([
      { month: '2024-04', minutes: 50 },
      { month: '2024-03', minutes: -5 },
    ]);

    expect(csv).toBe('Month,Minutes,Duration\n2024-04,50,00:50:00\n2024-03,-5,-00:05:00\n');
  });

  it('should render only the header for no months', () => {
    expect(formatMonthsCsv([])).toBe('Month,Minutes,Duration\n');
  });

  it('should render log entries in the display timezone', () => {
    const logs: LogEntry[] = [
      {
        id: 2,
        userId: 1,
        kind: 'adjust',
        timestamp: new Date('2024-04-05T12:00:00Z'),
        minutes: -15,
        details: 'fix, "urgent"',
      },
      {
        id: 1,
        userId: 1,
        kind: 'start',
        timestamp: new Date('2024-04-01T22:30:00Z'),
        details: 'Started at 2024-04-02 00:30:00',
      },
    ];

    expect(formatLogsCsv(logs, 'Europe/Zurich')).toBe(
      'Timestamp,Kind,Minutes,Duration,Details\n' +
        '2024-04-05 14:00:00,adjust,-15,-00:15:00,"fix, ""urgent"""\n' +
        '2024-04-02 00:30:00,start,,,Started at 2024-04-02 00:30:00\n'
    );
  });
});
