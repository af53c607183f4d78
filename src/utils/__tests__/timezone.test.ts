import { assertTimeZone, formatLocalTimestamp, isValidTimeZone, monthKey } from '../timezone';
import { ValidationError } from '../../types/errors';

describe('timezone helpers', () => {
  describe('monthKey', () => {
    it('should use the calendar month of the given timezone', () => {
      // 22:30 UTC on the last day of March is already April in Zurich (CEST)
      const instant = new Date('2024-03-31T22:30:00Z');
      expect(monthKey(instant, 'UTC')).toBe('2024-03');
      expect(monthKey(instant, 'Europe/Zurich')).toBe('2024-04');
    });

    it('should handle fixed offsets', () => {
      expect(monthKey(new Date('2024-01-31T23:30:00Z'), 'Etc/GMT-1')).toBe('2024-02');
      expect(monthKey(new Date('2024-02-01T00:30:00Z'), 'America/New_York')).toBe('2024-01');
    });

    it('should roll over the year', () => {
      expect(monthKey(new Date('2023-12-31T23:30:00Z'), 'Europe/Zurich')).toBe('2024-01');
    });
  });

  describe('formatLocalTimestamp', () => {
    it('should render wall-clock time in the timezone', () => {
      expect(formatLocalTimestamp(new Date('2024-04-01T00:01:10Z'), 'Etc/GMT-1')).toBe('2024-04-01 01:01:10');
    });

    it('should render midnight as 00', () => {
      expect(formatLocalTimestamp(new Date('2024-06-15T00:00:05Z'), 'UTC')).toBe('2024-06-15 00:00:05');
    });
  });

  describe('isValidTimeZone', () => {
    it('should accept IANA names', () => {
      expect(isValidTimeZone('Europe/Zurich')).toBe(true);
      expect(isValidTimeZone('UTC')).toBe(true);
    });

    it('should reject unknown or empty names', () => {
      expect(isValidTimeZone('Not/AZone')).toBe(false);
      expect(isValidTimeZone('')).toBe(false);
    });
  });

  describe('assertTimeZone', () => {
    it('should throw ValidationError for unknown zones', () => {
      expect(() => assertTimeZone('Not/AZone')).toThrow(ValidationError);
      expect(() => assertTimeZone('Not/AZone')).toThrow('Unknown timezone: Not/AZone');
    });
  });
});
