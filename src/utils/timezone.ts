import { ValidationError } from '../types/errors';

interface LocalParts {
  year: string;
  month: string;
  day: string;
  hour: string;
  minute: string;
  second: string;
}

const formatters = new Map<string, Intl.DateTimeFormat>();

function getFormatter(timeZone: string): Intl.DateTimeFormat {
  let formatter = formatters.get(timeZone);
  if (!formatter) {
    formatter = new Intl.DateTimeFormat('en-US', {
      timeZone,
      year: 'numeric',
      month: '2-digit',
      day: '2-digit',
      hour: '2-digit',
      minute: '2-digit',
      second: '2-digit',
      hourCycle: 'h23',
    });
    formatters.set(timeZone, formatter);
  }
  return formatter;
}

function localParts(date: Date, timeZone: string): LocalParts {
  const parts: LocalParts = { year: '', month: '', day: '', hour: '', minute: '', second: '' };

  for (const part of getFormatter(timeZone).formatToParts(date)) {
    switch (part.type) {
      case 'year':
      case 'month':
      case 'day':
      case 'hour':
      case 'minute':
      case 'second':
        parts[part.type] = part.value;
        break;
    }
  }

  return parts;
}

/**
 * Check whether a string names a timezone the runtime knows
 */
export function isValidTimeZone(timeZone: string): boolean {
  if (!timeZone) {
    return false;
  }
  try {
    getFormatter(timeZone);
    return true;
  } catch {
    return false;
  }
}

/**
 * Throw a ValidationError for an unknown timezone
 */
export function assertTimeZone(timeZone: string): void {
  if (!isValidTimeZone(timeZone)) {
    throw new ValidationError(`Unknown timezone: ${timeZone}`);
  }
}

/**
 * Calendar month key (YYYY-MM) of an instant in the given timezone
 */
export function monthKey(date: Date, timeZone: string): string {
  const { year, month } = localParts(date, timeZone);
  return `${year}-${month}`;
}

/**
 * Local wall-clock timestamp (yyyy-MM-dd HH:mm:ss) of an instant
 */
export function formatLocalTimestamp(date: Date, timeZone: string): string {
  const p = localParts(date, timeZone);
  return `${p.year}-${p.month}-${p.day} ${p.hour}:${p.minute}:${p.second}`;
}
