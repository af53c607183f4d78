import { LogEntry, MonthBucket } from '../../types/ledger';
import { formatHms } from '../../utils/duration';
import { formatLocalTimestamp } from '../../utils/timezone';

/**
 * Escape CSV field
 */
export function escapeCSV(value: string | number | undefined): string {
  if (value === undefined) {
    return '';
  }

  const str = String(value);

  // If field contains comma, quote, or newline, wrap in quotes and escape quotes
  if (str.includes(',') || str.includes('"') || str.includes('\n') || str.includes('\r')) {
    return `"${str.replace(/"/g, '""')}"`;
  }

  return str;
}

function row(fields: Array<string | number | undefined>): string {
  return fields.map(escapeCSV).join(',');
}

/**
 * Month totals as CSV: Month,Minutes,Duration
 */
export function formatMonthsCsv(buckets: MonthBucket[]): string {
  const lines = ['Month,Minutes,Duration'];

  for (const bucket of buckets) {
    lines.push(row([bucket.month, bucket.minutes, formatHms(bucket.minutes * 60)]));
  }

  return lines.join('\n') + '\n';
}

/**
 * Log entries as CSV, timestamps in the display timezone
 */
export function formatLogsCsv(logs: LogEntry[], timezone: string): string {
  const lines = ['Timestamp,Kind,Minutes,Duration,Details'];

  for (const log of logs) {
    lines.push(
      row([
        formatLocalTimestamp(log.timestamp, timezone),
        log.kind,
        log.minutes,
        log.minutes === undefined ? undefined : formatHms(log.minutes * 60),
        log.details,
      ])
    );
  }

  return lines.join('\n') + '\n';
}
