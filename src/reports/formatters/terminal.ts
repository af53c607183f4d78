import chalk from 'chalk';
import { LogEntry, LogKind, MonthBucket } from '../../types/ledger';
import { formatMinutes } from '../../utils/duration';
import { formatLocalTimestamp } from '../../utils/timezone';

const KIND_COLORS: Record<LogKind, (text: string) => string> = {
  start: chalk.green,
  stop: chalk.cyan,
  adjust: chalk.yellow,
};

/**
 * Month totals as an aligned two-column table, newest month first
 */
export function formatMonthsTable(buckets: MonthBucket[]): string {
  if (buckets.length === 0) {
    return chalk.gray('No time booked yet.');
  }

  const lines: string[] = [];
  lines.push(chalk.bold(`${'Month'.padEnd(9)}${'Total'.padStart(10)}`));

  for (const bucket of buckets) {
    const total = formatMinutes(bucket.minutes).padStart(10);
    lines.push(`${bucket.month.padEnd(9)}${bucket.minutes < 0 ? chalk.red(total) : total}`);
  }

  return lines.join('\n');
}

/**
 * Log entries, one per line: timestamp, kind, duration, details
 */
export function formatLogTable(logs: LogEntry[], timezone: string): string {
  if (logs.length === 0) {
    return chalk.gray('No log entries.');
  }

  return logs
    .map((log) => {
      const ts = chalk.gray(formatLocalTimestamp(log.timestamp, timezone));
      const kind = KIND_COLORS[log.kind](log.kind.padEnd(6));
      const duration = (log.minutes === undefined ? '' : formatMinutes(log.minutes)).padStart(8);
      return `${ts}  ${kind} ${duration}  ${log.details}`;
    })
    .join('\n');
}
