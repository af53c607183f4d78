import { withLedger, resolveUser, handleCommandError } from '../context';
import { FormatOptions, parseOutputFormat } from './months';
import { formatLogsCsv } from '../../reports/formatters/csv';
import { formatLogTable } from '../../reports/formatters/terminal';
import { ValidationError } from '../../types/errors';

interface LogOptions extends FormatOptions {
  limit?: string;
}

function parseLimit(value: string | undefined): number | undefined {
  if (value === undefined) {
    return undefined;
  }
  const limit = Number(value);
  if (!Number.isInteger(limit) || limit <= 0) {
    throw new ValidationError(`Invalid limit "${value}". Use a positive whole number`);
  }
  return limit;
}

/**
 * tl log command implementation
 * Newest entries first.
 */
export function logCommand(options: LogOptions): void {
  try {
    const format = parseOutputFormat(options.format);
    const limit = parseLimit(options.limit);

    withLedger((ctx) => {
      const user = resolveUser(ctx, options);
      const logs = ctx.ledger.recentLogs(user.id, limit);

      if (format === 'csv') {
        process.stdout.write(formatLogsCsv(logs, ctx.ledger.timezone));
      } else {
        console.log(formatLogTable(logs, ctx.ledger.timezone));
      }
    });
  } catch (error) {
    handleCommandError(error);
  }
}
