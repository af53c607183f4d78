import { withLedger, resolveUser, handleCommandError, GlobalOptions } from '../context';
import { formatMonthsCsv } from '../../reports/formatters/csv';
import { formatMonthsTable } from '../../reports/formatters/terminal';
import { ValidationError } from '../../types/errors';

export type OutputFormat = 'table' | 'csv';

export interface FormatOptions extends GlobalOptions {
  format?: string;
}

export function parseOutputFormat(value: string | undefined): OutputFormat {
  if (value === undefined || value === 'table') {
    return 'table';
  }
  if (value === 'csv') {
    return 'csv';
  }
  throw new ValidationError(`Invalid format "${value}". Use "table" or "csv"`);
}

/**
 * tl months command implementation
 */
export function monthsCommand(options: FormatOptions): void {
  try {
    const format = parseOutputFormat(options.format);

    withLedger((ctx) => {
      const user = resolveUser(ctx, options);
      const buckets = ctx.ledger.monthTotals(user.id);

      if (format === 'csv') {
        process.stdout.write(formatMonthsCsv(buckets));
      } else {
        console.log(formatMonthsTable(buckets));
      }
    });
  } catch (error) {
    handleCommandError(error);
  }
}
