import chalk from 'chalk';
import { withLedger, resolveUser, handleCommandError, GlobalOptions } from '../context';
import { formatMinutes } from '../../utils/duration';
import { ValidationError } from '../../types/errors';

/**
 * Parse a signed whole number of minutes ("30", "+30", "-15")
 */
export function parseDeltaMinutes(value: string): number {
  const trimmed = value.trim();
  if (!/^[+-]?\d+$/.test(trimmed)) {
    throw new ValidationError(`Invalid minutes: "${value}". Use a whole number such as 30 or -15`);
  }
  const minutes = Number(trimmed);
  if (!Number.isSafeInteger(minutes)) {
    throw new ValidationError(`Invalid minutes: "${value}" is too large`);
  }
  return minutes;
}

/**
 * tl adjust command implementation
 */
export function adjustCommand(minutes: string, reasonArgs: string[], options: GlobalOptions): void {
  try {
    const delta = parseDeltaMinutes(minutes);
    const reason = reasonArgs.join(' ');

    withLedger((ctx) => {
      const user = resolveUser(ctx, options);
      const adjustment = ctx.ledger.adjust(user.id, delta, reason);

      const sign = adjustment.minutes > 0 ? '+' : '';
      console.log(chalk.green.bold('✓') + chalk.green(` Booked ${sign}${formatMinutes(adjustment.minutes)}`));
      if (adjustment.reason) {
        console.log(chalk.gray(`  Reason: ${adjustment.reason}`));
      }
    });
  } catch (error) {
    handleCommandError(error);
  }
}
