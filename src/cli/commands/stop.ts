import chalk from 'chalk';
import { withLedger, resolveUser, handleCommandError, GlobalOptions } from '../context';
import { formatHms, formatMinutes } from '../../utils/duration';

/**
 * tl stop command implementation
 */
export function stopCommand(options: GlobalOptions): void {
  try {
    withLedger((ctx) => {
      const user = resolveUser(ctx, options);
      const { session, elapsedSeconds } = ctx.ledger.stopSession(user.id);

      console.log(chalk.green.bold('✓') + chalk.green(' Stopped tracking'));
      console.log(chalk.gray(`  Elapsed: ${formatHms(elapsedSeconds)}`));
      console.log(chalk.gray(`  Booked: ${formatMinutes(session.minutes)}`));
      console.log(chalk.gray(`  Stop time: ${ctx.ledger.localTimestamp(session.endTime)}`));
    });
  } catch (error) {
    handleCommandError(error);
  }
}
