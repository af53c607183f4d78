import chalk from 'chalk';
import { withLedger, resolveUser, handleCommandError, GlobalOptions } from '../context';
import { formatHms, formatMinutes } from '../../utils/duration';

/**
 * tl status command implementation
 * Shows the running session with its live elapsed time and the current
 * month's total. Re-run (e.g. under `watch`) to refresh.
 */
export function statusCommand(options: GlobalOptions): void {
  try {
    withLedger((ctx) => {
      const user = resolveUser(ctx, options);
      const active = ctx.ledger.activeSession(user.id);
      const elapsed = ctx.ledger.liveElapsedSeconds(user.id);

      console.log(chalk.bold(`${user.name}`));

      if (active && elapsed !== undefined) {
        console.log(
          chalk.green(`▶ Running since ${ctx.ledger.localTimestamp(active.startTime)}`) +
            chalk.bold(`  ${formatHms(elapsed)}`)
        );
      } else {
        console.log(chalk.gray('Not tracking. Start with: tl start'));
      }

      const monthMinutes = ctx.ledger.currentMonthMinutes(user.id);
      console.log(`This month: ${chalk.cyan(formatMinutes(monthMinutes))} ${chalk.gray(`(${formatHms(monthMinutes * 60)})`)}`);
    });
  } catch (error) {
    handleCommandError(error);
  }
}
