import chalk from 'chalk';
import { withLedger, resolveUser, handleCommandError, GlobalOptions } from '../context';

/**
 * tl start command implementation
 */
export function startCommand(options: GlobalOptions): void {
  try {
    withLedger((ctx) => {
      const user = resolveUser(ctx, options);
      const session = ctx.ledger.startSession(user.id);

      console.log(chalk.green.bold('✓') + chalk.green(` Started tracking for ${user.name}`));
      console.log(chalk.gray(`  Session ID: ${session.id}`));
      console.log(chalk.gray(`  Start time: ${ctx.ledger.localTimestamp(session.startTime)}`));
    });
  } catch (error) {
    handleCommandError(error);
  }
}
