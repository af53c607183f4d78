import chalk from 'chalk';
import { withLedger, handleCommandError } from '../context';
import { NotFoundError, ValidationError } from '../../types/errors';

interface RemoveUserOptions {
  force?: boolean;
}

/**
 * tl users command implementation
 */
export function usersCommand(): void {
  try {
    withLedger(({ ledger, config }) => {
      const users = ledger.listUsers();

      if (users.length === 0) {
        console.log(chalk.gray('No users yet. Create one with: tl login <name>'));
        return;
      }

      for (const user of users) {
        const marker = user.name === config.currentUser ? chalk.green('*') : ' ';
        const running = ledger.activeSession(user.id) ? chalk.green(' (running)') : '';
        console.log(`${marker} ${user.name}${running}`);
      }
    });
  } catch (error) {
    handleCommandError(error);
  }
}

/**
 * tl remove-user command implementation
 * Deletes the user with all sessions, adjustments and log entries.
 */
export function removeUserCommand(name: string, options: RemoveUserOptions): void {
  try {
    if (!options.force) {
      throw new ValidationError(`Removing "${name}" deletes all of its records. Re-run with --force to confirm`);
    }

    withLedger(({ ledger }) => {
      const user = ledger.findUser(name);
      if (!user) {
        throw new NotFoundError(`Unknown user "${name}"`);
      }
      ledger.removeUser(user.id);
      console.log(chalk.green.bold('✓') + chalk.green(` Removed ${user.name}`));
    });
  } catch (error) {
    handleCommandError(error);
  }
}
