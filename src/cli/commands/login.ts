import chalk from 'chalk';
import { withLedger, assertAllowed, handleCommandError } from '../context';
import { loadConfigFile, saveConfig } from '../../utils/config';

/**
 * tl login command implementation
 * Selects (and on first use creates) the acting user. Not authentication.
 */
export function loginCommand(name: string): void {
  try {
    const user = withLedger(({ ledger, config }) => {
      assertAllowed(name, config);
      return ledger.login(name);
    });

    saveConfig({ ...loadConfigFile(), currentUser: user.name });

    console.log(chalk.green.bold('✓') + chalk.green(` Logged in as ${user.name}`));
    console.log(chalk.gray(`  User ID: ${user.id}`));
  } catch (error) {
    handleCommandError(error);
  }
}
