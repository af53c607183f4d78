import chalk from 'chalk';
import { LedgerDB } from '../../db/database';
import { migrateSecondsToMinutes } from '../../db/migrations';
import { ensureDataDir, getDatabasePath } from '../../utils/config';
import { handleCommandError } from '../context';

/**
 * tl migrate command implementation
 * Converts a database written by builds that stored seconds.
 */
export function migrateCommand(): void {
  try {
    ensureDataDir();
    const db = new LedgerDB(getDatabasePath());

    try {
      if (db.getDurationUnit() === 'minutes') {
        console.log(chalk.gray('Durations are already stored in minutes. Nothing to do.'));
        return;
      }

      const counts = migrateSecondsToMinutes(db);
      console.log(chalk.green.bold('✓') + chalk.green(' Converted durations from seconds to minutes'));
      console.log(chalk.gray(`  Sessions: ${counts.sessions}`));
      console.log(chalk.gray(`  Adjustments: ${counts.adjustments}`));
      console.log(chalk.gray(`  Log entries: ${counts.logs}`));
    } finally {
      db.close();
    }
  } catch (error) {
    handleCommandError(error);
  }
}
