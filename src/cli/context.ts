import chalk from 'chalk';
import { LedgerDB } from '../db/database';
import { TimeLedger } from '../ledger/time-ledger';
import { ensureDataDir, getDatabasePath, loadConfig } from '../utils/config';
import { logger } from '../utils/logger';
import { ResolvedConfig } from '../types/config';
import { ConflictError, NotFoundError, StorageError, ValidationError } from '../types/errors';
import { User } from '../types/ledger';

/**
 * Options every command accepts through the global flags
 */
export interface GlobalOptions {
  user?: string;
}

export interface CommandContext {
  ledger: TimeLedger;
  config: ResolvedConfig;
}

/**
 * Open the database and ledger, run fn, and always close the database
 */
export function withLedger<T>(fn: (ctx: CommandContext) => T): T {
  ensureDataDir();
  const config = loadConfig();
  const db = new LedgerDB(getDatabasePath());

  try {
    const ledger = new TimeLedger(db, { timezone: config.timezone, logLimit: config.logLimit });
    return fn({ ledger, config });
  } finally {
    db.close();
  }
}

/**
 * Throw unless the name is on the allowed list (an empty list allows anyone)
 */
export function assertAllowed(name: string, config: ResolvedConfig): void {
  if (config.allowedUsers.length > 0 && !config.allowedUsers.includes(name.trim())) {
    throw new ValidationError(`"${name}" is not an allowed user (allowed: ${config.allowedUsers.join(', ')})`);
  }
}

/**
 * Resolve the acting user: --user wins over the name saved by `tl login`
 */
export function resolveUser(ctx: CommandContext, options: GlobalOptions): User {
  const name = options.user ?? ctx.config.currentUser;
  if (!name) {
    throw new ValidationError('No user selected. Log in first with: tl login <name>');
  }
  assertAllowed(name, ctx.config);

  const user = ctx.ledger.findUser(name);
  if (!user) {
    throw new NotFoundError(`Unknown user "${name}". Log in first with: tl login ${name}`);
  }
  logger.debug(`Acting as ${user.name} (id ${user.id})`);
  return user;
}

/**
 * Print a command failure and exit with status 1
 */
export function handleCommandError(error: unknown): void {
  if (error instanceof ConflictError) {
    console.error(chalk.yellow(error.message));
  } else if (error instanceof StorageError) {
    console.error(chalk.red(`Error: ${error.message}`));
    console.error(chalk.gray('  The change was not saved; try again.'));
  } else if (error instanceof Error) {
    console.error(chalk.red(`Error: ${error.message}`));
  } else {
    console.error(chalk.red(`Error: ${String(error)}`));
  }
  process.exit(1);
}
