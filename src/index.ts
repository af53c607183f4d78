#!/usr/bin/env node

import { Command } from 'commander';
import { loginCommand } from './cli/commands/login';
import { startCommand } from './cli/commands/start';
import { stopCommand } from './cli/commands/stop';
import { adjustCommand } from './cli/commands/adjust';
import { statusCommand } from './cli/commands/status';
import { monthsCommand } from './cli/commands/months';
import { logCommand } from './cli/commands/log';
import { usersCommand, removeUserCommand } from './cli/commands/users';
import { migrateCommand } from './cli/commands/migrate';
import { configCommand } from './cli/commands/config';
import { GlobalOptions } from './cli/context';
import { logger } from './utils/logger';

const program = new Command();

program
  .name('tl')
  .description('Time ledger: work sessions, manual adjustments and monthly totals')
  .option('-v, --verbose', 'Output debug messages.')
  .option('-u, --user <name>', 'Act as this user instead of the logged-in one')
  .version('1.0.0');

// Hook to enable verbose logging before any command runs
program.hook('preAction', (thisCommand) => {
  const opts = thisCommand.optsWithGlobals();
  if (opts.verbose) {
    logger.setVerbose(true);
    logger.debug('Verbose mode enabled');
  }
});

// Status command (default)
program
  .command('status', { isDefault: true })
  .description('Show the running session and this month\'s total')
  .action((_options, command: Command) => statusCommand(command.optsWithGlobals<GlobalOptions>()));

program
  .command('login')
  .description('Select the acting user, creating it on first login')
  .argument('<name>', 'User name')
  .action(loginCommand);

program
  .command('start')
  .description('Start a work session')
  .action((_options, command: Command) => startCommand(command.optsWithGlobals<GlobalOptions>()));

program
  .command('stop')
  .description('Stop the running work session')
  .action((_options, command: Command) => stopCommand(command.optsWithGlobals<GlobalOptions>()));

program
  .command('adjust')
  .description('Book a manual correction in minutes (negative to subtract)')
  .argument('<minutes>', 'Signed whole minutes, e.g. 30 or -15')
  .argument('[reason...]', 'Optional reason')
  // "-15" would otherwise be parsed as an unknown option
  .allowUnknownOption()
  .action((minutes: string, reason: string[], _options, command: Command) =>
    adjustCommand(minutes, reason, command.optsWithGlobals<GlobalOptions>())
  );

program
  .command('months')
  .description('Show totals per calendar month, newest first')
  .option('--format <format>', 'Output format: "table" (default) or "csv"', 'table')
  .action((_options, command: Command) => monthsCommand(command.optsWithGlobals()));

program
  .command('log')
  .description('Show the audit log, newest first')
  .option('-n, --limit <count>', 'Number of entries (at most 500)')
  .option('--format <format>', 'Output format: "table" (default) or "csv"', 'table')
  .action((_options, command: Command) => logCommand(command.optsWithGlobals()));

program
  .command('users')
  .description('List known users')
  .action(usersCommand);

program
  .command('remove-user')
  .description('Delete a user and all of its records')
  .argument('<name>', 'User name')
  .option('-f, --force', 'Confirm the deletion')
  .action(removeUserCommand);

program
  .command('migrate')
  .description('Convert durations stored in seconds to minutes (one-time)')
  .action(migrateCommand);

program
  .command('config')
  .description('Show or change configuration')
  .argument('[subcommand]', 'get, set or path')
  .argument('[args...]', 'Key and value')
  .action(configCommand);

program.parse();
