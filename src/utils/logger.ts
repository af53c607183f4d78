import chalk from 'chalk';

export type LogLevel = 'error' | 'warning' | 'info' | 'debug';

const PREFIXES: Record<LogLevel, () => string> = {
  error: () => chalk.red('ERROR:'),
  warning: () => chalk.yellow('WARNING:'),
  info: () => chalk.cyan('INFO:'),
  debug: () => chalk.gray('DEBUG:'),
};

/**
 * Process-wide logger for the tl CLI.
 * Everything goes to stderr so stdout stays clean for CSV output.
 * Debug messages only shown when verbose mode is enabled.
 */
class Logger {
  private verbose: boolean = false;

  setVerbose(enabled: boolean): void {
    this.verbose = enabled;
  }

  isVerbose(): boolean {
    return this.verbose;
  }

  error(message: string, ...args: unknown[]): void {
    this.write('error', message, args);
  }

  warning(message: string, ...args: unknown[]): void {
    this.write('warning', message, args);
  }

  info(message: string, ...args: unknown[]): void {
    this.write('info', message, args);
  }

  debug(message: string, ...args: unknown[]): void {
    if (this.verbose) {
      this.write('debug', message, args);
    }
  }

  private write(level: LogLevel, message: string, args: unknown[]): void {
    console.error(PREFIXES[level](), message, ...args);
  }
}

export const logger = new Logger();
